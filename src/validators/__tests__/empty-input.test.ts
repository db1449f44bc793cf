import { describe, expect, it } from 'vitest';

import {
  AddressValidator,
  AgeValidator,
  AlphabeticValidator,
  AlphanumericValidator,
  BooleanValidator,
  CrossFieldDateValidator,
  DateValidator,
  DecimalValidator,
  DocumentValidator,
  EmailValidator,
  FileValidator,
  GenderValidator,
  ImageValidator,
  MinMaxLengthValidator,
  NameValidator,
  NumericValidator,
  PasswordValidator,
  PhoneNumberValidator,
  PincodeValidator,
  PlaceNameValidator,
  RangeValidator,
  ZipcodeValidator,
} from '../index.js';
import type { AsyncValidator, Validator } from '../../types/validation.js';

const validators: Array<[string, Validator<unknown> | AsyncValidator<unknown>]> = [
  ['numeric', new NumericValidator()],
  ['range', new RangeValidator({ min: 0, max: 10 })],
  ['age', new AgeValidator()],
  ['decimal', new DecimalValidator()],
  ['length', new MinMaxLengthValidator()],
  ['length with zero bounds', new MinMaxLengthValidator({ minLength: 0, maxLength: 0 })],
  ['alphanumeric', new AlphanumericValidator()],
  ['alphabetic', new AlphabeticValidator()],
  ['name', new NameValidator()],
  ['address', new AddressValidator()],
  ['place name', new PlaceNameValidator()],
  ['gender', new GenderValidator()],
  ['gender without a minimum', new GenderValidator({ minLength: 0 })],
  ['phone', new PhoneNumberValidator()],
  ['email', new EmailValidator({ checkDomain: false })],
  ['email without a minimum', new EmailValidator({ minLength: 0, checkDomain: false })],
  ['zipcode', new ZipcodeValidator()],
  ['zipcode without bounds', new ZipcodeValidator({ minLength: 0, maxLength: 0 })],
  ['pincode', new PincodeValidator()],
  ['date', new DateValidator()],
  ['date range', new CrossFieldDateValidator()],
  ['boolean', new BooleanValidator()],
  ['password', new PasswordValidator()],
  ['file', new FileValidator({ allowedExtensions: ['.txt'], maxFileSizeMb: 1 })],
  ['document', new DocumentValidator()],
  ['image', new ImageValidator()],
];

describe('every validator', () => {
  it.each(validators)('%s should reject the empty string', async (_kind, validator) => {
    expect((await validator.validate('')).isValid).toBe(false);
  });

  it.each(validators)('%s should reject a value of the wrong type', async (_kind, validator) => {
    expect((await validator.validate({})).isValid).toBe(false);
    expect((await validator.validate(null)).isValid).toBe(false);
  });
});
