export { valid, invalid, fieldError } from './base.js';
export { NumericValidator, RangeValidator, AgeValidator, DecimalValidator } from './numeric.js';
export type { RangeOptions, AgeOptions, DecimalOptions } from './numeric.js';
export {
  MinMaxLengthValidator,
  AlphanumericValidator,
  AlphabeticValidator,
  NameValidator,
  AddressValidator,
  PlaceNameValidator,
  GenderValidator,
} from './string.js';
export type { LengthBounds, NameOptions, GenderOptions } from './string.js';
export {
  PhoneNumberValidator,
  EmailValidator,
  ZipcodeValidator,
  PincodeValidator,
} from './contact.js';
export type { PhoneNumberOptions, EmailOptions } from './contact.js';
export { DateValidator, CrossFieldDateValidator, compileDateFormat } from './date.js';
export type { DateValidatorOptions, DatePair } from './date.js';
export { BooleanValidator, PasswordValidator } from './credentials.js';
export type { PasswordOptions } from './credentials.js';
export { FileValidator, DocumentValidator, ImageValidator } from './file.js';
export type { FileRules, DocumentValidatorOptions, ImageValidatorOptions } from './file.js';
