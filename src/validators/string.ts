import { FieldErrorCode, type ValidationResult, type Validator } from '../types/validation.js';
import {
  ADDRESS_LENGTH,
  FIELD_PATTERNS,
  GENDER_MIN_LENGTH,
  NAME_LENGTH,
  PLACE_NAME_LENGTH,
  VALID_GENDERS,
} from '../constants/validation.js';
import { FIELD_MESSAGES } from '../constants/messages.js';
import { invalid, unsupportedInput, valid } from './base.js';

export interface LengthBounds {
  minLength?: number;
  maxLength?: number;
}

/**
 * Length check for strings, counted in code points. A bound of zero counts as
 * unset, so `{ maxLength: 0 }` accepts any length. The empty string fails
 * `EMPTY_VALUE` once the bounds pass.
 */
export class MinMaxLengthValidator implements Validator<string> {
  constructor(
    private readonly bounds: LengthBounds = {},
    private readonly emptyMessage: string = FIELD_MESSAGES.EMPTY_VALUE
  ) {}

  public validate = (value: unknown): ValidationResult<string> => {
    if (typeof value !== 'string') {
      return invalid(FieldErrorCode.NOT_A_STRING, FIELD_MESSAGES.NOT_A_STRING);
    }

    const { minLength, maxLength } = this.bounds;
    const length = [...value].length;

    if (minLength && length < minLength) {
      return invalid(FieldErrorCode.TOO_SHORT, FIELD_MESSAGES.TOO_SHORT(minLength));
    }
    if (maxLength && length > maxLength) {
      return invalid(FieldErrorCode.TOO_LONG, FIELD_MESSAGES.TOO_LONG(maxLength));
    }
    if (length === 0) {
      return invalid(FieldErrorCode.EMPTY_VALUE, this.emptyMessage);
    }

    return valid(value);
  };
}

const characterClassValidator = (
  pattern: RegExp,
  code: FieldErrorCode,
  message: string
): Validator<string> => ({
  validate: (value: unknown): ValidationResult<string> => {
    if (typeof value !== 'string') {
      return unsupportedInput('a string');
    }
    if (value === '') {
      return invalid(FieldErrorCode.EMPTY_VALUE, FIELD_MESSAGES.EMPTY_VALUE);
    }
    if (!pattern.test(value)) {
      return invalid(code, message);
    }
    return valid(value);
  },
});

export class AlphanumericValidator implements Validator<string> {
  private readonly inner = characterClassValidator(
    FIELD_PATTERNS.ALPHANUMERIC,
    FieldErrorCode.NOT_ALPHANUMERIC,
    FIELD_MESSAGES.NOT_ALPHANUMERIC
  );

  public validate = (value: unknown): ValidationResult<string> => this.inner.validate(value);
}

export class AlphabeticValidator implements Validator<string> {
  private readonly inner = characterClassValidator(
    FIELD_PATTERNS.ALPHABETIC,
    FieldErrorCode.NOT_ALPHABETIC,
    FIELD_MESSAGES.NOT_ALPHABETIC
  );

  public validate = (value: unknown): ValidationResult<string> => this.inner.validate(value);
}

export interface NameOptions extends LengthBounds {
  fieldName?: string;
}

/** First, middle or last name: letters, spaces, hyphens and apostrophes. */
export class NameValidator implements Validator<string> {
  private readonly fieldName: string;
  private readonly length: MinMaxLengthValidator;

  constructor({
    fieldName = 'name',
    minLength = NAME_LENGTH.min,
    maxLength = NAME_LENGTH.max,
  }: NameOptions = {}) {
    this.fieldName = fieldName;
    this.length = new MinMaxLengthValidator({ minLength, maxLength });
  }

  public validate = (value: unknown): ValidationResult<string> => {
    const result = this.length.validate(value);
    if (!result.isValid) {
      return result;
    }
    if (!FIELD_PATTERNS.NAME.test(result.sanitizedValue)) {
      return invalid(FieldErrorCode.BAD_FORMAT, FIELD_MESSAGES.INVALID_NAME(this.fieldName));
    }
    return result;
  };
}

export class AddressValidator implements Validator<string> {
  private readonly length: MinMaxLengthValidator;

  constructor({ minLength = ADDRESS_LENGTH.min, maxLength = ADDRESS_LENGTH.max }: LengthBounds = {}) {
    this.length = new MinMaxLengthValidator({ minLength, maxLength });
  }

  public validate = (value: unknown): ValidationResult<string> => {
    const result = this.length.validate(value);
    if (!result.isValid) {
      return result;
    }
    if (!FIELD_PATTERNS.ADDRESS.test(result.sanitizedValue)) {
      return invalid(FieldErrorCode.BAD_FORMAT, FIELD_MESSAGES.INVALID_ADDRESS);
    }
    return result;
  };
}

/** District, city or state name. Character check runs before the length check. */
export class PlaceNameValidator implements Validator<string> {
  private readonly length: MinMaxLengthValidator;

  constructor({
    minLength = PLACE_NAME_LENGTH.min,
    maxLength = PLACE_NAME_LENGTH.max,
  }: LengthBounds = {}) {
    this.length = new MinMaxLengthValidator({ minLength, maxLength });
  }

  public validate = (value: unknown): ValidationResult<string> => {
    if (typeof value !== 'string') {
      return unsupportedInput('a string');
    }
    if (value === '') {
      return invalid(FieldErrorCode.EMPTY_VALUE, FIELD_MESSAGES.EMPTY_VALUE);
    }
    if (!FIELD_PATTERNS.PLACE_NAME.test(value)) {
      return invalid(FieldErrorCode.BAD_FORMAT, FIELD_MESSAGES.INVALID_PLACE_NAME);
    }
    return this.length.validate(value);
  };
}

export interface GenderOptions {
  validGenders?: readonly string[];
  minLength?: number;
}

/** Case-folds the input and returns it lower-cased when it is one of the allowed values. */
export class GenderValidator implements Validator<string> {
  private readonly validGenders: readonly string[];
  private readonly length: MinMaxLengthValidator;

  constructor({ validGenders = VALID_GENDERS, minLength = GENDER_MIN_LENGTH }: GenderOptions = {}) {
    this.validGenders = validGenders.map((gender) => gender.toLowerCase());
    this.length = new MinMaxLengthValidator({ minLength });
  }

  public validate = (value: unknown): ValidationResult<string> => {
    if (typeof value !== 'string') {
      return unsupportedInput('a string');
    }

    const gender = value.toLowerCase();
    const result = this.length.validate(gender);
    if (!result.isValid) {
      return result;
    }
    if (!this.validGenders.includes(gender)) {
      return invalid(FieldErrorCode.INVALID_CHOICE, FIELD_MESSAGES.INVALID_GENDER(this.validGenders));
    }
    return valid(gender);
  };
}
