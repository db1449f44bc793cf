import { FieldErrorCode, type ValidationResult, type Validator } from '../types/validation.js';
import { DEFAULT_DECIMAL_PLACES_CAP, DEFAULT_MIN_AGE, FIELD_PATTERNS } from '../constants/validation.js';
import { FIELD_MESSAGES } from '../constants/messages.js';
import { invalid, unsupportedInput, valid } from './base.js';

/**
 * Accepts a finite number, or a string holding a decimal floating-point
 * literal (sign, exponent and surrounding whitespace allowed).
 */
export class NumericValidator implements Validator<number> {
  public validate = (value: unknown): ValidationResult<number> => {
    if (typeof value === 'number') {
      return Number.isFinite(value)
        ? valid(value)
        : invalid(FieldErrorCode.NOT_A_NUMBER, FIELD_MESSAGES.NOT_A_NUMBER);
    }

    if (typeof value !== 'string') {
      return unsupportedInput('a number or numeric string');
    }

    if (!FIELD_PATTERNS.NUMBER.test(value)) {
      return invalid(FieldErrorCode.NOT_A_NUMBER, FIELD_MESSAGES.NOT_A_NUMBER);
    }

    const parsed = Number(value.trim());
    return Number.isFinite(parsed)
      ? valid(parsed)
      : invalid(FieldErrorCode.NOT_A_NUMBER, FIELD_MESSAGES.NOT_A_NUMBER);
  };
}

export interface RangeOptions {
  min?: number;
  max?: number;
}

export class RangeValidator implements Validator<number> {
  private readonly numeric = new NumericValidator();

  constructor(private readonly options: RangeOptions = {}) {}

  public validate = (value: unknown): ValidationResult<number> => {
    const result = this.numeric.validate(value);
    if (!result.isValid) {
      return result;
    }

    const { min, max } = this.options;
    const number = result.sanitizedValue;

    if (min !== undefined && number < min) {
      return invalid(FieldErrorCode.BELOW_MIN, FIELD_MESSAGES.BELOW_MIN(min));
    }
    if (max !== undefined && number > max) {
      return invalid(FieldErrorCode.ABOVE_MAX, FIELD_MESSAGES.ABOVE_MAX(max));
    }

    return valid(number);
  };
}

export interface AgeOptions {
  minAge?: number;
  maxAge?: number;
}

/** Range check with a lower bound of `minAge` (18 unless given) and an optional upper bound. */
export class AgeValidator implements Validator<number> {
  private readonly minAge: number;
  private readonly maxAge?: number;
  private readonly range: RangeValidator;

  constructor({ minAge = DEFAULT_MIN_AGE, maxAge }: AgeOptions = {}) {
    this.minAge = minAge;
    this.maxAge = maxAge;
    this.range = new RangeValidator({ min: minAge, max: maxAge });
  }

  public validate = (value: unknown): ValidationResult<number> => {
    const result = this.range.validate(value);
    if (result.isValid) {
      return result;
    }

    // Rephrase bound failures as ages; format failures pass through
    if (result.error.code === FieldErrorCode.BELOW_MIN) {
      return invalid(FieldErrorCode.BELOW_MIN, FIELD_MESSAGES.AGE_BELOW_MIN(this.minAge));
    }
    if (result.error.code === FieldErrorCode.ABOVE_MAX && this.maxAge !== undefined) {
      return invalid(FieldErrorCode.ABOVE_MAX, FIELD_MESSAGES.AGE_ABOVE_MAX(this.maxAge));
    }
    return result;
  };
}

export interface DecimalOptions {
  maxDecimalPlaces?: number;
}

export class DecimalValidator implements Validator<string> {
  private readonly pattern: RegExp;

  constructor({ maxDecimalPlaces }: DecimalOptions = {}) {
    const places =
      maxDecimalPlaces !== undefined && Number.isInteger(maxDecimalPlaces) && maxDecimalPlaces > 0
        ? maxDecimalPlaces
        : DEFAULT_DECIMAL_PLACES_CAP;
    this.pattern = new RegExp(`^-?\\d+(\\.\\d{1,${places}})?$`);
  }

  public validate = (value: unknown): ValidationResult<string> => {
    if (typeof value !== 'string' && typeof value !== 'number') {
      return unsupportedInput('a number or numeric string');
    }

    const text = String(value);
    if (!this.pattern.test(text)) {
      return invalid(FieldErrorCode.NOT_A_DECIMAL, FIELD_MESSAGES.NOT_A_DECIMAL);
    }

    return valid(text);
  };
}
