import { FieldErrorCode, type ValidationResult, type Validator } from '../types/validation.js';
import { FIELD_PATTERNS, PASSWORD_MIN_LENGTH, PASSWORD_SPECIAL_CHARACTERS } from '../constants/validation.js';
import { FIELD_MESSAGES } from '../constants/messages.js';
import { invalid, unsupportedInput, valid } from './base.js';

/** Strict boolean: the strings "true" and "false", 0 and 1 are rejected. */
export class BooleanValidator implements Validator<boolean> {
  public validate = (value: unknown): ValidationResult<boolean> =>
    typeof value === 'boolean'
      ? valid(value)
      : invalid(FieldErrorCode.NOT_BOOLEAN, FIELD_MESSAGES.NOT_BOOLEAN);
}

export interface PasswordOptions {
  minLength?: number;
  specialCharacters?: string;
}

type PasswordCheck = {
  passes: (password: string) => boolean;
  code: FieldErrorCode;
  message: string;
};

/**
 * Password strength. Checks run in a fixed order and stop at the first
 * failure; a passing password is returned unchanged.
 */
export class PasswordValidator implements Validator<string> {
  private readonly checks: readonly PasswordCheck[];

  constructor({
    minLength = PASSWORD_MIN_LENGTH,
    specialCharacters = PASSWORD_SPECIAL_CHARACTERS,
  }: PasswordOptions = {}) {
    const specials = new Set(specialCharacters);

    this.checks = [
      {
        passes: (password) => [...password].length >= minLength,
        code: FieldErrorCode.TOO_SHORT,
        message: FIELD_MESSAGES.PASSWORD_TOO_SHORT(minLength),
      },
      {
        passes: (password) => FIELD_PATTERNS.DIGIT.test(password),
        code: FieldErrorCode.MISSING_DIGIT,
        message: FIELD_MESSAGES.MISSING_DIGIT,
      },
      {
        passes: (password) => FIELD_PATTERNS.LOWERCASE.test(password),
        code: FieldErrorCode.MISSING_LOWER,
        message: FIELD_MESSAGES.MISSING_LOWER,
      },
      {
        passes: (password) => FIELD_PATTERNS.UPPERCASE.test(password),
        code: FieldErrorCode.MISSING_UPPER,
        message: FIELD_MESSAGES.MISSING_UPPER,
      },
      {
        passes: (password) => [...password].some((char) => specials.has(char)),
        code: FieldErrorCode.MISSING_SPECIAL,
        message: FIELD_MESSAGES.MISSING_SPECIAL,
      },
    ];
  }

  public validate = (value: unknown): ValidationResult<string> => {
    if (typeof value !== 'string') {
      return unsupportedInput('a string');
    }

    const failed = this.checks.find((check) => !check.passes(value));
    return failed ? invalid(failed.code, failed.message) : valid(value);
  };
}
