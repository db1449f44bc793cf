export enum FieldErrorCode {
  NOT_A_NUMBER = 'NOT_A_NUMBER',
  BELOW_MIN = 'BELOW_MIN',
  ABOVE_MAX = 'ABOVE_MAX',
  NOT_A_DECIMAL = 'NOT_A_DECIMAL',
  NOT_A_STRING = 'NOT_A_STRING',
  TOO_SHORT = 'TOO_SHORT',
  TOO_LONG = 'TOO_LONG',
  EMPTY_VALUE = 'EMPTY_VALUE',
  NOT_ALPHANUMERIC = 'NOT_ALPHANUMERIC',
  NOT_ALPHABETIC = 'NOT_ALPHABETIC',
  BAD_FORMAT = 'BAD_FORMAT',
  USERNAME_TOO_SHORT = 'USERNAME_TOO_SHORT',
  UPPERCASE_NOT_ALLOWED = 'UPPERCASE_NOT_ALLOWED',
  DOMAIN_UNRESOLVABLE = 'DOMAIN_UNRESOLVABLE',
  LOOKUP_FAILED = 'LOOKUP_FAILED',
  UNRECOGNIZED_FORMAT = 'UNRECOGNIZED_FORMAT',
  INVALID_CALENDAR_DATE = 'INVALID_CALENDAR_DATE',
  FUTURE_YEAR = 'FUTURE_YEAR',
  RANGE_INVERTED = 'RANGE_INVERTED',
  NOT_BOOLEAN = 'NOT_BOOLEAN',
  MISSING_DIGIT = 'MISSING_DIGIT',
  MISSING_LOWER = 'MISSING_LOWER',
  MISSING_UPPER = 'MISSING_UPPER',
  MISSING_SPECIAL = 'MISSING_SPECIAL',
  BAD_FILE_NAME = 'BAD_FILE_NAME',
  UNSUPPORTED_TYPE = 'UNSUPPORTED_TYPE',
  FILE_TOO_LARGE = 'FILE_TOO_LARGE',
  IMAGE_CORRUPT = 'IMAGE_CORRUPT',
  IMAGE_TOO_SMALL = 'IMAGE_TOO_SMALL',
  IMAGE_TOO_LARGE = 'IMAGE_TOO_LARGE',
  INVALID_CHOICE = 'INVALID_CHOICE',
  UNSUPPORTED_INPUT = 'UNSUPPORTED_INPUT',
}

export enum ErrorCategory {
  FORMAT_ERROR = 'FORMAT_ERROR',
  RANGE_ERROR = 'RANGE_ERROR',
  EMPTY_INPUT_ERROR = 'EMPTY_INPUT_ERROR',
  UNSUPPORTED_TYPE_ERROR = 'UNSUPPORTED_TYPE_ERROR',
  EXTERNAL_LOOKUP_ERROR = 'EXTERNAL_LOOKUP_ERROR',
  UNRESOLVED_DOMAIN_ERROR = 'UNRESOLVED_DOMAIN_ERROR',
}

export interface FieldError {
  code: FieldErrorCode;
  category: ErrorCategory;
  message: string;
}

export type ValidationResult<T> =
  | { isValid: true; sanitizedValue: T }
  | { isValid: false; error: FieldError };

/**
 * Uniform contract shared by every validator. An instance is built with the
 * bounds of one request and used for exactly one value.
 */
export interface Validator<T> {
  validate(value: unknown): ValidationResult<T>;
}

export interface AsyncValidator<T> {
  validate(value: unknown): Promise<ValidationResult<T>>;
}

export interface ParsedDate {
  format: string;
  date: Date;
}

export interface DateRange {
  start: ParsedDate;
  end: ParsedDate;
}
