import { ErrorCategory, FieldErrorCode } from '../types/validation.js';
import type { ImageDimensions } from '../types/collaborators.js';

export const BYTES_PER_MB = 1024 * 1024;

// Places allowed when the option is unset or not a positive integer
export const DEFAULT_DECIMAL_PLACES_CAP = 10;

export const DEFAULT_MIN_AGE = 18;

export const PHONE_LENGTH = { min: 8, max: 14 } as const;
export const EMAIL_LENGTH = { min: 5, max: 254 } as const;
export const ZIPCODE_LENGTH = { min: 5, max: 10 } as const;
export const PINCODE_LENGTH = { min: 6, max: 6 } as const;
export const NAME_LENGTH = { min: 2, max: 50 } as const;
export const ADDRESS_LENGTH = { min: 5, max: 100 } as const;
export const PLACE_NAME_LENGTH = { min: 3, max: 50 } as const;
export const GENDER_MIN_LENGTH = 4;
export const EMAIL_MIN_USERNAME_LENGTH = 3;
export const PASSWORD_MIN_LENGTH = 8;

export const PASSWORD_SPECIAL_CHARACTERS = '!@#$%^&*(),.?":{}|<>';
export const VALID_GENDERS: readonly string[] = ['male', 'female', 'other'];

export const DEFAULT_LOOKUP_TIMEOUT_MS = 3000;

export const DOCUMENT_EXTENSIONS: readonly string[] = ['.pdf', '.docx', '.xlsx'];
export const IMAGE_EXTENSIONS: readonly string[] = ['.jpg', '.jpeg', '.png', '.gif'];
export const DOCUMENT_MAX_SIZE_MB = 2;
export const IMAGE_MAX_SIZE_MB = 5;

export const IMAGE_DIMENSION_LIMITS: { min: ImageDimensions; max: ImageDimensions } = {
  min: { width: 300, height: 300 },
  max: { width: 1920, height: 1080 },
};

export const FIELD_PATTERNS = {
  NUMBER: /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/,
  ALPHANUMERIC: /^[a-zA-Z0-9]+$/,
  ALPHABETIC: /^[a-zA-Z]+$/,
  NAME: /^[a-zA-Z\s'-]+$/,
  ADDRESS: /^[a-zA-Z0-9\s,.-]+$/,
  PLACE_NAME: /^[a-zA-Z\s]+$/,
  // Optional +, country code, optional parenthesized group, space/hyphen/dot separators
  PHONE: /^\+?\d{1,4}?[\s.-]?\(?\d{1,4}?\)?[\s.-]?\d{1,4}[\s.-]?\d{1,4}[\s.-]?\d{1,9}$/,
  EMAIL: /^[a-z0-9_.+-]+@[a-z0-9-]+\.[a-z0-9-.]+$/i,
  ZIPCODE: /^\d{5}(-\d{4})?$/,
  PINCODE: /^\d{6}$/,
  FILE_NAME: /^\w+\.[a-zA-Z0-9]+$/,
  DIGIT: /\d/,
  LOWERCASE: /[a-z]/,
  UPPERCASE: /[A-Z]/,
} as const;

export const ERROR_CATEGORIES = {
  [FieldErrorCode.NOT_A_NUMBER]: ErrorCategory.FORMAT_ERROR,
  [FieldErrorCode.BELOW_MIN]: ErrorCategory.RANGE_ERROR,
  [FieldErrorCode.ABOVE_MAX]: ErrorCategory.RANGE_ERROR,
  [FieldErrorCode.NOT_A_DECIMAL]: ErrorCategory.FORMAT_ERROR,
  [FieldErrorCode.NOT_A_STRING]: ErrorCategory.UNSUPPORTED_TYPE_ERROR,
  [FieldErrorCode.TOO_SHORT]: ErrorCategory.RANGE_ERROR,
  [FieldErrorCode.TOO_LONG]: ErrorCategory.RANGE_ERROR,
  [FieldErrorCode.EMPTY_VALUE]: ErrorCategory.EMPTY_INPUT_ERROR,
  [FieldErrorCode.NOT_ALPHANUMERIC]: ErrorCategory.FORMAT_ERROR,
  [FieldErrorCode.NOT_ALPHABETIC]: ErrorCategory.FORMAT_ERROR,
  [FieldErrorCode.BAD_FORMAT]: ErrorCategory.FORMAT_ERROR,
  [FieldErrorCode.USERNAME_TOO_SHORT]: ErrorCategory.RANGE_ERROR,
  [FieldErrorCode.UPPERCASE_NOT_ALLOWED]: ErrorCategory.FORMAT_ERROR,
  [FieldErrorCode.DOMAIN_UNRESOLVABLE]: ErrorCategory.UNRESOLVED_DOMAIN_ERROR,
  [FieldErrorCode.LOOKUP_FAILED]: ErrorCategory.EXTERNAL_LOOKUP_ERROR,
  [FieldErrorCode.UNRECOGNIZED_FORMAT]: ErrorCategory.FORMAT_ERROR,
  [FieldErrorCode.INVALID_CALENDAR_DATE]: ErrorCategory.FORMAT_ERROR,
  [FieldErrorCode.FUTURE_YEAR]: ErrorCategory.RANGE_ERROR,
  [FieldErrorCode.RANGE_INVERTED]: ErrorCategory.RANGE_ERROR,
  [FieldErrorCode.NOT_BOOLEAN]: ErrorCategory.UNSUPPORTED_TYPE_ERROR,
  [FieldErrorCode.MISSING_DIGIT]: ErrorCategory.FORMAT_ERROR,
  [FieldErrorCode.MISSING_LOWER]: ErrorCategory.FORMAT_ERROR,
  [FieldErrorCode.MISSING_UPPER]: ErrorCategory.FORMAT_ERROR,
  [FieldErrorCode.MISSING_SPECIAL]: ErrorCategory.FORMAT_ERROR,
  [FieldErrorCode.BAD_FILE_NAME]: ErrorCategory.FORMAT_ERROR,
  [FieldErrorCode.UNSUPPORTED_TYPE]: ErrorCategory.UNSUPPORTED_TYPE_ERROR,
  [FieldErrorCode.FILE_TOO_LARGE]: ErrorCategory.RANGE_ERROR,
  [FieldErrorCode.IMAGE_CORRUPT]: ErrorCategory.EXTERNAL_LOOKUP_ERROR,
  [FieldErrorCode.IMAGE_TOO_SMALL]: ErrorCategory.RANGE_ERROR,
  [FieldErrorCode.IMAGE_TOO_LARGE]: ErrorCategory.RANGE_ERROR,
  [FieldErrorCode.INVALID_CHOICE]: ErrorCategory.FORMAT_ERROR,
  [FieldErrorCode.UNSUPPORTED_INPUT]: ErrorCategory.UNSUPPORTED_TYPE_ERROR,
} as const satisfies Record<FieldErrorCode, ErrorCategory>;
