// Field failure messages and user-facing CLI text
export const FIELD_MESSAGES = {
  UNSUPPORTED_INPUT: (expected: string) => `Unsupported input. Value must be ${expected}.`,
  NOT_A_NUMBER: 'Value must be a valid number.',
  BELOW_MIN: (min: number) => `Value must be greater than ${min}.`,
  ABOVE_MAX: (max: number) => `Value must be less than ${max}.`,
  AGE_BELOW_MIN: (min: number) => `Age must be at least ${min}.`,
  AGE_ABOVE_MAX: (max: number) => `Age must be less than ${max}.`,
  NOT_A_DECIMAL: 'Value must be a valid decimal number.',
  NOT_A_STRING: 'Value must be a string.',
  TOO_SHORT: (min: number) => `String must be at least ${min} characters long.`,
  TOO_LONG: (max: number) => `String must be at most ${max} characters long.`,
  EMPTY_VALUE: 'Value cannot be empty.',
  NOT_ALPHANUMERIC: 'Value must be alphanumeric (letters and numbers only).',
  NOT_ALPHABETIC: 'Value must be alphabetic (letters only).',
  INVALID_NAME: (field: string) =>
    `Invalid ${field}: Only alphabetic characters, spaces, hyphens, and apostrophes are allowed.`,
  INVALID_ADDRESS:
    'Invalid address: Only letters, numbers, spaces, commas, periods, and hyphens are allowed.',
  INVALID_PLACE_NAME: 'Place name must contain only alphabets and spaces.',
  INVALID_GENDER: (allowed: readonly string[]) =>
    `Invalid gender: Allowed values are ${allowed.join(', ')}.`,
  EMPTY_PHONE: 'Phone number cannot be empty.',
  INVALID_PHONE: 'Invalid phone number format.',
  INVALID_PHONE_FOR_REGION: (region: string) => `Invalid phone number for region ${region}.`,
  EMPTY_EMAIL: 'Email ID cannot be empty.',
  USERNAME_TOO_SHORT: (min: number) => `Email username must be at least ${min} characters long.`,
  UPPERCASE_NOT_ALLOWED: 'Email ID must not contain uppercase letters.',
  INVALID_EMAIL: 'Invalid email ID format.',
  DOMAIN_UNRESOLVABLE: (domain: string) =>
    `Invalid domain in email: ${domain} does not have MX records.`,
  LOOKUP_FAILED: (domain: string, reason: string) =>
    `Unable to verify the domain ${domain}: ${reason}`,
  INVALID_ZIPCODE: 'Invalid ZIP code: It must be 5 digits or ZIP+4 (12345-6789).',
  INVALID_PINCODE: 'Invalid pincode: It must be exactly 6 numeric digits.',
  UNRECOGNIZED_DATE_FORMAT: 'Unable to determine the format of the date.',
  INVALID_CALENDAR_DATE: (format: string) =>
    `Invalid date or time. Ensure the input matches the format ${format}.`,
  FUTURE_YEAR: 'Invalid year. Year cannot be in the future.',
  RANGE_INVERTED: 'Start date must be earlier than end date.',
  NOT_BOOLEAN: 'Invalid input. Value must be a boolean (true or false).',
  PASSWORD_TOO_SHORT: (min: number) => `Password must be at least ${min} characters long.`,
  MISSING_DIGIT: 'Password must include at least one number.',
  MISSING_LOWER: 'Password must include at least one lowercase letter.',
  MISSING_UPPER: 'Password must include at least one uppercase letter.',
  MISSING_SPECIAL: 'Password must include at least one special character.',
  BAD_FILE_NAME:
    'File name should not contain spaces or special characters other than underscores.',
  UNSUPPORTED_FILE_TYPE: (extension: string, allowed: readonly string[]) =>
    `Unsupported file type: ${extension || '(none)'}. Allowed types: ${allowed.join(', ')}`,
  FILE_TOO_LARGE: (maxMb: number) => `File size exceeds ${maxMb} MB limit.`,
  IMAGE_CORRUPT: 'Invalid image file.',
  IMAGE_TOO_SMALL: (min: string, actual: string) =>
    `Image dimensions must be at least ${min}px. Uploaded image is ${actual}px.`,
  IMAGE_TOO_LARGE: (max: string, actual: string) =>
    `Image dimensions exceed ${max}px limit. Uploaded image is ${actual}px.`,
} as const;

export const ERROR_MESSAGES = {
  INVALID_CONFIG_KEY: 'Invalid configuration key',
  INVALID_CHECK_OPTIONS: 'Invalid check options',
  UNKNOWN_CHECK_KIND: 'Unknown check kind',
} as const;

export const SUCCESS_MESSAGES = {
  VALID: 'Valid',
  CONFIGURATION_RESET: 'Configuration reset to defaults',
} as const;

export const INFO_MESSAGES = {
  AVAILABLE_KINDS: '📋 Available check kinds:',
  USAGE_EXAMPLES: '📚 fieldcheck usage examples:',
} as const;

export const WARNING_MESSAGES = {
  RESET_CANCELLED: 'Reset cancelled',
  INVALID_CONFIG_FILE: 'Invalid config data, using defaults:',
  CONFIG_LOAD_FAILED: 'Failed to load config, using defaults:',
  INVALID_ENV_OVERRIDES: 'Ignoring invalid environment overrides:',
} as const;

export const HELP_MESSAGES = {
  USAGE_COMMANDS: 'Use "fieldcheck --help" for available commands',
  KINDS_COMMAND: 'Use "fieldcheck kinds" to list check kinds',
} as const;
