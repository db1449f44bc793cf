/**
 * Supported date/time formats, tried in order. The first format whose pattern
 * matches wins, so ISO beats day-first, and day-first beats month-first for
 * inputs such as 03/04/2024.
 */
export const SUPPORTED_DATE_FORMATS: readonly string[] = [
  '%Y-%m-%d',
  '%Y-%m-%d %H:%M',
  '%Y-%m-%d %H:%M:%S',
  '%d/%m/%Y',
  '%d/%m/%Y %H:%M',
  '%d/%m/%Y %H:%M:%S',
  '%m/%d/%Y',
  '%m/%d/%Y %H:%M',
  '%m/%d/%Y %H:%M:%S',
  '%Y-%m-%d %I:%M %p',
  '%Y-%m-%d %I:%M:%S %p',
  '%d/%m/%Y %I:%M %p',
  '%d/%m/%Y %I:%M:%S %p',
  '%m/%d/%Y %I:%M %p',
  '%m/%d/%Y %I:%M:%S %p',
  '%d %b %Y',
  '%d %B %Y',
  '%b %d, %Y',
  '%B %d, %Y',
];

export const MONTH_NAMES: readonly string[] = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

export const MONTH_ABBREVIATIONS: readonly string[] = MONTH_NAMES.map((name) => name.slice(0, 3));

// Field patterns with the same ranges strptime enforces while matching
export const DIRECTIVE_PATTERNS = {
  Y: '\\d{4}',
  m: '1[0-2]|0[1-9]|[1-9]',
  d: '3[01]|[12]\\d|0[1-9]|[1-9]',
  H: '2[0-3]|[0-1]\\d|\\d',
  I: '1[0-2]|0[1-9]|[1-9]',
  M: '[0-5]\\d|\\d',
  S: '6[0-1]|[0-5]\\d|\\d',
  p: 'am|pm',
  b: MONTH_ABBREVIATIONS.join('|'),
  B: MONTH_NAMES.join('|'),
} as const;

export type DateDirective = keyof typeof DIRECTIVE_PATTERNS;
