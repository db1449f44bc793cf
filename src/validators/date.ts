import {
  FieldErrorCode,
  type DateRange,
  type ParsedDate,
  type ValidationResult,
  type Validator,
} from '../types/validation.js';
import {
  DIRECTIVE_PATTERNS,
  MONTH_ABBREVIATIONS,
  MONTH_NAMES,
  SUPPORTED_DATE_FORMATS,
  type DateDirective,
} from '../constants/date.js';
import { FIELD_MESSAGES } from '../constants/messages.js';
import { invalid, unsupportedInput, valid } from './base.js';

interface CompiledFormat {
  format: string;
  pattern: RegExp;
  directives: DateDirective[];
}

interface DateFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const isDirective = (char: string | undefined): char is DateDirective =>
  char !== undefined && Object.hasOwn(DIRECTIVE_PATTERNS, char);

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Turns a strptime-style format into an anchored, case-insensitive pattern
 * with one capture group per directive. Whitespace in the format matches one
 * or more whitespace characters.
 */
export const compileDateFormat = (format: string): CompiledFormat => {
  const directives: DateDirective[] = [];
  let source = '';

  for (let i = 0; i < format.length; i++) {
    const char = format.charAt(i);

    if (char === '%') {
      const directive = format.charAt(i + 1);
      if (!isDirective(directive)) {
        throw new Error(`Unsupported date directive %${directive} in format ${format}`);
      }
      directives.push(directive);
      source += `(${DIRECTIVE_PATTERNS[directive]})`;
      i++;
    } else if (/\s/.test(char)) {
      source += '\\s+';
    } else {
      source += escapeRegExp(char);
    }
  }

  return { format, pattern: new RegExp(`^${source}$`, 'i'), directives };
};

const extractFields = (compiled: CompiledFormat, match: RegExpExecArray): DateFields => {
  const fields: DateFields = { year: 1900, month: 1, day: 1, hour: 0, minute: 0, second: 0 };
  let meridiem: 'am' | 'pm' | undefined;
  let hour12: number | undefined;

  for (const [index, directive] of compiled.directives.entries()) {
    const raw = match[index + 1] ?? '';
    const lower = raw.toLowerCase();

    switch (directive) {
      case 'Y':
        fields.year = Number(raw);
        break;
      case 'm':
        fields.month = Number(raw);
        break;
      case 'b':
        fields.month = MONTH_ABBREVIATIONS.indexOf(lower) + 1;
        break;
      case 'B':
        fields.month = MONTH_NAMES.indexOf(lower) + 1;
        break;
      case 'd':
        fields.day = Number(raw);
        break;
      case 'H':
        fields.hour = Number(raw);
        break;
      case 'I':
        hour12 = Number(raw);
        break;
      case 'M':
        fields.minute = Number(raw);
        break;
      case 'S':
        fields.second = Number(raw);
        break;
      case 'p':
        meridiem = lower === 'pm' ? 'pm' : 'am';
        break;
    }
  }

  if (hour12 !== undefined) {
    fields.hour = (hour12 % 12) + (meridiem === 'pm' ? 12 : 0);
  }

  return fields;
};

const isLeapYear = (year: number): boolean =>
  year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);

const daysInMonth = (year: number, month: number): number =>
  [31, isLeapYear(year) ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31][month - 1] ?? 0;

const existsOnCalendar = ({ year, month, day, second }: DateFields): boolean =>
  year >= 1 &&
  month >= 1 &&
  month <= 12 &&
  day >= 1 &&
  day <= daysInMonth(year, month) &&
  second <= 59;

// setUTCFullYear keeps years below 100 as written; Date.UTC would map them to 19xx
const toUtcDate = ({ year, month, day, hour, minute, second }: DateFields): Date => {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);
  return date;
};

export interface DateValidatorOptions {
  formats?: readonly string[];
  now?: () => Date;
}

/**
 * Date or date-time in one of the supported formats. The format is picked by
 * trying each in order; the winning format is then checked against the
 * calendar and the year must not be in the future.
 */
export class DateValidator implements Validator<ParsedDate> {
  private readonly formats: CompiledFormat[];
  private readonly now: () => Date;

  constructor({ formats = SUPPORTED_DATE_FORMATS, now = () => new Date() }: DateValidatorOptions = {}) {
    this.formats = formats.map(compileDateFormat);
    this.now = now;
  }

  public validate = (value: unknown): ValidationResult<ParsedDate> => {
    if (typeof value !== 'string') {
      return unsupportedInput('a date string');
    }

    const format = this.determineFormat(value);
    if (!format.isValid) {
      return format;
    }

    const parsed = this.validateCalendarDate(value, format.sanitizedValue);
    if (!parsed.isValid) {
      return parsed;
    }

    return this.validateNotFutureYear(parsed.sanitizedValue);
  };

  public determineFormat = (value: string): ValidationResult<string> => {
    const found = this.formats.find(({ pattern }) => pattern.test(value));
    return found
      ? valid(found.format)
      : invalid(FieldErrorCode.UNRECOGNIZED_FORMAT, FIELD_MESSAGES.UNRECOGNIZED_DATE_FORMAT);
  };

  public validateCalendarDate = (value: string, format: string): ValidationResult<ParsedDate> => {
    const compiled =
      this.formats.find((candidate) => candidate.format === format) ?? compileDateFormat(format);
    const match = compiled.pattern.exec(value);
    const fields = match ? extractFields(compiled, match) : undefined;

    if (!fields || !existsOnCalendar(fields)) {
      return invalid(
        FieldErrorCode.INVALID_CALENDAR_DATE,
        FIELD_MESSAGES.INVALID_CALENDAR_DATE(format)
      );
    }

    return valid({ format, date: toUtcDate(fields) });
  };

  public validateNotFutureYear = (parsed: ParsedDate): ValidationResult<ParsedDate> => {
    if (parsed.date.getUTCFullYear() > this.now().getFullYear()) {
      return invalid(FieldErrorCode.FUTURE_YEAR, FIELD_MESSAGES.FUTURE_YEAR);
    }
    return valid(parsed);
  };
}

export interface DatePair {
  start: unknown;
  end: unknown;
}

const isDatePair = (value: unknown): value is DatePair =>
  typeof value === 'object' && value !== null && 'start' in value && 'end' in value;

/** Validates both ends of a range independently, then requires start < end. */
export class CrossFieldDateValidator implements Validator<DateRange> {
  private readonly dates: DateValidator;

  constructor(options: DateValidatorOptions = {}) {
    this.dates = new DateValidator(options);
  }

  public validate = (value: unknown): ValidationResult<DateRange> => {
    if (!isDatePair(value)) {
      return unsupportedInput('an object with start and end dates');
    }

    const start = this.dates.validate(value.start);
    if (!start.isValid) {
      return start;
    }
    const end = this.dates.validate(value.end);
    if (!end.isValid) {
      return end;
    }

    if (start.sanitizedValue.date.getTime() >= end.sanitizedValue.date.getTime()) {
      return invalid(FieldErrorCode.RANGE_INVERTED, FIELD_MESSAGES.RANGE_INVERTED);
    }

    return valid({ start: start.sanitizedValue, end: end.sanitizedValue });
  };
}
