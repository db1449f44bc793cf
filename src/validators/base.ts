import { ERROR_CATEGORIES } from '../constants/validation.js';
import { FIELD_MESSAGES } from '../constants/messages.js';
import { FieldErrorCode, type FieldError, type ValidationResult } from '../types/validation.js';

export const valid = <T>(sanitizedValue: T): ValidationResult<T> => ({
  isValid: true,
  sanitizedValue,
});

export const fieldError = (code: FieldErrorCode, message: string): FieldError => ({
  code,
  category: ERROR_CATEGORIES[code],
  message,
});

export const invalid = <T = never>(code: FieldErrorCode, message: string): ValidationResult<T> => ({
  isValid: false,
  error: fieldError(code, message),
});

export const unsupportedInput = <T = never>(expected: string): ValidationResult<T> =>
  invalid(FieldErrorCode.UNSUPPORTED_INPUT, FIELD_MESSAGES.UNSUPPORTED_INPUT(expected));
