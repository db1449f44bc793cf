import { describe, expect, it } from 'vitest';

import { statusForCategory, toErrorResponse } from '../http.js';
import { fieldError } from '../../validators/base.js';
import { ErrorCategory, FieldErrorCode } from '../../types/validation.js';

describe('statusForCategory', () => {
  it.each([
    [ErrorCategory.FORMAT_ERROR, 422],
    [ErrorCategory.RANGE_ERROR, 422],
    [ErrorCategory.EMPTY_INPUT_ERROR, 422],
    [ErrorCategory.UNSUPPORTED_TYPE_ERROR, 422],
    [ErrorCategory.EXTERNAL_LOOKUP_ERROR, 400],
    [ErrorCategory.UNRESOLVED_DOMAIN_ERROR, 400],
  ])('should map %s to %i', (category, status) => {
    expect(statusForCategory(category)).toBe(status);
  });
});

describe('toErrorResponse', () => {
  it('should carry the message as the error body', () => {
    const error = fieldError(FieldErrorCode.DOMAIN_UNRESOLVABLE, 'No MX records for example.invalid.');

    expect(toErrorResponse(error)).toEqual({
      status: 400,
      body: { error: 'No MX records for example.invalid.' },
    });
  });

  it('should answer 422 for malformed values', () => {
    const error = fieldError(FieldErrorCode.BAD_FORMAT, 'Invalid ZIP code.');

    expect(toErrorResponse(error).status).toBe(422);
  });
});
