import { match } from 'ts-pattern';
import { ErrorCategory, type FieldError } from '../types/validation.js';

export type ErrorStatus = 400 | 422;

export interface ErrorResponse {
  status: ErrorStatus;
  body: { error: string };
}

// Malformed values are unprocessable; lookup failures are the caller's bad request
export const statusForCategory = (category: ErrorCategory): ErrorStatus =>
  match(category)
    .with(
      ErrorCategory.FORMAT_ERROR,
      ErrorCategory.RANGE_ERROR,
      ErrorCategory.EMPTY_INPUT_ERROR,
      ErrorCategory.UNSUPPORTED_TYPE_ERROR,
      (): ErrorStatus => 422
    )
    .with(
      ErrorCategory.EXTERNAL_LOOKUP_ERROR,
      ErrorCategory.UNRESOLVED_DOMAIN_ERROR,
      (): ErrorStatus => 400
    )
    .exhaustive();

/** Shapes a field failure into the status and body an HTTP handler sends back. */
export const toErrorResponse = (error: FieldError): ErrorResponse => ({
  status: statusForCategory(error.category),
  body: { error: error.message },
});
