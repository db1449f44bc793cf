import { DEFAULT_LOOKUP_TIMEOUT_MS } from '../constants/validation.js';

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export const withTimeout = <T>(
  promise: Promise<T>,
  timeoutMs: number = DEFAULT_LOOKUP_TIMEOUT_MS
): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
};

export const sanitizeError = (error: unknown): string => {
  if (typeof error === 'string') {
    return error
      .replace(/api[_-]?key[=:]\s*[^\s]+/gi, 'api_key=***')
      .replace(/token[=:]\s*[^\s]+/gi, 'token=***')
      .replace(/password[=:]\s*[^\s]+/gi, 'password=***')
      .replace(/secret[=:]\s*[^\s]+/gi, 'secret=***');
  }

  if (error instanceof Error) {
    return sanitizeError(error.message);
  }

  return 'An unknown error occurred';
};
