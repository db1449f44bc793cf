import { ErrorType } from '../types/error-handler.js';

export const ERROR_LOG_LIMIT = 100;

export const ERROR_PATTERNS = [
  { type: ErrorType.TIMEOUT_ERROR, patterns: ['timeout', 'timed out'] },
  { type: ErrorType.VALIDATION_ERROR, patterns: ['validation', 'invalid'] },
  { type: ErrorType.NETWORK_ERROR, patterns: ['dns', 'network', 'resolve'] },
  { type: ErrorType.CONFIG_ERROR, patterns: ['config', 'configuration'] },
];
