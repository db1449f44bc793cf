import type { FieldcheckConfig } from '../types/common.js';
import {
  DEFAULT_LOOKUP_TIMEOUT_MS,
  DOCUMENT_MAX_SIZE_MB,
  IMAGE_MAX_SIZE_MB,
  VALID_GENDERS,
} from './validation.js';

export const CONFIG_DIR = '.fieldcheck';
export const CONFIG_FILE = 'config.json';
export const CONFIG_FILE_MODE = 0o600;
export const CONFIG_DIR_MODE = 0o700;

export const DEFAULT_CONFIG: FieldcheckConfig = {
  checkEmailDomain: true,
  dnsTimeoutMs: DEFAULT_LOOKUP_TIMEOUT_MS,
  documentMaxSizeMb: DOCUMENT_MAX_SIZE_MB,
  imageMaxSizeMb: IMAGE_MAX_SIZE_MB,
  verifyImages: false,
  validGenders: [...VALID_GENDERS],
};

export const CONFIG_ENV_VARS = {
  dnsTimeoutMs: 'FIELDCHECK_DNS_TIMEOUT_MS',
  checkEmailDomain: 'FIELDCHECK_CHECK_EMAIL_DOMAIN',
  phoneRegion: 'FIELDCHECK_PHONE_REGION',
} as const;
