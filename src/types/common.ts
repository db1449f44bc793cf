import type { CountryCode } from 'libphonenumber-js';

export interface FieldcheckConfig {
  checkEmailDomain: boolean;
  dnsTimeoutMs: number;
  documentMaxSizeMb: number;
  imageMaxSizeMb: number;
  verifyImages: boolean;
  phoneRegion?: CountryCode;
  validGenders: string[];
}

export type CheckKind =
  | 'numeric'
  | 'range'
  | 'age'
  | 'decimal'
  | 'length'
  | 'alphanumeric'
  | 'alphabetic'
  | 'name'
  | 'address'
  | 'placename'
  | 'gender'
  | 'phone'
  | 'email'
  | 'zipcode'
  | 'pincode'
  | 'date'
  | 'boolean'
  | 'password';

export interface CheckOptions {
  min?: number;
  max?: number;
  minLength?: number;
  maxLength?: number;
  places?: number;
  minAge?: number;
  maxAge?: number;
  region?: CountryCode;
  checkDomain?: boolean;
}

export type FileKind = 'document' | 'image';

export interface FileCheckOptions {
  kind: FileKind;
  maxSizeMb?: number;
  verifyImage?: boolean;
}
