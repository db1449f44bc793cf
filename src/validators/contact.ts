import { isValidPhoneNumber, type CountryCode } from 'libphonenumber-js';
import {
  FieldErrorCode,
  type AsyncValidator,
  type ValidationResult,
  type Validator,
} from '../types/validation.js';
import type { MxResolver } from '../types/collaborators.js';
import {
  DEFAULT_LOOKUP_TIMEOUT_MS,
  EMAIL_LENGTH,
  EMAIL_MIN_USERNAME_LENGTH,
  FIELD_PATTERNS,
  PHONE_LENGTH,
  PINCODE_LENGTH,
  ZIPCODE_LENGTH,
} from '../constants/validation.js';
import { FIELD_MESSAGES } from '../constants/messages.js';
import { escapeHtml, stripNonDigits } from '../utils/data-sanitization.js';
import { sanitizeError, withTimeout } from '../utils/security.js';
import { DnsMxResolver } from '../services/dns.js';
import { invalid, unsupportedInput, valid } from './base.js';
import { MinMaxLengthValidator, type LengthBounds } from './string.js';

export interface PhoneNumberOptions extends LengthBounds {
  region?: CountryCode;
}

/**
 * International phone number. The digit count (separators stripped) is held
 * to `[minLength, maxLength]`; with a `region`, the number must also be valid
 * for that region's numbering plan.
 */
export class PhoneNumberValidator implements Validator<string> {
  private readonly digits: MinMaxLengthValidator;
  private readonly region?: CountryCode;

  constructor({
    minLength = PHONE_LENGTH.min,
    maxLength = PHONE_LENGTH.max,
    region,
  }: PhoneNumberOptions = {}) {
    this.digits = new MinMaxLengthValidator({ minLength, maxLength });
    this.region = region;
  }

  public validate = (value: unknown): ValidationResult<string> => {
    if (value === undefined || value === null || value === '') {
      return invalid(FieldErrorCode.EMPTY_VALUE, FIELD_MESSAGES.EMPTY_PHONE);
    }
    if (typeof value !== 'string') {
      return unsupportedInput('a string');
    }

    const phone = escapeHtml(value);
    if (!FIELD_PATTERNS.PHONE.test(phone)) {
      return invalid(FieldErrorCode.BAD_FORMAT, FIELD_MESSAGES.INVALID_PHONE);
    }

    const digitCheck = this.digits.validate(stripNonDigits(phone));
    if (!digitCheck.isValid) {
      return digitCheck;
    }

    if (this.region && !isValidPhoneNumber(phone, this.region)) {
      return invalid(FieldErrorCode.BAD_FORMAT, FIELD_MESSAGES.INVALID_PHONE_FOR_REGION(this.region));
    }

    return valid(phone);
  };
}

export interface EmailOptions extends LengthBounds {
  resolver?: MxResolver;
  checkDomain?: boolean;
  lookupTimeoutMs?: number;
}

/**
 * Email address with an MX lookup on the domain. Checks run in a fixed order
 * and stop at the first failure: length, emptiness, username length, case,
 * shape, then the lookup.
 */
export class EmailValidator implements AsyncValidator<string> {
  private readonly length: MinMaxLengthValidator;
  private readonly resolver: MxResolver;
  private readonly checkDomain: boolean;
  private readonly lookupTimeoutMs: number;

  constructor({
    minLength = EMAIL_LENGTH.min,
    maxLength = EMAIL_LENGTH.max,
    resolver,
    checkDomain = true,
    lookupTimeoutMs = DEFAULT_LOOKUP_TIMEOUT_MS,
  }: EmailOptions = {}) {
    this.length = new MinMaxLengthValidator({ minLength, maxLength }, FIELD_MESSAGES.EMPTY_EMAIL);
    this.resolver = resolver ?? new DnsMxResolver({ timeoutMs: lookupTimeoutMs });
    this.checkDomain = checkDomain;
    this.lookupTimeoutMs = lookupTimeoutMs;
  }

  public validate = async (value: unknown): Promise<ValidationResult<string>> => {
    if (typeof value !== 'string') {
      return unsupportedInput('a string');
    }

    const email = escapeHtml(value);
    const lengthCheck = this.length.validate(email);
    if (!lengthCheck.isValid) {
      return lengthCheck;
    }

    const separator = email.indexOf('@');
    const username = separator === -1 ? email : email.slice(0, separator);
    const domain = separator === -1 ? '' : email.slice(separator + 1);

    if ([...username].length < EMAIL_MIN_USERNAME_LENGTH) {
      return invalid(
        FieldErrorCode.USERNAME_TOO_SHORT,
        FIELD_MESSAGES.USERNAME_TOO_SHORT(EMAIL_MIN_USERNAME_LENGTH)
      );
    }
    if (email !== email.toLowerCase()) {
      return invalid(FieldErrorCode.UPPERCASE_NOT_ALLOWED, FIELD_MESSAGES.UPPERCASE_NOT_ALLOWED);
    }
    if (!FIELD_PATTERNS.EMAIL.test(email)) {
      return invalid(FieldErrorCode.BAD_FORMAT, FIELD_MESSAGES.INVALID_EMAIL);
    }

    if (!this.checkDomain) {
      return valid(email);
    }

    return this.verifyDomain(email, domain);
  };

  private readonly verifyDomain = async (
    email: string,
    domain: string
  ): Promise<ValidationResult<string>> => {
    try {
      const lookup = await withTimeout(this.resolver.resolveMx(domain), this.lookupTimeoutMs);
      return lookup === 'found'
        ? valid(email)
        : invalid(FieldErrorCode.DOMAIN_UNRESOLVABLE, FIELD_MESSAGES.DOMAIN_UNRESOLVABLE(domain));
    } catch (error) {
      return invalid(
        FieldErrorCode.LOOKUP_FAILED,
        FIELD_MESSAGES.LOOKUP_FAILED(domain, sanitizeError(error))
      );
    }
  };
}

/** US ZIP code, plain or ZIP+4. */
export class ZipcodeValidator implements Validator<string> {
  private readonly length: MinMaxLengthValidator;

  constructor({ minLength = ZIPCODE_LENGTH.min, maxLength = ZIPCODE_LENGTH.max }: LengthBounds = {}) {
    this.length = new MinMaxLengthValidator({ minLength, maxLength });
  }

  public validate = (value: unknown): ValidationResult<string> => {
    if (typeof value !== 'string') {
      return unsupportedInput('a string');
    }

    const zipcode = escapeHtml(value);
    const lengthCheck = this.length.validate(zipcode);
    if (!lengthCheck.isValid) {
      return lengthCheck;
    }
    if (!FIELD_PATTERNS.ZIPCODE.test(zipcode)) {
      return invalid(FieldErrorCode.BAD_FORMAT, FIELD_MESSAGES.INVALID_ZIPCODE);
    }
    return valid(zipcode);
  };
}

/** Indian postal index number: exactly six digits. */
export class PincodeValidator implements Validator<string> {
  private readonly length: MinMaxLengthValidator;

  constructor({ minLength = PINCODE_LENGTH.min, maxLength = PINCODE_LENGTH.max }: LengthBounds = {}) {
    this.length = new MinMaxLengthValidator({ minLength, maxLength });
  }

  public validate = (value: unknown): ValidationResult<string> => {
    const lengthCheck = this.length.validate(value);
    if (!lengthCheck.isValid) {
      return lengthCheck;
    }
    if (!FIELD_PATTERNS.PINCODE.test(lengthCheck.sanitizedValue)) {
      return invalid(FieldErrorCode.BAD_FORMAT, FIELD_MESSAGES.INVALID_PINCODE);
    }
    return lengthCheck;
  };
}
