import { describe, expect, it, vi } from 'vitest';

import {
  EmailValidator,
  PhoneNumberValidator,
  PincodeValidator,
  ZipcodeValidator,
} from '../contact.js';
import type { MxLookupResult } from '../../types/collaborators.js';
import { ErrorCategory, FieldErrorCode, type ValidationResult } from '../../types/validation.js';

const codeOf = <T>(result: ValidationResult<T>): FieldErrorCode | undefined =>
  result.isValid ? undefined : result.error.code;

const fakeResolver = (answer: () => Promise<MxLookupResult>) => ({
  resolveMx: vi.fn((_domain: string) => answer()),
});

describe('PhoneNumberValidator', () => {
  const validator = new PhoneNumberValidator();

  it('should accept international numbers with separators', () => {
    expect(validator.validate('+1 213-373-4253')).toEqual({
      isValid: true,
      sanitizedValue: '+1 213-373-4253',
    });
    expect(validator.validate('+91 (80) 2345 6789').isValid).toBe(true);
  });

  it('should reject missing values as empty', () => {
    for (const value of [undefined, null, '']) {
      const result = validator.validate(value);
      expect(result.isValid).toBe(false);
      if (!result.isValid) {
        expect(result.error.code).toBe(FieldErrorCode.EMPTY_VALUE);
        expect(result.error.message).toBe('Phone number cannot be empty.');
      }
    }
  });

  it('should reject letters and markup', () => {
    expect(codeOf(validator.validate('call me'))).toBe(FieldErrorCode.BAD_FORMAT);
    expect(codeOf(validator.validate('(080) 2345 6789'))).toBe(FieldErrorCode.BAD_FORMAT);
    expect(codeOf(validator.validate('<12345678>'))).toBe(FieldErrorCode.BAD_FORMAT);
  });

  it('should count digits only when checking length', () => {
    expect(codeOf(validator.validate('123-4567'))).toBe(FieldErrorCode.TOO_SHORT);
    expect(codeOf(validator.validate('123456789012345'))).toBe(FieldErrorCode.TOO_LONG);
    expect(validator.validate('1-2-3-4-5678').isValid).toBe(true);
  });

  it('should check the numbering plan of a region when one is given', () => {
    const us = new PhoneNumberValidator({ region: 'US' });

    expect(us.validate('2133734253').isValid).toBe(true);

    const result = us.validate('1234567890');
    expect(result.isValid).toBe(false);
    if (!result.isValid) {
      expect(result.error.code).toBe(FieldErrorCode.BAD_FORMAT);
      expect(result.error.message).toBe('Invalid phone number for region US.');
    }
  });

  it('should report unsupported input for numbers', () => {
    expect(codeOf(validator.validate(2133734253))).toBe(FieldErrorCode.UNSUPPORTED_INPUT);
  });
});

describe('EmailValidator', () => {
  it('should accept an address whose domain has mail exchangers', async () => {
    const resolver = fakeResolver(async () => 'found');
    const validator = new EmailValidator({ resolver });

    const result = await validator.validate('jane.doe@example.com');

    expect(result).toEqual({ isValid: true, sanitizedValue: 'jane.doe@example.com' });
    expect(resolver.resolveMx).toHaveBeenCalledWith('example.com');
  });

  it('should check the length before anything else', async () => {
    const resolver = fakeResolver(async () => 'found');
    const validator = new EmailValidator({ resolver });

    expect(codeOf(await validator.validate('a@b'))).toBe(FieldErrorCode.TOO_SHORT);
    expect(codeOf(await validator.validate(''))).toBe(FieldErrorCode.TOO_SHORT);
    expect(resolver.resolveMx).not.toHaveBeenCalled();
  });

  it('should report an empty address when no minimum length applies', async () => {
    const validator = new EmailValidator({ minLength: 0, checkDomain: false });

    const result = await validator.validate('');

    expect(result).toEqual({
      isValid: false,
      error: {
        code: FieldErrorCode.EMPTY_VALUE,
        category: ErrorCategory.EMPTY_INPUT_ERROR,
        message: 'Email ID cannot be empty.',
      },
    });
  });

  it('should require a username of at least three characters', async () => {
    const validator = new EmailValidator({ checkDomain: false });

    const result = await validator.validate('ab@example.com');

    expect(result.isValid).toBe(false);
    if (!result.isValid) {
      expect(result.error.code).toBe(FieldErrorCode.USERNAME_TOO_SHORT);
      expect(result.error.message).toBe('Email username must be at least 3 characters long.');
    }
  });

  it('should reject uppercase letters before checking the shape', async () => {
    const validator = new EmailValidator({ checkDomain: false });

    expect(codeOf(await validator.validate('Jane@example.com'))).toBe(
      FieldErrorCode.UPPERCASE_NOT_ALLOWED
    );
    expect(codeOf(await validator.validate('jane@@example.com'))).toBe(FieldErrorCode.BAD_FORMAT);
    expect(codeOf(await validator.validate('jane@localhost'))).toBe(FieldErrorCode.BAD_FORMAT);
  });

  it('should report a domain without mail exchangers', async () => {
    const validator = new EmailValidator({ resolver: fakeResolver(async () => 'not_found') });

    const result = await validator.validate('jane@example.invalid');

    expect(result).toEqual({
      isValid: false,
      error: {
        code: FieldErrorCode.DOMAIN_UNRESOLVABLE,
        category: ErrorCategory.UNRESOLVED_DOMAIN_ERROR,
        message: 'Invalid domain in email: example.invalid does not have MX records.',
      },
    });
  });

  it('should report a failed lookup separately from a missing domain', async () => {
    const resolver = fakeResolver(async () => {
      throw new Error('queryMx ESERVFAIL example.com');
    });
    const validator = new EmailValidator({ resolver });

    const result = await validator.validate('jane@example.com');

    expect(result).toEqual({
      isValid: false,
      error: {
        code: FieldErrorCode.LOOKUP_FAILED,
        category: ErrorCategory.EXTERNAL_LOOKUP_ERROR,
        message: 'Unable to verify the domain example.com: queryMx ESERVFAIL example.com',
      },
    });
  });

  it('should give up on a lookup that outlives the timeout', async () => {
    const resolver = fakeResolver(() => new Promise<MxLookupResult>(() => undefined));
    const validator = new EmailValidator({ resolver, lookupTimeoutMs: 20 });

    const result = await validator.validate('jane@example.com');

    expect(result.isValid).toBe(false);
    if (!result.isValid) {
      expect(result.error.code).toBe(FieldErrorCode.LOOKUP_FAILED);
      expect(result.error.message).toBe(
        'Unable to verify the domain example.com: Operation timed out after 20ms'
      );
    }
  });

  it('should skip the lookup when domain checks are off', async () => {
    const resolver = fakeResolver(async () => 'not_found');
    const validator = new EmailValidator({ resolver, checkDomain: false });

    const result = await validator.validate('jane@example.com');

    expect(result.isValid).toBe(true);
    expect(resolver.resolveMx).not.toHaveBeenCalled();
  });

  it('should escape markup before checking', async () => {
    const validator = new EmailValidator({ checkDomain: false });

    expect(codeOf(await validator.validate('jane<b>@example.com'))).toBe(FieldErrorCode.BAD_FORMAT);
  });
});

describe('ZipcodeValidator', () => {
  const validator = new ZipcodeValidator();

  it('should accept five digits and ZIP+4', () => {
    expect(validator.validate('12345')).toEqual({ isValid: true, sanitizedValue: '12345' });
    expect(validator.validate('12345-6789')).toEqual({ isValid: true, sanitizedValue: '12345-6789' });
  });

  it('should reject other shapes', () => {
    expect(codeOf(validator.validate('1234'))).toBe(FieldErrorCode.TOO_SHORT);
    expect(codeOf(validator.validate('12345678901'))).toBe(FieldErrorCode.TOO_LONG);
    expect(codeOf(validator.validate('12345-678'))).toBe(FieldErrorCode.BAD_FORMAT);
    expect(codeOf(validator.validate('ABCDE'))).toBe(FieldErrorCode.BAD_FORMAT);
  });
});

describe('PincodeValidator', () => {
  const validator = new PincodeValidator();

  it('should accept exactly six digits', () => {
    expect(validator.validate('560001')).toEqual({ isValid: true, sanitizedValue: '560001' });
  });

  it('should check the length before the digits', () => {
    expect(codeOf(validator.validate('56000'))).toBe(FieldErrorCode.TOO_SHORT);
    expect(codeOf(validator.validate('5600011'))).toBe(FieldErrorCode.TOO_LONG);
    expect(codeOf(validator.validate('56000a'))).toBe(FieldErrorCode.BAD_FORMAT);
    expect(codeOf(validator.validate(560001))).toBe(FieldErrorCode.NOT_A_STRING);
  });
});
