import { match } from 'ts-pattern';
import type {
  AsyncValidator,
  DateRange,
  ParsedDate,
  ValidationResult,
  Validator,
} from '../types/validation.js';
import type { ImageDecoder, MxResolver, UploadedFile } from '../types/collaborators.js';
import type { CheckKind, FieldcheckConfig } from '../types/common.js';
import { ErrorType } from '../types/error-handler.js';
import {
  CheckKindSchema,
  CheckOptionsSchema,
  FileCheckOptionsSchema,
  type ValidatedCheckOptions,
} from '../schemas/validation.js';
import { ConfigManager, formatIssues } from '../config.js';
import { SecureError } from '../utils/error-handler.js';
import { ERROR_MESSAGES } from '../constants/messages.js';
import {
  AddressValidator,
  AgeValidator,
  AlphabeticValidator,
  AlphanumericValidator,
  BooleanValidator,
  CrossFieldDateValidator,
  DateValidator,
  DecimalValidator,
  DocumentValidator,
  EmailValidator,
  GenderValidator,
  ImageValidator,
  MinMaxLengthValidator,
  NameValidator,
  NumericValidator,
  PasswordValidator,
  PhoneNumberValidator,
  PincodeValidator,
  PlaceNameValidator,
  RangeValidator,
  ZipcodeValidator,
} from '../validators/index.js';

export type CheckedValue = number | string | boolean | ParsedDate;

type AnyValidator = Validator<CheckedValue> | AsyncValidator<CheckedValue>;

export interface FieldCheckDependencies {
  config?: FieldcheckConfig;
  resolver?: MxResolver;
  decoder?: ImageDecoder;
  now?: () => Date;
}

/**
 * Entry point for one-off checks. Every call builds a fresh validator from
 * the request's parameters and the configuration, runs it once and drops it.
 * Bad parameters throw a `SecureError`; a value that fails its rules comes
 * back as an invalid result.
 */
export class FieldCheck {
  private readonly config: FieldcheckConfig;
  private readonly resolver?: MxResolver;
  private readonly decoder?: ImageDecoder;
  private readonly now?: () => Date;

  constructor({ config, resolver, decoder, now }: FieldCheckDependencies = {}) {
    this.config = config ?? ConfigManager.getInstance().getConfig();
    this.resolver = resolver;
    this.decoder = decoder;
    this.now = now;
  }

  public check = async (
    kind: string,
    value: unknown,
    options: unknown = {}
  ): Promise<ValidationResult<CheckedValue>> => {
    const checkKind = CheckKindSchema.safeParse(kind);
    if (!checkKind.success) {
      throw new SecureError(
        `${ERROR_MESSAGES.UNKNOWN_CHECK_KIND}: ${kind}`,
        ErrorType.VALIDATION_ERROR,
        { operation: 'check', kind },
        true
      );
    }

    const parsed = CheckOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new SecureError(
        `${ERROR_MESSAGES.INVALID_CHECK_OPTIONS}: ${formatIssues(parsed.error.issues)}`,
        ErrorType.VALIDATION_ERROR,
        { operation: 'check', kind },
        true
      );
    }

    const validator = this.createValidator(checkKind.data, parsed.data);
    return await validator.validate(value);
  };

  public checkDateRange = (start: unknown, end: unknown): ValidationResult<DateRange> =>
    new CrossFieldDateValidator({ now: this.now }).validate({ start, end });

  public checkFile = (file: UploadedFile, options: unknown = {}): ValidationResult<UploadedFile> => {
    const parsed = FileCheckOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new SecureError(
        `${ERROR_MESSAGES.INVALID_CHECK_OPTIONS}: ${formatIssues(parsed.error.issues)}`,
        ErrorType.VALIDATION_ERROR,
        { operation: 'checkFile', file: file.filename },
        true
      );
    }

    const { kind, maxSizeMb, verifyImage } = parsed.data;

    return match(kind)
      .with('document', () =>
        new DocumentValidator({
          maxFileSizeMb: maxSizeMb ?? this.config.documentMaxSizeMb,
        }).validate(file)
      )
      .with('image', () =>
        new ImageValidator({
          maxFileSizeMb: maxSizeMb ?? this.config.imageMaxSizeMb,
          verifyImage: verifyImage ?? this.config.verifyImages,
          decoder: this.decoder,
        }).validate(file)
      )
      .exhaustive();
  };

  private readonly createValidator = (
    kind: CheckKind,
    options: ValidatedCheckOptions
  ): AnyValidator => {
    const { min, max, minLength, maxLength, places, minAge, maxAge, region, checkDomain } =
      options;
    const bounds = { minLength, maxLength };

    return match<CheckKind, AnyValidator>(kind)
      .with('numeric', () => new NumericValidator())
      .with('range', () => new RangeValidator({ min, max }))
      .with('age', () => new AgeValidator({ minAge, maxAge }))
      .with('decimal', () => new DecimalValidator({ maxDecimalPlaces: places }))
      .with('length', () => new MinMaxLengthValidator(bounds))
      .with('alphanumeric', () => new AlphanumericValidator())
      .with('alphabetic', () => new AlphabeticValidator())
      .with('name', () => new NameValidator(bounds))
      .with('address', () => new AddressValidator(bounds))
      .with('placename', () => new PlaceNameValidator(bounds))
      .with('gender', () => new GenderValidator({ validGenders: this.config.validGenders }))
      .with(
        'phone',
        () => new PhoneNumberValidator({ ...bounds, region: region ?? this.config.phoneRegion })
      )
      .with(
        'email',
        () =>
          new EmailValidator({
            ...bounds,
            resolver: this.resolver,
            checkDomain: checkDomain ?? this.config.checkEmailDomain,
            lookupTimeoutMs: this.config.dnsTimeoutMs,
          })
      )
      .with('zipcode', () => new ZipcodeValidator(bounds))
      .with('pincode', () => new PincodeValidator(bounds))
      .with('date', () => new DateValidator({ now: this.now }))
      .with('boolean', () => new BooleanValidator())
      .with('password', () => new PasswordValidator())
      .exhaustive();
  };
}
