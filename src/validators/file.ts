import * as path from 'path';
import type { PartialDeep } from 'type-fest';
import { FieldErrorCode, type ValidationResult, type Validator } from '../types/validation.js';
import type {
  ImageDecoder,
  ImageDimensions,
  UploadedFile,
} from '../types/collaborators.js';
import {
  BYTES_PER_MB,
  DOCUMENT_EXTENSIONS,
  DOCUMENT_MAX_SIZE_MB,
  FIELD_PATTERNS,
  IMAGE_DIMENSION_LIMITS,
  IMAGE_EXTENSIONS,
  IMAGE_MAX_SIZE_MB,
} from '../constants/validation.js';
import { FIELD_MESSAGES } from '../constants/messages.js';
import { readAllBytes, withRestoredCursor } from '../utils/file-cursor.js';
import { ImageDataDecoder } from '../services/image.js';
import { invalid, unsupportedInput, valid } from './base.js';

export interface FileRules {
  allowedExtensions: readonly string[];
  maxFileSizeMb: number;
}

const isUploadedFile = (value: unknown): value is UploadedFile => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('filename' in value) || typeof value.filename !== 'string' || !('source' in value)) {
    return false;
  }
  const { source } = value;
  return (
    typeof source === 'object' &&
    source !== null &&
    'tell' in source &&
    'seek' in source &&
    'read' in source &&
    typeof source.tell === 'function' &&
    typeof source.seek === 'function' &&
    typeof source.read === 'function'
  );
};

/**
 * Uploaded file checked for name, extension and size, in that order. The
 * source is read in full to measure it, and its cursor is restored to where
 * it started whatever the outcome.
 */
export class FileValidator implements Validator<UploadedFile> {
  private readonly allowedExtensions: readonly string[];
  private readonly maxFileSizeMb: number;

  constructor({ allowedExtensions, maxFileSizeMb }: FileRules) {
    this.allowedExtensions = allowedExtensions.map((extension) => extension.toLowerCase());
    this.maxFileSizeMb = maxFileSizeMb;
  }

  public validate = (value: unknown): ValidationResult<UploadedFile> => {
    if (!isUploadedFile(value)) {
      return unsupportedInput('an uploaded file');
    }

    const result = this.inspect(value);
    return result.isValid ? valid(value) : result;
  };

  /** Runs every file check and hands back the file's bytes for further inspection. */
  public inspect = (file: UploadedFile): ValidationResult<Uint8Array> =>
    withRestoredCursor(file.source, () => {
      const name = this.validateFileName(file);
      if (!name.isValid) {
        return name;
      }
      const type = this.validateFileType(file);
      if (!type.isValid) {
        return type;
      }
      return this.validateFileSize(file);
    });

  public validateFileName = (file: UploadedFile): ValidationResult<string> =>
    FIELD_PATTERNS.FILE_NAME.test(file.filename)
      ? valid(file.filename)
      : invalid(FieldErrorCode.BAD_FILE_NAME, FIELD_MESSAGES.BAD_FILE_NAME);

  public validateFileType = (file: UploadedFile): ValidationResult<string> => {
    const extension = path.extname(file.filename).toLowerCase();
    if (!this.allowedExtensions.includes(extension)) {
      return invalid(
        FieldErrorCode.UNSUPPORTED_TYPE,
        FIELD_MESSAGES.UNSUPPORTED_FILE_TYPE(extension, this.allowedExtensions)
      );
    }
    return valid(extension);
  };

  public validateFileSize = (file: UploadedFile): ValidationResult<Uint8Array> => {
    const bytes = readAllBytes(file.source);
    if (bytes.byteLength > this.maxFileSizeMb * BYTES_PER_MB) {
      return invalid(FieldErrorCode.FILE_TOO_LARGE, FIELD_MESSAGES.FILE_TOO_LARGE(this.maxFileSizeMb));
    }
    return valid(bytes);
  };
}

export interface DocumentValidatorOptions {
  maxFileSizeMb?: number;
}

/** PDF, Word and Excel uploads, 2 MB by default. */
export class DocumentValidator implements Validator<UploadedFile> {
  private readonly files: FileValidator;

  constructor({ maxFileSizeMb = DOCUMENT_MAX_SIZE_MB }: DocumentValidatorOptions = {}) {
    this.files = new FileValidator({ allowedExtensions: DOCUMENT_EXTENSIONS, maxFileSizeMb });
  }

  public validate = (value: unknown): ValidationResult<UploadedFile> => this.files.validate(value);
}

export interface ImageValidatorOptions {
  maxFileSizeMb?: number;
  verifyImage?: boolean;
  decoder?: ImageDecoder;
  dimensions?: PartialDeep<typeof IMAGE_DIMENSION_LIMITS>;
}

const formatDimensions = ({ width, height }: ImageDimensions): string => `${width}x${height}`;

const withDefaults = (
  defaults: ImageDimensions,
  overrides: PartialDeep<ImageDimensions> = {}
): ImageDimensions => ({
  width: overrides.width ?? defaults.width,
  height: overrides.height ?? defaults.height,
});

/**
 * JPEG, PNG and GIF uploads, 5 MB by default. With `verifyImage`, the bytes
 * are decoded and the pixel dimensions held to the configured minimum and
 * maximum.
 */
export class ImageValidator implements Validator<UploadedFile> {
  private readonly files: FileValidator;
  private readonly verifyImage: boolean;
  private readonly decoder: ImageDecoder;
  private readonly minimum: ImageDimensions;
  private readonly maximum: ImageDimensions;

  constructor({
    maxFileSizeMb = IMAGE_MAX_SIZE_MB,
    verifyImage = false,
    decoder,
    dimensions = {},
  }: ImageValidatorOptions = {}) {
    this.files = new FileValidator({ allowedExtensions: IMAGE_EXTENSIONS, maxFileSizeMb });
    this.verifyImage = verifyImage;
    this.decoder = decoder ?? new ImageDataDecoder();
    this.minimum = withDefaults(IMAGE_DIMENSION_LIMITS.min, dimensions.min);
    this.maximum = withDefaults(IMAGE_DIMENSION_LIMITS.max, dimensions.max);
  }

  public validate = (value: unknown): ValidationResult<UploadedFile> => {
    if (!isUploadedFile(value)) {
      return unsupportedInput('an uploaded file');
    }

    return withRestoredCursor(value.source, () => {
      const inspected = this.files.inspect(value);
      if (!inspected.isValid) {
        return inspected;
      }
      if (!this.verifyImage) {
        return valid(value);
      }

      const dimensions = this.validateDimensions(inspected.sanitizedValue);
      return dimensions.isValid ? valid(value) : dimensions;
    });
  };

  public validateDimensions = (bytes: Uint8Array): ValidationResult<ImageDimensions> => {
    let size: ImageDimensions;
    try {
      size = this.decoder.decode(bytes);
    } catch {
      return invalid(FieldErrorCode.IMAGE_CORRUPT, FIELD_MESSAGES.IMAGE_CORRUPT);
    }

    if (size.width < this.minimum.width || size.height < this.minimum.height) {
      return invalid(
        FieldErrorCode.IMAGE_TOO_SMALL,
        FIELD_MESSAGES.IMAGE_TOO_SMALL(formatDimensions(this.minimum), formatDimensions(size))
      );
    }
    if (size.width > this.maximum.width || size.height > this.maximum.height) {
      return invalid(
        FieldErrorCode.IMAGE_TOO_LARGE,
        FIELD_MESSAGES.IMAGE_TOO_LARGE(formatDimensions(this.maximum), formatDimensions(size))
      );
    }

    return valid(size);
  };
}
