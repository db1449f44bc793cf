import { PNG } from 'pngjs';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { DocumentValidator, FileValidator, ImageValidator } from '../file.js';
import { uploadedFile } from '../../services/file-source.js';
import { BYTES_PER_MB } from '../../constants/validation.js';
import type { ImageDimensions, UploadedFile } from '../../types/collaborators.js';
import { ErrorCategory, FieldErrorCode, type ValidationResult } from '../../types/validation.js';

const codeOf = <T>(result: ValidationResult<T>): FieldErrorCode | undefined =>
  result.isValid ? undefined : result.error.code;

// Places the cursor mid-file so restoration is observable
const fileAt = (filename: string, size: number, cursor = 5): UploadedFile => {
  const file = uploadedFile(filename, new Uint8Array(size));
  file.source.seek(cursor);
  return file;
};

const fakeDecoder = (dimensions: ImageDimensions) => ({
  decode: vi.fn((_bytes: Uint8Array) => dimensions),
});

describe('FileValidator', () => {
  const validator = new FileValidator({ allowedExtensions: ['.PDF', '.txt'], maxFileSizeMb: 1 });

  it('should accept a file within the rules and return it', () => {
    const file = fileAt('notes.txt', 64);

    const result = validator.validate(file);

    expect(result.isValid && result.sanitizedValue).toBe(file);
    expect(file.source.tell()).toBe(5);
  });

  it('should compare extensions without regard to case', () => {
    expect(validator.validate(fileAt('scan.pdf', 10)).isValid).toBe(true);
    expect(validator.validate(fileAt('scan.PdF', 10)).isValid).toBe(true);
  });

  it('should reject names with spaces, extra dots or no extension', () => {
    for (const name of ['my notes.txt', 'notes.tar.txt', 'notes', 'notes-v2.txt']) {
      const file = fileAt(name, 10);
      expect(codeOf(validator.validate(file))).toBe(FieldErrorCode.BAD_FILE_NAME);
      expect(file.source.tell()).toBe(5);
    }
  });

  it('should list the allowed types when the extension is not one of them', () => {
    const file = fileAt('notes.csv', 10);

    expect(validator.validate(file)).toEqual({
      isValid: false,
      error: {
        code: FieldErrorCode.UNSUPPORTED_TYPE,
        category: ErrorCategory.UNSUPPORTED_TYPE_ERROR,
        message: 'Unsupported file type: .csv. Allowed types: .pdf, .txt',
      },
    });
    expect(file.source.tell()).toBe(5);
  });

  it('should measure the whole file regardless of the cursor', () => {
    const atLimit = fileAt('notes.txt', BYTES_PER_MB, BYTES_PER_MB - 1);
    const overLimit = fileAt('notes.txt', BYTES_PER_MB + 1, BYTES_PER_MB);

    expect(validator.validate(atLimit).isValid).toBe(true);
    expect(atLimit.source.tell()).toBe(BYTES_PER_MB - 1);

    expect(validator.validate(overLimit)).toEqual({
      isValid: false,
      error: {
        code: FieldErrorCode.FILE_TOO_LARGE,
        category: ErrorCategory.RANGE_ERROR,
        message: 'File size exceeds 1 MB limit.',
      },
    });
    expect(overLimit.source.tell()).toBe(BYTES_PER_MB);
  });

  it('should report unsupported input for anything but an uploaded file', () => {
    expect(codeOf(validator.validate('notes.txt'))).toBe(FieldErrorCode.UNSUPPORTED_INPUT);
    expect(codeOf(validator.validate({ filename: 'notes.txt', source: {} }))).toBe(
      FieldErrorCode.UNSUPPORTED_INPUT
    );
  });
});

describe('DocumentValidator', () => {
  it('should accept PDF, Word and Excel files up to 2 MB', () => {
    const validator = new DocumentValidator();

    expect(validator.validate(fileAt('report.pdf', 100)).isValid).toBe(true);
    expect(validator.validate(fileAt('report.docx', 100)).isValid).toBe(true);
    expect(validator.validate(fileAt('report.xlsx', 2 * BYTES_PER_MB)).isValid).toBe(true);
    expect(codeOf(validator.validate(fileAt('report.doc', 100)))).toBe(
      FieldErrorCode.UNSUPPORTED_TYPE
    );
    expect(codeOf(validator.validate(fileAt('report.pdf', 2 * BYTES_PER_MB + 1)))).toBe(
      FieldErrorCode.FILE_TOO_LARGE
    );
  });

  it('should honour a custom size limit', () => {
    const validator = new DocumentValidator({ maxFileSizeMb: 0.5 });

    const result = validator.validate(fileAt('report.pdf', BYTES_PER_MB));

    expect(result.isValid).toBe(false);
    if (!result.isValid) {
      expect(result.error.message).toBe('File size exceeds 0.5 MB limit.');
    }
  });
});

describe('ImageValidator', () => {
  let decoder: ReturnType<typeof fakeDecoder>;

  beforeEach(() => {
    decoder = fakeDecoder({ width: 800, height: 600 });
  });

  it('should skip decoding unless asked to verify', () => {
    const validator = new ImageValidator({ decoder });
    const file = fileAt('photo.png', 100);

    expect(validator.validate(file).isValid).toBe(true);
    expect(decoder.decode).not.toHaveBeenCalled();
  });

  it('should allow a 5 MB image by default', () => {
    const validator = new ImageValidator({ decoder });

    expect(validator.validate(fileAt('photo.jpg', 5 * BYTES_PER_MB)).isValid).toBe(true);
    expect(codeOf(validator.validate(fileAt('photo.jpg', 5 * BYTES_PER_MB + 1)))).toBe(
      FieldErrorCode.FILE_TOO_LARGE
    );
    expect(codeOf(validator.validate(fileAt('photo.bmp', 100)))).toBe(
      FieldErrorCode.UNSUPPORTED_TYPE
    );
  });

  it('should decode the whole file when verifying', () => {
    const validator = new ImageValidator({ decoder, verifyImage: true });
    const file = fileAt('photo.gif', 100);

    const result = validator.validate(file);

    expect(result.isValid && result.sanitizedValue).toBe(file);
    expect(decoder.decode).toHaveBeenCalledTimes(1);
    expect(decoder.decode.mock.calls[0]?.[0].byteLength).toBe(100);
    expect(file.source.tell()).toBe(5);
  });

  it('should reject images below the minimum dimensions', () => {
    const validator = new ImageValidator({
      decoder: fakeDecoder({ width: 200, height: 400 }),
      verifyImage: true,
    });

    expect(validator.validate(fileAt('photo.png', 100))).toEqual({
      isValid: false,
      error: {
        code: FieldErrorCode.IMAGE_TOO_SMALL,
        category: ErrorCategory.RANGE_ERROR,
        message: 'Image dimensions must be at least 300x300px. Uploaded image is 200x400px.',
      },
    });
  });

  it('should reject images above the maximum dimensions', () => {
    const validator = new ImageValidator({
      decoder: fakeDecoder({ width: 2000, height: 1000 }),
      verifyImage: true,
    });

    const result = validator.validate(fileAt('photo.png', 100));

    expect(result.isValid).toBe(false);
    if (!result.isValid) {
      expect(result.error.code).toBe(FieldErrorCode.IMAGE_TOO_LARGE);
      expect(result.error.message).toBe(
        'Image dimensions exceed 1920x1080px limit. Uploaded image is 2000x1000px.'
      );
    }
  });

  it('should report bytes the decoder cannot read and restore the cursor', () => {
    const validator = new ImageValidator({
      decoder: {
        decode: () => {
          throw new Error('unsupported file type');
        },
      },
      verifyImage: true,
    });
    const file = fileAt('photo.png', 100);

    expect(validator.validate(file)).toEqual({
      isValid: false,
      error: {
        code: FieldErrorCode.IMAGE_CORRUPT,
        category: ErrorCategory.EXTERNAL_LOOKUP_ERROR,
        message: 'Invalid image file.',
      },
    });
    expect(file.source.tell()).toBe(5);
  });

  it('should merge custom limits with the defaults', () => {
    const validator = new ImageValidator({
      decoder: fakeDecoder({ width: 200, height: 400 }),
      verifyImage: true,
      dimensions: { min: { width: 100 } },
    });

    expect(validator.validate(fileAt('photo.png', 100)).isValid).toBe(true);
  });

  it('should keep the default for a dimension passed as undefined', () => {
    const validator = new ImageValidator({
      decoder: fakeDecoder({ width: 200, height: 400 }),
      verifyImage: true,
      dimensions: { min: { width: undefined, height: 100 } },
    });

    const result = validator.validate(fileAt('photo.png', 100));

    expect(result.isValid).toBe(false);
    if (!result.isValid) {
      expect(result.error.message).toBe(
        'Image dimensions must be at least 300x100px. Uploaded image is 200x400px.'
      );
    }
  });

  it('should refuse a truncated image with the default decoder', () => {
    const validator = new ImageValidator({ verifyImage: true });
    const complete = PNG.sync.write(new PNG({ width: 500, height: 500 }));
    const file = uploadedFile('photo.png', complete.subarray(0, 33));
    file.source.seek(5);

    expect(codeOf(validator.validate(file))).toBe(FieldErrorCode.IMAGE_CORRUPT);
    expect(file.source.tell()).toBe(5);
    expect(validator.validate(uploadedFile('photo.png', complete)).isValid).toBe(true);
  });
});
