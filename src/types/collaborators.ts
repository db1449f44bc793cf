/**
 * Seekable byte source behind an uploaded file.
 * `read()` returns everything from the cursor to the end and leaves the
 * cursor at the end.
 */
export interface FileSource {
  tell(): number;
  seek(position: number): void;
  size(): number;
  read(): Uint8Array;
}

export interface UploadedFile {
  filename: string;
  source: FileSource;
}

export interface ImageDimensions {
  width: number;
  height: number;
}

export interface ImageDecoder {
  /** Throws when the bytes are not a decodable image. */
  decode(bytes: Uint8Array): ImageDimensions;
}

export type MxLookupResult = 'found' | 'not_found';

export interface MxResolver {
  /** Rejects on resolver failures other than "no such domain / no MX answer". */
  resolveMx(domain: string): Promise<MxLookupResult>;
}
