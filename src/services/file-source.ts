import { readFile } from 'fs/promises';
import * as path from 'path';
import type { FileSource, UploadedFile } from '../types/collaborators.js';

/** In-memory file source with a movable read cursor. */
export class BufferFileSource implements FileSource {
  private position = 0;

  constructor(private readonly bytes: Uint8Array) {}

  public tell = (): number => this.position;

  public seek = (position: number): void => {
    if (!Number.isInteger(position) || position < 0) {
      throw new RangeError(`Invalid seek position: ${position}`);
    }
    this.position = Math.min(position, this.bytes.byteLength);
  };

  public size = (): number => this.bytes.byteLength;

  public read = (): Uint8Array => {
    const chunk = this.bytes.subarray(this.position);
    this.position = this.bytes.byteLength;
    return chunk;
  };
}

export const uploadedFile = (filename: string, bytes: Uint8Array): UploadedFile => ({
  filename,
  source: new BufferFileSource(bytes),
});

export const fileFromPath = async (filePath: string): Promise<UploadedFile> => {
  const bytes = await readFile(filePath);
  return uploadedFile(path.basename(filePath), bytes);
};
