import { imageSize } from 'image-size';
import { decode as decodeJpeg } from 'jpeg-js';
import { GifReader } from 'omggif';
import { PNG } from 'pngjs';
import { match } from 'ts-pattern';
import type { ImageDecoder, ImageDimensions } from '../types/collaborators.js';

// Throws unless every frame decodes through to the end of the file
const decodePixels = (type: string | undefined, buffer: Buffer): void =>
  match(type)
    .with('png', () => {
      PNG.sync.read(buffer);
    })
    .with('jpg', () => {
      decodeJpeg(buffer, { tolerantDecoding: false });
    })
    .with('gif', () => {
      const reader = new GifReader(buffer);
      const pixels = new Uint8Array(reader.width * reader.height * 4);
      for (let frame = 0; frame < reader.numFrames(); frame++) {
        reader.decodeAndBlitFrameRGBA(frame, pixels);
      }
    })
    .otherwise((other) => {
      throw new Error(`Unsupported image type: ${other ?? 'unknown'}`);
    });

/**
 * Reads width and height from the image header, then decodes the image body
 * so that truncated or damaged files are refused.
 */
export class ImageDataDecoder implements ImageDecoder {
  public decode = (bytes: Uint8Array): ImageDimensions => {
    const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const { width, height, type } = imageSize(buffer);

    if (width === undefined || height === undefined) {
      throw new Error('Image dimensions could not be determined');
    }

    decodePixels(type, buffer);
    return { width, height };
  };
}
