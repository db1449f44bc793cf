import type { FileSource } from '../types/collaborators.js';

/**
 * Runs `fn` against the source and puts the cursor back where it was on
 * every exit path, thrown errors included.
 */
export const withRestoredCursor = <T>(source: FileSource, fn: (source: FileSource) => T): T => {
  const start = source.tell();
  try {
    return fn(source);
  } finally {
    source.seek(start);
  }
};

/** Reads the whole source from byte 0, restoring the cursor afterwards. */
export const readAllBytes = (source: FileSource): Uint8Array =>
  withRestoredCursor(source, (s) => {
    s.seek(0);
    return s.read();
  });
