import { readFile, stat } from 'fs/promises';
import { EncodingError, NotFoundError, errorMessage } from './errors.js';

// fs errors may come from another realm, so match on shape, not class
function isMissingPathError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Stat a source path, mapping a missing path to NotFoundError
 */
export async function statSource(filePath: string): Promise<{ size: number }> {
  try {
    const stats = await stat(filePath);
    return { size: stats.size };
  } catch (error) {
    if (isMissingPathError(error)) {
      throw new NotFoundError(filePath);
    }
    throw error;
  }
}

export function decodeBytes(
  bytes: Uint8Array,
  encoding: string,
  sourceName: string
): string {
  try {
    // fatal: reject malformed input instead of substituting U+FFFD
    return new TextDecoder(encoding, { fatal: true }).decode(bytes);
  } catch (error) {
    throw new EncodingError(
      `Cannot decode ${sourceName} as ${encoding}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

/**
 * Read a whole file into memory and decode it
 */
export async function readTextFile(
  filePath: string,
  encoding: string
): Promise<string> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (error) {
    if (isMissingPathError(error)) {
      throw new NotFoundError(filePath);
    }
    throw error;
  }
  return decodeBytes(bytes, encoding, filePath);
}
