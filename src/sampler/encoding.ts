/**
 * Encoding detection and decoding
 *
 * @module sampler/encoding
 */

import * as fs from 'fs';
import { detect } from 'chardet';
import iconv from 'iconv-lite';

/**
 * Used when detection has nothing to go on (an empty file)
 */
export const FALLBACK_ENCODING = 'utf-8';

/**
 * Statistical guess of a buffer's text encoding. The top guess is taken
 * as is; there is no confidence threshold.
 */
export function detectBufferEncoding(buffer: Uint8Array): string {
  return detect(buffer) ?? FALLBACK_ENCODING;
}

/**
 * Reads the whole file once and guesses its encoding
 */
export function detectEncoding(filePath: string): string {
  return detectBufferEncoding(fs.readFileSync(filePath));
}

export function isSupportedEncoding(encoding: string): boolean {
  return iconv.encodingExists(encoding);
}

/**
 * Decodes bytes to text, dropping a leading byte order mark
 *
 * @throws Error when the encoding label is not recognized
 */
export function decodeBuffer(buffer: Buffer, encoding: string): string {
  if (!isSupportedEncoding(encoding)) {
    throw new Error(`Unsupported encoding: ${encoding}`);
  }
  return iconv.decode(buffer, encoding);
}
