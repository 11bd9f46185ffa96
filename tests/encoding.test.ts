/**
 * Encoding detection tests
 */

import { describe, it, expect } from 'vitest';
import { decodeBuffer, detectBufferEncoding, isSupportedEncoding } from '../src/sampler/encoding.js';

describe('detectBufferEncoding', () => {
  it('should recognise UTF-8 with a byte order mark', () => {
    const buffer = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('name,city\nZoë,Köln\n', 'utf-8')]);

    expect(detectBufferEncoding(buffer)).toBe('UTF-8');
  });
});

describe('decodeBuffer', () => {
  it('should drop a leading byte order mark', () => {
    expect(decodeBuffer(Buffer.from([0xef, 0xbb, 0xbf, 0x61]), 'utf-8')).toBe('a');
  });

  it('should decode single-byte encodings', () => {
    expect(decodeBuffer(Buffer.from([0x4a, 0x6f, 0x73, 0xe9]), 'ISO-8859-1')).toBe('José');
  });

  it('should reject unknown labels', () => {
    expect(() => decodeBuffer(Buffer.from('a'), 'bogus')).toThrow('Unsupported encoding: bogus');
  });
});

describe('isSupportedEncoding', () => {
  it('should accept labels the detector reports', () => {
    expect(isSupportedEncoding('UTF-8')).toBe(true);
    expect(isSupportedEncoding('windows-1252')).toBe(true);
    expect(isSupportedEncoding('Shift_JIS')).toBe(true);
  });
});
