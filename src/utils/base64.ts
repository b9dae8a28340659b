import { BadRequestError } from './errors.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode a base64 image payload.
 * Whitespace (line wrapping) is ignored; anything else outside the base64
 * alphabet, or a length that is not a multiple of 4, is rejected.
 */
export function decodeBase64Image(encoded: string): Buffer {
  const compact = encoded.replace(/\s+/g, '');

  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new BadRequestError('Invalid base64 image data', 'INVALID_BASE64');
  }

  return Buffer.from(compact, 'base64');
}
