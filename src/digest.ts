import * as crypto from 'crypto';
import { TRAILER_LENGTH } from './shader-constants.js';

/**
 * Computes a fixed-length lowercase hex fingerprint of some bytes.
 */
export type DigestProvider = (data: Uint8Array) => string;

export const DIGEST_LENGTH = TRAILER_LENGTH - 1;

export const md5Hex: DigestProvider = (data) => {
  const hash = crypto.createHash('md5');
  hash.update(data);
  return hash.digest('hex');
};

/**
 * Builds the archive trailer for `data`: the hex digest followed by a NUL.
 */
export function trailerFor(data: Uint8Array, digest: DigestProvider = md5Hex): Buffer {
  const hex = digest(data);
  if (hex.length !== DIGEST_LENGTH) {
    throw new RangeError(`Digest must be ${DIGEST_LENGTH} characters, got ${hex.length}`);
  }
  return Buffer.from(hex + '\0', 'latin1');
}
