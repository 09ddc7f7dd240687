import { SHADER_CRYPTO_KEY } from './shader-constants.js';

/**
 * A cipher that transforms fixed-size blocks of a buffer in place.
 */
export interface BlockScheme {
  readonly blockSize: number;
  encryptBlock(data: Buffer, offset: number): void;
  decryptBlock(data: Buffer, offset: number): void;
}

export type TeaKey = readonly [number, number, number, number];

const TEA_DELTA = 0x9E3779B9;
const TEA_ROUNDS = 32;

/**
 * Tiny Encryption Algorithm over 8-byte blocks, both words read little-endian.
 * See https://en.wikipedia.org/wiki/Tiny_Encryption_Algorithm
 */
export class Tea implements BlockScheme {
  readonly blockSize = 8;
  private readonly key: TeaKey;

  constructor(key: TeaKey) {
    this.key = [key[0] >>> 0, key[1] >>> 0, key[2] >>> 0, key[3] >>> 0];
  }

  encryptBlock(data: Buffer, offset: number): void {
    let v0 = data.readUInt32LE(offset);
    let v1 = data.readUInt32LE(offset + 4);
    const [k0, k1, k2, k3] = this.key;

    let sum = 0;
    for (let i = 0; i < TEA_ROUNDS; i++) {
      sum = (sum + TEA_DELTA) >>> 0;
      v0 = (v0 + (((v1 << 4) + k0) ^ (v1 + sum) ^ ((v1 >>> 5) + k1))) >>> 0;
      v1 = (v1 + (((v0 << 4) + k2) ^ (v0 + sum) ^ ((v0 >>> 5) + k3))) >>> 0;
    }

    data.writeUInt32LE(v0, offset);
    data.writeUInt32LE(v1, offset + 4);
  }

  decryptBlock(data: Buffer, offset: number): void {
    let v0 = data.readUInt32LE(offset);
    let v1 = data.readUInt32LE(offset + 4);
    const [k0, k1, k2, k3] = this.key;

    // 0xC6EF3720
    let sum = (TEA_DELTA * TEA_ROUNDS) >>> 0;
    for (let i = 0; i < TEA_ROUNDS; i++) {
      v1 = (v1 - (((v0 << 4) + k2) ^ (v0 + sum) ^ ((v0 >>> 5) + k3))) >>> 0;
      v0 = (v0 - (((v1 << 4) + k0) ^ (v1 + sum) ^ ((v1 >>> 5) + k1))) >>> 0;
      sum = (sum - TEA_DELTA) >>> 0;
    }

    data.writeUInt32LE(v0, offset);
    data.writeUInt32LE(v1, offset + 4);
  }
}

/** The scheme the game uses for its shader archives. */
export const SHADER_TEA = new Tea(SHADER_CRYPTO_KEY);

/**
 * Encrypts `data` in place.
 *
 * Buffers shorter than one block are left untouched. When the length is not a
 * multiple of the block size, the whole blocks are encrypted first and then the
 * block ending at the last byte is encrypted again, covering the tail together
 * with part of an already encrypted block.
 */
export function encryptBuffer(scheme: BlockScheme, data: Buffer): void {
  const { blockSize } = scheme;
  if (data.length < blockSize) {
    return;
  }

  const remainder = data.length % blockSize;
  const end = data.length - remainder;
  for (let offset = 0; offset < end; offset += blockSize) {
    scheme.encryptBlock(data, offset);
  }

  if (remainder !== 0) {
    scheme.encryptBlock(data, data.length - blockSize);
  }
}

/**
 * Decrypts `data` in place, undoing {@link encryptBuffer}.
 *
 * The order is reversed: the block ending at the last byte is decrypted first,
 * and only then the whole blocks from the front. Going front to back first
 * would scramble the overlapping block before its second pass is undone.
 */
export function decryptBuffer(scheme: BlockScheme, data: Buffer): void {
  const { blockSize } = scheme;
  if (data.length < blockSize) {
    return;
  }

  const remainder = data.length % blockSize;
  if (remainder !== 0) {
    scheme.decryptBlock(data, data.length - blockSize);
  }

  const end = data.length - remainder;
  for (let offset = 0; offset < end; offset += blockSize) {
    scheme.decryptBlock(data, offset);
  }
}
