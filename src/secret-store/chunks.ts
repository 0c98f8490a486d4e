/**
 * Secret chunking
 *
 * A 256-bit secret is carried as four unsigned 64-bit chunks in
 * big-endian order: 0x[ 8B ][ 8B ][ 8B ][ 8B ] → [c0, c1, c2, c3].
 */

import { SECRET_CHUNK_COUNT } from '../types.js';

const CHUNK_HEX_LENGTH = 16; // 8 bytes
const SECRET_HEX_LENGTH = CHUNK_HEX_LENGTH * SECRET_CHUNK_COUNT;
const UINT64_MAX = (1n << 64n) - 1n;

/**
 * Split a hex secret of at most 32 bytes into four 64-bit chunks.
 * Shorter secrets are left-padded with zeros.
 *
 * @example
 * ```typescript
 * splitSecret('0x0123456789abcdef' + 'fedcba9876543210' + ...);
 * // [0x0123456789abcdefn, 0xfedcba9876543210n, ...]
 * ```
 */
export function splitSecret(secretHex: string): bigint[] {
  let hex = secretHex.toLowerCase();
  if (hex.startsWith('0x')) {
    hex = hex.slice(2);
  }

  if (!/^[0-9a-f]*$/.test(hex)) {
    throw new Error('Secret must be hex-encoded');
  }
  if (hex.length > SECRET_HEX_LENGTH) {
    throw new Error('Secret longer than 32 bytes');
  }

  hex = hex.padStart(SECRET_HEX_LENGTH, '0');

  const chunks: bigint[] = [];
  for (let i = 0; i < SECRET_CHUNK_COUNT; i++) {
    const start = i * CHUNK_HEX_LENGTH;
    chunks.push(BigInt('0x' + hex.slice(start, start + CHUNK_HEX_LENGTH)));
  }
  return chunks;
}

/**
 * Reassemble four 64-bit chunks into a 0x-prefixed 32-byte hex secret
 */
export function joinSecret(chunks: readonly bigint[]): string {
  if (chunks.length !== SECRET_CHUNK_COUNT) {
    throw new Error(`Expected ${SECRET_CHUNK_COUNT} chunks, got ${chunks.length}`);
  }

  let hex = '';
  for (const chunk of chunks) {
    if (chunk < 0n || chunk > UINT64_MAX) {
      throw new Error('Chunk must be an unsigned 64-bit integer');
    }
    hex += chunk.toString(16).padStart(CHUNK_HEX_LENGTH, '0');
  }
  return '0x' + hex;
}
