/**
 * In-memory confidential-compute backend
 *
 * Stands in for a confidential-compute network during development and
 * testing. Chunks are 64-bit unsigned values encrypted with AES-256-GCM
 * under a backend-held key; certified inputs carry an HMAC-SHA256 proof
 * binding the handle to its target and sender; read access is tracked in
 * a per-handle ACL.
 *
 * @example
 * ```typescript
 * const compute = new InMemoryConfidentialCompute();
 * const input = compute.encryptInput(storeId, owner, 42n);
 * const handle = compute.ingest(input, { target: storeId, sender: owner });
 * compute.grantAll([handle], recovery);
 * compute.userDecrypt(handle, recovery); // 42n
 * ```
 */

import { gcm } from '@noble/ciphers/aes';
import { equalBytes } from '@noble/ciphers/utils';
import { randomBytes } from '@noble/ciphers/webcrypto';
import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, hexToBytes, utf8ToBytes } from '@noble/hashes/utils';
import type { ChunkHandle, Identity } from '../types.js';
import {
  ConfidentialComputeError,
  type CertifiedInput,
  type ConfidentialCompute,
  type IngestContext,
  type InputEncryptor,
} from './types.js';

// =============================================================================
// Constants
// =============================================================================

const KEY_LENGTH = 32; // AES-256
const NONCE_LENGTH = 12; // 96 bits (recommended for GCM)
const HANDLE_LENGTH = 32;
const UINT64_MAX = (1n << 64n) - 1n;

interface SealedValue {
  nonce: Uint8Array;
  ciphertext: Uint8Array;
}

export interface InMemoryComputeOptions {
  /** AES-256 key sealing every ciphertext (random when omitted) */
  networkKey?: Uint8Array;

  /** HMAC key certifying inputs (random when omitted) */
  proofKey?: Uint8Array;
}

// =============================================================================
// Backend
// =============================================================================

export class InMemoryConfidentialCompute implements ConfidentialCompute, InputEncryptor {
  private readonly networkKey: Uint8Array;
  private readonly proofKey: Uint8Array;

  /** Client-submitted ciphertexts, not yet materialized */
  private readonly inputs = new Map<ChunkHandle, SealedValue>();

  /** Materialized chunks */
  private readonly chunks = new Map<ChunkHandle, SealedValue>();

  private readonly acl = new Map<ChunkHandle, Set<Identity>>();

  constructor(options: InMemoryComputeOptions = {}) {
    this.networkKey = options.networkKey ?? randomBytes(KEY_LENGTH);
    this.proofKey = options.proofKey ?? randomBytes(KEY_LENGTH);

    if (this.networkKey.length !== KEY_LENGTH) {
      throw new Error(`Network key must be ${KEY_LENGTH} bytes`);
    }
  }

  /**
   * Encrypt a 64-bit value for a target, as the client would before
   * submitting it
   */
  encryptInput(target: Identity, sender: Identity, value: bigint): CertifiedInput {
    const handle = newHandle();
    this.inputs.set(handle, this.seal(value));

    return { handle, proof: this.prove(handle, target, sender) };
  }

  ingest(input: CertifiedInput, context: IngestContext): ChunkHandle {
    const sealed = this.inputs.get(input.handle);
    if (!sealed) {
      throw new ConfidentialComputeError(
        `Unknown input handle: ${input.handle}`,
        'UNKNOWN_HANDLE',
        input.handle
      );
    }

    const expected = hexToBytes(this.prove(input.handle, context.target, context.sender).slice(2));
    if (!equalBytes(expected, decodeHex(input.proof))) {
      throw new ConfidentialComputeError(
        `Input proof does not verify for ${context.sender} → ${context.target}`,
        'INVALID_PROOF',
        input.handle
      );
    }

    // Re-seal under a fresh nonce so the stored chunk is unlinkable to the input
    const handle = newHandle();
    this.chunks.set(handle, this.seal(this.unseal(sealed)));
    this.acl.set(handle, new Set());

    return handle;
  }

  grant(handle: ChunkHandle, identity: Identity): void {
    this.grantAll([handle], identity);
  }

  grantAll(handles: readonly ChunkHandle[], identity: Identity): void {
    // Resolve every ACL first so an unknown handle leaves all of them untouched
    const targets = handles.map((handle) => {
      const allowed = this.acl.get(handle);
      if (!allowed) {
        throw new ConfidentialComputeError(
          `Unknown chunk handle: ${handle}`,
          'UNKNOWN_HANDLE',
          handle
        );
      }
      return allowed;
    });

    for (const allowed of targets) {
      allowed.add(identity);
    }
  }

  isAllowed(handle: ChunkHandle, identity: Identity): boolean {
    return this.acl.get(handle)?.has(identity) ?? false;
  }

  /**
   * Decrypt a stored chunk on behalf of an identity holding read access
   *
   * @throws {ConfidentialComputeError} ACCESS_DENIED without a grant
   */
  userDecrypt(handle: ChunkHandle, identity: Identity): bigint {
    const sealed = this.chunks.get(handle);
    if (!sealed) {
      throw new ConfidentialComputeError(
        `Unknown chunk handle: ${handle}`,
        'UNKNOWN_HANDLE',
        handle
      );
    }

    if (!this.isAllowed(handle, identity)) {
      throw new ConfidentialComputeError(
        `${identity} is not allowed to decrypt ${handle}`,
        'ACCESS_DENIED',
        handle
      );
    }

    return this.unseal(sealed);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private seal(value: bigint): SealedValue {
    if (value < 0n || value > UINT64_MAX) {
      throw new ConfidentialComputeError(
        'Value must be an unsigned 64-bit integer',
        'INVALID_VALUE'
      );
    }

    const plaintext = new Uint8Array(8);
    new DataView(plaintext.buffer).setBigUint64(0, value, false);

    const nonce = randomBytes(NONCE_LENGTH);
    const ciphertext = gcm(this.networkKey, nonce).encrypt(plaintext);
    return { nonce, ciphertext };
  }

  private unseal(sealed: SealedValue): bigint {
    const plaintext = gcm(this.networkKey, sealed.nonce).decrypt(sealed.ciphertext);
    return new DataView(plaintext.buffer, plaintext.byteOffset, plaintext.byteLength)
      .getBigUint64(0, false);
  }

  private prove(handle: ChunkHandle, target: Identity, sender: Identity): string {
    const message = utf8ToBytes(`${handle}|${target}|${sender}`);
    return '0x' + bytesToHex(hmac(sha256, this.proofKey, message));
  }
}

// =============================================================================
// Helpers
// =============================================================================

function newHandle(): ChunkHandle {
  return '0x' + bytesToHex(randomBytes(HANDLE_LENGTH));
}

/**
 * Decode a 0x-prefixed proof, returning an empty array for malformed input
 * so that it fails comparison
 */
function decodeHex(value: string): Uint8Array {
  const hex = value.startsWith('0x') ? value.slice(2) : value;
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    return new Uint8Array(0);
  }
  return hexToBytes(hex);
}
