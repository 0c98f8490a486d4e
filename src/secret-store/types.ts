/**
 * Types for the Secret Store and its confidential-compute collaborator
 */

import type { ChunkHandle, Identity } from '../types.js';

// =============================================================================
// Confidential Compute Collaborator
// =============================================================================

/**
 * Ciphertext produced client-side together with a proof that it was
 * encrypted for a given target and sender
 */
export interface CertifiedInput {
  /** Handle of the submitted ciphertext */
  handle: ChunkHandle;

  /** Proof binding the handle to target and sender (hex-encoded) */
  proof: string;
}

/**
 * Who the certified input is being ingested for
 */
export interface IngestContext {
  /** Identity of the store ingesting the input */
  target: Identity;

  /** Identity that produced and submitted the input */
  sender: Identity;
}

/**
 * Pluggable confidential-compute backend. The core never sees cleartext;
 * it only moves handles and grants.
 *
 * Implementations must not call back into the vault.
 */
export interface ConfidentialCompute {
  /**
   * Validate a certified input and materialize it as a stored chunk
   *
   * @throws if the proof does not verify
   */
  ingest(input: CertifiedInput, context: IngestContext): ChunkHandle;

  /**
   * Grant an identity standing read access to every listed chunk.
   * Either all grants take effect or none do.
   *
   * @throws if any handle cannot be granted
   */
  grantAll(handles: readonly ChunkHandle[], identity: Identity): void;
}

/**
 * Client-side helper producing certified inputs for a backend
 */
export interface InputEncryptor {
  encryptInput(target: Identity, sender: Identity, value: bigint): CertifiedInput;
}

// =============================================================================
// Backend Errors
// =============================================================================

export type ConfidentialComputeFailure =
  | 'INVALID_PROOF'
  | 'UNKNOWN_HANDLE'
  | 'ACCESS_DENIED'
  | 'INVALID_VALUE';

/**
 * Error thrown by the in-memory confidential-compute backend
 */
export class ConfidentialComputeError extends Error {
  constructor(
    message: string,
    public readonly reason: ConfidentialComputeFailure,
    public readonly handle?: ChunkHandle
  ) {
    super(message);
    this.name = 'ConfidentialComputeError';
  }
}
