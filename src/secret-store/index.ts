/**
 * SecretStore - Versioned, opaque secret held as four ciphertext chunks
 *
 * The store never reads cleartext. Ingestion and grants go through the
 * confidential-compute collaborator; the store only keeps the current
 * handles and the version counter.
 */

import {
  RecoveryError,
  RecoveryErrorCode,
  SECRET_CHUNK_COUNT,
  ZERO_HANDLE,
  isZeroIdentity,
  type ChunkHandle,
  type Identity,
  type SecretChunks,
} from '../types.js';
import type { ConfidentialCompute } from './types.js';

const EMPTY_SECRET: SecretChunks = [ZERO_HANDLE, ZERO_HANDLE, ZERO_HANDLE, ZERO_HANDLE];

export class SecretStore {
  private chunks: SecretChunks = EMPTY_SECRET;
  private currentVersion = 0;

  /**
   * @param compute - Confidential-compute backend
   * @param identity - The store's own identity; inputs are certified for it
   *   and it keeps standing access to every chunk it stores
   */
  constructor(
    private readonly compute: ConfidentialCompute,
    readonly identity: Identity
  ) {
    if (isZeroIdentity(identity)) {
      throw new RecoveryError('Store identity cannot be zero', RecoveryErrorCode.ZERO_IDENTITY);
    }
  }

  /**
   * Ingest four certified chunks and bump the version
   *
   * All chunks are materialized before local state changes, so a rejected
   * proof leaves the current secret and version untouched.
   *
   * @param handles - Client-side ciphertext handles
   * @param proofs - One proof per handle
   * @param submitter - Identity that produced the inputs
   * @returns The new version
   * @throws {RecoveryError} INVALID_PROOF_COUNT or INVALID_CERTIFIED_INPUT
   */
  ingest(
    handles: readonly ChunkHandle[],
    proofs: readonly string[],
    submitter: Identity
  ): number {
    if (proofs.length !== SECRET_CHUNK_COUNT || handles.length !== SECRET_CHUNK_COUNT) {
      throw new RecoveryError(
        `Expected ${SECRET_CHUNK_COUNT} chunks and ${SECRET_CHUNK_COUNT} proofs`,
        RecoveryErrorCode.INVALID_PROOF_COUNT,
        { chunks: handles.length, proofs: proofs.length }
      );
    }

    const stored = toSecretChunks(
      handles.map((handle, i) => this.materialize(handle, proofs[i] ?? '', submitter, i))
    );

    try {
      this.compute.grantAll(stored, this.identity);
    } catch (error) {
      throw new RecoveryError(
        'Backend refused store access to the ingested chunks',
        RecoveryErrorCode.INVALID_CERTIFIED_INPUT,
        { reason: error instanceof Error ? error.message : String(error) },
        { cause: error }
      );
    }

    this.chunks = stored;
    this.currentVersion += 1;

    return this.currentVersion;
  }

  /**
   * Grant an identity standing read access to all four current chunks,
   * all at once or not at all
   *
   * @throws {RecoveryError} ZERO_IDENTITY or NO_SECRET_STORED
   */
  grantAccess(identity: Identity): void {
    if (isZeroIdentity(identity)) {
      throw new RecoveryError(
        'Cannot grant access to the zero identity',
        RecoveryErrorCode.ZERO_IDENTITY
      );
    }

    if (this.currentVersion === 0) {
      throw new RecoveryError(
        'No secret has been stored yet',
        RecoveryErrorCode.NO_SECRET_STORED
      );
    }

    this.compute.grantAll(this.chunks, identity);
  }

  private materialize(
    handle: ChunkHandle,
    proof: string,
    submitter: Identity,
    position: number
  ): ChunkHandle {
    try {
      return this.compute.ingest(
        { handle, proof },
        { target: this.identity, sender: submitter }
      );
    } catch (error) {
      throw new RecoveryError(
        `Certified input rejected for chunk ${position}`,
        RecoveryErrorCode.INVALID_CERTIFIED_INPUT,
        { chunk: position, reason: error instanceof Error ? error.message : String(error) },
        { cause: error }
      );
    }
  }

  currentSecret(): SecretChunks {
    return this.chunks;
  }

  get version(): number {
    return this.currentVersion;
  }
}

function toSecretChunks(handles: ChunkHandle[]): SecretChunks {
  const [c0, c1, c2, c3] = handles;
  if (c0 === undefined || c1 === undefined || c2 === undefined || c3 === undefined) {
    throw new Error(`Expected ${SECRET_CHUNK_COUNT} stored chunks`);
  }
  return [c0, c1, c2, c3];
}

export * from './types.js';
export { InMemoryConfidentialCompute } from './memory-compute.js';
export type { InMemoryComputeOptions } from './memory-compute.js';
export { splitSecret, joinSecret } from './chunks.js';
