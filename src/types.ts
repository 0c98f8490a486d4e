/**
 * Shared types for the guardian recovery vault
 *
 * Identities, opaque chunk handles and the error taxonomy used by every
 * component.
 */

// =============================================================================
// Identities & Handles
// =============================================================================

/**
 * An authenticated principal (owner, guardian, grantee, or the store itself)
 */
export type Identity = string;

/**
 * Opaque reference to a ciphertext held by the confidential-compute backend
 */
export type ChunkHandle = string;

/**
 * The null identity
 */
export const ZERO_IDENTITY: Identity = '0x' + '0'.repeat(40);

/**
 * Handle reported for chunks that have never been stored
 */
export const ZERO_HANDLE: ChunkHandle = '0x' + '0'.repeat(64);

/**
 * Number of 64-bit chunks composing a 256-bit secret
 */
export const SECRET_CHUNK_COUNT = 4;

/**
 * Upper bound on the guardian committee (bitmap width)
 */
export const MAX_GUARDIANS = 256;

/**
 * The four chunk handles of a secret, big-endian chunk order
 */
export type SecretChunks = readonly [ChunkHandle, ChunkHandle, ChunkHandle, ChunkHandle];

/**
 * Check whether an identity is absent or the null identity
 */
export function isZeroIdentity(identity: Identity | null | undefined): boolean {
  if (identity === null || identity === undefined) {
    return true;
  }
  const trimmed = identity.trim();
  return trimmed.length === 0 || /^0x0*$/i.test(trimmed);
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Recovery error codes
 */
export enum RecoveryErrorCode {
  // Configuration (construction only)
  INVALID_GUARDIAN_SET = 'INVALID_GUARDIAN_SET',
  TOO_MANY_GUARDIANS = 'TOO_MANY_GUARDIANS',
  INVALID_THRESHOLD = 'INVALID_THRESHOLD',

  // Authorization
  NOT_A_GUARDIAN = 'NOT_A_GUARDIAN',
  NOT_OWNER = 'NOT_OWNER',

  // Input validation
  ZERO_IDENTITY = 'ZERO_IDENTITY',
  INVALID_PROOF_COUNT = 'INVALID_PROOF_COUNT',
  INVALID_CERTIFIED_INPUT = 'INVALID_CERTIFIED_INPUT',
  DUPLICATE_PROPOSAL = 'DUPLICATE_PROPOSAL',

  // State consistency
  NO_ACTIVE_REQUEST = 'NO_ACTIVE_REQUEST',
  STALE_OR_UNKNOWN_REQUEST = 'STALE_OR_UNKNOWN_REQUEST',
  ALREADY_EXECUTED = 'ALREADY_EXECUTED',
  ALREADY_APPROVED = 'ALREADY_APPROVED',
  NO_SECRET_STORED = 'NO_SECRET_STORED',
}

/**
 * Error raised by every vault operation. The operation that throws it has
 * left all state unchanged.
 */
export class RecoveryError extends Error {
  constructor(
    message: string,
    public readonly code: RecoveryErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RecoveryError';
  }
}
