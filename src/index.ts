/**
 * guardian-vault
 * Guardian threshold recovery for versioned, access-controlled secrets
 *
 * An owner stores a 256-bit secret as four opaque ciphertext chunks held
 * by a confidential-compute backend. A fixed committee of guardians can
 * name a recovery identity; once `threshold` distinct guardians approve,
 * that identity is granted read access to the current chunks. Rotating
 * the secret discards any recovery in flight.
 */

// =============================================================================
// Main API
// =============================================================================

export { AccessController, FixedOwner, assertOwner } from './vault/index.js';
export type { AccessControllerConfig, OwnerAuthority } from './vault/index.js';

export {
  RecoveryError,
  RecoveryErrorCode,
  ZERO_IDENTITY,
  ZERO_HANDLE,
  SECRET_CHUNK_COUNT,
  MAX_GUARDIANS,
  isZeroIdentity,
} from './types.js';
export type { Identity, ChunkHandle, SecretChunks } from './types.js';

// =============================================================================
// Components
// =============================================================================

export { GuardianRegistry } from './guardians/index.js';

export {
  RecoveryRequestMachine,
  ApprovalBitmap,
  RecoveryPhase,
  getPhaseDescription,
} from './recovery/index.js';
export type {
  RecoveryRequest,
  RecoveryState,
  RecoveryStatus,
  ProposalResult,
  ApprovalResult,
} from './recovery/index.js';

export {
  SecretStore,
  InMemoryConfidentialCompute,
  ConfidentialComputeError,
  splitSecret,
  joinSecret,
} from './secret-store/index.js';
export type {
  ConfidentialCompute,
  CertifiedInput,
  IngestContext,
  InputEncryptor,
  InMemoryComputeOptions,
  ConfidentialComputeFailure,
} from './secret-store/index.js';

// =============================================================================
// Audit
// =============================================================================

export { AuditTrail, AuditEventType, verifyAuditEntries } from './audit/index.js';
export type { AuditEntry, AuditVerification } from './audit/index.js';

// =============================================================================
// Configuration & Server
// =============================================================================

export {
  VaultConfigSchema,
  ServerConfigSchema,
  AppConfigSchema,
  DEFAULT_THRESHOLD,
  loadConfigFromEnv,
  loadConfigFile,
} from './config/index.js';
export type { VaultConfig, ServerSettings, AppConfig } from './config/index.js';

export { createServer, startServer, createInMemoryVault } from './api/server.js';
export type { ServerConfig } from './api/server.js';
