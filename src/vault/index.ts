/**
 * AccessController - Guardian social recovery over a versioned secret
 *
 * Orchestrates:
 * - Owner ingestion and rotation of the secret
 * - Guardian proposals and approvals
 * - The access grant issued when a request reaches the threshold
 * - The audit trail of every committed operation
 *
 * Every operation runs synchronously to completion and either commits all
 * of its effects or throws with state unchanged.
 *
 * @example
 * ```typescript
 * const compute = new InMemoryConfidentialCompute();
 * const vault = new AccessController({
 *   guardians: [g1, g2, g3],
 *   threshold: 2,
 *   owner: new FixedOwner(owner),
 *   compute,
 *   identity: vaultId,
 * });
 *
 * vault.storeSecret(owner, handles, proofs);   // version 1
 * const id = vault.proposeRecovery(g1, recovery);
 * vault.approveRecovery(g1, id);
 * vault.approveRecovery(g2, id);              // recovery can now decrypt
 * ```
 */

import { AuditTrail, AuditEventType } from '../audit/index.js';
import { GuardianRegistry } from '../guardians/index.js';
import { RecoveryRequestMachine } from '../recovery/state-machine.js';
import type { ApprovalResult, RecoveryRequest, RecoveryStatus } from '../recovery/types.js';
import { SecretStore } from '../secret-store/index.js';
import type { ConfidentialCompute } from '../secret-store/types.js';
import type { ChunkHandle, Identity, SecretChunks } from '../types.js';
import { assertOwner, type OwnerAuthority } from './authority.js';

export interface AccessControllerConfig {
  /** Ordered guardian committee (1..256 distinct identities) */
  guardians: readonly Identity[];

  /** Approvals required to execute a recovery request */
  threshold: number;

  /** Who may store, rotate and grant directly */
  owner: OwnerAuthority;

  /** Confidential-compute backend holding the ciphertext */
  compute: ConfidentialCompute;

  /** The vault's own identity, as seen by the backend */
  identity: Identity;

  /** Audit trail to append to (a fresh one when omitted) */
  audit?: AuditTrail;
}

export class AccessController {
  private readonly registry: GuardianRegistry;
  private readonly machine: RecoveryRequestMachine;
  private readonly store: SecretStore;
  private readonly owner: OwnerAuthority;
  private readonly audit: AuditTrail;

  constructor(config: AccessControllerConfig) {
    this.registry = new GuardianRegistry(config.guardians, config.threshold);
    this.machine = new RecoveryRequestMachine(this.registry);
    this.store = new SecretStore(config.compute, config.identity);
    this.owner = config.owner;
    this.audit = config.audit ?? new AuditTrail();
  }

  // ===========================================================================
  // Owner Operations
  // ===========================================================================

  /**
   * Store (or overwrite) the secret. Leaves the recovery request alone.
   *
   * @returns The new secret version
   */
  storeSecret(
    caller: Identity,
    handles: readonly ChunkHandle[],
    proofs: readonly string[]
  ): number {
    assertOwner(this.owner, caller, 'storeSecret');

    const version = this.store.ingest(handles, proofs, caller);

    this.audit.record(AuditEventType.SECRET_STORED, caller, { version });
    return version;
  }

  /**
   * Replace the secret and discard any recovery request, pending or
   * executed. Recovery after a rotation always starts from scratch.
   *
   * @returns The new secret version
   */
  rotateSecret(
    caller: Identity,
    handles: readonly ChunkHandle[],
    proofs: readonly string[]
  ): number {
    assertOwner(this.owner, caller, 'rotateSecret');

    const version = this.store.ingest(handles, proofs, caller);
    const discarded = this.machine.reset();

    this.audit.record(AuditEventType.SECRET_ROTATED, caller, { version });
    if (discarded) {
      this.recordReset(caller, discarded, 'rotated');
    }
    return version;
  }

  /**
   * Grant an identity read access to the current chunks, bypassing the
   * guardians
   */
  grantDecryptionRights(caller: Identity, identity: Identity): void {
    assertOwner(this.owner, caller, 'grantDecryptionRights');

    this.store.grantAccess(identity);

    this.audit.record(AuditEventType.ACCESS_GRANTED, caller, {
      grantee: identity,
      version: this.store.version,
      via: 'owner',
    });
  }

  // ===========================================================================
  // Guardian Operations
  // ===========================================================================

  /**
   * Propose a recovery identity
   *
   * @returns The new request id
   */
  proposeRecovery(caller: Identity, identity: Identity): number {
    const { id, cancelled } = this.machine.propose(caller, identity);

    if (cancelled) {
      this.recordReset(caller, cancelled, 'superseded');
    }
    this.audit.record(AuditEventType.RECOVERY_PROPOSED, caller, {
      id,
      proposedIdentity: identity,
    });
    return id;
  }

  /**
   * Approve the current request. The approval that reaches the threshold
   * also grants the proposed identity access to the current secret; if that
   * grant fails, the approval is rolled back.
   */
  approveRecovery(caller: Identity, id: number): ApprovalResult {
    const before = this.machine.getState();
    const result = this.machine.approve(caller, id);

    if (result.justExecuted) {
      try {
        this.store.grantAccess(result.request.proposedIdentity);
      } catch (error) {
        this.machine.restore(before);
        throw error;
      }
    }

    this.audit.record(AuditEventType.APPROVAL_RECORDED, caller, {
      id,
      approvalCount: result.approvalCount,
    });
    if (result.justExecuted) {
      this.audit.record(AuditEventType.ACCESS_GRANTED, caller, {
        id,
        grantee: result.request.proposedIdentity,
        version: this.store.version,
        via: 'guardians',
      });
    }
    return result;
  }

  // ===========================================================================
  // Views
  // ===========================================================================

  getSecret(): SecretChunks {
    return this.store.currentSecret();
  }

  get secretVersion(): number {
    return this.store.version;
  }

  get threshold(): number {
    return this.registry.threshold;
  }

  get identity(): Identity {
    return this.store.identity;
  }

  getGuardians(): Identity[] {
    return this.registry.getGuardians();
  }

  isGuardian(identity: Identity): boolean {
    return this.registry.isGuardian(identity);
  }

  hasApproved(guardian: Identity): boolean {
    return this.machine.hasApproved(guardian);
  }

  status(): RecoveryStatus {
    return this.machine.status();
  }

  getAuditTrail(): AuditTrail {
    return this.audit;
  }

  private recordReset(
    caller: Identity,
    request: RecoveryRequest,
    reason: 'superseded' | 'rotated'
  ): void {
    this.audit.record(AuditEventType.RECOVERY_RESET, caller, {
      id: request.id,
      proposedIdentity: request.proposedIdentity,
      reason,
    });
  }
}

export { FixedOwner, assertOwner } from './authority.js';
export type { OwnerAuthority } from './authority.js';
