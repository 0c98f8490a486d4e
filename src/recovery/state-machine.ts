/**
 * Recovery Request State Machine
 *
 * Holds the single current request and enforces:
 * EMPTY → PENDING → EXECUTED, with `propose` replacing any current request
 * by a fresh PENDING one and `reset` returning to EMPTY.
 *
 * Ids come from a counter that survives resets, so a superseded id is
 * never reused.
 */

import type { GuardianRegistry } from '../guardians/index.js';
import {
  RecoveryError,
  RecoveryErrorCode,
  isZeroIdentity,
  type Identity,
} from '../types.js';
import { ApprovalBitmap } from './bitmap.js';
import {
  RecoveryPhase,
  type ApprovalResult,
  type ProposalResult,
  type RecoveryRequest,
  type RecoveryState,
  type RecoveryStatus,
} from './types.js';

const EMPTY_STATE: RecoveryState = { phase: RecoveryPhase.EMPTY };

export class RecoveryRequestMachine {
  private state: RecoveryState = EMPTY_STATE;
  private lastId = 0;

  constructor(private readonly registry: GuardianRegistry) {}

  /**
   * Propose a new recovery identity, replacing the current request
   *
   * @param by - Proposing guardian
   * @param identity - Identity to be granted access once approved
   * @throws {RecoveryError} NOT_A_GUARDIAN, ZERO_IDENTITY or DUPLICATE_PROPOSAL
   */
  propose(by: Identity, identity: Identity): ProposalResult {
    this.requireGuardian(by);

    if (isZeroIdentity(identity)) {
      throw new RecoveryError(
        'Proposed identity cannot be zero',
        RecoveryErrorCode.ZERO_IDENTITY
      );
    }

    const current = this.state;
    if (
      current.phase === RecoveryPhase.PENDING &&
      current.request.proposedIdentity === identity
    ) {
      throw new RecoveryError(
        `Request ${current.request.id} for ${identity} is already pending`,
        RecoveryErrorCode.DUPLICATE_PROPOSAL,
        { id: current.request.id }
      );
    }

    const cancelled = current.phase === RecoveryPhase.PENDING ? current.request : null;

    const request: RecoveryRequest = {
      id: this.lastId + 1,
      proposedIdentity: identity,
      proposedBy: by,
      approvals: ApprovalBitmap.empty(),
      approvalCount: 0,
      createdAt: new Date(),
    };

    this.lastId = request.id;
    this.state = { phase: RecoveryPhase.PENDING, request };

    return { id: request.id, cancelled };
  }

  /**
   * Record a guardian's approval of the current request
   *
   * `justExecuted` is true exactly once per request: on the approval that
   * brings the count to the threshold. The caller must issue the access
   * grant in the same unit of work.
   *
   * @throws {RecoveryError} NOT_A_GUARDIAN, NO_ACTIVE_REQUEST,
   *   STALE_OR_UNKNOWN_REQUEST, ALREADY_EXECUTED or ALREADY_APPROVED
   */
  approve(by: Identity, id: number): ApprovalResult {
    const index = this.requireGuardian(by);
    const current = this.state;

    if (current.phase === RecoveryPhase.EMPTY) {
      throw new RecoveryError(
        'There is no active recovery request',
        RecoveryErrorCode.NO_ACTIVE_REQUEST,
        { id }
      );
    }

    if (current.request.id !== id) {
      throw new RecoveryError(
        `Request ${id} is not the current request (${current.request.id})`,
        RecoveryErrorCode.STALE_OR_UNKNOWN_REQUEST,
        { id, currentId: current.request.id }
      );
    }

    if (current.phase === RecoveryPhase.EXECUTED) {
      throw new RecoveryError(
        `Request ${id} has already been executed`,
        RecoveryErrorCode.ALREADY_EXECUTED,
        { id }
      );
    }

    if (current.request.approvals.has(index)) {
      throw new RecoveryError(
        `${by} has already approved request ${id}`,
        RecoveryErrorCode.ALREADY_APPROVED,
        { id, guardian: by }
      );
    }

    const approvals = current.request.approvals.with(index);
    const approvalCount = current.request.approvalCount + 1;
    const justExecuted = approvalCount === this.registry.threshold;

    const request: RecoveryRequest = {
      ...current.request,
      approvals,
      approvalCount,
      ...(justExecuted && { executedAt: new Date() }),
    };

    this.state = justExecuted
      ? { phase: RecoveryPhase.EXECUTED, request }
      : { phase: RecoveryPhase.PENDING, request };

    return { approvalCount, justExecuted, request };
  }

  /**
   * Return to EMPTY. Idempotent.
   *
   * @returns The discarded request, if there was one
   */
  reset(): RecoveryRequest | null {
    const previous = this.state;
    this.state = EMPTY_STATE;
    return previous.phase === RecoveryPhase.EMPTY ? null : previous.request;
  }

  /**
   * Put back a state obtained from `getState()`, undoing a transition whose
   * side effect failed. The id counter is left alone.
   */
  restore(state: RecoveryState): void {
    this.state = state;
  }

  getState(): RecoveryState {
    return this.state;
  }

  hasApproved(guardian: Identity): boolean {
    const index = this.registry.indexOf(guardian);
    if (index === null || this.state.phase === RecoveryPhase.EMPTY) {
      return false;
    }
    return this.state.request.approvals.has(index);
  }

  status(): RecoveryStatus {
    const state = this.state;
    if (state.phase === RecoveryPhase.EMPTY) {
      return {
        phase: state.phase,
        id: 0,
        proposedIdentity: null,
        approvalCount: 0,
        executed: false,
        createdAt: null,
      };
    }

    return {
      phase: state.phase,
      id: state.request.id,
      proposedIdentity: state.request.proposedIdentity,
      approvalCount: state.request.approvalCount,
      executed: state.phase === RecoveryPhase.EXECUTED,
      createdAt: state.request.createdAt,
    };
  }

  /** Highest id issued so far (0 before the first proposal) */
  get lastIssuedId(): number {
    return this.lastId;
  }

  private requireGuardian(identity: Identity): number {
    const index = this.registry.indexOf(identity);
    if (index === null) {
      throw new RecoveryError(
        `${identity} is not a guardian`,
        RecoveryErrorCode.NOT_A_GUARDIAN,
        { identity }
      );
    }
    return index;
  }
}

/**
 * Get human-readable description of a phase
 */
export function getPhaseDescription(phase: RecoveryPhase): string {
  switch (phase) {
    case RecoveryPhase.EMPTY:
      return 'No recovery request';
    case RecoveryPhase.PENDING:
      return 'Collecting guardian approvals';
    case RecoveryPhase.EXECUTED:
      return 'Threshold reached, access granted';
    default:
      return 'Unknown phase';
  }
}
