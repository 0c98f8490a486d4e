/**
 * Types for the Recovery Request state machine
 *
 * A single "current request" slot, modelled as a tagged union so that an
 * executed request without an id (or an empty slot with approvals) cannot
 * be represented.
 */

import type { Identity } from '../types.js';
import type { ApprovalBitmap } from './bitmap.js';

/**
 * Phases of the current request slot
 */
export enum RecoveryPhase {
  /** No request (id 0) */
  EMPTY = 'EMPTY',
  /** Collecting guardian approvals */
  PENDING = 'PENDING',
  /** Threshold reached, access granted */
  EXECUTED = 'EXECUTED',
}

/**
 * A recovery request naming a candidate identity
 */
export interface RecoveryRequest {
  /** Monotonic request id (first request is 1) */
  readonly id: number;

  /** Identity to be granted read access once approved */
  readonly proposedIdentity: Identity;

  /** Guardian who proposed the request */
  readonly proposedBy: Identity;

  /** Guardians that approved, by 0-based guardian index */
  readonly approvals: ApprovalBitmap;

  /** Cardinality of `approvals` */
  readonly approvalCount: number;

  /** Creation timestamp (informational) */
  readonly createdAt: Date;

  /** When the threshold was reached */
  readonly executedAt?: Date;
}

export type RecoveryState =
  | { readonly phase: RecoveryPhase.EMPTY }
  | { readonly phase: RecoveryPhase.PENDING; readonly request: RecoveryRequest }
  | { readonly phase: RecoveryPhase.EXECUTED; readonly request: RecoveryRequest };

/**
 * Snapshot returned by status queries
 */
export interface RecoveryStatus {
  phase: RecoveryPhase;
  /** 0 when the slot is empty */
  id: number;
  proposedIdentity: Identity | null;
  approvalCount: number;
  executed: boolean;
  createdAt: Date | null;
}

export interface ProposalResult {
  /** Id of the new pending request */
  id: number;

  /** Pending request implicitly cancelled by this proposal, if any */
  cancelled: RecoveryRequest | null;
}

export interface ApprovalResult {
  approvalCount: number;

  /** True only on the approval that reached the threshold */
  justExecuted: boolean;

  /** The request after this approval */
  request: RecoveryRequest;
}
