/**
 * Types for the vault audit trail
 */

import type { Identity } from '../types.js';

/**
 * Type of audit event
 */
export enum AuditEventType {
  SECRET_STORED = 'SECRET_STORED',
  SECRET_ROTATED = 'SECRET_ROTATED',
  RECOVERY_PROPOSED = 'RECOVERY_PROPOSED',
  /** A request was discarded by a newer proposal or a rotation */
  RECOVERY_RESET = 'RECOVERY_RESET',
  APPROVAL_RECORDED = 'APPROVAL_RECORDED',
  ACCESS_GRANTED = 'ACCESS_GRANTED',
}

/**
 * An entry in the audit trail
 * Hash-linked for tamper evidence
 */
export interface AuditEntry {
  /** Sequential entry number */
  sequence: number;

  /** Type of event */
  eventType: AuditEventType;

  /** Identity that triggered the event */
  actor: Identity;

  /** Timestamp */
  timestamp: Date;

  /** Event data (JSON-serializable) */
  data: Record<string, unknown>;

  /** Hash of previous entry (for chain integrity) */
  previousHash: string;

  /** Hash of this entry */
  hash: string;
}

export interface AuditVerification {
  valid: boolean;
  totalEntries: number;
  /** Sequence of the first entry that fails verification */
  firstInvalid: number | null;
}
