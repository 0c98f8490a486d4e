/**
 * Audit trail with hash chaining
 *
 * Every entry carries the SHA-256 of its own content and the hash of the
 * entry before it; editing or dropping any entry breaks the chain.
 */

import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import type { Identity } from '../types.js';
import {
  AuditEventType,
  type AuditEntry,
  type AuditVerification,
} from './types.js';

const GENESIS_HASH = '0'.repeat(64);

export class AuditTrail {
  private entries: AuditEntry[] = [];

  /**
   * Append an event to the trail
   */
  record(
    eventType: AuditEventType,
    actor: Identity,
    data: Record<string, unknown> = {}
  ): AuditEntry {
    const sequence = this.entries.length;
    const previousHash = this.entries[sequence - 1]?.hash ?? GENESIS_HASH;

    const entry: Omit<AuditEntry, 'hash'> = {
      sequence,
      eventType,
      actor,
      timestamp: new Date(),
      data: deepFreeze(structuredClone(data)),
      previousHash,
    };

    // Entries are handed out by reference and must stay as hashed
    const fullEntry: AuditEntry = Object.freeze({ ...entry, hash: computeEntryHash(entry) });
    this.entries.push(fullEntry);

    return fullEntry;
  }

  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  getEntriesByEvent(eventType: AuditEventType): AuditEntry[] {
    return this.entries.filter((e) => e.eventType === eventType);
  }

  getEntriesByActor(actor: Identity): AuditEntry[] {
    return this.entries.filter((e) => e.actor === actor);
  }

  get length(): number {
    return this.entries.length;
  }

  verify(): AuditVerification {
    return verifyAuditEntries(this.entries);
  }
}

/**
 * Verify integrity of an audit hash chain
 */
export function verifyAuditEntries(entries: readonly AuditEntry[]): AuditVerification {
  let previousHash = GENESIS_HASH;

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    if (
      entry === undefined ||
      entry.sequence !== i ||
      entry.previousHash !== previousHash ||
      computeEntryHash(entry) !== entry.hash
    ) {
      return { valid: false, totalEntries: entries.length, firstInvalid: i };
    }
    previousHash = entry.hash;
  }

  return { valid: true, totalEntries: entries.length, firstInvalid: null };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function computeEntryHash(entry: Omit<AuditEntry, 'hash'>): string {
  const entryJson = JSON.stringify({
    sequence: entry.sequence,
    eventType: entry.eventType,
    actor: entry.actor,
    timestamp: entry.timestamp.toISOString(),
    data: entry.data,
    previousHash: entry.previousHash,
  });
  return bytesToHex(sha256(utf8ToBytes(entryJson)));
}

export { AuditEventType };
export type { AuditEntry, AuditVerification };
