/**
 * Tests for the Recovery Request state machine
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { GuardianRegistry } from '../guardians/index.js';
import { RecoveryError, RecoveryErrorCode, ZERO_IDENTITY } from '../types.js';
import { ApprovalBitmap } from './bitmap.js';
import { RecoveryRequestMachine, getPhaseDescription } from './state-machine.js';
import { RecoveryPhase } from './types.js';

const G1 = 'guardian-1';
const G2 = 'guardian-2';
const G3 = 'guardian-3';
const RECOVERY = 'recovery';
const RECOVERY_2 = 'recovery-2';

function errorCode(fn: () => unknown): RecoveryErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof RecoveryError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

describe('ApprovalBitmap', () => {
  it('should start empty', () => {
    const bitmap = ApprovalBitmap.empty();

    expect(bitmap.count()).toBe(0);
    expect(bitmap.has(0)).toBe(false);
    expect(bitmap.indices()).toEqual([]);
  });

  it('should set bits without mutating the original', () => {
    const empty = ApprovalBitmap.empty();
    const bitmap = empty.with(0).with(255);

    expect(bitmap.has(0)).toBe(true);
    expect(bitmap.has(255)).toBe(true);
    expect(bitmap.has(1)).toBe(false);
    expect(bitmap.count()).toBe(2);
    expect(bitmap.indices()).toEqual([0, 255]);
    expect(empty.count()).toBe(0);
  });

  it('should count a bit set twice once', () => {
    expect(ApprovalBitmap.empty().with(7).with(7).count()).toBe(1);
  });

  it('should render as 32 bytes of hex', () => {
    expect(ApprovalBitmap.empty().with(0).toHex()).toBe('0x' + '0'.repeat(63) + '1');
  });

  it('should reject indices outside 0..255', () => {
    expect(() => ApprovalBitmap.empty().with(256)).toThrow(RangeError);
    expect(() => ApprovalBitmap.empty().has(-1)).toThrow(RangeError);
  });
});

describe('RecoveryRequestMachine', () => {
  let machine: RecoveryRequestMachine;

  beforeEach(() => {
    machine = new RecoveryRequestMachine(new GuardianRegistry([G1, G2, G3], 2));
  });

  describe('initial state', () => {
    it('should be empty with id 0', () => {
      expect(machine.status()).toEqual({
        phase: RecoveryPhase.EMPTY,
        id: 0,
        proposedIdentity: null,
        approvalCount: 0,
        executed: false,
        createdAt: null,
      });
      expect(machine.lastIssuedId).toBe(0);
    });

    it('should reject approvals with no active request', () => {
      expect(errorCode(() => machine.approve(G1, 1))).toBe(
        RecoveryErrorCode.NO_ACTIVE_REQUEST
      );
    });
  });

  describe('propose', () => {
    it('should create a pending request with id 1', () => {
      const result = machine.propose(G1, RECOVERY);
      const status = machine.status();

      expect(result).toEqual({ id: 1, cancelled: null });
      expect(status.phase).toBe(RecoveryPhase.PENDING);
      expect(status.id).toBe(1);
      expect(status.proposedIdentity).toBe(RECOVERY);
      expect(status.approvalCount).toBe(0);
      expect(status.executed).toBe(false);
    });

    it('should record the proposer', () => {
      machine.propose(G2, RECOVERY);
      const state = machine.getState();

      expect(state.phase).toBe(RecoveryPhase.PENDING);
      if (state.phase === RecoveryPhase.PENDING) {
        expect(state.request.proposedBy).toBe(G2);
      }
    });

    it('should reject non-guardians', () => {
      expect(errorCode(() => machine.propose('mallory', RECOVERY))).toBe(
        RecoveryErrorCode.NOT_A_GUARDIAN
      );
      expect(machine.status().id).toBe(0);
    });

    it('should reject the zero identity', () => {
      expect(errorCode(() => machine.propose(G1, ZERO_IDENTITY))).toBe(
        RecoveryErrorCode.ZERO_IDENTITY
      );
    });

    it('should reject re-proposing the pending identity', () => {
      machine.propose(G1, RECOVERY);

      expect(errorCode(() => machine.propose(G2, RECOVERY))).toBe(
        RecoveryErrorCode.DUPLICATE_PROPOSAL
      );
      expect(machine.status().id).toBe(1);
      expect(machine.lastIssuedId).toBe(1);
    });

    it('should replace a pending request and report it as cancelled', () => {
      machine.propose(G1, RECOVERY);
      const result = machine.propose(G1, RECOVERY_2);

      expect(result.id).toBe(2);
      expect(result.cancelled?.id).toBe(1);
      expect(result.cancelled?.proposedIdentity).toBe(RECOVERY);
      expect(errorCode(() => machine.approve(G1, 1))).toBe(
        RecoveryErrorCode.STALE_OR_UNKNOWN_REQUEST
      );
    });

    it('should allow re-proposing the same identity once executed', () => {
      machine.propose(G1, RECOVERY);
      machine.approve(G1, 1);
      machine.approve(G2, 1);

      const result = machine.propose(G3, RECOVERY);

      expect(result).toEqual({ id: 2, cancelled: null });
      expect(machine.status().phase).toBe(RecoveryPhase.PENDING);
      expect(machine.status().approvalCount).toBe(0);
    });
  });

  describe('approve', () => {
    beforeEach(() => {
      machine.propose(G1, RECOVERY);
    });

    it('should count approvals and execute on reaching the threshold', () => {
      const first = machine.approve(G1, 1);
      expect(first.approvalCount).toBe(1);
      expect(first.justExecuted).toBe(false);
      expect(machine.status().executed).toBe(false);

      const second = machine.approve(G2, 1);
      expect(second.approvalCount).toBe(2);
      expect(second.justExecuted).toBe(true);
      expect(second.request.executedAt).toBeInstanceOf(Date);
      expect(machine.status().phase).toBe(RecoveryPhase.EXECUTED);
      expect(machine.status().executed).toBe(true);
    });

    it('should reject a second approval from the same guardian', () => {
      machine.approve(G1, 1);

      expect(errorCode(() => machine.approve(G1, 1))).toBe(
        RecoveryErrorCode.ALREADY_APPROVED
      );
      expect(machine.status().approvalCount).toBe(1);
    });

    it('should reject approvals after execution', () => {
      machine.approve(G1, 1);
      machine.approve(G2, 1);

      expect(errorCode(() => machine.approve(G3, 1))).toBe(
        RecoveryErrorCode.ALREADY_EXECUTED
      );
      expect(machine.status().approvalCount).toBe(2);
    });

    it('should report an unknown id as stale even after execution', () => {
      machine.approve(G1, 1);
      machine.approve(G2, 1);

      expect(errorCode(() => machine.approve(G3, 5))).toBe(
        RecoveryErrorCode.STALE_OR_UNKNOWN_REQUEST
      );
    });

    it('should check guardianship before request state', () => {
      machine.reset();

      expect(errorCode(() => machine.approve('mallory', 1))).toBe(
        RecoveryErrorCode.NOT_A_GUARDIAN
      );
    });

    it('should keep the approval count equal to the bitmap population', () => {
      const result = machine.approve(G3, 1);

      expect(result.request.approvals.count()).toBe(result.approvalCount);
      expect(result.request.approvals.indices()).toEqual([2]);
    });

    it('should execute exactly on the k-th approval', () => {
      const guardians = ['g1', 'g2', 'g3', 'g4', 'g5'];
      const wide = new RecoveryRequestMachine(new GuardianRegistry(guardians, 3));
      wide.propose('g1', RECOVERY);

      const edges = guardians.slice(0, 3).map((g) => wide.approve(g, 1).justExecuted);

      expect(edges).toEqual([false, false, true]);
      expect(errorCode(() => wide.approve('g4', 1))).toBe(RecoveryErrorCode.ALREADY_EXECUTED);
    });
  });

  describe('hasApproved', () => {
    it('should reflect guardian votes on the current request', () => {
      machine.propose(G1, RECOVERY);
      expect(machine.hasApproved(G1)).toBe(false);

      machine.approve(G1, 1);
      expect(machine.hasApproved(G1)).toBe(true);
      expect(machine.hasApproved(G2)).toBe(false);
    });

    it('should be false for non-guardians and after a new proposal', () => {
      machine.propose(G1, RECOVERY);
      machine.approve(G1, 1);
      expect(machine.hasApproved('mallory')).toBe(false);

      machine.propose(G2, RECOVERY_2);
      expect(machine.hasApproved(G1)).toBe(false);
    });
  });

  describe('reset & restore', () => {
    it('should return to empty and keep issuing fresh ids', () => {
      machine.propose(G1, RECOVERY);

      expect(machine.reset()?.id).toBe(1);
      expect(machine.status().id).toBe(0);
      expect(machine.reset()).toBeNull();

      expect(machine.propose(G1, RECOVERY).id).toBe(2);
    });

    it('should reset executed requests too', () => {
      machine.propose(G1, RECOVERY);
      machine.approve(G1, 1);
      machine.approve(G2, 1);

      machine.reset();

      expect(machine.status().phase).toBe(RecoveryPhase.EMPTY);
      expect(machine.status().executed).toBe(false);
    });

    it('should restore a previous state', () => {
      machine.propose(G1, RECOVERY);
      machine.approve(G1, 1);
      const before = machine.getState();

      machine.approve(G2, 1);
      machine.restore(before);

      expect(machine.status().phase).toBe(RecoveryPhase.PENDING);
      expect(machine.status().approvalCount).toBe(1);
      expect(machine.hasApproved(G2)).toBe(false);
    });
  });

  describe('getPhaseDescription', () => {
    it('should describe each phase', () => {
      expect(getPhaseDescription(RecoveryPhase.EMPTY)).toBe('No recovery request');
      expect(getPhaseDescription(RecoveryPhase.PENDING)).toBe('Collecting guardian approvals');
      expect(getPhaseDescription(RecoveryPhase.EXECUTED)).toBe(
        'Threshold reached, access granted'
      );
    });
  });
});
