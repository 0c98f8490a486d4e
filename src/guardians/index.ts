/**
 * Guardian Registry
 *
 * Validates and indexes the fixed guardian committee. The set and the
 * threshold never change after construction.
 */

import {
  MAX_GUARDIANS,
  RecoveryError,
  RecoveryErrorCode,
  isZeroIdentity,
  type Identity,
} from '../types.js';

export class GuardianRegistry {
  private readonly guardians: readonly Identity[];
  /** identity → 1-based position */
  private readonly positions: Map<Identity, number>;

  readonly threshold: number;

  /**
   * @param guardians - Ordered, distinct guardian identities (1..256)
   * @param threshold - Approvals required to execute a request (1..guardians.length)
   * @throws {RecoveryError} INVALID_GUARDIAN_SET, TOO_MANY_GUARDIANS or INVALID_THRESHOLD
   */
  constructor(guardians: readonly Identity[], threshold: number) {
    if (guardians.length === 0) {
      throw new RecoveryError(
        'Guardian set cannot be empty',
        RecoveryErrorCode.INVALID_GUARDIAN_SET
      );
    }

    if (guardians.length > MAX_GUARDIANS) {
      throw new RecoveryError(
        `Guardian set cannot exceed ${MAX_GUARDIANS} members`,
        RecoveryErrorCode.TOO_MANY_GUARDIANS,
        { count: guardians.length }
      );
    }

    const positions = new Map<Identity, number>();
    guardians.forEach((guardian, i) => {
      if (isZeroIdentity(guardian)) {
        throw new RecoveryError(
          `Guardian at position ${i + 1} is the zero identity`,
          RecoveryErrorCode.INVALID_GUARDIAN_SET,
          { position: i + 1 }
        );
      }
      if (positions.has(guardian)) {
        throw new RecoveryError(
          `Duplicate guardian: ${guardian}`,
          RecoveryErrorCode.INVALID_GUARDIAN_SET,
          { guardian }
        );
      }
      positions.set(guardian, i + 1);
    });

    if (!Number.isInteger(threshold) || threshold < 1 || threshold > guardians.length) {
      throw new RecoveryError(
        `Threshold must be an integer between 1 and ${guardians.length}`,
        RecoveryErrorCode.INVALID_THRESHOLD,
        { threshold, guardians: guardians.length }
      );
    }

    this.guardians = [...guardians];
    this.positions = positions;
    this.threshold = threshold;
  }

  get size(): number {
    return this.guardians.length;
  }

  isGuardian(identity: Identity): boolean {
    return this.positions.has(identity);
  }

  /**
   * 0-based index of a guardian, used as its bit in approval bitmaps
   */
  indexOf(identity: Identity): number | null {
    const position = this.positions.get(identity);
    return position === undefined ? null : position - 1;
  }

  /**
   * 1-based position of a guardian, 0 when the identity is not a guardian
   */
  positionOf(identity: Identity): number {
    return this.positions.get(identity) ?? 0;
  }

  getGuardians(): Identity[] {
    return [...this.guardians];
  }
}
