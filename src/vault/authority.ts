/**
 * Owner authorization capability
 *
 * Ownership is an external concern; the controller only asks whether a
 * caller currently owns the vault.
 */

import {
  RecoveryError,
  RecoveryErrorCode,
  isZeroIdentity,
  type Identity,
} from '../types.js';

export interface OwnerAuthority {
  isOwner(identity: Identity): boolean;
}

/**
 * A single, fixed owner
 */
export class FixedOwner implements OwnerAuthority {
  constructor(readonly owner: Identity) {
    if (isZeroIdentity(owner)) {
      throw new RecoveryError('Owner cannot be the zero identity', RecoveryErrorCode.ZERO_IDENTITY);
    }
  }

  isOwner(identity: Identity): boolean {
    return identity === this.owner;
  }
}

/**
 * Assert that a caller owns the vault
 *
 * @throws {RecoveryError} NOT_OWNER
 */
export function assertOwner(authority: OwnerAuthority, caller: Identity, operation: string): void {
  if (!authority.isOwner(caller)) {
    throw new RecoveryError(
      `Unauthorized: ${caller} is not the owner (${operation})`,
      RecoveryErrorCode.NOT_OWNER,
      { caller, operation }
    );
  }
}
