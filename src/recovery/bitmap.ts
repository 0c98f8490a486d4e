/**
 * Fixed-width approval bitmap
 *
 * Bit i set ⇔ the guardian with 0-based index i approved. Immutable:
 * `with()` returns a new bitmap, so request snapshots stay valid.
 */

import { MAX_GUARDIANS } from '../types.js';

export class ApprovalBitmap {
  private constructor(private readonly bits: bigint) {}

  static empty(): ApprovalBitmap {
    return new ApprovalBitmap(0n);
  }

  has(index: number): boolean {
    assertIndex(index);
    return ((this.bits >> BigInt(index)) & 1n) === 1n;
  }

  with(index: number): ApprovalBitmap {
    assertIndex(index);
    return new ApprovalBitmap(this.bits | (1n << BigInt(index)));
  }

  /** Population count */
  count(): number {
    let n = 0;
    let rest = this.bits;
    while (rest > 0n) {
      rest &= rest - 1n;
      n++;
    }
    return n;
  }

  indices(): number[] {
    const result: number[] = [];
    for (let i = 0; i < MAX_GUARDIANS; i++) {
      if (this.has(i)) {
        result.push(i);
      }
    }
    return result;
  }

  /** 32-byte hex rendering, bit 0 in the lowest byte */
  toHex(): string {
    return '0x' + this.bits.toString(16).padStart(MAX_GUARDIANS / 4, '0');
  }
}

function assertIndex(index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= MAX_GUARDIANS) {
    throw new RangeError(`Guardian index out of range: ${index}`);
  }
}
