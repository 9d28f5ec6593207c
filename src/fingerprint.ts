/**
 * Bit-string fingerprints compared by Hamming distance
 */

import { AppError } from './logger.js';
import type { Fingerprint } from './types.js';

const POPCOUNT = Array.from({ length: 256 }, (_, byte) => {
  let count = 0;
  for (let value = byte; value > 0; value >>= 1) {
    count += value & 1;
  }
  return count;
});

export class BitFingerprint implements Fingerprint<BitFingerprint> {
  readonly bits: number;
  private readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array, bits: number = bytes.length * 8) {
    if (bits < 0 || Math.ceil(bits / 8) !== bytes.length) {
      throw new AppError(`Fingerprint of ${bits} bits cannot be stored in ${bytes.length} bytes`, 'INVALID_FINGERPRINT', 400);
    }
    this.bytes = bytes;
    this.bits = bits;
  }

  /**
   * Build from booleans, most significant bit first
   */
  static fromBits(bits: ReadonlyArray<boolean>): BitFingerprint {
    const bytes = new Uint8Array(Math.ceil(bits.length / 8));
    bits.forEach((bit, index) => {
      if (bit) {
        bytes[index >> 3] |= 0x80 >> (index & 7);
      }
    });
    return new BitFingerprint(bytes, bits.length);
  }

  static fromHex(hex: string): BitFingerprint {
    if (!/^([0-9a-f]{2})*$/i.test(hex)) {
      throw new AppError(`Invalid fingerprint hex: ${hex}`, 'INVALID_FINGERPRINT', 400);
    }
    return new BitFingerprint(Uint8Array.from(Buffer.from(hex, 'hex')));
  }

  /**
   * Number of differing bits
   */
  distance(other: BitFingerprint): number {
    if (other.bits !== this.bits) {
      throw new AppError(
        `Cannot compare fingerprints of ${this.bits} and ${other.bits} bits`,
        'FINGERPRINT_MISMATCH',
        400
      );
    }

    let distance = 0;
    for (let index = 0; index < this.bytes.length; index++) {
      distance += POPCOUNT[this.bytes[index] ^ other.bytes[index]];
    }
    return distance;
  }

  equals(other: BitFingerprint): boolean {
    return other.bits === this.bits && this.distance(other) === 0;
  }

  toHex(): string {
    return Buffer.from(this.bytes).toString('hex');
  }

  toString(): string {
    return this.toHex();
  }
}
