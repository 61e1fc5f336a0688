/**
 * Immutable 6-byte hardware (MAC) address.
 */

import { InvalidArgumentError } from '@qos-policy/core';

export const MAC_ADDRESS_LENGTH = 6;

const MAC_PATTERN = /^[0-9a-f]{2}([:-])[0-9a-f]{2}(?:\1[0-9a-f]{2}){4}$/i;

export class MacAddress {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /**
   * Parse `aa:bb:cc:dd:ee:ff` (or dash-separated) notation.
   */
  static fromString(value: string): MacAddress {
    if (typeof value !== 'string' || !MAC_PATTERN.test(value)) {
      throw new InvalidArgumentError('address', `Invalid MAC address: ${String(value)}`, 'QOS_A201');
    }
    const bytes = new Uint8Array(MAC_ADDRESS_LENGTH);
    value.split(/[:-]/).forEach((part, i) => {
      bytes[i] = parseInt(part, 16);
    });
    return new MacAddress(bytes);
  }

  static fromBytes(value: ArrayLike<number>): MacAddress {
    if (value.length !== MAC_ADDRESS_LENGTH) {
      throw new InvalidArgumentError(
        'address',
        `MAC address must be ${MAC_ADDRESS_LENGTH} bytes, got ${value.length}`,
        'QOS_A201'
      );
    }
    const bytes = new Uint8Array(MAC_ADDRESS_LENGTH);
    for (let i = 0; i < MAC_ADDRESS_LENGTH; i++) {
      const byte = value[i];
      if (byte === undefined || !Number.isInteger(byte) || byte < 0 || byte > 0xff) {
        throw new InvalidArgumentError('address', `Invalid MAC address byte at index ${i}: ${byte}`, 'QOS_A201');
      }
      bytes[i] = byte;
    }
    return new MacAddress(bytes);
  }

  /** Null-safe comparison: two absent addresses are equal. */
  static equals(a: MacAddress | null | undefined, b: MacAddress | null | undefined): boolean {
    if (a == null || b == null) return a == null && b == null;
    return a.equals(b);
  }

  toBytes(): Uint8Array {
    return this.bytes.slice();
  }

  equals(other: MacAddress | null | undefined): boolean {
    if (!other) return false;
    if (other === this) return true;
    return this.bytes.every((byte, i) => byte === other.bytes[i]);
  }

  hashCode(): number {
    let hash = 0;
    for (const byte of this.bytes) {
      hash = (Math.imul(hash, 31) + byte) | 0;
    }
    return hash;
  }

  toString(): string {
    return Array.from(this.bytes, (byte) => byte.toString(16).padStart(2, '0')).join(':');
  }

  toJSON(): string {
    return this.toString();
  }
}
