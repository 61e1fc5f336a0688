/**
 * Sequential wire primitives.
 *
 * Values are written back to back with no tags: signed 32-bit
 * little-endian integers, nullable hardware addresses (int32 presence flag
 * followed by the raw bytes) and nullable int32 arrays (int32 length, -1 for
 * null, followed by the elements).
 */

import { PolicyDecodeError, QosError } from '@qos-policy/core';
import { MAC_ADDRESS_LENGTH, MacAddress } from './mac-address.js';

const INT32_SIZE = 4;
const INITIAL_CAPACITY = 64;
const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

export const ABSENT = 0;
export const PRESENT = 1;
export const NULL_ARRAY_LENGTH = -1;

// ─── Writer ─────────────────────────────────────────────────────

export class WireWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private offset = 0;

  constructor(initialCapacity = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, INT32_SIZE));
    this.view = new DataView(this.buffer.buffer);
  }

  /** Bytes written so far. */
  get size(): number {
    return this.offset;
  }

  /** @throws QosError (`QOS_W305`) when `value` is not an int32 */
  writeInt32(value: number): this {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw new QosError({
        code: 'QOS_W305',
        message: `Cannot encode ${value} as a signed 32-bit integer`,
        context: { value, offset: this.offset },
      });
    }
    this.ensureCapacity(INT32_SIZE);
    this.view.setInt32(this.offset, value, true);
    this.offset += INT32_SIZE;
    return this;
  }

  writeBytes(bytes: Uint8Array): this {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
    return this;
  }

  writeNullableMac(address: MacAddress | null): this {
    if (!address) return this.writeInt32(ABSENT);
    return this.writeInt32(PRESENT).writeBytes(address.toBytes());
  }

  writeNullableInt32Array(values: readonly number[] | null): this {
    if (!values) return this.writeInt32(NULL_ARRAY_LENGTH);
    this.writeInt32(values.length);
    for (const value of values) {
      this.writeInt32(value);
    }
    return this;
  }

  /** Copy of the written bytes. */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }

  private ensureCapacity(additional: number): void {
    const required = this.offset + additional;
    if (required <= this.buffer.length) return;

    let capacity = this.buffer.length * 2;
    while (capacity < required) capacity *= 2;

    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.offset));
    this.buffer = next;
    this.view = new DataView(next.buffer);
  }
}

// ─── Reader ─────────────────────────────────────────────────────

export class WireReader {
  private readonly data: Uint8Array;
  private readonly view: DataView;
  private offset = 0;

  constructor(data: Uint8Array) {
    this.data = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  readInt32(): number {
    this.require(INT32_SIZE, 'int32');
    const value = this.view.getInt32(this.offset, true);
    this.offset += INT32_SIZE;
    return value;
  }

  readBytes(length: number): Uint8Array {
    this.require(length, `${length} bytes`);
    const bytes = this.data.slice(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }

  readNullableMac(): MacAddress | null {
    const flagOffset = this.offset;
    const flag = this.readInt32();
    if (flag === ABSENT) return null;
    if (flag !== PRESENT) {
      throw new PolicyDecodeError('QOS_W304', `Invalid presence flag: ${flag}`, flagOffset);
    }
    return MacAddress.fromBytes(this.readBytes(MAC_ADDRESS_LENGTH));
  }

  /** Read an int32 array; a length of -1 yields null. */
  readNullableInt32Array(): number[] | null {
    const lengthOffset = this.offset;
    const length = this.readInt32();
    if (length === NULL_ARRAY_LENGTH) return null;
    if (length < 0 || length * INT32_SIZE > this.remaining) {
      throw new PolicyDecodeError('QOS_W304', `Invalid array length: ${length}`, lengthOffset, {
        remaining: this.remaining,
      });
    }
    const values: number[] = [];
    for (let i = 0; i < length; i++) {
      values.push(this.readInt32());
    }
    return values;
  }

  private require(length: number, what: string): void {
    if (this.remaining < length) {
      throw new PolicyDecodeError(
        'QOS_W301',
        `Unexpected end of payload reading ${what}: need ${length}, have ${this.remaining}`,
        this.offset
      );
    }
  }
}
