/**
 * Wire-level encoding shared by the transaction serializer and the sighash
 * preimages: little-endian integers, variable-length integers and
 * length-prefixed vectors.
 */

import { Buffer } from 'node:buffer';

import * as varuint from 'varuint-bitcoin';

import { TransactionError } from '../errors/index.ts';

/** Marker width for each variable-length integer prefix byte */
const VARINT_WIDTHS: Readonly<Partial<Record<number, number>>> = {
  0xfd: 3,
  0xfe: 5,
  0xff: 9,
};

/**
 * Bounds-checked cursor over a byte buffer
 */
export class ByteReader {
  private offset = 0;

  constructor(private readonly buffer: Buffer) {}

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  readBytes(length: number): Buffer {
    this.require(length);
    const bytes = Buffer.from(this.buffer.subarray(this.offset, this.offset + length));
    this.offset += length;
    return bytes;
  }

  peekUInt8(): number {
    this.require(1);
    return this.buffer.readUInt8(this.offset);
  }

  readUInt8(): number {
    const value = this.peekUInt8();
    this.offset += 1;
    return value;
  }

  readUInt32LE(): number {
    this.require(4);
    const value = this.buffer.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  /**
   * Unsigned 64-bit satoshi amount, which must fit in a JS safe integer
   */
  readUInt64LE(): number {
    this.require(8);
    const value = this.buffer.readBigUInt64LE(this.offset);
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new TransactionError('InvalidAmount', `64-bit amount ${value} exceeds the safe integer range`, {
        found: value.toString(),
      });
    }
    this.offset += 8;
    return Number(value);
  }

  /**
   * Variable-length integer, rejecting encodings that are not minimal
   */
  readVarInt(): number {
    const width = VARINT_WIDTHS[this.peekUInt8()] ?? 1;
    this.require(width);

    let value: number;
    try {
      value = varuint.decode(this.buffer, this.offset);
    } catch (error) {
      throw new TransactionError('InvalidVariableSizeInteger', 'Invalid variable size integer', { cause: error });
    }
    if (varuint.encodingLength(value) !== width) {
      throw new TransactionError('InvalidVariableSizeInteger', `Non-minimal encoding of ${value}`, {
        expected: String(varuint.encodingLength(value)),
        found: String(width),
      });
    }

    this.offset += width;
    return value;
  }

  /** varint length ∥ bytes */
  readVarSlice(): Buffer {
    return this.readBytes(this.readVarInt());
  }

  assertFinished(): void {
    if (this.remaining > 0) {
      throw new TransactionError('TrailingBytes', `${this.remaining} unread bytes after transaction`, {
        found: String(this.remaining),
      });
    }
  }

  private require(length: number): void {
    if (this.offset + length > this.buffer.length) {
      throw new TransactionError('UnexpectedEndOfInput', `Expected ${length} more bytes at offset ${this.offset}`, {
        expected: String(length),
        found: String(this.remaining),
      });
    }
  }
}

/**
 * Read a varint count followed by that many elements
 */
export function readVector<T>(reader: ByteReader, readElement: (reader: ByteReader) => T): T[] {
  const count = reader.readVarInt();
  // every element takes at least one byte
  if (count > reader.remaining) {
    throw new TransactionError('UnexpectedEndOfInput', `Vector of ${count} elements exceeds the remaining input`, {
      expected: String(count),
      found: String(reader.remaining),
    });
  }
  return Array.from({ length: count }, () => readElement(reader));
}

export interface WitnessVector {
  count: number;
  items: Buffer[];
}

/**
 * Read one input's witness stack. Items are returned without their length
 * prefixes.
 */
export function readWitnessVector(reader: ByteReader): WitnessVector {
  const items = readVector(reader, (r) => r.readVarSlice());
  return { count: items.length, items };
}

export function encodeVarInt(value: number): Buffer {
  return Buffer.from(varuint.encode(value));
}

export function writeVarSlice(bytes: Buffer): Buffer {
  return Buffer.concat([encodeVarInt(bytes.length), bytes]);
}

/** varint count ∥ elements, each already encoded */
export function writeVector(elements: readonly Buffer[]): Buffer {
  return Buffer.concat([encodeVarInt(elements.length), ...elements]);
}

export function writeWitnessVector(items: readonly Buffer[]): Buffer {
  return writeVector(items.map(writeVarSlice));
}

export function writeUInt32LE(value: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32LE(value);
  return buffer;
}

export function writeUInt64LE(value: number): Buffer {
  const buffer = Buffer.alloc(8);
  buffer.writeBigUInt64LE(BigInt(value));
  return buffer;
}
