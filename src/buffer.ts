import { DwarfError } from "./errors";

/**
 * Cursor over a section. Every read is bounds-checked against `end` and
 * fails with a `BufferOverrun` error that decoders translate into their own
 * error kind.
 */
export class OffsetBuffer {
  private readonly end: number;

  constructor(
    private buffer: Buffer,
    private offset: number,
    end = buffer.length,
    readonly littleEndian = true
  ) {
    this.end = Math.min(end, buffer.length);
  }

  private ensure(length: number) {
    if (length < 0 || this.offset + length > this.end) {
      throw DwarfError.bufferOverrun(this.offset, length, this.end);
    }
  }

  readUInt8() {
    this.ensure(1);
    this.offset += 1;
    return this.buffer.readUInt8(this.offset - 1);
  }

  readInt8() {
    this.ensure(1);
    this.offset += 1;
    return this.buffer.readInt8(this.offset - 1);
  }

  readUInt16() {
    this.ensure(2);
    this.offset += 2;
    return this.littleEndian
      ? this.buffer.readUInt16LE(this.offset - 2)
      : this.buffer.readUInt16BE(this.offset - 2);
  }

  readInt16() {
    this.ensure(2);
    this.offset += 2;
    return this.littleEndian
      ? this.buffer.readInt16LE(this.offset - 2)
      : this.buffer.readInt16BE(this.offset - 2);
  }

  readUInt32() {
    this.ensure(4);
    this.offset += 4;
    return this.littleEndian
      ? this.buffer.readUInt32LE(this.offset - 4)
      : this.buffer.readUInt32BE(this.offset - 4);
  }

  readInt32() {
    this.ensure(4);
    this.offset += 4;
    return this.littleEndian
      ? this.buffer.readInt32LE(this.offset - 4)
      : this.buffer.readInt32BE(this.offset - 4);
  }

  readUInt64() {
    this.ensure(8);
    this.offset += 8;
    return this.littleEndian
      ? this.buffer.readBigUInt64LE(this.offset - 8)
      : this.buffer.readBigUInt64BE(this.offset - 8);
  }

  readInt64() {
    this.ensure(8);
    this.offset += 8;
    return this.littleEndian
      ? this.buffer.readBigInt64LE(this.offset - 8)
      : this.buffer.readBigInt64BE(this.offset - 8);
  }

  /** Unsigned integer of 1, 2, 4 or 8 bytes. */
  readUnsigned(size: number): bigint {
    switch (size) {
      case 1:
        return BigInt(this.readUInt8());
      case 2:
        return BigInt(this.readUInt16());
      case 4:
        return BigInt(this.readUInt32());
      case 8:
        return this.readUInt64();
      default:
        throw new RangeError(`unsupported integer size ${size}`);
    }
  }

  /** Signed integer of 1, 2, 4 or 8 bytes. */
  readSigned(size: number): bigint {
    switch (size) {
      case 1:
        return BigInt(this.readInt8());
      case 2:
        return BigInt(this.readInt16());
      case 4:
        return BigInt(this.readInt32());
      case 8:
        return this.readInt64();
      default:
        throw new RangeError(`unsupported integer size ${size}`);
    }
  }

  readAddress(size: number): bigint {
    return this.readUnsigned(size);
  }

  /** A 4- or 8-byte section offset, as a JS number. */
  readOffset(size: number): number {
    return size === 8 ? Number(this.readUInt64()) : this.readUInt32();
  }

  readUleb128Big(): bigint {
    let value = 0n;
    let shift = 0n;
    while (true) {
      const b = this.readUInt8();
      value |= BigInt(b & 0x7f) << shift;
      shift += 7n;
      if ((b & 0x80) === 0) {
        return value;
      }
    }
  }

  readSleb128Big(): bigint {
    let value = 0n;
    let shift = 0n;
    while (true) {
      const b = this.readUInt8();
      value |= BigInt(b & 0x7f) << shift;
      shift += 7n;
      if ((b & 0x80) === 0) {
        if (b & 0x40) {
          return value - (1n << shift);
        }
        return value;
      }
    }
  }

  readUleb128() {
    return Number(this.readUleb128Big());
  }

  readSleb128() {
    return Number(this.readSleb128Big());
  }

  subarray(length: number) {
    this.ensure(length);
    this.offset += length;
    return this.buffer.subarray(this.offset - length, this.offset);
  }

  skip(length: number) {
    this.ensure(length);
    this.offset += length;
  }

  peek() {
    this.ensure(1);
    return this.buffer.readUInt8(this.offset);
  }

  readCString() {
    const nullTerm = this.buffer.indexOf(0, this.offset);
    if (nullTerm === -1 || nullTerm >= this.end) {
      throw DwarfError.bufferOverrun(this.offset, this.end - this.offset + 1, this.end);
    }
    const raw_value = this.buffer.toString("utf8", this.offset, nullTerm);
    this.offset = nullTerm + 1;
    return raw_value;
  }

  tell() {
    return this.offset;
  }

  seek(offset: number) {
    if (offset < 0 || offset > this.end) {
      throw DwarfError.bufferOverrun(offset, 0, this.end);
    }
    this.offset = offset;
  }

  limit() {
    return this.end;
  }

  atEnd() {
    return this.offset >= this.end;
  }
}

/** Null-terminated string at `offset` in a string table such as .debug_str. */
export function readStringAt(table: Buffer, offset: number): string {
  return new OffsetBuffer(table, offset).readCString();
}

/**
 * Reads a unit length, switching to the 64-bit DWARF format on the
 * 0xffffffff escape.
 */
export function readInitialLength(o_buffer: OffsetBuffer): {
  length: number;
  offset_size: 4 | 8;
} {
  const length = o_buffer.readUInt32();
  if (length === 0xffffffff) {
    return { length: Number(o_buffer.readUInt64()), offset_size: 8 };
  }
  if (length >= 0xfffffff0) {
    throw DwarfError.bufferOverrun(o_buffer.tell() - 4, length, o_buffer.limit());
  }
  return { length, offset_size: 4 };
}

/** Unsigned value of target memory bytes in the image's byte order. */
export function decodeUnsigned(bytes: Uint8Array, littleEndian = true): bigint {
  let value = 0n;
  for (let i = 0; i < bytes.length; i++) {
    const b = littleEndian ? bytes[bytes.length - 1 - i] : bytes[i];
    value = (value << 8n) | BigInt(b);
  }
  return value;
}
