import { OffsetBuffer, decodeUnsigned, readInitialLength, readStringAt } from "../buffer";
import { codeOf, thrownBy } from "./helpers/errors";

describe("OffsetBuffer", () => {
  describe("LEB128", () => {
    it("should decode a multi-byte unsigned value", () => {
      const o_buffer = new OffsetBuffer(Buffer.from([0xe5, 0x8e, 0x26]), 0);
      expect(o_buffer.readUleb128()).toBe(624485);
      expect(o_buffer.atEnd()).toBe(true);
    });

    it("should decode a negative signed value", () => {
      const o_buffer = new OffsetBuffer(Buffer.from([0xc0, 0xbb, 0x78]), 0);
      expect(o_buffer.readSleb128Big()).toBe(-123456n);
    });

    it("should sign-extend a single byte", () => {
      expect(new OffsetBuffer(Buffer.from([0x7f]), 0).readSleb128()).toBe(-1);
      expect(new OffsetBuffer(Buffer.from([0x3f]), 0).readSleb128()).toBe(63);
    });

    it("should keep values wider than 53 bits exact", () => {
      const bytes = [0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x01];
      expect(new OffsetBuffer(Buffer.from(bytes), 0).readUleb128Big()).toBe(0xffffffffffffffffn);
    });

    it("should fail when the continuation bit runs off the end", () => {
      expect(codeOf(() => new OffsetBuffer(Buffer.from([0x80, 0x80]), 0).readUleb128())).toBe("BufferOverrun");
    });
  });

  it("should read big-endian integers", () => {
    const o_buffer = new OffsetBuffer(Buffer.from([0x12, 0x34, 0x56, 0x78, 0xff, 0xfe]), 0, 6, false);
    expect(o_buffer.readUInt32()).toBe(0x12345678);
    expect(o_buffer.readInt16()).toBe(-2);
  });

  it("should read sized unsigned and signed values as bigint", () => {
    const o_buffer = new OffsetBuffer(Buffer.from([0xf0, 0xff, 0xff, 0xff]), 0);
    expect(o_buffer.readUnsigned(2)).toBe(0xfff0n);
    o_buffer.seek(0);
    expect(o_buffer.readSigned(4)).toBe(-16n);
    expect(() => o_buffer.readUnsigned(3)).toThrow(RangeError);
  });

  it("should refuse reads past its end without moving", () => {
    const o_buffer = new OffsetBuffer(Buffer.from([1, 2, 3, 4]), 0, 2);
    const error = thrownBy(() => o_buffer.readUInt32());
    expect(error.code).toBe("BufferOverrun");
    expect(error.details).toMatchObject({ offset: 0, wanted: 4, end: 2 });
    expect(o_buffer.tell()).toBe(0);
    expect(o_buffer.readUInt16()).toBe(0x0201);
  });

  it("should read a null-terminated string and step over the terminator", () => {
    const o_buffer = new OffsetBuffer(Buffer.from("main\0x", "utf8"), 0);
    expect(o_buffer.readCString()).toBe("main");
    expect(o_buffer.tell()).toBe(5);
  });

  it("should reject an unterminated string", () => {
    expect(codeOf(() => new OffsetBuffer(Buffer.from("abc", "utf8"), 0).readCString())).toBe("BufferOverrun");
  });

  it("should not find a terminator beyond its end", () => {
    const o_buffer = new OffsetBuffer(Buffer.from("abc\0", "utf8"), 0, 3);
    expect(codeOf(() => o_buffer.readCString())).toBe("BufferOverrun");
  });

  it("should read strings out of a string table", () => {
    const table = Buffer.from("\0int\0long unsigned int\0", "utf8");
    expect(readStringAt(table, 1)).toBe("int");
    expect(readStringAt(table, 5)).toBe("long unsigned int");
    expect(readStringAt(table, 10)).toBe("unsigned int");
  });
});

describe("readInitialLength", () => {
  it("should read a 32-bit length", () => {
    const o_buffer = new OffsetBuffer(Buffer.from([0x10, 0, 0, 0]), 0);
    expect(readInitialLength(o_buffer)).toEqual({ length: 16, offset_size: 4 });
  });

  it("should switch to the 64-bit format on the escape value", () => {
    const bytes = [0xff, 0xff, 0xff, 0xff, 0x20, 0, 0, 0, 0, 0, 0, 0];
    const o_buffer = new OffsetBuffer(Buffer.from(bytes), 0);
    expect(readInitialLength(o_buffer)).toEqual({ length: 32, offset_size: 8 });
    expect(o_buffer.tell()).toBe(12);
  });

  it("should reject reserved length values", () => {
    const o_buffer = new OffsetBuffer(Buffer.from([0xf0, 0xff, 0xff, 0xff]), 0);
    expect(codeOf(() => readInitialLength(o_buffer))).toBe("BufferOverrun");
  });
});

describe("decodeUnsigned", () => {
  it("should honour the byte order", () => {
    const bytes = Uint8Array.from([0x01, 0x02, 0x03, 0x04]);
    expect(decodeUnsigned(bytes)).toBe(0x04030201n);
    expect(decodeUnsigned(bytes, false)).toBe(0x01020304n);
  });

  it("should decode nothing as zero", () => {
    expect(decodeUnsigned(new Uint8Array(0))).toBe(0n);
  });
});
