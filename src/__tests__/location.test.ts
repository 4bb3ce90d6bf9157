import { evaluateExpression } from "../expression";
import { rangesContain, readLocationList, readRangeList, selectLocation } from "../location";
import { ByteWriter } from "./helpers/dwarf_builder";
import { thrownBy } from "./helpers/errors";

// Two entries relative to the unit base, then the end of list.
const loc = new ByteWriter()
  .u64(0x00).u64(0x20).u16(2).raw([0x76, 0x00])
  .u64(0x20).u64(0x40).u16(2).raw([0x91, 0x78])
  .u64(0).u64(0)
  .toBuffer();

describe("readLocationList", () => {
  const list = readLocationList(loc, 0, { address_size: 8, base_address: 0x100n });

  it("should rebase entries on the unit base address", () => {
    expect(list).toEqual([
      { low_pc: 0x100n, high_pc: 0x120n, expression: Buffer.from([0x76, 0x00]) },
      { low_pc: 0x120n, high_pc: 0x140n, expression: Buffer.from([0x91, 0x78]) },
    ]);
  });

  it("should select the entry covering a pc", () => {
    const entry = selectLocation(list, 0x130n);
    expect(evaluateExpression(entry.expression, { address_size: 8, frameBase: 0x7000n })).toEqual({
      kind: "address",
      address: 0x6ff8n,
    });
  });

  it("should treat high_pc as exclusive", () => {
    expect(selectLocation(list, 0x120n).expression).toEqual(Buffer.from([0x91, 0x78]));
  });

  it("should report a pc outside every entry", () => {
    const error = thrownBy(() => selectLocation(list, 0x150n, 0x2a));
    expect(error.code).toBe("NoLocationAtPc");
    expect(error.offset).toBe(0x2a);
    expect(error.message).toBe("no location at pc 0x150");
  });

  it("should switch base on a base address selection entry", () => {
    const data = new ByteWriter(false)
      .u32(0xffffffff).u32(0x4000)
      .u32(0x10).u32(0x18).u16(1).u8(0x50)
      .u32(0).u32(0)
      .toBuffer();
    expect(readLocationList(data, 0, { address_size: 4, base_address: 0x100n, littleEndian: false })).toEqual([
      { low_pc: 0x4010n, high_pc: 0x4018n, expression: Buffer.from([0x50]) },
    ]);
  });

  it("should reject a list without its end entry", () => {
    const error = thrownBy(() => readLocationList(loc.subarray(0, 40), 0, { address_size: 8 }));
    expect(error.code).toBe("MalformedLocationList");
    expect(error.section).toBe(".debug_loc");
  });

  it("should read a list at a non-zero offset", () => {
    expect(readLocationList(loc, 20, { address_size: 8 })).toHaveLength(1);
  });
});

describe("readRangeList", () => {
  const ranges = new ByteWriter()
    .u32(0x10).u32(0x20)
    .u32(0x40).u32(0x48)
    .u32(0).u32(0)
    .toBuffer();

  it("should read ranges relative to the base address", () => {
    const list = readRangeList(ranges, 0, { address_size: 4, base_address: 0x1000n });
    expect(list).toEqual([
      { low_pc: 0x1010n, high_pc: 0x1020n },
      { low_pc: 0x1040n, high_pc: 0x1048n },
    ]);
    expect(rangesContain(list, 0x1044n)).toBe(true);
    expect(rangesContain(list, 0x1020n)).toBe(false);
  });

  it("should reject a truncated list", () => {
    const error = thrownBy(() => readRangeList(ranges.subarray(0, 12), 0, { address_size: 4 }));
    expect(error.code).toBe("MalformedLocationList");
    expect(error.section).toBe(".debug_ranges");
  });
});
