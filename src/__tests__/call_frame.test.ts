import {
  CallFrameSection,
  decodeUnwindRows,
  findFde,
  parseCallFrameSection,
  recoverCallerFrame,
} from "../call_frame";
import { formatUnwindRow } from "../debug_print";
import { TargetAccess } from "../expression";
import { CieSpec, assembleDebugFrame, le } from "./helpers/dwarf_builder";
import { codeOf, thrownBy } from "./helpers/errors";

// def_cfa r7+8; r16 saved at cfa-8
const x86Cie: CieSpec = { return_address_register: 16, instructions: [0x0c, 7, 8, 0x90, 1] };

function frameFor(cie: CieSpec, instructions: number[]): CallFrameSection {
  const { data } = assembleDebugFrame([cie], [{ cie: 0, initial_location: 0x1000, address_range: 0x10, instructions }]);
  const section = parseCallFrameSection(data, { address_size: 8 });
  expect(section.failures).toEqual([]);
  return section;
}

function rowsFor(instructions: number[], cie: CieSpec = x86Cie) {
  return decodeUnwindRows(frameFor(cie, instructions).fdes[0]);
}

function fakeTarget(registers: Record<number, bigint>, base: bigint, words: bigint[]): TargetAccess {
  const bytes = words.flatMap((word) => le(word, 8));
  return {
    readRegister: (register) => registers[register] ?? 0n,
    readMemory: (address, length) => {
      const start = Number(address - base);
      return Uint8Array.from(bytes.slice(start, start + length));
    },
  };
}

// advance 1; def_cfa_offset 16; r6 at cfa-16; advance 3; def_cfa_register r6
const pushFrame = [0x41, 0x0e, 16, 0x86, 2, 0x43, 0x0d, 6];

describe("parseCallFrameSection", () => {
  it("should index CIEs by offset and FDEs in order", () => {
    const { cies, fdes } = frameFor(x86Cie, pushFrame);

    expect([...cies.keys()]).toEqual([0]);
    expect(cies.get(0)).toMatchObject({
      version: 4,
      augmentation: "",
      address_size: 8,
      code_alignment_factor: 1,
      data_alignment_factor: -8,
      return_address_register: 16,
    });
    expect(fdes).toHaveLength(1);
    expect(fdes[0]).toMatchObject({ initial_location: 0x1000n, address_range: 0x10n });
    expect(fdes[0].instructions).toEqual(Buffer.from(pushFrame));
  });

  it("should read version 1 CIEs with the caller's address size", () => {
    const { data } = assembleDebugFrame(
      [{ version: 1, address_size: 4, return_address_register: 65, instructions: [] }],
      [{ cie: 0, initial_location: 0x8000, address_range: 0x20, instructions: [] }]
    );
    const { cies, fdes } = parseCallFrameSection(data, { address_size: 4 });
    expect(cies.get(0)).toMatchObject({ version: 1, address_size: 4, return_address_register: 65 });
    expect(fdes[0].initial_location).toBe(0x8000n);
  });

  it("should skip zero-length padding", () => {
    const { data } = assembleDebugFrame([x86Cie], [{ cie: 0, initial_location: 0x1000, address_range: 0x10, instructions: [] }]);
    const section = parseCallFrameSection(Buffer.concat([data, Buffer.alloc(4)]), { address_size: 8 });
    expect(section.failures).toEqual([]);
    expect(section.fdes).toHaveLength(1);
  });

  it("should record entries that fail and keep the rest", () => {
    const { data, fdeOffsets } = assembleDebugFrame(
      [{ version: 2, return_address_register: 16, instructions: [] }, x86Cie],
      [
        { cie: 0, initial_location: 0x1000, address_range: 0x10, instructions: [] },
        { cie: 1, initial_location: 0x2000, address_range: 0x10, instructions: [] },
      ]
    );
    const { fdes, failures } = parseCallFrameSection(data, { address_size: 8 });

    expect(fdes.map((fde) => fde.initial_location)).toEqual([0x2000n]);
    expect(failures.map((failure) => [failure.offset, failure.error.code])).toEqual([
      [0, "UnsupportedVersion"],
      [fdeOffsets[0], "UnsupportedVersion"],
    ]);
  });

  it("should record a truncated FDE", () => {
    const { data, fdeOffsets } = assembleDebugFrame(
      [x86Cie],
      [{ cie: 0, initial_location: 0x1000, address_range: 0x10, instructions: pushFrame }]
    );
    const { failures } = parseCallFrameSection(data.subarray(0, data.length - 2), { address_size: 8 });
    expect(failures).toHaveLength(1);
    expect(failures[0].offset).toBe(fdeOffsets[0]);
    expect(failures[0].error.code).toBe("MalformedCallFrame");
  });
});

describe("decodeUnwindRows", () => {
  it("should emit a row per advance through a frame setup", () => {
    expect(rowsFor(pushFrame).map(formatUnwindRow)).toEqual([
      "0x1000..0x1001 cfa=r7+8 r16=c-8",
      "0x1001..0x1004 cfa=r7+16 r6=c-16 r16=c-8",
      "0x1004..0x1010 cfa=r6+16 r6=c-16 r16=c-8",
    ]);
  });

  it("should carry the return address register on each row", () => {
    expect(rowsFor(pushFrame).every((row) => row.return_address_register === 16)).toBe(true);
  });

  it("should restore remembered state", () => {
    // advance 1; remember; def_cfa_offset 32; advance 1; restore_state; advance 1
    const rows = rowsFor([0x41, 0x0a, 0x0e, 32, 0x41, 0x0b, 0x41]);
    expect(rows.map(formatUnwindRow)).toEqual([
      "0x1000..0x1001 cfa=r7+8 r16=c-8",
      "0x1001..0x1002 cfa=r7+32 r16=c-8",
      "0x1002..0x1003 cfa=r7+8 r16=c-8",
      "0x1003..0x1010 cfa=r7+8 r16=c-8",
    ]);
  });

  it("should restore a register to its rule after the CIE", () => {
    // r16 at cfa-24; advance 1; restore r16
    const rows = rowsFor([0x05, 16, 3, 0x41, 0xd0]);
    expect(rows[0].registers.get(16)).toEqual({ kind: "offset", offset: -24n });
    expect(rows[1].registers.get(16)).toEqual({ kind: "offset", offset: -8n });
  });

  it("should record every register rule kind", () => {
    const rows = rowsFor([0x07, 4, 0x08, 5, 0x09, 2, 1, 0x14, 9, 1, 0x2f, 3, 1]);
    expect(formatUnwindRow(rows[0])).toBe("0x1000..0x1010 cfa=r7+8 r2=r1 r3=c+8 r4=u r5=s r9=v(c-8) r16=c-8");
  });

  it("should reject a location advance in CIE instructions", () => {
    expect(codeOf(() => rowsFor([], { return_address_register: 16, instructions: [0x0c, 7, 8, 0x41] }))).toBe(
      "MalformedCallFrame"
    );
  });

  it("should reject restore_state without a remembered state", () => {
    expect(codeOf(() => rowsFor([0x0b]))).toBe("MalformedCallFrame");
  });

  it("should reject unknown instructions", () => {
    const error = thrownBy(() => rowsFor([0x3f]));
    expect(error.code).toBe("MalformedCallFrame");
    expect(error.section).toBe(".debug_frame");
  });

  it("should reject a row without a CFA rule", () => {
    expect(codeOf(() => rowsFor([0x41], { return_address_register: 16, instructions: [] }))).toBe("MalformedCallFrame");
  });

  it("should stop at the step budget", () => {
    const fde = frameFor(x86Cie, [0x00, 0x00, 0x00, 0x00]).fdes[0];
    expect(codeOf(() => decodeUnwindRows(fde, { maxSteps: 3 }))).toBe("InstructionBudgetExceeded");
  });
});

describe("recoverCallerFrame", () => {
  it("should load saved registers relative to the CFA", () => {
    const rows = rowsFor(pushFrame);
    const target = fakeTarget({ 6: 0x7fe0n }, 0x7fe0n, [0x7ff8n, 0x401234n]);

    const frame = recoverCallerFrame(rows[2], target, { address_size: 8 });

    expect(frame.cfa).toBe(0x7ff0n);
    expect(frame.registers).toEqual(
      new Map([
        [16, 0x401234n],
        [6, 0x7ff8n],
      ])
    );
    expect(frame.return_address).toBe(0x401234n);
  });

  it("should evaluate expression rules with the CFA pushed", () => {
    const rows = rowsFor(
      [
        ...[0x0f, 2, 0x77, 0x08], // cfa = r7 + 8
        ...[0x10, 16, 2, 0x38, 0x1c], // r16 saved at cfa - 8
        ...[0x16, 3, 2, 0x23, 0x10], // r3 = cfa + 16
        ...[0x08, 5, 0x07, 4, 0x09, 2, 1, 0x14, 9, 1],
      ],
      { return_address_register: 16, instructions: [] }
    );
    const target = fakeTarget({ 7: 0x8000n, 5: 0x55n, 1: 0x11n }, 0x8000n, [0xabcdn]);

    const frame = recoverCallerFrame(rows[0], target, { address_size: 8 });

    expect(frame.cfa).toBe(0x8008n);
    expect(frame.registers).toEqual(
      new Map([
        [16, 0xabcdn],
        [3, 0x8018n],
        [5, 0x55n],
        [2, 0x11n],
        [9, 0x8000n],
      ])
    );
    expect(frame.return_address).toBe(0xabcdn);
  });
});

describe("findFde", () => {
  it("should find the FDE covering a pc", () => {
    const { fdes } = frameFor(x86Cie, []);
    expect(findFde(fdes, 0x100fn)).toBe(fdes[0]);
    expect(findFde(fdes, 0x1010n)).toBeUndefined();
  });
});
