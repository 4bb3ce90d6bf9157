import { TargetAccess } from "../expression";
import { DebugImage } from "../image";
import { formatUnwindRow } from "../debug_print";
import {
  ByteWriter,
  assembleDebugFrame,
  assembleElf,
  assembleInfo,
  assembleLineProgram,
  expr,
  le,
  section,
  sleb,
} from "./helpers/dwarf_builder";
import { errorOf, unwrap } from "./helpers/errors";

function assemble(stmt_list = 0, extraUnits = false) {
  return assembleInfo([
    {
      root: {
        tag: "DW_TAG_compile_unit",
        attrs: [
          ["DW_AT_name", "DW_FORM_string", "main.c"],
          ["DW_AT_comp_dir", "DW_FORM_string", "/work"],
          ["DW_AT_low_pc", "DW_FORM_addr", 0x1000],
          ["DW_AT_high_pc", "DW_FORM_data4", 0x100],
          ["DW_AT_stmt_list", "DW_FORM_sec_offset", stmt_list],
        ],
        children: [
          {
            tag: "DW_TAG_base_type",
            label: "int",
            attrs: [
              ["DW_AT_name", "DW_FORM_string", "int"],
              ["DW_AT_encoding", "DW_FORM_data1", 5],
              ["DW_AT_byte_size", "DW_FORM_data1", 4],
            ],
          },
          {
            tag: "DW_TAG_subprogram",
            label: "main",
            attrs: [
              ["DW_AT_name", "DW_FORM_string", "main"],
              ["DW_AT_low_pc", "DW_FORM_addr", 0x1000],
              ["DW_AT_high_pc", "DW_FORM_data4", 0x40],
              ["DW_AT_frame_base", "DW_FORM_exprloc", expr(0x9c)],
            ],
            children: [
              {
                tag: "DW_TAG_variable",
                label: "x",
                attrs: [
                  ["DW_AT_name", "DW_FORM_string", "x"],
                  ["DW_AT_type", "DW_FORM_ref4", { ref: "int" }],
                  ["DW_AT_location", "DW_FORM_exprloc", expr(0x91, sleb(-20))],
                ],
              },
              {
                tag: "DW_TAG_variable",
                label: "y",
                attrs: [
                  ["DW_AT_name", "DW_FORM_string", "y"],
                  ["DW_AT_location", "DW_FORM_sec_offset", 0],
                ],
              },
              {
                tag: "DW_TAG_variable",
                label: "k",
                attrs: [
                  ["DW_AT_name", "DW_FORM_string", "k"],
                  ["DW_AT_const_value", "DW_FORM_data1", 42],
                ],
              },
              {
                tag: "DW_TAG_variable",
                label: "gone",
                attrs: [
                  ["DW_AT_name", "DW_FORM_string", "gone"],
                  ["DW_AT_type", "DW_FORM_ref4", { ref: "int" }],
                ],
              },
              {
                tag: "DW_TAG_lexical_block",
                attrs: [
                  ["DW_AT_low_pc", "DW_FORM_addr", 0x1010],
                  ["DW_AT_high_pc", "DW_FORM_data4", 0x10],
                ],
                children: [
                  {
                    tag: "DW_TAG_variable",
                    label: "inner",
                    attrs: [
                      ["DW_AT_name", "DW_FORM_string", "inner"],
                      ["DW_AT_location", "DW_FORM_exprloc", expr(0x03, le(0x4000, 8))],
                    ],
                  },
                ],
              },
            ],
          },
          {
            tag: "DW_TAG_subprogram",
            label: "decl",
            attrs: [
              ["DW_AT_name", "DW_FORM_string", "helper"],
              ["DW_AT_declaration", "DW_FORM_flag_present"],
            ],
          },
          {
            tag: "DW_TAG_subprogram",
            label: "impl",
            attrs: [
              ["DW_AT_specification", "DW_FORM_ref4", { ref: "decl" }],
              ["DW_AT_low_pc", "DW_FORM_addr", 0x1040],
              ["DW_AT_high_pc", "DW_FORM_data4", 0x20],
            ],
          },
        ],
      },
    },
    ...(extraUnits ? [{ version: 5, root: { tag: "DW_TAG_compile_unit" as const } }] : []),
  ]);
}

const line = assembleLineProgram({
  files: [{ name: "main.c" }],
  program: (p) =>
    p
      .setAddress(0x1000).advanceLine(2).copy()
      .special(0x10, 2)
      .advancePc(0x30).advanceLine(10).copy()
      .advancePc(0x20).endSequence(),
});

// y is in r0 for the first 16 bytes of main, then at fbreg -8.
const loc = new ByteWriter()
  .u64(0x00).u64(0x10).u16(1).raw([0x50])
  .u64(0x10).u64(0x40).u16(2).raw([0x91, 0x78])
  .u64(0).u64(0)
  .toBuffer();

// cfa = r7+8, return address at cfa-8; main pushes r6 and makes it the frame pointer.
const frame = assembleDebugFrame(
  [{ return_address_register: 16, instructions: [0x0c, 7, 8, 0x90, 1] }],
  [
    { cie: 0, initial_location: 0x1000, address_range: 0x40, instructions: [0x41, 0x0e, 16, 0x86, 2, 0x43, 0x0d, 6] },
    { cie: 0, initial_location: 0x1040, address_range: 0x20, instructions: [] },
  ]
).data;

function imageFor(info: ReturnType<typeof assemble>) {
  return DebugImage.load([
    section(".debug_info", info.info),
    section(".debug_abbrev", info.abbrev),
    section(".debug_line", line),
    section(".debug_loc", loc),
    section(".debug_frame", frame),
  ]);
}

// Paused inside main: r6 = 0x7fe0, saved r6 and return address above it.
function pausedTarget(): TargetAccess {
  const bytes = [0x7ff8n, 0x401234n].flatMap((word) => le(word, 8));
  return {
    readRegister: (register) => (register === 6 ? 0x7fe0n : 0n),
    readMemory: (address, length) => {
      const start = Number(address - 0x7fe0n);
      return Uint8Array.from(bytes.slice(start, start + length));
    },
  };
}

describe("DebugImage", () => {
  const info = assemble();
  const image = imageFor(info);
  const at = (label: string) => {
    const offset = info.labels.get(label);
    if (offset === undefined) throw new Error(`no label ${label}`);
    return offset;
  };

  it("should load without failures", () => {
    expect(image.failures).toEqual([]);
    expect(image.units).toHaveLength(1);
  });

  describe("dieAt", () => {
    it("should find a DIE by offset", () => {
      expect(unwrap(image.dieAt(at("x"))).tag).toBe("DW_TAG_variable");
    });

    it("should report an offset that is not a DIE", () => {
      const error = errorOf(image.dieAt(0x9999));
      expect(error.code).toBe("NotFound");
      expect(error.message).toBe("DIE at 0x9999 not found");
    });
  });

  describe("resolveType", () => {
    it("should give the declared type of a variable", () => {
      expect(unwrap(image.resolveType(at("x")))).toEqual({
        kind: "base",
        name: "int",
        encoding: "DW_ATE_signed",
        byte_size: 4,
      });
    });

    it("should fail on an offset with no DIE", () => {
      expect(errorOf(image.resolveType(0x9999)).code).toBe("UnresolvedTypeReference");
    });
  });

  describe("variableLocation", () => {
    it("should evaluate fbreg against the CFA frame base", () => {
      expect(unwrap(image.variableLocation(at("x"), 0x1020n, pausedTarget()))).toEqual({
        kind: "address",
        address: 0x7fdcn,
      });
    });

    it("should take an explicit frame base", () => {
      expect(unwrap(image.variableLocation(at("x"), 0x1020n, undefined, 0x9000n))).toEqual({
        kind: "address",
        address: 0x8fecn,
      });
    });

    it("should fail when the frame base needs a target", () => {
      const error = errorOf(image.variableLocation(at("x"), 0x1020n));
      expect(error.code).toBe("MalformedExpression");
      expect(error.message).toBe("malformed expression at 0: no call frame CFA");
    });

    it("should pick the location list entry for the pc", () => {
      const target = pausedTarget();
      expect(unwrap(image.variableLocation(at("y"), 0x1008n, target))).toEqual({ kind: "register", register: 0 });
      expect(unwrap(image.variableLocation(at("y"), 0x1020n, target))).toEqual({
        kind: "address",
        address: 0x7fe8n,
      });
    });

    it("should report a pc outside the location list", () => {
      const error = errorOf(image.variableLocation(at("y"), 0x1050n, pausedTarget()));
      expect(error.code).toBe("NoLocationAtPc");
      expect(error.offset).toBe(at("y"));
    });

    it("should give a constant value as a value location", () => {
      expect(unwrap(image.variableLocation(at("k"), 0x1000n))).toEqual({ kind: "value", value: 42n });
    });

    it("should give an empty location without DW_AT_location", () => {
      expect(unwrap(image.variableLocation(at("gone"), 0x1000n))).toEqual({ kind: "empty" });
    });

    it("should not evaluate the frame base when the expression does not use it", () => {
      expect(unwrap(image.variableLocation(at("inner"), 0x1018n))).toEqual({ kind: "address", address: 0x4000n });
    });

    it("should report an unknown DIE", () => {
      expect(errorOf(image.variableLocation(0x9999, 0x1000n)).code).toBe("NotFound");
    });
  });

  describe("lineForAddress", () => {
    it("should give the row at or below the pc", () => {
      expect(unwrap(image.lineForAddress(0x1015n))).toEqual({
        file: "/work/main.c",
        line: 5,
        column: 0,
        address: 0x1010n,
      });
    });

    it("should treat the end of a sequence as outside it", () => {
      expect(errorOf(image.lineForAddress(0x1060n)).code).toBe("NotFound");
      expect(errorOf(image.lineForAddress(0x2000n)).message).toBe("line for address 0x2000 not found");
    });
  });

  describe("addressForLine", () => {
    it("should match a file by its trailing path components", () => {
      expect(unwrap(image.addressForLine("main.c", 15))).toEqual([0x1040n]);
      expect(unwrap(image.addressForLine("/work/main.c", 3))).toEqual([0x1000n]);
    });

    it("should give no addresses for a line without code", () => {
      expect(unwrap(image.addressForLine("main.c", 99))).toEqual([]);
      expect(unwrap(image.addressForLine("ain.c", 15))).toEqual([]);
    });
  });

  describe("unwindAt", () => {
    it("should give the row covering the pc", () => {
      expect(formatUnwindRow(unwrap(image.unwindAt(0x1002n)))).toBe("0x1001..0x1004 cfa=r7+16 r6=c-16 r16=c-8");
      expect(formatUnwindRow(unwrap(image.unwindAt(0x1010n)))).toBe("0x1004..0x1040 cfa=r6+16 r6=c-16 r16=c-8");
    });

    it("should report a pc no FDE covers", () => {
      const error = errorOf(image.unwindAt(0x3000n));
      expect(error.code).toBe("NotFound");
      expect(error.section).toBe(".debug_frame");
    });
  });

  describe("callerFrame", () => {
    it("should recover the caller's CFA and return address", () => {
      const frame = unwrap(image.callerFrame(0x1010n, pausedTarget()));
      expect(frame.cfa).toBe(0x7ff0n);
      expect(frame.registers.get(6)).toBe(0x7ff8n);
      expect(frame.return_address).toBe(0x401234n);
    });
  });

  describe("functionAt", () => {
    it("should find the subprogram covering the pc", () => {
      const fn = unwrap(image.functionAt(0x1018n));
      expect(fn.offset).toBe(at("main"));
      expect(fn.name).toBe("main");
      expect(fn.ranges).toEqual([{ low_pc: 0x1000n, high_pc: 0x1040n }]);
    });

    it("should name a definition through its specification", () => {
      const fn = unwrap(image.functionAt(0x1045n));
      expect(fn.offset).toBe(at("impl"));
      expect(fn.name).toBe("helper");
    });

    it("should report a pc in no subprogram", () => {
      expect(errorOf(image.functionAt(0x1080n)).code).toBe("NotFound");
      expect(errorOf(image.functionAt(0x5000n)).message).toBe("function at 0x5000 not found");
    });
  });

  describe("lineTableFor", () => {
    it("should give the table of a unit", () => {
      expect(unwrap(image.lineTableFor(info.unitOffsets[0])).fileName(1)).toBe("/work/main.c");
    });

    it("should report a unit without one", () => {
      expect(errorOf(image.lineTableFor(0x77)).code).toBe("NotFound");
    });
  });
});

describe("DebugImage failures", () => {
  it("should keep answering when another unit fails to decode", () => {
    const info = assemble(0, true);
    const image = imageFor(info);

    expect(image.units).toHaveLength(1);
    expect(image.failures).toHaveLength(1);
    expect(image.failures[0].offset).toBe(info.unitOffsets[1]);
    expect(image.failures[0].error.code).toBe("UnsupportedVersion");
    expect(unwrap(image.lineForAddress(0x1000n)).line).toBe(3);
  });

  it("should record a line program that cannot be decoded", () => {
    const image = imageFor(assemble(0x200));

    expect(image.failures).toHaveLength(1);
    expect(image.failures[0].section).toBe(".debug_line");
    expect(image.failures[0].offset).toBe(0x200);
    expect(image.failures[0].error.code).toBe("MalformedLineProgram");
    expect(errorOf(image.lineForAddress(0x1000n)).code).toBe("NotFound");
  });
});

describe("DebugImage.fromElf", () => {
  it("should load the DWARF sections of an ELF image", () => {
    const info = assemble();
    const elf = assembleElf([
      { name: ".text", data: Buffer.alloc(16) },
      { name: ".debug_info", data: info.info },
      { name: ".debug_abbrev", data: info.abbrev },
      { name: ".debug_line", data: line },
      { name: ".debug_frame", data: frame },
    ]);
    const image = DebugImage.fromElf(elf);

    expect(image.options.littleEndian).toBe(true);
    expect(image.failures).toEqual([]);
    expect(unwrap(image.lineForAddress(0x1040n)).line).toBe(15);
    expect(unwrap(image.functionAt(0x1000n)).name).toBe("main");
  });
});
