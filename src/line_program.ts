import { OffsetBuffer, readInitialLength } from "./buffer";
import { DwarfError } from "./errors";

export interface FileEntry {
  name: string;
  dir_index: number;
  mtime: number;
  length: number;
}

export interface LineProgramHeader {
  offset: number;
  unit_length: number;
  offset_size: 4 | 8;
  version: number;
  header_length: number;
  minimum_instruction_length: number;
  maximum_operations_per_instruction: number;
  default_is_stmt: boolean;
  line_base: number;
  line_range: number;
  opcode_base: number;
  /** Operand count of standard opcode `n` at index `n - 1`. */
  standard_opcode_lengths: number[];
  include_directory: string[];
  file_entry: FileEntry[];
  program_start_offset: number;
  program_end_offset: number;
}

export interface LineTableRow {
  address: bigint;
  op_index: number;
  file: number;
  line: number;
  column: number;
  is_stmt: boolean;
  basic_block: boolean;
  end_sequence: boolean;
  prologue_end: boolean;
  epilogue_begin: boolean;
  isa: number;
  discriminator: number;
}

// Line program opcodes
const DW_LNS_copy = 0x01;
const DW_LNS_advance_pc = 0x02;
const DW_LNS_advance_line = 0x03;
const DW_LNS_set_file = 0x04;
const DW_LNS_set_column = 0x05;
const DW_LNS_negate_stmt = 0x06;
const DW_LNS_set_basic_block = 0x07;
const DW_LNS_const_add_pc = 0x08;
const DW_LNS_fixed_advance_pc = 0x09;
const DW_LNS_set_prologue_end = 0x0a;
const DW_LNS_set_epilogue_begin = 0x0b;
const DW_LNS_set_isa = 0x0c;
const DW_LNE_end_sequence = 0x01;
const DW_LNE_set_address = 0x02;
const DW_LNE_define_file = 0x03;
const DW_LNE_set_discriminator = 0x04;

export class LineState implements LineTableRow {
  address = 0n;
  file = 1;
  line = 1;
  column = 0;
  op_index = 0;
  is_stmt: boolean;
  basic_block = false;
  end_sequence = false;
  prologue_end = false;
  epilogue_begin = false;
  isa = 0;
  discriminator = 0;

  constructor(default_is_stmt: boolean) {
    this.is_stmt = default_is_stmt;
  }

  snapshot(): LineTableRow {
    return {
      address: this.address,
      op_index: this.op_index,
      file: this.file,
      line: this.line,
      column: this.column,
      is_stmt: this.is_stmt,
      basic_block: this.basic_block,
      end_sequence: this.end_sequence,
      prologue_end: this.prologue_end,
      epilogue_begin: this.epilogue_begin,
      isa: this.isa,
      discriminator: this.discriminator,
    };
  }
}

export function parseLineProgramHeader(
  data: Buffer,
  offset: number,
  littleEndian = true
): LineProgramHeader {
  const o_buffer = new OffsetBuffer(data, offset, data.length, littleEndian);
  try {
    const { length: unit_length, offset_size } = readInitialLength(o_buffer);
    const program_end_offset = o_buffer.tell() + unit_length;
    if (program_end_offset > data.length) {
      throw DwarfError.malformedLineProgram(
        `unit length ${unit_length} runs past the section`,
        offset
      );
    }

    const version = o_buffer.readUInt16();
    if (version < 2 || version > 4) {
      throw DwarfError.unsupportedVersion(".debug_line", version, offset);
    }
    const header_length = o_buffer.readOffset(offset_size);
    const program_start_offset = o_buffer.tell() + header_length;
    const minimum_instruction_length = o_buffer.readUInt8();
    const maximum_operations_per_instruction = version >= 4 ? o_buffer.readUInt8() : 1;
    const default_is_stmt = o_buffer.readUInt8() !== 0;
    const line_base = o_buffer.readInt8();
    const line_range = o_buffer.readUInt8();
    const opcode_base = o_buffer.readUInt8();
    if (line_range === 0 || opcode_base === 0 || maximum_operations_per_instruction === 0) {
      throw DwarfError.malformedLineProgram(
        "line_range, opcode_base and maximum_operations_per_instruction must be non-zero",
        offset
      );
    }

    const standard_opcode_lengths = [...o_buffer.subarray(opcode_base - 1)];

    const include_directory: string[] = [];
    while (o_buffer.peek() !== 0) {
      include_directory.push(o_buffer.readCString());
    }
    o_buffer.readUInt8();

    const file_entry: FileEntry[] = [];
    while (o_buffer.peek() !== 0) {
      file_entry.push(readFileEntry(o_buffer));
    }
    o_buffer.readUInt8();

    if (program_start_offset > program_end_offset) {
      throw DwarfError.malformedLineProgram("header runs past the unit", offset);
    }

    return {
      offset,
      unit_length,
      offset_size,
      version,
      header_length,
      minimum_instruction_length,
      maximum_operations_per_instruction,
      default_is_stmt,
      line_base,
      line_range,
      opcode_base,
      standard_opcode_lengths,
      include_directory,
      file_entry,
      program_start_offset,
      program_end_offset,
    };
  } catch (error) {
    throw DwarfError.wrap(error, "MalformedLineProgram", "line program header is truncated", {
      offset: o_buffer.tell(),
      section: ".debug_line",
    });
  }
}

function readFileEntry(o_buffer: OffsetBuffer): FileEntry {
  return {
    name: o_buffer.readCString(),
    dir_index: o_buffer.readUleb128(),
    mtime: o_buffer.readUleb128(),
    length: o_buffer.readUleb128(),
  };
}

export interface LineProgram {
  header: LineProgramHeader;
  /** Header files followed by any added with DW_LNE_define_file. */
  files: FileEntry[];
  rows: LineTableRow[];
}

/**
 * Replays the opcodes of one line program. Each row-emitting opcode
 * snapshots the state; DW_LNE_end_sequence emits a final row and resets it.
 */
export function decodeLineProgram(
  data: Buffer,
  header: LineProgramHeader,
  options: { address_size?: number; littleEndian?: boolean; maxSteps?: number } = {}
): LineProgram {
  const rows: LineTableRow[] = [];
  const files = [...header.file_entry];
  const bits = (options.address_size ?? 8) * 8;
  const budget = options.maxSteps ?? 1_000_000;
  const {
    opcode_base,
    line_base,
    line_range,
    minimum_instruction_length,
    maximum_operations_per_instruction,
    standard_opcode_lengths,
  } = header;
  let state = new LineState(header.default_is_stmt);
  let steps = 0;

  function add_entry_new_state() {
    rows.push(state.snapshot());
    state.discriminator = 0;
    state.basic_block = false;
    state.prologue_end = false;
    state.epilogue_begin = false;
  }

  // Follows the recipe in 6.2.5.1 for VLIW op_index.
  function advance(operation_advance: number) {
    const address_addend =
      minimum_instruction_length *
      Math.floor((state.op_index + operation_advance) / maximum_operations_per_instruction);
    state.address = BigInt.asUintN(bits, state.address + BigInt(address_addend));
    state.op_index = (state.op_index + operation_advance) % maximum_operations_per_instruction;
  }

  const o_buffer = new OffsetBuffer(
    data,
    header.program_start_offset,
    header.program_end_offset,
    options.littleEndian ?? true
  );

  try {
    while (!o_buffer.atEnd()) {
      if (++steps > budget) {
        throw DwarfError.instructionBudgetExceeded(budget, o_buffer.tell());
      }
      const opcodeOffset = o_buffer.tell();
      const opcode = o_buffer.readUInt8();

      if (opcode >= opcode_base) {
        // Special opcode
        const adjusted_opcode = opcode - opcode_base;
        advance(Math.floor(adjusted_opcode / line_range));
        state.line += line_base + (adjusted_opcode % line_range);
        add_entry_new_state();
      } else if (opcode === 0) {
        // Extended opcode: start with a zero byte, followed by
        // instruction size and the instruction itself.
        const inst_len = o_buffer.readUleb128();
        const start = o_buffer.tell();
        const end = start + inst_len;
        if (inst_len === 0 || end > header.program_end_offset) {
          throw DwarfError.malformedLineProgram(
            `extended opcode of length ${inst_len} cannot be skipped`,
            opcodeOffset
          );
        }
        const ex_opcode = o_buffer.readUInt8();

        switch (ex_opcode) {
          case DW_LNE_end_sequence:
            state.end_sequence = true;
            add_entry_new_state();
            // reset state
            state = new LineState(header.default_is_stmt);
            break;
          case DW_LNE_set_address: {
            const size = inst_len - 1;
            if (![1, 2, 4, 8].includes(size)) {
              throw DwarfError.malformedLineProgram(
                `DW_LNE_set_address with a ${size}-byte operand`,
                opcodeOffset
              );
            }
            state.address = o_buffer.readAddress(size);
            state.op_index = 0;
            break;
          }
          case DW_LNE_define_file:
            files.push(readFileEntry(o_buffer));
            break;
          case DW_LNE_set_discriminator:
            state.discriminator = o_buffer.readUleb128();
            break;
          default:
            // Vendor opcode; its declared length is trusted.
            o_buffer.seek(end);
        }

        if (o_buffer.tell() !== end) {
          throw DwarfError.malformedLineProgram(
            `extended opcode 0x${ex_opcode.toString(16)} does not match its length ${inst_len}`,
            opcodeOffset
          );
        }
      } else {
        switch (opcode) {
          case DW_LNS_copy:
            add_entry_new_state();
            break;
          case DW_LNS_advance_pc:
            advance(o_buffer.readUleb128());
            break;
          case DW_LNS_advance_line:
            state.line += o_buffer.readSleb128();
            break;
          case DW_LNS_set_file:
            state.file = o_buffer.readUleb128();
            break;
          case DW_LNS_set_column:
            state.column = o_buffer.readUleb128();
            break;
          case DW_LNS_negate_stmt:
            state.is_stmt = !state.is_stmt;
            break;
          case DW_LNS_set_basic_block:
            state.basic_block = true;
            break;
          case DW_LNS_const_add_pc:
            advance(Math.floor((255 - opcode_base) / line_range));
            break;
          case DW_LNS_fixed_advance_pc:
            state.address = BigInt.asUintN(bits, state.address + BigInt(o_buffer.readUInt16()));
            state.op_index = 0;
            break;
          case DW_LNS_set_prologue_end:
            state.prologue_end = true;
            break;
          case DW_LNS_set_epilogue_begin:
            state.epilogue_begin = true;
            break;
          case DW_LNS_set_isa:
            state.isa = o_buffer.readUleb128();
            break;
          default: {
            // Standard opcode this decoder does not know; skip its operands.
            const operands = standard_opcode_lengths[opcode - 1] ?? 0;
            for (let i = 0; i < operands; i++) {
              o_buffer.readUleb128Big();
            }
          }
        }
      }
    }
  } catch (error) {
    throw DwarfError.wrap(error, "MalformedLineProgram", "line program runs past its end", {
      offset: o_buffer.tell(),
      section: ".debug_line",
    });
  }

  return { header, files, rows };
}

export interface LineSequence {
  low_pc: bigint;
  /** Address of the end_sequence row, one past the last instruction. */
  high_pc: bigint;
  rows: LineTableRow[];
}

export interface SourcePosition {
  file: string;
  line: number;
  column: number;
  address: bigint;
}

/**
 * Line rows of one unit grouped into contiguous sequences, with file names
 * resolved against the include directories and the unit's comp_dir.
 */
export class LineTable {
  readonly sequences: LineSequence[];

  constructor(readonly program: LineProgram, readonly comp_dir?: string) {
    const sequences: LineSequence[] = [];
    let current: LineTableRow[] = [];
    for (const row of program.rows) {
      current.push(row);
      if (row.end_sequence) {
        const first = current[0];
        if (current.length > 1 && first.address < row.address) {
          sequences.push({ low_pc: first.address, high_pc: row.address, rows: current });
        }
        current = [];
      }
    }
    // Rows after the last end_sequence cover no address range.
    this.sequences = sequences.sort((a, b) => (a.low_pc < b.low_pc ? -1 : a.low_pc > b.low_pc ? 1 : 0));
  }

  get rows(): LineTableRow[] {
    return this.program.rows;
  }

  fileName(index: number): string | undefined {
    const entry = this.program.files[index - 1];
    if (!entry) {
      return undefined;
    }
    if (entry.name.startsWith("/")) {
      return entry.name;
    }
    let dir =
      entry.dir_index === 0
        ? this.comp_dir
        : this.program.header.include_directory[entry.dir_index - 1];
    if (dir !== undefined && !dir.startsWith("/") && entry.dir_index !== 0 && this.comp_dir) {
      dir = `${this.comp_dir}/${dir}`;
    }
    return dir ? `${dir}/${entry.name}` : entry.name;
  }

  /** Row covering `pc`: the last row at or below it within its sequence. */
  lookup(pc: bigint): LineTableRow | undefined {
    const sequence = this.sequences.find((s) => s.low_pc <= pc && pc < s.high_pc);
    if (!sequence) {
      return undefined;
    }
    let match: LineTableRow | undefined;
    for (const row of sequence.rows) {
      if (row.end_sequence || row.address > pc) {
        break;
      }
      match = row;
    }
    return match;
  }

  position(pc: bigint): SourcePosition | undefined {
    const row = this.lookup(pc);
    if (!row) {
      return undefined;
    }
    return {
      file: this.fileName(row.file) ?? `<file ${row.file}>`,
      line: row.line,
      column: row.column,
      address: row.address,
    };
  }

  /**
   * Statement addresses for `line` of `file`, in ascending order. `file`
   * matches the full path or any trailing run of path components.
   */
  addressesFor(file: string, line: number): bigint[] {
    const addresses = new Set<bigint>();
    for (const sequence of this.sequences) {
      for (const row of sequence.rows) {
        if (row.end_sequence || !row.is_stmt || row.line !== line) {
          continue;
        }
        const name = this.fileName(row.file);
        if (name !== undefined && fileMatches(name, file)) {
          addresses.add(row.address);
        }
      }
    }
    return [...addresses].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }
}

export function fileMatches(path: string, query: string): boolean {
  return path === query || path.endsWith(`/${query}`);
}
