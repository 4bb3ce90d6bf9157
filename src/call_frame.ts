import { OffsetBuffer, decodeUnsigned, readInitialLength } from "./buffer";
import { DecodeFailure, DwarfError } from "./errors";
import { TargetAccess, evaluateExpression } from "./expression";

export type RegisterRule =
  | { kind: "undefined" }
  | { kind: "same_value" }
  /** Saved at CFA + offset. */
  | { kind: "offset"; offset: bigint }
  /** The value is CFA + offset. */
  | { kind: "val_offset"; offset: bigint }
  | { kind: "register"; register: number }
  | { kind: "expression"; expression: Buffer }
  | { kind: "val_expression"; expression: Buffer };

export type CfaRule =
  | { kind: "register_offset"; register: number; offset: bigint }
  | { kind: "expression"; expression: Buffer };

export interface CommonInformationEntry {
  offset: number;
  offset_size: 4 | 8;
  version: number;
  augmentation: string;
  address_size: number;
  segment_size: number;
  code_alignment_factor: number;
  data_alignment_factor: number;
  return_address_register: number;
  initial_instructions: Buffer;
}

export interface FrameDescriptionEntry {
  offset: number;
  cie: CommonInformationEntry;
  initial_location: bigint;
  address_range: bigint;
  instructions: Buffer;
}

export interface UnwindRow {
  low_pc: bigint;
  high_pc: bigint;
  cfa: CfaRule;
  registers: Map<number, RegisterRule>;
  return_address_register: number;
}

export interface CallFrameFormat {
  /** Used for CIEs older than version 4, which do not carry one. */
  address_size: number;
  littleEndian?: boolean;
}

const CIE_ID_32 = 0xffffffffn;
const CIE_ID_64 = 0xffffffffffffffffn;

// Call frame instructions
const DW_CFA_advance_loc = 0x40;
const DW_CFA_offset = 0x80;
const DW_CFA_restore = 0xc0;
const DW_CFA_nop = 0x00;
const DW_CFA_set_loc = 0x01;
const DW_CFA_advance_loc1 = 0x02;
const DW_CFA_advance_loc2 = 0x03;
const DW_CFA_advance_loc4 = 0x04;
const DW_CFA_offset_extended = 0x05;
const DW_CFA_restore_extended = 0x06;
const DW_CFA_undefined = 0x07;
const DW_CFA_same_value = 0x08;
const DW_CFA_register = 0x09;
const DW_CFA_remember_state = 0x0a;
const DW_CFA_restore_state = 0x0b;
const DW_CFA_def_cfa = 0x0c;
const DW_CFA_def_cfa_register = 0x0d;
const DW_CFA_def_cfa_offset = 0x0e;
const DW_CFA_def_cfa_expression = 0x0f;
const DW_CFA_expression = 0x10;
const DW_CFA_offset_extended_sf = 0x11;
const DW_CFA_def_cfa_sf = 0x12;
const DW_CFA_def_cfa_offset_sf = 0x13;
const DW_CFA_val_offset = 0x14;
const DW_CFA_val_offset_sf = 0x15;
const DW_CFA_val_expression = 0x16;
const DW_CFA_GNU_args_size = 0x2e;
const DW_CFA_GNU_negative_offset_extended = 0x2f;

/**
 * Index of a .debug_frame section: every CIE by offset and every FDE in
 * section order. An entry that fails to decode is recorded and skipped.
 */
export interface CallFrameSection {
  cies: Map<number, CommonInformationEntry>;
  fdes: FrameDescriptionEntry[];
  failures: DecodeFailure[];
}

export function parseCallFrameSection(
  data: Buffer,
  format: CallFrameFormat
): CallFrameSection {
  const littleEndian = format.littleEndian ?? true;
  const cies = new Map<number, CommonInformationEntry>();
  const fdes: FrameDescriptionEntry[] = [];
  const failures: DecodeFailure[] = [];

  const cieAt = (offset: number): CommonInformationEntry => {
    let cie = cies.get(offset);
    if (!cie) {
      cie = parseCie(data, offset, format);
      cies.set(offset, cie);
    }
    return cie;
  };

  let offset = 0;
  while (offset < data.length) {
    let next = data.length;
    try {
      const o_buffer = new OffsetBuffer(data, offset, data.length, littleEndian);
      const { length, offset_size } = readInitialLength(o_buffer);
      next = Math.min(o_buffer.tell() + length, data.length);
      if (length === 0) {
        // Padding between entries.
        offset = next;
        continue;
      }
      const id = o_buffer.readUnsigned(offset_size);
      if (id === (offset_size === 8 ? CIE_ID_64 : CIE_ID_32)) {
        cieAt(offset);
      } else {
        fdes.push(parseFde(data, offset, cieAt(Number(id)), littleEndian));
      }
    } catch (error) {
      failures.push({
        section: ".debug_frame",
        offset,
        error: DwarfError.wrap(error, "MalformedCallFrame", `entry at 0x${offset.toString(16)} is truncated`, {
          offset,
          section: ".debug_frame",
        }),
      });
    }
    offset = next;
  }

  return { cies, fdes, failures };
}

export function parseCie(
  data: Buffer,
  offset: number,
  format: CallFrameFormat
): CommonInformationEntry {
  const o_buffer = new OffsetBuffer(data, offset, data.length, format.littleEndian ?? true);
  try {
    const { length, offset_size } = readInitialLength(o_buffer);
    const end = o_buffer.tell() + length;
    const body = new OffsetBuffer(data, o_buffer.tell(), end, format.littleEndian ?? true);
    const id = body.readUnsigned(offset_size);
    if (id !== (offset_size === 8 ? CIE_ID_64 : CIE_ID_32)) {
      throw DwarfError.malformedCallFrame("CIE pointer does not point at a CIE", offset);
    }

    const version = body.readUInt8();
    if (version !== 1 && version !== 3 && version !== 4) {
      throw DwarfError.unsupportedVersion(".debug_frame", version, offset);
    }
    const augmentation = body.readCString();
    if (augmentation !== "" && !augmentation.startsWith("z")) {
      throw DwarfError.malformedCallFrame(`unknown augmentation "${augmentation}"`, offset);
    }
    const address_size = version >= 4 ? body.readUInt8() : format.address_size;
    const segment_size = version >= 4 ? body.readUInt8() : 0;
    const code_alignment_factor = body.readUleb128();
    const data_alignment_factor = body.readSleb128();
    const return_address_register = version === 1 ? body.readUInt8() : body.readUleb128();
    if (augmentation.startsWith("z")) {
      body.skip(body.readUleb128());
    }

    return {
      offset,
      offset_size,
      version,
      augmentation,
      address_size,
      segment_size,
      code_alignment_factor,
      data_alignment_factor,
      return_address_register,
      initial_instructions: body.subarray(end - body.tell()),
    };
  } catch (error) {
    throw DwarfError.wrap(error, "MalformedCallFrame", `CIE at 0x${offset.toString(16)} is truncated`, {
      offset,
      section: ".debug_frame",
    });
  }
}

function parseFde(
  data: Buffer,
  offset: number,
  cie: CommonInformationEntry,
  littleEndian: boolean
): FrameDescriptionEntry {
  const o_buffer = new OffsetBuffer(data, offset, data.length, littleEndian);
  const { length, offset_size } = readInitialLength(o_buffer);
  const end = o_buffer.tell() + length;
  const body = new OffsetBuffer(data, o_buffer.tell(), end, littleEndian);
  body.skip(offset_size);
  body.skip(cie.segment_size);
  const initial_location = body.readAddress(cie.address_size);
  const address_range = body.readAddress(cie.address_size);
  if (cie.augmentation.startsWith("z")) {
    body.skip(body.readUleb128());
  }

  return {
    offset,
    cie,
    initial_location,
    address_range,
    instructions: body.subarray(end - body.tell()),
  };
}

interface RuleState {
  cfa?: CfaRule;
  registers: Map<number, RegisterRule>;
}

function copyState(state: RuleState): RuleState {
  return { cfa: state.cfa, registers: new Map(state.registers) };
}

/**
 * Replays the CIE's initial instructions, then the FDE's, into rows that
 * together cover `[initial_location, initial_location + address_range)`.
 */
export function decodeUnwindRows(
  fde: FrameDescriptionEntry,
  options: { littleEndian?: boolean; maxSteps?: number } = {}
): UnwindRow[] {
  const { cie } = fde;
  const littleEndian = options.littleEndian ?? true;
  const budget = options.maxSteps ?? 100_000;
  const bits = cie.address_size * 8;
  const start = fde.initial_location;
  const end = BigInt.asUintN(bits, start + fde.address_range);
  const caf = BigInt(cie.code_alignment_factor);
  const daf = BigInt(cie.data_alignment_factor);

  const rows: UnwindRow[] = [];
  let state: RuleState = { registers: new Map() };
  let initial: RuleState = { registers: new Map() };
  const stack: RuleState[] = [];
  let loc = start;
  let steps = 0;

  const emit = (next: bigint, at: number) => {
    if (next <= loc) {
      return;
    }
    if (!state.cfa) {
      throw DwarfError.malformedCallFrame("row has no CFA rule", at);
    }
    rows.push({
      low_pc: loc,
      high_pc: next < end ? next : end,
      cfa: state.cfa,
      registers: new Map(state.registers),
      return_address_register: cie.return_address_register,
    });
    loc = next;
  };

  const run = (instructions: Buffer, inCie: boolean, entryOffset: number) => {
    const o_buffer = new OffsetBuffer(instructions, 0, instructions.length, littleEndian);
    try {
      while (!o_buffer.atEnd() && loc < end) {
        if (++steps > budget) {
          throw DwarfError.instructionBudgetExceeded(budget, entryOffset);
        }
        const at = o_buffer.tell();
        const byte = o_buffer.readUInt8();
        const high = byte & 0xc0;
        const low = byte & 0x3f;

        const advance = (delta: bigint) => {
          if (inCie) {
            throw DwarfError.malformedCallFrame("location advance in CIE instructions", entryOffset);
          }
          emit(BigInt.asUintN(bits, loc + delta * caf), entryOffset);
        };
        const restore = (register: number) => {
          const rule = initial.registers.get(register);
          if (rule) {
            state.registers.set(register, rule);
          } else {
            state.registers.delete(register);
          }
        };
        const cfaRegisterOffset = (): { register: number; offset: bigint } => {
          const cfa = state.cfa;
          if (cfa?.kind !== "register_offset") {
            throw DwarfError.malformedCallFrame(
              `instruction 0x${byte.toString(16)} at ${at} needs a register CFA rule`,
              entryOffset
            );
          }
          return cfa;
        };

        if (high === DW_CFA_advance_loc) {
          advance(BigInt(low));
          continue;
        }
        if (high === DW_CFA_offset) {
          state.registers.set(low, { kind: "offset", offset: BigInt(o_buffer.readUleb128()) * daf });
          continue;
        }
        if (high === DW_CFA_restore) {
          restore(low);
          continue;
        }

        switch (byte) {
          case DW_CFA_nop:
            break;
          case DW_CFA_GNU_args_size:
            o_buffer.readUleb128();
            break;
          case DW_CFA_set_loc: {
            const address = o_buffer.readAddress(cie.address_size);
            if (inCie || address < loc) {
              throw DwarfError.malformedCallFrame("DW_CFA_set_loc moves backwards", entryOffset);
            }
            emit(address, entryOffset);
            break;
          }
          case DW_CFA_advance_loc1:
            advance(o_buffer.readUnsigned(1));
            break;
          case DW_CFA_advance_loc2:
            advance(o_buffer.readUnsigned(2));
            break;
          case DW_CFA_advance_loc4:
            advance(o_buffer.readUnsigned(4));
            break;
          case DW_CFA_offset_extended: {
            const register = o_buffer.readUleb128();
            state.registers.set(register, { kind: "offset", offset: o_buffer.readUleb128Big() * daf });
            break;
          }
          case DW_CFA_offset_extended_sf: {
            const register = o_buffer.readUleb128();
            state.registers.set(register, { kind: "offset", offset: o_buffer.readSleb128Big() * daf });
            break;
          }
          case DW_CFA_GNU_negative_offset_extended: {
            const register = o_buffer.readUleb128();
            state.registers.set(register, { kind: "offset", offset: -o_buffer.readUleb128Big() * daf });
            break;
          }
          case DW_CFA_val_offset: {
            const register = o_buffer.readUleb128();
            state.registers.set(register, { kind: "val_offset", offset: o_buffer.readUleb128Big() * daf });
            break;
          }
          case DW_CFA_val_offset_sf: {
            const register = o_buffer.readUleb128();
            state.registers.set(register, { kind: "val_offset", offset: o_buffer.readSleb128Big() * daf });
            break;
          }
          case DW_CFA_restore_extended:
            restore(o_buffer.readUleb128());
            break;
          case DW_CFA_undefined:
            state.registers.set(o_buffer.readUleb128(), { kind: "undefined" });
            break;
          case DW_CFA_same_value:
            state.registers.set(o_buffer.readUleb128(), { kind: "same_value" });
            break;
          case DW_CFA_register: {
            const register = o_buffer.readUleb128();
            state.registers.set(register, { kind: "register", register: o_buffer.readUleb128() });
            break;
          }
          case DW_CFA_remember_state:
            stack.push(copyState(state));
            break;
          case DW_CFA_restore_state: {
            const saved = stack.pop();
            if (!saved) {
              throw DwarfError.malformedCallFrame("DW_CFA_restore_state without a remembered state", entryOffset);
            }
            state = saved;
            break;
          }
          case DW_CFA_def_cfa: {
            const register = o_buffer.readUleb128();
            state.cfa = { kind: "register_offset", register, offset: o_buffer.readUleb128Big() };
            break;
          }
          case DW_CFA_def_cfa_sf: {
            const register = o_buffer.readUleb128();
            state.cfa = { kind: "register_offset", register, offset: o_buffer.readSleb128Big() * daf };
            break;
          }
          case DW_CFA_def_cfa_register: {
            const register = o_buffer.readUleb128();
            state.cfa = { kind: "register_offset", register, offset: cfaRegisterOffset().offset };
            break;
          }
          case DW_CFA_def_cfa_offset: {
            const offset = o_buffer.readUleb128Big();
            state.cfa = { kind: "register_offset", register: cfaRegisterOffset().register, offset };
            break;
          }
          case DW_CFA_def_cfa_offset_sf: {
            const offset = o_buffer.readSleb128Big() * daf;
            state.cfa = { kind: "register_offset", register: cfaRegisterOffset().register, offset };
            break;
          }
          case DW_CFA_def_cfa_expression:
            state.cfa = { kind: "expression", expression: o_buffer.subarray(o_buffer.readUleb128()) };
            break;
          case DW_CFA_expression: {
            const register = o_buffer.readUleb128();
            state.registers.set(register, {
              kind: "expression",
              expression: o_buffer.subarray(o_buffer.readUleb128()),
            });
            break;
          }
          case DW_CFA_val_expression: {
            const register = o_buffer.readUleb128();
            state.registers.set(register, {
              kind: "val_expression",
              expression: o_buffer.subarray(o_buffer.readUleb128()),
            });
            break;
          }
          default:
            throw DwarfError.malformedCallFrame(
              `unknown call frame instruction 0x${byte.toString(16)} at ${at}`,
              entryOffset
            );
        }
      }
    } catch (error) {
      throw DwarfError.wrap(error, "MalformedCallFrame", "call frame instructions run past their entry", {
        offset: entryOffset,
        section: ".debug_frame",
      });
    }
  };

  run(cie.initial_instructions, true, cie.offset);
  initial = copyState(state);
  run(fde.instructions, false, fde.offset);
  emit(end, fde.offset);

  return rows;
}

export interface CallerFrame {
  cfa: bigint;
  /** Recovered caller registers; registers with an undefined rule are absent. */
  registers: Map<number, bigint>;
  return_address?: bigint;
}

/**
 * Applies an unwind row to a paused target. Registers the row does not
 * mention are left out; callers treat them by their ABI convention.
 */
export function recoverCallerFrame(
  row: UnwindRow,
  target: TargetAccess,
  format: { address_size: number; littleEndian?: boolean; maxSteps?: number }
): CallerFrame {
  const littleEndian = format.littleEndian ?? true;
  const bits = format.address_size * 8;
  const ctx = { ...format, littleEndian, target };

  const evaluateAddress = (expression: Buffer, initialStack: bigint[]): bigint => {
    const location = evaluateExpression(expression, { ...ctx, initialStack });
    if (location.kind === "address") return location.address;
    if (location.kind === "value") return location.value;
    throw DwarfError.malformedCallFrame(`expression yields a ${location.kind} location`, 0);
  };
  const load = (address: bigint) =>
    decodeUnsigned(target.readMemory(address, format.address_size), littleEndian);

  const cfa =
    row.cfa.kind === "register_offset"
      ? BigInt.asUintN(bits, target.readRegister(row.cfa.register) + row.cfa.offset)
      : evaluateAddress(row.cfa.expression, []);

  const registers = new Map<number, bigint>();
  for (const [register, rule] of row.registers) {
    switch (rule.kind) {
      case "undefined":
        break;
      case "same_value":
        registers.set(register, target.readRegister(register));
        break;
      case "offset":
        registers.set(register, load(BigInt.asUintN(bits, cfa + rule.offset)));
        break;
      case "val_offset":
        registers.set(register, BigInt.asUintN(bits, cfa + rule.offset));
        break;
      case "register":
        registers.set(register, target.readRegister(rule.register));
        break;
      case "expression":
        registers.set(register, load(evaluateAddress(rule.expression, [cfa])));
        break;
      case "val_expression":
        registers.set(register, evaluateAddress(rule.expression, [cfa]));
        break;
    }
  }

  return { cfa, registers, return_address: registers.get(row.return_address_register) };
}

/** The FDE whose range covers `pc`. */
export function findFde(
  fdes: readonly FrameDescriptionEntry[],
  pc: bigint
): FrameDescriptionEntry | undefined {
  return fdes.find(
    (fde) => fde.initial_location <= pc && pc < fde.initial_location + fde.address_range
  );
}
