import { OffsetBuffer, decodeUnsigned } from "./buffer";
import { DwarfError } from "./errors";

/**
 * Live access to a paused target. Both calls are synchronous; the target
 * must stay suspended for the whole evaluation.
 */
export interface TargetAccess {
  readRegister(register: number): bigint;
  readMemory(address: bigint, length: number): Uint8Array;
}

export type Location =
  | { kind: "address"; address: bigint }
  | { kind: "register"; register: number }
  | { kind: "value"; value: bigint }
  | { kind: "implicit"; data: Buffer }
  | { kind: "empty" }
  | { kind: "pieces"; pieces: Piece[] };

export type SimpleLocation = Exclude<Location, { kind: "pieces" }>;

export interface Piece {
  location: SimpleLocation;
  bit_size: number;
  bit_offset: number;
}

export interface ExpressionFormat {
  address_size: number;
  offset_size?: 4 | 8;
  littleEndian?: boolean;
}

export interface EvaluationContext extends ExpressionFormat {
  target?: TargetAccess;
  frameBase?: bigint;
  callFrameCfa?: bigint;
  objectAddress?: bigint;
  initialStack?: bigint[];
  maxSteps?: number;
  /** .debug_info offset of the unit, for DW_OP_call2/DW_OP_call4. */
  unitOffset?: number;
  /** Location expression of the DIE at an absolute .debug_info offset. */
  procedure?: (dieOffset: number) => Buffer | undefined;
}

export interface Operation {
  offset: number;
  opcode: number;
  name: string;
  operands: bigint[];
  block?: Buffer;
}

type OperandShape =
  | "u8"
  | "s8"
  | "u16"
  | "s16"
  | "u32"
  | "s32"
  | "u64"
  | "s64"
  | "uleb"
  | "sleb"
  | "addr"
  | "offset"
  | "block";

interface OpcodeInfo {
  name: string;
  operands: readonly OperandShape[];
}

export const DW_OP = {
  addr: 0x03,
  deref: 0x06,
  const1u: 0x08,
  const1s: 0x09,
  const2u: 0x0a,
  const2s: 0x0b,
  const4u: 0x0c,
  const4s: 0x0d,
  const8u: 0x0e,
  const8s: 0x0f,
  constu: 0x10,
  consts: 0x11,
  dup: 0x12,
  drop: 0x13,
  over: 0x14,
  pick: 0x15,
  swap: 0x16,
  rot: 0x17,
  xderef: 0x18,
  abs: 0x19,
  and: 0x1a,
  div: 0x1b,
  minus: 0x1c,
  mod: 0x1d,
  mul: 0x1e,
  neg: 0x1f,
  not: 0x20,
  or: 0x21,
  plus: 0x22,
  plus_uconst: 0x23,
  shl: 0x24,
  shr: 0x25,
  shra: 0x26,
  xor: 0x27,
  bra: 0x28,
  eq: 0x29,
  ge: 0x2a,
  gt: 0x2b,
  le: 0x2c,
  lt: 0x2d,
  ne: 0x2e,
  skip: 0x2f,
  lit0: 0x30,
  reg0: 0x50,
  breg0: 0x70,
  regx: 0x90,
  fbreg: 0x91,
  bregx: 0x92,
  piece: 0x93,
  deref_size: 0x94,
  xderef_size: 0x95,
  nop: 0x96,
  push_object_address: 0x97,
  call2: 0x98,
  call4: 0x99,
  call_ref: 0x9a,
  call_frame_cfa: 0x9c,
  bit_piece: 0x9d,
  implicit_value: 0x9e,
  stack_value: 0x9f,
} as const;

const OPCODES = new Map<number, OpcodeInfo>();
for (const [name, opcode] of Object.entries(DW_OP)) {
  OPCODES.set(opcode, { name: `DW_OP_${name}`, operands: [] });
}
const OPERANDS: [number, readonly OperandShape[]][] = [
  [DW_OP.addr, ["addr"]],
  [DW_OP.const1u, ["u8"]],
  [DW_OP.const1s, ["s8"]],
  [DW_OP.const2u, ["u16"]],
  [DW_OP.const2s, ["s16"]],
  [DW_OP.const4u, ["u32"]],
  [DW_OP.const4s, ["s32"]],
  [DW_OP.const8u, ["u64"]],
  [DW_OP.const8s, ["s64"]],
  [DW_OP.constu, ["uleb"]],
  [DW_OP.consts, ["sleb"]],
  [DW_OP.pick, ["u8"]],
  [DW_OP.plus_uconst, ["uleb"]],
  [DW_OP.bra, ["s16"]],
  [DW_OP.skip, ["s16"]],
  [DW_OP.regx, ["uleb"]],
  [DW_OP.fbreg, ["sleb"]],
  [DW_OP.bregx, ["uleb", "sleb"]],
  [DW_OP.piece, ["uleb"]],
  [DW_OP.deref_size, ["u8"]],
  [DW_OP.xderef_size, ["u8"]],
  [DW_OP.call2, ["u16"]],
  [DW_OP.call4, ["u32"]],
  [DW_OP.call_ref, ["offset"]],
  [DW_OP.bit_piece, ["uleb", "uleb"]],
  [DW_OP.implicit_value, ["block"]],
];
for (const [opcode, operands] of OPERANDS) {
  const info = OPCODES.get(opcode);
  if (info) info.operands = operands;
}
for (let n = 0; n < 32; n++) {
  OPCODES.set(DW_OP.lit0 + n, { name: `DW_OP_lit${n}`, operands: [] });
  OPCODES.set(DW_OP.reg0 + n, { name: `DW_OP_reg${n}`, operands: [] });
  OPCODES.set(DW_OP.breg0 + n, { name: `DW_OP_breg${n}`, operands: ["sleb"] });
}

const MAX_CALL_DEPTH = 64;

/**
 * Decodes an expression block into its operations. Unknown opcodes are
 * rejected here, before anything touches the target.
 */
export function decodeExpression(
  bytes: Buffer,
  format: ExpressionFormat
): Operation[] {
  const o_buffer = new OffsetBuffer(bytes, 0, bytes.length, format.littleEndian ?? true);
  const ops: Operation[] = [];

  try {
    while (!o_buffer.atEnd()) {
      const offset = o_buffer.tell();
      const opcode = o_buffer.readUInt8();
      const info = OPCODES.get(opcode);
      if (!info) {
        throw DwarfError.unknownOpcode(opcode, offset);
      }

      const op: Operation = { offset, opcode, name: info.name, operands: [] };
      for (const shape of info.operands) {
        switch (shape) {
          case "u8":
            op.operands.push(o_buffer.readUnsigned(1));
            break;
          case "s8":
            op.operands.push(o_buffer.readSigned(1));
            break;
          case "u16":
            op.operands.push(o_buffer.readUnsigned(2));
            break;
          case "s16":
            op.operands.push(o_buffer.readSigned(2));
            break;
          case "u32":
            op.operands.push(o_buffer.readUnsigned(4));
            break;
          case "s32":
            op.operands.push(o_buffer.readSigned(4));
            break;
          case "u64":
            op.operands.push(o_buffer.readUnsigned(8));
            break;
          case "s64":
            op.operands.push(o_buffer.readSigned(8));
            break;
          case "uleb":
            op.operands.push(o_buffer.readUleb128Big());
            break;
          case "sleb":
            op.operands.push(o_buffer.readSleb128Big());
            break;
          case "addr":
            op.operands.push(o_buffer.readAddress(format.address_size));
            break;
          case "offset":
            op.operands.push(o_buffer.readUnsigned(format.offset_size ?? 4));
            break;
          case "block": {
            const length = o_buffer.readUleb128();
            op.operands.push(BigInt(length));
            op.block = o_buffer.subarray(length);
            break;
          }
        }
      }
      ops.push(op);
    }
  } catch (error) {
    throw DwarfError.wrap(error, "MalformedExpression", "operand runs past the end of the expression", {
      offset: o_buffer.tell(),
    });
  }

  return ops;
}

// Targets with an evaluation in progress.
const inFlight = new WeakSet<TargetAccess>();

/**
 * Runs a location expression to completion. The result is the top of the
 * stack as an address unless the expression produced a register, value,
 * implicit or piece location.
 */
export function evaluateExpression(
  bytes: Buffer,
  ctx: EvaluationContext
): Location {
  const { target } = ctx;
  if (target) {
    if (inFlight.has(target)) {
      throw DwarfError.reentrantEvaluation();
    }
    inFlight.add(target);
  }
  try {
    return new ExpressionMachine(ctx).run(decodeExpression(bytes, ctx), bytes.length);
  } finally {
    if (target) inFlight.delete(target);
  }
}

class ExpressionMachine {
  private readonly stack: bigint[];
  private readonly pieces: Piece[] = [];
  private pending: SimpleLocation | undefined;
  private readonly bits: number;
  private readonly budget: number;
  private steps = 0;
  private depth = 0;

  constructor(private readonly ctx: EvaluationContext) {
    this.bits = ctx.address_size * 8;
    this.budget = ctx.maxSteps ?? 10_000;
    this.stack = (ctx.initialStack ?? []).map((value) => this.wrap(value));
  }

  run(ops: Operation[], length: number): Location {
    this.execute(ops, length);

    if (this.pieces.length > 0) {
      if (this.pending) {
        throw DwarfError.malformedExpression("location after the last piece", length);
      }
      return { kind: "pieces", pieces: this.pieces };
    }
    if (this.pending) {
      return this.pending;
    }
    const top = this.stack.pop();
    if (top === undefined) {
      if (ops.length === 0) {
        return { kind: "empty" };
      }
      throw DwarfError.stackUnderflow("result", length);
    }
    return { kind: "address", address: top };
  }

  private wrap(value: bigint) {
    return BigInt.asUintN(this.bits, value);
  }

  private signed(value: bigint) {
    return BigInt.asIntN(this.bits, value);
  }

  private pop(op: Operation): bigint {
    const value = this.stack.pop();
    if (value === undefined) {
      throw DwarfError.stackUnderflow(op.name, op.offset);
    }
    return value;
  }

  private push(value: bigint) {
    this.stack.push(this.wrap(value));
  }

  private peek(op: Operation, depth: number): bigint {
    const value = this.stack[this.stack.length - 1 - depth];
    if (depth < 0 || value === undefined) {
      throw DwarfError.stackUnderflow(op.name, op.offset);
    }
    return value;
  }

  private target(op: Operation): TargetAccess {
    if (!this.ctx.target) {
      throw DwarfError.malformedExpression(`${op.name} needs a live target`, op.offset);
    }
    return this.ctx.target;
  }

  private readRegister(op: Operation, register: number): bigint {
    return this.target(op).readRegister(register);
  }

  private readMemory(op: Operation, address: bigint, size: number): bigint {
    if (size < 1 || size > this.ctx.address_size) {
      throw DwarfError.malformedExpression(`${op.name} of ${size} bytes`, op.offset);
    }
    const bytes = this.target(op).readMemory(address, size);
    if (bytes.length < size) {
      throw DwarfError.malformedExpression(
        `short read of ${bytes.length}/${size} bytes at 0x${address.toString(16)}`,
        op.offset
      );
    }
    return decodeUnsigned(bytes.subarray(0, size), this.ctx.littleEndian ?? true);
  }

  private binary(op: Operation, fn: (a: bigint, b: bigint) => bigint) {
    const b = this.pop(op);
    const a = this.pop(op);
    this.push(fn(a, b));
  }

  private compare(op: Operation, fn: (a: bigint, b: bigint) => boolean) {
    const b = this.signed(this.pop(op));
    const a = this.signed(this.pop(op));
    this.push(fn(a, b) ? 1n : 0n);
  }

  private addPiece(bit_size: number, bit_offset: number) {
    let location: SimpleLocation;
    if (this.pending) {
      location = this.pending;
      this.pending = undefined;
    } else {
      const top = this.stack.pop();
      location = top === undefined ? { kind: "empty" } : { kind: "address", address: top };
    }
    this.pieces.push({ location, bit_size, bit_offset });
  }

  private execute(ops: Operation[], length: number) {
    const index = new Map(ops.map((op, i) => [op.offset, i]));
    let pc = 0;

    while (pc < ops.length) {
      const op = ops[pc];
      pc += 1;
      if (++this.steps > this.budget) {
        throw DwarfError.instructionBudgetExceeded(this.budget, op.offset);
      }
      if (
        this.pending &&
        op.opcode !== DW_OP.piece &&
        op.opcode !== DW_OP.bit_piece
      ) {
        throw DwarfError.malformedExpression(
          `${this.pending.kind} location must end the expression or precede a piece`,
          op.offset
        );
      }

      const [first = 0n, second = 0n] = op.operands;

      if (op.opcode >= DW_OP.lit0 && op.opcode < DW_OP.lit0 + 32) {
        this.push(BigInt(op.opcode - DW_OP.lit0));
        continue;
      }
      if (op.opcode >= DW_OP.reg0 && op.opcode < DW_OP.reg0 + 32) {
        this.pending = { kind: "register", register: op.opcode - DW_OP.reg0 };
        continue;
      }
      if (op.opcode >= DW_OP.breg0 && op.opcode < DW_OP.breg0 + 32) {
        this.push(this.readRegister(op, op.opcode - DW_OP.breg0) + first);
        continue;
      }

      switch (op.opcode) {
        case DW_OP.addr:
        case DW_OP.const1u:
        case DW_OP.const1s:
        case DW_OP.const2u:
        case DW_OP.const2s:
        case DW_OP.const4u:
        case DW_OP.const4s:
        case DW_OP.const8u:
        case DW_OP.const8s:
        case DW_OP.constu:
        case DW_OP.consts:
          this.push(first);
          break;
        case DW_OP.regx:
          this.pending = { kind: "register", register: Number(first) };
          break;
        case DW_OP.bregx:
          this.push(this.readRegister(op, Number(first)) + second);
          break;
        case DW_OP.fbreg:
          if (this.ctx.frameBase === undefined) {
            throw DwarfError.malformedExpression("DW_OP_fbreg without a frame base", op.offset);
          }
          this.push(this.ctx.frameBase + first);
          break;
        case DW_OP.dup:
          this.push(this.peek(op, 0));
          break;
        case DW_OP.drop:
          this.pop(op);
          break;
        case DW_OP.over:
          this.push(this.peek(op, 1));
          break;
        case DW_OP.pick:
          this.push(this.peek(op, Number(first)));
          break;
        case DW_OP.swap: {
          const a = this.pop(op);
          const b = this.pop(op);
          this.push(a);
          this.push(b);
          break;
        }
        case DW_OP.rot: {
          const a = this.pop(op);
          const b = this.pop(op);
          const c = this.pop(op);
          this.push(a);
          this.push(c);
          this.push(b);
          break;
        }
        case DW_OP.deref:
          this.push(this.readMemory(op, this.pop(op), this.ctx.address_size));
          break;
        case DW_OP.deref_size:
          this.push(this.readMemory(op, this.pop(op), Number(first)));
          break;
        case DW_OP.xderef:
        case DW_OP.xderef_size: {
          const address = this.pop(op);
          // Address space identifier; targets expose a single space.
          this.pop(op);
          const size = op.opcode === DW_OP.xderef ? this.ctx.address_size : Number(first);
          this.push(this.readMemory(op, address, size));
          break;
        }
        case DW_OP.abs: {
          const value = this.signed(this.pop(op));
          this.push(value < 0n ? -value : value);
          break;
        }
        case DW_OP.and:
          this.binary(op, (a, b) => a & b);
          break;
        case DW_OP.or:
          this.binary(op, (a, b) => a | b);
          break;
        case DW_OP.xor:
          this.binary(op, (a, b) => a ^ b);
          break;
        case DW_OP.div:
          this.binary(op, (a, b) => {
            if (b === 0n) throw DwarfError.divisionByZero(op.name, op.offset);
            return this.signed(a) / this.signed(b);
          });
          break;
        case DW_OP.mod:
          this.binary(op, (a, b) => {
            if (b === 0n) throw DwarfError.divisionByZero(op.name, op.offset);
            return a % b;
          });
          break;
        case DW_OP.minus:
          this.binary(op, (a, b) => a - b);
          break;
        case DW_OP.mul:
          this.binary(op, (a, b) => a * b);
          break;
        case DW_OP.plus:
          this.binary(op, (a, b) => a + b);
          break;
        case DW_OP.plus_uconst:
          this.push(this.pop(op) + first);
          break;
        case DW_OP.neg:
          this.push(-this.pop(op));
          break;
        case DW_OP.not:
          this.push(~this.pop(op));
          break;
        case DW_OP.shl:
          this.binary(op, (a, b) => (b >= BigInt(this.bits) ? 0n : a << b));
          break;
        case DW_OP.shr:
          this.binary(op, (a, b) => (b >= BigInt(this.bits) ? 0n : a >> b));
          break;
        case DW_OP.shra:
          this.binary(op, (a, b) => {
            const shift = b >= BigInt(this.bits) ? BigInt(this.bits - 1) : b;
            return this.signed(a) >> shift;
          });
          break;
        case DW_OP.eq:
          this.compare(op, (a, b) => a === b);
          break;
        case DW_OP.ne:
          this.compare(op, (a, b) => a !== b);
          break;
        case DW_OP.ge:
          this.compare(op, (a, b) => a >= b);
          break;
        case DW_OP.gt:
          this.compare(op, (a, b) => a > b);
          break;
        case DW_OP.le:
          this.compare(op, (a, b) => a <= b);
          break;
        case DW_OP.lt:
          this.compare(op, (a, b) => a < b);
          break;
        case DW_OP.skip:
        case DW_OP.bra: {
          if (op.opcode === DW_OP.bra && this.pop(op) === 0n) {
            break;
          }
          // Measured from the end of the 2-byte operand.
          const destination = op.offset + 3 + Number(first);
          if (destination === length) {
            pc = ops.length;
            break;
          }
          const next = index.get(destination);
          if (next === undefined) {
            throw DwarfError.malformedExpression(
              `${op.name} to ${destination} is not an instruction boundary`,
              op.offset
            );
          }
          pc = next;
          break;
        }
        case DW_OP.piece:
          this.addPiece(Number(first) * 8, 0);
          break;
        case DW_OP.bit_piece:
          this.addPiece(Number(first), Number(second));
          break;
        case DW_OP.stack_value:
          this.pending = { kind: "value", value: this.pop(op) };
          break;
        case DW_OP.implicit_value:
          this.pending = { kind: "implicit", data: op.block ?? Buffer.alloc(0) };
          break;
        case DW_OP.nop:
          break;
        case DW_OP.push_object_address:
          if (this.ctx.objectAddress === undefined) {
            throw DwarfError.malformedExpression("no object address", op.offset);
          }
          this.push(this.ctx.objectAddress);
          break;
        case DW_OP.call_frame_cfa:
          if (this.ctx.callFrameCfa === undefined) {
            throw DwarfError.malformedExpression("no call frame CFA", op.offset);
          }
          this.push(this.ctx.callFrameCfa);
          break;
        case DW_OP.call2:
        case DW_OP.call4:
        case DW_OP.call_ref:
          this.call(op, first);
          break;
        default:
          throw DwarfError.unknownOpcode(op.opcode, op.offset);
      }
    }
  }

  private call(op: Operation, operand: bigint) {
    const { procedure, unitOffset = 0 } = this.ctx;
    const dieOffset =
      op.opcode === DW_OP.call_ref ? Number(operand) : unitOffset + Number(operand);
    const body = procedure?.(dieOffset);
    if (!body) {
      throw DwarfError.malformedExpression(
        `${op.name} target 0x${dieOffset.toString(16)} has no location`,
        op.offset
      );
    }
    if (this.depth >= MAX_CALL_DEPTH) {
      throw DwarfError.malformedExpression(`${op.name} nests too deeply`, op.offset);
    }
    this.depth += 1;
    try {
      this.execute(decodeExpression(body, this.ctx), body.length);
    } finally {
      this.depth -= 1;
    }
  }
}
