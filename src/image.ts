import {
  CallFrameSection,
  CallerFrame,
  UnwindRow,
  decodeUnwindRows,
  findFde,
  parseCallFrameSection,
  recoverCallerFrame,
} from "./call_frame";
import { CompilationUnit, DIE, dieName, flattenDies, parseCompilationUnits } from "./die";
import { readElfSections } from "./elf";
import { DecodeFailure, DwarfError, QueryResult, failed, found } from "./errors";
import {
  DW_OP,
  EvaluationContext,
  Location,
  TargetAccess,
  decodeExpression,
  evaluateExpression,
} from "./expression";
import { AttributeValue } from "./forms";
import { LineTable, SourcePosition, decodeLineProgram, parseLineProgramHeader } from "./line_program";
import { AddressRange, rangesContain, readLocationList, readRangeList, selectLocation } from "./location";
import { DecodeOptions, resolveOptions } from "./options";
import { SectionRange, SectionTable } from "./sections";
import { TypeGraph, TypeNode } from "./type_graph";

export interface FunctionInfo {
  offset: number;
  name?: string;
  /** Covered address ranges, from low_pc/high_pc or DW_AT_ranges. */
  ranges: AddressRange[];
  die: DIE;
}

// Query-time failures become results; anything else is a defect and propagates.
function attempt<T>(query: () => T): QueryResult<T> {
  try {
    return found(query());
  } catch (error) {
    if (error instanceof DwarfError) {
      return failed(error);
    }
    throw error;
  }
}

/**
 * A decoded debug image. Every unit, line program and the call-frame index
 * are decoded once by `load`; afterwards only the type graph's memo table
 * changes.
 */
export class DebugImage {
  readonly units: CompilationUnit[];
  readonly failures: DecodeFailure[];
  readonly types: TypeGraph;
  readonly options: DecodeOptions;
  private readonly dies = new Map<number, DIE>();
  private readonly lineTables = new Map<number, LineTable>();
  private readonly callFrames?: CallFrameSection;

  private constructor(private readonly sections: SectionTable, options: DecodeOptions) {
    this.options = options;
    const { units, failures } = parseCompilationUnits(sections, options.littleEndian);
    this.units = units;
    this.failures = failures;

    for (const unit of units) {
      for (const [offset, die] of unit.dies) {
        this.dies.set(offset, die);
      }
      this.loadLineTable(unit);
    }

    const frame = sections.find(".debug_frame");
    if (frame) {
      this.callFrames = parseCallFrameSection(frame, {
        address_size: units[0]?.address_size ?? 8,
        littleEndian: options.littleEndian,
      });
      this.failures.push(...this.callFrames.failures);
    }

    this.types = new TypeGraph((offset) => this.dies.get(offset), {
      littleEndian: options.littleEndian,
      maxExpressionSteps: options.maxExpressionSteps,
    });
  }

  static load(ranges: readonly SectionRange[], options: Partial<DecodeOptions> = {}): DebugImage {
    return new DebugImage(new SectionTable(ranges), resolveOptions(options));
  }

  /** Loads the DWARF sections of an ELF image, in the image's byte order. */
  static fromElf(buffer: Buffer, options: Partial<DecodeOptions> = {}): DebugImage {
    const elf = readElfSections(buffer);
    return DebugImage.load(elf.debugSections, { ...options, littleEndian: elf.littleEndian });
  }

  private loadLineTable(unit: CompilationUnit) {
    const stmt_list = unit.top_level_die.attributes.get("DW_AT_stmt_list");
    if (stmt_list?.class !== "sec_offset") {
      return;
    }
    try {
      const data = this.sections.get(".debug_line");
      const header = parseLineProgramHeader(data, stmt_list.value, this.options.littleEndian);
      const program = decodeLineProgram(data, header, {
        address_size: unit.address_size,
        littleEndian: this.options.littleEndian,
        maxSteps: this.options.maxLineProgramSteps,
      });
      this.lineTables.set(unit.offset, new LineTable(program, stringAttr(unit.top_level_die, "DW_AT_comp_dir")));
    } catch (error) {
      if (!(error instanceof DwarfError)) {
        throw error;
      }
      this.failures.push({ section: ".debug_line", offset: stmt_list.value, error });
    }
  }

  dieAt(offset: number): QueryResult<DIE> {
    return attempt(() => this.requireDie(offset));
  }

  lineTableFor(unitOffset: number): QueryResult<LineTable> {
    const table = this.lineTables.get(unitOffset);
    return table
      ? found(table)
      : failed(DwarfError.notFound(`line table of unit 0x${unitOffset.toString(16)}`, { offset: unitOffset }));
  }

  resolveType(dieOffset: number): QueryResult<TypeNode> {
    return attempt(() => this.types.typeOf(dieOffset));
  }

  /**
   * Location of a variable or parameter at `pc`. Without `frameBase`, an
   * expression using DW_OP_fbreg gets the enclosing subprogram's
   * DW_AT_frame_base.
   */
  variableLocation(
    dieOffset: number,
    pc: bigint,
    target?: TargetAccess,
    frameBase?: bigint
  ): QueryResult<Location> {
    return attempt(() => {
      const die = this.requireDie(dieOffset);

      const constant = die.attributes.get("DW_AT_const_value");
      if (constant) {
        return constantLocation(constant, die);
      }

      const expression = this.expressionAt(die, "DW_AT_location", pc);
      if (!expression) {
        return { kind: "empty" };
      }

      let base = frameBase;
      if (base === undefined && this.usesOpcode(expression, die, DW_OP.fbreg)) {
        base = this.frameBaseOf(die, pc, target);
      }
      return evaluateExpression(expression, this.evaluationContext(die, pc, expression, target, base));
    });
  }

  lineForAddress(pc: bigint): QueryResult<SourcePosition> {
    for (const table of this.lineTables.values()) {
      const position = table.position(pc);
      if (position) {
        return found(position);
      }
    }
    return failed(DwarfError.notFound(`line for address 0x${pc.toString(16)}`, { pc }));
  }

  /** Statement addresses of `file:line` across every unit, ascending. */
  addressForLine(file: string, line: number): QueryResult<bigint[]> {
    const addresses = new Set<bigint>();
    for (const table of this.lineTables.values()) {
      for (const address of table.addressesFor(file, line)) {
        addresses.add(address);
      }
    }
    return found([...addresses].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0)));
  }

  unwindAt(pc: bigint): QueryResult<UnwindRow> {
    return attempt(() => this.requireUnwindRow(pc));
  }

  /** The caller's CFA and saved registers, for a target paused at `pc`. */
  callerFrame(pc: bigint, target: TargetAccess): QueryResult<CallerFrame> {
    return attempt(() =>
      recoverCallerFrame(this.requireUnwindRow(pc), target, {
        address_size: this.addressSize(),
        littleEndian: this.options.littleEndian,
        maxSteps: this.options.maxExpressionSteps,
      })
    );
  }

  /** Innermost subprogram whose code covers `pc`. */
  functionAt(pc: bigint): QueryResult<FunctionInfo> {
    return attempt(() => {
      for (const unit of this.units) {
        // Quick check if DW_TAG_compile_unit covers our address
        const unitRanges = this.rangesOf(unit.top_level_die);
        if (unitRanges.length > 0 && !rangesContain(unitRanges, pc)) {
          continue;
        }

        let match: FunctionInfo | undefined;
        for (const die of flattenDies([unit.top_level_die])) {
          if (die.tag !== "DW_TAG_subprogram") continue;
          const ranges = this.rangesOf(die);
          if (rangesContain(ranges, pc)) {
            match = { offset: die.offset, name: this.functionName(die), ranges, die };
          }
        }
        if (match) {
          return match;
        }
      }
      throw DwarfError.notFound(`function at 0x${pc.toString(16)}`, { pc });
    });
  }

  private requireDie(offset: number): DIE {
    const die = this.dies.get(offset);
    if (!die) {
      throw DwarfError.notFound(`DIE at 0x${offset.toString(16)}`, { offset, section: ".debug_info" });
    }
    return die;
  }

  private requireUnwindRow(pc: bigint): UnwindRow {
    const fde = this.callFrames && findFde(this.callFrames.fdes, pc);
    if (!fde) {
      throw DwarfError.notFound(`unwind row for 0x${pc.toString(16)}`, { pc, section: ".debug_frame" });
    }
    const rows = decodeUnwindRows(fde, {
      littleEndian: this.options.littleEndian,
      maxSteps: this.options.maxCallFrameSteps,
    });
    const row = rows.find((r) => r.low_pc <= pc && pc < r.high_pc);
    if (!row) {
      throw DwarfError.notFound(`unwind row for 0x${pc.toString(16)}`, { pc, offset: fde.offset, section: ".debug_frame" });
    }
    return row;
  }

  private addressSize() {
    return this.units[0]?.address_size ?? 8;
  }

  // Unit base address for location and range lists.
  private baseAddress(die: DIE): bigint {
    const root = this.dies.get(die.unit.die_offset);
    const low_pc = root?.attributes.get("DW_AT_low_pc");
    return low_pc?.class === "address" ? low_pc.value : 0n;
  }

  // Expression bytes of an exprloc attribute, or the location list entry at `pc`.
  private expressionAt(die: DIE, name: "DW_AT_location" | "DW_AT_frame_base", pc: bigint): Buffer | undefined {
    const value = die.attributes.get(name);
    if (!value) {
      return undefined;
    }
    if (value.class === "exprloc" || value.class === "block") {
      return value.value;
    }
    if (value.class === "sec_offset") {
      const list = readLocationList(this.sections.get(".debug_loc"), value.value, {
        address_size: die.unit.address_size,
        base_address: this.baseAddress(die),
        littleEndian: this.options.littleEndian,
      });
      return selectLocation(list, pc, die.offset).expression;
    }
    throw DwarfError.illegalForm(name, value.form, die.unit.version, die.offset);
  }

  private frameBaseOf(die: DIE, pc: bigint, target?: TargetAccess): bigint | undefined {
    let scope = die.parent;
    while (scope && scope.tag !== "DW_TAG_subprogram") {
      scope = scope.parent;
    }
    if (!scope) {
      return undefined;
    }
    const expression = this.expressionAt(scope, "DW_AT_frame_base", pc);
    if (!expression) {
      return undefined;
    }

    const location = evaluateExpression(expression, this.evaluationContext(scope, pc, expression, target, undefined));
    switch (location.kind) {
      case "address":
        return location.address;
      case "value":
        return location.value;
      case "register":
        // DW_OP_regN as a frame base names the register holding it.
        if (!target) {
          throw DwarfError.malformedExpression("frame base register needs a live target", 0);
        }
        return target.readRegister(location.register);
      default:
        throw DwarfError.malformedExpression(`frame base is a ${location.kind} location`, 0);
    }
  }

  private evaluationContext(
    die: DIE,
    pc: bigint,
    expression: Buffer,
    target: TargetAccess | undefined,
    frameBase: bigint | undefined
  ): EvaluationContext {
    const { unit } = die;
    const ctx: EvaluationContext = {
      address_size: unit.address_size,
      offset_size: unit.offset_size,
      littleEndian: this.options.littleEndian,
      maxSteps: this.options.maxExpressionSteps,
      target,
      frameBase,
      unitOffset: unit.offset,
      procedure: (offset) => {
        const callee = this.dies.get(offset);
        const location = callee?.attributes.get("DW_AT_location");
        return location?.class === "exprloc" ? location.value : undefined;
      },
    };

    if (target && this.usesOpcode(expression, die, DW_OP.call_frame_cfa)) {
      ctx.callFrameCfa = recoverCallerFrame(this.requireUnwindRow(pc), target, {
        address_size: unit.address_size,
        littleEndian: this.options.littleEndian,
        maxSteps: this.options.maxExpressionSteps,
      }).cfa;
    }
    return ctx;
  }

  private usesOpcode(expression: Buffer, die: DIE, opcode: number): boolean {
    const { address_size, offset_size } = die.unit;
    const format = { address_size, offset_size, littleEndian: this.options.littleEndian };
    return decodeExpression(expression, format).some((op) => op.opcode === opcode);
  }

  private rangesOf(die: DIE): AddressRange[] {
    const ranges = die.attributes.get("DW_AT_ranges");
    if (ranges?.class === "sec_offset") {
      return readRangeList(this.sections.get(".debug_ranges"), ranges.value, {
        address_size: die.unit.address_size,
        base_address: this.baseAddress(die),
        littleEndian: this.options.littleEndian,
      });
    }

    const low_pc = die.attributes.get("DW_AT_low_pc");
    const high_pc = die.attributes.get("DW_AT_high_pc");
    if (low_pc?.class !== "address" || !high_pc) {
      return [];
    }
    // DWARF v4 in section 2.17 describes how to interpret the
    // DW_AT_high_pc attribute based on the class of its form.
    // For class 'address' it's taken as an absolute address
    // (similarly to DW_AT_low_pc); for class 'constant', it's
    // an offset from DW_AT_low_pc.
    if (high_pc.class === "address") {
      return [{ low_pc: low_pc.value, high_pc: high_pc.value }];
    }
    if (high_pc.class === "constant") {
      return [{ low_pc: low_pc.value, high_pc: low_pc.value + high_pc.value }];
    }
    return [];
  }

  private functionName(die: DIE): string | undefined {
    const seen = new Set<number>();
    let current: DIE | undefined = die;
    while (current && !seen.has(current.offset)) {
      seen.add(current.offset);
      const name = dieName(current);
      if (name !== undefined) {
        return name;
      }
      const origin: AttributeValue | undefined =
        current.attributes.get("DW_AT_abstract_origin") ?? current.attributes.get("DW_AT_specification");
      current = origin?.class === "reference" ? this.dies.get(origin.value) : undefined;
    }
    return undefined;
  }
}

function constantLocation(value: AttributeValue, die: DIE): Location {
  switch (value.class) {
    case "constant":
      return { kind: "value", value: value.value };
    case "block":
    case "exprloc":
      return { kind: "implicit", data: value.value };
    case "string":
      return { kind: "implicit", data: Buffer.from(value.value, "utf8") };
    default:
      throw DwarfError.illegalForm("DW_AT_const_value", value.form, die.unit.version, die.offset);
  }
}

function stringAttr(die: DIE, name: "DW_AT_comp_dir" | "DW_AT_name"): string | undefined {
  const value = die.attributes.get(name);
  return value?.class === "string" ? value.value : undefined;
}
