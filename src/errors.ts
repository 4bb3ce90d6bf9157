import type { SectionId } from "./sections";

export type DwarfErrorCode =
  | "MalformedAbbrev"
  | "TruncatedUnit"
  | "UnbalancedTree"
  | "IllegalForm"
  | "UnsupportedVersion"
  | "MissingSection"
  | "UnresolvedTypeReference"
  | "UnsupportedTag"
  | "UnknownOpcode"
  | "StackUnderflow"
  | "DivisionByZero"
  | "MalformedExpression"
  | "InstructionBudgetExceeded"
  | "ReentrantEvaluation"
  | "NoLocationAtPc"
  | "MalformedLocationList"
  | "MalformedLineProgram"
  | "MalformedCallFrame"
  | "NotFound"
  | "BufferOverrun"
  | "MalformedElf"
  | "MalformedStringTable";

export interface DwarfErrorDetails {
  /** Byte offset the failure refers to, relative to `section`. */
  offset?: number;
  section?: SectionId;
  [key: string]: unknown;
}

/**
 * Every failure raised or returned by the engine. Structural decode errors
 * abort one compilation unit; query errors are handed back inside a
 * `QueryResult`.
 */
export class DwarfError extends Error {
  public readonly code: DwarfErrorCode;
  public readonly offset?: number;
  public readonly section?: SectionId;
  public readonly details: DwarfErrorDetails;
  public readonly cause?: Error;

  constructor(
    message: string,
    code: DwarfErrorCode,
    details: DwarfErrorDetails = {},
    cause?: Error
  ) {
    super(message);
    this.name = "DwarfError";
    this.code = code;
    this.details = details;
    if (details.offset !== undefined) this.offset = details.offset;
    if (details.section) this.section = details.section;
    if (cause) this.cause = cause;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Re-raise a lower-level failure under a decoder's own code, keeping the
   * offset where reading stopped.
   */
  static wrap(
    error: unknown,
    code: DwarfErrorCode,
    message: string,
    details: DwarfErrorDetails = {}
  ): DwarfError {
    if (error instanceof DwarfError && error.code !== "BufferOverrun") {
      return error;
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    const offset =
      error instanceof DwarfError && error.offset !== undefined
        ? error.offset
        : details.offset;
    return new DwarfError(
      `${message}: ${cause.message}`,
      code,
      { ...details, offset },
      cause
    );
  }

  static bufferOverrun(offset: number, wanted: number, end: number): DwarfError {
    return new DwarfError(
      `read of ${wanted} byte(s) at 0x${offset.toString(16)} runs past end 0x${end.toString(16)}`,
      "BufferOverrun",
      { offset, wanted, end }
    );
  }

  static malformedAbbrev(reason: string, offset: number): DwarfError {
    return new DwarfError(
      `malformed abbreviation at 0x${offset.toString(16)}: ${reason}`,
      "MalformedAbbrev",
      { offset, section: ".debug_abbrev" }
    );
  }

  static truncatedUnit(unitOffset: number, offset: number): DwarfError {
    return new DwarfError(
      `unit at 0x${unitOffset.toString(16)} is truncated at 0x${offset.toString(16)}`,
      "TruncatedUnit",
      { offset, section: ".debug_info", unitOffset }
    );
  }

  static unbalancedTree(unitOffset: number, offset: number): DwarfError {
    return new DwarfError(
      `unit at 0x${unitOffset.toString(16)} closes a sibling chain with no open parent at 0x${offset.toString(16)}`,
      "UnbalancedTree",
      { offset, section: ".debug_info", unitOffset }
    );
  }

  static illegalForm(
    attribute: string,
    form: string,
    version: number,
    offset: number
  ): DwarfError {
    return new DwarfError(
      `${form} is not a legal form for ${attribute} in a version ${version} unit`,
      "IllegalForm",
      { offset, section: ".debug_info", attribute, form, version }
    );
  }

  static unsupportedVersion(
    section: SectionId,
    version: number,
    offset: number
  ): DwarfError {
    return new DwarfError(
      `${section} version ${version} at 0x${offset.toString(16)} is unsupported`,
      "UnsupportedVersion",
      { offset, section, version }
    );
  }

  static missingSection(section: SectionId): DwarfError {
    return new DwarfError(`missing ${section} section`, "MissingSection", {
      section,
    });
  }

  static unresolvedTypeReference(offset: number, from?: number): DwarfError {
    return new DwarfError(
      `no DIE at type reference 0x${offset.toString(16)}`,
      "UnresolvedTypeReference",
      { offset, section: ".debug_info", from }
    );
  }

  static unsupportedTag(tag: string, offset: number): DwarfError {
    return new DwarfError(
      `${tag} at 0x${offset.toString(16)} has no type-graph mapping`,
      "UnsupportedTag",
      { offset, section: ".debug_info", tag }
    );
  }

  static unknownOpcode(opcode: number, offset: number): DwarfError {
    return new DwarfError(
      `unknown expression opcode 0x${opcode.toString(16)} at ${offset}`,
      "UnknownOpcode",
      { offset, opcode }
    );
  }

  static stackUnderflow(operation: string, offset: number): DwarfError {
    return new DwarfError(
      `${operation} at ${offset} underflows the expression stack`,
      "StackUnderflow",
      { offset, operation }
    );
  }

  static divisionByZero(operation: string, offset: number): DwarfError {
    return new DwarfError(
      `${operation} at ${offset} divides by zero`,
      "DivisionByZero",
      { offset, operation }
    );
  }

  static malformedExpression(reason: string, offset: number): DwarfError {
    return new DwarfError(
      `malformed expression at ${offset}: ${reason}`,
      "MalformedExpression",
      { offset }
    );
  }

  static instructionBudgetExceeded(budget: number, offset?: number): DwarfError {
    return new DwarfError(
      `instruction budget of ${budget} steps exhausted`,
      "InstructionBudgetExceeded",
      { offset, budget }
    );
  }

  static reentrantEvaluation(): DwarfError {
    return new DwarfError(
      "an evaluation is already running against this target",
      "ReentrantEvaluation"
    );
  }

  static noLocationAtPc(pc: bigint, dieOffset?: number): DwarfError {
    return new DwarfError(
      `no location at pc 0x${pc.toString(16)}`,
      "NoLocationAtPc",
      { offset: dieOffset, section: ".debug_info", pc }
    );
  }

  static malformedLocationList(reason: string, offset: number): DwarfError {
    return new DwarfError(
      `malformed location list at 0x${offset.toString(16)}: ${reason}`,
      "MalformedLocationList",
      { offset, section: ".debug_loc" }
    );
  }

  static malformedLineProgram(reason: string, offset: number): DwarfError {
    return new DwarfError(
      `malformed line program at 0x${offset.toString(16)}: ${reason}`,
      "MalformedLineProgram",
      { offset, section: ".debug_line" }
    );
  }

  static malformedCallFrame(reason: string, offset: number): DwarfError {
    return new DwarfError(
      `malformed call frame entry at 0x${offset.toString(16)}: ${reason}`,
      "MalformedCallFrame",
      { offset, section: ".debug_frame" }
    );
  }

  static notFound(what: string, details: DwarfErrorDetails = {}): DwarfError {
    return new DwarfError(`${what} not found`, "NotFound", details);
  }

  static malformedElf(reason: string, offset = 0): DwarfError {
    return new DwarfError(`malformed ELF image: ${reason}`, "MalformedElf", {
      offset,
    });
  }

  static malformedStringTable(reason: string, offset: number): DwarfError {
    return new DwarfError(
      `malformed string table at 0x${offset.toString(16)}: ${reason}`,
      "MalformedStringTable",
      { offset, section: ".debug_str" }
    );
  }

  /**
   * Format the error with its code, location and cause.
   */
  format(): string {
    const lines: string[] = [];

    lines.push(`${this.name}: ${this.message}`);
    lines.push(`  Code: ${this.code}`);
    if (this.section) lines.push(`  Section: ${this.section}`);
    if (this.offset !== undefined) {
      lines.push(`  Offset: 0x${this.offset.toString(16)}`);
    }
    if (this.cause) {
      lines.push(`  Caused by: ${this.cause.name}: ${this.cause.message}`);
    }

    return lines.join("\n");
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      section: this.section,
      offset: this.offset,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };
  }
}

export type QueryResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DwarfError };

export function found<T>(value: T): QueryResult<T> {
  return { ok: true, value };
}

export function failed<T>(error: DwarfError): QueryResult<T> {
  return { ok: false, error };
}

/** A structural failure that aborted decoding of one unit or table. */
export interface DecodeFailure {
  section: SectionId;
  offset: number;
  error: DwarfError;
}
