import { OffsetBuffer } from "./buffer";
import {
  DwAt,
  DwFormName,
  DwTag,
  ENUM_DW_FORM,
  describeAttribute,
  describeTag,
} from "./enums";
import { DwarfError } from "./errors";

export type AbbrevTable = Map<number, AbbrevRecord>;

export interface AbbrevRecord {
  decl_code: number;
  tag: DwTag;
  tag_code: number;
  has_children: boolean;
  attr_spec: AttrSpec[];
}

export interface AttrSpec {
  name: DwAt;
  name_code: number;
  form: DwFormName;
  /** Value carried by the declaration itself for DW_FORM_implicit_const. */
  implicit_const?: bigint;
}

/**
 * Decodes the abbreviation table starting at `offset` of .debug_abbrev.
 * Returns the table and the number of bytes consumed, terminator included.
 */
export function parseAbbrevTable(
  data: Buffer,
  offset: number
): { table: AbbrevTable; length: number } {
  const table: AbbrevTable = new Map();
  const o_buffer = new OffsetBuffer(data, offset);
  let recordOffset = offset;

  try {
    while (true) {
      recordOffset = o_buffer.tell();
      const decl_code = o_buffer.readUleb128();
      if (decl_code === 0) {
        break;
      }
      if (table.has(decl_code)) {
        throw DwarfError.malformedAbbrev(
          `code ${decl_code} declared twice`,
          recordOffset
        );
      }

      const tag_code = o_buffer.readUleb128();
      const children_flag = o_buffer.readUInt8();
      if (children_flag > 1) {
        throw DwarfError.malformedAbbrev(
          `children flag ${children_flag} is neither 0 nor 1`,
          o_buffer.tell() - 1
        );
      }

      const attr_spec: AttrSpec[] = [];
      while (true) {
        const specOffset = o_buffer.tell();
        const name_code = o_buffer.readUleb128();
        const form_code = o_buffer.readUleb128();
        if (name_code === 0 && form_code === 0) {
          break;
        }

        const form = ENUM_DW_FORM.get(form_code);
        if (!form) {
          throw DwarfError.malformedAbbrev(
            `unknown form 0x${form_code.toString(16)}`,
            specOffset
          );
        }
        const spec: AttrSpec = {
          name: describeAttribute(name_code),
          name_code,
          form,
        };
        if (form === "DW_FORM_implicit_const") {
          // The value lives in the declaration, not in the DIE.
          spec.implicit_const = o_buffer.readSleb128Big();
        }
        attr_spec.push(spec);
      }

      table.set(decl_code, {
        decl_code,
        tag: describeTag(tag_code),
        tag_code,
        has_children: children_flag === 1,
        attr_spec,
      });
    }
  } catch (error) {
    throw DwarfError.wrap(
      error,
      "MalformedAbbrev",
      "abbreviation table ends before its terminator",
      { offset: recordOffset, section: ".debug_abbrev" }
    );
  }

  return { table, length: o_buffer.tell() - offset };
}

/**
 * Tables keyed by their .debug_abbrev offset; units that share an offset
 * share the decoded table.
 */
export class AbbrevCache {
  private readonly tables = new Map<number, AbbrevTable>();

  constructor(private readonly data: Buffer) {}

  get(offset: number): AbbrevTable {
    let table = this.tables.get(offset);
    if (!table) {
      table = parseAbbrevTable(this.data, offset).table;
      this.tables.set(offset, table);
    }
    return table;
  }

  get size() {
    return this.tables.size;
  }
}
