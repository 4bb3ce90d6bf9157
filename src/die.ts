import { AbbrevCache, AbbrevTable } from "./abbrev";
import { OffsetBuffer, readInitialLength } from "./buffer";
import { DwAt, DwTag } from "./enums";
import { DecodeFailure, DwarfError } from "./errors";
import { AttributeValue, FormContext, readAttribute } from "./forms";
import { SectionTable } from "./sections";

export interface UnitHeader {
  offset: number;
  unit_length: number;
  format: 32 | 64;
  offset_size: 4 | 8;
  version: number;
  debug_abbrev_offset: number;
  address_size: number;
  /** Offset of the first DIE. */
  die_offset: number;
  /** One past the last byte of the unit. */
  end: number;
}

export interface DIE {
  offset: number;
  abbrev_code: number;
  tag: DwTag;
  attributes: Map<DwAt, AttributeValue>;
  has_children: boolean;
  parent?: DIE;
  children: DIE[];
  unit: UnitHeader;
}

export interface CompilationUnit extends UnitHeader {
  top_level_die: DIE;
  /** Every DIE of the unit by absolute .debug_info offset. */
  dies: Map<number, DIE>;
  abbrev_table: AbbrevTable;
}

export const SUPPORTED_UNIT_VERSIONS = [2, 3, 4];

/**
 * For each compilation unit compiled with a DWARF producer, a contribution is
 * made to the .debug_info section of the object file. Each such contribution
 * consists of a compilation unit header followed by a single
 * DW_TAG_compile_unit or DW_TAG_partial_unit entry, together with its
 * children.
 */
export function parseUnitHeader(
  info: Buffer,
  offset: number,
  littleEndian = true
): UnitHeader {
  const o_buffer = new OffsetBuffer(info, offset, info.length, littleEndian);
  const { length: unit_length, offset_size } = readInitialLength(o_buffer);
  const end = o_buffer.tell() + unit_length;
  if (end > info.length) {
    throw DwarfError.truncatedUnit(offset, info.length);
  }

  const version = o_buffer.readUInt16();
  if (!SUPPORTED_UNIT_VERSIONS.includes(version)) {
    throw DwarfError.unsupportedVersion(".debug_info", version, offset);
  }
  const debug_abbrev_offset = o_buffer.readOffset(offset_size);
  const address_size = o_buffer.readUInt8();
  if (![1, 2, 4, 8].includes(address_size)) {
    throw new DwarfError(
      `unit at 0x${offset.toString(16)} declares address size ${address_size}`,
      "UnsupportedVersion",
      { offset, section: ".debug_info", address_size }
    );
  }

  return {
    offset,
    unit_length,
    format: offset_size === 8 ? 64 : 32,
    offset_size,
    version,
    debug_abbrev_offset,
    address_size,
    die_offset: o_buffer.tell(),
    end,
  };
}

/**
 * Rebuilds the DIE tree of one unit in a single pre-order pass. A zero
 * abbreviation code closes the current sibling chain; a DIE whose
 * declaration has children becomes the parent of what follows.
 */
export function buildDieTree(
  info: Buffer,
  header: UnitHeader,
  abbrevTable: AbbrevTable,
  options: { littleEndian?: boolean; str?: Buffer } = {}
): { root: DIE; dies: Map<number, DIE> } {
  const o_buffer = new OffsetBuffer(
    info,
    header.die_offset,
    header.end,
    options.littleEndian ?? true
  );
  const ctx: FormContext = {
    version: header.version,
    address_size: header.address_size,
    offset_size: header.offset_size,
    unit_offset: header.offset,
    str: options.str,
  };
  const dies = new Map<number, DIE>();
  const parents: DIE[] = [];
  let root: DIE | undefined;

  try {
    while (!o_buffer.atEnd()) {
      const offset = o_buffer.tell();
      const abbrev_code = o_buffer.readUleb128();
      if (abbrev_code === 0) {
        if (parents.length === 0) {
          throw DwarfError.unbalancedTree(header.offset, offset);
        }
        parents.pop();
        continue;
      }
      if (root && parents.length === 0) {
        // A unit holds exactly one top-level DIE.
        throw DwarfError.unbalancedTree(header.offset, offset);
      }

      const record = abbrevTable.get(abbrev_code);
      if (!record) {
        throw new DwarfError(
          `DIE at 0x${offset.toString(16)} uses undeclared abbreviation code ${abbrev_code}`,
          "MalformedAbbrev",
          { offset, section: ".debug_info", abbrev_code }
        );
      }

      const attributes = new Map<DwAt, AttributeValue>();
      for (const spec of record.attr_spec) {
        attributes.set(spec.name, readAttribute(o_buffer, spec, ctx));
      }

      const parent = parents[parents.length - 1];
      const die: DIE = {
        offset,
        abbrev_code,
        tag: record.tag,
        attributes,
        has_children: record.has_children,
        parent,
        children: [],
        unit: header,
      };
      if (parent) {
        parent.children.push(die);
      } else {
        root = die;
      }
      dies.set(offset, die);

      if (die.has_children) {
        parents.push(die);
      }
    }
  } catch (error) {
    throw DwarfError.wrap(error, "TruncatedUnit", `unit at 0x${header.offset.toString(16)} is truncated`, {
      offset: o_buffer.tell(),
      section: ".debug_info",
    });
  }

  if (!root || parents.length > 0) {
    throw DwarfError.truncatedUnit(header.offset, header.end);
  }

  return { root, dies };
}

export function parseCompilationUnit(
  info: Buffer,
  offset: number,
  abbrevs: AbbrevCache,
  options: { littleEndian?: boolean; str?: Buffer } = {}
): CompilationUnit {
  const header = parseUnitHeader(info, offset, options.littleEndian);
  const abbrev_table = abbrevs.get(header.debug_abbrev_offset);
  const { root, dies } = buildDieTree(info, header, abbrev_table, options);

  return { ...header, top_level_die: root, dies, abbrev_table };
}

/**
 * Decodes every unit of .debug_info. A structural failure aborts only the
 * unit it occurs in; scanning resumes at the next unit whenever the failed
 * unit's length could be read.
 */
export function parseCompilationUnits(
  sections: SectionTable,
  littleEndian = true
): { units: CompilationUnit[]; failures: DecodeFailure[] } {
  const info = sections.get(".debug_info");
  const abbrevs = new AbbrevCache(sections.get(".debug_abbrev"));
  const str = sections.find(".debug_str");
  const units: CompilationUnit[] = [];
  const failures: DecodeFailure[] = [];

  let offset = 0;
  while (offset < info.length) {
    let next = info.length;
    try {
      const o_buffer = new OffsetBuffer(info, offset, info.length, littleEndian);
      const { length } = readInitialLength(o_buffer);
      next = Math.min(o_buffer.tell() + length, info.length);
      units.push(parseCompilationUnit(info, offset, abbrevs, { littleEndian, str }));
    } catch (error) {
      failures.push({
        section: ".debug_info",
        offset,
        error: DwarfError.wrap(error, "TruncatedUnit", `unit at 0x${offset.toString(16)} is truncated`, {
          offset,
          section: ".debug_info",
        }),
      });
    }
    offset = next;
  }

  return { units, failures };
}

export function flattenDies(dies: DIE[]): DIE[] {
  return dies.flatMap((die) => [die, ...flattenDies(die.children)]);
}

export function dieName(die: DIE): string | undefined {
  const name = die.attributes.get("DW_AT_name");
  return name?.class === "string" ? name.value : undefined;
}
