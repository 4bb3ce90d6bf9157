import { OffsetBuffer } from "./buffer";
import { DwarfError } from "./errors";

export interface LocationListEntry {
  low_pc: bigint;
  high_pc: bigint;
  expression: Buffer;
}

export interface AddressRange {
  low_pc: bigint;
  high_pc: bigint;
}

export interface ListFormat {
  address_size: number;
  /** Unit base address, normally the unit's DW_AT_low_pc. */
  base_address?: bigint;
  littleEndian?: boolean;
}

/**
 * Walks a .debug_loc or .debug_ranges list. `(0, 0)` ends the list; a
 * begin of all ones selects a new base address for the entries after it.
 */
function walkList<T>(
  data: Buffer,
  offset: number,
  format: ListFormat,
  readEntry: (o_buffer: OffsetBuffer, range: AddressRange) => T
): T[] {
  const { address_size } = format;
  const bits = address_size * 8;
  const maxAddress = BigInt.asUintN(bits, -1n);
  const o_buffer = new OffsetBuffer(data, offset, data.length, format.littleEndian ?? true);
  const entries: T[] = [];
  let base = format.base_address ?? 0n;

  while (true) {
    const begin = o_buffer.readAddress(address_size);
    const end = o_buffer.readAddress(address_size);
    if (begin === 0n && end === 0n) {
      return entries;
    }
    if (begin === maxAddress) {
      base = end;
      continue;
    }
    entries.push(
      readEntry(o_buffer, {
        low_pc: BigInt.asUintN(bits, base + begin),
        high_pc: BigInt.asUintN(bits, base + end),
      })
    );
  }
}

export function readLocationList(
  loc: Buffer,
  offset: number,
  format: ListFormat
): LocationListEntry[] {
  try {
    return walkList(loc, offset, format, (o_buffer, range) => ({
      ...range,
      expression: o_buffer.subarray(o_buffer.readUInt16()),
    }));
  } catch (error) {
    throw DwarfError.wrap(
      error,
      "MalformedLocationList",
      `location list at 0x${offset.toString(16)} is not terminated`,
      { offset, section: ".debug_loc" }
    );
  }
}

export function readRangeList(
  ranges: Buffer,
  offset: number,
  format: ListFormat
): AddressRange[] {
  try {
    return walkList(ranges, offset, format, (_, range) => range);
  } catch (error) {
    throw DwarfError.wrap(
      error,
      "MalformedLocationList",
      `range list at 0x${offset.toString(16)} is not terminated`,
      { offset, section: ".debug_ranges" }
    );
  }
}

/** The entry whose `[low_pc, high_pc)` contains `pc`. */
export function selectLocation(
  list: readonly LocationListEntry[],
  pc: bigint,
  dieOffset?: number
): LocationListEntry {
  const entry = list.find((e) => e.low_pc <= pc && pc < e.high_pc);
  if (!entry) {
    throw DwarfError.noLocationAtPc(pc, dieOffset);
  }
  return entry;
}

export function rangesContain(ranges: readonly AddressRange[], pc: bigint): boolean {
  return ranges.some((r) => r.low_pc <= pc && pc < r.high_pc);
}
