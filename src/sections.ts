import { DwarfError } from "./errors";

export type SectionId =
  | ".debug_abbrev"
  | ".debug_info"
  | ".debug_line"
  | ".debug_frame"
  | ".debug_loc"
  | ".debug_ranges"
  | ".debug_str";

export const DEBUG_SECTION_IDS: readonly SectionId[] = [
  ".debug_abbrev",
  ".debug_info",
  ".debug_line",
  ".debug_frame",
  ".debug_loc",
  ".debug_ranges",
  ".debug_str",
];

/**
 * A named byte range handed over by the object-file reader. The engine only
 * ever reads `buffer[offset, offset + length)`.
 */
export interface SectionRange {
  id: SectionId;
  buffer: Buffer;
  offset: number;
  length: number;
}

export function isSectionId(name: string): name is SectionId {
  return DEBUG_SECTION_IDS.some((id) => id === name);
}

/**
 * Section contents indexed by id; every view starts at section offset 0.
 */
export class SectionTable {
  private readonly views = new Map<SectionId, Buffer>();

  constructor(ranges: readonly SectionRange[]) {
    for (const range of ranges) {
      const { id, buffer, offset, length } = range;
      if (offset < 0 || length < 0 || offset + length > buffer.length) {
        throw DwarfError.bufferOverrun(offset, length, buffer.length);
      }
      this.views.set(id, buffer.subarray(offset, offset + length));
    }
  }

  has(id: SectionId): boolean {
    return this.views.has(id);
  }

  find(id: SectionId): Buffer | undefined {
    return this.views.get(id);
  }

  get(id: SectionId): Buffer {
    const view = this.views.get(id);
    if (!view) {
      throw DwarfError.missingSection(id);
    }
    return view;
  }
}
