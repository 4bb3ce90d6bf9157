import { OffsetBuffer, readStringAt } from "./buffer";
import { DwarfError } from "./errors";
import { SectionRange, isSectionId } from "./sections";

export interface ElfSectionHeader {
  index: number;
  sh_name: number;
  sh_type: number;
  sh_flags: bigint;
  sh_addr: bigint;
  sh_offset: number;
  sh_size: number;
  sh_link: number;
  sectionName: string;
}

export interface ElfImage {
  littleEndian: boolean;
  is64: boolean;
  e_machine: number;
  sections: ElfSectionHeader[];
  /** The DWARF sections the engine reads, as ranges of the input buffer. */
  debugSections: SectionRange[];
}

const ELF_MAGIC = Buffer.from([0x7f, 0x45, 0x4c, 0x46]);
const ELFCLASS32 = 1;
const ELFCLASS64 = 2;
const ELFDATA2LSB = 1;
const ELFDATA2MSB = 2;
const SHT_NULL = 0;
const SHT_NOBITS = 8;
const SHF_COMPRESSED = 0x800;

/**
 * Reads the section header table of an ELF32 or ELF64 image of either byte
 * order and picks out the DWARF sections by name.
 */
export function readElfSections(buffer: Buffer): ElfImage {
  if (buffer.length < 0x34 || !buffer.subarray(0, 4).equals(ELF_MAGIC)) {
    throw DwarfError.malformedElf("missing ELF magic");
  }
  const ei_class = buffer.readUInt8(4);
  const ei_data = buffer.readUInt8(5);
  if (ei_class !== ELFCLASS32 && ei_class !== ELFCLASS64) {
    throw DwarfError.malformedElf(`unknown ELF class ${ei_class}`, 4);
  }
  if (ei_data !== ELFDATA2LSB && ei_data !== ELFDATA2MSB) {
    throw DwarfError.malformedElf(`unknown ELF data encoding ${ei_data}`, 5);
  }
  const is64 = ei_class === ELFCLASS64;
  const littleEndian = ei_data === ELFDATA2LSB;

  try {
    const header = new OffsetBuffer(buffer, 0x12, buffer.length, littleEndian);
    const e_machine = header.readUInt16();
    // Points to the start of the section header table.
    header.seek(is64 ? 0x28 : 0x20);
    const e_shoff = is64 ? Number(header.readUInt64()) : header.readUInt32();
    // Size of a section header table entry, typically 0x28 (32 bit) or 0x40 (64 bit).
    header.seek(is64 ? 0x3a : 0x2e);
    const e_shentsize = header.readUInt16();
    // Number of entries in the section header table.
    const e_shnum = header.readUInt16();
    // Index of the section header table entry that contains the section names.
    const e_shstrndx = header.readUInt16();

    if (e_shnum > 0 && e_shentsize < (is64 ? 0x40 : 0x28)) {
      throw DwarfError.malformedElf(`section header entry size ${e_shentsize}`, is64 ? 0x3a : 0x2e);
    }

    const parseSection = (index: number): ElfSectionHeader => {
      const o_buffer = new OffsetBuffer(buffer, e_shoff + index * e_shentsize, buffer.length, littleEndian);
      const sh_name = o_buffer.readUInt32();
      const sh_type = o_buffer.readUInt32();
      const sh_flags = is64 ? o_buffer.readUInt64() : BigInt(o_buffer.readUInt32());
      const sh_addr = is64 ? o_buffer.readUInt64() : BigInt(o_buffer.readUInt32());
      const sh_offset = is64 ? Number(o_buffer.readUInt64()) : o_buffer.readUInt32();
      const sh_size = is64 ? Number(o_buffer.readUInt64()) : o_buffer.readUInt32();
      const sh_link = o_buffer.readUInt32();
      return { index, sh_name, sh_type, sh_flags, sh_addr, sh_offset, sh_size, sh_link, sectionName: "" };
    };

    const sections: ElfSectionHeader[] = [];
    for (let index = 0; index < e_shnum; index++) {
      sections.push(parseSection(index));
    }

    const names = sections[e_shstrndx];
    if (e_shnum > 0 && !names) {
      throw DwarfError.malformedElf(`section name table index ${e_shstrndx} out of range`, is64 ? 0x3e : 0x32);
    }
    for (const section of sections) {
      if (names) {
        section.sectionName = readStringAt(buffer, names.sh_offset + section.sh_name);
      }
    }

    const debugSections: SectionRange[] = [];
    for (const section of sections) {
      const { sectionName: id, sh_type, sh_offset, sh_size, sh_flags } = section;
      if (sh_type === SHT_NULL || sh_type === SHT_NOBITS || !isSectionId(id)) {
        continue;
      }
      if (sh_flags & BigInt(SHF_COMPRESSED)) {
        throw DwarfError.malformedElf(`${id} is compressed`, sh_offset);
      }
      if (sh_offset + sh_size > buffer.length) {
        throw DwarfError.malformedElf(`${id} runs past the end of the image`, sh_offset);
      }
      debugSections.push({ id, buffer, offset: sh_offset, length: sh_size });
    }

    return {
      littleEndian,
      is64,
      e_machine,
      sections: sections.filter((s) => s.sh_type !== SHT_NULL),
      debugSections,
    };
  } catch (error) {
    throw DwarfError.wrap(error, "MalformedElf", "ELF headers are truncated");
  }
}
