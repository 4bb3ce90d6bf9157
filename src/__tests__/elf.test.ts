import { readElfSections } from "../elf";
import { assembleElf } from "./helpers/dwarf_builder";
import { thrownBy } from "./helpers/errors";

const info = Buffer.from([1, 2, 3, 4]);
const abbrev = Buffer.from([5, 6]);

describe("readElfSections", () => {
  it("should pick the DWARF sections out of an ELF64 image", () => {
    const image = assembleElf([
      { name: ".text", data: Buffer.from([0x90]) },
      { name: ".debug_info", data: info },
      { name: ".debug_abbrev", data: abbrev },
      { name: ".debug_loc", data: Buffer.alloc(0), type: 8 },
    ]);

    const elf = readElfSections(image);

    expect(elf).toMatchObject({ littleEndian: true, is64: true, e_machine: 62 });
    expect(elf.sections.map((s) => s.sectionName)).toEqual([".text", ".debug_info", ".debug_abbrev", ".debug_loc", ".shstrtab"]);
    expect(elf.debugSections.map((s) => s.id)).toEqual([".debug_info", ".debug_abbrev"]);

    const [infoRange] = elf.debugSections;
    expect(infoRange.offset).toBe(0x41);
    expect(infoRange.length).toBe(4);
    expect(image.subarray(infoRange.offset, infoRange.offset + infoRange.length)).toEqual(info);
  });

  it("should read big-endian ELF32 images", () => {
    const image = assembleElf([{ name: ".debug_line", data: info }], { is64: false, littleEndian: false, machine: 8 });

    const elf = readElfSections(image);

    expect(elf).toMatchObject({ littleEndian: false, is64: false, e_machine: 8 });
    expect(elf.debugSections).toEqual([{ id: ".debug_line", buffer: image, offset: 0x34, length: 4 }]);
  });

  it("should reject a buffer without the ELF magic", () => {
    const error = thrownBy(() => readElfSections(Buffer.alloc(0x40)));
    expect(error.code).toBe("MalformedElf");
    expect(error.message).toBe("malformed ELF image: missing ELF magic");
  });

  it("should reject unknown classes and byte orders", () => {
    const badClass = assembleElf([]);
    badClass[4] = 3;
    expect(thrownBy(() => readElfSections(badClass)).offset).toBe(4);

    const badData = assembleElf([]);
    badData[5] = 0;
    expect(thrownBy(() => readElfSections(badData)).offset).toBe(5);
  });

  it("should reject compressed debug sections", () => {
    const image = assembleElf([{ name: ".debug_info", data: info, flags: 0x800 }]);
    const error = thrownBy(() => readElfSections(image));
    expect(error.code).toBe("MalformedElf");
    expect(error.message).toBe("malformed ELF image: .debug_info is compressed");
  });

  it("should reject a section that runs past the image", () => {
    const image = assembleElf([{ name: ".debug_info", data: info, size: 0x1000 }]);
    expect(thrownBy(() => readElfSections(image)).message).toBe(
      "malformed ELF image: .debug_info runs past the end of the image"
    );
  });

  it("should reject a truncated section header table", () => {
    const image = assembleElf([{ name: ".debug_info", data: info }]);
    const error = thrownBy(() => readElfSections(image.subarray(0, image.length - 30)));
    expect(error.code).toBe("MalformedElf");
    expect(error.cause?.name).toBe("DwarfError");
  });
});
