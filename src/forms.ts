import type { AttrSpec } from "./abbrev";
import { OffsetBuffer, readStringAt } from "./buffer";
import {
  ATTRIBUTE_CLASSES,
  DwFormName,
  ENUM_DW_FORM,
  FORM_CLASS,
  FormClass,
} from "./enums";
import { DwarfError } from "./errors";

export type AttributeValue =
  | { class: "address"; form: DwFormName; value: bigint }
  | { class: "block"; form: DwFormName; value: Buffer }
  | { class: "exprloc"; form: DwFormName; value: Buffer }
  | { class: "constant"; form: DwFormName; value: bigint; signed: boolean }
  | { class: "flag"; form: DwFormName; value: boolean }
  | { class: "string"; form: DwFormName; value: string; str_offset?: number }
  // Absolute .debug_info offset; `local` when the form was unit-relative.
  | { class: "reference"; form: DwFormName; value: number; local: boolean }
  | { class: "signature"; form: DwFormName; value: bigint }
  | { class: "sec_offset"; form: DwFormName; value: number };

export interface FormContext {
  version: number;
  address_size: number;
  offset_size: number;
  unit_offset: number;
  /** .debug_str, when the image has one. */
  str?: Buffer;
}

/**
 * Reads one attribute value at the cursor. Dispatch is by form only; the
 * attribute name is consulted afterwards to apply the DWARF 4 class of
 * version 2/3 encodings and to reject forms outside the attribute's
 * contract.
 */
export function readAttribute(
  o_buffer: OffsetBuffer,
  spec: AttrSpec,
  ctx: FormContext
): AttributeValue {
  const offset = o_buffer.tell();
  let form = spec.form;

  if (form === "DW_FORM_indirect") {
    const code = o_buffer.readUleb128();
    const actual = ENUM_DW_FORM.get(code);
    if (!actual || actual === "DW_FORM_indirect") {
      throw DwarfError.illegalForm(
        spec.name,
        `DW_FORM_0x${code.toString(16)}`,
        ctx.version,
        offset
      );
    }
    form = actual;
  }

  const formClass = FORM_CLASS.get(form);
  if (!formClass || formClass.since > ctx.version) {
    throw DwarfError.illegalForm(spec.name, form, ctx.version, offset);
  }

  const allowed = ATTRIBUTE_CLASSES.get(spec.name);
  const value = normalize(dwFormRead(form, o_buffer, ctx, offset), allowed, ctx.version);
  if (allowed && !allowed.includes(value.class)) {
    throw DwarfError.illegalForm(spec.name, form, ctx.version, offset);
  }
  return value;
}

// Version 2/3 producers encode section pointers as data4/data8 and
// expressions as blocks; both are mapped to their DWARF 4 classes.
function normalize(
  value: AttributeValue,
  allowed: readonly FormClass[] | undefined,
  version: number
): AttributeValue {
  if (!allowed || version >= 4) {
    return value;
  }
  if (
    value.class === "constant" &&
    (value.form === "DW_FORM_data4" || value.form === "DW_FORM_data8") &&
    allowed.includes("sec_offset")
  ) {
    return { class: "sec_offset", form: value.form, value: Number(value.value) };
  }
  if (
    value.class === "block" &&
    allowed.includes("exprloc") &&
    !allowed.includes("block")
  ) {
    return { class: "exprloc", form: value.form, value: value.value };
  }
  return value;
}

function dwFormRead(
  form: DwFormName,
  o_buffer: OffsetBuffer,
  ctx: FormContext,
  offset: number
): AttributeValue {
  switch (form) {
    case "DW_FORM_addr":
      return { class: "address", form, value: o_buffer.readAddress(ctx.address_size) };
    case "DW_FORM_block1":
      return { class: "block", form, value: o_buffer.subarray(o_buffer.readUInt8()) };
    case "DW_FORM_block2":
      return { class: "block", form, value: o_buffer.subarray(o_buffer.readUInt16()) };
    case "DW_FORM_block4":
      return { class: "block", form, value: o_buffer.subarray(o_buffer.readUInt32()) };
    case "DW_FORM_block":
      return { class: "block", form, value: o_buffer.subarray(o_buffer.readUleb128()) };
    case "DW_FORM_exprloc":
      return { class: "exprloc", form, value: o_buffer.subarray(o_buffer.readUleb128()) };
    case "DW_FORM_data1":
      return { class: "constant", form, value: o_buffer.readUnsigned(1), signed: false };
    case "DW_FORM_data2":
      return { class: "constant", form, value: o_buffer.readUnsigned(2), signed: false };
    case "DW_FORM_data4":
      return { class: "constant", form, value: o_buffer.readUnsigned(4), signed: false };
    case "DW_FORM_data8":
      return { class: "constant", form, value: o_buffer.readUnsigned(8), signed: false };
    case "DW_FORM_udata":
      return { class: "constant", form, value: o_buffer.readUleb128Big(), signed: false };
    case "DW_FORM_sdata":
      return { class: "constant", form, value: o_buffer.readSleb128Big(), signed: true };
    case "DW_FORM_flag":
      return { class: "flag", form, value: o_buffer.readUInt8() !== 0 };
    case "DW_FORM_flag_present":
      return { class: "flag", form, value: true };
    case "DW_FORM_string":
      return { class: "string", form, value: o_buffer.readCString() };
    case "DW_FORM_strp": {
      // read value from debug_str
      const str_offset = o_buffer.readOffset(ctx.offset_size);
      if (!ctx.str) {
        throw DwarfError.missingSection(".debug_str");
      }
      if (str_offset >= ctx.str.length) {
        throw DwarfError.malformedStringTable("offset past the end of .debug_str", str_offset);
      }
      try {
        return { class: "string", form, value: readStringAt(ctx.str, str_offset), str_offset };
      } catch (error) {
        throw DwarfError.wrap(error, "MalformedStringTable", "unterminated string", {
          offset: str_offset,
          section: ".debug_str",
        });
      }
    }
    case "DW_FORM_ref1":
    case "DW_FORM_ref2":
    case "DW_FORM_ref4":
    case "DW_FORM_ref8": {
      const size = { DW_FORM_ref1: 1, DW_FORM_ref2: 2, DW_FORM_ref4: 4, DW_FORM_ref8: 8 }[form];
      const relative = Number(o_buffer.readUnsigned(size));
      return { class: "reference", form, value: ctx.unit_offset + relative, local: true };
    }
    case "DW_FORM_ref_udata":
      return {
        class: "reference",
        form,
        value: ctx.unit_offset + o_buffer.readUleb128(),
        local: true,
      };
    case "DW_FORM_ref_addr": {
      // Address-sized in version 2, offset-sized afterwards.
      const size = ctx.version === 2 ? ctx.address_size : ctx.offset_size;
      return { class: "reference", form, value: Number(o_buffer.readUnsigned(size)), local: false };
    }
    case "DW_FORM_ref_sig8":
      return { class: "signature", form, value: o_buffer.readUInt64() };
    case "DW_FORM_sec_offset":
      return { class: "sec_offset", form, value: o_buffer.readOffset(ctx.offset_size) };
    default:
      throw DwarfError.illegalForm("attribute", form, ctx.version, offset);
  }
}

export function constantValue(value: AttributeValue | undefined): number | undefined {
  if (!value || value.class !== "constant") {
    return undefined;
  }
  return Number(value.value);
}
