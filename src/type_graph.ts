import type { DIE } from "./die";
import { DwAt, DwAte, DwFormName, DwTag, describeEncoding } from "./enums";
import { DwarfError } from "./errors";
import { evaluateExpression } from "./expression";
import { AttributeValue, constantValue } from "./forms";

/** Absolute .debug_info offset of a type DIE; `undefined` is void. */
export type TypeRef = number | undefined;

export type PointerKind = "pointer" | "reference" | "rvalue_reference" | "ptr_to_member";
export type Qualifier = "const" | "volatile" | "restrict" | "atomic";
export type CompositeKind = "struct" | "class" | "union" | "interface";

export interface Member {
  name?: string;
  type: TypeRef;
  byte_offset: number;
  /**
   * Bit offset within the storage at `byte_offset`, as DW_AT_data_bit_offset
   * counts it: from the least significant bit on little-endian images and
   * from the most significant bit on big-endian ones.
   */
  bit_offset?: number;
  bit_size?: number;
  /** Size of the storage unit holding a bit field. */
  byte_size?: number;
}

export interface BaseClass {
  type: TypeRef;
  byte_offset: number;
}

export interface Dimension {
  lower_bound: number;
  /** Unknown for flexible and variable-length arrays. */
  count?: number;
}

export interface Enumerator {
  name: string;
  value: bigint;
}

export type TypeNode =
  | { kind: "void" }
  | { kind: "base"; name?: string; encoding: DwAte; byte_size: number; bit_size?: number }
  | { kind: "unspecified"; name?: string }
  | {
      kind: "pointer";
      pointer_kind: PointerKind;
      target: TypeRef;
      byte_size?: number;
      containing_type?: TypeRef;
    }
  | { kind: "array"; name?: string; element: TypeRef; dimensions: Dimension[]; byte_size?: number }
  | {
      kind: CompositeKind;
      name?: string;
      byte_size?: number;
      declaration: boolean;
      members: Member[];
      bases: BaseClass[];
    }
  | {
      kind: "enum";
      name?: string;
      byte_size?: number;
      underlying: TypeRef;
      enumerators: Enumerator[];
    }
  | { kind: "typedef"; name?: string; target: TypeRef }
  | { kind: "qualified"; qualifier: Qualifier; target: TypeRef }
  | {
      kind: "subroutine";
      return_type: TypeRef;
      parameters: TypeRef[];
      variadic: boolean;
      prototyped: boolean;
    };

export const VOID: TypeNode = { kind: "void" };

const POINTER_TAGS = new Map<DwTag, PointerKind>([
  ["DW_TAG_pointer_type", "pointer"],
  ["DW_TAG_reference_type", "reference"],
  ["DW_TAG_rvalue_reference_type", "rvalue_reference"],
  ["DW_TAG_ptr_to_member_type", "ptr_to_member"],
]);

const QUALIFIER_TAGS = new Map<DwTag, Qualifier>([
  ["DW_TAG_const_type", "const"],
  ["DW_TAG_volatile_type", "volatile"],
  ["DW_TAG_restrict_type", "restrict"],
  ["DW_TAG_atomic_type", "atomic"],
]);

const COMPOSITE_TAGS = new Map<DwTag, CompositeKind>([
  ["DW_TAG_structure_type", "struct"],
  ["DW_TAG_class_type", "class"],
  ["DW_TAG_union_type", "union"],
  ["DW_TAG_interface_type", "interface"],
]);

const OTHER_TYPE_TAGS = new Set<DwTag>([
  "DW_TAG_base_type",
  "DW_TAG_unspecified_type",
  "DW_TAG_array_type",
  "DW_TAG_enumeration_type",
  "DW_TAG_typedef",
  "DW_TAG_subroutine_type",
]);

export function isTypeTag(tag: DwTag): boolean {
  return (
    POINTER_TAGS.has(tag) ||
    QUALIFIER_TAGS.has(tag) ||
    COMPOSITE_TAGS.has(tag) ||
    OTHER_TYPE_TAGS.has(tag)
  );
}

// Node fields that hold edges rather than plain numbers.
const REF_FIELDS = new Set(["target", "element", "underlying", "return_type", "containing_type", "type"]);

export interface TypeGraphOptions {
  littleEndian?: boolean;
  maxExpressionSteps?: number;
}

// Queues the DIE at `offset`, reached through an edge of the DIE at `from`.
type Enqueue = (offset: number, from: number) => void;

/**
 * Arena of resolved types keyed by DIE offset. Edges are offsets, so a
 * cycle is just an edge back to a node in the arena. Resolving a node
 * resolves everything reachable from it from a worklist; nothing reaches
 * the arena unless the whole reachable set resolves.
 */
export class TypeGraph {
  private readonly nodes = new Map<number, TypeNode>();

  constructor(
    private readonly lookup: (offset: number) => DIE | undefined,
    private readonly options: TypeGraphOptions = {}
  ) {}

  get size() {
    return this.nodes.size;
  }

  resolve(offset: number): TypeNode {
    return this.resolveFrom(offset);
  }

  /**
   * The type of the DIE at `offset`: the DIE itself when it is a type, its
   * DW_AT_type otherwise.
   */
  typeOf(offset: number): TypeNode {
    const die = this.lookup(offset);
    if (!die) {
      throw DwarfError.unresolvedTypeReference(offset);
    }
    if (isTypeTag(die.tag)) {
      return this.resolve(offset);
    }
    const ref = this.edge(die, "DW_AT_type", () => undefined);
    return ref === undefined ? VOID : this.resolveFrom(ref, offset);
  }

  /**
   * Structural equality. Pairs of edges already under comparison count as
   * equal, so cyclic types compare finitely.
   */
  typesEqual(left: number | TypeNode, right: number | TypeNode): boolean {
    const seen = new Set<string>();
    const pairs: [TypeRef, TypeRef][] = [];
    if (typeof left === "number" && typeof right === "number") {
      pairs.push([left, right]);
    } else {
      const a = typeof left === "number" ? this.resolve(left) : left;
      const b = typeof right === "number" ? this.resolve(right) : right;
      if (!this.equalValues(a, b, false, pairs)) {
        return false;
      }
    }

    let pair: [TypeRef, TypeRef] | undefined;
    while ((pair = pairs.pop())) {
      const [a, b] = pair;
      if (a === undefined || b === undefined) {
        if (a !== b) return false;
        continue;
      }
      const key = `${a}:${b}`;
      if (a === b || seen.has(key)) {
        continue;
      }
      seen.add(key);
      if (!this.equalValues(this.resolve(a), this.resolve(b), false, pairs)) {
        return false;
      }
    }
    return true;
  }

  private resolveFrom(offset: number, from?: number): TypeNode {
    const cached = this.nodes.get(offset);
    if (cached) {
      return cached;
    }

    const built = new Map<number, TypeNode>();
    const work: { offset: number; from?: number }[] = [{ offset, from }];
    const enqueue: Enqueue = (target, source) => {
      if (!this.nodes.has(target) && !built.has(target)) {
        work.push({ offset: target, from: source });
      }
    };

    let item: { offset: number; from?: number } | undefined;
    while ((item = work.pop())) {
      if (this.nodes.has(item.offset) || built.has(item.offset)) {
        continue;
      }
      const die = this.lookup(item.offset);
      if (!die) {
        throw DwarfError.unresolvedTypeReference(item.offset, item.from);
      }
      built.set(item.offset, this.build(die, enqueue));
    }

    for (const [key, node] of built) {
      this.nodes.set(key, node);
    }
    const node = built.get(offset);
    if (!node) {
      throw DwarfError.unresolvedTypeReference(offset, from);
    }
    return node;
  }

  private edge(die: DIE, name: DwAt, enqueue: Enqueue): TypeRef {
    const value = die.attributes.get(name);
    if (!value) {
      return undefined;
    }
    if (value.class !== "reference") {
      // Type units (.debug_types) are not decoded.
      throw new DwarfError(
        `${name} of DIE at 0x${die.offset.toString(16)} uses ${value.form}`,
        "UnresolvedTypeReference",
        { offset: die.offset, section: ".debug_info" }
      );
    }
    enqueue(value.value, die.offset);
    return value.value;
  }

  private build(die: DIE, enqueue: Enqueue): TypeNode {
    const { tag } = die;
    const name = stringValue(die.attributes.get("DW_AT_name"));
    const byte_size = constantValue(die.attributes.get("DW_AT_byte_size"));

    const pointer_kind = POINTER_TAGS.get(tag);
    if (pointer_kind) {
      const node: TypeNode = { kind: "pointer", pointer_kind, target: this.edge(die, "DW_AT_type", enqueue) };
      if (byte_size !== undefined) node.byte_size = byte_size;
      if (pointer_kind === "ptr_to_member") {
        node.containing_type = this.edge(die, "DW_AT_containing_type", enqueue);
      }
      return node;
    }

    const qualifier = QUALIFIER_TAGS.get(tag);
    if (qualifier) {
      return { kind: "qualified", qualifier, target: this.edge(die, "DW_AT_type", enqueue) };
    }

    const composite = COMPOSITE_TAGS.get(tag);
    if (composite) {
      const members: Member[] = [];
      const bases: BaseClass[] = [];
      for (const child of die.children) {
        if (child.tag === "DW_TAG_member" && !flagValue(child.attributes.get("DW_AT_declaration"))) {
          members.push(this.member(child, enqueue));
        } else if (child.tag === "DW_TAG_inheritance") {
          bases.push({
            type: this.edge(child, "DW_AT_type", enqueue),
            byte_offset: this.memberLocation(child) ?? 0,
          });
        }
      }
      return {
        kind: composite,
        name,
        byte_size,
        declaration: flagValue(die.attributes.get("DW_AT_declaration")),
        members,
        bases,
      };
    }

    switch (tag) {
      case "DW_TAG_base_type": {
        const node: TypeNode = {
          kind: "base",
          name,
          encoding: describeEncoding(constantValue(die.attributes.get("DW_AT_encoding")) ?? 0),
          byte_size: byte_size ?? 0,
        };
        const bit_size = constantValue(die.attributes.get("DW_AT_bit_size"));
        if (bit_size !== undefined) node.bit_size = bit_size;
        return node;
      }
      case "DW_TAG_unspecified_type":
        return { kind: "unspecified", name };
      case "DW_TAG_typedef":
        return { kind: "typedef", name, target: this.edge(die, "DW_AT_type", enqueue) };
      case "DW_TAG_array_type": {
        const element = this.edge(die, "DW_AT_type", enqueue);
        const dimensions = die.children
          .filter((child) => child.tag === "DW_TAG_subrange_type")
          .map((child) => dimension(child));
        return { kind: "array", name, element, dimensions, byte_size };
      }
      case "DW_TAG_enumeration_type": {
        const enumerators: Enumerator[] = [];
        for (const child of die.children) {
          if (child.tag !== "DW_TAG_enumerator") continue;
          const value = child.attributes.get("DW_AT_const_value");
          enumerators.push({
            name: stringValue(child.attributes.get("DW_AT_name")) ?? "",
            value: value?.class === "constant" ? value.value : 0n,
          });
        }
        return {
          kind: "enum",
          name,
          byte_size,
          underlying: this.edge(die, "DW_AT_type", enqueue),
          enumerators,
        };
      }
      case "DW_TAG_subroutine_type": {
        const parameters: TypeRef[] = [];
        let variadic = false;
        for (const child of die.children) {
          if (child.tag === "DW_TAG_formal_parameter") {
            parameters.push(this.edge(child, "DW_AT_type", enqueue));
          } else if (child.tag === "DW_TAG_unspecified_parameters") {
            variadic = true;
          }
        }
        return {
          kind: "subroutine",
          return_type: this.edge(die, "DW_AT_type", enqueue),
          parameters,
          variadic,
          prototyped: flagValue(die.attributes.get("DW_AT_prototyped")),
        };
      }
      default:
        throw DwarfError.unsupportedTag(tag, die.offset);
    }
  }

  private member(die: DIE, enqueue: Enqueue): Member {
    const type = this.edge(die, "DW_AT_type", enqueue);
    const location = this.memberLocation(die);
    const bit_size = constantValue(die.attributes.get("DW_AT_bit_size"));
    const storage = constantValue(die.attributes.get("DW_AT_byte_size"));
    const data_bit_offset = constantValue(die.attributes.get("DW_AT_data_bit_offset"));
    const legacy_bit_offset = constantValue(die.attributes.get("DW_AT_bit_offset"));

    const member: Member = {
      type,
      byte_offset: location ?? 0,
    };
    const name = stringValue(die.attributes.get("DW_AT_name"));
    if (name !== undefined) member.name = name;
    if (storage !== undefined) member.byte_size = storage;

    if (data_bit_offset !== undefined) {
      let byte_offset = location;
      if (byte_offset === undefined) {
        const unit = storage ?? 1;
        byte_offset = Math.floor(data_bit_offset / (unit * 8)) * unit;
      }
      member.byte_offset = byte_offset;
      member.bit_offset = data_bit_offset - byte_offset * 8;
    } else if (legacy_bit_offset !== undefined && bit_size !== undefined) {
      // DW_AT_bit_offset counts from the most significant bit of the storage.
      const unit = storage ?? this.storageSize(type) ?? Math.ceil((legacy_bit_offset + bit_size) / 8);
      member.bit_offset =
        (this.options.littleEndian ?? true)
          ? unit * 8 - legacy_bit_offset - bit_size
          : legacy_bit_offset;
    }
    if (bit_size !== undefined) member.bit_size = bit_size;

    return member;
  }

  private memberLocation(die: DIE): number | undefined {
    const value = die.attributes.get("DW_AT_data_member_location");
    if (!value) {
      return undefined;
    }
    if (value.class === "constant") {
      return Number(value.value);
    }
    if (value.class === "exprloc" || value.class === "block") {
      const location = evaluateExpression(value.value, {
        address_size: die.unit.address_size,
        offset_size: die.unit.offset_size,
        littleEndian: this.options.littleEndian,
        maxSteps: this.options.maxExpressionSteps,
        initialStack: [0n],
      });
      if (location.kind === "address") {
        return Number(location.address);
      }
    }
    throw DwarfError.malformedExpression(
      `DW_AT_data_member_location of DIE at 0x${die.offset.toString(16)} is not a static offset`,
      die.offset
    );
  }

  // Byte size of a type DIE after stripping typedefs and qualifiers.
  private storageSize(ref: TypeRef): number | undefined {
    const seen = new Set<number>();
    while (ref !== undefined && !seen.has(ref)) {
      seen.add(ref);
      const die = this.lookup(ref);
      if (!die) return undefined;
      if (die.tag === "DW_TAG_typedef" || QUALIFIER_TAGS.has(die.tag)) {
        const target = die.attributes.get("DW_AT_type");
        ref = target?.class === "reference" ? target.value : undefined;
        continue;
      }
      return constantValue(die.attributes.get("DW_AT_byte_size"));
    }
    return undefined;
  }

  // Compares one level of two nodes; edge pairs are queued on `pairs`.
  private equalValues(a: unknown, b: unknown, isRef: boolean, pairs: [TypeRef, TypeRef][]): boolean {
    if (isRef && (typeof a === "number" || a === undefined) && (typeof b === "number" || b === undefined)) {
      pairs.push([a, b]);
      return true;
    }
    if (Array.isArray(a) && Array.isArray(b)) {
      return a.length === b.length && a.every((value, i) => this.equalValues(value, b[i], isRef, pairs));
    }
    if (typeof a === "object" && a !== null && typeof b === "object" && b !== null) {
      const left = Object.entries(a).filter(([, value]) => value !== undefined);
      const right = new Map(Object.entries(b).filter(([, value]) => value !== undefined));
      if (left.length !== right.size) {
        return false;
      }
      return left.every(
        ([key, value]) =>
          right.has(key) &&
          this.equalValues(value, right.get(key), REF_FIELDS.has(key) || key === "parameters", pairs)
      );
    }
    return a === b;
  }
}

const DATA_FORM_BITS: Partial<Record<DwFormName, number>> = {
  DW_FORM_data1: 8,
  DW_FORM_data2: 16,
  DW_FORM_data4: 32,
  DW_FORM_data8: 64,
};

// Array bounds are signed; compilers write -1 in fixed-size data forms.
function bound(value: AttributeValue | undefined): bigint | undefined {
  if (value?.class !== "constant") {
    return undefined;
  }
  const bits = DATA_FORM_BITS[value.form];
  return bits !== undefined && !value.signed ? BigInt.asIntN(bits, value.value) : value.value;
}

function dimension(die: DIE): Dimension {
  const lower = bound(die.attributes.get("DW_AT_lower_bound")) ?? 0n;
  const lower_bound = Number(lower);
  const count = constantValue(die.attributes.get("DW_AT_count"));
  if (count !== undefined) {
    return { lower_bound, count };
  }
  const upper = bound(die.attributes.get("DW_AT_upper_bound"));
  if (upper !== undefined && upper >= lower - 1n) {
    return { lower_bound, count: Number(upper - lower + 1n) };
  }
  return { lower_bound };
}

function stringValue(value: AttributeValue | undefined): string | undefined {
  return value?.class === "string" ? value.value : undefined;
}

function flagValue(value: AttributeValue | undefined): boolean {
  return value?.class === "flag" ? value.value : false;
}
