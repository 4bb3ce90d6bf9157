import type { AbbrevTable } from "./abbrev";
import type { CfaRule, RegisterRule, UnwindRow } from "./call_frame";
import type { DIE } from "./die";
import type { Location } from "./expression";
import type { AttributeValue } from "./forms";
import type { LineTable } from "./line_program";

const hex = (value: number | bigint) => "0x" + value.toString(16);

export function formatAbbrevTable(abbrevTable: AbbrevTable): string {
  const lines: string[] = [];
  for (const record of abbrevTable.values()) {
    lines.push(
      `${record.decl_code}      ${record.tag}    [${record.has_children ? "has children" : "no children"}]`
    );
    for (const spec of record.attr_spec) {
      const implicit = spec.implicit_const !== undefined ? ` ${spec.implicit_const}` : "";
      lines.push(`    ${spec.name.padEnd(24)} ${spec.form}${implicit}`);
    }
  }
  return lines.join("\n");
}

export function formatAttributeValue(value: AttributeValue): string {
  switch (value.class) {
    case "address":
    case "signature":
      return hex(value.value);
    case "reference":
    case "sec_offset":
      return `<${hex(value.value)}>`;
    case "block":
    case "exprloc":
      return `${value.value.length} byte block: ${value.value.toString("hex")}`;
    case "string":
      return value.str_offset !== undefined
        ? `(indirect string, offset: ${hex(value.str_offset)}): ${value.value}`
        : value.value;
    case "constant":
    case "flag":
      return String(value.value);
  }
}

/** One line per DIE and attribute, indented by depth, readelf style. */
export function formatDieTree(die: DIE, depth = 0): string {
  const lines = [` <${depth}><${hex(die.offset)}>: Abbrev Number: ${die.abbrev_code} (${die.tag})`];
  for (const [name, value] of die.attributes) {
    lines.push(`    <${hex(die.offset)}>   ${name.padEnd(18)}: ${formatAttributeValue(value)}`);
  }
  for (const child of die.children) {
    lines.push(formatDieTree(child, depth + 1));
  }
  return lines.join("\n");
}

export function formatLineTable(table: LineTable): string {
  const lines = ["Address            File  Line  Column  Flags"];
  for (const row of table.rows) {
    const flags = [
      row.is_stmt ? "is_stmt" : "",
      row.end_sequence ? "end_sequence" : "",
      row.prologue_end ? "prologue_end" : "",
      row.epilogue_begin ? "epilogue_begin" : "",
    ]
      .filter(Boolean)
      .join(" ");
    lines.push(
      `${hex(row.address).padEnd(18)} ${String(row.file).padStart(4)} ${String(row.line).padStart(5)} ${String(row.column).padStart(7)}  ${flags}`
    );
  }
  return lines.join("\n");
}

function formatCfaRule(rule: CfaRule): string {
  if (rule.kind === "expression") {
    return `exp(${rule.expression.toString("hex")})`;
  }
  const sign = rule.offset < 0n ? "" : "+";
  return `r${rule.register}${sign}${rule.offset}`;
}

function formatRegisterRule(rule: RegisterRule): string {
  switch (rule.kind) {
    case "undefined":
      return "u";
    case "same_value":
      return "s";
    case "offset":
      return `c${rule.offset < 0n ? "" : "+"}${rule.offset}`;
    case "val_offset":
      return `v(c${rule.offset < 0n ? "" : "+"}${rule.offset})`;
    case "register":
      return `r${rule.register}`;
    case "expression":
      return `exp(${rule.expression.toString("hex")})`;
    case "val_expression":
      return `vexp(${rule.expression.toString("hex")})`;
  }
}

export function formatUnwindRow(row: UnwindRow): string {
  const registers = [...row.registers.entries()]
    .sort(([a], [b]) => a - b)
    .map(([register, rule]) => `r${register}=${formatRegisterRule(rule)}`);
  return [`${hex(row.low_pc)}..${hex(row.high_pc)}`, `cfa=${formatCfaRule(row.cfa)}`, ...registers].join(" ");
}

export function formatLocation(location: Location): string {
  switch (location.kind) {
    case "address":
      return `[${hex(location.address)}]`;
    case "register":
      return `reg${location.register}`;
    case "value":
      return `value ${hex(location.value)}`;
    case "implicit":
      return `implicit ${location.data.toString("hex")}`;
    case "empty":
      return "<optimized out>";
    case "pieces":
      return location.pieces
        .map((piece) => {
          const offset = piece.bit_offset ? `@${piece.bit_offset}` : "";
          return `${formatLocation(piece.location)}:${piece.bit_size}b${offset}`;
        })
        .join(" ");
  }
}

export function debugPrintAbbrevTable(abbrevTable: AbbrevTable) {
  console.log(formatAbbrevTable(abbrevTable));
}

export function debugPrintDieTree(die: DIE) {
  console.log(formatDieTree(die));
}

export function debugPrintLineTable(table: LineTable) {
  console.log(formatLineTable(table));
}

export function debugPrintUnwindRows(rows: UnwindRow[]) {
  rows.forEach((row) => console.log(formatUnwindRow(row)));
}
