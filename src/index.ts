export { AbbrevCache, parseAbbrevTable } from "./abbrev";
export type { AbbrevRecord, AbbrevTable, AttrSpec } from "./abbrev";
export { OffsetBuffer, decodeUnsigned, readInitialLength, readStringAt } from "./buffer";
export {
  decodeUnwindRows,
  findFde,
  parseCallFrameSection,
  parseCie,
  recoverCallerFrame,
} from "./call_frame";
export type {
  CallFrameSection,
  CallerFrame,
  CfaRule,
  CommonInformationEntry,
  FrameDescriptionEntry,
  RegisterRule,
  UnwindRow,
} from "./call_frame";
export {
  debugPrintAbbrevTable,
  debugPrintDieTree,
  debugPrintLineTable,
  debugPrintUnwindRows,
  formatAbbrevTable,
  formatAttributeValue,
  formatDieTree,
  formatLineTable,
  formatLocation,
  formatUnwindRow,
} from "./debug_print";
export {
  SUPPORTED_UNIT_VERSIONS,
  buildDieTree,
  dieName,
  flattenDies,
  parseCompilationUnit,
  parseCompilationUnits,
  parseUnitHeader,
} from "./die";
export type { CompilationUnit, DIE, UnitHeader } from "./die";
export { readElfSections } from "./elf";
export type { ElfImage, ElfSectionHeader } from "./elf";
export { describeAttribute, describeEncoding, describeTag } from "./enums";
export type { DwAt, DwAte, DwFormName, DwTag, FormClass } from "./enums";
export { DwarfError, failed, found } from "./errors";
export type { DecodeFailure, DwarfErrorCode, DwarfErrorDetails, QueryResult } from "./errors";
export { DW_OP, decodeExpression, evaluateExpression } from "./expression";
export type {
  EvaluationContext,
  ExpressionFormat,
  Location,
  Operation,
  Piece,
  SimpleLocation,
  TargetAccess,
} from "./expression";
export { constantValue, readAttribute } from "./forms";
export type { AttributeValue, FormContext } from "./forms";
export { DebugImage } from "./image";
export type { FunctionInfo } from "./image";
export { LineState, LineTable, decodeLineProgram, fileMatches, parseLineProgramHeader } from "./line_program";
export type {
  FileEntry,
  LineProgram,
  LineProgramHeader,
  LineSequence,
  LineTableRow,
  SourcePosition,
} from "./line_program";
export { rangesContain, readLocationList, readRangeList, selectLocation } from "./location";
export type { AddressRange, ListFormat, LocationListEntry } from "./location";
export { DEFAULT_OPTIONS, resolveOptions } from "./options";
export type { DecodeOptions } from "./options";
export { DEBUG_SECTION_IDS, SectionTable, isSectionId } from "./sections";
export type { SectionId, SectionRange } from "./sections";
export { TypeGraph, VOID, isTypeTag } from "./type_graph";
export type { Dimension, Enumerator, Member, TypeGraphOptions, TypeNode, TypeRef } from "./type_graph";
