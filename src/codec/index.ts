export { Codec } from "./Codec";
export type { CodecConfig } from "./Codec";
export { t, unwrapNullable, zeroValueOf, describeFieldType } from "./field-types";
export type { FieldType, FieldTypeNode, FieldKind } from "./field-types";
export { TypeModel, defaultTypeModel } from "./type-model";
export type {
  FieldDescriptor,
  MemberPlan,
  PlannedMember,
  TypeDescriptor,
} from "./type-model";
export { ReferenceTracker } from "./reference-tracker";
export {
  ConverterRegistry,
  createDefaultConverterRegistry,
} from "./converter-registry";
export { builtInConverters, dateConverter, urlConverter } from "./builtins";
export {
  createCodecOptions,
  mergeCodecOptions,
  DEFAULT_MAX_DEPTH,
} from "./options";
export {
  toCamelCase,
  toPascalCase,
  toSnakeCase,
  toKebabCase,
  resolveNamingPolicy,
} from "./naming-policy";
export { readNumber, writeNumber, JSON_NUMBER } from "./number-handling";
export { formatKey, parseKey } from "./dictionary-keys";
export { writeJson } from "./json-writer";
export type { JsonNode, JsonObjectNode } from "./json-writer";
export * from "./types";
