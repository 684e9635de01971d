import type { Constructor, JsonValue } from "./types";

/**
 * Runtime shape of a member's value type.
 */
export type FieldTypeNode =
  | { readonly kind: "string" }
  | { readonly kind: "number" }
  | { readonly kind: "integer" }
  | { readonly kind: "boolean" }
  | { readonly kind: "unknown" }
  | { readonly kind: "object"; readonly target: () => Constructor }
  | { readonly kind: "array"; readonly items: FieldTypeNode }
  | {
      readonly kind: "dictionary";
      readonly key: FieldTypeNode;
      readonly value: FieldTypeNode;
    }
  | { readonly kind: "record"; readonly value: FieldTypeNode }
  | { readonly kind: "nullable"; readonly inner: FieldTypeNode };

export type FieldKind = FieldTypeNode["kind"];

/**
 * A field type carrying the TypeScript type of its values as a phantom.
 */
export type FieldType<T> = FieldTypeNode & { readonly __value?: T };

export const t = {
  string: (): FieldType<string> => ({ kind: "string" }),
  number: (): FieldType<number> => ({ kind: "number" }),
  integer: (): FieldType<number> => ({ kind: "integer" }),
  boolean: (): FieldType<boolean> => ({ kind: "boolean" }),
  /** Raw JSON; `$id`/`$ref` are still resolved when references are preserved */
  unknown: (): FieldType<unknown> => ({ kind: "unknown" }),
  /**
   * A registered class, or a class owned by a converter. The thunk lets a
   * class refer to itself or to classes declared later.
   */
  object: <T extends object>(target: () => Constructor<T>): FieldType<T> => ({
    kind: "object",
    target,
  }),
  array: <T>(items: FieldType<T>): FieldType<T[]> => ({
    kind: "array",
    items,
  }),
  dictionary: <K, V>(
    key: FieldType<K>,
    value: FieldType<V>,
  ): FieldType<Map<K, V>> => ({ kind: "dictionary", key, value }),
  record: <V>(value: FieldType<V>): FieldType<Record<string, V>> => ({
    kind: "record",
    value,
  }),
  nullable: <T>(inner: FieldType<T>): FieldType<T | null> => ({
    kind: "nullable",
    inner,
  }),
} as const;

export const unwrapNullable = (
  type: FieldTypeNode,
): { inner: FieldTypeNode; nullable: boolean } =>
  type.kind === "nullable"
    ? { inner: unwrapNullable(type.inner).inner, nullable: true }
    : { inner: type, nullable: false };

/**
 * The value a member holds when nothing was assigned: 0, false, "" or null.
 */
export const zeroValueOf = (type: FieldTypeNode): JsonValue => {
  switch (type.kind) {
    case "number":
    case "integer":
      return 0;
    case "boolean":
      return false;
    case "string":
      return "";
    default:
      return null;
  }
};

/**
 * Human-readable name used in error messages.
 */
export const describeFieldType = (type: FieldTypeNode): string => {
  switch (type.kind) {
    case "object":
      return type.target().name || "anonymous class";
    case "array":
      return `array of ${describeFieldType(type.items)}`;
    case "dictionary":
      return `dictionary of ${describeFieldType(type.key)} to ${describeFieldType(type.value)}`;
    case "record":
      return `record of ${describeFieldType(type.value)}`;
    case "nullable":
      return `${describeFieldType(type.inner)} or null`;
    default:
      return type.kind;
  }
};

export type FieldTypeNodeOf<K extends FieldKind> = Extract<
  FieldTypeNode,
  { kind: K }
>;

export const UNKNOWN_TYPE: FieldTypeNode = Object.freeze({ kind: "unknown" });
