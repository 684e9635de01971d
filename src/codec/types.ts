/**
 * Shared type definitions for the codec.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue =
  | JsonPrimitive
  | JsonValue[]
  | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Any class whose instances the codec can describe. Constructor arguments are
 * irrelevant to identity; types needing arguments declare constructWith().
 */
export type Constructor<T extends object = object> = new (
  ...args: never[]
) => T;

export enum IgnoreCondition {
  /** Always emitted, even when the global default would omit it */
  Never = "Never",
  /** Never emitted nor read */
  Always = "Always",
  WhenWritingNull = "WhenWritingNull",
  WhenWritingDefault = "WhenWritingDefault",
}

/**
 * Bit flags; combine with `|`.
 */
export enum NumberHandling {
  Strict = 0,
  AllowReadingFromString = 1,
  WriteAsString = 2,
  AllowNamedFloatingPointLiterals = 4,
}

export enum ReferenceHandling {
  None = "None",
  Preserve = "Preserve",
}

export enum CodecDefaults {
  /** Member names as declared, case-sensitive matching, strict numbers */
  General = "General",
  /** camelCase names, case-insensitive matching, numbers readable from strings */
  Web = "Web",
}

export type NamingPolicyName =
  | "camelCase"
  | "pascalCase"
  | "snakeCase"
  | "kebabCase";

export type NamingPolicy = NamingPolicyName | ((name: string) => string);

export interface CodecOptions {
  propertyNamingPolicy?: NamingPolicy | null;
  propertyNameCaseInsensitive?: boolean;
  /** Global omission rule; `IgnoreCondition.Always` is rejected */
  defaultIgnoreCondition?: IgnoreCondition;
  numberHandling?: NumberHandling;
  referenceHandling?: ReferenceHandling;
  /** Include members declared with `member: "field"` */
  includeFields?: boolean;
  writeIndented?: boolean;
  /** Maximum nesting depth for encode and decode */
  maxDepth?: number;
}

export type ResolvedCodecOptions = Readonly<Required<CodecOptions>>;

/**
 * Handed to converters so they can honour the active options.
 */
export interface ConverterContext {
  readonly options: ResolvedCodecOptions;
  /** JSON path of the value being converted, e.g. `$.reports[0].name` */
  readonly path: string;
}

/**
 * A user-supplied encode/decode pair. Attach it to a member with
 * `field(..., { converter })` or register it for a type.
 */
export interface Converter<T> {
  /**
   * When true, decode() also receives `null` for null tokens and for members
   * absent from the JSON object. Otherwise null short-circuits to the zero value.
   */
  readonly handlesNull?: boolean;
  encode(value: T, context: ConverterContext): JsonValue;
  decode(token: JsonValue, context: ConverterContext): T;
}

export type PrimitiveTypeKey = "string" | "number" | "boolean";

export type ConverterTarget = Constructor | PrimitiveTypeKey;

export interface ConverterEntry<T = unknown> extends Converter<T> {
  readonly type: ConverterTarget;
}
