import type { FieldTypeNode } from "../codec/field-types";
import type {
  Constructor,
  Converter,
  IgnoreCondition,
  NumberHandling,
} from "../codec/types";
import { symbolTypeDefinition } from "./symbols";

/**
 * `"field"` members only take part when `includeFields` is on or the member
 * is declared with `include: true`.
 */
export type MemberKind = "property" | "field";

export interface FieldOptions<T extends object, V> {
  /** Exact JSON name; bypasses the naming policy */
  jsonName?: string;
  ignore?: IgnoreCondition;
  /** Owns encode and decode of this member's value */
  converter?: Converter<V>;
  numberHandling?: NumberHandling;
  member?: MemberKind;
  /**
   * Skipped on decode unless `include` is also set, in which case the value
   * is defined as an own property of the instance.
   */
  readOnly?: boolean;
  include?: boolean;
  /** Compared against with `equals` for `WhenWritingDefault` */
  defaultValue?: V;
  get?(instance: T): V;
  set?(instance: T, value: V): void;
  equals?(left: V, right: V): boolean;
}

export interface FieldDefinition {
  readonly name: string;
  readonly type: FieldTypeNode;
  readonly options: Readonly<FieldOptions<object, unknown>>;
}

export type ConstructionDefinition =
  | {
      readonly kind: "shell";
      create(): object;
    }
  | {
      readonly kind: "constructor";
      readonly parameters: readonly string[];
      create(args: Readonly<Record<string, unknown>>): object;
    };

export interface TypeDefinition<T extends object = object> {
  readonly [symbolTypeDefinition]: true;
  readonly type: Constructor<T>;
  readonly fields: readonly FieldDefinition[];
  /** Absent means `new type()` */
  readonly construction?: ConstructionDefinition;
}
