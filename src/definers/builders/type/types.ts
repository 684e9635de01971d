import type { Constructor } from "../../../codec/types";
import type {
  ConstructionDefinition,
  FieldDefinition,
} from "../../../types/typeDefinition";

/**
 * Internal state for the TypeFluentBuilder.
 * Kept immutable and frozen.
 */
export type TypeBuilderState<T extends object> = Readonly<{
  type: Constructor<T>;
  fields: ReadonlyArray<FieldDefinition>;
  construction?: ConstructionDefinition;
}>;
