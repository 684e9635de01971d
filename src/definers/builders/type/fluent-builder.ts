import type { FieldType } from "../../../codec/field-types";
import type {
  ConstructionDefinition,
  FieldDefinition,
  FieldOptions,
} from "../../../types/typeDefinition";
import { defineTypeDefinition } from "../../defineType";
import { appendItem, cloneState } from "../utils";
import type { TypeFluentBuilder } from "./fluent-builder.interface";
import type { TypeBuilderState } from "./types";

/**
 * Creates a TypeFluentBuilder from the given state.
 */
export function makeTypeBuilder<
  T extends object,
  TFields extends object = Record<never, never>,
>(state: TypeBuilderState<T>): TypeFluentBuilder<T, TFields> {
  const builder: TypeFluentBuilder<T, TFields> = {
    type: state.type,

    field<K extends keyof T & string>(
      name: K,
      type: FieldType<T[K]>,
      options: FieldOptions<T, T[K]> = {},
    ) {
      const field: FieldDefinition = {
        name,
        type,
        options: Object.freeze({ ...options }),
      };
      return makeTypeBuilder<T, TFields & Record<K, T[K]>>(
        cloneState(state, { fields: appendItem(state.fields, field) }),
      );
    },

    constructWith(parameters, create) {
      const construction: ConstructionDefinition = {
        kind: "constructor",
        parameters: Object.freeze([...parameters]),
        create,
      };
      return makeTypeBuilder<T, TFields>(
        cloneState(state, { construction: Object.freeze(construction) }),
      );
    },

    factory(create) {
      const construction: ConstructionDefinition = { kind: "shell", create };
      return makeTypeBuilder<T, TFields>(
        cloneState(state, { construction: Object.freeze(construction) }),
      );
    },

    build() {
      return defineTypeDefinition(state);
    },
  };

  return builder;
}
