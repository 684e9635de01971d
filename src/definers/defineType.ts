import { invalidTypeDefinitionError } from "../errors";
import { IgnoreCondition } from "../codec/types";
import type { TypeBuilderState } from "./builders/type/types";
import type { TypeDefinition } from "../types/typeDefinition";
import { symbolTypeDefinition } from "../types/symbols";

const fail = (typeName: string, message: string): never => {
  throw invalidTypeDefinitionError.create({ typeName, message });
};

function assertValidDefinition<T extends object>(
  state: TypeBuilderState<T>,
): void {
  const typeName = state.type.name || "anonymous class";
  const byName = new Map(state.fields.map((field) => [field.name, field]));

  if (byName.size !== state.fields.length) {
    const seen = new Set<string>();
    for (const field of state.fields) {
      if (seen.has(field.name)) {
        fail(typeName, `member "${field.name}" is declared more than once`);
      }
      seen.add(field.name);
    }
  }

  for (const field of state.fields) {
    if (field.name.length === 0) {
      fail(typeName, "member names cannot be empty");
    }
    if (field.options.jsonName !== undefined && field.options.jsonName.length === 0) {
      fail(typeName, `member "${field.name}" has an empty jsonName`);
    }
  }

  if (state.construction?.kind !== "constructor") {
    return;
  }

  const parameters = state.construction.parameters;
  if (new Set(parameters).size !== parameters.length) {
    fail(typeName, "constructor parameters must be unique");
  }
  for (const parameter of parameters) {
    const field = byName.get(parameter);
    if (!field) {
      fail(typeName, `constructor parameter "${parameter}" is not a declared member`);
    } else if (field.options.ignore === IgnoreCondition.Always) {
      fail(
        typeName,
        `constructor parameter "${parameter}" is ignored with IgnoreCondition.Always`,
      );
    }
  }
}

/**
 * Validate and freeze the builder state into a registrable definition.
 */
export function defineTypeDefinition<T extends object>(
  state: TypeBuilderState<T>,
): TypeDefinition<T> {
  assertValidDefinition(state);
  const definition: TypeDefinition<T> = {
    [symbolTypeDefinition]: true,
    type: state.type,
    fields: state.fields,
    construction: state.construction,
  };
  Object.freeze(definition);
  return definition;
}

export const isTypeDefinition = (value: unknown): value is TypeDefinition =>
  typeof value === "object" && value !== null && symbolTypeDefinition in value;
