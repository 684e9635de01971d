import type { Constructor } from "../../../codec/types";
import { makeTypeBuilder } from "./fluent-builder";
import type { TypeFluentBuilder } from "./fluent-builder.interface";
import type { TypeBuilderState } from "./types";

export * from "./fluent-builder.interface";
export * from "./fluent-builder";
export * from "./types";

/**
 * Entry point for describing how a class maps to JSON.
 *
 * @example
 * ```ts
 * const pointType = defineType(Point)
 *   .field("x", t.integer(), { readOnly: true })
 *   .field("y", t.integer(), { readOnly: true })
 *   .constructWith(["x", "y"], ({ x, y }) => new Point(x, y))
 *   .build();
 * ```
 */
export function defineType<T extends object>(
  type: Constructor<T>,
): TypeFluentBuilder<T> {
  const initial: TypeBuilderState<T> = Object.freeze({
    type,
    fields: Object.freeze([]),
  });

  return makeTypeBuilder(initial);
}
