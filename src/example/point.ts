import { t } from "../codec/field-types";
import type { Converter } from "../codec/types";
import { defineType } from "../definers/builders/type";

export const MISSING_DESCRIPTION = "No description provided.";

export class Point {
  additionalValues: Map<number, number> | null = null;
  description: string | null = null;

  constructor(
    public readonly x: number,
    public readonly y: number,
  ) {}
}

/**
 * Substitutes a placeholder for null or absent descriptions.
 */
export const descriptionConverter: Converter<string | null> = {
  handlesNull: true,
  encode: (value) => value,
  decode: (token) => (typeof token === "string" ? token : MISSING_DESCRIPTION),
};

export const pointType = defineType(Point)
  .field("x", t.integer(), { readOnly: true })
  .field("y", t.integer(), { readOnly: true })
  .field(
    "additionalValues",
    t.nullable(t.dictionary(t.integer(), t.integer())),
    { member: "field" },
  )
  .field("description", t.nullable(t.string()), {
    converter: descriptionConverter,
  })
  .constructWith(["x", "y"], ({ x, y }) => new Point(x, y))
  .build();
