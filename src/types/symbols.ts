/** @internal Marks an error helper built through error() */
export const symbolError: unique symbol = Symbol.for("graphcodec.error");

/** @internal Marks a type definition built through defineType() */
export const symbolTypeDefinition: unique symbol = Symbol.for(
  "graphcodec.typeDefinition",
);
