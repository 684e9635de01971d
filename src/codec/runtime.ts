import type { ConverterRegistry } from "./converter-registry";
import type { FieldTypeNode } from "./field-types";
import type { TypeModel } from "./type-model";
import type {
  ConverterEntry,
  NumberHandling,
  ResolvedCodecOptions,
} from "./types";

/**
 * Collaborators shared by one encode or decode call.
 */
export interface CodecRuntime {
  readonly typeModel: TypeModel;
  readonly converters: ConverterRegistry;
  readonly options: ResolvedCodecOptions;
}

export interface Frame {
  readonly path: string;
  readonly depth: number;
  /** Number handling in effect for numbers at this position */
  readonly handling: NumberHandling;
}

export const rootFrame = (options: ResolvedCodecOptions): Frame => ({
  path: "$",
  depth: 0,
  handling: options.numberHandling,
});

/**
 * Nested position; collections inherit the handling of the member holding them.
 */
export const childFrame = (
  frame: Frame,
  suffix: string,
  handling: NumberHandling = frame.handling,
): Frame => ({
  path: `${frame.path}${suffix}`,
  depth: frame.depth + 1,
  handling,
});

/**
 * Registry converter for a declared, already unwrapped type.
 */
export function declaredConverter(
  converters: ConverterRegistry,
  type: FieldTypeNode,
): ConverterEntry | undefined {
  switch (type.kind) {
    case "object":
      return converters.lookup(type.target());
    case "string":
    case "boolean":
    case "number":
      return converters.lookup(type.kind);
    case "integer":
      return converters.lookup("number");
    default:
      return undefined;
  }
}
