import { invalidJsonError } from "../errors";
import { Logger } from "../models/Logger";
import type { TypeDefinition } from "../types/typeDefinition";
import {
  ConverterRegistry,
  createDefaultConverterRegistry,
} from "./converter-registry";
import { GraphDecoder } from "./decoder";
import { GraphEncoder } from "./encoder";
import { UNKNOWN_TYPE } from "./field-types";
import type { FieldType, FieldTypeNode } from "./field-types";
import { writeJson } from "./json-writer";
import { createCodecOptions, mergeCodecOptions } from "./options";
import type { CodecRuntime } from "./runtime";
import { defaultTypeModel, TypeModel } from "./type-model";
import { CodecDefaults } from "./types";
import type {
  CodecOptions,
  Constructor,
  JsonValue,
  ResolvedCodecOptions,
} from "./types";

export interface CodecConfig {
  /** Preset, or already resolved options to layer `options` over */
  defaults?: CodecDefaults | ResolvedCodecOptions;
  options?: CodecOptions;
  /** Defaults to the shared model */
  typeModel?: TypeModel;
  /** Defaults to a registry with the built-in converters; locked on use */
  converters?: ConverterRegistry;
  /** Registered on the type model before first use */
  types?: readonly TypeDefinition[];
  logger?: Logger;
}

const toTypeNode = (
  type: Constructor | FieldTypeNode | undefined,
): FieldTypeNode => {
  if (type === undefined) {
    return UNKNOWN_TYPE;
  }
  if (typeof type === "function") {
    const target: Constructor = type;
    return { kind: "object", target: () => target };
  }
  return type;
};

const parseJson = (text: string): JsonValue => {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw invalidJsonError.create({ message: error.message, cause: error });
    }
    throw error;
  }
};

/**
 * Encodes typed object graphs to JSON text and back. Options are fixed per
 * instance; `withOptions` derives a sibling sharing the model and converters.
 */
export class Codec {
  public readonly options: ResolvedCodecOptions;
  public readonly typeModel: TypeModel;
  public readonly converters: ConverterRegistry;
  private readonly logger: Logger;

  constructor(config: CodecConfig = {}) {
    const { defaults = CodecDefaults.General } = config;
    this.options =
      typeof defaults === "string"
        ? createCodecOptions(defaults, config.options)
        : mergeCodecOptions(defaults, config.options);
    this.typeModel = config.typeModel ?? defaultTypeModel;
    this.converters = config.converters ?? createDefaultConverterRegistry();
    this.logger = (config.logger ?? Logger.silent()).with({ source: "codec" });

    if (config.types) {
      this.typeModel.register(...config.types);
    }
    this.converters.lock();
  }

  public encode(value: unknown, type?: Constructor | FieldTypeNode): string {
    const runtime = this.runtime();
    const node = new GraphEncoder(runtime).encode(value, toTypeNode(type));
    const text = writeJson(node, this.options.writeIndented);
    this.logger.trace("Encoded value", { data: { length: text.length } });
    return text;
  }

  public decode<T extends object>(text: string, type: Constructor<T>): T;
  public decode<T>(text: string, type: FieldType<T>): T;
  public decode(text: string): unknown;
  public decode(text: string, type?: Constructor | FieldTypeNode): unknown {
    const token = parseJson(text);
    const value = new GraphDecoder(this.runtime()).decode(
      token,
      toTypeNode(type),
    );
    this.logger.trace("Decoded value", { data: { length: text.length } });
    return value;
  }

  /**
   * A codec with these overrides over the current options.
   */
  public withOptions(overrides: CodecOptions): Codec {
    return new Codec({
      defaults: this.options,
      options: overrides,
      typeModel: this.typeModel,
      converters: this.converters,
      logger: this.logger,
    });
  }

  private runtime(): CodecRuntime {
    return {
      typeModel: this.typeModel,
      converters: this.converters,
      options: this.options,
    };
  }
}
