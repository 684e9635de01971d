import {
  cycleDetectedError,
  typeMismatchError,
  unsupportedTypeError,
} from "../errors";
import { assertKeyTypeSupported, formatKey } from "./dictionary-keys";
import {
  describeFieldType,
  unwrapNullable,
  UNKNOWN_TYPE,
} from "./field-types";
import type { FieldTypeNode, FieldTypeNodeOf } from "./field-types";
import { toJsonNode } from "./json-writer";
import type { JsonNode, JsonObjectNode } from "./json-writer";
import { escapeMetadataKey } from "./metadata-keys";
import { writeNumber } from "./number-handling";
import { ReferenceTracker } from "./reference-tracker";
import { childFrame, declaredConverter, rootFrame } from "./runtime";
import type { CodecRuntime, Frame } from "./runtime";
import type { PlannedMember, TypeDescriptor } from "./type-model";
import { IgnoreCondition, ReferenceHandling } from "./types";
import type { Converter } from "./types";
import {
  assertDepth,
  describeValue,
  isPlainObject,
  isReadonlyArray,
  typeNameOf,
} from "./validation";

const skipsOnWrite = (member: PlannedMember, value: unknown): boolean => {
  switch (member.ignore) {
    case IgnoreCondition.WhenWritingNull:
      return value === null || value === undefined;
    case IgnoreCondition.WhenWritingDefault:
      return member.field.isDefault(value);
    default:
      return false;
  }
};

/**
 * Walks one value into an ordered JSON node tree. One instance per call.
 */
export class GraphEncoder {
  private readonly references = new ReferenceTracker();
  // Objects on the current path; only consulted without reference preservation
  private readonly active = new Set<object>();
  private readonly preserve: boolean;

  constructor(private readonly runtime: CodecRuntime) {
    this.preserve =
      runtime.options.referenceHandling === ReferenceHandling.Preserve;
  }

  public encode(value: unknown, type: FieldTypeNode = UNKNOWN_TYPE): JsonNode {
    return this.encodeValue(value, type, rootFrame(this.runtime.options));
  }

  private encodeValue(
    value: unknown,
    type: FieldTypeNode,
    frame: Frame,
    converter?: Converter<unknown>,
  ): JsonNode {
    assertDepth(frame.depth, this.runtime.options.maxDepth);
    if (converter) {
      return this.encodeWithConverter(converter, value, frame);
    }

    const { inner } = unwrapNullable(type);
    const declared = declaredConverter(this.runtime.converters, inner);
    if (value === null || value === undefined) {
      return declared?.handlesNull
        ? this.encodeWithConverter(declared, null, frame)
        : null;
    }

    const entry = declared ?? this.runtime.converters.lookupForValue(value);
    if (entry) {
      return this.encodeWithConverter(entry, value, frame);
    }

    switch (inner.kind) {
      case "string":
      case "boolean":
        if (typeof value !== inner.kind) {
          throw this.mismatch(inner, value, frame);
        }
        return this.encodeUnknown(value, frame);
      case "number":
      case "integer":
        if (
          typeof value !== "number" ||
          (inner.kind === "integer" && !Number.isInteger(value))
        ) {
          throw this.mismatch(inner, value, frame);
        }
        return writeNumber(value, frame.handling);
      case "unknown":
        return this.encodeUnknown(value, frame);
      case "object":
        return this.encodeObject(value, inner, frame);
      case "array":
        return this.encodeArray(value, inner.items, frame);
      case "dictionary":
        return this.encodeDictionary(value, inner, frame);
      case "record":
        return this.encodeRecord(value, inner.value, frame);
      default:
        throw unsupportedTypeError.create({
          typeName: describeFieldType(inner),
          path: frame.path,
        });
    }
  }

  private encodeWithConverter(
    converter: Converter<unknown>,
    value: unknown,
    frame: Frame,
  ): JsonNode {
    const normalized = value === undefined ? null : value;
    if (normalized === null && !converter.handlesNull) {
      return null;
    }
    return toJsonNode(
      converter.encode(normalized, {
        options: this.runtime.options,
        path: frame.path,
      }),
    );
  }

  private encodeUnknown(value: unknown, frame: Frame): JsonNode {
    switch (typeof value) {
      case "string":
      case "boolean":
        return value;
      case "number":
        return writeNumber(value, frame.handling);
      case "object": {
        if (value === null) {
          return null;
        }
        if (isReadonlyArray(value)) {
          return this.encodeArray(value, UNKNOWN_TYPE, frame);
        }
        if (value instanceof Map) {
          return this.encodeDictionary(
            value,
            { kind: "dictionary", key: UNKNOWN_TYPE, value: UNKNOWN_TYPE },
            frame,
          );
        }
        if (isPlainObject(value)) {
          return this.encodeRecord(value, UNKNOWN_TYPE, frame);
        }
        const descriptor = this.runtime.typeModel.tryDescribe(value.constructor);
        if (descriptor) {
          return this.encodeDescribed(value, descriptor, frame);
        }
        throw unsupportedTypeError.create({
          typeName: typeNameOf(value.constructor),
          path: frame.path,
        });
      }
      default:
        throw unsupportedTypeError.create({
          typeName: typeof value,
          path: frame.path,
        });
    }
  }

  private encodeObject(
    value: unknown,
    type: FieldTypeNodeOf<"object">,
    frame: Frame,
  ): JsonNode {
    if (typeof value !== "object" || value === null || isReadonlyArray(value)) {
      throw this.mismatch(type, value, frame);
    }
    const { typeModel } = this.runtime;
    // The runtime class wins so subclasses keep their own members.
    const descriptor =
      typeModel.tryDescribe(value.constructor) ??
      (isPlainObject(value)
        ? typeModel.describe(type.target(), frame.path)
        : undefined);
    if (!descriptor) {
      throw unsupportedTypeError.create({
        typeName: typeNameOf(value.constructor),
        path: frame.path,
      });
    }
    return this.encodeDescribed(value, descriptor, frame);
  }

  private encodeDescribed(
    value: object,
    descriptor: TypeDescriptor,
    frame: Frame,
  ): JsonNode {
    const { options, typeModel } = this.runtime;
    const plan = typeModel.plan(descriptor, options);

    return this.withIdentity(value, descriptor.name, frame, (id) => {
      const node: JsonObjectNode = new Map();
      if (id !== undefined) {
        node.set("$id", id);
      }
      for (const member of plan.members) {
        const raw = member.field.get(value);
        if (skipsOnWrite(member, raw)) {
          continue;
        }
        node.set(
          member.jsonName,
          this.encodeValue(
            raw,
            member.field.type,
            childFrame(
              frame,
              `.${member.jsonName}`,
              member.field.numberHandling ?? options.numberHandling,
            ),
            member.field.converter,
          ),
        );
      }
      return node;
    });
  }

  private encodeArray(
    value: unknown,
    items: FieldTypeNode,
    frame: Frame,
  ): JsonNode {
    if (!isReadonlyArray(value)) {
      throw this.mismatch({ kind: "array", items }, value, frame);
    }
    const list = value;
    return this.withIdentity(list, "array", frame, (id) => {
      const values = list.map((item, index) =>
        this.encodeValue(item, items, childFrame(frame, `[${index}]`)),
      );
      if (id === undefined) {
        return values;
      }
      const node: JsonObjectNode = new Map();
      node.set("$id", id);
      node.set("$values", values);
      return node;
    });
  }

  private encodeDictionary(
    value: unknown,
    type: FieldTypeNodeOf<"dictionary">,
    frame: Frame,
  ): JsonNode {
    if (!(value instanceof Map)) {
      throw this.mismatch(type, value, frame);
    }
    assertKeyTypeSupported(type.key, frame.path);
    const entries: ReadonlyMap<unknown, unknown> = value;

    return this.withIdentity(value, "dictionary", frame, (id) => {
      const node: JsonObjectNode = new Map();
      if (id !== undefined) {
        node.set("$id", id);
      }
      for (const [key, item] of entries) {
        const name = this.propertyName(formatKey(key, type.key, frame.path));
        node.set(
          name,
          this.encodeValue(item, type.value, childFrame(frame, `.${name}`)),
        );
      }
      return node;
    });
  }

  private encodeRecord(
    value: unknown,
    itemType: FieldTypeNode,
    frame: Frame,
  ): JsonNode {
    if (
      typeof value !== "object" ||
      value === null ||
      isReadonlyArray(value) ||
      value instanceof Map
    ) {
      throw this.mismatch({ kind: "record", value: itemType }, value, frame);
    }
    const entries: [string, unknown][] = Object.entries(value);

    return this.withIdentity(value, "record", frame, (id) => {
      const node: JsonObjectNode = new Map();
      if (id !== undefined) {
        node.set("$id", id);
      }
      for (const [key, item] of entries) {
        node.set(
          this.propertyName(key),
          this.encodeValue(item, itemType, childFrame(frame, `.${key}`)),
        );
      }
      return node;
    });
  }

  // Keys shaped like reference metadata only collide when metadata is written.
  private propertyName(key: string): string {
    return this.preserve ? escapeMetadataKey(key) : key;
  }

  /**
   * Emits a back-reference for a repeated identity under Preserve; otherwise
   * rejects an identity that is already being encoded.
   */
  private withIdentity(
    value: object,
    typeName: string,
    frame: Frame,
    write: (id: string | undefined) => JsonNode,
  ): JsonNode {
    if (this.preserve) {
      const { id, isNew } = this.references.idFor(value);
      if (!isNew) {
        const reference: JsonObjectNode = new Map([["$ref", id]]);
        return reference;
      }
      return write(id);
    }

    if (this.active.has(value)) {
      throw cycleDetectedError.create({ typeName, path: frame.path });
    }
    this.active.add(value);
    try {
      return write(undefined);
    } finally {
      this.active.delete(value);
    }
  }

  private mismatch(type: FieldTypeNode, value: unknown, frame: Frame) {
    return typeMismatchError.create({
      expected: describeFieldType(type),
      actual: describeValue(value),
      path: frame.path,
    });
  }
}
