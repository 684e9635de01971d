import {
  constructorArityError,
  danglingReferenceError,
  referenceMetadataError,
  typeMismatchError,
} from "../errors";
import { assertKeyTypeSupported, parseKey } from "./dictionary-keys";
import {
  describeFieldType,
  unwrapNullable,
  UNKNOWN_TYPE,
  zeroValueOf,
} from "./field-types";
import type { FieldTypeNode, FieldTypeNodeOf } from "./field-types";
import { unescapeMetadataKey } from "./metadata-keys";
import { readNumber } from "./number-handling";
import { ReferenceTracker } from "./reference-tracker";
import { childFrame, declaredConverter, rootFrame } from "./runtime";
import type { CodecRuntime, Frame } from "./runtime";
import type {
  MemberPlan,
  PlannedMember,
  TypeDescriptor,
} from "./type-model";
import { ReferenceHandling } from "./types";
import type { Converter, JsonObject, JsonValue } from "./types";
import {
  assertDepth,
  describeToken,
  describeValue,
  hasOwn,
  isJsonObject,
  isPlainObject,
  isUnsafeKey,
} from "./validation";

/**
 * A `$ref` whose object has not been registered yet. Containers turn it into
 * a deferred patch; anything left over at the end is dangling.
 */
class PendingReference {
  constructor(
    public readonly id: string,
    public readonly expected: FieldTypeNode,
    public readonly path: string,
  ) {}
}

// Kinds without a null value of their own
const VALUE_KINDS: ReadonlySet<FieldTypeNode["kind"]> = new Set([
  "number",
  "integer",
  "boolean",
]);

/**
 * Rebuilds a typed value from a parsed JSON token tree. One instance per call.
 */
export class GraphDecoder {
  private readonly references = new ReferenceTracker();
  private readonly preserve: boolean;

  constructor(private readonly runtime: CodecRuntime) {
    this.preserve =
      runtime.options.referenceHandling === ReferenceHandling.Preserve;
  }

  public decode(token: JsonValue, type: FieldTypeNode = UNKNOWN_TYPE): unknown {
    const value = this.decodeValue(token, type, rootFrame(this.runtime.options));
    if (value instanceof PendingReference) {
      throw danglingReferenceError.create({ id: value.id, path: value.path });
    }
    this.references.assertSettled();
    return value;
  }

  private decodeValue(
    token: JsonValue,
    type: FieldTypeNode,
    frame: Frame,
    converter?: Converter<unknown>,
  ): unknown {
    assertDepth(frame.depth, this.runtime.options.maxDepth);
    if (converter) {
      return this.decodeWithConverter(converter, token, type, frame);
    }

    const { inner, nullable } = unwrapNullable(type);
    const declared = declaredConverter(this.runtime.converters, inner);
    if (declared) {
      return this.decodeWithConverter(declared, token, type, frame);
    }

    if (token === null) {
      if (nullable || !VALUE_KINDS.has(inner.kind)) {
        return null;
      }
      throw this.mismatch(describeFieldType(inner), token, frame);
    }

    switch (inner.kind) {
      case "string":
      case "boolean":
        if (typeof token !== inner.kind) {
          throw this.mismatch(inner.kind, token, frame);
        }
        return token;
      case "number":
      case "integer":
        return readNumber(token, inner.kind, frame.handling, frame.path);
      case "unknown":
        return this.decodeUnknown(token, frame);
      case "object":
        return this.decodeObject(token, inner, frame);
      case "array":
        return this.decodeArray(token, inner, frame);
      case "dictionary":
        return this.decodeDictionary(token, inner, frame);
      case "record":
        return this.decodeRecord(token, inner, frame);
      default:
        throw this.mismatch(describeFieldType(inner), token, frame);
    }
  }

  private decodeWithConverter(
    converter: Converter<unknown>,
    token: JsonValue,
    type: FieldTypeNode,
    frame: Frame,
  ): unknown {
    if (token === null && !converter.handlesNull) {
      return zeroValueOf(type);
    }
    return converter.decode(token, {
      options: this.runtime.options,
      path: frame.path,
    });
  }

  private decodeUnknown(token: JsonValue, frame: Frame): unknown {
    if (Array.isArray(token)) {
      return this.decodeArray(token, { kind: "array", items: UNKNOWN_TYPE }, frame);
    }
    if (!isJsonObject(token)) {
      return token;
    }
    if (this.isReference(token)) {
      return this.resolveReference(token, UNKNOWN_TYPE, frame);
    }
    if (this.preserve && hasOwn(token, "$values")) {
      return this.decodeArray(token, { kind: "array", items: UNKNOWN_TYPE }, frame);
    }
    return this.decodeRecord(token, { kind: "record", value: UNKNOWN_TYPE }, frame);
  }

  private decodeObject(
    token: JsonValue,
    type: FieldTypeNodeOf<"object">,
    frame: Frame,
  ): unknown {
    if (!isJsonObject(token)) {
      throw this.mismatch(describeFieldType(type), token, frame);
    }
    if (this.isReference(token)) {
      return this.resolveReference(token, type, frame);
    }

    const { typeModel, options } = this.runtime;
    const descriptor = typeModel.describe(type.target(), frame.path);
    const plan = typeModel.plan(descriptor, options);
    const id = this.readId(token, frame);
    const present = this.matchMembers(token, plan, frame);

    let instance: object;
    if (descriptor.construction.kind === "shell") {
      instance = descriptor.construction.create();
      if (id !== undefined) {
        this.references.register(id, instance, frame.path);
      }
    } else {
      const args: Record<string, unknown> = {};
      for (const parameter of descriptor.construction.parameters) {
        args[parameter] = this.decodeParameter(
          descriptor,
          plan,
          parameter,
          present,
          frame,
        );
      }
      instance = descriptor.construction.create(args);
      if (id !== undefined) {
        this.references.register(id, instance, frame.path);
      }
    }

    this.assignMembers(instance, plan, present, frame);
    return instance;
  }

  /**
   * Members present in the token, in document order.
   */
  private matchMembers(
    token: JsonObject,
    plan: MemberPlan,
    frame: Frame,
  ): Map<PlannedMember, JsonValue> {
    const present = new Map<PlannedMember, JsonValue>();
    for (const [key, value] of Object.entries(token)) {
      if (this.preserve && key === "$id") {
        continue;
      }
      if (this.preserve && key === "$values") {
        throw referenceMetadataError.create({
          message: "Unexpected $values in an object",
          path: frame.path,
        });
      }
      const member = plan.find(key);
      if (member) {
        present.set(member, value);
      }
    }
    return present;
  }

  private decodeParameter(
    descriptor: TypeDescriptor,
    plan: MemberPlan,
    parameter: string,
    present: ReadonlyMap<PlannedMember, JsonValue>,
    frame: Frame,
  ): unknown {
    const member = plan.byName(parameter);
    const token = member ? present.get(member) : undefined;
    if (!member || token === undefined) {
      const converter = member && this.nullHandlingConverter(member);
      if (member && converter) {
        return converter.decode(null, {
          options: this.runtime.options,
          path: this.memberFrame(frame, member).path,
        });
      }
      throw constructorArityError.create({
        typeName: descriptor.name,
        parameter,
        path: frame.path,
      });
    }

    const slotFrame = this.memberFrame(frame, member);
    let value: unknown;
    try {
      value = this.decodeValue(
        token,
        member.field.type,
        slotFrame,
        member.field.converter,
      );
    } catch (error) {
      if (typeMismatchError.is(error)) {
        throw constructorArityError.create({
          typeName: descriptor.name,
          parameter,
          path: slotFrame.path,
          cause: error,
        });
      }
      throw error;
    }

    // The object this argument belongs to does not exist yet.
    if (value instanceof PendingReference) {
      throw danglingReferenceError.create({ id: value.id, path: value.path });
    }
    return value;
  }

  private assignMembers(
    instance: object,
    plan: MemberPlan,
    present: ReadonlyMap<PlannedMember, JsonValue>,
    frame: Frame,
  ): void {
    for (const [member, token] of present) {
      if (member.field.isConstructorParameter) {
        continue;
      }
      // Read-only members are still decoded so their $id values register.
      const value = this.decodeValue(
        token,
        member.field.type,
        this.memberFrame(frame, member),
        member.field.converter,
      );
      this.settle(value, (resolved) => {
        if (member.assignable) {
          member.field.set(instance, resolved);
        }
      });
    }

    for (const member of plan.members) {
      if (!member.assignable || present.has(member)) {
        continue;
      }
      const converter = this.nullHandlingConverter(member);
      if (converter) {
        member.field.set(
          instance,
          converter.decode(null, {
            options: this.runtime.options,
            path: this.memberFrame(frame, member).path,
          }),
        );
      }
    }
  }

  private decodeArray(
    token: JsonValue,
    type: FieldTypeNodeOf<"array">,
    frame: Frame,
  ): unknown {
    let items: JsonValue[];
    let id: string | undefined;

    if (Array.isArray(token)) {
      items = token;
    } else if (isJsonObject(token)) {
      if (this.isReference(token)) {
        return this.resolveReference(token, type, frame);
      }
      id = this.readId(token, frame);
      if (id === undefined) {
        throw this.mismatch(describeFieldType(type), token, frame);
      }
      const values = token.$values;
      if (!Array.isArray(values) || Object.keys(token).length !== 2) {
        throw referenceMetadataError.create({
          message: "A preserved array must hold only $id and $values",
          path: frame.path,
        });
      }
      items = values;
    } else {
      throw this.mismatch(describeFieldType(type), token, frame);
    }

    const result: unknown[] = [];
    if (id !== undefined) {
      this.references.register(id, result, frame.path);
    }
    items.forEach((item, index) => {
      const value = this.decodeValue(
        item,
        type.items,
        childFrame(frame, `[${index}]`),
      );
      result.push(undefined);
      this.settle(value, (resolved) => {
        result[index] = resolved;
      });
    });
    return result;
  }

  private decodeDictionary(
    token: JsonValue,
    type: FieldTypeNodeOf<"dictionary">,
    frame: Frame,
  ): unknown {
    if (!isJsonObject(token)) {
      throw this.mismatch(describeFieldType(type), token, frame);
    }
    if (this.isReference(token)) {
      return this.resolveReference(token, type, frame);
    }
    assertKeyTypeSupported(type.key, frame.path);

    const id = this.readId(token, frame);
    const result = new Map<unknown, unknown>();
    if (id !== undefined) {
      this.references.register(id, result, frame.path);
    }
    for (const [property, item] of Object.entries(token)) {
      if (this.preserve && property === "$id") {
        continue;
      }
      const name = this.propertyName(property);
      const entryFrame = childFrame(frame, `.${name}`);
      const key = parseKey(name, type.key, entryFrame.path);
      const value = this.decodeValue(item, type.value, entryFrame);
      result.set(key, undefined);
      this.settle(value, (resolved) => {
        result.set(key, resolved);
      });
    }
    return result;
  }

  private decodeRecord(
    token: JsonValue,
    type: FieldTypeNodeOf<"record">,
    frame: Frame,
  ): unknown {
    if (!isJsonObject(token)) {
      throw this.mismatch(describeFieldType(type), token, frame);
    }
    if (this.isReference(token)) {
      return this.resolveReference(token, type, frame);
    }

    const id = this.readId(token, frame);
    const result: Record<string, unknown> = {};
    if (id !== undefined) {
      this.references.register(id, result, frame.path);
    }
    for (const [property, item] of Object.entries(token)) {
      if (this.preserve && property === "$id") {
        continue;
      }
      const name = this.propertyName(property);
      if (isUnsafeKey(name)) {
        continue;
      }
      const value = this.decodeValue(
        item,
        type.value,
        childFrame(frame, `.${name}`),
      );
      this.settle(value, (resolved) => {
        result[name] = resolved;
      });
    }
    return result;
  }

  private propertyName(property: string): string {
    return this.preserve ? unescapeMetadataKey(property) : property;
  }

  private isReference(token: JsonObject): boolean {
    return this.preserve && hasOwn(token, "$ref");
  }

  private resolveReference(
    token: JsonObject,
    expected: FieldTypeNode,
    frame: Frame,
  ): unknown {
    const id = token.$ref;
    if (typeof id !== "string" || Object.keys(token).length !== 1) {
      throw referenceMetadataError.create({
        message: "A $ref object must hold only a string $ref",
        path: frame.path,
      });
    }
    if (!this.references.has(id)) {
      return new PendingReference(id, expected, frame.path);
    }
    return this.checkReferenced(
      this.references.resolve(id, frame.path),
      expected,
      frame.path,
    );
  }

  /**
   * A referenced object must fit the position it is referenced from.
   */
  private checkReferenced(
    value: object,
    expected: FieldTypeNode,
    path: string,
  ): object {
    const { inner } = unwrapNullable(expected);
    const fits =
      inner.kind === "object"
        ? value instanceof inner.target()
        : inner.kind === "array"
          ? Array.isArray(value)
          : inner.kind === "dictionary"
            ? value instanceof Map
            : inner.kind === "record"
              ? isPlainObject(value)
              : true;
    if (!fits) {
      throw typeMismatchError.create({
        expected: describeFieldType(inner),
        actual: describeValue(value),
        path,
      });
    }
    return value;
  }

  private settle(value: unknown, assign: (resolved: unknown) => void): void {
    if (!(value instanceof PendingReference)) {
      assign(value);
      return;
    }
    const pending = value;
    this.references.whenRegistered(
      pending.id,
      (target) =>
        assign(this.checkReferenced(target, pending.expected, pending.path)),
      pending.path,
    );
  }

  private readId(token: JsonObject, frame: Frame): string | undefined {
    if (!this.preserve || !hasOwn(token, "$id")) {
      return undefined;
    }
    const id = token.$id;
    if (typeof id !== "string") {
      throw referenceMetadataError.create({
        message: "The $id value must be a string",
        path: frame.path,
      });
    }
    return id;
  }

  private memberFrame(frame: Frame, member: PlannedMember): Frame {
    return childFrame(
      frame,
      `.${member.jsonName}`,
      member.field.numberHandling ?? this.runtime.options.numberHandling,
    );
  }

  private nullHandlingConverter(
    member: PlannedMember,
  ): Converter<unknown> | undefined {
    const converter =
      member.field.converter ??
      declaredConverter(
        this.runtime.converters,
        unwrapNullable(member.field.type).inner,
      );
    return converter?.handlesNull ? converter : undefined;
  }

  private mismatch(expected: string, token: JsonValue, frame: Frame) {
    return typeMismatchError.create({
      expected,
      actual: describeToken(token),
      path: frame.path,
    });
  }
}
