import { invalidTypeDefinitionError, unsupportedTypeError } from "../errors";
import { Logger } from "../models/Logger";
import type {
  ConstructionDefinition,
  FieldDefinition,
  MemberKind,
  TypeDefinition,
} from "../types/typeDefinition";
import { zeroValueOf } from "./field-types";
import type { FieldTypeNode } from "./field-types";
import { resolveNamingPolicy } from "./naming-policy";
import { IgnoreCondition } from "./types";
import type {
  Constructor,
  Converter,
  NumberHandling,
  ResolvedCodecOptions,
} from "./types";
import { constructorChain, typeNameOf } from "./validation";

export interface FieldDescriptor {
  readonly name: string;
  /** Explicit JSON name, when declared */
  readonly jsonName?: string;
  readonly type: FieldTypeNode;
  readonly ignore?: IgnoreCondition;
  readonly converter?: Converter<unknown>;
  readonly numberHandling?: NumberHandling;
  readonly member: MemberKind;
  readonly readOnly: boolean;
  readonly include: boolean;
  readonly declaringType: Constructor;
  readonly isConstructorParameter: boolean;
  get(instance: object): unknown;
  set(instance: object, value: unknown): void;
  /** Whether the value counts as the member's default for WhenWritingDefault */
  isDefault(value: unknown): boolean;
}

export interface TypeDescriptor {
  readonly type: Constructor;
  readonly name: string;
  /** Inherited members first */
  readonly fields: readonly FieldDescriptor[];
  readonly construction: ConstructionDefinition;
}

export interface PlannedMember {
  readonly field: FieldDescriptor;
  readonly jsonName: string;
  /** Member condition, falling back to the global default */
  readonly ignore: IgnoreCondition;
  /** Whether decode assigns this member after construction */
  readonly assignable: boolean;
}

/**
 * The members of a type as seen under one set of options.
 */
export interface MemberPlan {
  readonly members: readonly PlannedMember[];
  find(jsonName: string): PlannedMember | undefined;
  byName(name: string): PlannedMember | undefined;
}

const isNullish = (value: unknown): value is null | undefined =>
  value === null || value === undefined;

const sameValue = (left: unknown, right: unknown): boolean =>
  isNullish(left) ? isNullish(right) : Object.is(left, right);

const defaultShell = (type: Constructor): ConstructionDefinition => ({
  kind: "shell",
  create: () => new type(),
});

function createFieldDescriptor(
  definition: FieldDefinition,
  declaringType: Constructor,
  construction: ConstructionDefinition,
): FieldDescriptor {
  const { name, type, options } = definition;
  const readOnly = options.readOnly === true;
  const include = options.include === true;
  const defaultValue =
    options.defaultValue === undefined ? zeroValueOf(type) : options.defaultValue;
  const equals = options.equals ?? sameValue;

  const read =
    options.get ?? ((instance: object): unknown => Reflect.get(instance, name));

  const assign = (instance: object, value: unknown): void => {
    if (readOnly) {
      Object.defineProperty(instance, name, {
        value,
        writable: true,
        enumerable: true,
        configurable: true,
      });
      return;
    }
    if (!Reflect.set(instance, name, value)) {
      throw invalidTypeDefinitionError.create({
        typeName: typeNameOf(declaringType),
        message: `member "${name}" cannot be assigned; declare it readOnly or give it a setter`,
      });
    }
  };

  const descriptor: FieldDescriptor = {
    name,
    jsonName: options.jsonName,
    type,
    ignore: options.ignore,
    converter: options.converter,
    numberHandling: options.numberHandling,
    member: options.member ?? "property",
    readOnly,
    include,
    declaringType,
    isConstructorParameter:
      construction.kind === "constructor" &&
      construction.parameters.includes(name),
    get: read,
    set: options.set ?? assign,
    isDefault: (value) => equals(value, defaultValue),
  };
  return Object.freeze(descriptor);
}

/**
 * Registry of type definitions and the descriptors derived from them.
 * Descriptors are derived on first use, memoized per class and frozen.
 */
export class TypeModel {
  private readonly definitions = new Map<unknown, TypeDefinition>();
  private readonly descriptors = new Map<unknown, TypeDescriptor>();
  private readonly plans = new WeakMap<
    TypeDescriptor,
    WeakMap<ResolvedCodecOptions, MemberPlan>
  >();
  private readonly logger: Logger;

  constructor(logger: Logger = Logger.silent()) {
    this.logger = logger.with({ source: "codec.typeModel" });
  }

  /**
   * Register definitions. Registering the same definition twice is a no-op;
   * a different definition for an already registered class fails.
   */
  public register(...definitions: TypeDefinition[]): this {
    for (const definition of definitions) {
      const existing = this.definitions.get(definition.type);
      if (existing === definition) {
        continue;
      }
      if (existing) {
        throw invalidTypeDefinitionError.create({
          typeName: typeNameOf(definition.type),
          message: "a different definition is already registered",
        });
      }
      this.definitions.set(definition.type, definition);
    }
    this.descriptors.clear();
    return this;
  }

  public isRegistered(type: unknown): boolean {
    return this.definitions.has(type);
  }

  /**
   * Describe a class or, failing that, its nearest registered ancestor.
   */
  public describe(type: Constructor, path = "$"): TypeDescriptor {
    const descriptor = this.tryDescribe(type);
    if (!descriptor) {
      throw unsupportedTypeError.create({ typeName: typeNameOf(type), path });
    }
    return descriptor;
  }

  public tryDescribe(type: unknown): TypeDescriptor | undefined {
    const cached = this.descriptors.get(type);
    if (cached) {
      return cached;
    }
    const descriptor = this.derive(type);
    if (descriptor) {
      this.descriptors.set(type, descriptor);
    }
    return descriptor;
  }

  /**
   * Member names and lookups for the given options, memoized per descriptor.
   */
  public plan(
    descriptor: TypeDescriptor,
    options: ResolvedCodecOptions,
  ): MemberPlan {
    let byOptions = this.plans.get(descriptor);
    if (!byOptions) {
      byOptions = new WeakMap();
      this.plans.set(descriptor, byOptions);
    }
    const cached = byOptions.get(options);
    if (cached) {
      return cached;
    }
    const plan = this.createPlan(descriptor, options);
    byOptions.set(options, plan);
    return plan;
  }

  private derive(type: unknown): TypeDescriptor | undefined {
    const chain = constructorChain(type);
    const lineage: TypeDefinition[] = [];
    for (const link of chain) {
      const definition = this.definitions.get(link);
      if (definition) {
        lineage.push(definition);
      }
    }
    const [nearest] = lineage;
    if (!nearest || !isConstructorOf(type, nearest.type)) {
      return undefined;
    }

    // An unregistered subclass keeps its own class when built as a shell.
    const construction = nearest.construction ?? defaultShell(type);

    const fields = new Map<string, FieldDescriptor>();
    for (const definition of [...lineage].reverse()) {
      for (const field of definition.fields) {
        fields.set(
          field.name,
          createFieldDescriptor(field, definition.type, construction),
        );
      }
    }

    const descriptor: TypeDescriptor = {
      type,
      name: typeNameOf(type),
      fields: Object.freeze([...fields.values()]),
      construction,
    };
    Object.freeze(descriptor);

    this.logger.debug(`Derived descriptor for ${descriptor.name}`, {
      data: {
        fields: descriptor.fields.map((field) => field.name),
        construction: construction.kind,
      },
    });
    return descriptor;
  }

  private createPlan(
    descriptor: TypeDescriptor,
    options: ResolvedCodecOptions,
  ): MemberPlan {
    const rename = resolveNamingPolicy(options.propertyNamingPolicy);
    const members: PlannedMember[] = [];
    const exact = new Map<string, PlannedMember>();
    const folded = new Map<string, PlannedMember>();
    const named = new Map<string, PlannedMember>();

    for (const field of descriptor.fields) {
      const ignore = field.ignore ?? options.defaultIgnoreCondition;
      if (ignore === IgnoreCondition.Always) {
        continue;
      }
      if (field.member === "field" && !options.includeFields && !field.include) {
        continue;
      }

      const jsonName = field.jsonName ?? rename(field.name);
      if (exact.has(jsonName)) {
        throw invalidTypeDefinitionError.create({
          typeName: descriptor.name,
          message: `JSON name "${jsonName}" is used by more than one member`,
        });
      }

      const member: PlannedMember = Object.freeze({
        field,
        jsonName,
        ignore,
        assignable:
          !field.isConstructorParameter && (!field.readOnly || field.include),
      });
      members.push(member);
      exact.set(jsonName, member);
      named.set(field.name, member);
      const lowered = jsonName.toLowerCase();
      if (!folded.has(lowered)) {
        folded.set(lowered, member);
      }
    }

    const caseInsensitive = options.propertyNameCaseInsensitive;
    return Object.freeze({
      members: Object.freeze(members),
      find: (jsonName: string) =>
        exact.get(jsonName) ??
        (caseInsensitive ? folded.get(jsonName.toLowerCase()) : undefined),
      byName: (name: string) => named.get(name),
    });
  }
}

function isConstructorOf(
  type: unknown,
  base: Constructor,
): type is Constructor {
  return constructorChain(type).includes(base);
}

/** Shared model used by codecs created without one */
export const defaultTypeModel = new TypeModel();
