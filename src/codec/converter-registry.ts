import { converterRegistryError } from "../errors";
import { LockableMap } from "../tools/LockableMap";
import { builtInConverters } from "./builtins";
import type { ConverterEntry, ConverterTarget } from "./types";
import { constructorChain, typeNameOf } from "./validation";

const targetName = (target: ConverterTarget): string =>
  typeof target === "string" ? target : typeNameOf(target);

/**
 * Type to converter lookup, consulted before a type's declared members.
 * Locked once a Codec borrows it.
 */
export class ConverterRegistry {
  private readonly entries = new LockableMap<unknown, ConverterEntry>(
    "ConverterRegistry",
  );

  public get locked(): boolean {
    return this.entries.locked;
  }

  public register(...entries: ConverterEntry[]): this {
    for (const entry of entries) {
      if (this.entries.locked) {
        throw converterRegistryError.create({
          message: `Cannot register a converter for ${targetName(entry.type)}: the registry is locked`,
        });
      }
      if (this.entries.has(entry.type)) {
        throw converterRegistryError.create({
          message: `A converter for ${targetName(entry.type)} is already registered`,
        });
      }
      this.entries.set(entry.type, entry);
    }
    return this;
  }

  /**
   * Converter for a declared type, walking a class's ancestors.
   */
  public lookup(type: ConverterTarget): ConverterEntry | undefined {
    if (typeof type === "string") {
      return this.entries.get(type);
    }
    for (const link of constructorChain(type)) {
      const entry = this.entries.get(link);
      if (entry) {
        return entry;
      }
    }
    return undefined;
  }

  /**
   * Converter for a runtime value, by primitive kind or class.
   */
  public lookupForValue(value: unknown): ConverterEntry | undefined {
    switch (typeof value) {
      case "string":
      case "number":
      case "boolean":
        return this.entries.get(typeof value);
      case "object":
        if (value === null) {
          return undefined;
        }
        for (const link of constructorChain(value.constructor)) {
          const entry = this.entries.get(link);
          if (entry) {
            return entry;
          }
        }
        return undefined;
      default:
        return undefined;
    }
  }

  public lock(): void {
    this.entries.lock();
  }
}

/**
 * A registry holding the built-in converters, ready for more registrations.
 */
export function createDefaultConverterRegistry(): ConverterRegistry {
  return new ConverterRegistry().register(...builtInConverters);
}
