/**
 * Guards shared by the encoder and decoder.
 */

import { maxDepthExceededError } from "../errors";
import type { JsonObject, JsonValue } from "./types";

/** Keys never copied into plain objects built from untrusted JSON */
export const DEFAULT_UNSAFE_KEYS: ReadonlySet<string> = new Set([
  "__proto__",
  "constructor",
  "prototype",
]);

export const isUnsafeKey = (
  key: string,
  unsafeKeys: ReadonlySet<string> = DEFAULT_UNSAFE_KEYS,
): boolean => unsafeKeys.has(key);

export const isJsonObject = (value: JsonValue): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const hasOwn = (record: object, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(record, key);

/**
 * Short description of a token for mismatch messages.
 */
export const describeToken = (token: JsonValue): string => {
  if (token === null) return "null";
  if (Array.isArray(token)) return "array";
  return typeof token;
};

export const assertDepth = (depth: number, maxDepth: number): void => {
  if (depth > maxDepth) {
    throw maxDepthExceededError.create({ maxDepth });
  }
};

/**
 * The class chain of a constructor, nearest first, stopping before
 * `Function.prototype`.
 */
export const constructorChain = (type: unknown): unknown[] => {
  const chain: unknown[] = [];
  let current: unknown = type;
  while (typeof current === "function" && current !== Function.prototype) {
    chain.push(current);
    current = Object.getPrototypeOf(current);
  }
  return chain;
};

export const typeNameOf = (type: unknown): string =>
  typeof type === "function" && type.name ? type.name : "anonymous class";

export const isReadonlyArray = (value: unknown): value is readonly unknown[] =>
  Array.isArray(value);

export const isPlainObject = (value: object): boolean => {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

/**
 * Short description of a runtime value for mismatch messages.
 */
export const describeValue = (value: unknown): string => {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") {
    return isPlainObject(value) ? "object" : typeNameOf(value.constructor);
  }
  return typeof value;
};
