const isObjectLike = (value: unknown): value is object =>
  (typeof value === "object" && value !== null) || typeof value === "function";

const isPlainObject = (value: object): boolean => {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

// Class instances reached below the root (schemas, user converters) stay mutable.
const shouldFreezeRecursively = (value: object): boolean =>
  typeof value === "function" || Array.isArray(value) || isPlainObject(value);

/**
 * Recursively freezes an object graph. Handles cycles via WeakSet.
 */
export function deepFreeze<T>(
  value: T,
  seen = new WeakSet<object>(),
  depth = 0,
): T {
  if (!isObjectLike(value)) {
    return value;
  }

  if (depth > 0 && !shouldFreezeRecursively(value)) {
    return value;
  }

  if (seen.has(value)) {
    return value;
  }
  seen.add(value);

  for (const key of Reflect.ownKeys(value)) {
    const descriptor = Object.getOwnPropertyDescriptor(value, key);
    if (!descriptor) {
      continue;
    }

    if ("value" in descriptor) {
      deepFreeze<unknown>(descriptor.value, seen, depth + 1);
      continue;
    }

    if (descriptor.get) {
      deepFreeze(descriptor.get, seen, depth + 1);
    }
    if (descriptor.set) {
      deepFreeze(descriptor.set, seen, depth + 1);
    }
  }

  Object.freeze(value);
  return value;
}
