/**
 * JSON.stringify for log output: cycles become "[Circular]", functions and
 * bigints are rendered as text, and nesting beyond maxDepth is collapsed.
 */
export function safeStringify(
  value: unknown,
  space?: number,
  options?: { maxDepth?: number },
): string {
  const seen = new WeakSet<object>();
  const holderDepth = new WeakMap<object, number>();
  const maxDepth = options?.maxDepth ?? Infinity;

  const replacer = function (this: unknown, _key: string, val: unknown) {
    if (typeof val === "function") {
      return "function()";
    }

    if (typeof val === "bigint") {
      return val.toString();
    }

    const holder: object = Object(this);
    const currentDepth = (holderDepth.get(holder) ?? 0) + 1;

    if (typeof val === "object" && val !== null) {
      if (seen.has(val)) return "[Circular]";

      if (currentDepth > maxDepth) {
        return Array.isArray(val) ? "[Array]" : "[Object]";
      }

      seen.add(val);
      holderDepth.set(val, currentDepth);
    }
    return val;
  };

  try {
    return JSON.stringify(value, replacer, space) ?? String(value);
  } catch {
    try {
      return String(value);
    } catch {
      return "[Unserializable]";
    }
  }
}
