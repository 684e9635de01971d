import { typeMismatchError, unsupportedKeyTypeError } from "../errors";
import { describeFieldType } from "./field-types";
import type { FieldTypeNode } from "./field-types";
import { parseNumberText } from "./number-handling";

const SUPPORTED_KEY_KINDS: ReadonlySet<FieldTypeNode["kind"]> = new Set([
  "string",
  "number",
  "integer",
  "boolean",
  "unknown",
]);

export function assertKeyTypeSupported(key: FieldTypeNode, path: string): void {
  if (!SUPPORTED_KEY_KINDS.has(key.kind)) {
    throw unsupportedKeyTypeError.create({
      keyType: describeFieldType(key),
      path,
    });
  }
}

/**
 * Property name for a dictionary key: decimal digits for numbers,
 * `true`/`false` for booleans.
 */
export function formatKey(
  key: unknown,
  keyType: FieldTypeNode,
  path: string,
): string {
  assertKeyTypeSupported(keyType, path);
  const expected = keyType.kind === "integer" ? "number" : keyType.kind;
  if (
    (typeof key === "string" || typeof key === "number" || typeof key === "boolean") &&
    (expected === "unknown" || typeof key === expected)
  ) {
    return String(key);
  }
  throw unsupportedKeyTypeError.create({
    keyType: key === null ? "null" : typeof key,
    path,
  });
}

export function parseKey(
  text: string,
  keyType: FieldTypeNode,
  path: string,
): string | number | boolean {
  assertKeyTypeSupported(keyType, path);
  switch (keyType.kind) {
    case "number":
    case "integer":
      return parseNumberText(text, keyType.kind, path);
    case "boolean":
      if (text === "true") return true;
      if (text === "false") return false;
      throw typeMismatchError.create({
        expected: "boolean",
        actual: `"${text}"`,
        path,
      });
    default:
      return text;
  }
}
