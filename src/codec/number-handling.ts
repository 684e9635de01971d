import { malformedNumberError, typeMismatchError } from "../errors";
import { hasNumberFlag } from "./options";
import { NumberHandling } from "./types";
import type { JsonValue } from "./types";
import { describeToken } from "./validation";

/** The JSON number grammar, anchored */
export const JSON_NUMBER = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

const NAMED_LITERALS: ReadonlyMap<string, number> = new Map([
  ["NaN", Number.NaN],
  ["Infinity", Number.POSITIVE_INFINITY],
  ["-Infinity", Number.NEGATIVE_INFINITY],
]);

export type NumberKind = "number" | "integer";

/**
 * Encodes a number under the given flags. Non-finite values become their
 * names when named literals are allowed, `null` otherwise.
 */
export function writeNumber(
  value: number,
  handling: NumberHandling,
): number | string | null {
  if (!Number.isFinite(value)) {
    return hasNumberFlag(handling, NumberHandling.AllowNamedFloatingPointLiterals)
      ? String(value)
      : null;
  }
  if (hasNumberFlag(handling, NumberHandling.WriteAsString)) {
    return String(value);
  }
  return value;
}

const assertKind = (
  value: number,
  kind: NumberKind,
  text: string,
  path: string,
): number => {
  if (kind === "integer" && !Number.isInteger(value)) {
    throw malformedNumberError.create({ value: text, path });
  }
  return value;
};

/**
 * Parses digits that must follow the JSON number grammar, such as a quoted
 * number or a dictionary key.
 */
export function parseNumberText(
  text: string,
  kind: NumberKind,
  path: string,
): number {
  if (!JSON_NUMBER.test(text)) {
    throw malformedNumberError.create({ value: text, path });
  }
  return assertKind(Number(text), kind, text, path);
}

export function readNumber(
  token: JsonValue,
  kind: NumberKind,
  handling: NumberHandling,
  path: string,
): number {
  if (typeof token === "number") {
    return assertKind(token, kind, String(token), path);
  }
  if (typeof token !== "string") {
    throw typeMismatchError.create({
      expected: kind,
      actual: describeToken(token),
      path,
    });
  }

  const named = NAMED_LITERALS.get(token);
  if (
    named !== undefined &&
    kind === "number" &&
    hasNumberFlag(handling, NumberHandling.AllowNamedFloatingPointLiterals)
  ) {
    return named;
  }
  if (!hasNumberFlag(handling, NumberHandling.AllowReadingFromString)) {
    throw typeMismatchError.create({ expected: kind, actual: "string", path });
  }
  return parseNumberText(token, kind, path);
}
