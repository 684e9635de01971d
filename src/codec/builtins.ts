/**
 * Built-in converters for platform classes with a canonical string form
 */

import { typeMismatchError } from "../errors";
import type { ConverterEntry, JsonValue } from "./types";
import { describeToken } from "./validation";

const readString = (token: JsonValue, expected: string, path: string): string => {
  if (typeof token !== "string") {
    throw typeMismatchError.create({
      expected,
      actual: describeToken(token),
      path,
    });
  }
  return token;
};

/**
 * Date <-> ISO 8601 string
 */
export const dateConverter: ConverterEntry<Date> = {
  type: Date,
  encode: (date) => date.toISOString(),
  decode: (token, { path }) => {
    const text = readString(token, "an ISO 8601 date string", path);
    const date = new Date(text);
    if (Number.isNaN(date.getTime())) {
      throw typeMismatchError.create({
        expected: "an ISO 8601 date string",
        actual: `"${text}"`,
        path,
      });
    }
    return date;
  },
};

/**
 * URL <-> href
 */
export const urlConverter: ConverterEntry<URL> = {
  type: URL,
  encode: (url) => url.href,
  decode: (token, { path }) => {
    const text = readString(token, "an absolute URL string", path);
    try {
      return new URL(text);
    } catch {
      throw typeMismatchError.create({
        expected: "an absolute URL string",
        actual: `"${text}"`,
        path,
      });
    }
  },
};

export const builtInConverters: readonly ConverterEntry[] = [
  dateConverter,
  urlConverter,
];
