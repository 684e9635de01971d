import type { NamingPolicy } from "./types";

const isUpper = (char: string): boolean =>
  char !== char.toLowerCase() && char === char.toUpperCase();

/**
 * Lowers the leading run of capitals, keeping the last one when it starts a
 * new word: `URLValue` becomes `urlValue`, `ID` becomes `id`.
 */
export const toCamelCase = (name: string): string => {
  if (!name || !isUpper(name[0])) {
    return name;
  }
  const chars = Array.from(name);
  for (let i = 0; i < chars.length; i++) {
    if (i === 1 && !isUpper(chars[i])) {
      break;
    }
    const hasNext = i + 1 < chars.length;
    if (i > 0 && hasNext && !isUpper(chars[i + 1])) {
      if (chars[i + 1] === " ") {
        chars[i] = chars[i].toLowerCase();
      }
      break;
    }
    chars[i] = chars[i].toLowerCase();
  }
  return chars.join("");
};

export const toPascalCase = (name: string): string =>
  name ? name[0].toUpperCase() + name.slice(1) : name;

export const splitWords = (name: string): string[] =>
  name
    .replace(/([a-z\d])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .split(/[\s_-]+/)
    .filter((word) => word.length > 0);

export const toSnakeCase = (name: string): string =>
  splitWords(name)
    .map((word) => word.toLowerCase())
    .join("_");

export const toKebabCase = (name: string): string =>
  splitWords(name)
    .map((word) => word.toLowerCase())
    .join("-");

const BUILT_IN_POLICIES: Readonly<Record<string, (name: string) => string>> = {
  camelCase: toCamelCase,
  pascalCase: toPascalCase,
  snakeCase: toSnakeCase,
  kebabCase: toKebabCase,
};

/**
 * Turns an option value into a name transform; `null` keeps names as declared.
 */
export function resolveNamingPolicy(
  policy: NamingPolicy | null,
): (name: string) => string {
  if (policy === null) {
    return (name) => name;
  }
  if (typeof policy === "function") {
    return policy;
  }
  return BUILT_IN_POLICIES[policy];
}
