import type { JsonPrimitive, JsonValue } from "./types";
import { isJsonObject } from "./validation";

/**
 * Output tree of the encoder. Objects are Maps so metadata stays first and
 * integer-like keys keep insertion order.
 */
export type JsonNode = JsonPrimitive | JsonNode[] | JsonObjectNode;
export type JsonObjectNode = Map<string, JsonNode>;

/**
 * Converts a converter's plain JSON result into the ordered tree.
 */
export function toJsonNode(value: JsonValue): JsonNode {
  if (Array.isArray(value)) {
    return value.map(toJsonNode);
  }
  if (isJsonObject(value)) {
    const node: JsonObjectNode = new Map();
    for (const [key, entry] of Object.entries(value)) {
      node.set(key, toJsonNode(entry));
    }
    return node;
  }
  return value;
}

const writePrimitive = (value: JsonPrimitive): string =>
  typeof value === "number" && !Number.isFinite(value)
    ? "null"
    : JSON.stringify(value);

function write(node: JsonNode, indent: string, level: number): string {
  if (!(node instanceof Map) && !Array.isArray(node)) {
    return writePrimitive(node);
  }

  const parts: string[] = [];
  if (Array.isArray(node)) {
    for (const item of node) {
      parts.push(write(item, indent, level + 1));
    }
  } else {
    const separator = indent ? ": " : ":";
    for (const [key, value] of node) {
      parts.push(`${JSON.stringify(key)}${separator}${write(value, indent, level + 1)}`);
    }
  }

  const [open, close] = Array.isArray(node) ? ["[", "]"] : ["{", "}"];
  if (parts.length === 0) {
    return `${open}${close}`;
  }
  if (!indent) {
    return `${open}${parts.join(",")}${close}`;
  }
  const inner = indent.repeat(level + 1);
  const outer = indent.repeat(level);
  return `${open}\n${inner}${parts.join(`,\n${inner}`)}\n${outer}${close}`;
}

/**
 * Serializes a node tree with the spacing of `JSON.stringify(value, null, 2)`
 * when indented and no whitespace otherwise.
 */
export function writeJson(node: JsonNode, indented = false): string {
  return write(node, indented ? "  " : "", 0);
}
