import { createHash } from "node:crypto";

/** Scalar leaves of a JSON document. */
export type JsonPrimitive = null | boolean | number | string;

/** Object node of a JSON document. */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Closed sum type covering every value a JSON-RPC frame can carry. All the
 * string-walking transforms of the bridge operate on this shape only.
 */
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

/**
 * Maximum nesting depth visited by the traversal helpers. Sub-trees nested
 * deeper than this are returned untouched.
 */
export const MAX_TRAVERSAL_DEPTH = 64;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Narrows an arbitrary runtime value (typically fresh out of `JSON.parse` or
 * handed over by a transport) to {@link JsonValue}. Functions, symbols,
 * `undefined`, non-finite numbers and class instances are rejected.
 */
export function isJsonValue(value: unknown, depth = 0): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  if (depth > MAX_TRAVERSAL_DEPTH * 4) {
    return false;
  }
  if (Array.isArray(value)) {
    return value.every((entry) => isJsonValue(entry, depth + 1));
  }
  if (typeof value === "object") {
    const prototype = Object.getPrototypeOf(value);
    if (prototype !== Object.prototype && prototype !== null) {
      return false;
    }
    return Object.values(value).every((entry) => isJsonValue(entry, depth + 1));
  }
  return false;
}

/**
 * Rebuilds {@link value} with {@link transform} applied to every string leaf.
 * Object keys are preserved verbatim and in order.
 */
export function mapStrings(
  value: JsonValue,
  transform: (input: string) => string,
  depth = 0,
): JsonValue {
  if (typeof value === "string") {
    return transform(value);
  }
  if (value === null || typeof value !== "object" || depth >= MAX_TRAVERSAL_DEPTH) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => mapStrings(entry, transform, depth + 1));
  }
  const result: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = mapStrings(entry, transform, depth + 1);
  }
  return result;
}

/** Flattens the document into the ordered list of its string leaves. */
export function collectStrings(value: JsonValue, startDepth = 0): string[] {
  const output: string[] = [];
  const visit = (node: JsonValue, depth: number): void => {
    if (typeof node === "string") {
      output.push(node);
      return;
    }
    if (node === null || typeof node !== "object" || depth >= MAX_TRAVERSAL_DEPTH) {
      return;
    }
    const children = Array.isArray(node) ? node : Object.values(node);
    for (const child of children) {
      visit(child, depth + 1);
    }
  };
  visit(value, startDepth);
  return output;
}

/** Serialises {@link value} with object keys sorted so equal documents hash equally. */
export function stableStringify(value: JsonValue): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((entry) => stableStringify(entry)).join(",")}]`;
  }
  const keys = Object.keys(value).sort();
  const parts = keys.map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`);
  return `{${parts.join(",")}}`;
}

/** Hex-encoded SHA-256 digest of {@link stableStringify}. */
export function contentHash(value: JsonValue): string {
  return createHash("sha256").update(stableStringify(value), "utf8").digest("hex");
}
