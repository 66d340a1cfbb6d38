import { collectStrings, isJsonObject, mapStrings, type JsonObject, type JsonValue } from "../json/value.js";

/**
 * Envelope members left untouched by the content transforms: rewriting an `id`
 * would break correlation and rewriting `method` would change the call.
 */
const ENVELOPE_KEYS = new Set(["jsonrpc", "id", "method"]);

/** Applies {@link transform} to every string of the message payload. */
export function mapPayloadStrings(message: JsonValue, transform: (value: string) => string): JsonValue {
  if (!isJsonObject(message)) {
    return mapStrings(message, transform);
  }
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(message)) {
    result[key] = ENVELOPE_KEYS.has(key) ? value : mapStrings(value, transform, 1);
  }
  return result;
}

/** String leaves of the payload, in traversal order. */
export function payloadStrings(message: JsonValue): string[] {
  if (!isJsonObject(message)) {
    return collectStrings(message);
  }
  const output: string[] = [];
  for (const [key, value] of Object.entries(message)) {
    if (!ENVELOPE_KEYS.has(key)) {
      for (const entry of collectStrings(value, 1)) {
        output.push(entry);
      }
    }
  }
  return output;
}
