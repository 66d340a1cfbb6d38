import { randomUUID } from "node:crypto";

import { isJsonObject, type JsonObject, type JsonValue } from "../json/value.js";

/** Identifier types accepted for correlation. `null` ids are never correlated. */
export type JsonRpcId = string | number;

/** Logical shape of a JSON-RPC frame. */
export type JsonRpcMessageKind = "request" | "response" | "notification" | "invalid";

/**
 * Reads the correlatable identifier of a message. The literal type is kept as
 * is so `"1"` and `1` stay distinct.
 */
export function readMessageId(message: JsonValue): JsonRpcId | null {
  if (!isJsonObject(message)) {
    return null;
  }
  const id = message.id;
  if (typeof id === "string") {
    return id;
  }
  if (typeof id === "number" && Number.isFinite(id)) {
    return id;
  }
  return null;
}

export function readMethod(message: JsonValue): string | null {
  if (!isJsonObject(message)) {
    return null;
  }
  return typeof message.method === "string" ? message.method : null;
}

export function classifyMessage(message: JsonValue): JsonRpcMessageKind {
  if (!isJsonObject(message)) {
    return "invalid";
  }
  const hasId = Object.prototype.hasOwnProperty.call(message, "id");
  const method = readMethod(message);
  if (method !== null) {
    return hasId ? "request" : "notification";
  }
  if (hasId && ("result" in message || "error" in message)) {
    return "response";
  }
  return "invalid";
}

/** Method namespace reserved for fire-and-forget notifications. */
const NOTIFICATION_METHOD_PREFIX = "notifications/";

/** True for methods that never expect a reply (`notifications/*`). */
function isNotificationMethod(method: string): boolean {
  return method.startsWith(NOTIFICATION_METHOD_PREFIX);
}

/**
 * Prepares a client submission before it enters the pipeline: the envelope
 * gains `jsonrpc: "2.0"` when missing, and a message carrying a `method` but no
 * `id` receives a fresh unique id unless the method lives under
 * `notifications/`. Non-object payloads are returned untouched.
 */
export function normaliseClientMessage(
  message: JsonValue,
  idFactory: () => JsonRpcId = randomUUID,
): JsonValue {
  if (!isJsonObject(message)) {
    return message;
  }
  const normalised: JsonObject = { ...message };
  if (!("jsonrpc" in normalised)) {
    normalised.jsonrpc = "2.0";
  }
  const method = normalised.method;
  if (!("id" in normalised) && typeof method === "string" && !isNotificationMethod(method)) {
    normalised.id = idFactory();
  }
  return normalised;
}
