import type { JsonObject, JsonValue } from "../json/value.js";
import type { JsonRpcId } from "./messages.js";

/**
 * Canonical taxonomy describing the JSON-RPC errors synthesised by the bridge
 * itself (as opposed to errors relayed verbatim from the child).
 */
export const JSON_RPC_ERROR_TAXONOMY = {
  BLOCKED_BY_POLICY: { code: -32000, message: "Blocked by content policy" },
  BRIDGE_UNAVAILABLE: { code: -32001, message: "Bridge unavailable" },
  INVALID_REQUEST: { code: -32600, message: "Invalid Request" },
  INTERNAL: { code: -32603, message: "Internal error" },
} as const;

/** Union type describing the supported JSON-RPC error categories. */
export type JsonRpcErrorCategory = keyof typeof JSON_RPC_ERROR_TAXONOMY;

/** Extra knobs accepted by {@link createJsonRpcErrorResponse}. */
export interface JsonRpcErrorOptions {
  message?: string;
  data?: JsonObject;
}

/**
 * Builds a complete JSON-RPC 2.0 error response. The `id` is echoed with its
 * original literal type; `null` is used when the offending message had none.
 */
export function createJsonRpcErrorResponse(
  category: JsonRpcErrorCategory,
  id: JsonRpcId | null,
  options: JsonRpcErrorOptions = {},
): JsonObject {
  const taxonomy = JSON_RPC_ERROR_TAXONOMY[category];
  const error: JsonObject = {
    code: taxonomy.code,
    message: options.message ?? taxonomy.message,
  };
  if (options.data !== undefined) {
    error.data = { category, ...options.data };
  } else {
    error.data = { category };
  }
  return { jsonrpc: "2.0", id, error };
}
