import { isJsonObject, type JsonObject, type JsonValue } from "../../json/value.js";
import type { Filter } from "../types.js";

export const METADATA_KEY = "bridge_meta";

/**
 * Stamps object messages with `bridge_meta { ts, direction, session }`, `ts`
 * being Unix seconds. An existing `bridge_meta` object is extended rather than
 * replaced. Not cacheable since the stamp depends on time and session.
 */
export const bridgeMetadataFilter: Filter = {
  name: "bridge_metadata",
  description: "Adds bridge_meta (timestamp, direction, session) to object messages",
  directions: ["client_to_server", "server_to_client"],
  defaultEnabled: false,
  cacheable: false,
  apply(message: JsonValue, context) {
    if (!isJsonObject(message)) {
      return { action: "pass", message };
    }
    const existing = message[METADATA_KEY];
    const meta: JsonObject = isJsonObject(existing) ? { ...existing } : {};
    meta.ts = context.now() / 1_000;
    meta.direction = context.direction;
    meta.session = context.sessionId;
    return { action: "pass", message: { ...message, [METADATA_KEY]: meta }, actions: ["metadata_stamped"] };
  },
};
