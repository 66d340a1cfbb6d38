import type { JsonValue } from "../../json/value.js";
import { mapPayloadStrings } from "../payload.js";
import type { Filter } from "../types.js";

export const SECRET_TOKEN = "[REDACTED]";

export const secretMaskingFilter: Filter = {
  name: "secret_masking",
  description: "Masks API keys and tokens in every string field",
  directions: ["client_to_server", "server_to_client"],
  defaultEnabled: true,
  cacheable: true,
  apply(message: JsonValue, context) {
    const patterns = context.config.secretMasking.patterns;
    let masked = 0;
    const output = mapPayloadStrings(message, (value) => {
      let current = value;
      for (const pattern of patterns) {
        current = current.replace(pattern, () => {
          masked += 1;
          return SECRET_TOKEN;
        });
      }
      return current;
    });
    if (masked === 0) {
      return { action: "pass", message };
    }
    return { action: "pass", message: output, actions: ["secrets_masked"] };
  },
};
