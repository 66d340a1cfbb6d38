import type { JsonValue } from "../../json/value.js";
import { mapPayloadStrings, payloadStrings } from "../payload.js";
import type { Filter } from "../types.js";

export const SUMMARY_PREFIX = "[SUMMARIZED]";
export const TRUNCATION_MARKER = "[TRUNCATED]";

/** Strings at or under this length are never summarised. */
const SUMMARY_MIN_LENGTH = 500;
const SENTENCE_SEPARATOR = ". ";

/**
 * Extractive summary keeping the first, middle and last sentence. Strings that
 * are short or have three sentences or fewer come back unchanged.
 */
export function summarizeText(value: string): string {
  if (value.length <= SUMMARY_MIN_LENGTH) {
    return value;
  }
  const sentences = value.split(SENTENCE_SEPARATOR);
  if (sentences.length <= 3) {
    return value;
  }
  const picked = [sentences[0], sentences[Math.floor(sentences.length / 2)], sentences[sentences.length - 1]];
  return `${SUMMARY_PREFIX} ${picked.filter((part) => part.length > 0).join(SENTENCE_SEPARATOR)}`;
}

/** {@link limit}, moved back one unit when it would split a surrogate pair. */
function cutIndex(value: string, limit: number): number {
  if (limit <= 0 || limit >= value.length) {
    return limit;
  }
  const before = value.charCodeAt(limit - 1);
  const after = value.charCodeAt(limit);
  const splitsPair = before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
  return splitsPair ? limit - 1 : limit;
}

/**
 * Cuts the string leaves so their lengths sum to at most {@link maxLength}.
 * Leaves are consumed in traversal order; the marker is not charged against
 * the budget.
 */
export function truncatePayload(message: JsonValue, maxLength: number): JsonValue {
  let budget = maxLength;
  return mapPayloadStrings(message, (value) => {
    if (value.length <= budget) {
      budget -= value.length;
      return value;
    }
    const kept = value.slice(0, cutIndex(value, budget));
    budget = 0;
    return `${kept}${TRUNCATION_MARKER}`;
  });
}

export const responseSizeFilter: Filter = {
  name: "response_size",
  description: "Summarises long responses and truncates oversized ones",
  directions: ["server_to_client"],
  defaultEnabled: true,
  cacheable: true,
  apply(message: JsonValue, context) {
    const { maxLength, summarizeThreshold } = context.config.responseSize;
    let total = 0;
    for (const value of payloadStrings(message)) {
      total += value.length;
    }
    if (total <= summarizeThreshold) {
      return { action: "pass", message };
    }
    if (total > maxLength) {
      return { action: "pass", message: truncatePayload(message, maxLength), actions: ["truncated"] };
    }

    let changed = false;
    const summarized = mapPayloadStrings(message, (value) => {
      const summary = summarizeText(value);
      if (summary !== value) {
        changed = true;
      }
      return summary;
    });
    return changed ? { action: "pass", message: summarized, actions: ["summarized"] } : { action: "pass", message };
  },
};
