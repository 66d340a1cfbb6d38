import { collectStrings, type JsonValue } from "../../json/value.js";
import type { Filter, FilterContext, FilterVerdict } from "../types.js";

/**
 * Blocks client submissions whose string content mentions a blocked domain or
 * keyword (case-insensitive substring) or matches a blocked pattern. The whole
 * message is scanned, envelope included.
 */
export const blacklistFilter: Filter = {
  name: "blacklist",
  description: "Blocks client messages mentioning blocked domains, keywords or patterns",
  directions: ["client_to_server"],
  defaultEnabled: true,
  cacheable: true,
  apply(message: JsonValue, context: FilterContext): FilterVerdict {
    const { blockedDomains, blockedKeywords, blockedPatterns } = context.config.blacklist;
    if (blockedDomains.length === 0 && blockedKeywords.length === 0 && blockedPatterns.length === 0) {
      return { action: "pass", message };
    }

    const domains = blockedDomains.map((domain) => domain.toLowerCase());
    const keywords = blockedKeywords.map((keyword) => keyword.toLowerCase());
    for (const text of collectStrings(message)) {
      const lower = text.toLowerCase();
      const domain = domains.find((candidate) => lower.includes(candidate));
      if (domain !== undefined) {
        return { action: "block", reason: `blocked domain "${domain}"` };
      }
      const keyword = keywords.find((candidate) => lower.includes(candidate));
      if (keyword !== undefined) {
        return { action: "block", reason: `blocked keyword "${keyword}"` };
      }
      const pattern = blockedPatterns.find((candidate) => candidate.test(text));
      if (pattern !== undefined) {
        return { action: "block", reason: `blocked pattern /${pattern.source}/` };
      }
    }
    return { action: "pass", message };
  },
};
