import type { JsonValue } from "../../json/value.js";
import type { FilterConfigSnapshot } from "../config.js";
import { mapPayloadStrings } from "../payload.js";
import { emptyRedactionCounts, type Filter, type RedactionCounts, type RedactionKind } from "../types.js";

interface PiiRule {
  readonly kind: RedactionKind;
  readonly pattern: RegExp;
  readonly token: string;
  readonly enabled: (config: FilterConfigSnapshot["pii"]) => boolean;
}

/**
 * Longer digit runs go first: a card number would otherwise be eaten piecewise
 * by the SSN and phone rules. None of the tokens contains a digit or an `@`, so
 * redacted text never matches again.
 */
const PII_RULES: readonly PiiRule[] = [
  {
    kind: "credit_card",
    // Visa, Mastercard, Amex, Diners, Discover.
    pattern: /\b(?:4[0-9]{12}(?:[0-9]{3})?|5[1-5][0-9]{14}|3[47][0-9]{13}|3[0-9]{13}|6(?:011|5[0-9]{2})[0-9]{12})\b/g,
    token: "[CREDIT_CARD_REDACTED]",
    enabled: (config) => config.redactCreditCards,
  },
  {
    kind: "ssn",
    pattern: /\b(?!000|666|9\d{2})\d{3}[-.\s]?(?!00)\d{2}[-.\s]?(?!0000)\d{4}\b/g,
    token: "[SSN_REDACTED]",
    enabled: (config) => config.redactSsns,
  },
  {
    kind: "phone",
    pattern: /(?:\+?1[-.\s]?)?\(?[0-9]{3}\)?[-.\s]?[0-9]{3}[-.\s]?[0-9]{4}/g,
    token: "[PHONE_REDACTED]",
    enabled: (config) => config.redactPhones,
  },
  {
    kind: "email",
    pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
    token: "[EMAIL_REDACTED]",
    enabled: (config) => config.redactEmails,
  },
];

/** Redacts PII in {@link text} and adds what it replaced to {@link counts}. */
export function redactPii(text: string, config: FilterConfigSnapshot["pii"], counts: RedactionCounts): string {
  let output = text;
  for (const rule of PII_RULES) {
    if (!rule.enabled(config)) {
      continue;
    }
    output = output.replace(rule.pattern, () => {
      counts[rule.kind] += 1;
      return rule.token;
    });
  }
  return output;
}

export const piiRedactorFilter: Filter = {
  name: "pii_redactor",
  description: "Masks emails, phone numbers, SSNs and card numbers",
  directions: ["client_to_server", "server_to_client"],
  defaultEnabled: true,
  cacheable: true,
  apply(message: JsonValue, context) {
    const counts = emptyRedactionCounts();
    const redacted = mapPayloadStrings(message, (value) => redactPii(value, context.config.pii, counts));
    const total = counts.credit_card + counts.ssn + counts.phone + counts.email;
    if (total === 0) {
      return { action: "pass", message };
    }
    return { action: "pass", message: redacted, actions: ["pii_redacted"], redactions: counts };
  },
};
