import type { JsonValue } from "../json/value.js";
import type { FilterConfigSnapshot } from "./config.js";

/** Side of the bridge a message is travelling towards. */
export type FilterDirection = "client_to_server" | "server_to_client";

/** Names of the built-in filters, in pipeline order. */
export const FILTER_NAMES = [
  "blacklist",
  "html_sanitizer",
  "pii_redactor",
  "secret_masking",
  "response_size",
  "bridge_metadata",
] as const;

export type FilterName = (typeof FILTER_NAMES)[number];

export function isFilterName(value: string): value is FilterName {
  return FILTER_NAMES.some((name) => name === value);
}

/** Transformations recorded in {@link FilterResult.actionsTaken}. */
export type FilterAction = "sanitized" | "pii_redacted" | "secrets_masked" | "summarized" | "truncated" | "metadata_stamped";

/** PII categories, in the order the redactor applies them. */
export const REDACTION_KINDS = ["credit_card", "ssn", "phone", "email"] as const;

export type RedactionKind = (typeof REDACTION_KINDS)[number];

export type RedactionCounts = Record<RedactionKind, number>;

export function emptyRedactionCounts(): RedactionCounts {
  return { credit_card: 0, ssn: 0, phone: 0, email: 0 };
}

/** Everything a filter may read while processing one message. */
export interface FilterContext {
  readonly direction: FilterDirection;
  readonly sessionId: string;
  readonly config: FilterConfigSnapshot;
  /** Wall clock in milliseconds. */
  readonly now: () => number;
}

export type FilterVerdict =
  | {
      action: "pass";
      message: JsonValue;
      actions?: readonly FilterAction[];
      redactions?: Partial<RedactionCounts>;
    }
  | { action: "block"; reason: string };

/**
 * A named transformation stage. `apply` must not mutate its input; it returns
 * either the (possibly rebuilt) message or a block verdict.
 */
export interface Filter {
  readonly name: FilterName;
  readonly description: string;
  readonly directions: readonly FilterDirection[];
  readonly defaultEnabled: boolean;
  /** False when the output depends on more than the message and the snapshot (time, session). */
  readonly cacheable: boolean;
  apply(message: JsonValue, context: FilterContext): FilterVerdict;
}

/** Outcome of one pipeline run. */
export interface FilterResult {
  message: JsonValue;
  blocked: boolean;
  reason: string | null;
  blockedBy: FilterName | null;
  actionsTaken: FilterAction[];
  redactionCounts: RedactionCounts;
  /** Filters that threw and were skipped. */
  faults: FilterName[];
  cached: boolean;
}

export interface FilterDescriptor {
  name: FilterName;
  enabled: boolean;
  description: string;
  directions: FilterDirection[];
}
