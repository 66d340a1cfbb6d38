import { readFile } from "node:fs/promises";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { ConfigurationError, describeError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { FILTER_NAMES, isFilterName, type FilterName } from "./types.js";

/** Key/token assignments and `sk-` style keys, always masked by `secret_masking`. */
const BUILTIN_SECRET_PATTERNS: readonly RegExp[] = [
  /(?:api|secret|access|bearer)[-_ ]?(?:key|token)\s*[:=]\s*[A-Za-z0-9._-]{12,}/gi,
  /sk-[A-Za-z0-9]{20,}/gi,
];

const BlacklistSchema = z
  .object({
    blockedDomains: z.array(z.string().min(1)).default([]),
    blockedKeywords: z.array(z.string().min(1)).default([]),
    /** Case-insensitive regular expressions. */
    blockedPatterns: z.array(z.string().min(1)).default([]),
  })
  .strict();

const HtmlSanitizerSchema = z
  .object({
    removeScripts: z.boolean().default(true),
    removeTracking: z.boolean().default(true),
    removeAds: z.boolean().default(true),
    normalizeWhitespace: z.boolean().default(true),
  })
  .strict();

const PiiSchema = z
  .object({
    redactEmails: z.boolean().default(true),
    redactPhones: z.boolean().default(true),
    redactSsns: z.boolean().default(true),
    redactCreditCards: z.boolean().default(true),
  })
  .strict();

const ResponseSizeSchema = z
  .object({
    maxLength: z.number().int().positive().default(15_000),
    summarizeThreshold: z.number().int().nonnegative().default(5_000),
  })
  .strict();

const SecretMaskingSchema = z
  .object({
    /** Extra patterns appended to the built-in ones (compiled with `gi`). */
    patterns: z.array(z.string().min(1)).default([]),
  })
  .strict();

const CacheSchema = z
  .object({
    enabled: z.boolean().default(true),
    ttlSeconds: z.number().positive().default(300),
    maxEntries: z.number().int().positive().default(1_000),
  })
  .strict();

const AuditSchema = z
  .object({
    logBlocked: z.boolean().default(true),
    logRedactions: z.boolean().default(true),
    logSummaries: z.boolean().default(true),
  })
  .strict();

/** Shape accepted by {@link parseFilterConfig}, from code or from a YAML/JSON file. */
export const FilterConfigSchema = z
  .object({
    /** Per-filter toggles; omitted filters keep their default. */
    filters: z.record(z.string(), z.boolean()).default({}),
    blacklist: BlacklistSchema.default({}),
    htmlSanitizer: HtmlSanitizerSchema.default({}),
    pii: PiiSchema.default({}),
    responseSize: ResponseSizeSchema.default({}),
    secretMasking: SecretMaskingSchema.default({}),
    cache: CacheSchema.default({}),
    audit: AuditSchema.default({}),
  })
  .strict()
  .superRefine((value, ctx) => {
    for (const name of Object.keys(value.filters)) {
      if (!isFilterName(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["filters", name],
          message: `unknown filter (expected one of ${FILTER_NAMES.join(", ")})`,
        });
      }
    }
    if (value.responseSize.summarizeThreshold > value.responseSize.maxLength) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["responseSize", "summarizeThreshold"],
        message: "summarizeThreshold must not exceed maxLength",
      });
    }
  });

export type FilterConfigInput = z.input<typeof FilterConfigSchema>;
export type FilterConfigValues = z.output<typeof FilterConfigSchema>;

/**
 * Immutable view of the filter configuration. A snapshot is never modified;
 * reconfiguration builds a new one with a higher `version`.
 */
export interface FilterConfigSnapshot {
  readonly version: number;
  readonly createdAt: number;
  readonly enabled: Readonly<Record<FilterName, boolean>>;
  readonly blacklist: {
    readonly blockedDomains: readonly string[];
    readonly blockedKeywords: readonly string[];
    readonly blockedPatterns: readonly RegExp[];
  };
  readonly htmlSanitizer: Readonly<FilterConfigValues["htmlSanitizer"]>;
  readonly pii: Readonly<FilterConfigValues["pii"]>;
  readonly responseSize: Readonly<FilterConfigValues["responseSize"]>;
  readonly secretMasking: { readonly patterns: readonly RegExp[] };
  readonly cache: { readonly enabled: boolean; readonly ttlMs: number; readonly maxEntries: number };
  readonly audit: Readonly<FilterConfigValues["audit"]>;
  /** Validated values the snapshot was compiled from. */
  readonly source: FilterConfigValues;
}

export interface BuildSnapshotOptions {
  version: number;
  /** Toggle applied to filters the configuration does not mention. */
  defaults: Readonly<Record<FilterName, boolean>>;
  logger?: StructuredLogger;
  now?: () => number;
}

/** Validates {@link input}, throwing a {@link ConfigurationError} listing every issue. */
export function parseFilterConfig(input: unknown): FilterConfigValues {
  const parsed = FilterConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigurationError("Invalid filter configuration", issues);
  }
  return parsed.data;
}

/**
 * Validates and compiles a configuration into a deep-frozen snapshot. Regular
 * expressions that fail to compile are logged (`filter_pattern_invalid`) and
 * skipped.
 */
export function buildFilterConfigSnapshot(input: unknown, options: BuildSnapshotOptions): FilterConfigSnapshot {
  const values = parseFilterConfig(input);
  const enabled = { ...options.defaults };
  for (const [name, toggle] of Object.entries(values.filters)) {
    if (isFilterName(name)) {
      enabled[name] = toggle;
    }
  }

  const snapshot: FilterConfigSnapshot = {
    version: options.version,
    createdAt: (options.now ?? Date.now)(),
    enabled,
    blacklist: {
      blockedDomains: [...values.blacklist.blockedDomains],
      blockedKeywords: [...values.blacklist.blockedKeywords],
      blockedPatterns: compilePatterns(values.blacklist.blockedPatterns, "i", "blacklist", options.logger),
    },
    htmlSanitizer: { ...values.htmlSanitizer },
    pii: { ...values.pii },
    responseSize: { ...values.responseSize },
    secretMasking: {
      patterns: [
        ...BUILTIN_SECRET_PATTERNS,
        ...compilePatterns(values.secretMasking.patterns, "gi", "secret_masking", options.logger),
      ],
    },
    cache: {
      enabled: values.cache.enabled,
      ttlMs: values.cache.ttlSeconds * 1_000,
      maxEntries: values.cache.maxEntries,
    },
    audit: { ...values.audit },
    source: structuredClone(values),
  };
  return deepFreeze(snapshot);
}

/** Same configuration with one filter toggled, as validated input for the next snapshot. */
export function withFilterToggle(values: FilterConfigValues, name: FilterName, enabled: boolean): FilterConfigValues {
  const next = structuredClone(values);
  next.filters[name] = enabled;
  return next;
}

/** Reads a YAML (or JSON, which YAML accepts) filter configuration file. */
export async function loadFilterConfigFile(path: string): Promise<FilterConfigValues> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Unable to read filter configuration ${path}`, [describeError(error).message]);
  }
  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (error) {
    throw new ConfigurationError(`Filter configuration ${path} is not valid YAML`, [describeError(error).message]);
  }
  return parseFilterConfig(document);
}

function compilePatterns(
  sources: readonly string[],
  flags: string,
  filter: FilterName,
  logger: StructuredLogger | undefined,
): RegExp[] {
  const compiled: RegExp[] = [];
  for (const source of sources) {
    try {
      compiled.push(new RegExp(source, flags));
    } catch (error) {
      logger?.warn("filter_pattern_invalid", { filter, pattern: source, error: describeError(error).message });
    }
  }
  return compiled;
}

/**
 * Freezes every nested object. Regular expressions stay mutable because global
 * matching writes their `lastIndex`.
 */
function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || value instanceof RegExp || Object.isFrozen(value)) {
    return value;
  }
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}
