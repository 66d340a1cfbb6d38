/**
 * Helpers reading environment variables with predictable coercion rules. The
 * readers are bound to an explicit environment so configuration loading never
 * depends on the ambient `process.env` in tests.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

export type EnvSource = Readonly<Record<string, string | undefined>>;

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

export interface EnvReader {
  /** Raw trimmed value, or `undefined` when unset or blank. */
  string(name: string): string | undefined;
  bool(name: string): boolean | undefined;
  int(name: string, options?: NumberOptions): number | undefined;
  number(name: string, options?: NumberOptions): number | undefined;
  /** Whitespace-separated list honouring single and double quotes. */
  list(name: string): string[] | undefined;
}

/** Normalises the raw value retrieved from the environment. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Determines whether the provided value fits the numeric constraints. */
function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  // Infinity and NaN fall back to the default rather than reaching arithmetic.
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/**
 * Splits a command-line style argument string. Quotes group words and are
 * removed; there is no escape character.
 */
export function splitArguments(raw: string): string[] {
  const output: string[] = [];
  let buffer = "";
  let quote: '"' | "'" | null = null;
  let pending = false;
  for (const char of raw) {
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        buffer += char;
      }
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
      pending = true;
      continue;
    }
    if (/\s/.test(char)) {
      if (pending) {
        output.push(buffer);
        buffer = "";
        pending = false;
      }
      continue;
    }
    buffer += char;
    pending = true;
  }
  if (pending) {
    output.push(buffer);
  }
  return output;
}

/**
 * Builds readers over {@link env}. Unset, blank or malformed values read as
 * `undefined` so callers decide the default.
 */
export function createEnvReader(env: EnvSource = process.env): EnvReader {
  return {
    string(name) {
      return normaliseEnvValue(env[name]);
    },
    bool(name) {
      const normalised = normaliseEnvValue(env[name]);
      if (!normalised) {
        return undefined;
      }
      const lower = normalised.toLowerCase();
      if (TRUE_LITERALS.has(lower)) {
        return true;
      }
      if (FALSE_LITERALS.has(lower)) {
        return false;
      }
      return undefined;
    },
    int(name, options) {
      const normalised = normaliseEnvValue(env[name]);
      if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
        return undefined;
      }
      const value = Number.parseInt(normalised, 10);
      if (!Number.isSafeInteger(value)) {
        return undefined;
      }
      return withinBounds(value, options) ? value : undefined;
    },
    number(name, options) {
      const normalised = normaliseEnvValue(env[name]);
      if (!normalised) {
        return undefined;
      }
      const value = Number(normalised);
      return withinBounds(value, options) ? value : undefined;
    },
    list(name) {
      const normalised = normaliseEnvValue(env[name]);
      return normalised ? splitArguments(normalised) : undefined;
    },
  };
}
