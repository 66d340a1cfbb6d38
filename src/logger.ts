import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

const REDACTION_TOKEN = "[REDACTED]";

const ENABLE_DIRECTIVES = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const DISABLE_DIRECTIVES = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Payload keys whose values are always replaced while redaction is on. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "apikey",
  "token",
  "secret",
  "password",
  "cookie",
]);

const DEFAULT_MAX_FILE_BYTES = 5 * 1024 * 1024;
const DEFAULT_MAX_FILE_COUNT = 5;

export interface RedactionDirectives {
  enabled: boolean;
  tokens: string[];
}

/**
 * Parses `BRIDGE_LOG_REDACT`: comma-separated on/off switches and literal
 * substrings to scrub. Listing substrings without a switch turns redaction on.
 */
export function parseRedactionDirectives(raw: string | undefined): RedactionDirectives {
  let enabled: boolean | undefined;
  const tokens = new Set<string>();
  for (const part of (raw ?? "").split(",")) {
    const directive = part.trim();
    if (directive.length === 0) {
      continue;
    }
    const lower = directive.toLowerCase();
    if (DISABLE_DIRECTIVES.has(lower)) {
      enabled = false;
    } else if (ENABLE_DIRECTIVES.has(lower)) {
      enabled = true;
    } else {
      tokens.add(directive);
    }
  }
  return { enabled: enabled ?? tokens.size > 0, tokens: [...tokens] };
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/** Minimal writable surface the logger prints to. */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /** Mirror every entry to this file. */
  readonly logFile?: string | null;
  /** Rotate the mirror once an append would push it past this size. */
  readonly maxFileSizeBytes?: number;
  /** Files kept on rotation, the active one included. */
  readonly maxFileCount?: number;
  /** Extra literal substrings or patterns scrubbed from string values; turns redaction on. */
  readonly redactSecrets?: ReadonlyArray<string | RegExp>;
  /** Overrides the switch parsed from `BRIDGE_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  readonly onEntry?: (entry: LogEntry) => void;
  /** Defaults to stdout. */
  readonly sink?: LogSink;
  readonly env?: Readonly<Record<string, string | undefined>>;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * JSON-lines logger. Entries go to the sink synchronously; the optional file
 * mirror is appended through a single promise chain so lines keep their order.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly secrets: ReadonlyArray<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly entryListener: ((entry: LogEntry) => void) | undefined;
  private readonly sink: LogSink;
  private fileChain: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(options: LoggerOptions = {}) {
    const env = options.env ?? process.env;
    const directives = parseRedactionDirectives(env.BRIDGE_LOG_REDACT);
    this.logFile = options.logFile ?? null;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_BYTES;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const extraSecrets = (options.redactSecrets ?? []).filter(
      (secret) => typeof secret !== "string" || secret.length > 0,
    );
    this.secrets = [...new Set<string | RegExp>([...directives.tokens, ...extraSecrets])];
    this.redactionEnabled = options.redactionEnabled ?? (directives.enabled || extraSecrets.length > 0);
    this.entryListener = options.onEntry;
    this.sink = options.sink ?? process.stdout;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /** Resolves once every queued file append has settled. */
  async flush(): Promise<void> {
    await this.fileChain;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (payload !== undefined) {
      entry.payload = this.redactionEnabled ? this.redact(payload) : payload;
    }
    const line = `${JSON.stringify(entry)}\n`;
    this.sink.write(line);
    this.entryListener?.({ ...entry });

    const logFile = this.logFile;
    if (logFile) {
      this.fileChain = this.fileChain.then(() => this.appendLine(logFile, line));
    }
  }

  private async appendLine(logFile: string, line: string): Promise<void> {
    try {
      if (!this.directoryReady) {
        await mkdir(dirname(logFile), { recursive: true });
        this.directoryReady = true;
      }
      await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
      await appendFile(logFile, line, "utf8");
    } catch (error) {
      this.directoryReady = false;
      this.reportInternalFailure("log_file_write_failed", error);
    }
  }

  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    if (this.maxFileSizeBytes <= 0) {
      return;
    }
    let size: number;
    try {
      size = (await stat(logFile)).size;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return;
      }
      throw error;
    }
    if (size + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    // file -> file.1 -> file.2 ...; the oldest beyond maxFileCount is dropped.
    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }
    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  private reportInternalFailure(message: string, error: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: "error",
      message,
      payload: { error: error instanceof Error ? error.message : String(error) },
    };
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  }

  private redact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrub(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redact(item));
    }
    if (value !== null && typeof value === "object") {
      const output: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        output[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.redact(entry);
      }
      return output;
    }
    return value;
  }

  private scrub(value: string): string {
    let output = value;
    for (const secret of this.secrets) {
      output =
        typeof secret === "string" ? output.split(secret).join(REDACTION_TOKEN) : output.replace(secret, REDACTION_TOKEN);
    }
    return output;
  }
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  }
}
