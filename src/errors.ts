/**
 * Error hierarchy surfaced by the bridge. Every error carries a stable `code`
 * so transports and tests can branch on it without parsing messages.
 */

/** Optional knobs attached to every {@link BridgeError}. */
export interface BridgeErrorOptions {
  hint?: string;
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class BridgeError extends Error {
  readonly code: string;
  readonly hint?: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, options: BridgeErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "BridgeError";
    this.code = code;
    if (options.hint !== undefined) {
      this.hint = options.hint;
    }
    if (options.details !== undefined) {
      this.details = options.details;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Stable codes raised by the framing codec. */
export type FramingErrorCode = "E-FRAME-EOF" | "E-FRAME-HEADER" | "E-FRAME-LENGTH" | "E-FRAME-BODY";

/**
 * Raised when the byte stream shared with the child cannot be decoded. The
 * `atBoundary` flag distinguishes a clean end of stream (no byte of the next
 * frame consumed) from a truncated frame.
 */
export class FramingError extends BridgeError {
  readonly atBoundary: boolean;

  constructor(code: FramingErrorCode, message: string, options: BridgeErrorOptions & { atBoundary?: boolean } = {}) {
    super(code, message, options);
    this.name = "FramingError";
    this.atBoundary = options.atBoundary ?? false;
  }
}

/** The child stopped producing frames (clean EOF or exit). */
export class ProcessExitedError extends BridgeError {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;

  constructor(exitCode: number | null, signal: NodeJS.Signals | null, options: BridgeErrorOptions = {}) {
    super(
      "E-PROCESS-EXITED",
      `Bridged process exited (code=${exitCode ?? "null"}, signal=${signal ?? "null"})`,
      options,
    );
    this.name = "ProcessExitedError";
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

/** Raised when spawning the child fails. */
export class ChildSpawnError extends BridgeError {
  constructor(command: string, cause: unknown) {
    const rootMessage = cause instanceof Error ? cause.message : String(cause ?? "unknown");
    super("E-CHILD-SPAWN", `Failed to spawn "${command}": ${rootMessage}`, { cause });
    this.name = "ChildSpawnError";
  }
}

export class UnknownSessionError extends BridgeError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super("E-SESSION-NOT-FOUND", `Unknown session ${sessionId}`, {
      hint: "register a session first or reconnect",
    });
    this.name = "UnknownSessionError";
    this.sessionId = sessionId;
  }
}

export class UnknownFilterError extends BridgeError {
  readonly filterName: string;

  constructor(filterName: string) {
    super("E-FILTER-NOT-FOUND", `Unknown filter ${filterName}`);
    this.name = "UnknownFilterError";
    this.filterName = filterName;
  }
}

/** Submissions after the child died or before the bridge started. */
export class BridgeUnavailableError extends BridgeError {
  constructor(message = "Bridge is not running", options: BridgeErrorOptions = {}) {
    super("E-BRIDGE-DOWN", message, options);
    this.name = "BridgeUnavailableError";
  }
}

/** Invalid tunables or filter configuration. */
export class ConfigurationError extends BridgeError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super("E-CONFIG-INVALID", message, { details: { issues: [...issues] } });
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/** Serialises any thrown value into a log-friendly payload. */
export function describeError(error: unknown): { name: string; message: string; code: string | null } {
  if (error instanceof BridgeError) {
    return { name: error.name, message: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, code: null };
  }
  return { name: "Error", message: String(error), code: null };
}
