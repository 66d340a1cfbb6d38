import { StructuredLogger, type LogLevel } from "../../src/logger.js";

/** Entry captured by {@link RecordingLogger}. */
export interface RecordedEntry {
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/**
 * Logger for tests that need to observe structured entries without polluting
 * stdout. It subclasses the production {@link StructuredLogger} so it exposes
 * the same surface while capturing calls in memory.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: RecordedEntry[] = [];

  constructor() {
    super({ logFile: null, redactionEnabled: false });
  }

  /** Entries whose message equals {@link message}. */
  find(message: string): RecordedEntry[] {
    return this.entries.filter((entry) => entry.message === message);
  }

  private record(level: LogLevel, message: string, payload?: unknown): void {
    this.entries.push({ level, message, payload });
  }

  override debug(message: string, payload?: unknown): void {
    this.record("debug", message, payload);
  }

  override info(message: string, payload?: unknown): void {
    this.record("info", message, payload);
  }

  override warn(message: string, payload?: unknown): void {
    this.record("warn", message, payload);
  }

  override error(message: string, payload?: unknown): void {
    this.record("error", message, payload);
  }
}
