import type { JsonRpcId } from "../rpc/messages.js";

const DEFAULT_TTL_MS = 10 * 60_000;
const DEFAULT_MAX_RETIRED = 10_000;

export interface CorrelationEntry {
  readonly sessionId: string;
  readonly method: string | null;
  readonly recordedAt: number;
}

export type RetirementReason = "expired" | "session_closed";

/** Id whose owner is gone; a late response to it must not fan out. */
export interface RetiredCorrelation {
  readonly sessionId: string;
  readonly reason: RetirementReason;
  readonly retiredAt: number;
}

export interface CorrelationTableOptions {
  ttlMs?: number;
  /** Upper bound of remembered retired ids; the oldest go first. */
  maxRetired?: number;
  now?: () => number;
}

/**
 * Maps request ids to the session that sent them. Keys compare with strict
 * equality, so `"1"` and `1` are two different requests. Entries that never
 * receive a response are retired by {@link sweep} once older than the TTL, and
 * entries of a closed session by {@link forgetSession}. Retired ids are kept
 * for another TTL so their late responses can be recognised and dropped.
 */
export class CorrelationTable {
  private readonly entries = new Map<JsonRpcId, CorrelationEntry>();
  private readonly retired = new Map<JsonRpcId, RetiredCorrelation>();
  private readonly ttlMs: number;
  private readonly maxRetired: number;
  private readonly now: () => number;

  constructor(options: CorrelationTableOptions = {}) {
    this.ttlMs = Math.max(0, options.ttlMs ?? DEFAULT_TTL_MS);
    this.maxRetired = Math.max(0, options.maxRetired ?? DEFAULT_MAX_RETIRED);
    this.now = options.now ?? Date.now;
  }

  /** Live entries still waiting for a response. */
  get size(): number {
    return this.entries.size;
  }

  get retiredSize(): number {
    return this.retired.size;
  }

  /**
   * Records the owner of {@link id}. Returns the previous owner when a stale
   * entry was overwritten.
   */
  record(id: JsonRpcId, sessionId: string, method: string | null): CorrelationEntry | null {
    const previous = this.entries.get(id) ?? null;
    this.entries.set(id, { sessionId, method, recordedAt: this.now() });
    this.retired.delete(id);
    return previous;
  }

  /** Puts back an entry displaced by {@link record}, timestamp included. */
  restore(id: JsonRpcId, entry: CorrelationEntry): void {
    this.entries.set(id, entry);
  }

  /** Removes and returns the owner of {@link id}. */
  pop(id: JsonRpcId): CorrelationEntry | null {
    const entry = this.entries.get(id);
    if (!entry) {
      return null;
    }
    this.entries.delete(id);
    return entry;
  }

  /** Removes and returns the retirement record of {@link id}. */
  takeRetired(id: JsonRpcId): RetiredCorrelation | null {
    const entry = this.retired.get(id);
    if (!entry) {
      return null;
    }
    this.retired.delete(id);
    return entry;
  }

  /** Drops {@link id} only while it still belongs to {@link sessionId}. */
  forget(id: JsonRpcId, sessionId: string): boolean {
    const entry = this.entries.get(id);
    if (!entry || entry.sessionId !== sessionId) {
      return false;
    }
    return this.entries.delete(id);
  }

  /** Retires every entry owned by {@link sessionId}; returns how many there were. */
  forgetSession(sessionId: string): number {
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (entry.sessionId === sessionId) {
        this.entries.delete(id);
        this.retire(id, sessionId, "session_closed");
        removed += 1;
      }
    }
    return removed;
  }

  /**
   * Retires entries recorded at least the TTL ago and returns their ids. Retired
   * ids older than another TTL are forgotten for good.
   */
  sweep(): JsonRpcId[] {
    const cutoff = this.now() - this.ttlMs;
    for (const [id, entry] of this.retired) {
      if (entry.retiredAt <= cutoff) {
        this.retired.delete(id);
      }
    }
    const expired: JsonRpcId[] = [];
    for (const [id, entry] of this.entries) {
      if (entry.recordedAt <= cutoff) {
        this.entries.delete(id);
        this.retire(id, entry.sessionId, "expired");
        expired.push(id);
      }
    }
    return expired;
  }

  clear(): void {
    this.entries.clear();
    this.retired.clear();
  }

  private retire(id: JsonRpcId, sessionId: string, reason: RetirementReason): void {
    this.retired.delete(id);
    this.retired.set(id, { sessionId, reason, retiredAt: this.now() });
    while (this.retired.size > this.maxRetired) {
      const oldest = this.retired.keys().next();
      if (oldest.done) {
        break;
      }
      this.retired.delete(oldest.value);
    }
  }
}
