import { randomUUID } from "node:crypto";

import { UnknownSessionError, describeError } from "../errors.js";
import type { JsonValue } from "../json/value.js";
import type { StructuredLogger } from "../logger.js";
import { runtimeClearInterval, runtimeSetInterval, type IntervalHandle } from "../runtime/timers.js";
import { BoundedQueue } from "../utils/boundedQueue.js";

const DEFAULT_MAX_QUEUE = 100;
const DEFAULT_MAX_IDLE_MS = 300_000;
const DEFAULT_SWEEP_INTERVAL_MS = 30_000;
export const DEFAULT_HEARTBEAT_MS = 15_000;

/**
 * Push handle attached to a session. `send` may be synchronous or return a
 * promise; a throw or a rejection detaches the subscriber.
 */
export interface SessionSubscriber {
  send(message: JsonValue): void | Promise<void>;
}

export type DeliveryOutcome = "queued" | "dropped" | "missing";

/** Result of {@link SessionRegistry.nextFrame}. */
export type SessionFrame = { type: "message"; message: JsonValue } | { type: "heartbeat" } | { type: "closed" };

export interface SessionSnapshot {
  id: string;
  queueDepth: number;
  subscriberCount: number;
  idleMs: number;
  ageMs: number;
  droppedFrames: number;
  deliveredFrames: number;
}

export interface SessionRegistryOptions {
  logger: StructuredLogger;
  /** Capacity of every session outbound queue. */
  maxQueue?: number;
  /** Idle period after which the sweeper removes a session. */
  maxIdleMs?: number;
  sweepIntervalMs?: number;
  now?: () => number;
  idFactory?: () => string;
}

interface SessionRecord {
  readonly id: string;
  readonly queue: BoundedQueue<JsonValue>;
  readonly subscribers: Set<SessionSubscriber>;
  readonly createdAt: number;
  lastActivity: number;
  droppedFrames: number;
  deliveredFrames: number;
}

/**
 * In-memory table of client sessions. Every session owns a bounded outbound
 * queue drained by {@link nextFrame} plus any number of push subscribers that
 * receive a copy of each delivered frame.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly logger: StructuredLogger;
  private readonly maxQueue: number;
  private readonly maxIdleMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private readonly idFactory: () => string;
  private sweeper: IntervalHandle | null = null;

  constructor(options: SessionRegistryOptions) {
    this.logger = options.logger;
    this.maxQueue = Math.max(1, Math.trunc(options.maxQueue ?? DEFAULT_MAX_QUEUE));
    this.maxIdleMs = Math.max(0, options.maxIdleMs ?? DEFAULT_MAX_IDLE_MS);
    this.sweepIntervalMs = Math.max(1, options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS);
    this.now = options.now ?? Date.now;
    this.idFactory = options.idFactory ?? randomUUID;
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Registers a fresh session and returns its identifier. */
  create(): string {
    let id = this.idFactory();
    while (this.sessions.has(id)) {
      id = this.idFactory();
    }
    const at = this.now();
    this.sessions.set(id, {
      id,
      queue: new BoundedQueue<JsonValue>(this.maxQueue),
      subscribers: new Set(),
      createdAt: at,
      lastActivity: at,
      droppedFrames: 0,
      deliveredFrames: 0,
    });
    this.logger.info("session_created", { session_id: id, sessions: this.sessions.size });
    return id;
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  /** Snapshot of a single session; throws {@link UnknownSessionError} when absent. */
  get(id: string): SessionSnapshot {
    return this.snapshot(this.require(id));
  }

  /** Ids of every registered session, in registration order. */
  ids(): string[] {
    return [...this.sessions.keys()];
  }

  /**
   * Removes the session: pending readers observe `closed` and subscribers are
   * detached. Returns whether a session was removed.
   */
  remove(id: string, reason = "removed"): boolean {
    const record = this.sessions.get(id);
    if (!record) {
      return false;
    }
    this.sessions.delete(id);
    record.queue.close();
    record.subscribers.clear();
    this.logger.info("session_removed", { session_id: id, reason, sessions: this.sessions.size });
    return true;
  }

  touch(id: string): void {
    const record = this.sessions.get(id);
    if (record) {
      record.lastActivity = this.now();
    }
  }

  /**
   * Enqueues {@link message} for the session and tees it to every subscriber.
   * A full queue drops the frame (`dropped`) without blocking the caller.
   */
  deliver(id: string, message: JsonValue): DeliveryOutcome {
    const record = this.sessions.get(id);
    if (!record) {
      return "missing";
    }

    const queued = record.queue.push(message);
    if (queued) {
      record.deliveredFrames += 1;
    } else {
      record.droppedFrames += 1;
      this.logger.warn("session_queue_full", {
        session_id: id,
        capacity: this.maxQueue,
        dropped_frames: record.droppedFrames,
      });
    }

    let accepted = false;
    for (const subscriber of [...record.subscribers]) {
      accepted = this.notifySubscriber(record, subscriber, message) || accepted;
    }
    // A connected subscriber counts as activity even when the client never polls.
    if (accepted) {
      record.lastActivity = this.now();
    }
    return queued ? "queued" : "dropped";
  }

  /** Attaches a push subscriber; the returned callback detaches it. */
  attach(id: string, subscriber: SessionSubscriber): () => void {
    const record = this.require(id);
    record.subscribers.add(subscriber);
    record.lastActivity = this.now();
    this.logger.debug("session_subscriber_attached", { session_id: id, subscribers: record.subscribers.size });
    return () => {
      if (record.subscribers.delete(subscriber)) {
        this.logger.debug("session_subscriber_detached", { session_id: id, subscribers: record.subscribers.size });
      }
    };
  }

  /**
   * Waits for the next queued frame. Resolves `heartbeat` when nothing arrived
   * within {@link heartbeatMs} and `closed` once the session has been removed.
   */
  async nextFrame(id: string, heartbeatMs = DEFAULT_HEARTBEAT_MS): Promise<SessionFrame> {
    const record = this.require(id);
    record.lastActivity = this.now();
    const outcome = await record.queue.take(heartbeatMs);
    if (outcome.type === "closed") {
      return { type: "closed" };
    }
    record.lastActivity = this.now();
    return outcome.type === "item" ? { type: "message", message: outcome.value } : { type: "heartbeat" };
  }

  /** Removes sessions idle for longer than {@link maxIdleMs} and returns their ids. */
  sweepIdle(maxIdleMs = this.maxIdleMs): string[] {
    const now = this.now();
    const expired: string[] = [];
    for (const record of [...this.sessions.values()]) {
      if (now - record.lastActivity > maxIdleMs) {
        expired.push(record.id);
        this.remove(record.id, "idle");
      }
    }
    if (expired.length > 0) {
      this.logger.info("session_sweep", { expired: expired.length, sessions: this.sessions.size });
    }
    return expired;
  }

  startSweeper(): void {
    if (this.sweeper) {
      return;
    }
    this.sweeper = runtimeSetInterval(() => this.sweepIdle(), this.sweepIntervalMs, { unref: true });
  }

  stopSweeper(): void {
    if (this.sweeper) {
      runtimeClearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  list(): SessionSnapshot[] {
    return [...this.sessions.values()].map((record) => this.snapshot(record));
  }

  /** Removes every session, typically during shutdown. */
  clear(reason = "shutdown"): void {
    for (const id of [...this.sessions.keys()]) {
      this.remove(id, reason);
    }
  }

  private require(id: string): SessionRecord {
    const record = this.sessions.get(id);
    if (!record) {
      throw new UnknownSessionError(id);
    }
    return record;
  }

  private snapshot(record: SessionRecord): SessionSnapshot {
    const now = this.now();
    return {
      id: record.id,
      queueDepth: record.queue.size,
      subscriberCount: record.subscribers.size,
      idleMs: Math.max(0, now - record.lastActivity),
      ageMs: Math.max(0, now - record.createdAt),
      droppedFrames: record.droppedFrames,
      deliveredFrames: record.deliveredFrames,
    };
  }

  /** Returns false when the subscriber threw and was pruned. */
  private notifySubscriber(record: SessionRecord, subscriber: SessionSubscriber, message: JsonValue): boolean {
    let pending: void | Promise<void>;
    try {
      pending = subscriber.send(message);
    } catch (error) {
      this.pruneSubscriber(record, subscriber, error);
      return false;
    }
    if (pending instanceof Promise) {
      void pending.catch((error: unknown) => this.pruneSubscriber(record, subscriber, error));
    }
    return true;
  }

  private pruneSubscriber(record: SessionRecord, subscriber: SessionSubscriber, error: unknown): void {
    if (record.subscribers.delete(subscriber)) {
      this.logger.warn("session_subscriber_pruned", { session_id: record.id, error: describeError(error) });
    }
  }
}
