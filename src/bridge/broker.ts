import { randomUUID } from "node:crypto";

import type { ChildSupervisorStatus, TerminationResult } from "../childSupervisor.js";
import { BridgeError, BridgeUnavailableError, UnknownSessionError, describeError } from "../errors.js";
import type { FilterPipeline } from "../filters/pipeline.js";
import type { JsonObject, JsonValue } from "../json/value.js";
import type { StructuredLogger } from "../logger.js";
import { createJsonRpcErrorResponse } from "../rpc/errors.js";
import {
  classifyMessage,
  normaliseClientMessage,
  readMessageId,
  readMethod,
  type JsonRpcId,
} from "../rpc/messages.js";
import { runtimeClearInterval, runtimeSetInterval, type IntervalHandle } from "../runtime/timers.js";
import type { SessionRegistry } from "../sessions/registry.js";
import { CorrelationTable } from "./correlation.js";
import { InFlightGate } from "./inflightGate.js";

const DEFAULT_CORRELATION_SWEEP_MS = 60_000;
const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

/** Method of the notification broadcast when the bridged process dies. */
export const BRIDGE_ERROR_METHOD = "bridge/error";

/**
 * Subset of {@link ChildProcessSupervisor} the broker drives. Tests substitute
 * an in-process fake.
 */
export interface BridgedProcess {
  start(): Promise<void>;
  writeJSON(message: JsonValue): Promise<void>;
  readJSON(): Promise<JsonValue>;
  probeHealth(timeoutMs?: number): Promise<boolean>;
  terminate(): Promise<TerminationResult>;
  getStatus(): ChildSupervisorStatus;
  on(event: "fatal", listener: (error: BridgeError) => void): unknown;
  off(event: "fatal", listener: (error: BridgeError) => void): unknown;
}

export type BridgeState = "idle" | "starting" | "running" | "down" | "stopped";

export type RouteStatus = "accepted" | "blocked";

export interface RouteResult {
  /** Id the message travelled with, after normalisation. */
  id: JsonRpcId | null;
  status: RouteStatus;
}

export interface BrokerTotals {
  routed: number;
  blocked: number;
  delivered: number;
  dropped: number;
  orphaned: number;
}

export interface BrokerStatus {
  state: BridgeState;
  uptimeMs: number;
  sessions: number;
  inFlight: number;
  correlations: number;
  totals: BrokerTotals;
  child: ChildSupervisorStatus;
  lastError: { code: string | null; message: string } | null;
}

export interface BrokerOptions {
  process: BridgedProcess;
  registry: SessionRegistry;
  pipeline: FilterPipeline;
  logger: StructuredLogger;
  gate?: InFlightGate;
  correlations?: CorrelationTable;
  correlationSweepMs?: number;
  probeTimeoutMs?: number;
  idFactory?: () => JsonRpcId;
  now?: () => number;
}

export interface BrokerStartOptions {
  /** Sends a health probe after spawning; a failed probe is logged only. */
  probe?: boolean;
}

/**
 * Routes messages between client sessions and the single bridged process.
 * Client submissions are normalised, filtered, correlated and written through
 * the in-flight gate. The pump drains the process output: correlated responses
 * go to their owner, everything else fans out to every live session.
 */
export class Broker {
  private readonly process: BridgedProcess;
  private readonly registry: SessionRegistry;
  private readonly pipeline: FilterPipeline;
  private readonly logger: StructuredLogger;
  private readonly gate: InFlightGate;
  private readonly correlations: CorrelationTable;
  private readonly correlationSweepMs: number;
  private readonly probeTimeoutMs: number;
  private readonly idFactory: () => JsonRpcId;
  private readonly now: () => number;

  private state: BridgeState = "idle";
  private startedAt: number | null = null;
  private stopping = false;
  private stopPromise: Promise<TerminationResult | null> | null = null;
  private pumpDone: Promise<void> = Promise.resolve();
  private correlationSweeper: IntervalHandle | null = null;
  private lastError: { code: string | null; message: string } | null = null;
  private readonly totals: BrokerTotals = { routed: 0, blocked: 0, delivered: 0, dropped: 0, orphaned: 0 };

  private readonly onFatal = (error: BridgeError): void => {
    this.handleFatal(error);
  };

  constructor(options: BrokerOptions) {
    this.process = options.process;
    this.registry = options.registry;
    this.pipeline = options.pipeline;
    this.logger = options.logger;
    this.gate = options.gate ?? new InFlightGate();
    this.now = options.now ?? Date.now;
    this.correlations = options.correlations ?? new CorrelationTable({ now: this.now });
    this.correlationSweepMs = Math.max(1, options.correlationSweepMs ?? DEFAULT_CORRELATION_SWEEP_MS);
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.idFactory = options.idFactory ?? randomUUID;
  }

  get bridgeState(): BridgeState {
    return this.state;
  }

  /**
   * Starts the process, optionally probes it, then starts the pump and the
   * sweepers. A failed spawn leaves the bridge `down` and rethrows.
   */
  async start(options: BrokerStartOptions = {}): Promise<void> {
    if (this.state !== "idle") {
      throw new BridgeError("E-BRIDGE-STARTED", `Bridge cannot start from state ${this.state}`);
    }
    this.state = "starting";
    this.process.on("fatal", this.onFatal);
    try {
      await this.process.start();
    } catch (error) {
      this.state = "down";
      this.lastError = describeError(error);
      this.process.off("fatal", this.onFatal);
      this.logger.error("bridge_start_failed", { error: describeError(error) });
      throw error;
    }
    this.startedAt = this.now();
    this.state = "running";

    if (options.probe) {
      const healthy = await this.process.probeHealth(this.probeTimeoutMs);
      if (!healthy) {
        this.logger.warn("bridge_probe_unhealthy", { timeout_ms: this.probeTimeoutMs });
      }
    }

    this.pumpDone = this.pump();
    this.registry.startSweeper();
    this.correlationSweeper = runtimeSetInterval(() => this.sweepCorrelations(), this.correlationSweepMs, {
      unref: true,
    });
    this.logger.info("bridge_started", { child: this.process.getStatus().pid });
  }

  /**
   * Accepts one message from a client session. Blocked messages are answered
   * with a single policy error delivered to the submitter and never reach the
   * process.
   */
  async routeFromClient(sessionId: string, message: JsonValue): Promise<RouteResult> {
    if (!this.registry.has(sessionId)) {
      throw new UnknownSessionError(sessionId);
    }
    this.assertRunning();
    this.registry.touch(sessionId);

    const normalised = normaliseClientMessage(message, this.idFactory);
    const id = readMessageId(normalised);
    const method = readMethod(normalised);

    const result = this.pipeline.apply("client_to_server", sessionId, normalised);
    if (result.blocked) {
      this.totals.blocked += 1;
      const data: JsonObject = { reason: result.reason ?? "blocked" };
      if (result.blockedBy !== null) {
        data.filter = result.blockedBy;
      }
      this.deliver(sessionId, createJsonRpcErrorResponse("BLOCKED_BY_POLICY", id, { data }));
      return { id, status: "blocked" };
    }

    // Only messages that actually reach the process claim their id.
    const correlated = id !== null && method !== null ? id : null;
    const previous = correlated === null ? null : this.correlations.record(correlated, sessionId, method);
    if (correlated !== null && previous && previous.sessionId !== sessionId) {
      this.logger.warn("correlation_overwritten", {
        id: correlated,
        previous_session: previous.sessionId,
        session_id: sessionId,
      });
    }

    try {
      await this.gate.run(() => this.process.writeJSON(result.message));
    } catch (error) {
      if (correlated !== null) {
        if (previous) {
          this.correlations.restore(correlated, previous);
        } else {
          this.correlations.forget(correlated, sessionId);
        }
      }
      this.logger.error("route_write_failed", { session_id: sessionId, id, error: describeError(error) });
      throw new BridgeUnavailableError("Failed to write to the bridged process", { cause: error });
    }

    this.totals.routed += 1;
    this.logger.debug("message_routed", { session_id: sessionId, id, method });
    return { id, status: "accepted" };
  }

  /**
   * Stops the sweepers, terminates the process, waits for the pump and removes
   * every session. Idempotent.
   */
  stop(): Promise<TerminationResult | null> {
    if (!this.stopPromise) {
      this.stopPromise = this.performStop();
    }
    return this.stopPromise;
  }

  getStatus(): BrokerStatus {
    return {
      state: this.state,
      uptimeMs: this.startedAt === null ? 0 : this.now() - this.startedAt,
      sessions: this.registry.size,
      inFlight: this.gate.inFlight,
      correlations: this.correlations.size,
      totals: { ...this.totals },
      child: this.process.getStatus(),
      lastError: this.lastError ? { ...this.lastError } : null,
    };
  }

  /**
   * Retires the pending correlations of a session that is going away, so their
   * late responses are dropped rather than fanned out.
   */
  forgetSession(sessionId: string): number {
    return this.correlations.forgetSession(sessionId);
  }

  private assertRunning(): void {
    if (this.state === "running") {
      return;
    }
    if (this.state === "down") {
      throw new BridgeUnavailableError("Bridged process is down", {
        hint: "restart the bridge",
        details: this.lastError ? { ...this.lastError } : {},
      });
    }
    throw new BridgeUnavailableError(`Bridge is ${this.state}`);
  }

  private async pump(): Promise<void> {
    while (!this.stopping) {
      let frame: JsonValue;
      try {
        frame = await this.process.readJSON();
      } catch (error) {
        if (!this.stopping) {
          this.handleFatal(error);
        }
        return;
      }
      this.dispatch(frame);
    }
  }

  private dispatch(frame: JsonValue): void {
    const id = readMessageId(frame);
    if (id !== null && classifyMessage(frame) === "response") {
      const owner = this.correlations.pop(id);
      if (owner) {
        if (!this.registry.has(owner.sessionId)) {
          this.orphan(id, owner.sessionId, "session_closed");
          return;
        }
        this.filterAndDeliver(owner.sessionId, frame);
        return;
      }
      const retired = this.correlations.takeRetired(id);
      if (retired) {
        this.orphan(id, retired.sessionId, retired.reason);
        return;
      }
    }

    for (const sessionId of this.registry.ids()) {
      this.filterAndDeliver(sessionId, structuredClone(frame));
    }
  }

  private orphan(id: JsonRpcId, sessionId: string, reason: string): void {
    this.totals.orphaned += 1;
    this.logger.debug("response_orphaned", { id, session_id: sessionId, reason });
  }

  private filterAndDeliver(sessionId: string, message: JsonValue): void {
    const result = this.pipeline.apply("server_to_client", sessionId, message);
    if (result.blocked) {
      this.totals.blocked += 1;
      return;
    }
    this.deliver(sessionId, result.message);
  }

  private deliver(sessionId: string, message: JsonValue): void {
    const outcome = this.registry.deliver(sessionId, message);
    if (outcome === "queued") {
      this.totals.delivered += 1;
    } else if (outcome === "dropped") {
      this.totals.dropped += 1;
    } else {
      this.totals.orphaned += 1;
    }
  }

  private handleFatal(error: unknown): void {
    if (this.state !== "running" || this.stopping) {
      return;
    }
    const described = describeError(error);
    this.state = "down";
    this.lastError = described;
    this.logger.error("bridge_fatal", { error: described, sessions: this.registry.size });

    const notice: JsonObject = {
      jsonrpc: "2.0",
      method: BRIDGE_ERROR_METHOD,
      params: { code: described.code ?? "E-BRIDGE-FATAL", message: described.message },
    };
    for (const sessionId of this.registry.ids()) {
      this.deliver(sessionId, structuredClone(notice));
    }
  }

  private sweepCorrelations(): void {
    const expired = this.correlations.sweep();
    if (expired.length > 0) {
      this.logger.debug("correlation_expired", { count: expired.length });
    }
  }

  private async performStop(): Promise<TerminationResult | null> {
    this.stopping = true;
    const previous = this.state;
    this.registry.stopSweeper();
    if (this.correlationSweeper) {
      runtimeClearInterval(this.correlationSweeper);
      this.correlationSweeper = null;
    }
    this.process.off("fatal", this.onFatal);

    const termination = previous === "idle" ? null : await this.process.terminate();
    await this.pumpDone;
    this.registry.clear("shutdown");
    this.correlations.clear();
    this.state = "stopped";
    this.logger.info("bridge_stopped", { previous_state: previous, termination });
    return termination;
  }
}
