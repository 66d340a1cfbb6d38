import { AuthGate, type AuthCredential } from "../auth/gate.js";
import { ChildProcessSupervisor, type TerminationResult } from "../childSupervisor.js";
import type { BridgeConfig } from "../config/bridgeConfig.js";
import { BridgeError, UnknownSessionError } from "../errors.js";
import type { FilterConfigSnapshot } from "../filters/config.js";
import type { FilterMetricsSnapshot } from "../filters/metrics.js";
import { FilterPipeline } from "../filters/pipeline.js";
import type { FilterDescriptor } from "../filters/types.js";
import type { ChildProcessGateway } from "../gateways/childProcess.js";
import { isJsonValue } from "../json/value.js";
import type { StructuredLogger } from "../logger.js";
import {
  DEFAULT_HEARTBEAT_MS,
  SessionRegistry,
  type SessionFrame,
  type SessionSnapshot,
  type SessionSubscriber,
} from "../sessions/registry.js";
import { Broker, type BridgedProcess, type BrokerStatus, type RouteResult } from "./broker.js";
import { CorrelationTable } from "./correlation.js";
import { InFlightGate } from "./inflightGate.js";

export interface BridgeControllerOptions {
  broker: Broker;
  registry: SessionRegistry;
  pipeline: FilterPipeline;
  auth: AuthGate;
  logger: StructuredLogger;
  heartbeatMs?: number;
  healthProbe?: boolean;
}

/**
 * Control surface an outer transport binds to. Every method maps onto one
 * operation of the broker, the registry or the pipeline; unknown sessions and
 * filters surface as not-found errors.
 */
export class BridgeController {
  private readonly broker: Broker;
  private readonly registry: SessionRegistry;
  private readonly pipeline: FilterPipeline;
  private readonly auth: AuthGate;
  private readonly logger: StructuredLogger;
  private readonly heartbeatMs: number;
  private readonly healthProbe: boolean;

  constructor(options: BridgeControllerOptions) {
    this.broker = options.broker;
    this.registry = options.registry;
    this.pipeline = options.pipeline;
    this.auth = options.auth;
    this.logger = options.logger;
    this.heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
    this.healthProbe = options.healthProbe ?? false;
  }

  start(): Promise<void> {
    return this.broker.start({ probe: this.healthProbe });
  }

  stop(): Promise<TerminationResult | null> {
    return this.broker.stop();
  }

  /** Pass/fail check of the credentials presented by a client. */
  authorize(credential: AuthCredential = {}): boolean {
    const allowed = this.auth.authorize(credential);
    if (!allowed) {
      this.logger.warn("auth_rejected", { mode: this.auth.mode });
    }
    return allowed;
  }

  registerSession(): string {
    return this.registry.create();
  }

  /** Routes a client message; payloads that are not JSON are rejected before routing. */
  submit(sessionId: string, message: unknown): Promise<RouteResult> {
    if (!isJsonValue(message)) {
      return Promise.reject(
        new BridgeError("E-INVALID-MESSAGE", "Submitted message is not a JSON value", {
          hint: "send a JSON-RPC object",
        }),
      );
    }
    return this.broker.routeFromClient(sessionId, message);
  }

  listSessions(): SessionSnapshot[] {
    return this.registry.list();
  }

  terminateSession(sessionId: string): void {
    if (!this.registry.remove(sessionId, "terminated")) {
      throw new UnknownSessionError(sessionId);
    }
    this.broker.forgetSession(sessionId);
  }

  nextFrame(sessionId: string, heartbeatMs = this.heartbeatMs): Promise<SessionFrame> {
    return this.registry.nextFrame(sessionId, heartbeatMs);
  }

  attachSubscriber(sessionId: string, subscriber: SessionSubscriber): () => void {
    return this.registry.attach(sessionId, subscriber);
  }

  listFilters(): FilterDescriptor[] {
    return this.pipeline.listFilters();
  }

  toggleFilter(name: string, enabled: boolean): FilterDescriptor[] {
    this.pipeline.toggle(name, enabled);
    return this.pipeline.listFilters();
  }

  replaceFilterConfig(config: unknown): FilterConfigSnapshot {
    return this.pipeline.swapConfig(config);
  }

  getFilterMetrics(): FilterMetricsSnapshot {
    return this.pipeline.getMetrics();
  }

  getStatus(): BrokerStatus {
    return this.broker.getStatus();
  }
}

export interface CreateBridgeOptions {
  config: BridgeConfig;
  logger: StructuredLogger;
  /** Initial filter configuration (already loaded from `filtersFile` when set). */
  filterConfig?: unknown;
  gateway?: ChildProcessGateway;
  /** Replaces the supervised child, mainly for tests. */
  process?: BridgedProcess;
}

/** Wires a supervisor, registry, pipeline and broker from validated settings. */
export function createBridge(options: CreateBridgeOptions): BridgeController {
  const { config, logger } = options;
  const child =
    options.process ??
    new ChildProcessSupervisor({
      command: config.command,
      args: config.args,
      ...(config.cwd !== null ? { cwd: config.cwd } : {}),
      logger,
      terminateGraceMs: config.terminateGraceMs,
      ...(options.gateway ? { gateway: options.gateway } : {}),
    });
  const registry = new SessionRegistry({
    logger,
    maxQueue: config.maxQueue,
    maxIdleMs: config.sessionIdleMs,
    sweepIntervalMs: config.sweepIntervalMs,
  });
  const pipeline = new FilterPipeline({ logger, config: options.filterConfig ?? {} });
  const broker = new Broker({
    process: child,
    registry,
    pipeline,
    logger,
    gate: new InFlightGate({ permits: config.maxInFlight }),
    correlations: new CorrelationTable({ ttlMs: config.correlationTtlMs }),
  });
  return new BridgeController({
    broker,
    registry,
    pipeline,
    auth: new AuthGate({ mode: config.auth.mode, secret: config.auth.secret }),
    logger,
    heartbeatMs: config.heartbeatMs,
    healthProbe: config.healthProbe,
  });
}
