import { createBridge, type BridgeController } from "./bridge/controller.js";
import { loadBridgeConfig, type BridgeConfigInput } from "./config/bridgeConfig.js";
import type { EnvSource } from "./config/env.js";
import { loadFilterConfigFile } from "./filters/config.js";
import { StructuredLogger } from "./logger.js";

export { AUTH_MODES, AuthGate, checkToken, extractBearerToken } from "./auth/gate.js";
export type { AuthCredential, AuthMode } from "./auth/gate.js";
export { BRIDGE_ERROR_METHOD, Broker } from "./bridge/broker.js";
export type { BridgeState, BridgedProcess, BrokerStatus, RouteResult } from "./bridge/broker.js";
export { BridgeController, createBridge } from "./bridge/controller.js";
export { CorrelationTable } from "./bridge/correlation.js";
export { InFlightGate } from "./bridge/inflightGate.js";
export { ChildProcessSupervisor, HEALTH_CHECK_ID } from "./childSupervisor.js";
export type { ChildSupervisorStatus, TerminationResult } from "./childSupervisor.js";
export { BridgeConfigSchema, loadBridgeConfig } from "./config/bridgeConfig.js";
export type { BridgeConfig, BridgeConfigInput } from "./config/bridgeConfig.js";
export * from "./errors.js";
export { FilterPipeline } from "./filters/pipeline.js";
export { loadFilterConfigFile, parseFilterConfig } from "./filters/config.js";
export type { FilterConfigInput, FilterConfigSnapshot } from "./filters/config.js";
export type { FilterMetricsSnapshot } from "./filters/metrics.js";
export { FILTER_NAMES } from "./filters/types.js";
export type { Filter, FilterDescriptor, FilterDirection, FilterName, FilterResult } from "./filters/types.js";
export { encodeFrame, FrameReader, readFrame, writeFrame } from "./framing/codec.js";
export type { JsonValue } from "./json/value.js";
export { StructuredLogger } from "./logger.js";
export { JSON_RPC_ERROR_TAXONOMY, createJsonRpcErrorResponse } from "./rpc/errors.js";
export { SessionRegistry } from "./sessions/registry.js";
export type { SessionFrame, SessionSnapshot, SessionSubscriber } from "./sessions/registry.js";
export { BRIDGE_NAME, BRIDGE_VERSION } from "./version.js";

export interface LaunchBridgeOptions {
  env?: EnvSource;
  overrides?: Partial<BridgeConfigInput>;
  logger?: StructuredLogger;
}

/**
 * Loads the configuration (environment, then the optional filter file),
 * builds the bridge and starts it. The caller owns the returned controller and
 * must `stop()` it.
 */
export async function launchBridge(options: LaunchBridgeOptions = {}): Promise<BridgeController> {
  const config = loadBridgeConfig({
    ...(options.env ? { env: options.env } : {}),
    ...(options.overrides ? { overrides: options.overrides } : {}),
  });
  const logger =
    options.logger ??
    new StructuredLogger({
      logFile: config.logFile,
      ...(config.auth.secret ? { redactSecrets: [config.auth.secret] } : {}),
    });
  const filterConfig = config.filtersFile ? await loadFilterConfigFile(config.filtersFile) : {};
  const bridge = createBridge({ config, logger, filterConfig });
  await bridge.start();
  logger.info("bridge_ready", {
    command: config.command,
    auth_mode: config.auth.mode,
    filters: bridge.listFilters().filter((filter) => filter.enabled).map((filter) => filter.name),
  });
  return bridge;
}
