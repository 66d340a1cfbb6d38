import { z } from "zod";

import { AUTH_MODES } from "../auth/gate.js";
import { ConfigurationError } from "../errors.js";
import { createEnvReader, type EnvSource } from "./env.js";

const positiveInt = z.number().int().positive();

/** Validated runtime settings of a bridge instance. */
export const BridgeConfigSchema = z
  .object({
    command: z.string().min(1, "BRIDGE_CMD must name the program to bridge"),
    args: z.array(z.string()).default([]),
    cwd: z.string().min(1).nullable().default(null),
    maxInFlight: positiveInt.default(128),
    maxQueue: positiveInt.default(100),
    sessionIdleMs: positiveInt.default(300_000),
    sweepIntervalMs: positiveInt.default(30_000),
    heartbeatMs: positiveInt.default(15_000),
    correlationTtlMs: positiveInt.default(600_000),
    terminateGraceMs: z.number().int().nonnegative().default(5_000),
    healthProbe: z.boolean().default(true),
    auth: z
      .object({
        mode: z.enum(AUTH_MODES).default("none"),
        secret: z.string().nullable().default(null),
      })
      .strict()
      .default({})
      .superRefine((value, ctx) => {
        if (value.mode !== "none" && !value.secret) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["secret"],
            message: `required when auth mode is ${value.mode}`,
          });
        }
      }),
    logFile: z.string().min(1).nullable().default(null),
    filtersFile: z.string().min(1).nullable().default(null),
  })
  .strict();

export type BridgeConfigInput = z.input<typeof BridgeConfigSchema>;
export type BridgeConfig = z.output<typeof BridgeConfigSchema>;

export interface LoadBridgeConfigOptions {
  env?: EnvSource;
  /** Values taking precedence over the environment. */
  overrides?: Partial<BridgeConfigInput>;
}

/**
 * Resolves the bridge settings from `BRIDGE_*` variables, applies
 * {@link LoadBridgeConfigOptions.overrides} and validates the result. A
 * variable that is set but cannot be parsed is reported rather than ignored.
 */
export function loadBridgeConfig(options: LoadBridgeConfigOptions = {}): BridgeConfig {
  const env = options.env ?? process.env;
  const read = createEnvReader(env);
  const issues: string[] = [];

  const secondsAsMs = (name: string): number | undefined => {
    const value = read.number(name, { min: 0 });
    if (value === undefined) {
      if (read.string(name) !== undefined) {
        issues.push(`${name}: expected a non-negative number of seconds`);
      }
      return undefined;
    }
    return Math.round(value * 1_000);
  };
  const integer = (name: string): number | undefined => {
    const value = read.int(name);
    if (value === undefined && read.string(name) !== undefined) {
      issues.push(`${name}: expected an integer`);
    }
    return value;
  };
  const flag = (name: string): boolean | undefined => {
    const value = read.bool(name);
    if (value === undefined && read.string(name) !== undefined) {
      issues.push(`${name}: expected a boolean (1/0, true/false, yes/no, on/off)`);
    }
    return value;
  };

  const fromEnv: Record<string, unknown> = {
    command: read.string("BRIDGE_CMD"),
    args: read.list("BRIDGE_ARGS"),
    cwd: read.string("BRIDGE_CWD"),
    maxInFlight: integer("BRIDGE_MAX_IN_FLIGHT"),
    maxQueue: integer("BRIDGE_MAX_QUEUE"),
    sessionIdleMs: secondsAsMs("BRIDGE_SESSION_IDLE_SEC"),
    sweepIntervalMs: secondsAsMs("BRIDGE_SWEEP_INTERVAL_SEC"),
    heartbeatMs: secondsAsMs("BRIDGE_HEARTBEAT_SEC"),
    correlationTtlMs: secondsAsMs("BRIDGE_CORRELATION_TTL_SEC"),
    terminateGraceMs: integer("BRIDGE_TERMINATE_GRACE_MS"),
    healthProbe: flag("BRIDGE_HEALTH_PROBE"),
    auth: {
      mode: read.string("BRIDGE_AUTH_MODE")?.toLowerCase(),
      secret: read.string("BRIDGE_AUTH_SECRET"),
    },
    logFile: read.string("BRIDGE_LOG_FILE"),
    filtersFile: read.string("BRIDGE_FILTERS_FILE"),
  };

  const candidate: Record<string, unknown> = {};
  for (const [key, value] of Object.entries({ ...fromEnv, ...options.overrides })) {
    if (value !== undefined) {
      candidate[key] = value;
    }
  }

  const parsed = BridgeConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      issues.push(`${issue.path.join(".") || "<root>"}: ${issue.message}`);
    }
  }
  if (issues.length > 0 || !parsed.success) {
    throw new ConfigurationError("Invalid bridge configuration", issues);
  }
  return parsed.data;
}
