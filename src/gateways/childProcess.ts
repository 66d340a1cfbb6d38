/**
 * Gateway responsible for spawning the bridged process. It validates the
 * command and its arguments and layers the configured overrides on top of the
 * parent environment.
 */
import { spawn as nodeSpawn, type ChildProcessWithoutNullStreams, type SpawnOptionsWithoutStdio } from "node:child_process";

import { BridgeError } from "../errors.js";

export interface SpawnChildProcessOptions {
  /** Executable name or absolute path. Must not be empty. */
  readonly command: string;
  /** Ordered list of arguments forwarded as-is to the spawn implementation. */
  readonly args?: readonly string[];
  readonly cwd?: string;
  /** Explicit overrides; an `undefined` value removes the inherited key. */
  readonly extraEnv?: Record<string, string | undefined>;
}

/** Spawn implementation signature, injectable for tests. */
export type SpawnImplementation = (
  command: string,
  args: readonly string[],
  options: SpawnOptionsWithoutStdio,
) => ChildProcessWithoutNullStreams;

export class InvalidChildProcessCommandError extends BridgeError {
  constructor(command: string) {
    super("E-CHILD-COMMAND", `Child process command must be a non-empty string. Received: "${command}".`, {
      hint: "set BRIDGE_CMD to the executable of the bridged server",
    });
    this.name = "InvalidChildProcessCommandError";
  }
}

export class InvalidChildProcessArgumentError extends BridgeError {
  constructor(index: number, reason: string) {
    super("E-CHILD-ARGUMENT", `Child process argument at index ${index} ${reason}.`);
    this.name = "InvalidChildProcessArgumentError";
  }
}

/** Contract exposed by the child process gateway. */
export interface ChildProcessGateway {
  spawn(options: SpawnChildProcessOptions): ChildProcessWithoutNullStreams;
}

interface ChildProcessGatewayDeps {
  /** Concrete spawn implementation (defaults to Node.js `spawn`). */
  readonly spawnImpl?: SpawnImplementation;
}

/**
 * Factory returning the child process gateway. Tests can inject a stub
 * {@link SpawnImplementation} to observe the wiring without launching commands.
 */
export function createChildProcessGateway({ spawnImpl = nodeSpawn }: ChildProcessGatewayDeps = {}): ChildProcessGateway {
  return {
    spawn(options: SpawnChildProcessOptions): ChildProcessWithoutNullStreams {
      const command = options.command;
      if (command.trim().length === 0 || command.includes("\u0000")) {
        throw new InvalidChildProcessCommandError(command);
      }

      const spawnOptions: SpawnOptionsWithoutStdio = {
        env: buildEnv(process.env, options.extraEnv ?? {}),
        stdio: "pipe",
        shell: false,
        windowsHide: true,
      };
      if (options.cwd !== undefined) {
        spawnOptions.cwd = options.cwd;
      }

      return spawnImpl(command, normaliseArgs(options.args ?? []), spawnOptions);
    },
  };
}

/** Rejects NUL bytes and returns a copy the caller cannot mutate afterwards. */
function normaliseArgs(args: readonly string[]): string[] {
  return args.map((value, index) => {
    if (value.includes("\u0000")) {
      throw new InvalidChildProcessArgumentError(index, "contains a NUL byte");
    }
    return value;
  });
}

function buildEnv(
  inheritEnv: NodeJS.ProcessEnv,
  extraEnv: Record<string, string | undefined>,
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...inheritEnv };
  for (const [key, value] of Object.entries(extraEnv)) {
    if (value === undefined) {
      delete env[key];
    } else {
      env[key] = value;
    }
  }
  return env;
}
