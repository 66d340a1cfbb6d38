import type { ChildProcessWithoutNullStreams } from "node:child_process";
import { EventEmitter } from "node:events";

import { LATEST_PROTOCOL_VERSION } from "@modelcontextprotocol/sdk/types.js";

import {
  BridgeError,
  BridgeUnavailableError,
  ChildSpawnError,
  FramingError,
  ProcessExitedError,
  describeError,
} from "./errors.js";
import { FrameReader, writeFrame, type FrameReaderOptions } from "./framing/codec.js";
import { createChildProcessGateway, type ChildProcessGateway } from "./gateways/childProcess.js";
import { isJsonObject, type JsonValue } from "./json/value.js";
import type { StructuredLogger } from "./logger.js";
import { runtimeClearTimeout, runtimeSetTimeout, type TimeoutHandle } from "./runtime/timers.js";
import { BRIDGE_NAME, BRIDGE_VERSION } from "./version.js";

/** Sentinel id reserved for the synthetic `initialize` sent by {@link ChildProcessSupervisor.probeHealth}. */
export const HEALTH_CHECK_ID = "bridge-health-check";

const DEFAULT_TERMINATE_GRACE_MS = 5_000;
const DEFAULT_PROBE_TIMEOUT_MS = 10_000;
const DEFAULT_INBOX_LIMIT = 1_024;
/** How long a clean EOF waits for the matching `exit` event before reporting unknown status. */
const EXIT_SETTLE_MS = 1_000;
/** Stderr lines longer than this are flushed in pieces. */
const MAX_STDERR_LINE = 64 * 1024;

export interface ChildProcessSupervisorOptions {
  command: string;
  args?: readonly string[];
  cwd?: string;
  /** Overrides merged on top of the inherited environment. */
  env?: Record<string, string | undefined>;
  logger: StructuredLogger;
  gateway?: ChildProcessGateway;
  /** Delay between SIGTERM and SIGKILL during {@link ChildProcessSupervisor.terminate}. */
  terminateGraceMs?: number;
  /** Frames buffered before the read loop stops pulling from stdout. */
  inboxLimit?: number;
  frameReader?: FrameReaderOptions;
}

export type SupervisorLifecycle = "idle" | "running" | "exited";

export interface ChildExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
  at: number;
}

export interface ChildSupervisorStatus {
  pid: number | null;
  lifecycle: SupervisorLifecycle;
  startedAt: number | null;
  exit: ChildExitInfo | null;
}

/** Result returned after a shutdown sequence. */
export interface TerminationResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  forced: boolean;
  durationMs: number;
}

interface InboxWaiter {
  resolve: (frame: JsonValue) => void;
  reject: (error: BridgeError) => void;
}

interface PendingProbe {
  settle: (healthy: boolean, reason: string) => void;
}

export interface ChildProcessSupervisor {
  on(event: "fatal", listener: (error: BridgeError) => void): this;
  once(event: "fatal", listener: (error: BridgeError) => void): this;
  off(event: "fatal", listener: (error: BridgeError) => void): this;
  emit(event: "fatal", error: BridgeError): boolean;
}

/**
 * Owns the bridged process: spawns it, serialises writes to its stdin, decodes
 * frames from its stdout into an inbox and pipes stderr into the logger. When
 * the read loop ends outside of {@link terminate} a `fatal` event is emitted
 * with the reason.
 */
export class ChildProcessSupervisor extends EventEmitter {
  private readonly command: string;
  private readonly args: readonly string[];
  private readonly cwd: string | undefined;
  private readonly env: Record<string, string | undefined>;
  private readonly logger: StructuredLogger;
  private readonly gateway: ChildProcessGateway;
  private readonly terminateGraceMs: number;
  private readonly inboxLimit: number;
  private readonly frameReaderOptions: FrameReaderOptions;

  private child: ChildProcessWithoutNullStreams | null = null;
  private reader: FrameReader | null = null;
  private lifecycle: SupervisorLifecycle = "idle";
  private startedAt: number | null = null;
  private exitInfo: ChildExitInfo | null = null;
  private readonly exitWaiters: Array<(exit: ChildExitInfo) => void> = [];

  private writeChain: Promise<void> = Promise.resolve();
  private readonly inbox: JsonValue[] = [];
  private readonly inboxWaiters: InboxWaiter[] = [];
  private spaceWaiter: (() => void) | null = null;
  private loopError: BridgeError | null = null;
  private loopDone: Promise<void> = Promise.resolve();

  private stderrBuffer = "";
  private stderrDone: Promise<void> = Promise.resolve();

  private pendingProbe: PendingProbe | null = null;
  private probeInFlight: Promise<boolean> | null = null;
  private terminating = false;
  private terminatePromise: Promise<TerminationResult> | null = null;

  constructor(options: ChildProcessSupervisorOptions) {
    super();
    this.command = options.command;
    this.args = [...(options.args ?? [])];
    this.cwd = options.cwd;
    this.env = { ...(options.env ?? {}) };
    this.logger = options.logger;
    this.gateway = options.gateway ?? createChildProcessGateway();
    this.terminateGraceMs = Math.max(0, options.terminateGraceMs ?? DEFAULT_TERMINATE_GRACE_MS);
    this.inboxLimit = Math.max(1, options.inboxLimit ?? DEFAULT_INBOX_LIMIT);
    this.frameReaderOptions = options.frameReader ?? {};
  }

  /**
   * Spawns the process and resolves once the OS confirmed it (`spawn` event).
   * The read loop and the stderr pump start immediately afterwards.
   */
  async start(): Promise<void> {
    if (this.lifecycle !== "idle") {
      throw new BridgeError("E-CHILD-STARTED", "Supervisor has already been started");
    }

    let child: ChildProcessWithoutNullStreams;
    try {
      child = this.gateway.spawn({
        command: this.command,
        args: this.args,
        extraEnv: this.env,
        ...(this.cwd !== undefined ? { cwd: this.cwd } : {}),
      });
    } catch (error) {
      this.markSpawnFailure();
      throw error instanceof BridgeError ? error : new ChildSpawnError(this.command, error);
    }

    try {
      await new Promise<void>((resolve, reject) => {
        const onSpawn = () => {
          child.off("error", onError);
          resolve();
        };
        const onError = (error: Error) => {
          child.off("spawn", onSpawn);
          reject(new ChildSpawnError(this.command, error));
        };
        child.once("spawn", onSpawn);
        child.once("error", onError);
      });
    } catch (error) {
      this.markSpawnFailure();
      throw error;
    }

    this.child = child;
    this.lifecycle = "running";
    this.startedAt = Date.now();

    child.on("error", (error: Error) => {
      this.logger.error("child_process_error", { pid: child.pid ?? null, error: describeError(error) });
    });
    child.once("exit", (code, signal) => {
      const exit: ChildExitInfo = { code, signal, at: Date.now() };
      this.exitInfo = exit;
      this.lifecycle = "exited";
      this.logger.info("child_exit", { pid: child.pid ?? null, code, signal });
      for (const waiter of this.exitWaiters.splice(0)) {
        waiter(exit);
      }
    });
    child.stdin.on("error", (error: Error) => {
      this.logger.warn("child_stdin_error", { pid: child.pid ?? null, error: describeError(error) });
    });

    this.stderrDone = this.pumpStderr(child);
    const reader = new FrameReader(child.stdout, this.frameReaderOptions);
    this.reader = reader;
    this.loopDone = this.runReadLoop(reader);

    this.logger.info("child_spawned", { pid: child.pid ?? null, command: this.command, args: this.args });
  }

  /**
   * Queues {@link message} on the single write chain. Rejects once the process
   * exited or the read loop failed.
   */
  writeJSON(message: JsonValue): Promise<void> {
    const child = this.child;
    if (!child) {
      return Promise.reject(new BridgeUnavailableError("Bridged process has not been started"));
    }
    const run = this.writeChain.then(async () => {
      this.assertWritable();
      await writeFrame(child.stdin, message);
    });
    // The caller observes failures through `run`; the chain only preserves ordering.
    this.writeChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /**
   * Next frame decoded from the process. Once the read loop ended and the inbox
   * is drained, rejects with the error that stopped the loop.
   */
  readJSON(): Promise<JsonValue> {
    if (this.inbox.length > 0) {
      const [frame] = this.inbox.splice(0, 1);
      this.releaseSpace();
      return Promise.resolve(frame);
    }
    if (this.loopError) {
      return Promise.reject(this.loopError);
    }
    if (this.lifecycle === "idle") {
      return Promise.reject(new BridgeUnavailableError("Bridged process has not been started"));
    }
    return new Promise((resolve, reject) => {
      this.inboxWaiters.push({ resolve, reject });
    });
  }

  /**
   * Sends a synthetic `initialize` request and waits for the matching reply.
   * Resolves `false` on timeout, error reply or write failure; never rejects.
   */
  probeHealth(timeoutMs = DEFAULT_PROBE_TIMEOUT_MS): Promise<boolean> {
    if (this.probeInFlight) {
      return this.probeInFlight;
    }
    const probe = this.runProbe(timeoutMs).finally(() => {
      this.probeInFlight = null;
    });
    this.probeInFlight = probe;
    return probe;
  }

  /**
   * SIGTERM, then SIGKILL once the grace period elapsed. Always waits for the
   * stderr pump and the read loop to wind down. Idempotent.
   */
  terminate(): Promise<TerminationResult> {
    if (!this.terminatePromise) {
      this.terminatePromise = this.performTerminate();
    }
    return this.terminatePromise;
  }

  getStatus(): ChildSupervisorStatus {
    return {
      pid: this.child?.pid ?? null,
      lifecycle: this.lifecycle,
      startedAt: this.startedAt,
      exit: this.exitInfo ? { ...this.exitInfo } : null,
    };
  }

  private assertWritable(): void {
    if (this.exitInfo) {
      throw new ProcessExitedError(this.exitInfo.code, this.exitInfo.signal);
    }
    if (this.loopError) {
      throw this.loopError;
    }
  }

  private markSpawnFailure(): void {
    this.lifecycle = "exited";
    this.exitInfo = { code: null, signal: null, at: Date.now() };
  }

  private async runReadLoop(reader: FrameReader): Promise<void> {
    let failure: BridgeError;
    for (;;) {
      let frame: JsonValue;
      try {
        frame = await reader.readFrame();
      } catch (error) {
        failure = await this.explainLoopFailure(error);
        break;
      }

      if (this.interceptProbeResponse(frame)) {
        continue;
      }
      const waiter = this.inboxWaiters.shift();
      if (waiter) {
        waiter.resolve(frame);
        continue;
      }
      this.inbox.push(frame);
      if (this.inbox.length >= this.inboxLimit) {
        await new Promise<void>((resolve) => {
          this.spaceWaiter = resolve;
        });
      }
    }

    this.loopError = failure;
    for (const waiter of this.inboxWaiters.splice(0)) {
      waiter.reject(failure);
    }
    this.pendingProbe?.settle(false, failure.message);

    if (this.terminating) {
      this.logger.debug("child_read_loop_closed", { reason: failure.message });
      return;
    }
    this.logger.error("child_fatal", { code: failure.code, message: failure.message });
    this.emit("fatal", failure);
  }

  private async explainLoopFailure(error: unknown): Promise<BridgeError> {
    if (error instanceof FramingError && error.code === "E-FRAME-EOF" && error.atBoundary) {
      const exit = this.exitInfo ?? (await this.waitForExit(EXIT_SETTLE_MS));
      return new ProcessExitedError(exit?.code ?? null, exit?.signal ?? null, { cause: error });
    }
    if (error instanceof BridgeError) {
      return error;
    }
    return new FramingError("E-FRAME-BODY", describeError(error).message, { cause: error });
  }

  private releaseSpace(): void {
    if (this.spaceWaiter && this.inbox.length < this.inboxLimit) {
      const resume = this.spaceWaiter;
      this.spaceWaiter = null;
      resume();
    }
  }

  /** Swallows replies carrying the health-check sentinel so they never reach the inbox. */
  private interceptProbeResponse(frame: JsonValue): boolean {
    if (!isJsonObject(frame) || frame.id !== HEALTH_CHECK_ID || "method" in frame) {
      return false;
    }
    const probe = this.pendingProbe;
    if (!probe) {
      this.logger.debug("health_probe_late_reply");
      return true;
    }
    if ("error" in frame) {
      probe.settle(false, "error response");
    } else if ("result" in frame) {
      probe.settle(true, "ok");
    } else {
      probe.settle(false, "reply without result");
    }
    return true;
  }

  private async runProbe(timeoutMs: number): Promise<boolean> {
    const started = Date.now();
    let resolveOutcome: (healthy: boolean) => void = () => undefined;
    const outcome = new Promise<boolean>((resolve) => {
      resolveOutcome = resolve;
    });

    const probe: PendingProbe = {
      settle: (healthy, reason) => {
        if (this.pendingProbe !== probe) {
          return;
        }
        this.pendingProbe = null;
        runtimeClearTimeout(timer);
        const payload = { healthy, reason, duration_ms: Date.now() - started };
        if (healthy) {
          this.logger.info("health_probe_ok", payload);
        } else {
          this.logger.warn("health_probe_failed", payload);
        }
        resolveOutcome(healthy);
      },
    };
    this.pendingProbe = probe;
    const timer = runtimeSetTimeout(() => probe.settle(false, `timeout after ${timeoutMs}ms`), timeoutMs);

    try {
      await this.writeJSON({
        jsonrpc: "2.0",
        id: HEALTH_CHECK_ID,
        method: "initialize",
        params: {
          protocolVersion: LATEST_PROTOCOL_VERSION,
          capabilities: {},
          clientInfo: { name: BRIDGE_NAME, version: BRIDGE_VERSION },
        },
      });
    } catch (error) {
      probe.settle(false, `write failed: ${describeError(error).message}`);
    }
    return outcome;
  }

  private async performTerminate(): Promise<TerminationResult> {
    this.terminating = true;
    const started = Date.now();
    const child = this.child;
    if (!child) {
      this.lifecycle = this.lifecycle === "idle" ? "exited" : this.lifecycle;
      return { code: null, signal: null, forced: false, durationMs: 0 };
    }

    let forced = false;
    let exit = this.exitInfo;
    if (!exit) {
      child.kill("SIGTERM");
      exit = await this.waitForExit(this.terminateGraceMs);
      if (!exit) {
        forced = true;
        this.logger.warn("child_terminate_timeout", { pid: child.pid ?? null, grace_ms: this.terminateGraceMs });
        child.kill("SIGKILL");
        exit = await this.waitForExit(null);
      }
    }

    await this.waitForStderr();
    this.reader?.close();
    this.releaseSpaceUnconditionally();
    await this.loopDone;

    const result: TerminationResult = {
      code: exit?.code ?? null,
      signal: exit?.signal ?? null,
      forced,
      durationMs: Date.now() - started,
    };
    this.logger.info("child_terminated", { pid: child.pid ?? null, ...result });
    return result;
  }

  private releaseSpaceUnconditionally(): void {
    const resume = this.spaceWaiter;
    this.spaceWaiter = null;
    resume?.();
  }

  /** Resolves with the exit info, or `null` when {@link timeoutMs} elapsed first. */
  private waitForExit(timeoutMs: number | null): Promise<ChildExitInfo | null> {
    if (this.exitInfo) {
      return Promise.resolve(this.exitInfo);
    }
    return new Promise((resolve) => {
      let timer: TimeoutHandle | null = null;
      const onExit = (exit: ChildExitInfo) => {
        if (timer) {
          runtimeClearTimeout(timer);
        }
        resolve(exit);
      };
      this.exitWaiters.push(onExit);
      if (timeoutMs !== null) {
        timer = runtimeSetTimeout(() => {
          const index = this.exitWaiters.indexOf(onExit);
          if (index >= 0) {
            this.exitWaiters.splice(index, 1);
          }
          resolve(null);
        }, timeoutMs);
      }
    });
  }

  /** A grandchild may keep stderr open after the exit; the wait is capped by the grace period. */
  private async waitForStderr(): Promise<void> {
    let release: () => void = () => undefined;
    const cap = new Promise<void>((resolve) => {
      release = resolve;
    });
    const timer = runtimeSetTimeout(() => release(), Math.max(100, this.terminateGraceMs));
    await Promise.race([this.stderrDone, cap]);
    runtimeClearTimeout(timer);
  }

  private pumpStderr(child: ChildProcessWithoutNullStreams): Promise<void> {
    const stderr = child.stderr;
    stderr.setEncoding("utf8");
    return new Promise<void>((resolve) => {
      const finish = () => {
        this.flushStderr(child.pid ?? null);
        resolve();
      };
      stderr.on("data", (chunk: string) => this.consumeStderr(chunk, child.pid ?? null));
      stderr.once("end", finish);
      stderr.once("close", finish);
      stderr.once("error", (error: Error) => {
        this.logger.warn("child_stderr_error", { error: describeError(error) });
        finish();
      });
    });
  }

  private consumeStderr(chunk: string, pid: number | null): void {
    this.stderrBuffer += chunk;
    let newlineIndex = this.stderrBuffer.indexOf("\n");
    while (newlineIndex !== -1) {
      this.logStderrLine(this.stderrBuffer.slice(0, newlineIndex), pid);
      this.stderrBuffer = this.stderrBuffer.slice(newlineIndex + 1);
      newlineIndex = this.stderrBuffer.indexOf("\n");
    }
    while (this.stderrBuffer.length > MAX_STDERR_LINE) {
      this.logStderrLine(this.stderrBuffer.slice(0, MAX_STDERR_LINE), pid);
      this.stderrBuffer = this.stderrBuffer.slice(MAX_STDERR_LINE);
    }
  }

  private flushStderr(pid: number | null): void {
    if (this.stderrBuffer.length > 0) {
      this.logStderrLine(this.stderrBuffer, pid);
      this.stderrBuffer = "";
    }
  }

  private logStderrLine(rawLine: string, pid: number | null): void {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    if (line.length === 0) {
      return;
    }
    this.logger.info("child_stderr", { pid, line });
  }
}
