import { afterEach, describe, it } from "mocha";
import { expect } from "chai";

import { ChildProcessSupervisor } from "../src/childSupervisor.js";
import { BridgeError, ChildSpawnError, ProcessExitedError } from "../src/errors.js";
import { captureRejection } from "./helpers/fakeProcess.js";
import { compiledFixture } from "./helpers/fixtureServer.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

async function waitFor(predicate: () => boolean, timeoutMs = 3_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error("condition not met in time");
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

describe("child supervisor", () => {
  let supervisor: ChildProcessSupervisor | null = null;

  const launch = async (logger: RecordingLogger, options: { flags?: string[]; terminateGraceMs?: number } = {}) => {
    supervisor = new ChildProcessSupervisor({
      command: process.execPath,
      args: [compiledFixture("framed-echo-server"), ...(options.flags ?? [])],
      logger,
      terminateGraceMs: options.terminateGraceMs ?? 2_000,
    });
    await supervisor.start();
    return supervisor;
  };

  afterEach(async () => {
    await supervisor?.terminate();
    supervisor = null;
  });

  it("answers the health probe without leaking the reply to readers", async () => {
    const logger = new RecordingLogger();
    const child = await launch(logger);

    expect(await child.probeHealth(5_000)).to.equal(true);
    expect(logger.find("health_probe_ok")).to.have.length(1);

    await child.writeJSON({ jsonrpc: "2.0", id: 1, method: "echo", params: { after: "probe" } });
    expect(await child.readJSON()).to.deep.equal({ jsonrpc: "2.0", id: 1, result: { after: "probe" } });
  });

  it("reports an error reply to the probe as unhealthy", async () => {
    const logger = new RecordingLogger();
    const child = await launch(logger, { flags: ["--fail-init"] });

    expect(await child.probeHealth(5_000)).to.equal(false);
    expect(logger.find("health_probe_failed")).to.have.length(1);
  });

  it("round-trips frames in write order", async () => {
    const child = await launch(new RecordingLogger());

    await child.writeJSON({ jsonrpc: "2.0", id: 1, method: "echo", params: { text: "héllo" } });
    await child.writeJSON({ jsonrpc: "2.0", id: 2, method: "broadcast", params: { level: "info" } });

    expect(await child.readJSON()).to.deep.equal({ jsonrpc: "2.0", id: 1, result: { text: "héllo" } });
    expect(await child.readJSON()).to.deep.equal({
      jsonrpc: "2.0",
      method: "notifications/message",
      params: { level: "info" },
    });
    expect(child.getStatus().lifecycle).to.equal("running");
  });

  it("logs stderr line by line", async () => {
    const logger = new RecordingLogger();
    const child = await launch(logger);

    await child.writeJSON({ jsonrpc: "2.0", id: 1, method: "log", params: { line: "warming up" } });
    await child.readJSON();
    await waitFor(() => logger.find("child_stderr").length > 0);

    expect(logger.find("child_stderr")[0].payload).to.deep.equal({ pid: child.getStatus().pid, line: "warming up" });
  });

  it("emits fatal with the exit status when the process dies", async () => {
    const child = await launch(new RecordingLogger());
    const fatal = new Promise<BridgeError>((resolve) => child.once("fatal", resolve));

    await child.writeJSON({ jsonrpc: "2.0", id: 1, method: "exit", params: { code: 3 } });
    const error = await fatal;

    expect(error).to.be.instanceOf(ProcessExitedError);
    expect(error).to.include({ exitCode: 3, signal: null });
    expect(await captureRejection(child.readJSON())).to.equal(error);
    expect(child.getStatus().exit?.code).to.equal(3);
    expect(await captureRejection(child.writeJSON({ jsonrpc: "2.0", id: 2, method: "echo" }))).to.be.instanceOf(
      ProcessExitedError,
    );
  });

  it("terminates with SIGTERM without raising fatal", async () => {
    const logger = new RecordingLogger();
    const child = await launch(logger);
    let fatal = false;
    child.on("fatal", () => {
      fatal = true;
    });

    const first = child.terminate();
    expect(child.terminate()).to.equal(first);
    const result = await first;

    expect(result).to.include({ code: null, signal: "SIGTERM", forced: false });
    expect(fatal).to.equal(false);
    expect(logger.find("child_fatal")).to.deep.equal([]);
  });

  it("escalates to SIGKILL after the grace period", async () => {
    const logger = new RecordingLogger();
    const child = await launch(logger, { flags: ["--ignore-sigterm"], terminateGraceMs: 200 });
    // Make sure the SIGTERM handler is installed before signalling.
    await child.writeJSON({ jsonrpc: "2.0", id: 1, method: "echo" });
    await child.readJSON();

    const result = await child.terminate();

    expect(result).to.include({ signal: "SIGKILL", forced: true });
    expect(logger.find("child_terminate_timeout")).to.have.length(1);
  });

  it("rejects with a spawn error when the command does not exist", async () => {
    supervisor = new ChildProcessSupervisor({
      command: "/nonexistent/bridge-target",
      logger: new RecordingLogger(),
    });

    const error = await captureRejection(supervisor.start());

    expect(error).to.be.instanceOf(ChildSpawnError);
    expect(supervisor.getStatus().lifecycle).to.equal("exited");
  });
});
