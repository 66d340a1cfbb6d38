import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { createBridge, type BridgeController } from "../src/bridge/controller.js";
import { loadBridgeConfig } from "../src/config/bridgeConfig.js";
import { BridgeError, UnknownFilterError, UnknownSessionError } from "../src/errors.js";
import { launchBridge } from "../src/index.js";
import type { JsonValue } from "../src/json/value.js";
import { captureRejection, FakeBridgedProcess, flushAsync } from "./helpers/fakeProcess.js";
import { compiledFixture } from "./helpers/fixtureServer.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("bridge/controller", () => {
  let logger: RecordingLogger;
  let fake: FakeBridgedProcess;
  let bridge: BridgeController;

  beforeEach(async () => {
    logger = new RecordingLogger();
    fake = new FakeBridgedProcess();
    const config = loadBridgeConfig({
      env: {},
      overrides: { command: "fake-server", healthProbe: false, auth: { mode: "bearer", secret: "test-secret" } },
    });
    bridge = createBridge({ config, logger, process: fake });
    await bridge.start();
  });

  afterEach(async () => {
    await bridge.stop();
  });

  it("checks credentials and logs rejections", () => {
    expect(bridge.authorize({ authorization: "Bearer test-secret" })).to.equal(true);
    expect(bridge.authorize({ authorization: "Bearer nope" })).to.equal(false);
    expect(logger.find("auth_rejected")).to.have.length(1);
  });

  it("routes a submission and serves the reply through nextFrame", async () => {
    const session = bridge.registerSession();
    expect(await bridge.submit(session, { jsonrpc: "2.0", id: 1, method: "echo" })).to.deep.equal({
      id: 1,
      status: "accepted",
    });
    expect(fake.written).to.deep.equal([{ jsonrpc: "2.0", id: 1, method: "echo" }]);

    fake.emitFrame({ jsonrpc: "2.0", id: 1, result: { ok: true } });
    expect(await bridge.nextFrame(session, 1_000)).to.deep.equal({
      type: "message",
      message: { jsonrpc: "2.0", id: 1, result: { ok: true } },
    });
  });

  it("rejects submissions that are not JSON", async () => {
    const session = bridge.registerSession();
    const error = await captureRejection(bridge.submit(session, { at: new Date(0) }));
    expect(error).to.be.instanceOf(BridgeError);
    expect(error).to.have.property("code", "E-INVALID-MESSAGE");
    expect(fake.written).to.deep.equal([]);
  });

  it("terminates a session along with its pending correlations", async () => {
    const session = bridge.registerSession();
    await bridge.submit(session, { jsonrpc: "2.0", id: 2, method: "slow" });

    bridge.terminateSession(session);

    expect(bridge.getStatus()).to.include({ sessions: 0, correlations: 0 });
    expect(() => bridge.terminateSession(session)).to.throw(UnknownSessionError);
  });

  it("keeps the late reply of a terminated session away from the others", async () => {
    const leaving = bridge.registerSession();
    const staying = bridge.registerSession();
    const received: JsonValue[] = [];
    bridge.attachSubscriber(staying, { send: (message) => void received.push(message) });
    await bridge.submit(leaving, { jsonrpc: "2.0", id: "private-1", method: "tools/call" });

    bridge.terminateSession(leaving);
    fake.emitFrame({ jsonrpc: "2.0", id: "private-1", result: { for: "leaving" } });
    await flushAsync();

    expect(received).to.deep.equal([]);
    expect(bridge.getStatus().totals.orphaned).to.equal(1);
  });

  it("lists sessions and pushes fan-out to subscribers", async () => {
    const first = bridge.registerSession();
    const second = bridge.registerSession();
    const received: JsonValue[] = [];
    bridge.attachSubscriber(second, { send: (message) => void received.push(message) });

    expect(bridge.listSessions().map((session) => session.id)).to.deep.equal([first, second]);

    fake.emitFrame({ jsonrpc: "2.0", method: "notifications/tools/list_changed" });
    expect(await bridge.nextFrame(first, 1_000)).to.deep.equal({
      type: "message",
      message: { jsonrpc: "2.0", method: "notifications/tools/list_changed" },
    });
    expect(received).to.deep.equal([{ jsonrpc: "2.0", method: "notifications/tools/list_changed" }]);
  });

  it("toggles filters and reports the resulting list", () => {
    const filters = bridge.toggleFilter("bridge_metadata", true);
    expect(filters.find((filter) => filter.name === "bridge_metadata")?.enabled).to.equal(true);
    expect(() => bridge.toggleFilter("nope", true)).to.throw(UnknownFilterError);
    expect(bridge.listFilters()).to.deep.equal(filters);
  });

  it("replaces the filter configuration and exposes the metrics", () => {
    const snapshot = bridge.replaceFilterConfig({ cache: { enabled: false } });
    expect(snapshot.version).to.equal(2);
    expect(snapshot.cache.enabled).to.equal(false);
    expect(bridge.getFilterMetrics()).to.include({ configVersion: 2, totalMessages: 0 });
  });

  it("returns the termination result on stop", async () => {
    expect(await bridge.stop()).to.deep.equal({ code: 0, signal: null, forced: false, durationMs: 0 });
    expect(bridge.getStatus().state).to.equal("stopped");
  });
});

describe("launchBridge", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "bridge-launch-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("bridges a real framed server with the configured filters", async () => {
    const filtersFile = path.join(directory, "filters.yaml");
    await writeFile(filtersFile, 'secretMasking:\n  patterns: ["ghp_[A-Za-z0-9]{8}"]\n', "utf8");
    const script = compiledFixture("framed-echo-server");
    const logger = new RecordingLogger();

    const bridge = await launchBridge({
      env: {
        BRIDGE_CMD: process.execPath,
        BRIDGE_ARGS: `"${script}"`,
        BRIDGE_FILTERS_FILE: filtersFile,
        BRIDGE_TERMINATE_GRACE_MS: "2000",
      },
      logger,
    });
    try {
      const session = bridge.registerSession();
      await bridge.submit(session, {
        jsonrpc: "2.0",
        id: 1,
        method: "echo",
        params: { token: "ghp_abcd1234", mail: "dana@example.com" },
      });

      expect(await bridge.nextFrame(session, 5_000)).to.deep.equal({
        type: "message",
        message: { jsonrpc: "2.0", id: 1, result: { token: "[REDACTED]", mail: "[EMAIL_REDACTED]" } },
      });
      expect(logger.find("health_probe_ok")).to.have.length(1);
      expect(logger.find("bridge_ready")).to.have.length(1);
    } finally {
      await bridge.stop();
    }
  });
});
