import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import fc from "fast-check";

import { Broker } from "../src/bridge/broker.js";
import { CorrelationTable } from "../src/bridge/correlation.js";
import { BridgeError, BridgeUnavailableError, UnknownSessionError } from "../src/errors.js";
import { FilterPipeline } from "../src/filters/pipeline.js";
import type { JsonValue } from "../src/json/value.js";
import { SessionRegistry } from "../src/sessions/registry.js";
import { captureRejection, FakeBridgedProcess, flushAsync } from "./helpers/fakeProcess.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

interface Harness {
  logger: RecordingLogger;
  fake: FakeBridgedProcess;
  registry: SessionRegistry;
  broker: Broker;
}

function createHarness(filterConfig: unknown = {}): Harness {
  const logger = new RecordingLogger();
  const fake = new FakeBridgedProcess();
  let sessions = 0;
  let ids = 0;
  const registry = new SessionRegistry({
    logger,
    idFactory: () => {
      sessions += 1;
      return `session-${sessions}`;
    },
  });
  const pipeline = new FilterPipeline({ logger, config: filterConfig });
  const broker = new Broker({
    process: fake,
    registry,
    pipeline,
    logger,
    idFactory: () => {
      ids += 1;
      return `generated-${ids}`;
    },
  });
  return { logger, fake, registry, broker };
}

/** Collects every frame delivered to {@link sessionId}. */
function inbox(registry: SessionRegistry, sessionId: string): JsonValue[] {
  const frames: JsonValue[] = [];
  registry.attach(sessionId, { send: (message) => void frames.push(message) });
  return frames;
}

describe("bridge/broker", () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = createHarness();
    await harness.broker.start();
  });

  afterEach(async () => {
    await harness.broker.stop();
  });

  it("writes the normalised request and delivers the response to its owner only", async () => {
    const { fake, registry, broker } = harness;
    const a = registry.create();
    const b = registry.create();
    const aFrames = inbox(registry, a);
    const bFrames = inbox(registry, b);

    const routed = await broker.routeFromClient(a, { id: 1, method: "tools/list" });
    expect(routed).to.deep.equal({ id: 1, status: "accepted" });
    expect(fake.written).to.deep.equal([{ jsonrpc: "2.0", id: 1, method: "tools/list" }]);

    fake.emitFrame({ jsonrpc: "2.0", id: 1, result: { tools: [] } });
    await flushAsync();

    expect(aFrames).to.deep.equal([{ jsonrpc: "2.0", id: 1, result: { tools: [] } }]);
    expect(bFrames).to.deep.equal([]);
    const status = broker.getStatus();
    expect(status.state).to.equal("running");
    expect(status.correlations).to.equal(0);
    expect(status.totals).to.deep.equal({ routed: 1, blocked: 0, delivered: 1, dropped: 0, orphaned: 0 });
    expect(status.child.pid).to.equal(4242);
  });

  it("keeps string and numeric ids apart", async () => {
    const { fake, registry, broker } = harness;
    const a = registry.create();
    const b = registry.create();
    const aFrames = inbox(registry, a);
    const bFrames = inbox(registry, b);

    await broker.routeFromClient(a, { jsonrpc: "2.0", id: "1", method: "ping" });
    await broker.routeFromClient(b, { jsonrpc: "2.0", id: 1, method: "ping" });
    fake.emitFrame({ jsonrpc: "2.0", id: 1, result: "numeric" });
    fake.emitFrame({ jsonrpc: "2.0", id: "1", result: "string" });
    await flushAsync();

    expect(aFrames).to.deep.equal([{ jsonrpc: "2.0", id: "1", result: "string" }]);
    expect(bFrames).to.deep.equal([{ jsonrpc: "2.0", id: 1, result: "numeric" }]);
  });

  it("assigns ids to requests without one but not to notifications", async () => {
    const { fake, registry, broker } = harness;
    const a = registry.create();

    expect(await broker.routeFromClient(a, { method: "tools/list" })).to.deep.equal({
      id: "generated-1",
      status: "accepted",
    });
    expect(await broker.routeFromClient(a, { method: "notifications/initialized" })).to.deep.equal({
      id: null,
      status: "accepted",
    });
    expect(fake.written).to.deep.equal([
      { jsonrpc: "2.0", id: "generated-1", method: "tools/list" },
      { jsonrpc: "2.0", method: "notifications/initialized" },
    ]);
    expect(broker.getStatus().correlations).to.equal(1);
  });

  it("fans out uncorrelated frames as separate copies", async () => {
    const { fake, registry } = harness;
    const a = registry.create();
    const b = registry.create();
    const aFrames = inbox(registry, a);
    const bFrames = inbox(registry, b);

    fake.emitFrame({ jsonrpc: "2.0", method: "notifications/progress", params: { n: 1 } });
    fake.emitFrame({ jsonrpc: "2.0", id: 99, result: "nobody asked" });
    await flushAsync();

    const expected = [
      { jsonrpc: "2.0", method: "notifications/progress", params: { n: 1 } },
      { jsonrpc: "2.0", id: 99, result: "nobody asked" },
    ];
    expect(aFrames).to.deep.equal(expected);
    expect(bFrames).to.deep.equal(expected);
    expect(aFrames[0]).to.not.equal(bFrames[0]);
  });

  it("filters server frames per session before delivery", async () => {
    const { fake, registry, broker } = harness;
    const a = registry.create();
    const aFrames = inbox(registry, a);

    await broker.routeFromClient(a, { jsonrpc: "2.0", id: 3, method: "contacts/get" });
    fake.emitFrame({ jsonrpc: "2.0", id: 3, result: { contact: "carol@example.net" } });
    await flushAsync();

    expect(aFrames).to.deep.equal([{ jsonrpc: "2.0", id: 3, result: { contact: "[EMAIL_REDACTED]" } }]);
  });

  it("answers a blocked submission with exactly one policy error", async () => {
    await harness.broker.stop();
    harness = createHarness({ blacklist: { blockedKeywords: ["forbidden"] } });
    await harness.broker.start();
    const { fake, registry, broker } = harness;
    const a = registry.create();
    const b = registry.create();
    const aFrames = inbox(registry, a);
    const bFrames = inbox(registry, b);

    const routed = await broker.routeFromClient(a, {
      jsonrpc: "2.0",
      id: 7,
      method: "tools/call",
      params: { query: "something forbidden" },
    });

    expect(routed).to.deep.equal({ id: 7, status: "blocked" });
    expect(fake.written).to.deep.equal([]);
    expect(aFrames).to.deep.equal([
      {
        jsonrpc: "2.0",
        id: 7,
        error: {
          code: -32000,
          message: "Blocked by content policy",
          data: { category: "BLOCKED_BY_POLICY", reason: 'blocked keyword "forbidden"', filter: "blacklist" },
        },
      },
    ]);
    expect(bFrames).to.deep.equal([]);
    expect(broker.getStatus().correlations).to.equal(0);
    expect(broker.getStatus().totals.blocked).to.equal(1);
  });

  it("broadcasts one bridge/error notice when the process dies and refuses further submissions", async () => {
    const { fake, registry, broker, logger } = harness;
    const a = registry.create();
    const b = registry.create();
    const aFrames = inbox(registry, a);
    const bFrames = inbox(registry, b);

    fake.crash();
    await flushAsync();

    const notice = {
      jsonrpc: "2.0",
      method: "bridge/error",
      params: { code: "E-PROCESS-EXITED", message: "Bridged process exited (code=1, signal=null)" },
    };
    expect(aFrames).to.deep.equal([notice]);
    expect(bFrames).to.deep.equal([notice]);
    expect(broker.bridgeState).to.equal("down");
    expect(logger.find("bridge_fatal")).to.have.length(1);

    const error = await captureRejection(broker.routeFromClient(a, { jsonrpc: "2.0", id: 1, method: "ping" }));
    expect(error).to.be.instanceOf(BridgeUnavailableError);
  });

  it("counts a response whose session is gone as orphaned", async () => {
    const { fake, registry, broker, logger } = harness;
    const a = registry.create();
    const b = registry.create();
    const bFrames = inbox(registry, b);

    await broker.routeFromClient(a, { jsonrpc: "2.0", id: 5, method: "slow" });
    registry.remove(a);
    fake.emitFrame({ jsonrpc: "2.0", id: 5, result: "late" });
    await flushAsync();

    expect(bFrames).to.deep.equal([]);
    expect(broker.getStatus().totals.orphaned).to.equal(1);
    expect(logger.find("response_orphaned")).to.have.length(1);
  });

  it("hands a reused id to the latest sender", async () => {
    const { fake, registry, broker, logger } = harness;
    const a = registry.create();
    const b = registry.create();
    const aFrames = inbox(registry, a);
    const bFrames = inbox(registry, b);

    await broker.routeFromClient(a, { jsonrpc: "2.0", id: 9, method: "ping" });
    await broker.routeFromClient(b, { jsonrpc: "2.0", id: 9, method: "ping" });
    fake.emitFrame({ jsonrpc: "2.0", id: 9, result: "pong" });
    await flushAsync();

    expect(logger.find("correlation_overwritten")).to.have.length(1);
    expect(aFrames).to.deep.equal([]);
    expect(bFrames).to.deep.equal([{ jsonrpc: "2.0", id: 9, result: "pong" }]);
  });

  it("forgets the correlation and releases the permit when a write fails", async () => {
    const { fake, registry, broker, logger } = harness;
    const a = registry.create();
    fake.writeError = new Error("EPIPE");

    const error = await captureRejection(broker.routeFromClient(a, { jsonrpc: "2.0", id: 4, method: "ping" }));

    expect(error).to.be.instanceOf(BridgeUnavailableError);
    expect(broker.getStatus()).to.include({ correlations: 0, inFlight: 0 });
    expect(logger.find("route_write_failed")).to.have.length(1);
  });

  it("drops late responses for a forgotten session instead of fanning them out", async () => {
    const { fake, registry, broker, logger } = harness;
    const a = registry.create();
    const b = registry.create();
    const bFrames = inbox(registry, b);
    await broker.routeFromClient(a, { jsonrpc: "2.0", id: "secret-a", method: "tools/call" });
    await broker.routeFromClient(a, { jsonrpc: "2.0", id: 2, method: "ping" });

    expect(broker.forgetSession(a)).to.equal(2);
    registry.remove(a);
    expect(broker.getStatus().correlations).to.equal(0);

    fake.emitFrame({ jsonrpc: "2.0", id: "secret-a", result: "private to a" });
    await flushAsync();

    expect(bFrames).to.deep.equal([]);
    expect(broker.getStatus().totals.orphaned).to.equal(1);
    expect(logger.find("response_orphaned")[0].payload).to.deep.equal({
      id: "secret-a",
      session_id: a,
      reason: "session_closed",
    });
  });

  it("keeps the earlier owner of an id when a reuse of it is blocked", async () => {
    await harness.broker.stop();
    harness = createHarness({ blacklist: { blockedKeywords: ["forbidden"] } });
    await harness.broker.start();
    const { fake, registry, broker } = harness;
    const a = registry.create();
    const b = registry.create();
    const aFrames = inbox(registry, a);
    const bFrames = inbox(registry, b);

    await broker.routeFromClient(a, { jsonrpc: "2.0", id: 9, method: "tools/call" });
    const routed = await broker.routeFromClient(b, {
      jsonrpc: "2.0",
      id: 9,
      method: "tools/call",
      params: { query: "forbidden" },
    });
    expect(routed.status).to.equal("blocked");
    expect(broker.getStatus().correlations).to.equal(1);

    fake.emitFrame({ jsonrpc: "2.0", id: 9, result: "for a" });
    await flushAsync();

    expect(aFrames).to.deep.equal([{ jsonrpc: "2.0", id: 9, result: "for a" }]);
    expect(bFrames).to.have.length(1);
    expect(bFrames[0]).to.have.nested.property("error.code", -32000);
  });

  it("puts the earlier owner back when the write of a reused id fails", async () => {
    const { fake, registry, broker } = harness;
    const a = registry.create();
    const b = registry.create();
    const aFrames = inbox(registry, a);

    await broker.routeFromClient(a, { jsonrpc: "2.0", id: 11, method: "ping" });
    fake.writeError = new Error("EPIPE");
    await captureRejection(broker.routeFromClient(b, { jsonrpc: "2.0", id: 11, method: "ping" }));
    fake.writeError = null;

    fake.emitFrame({ jsonrpc: "2.0", id: 11, result: "pong" });
    await flushAsync();
    expect(aFrames).to.deep.equal([{ jsonrpc: "2.0", id: 11, result: "pong" }]);
  });

  it("rejects unknown sessions", async () => {
    const error = await captureRejection(harness.broker.routeFromClient("missing", { method: "ping" }));
    expect(error).to.be.instanceOf(UnknownSessionError);
  });

  it("refuses to start twice", async () => {
    const error = await captureRejection(harness.broker.start());
    expect(error).to.be.instanceOf(BridgeError);
    expect(error).to.have.property("code", "E-BRIDGE-STARTED");
  });

  it("stops once, terminating the process and closing every session", async () => {
    const { fake, registry, broker, logger } = harness;
    const a = registry.create();
    const pending = registry.nextFrame(a, 60_000);

    const first = broker.stop();
    expect(broker.stop()).to.equal(first);
    expect(await first).to.deep.equal({ code: 0, signal: null, forced: false, durationMs: 0 });

    expect(await pending).to.deep.equal({ type: "closed" });
    expect(fake.terminations).to.equal(1);
    expect(registry.size).to.equal(0);
    expect(broker.bridgeState).to.equal("stopped");
    expect(logger.find("bridge_fatal")).to.deep.equal([]);
    expect(logger.find("bridge_stopped")).to.have.length(1);
  });
});

describe("bridge/broker lifecycle", () => {
  it("refuses submissions before start", async () => {
    const { registry, broker } = createHarness();
    const a = registry.create();
    const error = await captureRejection(broker.routeFromClient(a, { method: "ping" }));
    expect(error).to.be.instanceOf(BridgeUnavailableError);
    expect(await broker.stop()).to.equal(null);
  });

  it("goes down and rethrows when the process fails to start", async () => {
    const { fake, broker, logger } = createHarness();
    const failure = new Error("spawn ENOENT");
    fake.startError = failure;

    expect(await captureRejection(broker.start())).to.equal(failure);
    expect(broker.bridgeState).to.equal("down");
    expect(broker.getStatus().lastError).to.include({ message: "spawn ENOENT", code: null });
    expect(logger.find("bridge_start_failed")).to.have.length(1);
    await broker.stop();
  });

  it("logs an unhealthy probe and keeps running", async () => {
    const { fake, broker, logger } = createHarness();
    fake.healthy = false;

    await broker.start({ probe: true });

    expect(broker.bridgeState).to.equal("running");
    expect(logger.find("bridge_probe_unhealthy")).to.have.length(1);
    await broker.stop();
  });

  it("expires correlations and drops their late responses", async () => {
    const clock = sinon.useFakeTimers({ now: 0, toFake: ["Date", "setInterval", "clearInterval"] });
    try {
      const logger = new RecordingLogger();
      const fake = new FakeBridgedProcess();
      const registry = new SessionRegistry({ logger });
      const broker = new Broker({
        process: fake,
        registry,
        pipeline: new FilterPipeline({ logger }),
        logger,
        correlations: new CorrelationTable({ ttlMs: 1_000 }),
        correlationSweepMs: 500,
      });
      await broker.start();
      const a = registry.create();
      const b = registry.create();
      const bFrames = inbox(registry, b);
      await broker.routeFromClient(a, { jsonrpc: "2.0", id: 77, method: "slow" });

      clock.tick(500);
      expect(broker.getStatus().correlations).to.equal(1);
      clock.tick(500);
      expect(broker.getStatus().correlations).to.equal(0);
      expect(logger.find("correlation_expired")).to.have.length(1);

      fake.emitFrame({ jsonrpc: "2.0", id: 77, result: "a only" });
      await flushAsync();

      expect(bFrames).to.deep.equal([]);
      expect(broker.getStatus().totals.orphaned).to.equal(1);
      expect(logger.find("response_orphaned")[0].payload).to.include({ id: 77, reason: "expired" });
      await broker.stop();
    } finally {
      clock.restore();
    }
  });
});

describe("bridge/broker correlation under concurrency", () => {
  const SENDERS = 3;
  // 1, "1", 2, "2", ...: numeric and string ids in flight together.
  const IDS = Array.from({ length: 9 }, (_, index) => (index % 2 === 0 ? index / 2 + 1 : String((index + 1) / 2)));
  const INDICES = IDS.map((_, index) => index);

  it("delivers every response exactly once and only to its sender, whatever the reply order", async () => {
    await fc.assert(
      fc.asyncProperty(fc.shuffledSubarray(INDICES, { minLength: INDICES.length }), async (order) => {
        const { fake, registry, broker } = createHarness();
        await broker.start();
        try {
          const sessions = Array.from({ length: SENDERS }, () => registry.create());
          const inboxes = sessions.map((session) => inbox(registry, session));

          const routed = await Promise.all(
            IDS.map((id, index) =>
              broker.routeFromClient(sessions[index % SENDERS], { jsonrpc: "2.0", id, method: "tools/call" }),
            ),
          );
          expect(routed.map((result) => result.status)).to.deep.equal(IDS.map(() => "accepted"));

          for (const index of order) {
            fake.emitFrame({ jsonrpc: "2.0", id: IDS[index], result: { index } });
          }
          await flushAsync();

          inboxes.forEach((frames, sender) => {
            const expected = order
              .filter((index) => index % SENDERS === sender)
              .map((index) => ({ jsonrpc: "2.0", id: IDS[index], result: { index } }));
            expect(frames).to.deep.equal(expected);
          });
          expect(broker.getStatus()).to.include({ correlations: 0 });
        } finally {
          await broker.stop();
        }
      }),
      { numRuns: 25 },
    );
  });
});
