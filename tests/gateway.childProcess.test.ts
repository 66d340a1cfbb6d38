import { describe, it } from "mocha";
import { expect } from "chai";
import type { SpawnOptionsWithoutStdio } from "node:child_process";

import {
  createChildProcessGateway,
  InvalidChildProcessArgumentError,
  InvalidChildProcessCommandError,
  type SpawnImplementation,
} from "../src/gateways/childProcess.js";

interface SpawnCall {
  command: string;
  args: readonly string[];
  options: SpawnOptionsWithoutStdio;
}

function recordingSpawn(calls: SpawnCall[]): SpawnImplementation {
  return (command, args, options) => {
    calls.push({ command, args, options });
    throw new Error("spawn stubbed");
  };
}

describe("gateways/childProcess", () => {
  it("forwards the command, arguments and working directory", () => {
    const calls: SpawnCall[] = [];
    const gateway = createChildProcessGateway({ spawnImpl: recordingSpawn(calls) });

    expect(() => gateway.spawn({ command: "server", args: ["--stdio"], cwd: "/srv" })).to.throw("spawn stubbed");

    expect(calls).to.have.length(1);
    expect(calls[0].command).to.equal("server");
    expect(calls[0].args).to.deep.equal(["--stdio"]);
    expect(calls[0].options).to.include({ cwd: "/srv", stdio: "pipe", shell: false });
  });

  it("layers overrides on the parent environment and drops undefined keys", () => {
    const calls: SpawnCall[] = [];
    const gateway = createChildProcessGateway({ spawnImpl: recordingSpawn(calls) });

    expect(() =>
      gateway.spawn({ command: "server", extraEnv: { PATH: undefined, BRIDGE_CHILD_FLAG: "1" } }),
    ).to.throw("spawn stubbed");

    const env = calls[0].options.env ?? {};
    expect(env).to.not.have.property("PATH");
    expect(env).to.have.property("BRIDGE_CHILD_FLAG", "1");
  });

  it("rejects blank commands and NUL bytes before spawning", () => {
    const calls: SpawnCall[] = [];
    const gateway = createChildProcessGateway({ spawnImpl: recordingSpawn(calls) });

    expect(() => gateway.spawn({ command: "  " })).to.throw(InvalidChildProcessCommandError);
    expect(() => gateway.spawn({ command: "server", args: ["ok", "bad\u0000"] })).to.throw(
      InvalidChildProcessArgumentError,
      "Child process argument at index 1 contains a NUL byte.",
    );
    expect(calls).to.deep.equal([]);
  });
});
