import { describe, expect, it, vi, beforeEach } from "vitest";
import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { CommandFailedError } from "../src/errors.js";
import { buildChildEnv, formatInvocation, runCommand } from "../src/exec/run-command.js";

class FakeChild extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();

  /** Write the given output, end both streams, then report the exit. */
  finish(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.stdout.end();
    this.stderr.end();
    setTimeout(() => this.emit("close", code, signal), 10);
  }
}

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));

vi.mock("node:child_process", () => ({
  spawn: spawnMock,
}));

let child: FakeChild;

describe("buildChildEnv", () => {
  it("merges overrides into a copy of the base environment", () => {
    const base = { PATH: "/usr/bin", HOME: "/home/test" };
    const env = buildChildEnv(base, { FS_LICENSE_KEY: "test-secret", HOME: "/tmp" });
    expect(env).toEqual({ PATH: "/usr/bin", HOME: "/tmp", FS_LICENSE_KEY: "test-secret" });
    expect(base).toEqual({ PATH: "/usr/bin", HOME: "/home/test" });
  });

  it("strips named variables even when an override sets them", () => {
    const env = buildChildEnv({ PATH: "/usr/bin", DEBUG: "1" }, { DEBUG: "2" }, ["DEBUG"]);
    expect(env).toEqual({ PATH: "/usr/bin" });
  });

  it("drops undefined values and returns a frozen record", () => {
    const env = buildChildEnv({ PATH: "/usr/bin", EMPTY: undefined });
    expect(Object.keys(env)).toEqual(["PATH"]);
    expect(Object.isFrozen(env)).toBe(true);
  });
});

describe("runCommand", () => {
  beforeEach(() => {
    child = new FakeChild();
    spawnMock.mockReset();
    spawnMock.mockImplementation(() => child);
  });

  const invocation = { command: "recon-all", args: ["-long", "sub-01_ses-1", "sub-01"], env: { PATH: "/usr/bin" } };

  it("spawns without a shell using the given environment", async () => {
    const done = runCommand(invocation, () => {});
    child.finish(0);
    await expect(done).resolves.toBe(0);
    expect(spawnMock).toHaveBeenCalledWith("recon-all", ["-long", "sub-01_ses-1", "sub-01"], {
      env: { PATH: "/usr/bin" },
      shell: false,
      stdio: ["ignore", "pipe", "pipe"],
    });
  });

  it("forwards stdout and stderr line by line", async () => {
    const lines: string[] = [];
    const done = runCommand(invocation, (l) => lines.push(l));
    child.stdout.write("first\nsecond\n");
    child.stderr.write("warning: third\n");
    child.stdout.write("partial");
    child.finish(0);
    await done;
    expect(lines.sort()).toEqual(["first", "partial", "second", "warning: third"]);
  });

  it("rejects with the exit code on failure", async () => {
    const done = runCommand(invocation, () => {});
    child.finish(3);
    await expect(done).rejects.toBeInstanceOf(CommandFailedError);
    await expect(done).rejects.toThrow("Non zero return code: 3");
  });

  it("resolves with the exit code when errors are ignored", async () => {
    const done = runCommand({ ...invocation, ignoreErrors: true }, () => {});
    child.finish(3);
    await expect(done).resolves.toBe(3);
  });

  it("reports a killed child as 128 plus the signal number", async () => {
    const done = runCommand(invocation, () => {});
    child.finish(null, "SIGKILL");
    await expect(done).rejects.toThrow("Non zero return code: 137");
  });

  it("rejects when the process cannot be started", async () => {
    const done = runCommand(invocation, () => {});
    child.emit("error", new Error("spawn recon-all ENOENT"));
    await expect(done).rejects.toThrow("spawn recon-all ENOENT");
  });
});

describe("formatInvocation", () => {
  it("joins command and arguments", () => {
    expect(formatInvocation({ command: "recon-all", args: ["-localGI"], env: {} })).toBe("recon-all -localGI");
  });
});
