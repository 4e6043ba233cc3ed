import { spawn } from "node:child_process";
import os from "node:os";
import { createInterface } from "node:readline";
import { CommandFailedError } from "../errors.js";

export type ChildEnv = Readonly<Record<string, string>>;

/** Everything needed to launch one child process. Built once, never mutated. */
export type Invocation = Readonly<{
  command: string;
  args: readonly string[];
  env: ChildEnv;
  ignoreErrors?: boolean;
}>;

export type LineSink = (line: string) => void;

export type CommandRunner = (invocation: Invocation, onLine: LineSink) => Promise<number>;

/**
 * Build a child environment from `base` plus `overrides`, minus every name in
 * `strip`. Stripped names are removed even when an override sets them.
 */
export function buildChildEnv(
  base: NodeJS.ProcessEnv,
  overrides: Readonly<Record<string, string>> = {},
  strip: readonly string[] = [],
): ChildEnv {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) env[key] = value;
  }
  Object.assign(env, overrides);
  for (const name of strip) delete env[name];
  return Object.freeze(env);
}

export function formatInvocation(invocation: Invocation): string {
  return [invocation.command, ...invocation.args].join(" ");
}

/**
 * Run a command without a shell, forwarding stdout and stderr line by line to
 * `onLine` while it runs. Resolves with the exit code once the child has
 * closed; rejects with CommandFailedError on a non-zero code unless the
 * invocation asks for errors to be ignored.
 */
export const runCommand: CommandRunner = (invocation, onLine) =>
  new Promise<number>((resolve, reject) => {
    const child = spawn(invocation.command, [...invocation.args], {
      env: invocation.env,
      shell: false,
      stdio: ["ignore", "pipe", "pipe"],
    });

    for (const stream of [child.stdout, child.stderr]) {
      createInterface({ input: stream, crlfDelay: Infinity }).on("line", onLine);
    }

    child.on("error", reject);
    child.on("close", (code, signal) => {
      // A child killed by a signal has no exit code; report 128 + signal number like a shell.
      const exitCode = code ?? (signal ? 128 + os.constants.signals[signal] : 1);
      if (exitCode !== 0 && !invocation.ignoreErrors) {
        reject(new CommandFailedError(exitCode));
        return;
      }
      resolve(exitCode);
    });
  });
