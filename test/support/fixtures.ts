import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Reporter } from "../../src/log/reporter.js";
import type { CommandRunner } from "../../src/exec/run-command.js";

export const LGI_FILES = ["lh.pial_lgi", "rh.pial_lgi"];

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Create `<outputDir>/<name>/surf`, optionally with the given hemisphere files. */
export function makeLongDir(outputDir: string, name: string, files: string[] = []): string {
  const surf = path.join(outputDir, name, "surf");
  fs.mkdirSync(surf, { recursive: true });
  for (const f of files) fs.writeFileSync(path.join(surf, f), "lgi\n");
  return surf;
}

export function silentReporter(): { reporter: Reporter; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  const reporter = new Reporter("human", (t) => out.push(t), (t) => err.push(t));
  return { reporter, out, err };
}

export type ReconBehaviour = { exitCode?: number; files?: string[]; lines?: string[] };

/**
 * Stand-in for recon-all: exits with `exitCode` and, on success, writes
 * `files` into the surf directory of the timepoint it was asked for.
 */
export function fakeRecon(
  outputDir: string,
  behaviour: Record<string, ReconBehaviour>,
): { runner: CommandRunner; calls: string[][] } {
  const calls: string[][] = [];
  const runner: CommandRunner = async (invocation, onLine) => {
    calls.push([invocation.command, ...invocation.args]);
    const tp = invocation.args[1];
    const base = invocation.args[2];
    const b: ReconBehaviour = behaviour[tp] ?? {};
    for (const line of b.lines ?? []) onLine(line);
    const exitCode = b.exitCode ?? 0;
    if (exitCode !== 0) throw new Error(`Non zero return code: ${exitCode}`);
    const surf = path.join(outputDir, `${tp}.long.${base}`, "surf");
    fs.mkdirSync(surf, { recursive: true });
    for (const f of b.files ?? []) fs.writeFileSync(path.join(surf, f), "lgi\n");
    return 0;
  };
  return { runner, calls };
}
