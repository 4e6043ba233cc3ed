import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../errors.js";
import { formatInvocation, type CommandRunner, type ChildEnv, type Invocation } from "../exec/run-command.js";
import type { Reporter } from "../log/reporter.js";
import { surfDirOf, type Timepoint } from "../discovery/timepoints.js";

export type TimepointStatus = "skipped" | "succeeded" | "failed";

export type TimepointOutcome = {
  timepoint: Timepoint;
  status: TimepointStatus;
  missing?: string[];
  error?: string;
};

export type TimepointContext = {
  outputDir: string;
  nCpus: number;
  reconCommand: string;
  surfSubdir: string;
  lgiOutputs: readonly string[];
  env: ChildEnv;
  runner: CommandRunner;
  reporter: Reporter;
};

/** Names from `files` that do not exist in `dir`. */
export function missingOutputs(dir: string, files: readonly string[]): string[] {
  return files.filter((f) => !fs.existsSync(path.join(dir, f)));
}

export function lgiInvocation(tp: Timepoint, ctx: Pick<TimepointContext, "outputDir" | "nCpus" | "reconCommand" | "env">): Invocation {
  return {
    command: ctx.reconCommand,
    args: [
      "-long", tp.id, tp.base,
      "-sd", ctx.outputDir,
      "-localGI",
      "-parallel",
      "-openmp", String(ctx.nCpus),
    ],
    env: ctx.env,
  };
}

/**
 * Compute the local gyrification index for one timepoint unless both
 * hemisphere files are already there. Never throws: a failed run is reported
 * as a `failed` outcome so the caller can move on to the next timepoint.
 */
export async function processTimepoint(tp: Timepoint, ctx: TimepointContext): Promise<TimepointOutcome> {
  const { reporter } = ctx;
  const surfDir = surfDirOf(ctx.outputDir, tp, ctx.surfSubdir);
  const outputs = ctx.lgiOutputs.join(" and ");

  if (missingOutputs(surfDir, ctx.lgiOutputs).length === 0) {
    reporter.info("TP_SKIPPED", `${outputs} exist for ${tp.subject} ${tp.session}. NOT recomputing`, {
      subject: tp.subject,
      timepoint: tp.id,
    });
    return { timepoint: tp, status: "skipped" };
  }

  const invocation = lgiInvocation(tp, ctx);
  reporter.info("TP_RUN", `running long LGI for ${tp.id}: ${formatInvocation(invocation)}`, {
    subject: tp.subject,
    timepoint: tp.id,
  });

  try {
    await ctx.runner(invocation, (line) => reporter.toolOutput(line));
  } catch (e) {
    const error = errorMessage(e);
    reporter.warn("TP_FAILED", `Something failed with tp ${tp.session}: ${error}. Trying other timepoints`, {
      subject: tp.subject,
      timepoint: tp.id,
    });
    return { timepoint: tp, status: "failed", error };
  }

  const missing = missingOutputs(surfDir, ctx.lgiOutputs);
  if (missing.length > 0) {
    reporter.warn(
      "TP_OUTPUT_MISSING",
      `pial_lgi not found after calc for ${tp.subject} ${tp.session}: ${missing.join(" ")}. Trying other timepoints`,
      { subject: tp.subject, timepoint: tp.id, missing },
    );
    return { timepoint: tp, status: "failed", missing };
  }

  reporter.info("TP_DONE", `${outputs} calculated for ${tp.subject} ${tp.session}`, {
    subject: tp.subject,
    timepoint: tp.id,
  });
  return { timepoint: tp, status: "succeeded" };
}
