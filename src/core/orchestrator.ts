import { ensureOutputPopulated, provisionSharedAssets, type ReferenceDirLookup } from "../assets/provision.js";
import { discoverTimepoints } from "../discovery/timepoints.js";
import { SubjectFailedError } from "../errors.js";
import type { CommandRunner, ChildEnv } from "../exec/run-command.js";
import type { Reporter } from "../log/reporter.js";
import { processTimepoint, type TimepointOutcome } from "./timepoint.js";

export type OrchestratorOptions = {
  outputDir: string;
  referenceDir: ReferenceDirLookup;
  nCpus: number;
  reconCommand: string;
  sharedAssets: readonly string[];
  surfSubdir: string;
  lgiOutputs: readonly string[];
  env: ChildEnv;
  runner: CommandRunner;
  reporter: Reporter;
};

export type SubjectReport = {
  subject: string;
  outcomes: TimepointOutcome[];
  succeeded: string[];
  skipped: string[];
  failed: string[];
};

export type RunReport = {
  copiedAssets: string[];
  subjects: SubjectReport[];
};

/** Fold per-timepoint outcomes into session label lists. */
export function summarizeOutcomes(subject: string, outcomes: TimepointOutcome[]): SubjectReport {
  const sessions = (status: TimepointOutcome["status"]) =>
    outcomes.filter((o) => o.status === status).map((o) => o.timepoint.session);
  return {
    subject,
    outcomes,
    succeeded: sessions("succeeded"),
    skipped: sessions("skipped"),
    failed: sessions("failed"),
  };
}

/**
 * Orchestrator — walks subjects and their timepoints one at a time.
 *
 * A failed timepoint does not stop its subject, but a subject with any failed
 * timepoint stops the run: SubjectFailedError propagates before the next
 * subject is looked at.
 */
export class Orchestrator {
  constructor(private readonly opts: OrchestratorOptions) {}

  async run(subjects: readonly string[]): Promise<RunReport> {
    const { outputDir, reporter } = this.opts;

    ensureOutputPopulated(outputDir, reporter);
    const copiedAssets = await provisionSharedAssets(
      outputDir,
      this.opts.referenceDir,
      this.opts.sharedAssets,
      reporter,
    );

    const reports: SubjectReport[] = [];
    for (const subject of subjects) {
      reports.push(await this.processSubject(subject));
    }
    return { copiedAssets, subjects: reports };
  }

  async processSubject(subject: string): Promise<SubjectReport> {
    const { reporter } = this.opts;
    const timepoints = discoverTimepoints(this.opts.outputDir, subject);
    reporter.info(
      "TP_FOUND",
      `Timepoints for subject found ${subject}: ${timepoints.map((tp) => tp.id).join(" ")}`,
      { subject, timepoints: timepoints.map((tp) => tp.id) },
    );

    const outcomes: TimepointOutcome[] = [];
    for (const tp of timepoints) {
      outcomes.push(await processTimepoint(tp, this.opts));
    }

    const report = summarizeOutcomes(subject, outcomes);
    if (report.succeeded.length > 0) {
      reporter.info(
        "SUBJECT_PROCESSED",
        `Timepoints successfully processed for ${subject}: ${report.succeeded.join(" ")}`,
        { subject, sessions: report.succeeded },
      );
    }
    if (report.failed.length > 0) {
      throw new SubjectFailedError(subject, report.failed);
    }
    reporter.info("SUBJECT_OK", `Everything seems fine for ${subject}`, { subject });
    return report;
  }
}
