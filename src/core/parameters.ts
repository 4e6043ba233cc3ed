import path from "node:path";
import { ConfigurationError, UsageError } from "../errors.js";
import { listSubjects, normalizeLabels } from "../discovery/subjects.js";

export const ANALYSIS_LEVELS = ["participant"] as const;

export type AnalysisLevel = (typeof ANALYSIS_LEVELS)[number];

/** Values as they arrive from the command line. */
export type RawParameters = {
  bidsDir: string;
  outputDir: string;
  analysisLevel: string;
  participantLabel?: string[];
  nCpus?: number | string;
  licenseKey?: string;
};

export type RunParameters = {
  bidsDir: string;
  /** Absolute; recon-all resolves -sd relative to its own working directory. */
  outputDir: string;
  analysisLevel: AnalysisLevel;
  subjects: string[];
  nCpus: number;
  licenseKey: string;
};

function isAnalysisLevel(value: string): value is AnalysisLevel {
  return ANALYSIS_LEVELS.some((level) => level === value);
}

export function parseCpuCount(value: number | string | undefined): number {
  if (value === undefined) return 1;
  const n = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(n) || n < 1) {
    throw new UsageError(`--n_cpus must be a positive integer, got ${String(value)}`);
  }
  return n;
}

/**
 * Validate the invocation and settle which subjects to process. Without
 * explicit labels every `sub-*` entry of the output directory is taken.
 */
export function resolveParameters(raw: RawParameters, cwd: string = process.cwd()): RunParameters {
  if (!isAnalysisLevel(raw.analysisLevel)) {
    throw new UsageError(
      `Invalid analysis level "${raw.analysisLevel}" (choose from ${ANALYSIS_LEVELS.join(", ")})`,
    );
  }

  const licenseKey = raw.licenseKey?.trim() ?? "";
  if (licenseKey.length === 0) {
    throw new ConfigurationError("A FreeSurfer license key is required (--license_key)");
  }

  const nCpus = parseCpuCount(raw.nCpus);
  const outputDir = path.resolve(cwd, raw.outputDir);
  const explicit = normalizeLabels(raw.participantLabel ?? []);

  return {
    bidsDir: path.resolve(cwd, raw.bidsDir),
    outputDir,
    analysisLevel: raw.analysisLevel,
    subjects: explicit.length > 0 ? explicit : listSubjects(outputDir),
    nCpus,
    licenseKey,
  };
}
