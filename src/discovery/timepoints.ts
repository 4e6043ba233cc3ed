import path from "node:path";
import { PreconditionError } from "../errors.js";
import { SUBJECT_PREFIX, matchEntries } from "./subjects.js";

export const LONG_MARKER = ".long.";

export type Timepoint = {
  /** Cross-sectional name, e.g. `sub-01_ses-1`. */
  id: string;
  subject: string;
  /** Longitudinal base, e.g. `sub-01`. */
  base: string;
  /** Human facing label used in reports, e.g. `1`. */
  session: string;
  /** Directory holding the longitudinal run, e.g. `sub-01_ses-1.long.sub-01`. */
  longDir: string;
};

export function baseOf(subject: string): string {
  return `${SUBJECT_PREFIX}${subject}`;
}

/** `sub-01_ses-pre` → `pre` */
export function sessionLabelOf(timepointId: string): string {
  const last = timepointId.split("_").at(-1) ?? timepointId;
  return last.split("-").at(-1) ?? last;
}

export function toTimepoint(subject: string, id: string): Timepoint {
  const base = baseOf(subject);
  return { id, subject, base, session: sessionLabelOf(id), longDir: `${id}${LONG_MARKER}${base}` };
}

/**
 * Longitudinal timepoints already produced for a subject, sorted.
 * Throws if the upstream longitudinal stage left nothing for this subject.
 */
export function discoverTimepoints(outputDir: string, subject: string): Timepoint[] {
  const pattern = `${baseOf(subject)}_*${LONG_MARKER}*`;
  const ids = new Set(
    matchEntries(outputDir, pattern).map((name) => name.slice(0, name.indexOf(LONG_MARKER))),
  );
  if (ids.size === 0) {
    throw new PreconditionError(`No timepoints found. Something went wrong: ${subject}`);
  }
  return [...ids].sort().map((id) => toTimepoint(subject, id));
}

export function surfDirOf(outputDir: string, tp: Timepoint, surfSubdir: string): string {
  return path.join(outputDir, tp.longDir, surfSubdir);
}
