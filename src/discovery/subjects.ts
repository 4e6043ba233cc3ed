import fs from "node:fs";
import { minimatch } from "minimatch";

export const SUBJECT_PREFIX = "sub-";

/** Entries in a directory whose names match a glob pattern. Missing directory → []. */
export function matchEntries(dir: string, pattern: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs.readdirSync(dir).filter((name) => minimatch(name, pattern, { dot: false }));
}

/**
 * Subject label of an output entry: `sub-01_ses-1.long.sub-01` → `01`,
 * `sub-01` → `01`.
 */
export function subjectLabelOf(entryName: string): string {
  const head = entryName.split("_")[0];
  return head.split("-").at(-1) ?? head;
}

/** Subjects present in the output directory, unique and sorted. */
export function listSubjects(outputDir: string): string[] {
  const labels = matchEntries(outputDir, `${SUBJECT_PREFIX}*`).map(subjectLabelOf);
  return [...new Set(labels)].filter((l) => l.length > 0).sort();
}

/** Normalise user supplied labels: drop a leading `sub-`, blanks and repeats. */
export function normalizeLabels(labels: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const raw of labels) {
    const trimmed = raw.trim();
    const label = trimmed.startsWith(SUBJECT_PREFIX) ? trimmed.slice(SUBJECT_PREFIX.length) : trimmed;
    if (label.length > 0) seen.add(label);
  }
  return [...seen];
}
