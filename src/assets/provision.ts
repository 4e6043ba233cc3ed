import fs from "node:fs";
import { cp } from "node:fs/promises";
import path from "node:path";
import { PreconditionError, errorMessage } from "../errors.js";
import type { Reporter } from "../log/reporter.js";

/**
 * The output directory must already hold the longitudinal stage's results.
 * Returns its entries.
 */
export function ensureOutputPopulated(outputDir: string, reporter: Reporter): string[] {
  if (fs.existsSync(outputDir) && !fs.statSync(outputDir).isDirectory()) {
    throw new PreconditionError(`output dir is not a directory ${outputDir}`);
  }
  const entries = fs.existsSync(outputDir) ? fs.readdirSync(outputDir).sort() : [];
  reporter.info("OUTPUT_DIR_CONTENT", `output_dir content: ${entries.join(", ")}`, { outputDir, entries });
  if (entries.length === 0) {
    throw new PreconditionError(`output dir empty ${outputDir}`);
  }
  return entries;
}

/** Resolves the reference subjects directory; only called when an asset has to be copied. */
export type ReferenceDirLookup = () => string;

/**
 * Copy shared templates (fsaverage and the EC average curvatures) from the
 * reference subjects directory into the output directory. Assets already
 * present are left alone. Returns the names that were copied.
 */
export async function provisionSharedAssets(
  outputDir: string,
  referenceDir: ReferenceDirLookup,
  assets: readonly string[],
  reporter: Reporter,
): Promise<string[]> {
  const copied: string[] = [];
  for (const asset of assets) {
    const target = path.join(outputDir, asset);
    if (fs.existsSync(target)) continue;

    const source = path.join(referenceDir(), asset);
    reporter.info("ASSET_COPY", `copying ${source} to ${target}`, { asset });
    try {
      await cp(source, target, { recursive: true, force: true, errorOnExist: false });
    } catch (e) {
      throw new PreconditionError(`Could not copy shared asset ${asset} from ${path.dirname(source)}: ${errorMessage(e)}`);
    }
    copied.push(asset);
  }
  return copied;
}
