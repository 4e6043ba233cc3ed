import fs from "node:fs";
import { CONFIG_DIR, loadConfig } from "./config/loader.js";

export const PACKAGE_VERSION = "0.1.0";

/**
 * Version string baked into the container image, or the package version when
 * running outside it.
 */
export function readVersion(versionFile: string): string {
  try {
    const v = fs.readFileSync(versionFile, "utf8").trim();
    return v.length > 0 ? v : PACKAGE_VERSION;
  } catch {
    return PACKAGE_VERSION;
  }
}

/**
 * Version shown by `--version`. The version text is fixed before options are
 * parsed, so `--config` and `--env` do not apply here: the file comes from the
 * bundled config, the LGI_ENV overlay and an LGI_VERSION_FILE override.
 */
export function resolveVersion(env: NodeJS.ProcessEnv = process.env, configDir: string = CONFIG_DIR): string {
  try {
    const config = loadConfig({ envName: env.LGI_ENV, configDir, env });
    return readVersion(config.version_file);
  } catch {
    return PACKAGE_VERSION;
  }
}
