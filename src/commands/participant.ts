import { loadConfig } from "../config/loader.js";
import { Orchestrator, type RunReport } from "../core/orchestrator.js";
import { resolveParameters, type RawParameters } from "../core/parameters.js";
import { ConfigurationError, LgiError, errorMessage } from "../errors.js";
import { buildChildEnv, runCommand, type CommandRunner } from "../exec/run-command.js";
import { Reporter } from "../log/reporter.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export type ParticipantOpts = RawParameters & {
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  reporter?: Reporter;
  runner?: CommandRunner;
};

export type ParticipantResult =
  | { ok: true; report: RunReport }
  | { ok: false; code: string; error: string; exitCode: ExitCode };

/**
 * Participant level analysis: compute the longitudinal local gyrification
 * index for every selected subject.
 */
export async function participant(opts: ParticipantOpts): Promise<ParticipantResult> {
  const reporter = opts.reporter ?? new Reporter();
  const env = opts.env ?? process.env;

  try {
    const config = loadConfig({ envName: opts.envName, configDir: opts.configDir, env });
    const params = resolveParameters(opts, opts.cwd);

    const referenceDir = (): string => {
      const dir = env[config.reference_dir_env];
      if (!dir) {
        throw new ConfigurationError(`${config.reference_dir_env} is not set; it must point at the reference subjects directory`);
      }
      return dir;
    };

    reporter.info("SUBJECTS", `Subjects to analyze: ${params.subjects.join(" ")}`, { subjects: params.subjects });

    const orch = new Orchestrator({
      outputDir: params.outputDir,
      referenceDir,
      nCpus: params.nCpus,
      reconCommand: config.recon_command,
      sharedAssets: config.shared_assets,
      surfSubdir: config.surf_subdir,
      lgiOutputs: config.lgi_outputs,
      env: buildChildEnv(env, { [config.license_env]: params.licenseKey }, config.strip_env),
      runner: opts.runner ?? runCommand,
      reporter,
    });

    const report = await orch.run(params.subjects);
    return { ok: true, report };
  } catch (e) {
    if (e instanceof LgiError) {
      return { ok: false, code: e.code, error: e.message, exitCode: exitCodeFor(e.code) };
    }
    return { ok: false, code: "UNEXPECTED", error: errorMessage(e), exitCode: EXIT.UNEXPECTED };
  }
}
