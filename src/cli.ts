#!/usr/bin/env node

import { Argument, Command, InvalidArgumentError, Option } from "commander";
import { CONFIG_DIR } from "./config/loader.js";
import { participant } from "./commands/participant.js";
import { EXIT } from "./commands/exit-codes.js";
import { ANALYSIS_LEVELS } from "./core/parameters.js";
import { Reporter, type OutputFormat } from "./log/reporter.js";
import { resolveVersion } from "./version.js";

type CliOpts = {
  participant_label?: string[];
  n_cpus: number;
  license_key: string;
  config: string;
  env?: string;
  format: OutputFormat;
};

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Not a positive integer.");
  return n;
}

const program = new Command();

program
  .name("long-lgi")
  .description("FreeSurfer longitudinal local gyrification index for BIDS derivatives")
  .version(`long-lgi version ${resolveVersion()}`, "-v, --version")
  .argument("<bids_dir>", "The directory with the input dataset formatted according to the BIDS standard")
  .argument(
    "<output_dir>",
    "The directory where the output files are stored; it must already hold the longitudinal recon-all results",
  )
  .addArgument(new Argument("<analysis_level>", "Level of the analysis that will be performed").choices(ANALYSIS_LEVELS))
  .option(
    "--participant_label <labels...>",
    'Labels of the participants to analyze, as in sub-<participant_label> (without "sub-"). Defaults to all subjects in output_dir',
  )
  .option("--n_cpus <n>", "Number of CPUs/cores available to use", parsePositiveInt, 1)
  .requiredOption("--license_key <key>", "FreeSurfer license key")
  .option("--config <path>", "Path to config directory", CONFIG_DIR)
  .option("--env <name>", "Config overlay to apply on top of base.yaml")
  .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"))
  .action(async (bidsDir: string, outputDir: string, analysisLevel: string, opts: CliOpts) => {
    const reporter = new Reporter(opts.format);
    const res = await participant({
      bidsDir,
      outputDir,
      analysisLevel,
      participantLabel: opts.participant_label,
      nCpus: opts.n_cpus,
      licenseKey: opts.license_key,
      configDir: opts.config,
      envName: opts.env ?? process.env.LGI_ENV,
      reporter,
    });

    if (!res.ok) {
      reporter.error(res.code, res.error);
      process.exit(res.exitCode);
    }

    reporter.info("OK", "Everything seems fine");
    process.exit(EXIT.SUCCESS);
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(EXIT.UNEXPECTED);
});
