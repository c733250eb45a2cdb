#!/usr/bin/env node
import { Command } from "commander";
import { errorMessage } from "../types/errors";
import { loadConfig } from "../core/config";
import { createConsoleLogger, Logger } from "../core/logger";
import { calculateRelease } from "../core/release-calc";
import { PipelineCliOptions, runPipelineCommand } from "./run-pipeline";
import { runRelease } from "./run-release";
import { runSetup } from "./setup";

const program = new Command();

interface CutFlags {
  config?: string;
  base?: string;
  auto: boolean;
  dryRun: boolean;
  pr: boolean;
  reviewer: string[];
  changelog?: boolean;
  skipPreflight: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

function loggerFor(cmd: Command): Logger {
  const opts = cmd.optsWithGlobals<{ verbose?: boolean; quiet?: boolean }>();
  return createConsoleLogger({ verbose: opts.verbose, quiet: opts.quiet });
}

program
  .name("release-runner")
  .description("Cut release branches and run step pipelines")
  .version("0.1.0")
  .option("-v, --verbose", "Print debug output", false)
  .option("-q, --quiet", "Suppress progress messages", false);

program
  .command("cut")
  .description("Create release/v<version>, bump the version file and open a PR")
  .argument("[version]", "Version name (e.g. 5.5.0)")
  .option("-c, --config <file>", "Config file")
  .option("-b, --base <branch>", "Base branch to cut from and target")
  .option("--auto", "Compute the version with semantic-release", false)
  .option("--dry-run", "Print the plan without changing anything", false)
  .option("--no-pr", "Stop after pushing the branch")
  .option("-r, --reviewer <login>", "Request a review (repeatable)", collect, [])
  .option("--changelog", "Promote the Unreleased changelog section")
  .option("--skip-preflight", "Do not check token permissions first", false)
  .action(async (version: string | undefined, options: CutFlags, cmd: Command) => {
    const reviewers = options.reviewer;
    await runRelease(
      version,
      {
        config: options.config,
        base: options.base,
        auto: options.auto,
        dryRun: options.dryRun,
        pr: options.pr,
        reviewer: reviewers.length ? reviewers : undefined,
        changelog: options.changelog,
        skipPreflight: options.skipPreflight,
      },
      loggerFor(cmd),
    );
  });

program
  .command("run")
  .description("Run a pipeline file once per matrix combination")
  .argument("<pipeline>", "Pipeline YAML file")
  .option("-a, --artifacts-dir <dir>", "Where uploaded artifacts are copied")
  .option("-i, --input <name=value>", "Pipeline input (repeatable)", collect, [])
  .option("-C, --cwd <dir>", "Workspace directory")
  .option("--capture", "Capture step output instead of streaming it", false)
  .action(async (file: string, options: PipelineCliOptions, cmd: Command) => {
    await runPipelineCommand(file, options, loggerFor(cmd));
  });

program
  .command("preflight")
  .description("Check that the token can push and open pull requests")
  .option("-c, --config <file>", "Config file")
  .option("-b, --base <branch>", "Base branch")
  .action(async (options: { config?: string; base?: string }, cmd: Command) => {
    const ok = await runSetup(options, loggerFor(cmd));
    if (!ok) process.exitCode = 1;
  });

program
  .command("next-version")
  .description("Print the next version semantic-release would publish")
  .option("-c, --config <file>", "Config file")
  .action(async (options: { config?: string }, cmd: Command) => {
    const config = loadConfig({ configFile: options.config });
    const calc = await calculateRelease({ branch: config.baseBranch });
    if (calc.noRelease) {
      loggerFor(cmd).info("no release required");
      return;
    }
    console.log(calc.version);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  createConsoleLogger().error(`failed: ${errorMessage(err)}`);
  process.exit(1);
});
