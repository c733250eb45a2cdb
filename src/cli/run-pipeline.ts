import * as path from "node:path";
import { ConfigError, StepFailedError } from "../types/errors";
import { CommandRunner } from "../core/exec";
import { Logger } from "../core/logger";
import { loadPipeline } from "../core/pipeline/definition";
import { runPipeline } from "../core/pipeline/runner";

export interface PipelineCliOptions {
  artifactsDir?: string;
  input: string[];
  cwd?: string;
  capture?: boolean;
}

/** Throws StepFailedError naming the first failing step when a job fails. */
export async function runPipelineCommand(
  file: string,
  options: PipelineCliOptions,
  logger: Logger,
  runner?: CommandRunner,
): Promise<void> {
  const definition = loadPipeline(path.resolve(file));
  const result = await runPipeline({
    definition,
    inputs: parseInputs(options.input),
    cwd: options.cwd,
    artifactsDir: options.artifactsDir,
    logger,
    runner,
    stream: !options.capture,
  });
  for (const job of result.jobs) {
    const failed = job.steps.filter((s) => s.outcome === "failure").length;
    const skipped = job.steps.filter((s) => s.outcome === "skipped").length;
    logger.info(
      `${job.name}: ${job.conclusion} (${job.steps.length} steps, ${failed} failed, ${skipped} skipped)`,
    );
  }
  if (result.conclusion === "success") return;
  for (const job of result.jobs) {
    const step = job.steps.find(
      (s) => s.outcome === "failure" && s.conclusion === "failure",
    );
    if (step) {
      throw new StepFailedError(
        step.name,
        `${job.name}: step "${step.name}" failed: ${step.error ?? "no details"}`,
      );
    }
  }
  throw new StepFailedError("", `${result.name} failed`);
}

export function parseInputs(pairs: string[]): Record<string, string> {
  const inputs: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new ConfigError(`Input "${pair}" must look like name=value`);
    }
    inputs[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return inputs;
}
