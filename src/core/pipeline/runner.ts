import * as fs from "node:fs";
import * as path from "node:path";
import { ConfigError, errorMessage } from "../../types/errors";
import { CommandRunner, spawnRunner } from "../exec";
import { Logger, silentLogger } from "../logger";
import { uploadArtifact } from "./artifacts";
import {
  PipelineDefinition,
  PipelineStep,
  RunStep,
  UploadStep,
} from "./definition";
import {
  ExpressionContext,
  interpolate,
  interpolateRecord,
  shouldRun,
} from "./expressions";
import { describeCombo, expandMatrix, MatrixCombo } from "./matrix";
import { resolveShell } from "./shell";

export type StepOutcome = "success" | "failure" | "skipped";

export interface StepResult {
  name: string;
  /** What happened. */
  outcome: StepOutcome;
  /** What counts for the job; a continue-on-error failure concludes as success. */
  conclusion: StepOutcome;
  exitCode?: number | null;
  error?: string;
  artifacts?: string[];
  durationMs: number;
}

type StepRun = Omit<StepResult, "name" | "conclusion" | "durationMs">;

export interface JobResult {
  name: string;
  matrix: MatrixCombo;
  conclusion: "success" | "failure";
  steps: StepResult[];
}

export interface PipelineResult {
  name: string;
  conclusion: "success" | "failure";
  jobs: JobResult[];
}

export interface RunPipelineOptions {
  definition: PipelineDefinition;
  inputs?: Record<string, string>;
  /** Workspace root; step directories and upload paths resolve against it. */
  cwd?: string;
  artifactsDir?: string;
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  logger?: Logger;
  /** Let step output through to the terminal instead of capturing it. */
  stream?: boolean;
}

export const DEFAULT_ARTIFACTS_DIR = ".release-runner/artifacts";

/**
 * Runs every matrix combination in turn. Within a job steps run in order and
 * each step's `if` is checked against whether the job has failed so far.
 */
export async function runPipeline(
  opts: RunPipelineOptions,
): Promise<PipelineResult> {
  const def = opts.definition;
  const cwd = path.resolve(opts.cwd || process.cwd());
  const inputs = resolveInputs(def, opts.inputs || {});
  const combos = expandMatrix(def.matrix);
  if (!combos.length) {
    throw new ConfigError(`${def.name}: matrix excludes every combination`);
  }
  for (const combo of combos) checkExpressions(def, combo, inputs);
  const ctx: JobContext = {
    cwd,
    defaultWorkdir: def.defaults.workingDirectory,
    artifactsDir: path.resolve(cwd, opts.artifactsDir || DEFAULT_ARTIFACTS_DIR),
    baseEnv: opts.env || process.env,
    runner: opts.runner || spawnRunner,
    log: opts.logger || silentLogger,
    stream: !!opts.stream,
  };

  const jobs: JobResult[] = [];
  for (const combo of combos) {
    jobs.push(runJob(def, combo, inputs, ctx));
  }
  const conclusion = jobs.every((j) => j.conclusion === "success")
    ? "success"
    : "failure";
  ctx.log.info(`${def.name}: ${conclusion}`);
  return { name: def.name, conclusion, jobs };
}

export function resolveInputs(
  def: PipelineDefinition,
  given: Record<string, string>,
): Record<string, string> {
  const unknown = Object.keys(given).filter(
    (k) => !Object.prototype.hasOwnProperty.call(def.inputs, k),
  );
  if (unknown.length) {
    throw new ConfigError(`Unexpected inputs provided: ${unknown.join(", ")}`);
  }
  const resolved: Record<string, string> = {};
  for (const [name, input] of Object.entries(def.inputs)) {
    const value = given[name] ?? input.default;
    if (value === undefined) {
      if (input.required) throw new ConfigError(`Input required and not supplied: ${name}`);
      continue;
    }
    resolved[name] = value;
  }
  return resolved;
}

interface JobContext {
  cwd: string;
  defaultWorkdir?: string;
  artifactsDir: string;
  baseEnv: NodeJS.ProcessEnv;
  runner: CommandRunner;
  log: Logger;
  stream: boolean;
}

function runJob(
  def: PipelineDefinition,
  combo: MatrixCombo,
  inputs: Record<string, string>,
  ctx: JobContext,
): JobResult {
  const label = Object.keys(combo).length
    ? `${def.name} (${describeCombo(combo)})`
    : def.name;
  const exprCtx: ExpressionContext = { matrix: combo, env: {}, inputs };
  exprCtx.env = interpolateRecord(def.env, exprCtx);
  ctx.log.info(`job ${label}`);

  const steps: StepResult[] = [];
  let failed = false;
  for (const step of def.steps) {
    const name = interpolate(step.name, exprCtx);
    if (!shouldRun(step.condition, failed)) {
      ctx.log.info(`  skip ${name}`);
      steps.push({ name, outcome: "skipped", conclusion: "skipped", durationMs: 0 });
      continue;
    }
    ctx.log.info(`  run  ${name}`);
    const started = Date.now();
    let result: StepRun;
    try {
      result =
        step.kind === "run"
          ? runCommandStep(step, combo, exprCtx, ctx)
          : runUploadStep(step, exprCtx, ctx, label);
    } catch (err) {
      result = { outcome: "failure", error: errorMessage(err) };
    }
    const conclusion =
      result.outcome === "failure" && step.continueOnError
        ? "success"
        : result.outcome;
    if (conclusion === "failure") failed = true;
    if (result.outcome === "failure") {
      const how = step.continueOnError ? " (continuing)" : "";
      ctx.log.error(`  fail ${name}${how}: ${result.error ?? "failed"}`);
    }
    steps.push({ ...result, name, conclusion, durationMs: Date.now() - started });
  }
  return {
    name: label,
    matrix: combo,
    conclusion: failed ? "failure" : "success",
    steps,
  };
}

/**
 * Resolves every `${{ }}` a job would use so that an unknown key fails the
 * run before any step executes.
 */
function checkExpressions(
  def: PipelineDefinition,
  combo: MatrixCombo,
  inputs: Record<string, string>,
): void {
  const ctx: ExpressionContext = { matrix: combo, env: {}, inputs };
  try {
    ctx.env = interpolateRecord(def.env, ctx);
  } catch (err) {
    throw new ConfigError(`${def.name} env: ${errorMessage(err)}`);
  }
  def.steps.forEach((step, i) => {
    try {
      checkStep(step, ctx, def.defaults.workingDirectory);
    } catch (err) {
      throw new ConfigError(`${def.name} steps.${i}: ${errorMessage(err)}`);
    }
  });
}

function checkStep(
  step: PipelineStep,
  ctx: ExpressionContext,
  defaultWorkdir: string | undefined,
): void {
  interpolate(step.name, ctx);
  if (step.kind === "upload") {
    interpolate(step.artifact, ctx);
    for (const p of step.paths) interpolate(p, ctx);
    return;
  }
  const scope: ExpressionContext = {
    ...ctx,
    env: { ...ctx.env, ...interpolateRecord(step.env, ctx) },
  };
  interpolate(step.run, scope);
  interpolate(defaultWorkdir ?? ".", scope);
  interpolate(step.workingDirectory ?? ".", scope);
}

function runCommandStep(
  step: RunStep,
  combo: MatrixCombo,
  exprCtx: ExpressionContext,
  ctx: JobContext,
): StepRun {
  const stepEnv = interpolateRecord(step.env, exprCtx);
  const scopeCtx: ExpressionContext = {
    ...exprCtx,
    env: { ...exprCtx.env, ...stepEnv },
  };
  const script = interpolate(step.run, scopeCtx);
  const workdir = path.resolve(
    ctx.cwd,
    interpolate(ctx.defaultWorkdir ?? ".", scopeCtx),
    interpolate(step.workingDirectory ?? ".", scopeCtx),
  );
  if (!fs.existsSync(workdir)) {
    return { outcome: "failure", error: `working directory ${workdir} does not exist` };
  }
  const env: NodeJS.ProcessEnv = {
    ...ctx.baseEnv,
    ...matrixEnv(combo),
    ...scopeCtx.env,
  };
  const shell = resolveShell(step.shell, script);
  try {
    const res = ctx.runner.run(shell.command, shell.args, {
      cwd: workdir,
      env,
      timeoutMs: step.timeoutMinutes ? step.timeoutMinutes * 60_000 : undefined,
      stream: ctx.stream,
    });
    if (!ctx.stream && res.stdout.trim()) ctx.log.debug(res.stdout.trimEnd());
    if (res.timedOut) {
      return {
        outcome: "failure",
        exitCode: res.exitCode,
        error: `timed out after ${step.timeoutMinutes} minute(s)`,
      };
    }
    if (res.exitCode !== 0) {
      return {
        outcome: "failure",
        exitCode: res.exitCode,
        error: `exited with ${res.exitCode ?? "signal"}` +
          (res.stderr.trim() ? `: ${lastLine(res.stderr)}` : ""),
      };
    }
    return { outcome: "success", exitCode: 0 };
  } finally {
    shell.cleanup();
  }
}

function runUploadStep(
  step: UploadStep,
  exprCtx: ExpressionContext,
  ctx: JobContext,
  job: string,
): StepRun {
  const name = interpolate(step.artifact, exprCtx);
  const res = uploadArtifact({
    name,
    paths: step.paths.map((p) => interpolate(p, exprCtx)),
    workspace: ctx.cwd,
    artifactsDir: ctx.artifactsDir,
    job,
  });
  if (res.missing.length) {
    const message = `no files found at ${res.missing.join(", ")}`;
    if (step.ifNoFilesFound === "error") {
      return { outcome: "failure", error: message, artifacts: res.files };
    }
    if (step.ifNoFilesFound === "warn") ctx.log.warn(`  ${name}: ${message}`);
  }
  ctx.log.info(`  uploaded ${res.files.length} file(s) as ${name}`);
  return { outcome: "success", artifacts: res.files };
}

function matrixEnv(combo: MatrixCombo): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [k, v] of Object.entries(combo)) {
    env[`MATRIX_${k.toUpperCase().replace(/[^A-Z0-9]/g, "_")}`] = String(v);
  }
  return env;
}

function lastLine(text: string): string {
  const lines = text.trim().split("\n");
  return lines[lines.length - 1];
}
