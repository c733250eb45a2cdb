/**
 * Pipeline files: a named, linear list of steps run once per matrix
 * combination. Parsed with yaml, checked with zod, then normalized.
 */

import * as fs from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "../../types/errors";
import { formatIssues } from "../config";
import { parseCondition, ScalarValue, StepCondition } from "./expressions";
import { MatrixCombo, MatrixSpec } from "./matrix";

const Scalar = z.union([z.string(), z.number(), z.boolean()]);
const Combo = z.record(z.string(), Scalar);
const EnvSchema = z.record(z.string(), Scalar);

const UploadSchema = z
  .object({
    name: z.string().min(1),
    path: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
    "if-no-files-found": z.enum(["error", "warn", "ignore"]).optional(),
  })
  .strict();

const StepSchema = z
  .object({
    name: z.string().min(1).optional(),
    id: z.string().min(1).optional(),
    run: z.string().min(1).optional(),
    upload: UploadSchema.optional(),
    if: z.string().optional(),
    shell: z.string().min(1).optional(),
    "working-directory": z.string().min(1).optional(),
    env: EnvSchema.optional(),
    "continue-on-error": z.boolean().optional(),
    "timeout-minutes": z.number().positive().optional(),
  })
  .strict()
  .refine((s) => (s.run === undefined) !== (s.upload === undefined), {
    message: "a step needs exactly one of run or upload",
  });

const InputSchema = z
  .object({
    description: z.string().optional(),
    required: z.boolean().optional(),
    default: Scalar.optional(),
  })
  .strict();

export const PipelineFileSchema = z
  .object({
    name: z.string().min(1),
    inputs: z.record(z.string(), InputSchema).optional(),
    env: EnvSchema.optional(),
    matrix: z.record(z.string(), z.array(z.union([Scalar, Combo]))).optional(),
    defaults: z
      .object({
        shell: z.string().min(1).optional(),
        "working-directory": z.string().min(1).optional(),
        workingDirectory: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    steps: z.array(StepSchema).min(1),
  })
  .strict();

export type PipelineFile = z.infer<typeof PipelineFileSchema>;

interface StepBase {
  name: string;
  id?: string;
  condition: StepCondition;
  continueOnError: boolean;
}

export interface RunStep extends StepBase {
  kind: "run";
  run: string;
  shell: string;
  workingDirectory?: string;
  env: Record<string, string>;
  timeoutMinutes?: number;
}

export interface UploadStep extends StepBase {
  kind: "upload";
  artifact: string;
  paths: string[];
  ifNoFilesFound: "error" | "warn" | "ignore";
}

export type PipelineStep = RunStep | UploadStep;

export interface InputSpec {
  description?: string;
  required: boolean;
  default?: string;
}

export interface PipelineDefinition {
  name: string;
  inputs: Record<string, InputSpec>;
  env: Record<string, string>;
  matrix: MatrixSpec;
  defaults: { shell: string; workingDirectory?: string };
  steps: PipelineStep[];
}

export const DEFAULT_SHELL = "bash";

export function loadPipeline(file: string): PipelineDefinition {
  if (!fs.existsSync(file)) {
    throw new ConfigError(`Pipeline file not found: ${file}`);
  }
  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(file, "utf8"));
  } catch (err) {
    throw new ConfigError(`Cannot parse ${file}: ${errorMessage(err)}`);
  }
  return parsePipeline(raw, file);
}

export function parsePipeline(
  raw: unknown,
  source = "pipeline",
): PipelineDefinition {
  const result = PipelineFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid pipeline ${source}: ${formatIssues(result.error)}`,
    );
  }
  return normalizePipeline(result.data, source);
}

function normalizePipeline(
  file: PipelineFile,
  source: string,
): PipelineDefinition {
  const shell = file.defaults?.shell ?? DEFAULT_SHELL;
  const steps = file.steps.map((step, i): PipelineStep => {
    let condition: StepCondition;
    try {
      condition = parseCondition(step.if);
    } catch (err) {
      throw new ConfigError(`${source} steps.${i}: ${errorMessage(err)}`);
    }
    const common = {
      id: step.id,
      condition,
      continueOnError: step["continue-on-error"] ?? false,
    };
    if (step.upload) {
      const paths = Array.isArray(step.upload.path)
        ? step.upload.path
        : [step.upload.path];
      return {
        ...common,
        kind: "upload",
        name: step.name ?? `Upload ${step.upload.name}`,
        artifact: step.upload.name,
        paths,
        ifNoFilesFound: step.upload["if-no-files-found"] ?? "error",
      };
    }
    const run = step.run ?? "";
    return {
      ...common,
      kind: "run",
      name: step.name ?? firstLine(run),
      run,
      shell: step.shell ?? shell,
      workingDirectory: step["working-directory"],
      env: stringifyValues(step.env ?? {}),
      timeoutMinutes: step["timeout-minutes"],
    };
  });

  const inputs: Record<string, InputSpec> = {};
  for (const [name, input] of Object.entries(file.inputs ?? {})) {
    inputs[name] = {
      description: input.description,
      required: input.required ?? false,
      default: input.default === undefined ? undefined : String(input.default),
    };
  }

  return {
    name: file.name,
    inputs,
    env: stringifyValues(file.env ?? {}),
    matrix: normalizeMatrix(file.matrix ?? {}, source),
    defaults: {
      shell,
      workingDirectory:
        file.defaults?.workingDirectory ?? file.defaults?.["working-directory"],
    },
    steps,
  };
}

function normalizeMatrix(
  raw: Record<string, Array<ScalarValue | MatrixCombo>>,
  source: string,
): MatrixSpec {
  const parsed: MatrixSpec = { axes: {}, include: [], exclude: [] };
  for (const [key, values] of Object.entries(raw)) {
    if (key === "include" || key === "exclude") {
      for (const v of values) {
        if (typeof v !== "object") {
          throw new ConfigError(
            `${source} matrix.${key}: entries must be mappings`,
          );
        }
        parsed[key].push(v);
      }
      continue;
    }
    if (!values.length) {
      throw new ConfigError(`${source} matrix.${key}: needs at least one value`);
    }
    const axis: ScalarValue[] = [];
    for (const v of values) {
      if (typeof v === "object") {
        throw new ConfigError(`${source} matrix.${key}: values must be scalars`);
      }
      axis.push(v);
    }
    parsed.axes[key] = axis;
  }
  return parsed;
}

function stringifyValues(
  values: Record<string, ScalarValue>,
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(values)) out[k] = String(v);
  return out;
}

function firstLine(script: string): string {
  return script.trim().split("\n")[0];
}
