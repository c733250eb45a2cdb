import { ConfigError } from "../../types/errors";

export type StepCondition = "success" | "always" | "failure";

export type ScalarValue = string | number | boolean;

export interface ExpressionContext {
  matrix: Record<string, ScalarValue>;
  env: Record<string, string>;
  inputs: Record<string, string>;
}

const EXPR_RE = /\$\{\{\s*([^}]*?)\s*\}\}/g;

/** Replaces every `${{ scope.key }}` in `text` with its value. */
export function interpolate(text: string, ctx: ExpressionContext): string {
  return text.replace(EXPR_RE, (_whole, expr: string) =>
    String(resolvePath(expr, ctx)),
  );
}

export function interpolateRecord(
  values: Record<string, string>,
  ctx: ExpressionContext,
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(values)) out[k] = interpolate(v, ctx);
  return out;
}

function resolvePath(expr: string, ctx: ExpressionContext): ScalarValue {
  const dot = expr.indexOf(".");
  const scope = dot === -1 ? expr : expr.slice(0, dot);
  const key = dot === -1 ? "" : expr.slice(dot + 1);
  if (!key) {
    throw new ConfigError(`Unsupported expression "\${{ ${expr} }}"`);
  }
  let source: Record<string, ScalarValue>;
  switch (scope) {
    case "matrix":
      source = ctx.matrix;
      break;
    case "env":
      source = ctx.env;
      break;
    case "inputs":
      source = ctx.inputs;
      break;
    default:
      return resolveEventInput(expr, ctx);
  }
  if (!Object.prototype.hasOwnProperty.call(source, key)) {
    throw new ConfigError(`Unknown ${scope} value "${key}" in \${{ ${expr} }}`);
  }
  return source[key];
}

// github.event.inputs.<name> is the dispatch-event spelling of inputs.<name>
function resolveEventInput(expr: string, ctx: ExpressionContext): ScalarValue {
  const prefix = "github.event.inputs.";
  if (!expr.startsWith(prefix)) {
    throw new ConfigError(`Unsupported expression "\${{ ${expr} }}"`);
  }
  return resolvePath(`inputs.${expr.slice(prefix.length)}`, ctx);
}

/**
 * Step `if:` values. Only the status functions are understood; anything else
 * is rejected when the pipeline is loaded.
 */
export function parseCondition(raw: string | undefined): StepCondition {
  if (raw === undefined) return "success";
  const m = /^\s*(?:\$\{\{\s*)?(success|always|failure)\(\s*\)(?:\s*\}\})?\s*$/.exec(
    raw,
  );
  if (!m) {
    throw new ConfigError(
      `Unsupported condition "${raw}" (use success(), always() or failure())`,
    );
  }
  switch (m[1]) {
    case "always":
      return "always";
    case "failure":
      return "failure";
    default:
      return "success";
  }
}

export function shouldRun(condition: StepCondition, jobFailed: boolean): boolean {
  switch (condition) {
    case "always":
      return true;
    case "failure":
      return jobFailed;
    case "success":
      return !jobFailed;
  }
}
