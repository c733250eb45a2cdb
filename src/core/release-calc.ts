import { UnexpectedError, errorMessage } from "../types/errors";
import { Git } from "./git";
import { isRecord } from "./guards";

export interface ReleaseCalcResult {
  version: string | undefined;
  notes: string;
  defaultBranch: string;
  baseCommit: string;
  noRelease?: boolean;
}

export type SemanticReleaseFn = (
  options: Record<string, unknown>,
  config: { cwd: string },
) => Promise<unknown>;

export interface CalculateReleaseOptions {
  cwd?: string;
  branch?: string;
  git?: Git;
  semanticRelease?: SemanticReleaseFn;
}

/**
 * Runs semantic-release in dry-run mode to determine next release.
 * Returns noRelease=true when semantic-release reports no new version.
 */
export async function calculateRelease(
  opts: CalculateReleaseOptions = {},
): Promise<ReleaseCalcResult> {
  const cwd = opts.cwd || process.cwd();
  const branch = opts.branch || "main";
  const git = opts.git || new Git({ cwd });
  const headSha = git.currentSha();

  let srResult: unknown;
  try {
    const semanticRelease = opts.semanticRelease || loadSemanticRelease();
    srResult = await semanticRelease(
      {
        branches: [{ name: branch }],
        dryRun: true,
        ci: false,
        plugins: [
          "@semantic-release/commit-analyzer",
          "@semantic-release/release-notes-generator",
        ],
      },
      { cwd },
    );
  } catch (err) {
    throw new UnexpectedError(
      "semantic-release invocation failed: " + errorMessage(err),
    );
  }

  const nextRelease =
    isRecord(srResult) && isRecord(srResult["nextRelease"])
      ? srResult["nextRelease"]
      : undefined;
  if (!isRecord(srResult) || !nextRelease) {
    return {
      version: undefined,
      notes: "",
      defaultBranch: branch,
      baseCommit: headSha,
      noRelease: true,
    };
  }

  const srBranch: Record<string, unknown> = isRecord(srResult["branch"])
    ? srResult["branch"]
    : {};
  const lastRelease: Record<string, unknown> = isRecord(srResult["lastRelease"])
    ? srResult["lastRelease"]
    : {};
  return {
    version: optionalString(nextRelease["version"]),
    notes: optionalString(nextRelease["notes"]) || "",
    defaultBranch: optionalString(srBranch["name"]) || branch,
    baseCommit: optionalString(lastRelease["gitHead"]) || headSha,
    noRelease: false,
  };
}

function loadSemanticRelease(): SemanticReleaseFn {
  // eslint-disable-next-line @typescript-eslint/no-var-requires
  const srMod: unknown = require("semantic-release");
  const candidate =
    isRecord(srMod) && "default" in srMod ? srMod["default"] : srMod; // handle possible default export
  if (typeof candidate !== "function") {
    throw new Error("semantic-release does not export a function");
  }
  return (options, config) => Promise.resolve(candidate(options, config));
}

function optionalString(v: unknown): string | undefined {
  return typeof v === "string" && v ? v : undefined;
}
