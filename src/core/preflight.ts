import { errorMessage, PermissionError } from "../types/errors";
import { FetchLike, GitHubClient } from "./github";

export interface CapabilityGap {
  capability: string;
  reason: string;
  recommendation: string;
}

export interface PreflightContext {
  repo?: string;
  visibility?: "public" | "private";
  defaultBranch?: string;
  baseBranch: string;
  baseBranchExists?: boolean;
  canPush: boolean;
  isAdmin: boolean;
}

export interface PreflightReport {
  gaps: CapabilityGap[];
  context: PreflightContext;
}

export interface PreflightOptions {
  repo?: string;
  token?: string;
  baseBranch: string;
  /** REST root for GitHub Enterprise, e.g. https://ghe.example.com/api/v3 */
  apiUrl?: string;
  fetch?: FetchLike;
  /** Builds the client; overrides apiUrl and fetch. */
  client?: (repo: string, token: string) => GitHubClient;
}

/**
 * Checks that the configured token can open a release PR on the repository:
 * repo readable, push rights, base branch present.
 */
export async function runPreflight(
  opts: PreflightOptions,
): Promise<PreflightReport> {
  const context: PreflightContext = {
    repo: opts.repo,
    baseBranch: opts.baseBranch,
    canPush: false,
    isAdmin: false,
  };
  if (!opts.repo) {
    return {
      gaps: [
        {
          capability: "repository",
          reason: "No repository configured",
          recommendation:
            "Set RR_REPO=owner/repo, GITHUB_REPOSITORY, or repo in the config file.",
        },
      ],
      context,
    };
  }
  if (!opts.token) {
    return {
      gaps: [
        {
          capability: "usable-token",
          reason: "No token env vars detected",
          recommendation: "Export GITHUB_TOKEN or GH_TOKEN before running.",
        },
      ],
      context,
    };
  }

  const client = opts.client
    ? opts.client(opts.repo, opts.token)
    : new GitHubClient({
        repo: opts.repo,
        token: opts.token,
        apiUrl: opts.apiUrl,
        fetch: opts.fetch,
      });
  const gaps: CapabilityGap[] = [];

  try {
    const repo = await client.getRepository();
    context.visibility = repo.private ? "private" : "public";
    context.defaultBranch = repo.defaultBranch;
    context.canPush = repo.permissions.push;
    context.isAdmin = repo.permissions.admin;
  } catch (err) {
    gaps.push({
      capability: "repo-read",
      reason: errorMessage(err),
      recommendation:
        err instanceof PermissionError
          ? "Provide a token with repo scope (contents: write, pull-requests: write)."
          : "Check the repository name and API URL.",
    });
    return { gaps, context };
  }

  if (!context.canPush) {
    gaps.push({
      capability: "push",
      reason: "Token has no push permission on the repository",
      recommendation: "Grant contents: write to the token.",
    });
  }

  context.baseBranchExists = await client.branchExists(opts.baseBranch);
  if (!context.baseBranchExists) {
    gaps.push({
      capability: "base-branch",
      reason: `Base branch ${opts.baseBranch} not found`,
      recommendation: `Create ${opts.baseBranch} or pass --base.`,
    });
  }
  return { gaps, context };
}
