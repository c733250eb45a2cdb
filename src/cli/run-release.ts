import { ConfigError, PermissionError } from "../types/errors";
import { loadConfig, ReleaseConfig } from "../core/config";
import { Git } from "../core/git";
import { GitHubClient } from "../core/github";
import { Logger } from "../core/logger";
import { runPreflight } from "../core/preflight";
import { createReleaseBranch } from "../core/release-branch";
import { calculateRelease } from "../core/release-calc";

export interface CutOptions {
  config?: string;
  base?: string;
  auto?: boolean;
  dryRun?: boolean;
  pr: boolean;
  reviewer?: string[];
  changelog?: boolean;
  skipPreflight?: boolean;
}

export async function runRelease(
  versionArg: string | undefined,
  options: CutOptions,
  logger: Logger,
): Promise<void> {
  const loaded = loadConfig({ configFile: options.config });
  const config: ReleaseConfig = options.base
    ? { ...loaded, baseBranch: options.base }
    : loaded;
  const git = new Git({ remote: config.remote });

  let version = versionArg;
  let notes = "";
  if (!version) {
    if (!options.auto) {
      throw new ConfigError("A version is required (e.g. 5.5.0), or pass --auto");
    }
    const calc = await calculateRelease({ branch: config.baseBranch, git });
    if (calc.noRelease || !calc.version) {
      logger.info("no release required");
      return;
    }
    version = calc.version;
    notes = calc.notes;
    logger.info(`next version ${version}`);
  }

  const github =
    config.repo && config.token
      ? new GitHubClient({
          repo: config.repo,
          token: config.token,
          apiUrl: config.apiUrl,
          logger,
        })
      : undefined;

  if (options.pr && !options.dryRun && !options.skipPreflight) {
    const report = await runPreflight({
      repo: config.repo,
      token: config.token,
      baseBranch: config.baseBranch,
      apiUrl: config.apiUrl,
      client: github ? () => github : undefined,
    });
    if (report.gaps.length) {
      for (const g of report.gaps) {
        logger.error(`${g.capability}: ${g.reason} -> ${g.recommendation}`);
      }
      throw new PermissionError(
        "Preflight failed: " + report.gaps.map((g) => g.capability).join(", "),
      );
    }
  }

  const result = await createReleaseBranch(
    {
      version,
      config,
      dryRun: options.dryRun,
      pullRequest: options.pr,
      changelog: options.changelog,
      reviewers: options.reviewer,
      notes,
    },
    { git, github, logger },
  );
  if (result.dryRun) return;
  const pr = result.pullRequest
    ? ` pr=#${result.pullRequest.number}`
    : "";
  logger.info(
    `release branch ready branch=${result.branch} version=${result.version}${pr}`,
  );
}
