import { loadConfig } from "../core/config";
import { GitHubClient } from "../core/github";
import { Logger } from "../core/logger";
import { runPreflight } from "../core/preflight";

/** Prints capability gaps; resolves false when any were found. */
export async function runSetup(
  options: { config?: string; base?: string },
  logger: Logger,
): Promise<boolean> {
  const config = loadConfig({ configFile: options.config });
  const { repo, token } = config;
  const report = await runPreflight({
    repo,
    token,
    baseBranch: options.base || config.baseBranch,
    client: (r, t) =>
      new GitHubClient({ repo: r, token: t, apiUrl: config.apiUrl, logger }),
  });
  const ctx = report.context;
  logger.info(
    `repo=${ctx.repo ?? "?"} visibility=${ctx.visibility ?? "?"} default=${ctx.defaultBranch ?? "?"} push=${ctx.canPush} admin=${ctx.isAdmin}`,
  );
  if (report.gaps.length) {
    logger.info("Capability gaps:");
    for (const g of report.gaps) {
      logger.info(`- ${g.capability}: ${g.reason} -> ${g.recommendation}`);
    }
    return false;
  }
  logger.info("No capability gaps detected.");
  return true;
}
