import * as path from "node:path";
import { ConfigError, errorMessage } from "../types/errors";
import { applyContentUpdate } from "./content-update";
import { ReleaseConfig, renderTemplate } from "./config";
import { Git } from "./git";
import { GitHubClient, PullRequestRef } from "./github";
import { assertBranchAbsent, assertNoRace } from "./guards";
import { Logger, silentLogger } from "./logger";
import { applyVersionBump, parseVersion } from "./version";

export interface ReleaseBranchOptions {
  version: string;
  config: ReleaseConfig;
  dryRun?: boolean;
  /** Open a pull request after pushing (default true). */
  pullRequest?: boolean;
  /** Overrides config.changelog.enabled. */
  changelog?: boolean;
  reviewers?: string[];
  notes?: string;
  date?: Date;
}

export interface ReleaseBranchDeps {
  git: Git;
  github?: GitHubClient;
  logger?: Logger;
}

export interface ReleaseCommit {
  sha: string;
  message: string;
  files: string[];
}

export interface ReleaseBranchResult {
  version: string;
  branch: string;
  base: string;
  baseSha?: string;
  commits: ReleaseCommit[];
  pullRequest?: PullRequestRef;
  plan: string[];
  dryRun: boolean;
}

/**
 * Cuts `release/v<version>` from the base branch, bumps the version file,
 * pushes the branch and opens a pull request back into the base.
 */
export async function createReleaseBranch(
  opts: ReleaseBranchOptions,
  deps: ReleaseBranchDeps,
): Promise<ReleaseBranchResult> {
  const config = opts.config;
  const git = deps.git;
  const log = deps.logger || silentLogger;
  const version = parseVersion(opts.version).raw;
  const branch = `${config.branchPrefix}${version}`;
  const base = config.baseBranch;
  const remoteBase = `${git.remote}/${base}`;
  const changelog = opts.changelog ?? config.changelog.enabled;
  const openPr = opts.pullRequest !== false;
  const reviewers = opts.reviewers ?? config.pullRequest.reviewers;
  const vars = { version, base, branch, project: config.projectName };
  const title = renderTemplate(config.pullRequest.title, vars);
  const bumpMessage = `Bumping ${config.projectName} version number in ${path.basename(config.versionFile)}`;
  const changelogMessage = `Prepare release ${version}`;

  const plan = [
    `fetch ${git.remote} ${base}`,
    `git checkout -b ${branch} ${remoteBase}`,
    `git config user.name "${config.gitUser.name}"; git config user.email ${config.gitUser.email}`,
    `set version ${version} in ${config.versionFile}; commit "${bumpMessage}"`,
    ...(changelog
      ? [`promote ${config.changelog.file}; commit "${changelogMessage}"`]
      : []),
    `git push ${git.remote} ${branch}`,
    ...(openPr
      ? [
          `open pull request "${title}" (${branch} -> ${base})` +
            (reviewers.length ? `, reviewers: ${reviewers.join(", ")}` : ""),
        ]
      : []),
  ];
  const result: ReleaseBranchResult = {
    version,
    branch,
    base,
    commits: [],
    plan,
    dryRun: !!opts.dryRun,
  };

  if (opts.dryRun) {
    assertBranchAbsent(git.branchExists(branch), branch);
    for (const step of plan) log.info(`[dry-run] ${step}`);
    return result;
  }
  if (openPr && !deps.github) {
    throw new ConfigError(
      "Opening a pull request needs a repository and a token (or pass --no-pr)",
    );
  }

  git.ensureCleanWorkingTree();
  git.fetch(base);
  const baseSha = git.currentSha(remoteBase);
  result.baseSha = baseSha;
  log.info(`base ${base} at ${baseSha.slice(0, 7)}`);

  assertBranchAbsent(git.branchExists(branch), branch);
  const startRef = git.currentRef();
  git.createBranch(branch, remoteBase);
  log.info(`created branch ${branch}`);

  // everything up to the push is undone on failure
  async function prepareBranch(): Promise<void> {
    git.configureIdentity(config.gitUser);

    const bump = applyVersionBump({
      file: path.resolve(git.cwd, config.versionFile),
      version,
      pattern: config.versionPattern,
      template: config.versionTemplate,
    });
    if (!bump.changed) {
      throw new ConfigError(
        `${config.versionFile} already declares version ${version}`,
      );
    }
    log.debug(`replaced "${bump.previous ?? ""}" in ${config.versionFile}`);
    result.commits.push({
      sha: git.commitFiles(bumpMessage, [config.versionFile]),
      message: bumpMessage,
      files: [config.versionFile],
    });

    if (changelog) {
      const changed = await applyContentUpdate({
        version,
        notes: opts.notes || "",
        changelogFile: path.resolve(git.cwd, config.changelog.file),
        date: opts.date,
      });
      if (changed) {
        git.addFiles([config.changelog.file]);
        result.commits.push({
          sha: git.commitFiles(changelogMessage, [config.changelog.file]),
          message: changelogMessage,
          files: [config.changelog.file],
        });
      } else {
        log.warn(`${config.changelog.file} already lists ${version}`);
      }
    }

    const currentBase = git.remoteSha(base);
    assertNoRace(baseSha, currentBase ?? "");
    git.pushBranch(branch);
  }

  try {
    await prepareBranch();
  } catch (err) {
    restore(git, startRef, branch, log);
    throw err;
  }
  log.info(`pushed ${branch} to ${git.remote}`);

  if (!openPr || !deps.github) return result;

  const github = deps.github;
  const existing = await github.findOpenPullRequest(branch, base);
  if (existing) {
    log.warn(`pull request #${existing.number} already open for ${branch}`);
    result.pullRequest = existing;
    return result;
  }
  const pr = await github.createPullRequest({
    head: branch,
    base,
    title,
    body: renderTemplate(config.pullRequest.body, vars),
    draft: config.pullRequest.draft,
  });
  log.info(`opened pull request #${pr.number} ${pr.url}`);
  await github.requestReviewers(pr.number, reviewers);
  result.pullRequest = pr;
  return result;
}

/** Leaves the repository on the ref it started from, without the half-made branch. */
function restore(git: Git, startRef: string, branch: string, log: Logger): void {
  try {
    git.checkout(startRef, true);
    git.deleteBranch(branch);
    log.info(`removed ${branch}, back on ${startRef}`);
  } catch (err) {
    log.warn(`could not remove ${branch}: ${errorMessage(err)}`);
  }
}
