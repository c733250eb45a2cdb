import { ConfigError, GitCommandError } from "../types/errors";
import { CommandRunner, spawnRunner } from "./exec";

export interface GitIdentity {
  name: string;
  email: string;
}

export interface GitOptions {
  cwd?: string;
  runner?: CommandRunner;
  remote?: string;
}

/**
 * Thin wrapper over the git CLI. Every call is synchronous and fails with
 * GitCommandError on a non-zero exit.
 */
export class Git {
  readonly cwd: string;
  readonly remote: string;
  private readonly runner: CommandRunner;

  constructor(opts: GitOptions = {}) {
    this.cwd = opts.cwd || process.cwd();
    this.remote = opts.remote || "origin";
    this.runner = opts.runner || spawnRunner;
  }

  ensureCleanWorkingTree(): void {
    const status = this.git(["status", "--porcelain"]).trim();
    if (status) {
      const files = status.split("\n").length;
      throw new ConfigError(
        `Working tree has ${files} uncommitted change(s); commit or stash them first`,
      );
    }
  }

  currentSha(ref = "HEAD"): string {
    return this.git(["rev-parse", ref]).trim();
  }

  /** Sha of `branch` on the remote, or undefined when it does not exist there. */
  remoteSha(branch: string): string | undefined {
    const out = this.git([
      "ls-remote",
      "--heads",
      this.remote,
      `refs/heads/${branch}`,
    ]).trim();
    if (!out) return undefined;
    return out.split(/\s+/)[0];
  }

  localBranchExists(branch: string): boolean {
    const res = this.runner.run(
      "git",
      ["rev-parse", "--verify", "--quiet", `refs/heads/${branch}`],
      { cwd: this.cwd },
    );
    return res.exitCode === 0;
  }

  branchExists(branch: string): boolean {
    return (
      this.localBranchExists(branch) || this.remoteSha(branch) !== undefined
    );
  }

  fetch(branch: string): void {
    this.git(["fetch", this.remote, branch]);
  }

  /** Branch name of HEAD, or its sha when HEAD is detached. */
  currentRef(): string {
    const name = this.git(["rev-parse", "--abbrev-ref", "HEAD"]).trim();
    return name && name !== "HEAD" ? name : this.currentSha();
  }

  /** `force` discards local changes to tracked files. */
  checkout(ref: string, force = false): void {
    this.git(force ? ["checkout", "--force", ref] : ["checkout", ref]);
  }

  deleteBranch(name: string): void {
    this.git(["branch", "-D", name]);
  }

  createBranch(name: string, startPoint?: string): void {
    this.git(
      startPoint
        ? ["checkout", "-b", name, startPoint]
        : ["checkout", "-b", name],
    );
  }

  configureIdentity(identity: GitIdentity): void {
    this.git(["config", "user.name", identity.name]);
    this.git(["config", "user.email", identity.email]);
  }

  addFiles(files: string[]): void {
    this.git(["add", "--", ...files]);
  }

  /** Commits the given paths only and returns the new HEAD sha. */
  commitFiles(message: string, files: string[]): string {
    this.git(["commit", "--message", message, "--", ...files]);
    return this.currentSha();
  }

  pushBranch(branch: string): void {
    this.git(["push", this.remote, branch]);
  }

  private git(args: string[]): string {
    const res = this.runner.run("git", args, { cwd: this.cwd });
    if (res.exitCode !== 0) {
      throw new GitCommandError(args, res.exitCode, res.stderr);
    }
    return res.stdout;
  }
}
