import { expect } from "chai";
import { Git } from "../../src/core/git";
import { ConfigError, GitCommandError } from "../../src/types/errors";
import { FakeRunner } from "../helpers/fakes";

describe("Git", () => {
  it("runs git in the configured directory", () => {
    const runner = new FakeRunner(() => ({ stdout: "abc123\n" }));
    const git = new Git({ cwd: "/work", runner });
    expect(git.currentSha()).to.equal("abc123");
    expect(runner.calls[0]).to.deep.equal({
      command: "git",
      args: ["rev-parse", "HEAD"],
      opts: { cwd: "/work" },
    });
  });

  it("rejects a dirty working tree", () => {
    const runner = new FakeRunner(() => ({ stdout: " M a.py\n?? b.py\n" }));
    const git = new Git({ runner });
    expect(() => git.ensureCleanWorkingTree()).to.throw(
      ConfigError,
      "Working tree has 2 uncommitted change(s)",
    );
  });

  it("accepts a clean working tree", () => {
    const git = new Git({ runner: new FakeRunner() });
    expect(() => git.ensureCleanWorkingTree()).not.to.throw();
  });

  it("raises GitCommandError with stderr on failure", () => {
    const runner = new FakeRunner(() => ({
      exitCode: 128,
      stderr: "fatal: not a git repository\n",
    }));
    const git = new Git({ runner });
    try {
      git.pushBranch("release/v1.0.0");
      expect.fail("expected push to throw");
    } catch (err) {
      if (!(err instanceof GitCommandError)) throw err;
      expect(err.exitCode).to.equal(128);
      expect(err.message).to.equal(
        "git push origin release/v1.0.0 exited with 128: fatal: not a git repository",
      );
    }
  });

  it("reads the remote sha from ls-remote", () => {
    const runner = new FakeRunner(() => ({
      stdout: "deadbeef\trefs/heads/main\n",
    }));
    const git = new Git({ runner, remote: "upstream" });
    expect(git.remoteSha("main")).to.equal("deadbeef");
    expect(runner.gitCommands()).to.deep.equal([
      "ls-remote --heads upstream refs/heads/main",
    ]);
  });

  it("treats empty ls-remote output as a missing branch", () => {
    const git = new Git({ runner: new FakeRunner() });
    expect(git.remoteSha("release/v9.9.9")).to.equal(undefined);
  });

  it("checks local then remote branches", () => {
    const runner = new FakeRunner((_cmd, args) =>
      args[0] === "rev-parse" ? { exitCode: 1 } : { stdout: "" },
    );
    const git = new Git({ runner });
    expect(git.branchExists("release/v1.0.0")).to.equal(false);
    expect(runner.gitCommands()).to.deep.equal([
      "rev-parse --verify --quiet refs/heads/release/v1.0.0",
      "ls-remote --heads origin refs/heads/release/v1.0.0",
    ]);
  });

  it("commits only the named files and returns the new sha", () => {
    const runner = new FakeRunner((_cmd, args) =>
      args[0] === "rev-parse" ? { stdout: "f00d\n" } : undefined,
    );
    const git = new Git({ runner });
    const sha = git.commitFiles("Bump", ["pkg/_version.py"]);
    expect(sha).to.equal("f00d");
    expect(runner.gitCommands()).to.deep.equal([
      "commit --message Bump -- pkg/_version.py",
      "rev-parse HEAD",
    ]);
  });

  it("sets the commit identity", () => {
    const runner = new FakeRunner();
    new Git({ runner }).configureIdentity({
      name: "GitHub Actions",
      email: "noreply@github.com",
    });
    expect(runner.calls.map((c) => c.args)).to.deep.equal([
      ["config", "user.name", "GitHub Actions"],
      ["config", "user.email", "noreply@github.com"],
    ]);
  });
});
