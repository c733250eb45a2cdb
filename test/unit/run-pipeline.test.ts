import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import { parseInputs, runPipelineCommand } from "../../src/cli/run-pipeline";
import { MemoryLogger } from "../../src/core/logger";
import { ConfigError, StepFailedError } from "../../src/types/errors";
import { FakeRunner, removeDir, tempDir } from "../helpers/fakes";

describe("parseInputs", () => {
  it("splits name=value pairs on the first equals sign", () => {
    expect(parseInputs(["versionName=5.5.0", "flags=a=b"])).to.deep.equal({
      versionName: "5.5.0",
      flags: "a=b",
    });
  });

  it("rejects pairs without a name", () => {
    expect(() => parseInputs(["=1"])).to.throw(ConfigError, "name=value");
    expect(() => parseInputs(["novalue"])).to.throw(ConfigError);
  });
});

describe("runPipelineCommand", () => {
  let dir: string;
  let file: string;
  beforeEach(() => {
    dir = tempDir();
    file = path.join(dir, "build.yml");
    fs.writeFileSync(
      file,
      [
        "name: build",
        "steps:",
        "  - name: compile",
        "    run: make",
        "  - name: package",
        "    run: make dist",
        "",
      ].join("\n"),
    );
  });
  afterEach(() => removeDir(dir));

  it("summarizes a passing run", async () => {
    const logger = new MemoryLogger();
    await runPipelineCommand(
      file,
      { input: [], cwd: dir, capture: true },
      logger,
      new FakeRunner(),
    );
    expect(logger.messages("info")).to.include(
      "build: success (2 steps, 0 failed, 0 skipped)",
    );
  });

  it("throws StepFailedError naming the failing step", async () => {
    const runner = new FakeRunner((_cmd, args) =>
      args[args.length - 1] === "make"
        ? { exitCode: 2, stderr: "missing rule\n" }
        : undefined,
    );
    const logger = new MemoryLogger();
    try {
      await runPipelineCommand(file, { input: [], cwd: dir, capture: true }, logger, runner);
      expect.fail("expected the run to fail");
    } catch (err) {
      if (!(err instanceof StepFailedError)) throw err;
      expect(err.step).to.equal("compile");
      expect(err.message).to.equal(
        'build: step "compile" failed: exited with 2: missing rule',
      );
    }
    expect(logger.messages("info")).to.include(
      "build: failure (2 steps, 1 failed, 1 skipped)",
    );
  });
});
