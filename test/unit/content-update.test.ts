import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import { applyContentUpdate } from "../../src/core/content-update";
import { removeDir, tempDir } from "../helpers/fakes";

describe("applyContentUpdate", () => {
  const date = new Date("2024-03-05T12:00:00Z");
  let dir: string;
  let file: string;
  beforeEach(() => {
    dir = tempDir();
    file = path.join(dir, "CHANGELOG.md");
  });
  afterEach(() => removeDir(dir));

  it("does nothing without a version", async () => {
    const changed = await applyContentUpdate({
      version: undefined,
      notes: "x",
      changelogFile: file,
    });
    expect(changed).to.equal(false);
    expect(fs.existsSync(file)).to.equal(false);
  });

  it("moves Unreleased entries under the new version heading", async () => {
    fs.writeFileSync(
      file,
      "# Changelog\n\n## [Unreleased]\n\n### Added\n- thing\n\n## [1.0.0] - 2024-01-01\n",
    );
    const changed = await applyContentUpdate({
      version: "1.1.0",
      notes: "",
      changelogFile: file,
      date,
    });
    expect(changed).to.equal(true);
    expect(fs.readFileSync(file, "utf8")).to.equal(
      "# Changelog\n\n## [Unreleased]\n\n## [1.1.0] - 2024-03-05\n\n### Added\n- thing\n\n## [1.0.0] - 2024-01-01\n",
    );
  });

  it("inserts a section with notes before the first release", async () => {
    fs.writeFileSync(file, "# Changelog\n\n## [1.0.0] - 2024-01-01\n- init\n");
    await applyContentUpdate({
      version: "1.0.1",
      notes: "- fix\n",
      changelogFile: file,
      date,
    });
    expect(fs.readFileSync(file, "utf8")).to.equal(
      "# Changelog\n\n## [1.0.1] - 2024-03-05\n\n- fix\n\n## [1.0.0] - 2024-01-01\n- init\n",
    );
  });

  it("creates the changelog when missing", async () => {
    await applyContentUpdate({
      version: "0.1.0",
      notes: "first",
      changelogFile: file,
      date,
    });
    expect(fs.readFileSync(file, "utf8")).to.equal(
      "# Changelog\n\n## [0.1.0] - 2024-03-05\n\nfirst\n",
    );
  });

  it("leaves a changelog that already lists the version", async () => {
    const content = "# Changelog\n\n## [2.0.0] - 2024-02-02\n";
    fs.writeFileSync(file, content);
    const changed = await applyContentUpdate({
      version: "2.0.0",
      notes: "",
      changelogFile: file,
      date,
    });
    expect(changed).to.equal(false);
    expect(fs.readFileSync(file, "utf8")).to.equal(content);
  });
});
