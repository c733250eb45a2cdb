import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import {
  applyVersionBump,
  parseVersion,
  readCurrentVersion,
  releaseBranchName,
} from "../../src/core/version";
import { ConfigError, VersionError } from "../../src/types/errors";
import { removeDir, tempDir } from "../helpers/fakes";

describe("parseVersion", () => {
  it("parses a plain release version", () => {
    const v = parseVersion("5.5.0");
    expect(v).to.deep.equal({
      raw: "5.5.0",
      major: 5,
      minor: 5,
      patch: 0,
      prerelease: undefined,
    });
  });

  it("strips a leading v", () => {
    expect(parseVersion("v1.2.3").raw).to.equal("1.2.3");
  });

  it("accepts semver and PEP 440 pre-release tails", () => {
    expect(parseVersion("1.0.0-rc.1").prerelease).to.equal("rc.1");
    expect(parseVersion("0.3.4rc1").prerelease).to.equal("rc1");
    expect(parseVersion("0.3.4.dev0").prerelease).to.equal(".dev0");
  });

  it("rejects empty, padded and malformed versions", () => {
    expect(() => parseVersion("")).to.throw(VersionError, "must not be empty");
    expect(() => parseVersion(" 1.2.3")).to.throw(VersionError, "whitespace");
    expect(() => parseVersion("1.2")).to.throw(VersionError, "not a version");
    expect(() => parseVersion("1.2.3 ; rm -rf")).to.throw(VersionError);
    expect(() => parseVersion("1.2.3-rc..1")).to.throw(
      VersionError,
      "cannot be used in a branch name",
    );
  });
});

describe("releaseBranchName", () => {
  it("prefixes the version", () => {
    expect(releaseBranchName("5.5.0")).to.equal("release/v5.5.0");
    expect(releaseBranchName("v2.0.0", "rel-")).to.equal("rel-2.0.0");
  });
});

describe("applyVersionBump", () => {
  let dir: string;
  beforeEach(() => {
    dir = tempDir();
  });
  afterEach(() => removeDir(dir));

  it("replaces the __version__ line", () => {
    const file = path.join(dir, "_version.py");
    fs.writeFileSync(file, '"""Version"""\n__version__ = "0.3.3"\n');
    const res = applyVersionBump({ file, version: "0.3.4" });
    expect(res).to.deep.equal({
      file,
      changed: true,
      previous: '__version__ = "0.3.3"',
    });
    expect(fs.readFileSync(file, "utf8")).to.equal(
      '"""Version"""\n__version__ = "0.3.4"\n',
    );
  });

  it("writes dollar signs in the template literally", () => {
    const file = path.join(dir, "_version.py");
    fs.writeFileSync(file, '__version__ = "0.3.3"\n');
    applyVersionBump({
      file,
      version: "0.3.4",
      template: '__version__ = "{version}"  # $& $1',
    });
    expect(fs.readFileSync(file, "utf8")).to.equal(
      '__version__ = "0.3.4"  # $& $1\n',
    );
  });

  it("reports no change when the version is already set", () => {
    const file = path.join(dir, "_version.py");
    fs.writeFileSync(file, '__version__ = "0.3.4"\n');
    const res = applyVersionBump({ file, version: "0.3.4" });
    expect(res.changed).to.equal(false);
  });

  it("fails when no line matches", () => {
    const file = path.join(dir, "_version.py");
    fs.writeFileSync(file, "VERSION = 1\n");
    expect(() => applyVersionBump({ file, version: "1.0.0" })).to.throw(
      ConfigError,
      "nothing to bump",
    );
  });

  it("fails when the file is missing", () => {
    expect(() =>
      applyVersionBump({ file: path.join(dir, "nope.py"), version: "1.0.0" }),
    ).to.throw(ConfigError, "Version file not found");
  });

  it("uses a custom pattern and template", () => {
    const file = path.join(dir, "version.txt");
    fs.writeFileSync(file, "name: demo\nversion: 1.0.0\n");
    applyVersionBump({
      file,
      version: "1.1.0",
      pattern: "^version: .*$",
      template: "version: {version}",
    });
    expect(fs.readFileSync(file, "utf8")).to.equal(
      "name: demo\nversion: 1.1.0\n",
    );
  });

  it("rewrites the version field of a JSON manifest", () => {
    const file = path.join(dir, "package.json");
    fs.writeFileSync(file, '{"name":"demo","version":"1.0.0"}');
    const res = applyVersionBump({ file, version: "2.0.0" });
    expect(res.previous).to.equal("1.0.0");
    expect(fs.readFileSync(file, "utf8")).to.equal(
      '{\n  "name": "demo",\n  "version": "2.0.0"\n}\n',
    );
  });
});

describe("readCurrentVersion", () => {
  let dir: string;
  beforeEach(() => {
    dir = tempDir();
  });
  afterEach(() => removeDir(dir));

  it("extracts the quoted version", () => {
    const file = path.join(dir, "_version.py");
    fs.writeFileSync(file, "__version__ = '0.9.1'\n");
    expect(readCurrentVersion(file)).to.equal("0.9.1");
  });

  it("returns undefined for a missing file", () => {
    expect(readCurrentVersion(path.join(dir, "missing.py"))).to.equal(
      undefined,
    );
  });
});
