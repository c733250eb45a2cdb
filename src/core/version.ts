import * as fs from "node:fs";
import * as path from "node:path";
import { ConfigError, VersionError, errorMessage } from "../types/errors";
import { isRecord } from "./guards";

export const DEFAULT_VERSION_PATTERN = "^__version__ = .*$";
export const DEFAULT_VERSION_TEMPLATE = '__version__ = "{version}"';

// MAJOR.MINOR.PATCH plus an optional semver (-rc.1) or PEP 440 (rc1, .dev0) tail
const VERSION_RE =
  /^(\d+)\.(\d+)\.(\d+)((?:-[0-9A-Za-z.]+)|(?:(?:a|b|rc)\d+)?(?:\.post\d+)?(?:\.dev\d+)?)$/;

export interface ParsedVersion {
  raw: string;
  major: number;
  minor: number;
  patch: number;
  prerelease?: string;
}

export function parseVersion(input: string): ParsedVersion {
  const trimmed = input.trim();
  if (!trimmed) throw new VersionError("Version must not be empty");
  if (trimmed !== input) {
    throw new VersionError(`Version "${input}" has surrounding whitespace`);
  }
  const raw = trimmed.startsWith("v") ? trimmed.slice(1) : trimmed;
  const m = VERSION_RE.exec(raw);
  if (!m) {
    throw new VersionError(
      `"${input}" is not a version (expected MAJOR.MINOR.PATCH, e.g. 5.5.0)`,
    );
  }
  if (raw.includes("..") || raw.endsWith(".")) {
    throw new VersionError(`"${input}" cannot be used in a branch name`);
  }
  return {
    raw,
    major: Number(m[1]),
    minor: Number(m[2]),
    patch: Number(m[3]),
    prerelease: m[4] ? m[4].replace(/^-/, "") : undefined,
  };
}

export function releaseBranchName(version: string, prefix = "release/v"): string {
  return `${prefix}${parseVersion(version).raw}`;
}

export interface VersionBumpInput {
  file: string;
  version: string;
  pattern?: string;
  template?: string;
}

export interface VersionBumpResult {
  file: string;
  changed: boolean;
  previous?: string;
}

/**
 * Rewrites the version declaration in `file`. JSON manifests get their
 * `version` field replaced; any other file has every line matching `pattern`
 * replaced by `template`.
 */
export function applyVersionBump(input: VersionBumpInput): VersionBumpResult {
  const version = parseVersion(input.version).raw;
  if (!fs.existsSync(input.file)) {
    throw new ConfigError(`Version file not found: ${input.file}`);
  }
  const original = fs.readFileSync(input.file, "utf8");
  if (path.extname(input.file) === ".json") {
    return bumpJsonManifest(input.file, original, version);
  }

  const re = compilePattern(input.pattern ?? DEFAULT_VERSION_PATTERN);
  const replacement = (input.template ?? DEFAULT_VERSION_TEMPLATE).replace(
    /\{version\}/g,
    version,
  );
  const matches = original.match(re);
  if (!matches || !matches.length) {
    throw new ConfigError(
      `No line in ${input.file} matches /${re.source}/; nothing to bump`,
    );
  }
  const updated = original.replace(re, () => replacement);
  if (updated === original) {
    return { file: input.file, changed: false, previous: matches[0] };
  }
  fs.writeFileSync(input.file, updated);
  return { file: input.file, changed: true, previous: matches[0] };
}

export function readCurrentVersion(
  file: string,
  pattern: string = DEFAULT_VERSION_PATTERN,
): string | undefined {
  if (!fs.existsSync(file)) return undefined;
  const content = fs.readFileSync(file, "utf8");
  if (path.extname(file) === ".json") {
    const json: unknown = JSON.parse(content);
    return isRecord(json) && typeof json["version"] === "string"
      ? json["version"]
      : undefined;
  }
  const line = content.match(compilePattern(pattern))?.[0];
  if (!line) return undefined;
  return /["']([^"']+)["']/.exec(line)?.[1];
}

function bumpJsonManifest(
  file: string,
  original: string,
  version: string,
): VersionBumpResult {
  const json: unknown = JSON.parse(original);
  if (!isRecord(json) || typeof json["version"] !== "string") {
    throw new ConfigError(`${file} has no "version" field`);
  }
  const previous = json["version"];
  if (previous === version) return { file, changed: false, previous };
  json["version"] = version;
  fs.writeFileSync(file, JSON.stringify(json, null, 2) + "\n");
  return { file, changed: true, previous };
}

function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern, "gm");
  } catch (err) {
    throw new ConfigError(
      `Invalid version pattern /${pattern}/: ${errorMessage(err)}`,
    );
  }
}
