/**
 * Configuration for release-runner: defaults, optional config file in the
 * working directory, environment variables, then CLI overrides.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "../types/errors";
import { DEFAULT_VERSION_PATTERN, DEFAULT_VERSION_TEMPLATE } from "./version";

export const DEFAULT_PR_BODY = [
  'This PR was created in response to the "create release branch" run.',
  "It automatically updated the version number.",
  "Don't forget to update the CHANGELOG, and then merge back {base} into develop after this PR goes through.",
  "For the review, only version bumping files are of interest, and making sure tests are passing.",
  "Afterwards, creating a release on GitHub or on the package index can be done.",
].join("\n");

const GitUserSchema = z.object({
  name: z.string().min(1),
  email: z.string().min(1),
});

export const ConfigFileSchema = z
  .object({
    repo: z
      .string()
      .regex(/^[^/\s]+\/[^/\s]+$/, "repo must be owner/repo")
      .optional(),
    baseBranch: z.string().min(1).optional(),
    branchPrefix: z.string().min(1).optional(),
    remote: z.string().min(1).optional(),
    projectName: z.string().min(1).optional(),
    versionFile: z.string().min(1).optional(),
    versionPattern: z.string().min(1).optional(),
    versionTemplate: z
      .string()
      .includes("{version}", { message: "versionTemplate needs {version}" })
      .optional(),
    gitUser: GitUserSchema.optional(),
    pullRequest: z
      .object({
        title: z.string().min(1).optional(),
        body: z.string().optional(),
        reviewers: z.array(z.string().min(1)).optional(),
        draft: z.boolean().optional(),
      })
      .strict()
      .optional(),
    changelog: z
      .object({
        enabled: z.boolean().optional(),
        file: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface ReleaseConfig {
  repo?: string;
  token?: string;
  apiUrl: string;
  baseBranch: string;
  branchPrefix: string;
  remote: string;
  projectName: string;
  versionFile: string;
  versionPattern: string;
  versionTemplate: string;
  gitUser: { name: string; email: string };
  pullRequest: {
    title: string;
    body: string;
    reviewers: string[];
    draft: boolean;
  };
  changelog: { enabled: boolean; file: string };
}

export const DEFAULT_CONFIG: ReleaseConfig = {
  apiUrl: "https://api.github.com",
  baseBranch: "main",
  branchPrefix: "release/v",
  remote: "origin",
  projectName: "project",
  versionFile: "_version.py",
  versionPattern: DEFAULT_VERSION_PATTERN,
  versionTemplate: DEFAULT_VERSION_TEMPLATE,
  gitUser: { name: "GitHub Actions", email: "noreply@github.com" },
  pullRequest: {
    title: "New release v{version} into {base}",
    body: DEFAULT_PR_BODY,
    reviewers: [],
    draft: false,
  },
  changelog: { enabled: false, file: "CHANGELOG.md" },
};

export const CONFIG_FILE_NAMES = [
  "release-runner.config.yaml",
  "release-runner.config.yml",
  "release-runner.config.json",
  ".release-runnerrc",
];

export interface LoadConfigOptions {
  cwd?: string;
  configFile?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(opts: LoadConfigOptions = {}): ReleaseConfig {
  const cwd = opts.cwd || process.cwd();
  const env = opts.env || process.env;
  const file = opts.configFile
    ? path.resolve(cwd, opts.configFile)
    : CONFIG_FILE_NAMES.map((f) => path.join(cwd, f)).find((f) =>
        fs.existsSync(f),
      );
  if (opts.configFile && file && !fs.existsSync(file)) {
    throw new ConfigError(`Config file not found: ${file}`);
  }
  const fromFile = file ? readConfigFile(file) : {};
  return applyEnv(mergeConfig(DEFAULT_CONFIG, fromFile), env);
}

export function readConfigFile(file: string): ConfigFile {
  const content = fs.readFileSync(file, "utf8");
  let raw: unknown;
  try {
    raw = file.endsWith(".json") ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new ConfigError(`Cannot parse ${file}: ${errorMessage(err)}`);
  }
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config in ${file}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function mergeConfig(
  base: ReleaseConfig,
  override: ConfigFile,
): ReleaseConfig {
  return {
    ...base,
    repo: override.repo ?? base.repo,
    baseBranch: override.baseBranch ?? base.baseBranch,
    branchPrefix: override.branchPrefix ?? base.branchPrefix,
    remote: override.remote ?? base.remote,
    projectName: override.projectName ?? base.projectName,
    versionFile: override.versionFile ?? base.versionFile,
    versionPattern: override.versionPattern ?? base.versionPattern,
    versionTemplate: override.versionTemplate ?? base.versionTemplate,
    gitUser: override.gitUser ?? base.gitUser,
    pullRequest: {
      title: override.pullRequest?.title ?? base.pullRequest.title,
      body: override.pullRequest?.body ?? base.pullRequest.body,
      reviewers: override.pullRequest?.reviewers ?? base.pullRequest.reviewers,
      draft: override.pullRequest?.draft ?? base.pullRequest.draft,
    },
    changelog: {
      enabled: override.changelog?.enabled ?? base.changelog.enabled,
      file: override.changelog?.file ?? base.changelog.file,
    },
  };
}

function applyEnv(config: ReleaseConfig, env: NodeJS.ProcessEnv): ReleaseConfig {
  return {
    ...config,
    repo: env["RR_REPO"] || config.repo || env["GITHUB_REPOSITORY"],
    token: env["GITHUB_TOKEN"] || env["GH_TOKEN"] || config.token,
    apiUrl: env["GITHUB_API_URL"] || config.apiUrl,
    changelog: {
      ...config.changelog,
      file: env["CHANGELOG_FILE"] || config.changelog.file,
    },
  };
}

/** Fills `{name}` placeholders; unknown names are left as they are. */
export function renderTemplate(
  template: string,
  values: Record<string, string>,
): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : whole,
  );
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`)
    .join("; ");
}
