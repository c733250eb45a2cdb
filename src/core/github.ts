import { ConfigError, GitHubApiError, PermissionError } from "../types/errors";
import { isRecord } from "./guards";
import { Logger, silentLogger } from "./logger";

export type FetchLike = typeof fetch;

export interface GitHubClientOptions {
  repo: string; // owner/repo
  token: string;
  apiUrl?: string;
  fetch?: FetchLike;
  logger?: Logger;
}

export interface RepositoryInfo {
  fullName: string;
  defaultBranch: string;
  private: boolean;
  permissions: { admin: boolean; push: boolean; pull: boolean };
}

export interface PullRequestInput {
  head: string;
  base: string;
  title: string;
  body: string;
  draft?: boolean;
}

export interface PullRequestRef {
  number: number;
  url: string;
  existing: boolean;
}

interface ApiResponse {
  status: number;
  data: unknown;
}

export class GitHubClient {
  readonly owner: string;
  readonly name: string;
  private readonly base: string;
  private readonly token: string;
  private readonly fetchFn: FetchLike;
  private readonly logger: Logger;

  constructor(opts: GitHubClientOptions) {
    const [owner, name] = opts.repo.split("/");
    if (!owner || !name) {
      throw new ConfigError(`Repository must be owner/repo, got "${opts.repo}"`);
    }
    this.owner = owner;
    this.name = name;
    this.token = opts.token;
    this.base = `${(opts.apiUrl || "https://api.github.com").replace(/\/+$/, "")}/repos/${owner}/${name}`;
    this.fetchFn = opts.fetch || ((input, init) => fetch(input, init));
    this.logger = opts.logger || silentLogger;
  }

  async getRepository(): Promise<RepositoryInfo> {
    const { data } = await this.request("GET", "");
    const d = record(data);
    const perms = record(d["permissions"]);
    return {
      fullName: str(d["full_name"]) || `${this.owner}/${this.name}`,
      defaultBranch: str(d["default_branch"]) || "main",
      private: d["private"] === true,
      permissions: {
        admin: perms["admin"] === true,
        push: perms["push"] === true,
        pull: perms["pull"] === true,
      },
    };
  }

  async branchExists(branch: string): Promise<boolean> {
    const res = await this.request(
      "GET",
      `/branches/${encodeURIComponent(branch)}`,
      undefined,
      [404],
    );
    return res.status === 200;
  }

  async findOpenPullRequest(
    head: string,
    base: string,
  ): Promise<PullRequestRef | undefined> {
    const query = new URLSearchParams({
      state: "open",
      head: `${this.owner}:${head}`,
      base,
    });
    const { data } = await this.request("GET", `/pulls?${query.toString()}`);
    if (!Array.isArray(data) || !data.length) return undefined;
    return toPullRequestRef(data[0], true);
  }

  async createPullRequest(input: PullRequestInput): Promise<PullRequestRef> {
    const { data } = await this.request("POST", "/pulls", {
      head: input.head,
      base: input.base,
      title: input.title,
      body: input.body,
      draft: input.draft ?? false,
    });
    return toPullRequestRef(data, false);
  }

  /**
   * Requests reviews. GitHub answers 422 when a login cannot review (the PR
   * author, a non-collaborator); that only warrants a warning.
   */
  async requestReviewers(pr: number, reviewers: string[]): Promise<boolean> {
    if (!reviewers.length) return true;
    const res = await this.request(
      "POST",
      `/pulls/${pr}/requested_reviewers`,
      { reviewers },
      [422],
    );
    if (res.status === 422) {
      this.logger.warn(
        `Could not request review from ${reviewers.join(", ")}: ${apiMessage(res.data)}`,
      );
      return false;
    }
    return true;
  }

  private async request(
    method: "GET" | "POST",
    path: string,
    body?: unknown,
    allowStatus: number[] = [],
  ): Promise<ApiResponse> {
    const url = `${this.base}${path}`;
    this.logger.debug(`${method} ${url}`);
    const res = await this.fetchFn(url, {
      method,
      headers: {
        Authorization: `Bearer ${this.token}`,
        Accept: "application/vnd.github+json",
        "User-Agent": "release-runner",
        ...(body === undefined ? {} : { "Content-Type": "application/json" }),
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await res.text();
    let data: unknown = null;
    if (text) {
      try {
        data = JSON.parse(text);
      } catch {
        data = text;
      }
    }
    if (res.ok || allowStatus.includes(res.status)) {
      return { status: res.status, data };
    }
    const message = `${method} ${url} failed with ${res.status}: ${apiMessage(data)}`;
    if (res.status === 401 || res.status === 403) {
      throw new PermissionError(message);
    }
    throw new GitHubApiError(message, res.status, url);
  }
}

function toPullRequestRef(data: unknown, existing: boolean): PullRequestRef {
  const d = record(data);
  if (typeof d["number"] !== "number") {
    throw new GitHubApiError("Pull request response has no number", 200, "");
  }
  return { number: d["number"], url: str(d["html_url"]) || "", existing };
}

function apiMessage(data: unknown): string {
  if (isRecord(data) && typeof data["message"] === "string") {
    return data["message"];
  }
  return typeof data === "string" ? data : "no message";
}

function record(data: unknown): Record<string, unknown> {
  return isRecord(data) ? data : {};
}

function str(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}
