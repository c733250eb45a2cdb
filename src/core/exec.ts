import { spawnSync } from "node:child_process";

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  /** Forward child output to this process instead of capturing it. */
  stream?: boolean;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandRunner {
  run(command: string, args: string[], opts?: CommandOptions): CommandResult;
}

export const spawnRunner: CommandRunner = {
  run(command, args, opts = {}) {
    const res = spawnSync(command, args, {
      cwd: opts.cwd,
      env: opts.env,
      timeout: opts.timeoutMs,
      encoding: "utf8",
      stdio: opts.stream ? "inherit" : ["ignore", "pipe", "pipe"],
    });
    const timedOut =
      res.error !== undefined &&
      "code" in res.error &&
      res.error.code === "ETIMEDOUT";
    let stderr = res.stderr ?? "";
    if (res.error && !timedOut) {
      stderr = stderr ? `${stderr}\n${res.error.message}` : res.error.message;
    }
    return {
      exitCode: res.status,
      stdout: res.stdout ?? "",
      stderr,
      timedOut,
    };
  },
};
