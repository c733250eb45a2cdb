import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ConfigError } from "../../types/errors";

export interface ShellInvocation {
  command: string;
  args: string[];
  /** Removes the temporary script file, if one was written. */
  cleanup(): void;
}

const BUILTIN_SHELLS: Record<string, string[]> = {
  bash: ["bash", "--noprofile", "--norc", "-eo", "pipefail", "-c"],
  sh: ["sh", "-e", "-c"],
};

/**
 * Turns a step's `shell` into a command line. `bash` and `sh` get the script
 * inline; a custom template such as `bash -el {0}` gets the path of a
 * temporary script file in place of `{0}`.
 */
export function resolveShell(shell: string, script: string): ShellInvocation {
  const builtin = BUILTIN_SHELLS[shell];
  if (builtin) {
    const [command, ...flags] = builtin;
    return { command, args: [...flags, script], cleanup() {} };
  }
  const parts = shell.trim().split(/\s+/);
  if (!parts.includes("{0}")) {
    throw new ConfigError(
      `Shell "${shell}" is neither bash nor sh and has no {0} placeholder`,
    );
  }
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "rr-step-"));
  const file = path.join(dir, "step.sh");
  fs.writeFileSync(file, script.endsWith("\n") ? script : `${script}\n`);
  const [command, ...args] = parts.map((p) => (p === "{0}" ? file : p));
  return {
    command,
    args,
    cleanup() {
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}
