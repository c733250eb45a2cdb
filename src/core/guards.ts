import { ConfigError, RaceConditionError } from "../types/errors";

export function assertNoRace(baseSha: string, currentSha: string) {
  if (baseSha !== currentSha) {
    throw new RaceConditionError(
      `Base branch advanced after the release branch was cut (${short(baseSha)} -> ${short(currentSha)})`,
    );
  }
}

export function assertBranchAbsent(exists: boolean, branch: string) {
  if (exists) {
    throw new ConfigError(`Branch ${branch} already exists`);
  }
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function short(sha: string): string {
  return sha.slice(0, 7);
}
