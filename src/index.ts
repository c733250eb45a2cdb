export * from "./core/config";
export * from "./core/content-update";
export * from "./core/exec";
export * from "./core/git";
export * from "./core/github";
export * from "./core/guards";
export * from "./core/logger";
export * from "./core/preflight";
export * from "./core/release-branch";
export * from "./core/release-calc";
export * from "./core/version";
export * from "./core/pipeline/artifacts";
export * from "./core/pipeline/definition";
export * from "./core/pipeline/expressions";
export * from "./core/pipeline/matrix";
export * from "./core/pipeline/runner";
export * from "./core/pipeline/shell";
export * from "./types/errors";
