import * as fs from "node:fs";
import * as path from "node:path";
import { ConfigError } from "../../types/errors";

export interface ArtifactUpload {
  name: string;
  paths: string[];
  /** Paths are resolved against this directory. */
  workspace: string;
  artifactsDir: string;
  job: string;
}

export interface ArtifactRecord {
  name: string;
  job: string;
  files: string[];
  uploadedAt: string;
}

export interface UploadResult {
  files: string[];
  missing: string[];
}

export const MANIFEST_FILE = "manifest.json";

/**
 * Copies the given files or directories into `<artifactsDir>/<name>/` and
 * records them in the manifest. Missing paths are reported, not thrown. A
 * name belongs to the first job that uploads it; the same job uploading again
 * replaces its earlier files.
 */
export function uploadArtifact(upload: ArtifactUpload): UploadResult {
  const owner = readManifest(upload.artifactsDir).find(
    (r) => r.name === upload.name && r.job !== upload.job,
  );
  if (owner) {
    throw new ConfigError(
      `artifact "${upload.name}" was already uploaded by job "${owner.job}"`,
    );
  }
  const dest = path.join(upload.artifactsDir, upload.name);
  const files: string[] = [];
  const missing: string[] = [];
  for (const p of upload.paths) {
    const src = path.resolve(upload.workspace, p);
    if (!fs.existsSync(src)) {
      missing.push(p);
      continue;
    }
    fs.mkdirSync(dest, { recursive: true });
    const target = path.join(dest, path.basename(src));
    fs.cpSync(src, target, { recursive: true });
    files.push(path.relative(upload.artifactsDir, target));
  }
  if (files.length) {
    appendManifest(upload.artifactsDir, {
      name: upload.name,
      job: upload.job,
      files,
      uploadedAt: new Date().toISOString(),
    });
  }
  return { files, missing };
}

export function readManifest(artifactsDir: string): ArtifactRecord[] {
  const file = path.join(artifactsDir, MANIFEST_FILE);
  if (!fs.existsSync(file)) return [];
  const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  return Array.isArray(parsed) ? parsed.filter(isArtifactRecord) : [];
}

function appendManifest(artifactsDir: string, record: ArtifactRecord): void {
  const records = readManifest(artifactsDir).filter(
    (r) => r.name !== record.name,
  );
  records.push(record);
  fs.writeFileSync(
    path.join(artifactsDir, MANIFEST_FILE),
    JSON.stringify(records, null, 2) + "\n",
  );
}

function isArtifactRecord(v: unknown): v is ArtifactRecord {
  return (
    typeof v === "object" &&
    v !== null &&
    "name" in v &&
    typeof v.name === "string" &&
    "job" in v &&
    typeof v.job === "string" &&
    "files" in v &&
    Array.isArray(v.files)
  );
}
