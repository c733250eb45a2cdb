import * as fs from "node:fs";

// Promotes the changelog for a release (keep-a-changelog layout)
export interface ContentUpdateInput {
  version: string | undefined;
  notes: string;
  changelogFile?: string;
  date?: Date;
}

const UNRELEASED_RE = /^## \[Unreleased\][^\n]*$/im;

export async function applyContentUpdate(
  input: ContentUpdateInput,
): Promise<boolean> {
  if (!input.version) {
    // No release scenario, skip content updates.
    return false;
  }
  const file = input.changelogFile || "CHANGELOG.md";
  const heading = `## [${input.version}] - ${isoDate(input.date ?? new Date())}`;
  const notes = input.notes.trim();

  if (!fs.existsSync(file)) {
    fs.writeFileSync(file, `# Changelog\n\n${section(heading, notes)}`);
    return true;
  }

  const current = fs.readFileSync(file, "utf8");
  if (current.includes(`## [${input.version}]`)) return false;

  let updated: string;
  const unreleased = UNRELEASED_RE.exec(current);
  if (unreleased) {
    const at = unreleased.index + unreleased[0].length;
    // entries under Unreleased now belong to the new version
    updated = `${current.slice(0, at)}\n\n${heading}${current.slice(at)}`;
  } else {
    const firstSection = current.search(/^## /m);
    updated =
      firstSection === -1
        ? `${current.replace(/\n*$/, "\n\n")}${section(heading, notes)}`
        : `${current.slice(0, firstSection)}${section(heading, notes)}\n${current.slice(firstSection)}`;
  }
  fs.writeFileSync(file, updated);
  return true;
}

function section(heading: string, notes: string): string {
  return notes ? `${heading}\n\n${notes}\n` : `${heading}\n`;
}

function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}
