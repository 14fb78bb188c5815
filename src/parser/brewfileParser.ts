import type { PackageKind, PackageRef, ParsedBrewfile } from "../types.js";

const ENTRY_RE = /^(brew|cask)\s+"([^"]+)"(?:\s*,\s*.+)?$/;
const SKIPPED_RE = /^(tap|mas|vscode|whalebrew)\s+"([^"]+)"/;

/**
 * Reads the formulae and casks of a Brewfile in file order. Taps and other
 * entry types cannot be installed through a package batch and are listed in
 * `skipped`; unreadable lines are reported in `errors`.
 */
export function parseBrewfile(content: string): ParsedBrewfile {
  const lines = content.split(/\r?\n/);
  const refs: PackageRef[] = [];
  const skipped: string[] = [];
  const errors: string[] = [];
  const seen = new Set<string>();

  for (let i = 0; i < lines.length; i += 1) {
    const line = stripComment(lines[i] ?? "").trim();

    if (!line) {
      continue;
    }

    const entry = line.match(ENTRY_RE);
    if (entry) {
      const ref: PackageRef = { name: entry[2], kind: kindOf(entry[1]) };
      const key = `${ref.kind}:${ref.name}`;
      if (!seen.has(key)) {
        seen.add(key);
        refs.push(ref);
      }
      continue;
    }

    const other = line.match(SKIPPED_RE);
    if (other) {
      skipped.push(`${other[1]} ${other[2]}`);
      continue;
    }

    errors.push(`Line ${i + 1}: Unsupported or malformed line`);
  }

  return { refs, skipped, errors };
}

function kindOf(keyword: string): PackageKind {
  return keyword === "cask" ? "cask" : "formula";
}

function stripComment(line: string): string {
  const trimmed = line.trimStart();
  return trimmed.startsWith("#") ? "" : line;
}
