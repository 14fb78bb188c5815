import { BrewCommandError } from "../errors.js";
import type {
  CacheInfo,
  CleanupItem,
  CleanupPreview,
  ManagedService,
  Package,
  PackageKind,
  ServiceStatus
} from "../types.js";

export function parseInstalledJson(output: string, pinned: ReadonlySet<string> = new Set()): Package[] {
  const data = parseJson(output, "brew info --installed");
  const packages: Package[] = [];

  for (const formula of records(data.formulae)) {
    const name = stringValue(formula.name);
    if (!name) {
      continue;
    }
    const installed = firstRecord(formula.installed);
    packages.push({
      ...emptyPackage(name, "formula"),
      installed: true,
      version: stringValue(installed?.version),
      description: stringValue(formula.desc),
      pinned: pinned.has(name) || formula.pinned === true
    });
  }

  for (const cask of records(data.casks)) {
    const name = stringValue(cask.token) ?? stringValue(cask.name);
    if (!name) {
      continue;
    }
    packages.push({
      ...emptyPackage(name, "cask"),
      installed: true,
      version: stringValue(cask.installed) ?? firstString(cask.installed),
      description: stringValue(cask.desc)
    });
  }

  return packages;
}

export function parseOutdatedJson(output: string): Package[] {
  const data = parseJson(output, "brew outdated");
  const packages: Package[] = [];

  const sections: Array<[unknown, PackageKind]> = [
    [data.formulae, "formula"],
    [data.casks, "cask"]
  ];

  for (const [section, kind] of sections) {
    for (const entry of records(section)) {
      const name = stringValue(entry.name);
      if (!name) {
        continue;
      }
      packages.push({
        ...emptyPackage(name, kind),
        installed: true,
        outdated: true,
        version: firstString(entry.installed_versions),
        availableVersion: stringValue(entry.current_version),
        pinned: entry.pinned === true
      });
    }
  }

  return packages;
}

export function parseInfoJson(output: string, name: string, kind: PackageKind): Package {
  const data = parseJson(output, `brew info ${name}`);
  const item = firstRecord(kind === "formula" ? data.formulae : data.casks);
  if (!item) {
    throw new BrewCommandError({ code: "notFound", message: `Package info not found for ${name}` });
  }

  const versions = toRecord(item.versions);
  const installed = kind === "formula" ? firstRecord(item.installed) : undefined;
  const installedVersion =
    kind === "formula" ? stringValue(installed?.version) : stringValue(item.installed);

  return {
    ...emptyPackage(name, kind),
    version: stringValue(versions?.stable) ?? stringValue(item.version),
    description: stringValue(item.desc),
    installed: installedVersion !== undefined,
    outdated: item.outdated === true,
    pinned: item.pinned === true
  };
}

export function parseSearchOutput(output: string, kind: PackageKind): Package[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("==>"))
    .map((name) => emptyPackage(name, kind));
}

export function parsePinnedList(output: string): Set<string> {
  return new Set(
    output
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean)
  );
}

/**
 * Parses `brew services list`: a header line, then `Name Status User File`
 * columns where User and File may be missing.
 */
export function parseServicesList(output: string): ManagedService[] {
  return output
    .split(/\r?\n/)
    .slice(1)
    .map((line) => line.trim().split(/\s+/))
    .filter((parts) => parts.length >= 2)
    .map(([name = "", status = "", user, ...file]) => ({
      name,
      status: serviceStatus(status),
      ...(user ? { user } : {}),
      ...(file.length > 0 ? { file: file.join(" ") } : {})
    }));
}

function serviceStatus(value: string): ServiceStatus {
  const lower = value.toLowerCase();
  if (lower.includes("started")) {
    return "started";
  }
  if (lower.includes("stopped") || lower.includes("none")) {
    return "stopped";
  }
  if (lower.includes("error")) {
    return "error";
  }
  return "unknown";
}

const WOULD_REMOVE_RE = /^Would remove:\s+(.+?)(?:\s+\(([\d.]+)\s*(B|KB|MB|GB|TB)\))?$/;
const FREE_RE = /would free approximately\s+([\d.]+)\s*(B|KB|MB|GB|TB)/i;

export function parseCleanupPreview(output: string): CleanupPreview {
  const items: CleanupItem[] = [];
  let announcedTotal: number | undefined;

  for (const raw of output.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) {
      continue;
    }

    const free = line.match(FREE_RE);
    if (free) {
      announcedTotal = toBytes(free[1], free[2]);
      continue;
    }

    const remove = line.match(WOULD_REMOVE_RE);
    if (remove) {
      items.push({
        path: remove[1],
        size: remove[2] && remove[3] ? toBytes(remove[2], remove[3]) : 0
      });
    }
  }

  const summed = items.reduce((total, item) => total + item.size, 0);
  return { items, totalSize: announcedTotal ?? summed };
}

export function parseDiskUsage(output: string, path: string): CacheInfo {
  const first = output.trim().split(/\s+/)[0] ?? "";
  const kilobytes = Number(first);
  if (!first || !Number.isFinite(kilobytes)) {
    throw new BrewCommandError({ code: "externalToolError", message: `Unexpected du output for ${path}` });
  }
  return { path, totalSize: kilobytes * 1024 };
}

export function emptyPackage(name: string, kind: PackageKind): Package {
  return {
    name,
    kind,
    installed: false,
    outdated: false,
    pinned: false,
    versionLoadFailed: false
  };
}

function toBytes(amount: string, unit: string): number {
  const factors: Record<string, number> = {
    B: 1,
    KB: 1024,
    MB: 1024 ** 2,
    GB: 1024 ** 3,
    TB: 1024 ** 4
  };
  return Math.round(Number(amount) * (factors[unit.toUpperCase()] ?? 1));
}

function parseJson(output: string, source: string): Record<string, unknown> {
  let data: unknown;
  try {
    data = JSON.parse(output);
  } catch {
    throw new BrewCommandError({ code: "externalToolError", message: `Unreadable JSON from ${source}` });
  }

  const record = toRecord(data);
  if (!record) {
    throw new BrewCommandError({ code: "externalToolError", message: `Unexpected JSON shape from ${source}` });
  }
  return record;
}

function records(value: unknown): Record<string, unknown>[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.flatMap((entry) => {
    const record = toRecord(entry);
    return record ? [record] : [];
  });
}

function firstRecord(value: unknown): Record<string, unknown> | undefined {
  return Array.isArray(value) ? toRecord(value[0]) : undefined;
}

function toRecord(value: unknown): Record<string, unknown> | undefined {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return undefined;
  }
  return value as Record<string, unknown>;
}

function stringValue(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function firstString(value: unknown): string | undefined {
  if (!Array.isArray(value) || value.length === 0) {
    return undefined;
  }

  const first: unknown = value[0];
  return typeof first === "string" && first.length > 0 ? first : undefined;
}
