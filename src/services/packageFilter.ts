import type { Package } from "../types.js";

export interface PackageFilter {
  readonly showFormulae: boolean;
  readonly showCasks: boolean;
  /** Case-insensitive substring of the package name; empty matches everything. */
  readonly query: string;
}

export const NO_FILTER: PackageFilter = { showFormulae: true, showCasks: true, query: "" };

export function filterPackages(packages: readonly Package[], filter: PackageFilter): Package[] {
  const query = filter.query.trim().toLowerCase();
  return packages.filter((pkg) => {
    const shown = pkg.kind === "formula" ? filter.showFormulae : filter.showCasks;
    return shown && (query === "" || pkg.name.toLowerCase().includes(query));
  });
}

export function describeFilter(filter: PackageFilter): string {
  const parts: string[] = [];
  if (!filter.showFormulae) {
    parts.push("no formulae");
  }
  if (!filter.showCasks) {
    parts.push("no casks");
  }
  const query = filter.query.trim();
  if (query) {
    parts.push(`"${query}"`);
  }
  return parts.length > 0 ? `filter: ${parts.join(", ")}` : "";
}
