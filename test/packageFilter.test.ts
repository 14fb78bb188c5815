import { describe, expect, it } from "vitest";
import { emptyPackage } from "../src/parser/brewOutputParser.js";
import { NO_FILTER, describeFilter, filterPackages } from "../src/services/packageFilter.js";

const packages = [
  emptyPackage("wget", "formula"),
  emptyPackage("jq", "formula"),
  emptyPackage("wezterm", "cask"),
  emptyPackage("iterm2", "cask")
];

function names(filter: Parameters<typeof filterPackages>[1]): string[] {
  return filterPackages(packages, filter).map((pkg) => pkg.name);
}

describe("filterPackages", () => {
  it("keeps everything without a filter", () => {
    expect(names(NO_FILTER)).toEqual(["wget", "jq", "wezterm", "iterm2"]);
  });

  it("hides formulae or casks", () => {
    expect(names({ ...NO_FILTER, showFormulae: false })).toEqual(["wezterm", "iterm2"]);
    expect(names({ ...NO_FILTER, showCasks: false })).toEqual(["wget", "jq"]);
    expect(names({ showFormulae: false, showCasks: false, query: "" })).toEqual([]);
  });

  it("matches names case-insensitively and ignores surrounding spaces", () => {
    expect(names({ ...NO_FILTER, query: " WE " })).toEqual(["wezterm"]);
    expect(names({ ...NO_FILTER, query: "w", showCasks: false })).toEqual(["wget"]);
  });

  it("describes an active filter", () => {
    expect(describeFilter(NO_FILTER)).toBe("");
    expect(describeFilter({ showFormulae: true, showCasks: false, query: "we" })).toBe('filter: no casks, "we"');
  });
});
