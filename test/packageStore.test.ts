import { describe, expect, it } from "vitest";
import { emptyPackage } from "../src/parser/brewOutputParser.js";
import { PackageStore } from "../src/services/packageStore.js";
import type { Package } from "../src/types.js";

function installed(name: string, version: string, overrides: Partial<Package> = {}): Package {
  return { ...emptyPackage(name, "formula"), installed: true, version, ...overrides };
}

function outdated(name: string, version: string, availableVersion: string): Package {
  return { ...installed(name, version), outdated: true, availableVersion };
}

describe("PackageStore", () => {
  it("merges outdated versions into the installed list", () => {
    const store = new PackageStore();
    store.replaceInstalled([installed("wget", "1.24.4"), installed("jq", "1.7.1")]);
    store.replaceOutdated([outdated("wget", "1.24.4", "1.24.5")]);

    expect(store.merged().map((pkg) => [pkg.name, pkg.outdated, pkg.availableVersion])).toEqual([
      ["jq", false, undefined],
      ["wget", true, "1.24.5"]
    ]);
  });

  it("applies a successful update locally", () => {
    const store = new PackageStore();
    store.replaceInstalled([installed("wget", "1.24.4")]);
    store.replaceOutdated([outdated("wget", "1.24.4", "1.24.5")]);

    store.applySuccess("update", { name: "wget", kind: "formula" });

    expect(store.outdatedPackages()).toEqual([]);
    expect(store.merged()[0]).toMatchObject({ name: "wget", version: "1.24.5", outdated: false });
  });

  it("adds installs from search results and removes uninstalls", () => {
    const store = new PackageStore();
    store.replaceSearchResults([{ ...emptyPackage("jq", "formula"), description: "JSON processor" }]);

    store.applySuccess("install", { name: "jq", kind: "formula" });
    expect(store.merged()).toEqual([{ ...emptyPackage("jq", "formula"), description: "JSON processor", installed: true }]);
    expect(store.search()[0]?.installed).toBe(true);

    store.applySuccess("uninstall", { name: "jq", kind: "formula" });
    expect(store.merged()).toEqual([]);
  });

  it("toggles the pinned flag", () => {
    const store = new PackageStore();
    store.replaceInstalled([installed("node", "20.11.0")]);

    store.applySuccess("pin", { name: "node", kind: "formula" });
    expect(store.merged()[0]?.pinned).toBe(true);

    store.applySuccess("unpin", { name: "node", kind: "formula" });
    expect(store.merged()[0]?.pinned).toBe(false);
  });

  it("marks failed info loads and overlays loaded info on search results", () => {
    const store = new PackageStore();
    store.replaceSearchResults([emptyPackage("jq", "formula"), emptyPackage("yq", "formula")]);

    store.putInfo({ ...emptyPackage("jq", "formula"), version: "1.7.1" });
    store.markInfoFailed({ name: "yq", kind: "formula" });

    expect(store.search().map((pkg) => [pkg.name, pkg.version, pkg.versionLoadFailed])).toEqual([
      ["jq", "1.7.1", false],
      ["yq", undefined, true]
    ]);
  });

  it("bumps the revision on every change", () => {
    const store = new PackageStore();
    const before = store.revision;

    store.replaceInstalled([]);
    store.setCacheInfo({ path: "/cache", totalSize: 1024 });

    expect(store.revision).toBe(before + 2);
  });
});
