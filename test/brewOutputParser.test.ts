import { describe, expect, it } from "vitest";
import {
  parseCleanupPreview,
  parseDiskUsage,
  parseInfoJson,
  parseInstalledJson,
  parseOutdatedJson,
  parseSearchOutput,
  parseServicesList
} from "../src/parser/brewOutputParser.js";

describe("parseInstalledJson", () => {
  it("reads formulae and casks", () => {
    const output = JSON.stringify({
      formulae: [{ name: "jq", desc: "JSON processor", installed: [{ version: "1.7.1" }] }],
      casks: [{ token: "iterm2", desc: "Terminal emulator", installed: "3.5.0" }]
    });

    expect(parseInstalledJson(output)).toEqual([
      {
        name: "jq",
        kind: "formula",
        installed: true,
        outdated: false,
        pinned: false,
        versionLoadFailed: false,
        version: "1.7.1",
        description: "JSON processor"
      },
      {
        name: "iterm2",
        kind: "cask",
        installed: true,
        outdated: false,
        pinned: false,
        versionLoadFailed: false,
        version: "3.5.0",
        description: "Terminal emulator"
      }
    ]);
  });

  it("rejects output that is not JSON", () => {
    expect(() => parseInstalledJson("Warning: something")).toThrow("Unreadable JSON from brew info --installed");
  });
});

describe("parseOutdatedJson", () => {
  it("reads installed and current versions", () => {
    const output = JSON.stringify({
      formulae: [{ name: "node", installed_versions: ["20.10.0"], current_version: "20.11.0", pinned: true }],
      casks: [{ name: "firefox", installed_versions: ["121.0"], current_version: "122.0" }]
    });

    const packages = parseOutdatedJson(output);

    expect(packages.map((pkg) => [pkg.name, pkg.kind, pkg.version, pkg.availableVersion, pkg.pinned])).toEqual([
      ["node", "formula", "20.10.0", "20.11.0", true],
      ["firefox", "cask", "121.0", "122.0", false]
    ]);
    expect(packages.every((pkg) => pkg.outdated && pkg.installed)).toBe(true);
  });
});

describe("parseInfoJson", () => {
  it("reads the stable version of a formula that is not installed", () => {
    const output = JSON.stringify({
      formulae: [{ name: "jq", desc: "JSON processor", versions: { stable: "1.7.1" }, installed: [] }],
      casks: []
    });

    expect(parseInfoJson(output, "jq", "formula")).toMatchObject({
      name: "jq",
      kind: "formula",
      version: "1.7.1",
      description: "JSON processor",
      installed: false
    });
  });

  it("reads cask versions", () => {
    const output = JSON.stringify({
      formulae: [],
      casks: [{ token: "iterm2", version: "3.5.0", installed: "3.4.0" }]
    });

    expect(parseInfoJson(output, "iterm2", "cask")).toMatchObject({ version: "3.5.0", installed: true });
  });

  it("fails when brew returns no entry for the package", () => {
    expect(() => parseInfoJson(JSON.stringify({ formulae: [], casks: [] }), "jq", "formula")).toThrow(
      "Package info not found for jq"
    );
  });
});

describe("parseSearchOutput", () => {
  it("drops section headers and blank lines", () => {
    const names = parseSearchOutput("==> Formulae\nwget\n\nwgetpaste\n", "formula").map((pkg) => pkg.name);

    expect(names).toEqual(["wget", "wgetpaste"]);
  });
});

describe("parseCleanupPreview", () => {
  it("sums item sizes", () => {
    const output = [
      "Would remove: /cache/wget--1.24.5.bottle.tar.gz (1.5MB)",
      "Would remove: /cache/jq--1.7.bottle.tar.gz (512KB)",
      "Would remove: /cache/downloads/partial"
    ].join("\n");

    expect(parseCleanupPreview(output)).toEqual({
      items: [
        { path: "/cache/wget--1.24.5.bottle.tar.gz", size: 1572864 },
        { path: "/cache/jq--1.7.bottle.tar.gz", size: 524288 },
        { path: "/cache/downloads/partial", size: 0 }
      ],
      totalSize: 2097152
    });
  });

  it("prefers the total brew announces", () => {
    const output = [
      "Would remove: /cache/wget--1.24.5.bottle.tar.gz (1.5MB)",
      "==> This operation would free approximately 3MB of disk space."
    ].join("\n");

    expect(parseCleanupPreview(output).totalSize).toBe(3145728);
  });
});

describe("parseDiskUsage", () => {
  it("converts kilobytes to bytes", () => {
    expect(parseDiskUsage("2048\t/cache\n", "/cache")).toEqual({ path: "/cache", totalSize: 2097152 });
  });

  it("rejects unexpected output", () => {
    expect(() => parseDiskUsage("du: /cache: No such file", "/cache")).toThrow("Unexpected du output for /cache");
  });
});

describe("parseServicesList", () => {
  it("reads name, status and the optional user and file columns", () => {
    const output = [
      "Name          Status  User File",
      "postgresql@16 started test ~/Library/LaunchAgents/homebrew.mxcl.postgresql@16.plist",
      "redis         none",
      "unbound       error   root /Library/LaunchDaemons/homebrew.mxcl.unbound.plist",
      "dnsmasq       scheduled",
      ""
    ].join("\n");

    expect(parseServicesList(output)).toEqual([
      {
        name: "postgresql@16",
        status: "started",
        user: "test",
        file: "~/Library/LaunchAgents/homebrew.mxcl.postgresql@16.plist"
      },
      { name: "redis", status: "stopped" },
      { name: "unbound", status: "error", user: "root", file: "/Library/LaunchDaemons/homebrew.mxcl.unbound.plist" },
      { name: "dnsmasq", status: "unknown" }
    ]);
  });

  it("returns nothing for a header without rows", () => {
    expect(parseServicesList("Name Status User File")).toEqual([]);
  });
});
