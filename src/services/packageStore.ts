import { emptyPackage } from "../parser/brewOutputParser.js";
import type { CacheInfo, CleanupPreview, CleanupScope, ManagedService, Package, PackageRef } from "../types.js";
import { refKey } from "../types.js";
import type { BatchOperationKind } from "./batchProcessor.js";

export interface CleanupPreviewState {
  scope: CleanupScope;
  preview: CleanupPreview;
}

/**
 * In-memory listing the renderer reads. Local updates after an operation are
 * best effort; the next full reload replaces them.
 */
export class PackageStore {
  private installed = new Map<string, Package>();
  private outdated = new Map<string, Package>();
  private searchResults: Package[] = [];
  private readonly info = new Map<string, Package>();
  private preview?: CleanupPreviewState;
  private cache?: CacheInfo;
  private serviceList: ManagedService[] = [];
  private version = 0;

  get revision(): number {
    return this.version;
  }

  replaceInstalled(packages: readonly Package[]): void {
    this.installed = keyed(packages);
    this.touch();
  }

  replaceOutdated(packages: readonly Package[]): void {
    this.outdated = keyed(packages);
    this.touch();
  }

  replaceSearchResults(packages: readonly Package[]): void {
    this.searchResults = [...packages];
    this.touch();
  }

  putInfo(pkg: Package): void {
    this.info.set(refKey(pkg), pkg);
    this.touch();
  }

  markInfoFailed(ref: PackageRef): void {
    const known = this.info.get(refKey(ref)) ?? emptyPackage(ref.name, ref.kind);
    this.info.set(refKey(ref), { ...known, versionLoadFailed: true });
    this.touch();
  }

  setCleanupPreview(state: CleanupPreviewState | undefined): void {
    this.preview = state;
    this.touch();
  }

  setCacheInfo(cache: CacheInfo): void {
    this.cache = cache;
    this.touch();
  }

  replaceServices(services: readonly ManagedService[]): void {
    this.serviceList = [...services].sort((a, b) => a.name.localeCompare(b.name));
    this.touch();
  }

  applySuccess(kind: BatchOperationKind, ref: PackageRef): void {
    const key = refKey(ref);
    switch (kind) {
      case "update": {
        const previous = this.outdated.get(key);
        this.outdated.delete(key);
        const current = this.installed.get(key);
        if (current) {
          this.installed.set(key, {
            ...current,
            outdated: false,
            version: previous?.availableVersion ?? current.version,
            availableVersion: undefined
          });
        }
        break;
      }
      case "uninstall":
        this.installed.delete(key);
        this.outdated.delete(key);
        break;
      case "install":
        if (!this.installed.has(key)) {
          const known = this.info.get(key) ?? this.searchResults.find((pkg) => refKey(pkg) === key);
          this.installed.set(key, { ...(known ?? emptyPackage(ref.name, ref.kind)), installed: true });
        }
        break;
      case "pin":
      case "unpin": {
        const current = this.installed.get(key);
        if (current) {
          this.installed.set(key, { ...current, pinned: kind === "pin" });
        }
        break;
      }
    }
    this.touch();
  }

  /** Installed packages with outdated data merged in, sorted by name. */
  merged(): Package[] {
    return [...this.installed.values()]
      .map((pkg) => {
        const newer = this.outdated.get(refKey(pkg));
        return newer
          ? { ...pkg, outdated: true, availableVersion: newer.availableVersion, pinned: pkg.pinned || newer.pinned }
          : pkg;
      })
      .sort(byName);
  }

  outdatedPackages(): Package[] {
    return [...this.outdated.values()].sort(byName);
  }

  search(): Package[] {
    return this.searchResults.map((pkg) => {
      const detailed = this.info.get(refKey(pkg));
      const installed = this.installed.has(refKey(pkg));
      return detailed ? { ...pkg, ...detailed, installed: installed || detailed.installed } : { ...pkg, installed };
    });
  }

  infoFor(ref: PackageRef): Package | undefined {
    return this.info.get(refKey(ref));
  }

  isInstalled(ref: PackageRef): boolean {
    return this.installed.has(refKey(ref));
  }

  cleanupPreview(): CleanupPreviewState | undefined {
    return this.preview;
  }

  cacheInfo(): CacheInfo | undefined {
    return this.cache;
  }

  services(): ManagedService[] {
    return [...this.serviceList];
  }

  private touch(): void {
    this.version += 1;
  }
}

function keyed(packages: readonly Package[]): Map<string, Package> {
  return new Map(packages.map((pkg) => [refKey(pkg), pkg]));
}

function byName(a: Package, b: Package): number {
  return a.name.localeCompare(b.name) || a.kind.localeCompare(b.kind);
}
