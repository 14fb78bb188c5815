import type { TimeoutPolicy } from "../config.js";
import type {
  OperationKind,
  OperationRequest,
  PackageRef,
  ServiceAction,
  ServiceRequest,
  TargetedKind
} from "../types.js";

const PRIVILEGED: ReadonlySet<OperationKind> = new Set<OperationKind>(["install", "uninstall", "update", "updateAll"]);

export function isPrivileged(kind: OperationKind): boolean {
  return PRIVILEGED.has(kind);
}

export function timeoutFor(request: OperationRequest, timeouts: TimeoutPolicy): number {
  switch (request.kind) {
    case "getInfo":
    case "cacheSize":
    case "readBrewfile":
      return timeouts.lookupMs;
    case "list":
    case "listOutdated":
    case "search":
    case "cleanupPreview":
    case "pin":
    case "unpin":
    case "servicesList":
      return timeouts.listMs;
    case "serviceStart":
    case "serviceStop":
    case "serviceRestart":
    case "cleanCache":
    case "cleanupOldVersions":
    case "exportBrewfile":
      return timeouts.maintenanceMs;
    case "install":
    case "uninstall":
    case "update":
    case "updateAll":
      return timeouts.privilegedMs;
  }
}

export function describeRequest(request: OperationRequest): string {
  switch (request.kind) {
    case "list":
      return "load installed packages";
    case "listOutdated":
      return "check for outdated packages";
    case "search":
      return `search "${request.query}"`;
    case "getInfo":
      return `load info for ${describeRef(request.target)}`;
    case "install":
    case "uninstall":
    case "update":
    case "pin":
    case "unpin":
      return `${request.kind} ${describeRef(request.target)}`;
    case "updateAll":
      return "update all packages";
    case "cleanCache":
      return "clean cache";
    case "cleanupOldVersions":
      return "remove old versions";
    case "cleanupPreview":
      return request.scope === "cache" ? "preview cache cleanup" : "preview old version cleanup";
    case "cacheSize":
      return "measure cache size";
    case "exportBrewfile":
      return `export Brewfile to ${request.path}`;
    case "readBrewfile":
      return `read Brewfile ${request.path}`;
    case "servicesList":
      return "load services";
    case "serviceStart":
      return `start service ${request.service}`;
    case "serviceStop":
      return `stop service ${request.service}`;
    case "serviceRestart":
      return `restart service ${request.service}`;
  }
}

export function describeRef(ref: PackageRef): string {
  return `${ref.name} (${ref.kind})`;
}

export function targetedRequest(kind: TargetedKind, target: PackageRef): OperationRequest {
  switch (kind) {
    case "getInfo":
      return { kind: "getInfo", target };
    case "install":
      return { kind: "install", target };
    case "uninstall":
      return { kind: "uninstall", target };
    case "update":
      return { kind: "update", target };
    case "pin":
      return { kind: "pin", target };
    case "unpin":
      return { kind: "unpin", target };
  }
}

const PROGRESS_VERBS: Record<TargetedKind, string> = {
  getInfo: "Loading info",
  install: "Installing",
  uninstall: "Uninstalling",
  update: "Updating",
  pin: "Pinning",
  unpin: "Unpinning"
};

export function progressVerb(kind: TargetedKind): string {
  return PROGRESS_VERBS[kind];
}

export function serviceRequest(action: ServiceAction, service: string): ServiceRequest {
  switch (action) {
    case "start":
      return { kind: "serviceStart", service };
    case "stop":
      return { kind: "serviceStop", service };
    case "restart":
      return { kind: "serviceRestart", service };
  }
}
