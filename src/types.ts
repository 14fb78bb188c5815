export type PackageKind = "formula" | "cask";

export interface PackageRef {
  readonly name: string;
  readonly kind: PackageKind;
}

export interface Package extends PackageRef {
  version?: string;
  availableVersion?: string;
  description?: string;
  installed: boolean;
  outdated: boolean;
  pinned: boolean;
  versionLoadFailed: boolean;
}

export interface CleanupItem {
  path: string;
  size: number;
}

export interface CleanupPreview {
  items: CleanupItem[];
  totalSize: number;
}

export type CleanupScope = "cache" | "oldVersions";

export interface CacheInfo {
  path: string;
  totalSize: number;
}

export type ServiceStatus = "started" | "stopped" | "error" | "unknown";

/** A background service managed by `brew services`. */
export interface ManagedService {
  readonly name: string;
  readonly status: ServiceStatus;
  readonly user?: string;
  readonly file?: string;
}

export type ServiceAction = "start" | "stop" | "restart";

export interface ParsedBrewfile {
  refs: PackageRef[];
  skipped: string[];
  errors: string[];
}

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  timeoutMs?: number;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

export interface CommandExecutor {
  run(cmd: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

export type OperationRequest =
  | { kind: "list" }
  | { kind: "listOutdated" }
  | { kind: "search"; query: string; packageKind?: PackageKind }
  | { kind: "getInfo"; target: PackageRef }
  | { kind: "install"; target: PackageRef }
  | { kind: "uninstall"; target: PackageRef }
  | { kind: "update"; target: PackageRef }
  | { kind: "updateAll" }
  | { kind: "cleanCache" }
  | { kind: "cleanupOldVersions" }
  | { kind: "pin"; target: PackageRef }
  | { kind: "unpin"; target: PackageRef }
  | { kind: "cleanupPreview"; scope: CleanupScope }
  | { kind: "cacheSize" }
  | { kind: "exportBrewfile"; path: string }
  | { kind: "readBrewfile"; path: string }
  | { kind: "servicesList" }
  | { kind: "serviceStart"; service: string }
  | { kind: "serviceStop"; service: string }
  | { kind: "serviceRestart"; service: string };

export type OperationKind = OperationRequest["kind"];

export type TargetedRequest = Extract<OperationRequest, { target: PackageRef }>;

export type TargetedKind = TargetedRequest["kind"];

export type ServiceRequest = Extract<OperationRequest, { service: string }>;

export type FailureCode = "authRequired" | "authRejected" | "notFound" | "externalToolError" | "timeout";

export interface FailureReason {
  code: FailureCode;
  message: string;
}

export type OperationPayload =
  | { type: "packages"; packages: Package[] }
  | { type: "package"; package: Package }
  | { type: "message"; message: string }
  | { type: "cleanupPreview"; preview: CleanupPreview }
  | { type: "cacheSize"; cache: CacheInfo }
  | { type: "brewfile"; path: string; parsed: ParsedBrewfile }
  | { type: "services"; services: ManagedService[] };

export type OperationOutcome =
  | { ok: true; payload: OperationPayload }
  | { ok: false; reason: FailureReason };

export interface OperationGateway {
  execute(request: OperationRequest, options?: ExecuteOptions): Promise<OperationOutcome>;
}

export interface ExecuteOptions {
  credential?: string;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export type TaskId = number;

export type OperationId = number;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface StatusEvent {
  readonly timestamp: Date;
  readonly level: LogLevel;
  readonly line: string;
}

export function refKey(ref: PackageRef): string {
  return `${ref.kind}:${ref.name}`;
}

export function success(payload: OperationPayload): OperationOutcome {
  return { ok: true, payload };
}

export function failure(code: FailureCode, message: string): OperationOutcome {
  return { ok: false, reason: { code, message } };
}
