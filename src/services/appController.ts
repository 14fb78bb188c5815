import type { AppConfig } from "../config.js";
import { DEFAULT_CONFIG } from "../config.js";
import { messageOf } from "../errors.js";
import { formatSize } from "../format.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type {
  CacheInfo,
  LogLevel,
  ManagedService,
  OperationGateway,
  OperationId,
  OperationPayload,
  OperationRequest,
  Package,
  PackageRef,
  StatusEvent
} from "../types.js";
import type { BatchOperationKind, BatchProgress, BatchSummary } from "./batchProcessor.js";
import { SequentialBatchProcessor } from "./batchProcessor.js";
import type { CredentialPrompt, OperationSettlement } from "./operationExecutor.js";
import { OperationExecutor } from "./operationExecutor.js";
import { isPrivileged, targetedRequest } from "./operationKinds.js";
import type { PackageFilter } from "./packageFilter.js";
import { NO_FILTER, filterPackages } from "./packageFilter.js";
import type { CleanupPreviewState } from "./packageStore.js";
import { PackageStore } from "./packageStore.js";
import { StatusBus } from "./statusBus.js";
import type { TaskSummary } from "./taskManager.js";
import { AsyncTaskManager } from "./taskManager.js";

export type OperationIntent =
  | { kind: BatchOperationKind; targets: readonly PackageRef[] }
  | Exclude<OperationRequest, { kind: BatchOperationKind }>;

export interface AppSnapshot {
  readonly status: string;
  readonly log: readonly StatusEvent[];
  readonly batch?: BatchProgress;
  readonly lastBatch?: BatchSummary;
  readonly prompt?: CredentialPrompt;
  readonly packages: readonly Package[];
  readonly outdated: readonly Package[];
  readonly searchResults: readonly Package[];
  readonly services: readonly ManagedService[];
  /** Applied to `packages` and `outdated`. */
  readonly filter: PackageFilter;
  readonly cleanupPreview?: CleanupPreviewState;
  readonly cacheInfo?: CacheInfo;
  readonly tasks: readonly TaskSummary[];
  readonly revision: number;
}

export interface AppControllerOptions {
  logger?: Logger;
  logLines?: number;
  showDebug?: boolean;
  clock?: () => Date;
}

const VISIBLE_LEVELS: ReadonlySet<LogLevel> = new Set<LogLevel>(["info", "warn", "error"]);

/**
 * The surface the terminal UI talks to. Intents go in, immutable snapshots
 * come out; `tick()` advances the orchestration once per redraw.
 */
export class AppController {
  readonly bus: StatusBus;
  readonly manager: AsyncTaskManager;
  readonly executor: OperationExecutor;
  readonly batches: SequentialBatchProcessor;
  readonly store = new PackageStore();

  private readonly pendingListings = new Map<string, OperationId>();
  private readonly logger: Logger;
  private readonly logLines: number;
  private readonly showDebug: boolean;
  private filter: PackageFilter = NO_FILTER;
  private filterRevision = 0;

  constructor(
    gateway: OperationGateway,
    private readonly config: AppConfig = DEFAULT_CONFIG,
    options: AppControllerOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.logLines = options.logLines ?? 50;
    this.showDebug = options.showDebug ?? false;
    this.bus = new StatusBus(config.logCapacity, this.logger, options.clock);
    this.manager = new AsyncTaskManager(this.bus, {
      timeouts: config.timeouts,
      maxConcurrentLookups: config.maxConcurrentLookups,
      logger: this.logger
    });
    this.executor = new OperationExecutor(this.manager, gateway, this.bus, this.logger);
    this.batches = new SequentialBatchProcessor(
      this.executor,
      this.bus,
      {
        onItemSucceeded: (ref, kind) => this.store.applySuccess(kind, ref),
        onFinished: (summary) => {
          if (summary.results.some((result) => result.status === "success")) {
            this.reload();
          }
        }
      },
      this.logger
    );
  }

  /** Drains finished tasks into the executor. Never blocks. */
  tick(): void {
    for (const completion of this.manager.pollAll()) {
      const event = this.executor.handleCompletion(completion);
      if (event?.type === "needsCredential") {
        this.enforceAttemptLimit(event.prompt);
      }
    }
  }

  requestOperation(intent: OperationIntent): void {
    try {
      if ("targets" in intent) {
        this.runTargeted(intent.kind, intent.targets);
        return;
      }
      this.runSingle(intent);
    } catch (error) {
      this.bus.publish(messageOf(error), "warn");
    }
  }

  supplyCredential(promptId: string, secret: string): void {
    try {
      this.executor.supplyCredential(promptId, secret);
    } catch (error) {
      this.bus.publish(messageOf(error), "warn");
    }
  }

  cancelPrompt(promptId: string): void {
    try {
      this.executor.cancelPrompt(promptId);
    } catch (error) {
      this.bus.publish(messageOf(error), "warn");
    }
  }

  cancelBatch(): boolean {
    return this.batches.cancel();
  }

  reload(): void {
    this.requestOperation({ kind: "list" });
    this.requestOperation({ kind: "listOutdated" });
  }

  setFilter(changes: Partial<PackageFilter>): PackageFilter {
    this.filter = { ...this.filter, ...changes };
    this.filterRevision += 1;
    return this.filter;
  }

  snapshot(): AppSnapshot {
    return {
      status: this.bus.current(),
      log: this.bus.snapshot(this.logLines, this.showDebug ? undefined : VISIBLE_LEVELS),
      batch: this.batches.progress(),
      lastBatch: this.batches.lastSummary(),
      prompt: this.executor.prompts()[0],
      packages: filterPackages(this.store.merged(), this.filter),
      outdated: filterPackages(this.store.outdatedPackages(), this.filter),
      searchResults: this.store.search(),
      services: this.store.services(),
      filter: this.filter,
      cleanupPreview: this.store.cleanupPreview(),
      cacheInfo: this.store.cacheInfo(),
      tasks: this.manager.snapshot(),
      revision: this.store.revision + this.bus.publishedCount + this.filterRevision
    };
  }

  private runTargeted(kind: BatchOperationKind, targets: readonly PackageRef[]): void {
    const [only] = targets;
    if (only && targets.length === 1) {
      this.submit(targetedRequest(kind, only));
      return;
    }
    this.batches.start(targets, kind);
  }

  private runSingle(request: OperationRequest): void {
    const key = listingKey(request);
    if (key !== undefined) {
      if (this.pendingListings.has(key)) {
        this.logger.debug(`Ignoring duplicate ${request.kind} request`);
        return;
      }
      this.pendingListings.set(key, this.submit(request));
      return;
    }
    this.submit(request);
  }

  private submit(request: OperationRequest): OperationId {
    return this.executor.execute(request, (settlement) => this.onSettled(settlement));
  }

  private onSettled(settlement: OperationSettlement): void {
    const { request } = settlement;
    const key = listingKey(request);
    if (key !== undefined && this.pendingListings.get(key) === settlement.operationId) {
      this.pendingListings.delete(key);
    }

    if (settlement.status !== "success") {
      if (request.kind === "getInfo") {
        this.store.markInfoFailed(request.target);
      }
      return;
    }

    this.apply(request, settlement.payload);
  }

  private apply(request: OperationRequest, payload: OperationPayload): void {
    switch (payload.type) {
      case "packages":
        if (request.kind === "list") {
          this.store.replaceInstalled(payload.packages);
          this.bus.publish(`Loaded ${payload.packages.length} installed packages`);
        } else if (request.kind === "listOutdated") {
          this.store.replaceOutdated(payload.packages);
          this.bus.publish(`${payload.packages.length} packages can be updated`);
        } else if (request.kind === "search") {
          this.store.replaceSearchResults(payload.packages);
          this.bus.publish(`Found ${payload.packages.length} results for "${request.query}"`);
          this.prefetchInfo(payload.packages);
        }
        return;
      case "package":
        this.store.putInfo(payload.package);
        return;
      case "message":
        this.bus.publish(payload.message);
        this.afterMessage(request);
        return;
      case "cleanupPreview":
        if (request.kind === "cleanupPreview") {
          this.store.setCleanupPreview({ scope: request.scope, preview: payload.preview });
          this.bus.publish(
            `Cleanup would remove ${payload.preview.items.length} items (${formatSize(payload.preview.totalSize)})`
          );
        }
        return;
      case "cacheSize":
        this.store.setCacheInfo(payload.cache);
        this.bus.publish(`Cache at ${payload.cache.path} uses ${formatSize(payload.cache.totalSize)}`);
        return;
      case "brewfile":
        this.importBrewfile(payload.path, payload.parsed.refs, payload.parsed.skipped, payload.parsed.errors);
        return;
      case "services":
        this.store.replaceServices(payload.services);
        this.bus.publish(`Loaded ${payload.services.length} services`);
        return;
    }
  }

  private afterMessage(request: OperationRequest): void {
    switch (request.kind) {
      case "install":
      case "uninstall":
      case "update":
      case "pin":
      case "unpin":
        this.store.applySuccess(request.kind, request.target);
        break;
      case "cleanCache":
      case "cleanupOldVersions":
        this.store.setCleanupPreview(undefined);
        break;
      case "serviceStart":
      case "serviceStop":
      case "serviceRestart":
        this.requestOperation({ kind: "servicesList" });
        break;
      default:
        break;
    }
    if (isPrivileged(request.kind)) {
      this.reload();
    }
  }

  private prefetchInfo(results: readonly Package[]): void {
    const missing = results.filter((pkg) => this.store.infoFor(pkg) === undefined);
    for (const pkg of missing.slice(0, this.config.searchInfoPrefetch)) {
      this.submit({ kind: "getInfo", target: { name: pkg.name, kind: pkg.kind } });
    }
  }

  private importBrewfile(
    path: string,
    refs: readonly PackageRef[],
    skipped: readonly string[],
    errors: readonly string[]
  ): void {
    for (const line of errors) {
      this.bus.publish(`${path}: ${line}`, "warn");
    }
    if (skipped.length > 0) {
      this.bus.publish(`Skipped ${skipped.length} unsupported entries: ${skipped.join(", ")}`, "warn");
    }

    const missing = refs.filter((ref) => !this.store.isInstalled(ref));
    if (missing.length === 0) {
      this.bus.publish(`Everything in ${path} is already installed`);
      return;
    }
    this.requestOperation({ kind: "install", targets: missing });
  }

  private enforceAttemptLimit(prompt: CredentialPrompt): void {
    const limit = this.config.maxPasswordAttempts;
    if (limit === null || prompt.rejectionCount < limit) {
      return;
    }
    this.executor.abandon(prompt.id, `Giving up after ${prompt.rejectionCount} incorrect password attempts`);
  }
}

/** In-flight listings with the same key are not submitted twice. */
function listingKey(request: OperationRequest): string | undefined {
  switch (request.kind) {
    case "list":
    case "listOutdated":
    case "servicesList":
      return request.kind;
    case "search":
      return `search:${request.packageKind ?? "all"}:${request.query}`;
    default:
      return undefined;
  }
}
