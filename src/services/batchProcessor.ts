import { BatchInProgressError, EmptyBatchError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { FailureReason, OperationId, PackageRef } from "../types.js";
import type { OperationExecutor, OperationSettlement } from "./operationExecutor.js";
import { progressVerb, targetedRequest } from "./operationKinds.js";
import type { StatusBus } from "./statusBus.js";

export type BatchOperationKind = "install" | "uninstall" | "update" | "pin" | "unpin";

export type BatchItemResult =
  | { ref: PackageRef; status: "success" }
  | { ref: PackageRef; status: "failure"; reason: FailureReason }
  | { ref: PackageRef; status: "cancelled" };

export interface BatchProgress {
  kind: BatchOperationKind;
  completedCount: number;
  totalCount: number;
  currentItemName?: string;
  cancelled: boolean;
}

export interface BatchSummary {
  kind: BatchOperationKind;
  totalCount: number;
  results: readonly BatchItemResult[];
  skippedCount: number;
  cancelled: boolean;
}

export interface BatchHooks {
  onItemSucceeded?: (ref: PackageRef, kind: BatchOperationKind) => void;
  onFinished?: (summary: BatchSummary) => void;
}

interface BatchJob {
  kind: BatchOperationKind;
  items: readonly PackageRef[];
  cursor: number;
  results: BatchItemResult[];
  cancelled: boolean;
  inFlight?: OperationId;
}

/**
 * Processes one batch at a time, one item at a time. The next item is only
 * submitted after the executor settles the previous one, whatever its result.
 */
export class SequentialBatchProcessor {
  private job?: BatchJob;
  private finished?: BatchSummary;

  constructor(
    private readonly executor: OperationExecutor,
    private readonly bus: StatusBus,
    private readonly hooks: BatchHooks = {},
    private readonly logger: Logger = silentLogger
  ) {}

  start(items: readonly PackageRef[], kind: BatchOperationKind): BatchProgress {
    if (this.job) {
      throw new BatchInProgressError(formatBatchProgress(this.progressOf(this.job)));
    }
    if (items.length === 0) {
      throw new EmptyBatchError();
    }

    const job: BatchJob = { kind, items: [...items], cursor: 0, results: [], cancelled: false };
    this.job = job;
    this.bus.publish(`Queued ${items.length} packages for sequential ${kind}`);
    this.submitCurrent(job);
    return this.progressOf(job);
  }

  /** Stops submitting further items; the in-flight item still completes. */
  cancel(): boolean {
    const job = this.job;
    if (!job || job.cancelled) {
      return false;
    }
    job.cancelled = true;
    const remaining = job.items.length - job.cursor - 1;
    this.bus.publish(`Batch ${job.kind} cancelled; ${remaining} remaining item(s) will be skipped`, "warn");
    return true;
  }

  progress(): BatchProgress | undefined {
    return this.job ? this.progressOf(this.job) : undefined;
  }

  lastSummary(): BatchSummary | undefined {
    return this.finished;
  }

  get isActive(): boolean {
    return this.job !== undefined;
  }

  private submitCurrent(job: BatchJob): void {
    const ref = job.items[job.cursor];
    if (!ref) {
      this.finish(job);
      return;
    }

    this.bus.publish(formatBatchProgress(this.progressOf(job)));
    job.inFlight = this.executor.execute(targetedRequest(job.kind, ref), (settlement) =>
      this.onItemComplete(job, ref, settlement)
    );
  }

  private onItemComplete(job: BatchJob, ref: PackageRef, settlement: OperationSettlement): void {
    if (this.job !== job || job.inFlight !== settlement.operationId) {
      this.logger.warn(`Ignoring stale batch settlement for ${ref.name}`);
      return;
    }
    job.inFlight = undefined;

    switch (settlement.status) {
      case "success":
        job.results.push({ ref, status: "success" });
        this.hooks.onItemSucceeded?.(ref, job.kind);
        break;
      case "failure":
        job.results.push({ ref, status: "failure", reason: settlement.reason });
        break;
      case "cancelled":
        job.results.push({ ref, status: "cancelled" });
        break;
    }
    job.cursor += 1;

    if (job.cancelled || job.cursor >= job.items.length) {
      this.finish(job);
      return;
    }
    this.submitCurrent(job);
  }

  private finish(job: BatchJob): void {
    const summary: BatchSummary = {
      kind: job.kind,
      totalCount: job.items.length,
      results: [...job.results],
      skippedCount: job.items.length - job.results.length,
      cancelled: job.cancelled
    };
    this.job = undefined;
    this.finished = summary;
    this.bus.publish(formatBatchSummary(summary), summaryLevel(summary));
    this.hooks.onFinished?.(summary);
  }

  private progressOf(job: BatchJob): BatchProgress {
    return {
      kind: job.kind,
      completedCount: job.results.length,
      totalCount: job.items.length,
      currentItemName: job.items[job.cursor]?.name,
      cancelled: job.cancelled
    };
  }
}

export function formatBatchProgress(progress: BatchProgress): string {
  const position = Math.min(progress.completedCount + 1, progress.totalCount);
  const label = `${progressVerb(progress.kind)} ${position}/${progress.totalCount}`;
  return progress.currentItemName ? `${label}: ${progress.currentItemName}` : label;
}

export function formatBatchSummary(summary: BatchSummary): string {
  const succeeded = summary.results.filter((result) => result.status === "success").length;
  const failed = summary.results.filter((result) => result.status === "failure").length;
  const parts = [`${succeeded} succeeded`];
  const cancelled = summary.results.filter((result) => result.status === "cancelled").length;
  if (failed > 0) {
    parts.push(`${failed} failed`);
  }
  if (cancelled > 0) {
    parts.push(`${cancelled} cancelled`);
  }
  if (summary.skippedCount > 0) {
    parts.push(`${summary.skippedCount} skipped`);
  }
  const verb = summary.cancelled ? "cancelled" : "finished";
  return `Batch ${summary.kind} ${verb}: ${parts.join(", ")}`;
}

function summaryLevel(summary: BatchSummary): "info" | "warn" {
  return summary.results.some((result) => result.status === "failure") ? "warn" : "info";
}
