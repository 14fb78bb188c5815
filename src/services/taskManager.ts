import type { TimeoutPolicy } from "../config.js";
import { DEFAULT_CONFIG } from "../config.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { OperationOutcome, OperationRequest, TaskId } from "../types.js";
import { describeRequest, isPrivileged, timeoutFor } from "./operationKinds.js";
import type { StatusBus } from "./statusBus.js";
import type { TaskWork } from "./taskHandle.js";
import { TaskHandle } from "./taskHandle.js";

export interface TaskCompletion {
  id: TaskId;
  request: OperationRequest;
  outcome: OperationOutcome;
}

export type TaskPhase = "queued" | "running" | "completed" | "cancelled";

export interface TaskSummary {
  id: TaskId;
  description: string;
  privileged: boolean;
  phase: TaskPhase;
}

export interface TaskManagerOptions {
  timeouts?: TimeoutPolicy;
  maxConcurrentLookups?: number;
  logger?: Logger;
}

/**
 * Owns every live task. Privileged operations share a single slot and wait in
 * FIFO order behind it; lookups run side by side up to a concurrency limit.
 * `pollAll` is synchronous and is called once per redraw tick.
 */
export class AsyncTaskManager {
  private readonly running = new Map<TaskId, TaskHandle>();
  private readonly privilegedQueue: TaskHandle[] = [];
  private readonly lookupQueue: TaskHandle[] = [];
  /** Timed-out tasks whose work has not settled yet; they still hold their slot. */
  private readonly draining = new Map<TaskId, TaskHandle>();
  private readonly timeouts: TimeoutPolicy;
  private readonly maxConcurrentLookups: number;
  private readonly logger: Logger;
  private nextId: TaskId = 1;

  constructor(
    private readonly bus: StatusBus,
    options: TaskManagerOptions = {}
  ) {
    this.timeouts = options.timeouts ?? DEFAULT_CONFIG.timeouts;
    this.maxConcurrentLookups = options.maxConcurrentLookups ?? DEFAULT_CONFIG.maxConcurrentLookups;
    this.logger = options.logger ?? silentLogger;
  }

  submit(request: OperationRequest, work: TaskWork): TaskId {
    const id = this.nextId;
    this.nextId += 1;
    const handle = new TaskHandle(id, request, work, timeoutFor(request, this.timeouts));
    const description = describeRequest(request);

    if (isPrivileged(request.kind)) {
      if (this.privilegedBusy() || this.privilegedQueue.length > 0) {
        this.privilegedQueue.push(handle);
        this.bus.publish(`Queued: ${description} (waiting for the running operation)`);
        return id;
      }
    } else if (this.activeLookups() >= this.maxConcurrentLookups) {
      this.lookupQueue.push(handle);
      this.bus.publish(`Queued: ${description}`, "debug");
      return id;
    }

    this.launch(handle);
    return id;
  }

  /**
   * Returns every task that reached a terminal state since the previous call
   * and drops it from the live set, then starts queued work whose slot freed up.
   */
  pollAll(): TaskCompletion[] {
    const completions: TaskCompletion[] = [];

    for (const [id, handle] of this.draining) {
      if (handle.isSettled) {
        this.draining.delete(id);
        this.logger.debug(`Timed-out task ${id} released its slot: ${describeRequest(handle.request)}`);
      }
    }

    for (const [id, handle] of this.running) {
      const state = handle.state;
      if (state.status === "completed") {
        this.running.delete(id);
        if (!handle.isSettled) {
          this.draining.set(id, handle);
        }
        completions.push({ id, request: handle.request, outcome: state.outcome });
        this.announce(handle.request, state.outcome);
      } else if (state.status === "cancelled" && handle.isSettled) {
        this.running.delete(id);
        this.logger.debug(`Discarded result of cancelled task ${id}: ${describeRequest(handle.request)}`);
      }
    }

    this.drainQueues();
    return completions;
  }

  cancel(id: TaskId): boolean {
    for (const queue of [this.privilegedQueue, this.lookupQueue]) {
      const index = queue.findIndex((handle) => handle.id === id);
      if (index >= 0) {
        const [handle] = queue.splice(index, 1);
        handle.cancel();
        this.bus.publish(`Cancelled: ${describeRequest(handle.request)}`);
        return true;
      }
    }

    const handle = this.running.get(id);
    if (!handle || !handle.cancel()) {
      return false;
    }
    this.bus.publish(`Cancelled: ${describeRequest(handle.request)} (finishing in the background)`);
    return true;
  }

  state(id: TaskId): TaskPhase | undefined {
    if (this.privilegedQueue.some((handle) => handle.id === id) || this.lookupQueue.some((handle) => handle.id === id)) {
      return "queued";
    }
    const handle = this.running.get(id);
    if (!handle) {
      return undefined;
    }
    const status = handle.state.status;
    return status === "pending" ? "running" : status;
  }

  /** Id of the privileged task currently holding the slot, if any. */
  privilegedInFlight(): TaskId | undefined {
    for (const handle of this.occupying()) {
      if (isPrivileged(handle.request.kind) && !handle.isSettled) {
        return handle.id;
      }
    }
    return undefined;
  }

  get liveCount(): number {
    return this.running.size + this.privilegedQueue.length + this.lookupQueue.length;
  }

  isIdle(): boolean {
    return this.liveCount === 0;
  }

  snapshot(): TaskSummary[] {
    const summarize = (handle: TaskHandle, phase: TaskPhase): TaskSummary => ({
      id: handle.id,
      description: describeRequest(handle.request),
      privileged: isPrivileged(handle.request.kind),
      phase
    });

    return [
      ...[...this.running.values()].map((handle) =>
        summarize(handle, handle.state.status === "pending" ? "running" : handle.state.status)
      ),
      ...this.privilegedQueue.map((handle) => summarize(handle, "queued")),
      ...this.lookupQueue.map((handle) => summarize(handle, "queued"))
    ];
  }

  private launch(handle: TaskHandle): void {
    this.running.set(handle.id, handle);
    handle.start();
    const message = `Started: ${describeRequest(handle.request)}`;
    if (isPrivileged(handle.request.kind)) {
      this.bus.publish(message);
    } else {
      this.bus.publish(message, "debug");
    }
  }

  private drainQueues(): void {
    if (!this.privilegedBusy()) {
      const next = this.privilegedQueue.shift();
      if (next) {
        this.launch(next);
      }
    }

    while (this.lookupQueue.length > 0 && this.activeLookups() < this.maxConcurrentLookups) {
      const next = this.lookupQueue.shift();
      if (next) {
        this.launch(next);
      }
    }
  }

  private privilegedBusy(): boolean {
    return this.privilegedInFlight() !== undefined;
  }

  private activeLookups(): number {
    let count = 0;
    for (const handle of this.occupying()) {
      if (!isPrivileged(handle.request.kind) && !handle.isSettled) {
        count += 1;
      }
    }
    return count;
  }

  private *occupying(): Iterable<TaskHandle> {
    yield* this.running.values();
    yield* this.draining.values();
  }

  private announce(request: OperationRequest, outcome: OperationOutcome): void {
    const description = describeRequest(request);
    if (outcome.ok) {
      this.bus.publish(`Finished: ${description}`, isPrivileged(request.kind) ? "info" : "debug");
    } else {
      this.bus.publish(`Failed: ${description} (${outcome.reason.code})`, "debug");
    }
  }
}
