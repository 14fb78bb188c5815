import { messageOf } from "../errors.js";
import type { OperationOutcome, OperationRequest, TaskId } from "../types.js";
import { failure } from "../types.js";
import { describeRequest } from "./operationKinds.js";

export type TaskWork = (signal: AbortSignal) => Promise<OperationOutcome>;

export type TaskState =
  | { status: "pending" }
  | { status: "completed"; outcome: OperationOutcome }
  | { status: "cancelled" };

/**
 * One in-flight operation plus its completion slot. The work runs on the event
 * loop; the slot is filled by the first of: the work settling, or the deadline.
 */
export class TaskHandle {
  private current: TaskState = { status: "pending" };
  private started = false;
  private workSettled = false;
  private deadline?: NodeJS.Timeout;
  private readonly abort = new AbortController();

  constructor(
    readonly id: TaskId,
    readonly request: OperationRequest,
    private readonly work: TaskWork,
    readonly timeoutMs: number
  ) {}

  get state(): TaskState {
    return this.current;
  }

  /** True once nothing is running on behalf of this handle any more. */
  get isSettled(): boolean {
    return this.workSettled || !this.started;
  }

  start(): void {
    if (this.started || this.current.status !== "pending") {
      return;
    }

    this.started = true;
    this.deadline = setTimeout(() => this.expire(), this.timeoutMs);

    let running: Promise<OperationOutcome>;
    try {
      running = this.work(this.abort.signal);
    } catch (error) {
      running = Promise.reject(error);
    }

    void running.then(
      (outcome) => this.settle(outcome),
      (error: unknown) => this.settle(failure("externalToolError", messageOf(error)))
    );
  }

  cancel(): boolean {
    if (this.current.status !== "pending") {
      return false;
    }
    this.current = { status: "cancelled" };
    return true;
  }

  private settle(outcome: OperationOutcome): void {
    this.workSettled = true;
    this.clearDeadline();
    if (this.current.status === "pending") {
      this.current = { status: "completed", outcome };
    }
  }

  private expire(): void {
    this.deadline = undefined;
    if (this.current.status === "pending") {
      const seconds = Math.round(this.timeoutMs / 1000);
      this.current = {
        status: "completed",
        outcome: failure("timeout", `${describeRequest(this.request)} timed out after ${seconds}s`)
      };
    }
    // the gateway kills the subprocess when the signal fires
    this.abort.abort();
  }

  private clearDeadline(): void {
    if (this.deadline) {
      clearTimeout(this.deadline);
      this.deadline = undefined;
    }
  }
}
