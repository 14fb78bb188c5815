import { InvalidCredentialError, UnknownPromptError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type {
  FailureReason,
  OperationGateway,
  OperationId,
  OperationPayload,
  OperationRequest,
  TaskId
} from "../types.js";
import { describeRequest, isPrivileged } from "./operationKinds.js";
import type { StatusBus } from "./statusBus.js";
import type { AsyncTaskManager, TaskCompletion } from "./taskManager.js";

const SETTLED_HISTORY = 100;

export type OperationPhase = "attempting" | "needsCredential" | "succeeded" | "failed" | "cancelled";

export interface CredentialPrompt {
  readonly id: string;
  readonly operationId: OperationId;
  readonly title: string;
  readonly message: string;
  readonly rejectionCount: number;
}

export type OperationSettlement =
  | { status: "success"; operationId: OperationId; request: OperationRequest; payload: OperationPayload }
  | { status: "failure"; operationId: OperationId; request: OperationRequest; reason: FailureReason }
  | { status: "cancelled"; operationId: OperationId; request: OperationRequest };

export type SettlementListener = (settlement: OperationSettlement) => void;

export type ExecutorEvent =
  | { type: "settled"; settlement: OperationSettlement }
  | { type: "needsCredential"; prompt: CredentialPrompt };

export interface OperationSnapshot {
  id: OperationId;
  request: OperationRequest;
  phase: OperationPhase;
  taskIds: readonly TaskId[];
  rejectionCount: number;
}

interface TrackedOperation {
  id: OperationId;
  request: OperationRequest;
  phase: OperationPhase;
  taskIds: TaskId[];
  rejectionCount: number;
  promptId?: string;
  prompt?: CredentialPrompt;
  onSettled?: SettlementListener;
}

/**
 * Runs logical operations on top of the task manager. A privileged attempt
 * that fails with an authentication signature parks in `needsCredential`
 * until the UI supplies a password or cancels; each retry is a new task.
 */
export class OperationExecutor {
  private readonly operations = new Map<OperationId, TrackedOperation>();
  private readonly byTask = new Map<TaskId, OperationId>();
  private readonly settledOrder: OperationId[] = [];
  private nextId: OperationId = 1;

  constructor(
    private readonly manager: AsyncTaskManager,
    private readonly gateway: OperationGateway,
    private readonly bus: StatusBus,
    private readonly logger: Logger = silentLogger
  ) {}

  execute(request: OperationRequest, onSettled?: SettlementListener): OperationId {
    const operation: TrackedOperation = {
      id: this.nextId,
      request,
      phase: "attempting",
      taskIds: [],
      rejectionCount: 0,
      onSettled
    };
    this.nextId += 1;
    this.operations.set(operation.id, operation);
    this.attempt(operation);
    return operation.id;
  }

  /** Routes a polled completion; ignores tasks it did not submit. */
  handleCompletion(completion: TaskCompletion): ExecutorEvent | undefined {
    const operationId = this.byTask.get(completion.id);
    if (operationId === undefined) {
      return undefined;
    }
    this.byTask.delete(completion.id);

    const operation = this.operations.get(operationId);
    if (!operation || operation.phase !== "attempting") {
      return undefined;
    }

    const { outcome } = completion;
    if (outcome.ok) {
      operation.phase = "succeeded";
      return this.settle(operation, {
        status: "success",
        operationId: operation.id,
        request: operation.request,
        payload: outcome.payload
      });
    }

    const { reason } = outcome;
    if ((reason.code === "authRequired" || reason.code === "authRejected") && isPrivileged(operation.request.kind)) {
      return this.requestCredential(operation, reason);
    }

    operation.phase = "failed";
    this.bus.publish(reason.message, "error");
    return this.settle(operation, {
      status: "failure",
      operationId: operation.id,
      request: operation.request,
      reason
    });
  }

  supplyCredential(promptId: string, secret: string): void {
    const operation = this.awaitingCredential(promptId);
    if (secret.length === 0) {
      throw new InvalidCredentialError();
    }

    operation.prompt = undefined;
    operation.phase = "attempting";
    this.bus.publish(`Retrying ${describeRequest(operation.request)} with password`);
    this.attempt(operation, secret);
  }

  cancelPrompt(promptId: string): OperationSettlement {
    const operation = this.awaitingCredential(promptId);
    operation.prompt = undefined;
    operation.phase = "cancelled";
    this.bus.publish("Password entry cancelled.");
    const settlement: OperationSettlement = {
      status: "cancelled",
      operationId: operation.id,
      request: operation.request
    };
    this.settle(operation, settlement);
    return settlement;
  }

  /** Gives up on a prompt, settling the operation as a rejected credential. */
  abandon(promptId: string, message: string): OperationSettlement {
    const operation = this.awaitingCredential(promptId);
    operation.prompt = undefined;
    operation.phase = "failed";
    this.bus.publish(message, "error");
    const settlement: OperationSettlement = {
      status: "failure",
      operationId: operation.id,
      request: operation.request,
      reason: { code: "authRejected", message }
    };
    this.settle(operation, settlement);
    return settlement;
  }

  prompts(): CredentialPrompt[] {
    const open: CredentialPrompt[] = [];
    for (const operation of this.operations.values()) {
      if (operation.phase === "needsCredential" && operation.prompt) {
        open.push(operation.prompt);
      }
    }
    return open;
  }

  operation(id: OperationId): OperationSnapshot | undefined {
    const operation = this.operations.get(id);
    if (!operation) {
      return undefined;
    }
    return {
      id: operation.id,
      request: operation.request,
      phase: operation.phase,
      taskIds: [...operation.taskIds],
      rejectionCount: operation.rejectionCount
    };
  }

  private attempt(operation: TrackedOperation, credential?: string): void {
    const { request } = operation;
    const taskId = this.manager.submit(request, (signal) =>
      this.gateway.execute(request, credential === undefined ? { signal } : { signal, credential })
    );
    operation.taskIds.push(taskId);
    this.byTask.set(taskId, operation.id);
    this.logger.debug(`Operation ${operation.id} attempt ${operation.taskIds.length} is task ${taskId}`);
  }

  private requestCredential(operation: TrackedOperation, reason: FailureReason): ExecutorEvent {
    if (reason.code === "authRejected") {
      operation.rejectionCount += 1;
    }
    operation.promptId ??= `prompt-${operation.id}`;
    operation.phase = "needsCredential";

    const description = describeRequest(operation.request);
    const rejected = reason.code === "authRejected";
    const prompt: CredentialPrompt = {
      id: operation.promptId,
      operationId: operation.id,
      title: `Password required: ${description}`,
      message: rejected
        ? "Incorrect password, try again."
        : "This operation requires the administrator password.",
      rejectionCount: operation.rejectionCount
    };
    operation.prompt = prompt;

    this.bus.publish(
      rejected ? `Incorrect password for ${description}` : `Password required to ${description}`,
      rejected ? "warn" : "info"
    );
    return { type: "needsCredential", prompt };
  }

  private awaitingCredential(promptId: string): TrackedOperation {
    for (const operation of this.operations.values()) {
      if (operation.promptId === promptId && operation.phase === "needsCredential") {
        return operation;
      }
    }
    throw new UnknownPromptError(promptId);
  }

  private settle(operation: TrackedOperation, settlement: OperationSettlement): ExecutorEvent {
    this.logger.debug(`Operation ${operation.id} settled: ${settlement.status}`);
    this.settledOrder.push(operation.id);
    while (this.settledOrder.length > SETTLED_HISTORY) {
      const oldest = this.settledOrder.shift();
      if (oldest !== undefined) {
        this.operations.delete(oldest);
      }
    }
    operation.onSettled?.(settlement);
    return { type: "settled", settlement };
  }
}
