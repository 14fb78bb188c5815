import { describe, expect, it, vi } from "vitest";
import { BatchInProgressError, EmptyBatchError } from "../src/errors.js";
import type { BatchHooks } from "../src/services/batchProcessor.js";
import { SequentialBatchProcessor, formatBatchProgress } from "../src/services/batchProcessor.js";
import { OperationExecutor } from "../src/services/operationExecutor.js";
import { StatusBus } from "../src/services/statusBus.js";
import { AsyncTaskManager } from "../src/services/taskManager.js";
import type { OperationOutcome, PackageRef } from "../src/types.js";
import { failure, success } from "../src/types.js";
import { FakeGateway, flush } from "./fakes.js";

const a: PackageRef = { name: "wget", kind: "formula" };
const b: PackageRef = { name: "jq", kind: "formula" };
const c: PackageRef = { name: "iterm2", kind: "cask" };
const ok = success({ type: "message", message: "ok" });

function setup(hooks: BatchHooks = {}) {
  const bus = new StatusBus();
  const manager = new AsyncTaskManager(bus);
  const gateway = new FakeGateway();
  const executor = new OperationExecutor(manager, gateway, bus);
  const batches = new SequentialBatchProcessor(executor, bus, hooks);

  const complete = async (outcome: OperationOutcome): Promise<void> => {
    gateway.last().outcome.resolve(outcome);
    await flush();
    for (const completion of manager.pollAll()) {
      executor.handleCompletion(completion);
    }
  };

  return { bus, gateway, executor, batches, complete };
}

describe("SequentialBatchProcessor", () => {
  it("runs items one at a time and keeps going after a failure", async () => {
    const onItemSucceeded = vi.fn();
    const { bus, gateway, batches, complete } = setup({ onItemSucceeded });

    expect(batches.start([a, b, c], "update")).toEqual({
      kind: "update",
      completedCount: 0,
      totalCount: 3,
      currentItemName: "wget",
      cancelled: false
    });
    expect(gateway.calls.map((call) => call.request)).toEqual([{ kind: "update", target: a }]);

    await complete(ok);
    expect(gateway.calls).toHaveLength(2);
    const progress = batches.progress();
    expect(progress && formatBatchProgress(progress)).toBe("Updating 2/3: jq");

    await complete(failure("externalToolError", "jq: checksum mismatch"));
    expect(gateway.calls.map((call) => call.request)).toEqual([
      { kind: "update", target: a },
      { kind: "update", target: b },
      { kind: "update", target: c }
    ]);

    await complete(ok);

    expect(batches.isActive).toBe(false);
    expect(batches.progress()).toBeUndefined();
    expect(batches.lastSummary()).toEqual({
      kind: "update",
      totalCount: 3,
      results: [
        { ref: a, status: "success" },
        { ref: b, status: "failure", reason: { code: "externalToolError", message: "jq: checksum mismatch" } },
        { ref: c, status: "success" }
      ],
      skippedCount: 0,
      cancelled: false
    });
    expect(gateway.calls).toHaveLength(3);
    expect(onItemSucceeded.mock.calls).toEqual([
      [a, "update"],
      [c, "update"]
    ]);
    expect(bus.current()).toBe("Batch update finished: 2 succeeded, 1 failed");
  });

  it("stops submitting after cancel but lets the current item finish", async () => {
    const onFinished = vi.fn();
    const { bus, gateway, batches, complete } = setup({ onFinished });
    batches.start([a, b, c], "install");

    expect(batches.cancel()).toBe(true);
    expect(bus.current()).toBe("Batch install cancelled; 2 remaining item(s) will be skipped");
    expect(batches.cancel()).toBe(false);

    await complete(ok);

    expect(gateway.calls).toHaveLength(1);
    expect(onFinished).toHaveBeenCalledWith({
      kind: "install",
      totalCount: 3,
      results: [{ ref: a, status: "success" }],
      skippedCount: 2,
      cancelled: true
    });
    expect(bus.current()).toBe("Batch install cancelled: 1 succeeded, 2 skipped");
  });

  it("refuses a second batch and an empty one", () => {
    const { batches } = setup();

    expect(() => batches.start([], "install")).toThrow(EmptyBatchError);
    batches.start([a], "install");
    expect(() => batches.start([b], "install")).toThrow(BatchInProgressError);
  });

  it("records a dismissed password prompt as cancelled and moves on", async () => {
    const { gateway, executor, batches, complete } = setup();
    batches.start([a, b], "install");

    await complete(failure("authRequired", "brew install requires an administrator password"));
    executor.cancelPrompt("prompt-1");

    expect(gateway.calls.map((call) => call.request)).toEqual([
      { kind: "install", target: a },
      { kind: "install", target: b }
    ]);
    await complete(ok);
    expect(batches.lastSummary()?.results).toEqual([
      { ref: a, status: "cancelled" },
      { ref: b, status: "success" }
    ]);
  });

  it("does not reuse a password for the next item", async () => {
    const { gateway, executor, batches, complete } = setup();
    batches.start([a, b], "install");

    await complete(failure("authRequired", "brew install requires an administrator password"));
    executor.supplyCredential("prompt-1", "test-secret");
    await complete(ok);

    expect(gateway.calls.map((call) => call.options.credential)).toEqual([undefined, "test-secret", undefined]);
  });
});
