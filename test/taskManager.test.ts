import { afterEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG } from "../src/config.js";
import { StatusBus } from "../src/services/statusBus.js";
import { AsyncTaskManager } from "../src/services/taskManager.js";
import type { OperationOutcome, OperationRequest } from "../src/types.js";
import { success } from "../src/types.js";
import { deferred, flush } from "./fakes.js";

const done = success({ type: "message", message: "done" });

function install(name: string): OperationRequest {
  return { kind: "install", target: { name, kind: "formula" } };
}

function info(name: string): OperationRequest {
  return { kind: "getInfo", target: { name, kind: "formula" } };
}

describe("AsyncTaskManager", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs one privileged task at a time in submission order", async () => {
    const bus = new StatusBus();
    const manager = new AsyncTaskManager(bus);
    const first = deferred<OperationOutcome>();
    const second = deferred<OperationOutcome>();
    const secondWork = vi.fn(() => second.promise);

    const a = manager.submit(install("wget"), () => first.promise);
    const b = manager.submit(install("jq"), secondWork);

    expect([a, b]).toEqual([1, 2]);
    expect(manager.state(a)).toBe("running");
    expect(manager.state(b)).toBe("queued");
    expect(secondWork).not.toHaveBeenCalled();
    expect(bus.current()).toBe("Queued: install jq (formula) (waiting for the running operation)");

    first.resolve(done);
    await flush();

    expect(manager.pollAll()).toEqual([{ id: a, request: install("wget"), outcome: done }]);
    expect(manager.state(b)).toBe("running");
    expect(secondWork).toHaveBeenCalledTimes(1);
  });

  it("reports each completion exactly once", async () => {
    const manager = new AsyncTaskManager(new StatusBus());
    const work = deferred<OperationOutcome>();
    manager.submit(info("jq"), () => work.promise);

    expect(manager.pollAll()).toEqual([]);
    work.resolve(done);
    await flush();

    expect(manager.pollAll()).toHaveLength(1);
    expect(manager.pollAll()).toEqual([]);
    expect(manager.isIdle()).toBe(true);
  });

  it("caps concurrent lookups and starts queued ones as slots free", async () => {
    const manager = new AsyncTaskManager(new StatusBus(), { maxConcurrentLookups: 2 });
    const works = [deferred<OperationOutcome>(), deferred<OperationOutcome>(), deferred<OperationOutcome>()];
    const ids = works.map((work, index) => manager.submit(info(`pkg${index}`), () => work.promise));

    expect(ids.map((id) => manager.state(id))).toEqual(["running", "running", "queued"]);

    works[0]?.resolve(done);
    await flush();
    manager.pollAll();

    expect(ids.map((id) => manager.state(id))).toEqual([undefined, "running", "running"]);
  });

  it("lets lookups run beside a privileged task", () => {
    const manager = new AsyncTaskManager(new StatusBus());
    manager.submit(install("wget"), () => deferred<OperationOutcome>().promise);
    const lookup = manager.submit(info("jq"), () => deferred<OperationOutcome>().promise);

    expect(manager.state(lookup)).toBe("running");
    expect(manager.privilegedInFlight()).toBe(1);
  });

  it("removes a cancelled queued task without running it", () => {
    const bus = new StatusBus();
    const manager = new AsyncTaskManager(bus);
    const queuedWork = vi.fn(() => deferred<OperationOutcome>().promise);
    manager.submit(install("wget"), () => deferred<OperationOutcome>().promise);
    const queued = manager.submit(install("jq"), queuedWork);

    expect(manager.cancel(queued)).toBe(true);

    expect(manager.state(queued)).toBeUndefined();
    expect(bus.current()).toBe("Cancelled: install jq (formula)");
    manager.pollAll();
    expect(queuedWork).not.toHaveBeenCalled();
  });

  it("keeps the privileged slot until cancelled work settles and discards its result", async () => {
    const manager = new AsyncTaskManager(new StatusBus());
    const first = deferred<OperationOutcome>();
    const a = manager.submit(install("wget"), () => first.promise);
    const b = manager.submit(install("jq"), () => deferred<OperationOutcome>().promise);

    expect(manager.cancel(a)).toBe(true);
    expect(manager.state(a)).toBe("cancelled");
    expect(manager.pollAll()).toEqual([]);
    expect(manager.state(b)).toBe("queued");

    first.resolve(done);
    await flush();

    expect(manager.pollAll()).toEqual([]);
    expect(manager.state(a)).toBeUndefined();
    expect(manager.state(b)).toBe("running");
  });

  it("does not cancel a task that already completed", async () => {
    const manager = new AsyncTaskManager(new StatusBus());
    const work = deferred<OperationOutcome>();
    const id = manager.submit(info("jq"), () => work.promise);
    work.resolve(done);
    await flush();

    expect(manager.cancel(id)).toBe(false);
    expect(manager.pollAll()).toHaveLength(1);
  });

  it("times out tasks that run past their deadline", () => {
    vi.useFakeTimers();
    const manager = new AsyncTaskManager(new StatusBus(), {
      timeouts: { ...DEFAULT_CONFIG.timeouts, lookupMs: 1000 }
    });
    let received: AbortSignal | undefined;
    const id = manager.submit(info("jq"), (signal) => {
      received = signal;
      return deferred<OperationOutcome>().promise;
    });

    vi.advanceTimersByTime(999);
    expect(manager.pollAll()).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(manager.pollAll()).toEqual([
      {
        id,
        request: info("jq"),
        outcome: { ok: false, reason: { code: "timeout", message: "load info for jq (formula) timed out after 1s" } }
      }
    ]);
    expect(received?.aborted).toBe(true);
  });

  it("keeps the privileged slot after a timeout until the work settles", async () => {
    vi.useFakeTimers();
    const manager = new AsyncTaskManager(new StatusBus(), {
      timeouts: { ...DEFAULT_CONFIG.timeouts, privilegedMs: 1000 }
    });
    const first = deferred<OperationOutcome>();
    const secondWork = vi.fn(() => deferred<OperationOutcome>().promise);
    const a = manager.submit(install("wget"), () => first.promise);

    vi.advanceTimersByTime(1000);
    expect(manager.pollAll().map((completion) => completion.outcome.ok)).toEqual([false]);

    const b = manager.submit(install("jq"), secondWork);
    expect(manager.state(b)).toBe("queued");
    expect(manager.privilegedInFlight()).toBe(a);
    manager.pollAll();
    expect(secondWork).not.toHaveBeenCalled();

    first.resolve(done);
    await flush();

    expect(manager.pollAll()).toEqual([]);
    expect(manager.state(b)).toBe("running");
    expect(secondWork).toHaveBeenCalledTimes(1);
  });

  it("counts a timed-out lookup against the cap until it settles", async () => {
    vi.useFakeTimers();
    const manager = new AsyncTaskManager(new StatusBus(), {
      maxConcurrentLookups: 1,
      timeouts: { ...DEFAULT_CONFIG.timeouts, lookupMs: 1000 }
    });
    const first = deferred<OperationOutcome>();
    manager.submit(info("jq"), () => first.promise);

    vi.advanceTimersByTime(1000);
    expect(manager.pollAll()).toHaveLength(1);

    const next = manager.submit(info("wget"), () => deferred<OperationOutcome>().promise);
    expect(manager.state(next)).toBe("queued");

    first.resolve(done);
    await flush();
    manager.pollAll();

    expect(manager.state(next)).toBe("running");
  });

  it("turns a rejected task into an external tool failure", async () => {
    const manager = new AsyncTaskManager(new StatusBus());
    manager.submit(info("jq"), () => Promise.reject(new Error("spawn brew ENOENT")));
    await flush();

    expect(manager.pollAll()).toEqual([
      {
        id: 1,
        request: info("jq"),
        outcome: { ok: false, reason: { code: "externalToolError", message: "spawn brew ENOENT" } }
      }
    ]);
  });

  it("publishes a status event for every submission", () => {
    const bus = new StatusBus();
    const manager = new AsyncTaskManager(bus, { maxConcurrentLookups: 1 });

    manager.submit(install("wget"), () => deferred<OperationOutcome>().promise);
    manager.submit(install("jq"), () => deferred<OperationOutcome>().promise);
    manager.submit(info("a"), () => deferred<OperationOutcome>().promise);
    manager.submit(info("b"), () => deferred<OperationOutcome>().promise);

    expect(bus.snapshot().map((event) => event.line)).toEqual([
      "Started: install wget (formula)",
      "Queued: install jq (formula) (waiting for the running operation)",
      "Started: load info for a (formula)",
      "Queued: load info for b (formula)"
    ]);
  });
});
