import { describe, expect, it, vi } from "vitest";
import { RunInput, RunStore } from "../../src/services/runStore";

const buildInput = (overrides: Partial<RunInput> = {}): RunInput => ({
  kind: "build",
  project: "demo",
  request: { idea: "a todo app", enrichModel: "enrich", buildModel: "build" },
  maxFixAttempts: 3,
  ...overrides
});

describe("RunStore", () => {
  it("creates pending runs with zeroed usage", () => {
    const store = new RunStore();

    const run = store.create(buildInput({ id: "run-1", sessionId: "s-1" }));

    expect(run).toMatchObject({
      id: "run-1",
      status: "pending",
      stage: "received",
      fixAttempt: 0,
      sessionId: "s-1",
      usage: { promptTokens: 0, completionTokens: 0, llmCalls: 0, estimatedCostUsd: 0 }
    });
    expect(store.get("run-1")).toBe(run);
  });

  it("numbers events per run and replays after a sequence number", () => {
    const store = new RunStore();
    const run = store.create(buildInput());

    store.pushEvent(run.id, { type: "log", level: "info", message: "one" });
    store.pushEvent(run.id, { type: "log", level: "info", message: "two" });
    const third = store.pushEvent(run.id, { type: "log", level: "info", message: "three" });

    expect(third.seq).toBe(3);
    expect(store.getEvents(run.id, 1).map((event) => event.seq)).toEqual([2, 3]);
    expect(store.getEvents("missing")).toEqual([]);
  });

  it("delivers live events to subscribers until they unsubscribe", () => {
    const store = new RunStore();
    const run = store.create(buildInput());
    const perRun = vi.fn();
    const everyRun = vi.fn();
    const unsubscribe = store.subscribe(run.id, perRun);
    store.subscribeAll(everyRun);

    store.pushEvent(run.id, { type: "log", level: "info", message: "one" });
    unsubscribe();
    store.pushEvent(run.id, { type: "log", level: "info", message: "two" });

    expect(perRun).toHaveBeenCalledTimes(1);
    expect(everyRun).toHaveBeenCalledTimes(2);
  });

  it("keeps the first terminal status", () => {
    const store = new RunStore();
    const run = store.create(buildInput());
    store.setStatus(run.id, "running");

    store.finish(run.id, "failed", { reason: "install_failed", message: "boom" });
    store.finish(run.id, "success");
    store.setStatus(run.id, "running");

    expect(store.get(run.id)).toMatchObject({
      status: "failed",
      stage: "failed",
      failure: { reason: "install_failed", message: "boom" }
    });
    expect(store.get(run.id)?.endedAt).toBeDefined();
  });

  it("accumulates token usage and estimates cost", () => {
    const store = new RunStore({ promptCostPer1k: 0.5, completionCostPer1k: 1.5 });
    const run = store.create(buildInput());

    store.addUsage(run.id, { promptTokens: 400, completionTokens: 1_000 });
    store.addUsage(run.id, { promptTokens: 600, completionTokens: 1_000 });

    expect(store.get(run.id)?.usage).toEqual({
      promptTokens: 1_000,
      completionTokens: 2_000,
      llmCalls: 2,
      estimatedCostUsd: 3.5
    });
  });

  it("lists only the active runs of a session", () => {
    const store = new RunStore();
    const first = store.create(buildInput({ id: "a", sessionId: "s-1" }));
    store.create(buildInput({ id: "b", sessionId: "s-1", project: "other" }));
    store.create(buildInput({ id: "c", sessionId: "s-2", project: "third" }));
    store.finish(first.id, "cancelled");

    expect(store.bySession("s-1").map((run) => run.id)).toEqual(["b"]);
    expect(store.active()).toHaveLength(2);
    expect(store.all()).toHaveLength(3);
  });

  it("drops the oldest finished runs past the retention cap", () => {
    const store = new RunStore(undefined, 2);
    const live = store.create(buildInput({ id: "live" }));
    for (const id of ["a", "b", "c"]) {
      store.create(buildInput({ id, project: id }));
      store.pushEvent(id, { type: "log", level: "info", message: `run ${id}` });
      store.finish(id, "success");
    }

    expect(store.get("a")).toBeUndefined();
    expect(store.getEvents("a")).toEqual([]);
    expect(store.get("b")?.status).toBe("success");
    expect(store.getEvents("c").map((event) => event.type)).toEqual(["log"]);
    expect(store.get(live.id)?.status).toBe("pending");
    expect(store.all()).toHaveLength(3);
  });
});
