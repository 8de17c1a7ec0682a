import { describe, expect, it } from "vitest";
import { CapacityError, ProjectBusyError } from "../../src/errors";
import { ProjectLockManager } from "../../src/services/projectLockManager";

describe("ProjectLockManager", () => {
  it("admits one run per project", () => {
    const locks = new ProjectLockManager({ maxConcurrentRuns: 4, devPortBase: 5173 });

    locks.admit("run-1", "demo");
    locks.admit("run-1", "demo");

    expect(locks.ownerOf("demo")).toBe("run-1");
    expect(() => locks.admit("run-2", "demo")).toThrow(ProjectBusyError);
    try {
      locks.admit("run-2", "demo");
    } catch (error: unknown) {
      expect(error).toMatchObject({ project: "demo", activeRunId: "run-1", reason: "project_busy" });
    }
  });

  it("caps the number of concurrent runs", () => {
    const locks = new ProjectLockManager({ maxConcurrentRuns: 1, devPortBase: 5173 });

    locks.admit("run-1", "demo");

    expect(() => locks.admit("run-2", "other")).toThrow(CapacityError);
    expect(locks.activeCount()).toBe(1);
  });

  it("frees the project and the port on release", () => {
    const locks = new ProjectLockManager({ maxConcurrentRuns: 1, devPortBase: 5173 });
    locks.admit("run-1", "demo");
    locks.allocatePort("run-1");

    locks.release("run-1");

    expect(locks.ownerOf("demo")).toBeUndefined();
    expect(locks.isLocked("demo")).toBe(false);
    locks.admit("run-2", "demo");
    expect(locks.allocatePort("run-2")).toBe(5173);
  });

  it("hands out distinct ports and skips reserved ones", () => {
    const locks = new ProjectLockManager({ maxConcurrentRuns: 4, devPortBase: 5173 });

    expect(locks.allocatePort("run-1")).toBe(5173);
    expect(locks.allocatePort("run-2", [5174])).toBe(5175);
    expect(locks.allocatePort("run-1")).toBe(5173);

    locks.releasePort("run-1");
    expect(locks.allocatePort("run-3")).toBe(5173);
  });
});
