import { describe, expect, it, vi } from "vitest";
import { RepairBudgetExhaustedError, RunCancelledError } from "../../src/errors";
import { FixLoopController, FixLoopWorkspace, RepairerLike, TesterLike } from "../../src/orchestrator/fixLoop";
import { RunStore } from "../../src/services/runStore";
import { TestReport } from "../../src/types";

const memoryWorkspace = (files: Record<string, string>): FixLoopWorkspace & { files: Record<string, string> } => ({
  files,
  componentFiles: async () => Object.keys(files).filter((file) => file.startsWith("src/components/")).sort(),
  readFile: async (filePath) => files[filePath] ?? "",
  writeFile: async (filePath, content) => {
    files[filePath] = content;
  },
  projectContext: async () => "context"
});

const scripted = (reports: TestReport[]): TesterLike => {
  let call = 0;
  return {
    runTests: vi.fn(async () => reports[Math.min(call++, reports.length - 1)])
  };
};

const repairer = (): RepairerLike => ({
  repair: vi.fn(async (filePath: string) => `// fixed ${filePath}\n`)
});

const setupRun = (): { store: RunStore; runId: string } => {
  const store = new RunStore();
  const run = store.create({ kind: "build", project: "demo", request: { idea: "x", enrichModel: "m", buildModel: "m" }, maxFixAttempts: 2 });
  return { store, runId: run.id };
};

describe("FixLoopController", () => {
  it("returns zero attempts when the first test passes", async () => {
    const { store, runId } = setupRun();
    const tester = scripted([{ passed: true, errors: [] }]);
    const fixer = repairer();
    const loop = new FixLoopController(tester, fixer, store);

    const result = await loop.run({
      runId,
      servingUrl: "http://127.0.0.1:5173",
      maxAttempts: 2,
      model: "m",
      workspace: memoryWorkspace({ "src/components/Hero.jsx": "hero" })
    });

    expect(result).toEqual({ attempts: 0 });
    expect(fixer.repair).not.toHaveBeenCalled();
    expect(tester.runTests).toHaveBeenCalledWith(
      "http://127.0.0.1:5173",
      expect.objectContaining({ modules: ["src/App.jsx", "src/components/Hero.jsx"] })
    );
  });

  it("repairs only the files named by the errors", async () => {
    const { store, runId } = setupRun();
    const workspace = memoryWorkspace({ "src/components/Footer.jsx": "footer", "src/components/Hero.jsx": "hero" });
    const tester = scripted([
      { passed: false, errors: [{ message: "[plugin:vite:react-babel] /app/src/components/Footer.jsx: Unexpected token (4:2)" }] },
      { passed: true, errors: [] }
    ]);
    const fixer = repairer();
    const afterRepair = vi.fn(async () => undefined);

    const result = await new FixLoopController(tester, fixer, store).run({
      runId,
      servingUrl: "http://127.0.0.1:5173",
      maxAttempts: 2,
      model: "m",
      workspace,
      afterRepair
    });

    expect(result).toEqual({ attempts: 1 });
    expect(fixer.repair).toHaveBeenCalledTimes(1);
    expect(fixer.repair).toHaveBeenCalledWith(
      "src/components/Footer.jsx",
      expect.objectContaining({ currentContent: "footer", projectContext: "context" }),
      "m",
      expect.any(Object)
    );
    expect(workspace.files["src/components/Footer.jsx"]).toBe("// fixed src/components/Footer.jsx\n");
    expect(workspace.files["src/components/Hero.jsx"]).toBe("hero");
    expect(afterRepair).toHaveBeenCalledTimes(1);
    expect(store.get(runId)?.fixAttempt).toBe(1);
    expect(store.get(runId)?.lastErrors).toEqual([]);
  });

  it("repairs every component when no file can be implicated", async () => {
    const { store, runId } = setupRun();
    const tester = scripted([
      { passed: false, errors: [{ message: "Page appears completely blank" }] },
      { passed: true, errors: [] }
    ]);
    const fixer = repairer();

    await new FixLoopController(tester, fixer, store).run({
      runId,
      servingUrl: "http://127.0.0.1:5173",
      maxAttempts: 1,
      model: "m",
      workspace: memoryWorkspace({ "src/components/A.jsx": "a", "src/components/B.jsx": "b" })
    });

    const repair = store.getEvents(runId).find((event) => event.type === "repair");
    expect(repair).toMatchObject({ attempt: 1, maxAttempts: 1, files: ["src/components/A.jsx", "src/components/B.jsx"] });
  });

  it("throws with the last actionable errors once the budget is spent", async () => {
    const { store, runId } = setupRun();
    const errors = [{ message: "TypeError: Cannot read properties of undefined (reading 'map')" }];
    const tester = scripted([{ passed: false, errors }]);
    const fixer = repairer();

    const failure = await new FixLoopController(tester, fixer, store)
      .run({
        runId,
        servingUrl: "http://127.0.0.1:5173",
        maxAttempts: 2,
        model: "m",
        workspace: memoryWorkspace({ "src/components/Hero.jsx": "hero" })
      })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(RepairBudgetExhaustedError);
    expect(failure).toMatchObject({ reason: "repair_budget_exhausted", lastErrors: errors });
    expect(tester.runTests).toHaveBeenCalledTimes(3);
    expect(fixer.repair).toHaveBeenCalledTimes(2);
    expect(store.get(runId)?.lastErrors).toEqual(errors);
  });

  it("ignores noise and counts it on the test event", async () => {
    const { store, runId } = setupRun();
    const tester = scripted([
      { passed: false, errors: [{ message: "Warning: Each child in a list should have a unique key prop." }] }
    ]);

    await new FixLoopController(tester, repairer(), store).run({
      runId,
      servingUrl: "http://127.0.0.1:5173",
      maxAttempts: 2,
      model: "m",
      workspace: memoryWorkspace({})
    });

    const tests = store.getEvents(runId).filter((event) => event.type === "test");
    expect(tests).toHaveLength(1);
    expect(tests[0]).toMatchObject({ attempt: 0, passed: true, errors: [], ignored: 1 });
  });

  it("stops before testing when the signal is already aborted", async () => {
    const { store, runId } = setupRun();
    const tester = scripted([{ passed: true, errors: [] }]);
    const controller = new AbortController();
    controller.abort();

    await expect(
      new FixLoopController(tester, repairer(), store).run({
        runId,
        servingUrl: "http://127.0.0.1:5173",
        maxAttempts: 2,
        model: "m",
        workspace: memoryWorkspace({}),
        signal: controller.signal
      })
    ).rejects.toBeInstanceOf(RunCancelledError);
    expect(tester.runTests).not.toHaveBeenCalled();
  });
});
