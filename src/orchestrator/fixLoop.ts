import { RepairContext } from "../agents/generationAgent";
import { RepairBudgetExhaustedError } from "../errors";
import { ErrorPolicy, defaultErrorPolicy, filterActionable, identifyImplicatedFiles } from "../services/actionableErrors";
import { RunStore } from "../services/runStore";
import { CollaboratorContext, TestContext, TestReport } from "../types";
import { throwIfCancelled } from "../utils/async";

export interface TesterLike {
  runTests(servingUrl: string, ctx?: TestContext): Promise<TestReport>;
}

export interface RepairerLike {
  repair(filePath: string, context: RepairContext, modelId: string, ctx?: CollaboratorContext): Promise<string>;
}

export interface FixLoopWorkspace {
  componentFiles(): Promise<string[]>;
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, content: string): Promise<void>;
  projectContext(): Promise<string>;
}

export interface FixLoopParams {
  runId: string;
  servingUrl: string;
  maxAttempts: number;
  model: string;
  workspace: FixLoopWorkspace;
  testContext?: Omit<TestContext, "signal" | "onUsage">;
  signal?: AbortSignal;
  onUsage?: CollaboratorContext["onUsage"];
  afterRepair?: () => Promise<void>;
}

export interface FixLoopResult {
  attempts: number;
}

export class FixLoopController {
  constructor(
    private readonly tester: TesterLike,
    private readonly repairer: RepairerLike,
    private readonly runStore: RunStore,
    private readonly policy: ErrorPolicy = defaultErrorPolicy()
  ) {}

  // Tests, then repairs and re-tests until the filtered error set is empty or the budget is spent.
  async run(params: FixLoopParams): Promise<FixLoopResult> {
    const { runId, signal } = params;
    let attempt = 0;

    for (;;) {
      throwIfCancelled(signal);
      const components = await params.workspace.componentFiles();
      const report = await this.tester.runTests(params.servingUrl, {
        ...params.testContext,
        modules: params.testContext?.modules ?? ["src/App.jsx", ...components],
        signal,
        onUsage: params.onUsage
      });

      const { actionable, ignored } = filterActionable(report.errors, this.policy);
      this.runStore.pushEvent(runId, {
        type: "test",
        attempt,
        passed: actionable.length === 0,
        errors: actionable,
        ignored: ignored.length
      });

      if (actionable.length === 0) {
        this.runStore.setLastErrors(runId, []);
        return { attempts: attempt };
      }

      this.runStore.setLastErrors(runId, actionable);
      if (attempt >= params.maxAttempts) {
        throw new RepairBudgetExhaustedError(attempt, actionable);
      }

      attempt += 1;
      this.runStore.setFixAttempt(runId, attempt);

      const implicated = identifyImplicatedFiles(actionable, components);
      const targets = implicated.length > 0 ? implicated : components;
      this.runStore.pushEvent(runId, { type: "repair", attempt, maxAttempts: params.maxAttempts, files: targets });

      const projectContext = await params.workspace.projectContext();
      for (const filePath of targets) {
        throwIfCancelled(signal);
        const currentContent = await params.workspace.readFile(filePath);
        const repaired = await this.repairer.repair(
          filePath,
          { currentContent, errors: actionable, projectContext },
          params.model,
          { signal, onUsage: params.onUsage }
        );
        await params.workspace.writeFile(filePath, repaired);
      }

      await params.afterRepair?.();
    }
  }
}
