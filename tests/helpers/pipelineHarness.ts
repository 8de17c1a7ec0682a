import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { RepairContext, RewriteRequest, TargetSelectionRequest } from "../../src/agents/generationAgent";
import { EnricherLike, GeneratorLike, OrchestratorSettings, PipelineOrchestrator } from "../../src/orchestrator/pipelineOrchestrator";
import { TesterLike } from "../../src/orchestrator/fixLoop";
import { ProcessSupervisor } from "../../src/services/processSupervisor";
import { ProjectLockManager } from "../../src/services/projectLockManager";
import { ProjectStore } from "../../src/services/projectStore";
import { RunStore } from "../../src/services/runStore";
import { CollaboratorContext, GeneratedFile, ProjectSpecification, TestContext, TestReport } from "../../src/types";
import { createFakeProcessEnv, createTestSupervisor, FakeProcessBehaviour, FakeProcessEnv } from "./fakeProcess";

export const APP_SHELL = [
  "import Header from './components/Header'",
  "import Hero from './components/Hero'",
  "",
  "export default function App() {",
  "  return (",
  '    <div className="min-h-screen bg-gray-900">',
  "      <Header />",
  "      <Hero />",
  "    </div>",
  "  )",
  "}",
  ""
].join("\n");

export const HEADER = [
  "export default function Header() {",
  '  return <header className="bg-gray-900"><button className="bg-red-500">Start</button></header>',
  "}",
  ""
].join("\n");

export const HERO = [
  "export default function Hero() {",
  '  return <section className="bg-gray-900"><h1>Plan your day</h1></section>',
  "}",
  ""
].join("\n");

export const seedFiles = (): GeneratedFile[] => [
  { path: "package.json", content: '{ "name": "demo" }\n' },
  { path: "src/App.jsx", content: APP_SHELL },
  { path: "src/components/Header.jsx", content: HEADER },
  { path: "src/components/Hero.jsx", content: HERO }
];

export const todoSpec = (): ProjectSpecification => ({
  projectName: "todo",
  siteType: "general",
  strategy: "react-sections",
  title: "Todo",
  tagline: "Get things done",
  description: "A small todo list.",
  features: ["due dates"],
  sections: ["Header", "Hero"],
  colorScheme: "dark",
  style: "minimal"
});

export class FakeEnricher implements EnricherLike {
  readonly calls: string[] = [];
  failWith?: Error;

  async enrich(idea: string): Promise<ProjectSpecification> {
    this.calls.push(idea);
    if (this.failWith) throw this.failWith;
    return todoSpec();
  }
}

// Rewrites and repairs wait on `gate` when it is set, and reject when the run is aborted meanwhile.
export class FakeGenerator implements GeneratorLike {
  readonly rewrites: RewriteRequest[] = [];
  readonly repairs: Array<{ filePath: string; context: RepairContext }> = [];
  gate?: Promise<void>;

  async *generate(): AsyncGenerator<GeneratedFile> {
    for (const file of seedFiles()) {
      yield file;
    }
  }

  async rewrite(request: RewriteRequest, _modelId: string, ctx: CollaboratorContext = {}): Promise<string> {
    this.rewrites.push(request);
    await this.wait(ctx.signal);
    return `export default function ${request.component}() {\n  return <section className="bg-blue-500">${request.component}</section>\n}\n`;
  }

  async repair(filePath: string, context: RepairContext, _modelId: string, ctx: CollaboratorContext = {}): Promise<string> {
    this.repairs.push({ filePath, context });
    await this.wait(ctx.signal);
    return `${context.currentContent}// repaired ${this.repairs.length}\n`;
  }

  private async wait(signal?: AbortSignal): Promise<void> {
    if (!this.gate) return;
    await new Promise<void>((resolve, reject) => {
      signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      this.gate?.then(resolve, reject);
    });
  }
}

// Answers with `choice`, or throws it when it is an error.
export class ChoosingGenerator extends FakeGenerator {
  readonly selections: TargetSelectionRequest[] = [];

  constructor(private readonly choice: string[] | Error) {
    super();
  }

  async chooseTargets(request: TargetSelectionRequest): Promise<string[]> {
    this.selections.push(request);
    if (this.choice instanceof Error) throw this.choice;
    return this.choice;
  }
}

// Scripted entries are returned in order, the last one repeating; an Error entry is thrown instead.
export class ScriptedTester implements TesterLike {
  readonly calls: Array<{ url: string; ctx?: TestContext }> = [];

  constructor(private readonly reports: Array<TestReport | Error> = [{ passed: true, errors: [] }]) {}

  async runTests(url: string, ctx?: TestContext): Promise<TestReport> {
    this.calls.push({ url, ctx });
    const next = this.reports[Math.min(this.calls.length - 1, this.reports.length - 1)];
    if (next instanceof Error) throw next;
    return next;
  }
}

export interface Harness {
  root: string;
  orchestrator: PipelineOrchestrator;
  runStore: RunStore;
  projectStore: ProjectStore;
  locks: ProjectLockManager;
  supervisor: ProcessSupervisor;
  env: FakeProcessEnv;
  enricher: FakeEnricher;
  generator: FakeGenerator;
  tester: ScriptedTester;
  cleanup(): Promise<void>;
}

export const testSettings = (): OrchestratorSettings => ({
  maxFixAttempts: 3,
  enrichModel: "enrich-test",
  buildModel: "build-test",
  installCommand: "install",
  serveCommand: "serve --port {port} --host {host}",
  devServerHost: "127.0.0.1",
  installTimeoutMs: 1_000,
  portTimeoutMs: 100,
  serveStartAttempts: 2,
  retainPreviewServer: false
});

export const createHarness = async (
  options: {
    reports?: Array<TestReport | Error>;
    generator?: FakeGenerator;
    settings?: Partial<OrchestratorSettings>;
    processes?: FakeProcessBehaviour;
    maxConcurrentRuns?: number;
  } = {}
): Promise<Harness> => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "site-forge-"));
  const env = createFakeProcessEnv(options.processes);
  const supervisor = createTestSupervisor(env);
  const runStore = new RunStore();
  const projectStore = new ProjectStore(root);
  const locks = new ProjectLockManager({ maxConcurrentRuns: options.maxConcurrentRuns ?? 2, devPortBase: 5173 });
  const enricher = new FakeEnricher();
  const generator = options.generator ?? new FakeGenerator();
  const tester = new ScriptedTester(options.reports);

  const orchestrator = new PipelineOrchestrator({
    runStore,
    projectStore,
    locks,
    supervisor,
    enrichment: enricher,
    generation: generator,
    tester,
    settings: { ...testSettings(), ...options.settings }
  });

  return {
    root,
    orchestrator,
    runStore,
    projectStore,
    locks,
    supervisor,
    env,
    enricher,
    generator,
    tester,
    cleanup: async () => {
      await orchestrator.shutdown();
      await fs.rm(root, { recursive: true, force: true });
    }
  };
};

export const seedProject = async (harness: Harness, name = "demo"): Promise<void> => {
  await harness.projectStore.importProject(name, seedFiles(), "Demo");
};

export const eventTypes = (harness: Harness, runId: string): string[] =>
  harness.runStore.getEvents(runId).map((event) => event.type);
