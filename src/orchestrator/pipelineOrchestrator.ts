import { randomUUID } from "node:crypto";
import { createTwoFilesPatch } from "diff";
import { config } from "../config";
import { RewriteRequest, TargetSelectionRequest, summarizeCodebase } from "../agents/generationAgent";
import {
  CollaboratorError,
  ForgeError,
  InfrastructureError,
  InputError,
  ProcessTimeoutError,
  RepairBudgetExhaustedError,
  RunCancelledError,
  errorMessage,
  isCancellation,
  toFailure
} from "../errors";
import { componentLogger, Logger } from "../logger";
import { ErrorPolicy } from "../services/actionableErrors";
import { COMPOSITION_ROOT, injectComponent } from "../services/compositionRoot";
import { acceptChosenTargets, classify, resolveTargets } from "../services/intentClassifier";
import { ProcessHandle, ProcessSupervisor } from "../services/processSupervisor";
import { ProjectLockManager } from "../services/projectLockManager";
import { ProjectStore } from "../services/projectStore";
import { RunStore } from "../services/runStore";
import { componentPath, projectReadme } from "../services/scaffold";
import {
  BuildRequest,
  CollaboratorContext,
  FailureReason,
  GeneratedFile,
  Intent,
  LogLevel,
  PipelineStage,
  ProjectArchive,
  ProjectFileSet,
  ProjectLifecycle,
  ProjectMeta,
  ProjectSpecification,
  ProjectState,
  ProjectSummary,
  RepromptRequest,
  RunState
} from "../types";
import { throwIfCancelled } from "../utils/async";
import { byteSize, fillTemplate, projectSlugFromIdea } from "../utils/text";
import { FixLoopController, FixLoopResult, FixLoopWorkspace, RepairerLike, TesterLike } from "./fixLoop";

export interface EnricherLike {
  enrich(idea: string, modelId: string, ctx?: CollaboratorContext): Promise<ProjectSpecification>;
}

export interface GeneratorLike extends RepairerLike {
  generate(spec: ProjectSpecification, modelId: string, ctx?: CollaboratorContext): AsyncIterable<GeneratedFile>;
  rewrite(request: RewriteRequest, modelId: string, ctx?: CollaboratorContext): Promise<string>;
  chooseTargets?(request: TargetSelectionRequest, modelId: string, ctx?: CollaboratorContext): Promise<string[]>;
}

export interface OrchestratorSettings {
  maxFixAttempts: number;
  enrichModel: string;
  buildModel: string;
  installCommand: string;
  serveCommand: string;
  devServerHost: string;
  installTimeoutMs: number;
  portTimeoutMs: number;
  serveStartAttempts: number;
  retainPreviewServer: boolean;
}

export interface OrchestratorDeps {
  runStore: RunStore;
  projectStore: ProjectStore;
  locks: ProjectLockManager;
  supervisor: ProcessSupervisor;
  enrichment: EnricherLike;
  generation: GeneratorLike;
  tester: TesterLike;
  settings?: Partial<OrchestratorSettings>;
  policy?: ErrorPolicy;
  logger?: Logger;
}

export interface StartBuildInput {
  idea: string;
  enrichModel?: string;
  buildModel?: string;
  sessionId?: string;
}

export interface StartUpdateInput {
  project: string;
  instruction: string;
  intent?: Intent;
  target?: string;
  buildModel?: string;
  sessionId?: string;
}

type TerminalStatus = "success" | "failed" | "cancelled";

interface RunContext {
  run: RunState;
  signal: AbortSignal;
  collab: CollaboratorContext;
  projectReady: boolean;
  previousLifecycle?: ProjectLifecycle;
  serveHandle?: ProcessHandle;
}

interface RunOutcome {
  servingUrl?: string;
  attempts: number;
}

export const previewOwner = (project: string): string => `preview:${project}`;

const defaultSettings = (): OrchestratorSettings => ({
  maxFixAttempts: config.maxFixAttempts,
  enrichModel: config.enrichModel,
  buildModel: config.buildModel,
  installCommand: config.installCommand,
  serveCommand: config.serveCommand,
  devServerHost: config.devServerHost,
  installTimeoutMs: config.installTimeoutMs,
  portTimeoutMs: config.portTimeoutMs,
  serveStartAttempts: config.serveStartAttempts,
  retainPreviewServer: config.retainPreviewServer
});

const pick = (value: string | undefined, fallback: string): string => value?.trim() || fallback;

const contentsOf = (files: ProjectFileSet): Record<string, string> =>
  Object.fromEntries(Object.entries(files).map(([filePath, file]) => [filePath, file.content]));

export class PipelineOrchestrator {
  private readonly controllers = new Map<string, AbortController>();
  private readonly tasks = new Map<string, Promise<void>>();
  private readonly settings: OrchestratorSettings;
  private readonly fixLoop: FixLoopController;
  private readonly logger: Logger;

  constructor(private readonly deps: OrchestratorDeps) {
    this.settings = { ...defaultSettings(), ...deps.settings };
    this.fixLoop = new FixLoopController(deps.tester, deps.generation, deps.runStore, deps.policy);
    this.logger = deps.logger ?? componentLogger("orchestrator");
  }

  async startBuild(input: StartBuildInput): Promise<RunState> {
    const idea = input.idea.trim();
    if (!idea) {
      throw new InputError("Idea must not be empty.");
    }

    const runId = randomUUID();
    const project = await this.admitFreshProject(runId, projectSlugFromIdea(idea));
    const request: BuildRequest = {
      idea,
      enrichModel: pick(input.enrichModel, this.settings.enrichModel),
      buildModel: pick(input.buildModel, this.settings.buildModel)
    };
    const run = this.deps.runStore.create({
      id: runId,
      kind: "build",
      project,
      request,
      maxFixAttempts: this.settings.maxFixAttempts,
      sessionId: input.sessionId
    });
    this.launch(run, (ctx) => this.executeBuild(ctx, request));
    return run;
  }

  async startUpdate(input: StartUpdateInput): Promise<RunState> {
    const instruction = input.instruction.trim();
    if (!instruction) {
      throw new InputError("Instruction must not be empty.");
    }
    await this.deps.projectStore.assertExists(input.project);

    const runId = randomUUID();
    this.deps.locks.admit(runId, input.project);
    const request: RepromptRequest = {
      project: input.project,
      instruction,
      intent: input.intent,
      target: input.target?.trim() || undefined,
      buildModel: pick(input.buildModel, this.settings.buildModel)
    };
    const run = this.deps.runStore.create({
      id: runId,
      kind: "update",
      project: input.project,
      request,
      maxFixAttempts: this.settings.maxFixAttempts,
      sessionId: input.sessionId
    });
    this.launch(run, (ctx) => this.executeUpdate(ctx, request));
    return run;
  }

  cancel(runId: string): boolean {
    const controller = this.controllers.get(runId);
    if (!controller || controller.signal.aborted) {
      return false;
    }
    this.deps.runStore.pushEvent(runId, { type: "log", level: "warn", message: "Cancellation requested." });
    controller.abort();
    return true;
  }

  cancelSession(sessionId: string): string[] {
    return this.deps.runStore
      .bySession(sessionId)
      .map((run) => run.id)
      .filter((runId) => this.cancel(runId));
  }

  async waitForRun(runId: string): Promise<RunState | undefined> {
    await this.tasks.get(runId);
    return this.deps.runStore.get(runId);
  }

  async shutdown(): Promise<void> {
    for (const runId of [...this.controllers.keys()]) {
      this.cancel(runId);
    }
    await Promise.allSettled([...this.tasks.values()]);
    await this.deps.supervisor.stopAll();
  }

  async listProjects(): Promise<ProjectSummary[]> {
    return this.deps.projectStore.list();
  }

  async readProjectFiles(project: string): Promise<ProjectFileSet> {
    return this.deps.projectStore.readFiles(project);
  }

  async exportProject(project: string): Promise<ProjectArchive> {
    return this.deps.projectStore.exportArchive(project);
  }

  // The import holds the project lock like a run, so no build can claim the name while files are written.
  async importProject(project: string, files: GeneratedFile[], title?: string): Promise<ProjectMeta> {
    const owner = `import:${randomUUID()}`;
    this.deps.locks.admit(owner, project);
    try {
      return await this.deps.projectStore.importProject(project, files, title);
    } finally {
      this.deps.locks.release(owner);
    }
  }

  // Slug choice and admission happen without an await in between, so two builds of the same idea get distinct names.
  private async admitFreshProject(runId: string, base: string): Promise<string> {
    const locked = (name: string): boolean => this.deps.locks.ownerOf(name) !== undefined;
    for (;;) {
      const candidate = await this.deps.projectStore.uniqueName(base, locked);
      if (!locked(candidate)) {
        this.deps.locks.admit(runId, candidate);
        return candidate;
      }
    }
  }

  private launch(run: RunState, work: (ctx: RunContext) => Promise<RunOutcome>): void {
    const controller = new AbortController();
    this.controllers.set(run.id, controller);
    this.deps.runStore.setStatus(run.id, "running");
    this.deps.runStore.pushEvent(run.id, {
      type: "step",
      stage: "received",
      status: "done",
      message: `${run.kind === "build" ? "Build" : "Update"} accepted for ${run.project}`
    });

    const task = this.drive(run, controller.signal, work)
      .catch((error: unknown) => {
        this.logger.error({ err: error, runId: run.id }, "run driver failed");
        this.deps.locks.release(run.id);
        this.deps.runStore.finish(run.id, "failed", { reason: "internal", message: errorMessage(error) });
        this.deps.runStore.pushEvent(run.id, { type: "error", reason: "internal", message: errorMessage(error) });
      })
      .finally(() => {
        this.controllers.delete(run.id);
        this.tasks.delete(run.id);
      });
    this.tasks.set(run.id, task);
  }

  private async drive(run: RunState, signal: AbortSignal, work: (ctx: RunContext) => Promise<RunOutcome>): Promise<void> {
    const ctx: RunContext = {
      run,
      signal,
      projectReady: false,
      collab: {
        signal,
        onUsage: (usage) => this.deps.runStore.addUsage(run.id, usage),
        onStream: (chunk) => this.deps.runStore.pushEvent(run.id, { type: "stream", ...chunk })
      }
    };
    const unsubscribe = this.deps.supervisor.onOutput((handle, line) => {
      if (handle.owner === run.id) {
        this.deps.runStore.pushEvent(run.id, { type: "log", level: "debug", message: `[${handle.kind}] ${line}` });
      }
    });

    let outcome: RunOutcome | undefined;
    let failure: unknown;
    try {
      outcome = await work(ctx);
    } catch (error: unknown) {
      failure = error;
    } finally {
      unsubscribe();
    }

    const status: TerminalStatus = outcome ? "success" : signal.aborted || isCancellation(failure) ? "cancelled" : "failed";
    await this.teardown(ctx, status);
    this.deps.locks.release(run.id);
    this.finish(ctx, status, outcome, failure);
  }

  private async teardown(ctx: RunContext, status: TerminalStatus): Promise<void> {
    const { run } = ctx;
    const handle = ctx.serveHandle;
    if (status === "success" && this.settings.retainPreviewServer && handle?.alive) {
      this.deps.supervisor.transfer(handle, previewOwner(run.project));
      this.log(ctx, "info", `Dev server kept running as preview at port ${handle.port ?? "unknown"}.`);
    } else if (status === "success" && handle) {
      this.log(ctx, "info", "Dev server stopped after testing.");
    }

    try {
      await this.deps.supervisor.stopOwned(run.id);
    } catch (error: unknown) {
      this.logger.error({ err: error, runId: run.id }, "failed to stop run processes");
    }
    this.deps.locks.releasePort(run.id);

    if (!ctx.projectReady) return;
    const lifecycle: ProjectLifecycle =
      status === "success" ? "ready" : status === "cancelled" ? ctx.previousLifecycle ?? "failed" : "failed";
    const built = status === "success" && run.intent !== "patch";
    try {
      await this.deps.projectStore.updateMeta(run.project, {
        lifecycle,
        ...(built ? { lastBuiltAt: new Date().toISOString() } : {})
      });
    } catch (error: unknown) {
      this.logger.error({ err: error, runId: run.id, project: run.project }, "failed to persist project lifecycle");
    }
  }

  private finish(ctx: RunContext, status: TerminalStatus, outcome: RunOutcome | undefined, failure: unknown): void {
    const { run } = ctx;
    const store = this.deps.runStore;

    if (status === "success" && outcome) {
      store.setServingUrl(run.id, outcome.servingUrl);
      store.finish(run.id, "success");
      store.pushEvent(run.id, {
        type: "done",
        project: run.project,
        servingUrl: outcome.servingUrl,
        attempts: outcome.attempts,
        usage: { ...run.usage }
      });
      this.logger.info({ runId: run.id, project: run.project, attempts: outcome.attempts }, "run succeeded");
      return;
    }

    if (status === "cancelled") {
      store.finish(run.id, "cancelled", { reason: "cancelled", message: "Run cancelled." });
      store.pushEvent(run.id, { type: "cancelled", message: `Run cancelled during ${run.stage}.` });
      this.logger.info({ runId: run.id, project: run.project }, "run cancelled");
      return;
    }

    const info = toFailure(failure);
    store.pushEvent(run.id, { type: "step", stage: run.stage, status: "error", message: info.message });
    store.finish(run.id, "failed", info);
    store.pushEvent(run.id, {
      type: "error",
      reason: info.reason,
      message: info.message,
      ...(failure instanceof RepairBudgetExhaustedError ? { errors: failure.lastErrors } : {})
    });
    this.logger.warn({ runId: run.id, project: run.project, reason: info.reason }, "run failed");
  }

  private async executeBuild(ctx: RunContext, request: BuildRequest): Promise<RunOutcome> {
    const { run } = ctx;
    const store = this.deps.projectStore;

    this.stage(ctx, "enriching", `Enriching idea with ${request.enrichModel}`);
    const spec = await this.guard(ctx, "enrichment_failed", "Enrichment", () =>
      this.deps.enrichment.enrich(request.idea, request.enrichModel, ctx.collab)
    );
    this.completeStage(ctx, "enriching", `${spec.title} (${spec.siteType}, ${spec.strategy})`);

    this.stage(ctx, "generating", `Generating ${spec.title} with ${request.buildModel}`);
    await store.create(run.project, { title: spec.title, idea: request.idea });
    ctx.projectReady = true;
    await store.updateMeta(run.project, { lifecycle: "running" });
    let written = 0;
    await this.guard(ctx, "generation_failed", "Generation", async () => {
      for await (const file of this.deps.generation.generate(spec, request.buildModel, ctx.collab)) {
        throwIfCancelled(ctx.signal);
        await this.writeProjectFile(ctx, file.path, file.content);
        written += 1;
      }
    });
    this.completeStage(ctx, "generating", `${written} file(s) written`);

    await this.install(ctx);
    const servingUrl = await this.serve(ctx);
    const { attempts } = await this.test(ctx, servingUrl, request.buildModel);

    const { components } = await store.components(run.project);
    await this.writeProjectFile(
      ctx,
      "README.md",
      projectReadme(run.project, { title: spec.title, idea: request.idea, components: components.map((item) => item.name) })
    );
    return { servingUrl, attempts };
  }

  private async executeUpdate(ctx: RunContext, request: RepromptRequest): Promise<RunOutcome> {
    const { run } = ctx;
    const store = this.deps.projectStore;

    this.stage(ctx, "loading", `Loading ${run.project}`);
    const meta = await store.readMeta(run.project);
    ctx.previousLifecycle = meta.lifecycle;
    ctx.projectReady = true;
    await store.updateMeta(run.project, { lifecycle: "running" });

    const files = await store.readFiles(run.project);
    for (const [filePath, file] of Object.entries(files)) {
      this.deps.runStore.pushEvent(run.id, { type: "file", path: filePath, size: file.size, content: file.content });
    }
    const state = await store.components(run.project);
    const intent = request.intent ?? classify(request.instruction, state);
    this.deps.runStore.setIntent(run.id, intent);
    const projectContext = summarizeCodebase(contentsOf(files));
    const targets = await this.pickTargets(ctx, request, state, intent, projectContext);
    if (targets.length === 0) {
      throw new InputError(`Project ${run.project} has no components to update.`);
    }
    this.completeStage(ctx, "loading", `Intent ${intent}, target ${targets.join(", ")}`);

    this.stage(ctx, "editing", `Applying ${intent} to ${targets.join(", ")}`);
    const rewrite = (component: string, currentContent?: string): Promise<string> =>
      this.guard(ctx, "generation_failed", "Generation", () =>
        this.deps.generation.rewrite(
          { component, instruction: request.instruction, intent, currentContent, projectContext },
          request.buildModel,
          ctx.collab
        )
      );

    if (intent === "feature") {
      const [name] = targets;
      const app = files[COMPOSITION_ROOT]?.content;
      if (app === undefined) {
        throw new InputError(`Project ${run.project} has no ${COMPOSITION_ROOT} to mount ${name} into.`);
      }
      await this.writeProjectFile(ctx, componentPath(name), await rewrite(name));
      const injected = injectComponent(app, name);
      if (injected.imported || injected.mounted) {
        await this.writeProjectFile(ctx, COMPOSITION_ROOT, injected.content);
      }
      if (injected.imported && !injected.mounted) {
        this.log(ctx, "warn", `Imported ${name} but found no place to mount it in ${COMPOSITION_ROOT}.`);
      }
    } else {
      const current = new Map(state.components.map((item) => [item.name, item.content]));
      for (const name of intent === "patch" ? targets.slice(0, 1) : targets) {
        await this.writeProjectFile(ctx, componentPath(name), await rewrite(name, current.get(name)));
      }
    }
    this.completeStage(ctx, "editing", `${intent} applied`);

    if (intent === "patch") {
      this.skipStage(ctx, "testing", "Patch applied without the test loop");
      const preview = this.deps.supervisor.find(run.project, "serve");
      const servingUrl = preview?.port !== undefined ? `http://${this.settings.devServerHost}:${preview.port}` : undefined;
      return { servingUrl, attempts: 0 };
    }

    if (await store.hasDependencies(run.project)) {
      this.skipStage(ctx, "installing", "Dependencies already installed");
    } else {
      await this.install(ctx);
    }
    const servingUrl = await this.serve(ctx);
    const { attempts } = await this.test(ctx, servingUrl, request.buildModel);
    return { servingUrl, attempts };
  }

  // The model picks targets when the client named none; keyword matching covers an unusable or failed answer.
  private async pickTargets(
    ctx: RunContext,
    request: RepromptRequest,
    state: ProjectState,
    intent: Intent,
    projectContext: string
  ): Promise<string[]> {
    const generation = this.deps.generation;
    if (!request.target && generation.chooseTargets && state.components.length > 0) {
      const selection: TargetSelectionRequest = {
        instruction: request.instruction,
        intent,
        components: state.components.map((component) => component.name),
        projectContext
      };
      try {
        const chosen = await generation.chooseTargets(selection, request.buildModel, ctx.collab);
        const accepted = acceptChosenTargets(chosen, state, intent);
        if (accepted.length > 0) {
          return accepted;
        }
        this.log(ctx, "info", `Model picked no usable target (${chosen.join(", ") || "none"}); matching by keywords.`);
      } catch (error: unknown) {
        if (ctx.signal.aborted || isCancellation(error)) throw new RunCancelledError();
        this.log(ctx, "warn", `Target selection failed: ${errorMessage(error)}; matching by keywords.`);
      }
    }
    return resolveTargets(request.instruction, state, intent, request.target);
  }

  private async install(ctx: RunContext): Promise<void> {
    const { run } = ctx;
    const command = this.settings.installCommand;
    this.stage(ctx, "installing", `Running ${command}`);
    const handle = this.deps.supervisor.start({
      projectId: run.project,
      kind: "install",
      command,
      cwd: this.deps.projectStore.projectRoot(run.project),
      owner: run.id
    });

    let exitCode: number | null;
    try {
      ({ exitCode } = await this.deps.supervisor.waitForExit(handle, this.settings.installTimeoutMs, ctx.signal));
    } catch (error: unknown) {
      if (error instanceof ProcessTimeoutError) {
        throw new InfrastructureError(`Dependency install timed out after ${this.settings.installTimeoutMs}ms.`, "install_failed");
      }
      throw error;
    }
    if (exitCode !== 0) {
      const tail = this.deps.supervisor.captureOutput(handle).slice(-5).join(" | ");
      throw new InfrastructureError(
        `Dependency install exited with code ${exitCode ?? "unknown"}${tail ? `: ${tail}` : ""}`,
        "install_failed"
      );
    }
    this.completeStage(ctx, "installing", "Dependencies installed");
  }

  private async serve(ctx: RunContext): Promise<string> {
    this.stage(ctx, "serving", "Starting dev server");
    const url = await this.startDevServer(ctx);
    this.completeStage(ctx, "serving", `Dev server ready at ${url}`);
    return url;
  }

  private async startDevServer(ctx: RunContext): Promise<string> {
    const { run } = ctx;
    const supervisor = this.deps.supervisor;
    const existing = supervisor.find(run.project, "serve");
    if (existing && existing.owner !== run.id) {
      this.log(ctx, "info", `Stopping preview server on port ${existing.port ?? "unknown"}.`);
      await supervisor.stop(existing);
    }

    const reserved = supervisor.list().flatMap((handle) => (handle.port === undefined ? [] : [handle.port]));
    const port = this.deps.locks.allocatePort(run.id, reserved);
    const host = this.settings.devServerHost;
    const command = fillTemplate(this.settings.serveCommand, { port, host });
    const cwd = this.deps.projectStore.projectRoot(run.project);
    const attempts = Math.max(1, this.settings.serveStartAttempts);

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      const handle = supervisor.start({ projectId: run.project, kind: "serve", command, cwd, port, owner: run.id });
      ctx.serveHandle = handle;
      const result = await supervisor.waitForPort(host, port, this.settings.portTimeoutMs, { handle, signal: ctx.signal });
      if (result === "ready") {
        return `http://${host}:${port}`;
      }
      this.log(
        ctx,
        "warn",
        `Dev server did not open port ${port} within ${this.settings.portTimeoutMs}ms (attempt ${attempt}/${attempts}).`
      );
      await supervisor.stop(handle);
    }
    throw new InfrastructureError(`Dev server never opened port ${port} after ${attempts} attempt(s).`, "port_timeout");
  }

  private async test(ctx: RunContext, servingUrl: string, model: string): Promise<FixLoopResult> {
    const { run } = ctx;
    this.stage(ctx, "testing", `Testing ${servingUrl}`);
    const result = await this.fixLoop.run({
      runId: run.id,
      servingUrl,
      maxAttempts: run.maxFixAttempts,
      model,
      workspace: this.workspaceFor(ctx),
      testContext: { project: { id: run.project, root: this.deps.projectStore.projectRoot(run.project) }, owner: run.id },
      signal: ctx.signal,
      onUsage: ctx.collab.onUsage,
      afterRepair: async () => {
        if (ctx.serveHandle?.alive) return;
        this.log(ctx, "warn", "Dev server stopped during repair, restarting.");
        await this.startDevServer(ctx);
      }
    });
    this.completeStage(
      ctx,
      "testing",
      result.attempts === 0 ? "All checks passed" : `Checks passed after ${result.attempts} repair(s)`
    );
    return result;
  }

  private workspaceFor(ctx: RunContext): FixLoopWorkspace {
    const project = ctx.run.project;
    const store = this.deps.projectStore;
    return {
      componentFiles: async () => (await store.components(project)).components.map((item) => componentPath(item.name)),
      readFile: async (filePath) => (await store.readFile(project, filePath)) ?? "",
      writeFile: (filePath, content) => this.writeProjectFile(ctx, filePath, content),
      projectContext: async () => summarizeCodebase(contentsOf(await store.readFiles(project)))
    };
  }

  private async writeProjectFile(ctx: RunContext, filePath: string, content: string): Promise<void> {
    const { previous } = await this.deps.projectStore.writeFile(ctx.run.project, filePath, content);
    const diff =
      previous !== undefined && previous !== content ? createTwoFilesPatch(filePath, filePath, previous, content) : undefined;
    this.deps.runStore.pushEvent(ctx.run.id, {
      type: "file",
      path: filePath,
      size: byteSize(content),
      content,
      ...(diff ? { diff } : {})
    });
  }

  private async guard<T>(ctx: RunContext, reason: FailureReason, label: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error: unknown) {
      if (ctx.signal.aborted) throw new RunCancelledError();
      if (error instanceof ForgeError) throw error;
      throw new CollaboratorError(`${label} failed: ${errorMessage(error)}`, reason, { cause: error });
    }
  }

  private stage(ctx: RunContext, stage: PipelineStage, message: string): void {
    throwIfCancelled(ctx.signal);
    this.deps.runStore.setStage(ctx.run.id, stage);
    this.deps.runStore.pushEvent(ctx.run.id, { type: "step", stage, status: "active", message });
  }

  private completeStage(ctx: RunContext, stage: PipelineStage, message: string): void {
    this.deps.runStore.pushEvent(ctx.run.id, { type: "step", stage, status: "done", message });
  }

  private skipStage(ctx: RunContext, stage: PipelineStage, message: string): void {
    this.deps.runStore.pushEvent(ctx.run.id, { type: "step", stage, status: "skipped", message });
  }

  private log(ctx: RunContext, level: LogLevel, message: string): void {
    this.deps.runStore.pushEvent(ctx.run.id, { type: "log", level, message });
  }
}
