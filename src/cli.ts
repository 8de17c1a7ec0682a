#!/usr/bin/env node
import fs from "node:fs/promises";
import { assertConfig, config } from "./config";
import { EnrichmentAgent } from "./agents/enrichmentAgent";
import { GenerationAgent } from "./agents/generationAgent";
import { SupervisedCommandRunner, TestAgent } from "./agents/testAgent";
import { OpenAiClient } from "./llm/openaiClient";
import { PipelineOrchestrator } from "./orchestrator/pipelineOrchestrator";
import { ProcessSupervisor } from "./services/processSupervisor";
import { ProjectLockManager } from "./services/projectLockManager";
import { ProjectStore } from "./services/projectStore";
import { RunStore } from "./services/runStore";
import { Intent, RunEvent, RunState } from "./types";
import { formatSize } from "./utils/text";

const USAGE = [
  "Usage:",
  '  site-forge build --idea "a todo app with due dates" [--enrich-model m] [--build-model m]',
  '  site-forge update --project todo-app --instruction "make the header button blue" [--intent patch|modify|feature] [--target Header]',
  "  site-forge projects",
  "  site-forge export --project todo-app [--out archive.json]"
].join("\n");

const getArgValue = (name: string): string | undefined => {
  const marker = `--${name}`;
  const index = process.argv.findIndex((arg) => arg === marker);
  if (index === -1) return undefined;
  return process.argv[index + 1];
};

const parseIntent = (value: string | undefined): Intent | undefined => {
  if (value === "patch" || value === "modify" || value === "feature") return value;
  if (value) throw new Error(`Unknown intent "${value}". Use patch, modify or feature.`);
  return undefined;
};

const describeEvent = (event: RunEvent): string | undefined => {
  switch (event.type) {
    case "log":
      return event.level === "debug" ? undefined : `[${event.level}] ${event.message}`;
    case "step":
      return `[${event.stage}] ${event.status}: ${event.message}`;
    case "file":
      return `  wrote ${event.path} (${formatSize(event.size)})`;
    case "stream":
      return event.phase === "start" ? `  writing ${event.file} ...` : undefined;
    case "test":
      return event.passed
        ? `[test #${event.attempt}] passed${event.ignored > 0 ? ` (${event.ignored} ignored)` : ""}`
        : `[test #${event.attempt}] ${event.errors.length} error(s): ${event.errors.map((error) => error.message).join(" | ")}`;
    case "repair":
      return `[repair ${event.attempt}/${event.maxAttempts}] ${event.files.join(", ")}`;
    case "done":
      return `Done: ${event.project}${event.servingUrl ? ` at ${event.servingUrl}` : ""} after ${event.attempts} repair(s), ${event.usage.llmCalls} LLM call(s)`;
    case "error":
      return `Failed (${event.reason}): ${event.message}`;
    case "cancelled":
      return event.message;
  }
};

const main = async (): Promise<void> => {
  const command = process.argv[2];
  const projectStore = new ProjectStore();

  if (command === "projects") {
    for (const project of await projectStore.list()) {
      console.log(`${project.name}\t${project.lifecycle}\t${project.fileCount} file(s)\t${project.title}`);
    }
    return;
  }

  if (command === "export") {
    const project = getArgValue("project");
    if (!project) throw new Error(USAGE);
    const archive = await projectStore.exportArchive(project);
    const out = getArgValue("out") ?? `${project}.json`;
    await fs.writeFile(out, `${JSON.stringify(archive, null, 2)}\n`, "utf8");
    console.log(`Exported ${archive.fileCount} file(s) (${formatSize(archive.totalBytes)}) to ${out}`);
    return;
  }

  if (command !== "build" && command !== "update") {
    throw new Error(USAGE);
  }

  assertConfig();
  const runStore = new RunStore(
    { promptCostPer1k: config.promptCostPer1k, completionCostPer1k: config.completionCostPer1k },
    config.maxRetainedRuns
  );
  const supervisor = new ProcessSupervisor();
  const disposeHooks = supervisor.installShutdownHooks();
  const llm = new OpenAiClient();
  const orchestrator = new PipelineOrchestrator({
    runStore,
    projectStore,
    supervisor,
    locks: new ProjectLockManager({ maxConcurrentRuns: 1, devPortBase: config.devPortBase }),
    enrichment: new EnrichmentAgent(llm),
    generation: new GenerationAgent(llm),
    tester: new TestAgent({ runner: new SupervisedCommandRunner(supervisor) })
  });

  let run: RunState;
  if (command === "build") {
    const idea = getArgValue("idea")?.trim();
    if (!idea) throw new Error(USAGE);
    run = await orchestrator.startBuild({
      idea,
      enrichModel: getArgValue("enrich-model"),
      buildModel: getArgValue("build-model")
    });
  } else {
    const project = getArgValue("project")?.trim();
    const instruction = getArgValue("instruction")?.trim();
    if (!project || !instruction) throw new Error(USAGE);
    run = await orchestrator.startUpdate({
      project,
      instruction,
      intent: parseIntent(getArgValue("intent")),
      target: getArgValue("target"),
      buildModel: getArgValue("build-model")
    });
  }

  console.log(`Run started: ${run.id} (project ${run.project})`);
  const print = (event: RunEvent): void => {
    const line = describeEvent(event);
    if (line) console.log(line);
  };
  runStore.getEvents(run.id).forEach(print);
  const unsubscribe = runStore.subscribe(run.id, print);

  const final = await orchestrator.waitForRun(run.id);
  unsubscribe();
  disposeHooks();
  await orchestrator.shutdown();
  if (final?.status !== "success") {
    process.exitCode = 1;
  }
};

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exit(1);
});
