import fs from "node:fs";
import fastify, { FastifyInstance, FastifyReply } from "fastify";
import fastifyStatic from "@fastify/static";
import { z } from "zod";
import { config } from "./config";
import { ForgeError, ProjectNotFoundError, errorMessage } from "./errors";
import { GatewayOrchestrator } from "./gateway/eventGateway";
import { RunStore } from "./services/runStore";
import { GeneratedFile, ProjectFileSet, ProjectMeta, ProjectSummary, RunEvent } from "./types";

export interface OrchestratorLike extends GatewayOrchestrator {
  listProjects(): Promise<ProjectSummary[]>;
  readProjectFiles(project: string): Promise<ProjectFileSet>;
  importProject(project: string, files: GeneratedFile[], title?: string): Promise<ProjectMeta>;
}

export interface ServerDeps {
  orchestrator: OrchestratorLike;
  runStore: RunStore;
  uiRoot?: string;
}

const buildSchema = z.object({
  idea: z.string().min(1).max(4000),
  enrichModel: z.string().min(1).optional(),
  buildModel: z.string().min(1).optional()
});

const updateSchema = z.object({
  instruction: z.string().min(1).max(4000),
  intent: z.enum(["patch", "modify", "feature"]).optional(),
  target: z.string().min(1).max(100).optional(),
  buildModel: z.string().min(1).optional()
});

const importSchema = z.object({
  name: z.string().min(1).max(64),
  title: z.string().min(1).max(200).optional(),
  files: z
    .array(z.object({ path: z.string().min(1).max(300), content: z.string() }))
    .min(1)
    .max(500)
});

const eventsQuerySchema = z.object({
  afterSeq: z.coerce.number().int().min(0).default(0)
});

const TERMINAL_EVENTS = new Set<RunEvent["type"]>(["done", "error", "cancelled"]);

const statusFor = (error: unknown): number => {
  if (error instanceof ProjectNotFoundError) return 404;
  if (error instanceof ForgeError) {
    if (error.category === "input") return 400;
    if (error.category === "conflict") return 409;
  }
  return 500;
};

const sendError = (reply: FastifyReply, error: unknown) => {
  const reason = error instanceof ForgeError ? error.reason : "internal";
  return reply.code(statusFor(error)).send({ error: errorMessage(error), reason });
};

export const buildApp = (deps: ServerDeps): FastifyInstance => {
  const app = fastify({ logger: { level: config.logLevel } });
  const uiRoot = deps.uiRoot ?? config.uiRoot;

  if (fs.existsSync(uiRoot)) {
    app.register(fastifyStatic, { root: uiRoot, prefix: "/" });
  }

  app.get("/api/health", async () => ({ ok: true }));

  app.get("/api/tools/overview", async () => ({
    ok: true,
    service: "site-forge",
    port: config.port,
    gatewayPort: config.gatewayPort,
    enrichModel: config.enrichModel,
    buildModel: config.buildModel,
    openaiBaseUrl: config.openaiBaseUrl,
    projectsRoot: config.projectsRoot,
    maxFixAttempts: config.maxFixAttempts,
    maxConcurrentRuns: config.maxConcurrentRuns,
    activeRuns: deps.runStore.active().length,
    now: new Date().toISOString()
  }));

  app.get("/api/projects", async () => ({ projects: await deps.orchestrator.listProjects() }));

  app.get<{ Params: { name: string } }>("/api/projects/:name/files", async (request, reply) => {
    try {
      return { project: request.params.name, files: await deps.orchestrator.readProjectFiles(request.params.name) };
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  app.get<{ Params: { name: string } }>("/api/projects/:name/export", async (request, reply) => {
    try {
      const archive = await deps.orchestrator.exportProject(request.params.name);
      reply.header("Content-Disposition", `attachment; filename="${archive.project}.json"`);
      return archive;
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  app.post("/api/projects/import", async (request, reply) => {
    const parsed = importSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }
    try {
      const project = await deps.orchestrator.importProject(parsed.data.name, parsed.data.files, parsed.data.title);
      return reply.code(201).send({ project });
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  app.post("/api/builds", async (request, reply) => {
    const parsed = buildSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }
    try {
      const run = await deps.orchestrator.startBuild(parsed.data);
      return reply.code(202).send({ runId: run.id, project: run.project });
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  app.post<{ Params: { name: string } }>("/api/projects/:name/updates", async (request, reply) => {
    const parsed = updateSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }
    try {
      const run = await deps.orchestrator.startUpdate({ project: request.params.name, ...parsed.data });
      return reply.code(202).send({ runId: run.id, project: run.project });
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  app.get("/api/runs", async () => ({ runs: deps.runStore.all() }));

  app.get<{ Params: { id: string } }>("/api/runs/:id", async (request, reply) => {
    const run = deps.runStore.get(request.params.id);
    if (!run) {
      return reply.code(404).send({ error: "Run not found" });
    }
    return { run, events: deps.runStore.getEvents(run.id) };
  });

  app.post<{ Params: { id: string } }>("/api/runs/:id/cancel", async (request, reply) => {
    const run = deps.runStore.get(request.params.id);
    if (!run) {
      return reply.code(404).send({ error: "Run not found" });
    }
    return { runId: run.id, cancelled: deps.orchestrator.cancel(run.id) };
  });

  app.get<{ Params: { id: string } }>("/api/runs/:id/events", async (request, reply) => {
    const run = deps.runStore.get(request.params.id);
    if (!run) {
      return reply.code(404).send({ error: "Run not found" });
    }
    const query = eventsQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }

    reply.hijack();
    reply.raw.setHeader("Content-Type", "text/event-stream");
    reply.raw.setHeader("Cache-Control", "no-cache");
    reply.raw.setHeader("Connection", "keep-alive");
    reply.raw.flushHeaders?.();

    const send = (data: unknown): void => {
      reply.raw.write(`data: ${JSON.stringify(data)}\n\n`);
    };

    const backlog = deps.runStore.getEvents(run.id, query.data.afterSeq);
    for (const event of backlog) {
      send(event);
    }
    if (backlog.some((event) => TERMINAL_EVENTS.has(event.type))) {
      reply.raw.end();
      return;
    }

    const unsubscribe = deps.runStore.subscribe(run.id, (event) => {
      send(event);
      if (TERMINAL_EVENTS.has(event.type)) {
        unsubscribe();
        reply.raw.end();
      }
    });

    request.raw.on("close", () => {
      unsubscribe();
      reply.raw.end();
    });
  });

  return app;
};
