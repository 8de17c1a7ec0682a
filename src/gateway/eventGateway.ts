import { z } from "zod";
import { config } from "../config";
import { ForgeError, ProjectBusyError, errorMessage } from "../errors";
import { componentLogger, Logger } from "../logger";
import { RunStore } from "../services/runStore";
import { Intent, ProjectArchive, RunEvent, RunState } from "../types";

export interface GatewayOrchestrator {
  startBuild(input: { idea: string; enrichModel?: string; buildModel?: string; sessionId?: string }): Promise<RunState>;
  startUpdate(input: {
    project: string;
    instruction: string;
    intent?: Intent;
    target?: string;
    buildModel?: string;
    sessionId?: string;
  }): Promise<RunState>;
  cancel(runId: string): boolean;
  cancelSession(sessionId: string): string[];
  exportProject(project: string): Promise<ProjectArchive>;
}

export type GatewayMessage =
  | { type: "hello"; sessionId: string }
  | { type: "accepted"; runId: string; project: string; kind: RunState["kind"] }
  | { type: "busy"; project: string; activeRunId: string }
  | { type: "rejected"; reason: string; message: string }
  | { type: "cancelling"; runIds: string[] }
  | { type: "export"; archive: ProjectArchive }
  | { type: "status"; run: RunState }
  | RunEvent;

export interface GatewayConnection {
  id: string;
  send(message: GatewayMessage): void;
}

export interface EventGatewayOptions {
  cancelOnDisconnect?: boolean;
  logger?: Logger;
}

const commandSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("build"),
    idea: z.string().min(1).max(4000),
    enrichModel: z.string().min(1).optional(),
    buildModel: z.string().min(1).optional()
  }),
  z.object({
    type: z.literal("update"),
    project: z.string().min(1),
    instruction: z.string().min(1).max(4000),
    intent: z.enum(["patch", "modify", "feature"]).optional(),
    target: z.string().min(1).optional(),
    buildModel: z.string().min(1).optional()
  }),
  z.object({ type: z.literal("cancel"), runId: z.string().min(1).optional() }),
  z.object({ type: z.literal("export"), project: z.string().min(1) }),
  z.object({ type: z.literal("attach"), runId: z.string().min(1), afterSeq: z.number().int().min(0).optional() }),
  z.object({ type: z.literal("status"), runId: z.string().min(1) })
]);

type GatewayCommand = z.infer<typeof commandSchema>;

const TERMINAL_EVENTS = new Set<RunEvent["type"]>(["done", "error", "cancelled"]);

interface Session {
  connection: GatewayConnection;
  attachments: Map<string, () => void>;
}

export class EventGateway {
  private readonly sessions = new Map<string, Session>();
  private readonly cancelOnDisconnect: boolean;
  private readonly logger: Logger;

  constructor(
    private readonly orchestrator: GatewayOrchestrator,
    private readonly runStore: RunStore,
    options: EventGatewayOptions = {}
  ) {
    this.cancelOnDisconnect = options.cancelOnDisconnect ?? config.cancelOnDisconnect;
    this.logger = options.logger ?? componentLogger("gateway");
  }

  connect(connection: GatewayConnection): void {
    this.sessions.set(connection.id, { connection, attachments: new Map() });
    connection.send({ type: "hello", sessionId: connection.id });
  }

  disconnect(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    for (const unsubscribe of session.attachments.values()) {
      unsubscribe();
    }
    this.sessions.delete(sessionId);

    if (this.cancelOnDisconnect) {
      const cancelled = this.orchestrator.cancelSession(sessionId);
      if (cancelled.length > 0) {
        this.logger.info({ sessionId, runIds: cancelled }, "cancelled runs of disconnected session");
      }
    }
  }

  sessionCount(): number {
    return this.sessions.size;
  }

  async handle(sessionId: string, raw: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) return;

    let candidate: unknown;
    try {
      candidate = JSON.parse(raw);
    } catch {
      session.connection.send({ type: "rejected", reason: "invalid_command", message: "Message is not valid JSON." });
      return;
    }
    const parsed = commandSchema.safeParse(candidate);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      session.connection.send({
        type: "rejected",
        reason: "invalid_command",
        message: issue ? `${issue.path.join(".") || "command"}: ${issue.message}` : "Invalid command."
      });
      return;
    }

    try {
      await this.dispatch(sessionId, session, parsed.data);
    } catch (error: unknown) {
      this.reject(session, error);
    }
  }

  private async dispatch(sessionId: string, session: Session, command: GatewayCommand): Promise<void> {
    switch (command.type) {
      case "build": {
        const run = await this.orchestrator.startBuild({
          idea: command.idea,
          enrichModel: command.enrichModel,
          buildModel: command.buildModel,
          sessionId
        });
        this.accept(session, run);
        return;
      }
      case "update": {
        const run = await this.orchestrator.startUpdate({
          project: command.project,
          instruction: command.instruction,
          intent: command.intent,
          target: command.target,
          buildModel: command.buildModel,
          sessionId
        });
        this.accept(session, run);
        return;
      }
      case "cancel": {
        const { runId } = command;
        const runIds = runId
          ? [runId].filter((id) => this.orchestrator.cancel(id))
          : this.orchestrator.cancelSession(sessionId);
        session.connection.send({ type: "cancelling", runIds });
        return;
      }
      case "export": {
        const archive = await this.orchestrator.exportProject(command.project);
        session.connection.send({ type: "export", archive });
        return;
      }
      case "attach": {
        if (!this.runStore.get(command.runId)) {
          session.connection.send({ type: "rejected", reason: "run_not_found", message: `Run not found: ${command.runId}` });
          return;
        }
        this.attach(session, command.runId, command.afterSeq ?? 0);
        return;
      }
      case "status": {
        const run = this.runStore.get(command.runId);
        if (!run) {
          session.connection.send({ type: "rejected", reason: "run_not_found", message: `Run not found: ${command.runId}` });
          return;
        }
        session.connection.send({ type: "status", run });
        return;
      }
    }
  }

  private accept(session: Session, run: RunState): void {
    session.connection.send({ type: "accepted", runId: run.id, project: run.project, kind: run.kind });
    this.attach(session, run.id, 0);
  }

  // Replay and subscription happen in the same tick, so no event falls between them.
  private attach(session: Session, runId: string, afterSeq: number): void {
    session.attachments.get(runId)?.();
    session.attachments.delete(runId);

    const backlog = this.runStore.getEvents(runId, afterSeq);
    for (const event of backlog) {
      session.connection.send(event);
    }
    if (backlog.some((event) => TERMINAL_EVENTS.has(event.type))) {
      return;
    }

    const unsubscribe = this.runStore.subscribe(runId, (event) => {
      session.connection.send(event);
      if (TERMINAL_EVENTS.has(event.type)) {
        unsubscribe();
        session.attachments.delete(runId);
      }
    });
    session.attachments.set(runId, unsubscribe);
  }

  private reject(session: Session, error: unknown): void {
    if (error instanceof ProjectBusyError) {
      session.connection.send({ type: "busy", project: error.project, activeRunId: error.activeRunId });
      return;
    }
    if (error instanceof ForgeError) {
      session.connection.send({ type: "rejected", reason: error.reason, message: error.message });
      return;
    }
    this.logger.error({ err: error }, "gateway command failed");
    session.connection.send({ type: "rejected", reason: "internal", message: errorMessage(error) });
  }
}
