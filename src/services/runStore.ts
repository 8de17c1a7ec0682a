import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import {
  BuildRequest,
  Intent,
  PipelineStage,
  RepromptRequest,
  RunEvent,
  RunEventPayload,
  RunFailure,
  RunKind,
  RunState,
  RunStatus,
  TestError,
  TokenUsage
} from "../types";

export interface RunInput {
  id?: string;
  kind: RunKind;
  project: string;
  request: BuildRequest | RepromptRequest;
  maxFixAttempts: number;
  sessionId?: string;
}

export interface UsagePricing {
  promptCostPer1k: number;
  completionCostPer1k: number;
}

const ALL_EVENTS = "run:*";

const isTerminal = (status: RunStatus): boolean => status === "success" || status === "failed" || status === "cancelled";

export class RunStore {
  private readonly runs = new Map<string, RunState>();
  private readonly events = new Map<string, RunEvent[]>();
  private readonly finished: string[] = [];
  private readonly emitter = new EventEmitter();
  private readonly retainFinished: number;

  constructor(
    private readonly pricing: UsagePricing = { promptCostPer1k: 0, completionCostPer1k: 0 },
    retainFinished = 100
  ) {
    this.emitter.setMaxListeners(0);
    this.retainFinished = Math.max(1, Math.floor(retainFinished));
  }

  create(input: RunInput): RunState {
    const run: RunState = {
      id: input.id ?? randomUUID(),
      kind: input.kind,
      project: input.project,
      status: "pending",
      stage: "received",
      fixAttempt: 0,
      maxFixAttempts: input.maxFixAttempts,
      usage: { promptTokens: 0, completionTokens: 0, llmCalls: 0, estimatedCostUsd: 0 },
      request: input.request,
      sessionId: input.sessionId,
      startedAt: new Date().toISOString()
    };
    this.runs.set(run.id, run);
    this.events.set(run.id, []);
    return run;
  }

  get(runId: string): RunState | undefined {
    return this.runs.get(runId);
  }

  all(): RunState[] {
    return [...this.runs.values()].sort((a, b) => (a.startedAt > b.startedAt ? -1 : 1));
  }

  active(): RunState[] {
    return this.all().filter((run) => !isTerminal(run.status));
  }

  bySession(sessionId: string): RunState[] {
    return this.active().filter((run) => run.sessionId === sessionId);
  }

  setStatus(runId: string, status: RunStatus): void {
    const current = this.runs.get(runId);
    if (!current || isTerminal(current.status)) return;
    current.status = status;
  }

  setStage(runId: string, stage: PipelineStage): void {
    const current = this.runs.get(runId);
    if (!current) return;
    current.stage = stage;
  }

  setIntent(runId: string, intent: Intent): void {
    const current = this.runs.get(runId);
    if (!current) return;
    current.intent = intent;
  }

  setFixAttempt(runId: string, attempt: number): void {
    const current = this.runs.get(runId);
    if (!current) return;
    current.fixAttempt = attempt;
  }

  setLastErrors(runId: string, errors: TestError[]): void {
    const current = this.runs.get(runId);
    if (!current) return;
    current.lastErrors = errors;
  }

  setServingUrl(runId: string, servingUrl: string | undefined): void {
    const current = this.runs.get(runId);
    if (!current) return;
    current.servingUrl = servingUrl;
  }

  addUsage(runId: string, usage: TokenUsage): void {
    const current = this.runs.get(runId);
    if (!current) return;
    const promptTokens = current.usage.promptTokens + usage.promptTokens;
    const completionTokens = current.usage.completionTokens + usage.completionTokens;
    current.usage = {
      promptTokens,
      completionTokens,
      llmCalls: current.usage.llmCalls + 1,
      estimatedCostUsd:
        (promptTokens / 1000) * this.pricing.promptCostPer1k + (completionTokens / 1000) * this.pricing.completionCostPer1k
    };
  }

  finish(runId: string, status: "success" | "failed" | "cancelled", failure?: RunFailure): void {
    const current = this.runs.get(runId);
    if (!current || isTerminal(current.status)) return;
    current.status = status;
    current.stage = status === "success" ? "done" : status;
    current.failure = failure;
    current.endedAt = new Date().toISOString();
    this.finished.push(runId);
    this.evictFinished();
  }

  // Runs past the retention cap are dropped oldest-finished first; active runs are never evicted.
  private evictFinished(): void {
    while (this.finished.length > this.retainFinished) {
      const runId = this.finished.shift();
      if (runId === undefined) return;
      this.runs.delete(runId);
      this.events.delete(runId);
    }
  }

  pushEvent(runId: string, payload: RunEventPayload): RunEvent {
    const list = this.events.get(runId) ?? [];
    const event: RunEvent = {
      id: randomUUID(),
      runId,
      seq: list.length + 1,
      timestamp: new Date().toISOString(),
      ...payload
    };
    list.push(event);
    this.events.set(runId, list);
    this.emitter.emit(`run:${runId}`, event);
    this.emitter.emit(ALL_EVENTS, event);
    return event;
  }

  getEvents(runId: string, afterSeq = 0): RunEvent[] {
    return (this.events.get(runId) ?? []).filter((event) => event.seq > afterSeq);
  }

  subscribe(runId: string, handler: (event: RunEvent) => void): () => void {
    const channel = `run:${runId}`;
    this.emitter.on(channel, handler);
    return () => this.emitter.off(channel, handler);
  }

  subscribeAll(handler: (event: RunEvent) => void): () => void {
    this.emitter.on(ALL_EVENTS, handler);
    return () => this.emitter.off(ALL_EVENTS, handler);
  }
}
