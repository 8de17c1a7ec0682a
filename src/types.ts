export type Intent = "patch" | "modify" | "feature";

export type RunKind = "build" | "update";

export type RunStatus = "pending" | "running" | "success" | "failed" | "cancelled";

export type PipelineStage =
  | "received"
  | "enriching"
  | "loading"
  | "generating"
  | "editing"
  | "installing"
  | "serving"
  | "testing"
  | "done"
  | "failed"
  | "cancelled";

export type StepStatus = "active" | "done" | "error" | "skipped";

export type ProjectLifecycle = "empty" | "running" | "ready" | "failed";

export type ProcessKind = "install" | "serve" | "test";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type FailureReason =
  | "invalid_input"
  | "project_not_found"
  | "project_busy"
  | "capacity"
  | "enrichment_failed"
  | "generation_failed"
  | "install_failed"
  | "port_timeout"
  | "process_exited"
  | "process_timeout"
  | "process_conflict"
  | "test_infrastructure"
  | "repair_budget_exhausted"
  | "cancelled"
  | "internal";

export interface RunFailure {
  reason: FailureReason;
  message: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface RunUsage extends TokenUsage {
  llmCalls: number;
  estimatedCostUsd: number;
}

export interface ProjectSpecification {
  projectName: string;
  siteType: string;
  strategy: "react-app" | "react-sections";
  title: string;
  tagline: string;
  description: string;
  features: string[];
  sections: string[];
  colorScheme: string;
  style: string;
}

export interface GeneratedFile {
  path: string;
  content: string;
}

export interface ProjectFile {
  content: string;
  size: number;
}

export type ProjectFileSet = Record<string, ProjectFile>;

export interface ProjectMeta {
  name: string;
  title: string;
  lifecycle: ProjectLifecycle;
  createdAt: string;
  lastBuiltAt?: string;
  idea?: string;
}

export interface ProjectSummary extends ProjectMeta {
  root: string;
  fileCount: number;
}

export interface ComponentSource {
  name: string;
  content: string;
}

export interface ProjectState {
  components: ComponentSource[];
}

export interface BuildRequest {
  idea: string;
  enrichModel: string;
  buildModel: string;
  project?: string;
}

export interface RepromptRequest {
  project: string;
  instruction: string;
  intent?: Intent;
  target?: string;
  buildModel: string;
}

export interface StreamChunk {
  phase: "start" | "delta" | "end";
  file: string;
  text?: string;
}

export interface CollaboratorContext {
  signal?: AbortSignal;
  onUsage?: (usage: TokenUsage) => void;
  onStream?: (chunk: StreamChunk) => void;
}

export interface TestContext extends CollaboratorContext {
  modules?: string[];
  project?: { id: string; root: string };
  owner?: string;
}

export interface TestError {
  message: string;
  sourceHint?: string;
}

export interface TestReport {
  passed: boolean;
  errors: TestError[];
}

export interface RunState {
  id: string;
  kind: RunKind;
  project: string;
  status: RunStatus;
  stage: PipelineStage;
  fixAttempt: number;
  maxFixAttempts: number;
  usage: RunUsage;
  request: BuildRequest | RepromptRequest;
  sessionId?: string;
  intent?: Intent;
  servingUrl?: string;
  failure?: RunFailure;
  lastErrors?: TestError[];
  startedAt: string;
  endedAt?: string;
}

interface RunEventBase {
  id: string;
  runId: string;
  seq: number;
  timestamp: string;
}

export type RunEventPayload =
  | { type: "log"; level: LogLevel; message: string }
  | { type: "step"; stage: PipelineStage; status: StepStatus; message: string }
  | { type: "file"; path: string; size: number; content: string; diff?: string }
  | ({ type: "stream" } & StreamChunk)
  | { type: "test"; attempt: number; passed: boolean; errors: TestError[]; ignored: number }
  | { type: "repair"; attempt: number; maxAttempts: number; files: string[] }
  | { type: "done"; project: string; servingUrl?: string; attempts: number; usage: RunUsage }
  | { type: "error"; reason: FailureReason; message: string; errors?: TestError[] }
  | { type: "cancelled"; message: string };

export type RunEvent = RunEventBase & RunEventPayload;

export type RunEventType = RunEventPayload["type"];

export interface ProjectArchive {
  format: "site-forge-archive";
  version: 1;
  project: string;
  exportedAt: string;
  fileCount: number;
  totalBytes: number;
  files: Array<{ path: string; size: number; content: string }>;
}
