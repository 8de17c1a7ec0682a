import { FailureReason, RunFailure, TestError } from "./types";

export type ErrorCategory = "input" | "conflict" | "collaborator" | "infrastructure" | "quality" | "cancelled" | "internal";

export class ForgeError extends Error {
  constructor(
    message: string,
    readonly category: ErrorCategory,
    readonly reason: FailureReason
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InputError extends ForgeError {
  constructor(message: string) {
    super(message, "input", "invalid_input");
  }
}

export class ProjectNotFoundError extends ForgeError {
  constructor(readonly project: string) {
    super(`Project not found: ${project}`, "input", "project_not_found");
  }
}

export class ProjectBusyError extends ForgeError {
  constructor(
    readonly project: string,
    readonly activeRunId: string
  ) {
    super(`Project ${project} already has an active run (${activeRunId}).`, "conflict", "project_busy");
  }
}

export class CapacityError extends ForgeError {
  constructor(readonly limit: number) {
    super(`Maximum concurrent runs reached (${limit}). Try again when a run finishes.`, "conflict", "capacity");
  }
}

export class CollaboratorError extends ForgeError {
  constructor(message: string, reason: FailureReason, options?: { cause?: unknown }) {
    super(message, "collaborator", reason);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class MalformedOutputError extends CollaboratorError {
  constructor(
    readonly stage: "enrichment" | "generation",
    message: string,
    readonly rawOutput = ""
  ) {
    super(message, stage === "enrichment" ? "enrichment_failed" : "generation_failed");
  }
}

export class InfrastructureError extends ForgeError {
  constructor(message: string, reason: FailureReason = "test_infrastructure") {
    super(message, "infrastructure", reason);
  }
}

export class ProcessAlreadyRunningError extends ForgeError {
  constructor(
    readonly projectId: string,
    readonly kind: string
  ) {
    super(`A ${kind} process is already running for ${projectId}. Stop it first.`, "infrastructure", "process_conflict");
  }
}

export class ProcessExitedError extends InfrastructureError {
  constructor(
    readonly kind: string,
    readonly exitCode: number | null,
    readonly recentOutput: string[] = []
  ) {
    super(`${kind} process exited (code ${exitCode ?? "unknown"}) before it became ready.`, "process_exited");
  }
}

export class ProcessTimeoutError extends InfrastructureError {
  constructor(
    readonly kind: string,
    readonly timeoutMs: number
  ) {
    super(`${kind} process did not finish within ${timeoutMs}ms.`, "process_timeout");
  }
}

export class RepairBudgetExhaustedError extends ForgeError {
  constructor(
    readonly attempts: number,
    readonly lastErrors: TestError[]
  ) {
    super(
      `Tests still failing after ${attempts} repair attempt(s): ${lastErrors
        .slice(0, 3)
        .map((error) => error.message)
        .join(" | ")}`,
      "quality",
      "repair_budget_exhausted"
    );
  }
}

export class RunCancelledError extends ForgeError {
  constructor(message = "Run cancelled.") {
    super(message, "cancelled", "cancelled");
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const toFailure = (error: unknown): RunFailure => {
  if (error instanceof ForgeError) {
    return { reason: error.reason, message: error.message };
  }
  return { reason: "internal", message: errorMessage(error) };
};

export const isCancellation = (error: unknown): boolean =>
  error instanceof RunCancelledError || (error instanceof Error && error.name === "AbortError");
