import { z } from "zod";
import { config } from "../config";
import { InfrastructureError, ProcessTimeoutError, RunCancelledError, errorMessage } from "../errors";
import { ProcessSupervisor } from "../services/processSupervisor";
import { TestContext, TestError, TestReport } from "../types";
import { parseJsonObject } from "../utils/json";
import { fillTemplate } from "../utils/text";

export interface TestCommandRunner {
  run(
    command: string,
    options: { projectId: string; cwd: string; owner: string; timeoutMs: number; signal?: AbortSignal }
  ): Promise<{ exitCode: number | null; output: string[] }>;
}

export class SupervisedCommandRunner implements TestCommandRunner {
  constructor(private readonly supervisor: ProcessSupervisor) {}

  async run(
    command: string,
    options: { projectId: string; cwd: string; owner: string; timeoutMs: number; signal?: AbortSignal }
  ): Promise<{ exitCode: number | null; output: string[] }> {
    const handle = this.supervisor.start({
      projectId: options.projectId,
      kind: "test",
      command,
      cwd: options.cwd,
      owner: options.owner
    });
    const { exitCode } = await this.supervisor.waitForExit(handle, options.timeoutMs, options.signal);
    return { exitCode, output: this.supervisor.captureOutput(handle) };
  }
}

const reportSchema = z.object({
  passed: z.boolean(),
  errors: z
    .array(
      z.union([
        z.string().transform((message) => ({ message })),
        z.object({ message: z.string(), sourceHint: z.string().optional() })
      ])
    )
    .default([])
});

export interface TestAgentOptions {
  fetchImpl?: typeof fetch;
  runner?: TestCommandRunner;
  testCommand?: string;
  timeoutMs?: number;
  requestTimeoutMs?: number;
}

const firstLine = (body: string): string =>
  body
    .replace(/<[^>]+>/g, " ")
    .split("\n")
    .map((line) => line.trim())
    .find(Boolean)
    ?.slice(0, 300) ?? "no details";

export const parseTestReport = (output: string[]): TestReport => {
  const parsed = parseJsonObject(output.join("\n"), reportSchema);
  if (parsed.ok) {
    return parsed.value;
  }
  throw new InfrastructureError(
    parsed.found
      ? `Test command report has an unexpected shape: ${parsed.problem}`
      : `Test command printed no JSON report: ${parsed.problem}`
  );
};

export class TestAgent {
  private readonly fetchImpl: typeof fetch;
  private readonly testCommand: string;
  private readonly timeoutMs: number;
  private readonly requestTimeoutMs: number;

  constructor(private readonly options: TestAgentOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.testCommand = options.testCommand ?? config.testCommand;
    this.timeoutMs = options.timeoutMs ?? config.testTimeoutMs;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
  }

  private async request(url: string, signal?: AbortSignal): Promise<{ status: number; ok: boolean; body: string }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      const response = await this.fetchImpl(url, { signal: controller.signal });
      return { status: response.status, ok: response.ok, body: await response.text() };
    } catch (error: unknown) {
      if (signal?.aborted) throw new RunCancelledError();
      throw new InfrastructureError(`Dev server unreachable at ${url}: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  async runTests(servingUrl: string, ctx: TestContext = {}): Promise<TestReport> {
    const base = servingUrl.replace(/\/+$/, "");
    const errors: TestError[] = [];

    const index = await this.request(`${base}/`, ctx.signal);
    if (!index.ok) {
      errors.push({ message: `Failed to compile index.html: HTTP ${index.status}`, sourceHint: "index.html" });
    } else if (!/id=["']root["']/.test(index.body)) {
      errors.push({ message: "Page appears completely blank: no root element in index.html", sourceHint: "index.html" });
    }

    // The dev server compiles each module on request and answers 500 with the compiler message.
    for (const module of ctx.modules ?? []) {
      const response = await this.request(`${base}/${module.replace(/^\/+/, "")}`, ctx.signal);
      if (!response.ok) {
        errors.push({ message: `Failed to compile ${module}: ${firstLine(response.body)}`, sourceHint: module });
      }
    }

    if (this.testCommand && this.options.runner && ctx.project) {
      errors.push(...(await this.runCommand(base, ctx)));
    }

    return { passed: errors.length === 0, errors };
  }

  private async runCommand(url: string, ctx: TestContext): Promise<TestError[]> {
    const runner = this.options.runner;
    const project = ctx.project;
    if (!runner || !project) return [];

    let result: { exitCode: number | null; output: string[] };
    try {
      result = await runner.run(fillTemplate(this.testCommand, { url }), {
        projectId: project.id,
        cwd: project.root,
        owner: ctx.owner ?? `test:${project.id}`,
        timeoutMs: this.timeoutMs,
        signal: ctx.signal
      });
    } catch (error: unknown) {
      if (error instanceof ProcessTimeoutError) {
        throw new InfrastructureError(`Browser test command timed out after ${this.timeoutMs}ms.`);
      }
      throw error;
    }

    const report = parseTestReport(result.output);
    if (!report.passed && report.errors.length === 0) {
      return [{ message: `Test command failed (exit code ${result.exitCode ?? "unknown"}) without reporting errors.` }];
    }
    return report.passed ? [] : report.errors;
  }
}
