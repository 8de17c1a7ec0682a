import { ChildProcess, spawn, SpawnOptions } from "node:child_process";
import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import net from "node:net";
import { config } from "../config";
import { ProcessAlreadyRunningError, ProcessExitedError, ProcessTimeoutError, RunCancelledError } from "../errors";
import { componentLogger, Logger } from "../logger";
import { ProcessKind } from "../types";
import { sleep, throwIfCancelled } from "../utils/async";

export interface ProcessHandle {
  readonly id: string;
  readonly projectId: string;
  readonly kind: ProcessKind;
  readonly command: string;
  readonly cwd: string;
  readonly port?: number;
  readonly pid?: number;
  readonly startedAt: string;
  readonly owner: string;
  readonly alive: boolean;
  readonly exitCode: number | null;
  readonly stoppedAt?: string;
}

export interface StartProcessOptions {
  projectId: string;
  kind: ProcessKind;
  command: string;
  cwd: string;
  owner: string;
  env?: Record<string, string>;
  port?: number;
}

export type PortWaitResult = "ready" | "timeout";

export type OutputStream = "stdout" | "stderr";

export type OutputListener = (handle: ProcessHandle, line: string, stream: OutputStream) => void;

export type SpawnProcess = (command: string, options: SpawnOptions) => ChildProcess;

export type PortProbe = (host: string, port: number) => Promise<boolean>;

export interface ProcessSupervisorOptions {
  stopGraceMs?: number;
  maxCapturedLines?: number;
  portPollMaxIntervalMs?: number;
  detached?: boolean;
  spawnProcess?: SpawnProcess;
  probePort?: PortProbe;
  logger?: Logger;
}

interface MutableHandle {
  id: string;
  projectId: string;
  kind: ProcessKind;
  command: string;
  cwd: string;
  port?: number;
  pid?: number;
  startedAt: string;
  owner: string;
  alive: boolean;
  exitCode: number | null;
  stoppedAt?: string;
}

interface TrackedProcess {
  handle: MutableHandle;
  child: ChildProcess;
  output: string[];
  partial: Record<OutputStream, string>;
  exited: Promise<number | null>;
  stopping?: Promise<void>;
}

const RETIRED_HANDLES = 64;

const keyOf = (projectId: string, kind: ProcessKind): string => `${projectId}:${kind}`;

const isNoSuchProcess = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ESRCH";

const settlesWithin = async (promise: Promise<unknown>, ms: number): Promise<boolean> => {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise.then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), ms);
      })
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
};

export const probeTcpPort: PortProbe = (host, port) =>
  new Promise((resolve) => {
    const socket = net.connect({ host, port });
    const finish = (open: boolean): void => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(open);
    };
    socket.setTimeout(1000, () => finish(false));
    socket.once("connect", () => finish(true));
    socket.once("error", () => finish(false));
  });

export class ProcessSupervisor {
  private readonly table = new Map<string, TrackedProcess>();
  private readonly byId = new Map<string, TrackedProcess>();
  private readonly retired: string[] = [];
  private readonly emitter = new EventEmitter();
  private readonly stopGraceMs: number;
  private readonly maxCapturedLines: number;
  private readonly portPollMaxIntervalMs: number;
  private readonly detached: boolean;
  private readonly spawnProcess: SpawnProcess;
  private readonly probePort: PortProbe;
  private readonly logger: Logger;

  constructor(options: ProcessSupervisorOptions = {}) {
    this.stopGraceMs = options.stopGraceMs ?? config.stopGraceMs;
    this.maxCapturedLines = options.maxCapturedLines ?? config.maxCapturedLines;
    this.portPollMaxIntervalMs = options.portPollMaxIntervalMs ?? config.portPollMaxIntervalMs;
    this.detached = options.detached ?? process.platform !== "win32";
    this.spawnProcess = options.spawnProcess ?? ((command, spawnOptions) => spawn(command, spawnOptions));
    this.probePort = options.probePort ?? probeTcpPort;
    this.logger = options.logger ?? componentLogger("process-supervisor");
    this.emitter.setMaxListeners(0);
  }

  start(options: StartProcessOptions): ProcessHandle {
    const key = keyOf(options.projectId, options.kind);
    const existing = this.table.get(key);
    if (existing?.handle.alive) {
      throw new ProcessAlreadyRunningError(options.projectId, options.kind);
    }

    const child = this.spawnProcess(options.command, {
      cwd: options.cwd,
      shell: true,
      detached: this.detached,
      stdio: ["ignore", "pipe", "pipe"],
      env: {
        ...process.env,
        CI: process.env.CI ?? "1",
        ...(options.env ?? {})
      }
    });

    const handle: MutableHandle = {
      id: randomUUID(),
      projectId: options.projectId,
      kind: options.kind,
      command: options.command,
      cwd: options.cwd,
      port: options.port,
      pid: child.pid,
      startedAt: new Date().toISOString(),
      owner: options.owner,
      alive: true,
      exitCode: null
    };

    let settled = false;
    let resolveExit: (code: number | null) => void = () => undefined;
    const exited = new Promise<number | null>((resolve) => {
      resolveExit = resolve;
    });

    const tracked: TrackedProcess = {
      handle,
      child,
      output: [],
      partial: { stdout: "", stderr: "" },
      exited
    };

    const settle = (code: number | null): void => {
      if (settled) return;
      settled = true;
      this.flushPartial(tracked, "stdout");
      this.flushPartial(tracked, "stderr");
      this.markStopped(tracked, code);
      resolveExit(code);
    };

    child.stdout?.on("data", (chunk: Buffer) => this.appendOutput(tracked, "stdout", chunk.toString("utf8")));
    child.stderr?.on("data", (chunk: Buffer) => this.appendOutput(tracked, "stderr", chunk.toString("utf8")));
    child.once("error", (error) => {
      this.pushLine(tracked, `spawn error: ${error.message}`, "stderr");
      settle(null);
    });
    child.once("exit", (code) => settle(code));

    this.table.set(key, tracked);
    this.byId.set(handle.id, tracked);
    this.logger.info({ projectId: handle.projectId, kind: handle.kind, pid: handle.pid, owner: handle.owner }, "process started");
    return handle;
  }

  async waitForPort(
    host: string,
    port: number,
    timeoutMs: number,
    options: { handle?: ProcessHandle; signal?: AbortSignal } = {}
  ): Promise<PortWaitResult> {
    const deadline = Date.now() + timeoutMs;
    let interval = 100;

    for (;;) {
      throwIfCancelled(options.signal);
      const watched = options.handle;
      if (watched && !watched.alive) {
        throw new ProcessExitedError(watched.kind, watched.exitCode, this.captureOutput(watched));
      }
      if (await this.probePort(host, port)) {
        return "ready";
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return "timeout";
      }
      await sleep(Math.min(interval, remaining), options.signal);
      interval = Math.min(interval * 2, this.portPollMaxIntervalMs);
    }
  }

  async waitForExit(handle: ProcessHandle, timeoutMs: number, signal?: AbortSignal): Promise<{ exitCode: number | null }> {
    const tracked = this.byId.get(handle.id);
    if (!tracked) {
      return { exitCode: handle.exitCode };
    }

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<"aborted">((resolve) => {
      if (signal?.aborted) {
        resolve("aborted");
        return;
      }
      onAbort = () => resolve("aborted");
      signal?.addEventListener("abort", onAbort, { once: true });
    });

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });

    try {
      const outcome = await Promise.race([tracked.exited.then(() => "exited" as const), timedOut, aborted]);
      if (outcome === "exited") {
        return { exitCode: tracked.handle.exitCode };
      }
      await this.stop(handle);
      if (outcome === "aborted") {
        throw new RunCancelledError();
      }
      throw new ProcessTimeoutError(handle.kind, timeoutMs);
    } finally {
      if (timer) clearTimeout(timer);
      if (onAbort) signal?.removeEventListener("abort", onAbort);
    }
  }

  async stop(handle: ProcessHandle): Promise<void> {
    const tracked = this.byId.get(handle.id);
    if (!tracked || !tracked.handle.alive) {
      return;
    }

    if (!tracked.stopping) {
      tracked.stopping = this.terminate(tracked);
    }
    await tracked.stopping;
  }

  async stopOwned(owner: string): Promise<void> {
    await Promise.all(this.list().filter((handle) => handle.owner === owner).map((handle) => this.stop(handle)));
  }

  async stopProject(projectId: string, kind?: ProcessKind): Promise<void> {
    await Promise.all(
      this.list()
        .filter((handle) => handle.projectId === projectId && (!kind || handle.kind === kind))
        .map((handle) => this.stop(handle))
    );
  }

  async stopAll(): Promise<void> {
    await Promise.all(this.list().map((handle) => this.stop(handle)));
  }

  transfer(handle: ProcessHandle, owner: string): void {
    const tracked = this.byId.get(handle.id);
    if (!tracked) return;
    tracked.handle.owner = owner;
  }

  captureOutput(handle: ProcessHandle): string[] {
    const tracked = this.byId.get(handle.id);
    return tracked ? [...tracked.output] : [];
  }

  find(projectId: string, kind: ProcessKind): ProcessHandle | undefined {
    const tracked = this.table.get(keyOf(projectId, kind));
    return tracked?.handle.alive ? tracked.handle : undefined;
  }

  list(): ProcessHandle[] {
    return [...this.byId.values()].filter((tracked) => tracked.handle.alive).map((tracked) => tracked.handle);
  }

  onOutput(listener: OutputListener): () => void {
    this.emitter.on("output", listener);
    return () => this.emitter.off("output", listener);
  }

  installShutdownHooks(options: { signals?: boolean } = {}): () => void {
    const onExit = (): void => this.killAllSync();
    const onSignal = (signal: NodeJS.Signals): void => {
      this.stopAll()
        .catch((error: unknown) => this.logger.error({ err: error }, "failed to stop processes on shutdown"))
        .finally(() => process.exit(signal === "SIGINT" ? 130 : 143));
    };

    process.once("exit", onExit);
    if (options.signals ?? true) {
      process.once("SIGINT", onSignal);
      process.once("SIGTERM", onSignal);
    }

    return () => {
      process.off("exit", onExit);
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    };
  }

  killAllSync(): void {
    for (const tracked of this.byId.values()) {
      if (tracked.handle.alive) {
        this.signal(tracked, "SIGKILL");
      }
    }
  }

  private async terminate(tracked: TrackedProcess): Promise<void> {
    this.signal(tracked, "SIGTERM");
    const graceful = await settlesWithin(tracked.exited, this.stopGraceMs);
    if (!graceful) {
      this.logger.warn({ projectId: tracked.handle.projectId, kind: tracked.handle.kind }, "process ignored SIGTERM, killing");
      this.signal(tracked, "SIGKILL");
      await settlesWithin(tracked.exited, this.stopGraceMs);
    }
    // SIGKILL cannot be refused; the handle is stopped even if the exit event never arrives.
    this.markStopped(tracked, tracked.handle.exitCode);
  }

  private signal(tracked: TrackedProcess, signal: NodeJS.Signals): void {
    const pid = tracked.child.pid;
    try {
      if (this.detached && pid !== undefined) {
        process.kill(-pid, signal);
      } else {
        tracked.child.kill(signal);
      }
    } catch (error: unknown) {
      if (!isNoSuchProcess(error)) {
        this.logger.warn({ err: error, pid, signal }, "failed to signal process");
      }
    }
  }

  private markStopped(tracked: TrackedProcess, code: number | null): void {
    const { handle } = tracked;
    if (!handle.alive) return;
    handle.alive = false;
    handle.exitCode = code;
    handle.stoppedAt = new Date().toISOString();

    const key = keyOf(handle.projectId, handle.kind);
    if (this.table.get(key) === tracked) {
      this.table.delete(key);
    }
    // Stopped handles keep their output for a while so callers can still read it.
    this.retired.push(handle.id);
    while (this.retired.length > RETIRED_HANDLES) {
      const oldest = this.retired.shift();
      if (oldest) this.byId.delete(oldest);
    }
    this.logger.info({ projectId: handle.projectId, kind: handle.kind, exitCode: code }, "process stopped");
  }

  private appendOutput(tracked: TrackedProcess, stream: OutputStream, text: string): void {
    const lines = (tracked.partial[stream] + text).split(/\r?\n/);
    tracked.partial[stream] = lines.pop() ?? "";
    for (const line of lines) {
      this.pushLine(tracked, line, stream);
    }
  }

  private flushPartial(tracked: TrackedProcess, stream: OutputStream): void {
    const rest = tracked.partial[stream];
    tracked.partial[stream] = "";
    if (rest) {
      this.pushLine(tracked, rest, stream);
    }
  }

  private pushLine(tracked: TrackedProcess, raw: string, stream: OutputStream): void {
    const line = raw.trimEnd();
    if (!line.trim()) return;
    tracked.output.push(line);
    if (tracked.output.length > this.maxCapturedLines) {
      tracked.output.splice(0, tracked.output.length - this.maxCapturedLines);
    }
    this.emitter.emit("output", tracked.handle, line, stream);
  }
}
