import { ChildProcess } from "node:child_process";
import { PassThrough } from "node:stream";
import { ProcessSupervisor, SpawnProcess } from "../../src/services/processSupervisor";

export class FakeChild extends ChildProcess {
  readonly signals: Array<NodeJS.Signals | number> = [];
  private exited = false;

  constructor(private readonly options: { ignoreTerm?: boolean; onKill?: () => void } = {}) {
    super();
    this.stdout = new PassThrough();
    this.stderr = new PassThrough();
  }

  override kill(signal: NodeJS.Signals | number = "SIGTERM"): boolean {
    this.signals.push(signal);
    if (signal === "SIGTERM" && this.options.ignoreTerm) {
      return true;
    }
    this.options.onKill?.();
    this.finish(null);
    return true;
  }

  print(text: string, stream: "stdout" | "stderr" = "stdout"): void {
    (stream === "stdout" ? this.stdout : this.stderr)?.push(text);
  }

  finish(code: number | null): void {
    if (this.exited) return;
    this.exited = true;
    setTimeout(() => this.emit("exit", code, null), 1);
  }
}

export interface SpawnRecord {
  command: string;
  child: FakeChild;
}

export interface FakeProcessEnv {
  spawnProcess: SpawnProcess;
  spawned: SpawnRecord[];
  openPorts: Set<number>;
  probePort: (host: string, port: number) => Promise<boolean>;
}

export interface FakeProcessBehaviour {
  installExitCode?: number;
  serveListens?: boolean;
  serveExitCode?: number;
  testOutput?: string;
}

// Commands starting with "install" exit on their own; "serve" opens the port from --port until killed,
// or exits with `serveExitCode` without listening.
export const createFakeProcessEnv = (behaviour: FakeProcessBehaviour = {}): FakeProcessEnv => {
  const spawned: SpawnRecord[] = [];
  const openPorts = new Set<number>();

  const spawnProcess: SpawnProcess = (command) => {
    const port = Number.parseInt(/--port (\d+)/.exec(command)?.[1] ?? "", 10);
    const child = new FakeChild({
      onKill: () => {
        if (Number.isFinite(port)) openPorts.delete(port);
      }
    });
    spawned.push({ command, child });

    if (command.startsWith("install")) {
      child.print("added 42 packages\n");
      child.finish(behaviour.installExitCode ?? 0);
    } else if (command.startsWith("serve") && behaviour.serveExitCode !== undefined) {
      child.print(`Error: listen EADDRINUSE: address already in use :::${port}\n`, "stderr");
      child.finish(behaviour.serveExitCode);
    } else if (command.startsWith("serve") && Number.isFinite(port) && behaviour.serveListens !== false) {
      openPorts.add(port);
    } else if (command.startsWith("check")) {
      child.print(behaviour.testOutput ?? '{"passed":true,"errors":[]}\n');
      child.finish(0);
    }
    return child;
  };

  return {
    spawnProcess,
    spawned,
    openPorts,
    probePort: async (_host, port) => openPorts.has(port)
  };
};

export const createTestSupervisor = (env: FakeProcessEnv): ProcessSupervisor =>
  new ProcessSupervisor({
    detached: false,
    spawnProcess: env.spawnProcess,
    probePort: env.probePort,
    stopGraceMs: 20,
    portPollMaxIntervalMs: 10,
    maxCapturedLines: 50
  });

export const tick = (ms = 5): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));
