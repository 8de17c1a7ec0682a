import { CapacityError, ProjectBusyError } from "../errors";

export interface ProjectLockOptions {
  maxConcurrentRuns: number;
  devPortBase: number;
}

export class ProjectLockManager {
  private readonly byProject = new Map<string, string>();
  private readonly portsByRun = new Map<string, number>();

  constructor(private readonly options: ProjectLockOptions) {}

  // Admission is atomic: the busy check, the capacity check and the lock happen together.
  admit(runId: string, project: string): void {
    const owner = this.byProject.get(project);
    if (owner && owner !== runId) {
      throw new ProjectBusyError(project, owner);
    }
    if (!owner && this.activeCount() >= this.options.maxConcurrentRuns) {
      throw new CapacityError(this.options.maxConcurrentRuns);
    }
    this.byProject.set(project, runId);
  }

  release(runId: string): void {
    for (const [project, owner] of this.byProject.entries()) {
      if (owner === runId) {
        this.byProject.delete(project);
      }
    }
    this.releasePort(runId);
  }

  ownerOf(project: string): string | undefined {
    return this.byProject.get(project);
  }

  isLocked(project: string): boolean {
    return this.byProject.has(project);
  }

  activeCount(): number {
    return new Set(this.byProject.values()).size;
  }

  allocatePort(runId: string, reserved: number[] = []): number {
    const existing = this.portsByRun.get(runId);
    if (existing !== undefined) {
      return existing;
    }
    const taken = new Set([...this.portsByRun.values(), ...reserved]);
    let port = this.options.devPortBase;
    while (taken.has(port)) {
      port += 1;
    }
    this.portsByRun.set(runId, port);
    return port;
  }

  releasePort(runId: string): void {
    this.portsByRun.delete(runId);
  }
}
