import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { config } from "../config";
import { InputError, ProjectNotFoundError } from "../errors";
import {
  ComponentSource,
  GeneratedFile,
  ProjectArchive,
  ProjectFileSet,
  ProjectMeta,
  ProjectState,
  ProjectSummary
} from "../types";
import { byteSize } from "../utils/text";

const META_DIR = ".forge";
const META_FILE = "project.json";
const SKIPPED_DIRS = new Set(["node_modules", "dist", ".forge", ".git"]);
const MAX_READ_BYTES = 512 * 1024;
const PROJECT_NAME = /^[a-z0-9][a-z0-9-]{0,63}$/;

const isWithinOrEqual = (candidate: string, root: string): boolean => {
  const relative = path.relative(root, candidate);
  return !relative.startsWith("..") && !path.isAbsolute(relative);
};

const isMissing = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

const projectMetaSchema = z.object({
  name: z.string(),
  title: z.string(),
  lifecycle: z.enum(["empty", "running", "ready", "failed"]),
  createdAt: z.string(),
  lastBuiltAt: z.string().optional(),
  idea: z.string().optional()
});

const toPosix = (value: string): string => value.split(path.sep).join("/");

export class ProjectStore {
  constructor(private readonly root = config.projectsRoot) {}

  get rootDir(): string {
    return this.root;
  }

  projectRoot(name: string): string {
    if (!PROJECT_NAME.test(name)) {
      throw new InputError(`Invalid project name: ${name}`);
    }
    return path.join(this.root, name);
  }

  resolveSafePath(name: string, relativePath: string): string {
    const baseRoot = this.projectRoot(name);
    const cleaned = relativePath.replace(/\\/g, "/").replace(/^\/+/, "");
    const absolute = path.resolve(baseRoot, cleaned);
    if (!cleaned || !isWithinOrEqual(absolute, baseRoot) || absolute === baseRoot) {
      throw new InputError(`Unsafe path rejected: ${relativePath}`);
    }
    return absolute;
  }

  async exists(name: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.projectRoot(name));
      return stat.isDirectory();
    } catch (error: unknown) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  async assertExists(name: string): Promise<void> {
    if (!(await this.exists(name))) {
      throw new ProjectNotFoundError(name);
    }
  }

  async uniqueName(base: string, reserved: (name: string) => boolean = () => false): Promise<string> {
    let candidate = base;
    let suffix = 2;
    while (reserved(candidate) || (await this.exists(candidate))) {
      candidate = `${base}-${suffix}`;
      suffix += 1;
    }
    return candidate;
  }

  async create(name: string, meta: Omit<ProjectMeta, "name" | "createdAt" | "lifecycle">): Promise<ProjectMeta> {
    await fs.mkdir(this.projectRoot(name), { recursive: true });
    const created: ProjectMeta = {
      name,
      createdAt: new Date().toISOString(),
      lifecycle: "empty",
      ...meta
    };
    await this.writeMeta(created);
    return created;
  }

  async readMeta(name: string): Promise<ProjectMeta> {
    const root = this.projectRoot(name);
    try {
      const raw = await fs.readFile(path.join(root, META_DIR, META_FILE), "utf8");
      return { ...projectMetaSchema.parse(JSON.parse(raw)), name };
    } catch (error: unknown) {
      if (!isMissing(error)) throw error;
    }

    // Projects copied in by hand have no metadata; describe them from the directory itself.
    const stat = await fs.stat(root).catch((error: unknown) => {
      throw isMissing(error) ? new ProjectNotFoundError(name) : error;
    });
    return { name, title: name, lifecycle: "ready", createdAt: stat.mtime.toISOString() };
  }

  async writeMeta(meta: ProjectMeta): Promise<void> {
    const dir = path.join(this.projectRoot(meta.name), META_DIR);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(path.join(dir, META_FILE), `${JSON.stringify(meta, null, 2)}\n`, "utf8");
  }

  async updateMeta(name: string, patch: Partial<Omit<ProjectMeta, "name">>): Promise<ProjectMeta> {
    const next = { ...(await this.readMeta(name)), ...patch, name };
    await this.writeMeta(next);
    return next;
  }

  async list(): Promise<ProjectSummary[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.root, { withFileTypes: true });
    } catch (error: unknown) {
      if (isMissing(error)) return [];
      throw error;
    }

    const names = entries.filter((entry) => entry.isDirectory() && PROJECT_NAME.test(entry.name)).map((entry) => entry.name);
    const summaries = await Promise.all(
      names.map(async (name) => {
        const meta = await this.readMeta(name);
        const files = await this.listFiles(name);
        return { ...meta, root: this.projectRoot(name), fileCount: files.length };
      })
    );
    return summaries.sort((a, b) => a.name.localeCompare(b.name));
  }

  async listFiles(name: string): Promise<string[]> {
    const root = this.projectRoot(name);
    const files: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (error: unknown) {
        if (isMissing(error)) return;
        throw error;
      }
      for (const entry of entries) {
        const absolute = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          if (!SKIPPED_DIRS.has(entry.name)) await walk(absolute);
        } else if (entry.isFile()) {
          files.push(toPosix(path.relative(root, absolute)));
        }
      }
    };

    await walk(root);
    return files.sort();
  }

  async readFiles(name: string): Promise<ProjectFileSet> {
    await this.assertExists(name);
    const files: ProjectFileSet = {};
    for (const relative of await this.listFiles(name)) {
      const absolute = this.resolveSafePath(name, relative);
      const stat = await fs.stat(absolute);
      if (stat.size > MAX_READ_BYTES) continue;
      const content = await fs.readFile(absolute, "utf8");
      files[relative] = { content, size: byteSize(content) };
    }
    return files;
  }

  async readFile(name: string, relativePath: string): Promise<string | undefined> {
    try {
      return await fs.readFile(this.resolveSafePath(name, relativePath), "utf8");
    } catch (error: unknown) {
      if (isMissing(error)) return undefined;
      throw error;
    }
  }

  async writeFile(name: string, relativePath: string, content: string): Promise<{ previous?: string }> {
    const absolute = this.resolveSafePath(name, relativePath);
    const previous = await this.readFile(name, relativePath);
    await fs.mkdir(path.dirname(absolute), { recursive: true });
    await fs.writeFile(absolute, content, "utf8");
    return { previous };
  }

  async components(name: string): Promise<ProjectState> {
    await this.assertExists(name);
    const dir = this.resolveSafePath(name, "src/components");
    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch (error: unknown) {
      if (isMissing(error)) return { components: [] };
      throw error;
    }

    const components: ComponentSource[] = [];
    for (const file of entries.filter((entry) => /\.(?:jsx|tsx)$/.test(entry)).sort()) {
      const content = await fs.readFile(path.join(dir, file), "utf8");
      components.push({ name: file.replace(/\.(?:jsx|tsx)$/, ""), content });
    }
    return { components };
  }

  async hasDependencies(name: string): Promise<boolean> {
    try {
      const stat = await fs.stat(path.join(this.projectRoot(name), "node_modules"));
      return stat.isDirectory();
    } catch (error: unknown) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  async importProject(name: string, files: GeneratedFile[], title = name): Promise<ProjectMeta> {
    if (await this.exists(name)) {
      throw new InputError(`Project already exists: ${name}`);
    }
    if (files.length === 0) {
      throw new InputError("Import needs at least one file.");
    }
    // Validate every path before touching the disk.
    files.forEach((file) => this.resolveSafePath(name, file.path));

    await this.create(name, { title });
    for (const file of files) {
      await this.writeFile(name, file.path, file.content);
    }
    return this.updateMeta(name, { lifecycle: "ready" });
  }

  async exportArchive(name: string): Promise<ProjectArchive> {
    const fileSet = await this.readFiles(name);
    const files = Object.entries(fileSet).map(([filePath, file]) => ({ path: filePath, size: file.size, content: file.content }));
    return {
      format: "site-forge-archive",
      version: 1,
      project: name,
      exportedAt: new Date().toISOString(),
      fileCount: files.length,
      totalBytes: files.reduce((sum, file) => sum + file.size, 0),
      files
    };
  }
}
