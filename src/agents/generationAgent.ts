import { z } from "zod";
import { config } from "../config";
import { CollaboratorError, MalformedOutputError, RunCancelledError, errorMessage } from "../errors";
import { CompletionRequest, LlmLike } from "../llm/openaiClient";
import { allowedPackages, componentPath, plannedComponents, scaffoldFiles } from "../services/scaffold";
import { CollaboratorContext, GeneratedFile, Intent, ProjectSpecification, TestError } from "../types";
import { withTimeout } from "../utils/async";
import { parseJsonObject } from "../utils/json";
import { stripCodeFences } from "../utils/text";

export interface RewriteRequest {
  component: string;
  instruction: string;
  intent: Intent;
  currentContent?: string;
  projectContext: string;
}

export interface RepairContext {
  currentContent: string;
  errors: TestError[];
  projectContext: string;
}

export interface TargetSelectionRequest {
  instruction: string;
  intent: Intent;
  components: string[];
  projectContext: string;
}

const targetSelectionSchema = z.object({ targets: z.array(z.string()) });

const SYSTEM_PROMPT = [
  "You are an expert React + Tailwind developer.",
  "Output ONLY complete, valid JSX code. No markdown fences, no explanation, no preamble.",
  "Rules:",
  "1. Imports first, then immediately `export default function Name()`; nothing between them.",
  "2. All data arrays, constants and state live inside the function body.",
  "3. Never split the UI into several named functions; everything lives in the one exported function.",
  `4. Only import from: ${allowedPackages().join(", ")}. Icons come from react-icons/fi.`,
  "5. Self-close void elements: <br />, <img />, <input />, <hr />.",
  "6. The outermost element has an explicit dark background such as bg-gray-900.",
  "7. Never write regex literals or division inside JSX braces; hoist them to constants above return()."
].join("\n");

const limit = (text: string, max: number): string => (text.length > max ? `${text.slice(0, max)} ...[truncated]` : text);

// Small files are shown whole; components are clipped harder so the prompt stays within budget.
export const summarizeCodebase = (files: Record<string, string>): string => {
  const priority = ["src/App.jsx", "src/main.jsx", "src/index.css"];
  const ordered = [...priority.filter((file) => file in files), ...Object.keys(files).sort().filter((file) => !priority.includes(file))];
  return ordered
    .filter((file) => file.startsWith("src/"))
    .map((file) => `── ${file} ──\n${limit(files[file], file.startsWith("src/components/") ? 800 : 400)}`)
    .join("\n\n");
};

export const extractComponentCode = (raw: string): string => {
  const body = stripCodeFences(raw);
  const firstImport = body.search(/^import\s/m);
  const code = firstImport > 0 ? body.slice(firstImport).trim() : body;
  return code.includes("export default") ? code : "";
};

const componentPrompt = (name: string, spec: ProjectSpecification): string => {
  const common = [
    `Project: ${spec.title} (${spec.siteType}) - ${spec.tagline}`,
    `Description: ${spec.description}`,
    `Style: ${spec.style}; colours: ${spec.colorScheme}`,
    spec.features.length > 0 ? `Key features: ${spec.features.join(", ")}` : ""
  ].filter(Boolean);

  if (name === "App") {
    return [
      "Build the complete application as ONE React component named App.",
      ...common,
      "It must be fully interactive with real working logic and real content, not a landing page.",
      "Output ONLY the JSX starting with import statements."
    ].join("\n");
  }

  if (name === "Navbar") {
    return [
      `Build a responsive sticky Navbar for "${spec.title}".`,
      `Link to these section ids with window.scrollTo: ${spec.sections.filter((section) => section !== "Navbar").map((section) => section.toLowerCase()).join(", ")}.`,
      "Include a mobile menu toggled with useState.",
      "Output ONLY the JSX starting with import statements."
    ].join("\n");
  }

  return [
    `Build the ${name} section of the site.`,
    ...common,
    "Use framer-motion for entrance animations and real, specific content.",
    `export default function ${name}()`,
    "Output ONLY the JSX starting with import statements."
  ].join("\n");
};

const rewritePrompt = (request: RewriteRequest): string => {
  if (request.intent === "feature" || request.currentContent === undefined) {
    return [
      `Create a NEW React component called '${request.component}'.`,
      `USER REQUEST: ${request.instruction}`,
      "EXISTING CODEBASE (match its colours, fonts and design language):",
      limit(request.projectContext, 2000),
      `Export default function ${request.component}(). Output ONLY the complete JSX starting with import statements.`
    ].join("\n\n");
  }

  if (request.intent === "patch") {
    return [
      `Make this SMALL change to the '${request.component}' React component.`,
      `CHANGE: ${request.instruction}`,
      "CURRENT FULL CODE (change ONLY what is described above):",
      request.currentContent,
      "Keep every import, function and className unchanged unless the request mentions it.",
      `Export default function ${request.component}(). Output the COMPLETE updated JSX.`
    ].join("\n\n");
  }

  return [
    `Update the '${request.component}' component as described.`,
    `REQUEST: ${request.instruction}`,
    "CURRENT CODE (implement the request, preserve everything else):",
    request.currentContent,
    "OTHER PROJECT FILES (context only, do not change these):",
    limit(request.projectContext, 1200),
    `Export default function ${request.component}(). Output the COMPLETE updated JSX.`
  ].join("\n\n");
};

const repairHints = (errors: TestError[], name: string): string[] => {
  const hints: string[] = [];
  for (const { message } of errors) {
    const missingExport = /does not provide an export named '(\w+)'/.exec(message);
    if (missingExport) {
      hints.push(`- Remove '${missingExport[1]}' from the imports; it does not exist. Use a real icon such as FiCircle or FiBox.`);
    }
    const undefinedName = /(\w+) is not defined/.exec(message);
    if (undefinedName) {
      hints.push(`- '${undefinedName[1]}' is not defined. Define it inside export default function ${name}() or import it.`);
    }
    if (/Failed to resolve import|Cannot find module/.test(message)) {
      hints.push(`- Fix the broken import: ${message.slice(0, 120)}`);
    }
  }
  return [...new Set(hints)];
};

const repairPrompt = (filePath: string, name: string, context: RepairContext): string => {
  const relevant = context.errors.filter(
    (error) => error.message.includes(name) || error.sourceHint?.endsWith(filePath) === true
  );
  const shown = (relevant.length > 0 ? relevant : context.errors).slice(0, 8);
  const hints = repairHints(shown, name);

  return [
    `Fix the broken React component ${filePath}.`,
    `ERRORS:\n${shown.map((error) => `  ${error.message.slice(0, 300)}`).join("\n")}`,
    hints.length > 0 ? `SPECIFIC FIXES:\n${hints.join("\n")}` : "",
    `CODEBASE CONTEXT:\n${limit(context.projectContext, 1800)}`,
    `BROKEN COMPONENT:\n${limit(context.currentContent, 6000)}`,
    `Keep the same visual design. Output ONLY the complete fixed JSX ending in export default function ${name}().`
  ]
    .filter(Boolean)
    .join("\n\n");
};

const TARGET_SYSTEM_PROMPT = [
  "You are a JSON API. Output ONLY a raw JSON object. No markdown, no explanation.",
  'Answer with {"targets":["ComponentName"]}, the React components the request should change.'
].join("\n");

const targetPrompt = (request: TargetSelectionRequest): string =>
  [
    `Existing components: ${request.components.join(", ") || "(none)"}`,
    `User request: ${request.instruction}`,
    request.intent === "feature"
      ? "Rule: the user wants to ADD something. Return one new PascalCase component name unless an existing one fits."
      : "Rule: the user wants to change existing UI. Return ONLY names from the existing component list.",
    `Codebase:\n${limit(request.projectContext, 900)}`,
    "Which component(s) to change? JSON only:"
  ].join("\n\n");

const componentNameOf = (filePath: string): string => (filePath.split("/").pop() ?? filePath).replace(/\.(?:jsx?|tsx?)$/, "");

export class GenerationAgent {
  constructor(
    private readonly llm: LlmLike,
    private readonly timeoutMs = config.llmTimeoutMs
  ) {}

  private async call(label: string, request: CompletionRequest, ctx: CollaboratorContext): Promise<string> {
    try {
      return await withTimeout(this.llm.complete(request, ctx), this.timeoutMs, label);
    } catch (error: unknown) {
      if (ctx.signal?.aborted) throw new RunCancelledError();
      throw new CollaboratorError(`${label} failed: ${errorMessage(error)}`, "generation_failed", { cause: error });
    }
  }

  private async writeComponent(
    filePath: string,
    user: string,
    modelId: string,
    ctx: CollaboratorContext,
    temperature: number
  ): Promise<string> {
    const name = componentNameOf(filePath);
    const raw = await this.call(
      `Generation of ${name}`,
      { model: modelId, system: SYSTEM_PROMPT, user, temperature, maxTokens: 4096, streamAs: filePath },
      ctx
    );

    const code = extractComponentCode(raw);
    if (!code) {
      throw new MalformedOutputError("generation", `Model returned no usable component code for ${name}.`, raw);
    }
    return `${code}\n`;
  }

  async *generate(spec: ProjectSpecification, modelId: string, ctx: CollaboratorContext = {}): AsyncGenerator<GeneratedFile> {
    for (const file of scaffoldFiles(spec)) {
      yield file;
    }
    for (const name of plannedComponents(spec)) {
      const filePath = componentPath(name);
      const content = await this.writeComponent(filePath, componentPrompt(name, spec), modelId, ctx, 0.15);
      yield { path: filePath, content };
    }
  }

  async rewrite(request: RewriteRequest, modelId: string, ctx: CollaboratorContext = {}): Promise<string> {
    const temperature = request.intent === "patch" ? 0.05 : 0.15;
    return this.writeComponent(componentPath(request.component), rewritePrompt(request), modelId, ctx, temperature);
  }

  async repair(filePath: string, context: RepairContext, modelId: string, ctx: CollaboratorContext = {}): Promise<string> {
    const name = componentNameOf(filePath);
    return this.writeComponent(filePath, repairPrompt(filePath, name, context), modelId, ctx, 0.05);
  }

  async chooseTargets(request: TargetSelectionRequest, modelId: string, ctx: CollaboratorContext = {}): Promise<string[]> {
    const raw = await this.call(
      "Target selection",
      { model: modelId, system: TARGET_SYSTEM_PROMPT, user: targetPrompt(request), json: true, temperature: 0, maxTokens: 150 },
      ctx
    );
    const parsed = parseJsonObject(raw, targetSelectionSchema);
    if (!parsed.ok) {
      throw new MalformedOutputError("generation", `Target selection returned no component list (${parsed.problem}).`, raw);
    }
    return parsed.value.targets;
  }
}
