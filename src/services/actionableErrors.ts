import signatures from "../data/errorSignatures.json";
import { config } from "../config";
import { TestError } from "../types";

export interface ErrorPolicy {
  actionable: string[];
  noise: string[];
}

export interface FilteredErrors {
  actionable: TestError[];
  ignored: TestError[];
}

export const defaultErrorPolicy = (): ErrorPolicy => ({
  actionable: [...signatures.actionable, ...config.extraActionableSignatures],
  noise: [...signatures.noise, ...config.extraNoiseSignatures]
});

export const isActionable = (error: TestError, policy: ErrorPolicy): boolean => {
  const lower = error.message.toLowerCase();
  if (policy.noise.some((signature) => lower.includes(signature.toLowerCase()))) {
    return false;
  }
  return policy.actionable.some((signature) => error.message.includes(signature));
};

export const filterActionable = (errors: TestError[], policy: ErrorPolicy): FilteredErrors => {
  const actionable: TestError[] = [];
  const ignored: TestError[] = [];
  for (const error of errors) {
    (isActionable(error, policy) ? actionable : ignored).push(error);
  }
  return { actionable, ignored };
};

const COMPILE_ERROR = /\[plugin:vite[^\]]*\][^\n]*[/\\]src[/\\]components[/\\](\w{1,50})\.(?:jsx?|tsx?)/i;
const REACT_BOUNDARY = /The above error occurred in the <(\w{1,50})> component/i;
const COMPONENT_PATH = /[/\\]?src[/\\]components[/\\](\w{1,50})\.(?:jsx?|tsx?)/gi;
const LOOSE_COMPONENT = /components?[/\\](\w{1,50})['".:]/g;
const STACK_FRAME = /at \w+ \(https?:/;

const componentName = (filePath: string): string => {
  const base = filePath.split(/[/\\]/).pop() ?? filePath;
  return base.replace(/\.(?:jsx?|tsx?)$/, "");
};

// Maps component names mentioned in the error text back onto files the project owns.
export const identifyImplicatedFiles = (errors: TestError[], knownFiles: string[]): string[] => {
  const byName = new Map(knownFiles.map((file) => [componentName(file), file]));
  const owned = (names: string[]): string[] => {
    const files: string[] = [];
    for (const name of names) {
      const file = byName.get(name);
      if (file && !files.includes(file)) files.push(file);
    }
    return files;
  };

  const hinted: string[] = [];
  for (const error of errors) {
    const hint = error.sourceHint?.replace(/\\/g, "/");
    if (!hint) continue;
    const file = knownFiles.find((known) => hint === known || hint.endsWith(`/${known}`));
    if (file && !hinted.includes(file)) hinted.push(file);
  }
  if (hinted.length > 0) {
    return hinted;
  }

  const text = errors.map((error) => error.message).join("\n");

  const compile = COMPILE_ERROR.exec(text);
  if (compile) {
    const files = owned([compile[1]]);
    if (files.length > 0) return files;
  }

  const boundary = REACT_BOUNDARY.exec(text);
  if (boundary) {
    const files = owned([boundary[1]]);
    if (files.length > 0) return files;
  }

  const lines = text.split("\n").filter((line) => line.length <= 300 && !STACK_FRAME.test(line));

  const mentioned: string[] = [];
  for (const line of lines) {
    for (const match of line.matchAll(COMPONENT_PATH)) mentioned.push(match[1]);
  }
  if (mentioned.length > 0) {
    const files = owned(mentioned);
    if (files.length > 0) return files;
  }

  const loose: string[] = [];
  for (const line of lines) {
    for (const match of line.matchAll(LOOSE_COMPONENT)) loose.push(match[1]);
  }
  return owned(loose);
};
