import { ZodError, ZodType, ZodTypeDef } from "zod";

export type JsonParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; found: boolean; problem: string };

export const describeIssues = (error: ZodError): string =>
  error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)).join("; ");

const asObject = (candidate: string): object | undefined => {
  let value: unknown;
  try {
    value = JSON.parse(candidate);
  } catch {
    return undefined;
  }
  return typeof value === "object" && value !== null && !Array.isArray(value) ? value : undefined;
};

// Balanced `{...}` spans in order of their opening brace; braces inside string literals do not count.
function* braceSpans(text: string): Generator<string> {
  for (let open = text.indexOf("{"); open !== -1; open = text.indexOf("{", open + 1)) {
    let depth = 0;
    let quoted = false;
    let escaped = false;
    for (let index = open; index < text.length; index += 1) {
      const ch = text[index];
      if (quoted) {
        if (escaped) escaped = false;
        else if (ch === "\\") escaped = true;
        else if (ch === '"') quoted = false;
      } else if (ch === '"') {
        quoted = true;
      } else if (ch === "{") {
        depth += 1;
      } else if (ch === "}") {
        depth -= 1;
        if (depth === 0) {
          yield text.slice(open, index + 1);
          break;
        }
      }
    }
  }
}

// Fenced blocks first, then the raw text; each source whole, then every brace span inside it.
function* objectCandidates(text: string): Generator<object> {
  const fenced = [...text.matchAll(/```(?:json)?\s*([\s\S]*?)```/gi)].map((match) => match[1]);
  for (const source of [...fenced, text]) {
    for (const span of [source.trim(), ...braceSpans(source)]) {
      const value = asObject(span);
      if (value) yield value;
    }
  }
}

// Returns the first object in model output that the schema accepts.
export const parseJsonObject = <T>(text: string, schema: ZodType<T, ZodTypeDef, unknown>): JsonParseResult<T> => {
  let firstProblem: string | undefined;
  for (const candidate of objectCandidates(text)) {
    const parsed = schema.safeParse(candidate);
    if (parsed.success) {
      return { ok: true, value: parsed.data };
    }
    if (firstProblem === undefined) {
      firstProblem = describeIssues(parsed.error);
    }
  }
  return firstProblem === undefined
    ? { ok: false, found: false, problem: "No JSON object found in model output." }
    : { ok: false, found: true, problem: firstProblem };
};
