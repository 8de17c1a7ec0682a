const STOP_WORDS = new Set([
  "a", "an", "the", "build", "create", "make", "i", "want", "need", "with", "for",
  "and", "or", "of", "website", "site", "page", "web", "app", "simple", "me", "my"
]);

export const slugify = (value: string, maxLength = 30): string =>
  value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, maxLength)
    .replace(/-+$/g, "");

export const projectSlugFromIdea = (idea: string): string => {
  const words = idea
    .split(/\s+/)
    .map((word) => word.replace(/[^A-Za-z0-9]/g, ""))
    .filter((word) => word && !STOP_WORDS.has(word.toLowerCase()));
  return slugify(words.slice(0, 4).join(" ")) || "project";
};

export const toPascalCase = (value: string): string =>
  value
    .split(/[^A-Za-z0-9]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");

export const byteSize = (content: string): number => Buffer.byteLength(content, "utf8");

export const formatSize = (bytes: number): string => (bytes >= 1024 ? `${(bytes / 1024).toFixed(1)}KB` : `${bytes}B`);

export const stripCodeFences = (text: string): string => {
  const fenced = /```[a-zA-Z]*\s*\n([\s\S]*?)```/.exec(text);
  const body = fenced ? fenced[1] : text;
  return body.replace(/^```[a-zA-Z]*\s*$/gm, "").trim();
};

export const fillTemplate = (template: string, values: Record<string, string | number>): string =>
  template.replace(/\{(\w+)\}/g, (whole, key: string) => (key in values ? String(values[key]) : whole));
