import signals from "../data/intentSignals.json";
import { InputError } from "../errors";
import { Intent, ProjectState } from "../types";
import { toPascalCase } from "../utils/text";

interface IntentVocabulary {
  featurePhrases: string[];
  componentNouns: string[];
  editVerbs: string[];
  editAttributes: string[];
  patchPhrases: string[];
  colorWords: string[];
  elementTags: Record<string, string>;
  componentKeywords: Record<string, string[]>;
}

const vocabulary: IntentVocabulary = signals;

const NON_NAME_WORDS = new Set([
  "the", "a", "an", "new", "this", "that", "each", "every", "whole", "entire", "main",
  "first", "last", "top", "bottom", "another", "same", "my", "our", "your", "its"
]);

const normalize = (instruction: string): string => ` ${instruction.toLowerCase().replace(/\s+/g, " ").trim()} `;

const wordsOf = (instruction: string): string[] => instruction.toLowerCase().match(/[a-z0-9]+/g) ?? [];

const withoutQuotes = (instruction: string): string => instruction.replace(/(["'`])[^"'`]*\1/g, " ");

const singular = (word: string): string => (word.length > 3 && word.endsWith("s") ? word.slice(0, -1) : word);

const requireInstruction = (instruction: string): string => {
  const trimmed = instruction.trim();
  if (!trimmed) {
    throw new InputError("Instruction must not be empty.");
  }
  return trimmed;
};

const componentNames = (state: ProjectState): string[] => state.components.map((component) => component.name);

// Phrases match from the start of a word: "rebuild a hero" is not "build a ".
const hasFeaturePhrase = (normalized: string): boolean =>
  vocabulary.featurePhrases.some((phrase) => normalized.includes(` ${phrase}`));

const COMPONENT_NAME = /^[A-Z][A-Za-z0-9]*$/;

export const isComponentName = (name: string): boolean => COMPONENT_NAME.test(name);

// A name that would not be a JSX identifier, such as "3d", becomes "Section3d".
export const toComponentName = (raw: string): string | undefined => {
  const name = toPascalCase(raw);
  if (!name) return undefined;
  return isComponentName(name) ? name : `Section${name}`;
};

// PascalCase identifiers with at least two humps, e.g. PricingTable; plain capitalised words are too common in prose.
const pascalIdentifiers = (instruction: string): string[] =>
  withoutQuotes(instruction)
    .split(/\s+/)
    .slice(1)
    .map((word) => word.replace(/[^A-Za-z0-9]/g, ""))
    .filter((word) => /^[A-Z][a-z0-9]+(?:[A-Z][a-z0-9]*)+$/.test(word));

const nounPattern = (): RegExp => new RegExp(`\\b([a-z][a-z0-9-]*)\\s+(?:${vocabulary.componentNouns.join("|")})s?\\b`, "g");

const namedSections = (instruction: string): string[] => {
  const names: string[] = [];
  const pattern = nounPattern();
  const lower = withoutQuotes(instruction).toLowerCase();
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(lower)) !== null) {
    const word = match[1];
    if (!NON_NAME_WORDS.has(word) && !vocabulary.componentNouns.includes(word)) {
      names.push(word);
    }
  }
  return names;
};

const keywordMatches = (word: string, existing: string[]): string[] => {
  const candidates = vocabulary.componentKeywords[word] ?? vocabulary.componentKeywords[singular(word)] ?? [];
  return candidates.filter((candidate) => existing.includes(candidate));
};

const isKnownComponentWord = (word: string, existing: string[]): boolean => {
  const lowered = existing.map((name) => name.toLowerCase());
  return lowered.includes(word.replace(/-/g, "")) || lowered.includes(singular(word)) || keywordMatches(word, existing).length > 0;
};

const referencesMissingComponent = (instruction: string, state: ProjectState): boolean => {
  const existing = componentNames(state);
  if (pascalIdentifiers(instruction).some((name) => !existing.includes(name))) {
    return true;
  }
  return namedSections(instruction).some((word) => !isKnownComponentWord(word, existing));
};

const hasPatchSignal = (normalized: string, words: string[]): boolean => {
  if (vocabulary.patchPhrases.some((phrase) => normalized.includes(` ${phrase}`))) {
    return true;
  }
  if (!words.some((word) => vocabulary.editVerbs.includes(word))) {
    return false;
  }
  return words.some(
    (word) =>
      vocabulary.editAttributes.includes(singular(word)) ||
      vocabulary.editAttributes.includes(word) ||
      vocabulary.colorWords.includes(word) ||
      /^\d/.test(word)
  );
};

export const findComponentMatches = (instruction: string, state: ProjectState): string[] => {
  const existing = componentNames(state);
  const words = wordsOf(instruction);
  const normalized = normalize(instruction);
  const matches: string[] = [];
  const add = (name: string): void => {
    if (!matches.includes(name)) matches.push(name);
  };

  for (const name of existing) {
    const spaced = name.replace(/([a-z0-9])([A-Z])/g, "$1 $2").toLowerCase();
    if (words.includes(name.toLowerCase()) || normalized.includes(` ${spaced} `)) {
      add(name);
    }
  }

  for (const word of words) {
    keywordMatches(word, existing).forEach(add);
  }

  for (const word of words) {
    const tag = vocabulary.elementTags[word];
    if (!tag) continue;
    state.components.filter((component) => component.content.includes(tag)).forEach((component) => add(component.name));
  }

  return matches;
};

export const classify = (instruction: string, state: ProjectState): Intent => {
  const text = requireInstruction(instruction);
  const normalized = normalize(text);

  if (hasFeaturePhrase(normalized) || referencesMissingComponent(text, state)) {
    return "feature";
  }

  if (hasPatchSignal(normalized, wordsOf(text)) && findComponentMatches(text, state).length > 0) {
    return "patch";
  }

  return "modify";
};

const uniqueName = (base: string, existing: string[]): string => {
  if (!existing.includes(base)) return base;
  let suffix = 2;
  while (existing.includes(`${base}${suffix}`)) suffix += 1;
  return `${base}${suffix}`;
};

const nameAfterFeaturePhrase = (instruction: string): string | undefined => {
  const normalized = normalize(withoutQuotes(instruction));
  for (const phrase of vocabulary.featurePhrases) {
    const index = normalized.indexOf(` ${phrase}`);
    if (index === -1) continue;
    const rest = wordsOf(normalized.slice(index + phrase.length + 1));
    const picked: string[] = [];
    for (const word of rest) {
      if (vocabulary.componentNouns.includes(word) || NON_NAME_WORDS.has(word) || ["to", "for", "with", "in", "on", "at", "below", "above", "after", "before", "that"].includes(word)) {
        break;
      }
      picked.push(word);
      if (picked.length === 2) break;
    }
    if (picked.length > 0) {
      return toComponentName(picked.join(" "));
    }
  }
  return undefined;
};

export const deriveFeatureName = (instruction: string, state: ProjectState): string => {
  const existing = componentNames(state);
  const explicit = pascalIdentifiers(instruction).find((name) => !existing.includes(name));
  if (explicit) return explicit;

  const section = namedSections(instruction).find((word) => !isKnownComponentWord(word, existing));
  const base = (section ? toComponentName(section) : undefined) ?? nameAfterFeaturePhrase(instruction) ?? "NewSection";
  return uniqueName(base, existing);
};

export const resolveTargets = (instruction: string, state: ProjectState, intent: Intent, hint?: string): string[] => {
  const text = requireInstruction(instruction);
  const existing = componentNames(state);
  const cleanedHint = hint ? toComponentName(hint) ?? "" : "";

  if (intent === "feature") {
    if (cleanedHint && !existing.includes(cleanedHint)) {
      return [cleanedHint];
    }
    return [deriveFeatureName(text, state)];
  }

  if (cleanedHint && existing.includes(cleanedHint)) {
    return [cleanedHint];
  }

  const matches = findComponentMatches(text, state);
  if (matches.length > 0) {
    return intent === "patch" ? [matches[0]] : matches;
  }

  return existing.length > 0 ? [existing[0]] : [];
};

// Keeps what a model picked only when it fits the intent: existing components for patch and modify, one unused name for feature.
export const acceptChosenTargets = (chosen: string[], state: ProjectState, intent: Intent): string[] => {
  const existing = componentNames(state);
  const valid = [...new Set(chosen.map((name) => name.trim()).filter(isComponentName))];
  if (intent === "feature") {
    const fresh = valid.find((name) => !existing.includes(name));
    return fresh ? [fresh] : [];
  }
  const known = valid.filter((name) => existing.includes(name));
  return intent === "patch" ? known.slice(0, 1) : known;
};
