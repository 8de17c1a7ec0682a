import { z } from "zod";
import { config } from "../config";
import catalog from "../data/siteCatalog.json";
import { CollaboratorError, InputError, MalformedOutputError, RunCancelledError, errorMessage } from "../errors";
import { CompletionRequest, LlmLike } from "../llm/openaiClient";
import { CollaboratorContext, ProjectSpecification } from "../types";
import { withTimeout } from "../utils/async";
import { parseJsonObject } from "../utils/json";
import { projectSlugFromIdea, slugify } from "../utils/text";

const siteTypes: Record<string, string[]> = catalog.siteTypes;
const sectionMap: Record<string, string[]> = catalog.sections;
const singleComponentTypes: string[] = catalog.singleComponentTypes;

const enrichmentSchema = z.object({
  project_name: z.string().optional(),
  site_type: z.string().optional(),
  title: z.string().min(1),
  tagline: z.string().optional(),
  description: z.string().optional(),
  color_scheme: z.string().optional(),
  style: z.string().optional(),
  brand_name: z.string().optional(),
  key_features: z.array(z.string()).optional()
});

type EnrichmentOutput = z.infer<typeof enrichmentSchema>;

const SYSTEM_PROMPT = [
  "You are a JSON API. Output ONLY a raw JSON object. No markdown, no explanation.",
  "Given a website or app idea, classify it and return exactly:",
  `{"project_name":"kebab-case","site_type":"${Object.keys(sectionMap).join("|")}",`,
  '"title":"Title","tagline":"Catchphrase","description":"2-3 sentences",',
  '"color_scheme":"describe colors and theme","style":"modern|minimal|bold|playful|retro|corporate|luxury",',
  '"brand_name":"Brand or App Name","key_features":["feature1","feature2","feature3"]}',
  "site_type MUST be one of the listed values."
].join("\n");

export const detectSiteType = (idea: string): string => {
  const lower = idea.toLowerCase();
  for (const [siteType, keywords] of Object.entries(siteTypes)) {
    if (keywords.some((keyword) => lower.includes(keyword))) {
      return siteType;
    }
  }
  return "general";
};

export const buildSpecification = (idea: string, detectedType: string, output: EnrichmentOutput): ProjectSpecification => {
  const llmType = output.site_type?.trim().toLowerCase() ?? "";
  const siteType = llmType in sectionMap ? llmType : detectedType in sectionMap ? detectedType : "general";
  const brand = output.brand_name?.trim() || output.title.trim();

  return {
    projectName: slugify(output.project_name ?? brand) || projectSlugFromIdea(idea),
    siteType,
    strategy: singleComponentTypes.includes(siteType) ? "react-app" : "react-sections",
    title: output.title.trim(),
    tagline: output.tagline?.trim() || `Welcome to ${brand}`,
    description: output.description?.trim() || idea.slice(0, 300),
    features: output.key_features ?? [],
    sections: [...sectionMap[siteType]],
    colorScheme: output.color_scheme?.trim() || "dark with indigo and cyan accents",
    style: output.style?.trim() || "modern"
  };
};

export class EnrichmentAgent {
  constructor(
    private readonly llm: LlmLike,
    private readonly timeoutMs = config.llmTimeoutMs
  ) {}

  async enrich(idea: string, modelId: string, ctx: CollaboratorContext = {}): Promise<ProjectSpecification> {
    const trimmed = idea.trim();
    if (!trimmed) {
      throw new InputError("Idea must not be empty.");
    }

    const detectedType = detectSiteType(trimmed);
    const request: CompletionRequest = {
      model: modelId,
      system: SYSTEM_PROMPT,
      user: `Idea: ${trimmed}\n\nJSON only:`,
      json: true,
      temperature: 0.1,
      maxTokens: 600
    };

    let lastRaw = "";
    let lastProblem = "";
    for (let attempt = 1; attempt <= 2; attempt += 1) {
      try {
        lastRaw = await withTimeout(this.llm.complete(request, ctx), this.timeoutMs, "enrichment llm call");
      } catch (error: unknown) {
        if (ctx.signal?.aborted) throw new RunCancelledError();
        throw new CollaboratorError(`Enrichment call failed: ${errorMessage(error)}`, "enrichment_failed", { cause: error });
      }

      const parsed = parseJsonObject(lastRaw, enrichmentSchema);
      if (parsed.ok) {
        return buildSpecification(trimmed, detectedType, parsed.value);
      }
      lastProblem = parsed.problem;
    }

    throw new MalformedOutputError("enrichment", `Enrichment output was not a usable specification (${lastProblem}).`, lastRaw);
  }
}
