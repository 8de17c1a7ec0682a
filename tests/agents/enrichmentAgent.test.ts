import { describe, expect, it, vi } from "vitest";
import { EnrichmentAgent, detectSiteType } from "../../src/agents/enrichmentAgent";
import { CollaboratorError, InputError, MalformedOutputError } from "../../src/errors";
import { CompletionRequest, LlmLike } from "../../src/llm/openaiClient";

const llmReplying = (...replies: string[]) => {
  let call = 0;
  return {
    complete: vi.fn(async (_request: CompletionRequest) => replies[Math.min(call++, replies.length - 1)])
  };
};

describe("detectSiteType", () => {
  it("matches keywords in catalogue order", () => {
    expect(detectSiteType("a todo app with due dates")).toBe("app");
    expect(detectSiteType("a bakery shop")).toBe("ecommerce");
    expect(detectSiteType("something else entirely")).toBe("general");
  });
});

describe("EnrichmentAgent", () => {
  it("turns model output into a specification", async () => {
    const llm = llmReplying(
      '```json\n{"project_name":"Task Pilot","site_type":"app","title":"Task Pilot","key_features":["due dates"]}\n```'
    );

    const spec = await new EnrichmentAgent(llm).enrich("a todo app with due dates", "enrich-model");

    expect(spec).toEqual({
      projectName: "task-pilot",
      siteType: "app",
      strategy: "react-app",
      title: "Task Pilot",
      tagline: "Welcome to Task Pilot",
      description: "a todo app with due dates",
      features: ["due dates"],
      sections: ["App"],
      colorScheme: "dark with indigo and cyan accents",
      style: "modern"
    });
    expect(llm.complete).toHaveBeenCalledWith(
      expect.objectContaining({ model: "enrich-model", json: true, user: "Idea: a todo app with due dates\n\nJSON only:" }),
      {}
    );
  });

  it("falls back to the detected site type when the model invents one", async () => {
    const llm = llmReplying('{"site_type":"spaceship","title":"Crumbs"}');

    const spec = await new EnrichmentAgent(llm).enrich("a bakery shop", "m");

    expect(spec.siteType).toBe("ecommerce");
    expect(spec.strategy).toBe("react-sections");
    expect(spec.sections).toEqual(["Hero", "FeaturedProducts", "Categories", "Testimonials", "Newsletter"]);
  });

  it("asks once more after unusable output", async () => {
    const llm = llmReplying("I cannot do that", '{"title":"Todo"}');

    const spec = await new EnrichmentAgent(llm).enrich("a todo app", "m");

    expect(spec.title).toBe("Todo");
    expect(llm.complete).toHaveBeenCalledTimes(2);
  });

  it("gives up with the raw output after two unusable replies", async () => {
    const llm = llmReplying('{"tagline":"no title"}');

    const failure = await new EnrichmentAgent(llm).enrich("a todo app", "m").catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(MalformedOutputError);
    expect(failure).toMatchObject({ reason: "enrichment_failed", rawOutput: '{"tagline":"no title"}' });
    expect(llm.complete).toHaveBeenCalledTimes(2);
  });

  it("wraps transport failures", async () => {
    const llm: LlmLike = { complete: vi.fn(async () => Promise.reject(new Error("connect ECONNREFUSED"))) };

    await expect(new EnrichmentAgent(llm).enrich("a todo app", "m")).rejects.toThrow(
      new CollaboratorError("Enrichment call failed: connect ECONNREFUSED", "enrichment_failed")
    );
  });

  it("rejects an empty idea without calling the model", async () => {
    const llm = llmReplying("{}");

    await expect(new EnrichmentAgent(llm).enrich("  ", "m")).rejects.toBeInstanceOf(InputError);
    expect(llm.complete).not.toHaveBeenCalled();
  });
});
