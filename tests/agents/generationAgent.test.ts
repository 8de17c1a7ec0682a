import { describe, expect, it, vi } from "vitest";
import { GenerationAgent, extractComponentCode, summarizeCodebase } from "../../src/agents/generationAgent";
import { MalformedOutputError, RunCancelledError } from "../../src/errors";
import { CompletionRequest } from "../../src/llm/openaiClient";
import { GeneratedFile } from "../../src/types";
import { HERO, todoSpec } from "../helpers/pipelineHarness";

const componentReply = (request: CompletionRequest): string => {
  const name = /function (\w+)\(\)/.exec(request.user)?.[1] ?? "Navbar";
  return `Here it is:\n\`\`\`jsx\nimport { motion } from 'framer-motion'\nexport default function ${name}() {\n  return <div />\n}\n\`\`\``;
};

describe("extractComponentCode", () => {
  it("drops fences and preamble", () => {
    expect(extractComponentCode("Sure!\nimport React from 'react'\nexport default function A() {}")).toBe(
      "import React from 'react'\nexport default function A() {}"
    );
  });

  it("returns nothing without a default export", () => {
    expect(extractComponentCode("function A() {}")).toBe("");
  });
});

describe("summarizeCodebase", () => {
  it("puts the app shell first and leaves out files outside src", () => {
    const summary = summarizeCodebase({
      "package.json": "{}",
      "src/components/Hero.jsx": "hero",
      "src/App.jsx": "app"
    });

    expect(summary).toBe("── src/App.jsx ──\napp\n\n── src/components/Hero.jsx ──\nhero");
  });
});

describe("GenerationAgent", () => {
  it("streams the scaffold and then one file per planned component", async () => {
    const llm = { complete: vi.fn(async (request: CompletionRequest) => componentReply(request)) };
    const files: GeneratedFile[] = [];

    for await (const file of new GenerationAgent(llm).generate(todoSpec(), "build-model")) {
      files.push(file);
    }

    expect(files.slice(8).map((file) => file.path)).toEqual([
      "src/components/Navbar.jsx",
      "src/components/Header.jsx",
      "src/components/Hero.jsx"
    ]);
    expect(files[9].content).toBe(
      "import { motion } from 'framer-motion'\nexport default function Header() {\n  return <div />\n}\n"
    );
    expect(llm.complete).toHaveBeenCalledTimes(3);
    expect(llm.complete.mock.calls[0][0]).toMatchObject({ model: "build-model", temperature: 0.15, maxTokens: 4096 });
  });

  it("sends the current code for a patch", async () => {
    const llm = { complete: vi.fn(async (request: CompletionRequest) => componentReply(request)) };

    const code = await new GenerationAgent(llm).rewrite(
      { component: "Hero", instruction: "make the title bigger", intent: "patch", currentContent: HERO, projectContext: "ctx" },
      "build-model"
    );

    const request = llm.complete.mock.calls[0][0];
    expect(request.temperature).toBe(0.05);
    expect(request.streamAs).toBe("src/components/Hero.jsx");
    expect(request.user).toContain("Make this SMALL change to the 'Hero' React component.");
    expect(request.user).toContain(HERO);
    expect(code).toContain("export default function Hero()");
  });

  it("asks for a new component for a feature", async () => {
    const llm = { complete: vi.fn(async (request: CompletionRequest) => componentReply(request)) };

    await new GenerationAgent(llm).rewrite(
      { component: "Pricing", instruction: "add a pricing section", intent: "feature", projectContext: "ctx" },
      "build-model"
    );

    expect(llm.complete.mock.calls[0][0].user).toContain("Create a NEW React component called 'Pricing'.");
  });

  it("includes targeted hints when repairing", async () => {
    const llm = { complete: vi.fn(async (request: CompletionRequest) => componentReply(request)) };

    await new GenerationAgent(llm).repair(
      "src/components/Hero.jsx",
      { currentContent: HERO, errors: [{ message: "ReferenceError: FiStar is not defined" }], projectContext: "ctx" },
      "build-model"
    );

    const { user } = llm.complete.mock.calls[0][0];
    expect(user).toContain("Fix the broken React component src/components/Hero.jsx.");
    expect(user).toContain("- 'FiStar' is not defined. Define it inside export default function Hero() or import it.");
  });

  it("rejects output without a component", async () => {
    const llm = { complete: vi.fn(async () => "I am not sure what you mean.") };

    await expect(
      new GenerationAgent(llm).rewrite(
        { component: "Hero", instruction: "rework it", intent: "modify", currentContent: HERO, projectContext: "" },
        "m"
      )
    ).rejects.toBeInstanceOf(MalformedOutputError);
  });

  it("reports cancellation when the model call is aborted", async () => {
    const controller = new AbortController();
    const llm = {
      complete: vi.fn(async () => {
        controller.abort();
        throw new Error("Request was aborted.");
      })
    };

    await expect(
      new GenerationAgent(llm).repair(
        "src/components/Hero.jsx",
        { currentContent: HERO, errors: [], projectContext: "" },
        "m",
        { signal: controller.signal }
      )
    ).rejects.toBeInstanceOf(RunCancelledError);
  });

  it("asks the model which components an instruction should touch", async () => {
    const llm = { complete: vi.fn(async (_request: CompletionRequest) => 'Sure:\n```json\n{"targets":["Hero"]}\n```') };

    const targets = await new GenerationAgent(llm).chooseTargets(
      { instruction: "make it feel more playful", intent: "modify", components: ["Header", "Hero"], projectContext: "ctx" },
      "build-model"
    );

    expect(targets).toEqual(["Hero"]);
    const request = llm.complete.mock.calls[0][0];
    expect(request).toMatchObject({ model: "build-model", json: true, temperature: 0, maxTokens: 150 });
    expect(request.streamAs).toBeUndefined();
    expect(request.user).toContain("Existing components: Header, Hero");
    expect(request.user).toContain("User request: make it feel more playful");
  });

  it("rejects a target answer without a component list", async () => {
    const llm = { complete: vi.fn(async () => '{"component":"Hero"}') };

    await expect(
      new GenerationAgent(llm).chooseTargets(
        { instruction: "tidy up", intent: "modify", components: ["Hero"], projectContext: "" },
        "m"
      )
    ).rejects.toThrow("Target selection returned no component list (targets: Required).");
  });
});
