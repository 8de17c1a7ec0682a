import OpenAI from "openai";
import { config } from "../config";
import { CollaboratorContext, StreamChunk } from "../types";

export interface CompletionRequest {
  model: string;
  system: string;
  user: string;
  json?: boolean;
  temperature?: number;
  maxTokens?: number;
  // Project file the output becomes; when set and the caller listens, tokens are streamed.
  streamAs?: string;
}

export interface LlmLike {
  complete(request: CompletionRequest, ctx?: CollaboratorContext): Promise<string>;
}

export interface OpenAiClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export class OpenAiClient implements LlmLike {
  private readonly client: OpenAI;
  private readonly validated = new Map<string, Promise<void>>();

  constructor(
    private readonly options: OpenAiClientOptions = {
      apiKey: config.openaiApiKey,
      baseUrl: config.openaiBaseUrl,
      timeoutMs: config.llmTimeoutMs
    }
  ) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 1
    });
  }

  private static isModelUnknownError(error: unknown): boolean {
    const message = error instanceof Error ? error.message : String(error);
    return /unknown model|invalid model|model .* does not exist|no such model|unsupported model|model .* not found/i.test(message);
  }

  private static isModelsListUnsupportedError(error: unknown): boolean {
    if (typeof error === "object" && error !== null && "status" in error) {
      const { status } = error;
      if (status === 404 || status === 405 || status === 501) {
        return true;
      }
    }

    const message = error instanceof Error ? error.message : String(error);
    return /models?.*(not found|unsupported)|unsupported.*models?/i.test(message);
  }

  private toUnknownModelError(model: string, error: unknown): Error {
    const originalMessage = error instanceof Error ? error.message : String(error);
    return new Error(
      [
        `Model "${model}" is not available on ${this.options.baseUrl}.`,
        "Pull it on the provider or pick another model id.",
        `Original error: ${originalMessage}`
      ].join(" ")
    );
  }

  private async validateWithModelsList(model: string): Promise<void> {
    const response = await this.client.models.list();
    const modelIds = (response.data ?? [])
      .map((item) => (typeof item.id === "string" ? item.id.trim() : ""))
      .filter(Boolean);

    if (modelIds.length === 0 || modelIds.includes(model)) {
      return;
    }

    const sample = modelIds.slice(0, 8).join(", ");
    const hint = sample ? ` Available models (sample): ${sample}` : "";
    throw new Error(`Model "${model}" is not in the provider model list.${hint}`);
  }

  private async runModelValidation(model: string): Promise<void> {
    try {
      await this.validateWithModelsList(model);
    } catch (error: unknown) {
      if (OpenAiClient.isModelUnknownError(error)) {
        throw this.toUnknownModelError(model, error);
      }
      if (!OpenAiClient.isModelsListUnsupportedError(error)) {
        throw error;
      }
    }
  }

  async assertModelAvailable(model: string): Promise<void> {
    let pending = this.validated.get(model);
    if (!pending) {
      pending = this.runModelValidation(model);
      this.validated.set(model, pending);
      // A failed check is retried on the next call instead of being cached.
      pending.catch(() => this.validated.delete(model));
    }
    return pending;
  }

  async complete(request: CompletionRequest, ctx: CollaboratorContext = {}): Promise<string> {
    await this.assertModelAvailable(request.model);

    const body = {
      model: request.model,
      messages: [
        { role: "system" as const, content: request.system },
        { role: "user" as const, content: request.user }
      ],
      temperature: request.temperature ?? 0.15,
      ...(request.maxTokens ? { max_tokens: request.maxTokens } : {}),
      ...(request.json ? { response_format: { type: "json_object" as const } } : {})
    };

    if (request.streamAs && ctx.onStream) {
      return this.stream(body, request.streamAs, ctx.onStream, ctx);
    }

    const response = await this.client.chat.completions.create(body, { signal: ctx.signal });
    if (response.usage) {
      this.reportUsage(response.usage, ctx);
    }
    return response.choices[0]?.message?.content?.trim() ?? "";
  }

  private async stream(
    body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
    file: string,
    onStream: (chunk: StreamChunk) => void,
    ctx: CollaboratorContext
  ): Promise<string> {
    const chunks = await this.client.chat.completions.create(
      { ...body, stream: true, stream_options: { include_usage: true } },
      { signal: ctx.signal }
    );

    let content = "";
    onStream({ phase: "start", file });
    for await (const chunk of chunks) {
      const text = chunk.choices[0]?.delta?.content ?? "";
      if (text) {
        content += text;
        onStream({ phase: "delta", file, text });
      }
      if (chunk.usage) {
        this.reportUsage(chunk.usage, ctx);
      }
    }
    onStream({ phase: "end", file });
    return content.trim();
  }

  private reportUsage(usage: OpenAI.CompletionUsage, ctx: CollaboratorContext): void {
    ctx.onUsage?.({ promptTokens: usage.prompt_tokens, completionTokens: usage.completion_tokens });
  }
}
