import { generateText } from "ai";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { credentialState, getConfig, LLM_KEY_PLACEHOLDER } from "../../config";
import { ConfigurationError, RemoteCallError } from "../workflow/errors";

export interface ChatCompletionMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatCompletionMessage[];
  maxTokens: number;
}

export interface ChatCompletionResult {
  content: string;
  model: string;
  usageTokens: number;
}

export interface LlmClient {
  completeChat(request: ChatCompletionRequest): Promise<ChatCompletionResult>;
}

export function normalizeProviderError(error: unknown): string {
  if (error instanceof Error && error.message.trim()) {
    return error.message;
  }

  if (error && typeof error === "object" && "cause" in error) {
    const { cause } = error;
    if (cause instanceof Error && cause.message.trim()) {
      return cause.message;
    }
  }

  return "LLM request failed";
}

export interface OpenAiCompatibleClientOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Text generation against any OpenAI-compatible chat endpoint.
 */
export class OpenAiCompatibleClient implements LlmClient {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly provider: ReturnType<typeof createOpenAICompatible>;

  constructor(options: OpenAiCompatibleClientOptions = {}) {
    const config = getConfig();
    this.apiKey = options.apiKey ?? config.llmApiKey;
    this.timeoutMs = options.timeoutMs ?? config.remoteTimeoutMs;
    this.provider = createOpenAICompatible({
      name: "llm",
      apiKey: this.apiKey,
      baseURL: options.baseUrl ?? config.llmBaseUrl,
      fetch: options.fetchImpl,
    });
  }

  async completeChat(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
    if (credentialState(this.apiKey, LLM_KEY_PLACEHOLDER) !== "configured") {
      throw new ConfigurationError("LLM_API_KEY is required for content generation");
    }

    let content: string;
    let model: string;
    let usageTokens: number;
    try {
      const result = await generateText({
        model: this.provider(request.model),
        messages: request.messages,
        maxOutputTokens: request.maxTokens,
        abortSignal: AbortSignal.timeout(this.timeoutMs),
      });

      content = result.text.trim();
      model = result.response.modelId ?? request.model;
      usageTokens = (
        result.usage.totalTokens
        ?? ((result.usage.inputTokens ?? 0) + (result.usage.outputTokens ?? 0))
      ) || Math.max(1, Math.ceil(content.length / 4));
    } catch (error) {
      throw new RemoteCallError("llm", normalizeProviderError(error));
    }

    if (!content) {
      throw new RemoteCallError("llm", "LLM returned an empty response");
    }

    return { content, model, usageTokens };
  }
}
