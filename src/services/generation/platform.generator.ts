import type { LlmClient } from "../llm/llm.client";
import { buildPlatformMessages } from "./platform.prompt";
import type { PlatformProfile } from "./platform.profiles";
import type { GenerationRequest, GenerationResult } from "./request";

export interface ContentGenerator {
  readonly producerName: string;
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export interface PlatformContentGeneratorOptions {
  profile: PlatformProfile;
  llmClient: LlmClient;
  model: string;
  maxTokens: number;
}

/**
 * Writes posts for one platform. Both platforms share this class and differ
 * only in the profile they are given.
 */
export class PlatformContentGenerator implements ContentGenerator {
  constructor(private readonly options: PlatformContentGeneratorOptions) {}

  get producerName(): string {
    return this.options.profile.producerName;
  }

  get platformName(): string {
    return this.options.profile.platformName;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const { profile, llmClient, model, maxTokens } = this.options;
    const completion = await llmClient.completeChat({
      model,
      messages: buildPlatformMessages(profile, request),
      maxTokens,
    });

    return Object.freeze({
      platformName: profile.platformName,
      count: request.count,
      body: completion.content,
      producerName: profile.producerName,
    });
  }
}
