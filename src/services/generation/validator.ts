import type { ChatCompletionMessage, LlmClient } from "../llm/llm.client";
import type { GenerationRequest, GenerationResult } from "./request";

const VALIDATOR_SYSTEM_PROMPT = [
  "You are the content coordinator reviewing thought leadership posts written for several social platforms.",
  "Check relevance to the provided context and consistency with the tone of the example posts.",
  "Check that length and formatting suit each platform and that no two posts duplicate each other.",
  "Judge professional quality and engagement potential, then present your findings clearly.",
].join("\n");

export interface ValidationInput {
  request: GenerationRequest;
  linkedin: GenerationResult;
  x: GenerationResult;
}

export function buildValidationPrompt(input: ValidationInput): string {
  return [
    "Review the following generated posts and validate them based on these criteria:",
    "",
    "Original Context:",
    input.request.context,
    "",
    "Example Posts:",
    input.request.examples,
    "",
    "LinkedIn Posts Generated:",
    input.linkedin.body,
    "",
    "X Posts Generated:",
    input.x.body,
    "",
    "Validation Criteria:",
    "1. Do all posts align with the provided context?",
    "2. Do posts match the style and tone of example posts?",
    "3. Are there any duplicate or very similar posts?",
    "4. Are LinkedIn posts appropriate length (150-300 words)?",
    "5. Are X posts under 280 characters?",
    "6. Is the content valuable and engaging?",
    "7. Are posts unique and varied?",
    "",
    "Provide a brief validation summary and confirm if the posts meet quality standards.",
    "If any posts need improvement, specify which ones and why.",
  ].join("\n");
}

export function buildValidationMessages(input: ValidationInput): ChatCompletionMessage[] {
  return [
    { role: "system", content: VALIDATOR_SYSTEM_PROMPT },
    { role: "user", content: buildValidationPrompt(input) },
  ];
}

export interface PostReviewer {
  review(input: ValidationInput): Promise<string>;
}

export class PostValidator implements PostReviewer {
  constructor(
    private readonly llmClient: LlmClient,
    private readonly model: string,
    private readonly maxTokens: number,
  ) {}

  async review(input: ValidationInput): Promise<string> {
    const completion = await this.llmClient.completeChat({
      model: this.model,
      messages: buildValidationMessages(input),
      maxTokens: this.maxTokens,
    });

    return completion.content;
  }
}
