import type { ChatCompletionMessage } from "../llm/llm.client";
import type { GenerationRequest } from "./request";
import { describeLengthRule, type PlatformProfile } from "./platform.profiles";

export function buildPlatformPrompt(profile: PlatformProfile, request: GenerationRequest): string {
  const lengthNote = profile.length.kind === "characters"
    ? ` - UNDER ${profile.length.max} characters`
    : "";

  return [
    `Generate ${request.count} unique ${profile.platformName} posts based on the following:`,
    "",
    "CONTEXT:",
    request.context,
    "",
    "EXAMPLE POSTS (for style reference):",
    request.examples,
    "",
    "REQUIREMENTS:",
    `- Create ${request.count} distinct, unique ${profile.platformName} posts`,
    `- ${describeLengthRule(profile.length)}`,
    ...profile.styleNotes.map((note) => `- ${note}`),
    "- Number each post clearly (Post 1, Post 2, etc.)",
    `- Include ${profile.hashtags.min}-${profile.hashtags.max} relevant hashtags for each post`,
    "",
    "Format each post clearly with:",
    "---",
    "Post [Number]",
    `[Post content here${lengthNote}]`,
    "---",
  ].join("\n");
}

export function buildPlatformMessages(
  profile: PlatformProfile,
  request: GenerationRequest,
): ChatCompletionMessage[] {
  return [
    {
      role: "system",
      content: profile.systemPrompt,
    },
    {
      role: "user",
      content: buildPlatformPrompt(profile, request),
    },
  ];
}
