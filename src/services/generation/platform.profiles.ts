export type PlatformKey = "linkedin" | "x";

export type LengthRule =
  | { kind: "words"; min: number; max: number }
  | { kind: "characters"; max: number };

export interface PlatformProfile {
  key: PlatformKey;
  platformName: string;
  producerName: string;
  systemPrompt: string;
  length: LengthRule;
  hashtags: { min: number; max: number };
  styleNotes: string[];
}

const LINKEDIN_SYSTEM_PROMPT = [
  "You are a LinkedIn content writer who crafts professional, engaging posts.",
  "Posts run 150-300 words, use line breaks for readability and end with a question or call to action.",
  "Keep a professional yet conversational tone and use 3-5 relevant hashtags.",
  "Align with the provided context and the style of the example posts.",
  "Every post must be unique and focused on value that invites discussion.",
  "Open with a hook, use storytelling where it fits and include actionable insights.",
].join("\n");

const X_SYSTEM_PROMPT = [
  "You are an X (Twitter) content writer who crafts concise, punchy posts.",
  "Every post stays under 280 characters including spaces and hashtags.",
  "Be direct, lead with the main point, use active voice and 1-3 relevant hashtags.",
  "Align with the provided context and the style of the example posts.",
  "Every post must be unique, quotable and easy to share.",
  "Use emojis sparingly and only when they fit the brand voice.",
].join("\n");

export const LINKEDIN_PROFILE: PlatformProfile = {
  key: "linkedin",
  platformName: "LinkedIn",
  producerName: "LinkedIn Content Creator",
  systemPrompt: LINKEDIN_SYSTEM_PROMPT,
  length: { kind: "words", min: 150, max: 300 },
  hashtags: { min: 3, max: 5 },
  styleNotes: [
    "Follow the style and tone of the example posts",
    "Incorporate insights from the context",
    "Each post should be self-contained and valuable",
  ],
};

export const X_PROFILE: PlatformProfile = {
  key: "x",
  platformName: "X (Twitter)",
  producerName: "X Content Creator",
  systemPrompt: X_SYSTEM_PROMPT,
  length: { kind: "characters", max: 280 },
  hashtags: { min: 1, max: 3 },
  styleNotes: [
    "Follow the style and tone of the example posts",
    "Incorporate insights from the context",
    "Each post should be impactful and shareable",
  ],
};

export function describeLengthRule(rule: LengthRule): string {
  if (rule.kind === "words") {
    return `Each post should be between ${rule.min}-${rule.max} words`;
  }

  return `Each post MUST be under ${rule.max} characters (including hashtags)`;
}
