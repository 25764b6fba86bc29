import {
  hasSelectors,
  normalizeSelectors,
  type ExampleFetcher,
  type ExampleSelectors,
} from "../scraping/example.fetcher";
import type { PlatformKey } from "../generation/platform.profiles";
import { errorMessage } from "./errors";

interface ExamplesLogger {
  info(payload: Record<string, unknown>, message: string): void;
  warn(payload: Record<string, unknown>, message: string): void;
}

export const FALLBACK_EXAMPLES: Record<PlatformKey, string> = {
  linkedin: [
    "LinkedIn Example:",
    "\"Customer expectations have never been higher.",
    "In 2024, 73% of customers expect immediate responses.",
    "This is where AI-powered automation becomes essential.",
    "#CustomerService #AI\"",
  ].join("\n"),
  x: [
    "X Example:",
    "\"AI won't replace customer service agents.",
    "But agents using AI will replace those who don't.",
    "#CX #AI\"",
  ].join("\n"),
};

export const EXAMPLES_SEPARATOR = "\n\n---\n\n";

export type ExampleSource = "scraped" | "fallback";

export interface ResolvedExamples {
  text: string;
  source: ExampleSource;
}

/**
 * Scraped examples when selectors are given and scraping succeeds, the
 * platform's fallback example otherwise. Generation and validation failures
 * stay fatal; only example scraping degrades.
 */
export async function resolveExamples(
  fetcher: ExampleFetcher,
  selectors: ExampleSelectors,
  logger?: ExamplesLogger,
): Promise<ResolvedExamples> {
  const platform = fetcher.profile.key;
  if (!hasSelectors(normalizeSelectors(selectors, fetcher.profile.accepts))) {
    logger?.info({ platform }, "no example sources given, using fallback examples");
    return { text: FALLBACK_EXAMPLES[platform], source: "fallback" };
  }

  try {
    return { text: await fetcher.fetch(selectors), source: "scraped" };
  } catch (error) {
    logger?.warn({ platform, error: errorMessage(error) }, "example scraping failed, using fallback examples");
    return { text: FALLBACK_EXAMPLES[platform], source: "fallback" };
  }
}

export function combineExamples(linkedin: string, x: string): string {
  return `${linkedin}${EXAMPLES_SEPARATOR}${x}`;
}
