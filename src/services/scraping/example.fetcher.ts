import type { PlatformKey } from "../generation/platform.profiles";
import { InputError } from "../workflow/errors";
import type { ScrapingClient } from "./apify.client";

export type SelectorKind = "urls" | "searchTerms" | "handles";

/**
 * Where to look for example posts. A request may combine kinds, but at least
 * one list accepted by the target source must be non-empty.
 */
export type ExampleSelectors =
  | { urls: string[]; searchTerms?: string[]; handles?: string[] }
  | { urls?: string[]; searchTerms: string[]; handles?: string[] }
  | { urls?: string[]; searchTerms?: string[]; handles: string[] };

export type NormalizedSelectors = Record<SelectorKind, string[]>;

export interface ScrapedExample {
  text: string;
  author: string;
}

export interface ExampleSourceLimits {
  linkedinLimitPerSource: number;
  xMaxItems: number;
}

export interface ExampleSourceProfile {
  key: PlatformKey;
  label: string;
  actorId: string;
  accepts: readonly SelectorKind[];
  minLength: number;
  maxLength?: number;
  skipRetweets: boolean;
  authorPrefix: string;
  buildInput(selectors: NormalizedSelectors, limits: ExampleSourceLimits): Record<string, unknown>;
  readRecord(record: Record<string, unknown>): ScrapedExample;
}

export const NO_EXAMPLES_PLACEHOLDER = "No valid examples found from scraped content.";
export const UNKNOWN_AUTHOR = "Unknown Author";

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function firstString(...values: unknown[]): string {
  for (const value of values) {
    if (typeof value === "string" && value.trim()) {
      return value;
    }
  }

  return "";
}

export const LINKEDIN_SOURCE: ExampleSourceProfile = {
  key: "linkedin",
  label: "LinkedIn",
  actorId: "supreme_coder/linkedin-post",
  accepts: ["urls"],
  minLength: 20,
  skipRetweets: false,
  authorPrefix: "",
  buildInput(selectors, limits) {
    return {
      urls: selectors.urls,
      limitPerSource: limits.linkedinLimitPerSource,
    };
  },
  readRecord(record) {
    const rawAuthor = record.author;
    const author = isRecord(rawAuthor) ? firstString(rawAuthor.name) : "";
    return {
      text: firstString(record.text),
      author: author || UNKNOWN_AUTHOR,
    };
  },
};

export const X_SOURCE: ExampleSourceProfile = {
  key: "x",
  label: "X",
  actorId: "apidojo/tweet-scraper",
  accepts: ["urls", "searchTerms", "handles"],
  minLength: 10,
  maxLength: 400,
  skipRetweets: true,
  authorPrefix: "@",
  buildInput(selectors, limits) {
    return {
      maxItems: limits.xMaxItems,
      sort: "Latest",
      tweetLanguage: "en",
      ...(selectors.urls.length > 0 ? { startUrls: selectors.urls } : {}),
      ...(selectors.searchTerms.length > 0 ? { searchTerms: selectors.searchTerms } : {}),
      ...(selectors.handles.length > 0 ? { twitterHandles: selectors.handles } : {}),
    };
  },
  readRecord(record) {
    const rawAuthor = record.author;
    const author = isRecord(rawAuthor)
      ? firstString(rawAuthor.userName, rawAuthor.name)
      : firstString(rawAuthor);
    return {
      text: firstString(record.text, record.full_text),
      author: author || UNKNOWN_AUTHOR,
    };
  },
};

function cleanList(values: readonly string[] | undefined): string[] {
  return (values ?? []).map((value) => value.trim()).filter((value) => value.length > 0);
}

export function normalizeSelectors(
  selectors: Partial<Record<SelectorKind, readonly string[]>>,
  accepts: readonly SelectorKind[],
): NormalizedSelectors {
  const normalized: NormalizedSelectors = { urls: [], searchTerms: [], handles: [] };
  for (const kind of accepts) {
    normalized[kind] = cleanList(selectors[kind]);
  }

  return normalized;
}

export function hasSelectors(selectors: NormalizedSelectors): boolean {
  return selectors.urls.length + selectors.searchTerms.length + selectors.handles.length > 0;
}

export function formatExamples(
  profile: ExampleSourceProfile,
  records: readonly unknown[],
): string {
  const examples: string[] = [];

  records.forEach((raw, index) => {
    if (!isRecord(raw)) {
      return;
    }

    const { text, author } = profile.readRecord(raw);
    const trimmed = text.trim();
    if (trimmed.length < profile.minLength) {
      return;
    }

    if (profile.skipRetweets && trimmed.startsWith("RT @")) {
      return;
    }

    if (profile.maxLength !== undefined && trimmed.length > profile.maxLength) {
      return;
    }

    examples.push(
      `${profile.label} Example ${index + 1}:\n"${trimmed}"\n(Author: ${profile.authorPrefix}${author})\n`,
    );
  });

  if (examples.length === 0) {
    return NO_EXAMPLES_PLACEHOLDER;
  }

  return examples.join("\n---\n\n");
}

interface FetcherLogger {
  info(payload: Record<string, unknown>, message: string): void;
}

export interface ExampleFetcherOptions {
  profile: ExampleSourceProfile;
  client: ScrapingClient;
  limits: ExampleSourceLimits;
  logger?: FetcherLogger;
}

/**
 * Pulls recent posts for one platform and shapes them into style examples.
 */
export class ExampleFetcher {
  constructor(private readonly options: ExampleFetcherOptions) {}

  get profile(): ExampleSourceProfile {
    return this.options.profile;
  }

  async fetch(selectors: ExampleSelectors): Promise<string> {
    const { profile, client, limits, logger } = this.options;
    const normalized = normalizeSelectors(selectors, profile.accepts);
    if (!hasSelectors(normalized)) {
      throw new InputError(
        `${profile.label} examples need at least one of: ${profile.accepts.join(", ")}`,
      );
    }

    logger?.info(
      {
        platform: profile.key,
        actorId: profile.actorId,
        sources: normalized.urls.length + normalized.searchTerms.length + normalized.handles.length,
      },
      "scraping example posts",
    );

    const records = await client.runActor(profile.actorId, profile.buildInput(normalized, limits));
    logger?.info({ platform: profile.key, records: records.length }, "scraped example posts");

    return formatExamples(profile, records);
  }
}
