import { parseArgs } from "node:util";
import { InputError } from "../services/workflow/errors";

export const SAMPLE_CONTEXT = [
  "We are a B2B SaaS company specializing in AI-powered customer service automation.",
  "Our platform helps enterprises reduce support costs by 40% while improving customer",
  "satisfaction scores. We focus on enterprise clients in finance, healthcare, and e-commerce",
  "sectors. Key differentiators include our proprietary NLP models, seamless CRM integrations,",
  "and compliance-first approach.",
].join(" ");

export interface GenerateCliOptions {
  context: string | null;
  contextFile: string | null;
  count: number;
  linkedinUrls: string[];
  xUrls: string[];
  xSearchTerms: string[];
  xHandles: string[];
  out: string | null;
  help: boolean;
}

export const GENERATE_USAGE = [
  "Usage: generate-posts [options]",
  "",
  "  --context <text>        Context the posts should draw on",
  "  --context-file <path>   Read the context from a text file",
  "  --count <n>             Posts per platform (default 3)",
  "  --linkedin-url <url>    LinkedIn page to scrape for examples (repeatable)",
  "  --x-url <url>           X profile or search URL to scrape (repeatable)",
  "  --x-search <term>       X search term to scrape (repeatable)",
  "  --x-handle <handle>     X handle to scrape, without @ (repeatable)",
  "  --out <path>            Where to write the report (default: reports directory)",
  "  -h, --help              Show this message",
].join("\n");

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      options: {
        context: { type: "string" },
        "context-file": { type: "string" },
        count: { type: "string" },
        "linkedin-url": { type: "string", multiple: true },
        "x-url": { type: "string", multiple: true },
        "x-search": { type: "string", multiple: true },
        "x-handle": { type: "string", multiple: true },
        out: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    throw new InputError(error instanceof Error ? error.message : String(error));
  }
}

export function parseGenerateArgs(argv: string[]): GenerateCliOptions {
  const { values } = readArgs(argv);
  const count = values.count === undefined ? 3 : Number(values.count);
  if (!Number.isInteger(count) || count < 1) {
    throw new InputError("--count must be a positive integer");
  }

  if (values.context !== undefined && values["context-file"] !== undefined) {
    throw new InputError("Use either --context or --context-file, not both");
  }

  return {
    context: values.context ?? null,
    contextFile: values["context-file"] ?? null,
    count,
    linkedinUrls: values["linkedin-url"] ?? [],
    xUrls: values["x-url"] ?? [],
    xSearchTerms: values["x-search"] ?? [],
    xHandles: (values["x-handle"] ?? []).map((handle) => handle.replace(/^@/, "")),
    out: values.out ?? null,
    help: values.help ?? false,
  };
}
