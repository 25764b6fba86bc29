import fs from "node:fs";
import path from "node:path";
import pino from "pino";
import {
  GENERATE_USAGE,
  parseGenerateArgs,
  SAMPLE_CONTEXT,
  type GenerateCliOptions,
} from "../src/cli/generate.args";
import { assertCredentialsConfigured, getConfig, loadEnv } from "../src/config";
import { OpenAiCompatibleClient } from "../src/services/llm/llm.client";
import { ApifyActorClient } from "../src/services/scraping/apify.client";
import { ExampleFetcher, LINKEDIN_SOURCE, X_SOURCE } from "../src/services/scraping/example.fetcher";
import { createWorkflowCoordinator } from "../src/services/workflow/coordinator";
import { createGenerationRequest } from "../src/services/generation/request";
import { combineExamples, resolveExamples } from "../src/services/workflow/examples";
import { renderReport } from "../src/services/workflow/report.format";
import { FileReportStore } from "../src/services/workflow/report.store";

function readContext(options: GenerateCliOptions): string {
  if (options.contextFile) {
    return fs.readFileSync(path.resolve(options.contextFile), "utf8");
  }

  return options.context ?? SAMPLE_CONTEXT;
}

async function main(): Promise<void> {
  const options = parseGenerateArgs(process.argv.slice(2));
  if (options.help) {
    console.log(GENERATE_USAGE);
    return;
  }

  loadEnv();
  const config = getConfig();
  const logger = pino({ name: "generate-posts", level: config.logLevel });
  assertCredentialsConfigured(config);

  const llmClient = new OpenAiCompatibleClient({
    apiKey: config.llmApiKey,
    baseUrl: config.llmBaseUrl,
    timeoutMs: config.remoteTimeoutMs,
  });
  const scrapingClient = new ApifyActorClient({
    token: config.apifyApiToken,
    baseUrl: config.apifyBaseUrl,
    timeoutMs: config.remoteTimeoutMs,
  });
  const limits = {
    linkedinLimitPerSource: config.linkedinLimitPerSource,
    xMaxItems: config.xMaxItems,
  };

  const linkedin = await resolveExamples(
    new ExampleFetcher({ profile: LINKEDIN_SOURCE, client: scrapingClient, limits, logger }),
    { urls: options.linkedinUrls },
    logger,
  );
  const x = await resolveExamples(
    new ExampleFetcher({ profile: X_SOURCE, client: scrapingClient, limits, logger }),
    { urls: options.xUrls, searchTerms: options.xSearchTerms, handles: options.xHandles },
    logger,
  );

  const request = createGenerationRequest({
    context: readContext(options),
    examples: combineExamples(linkedin.text, x.text),
    count: options.count,
  });

  const coordinator = createWorkflowCoordinator(config, llmClient, logger);
  const report = await coordinator.execute(request, {
    onProgress: (message) => logger.info({}, message),
  });
  const text = renderReport(report);
  console.log(text);

  if (options.out) {
    const target = path.resolve(options.out);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, text, "utf8");
    console.log(`[generate-posts] Report saved to ${target}`);
    return;
  }

  const stored = await new FileReportStore(config.reportsDir).save(text);
  console.log(`[generate-posts] Report saved to ${stored.location}`);
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[generate-posts] Failed: ${message}`);
  process.exit(1);
});
