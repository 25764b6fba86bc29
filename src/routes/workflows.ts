import type { FastifyInstance } from "fastify";
import { getConfig, type AppConfig } from "../config";
import { renderReportPdf } from "../services/documents/report.pdf";
import { OpenAiCompatibleClient, type LlmClient } from "../services/llm/llm.client";
import { ApifyActorClient, type ScrapingClient } from "../services/scraping/apify.client";
import {
  ExampleFetcher,
  LINKEDIN_SOURCE,
  X_SOURCE,
} from "../services/scraping/example.fetcher";
import { createWorkflowCoordinator } from "../services/workflow/coordinator";
import { InputError } from "../services/workflow/errors";
import { FileReportStore, type ReportStore } from "../services/workflow/report.store";
import {
  WorkflowRunner,
  type StartWorkflowResult,
  type WorkflowRunInput,
} from "../services/workflow/runner";
import type { StartWorkflowResponseV1, WorkflowStatusV1 } from "../types/workflow";
import { errorResponse, okResponse } from "../utils/http-envelope";

export interface WorkflowsRouteOptions {
  config?: AppConfig;
  runner?: WorkflowRunner;
  llmClient?: LlmClient;
  scrapingClient?: ScrapingClient;
  reportStore?: ReportStore;
}

export const DEFAULT_POST_COUNT = 3;
export const MAX_POST_COUNT = 10;

function parseStringList(value: unknown, field: string): { value?: string[]; error?: string } {
  if (value === undefined || value === null) {
    return { value: [] };
  }

  if (typeof value === "string") {
    return {
      value: value.split(/\r?\n/).map((item) => item.trim()).filter((item) => item.length > 0),
    };
  }

  if (!Array.isArray(value)) {
    return { error: `${field} must be an array of strings` };
  }

  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") {
      return { error: `${field} must be an array of strings` };
    }

    const trimmed = item.trim();
    if (trimmed) {
      items.push(trimmed);
    }
  }

  return { value: items };
}

export function parseStartPayload(raw: unknown): {
  value?: WorkflowRunInput;
  error?: string;
} {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    return { error: "Payload must be a JSON object" };
  }

  const body = raw as Record<string, unknown>;
  const context = typeof body.context === "string" ? body.context.trim() : "";
  if (!context) {
    return { error: "Context cannot be empty" };
  }

  const count = body.num_posts === undefined || body.num_posts === null
    ? DEFAULT_POST_COUNT
    : Number(body.num_posts);
  if (!Number.isInteger(count) || count < 1 || count > MAX_POST_COUNT) {
    return { error: `num_posts must be an integer between 1 and ${MAX_POST_COUNT}` };
  }

  const linkedinUrls = parseStringList(body.linkedin_urls, "linkedin_urls");
  const xUrls = parseStringList(body.x_urls, "x_urls");
  const xSearchTerms = parseStringList(body.x_search_terms, "x_search_terms");
  const xHandles = parseStringList(body.x_handles, "x_handles");

  for (const list of [linkedinUrls, xUrls, xSearchTerms, xHandles]) {
    if (list.error) {
      return { error: list.error };
    }
  }

  return {
    value: {
      context,
      count,
      linkedinUrls: linkedinUrls.value ?? [],
      xUrls: xUrls.value ?? [],
      xSearchTerms: xSearchTerms.value ?? [],
      xHandles: (xHandles.value ?? []).map((handle) => handle.replace(/^@/, "")),
    },
  };
}

function createRunner(
  app: FastifyInstance,
  config: AppConfig,
  options: WorkflowsRouteOptions,
): WorkflowRunner {
  const llmClient = options.llmClient ?? new OpenAiCompatibleClient({
    apiKey: config.llmApiKey,
    baseUrl: config.llmBaseUrl,
    timeoutMs: config.remoteTimeoutMs,
  });
  const scrapingClient = options.scrapingClient ?? new ApifyActorClient({
    token: config.apifyApiToken,
    baseUrl: config.apifyBaseUrl,
    timeoutMs: config.remoteTimeoutMs,
  });
  const limits = {
    linkedinLimitPerSource: config.linkedinLimitPerSource,
    xMaxItems: config.xMaxItems,
  };

  return new WorkflowRunner({
    config,
    coordinator: createWorkflowCoordinator(config, llmClient, app.log),
    linkedinFetcher: new ExampleFetcher({
      profile: LINKEDIN_SOURCE,
      client: scrapingClient,
      limits,
      logger: app.log,
    }),
    xFetcher: new ExampleFetcher({
      profile: X_SOURCE,
      client: scrapingClient,
      limits,
      logger: app.log,
    }),
    reportStore: options.reportStore ?? new FileReportStore(config.reportsDir),
    logger: app.log,
  });
}

export async function workflowsRoutes(app: FastifyInstance, options: WorkflowsRouteOptions = {}) {
  const config = options.config ?? getConfig();
  const runner = options.runner ?? createRunner(app, config, options);

  app.post("/start_workflow", async (request, reply) => {
    const validated = parseStartPayload(request.body);
    if (!validated.value) {
      return reply
        .code(400)
        .send(errorResponse("VALIDATION_ERROR", validated.error ?? "Invalid payload"));
    }

    let started: StartWorkflowResult;
    try {
      started = runner.start(validated.value);
    } catch (error) {
      if (error instanceof InputError) {
        return reply.code(400).send(errorResponse(error.code, error.message));
      }

      throw error;
    }

    if (!started.accepted) {
      return reply
        .code(409)
        .send(errorResponse("WORKFLOW_ALREADY_RUNNING", started.reason));
    }

    request.log.info({ runId: started.runId, count: validated.value.count }, "workflow accepted");
    const data: StartWorkflowResponseV1 = {
      run_id: started.runId,
      message: "Workflow started successfully",
    };
    return reply.code(202).send(okResponse(data));
  });

  app.get("/status", async (_request, reply) => {
    const snapshot = runner.status();
    const data: WorkflowStatusV1 = {
      running: snapshot.running,
      progress: snapshot.progress,
      output: snapshot.output,
      error: snapshot.error,
    };
    return reply.code(200).send(okResponse(data));
  });

  app.get("/download_pdf", async (request, reply) => {
    const { fullOutput } = runner.status();
    if (!fullOutput) {
      return reply
        .code(404)
        .send(errorResponse("NO_OUTPUT", "No output available to download"));
    }

    let pdf: Buffer;
    try {
      pdf = await renderReportPdf(fullOutput);
    } catch (error) {
      request.log.error({ error }, "pdf generation failed");
      return reply
        .code(500)
        .send(errorResponse("PDF_RENDER_FAILED", "Failed to generate PDF"));
    }

    return reply
      .code(200)
      .header("Content-Type", "application/pdf")
      .header("Content-Disposition", "attachment; filename=\"social_posts.pdf\"")
      .send(pdf);
  });

  app.get("/download_txt", async (_request, reply) => {
    const { fullOutput, reportFile } = runner.status();
    if (!fullOutput) {
      return reply
        .code(404)
        .send(errorResponse("NO_OUTPUT", "No output available to download"));
    }

    return reply
      .code(200)
      .header("Content-Type", "text/plain; charset=utf-8")
      .header("Content-Disposition", `attachment; filename="${reportFile ?? "social_posts.txt"}"`)
      .send(fullOutput);
  });
}
