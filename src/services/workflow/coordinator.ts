import type { AppConfig } from "../../config";
import type { LlmClient } from "../llm/llm.client";
import {
  PlatformContentGenerator,
  type ContentGenerator,
} from "../generation/platform.generator";
import { LINKEDIN_PROFILE, X_PROFILE } from "../generation/platform.profiles";
import type { GenerationRequest, GenerationResult } from "../generation/request";
import { PostValidator, type PostReviewer } from "../generation/validator";
import { errorMessage } from "./errors";

interface CoordinatorLogger {
  info(payload: Record<string, unknown>, message: string): void;
  error(payload: Record<string, unknown>, message: string): void;
}

export interface WorkflowReport {
  readonly status: "completed";
  readonly contextExcerpt: string;
  readonly agentsUsed: readonly string[];
  readonly validationSummary: string;
  readonly linkedin: GenerationResult;
  readonly x: GenerationResult;
}

export interface ExecuteHooks {
  onProgress?: (message: string) => void;
}

export interface WorkflowCoordinatorOptions {
  linkedin: ContentGenerator;
  x: ContentGenerator;
  reviewer: PostReviewer;
  logger?: CoordinatorLogger;
  name?: string;
}

export const COORDINATOR_NAME = "Content Coordinator";
const CONTEXT_EXCERPT_LENGTH = 100;

export function excerptContext(context: string): string {
  const codePoints = Array.from(context);
  if (codePoints.length <= CONTEXT_EXCERPT_LENGTH) {
    return context;
  }

  return `${codePoints.slice(0, CONTEXT_EXCERPT_LENGTH).join("")}...`;
}

/**
 * Runs the two platform generators side by side, then hands both results to
 * the reviewer. The review never starts before both generators resolve, and a
 * failure in either generator fails the whole run.
 */
export class WorkflowCoordinator {
  readonly name: string;

  constructor(private readonly options: WorkflowCoordinatorOptions) {
    this.name = options.name ?? COORDINATOR_NAME;
  }

  private async runGenerator(
    label: "linkedin" | "x",
    generator: ContentGenerator,
    request: GenerationRequest,
  ): Promise<GenerationResult> {
    try {
      const result = await generator.generate(request);
      this.options.logger?.info({ platform: label, producer: generator.producerName }, "generator completed");
      return result;
    } catch (error) {
      this.options.logger?.error(
        { platform: label, producer: generator.producerName, error: errorMessage(error) },
        "generator failed",
      );
      throw error;
    }
  }

  async execute(request: GenerationRequest, hooks: ExecuteHooks = {}): Promise<WorkflowReport> {
    this.options.logger?.info(
      {
        contextLength: request.context.length,
        examplesLength: request.examples.length,
        count: request.count,
      },
      "workflow started",
    );

    hooks.onProgress?.("Generating LinkedIn and X posts in parallel...");
    const [linkedin, x] = await Promise.all([
      this.runGenerator("linkedin", this.options.linkedin, request),
      this.runGenerator("x", this.options.x, request),
    ]);

    hooks.onProgress?.("Validating generated content...");
    const validationSummary = await this.options.reviewer.review({ request, linkedin, x });
    this.options.logger?.info({ summaryLength: validationSummary.length }, "validation completed");

    return Object.freeze({
      status: "completed" as const,
      contextExcerpt: excerptContext(request.context),
      agentsUsed: Object.freeze([linkedin.producerName, x.producerName, this.name]),
      validationSummary,
      linkedin: Object.freeze({ ...linkedin }),
      x: Object.freeze({ ...x }),
    });
  }
}

export function createWorkflowCoordinator(
  config: AppConfig,
  llmClient: LlmClient,
  logger?: CoordinatorLogger,
): WorkflowCoordinator {
  const generatorOptions = {
    llmClient,
    model: config.llmModel,
    maxTokens: config.llmMaxOutputTokens,
  };

  return new WorkflowCoordinator({
    linkedin: new PlatformContentGenerator({ profile: LINKEDIN_PROFILE, ...generatorOptions }),
    x: new PlatformContentGenerator({ profile: X_PROFILE, ...generatorOptions }),
    reviewer: new PostValidator(llmClient, config.llmModel, config.llmMaxOutputTokens),
    logger,
  });
}
