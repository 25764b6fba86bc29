import { randomUUID } from "node:crypto";
import { assertCredentialsConfigured, type AppConfig } from "../../config";
import { createGenerationRequest } from "../generation/request";
import type { ExampleFetcher } from "../scraping/example.fetcher";
import type { WorkflowCoordinator } from "./coordinator";
import { errorMessage, InputError } from "./errors";
import { combineExamples, resolveExamples } from "./examples";
import { renderReport, stripValidationSection } from "./report.format";
import type { ReportStore } from "./report.store";

interface RunnerLogger {
  info(payload: Record<string, unknown>, message: string): void;
  warn(payload: Record<string, unknown>, message: string): void;
  error(payload: Record<string, unknown>, message: string): void;
}

export interface WorkflowStatusSnapshot {
  readonly runId: string | null;
  readonly running: boolean;
  readonly progress: string;
  readonly output: string;
  readonly fullOutput: string;
  readonly error: string | null;
  readonly reportFile: string | null;
  readonly startedAt: string | null;
  readonly finishedAt: string | null;
}

export interface WorkflowRunInput {
  context: string;
  count: number;
  linkedinUrls: string[];
  xUrls: string[];
  xSearchTerms: string[];
  xHandles: string[];
}

export type StartWorkflowResult =
  | { accepted: true; runId: string }
  | { accepted: false; reason: string };

export interface WorkflowRunnerOptions {
  config: AppConfig;
  coordinator: WorkflowCoordinator;
  linkedinFetcher: ExampleFetcher;
  xFetcher: ExampleFetcher;
  reportStore: ReportStore;
  logger: RunnerLogger;
  now?: () => Date;
  idFactory?: () => string;
}

export const IDLE_SNAPSHOT: WorkflowStatusSnapshot = Object.freeze({
  runId: null,
  running: false,
  progress: "",
  output: "",
  fullOutput: "",
  error: null,
  reportFile: null,
  startedAt: null,
  finishedAt: null,
});

export const ALREADY_RUNNING_MESSAGE = "Workflow is already running";

/**
 * Owns the single background workflow slot. The status snapshot is replaced
 * whole on every change, so readers never observe a half-written state.
 */
export class WorkflowRunner {
  private snapshot: WorkflowStatusSnapshot = IDLE_SNAPSHOT;
  private current: Promise<void> | null = null;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(private readonly options: WorkflowRunnerOptions) {
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  status(): WorkflowStatusSnapshot {
    return this.snapshot;
  }

  /** Resolves once the in-flight run, if any, has settled. */
  waitForIdle(): Promise<void> {
    return this.current ?? Promise.resolve();
  }

  start(input: WorkflowRunInput): StartWorkflowResult {
    if (this.snapshot.running) {
      return { accepted: false, reason: ALREADY_RUNNING_MESSAGE };
    }

    if (!input.context.trim()) {
      throw new InputError("Context cannot be empty");
    }

    const runId = this.idFactory();
    this.snapshot = Object.freeze({
      ...IDLE_SNAPSHOT,
      runId,
      running: true,
      progress: "Starting workflow...",
      startedAt: this.now().toISOString(),
    });

    const task = this.execute(runId, input).finally(() => {
      if (this.current === task) {
        this.current = null;
      }
    });
    this.current = task;

    return { accepted: true, runId };
  }

  private update(runId: string, patch: Partial<WorkflowStatusSnapshot>): void {
    if (this.snapshot.runId !== runId) {
      return;
    }

    this.snapshot = Object.freeze({ ...this.snapshot, ...patch });
  }

  private async execute(runId: string, input: WorkflowRunInput): Promise<void> {
    const { config, coordinator, linkedinFetcher, xFetcher, reportStore, logger } = this.options;
    const progress = (message: string) => this.update(runId, { progress: message });

    try {
      progress("Validating API keys...");
      assertCredentialsConfigured(config);

      progress("Scraping LinkedIn posts...");
      const linkedin = await resolveExamples(linkedinFetcher, { urls: input.linkedinUrls }, logger);

      progress("Scraping X posts...");
      const x = await resolveExamples(
        xFetcher,
        { urls: input.xUrls, searchTerms: input.xSearchTerms, handles: input.xHandles },
        logger,
      );

      progress("Preparing content generation...");
      const request = createGenerationRequest({
        context: input.context,
        examples: combineExamples(linkedin.text, x.text),
        count: input.count,
      });

      progress("Generating content with AI agents...");
      const report = await coordinator.execute(request, { onProgress: progress });

      const fullOutput = renderReport(report);
      const stored = await reportStore.save(fullOutput, this.now());

      this.update(runId, {
        running: false,
        progress: "Complete!",
        output: stripValidationSection(fullOutput),
        fullOutput,
        reportFile: stored.name,
        finishedAt: this.now().toISOString(),
      });
      logger.info(
        {
          runId,
          reportFile: stored.location,
          linkedinExamples: linkedin.source,
          xExamples: x.source,
        },
        "workflow completed",
      );
    } catch (error) {
      const message = errorMessage(error);
      this.update(runId, {
        running: false,
        progress: "Error occurred",
        error: message,
        finishedAt: this.now().toISOString(),
      });
      logger.error({ runId, error: message }, "workflow failed");
    }
  }
}
