import assert from "node:assert/strict";
import test from "node:test";
import { X_SOURCE } from "../../src/services/scraping/example.fetcher";
import { InputError, RemoteCallError } from "../../src/services/workflow/errors";
import { combineExamples, FALLBACK_EXAMPLES } from "../../src/services/workflow/examples";
import { stripValidationSection } from "../../src/services/workflow/report.format";
import {
  ALREADY_RUNNING_MESSAGE,
  IDLE_SNAPSHOT,
  type WorkflowRunner,
} from "../../src/services/workflow/runner";
import { cannedResponder, labelFor, StubScrapingClient, testConfig } from "../support/fakes";
import { createGate, createRunnerHarness as createHarness, runInput } from "../support/runner";

test("a run with no example sources completes on the fallback examples", async () => {
  const { runner, llm, scraping, store } = createHarness();

  const started = runner.start(runInput());
  assert.deepEqual(started, { accepted: true, runId: "run-1" });
  assert.equal(runner.status().running, true);
  assert.equal(runner.status().progress, "Starting workflow...");

  await runner.waitForIdle();
  const status = runner.status();

  assert.equal(status.running, false);
  assert.equal(status.progress, "Complete!");
  assert.equal(status.error, null);
  assert.equal(status.reportFile, "output_20260105_090703.txt");
  assert.equal(store.reports.get("output_20260105_090703.txt"), status.fullOutput);
  assert.equal(status.output, stripValidationSection(status.fullOutput));
  assert.ok(status.fullOutput.includes("VALIDATION SUMMARY\n"));
  assert.equal(status.output.includes("VALIDATION SUMMARY"), false);
  assert.ok(status.output.includes("Total LinkedIn Posts: 2"));
  assert.equal(scraping.calls.length, 0);

  const linkedinCall = llm.requests.find((chat) => labelFor(chat) === "linkedin");
  const prompt = linkedinCall?.messages[1]?.content ?? "";
  assert.ok(prompt.includes(combineExamples(FALLBACK_EXAMPLES.linkedin, FALLBACK_EXAMPLES.x)));
  assert.ok(prompt.startsWith("Generate 2 unique LinkedIn posts"));
});

test("progress moves through scraping, generation and validation", async () => {
  const seen: string[] = [];
  let runner: WorkflowRunner | null = null;
  const record = () => {
    if (runner) {
      seen.push(runner.status().progress);
    }
  };
  const canned = cannedResponder();
  const scraping = new StubScrapingClient();
  const originalRunActor = scraping.runActor.bind(scraping);
  scraping.runActor = async (actorId, input) => {
    record();
    return originalRunActor(actorId, input);
  };

  const harness = createHarness({
    scraping,
    responder: (chat) => {
      record();
      return canned(chat);
    },
  });
  runner = harness.runner;

  runner.start(runInput({ linkedinUrls: ["https://example.test/in/a"], xHandles: ["cxlead"] }));
  await runner.waitForIdle();

  assert.deepEqual(seen, [
    "Scraping LinkedIn posts...",
    "Scraping X posts...",
    "Generating LinkedIn and X posts in parallel...",
    "Generating LinkedIn and X posts in parallel...",
    "Validating generated content...",
  ]);
  assert.equal(runner.status().progress, "Complete!");
});

test("a second start while running is refused and leaves the state untouched", async () => {
  const gate = createGate();
  const canned = cannedResponder();
  const { runner, llm } = createHarness({
    responder: async (chat) => {
      await gate.promise;
      return canned(chat);
    },
  });

  runner.start(runInput());
  await new Promise((resolve) => setImmediate(resolve));
  const before = runner.status();

  const second = runner.start(runInput({ context: "Something else entirely." }));

  assert.deepEqual(second, { accepted: false, reason: ALREADY_RUNNING_MESSAGE });
  assert.equal(runner.status(), before);
  assert.equal(before.runId, "run-1");

  gate.open();
  await runner.waitForIdle();
  assert.equal(runner.status().progress, "Complete!");
  assert.equal(llm.requests.length, 3);
});

test("a finished run frees the slot for the next one", async () => {
  const { runner } = createHarness();

  runner.start(runInput());
  await runner.waitForIdle();
  const next = runner.start(runInput());

  assert.deepEqual(next, { accepted: true, runId: "run-2" });
  assert.equal(runner.status().output, "");
  assert.equal(runner.status().fullOutput, "");
  await runner.waitForIdle();
});

test("blank context is rejected without starting a run", () => {
  const { runner } = createHarness();

  assert.throws(() => runner.start(runInput({ context: "   " })), InputError);
  assert.equal(runner.status(), IDLE_SNAPSHOT);
});

test("missing credentials fail the run before any remote call", async () => {
  const { runner, llm, scraping, logger } = createHarness({
    config: testConfig({ llmApiKey: "" }),
  });

  runner.start(runInput({ linkedinUrls: ["https://example.test/in/a"] }));
  await runner.waitForIdle();
  const status = runner.status();

  assert.equal(status.running, false);
  assert.equal(status.progress, "Error occurred");
  assert.equal(status.error, "LLM_API_KEY not configured");
  assert.equal(status.output, "");
  assert.equal(llm.requests.length, 0);
  assert.equal(scraping.calls.length, 0);
  assert.deepEqual(logger.messages("error"), ["workflow failed"]);
});

test("a scraping failure falls back to the built-in examples", async () => {
  const scraping = new StubScrapingClient({
    [X_SOURCE.actorId]: new RemoteCallError("apify", "Apify actor apidojo/tweet-scraper failed with status 502"),
  });
  const { runner, logger } = createHarness({ scraping });

  runner.start(runInput({ xSearchTerms: ["customer service"] }));
  await runner.waitForIdle();

  assert.equal(runner.status().progress, "Complete!");
  assert.deepEqual(logger.messages("warn"), ["example scraping failed, using fallback examples"]);
});

test("a generator failure ends the run without saving a report", async () => {
  const canned = cannedResponder();
  const { runner, store } = createHarness({
    responder: (chat) => {
      if (labelFor(chat) === "linkedin") {
        throw new RemoteCallError("llm", "model overloaded");
      }
      return canned(chat);
    },
  });

  runner.start(runInput());
  await runner.waitForIdle();
  const status = runner.status();

  assert.equal(status.progress, "Error occurred");
  assert.equal(status.error, "model overloaded");
  assert.equal(status.fullOutput, "");
  assert.equal(status.reportFile, null);
  assert.equal(store.reports.size, 0);
});
