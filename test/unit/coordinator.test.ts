import assert from "node:assert/strict";
import test from "node:test";
import { setTimeout as sleep } from "node:timers/promises";
import { createGenerationRequest } from "../../src/services/generation/request";
import {
  createWorkflowCoordinator,
  excerptContext,
} from "../../src/services/workflow/coordinator";
import { RemoteCallError } from "../../src/services/workflow/errors";
import {
  cannedResponder,
  labelFor,
  RecordingLlmClient,
  RecordingLogger,
  testConfig,
} from "../support/fakes";

const request = createGenerationRequest({
  context: "We sell AI customer service tools.",
  examples: "(none)",
  count: 2,
});

test("excerptContext keeps short context and cuts long context at 100 characters", () => {
  assert.equal(excerptContext("short"), "short");
  assert.equal(excerptContext("a".repeat(100)), "a".repeat(100));
  assert.equal(excerptContext("b".repeat(150)), `${"b".repeat(100)}...`);
});

test("excerptContext counts code points and never splits a surrogate pair", () => {
  const rocket = "\u{1F680}";

  assert.equal(excerptContext(`${"a".repeat(99)}${rocket}`), `${"a".repeat(99)}${rocket}`);
  assert.equal(
    excerptContext(`${"a".repeat(99)}${rocket}tail`),
    `${"a".repeat(99)}${rocket}...`,
  );
});

test("both generators start before either finishes and validation waits for both", async () => {
  const canned = cannedResponder();
  const llm = new RecordingLlmClient(async (chat) => {
    if (labelFor(chat) === "linkedin") {
      await sleep(20);
    }
    return canned(chat);
  });
  const coordinator = createWorkflowCoordinator(testConfig(), llm);

  await coordinator.execute(request);

  assert.deepEqual(llm.events.slice(0, 2), ["start:linkedin", "start:x"]);
  const validationStart = llm.events.indexOf("start:validation");
  assert.ok(validationStart > llm.events.indexOf("end:linkedin"));
  assert.ok(validationStart > llm.events.indexOf("end:x"));
  assert.equal(llm.events.at(-1), "end:validation");
  assert.equal(llm.requests.length, 3);
});

test("execute assembles a frozen completed report", async () => {
  const llm = new RecordingLlmClient(cannedResponder({
    linkedin: "Post 1\nLinkedIn body",
    x: "Post 1\nX body",
    validation: "Looks good.",
  }));
  const progress: string[] = [];
  const coordinator = createWorkflowCoordinator(testConfig(), llm);

  const report = await coordinator.execute(request, {
    onProgress: (message) => progress.push(message),
  });

  assert.equal(report.status, "completed");
  assert.equal(report.contextExcerpt, "We sell AI customer service tools.");
  assert.deepEqual(report.agentsUsed, [
    "LinkedIn Content Creator",
    "X Content Creator",
    "Content Coordinator",
  ]);
  assert.equal(report.validationSummary, "Looks good.");
  assert.equal(report.linkedin.body, "Post 1\nLinkedIn body");
  assert.equal(report.linkedin.count, 2);
  assert.equal(report.x.platformName, "X (Twitter)");
  assert.equal(Object.isFrozen(report), true);
  assert.equal(Object.isFrozen(report.linkedin), true);
  assert.equal(Object.isFrozen(report.x), true);
  assert.equal(Object.isFrozen(report.agentsUsed), true);
  assert.deepEqual(progress, [
    "Generating LinkedIn and X posts in parallel...",
    "Validating generated content...",
  ]);
});

test("a failing generator fails the run and skips validation", async () => {
  const canned = cannedResponder();
  const llm = new RecordingLlmClient((chat) => {
    if (labelFor(chat) === "x") {
      throw new RemoteCallError("llm", "quota exceeded");
    }
    return canned(chat);
  });
  const logger = new RecordingLogger();
  const coordinator = createWorkflowCoordinator(testConfig(), llm, logger);

  await assert.rejects(coordinator.execute(request), /quota exceeded/);

  assert.equal(llm.requests.some((chat) => labelFor(chat) === "validation"), false);
  const failure = logger.entries.find((entry) => entry.message === "generator failed");
  assert.deepEqual(failure?.payload, {
    platform: "x",
    producer: "X Content Creator",
    error: "quota exceeded",
  });
});

test("a failing validator fails the run", async () => {
  const canned = cannedResponder();
  const llm = new RecordingLlmClient((chat) => {
    if (labelFor(chat) === "validation") {
      throw new RemoteCallError("llm", "validator timed out");
    }
    return canned(chat);
  });
  const coordinator = createWorkflowCoordinator(testConfig(), llm);

  await assert.rejects(coordinator.execute(request), /validator timed out/);
});
