import assert from "node:assert/strict";
import test from "node:test";
import { parseGenerateArgs } from "../../src/cli/generate.args";
import { InputError } from "../../src/services/workflow/errors";

test("parseGenerateArgs applies defaults", () => {
  assert.deepEqual(parseGenerateArgs([]), {
    context: null,
    contextFile: null,
    count: 3,
    linkedinUrls: [],
    xUrls: [],
    xSearchTerms: [],
    xHandles: [],
    out: null,
    help: false,
  });
});

test("parseGenerateArgs collects repeated selectors and strips handle prefixes", () => {
  const options = parseGenerateArgs([
    "--context", "We sell AI customer service tools.",
    "--count", "2",
    "--linkedin-url", "https://example.test/in/a",
    "--linkedin-url", "https://example.test/in/b",
    "--x-handle", "@cxlead",
    "--x-search", "support automation",
    "--out", "reports/latest.txt",
  ]);

  assert.equal(options.context, "We sell AI customer service tools.");
  assert.equal(options.count, 2);
  assert.deepEqual(options.linkedinUrls, ["https://example.test/in/a", "https://example.test/in/b"]);
  assert.deepEqual(options.xHandles, ["cxlead"]);
  assert.deepEqual(options.xSearchTerms, ["support automation"]);
  assert.equal(options.out, "reports/latest.txt");
});

test("parseGenerateArgs rejects bad counts and unknown flags", () => {
  assert.throws(() => parseGenerateArgs(["--count", "0"]), /--count must be a positive integer/);
  assert.throws(() => parseGenerateArgs(["--count", "two"]), InputError);
  assert.throws(() => parseGenerateArgs(["--verbose"]), InputError);
});

test("parseGenerateArgs refuses context from two places", () => {
  assert.throws(
    () => parseGenerateArgs(["--context", "inline", "--context-file", "context.txt"]),
    /Use either --context or --context-file, not both/,
  );
});

test("parseGenerateArgs reads the short help flag", () => {
  assert.equal(parseGenerateArgs(["-h"]).help, true);
});
