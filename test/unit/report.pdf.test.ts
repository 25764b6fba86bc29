import assert from "node:assert/strict";
import test from "node:test";
import {
  classifyLine,
  renderReportPdf,
  toPdfSafeText,
} from "../../src/services/documents/report.pdf";

test("classifyLine picks out section headings and rules", () => {
  assert.equal(classifyLine("LINKEDIN POSTS"), "heading");
  assert.equal(classifyLine("  VALIDATION SUMMARY  "), "heading");
  assert.equal(classifyLine("=".repeat(70)), "rule");
  assert.equal(classifyLine("-".repeat(70)), "rule");
  assert.equal(classifyLine("   "), "blank");
  assert.equal(classifyLine("Post 1"), "body");
  assert.equal(classifyLine("---x"), "body");
});

test("toPdfSafeText drops characters the standard fonts cannot draw", () => {
  assert.equal(toPdfSafeText("Ship it \u{1F680} now"), "Ship it  now");
  assert.equal(toPdfSafeText("café — menu   "), "café  menu");
});

test("renderReportPdf produces a complete PDF document", async () => {
  const pdf = await renderReportPdf(
    ["LINKEDIN POSTS", "-".repeat(70), "Post 1", "Hello \u{1F44B} world", "", "X (TWITTER) POSTS"].join("\n"),
  );

  assert.equal(pdf.subarray(0, 5).toString("latin1"), "%PDF-");
  assert.ok(pdf.subarray(-16).toString("latin1").includes("%%EOF"));
});
