import assert from "node:assert/strict";
import test from "node:test";
import {
  extractPdfText,
  normalizeExtractedText,
  PdfExtractionError,
} from "../../src/services/documents/pdf.extract";

test("normalizeExtractedText unwraps lines and keeps paragraph breaks", () => {
  const raw = "\n\nOur platform helps\nenterprises  reduce costs.\n \n\nWe focus on\n\tfinance.\n\n\n";

  assert.equal(
    normalizeExtractedText(raw),
    "Our platform helps enterprises reduce costs.\n\nWe focus on finance.",
  );
});

test("normalizeExtractedText returns an empty string for whitespace", () => {
  assert.equal(normalizeExtractedText(" \n\n \t "), "");
});

test("extractPdfText rejects bytes that are not a PDF", async () => {
  await assert.rejects(
    extractPdfText(Buffer.from("plain text, not a pdf")),
    (error: unknown) =>
      error instanceof PdfExtractionError && error.code === "PDF_EXTRACTION_FAILED",
  );
});
