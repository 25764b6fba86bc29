import pdfParse from "pdf-parse";

export class PdfExtractionError extends Error {
  readonly code = "PDF_EXTRACTION_FAILED";

  constructor(message: string) {
    super(message);
    this.name = "PdfExtractionError";
  }
}

export type PdfTextExtractor = (data: Buffer) => Promise<string>;

/**
 * Collapses the hard line wrapping PDFs carry while keeping blank-line
 * paragraph breaks.
 */
export function normalizeExtractedText(raw: string): string {
  return raw
    .split(/\n\s*\n/)
    .map((block) => block.replace(/\s+/g, " ").trim())
    .filter((block) => block.length > 0)
    .join("\n\n");
}

export const extractPdfText: PdfTextExtractor = async (data) => {
  let raw: string;
  try {
    const parsed = await pdfParse(data);
    raw = parsed.text;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PdfExtractionError(`Failed to extract text from PDF: ${reason}`);
  }

  const text = normalizeExtractedText(raw);
  if (!text) {
    throw new PdfExtractionError("No text could be extracted from the PDF");
  }

  return text;
};
