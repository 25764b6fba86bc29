import PDFDocument from "pdfkit";
import { SECTION_HEADERS } from "../workflow/report.format";

const PDF_TITLE = "Social Post Content";

type LineKind = "heading" | "rule" | "blank" | "body";

export function classifyLine(line: string): LineKind {
  const trimmed = line.trim();
  if (!trimmed) {
    return "blank";
  }

  if (SECTION_HEADERS.includes(trimmed)) {
    return "heading";
  }

  if (/^[=-]+$/.test(trimmed)) {
    return "rule";
  }

  return "body";
}

// Standard PDF fonts only cover Latin-1.
export function toPdfSafeText(line: string): string {
  return line.replace(/[^\t\x20-\x7e\xa0-\xff]/g, "").trimEnd();
}

export function renderReportPdf(reportText: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: "LETTER",
      margins: { top: 72, bottom: 18, left: 72, right: 72 },
      info: { Title: PDF_TITLE },
    });
    const chunks: Buffer[] = [];

    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    doc.font("Helvetica-Bold").fontSize(18).text(PDF_TITLE);
    doc.moveDown(1);

    for (const line of reportText.split("\n")) {
      switch (classifyLine(line)) {
        case "blank":
          doc.moveDown(0.4);
          break;
        case "rule":
          doc.moveDown(0.2);
          break;
        case "heading":
          doc.font("Helvetica-Bold").fontSize(13).text(toPdfSafeText(line.trim()));
          doc.moveDown(0.5);
          break;
        case "body":
          doc.font("Courier").fontSize(10).text(toPdfSafeText(line), { lineGap: 2 });
          break;
      }
    }

    doc.end();
  });
}
