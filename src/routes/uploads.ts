import path from "node:path";
import type { FastifyInstance } from "fastify";
import {
  extractPdfText,
  PdfExtractionError,
  type PdfTextExtractor,
} from "../services/documents/pdf.extract";
import type { UploadResponseV1 } from "../types/workflow";
import { errorResponse, okResponse } from "../utils/http-envelope";

export interface UploadsRouteOptions {
  extractText?: PdfTextExtractor;
}

export function sanitizeFilename(raw: string): string {
  const base = path.basename(raw.replace(/\\/g, "/"));
  return base
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9._-]/g, "")
    .replace(/^[._]+/, "");
}

function isFileTooLarge(error: unknown): boolean {
  return error !== null
    && typeof error === "object"
    && "code" in error
    && error.code === "FST_REQ_FILE_TOO_LARGE";
}

export async function uploadsRoutes(app: FastifyInstance, options: UploadsRouteOptions = {}) {
  const extractText = options.extractText ?? extractPdfText;

  app.post("/upload", async (request, reply) => {
    if (!request.isMultipart()) {
      return reply
        .code(400)
        .send(errorResponse("VALIDATION_ERROR", "No PDF file provided"));
    }

    const file = await request.file();
    if (!file) {
      return reply
        .code(400)
        .send(errorResponse("VALIDATION_ERROR", "No PDF file provided"));
    }

    if (file.fieldname !== "pdf") {
      file.file.resume();
      return reply
        .code(400)
        .send(errorResponse("VALIDATION_ERROR", "No PDF file provided"));
    }

    if (!file.filename) {
      file.file.resume();
      return reply
        .code(400)
        .send(errorResponse("VALIDATION_ERROR", "No file selected"));
    }

    if (!file.filename.toLowerCase().endsWith(".pdf")) {
      file.file.resume();
      return reply
        .code(400)
        .send(errorResponse("VALIDATION_ERROR", "File must be a PDF"));
    }

    let data: Buffer;
    try {
      data = await file.toBuffer();
    } catch (error) {
      if (isFileTooLarge(error)) {
        return reply
          .code(413)
          .send(errorResponse("FILE_TOO_LARGE", "PDF exceeds the upload size limit"));
      }

      throw error;
    }

    let text: string;
    try {
      text = await extractText(data);
    } catch (error) {
      if (error instanceof PdfExtractionError) {
        return reply.code(422).send(errorResponse(error.code, error.message));
      }

      request.log.error({ error }, "pdf extraction failed");
      return reply
        .code(500)
        .send(errorResponse("PDF_EXTRACTION_FAILED", "Failed to extract text from PDF"));
    }

    const payload: UploadResponseV1 = {
      text,
      filename: sanitizeFilename(file.filename),
    };
    return reply.code(200).send(okResponse(payload));
  });
}
