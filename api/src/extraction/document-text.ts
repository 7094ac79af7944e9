import mammoth from "mammoth";
import { PDFParse } from "pdf-parse";
import { ExtractionFailedError, describeError } from "../errors.js";

export type DocumentKind = "pdf" | "docx" | "txt";

const MIME_KINDS: Record<string, DocumentKind> = {
  "application/pdf": "pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document": "docx",
  "text/plain": "txt",
};

/** Kind from the file extension, falling back to the mime type. */
export function detectDocumentKind(filename: string, mimeType?: string): DocumentKind | undefined {
  const extension = filename.toLowerCase().split(".").pop();
  if (extension === "pdf" || extension === "docx" || extension === "txt") {
    return extension;
  }
  return mimeType ? MIME_KINDS[mimeType.toLowerCase()] : undefined;
}

export async function extractDocumentText(document: Buffer, kind: DocumentKind): Promise<string> {
  if (document.length === 0) {
    throw new ExtractionFailedError("The uploaded file is empty");
  }

  try {
    switch (kind) {
      case "pdf": {
        const parser = new PDFParse({ data: document });
        try {
          const data = await parser.getText();
          return data.text;
        } finally {
          await parser.destroy();
        }
      }
      case "docx": {
        const { value } = await mammoth.extractRawText({ buffer: document });
        return value;
      }
      case "txt":
        return document.toString("utf-8");
    }
  } catch (error) {
    throw new ExtractionFailedError(`Could not read ${kind.toUpperCase()} document: ${describeError(error)}`, {
      cause: error,
    });
  }
}
