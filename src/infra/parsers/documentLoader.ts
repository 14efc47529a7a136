import path from "node:path";
import { PDFParse } from "pdf-parse";
import { ExtractionError, describeError } from "../../domain/errors.js";
import { normalizeText } from "../../utils/text.js";

const TEXT_EXTENSIONS = new Set([".md", ".txt"]);
const SUPPORTED_EXTENSIONS = new Set([...TEXT_EXTENSIONS, ".pdf"]);
const PDF_MAGIC = Buffer.from("%PDF-", "latin1");

export function isSupportedDocumentExtension(filename: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filename).toLowerCase());
}

export function getSupportedDocumentExtensions(): string[] {
  return [...SUPPORTED_EXTENSIONS];
}

function looksLikePdf(bytes: Buffer): boolean {
  return bytes.subarray(0, PDF_MAGIC.length).equals(PDF_MAGIC);
}

/**
 * Turns an uploaded file into plain text. Nothing is written to disk.
 * An empty string is a valid result (a PDF with pages but no text layer).
 */
export async function extractText(filename: string, bytes: Buffer): Promise<string> {
  const ext = path.extname(filename).toLowerCase();

  if (ext === ".pdf" || looksLikePdf(bytes)) {
    return extractPdfText(filename, bytes);
  }

  if (TEXT_EXTENSIONS.has(ext)) {
    return normalizeText(bytes.toString("utf-8"));
  }

  throw new ExtractionError(
    filename,
    `unsupported file type "${ext || "(none)"}", allowed: ${getSupportedDocumentExtensions().join(", ")}`,
  );
}

async function extractPdfText(filename: string, bytes: Buffer): Promise<string> {
  if (bytes.length === 0) {
    throw new ExtractionError(filename, "the file is empty");
  }

  const parser = new PDFParse({ data: bytes });
  try {
    const parsed = await parser.getText();
    if (parsed.total === 0) {
      throw new ExtractionError(filename, "the PDF has no pages");
    }
    return normalizeText(parsed.text);
  } catch (error) {
    if (error instanceof ExtractionError) {
      throw error;
    }
    throw new ExtractionError(filename, pdfFailureReason(error), error);
  } finally {
    await parser.destroy();
  }
}

function pdfFailureReason(error: unknown): string {
  if (error instanceof Error && error.name === "PasswordException") {
    return "the PDF is encrypted";
  }
  return `the PDF could not be parsed (${describeError(error)})`;
}
