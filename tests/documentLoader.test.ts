import { beforeEach, describe, expect, it, vi } from "vitest";
import { ExtractionError } from "../src/domain/errors.js";
import {
  extractText,
  getSupportedDocumentExtensions,
  isSupportedDocumentExtension,
} from "../src/infra/parsers/documentLoader.js";

const pdf = vi.hoisted(() => ({
  getText: vi.fn(),
  destroy: vi.fn(),
  inputs: [] as unknown[],
}));

vi.mock("pdf-parse", () => ({
  PDFParse: class {
    constructor(input: unknown) {
      pdf.inputs.push(input);
    }

    getText() {
      return pdf.getText();
    }

    destroy() {
      return pdf.destroy();
    }
  },
}));

const FAKE_PDF = Buffer.from("%PDF-1.7\nfake body", "latin1");

describe("documentLoader", () => {
  beforeEach(() => {
    pdf.getText.mockReset();
    pdf.destroy.mockReset();
    pdf.destroy.mockResolvedValue(undefined);
    pdf.inputs.length = 0;
  });

  it("includes pdf as supported extension", () => {
    expect(getSupportedDocumentExtensions()).toContain(".pdf");
    expect(isSupportedDocumentExtension("manual.PDF")).toBe(true);
    expect(isSupportedDocumentExtension("sheet.xlsx")).toBe(false);
  });

  it("extracts pdf text in memory and releases the parser", async () => {
    pdf.getText.mockResolvedValue({ text: "Page one\r\n\tbody  ", total: 1 });

    await expect(extractText("guide.pdf", FAKE_PDF)).resolves.toBe("Page one\n body");
    expect(pdf.inputs).toEqual([{ data: FAKE_PDF }]);
    expect(pdf.destroy).toHaveBeenCalledTimes(1);
  });

  it("detects a pdf by its magic bytes when the extension is missing", async () => {
    pdf.getText.mockResolvedValue({ text: "detected", total: 2 });

    await expect(extractText("upload", FAKE_PDF)).resolves.toBe("detected");
  });

  it("rejects a pdf without pages", async () => {
    pdf.getText.mockResolvedValue({ text: "", total: 0 });

    await expect(extractText("blank.pdf", FAKE_PDF)).rejects.toThrow(
      "Failed to extract text from blank.pdf: the PDF has no pages",
    );
    expect(pdf.destroy).toHaveBeenCalledTimes(1);
  });

  it("reports an encrypted pdf with the filename", async () => {
    const locked = new Error("No password given");
    locked.name = "PasswordException";
    pdf.getText.mockRejectedValue(locked);

    const error = await extractText("locked.pdf", FAKE_PDF).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({
      code: "EXTRACTION_ERROR",
      statusCode: 422,
      details: { filename: "locked.pdf" },
      message: "Failed to extract text from locked.pdf: the PDF is encrypted",
    });
    expect(pdf.destroy).toHaveBeenCalledTimes(1);
  });

  it("wraps parser failures for corrupt files", async () => {
    pdf.getText.mockRejectedValue(new Error("Invalid XRef stream"));

    await expect(extractText("broken.pdf", FAKE_PDF)).rejects.toThrow(
      "the PDF could not be parsed (Invalid XRef stream)",
    );
  });

  it("rejects an empty pdf upload without invoking the parser", async () => {
    await expect(extractText("empty.pdf", Buffer.alloc(0))).rejects.toThrow("the file is empty");
    expect(pdf.inputs).toHaveLength(0);
  });

  it("decodes text and markdown uploads as utf-8", async () => {
    const bytes = Buffer.from("line 1\r\nline 2 – café\n", "utf-8");

    await expect(extractText("notes.md", bytes)).resolves.toBe("line 1\nline 2 – café");
  });

  it("rejects unsupported extensions", async () => {
    await expect(extractText("sheet.xlsx", Buffer.from("PK"))).rejects.toThrow(
      'unsupported file type ".xlsx"',
    );
  });
});
