import { mkdir, readdir, readFile } from "node:fs/promises";
import path from "node:path";

import { formatError, PdfExtractionFailedError } from "../../domain/errors.js";
import type { PdfDocumentText, PdfPageText } from "../../domain/models.js";
import { normalizeWhitespace } from "../../utils/text.js";

export type PdfPageLoader = (data: Uint8Array) => Promise<PdfPageText[]>;

export function pageMarker(pageNum: number): string {
  return `--- Page ${pageNum} ---`;
}

export class PdfTextReader {
  constructor(private readonly loadPages: PdfPageLoader = loadPagesWithPdfParse) {}

  async read(filePath: string): Promise<PdfDocumentText> {
    const sourceFilename = path.basename(filePath);

    let data: Uint8Array;
    try {
      data = new Uint8Array(await readFile(filePath));
    } catch (error) {
      throw new PdfExtractionFailedError(filePath, formatError(error));
    }

    let pages: PdfPageText[];
    try {
      pages = await this.loadPages(data);
    } catch (error) {
      throw new PdfExtractionFailedError(filePath, formatError(error));
    }

    const normalizedPages = pages
      .map((page) => ({ pageNum: page.pageNum, text: normalizeWhitespace(page.text) }))
      .sort((left, right) => left.pageNum - right.pageNum);

    if (normalizedPages.every((page) => page.text.length === 0)) {
      throw new PdfExtractionFailedError(
        filePath,
        "no extractable text (likely a scanned or image-based PDF)"
      );
    }

    const fullText = normalizedPages.map((page) => `\n${pageMarker(page.pageNum)}\n${page.text}`).join("");
    console.log(`[input] ${sourceFilename}: ${normalizedPages.length} page(s), ${fullText.length} chars`);

    return {
      sourceFilename,
      fullText,
      pages: normalizedPages,
      pageCount: normalizedPages.length
    };
  }
}

export async function listPdfFiles(directory: string): Promise<string[]> {
  await mkdir(directory, { recursive: true });

  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".pdf"))
    .map((entry) => path.join(directory, entry.name))
    .sort();
}

async function loadPagesWithPdfParse(data: Uint8Array): Promise<PdfPageText[]> {
  const { PDFParse } = await import("pdf-parse");
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    return result.pages.map((page) => ({ pageNum: page.num, text: page.text }));
  } finally {
    await parser.destroy();
  }
}
