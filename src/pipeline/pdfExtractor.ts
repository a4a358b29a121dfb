/**
 * PDF text extraction, one string per page.
 *
 * Uses unpdf (serverless PDF.js build). A page that fails to decode is logged
 * and recorded as `null` so the rest of the bill still comes through.
 */

import { getDocumentProxy, getMeta } from "unpdf";
import { CorruptDocumentError, EncryptedDocumentError } from "../errors.js";
import { logger } from "../logger.js";

export interface PdfMetadata {
  /** Document title from the info dictionary, preferred over the first line */
  title?: string;
}

export interface PdfExtraction {
  /** Page text in page order; `null` where a page could not be decoded */
  pages: Array<string | null>;
  pageCount: number;
  metadata: PdfMetadata;
}

/**
 * @throws EncryptedDocumentError - Password-protected PDF
 * @throws CorruptDocumentError - Not a PDF, or unreadable structure
 */
export async function extractPdfPages(bytes: Uint8Array): Promise<PdfExtraction> {
  const pdf = await loadPdf(bytes);

  try {
    const pages: Array<string | null> = [];
    for (let n = 1; n <= pdf.numPages; n++) {
      try {
        const page = await pdf.getPage(n);
        const content = await page.getTextContent();
        pages.push(
          content.items
            .map((item) => ("str" in item ? item.str + (item.hasEOL ? "\n" : "") : ""))
            .join("")
        );
      } catch (error: unknown) {
        logger.warn("Skipping unreadable PDF page", {
          page: n,
          error: error instanceof Error ? error.message : String(error),
        });
        pages.push(null);
      }
    }

    return { pages, pageCount: pdf.numPages, metadata: await readMetadata(pdf) };
  } finally {
    await pdf.destroy();
  }
}

type PdfProxy = Awaited<ReturnType<typeof getDocumentProxy>>;

async function loadPdf(bytes: Uint8Array): Promise<PdfProxy> {
  try {
    // PDF.js may detach the buffer it is given; hand it a copy
    return await getDocumentProxy(new Uint8Array(bytes));
  } catch (error: unknown) {
    const name = error instanceof Error ? error.name : "";
    const message = error instanceof Error ? error.message.toLowerCase() : String(error);

    if (name === "PasswordException" || message.includes("password")) {
      throw new EncryptedDocumentError();
    }
    logger.warn("PDF could not be opened", { error: message });
    throw new CorruptDocumentError();
  }
}

async function readMetadata(pdf: PdfProxy): Promise<PdfMetadata> {
  try {
    const { info } = await getMeta(pdf);
    const record: Record<string, unknown> = info ?? {};
    return {
      title: typeof record.Title === "string" && record.Title.trim() ? record.Title : undefined,
    };
  } catch (error: unknown) {
    // Metadata is optional; the text is what matters
    logger.warn("PDF metadata unreadable", {
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }
}
