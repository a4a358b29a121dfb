import type { BillDocument } from "../types.js";

const MAX_TITLE_LENGTH = 120;

/**
 * Builds a BillDocument from per-page text in page order.
 * `null` marks a page that could not be decoded; it contributes no text.
 * A `title` (the PDF's own metadata title) wins over the first line of text.
 * Never throws: a document without text is rejected later by the validator.
 */
export function parseDocument(
  pages: ReadonlyArray<string | null | undefined>,
  options: { id?: string; filename: string; title?: string }
): BillDocument {
  const normalized = pages.map((p) => (p ?? "").normalize("NFC"));
  const withText = normalized.filter((p) => p.trim().length > 0);
  const text = withText.join("\n").trim();

  return {
    id: options.id ?? crypto.randomUUID(),
    filename: options.filename,
    title: boundedTitle(options.title) ?? extractTitle(text),
    pages: normalized,
    pageCount: normalized.length,
    extractedPageCount: withText.length,
    text,
  };
}

/** Bounded prefix used to cap validation cost on very large bills. */
export function previewOf(text: string, limit: number): string {
  return text.length <= limit ? text : text.slice(0, limit);
}

function extractTitle(text: string): string {
  // Take first non-empty line as title
  const firstLine = text.split("\n").find((l) => l.trim().length > 0);
  return boundedTitle(firstLine) ?? "Untitled Bill";
}

function boundedTitle(title: string | undefined): string | undefined {
  const trimmed = title?.normalize("NFC").trim();
  return trimmed ? trimmed.slice(0, MAX_TITLE_LENGTH) : undefined;
}
