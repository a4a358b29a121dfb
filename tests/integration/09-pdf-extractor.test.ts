import { jsPDF } from "jspdf";
import { describe, expect, it } from "vitest";
import { CorruptDocumentError, EncryptedDocumentError } from "../../src/errors.js";
import { parseDocument } from "../../src/pipeline/documentParser.js";
import { extractPdfPages } from "../../src/pipeline/pdfExtractor.js";
import { layoutSummaryLines, renderSummaryPdf } from "../../src/pipeline/pdfExporter.js";

function pdfWithPages(pages: string[][], title?: string): Uint8Array {
  const doc = new jsPDF({ unit: "pt", format: "a4" });
  if (title) doc.setProperties({ title });
  pages.forEach((lines, index) => {
    if (index > 0) doc.addPage();
    lines.forEach((line, row) => doc.text(line, 40, 800 - row * 14));
  });
  return new Uint8Array(doc.output("arraybuffer"));
}

describe("L9 · pdfExtractor (integration)", () => {
  it("extracts text page by page", async () => {
    const bytes = pdfWithPages(
      [["A BILL to regulate coastal shipping"], ["Statement of Objects and Reasons"]],
      "Coastal Shipping Bill"
    );

    const result = await extractPdfPages(bytes);

    expect(result.pageCount).toBe(2);
    expect(result.pages[0]).toContain("A BILL to regulate coastal shipping");
    expect(result.pages[1]).toContain("Statement of Objects and Reasons");
    expect(result.metadata.title).toBe("Coastal Shipping Bill");
  });

  it("feeds parseDocument with text in page order", async () => {
    const { pages } = await extractPdfPages(pdfWithPages([["First page text"], ["Second page text"]]));
    const doc = parseDocument(pages, { filename: "two-pages.pdf" });

    expect(doc.extractedPageCount).toBe(2);
    expect(doc.text.indexOf("First page text")).toBeLessThan(doc.text.indexOf("Second page text"));
  });

  it("reads back exported summary lines in their original order", async () => {
    const summary = [
      "Creates a licence for coastal trade",
      "Sets up a national coastal shipping plan",
      "Allows foreign ships only with permission",
    ].join("\n");

    const { pages } = await extractPdfPages(renderSummaryPdf(summary));
    const text = pages.join("\n");
    const positions = layoutSummaryLines(summary).map((line) => text.indexOf(line));

    expect(positions.every((p) => p >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it("reads back bullets, rupee amounts and Devanagari from an exported summary", async () => {
    const summary = [
      "- Sets aside \u20b9500 crore for ports",
      "- Short title in Hindi: \u0924\u091f\u0940\u092f \u0928\u094c\u0935\u0939\u0928",
    ].join("\n");

    const { pages } = await extractPdfPages(renderSummaryPdf(summary));
    const text = pages.join("\n");
    const lines = layoutSummaryLines(summary);

    expect(lines).toEqual([
      "\u2022 Sets aside Rs. 500 crore for ports",
      "\u2022 Short title in Hindi: ? ?",
    ]);
    for (const line of lines) {
      expect(text).toContain(line);
    }
  });

  it("prefers the metadata title over the first line of text", async () => {
    const result = await extractPdfPages(
      pdfWithPages([["BILL No. 12 of 2024"]], "The Coastal Shipping Bill, 2024")
    );
    const doc = parseDocument(result.pages, {
      filename: "coastal.pdf",
      title: result.metadata.title,
    });

    expect(doc.title).toBe("The Coastal Shipping Bill, 2024");
  });

  it("exports long summaries across several pages", async () => {
    const summary = Array.from({ length: 60 }, (_, i) => `Summary line ${i}`).join("\n");

    const result = await extractPdfPages(renderSummaryPdf(summary));

    expect(result.pageCount).toBe(2);
    expect(result.pages[0]).toContain("Summary line 0");
    expect(result.pages[1]).toContain("Summary line 59");
  });

  it("rejects bytes that are not a PDF", async () => {
    await expect(
      extractPdfPages(new TextEncoder().encode("Invoice #4521, due April 2024"))
    ).rejects.toBeInstanceOf(CorruptDocumentError);
  });

  it("reports password-protected PDFs", async () => {
    const doc = new jsPDF({
      encryption: { userPassword: "test-secret", ownerPassword: "test-secret", userPermissions: ["print"] },
    });
    doc.text("Restricted bill", 40, 40);

    await expect(
      extractPdfPages(new Uint8Array(doc.output("arraybuffer")))
    ).rejects.toBeInstanceOf(EncryptedDocumentError);
  });
});
