import { describe, expect, it } from "vitest";
import { parseDocument, previewOf } from "../../src/pipeline/documentParser.js";

describe("L1 · documentParser", () => {
  it("joins page text in page order", () => {
    const doc = parseDocument(["First page", "Second page"], {
      id: "bill-001",
      filename: "bill.pdf",
    });

    expect(doc.id).toBe("bill-001");
    expect(doc.filename).toBe("bill.pdf");
    expect(doc.text).toBe("First page\nSecond page");
    expect(doc.pageCount).toBe(2);
    expect(doc.extractedPageCount).toBe(2);
  });

  it("treats pages that failed to decode as empty", () => {
    const doc = parseDocument(["Page one", null, undefined, "Page four"], {
      filename: "gaps.pdf",
    });

    expect(doc.text).toBe("Page one\nPage four");
    expect(doc.pages).toEqual(["Page one", "", "", "Page four"]);
    expect(doc.pageCount).toBe(4);
    expect(doc.extractedPageCount).toBe(2);
  });

  it("does not throw for a document with no text at all", () => {
    const doc = parseDocument([null, "   \n  "], { filename: "scan.pdf" });

    expect(doc.text).toBe("");
    expect(doc.title).toBe("Untitled Bill");
    expect(doc.extractedPageCount).toBe(0);
  });

  it("derives the title from the first non-empty line", () => {
    const doc = parseDocument(["\n\n  THE COASTAL SHIPPING BILL, 2024  \nBody"], {
      filename: "b.pdf",
    });
    expect(doc.title).toBe("THE COASTAL SHIPPING BILL, 2024");
  });

  it("prefers a supplied title and ignores a blank one", () => {
    const page = "BILL No. 12 of 2024\nBody";

    expect(parseDocument([page], { filename: "b.pdf", title: "  Coastal Shipping Bill  " }).title).toBe(
      "Coastal Shipping Bill"
    );
    expect(parseDocument([page], { filename: "b.pdf", title: "   " }).title).toBe("BILL No. 12 of 2024");
  });

  it("caps the title at 120 characters", () => {
    const doc = parseDocument(["T".repeat(300)], { filename: "b.pdf" });
    expect(doc.title).toHaveLength(120);
  });

  it("normalizes text to NFC", () => {
    const decomposed = "Cafe\u0301";
    const doc = parseDocument([decomposed], { filename: "b.pdf" });
    expect(doc.text).toBe("Caf\u00e9");
  });

  it("trims leading and trailing whitespace from the joined text", () => {
    const doc = parseDocument(["  \n  Bill body.  \n  "], { filename: "b.pdf" });
    expect(doc.text).toBe("Bill body.");
  });

  it("auto-generates a UUID id when none is provided", () => {
    const doc = parseDocument(["Some bill text"], { filename: "b.pdf" });
    expect(doc.id).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/
    );
  });

  it("previewOf returns a bounded prefix", () => {
    expect(previewOf("abcdef", 3)).toBe("abc");
    expect(previewOf("abc", 10)).toBe("abc");
  });
});
