import { describe, expect, it } from "vitest";
import {
  layoutSummaryLines,
  linesPerPage,
  paginateLines,
  renderSummaryPdf,
  toWinAnsi,
} from "../../src/pipeline/pdfExporter.js";

describe("L5 · pdfExporter", () => {
  describe("layoutSummaryLines", () => {
    it("renders list markers as a bullet glyph", () => {
      expect(layoutSummaryLines("- one\n* two\n\u2022 three\nplain")).toEqual([
        "\u2022 one",
        "\u2022 two",
        "\u2022 three",
        "plain",
      ]);
    });

    it("keeps the indentation of nested bullets", () => {
      expect(layoutSummaryLines("  * nested")).toEqual(["  \u2022 nested"]);
    });

    it("leaves a leading dash without a space alone", () => {
      expect(layoutSummaryLines("-5 per cent duty")).toEqual(["-5 per cent duty"]);
    });

    it("writes rupee amounts the standard font can encode", () => {
      expect(layoutSummaryLines("- Sets aside \u20b9500 crore for ports")).toEqual([
        "\u2022 Sets aside Rs. 500 crore for ports",
      ]);
    });

    it("keeps blank lines and normalizes CRLF", () => {
      expect(layoutSummaryLines("a\r\n\r\nb")).toEqual(["a", "", "b"]);
    });

    it("wraps long lines at word boundaries", () => {
      expect(layoutSummaryLines("aaa bbb ccc", { maxCharsPerLine: 7 })).toEqual([
        "aaa bbb",
        "ccc",
      ]);
    });

    it("hard-splits a word longer than the line", () => {
      expect(layoutSummaryLines("abcdefghij", { maxCharsPerLine: 4 })).toEqual([
        "abcd",
        "efgh",
        "ij",
      ]);
    });

    it("never produces a line longer than the limit", () => {
      const text = "word ".repeat(80) + "x".repeat(250);
      const lines = layoutSummaryLines(text);
      expect(lines.every((l) => l.length <= 100)).toBe(true);
    });

    it("rejects a line width below two characters", () => {
      expect(() => layoutSummaryLines("abc", { maxCharsPerLine: 1 })).toThrow(RangeError);
    });
  });

  describe("toWinAnsi", () => {
    it("replaces the rupee sign with Rs.", () => {
      expect(toWinAnsi("\u20b9500 crore")).toBe("Rs. 500 crore");
      expect(toWinAnsi("\u20b9 500 crore")).toBe("Rs. 500 crore");
    });

    it("keeps characters WinAnsi already covers", () => {
      const text = "Caf\u00e9 \u201cquoted\u201d \u2013 clause 5 \u2022 \u20ac10";
      expect(toWinAnsi(text)).toBe(text);
    });

    it("gives common symbols ASCII stand-ins", () => {
      expect(toWinAnsi("x \u2212 y \u2264 3 \u2192 z\tend")).toBe("x - y <= 3 -> z end");
    });

    it("drops accents outside Latin-1", () => {
      expect(toWinAnsi("D\u0101man and D\u012bu")).toBe("Daman and Diu");
    });

    it("collapses each run of unencodable text to one mark", () => {
      expect(toWinAnsi("Rajya Sabha (\u0930\u093e\u091c\u094d\u092f \u0938\u092d\u093e)")).toBe(
        "Rajya Sabha (? ?)"
      );
    });
  });

  describe("pagination", () => {
    it("fits 55 lines on an A4 page", () => {
      expect(linesPerPage()).toBe(55);
    });

    it("splits lines into pages in order", () => {
      const lines = Array.from({ length: 120 }, (_, i) => `line ${i}`);
      const pages = paginateLines(lines);

      expect(pages.map((p) => p.length)).toEqual([55, 55, 10]);
      expect(pages[1]?.[0]).toBe("line 55");
      expect(pages.flat()).toEqual(lines);
    });

    it("returns a single empty page for no lines", () => {
      expect(paginateLines([])).toEqual([[]]);
    });
  });

  it("renderSummaryPdf produces PDF bytes", () => {
    const bytes = renderSummaryPdf("- Creates a licence for coastal trade");
    const header = new TextDecoder().decode(bytes.subarray(0, 5));

    expect(header).toBe("%PDF-");
    expect(bytes.length).toBeGreaterThan(100);
  });
});
