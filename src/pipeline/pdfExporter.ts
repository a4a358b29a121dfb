import { jsPDF } from "jspdf";

export const DEFAULT_MAX_CHARS_PER_LINE = 100;

const BULLET = "\u2022 ";

/** Code points 0x80-0x9F of WinAnsiEncoding, the rest mirrors Latin-1 */
const WIN_ANSI_EXTRAS = new Set(
  "\u20ac\u201a\u0192\u201e\u2026\u2020\u2021\u02c6\u2030\u0160\u2039\u0152\u017d" +
    "\u2018\u2019\u201c\u201d\u2022\u2013\u2014\u02dc\u2122\u0161\u203a\u0153\u017e\u0178"
);

const GLYPH_SUBSTITUTES = new Map<string, string>([
  ["\t", " "],
  ["\u2010", "-"],
  ["\u2011", "-"],
  ["\u2212", "-"],
  ["\u2192", "->"],
  ["\u2264", "<="],
  ["\u2265", ">="],
]);

/** Written in place of a run of characters the standard fonts cannot show */
export const UNENCODABLE_MARK = "?";

/** A4 portrait in points, baseline-to-baseline layout */
const PAGE = {
  format: "a4",
  marginLeft: 40,
  top: 800,
  bottom: 40,
  lineHeight: 14,
  fontSize: 10,
} as const;

export interface PdfExportOptions {
  maxCharsPerLine?: number;
}

/**
 * Lines exactly as they will be written: `-`, `*` and `•` list markers
 * rendered as a bullet glyph, text reduced to what the built-in Helvetica
 * can encode (see {@link toWinAnsi}), long lines wrapped at word boundaries
 * (hard-split when a single word is longer than the limit). Blank lines are
 * kept.
 */
export function layoutSummaryLines(
  text: string,
  options: PdfExportOptions = {}
): string[] {
  const max = options.maxCharsPerLine ?? DEFAULT_MAX_CHARS_PER_LINE;
  if (max < 2) throw new RangeError("maxCharsPerLine must be at least 2");

  return text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => toWinAnsi(line).trimEnd().replace(/^(\s*)[-*\u2022]\s+/, `$1${BULLET}`))
    .flatMap((line) => wrapLine(line, max));
}

export function linesPerPage(): number {
  return Math.floor((PAGE.top - PAGE.bottom) / PAGE.lineHeight) + 1;
}

export function paginateLines(lines: readonly string[], perPage = linesPerPage()): string[][] {
  const pages: string[][] = [];
  for (let i = 0; i < lines.length; i += perPage) {
    pages.push(lines.slice(i, i + perPage));
  }
  return pages.length > 0 ? pages : [[]];
}

/** Renders the detailed summary as a plain-text A4 PDF. */
export function renderSummaryPdf(text: string, options: PdfExportOptions = {}): Uint8Array {
  const doc = new jsPDF({ unit: "pt", format: PAGE.format });
  doc.setFont("helvetica", "normal");
  doc.setFontSize(PAGE.fontSize);

  paginateLines(layoutSummaryLines(text, options)).forEach((page, index) => {
    if (index > 0) doc.addPage();
    page.forEach((line, row) => {
      if (line.length > 0) {
        doc.text(line, PAGE.marginLeft, PAGE.top - row * PAGE.lineHeight);
      }
    });
  });

  return new Uint8Array(doc.output("arraybuffer"));
}

/**
 * jsPDF's standard fonts are WinAnsi-encoded; anything outside that set is
 * written as garbage. The rupee sign becomes `Rs.`, a few symbols get ASCII
 * stand-ins, accented letters lose their marks, and whatever is left
 * collapses to one {@link UNENCODABLE_MARK} per run.
 */
export function toWinAnsi(text: string): string {
  let out = "";
  let inRun = false;
  for (const ch of text.replace(/\u20b9\s*/g, "Rs. ")) {
    const encoded = encodeChar(ch);
    if (encoded === null) {
      if (!inRun) out += UNENCODABLE_MARK;
      inRun = true;
    } else {
      out += encoded;
      inRun = false;
    }
  }
  return out;
}

function encodeChar(ch: string): string | null {
  if (isWinAnsi(ch)) return ch;
  const substitute = GLYPH_SUBSTITUTES.get(ch);
  if (substitute !== undefined) return substitute;

  const base = ch.normalize("NFKD").replace(/\p{M}/gu, "");
  return base.length > 0 && [...base].every(isWinAnsi) ? base : null;
}

function isWinAnsi(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return (code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff) || WIN_ANSI_EXTRAS.has(ch);
}

function wrapLine(line: string, max: number): string[] {
  if (line.length <= max) return [line];

  const out: string[] = [];
  let current = "";
  for (const word of line.split(/\s+/).filter(Boolean)) {
    if (current && current.length + 1 + word.length <= max) {
      current += ` ${word}`;
      continue;
    }
    if (current) out.push(current);
    current = word;
    while (current.length > max) {
      out.push(current.slice(0, max));
      current = current.slice(max);
    }
  }
  if (current) out.push(current);
  return out;
}
