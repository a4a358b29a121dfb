import type {
  BillSectionKey,
  ImpactGroupKey,
  SectionDefinition,
  SectionMap,
} from "../types.js";

/** Returned when a requested header does not occur in the model output. */
export const SECTION_NOT_AVAILABLE = "Not available";

export interface ExtractOptions {
  /** Strip stray markdown emphasis markers (default true) */
  clean?: boolean;
}

export interface SectionSchema<K extends string> {
  order: readonly K[];
  definitions: Readonly<Record<K, SectionDefinition<K>>>;
  /** Headers in document order */
  headers: readonly string[];
}

/**
 * Checks a header set for the invariants extraction relies on: no duplicates
 * and no header contained in another (case-insensitive). Throws on violation.
 */
export function defineSectionSchema<K extends string>(
  order: readonly K[],
  definitions: Record<K, SectionDefinition<K>>
): SectionSchema<K> {
  if (order.length === 0) {
    throw new Error("Section schema must define at least one header");
  }
  const headers = order.map((key) => definitions[key].header);

  headers.forEach((a, i) => {
    headers.forEach((b, j) => {
      if (i !== j && b.toLowerCase().includes(a.toLowerCase())) {
        throw new Error(`Section header "${a}" overlaps with "${b}"`);
      }
    });
  });

  return { order, definitions, headers };
}

// ── Schemas ───────────────────────────────────────────────────────────────────

export const BILL_SECTIONS = defineSectionSchema<BillSectionKey>(
  [
    "sector",
    "objective",
    "detailedSummary",
    "impactAnalysis",
    "beneficiaries",
    "affectedGroups",
    "positives",
    "risks",
  ],
  {
    sector: {
      key: "sector",
      header: "SECTOR:",
      label: "Sector",
      instructions: [
        "One word primary sector (e.g., Finance, Agriculture, Transport, Energy, Shipping).",
      ],
    },
    objective: {
      key: "objective",
      header: "OBJECTIVE:",
      label: "Objective",
      instructions: ["Explain the main objective of this bill in 3-4 simple lines."],
    },
    detailedSummary: {
      key: "detailedSummary",
      header: "DETAILED SUMMARY:",
      label: "Detailed Summary",
      instructions: [
        "Provide a 10-20 bullet point explanation:",
        "- What the bill does",
        "- Why it matters",
        "- What changes for a normal person",
      ],
    },
    impactAnalysis: {
      key: "impactAnalysis",
      header: "IMPACT ANALYSIS:",
      label: "Impact Analysis",
      instructions: ["Explain the impact separately for each group below."],
    },
    beneficiaries: {
      key: "beneficiaries",
      header: "BENEFICIARIES:",
      label: "Beneficiaries",
      instructions: [
        "Which sectors benefit.",
        "Which sectors get new business or growth opportunities.",
      ],
    },
    affectedGroups: {
      key: "affectedGroups",
      header: "AFFECTED GROUPS:",
      label: "Affected Groups",
      instructions: [
        "Which sectors face restrictions.",
        "Which sectors face higher costs, compliance, or limitations.",
      ],
    },
    positives: {
      key: "positives",
      header: "POSITIVES:",
      label: "Positives",
      instructions: ["Bullet points focusing on advantages and opportunities."],
    },
    risks: {
      key: "risks",
      header: "NEGATIVES / RISKS:",
      label: "Negatives / Risks",
      instructions: [
        "Bullet points focusing on risks, costs, resistance, or implementation challenges.",
      ],
    },
  }
);

/** Sub-headers inside the IMPACT ANALYSIS section. */
export const IMPACT_GROUPS = defineSectionSchema<ImpactGroupKey>(
  ["citizens", "businesses", "government", "industries", "civilSociety"],
  {
    citizens: { key: "citizens", header: "Citizens:", label: "Citizens", instructions: ["(Bullet points)"] },
    businesses: { key: "businesses", header: "Businesses:", label: "Businesses", instructions: ["(Bullet points)"] },
    government: { key: "government", header: "Government:", label: "Government", instructions: ["(Bullet points)"] },
    industries: {
      key: "industries",
      header: "Industries / Markets:",
      label: "Industries / Markets",
      instructions: ["(Bullet points)"],
    },
    civilSociety: {
      key: "civilSociety",
      header: "NGOs / Civil Society:",
      label: "NGOs / Civil Society",
      instructions: ["(Bullet points)"],
    },
  }
);

// ── Extraction ────────────────────────────────────────────────────────────────

interface HeaderMatch {
  start: number;
  end: number;
}

/**
 * Returns the text between the first occurrence of `targetHeader` and the
 * earliest following occurrence of any other header in `orderedHeaders`.
 * Missing header → SECTION_NOT_AVAILABLE; a present but empty section → "".
 */
export function extractSection(
  analysisText: string,
  targetHeader: string,
  orderedHeaders: readonly string[],
  options: ExtractOptions = {}
): string {
  const target = locateHeader(analysisText, targetHeader, 0);
  if (!target) return SECTION_NOT_AVAILABLE;

  let cut = analysisText.length;
  for (const header of orderedHeaders) {
    if (header === targetHeader) continue;
    const next = locateHeader(analysisText, header, target.end);
    if (next && next.start < cut) cut = next.start;
  }

  const raw = analysisText.slice(target.end, cut);
  return (options.clean ?? true) ? stripMarkdown(raw).trim() : raw.trim();
}

export function extractBillSections(
  analysisText: string,
  options?: ExtractOptions
): SectionMap<BillSectionKey> {
  const section = (key: BillSectionKey) =>
    extractSection(analysisText, BILL_SECTIONS.definitions[key].header, BILL_SECTIONS.headers, options);

  return {
    sector: section("sector"),
    objective: section("objective"),
    detailedSummary: section("detailedSummary"),
    impactAnalysis: section("impactAnalysis"),
    beneficiaries: section("beneficiaries"),
    affectedGroups: section("affectedGroups"),
    positives: section("positives"),
    risks: section("risks"),
  };
}

/** Splits the impact analysis text into per-group paragraphs. */
export function extractImpactGroups(
  impactText: string,
  options?: ExtractOptions
): SectionMap<ImpactGroupKey> {
  const group = (key: ImpactGroupKey) =>
    impactText === SECTION_NOT_AVAILABLE
      ? SECTION_NOT_AVAILABLE
      : extractSection(impactText, IMPACT_GROUPS.definitions[key].header, IMPACT_GROUPS.headers, options);

  return {
    citizens: group("citizens"),
    businesses: group("businesses"),
    government: group("government"),
    industries: group("industries"),
    civilSociety: group("civilSociety"),
  };
}

/** Keys whose value is the sentinel, in schema order. */
export function missingSections<K extends string>(
  map: SectionMap<K>,
  schema: SectionSchema<K>
): K[] {
  return schema.order.filter((key) => map[key] === SECTION_NOT_AVAILABLE);
}

/**
 * A header that starts a line anywhere in the text (case-insensitive,
 * markdown markers and a missing colon tolerated) is only ever matched at a
 * line start, so the same words inside another section's prose are not taken
 * for it. A header that never starts a line falls back to its first exact
 * occurrence, for replies that run every section together on one line.
 */
function locateHeader(text: string, header: string, from: number): HeaderMatch | null {
  if (lineStartMatch(text, header, 0) !== null) {
    return lineStartMatch(text, header, from);
  }

  const exact = text.indexOf(header, from);
  return exact >= 0 ? { start: exact, end: exact + header.length } : null;
}

function lineStartMatch(text: string, header: string, from: number): HeaderMatch | null {
  const pattern = headerVariantPattern(header);
  pattern.lastIndex = from;
  const m = pattern.exec(text);
  if (!m) return null;

  const lineStart = m.index + (m[1]?.length ?? 0);
  return { start: lineStart, end: m.index + m[0].length };
}

function headerVariantPattern(header: string): RegExp {
  const name = header.replace(/:\s*$/, "").trim();
  const body = escapeRegExp(name).replace(/\s+/g, "\\s*");
  // Either a colon follows, or the name is alone on its line
  return new RegExp(
    `(^|\\n)[ \\t>#*_]*${body}(?![A-Za-z])[ \\t*_]*(?::[ \\t*_]*|(?=[ \\t]*(?:\\r?\\n|$)))`,
    "gi"
  );
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

function stripMarkdown(s: string): string {
  return s
    .replace(/#{2,3}/g, "")
    .replace(/\*\*|__/g, "")
    .replace(/\*/g, "");
}
