import type {
  IndicatorCategory,
  ValidationMode,
  ValidationResult,
} from "../types.js";
import { previewOf } from "./documentParser.js";

export const DEFAULT_MIN_CHARS = 200;
export const DEFAULT_PREVIEW_CHARS = 15_000;

/** Decision table thresholds */
const ACCEPT = { strong: 2, keywords: 5 } as const;
const LIKELY = { strong: 1, keywords: 3 } as const;

export interface ValidatorOptions {
  minChars?: number;
  previewChars?: number;
  mode?: ValidationMode;
}

type Scores = Omit<ValidationResult, "accepted" | "reason" | "classification">;

interface Indicator {
  label: string;
  pattern: RegExp;
}

// ── Pattern tables ────────────────────────────────────────────────────────────

/** Instructional or sample text; rejects even when legislative words appear. */
const EXAMPLE_PATTERNS: Indicator[] = [
  { label: "question/answer block", pattern: /\bquestion\s*:[\s\S]{1,800}?\banswer\s*:/i },
  { label: "example bill", pattern: /\bexample bill\b/i },
  { label: "sample bill", pattern: /\bsample bill\b/i },
  { label: "test document", pattern: /\btest document\b/i },
  { label: "for demonstration purposes", pattern: /\bfor demonstration purposes\b/i },
];

/** High-confidence bill phrasing, matched against lower-cased text. */
const STRONG_INDICATORS: Indicator[] = [
  { label: "a bill to", pattern: /\ba bill to\s/ },
  { label: "bill no.", pattern: /\bbill no\.?\s*\d+/ },
  { label: "introduced in lok/rajya sabha", pattern: /\bintroduced in (?:the )?(?:lok|rajya) sabha\b/ },
  { label: "statement of objects and reasons", pattern: /\bstatement of objects and reasons\b/ },
  { label: "financial memorandum", pattern: /\bfinancial memorandum\b/ },
  { label: "be it enacted", pattern: /\bbe it enacted\b/ },
  { label: "arrangement of clauses", pattern: /\barrangement of clauses\b/ },
  { label: "this act may be called", pattern: /\bthis act may be called\b/ },
  { label: "memorandum regarding delegated legislation", pattern: /\bmemorandum regarding delegated legislation\b/ },
];

const KEYWORDS = [
  "bill",
  "act",
  "parliament",
  "lok sabha",
  "rajya sabha",
  "gazette",
  "legislative",
  "enacted",
  "ministry of law",
  "short title",
  "commencement",
  "clause",
  "amendment",
  "legislature",
  "minister",
  "schedule",
  // Hindi transliterations: bill, act, parliament
  "vidheyak",
  "adhiniyam",
  "sansad",
] as const;

const KEYWORD_PATTERNS: Indicator[] = KEYWORDS.map((keyword) => ({
  label: keyword,
  pattern: new RegExp(`\\b${keyword.replace(/\s+/g, "\\s+")}\\b`),
}));

const CATEGORIES: IndicatorCategory[] = ["identity", "institution", "action"];

/** Strict mode: each category needs at least one hit. */
const CATEGORY_PATTERNS: Record<IndicatorCategory, RegExp[]> = {
  identity: [
    /\ba bill to\s/,
    /\bbill no\.?\s*\d+/,
    /\bthe [a-z() ,'-]{3,120} bill,?\s+\d{4}\b/,
    /\bvidheyak\b/,
  ],
  institution: [
    /\blok sabha\b/,
    /\brajya sabha\b/,
    /\bparliament\b/,
    /\blegislative (?:assembly|council)\b/,
    /\bhouse of the people\b/,
    /\bcouncil of states\b/,
    /\bsansad\b/,
  ],
  action: [
    /\bbe it enacted\b/,
    /\bas introduced\b/,
    /\bto be introduced\b/,
    /\bintroduced in\b/,
    /\bas passed by\b/,
    /\benacted by\b/,
  ],
};

const CATEGORY_NAMES: Record<IndicatorCategory, string> = {
  identity: "bill identity (e.g. \"A Bill to…\", \"Bill No. 12 of 2024\")",
  institution: "institutional context (e.g. Lok Sabha, Rajya Sabha, Parliament)",
  action: "bill action (e.g. \"as introduced in\", \"be it enacted\")",
};

// ── Validator ─────────────────────────────────────────────────────────────────

/**
 * Decides whether extracted text is plausibly an official legislative bill.
 * Pure; never throws. Empty text is rejected by the length check.
 */
export function validateBill(
  text: string,
  options: ValidatorOptions = {}
): ValidationResult {
  const minChars = options.minChars ?? DEFAULT_MIN_CHARS;
  const previewChars = options.previewChars ?? DEFAULT_PREVIEW_CHARS;
  const mode = options.mode ?? "standard";

  const trimmed = text.trim();
  const base: Scores = {
    strongIndicatorCount: 0,
    keywordCount: 0,
    matchedIndicators: [],
    matchedKeywords: [],
    missingCategories: [],
  };

  if (trimmed.length < minChars) {
    return {
      ...base,
      accepted: false,
      classification: "too_short",
      reason:
        `Document too short: ${trimmed.length} characters found, at least ${minChars} ` +
        "are needed to detect legislative indicators.",
    };
  }

  const preview = previewOf(trimmed, previewChars);

  const example = EXAMPLE_PATTERNS.find(({ pattern }) => pattern.test(preview));
  if (example) {
    return {
      ...base,
      accepted: false,
      classification: "example",
      reason:
        `Document appears to be example/instructional text (${example.label}), ` +
        "not an official bill.",
    };
  }

  const lower = preview.toLowerCase();
  const matchedIndicators = matchLabels(STRONG_INDICATORS, lower);
  const matchedKeywords = matchLabels(KEYWORD_PATTERNS, lower);
  const strong = matchedIndicators.length;
  const keywords = matchedKeywords.length;
  const scored: Scores = {
    ...base,
    strongIndicatorCount: strong,
    keywordCount: keywords,
    matchedIndicators,
    matchedKeywords,
  };
  const counts = `${strong} strong indicators, ${keywords} keywords`;

  let classification: "accepted" | "likely";
  if (strong >= ACCEPT.strong && keywords >= ACCEPT.keywords) {
    classification = "accepted";
  } else if (strong >= LIKELY.strong && keywords >= LIKELY.keywords) {
    classification = "likely";
  } else {
    return {
      ...scored,
      accepted: false,
      classification: "invalid",
      reason:
        "Document doesn't appear to be a parliamentary bill: insufficient " +
        `legislative indicators (${counts}).`,
    };
  }

  if (mode === "strict") {
    const missingCategories = missingCategoriesIn(lower);
    if (missingCategories.length > 0) {
      return {
        ...scored,
        missingCategories,
        accepted: false,
        classification: "invalid",
        reason:
          "Document doesn't appear to be a parliamentary bill: missing " +
          missingCategories.map((c) => CATEGORY_NAMES[c]).join("; ") +
          ".",
      };
    }
  }

  return {
    ...scored,
    accepted: true,
    classification,
    reason:
      classification === "accepted"
        ? `Valid parliamentary bill (${counts}).`
        : `Possible bill (${counts}); proceeding with analysis.`,
  };
}

function matchLabels(indicators: Indicator[], text: string): string[] {
  return indicators.filter(({ pattern }) => pattern.test(text)).map((i) => i.label);
}

function missingCategoriesIn(text: string): IndicatorCategory[] {
  return CATEGORIES.filter(
    (category) => !CATEGORY_PATTERNS[category].some((p) => p.test(text))
  );
}
