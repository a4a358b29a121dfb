// ── Document ──────────────────────────────────────────────────────────────────

export interface BillDocument {
  id: string;
  filename: string;
  title: string;
  /** One entry per PDF page; pages that failed to decode are empty strings */
  pages: string[];
  pageCount: number;
  /** Pages that yielded any text */
  extractedPageCount: number;
  text: string;
}

// ── Validation ────────────────────────────────────────────────────────────────

export type ValidationClassification =
  | "accepted"
  | "likely"
  | "example"
  | "too_short"
  | "invalid";

export type ValidationMode = "standard" | "strict";

export type IndicatorCategory = "identity" | "institution" | "action";

export interface ValidationResult {
  accepted: boolean;
  reason: string;
  classification: ValidationClassification;
  strongIndicatorCount: number;
  keywordCount: number;
  matchedIndicators: string[];
  matchedKeywords: string[];
  /** Only populated in strict mode */
  missingCategories: IndicatorCategory[];
}

// ── Sections ──────────────────────────────────────────────────────────────────

export type BillSectionKey =
  | "sector"
  | "objective"
  | "detailedSummary"
  | "impactAnalysis"
  | "beneficiaries"
  | "affectedGroups"
  | "positives"
  | "risks";

export type ImpactGroupKey =
  | "citizens"
  | "businesses"
  | "government"
  | "industries"
  | "civilSociety";

export interface SectionDefinition<K extends string = string> {
  key: K;
  /** Exact header the model is told to emit, trailing colon included */
  header: string;
  label: string;
  /** Instruction lines placed under the header in the prompt */
  instructions: string[];
}

/** Every key maps to extracted text or the "not available" sentinel */
export type SectionMap<K extends string = string> = Readonly<Record<K, string>>;

// ── Analysis ──────────────────────────────────────────────────────────────────

export interface RejectedAnalysis {
  status: "rejected";
  validation: ValidationResult;
}

export interface CompletedAnalysis {
  status: "completed";
  validation: ValidationResult;
  /** True when the user overrode a rejected validation */
  forced: boolean;
  /** Raw model output */
  response: string;
  sections: SectionMap<BillSectionKey>;
  impact: SectionMap<ImpactGroupKey>;
  /** Section keys the model did not produce */
  missing: BillSectionKey[];
  model: string;
  promptTruncated: boolean;
  durationMs: number;
}

export type AnalysisRun = RejectedAnalysis | CompletedAnalysis;
