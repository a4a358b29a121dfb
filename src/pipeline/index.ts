import type { LanguageModelClient } from "../llm/client.js";
import type { AnalysisRun, BillDocument } from "../types.js";
import { validateBill, type ValidatorOptions } from "./billValidator.js";
import { buildAnalysisPrompt, buildQuestionPrompt } from "./promptBuilder.js";
import {
  BILL_SECTIONS,
  extractBillSections,
  extractImpactGroups,
  missingSections,
} from "./sectionExtractor.js";

export interface AnalysisOptions {
  validation?: ValidatorOptions;
  /** Characters of bill text sent to the model */
  promptCharLimit?: number;
  /** Proceed even when the validator rejects the document */
  force?: boolean;
}

/**
 * Full analysis flow:
 *   1. Validate the document text (no model call on rejection unless forced)
 *   2. Build the analysis prompt from the truncated bill text
 *   3. Invoke the model once
 *   4. Slice the reply into sections and impact groups
 *
 * Model failures propagate as LlmFailedError.
 */
export async function runAnalysis(
  doc: BillDocument,
  client: LanguageModelClient,
  options: AnalysisOptions = {}
): Promise<AnalysisRun> {
  const start = performance.now();
  const validation = validateBill(doc.text, options.validation);

  if (!validation.accepted && !options.force) {
    return { status: "rejected", validation };
  }

  const { prompt, truncated } = buildAnalysisPrompt(doc, { charLimit: options.promptCharLimit });
  const response = await client.invoke(prompt);

  const sections = extractBillSections(response);
  return {
    status: "completed",
    validation,
    forced: !validation.accepted,
    response,
    sections,
    impact: extractImpactGroups(sections.impactAnalysis),
    missing: missingSections(sections, BILL_SECTIONS),
    model: client.model,
    promptTruncated: truncated,
    durationMs: performance.now() - start,
  };
}

/** Answers a follow-up question from the bill text. */
export async function answerQuestion(
  doc: BillDocument,
  question: string,
  client: LanguageModelClient,
  options: { promptCharLimit?: number } = {}
): Promise<string> {
  const { prompt } = buildQuestionPrompt(doc, question, { charLimit: options.promptCharLimit });
  const answer = await client.invoke(prompt);
  return answer.trim();
}
