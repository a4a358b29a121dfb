import { readFileSync } from "node:fs";
import type { BillDocument } from "../types.js";
import { BILL_SECTIONS, IMPACT_GROUPS, type SectionSchema } from "./sectionExtractor.js";

export const DEFAULT_PROMPT_CHAR_LIMIT = 12_000;

export const AUDIENCE =
  "8th grade school students and common citizens, so use simple language for non-experts";

/** The model is told to reply with exactly this when the bill is silent. */
export const ANSWER_NOT_FOUND = "The bill text does not say.";

const FORMAT_RULES = [
  "Use only the bill text",
  "Do not assume facts",
  "Keep language simple",
  "Do not use markdown emphasis such as ** or ##",
  'Start every bullet point with "- "',
];

export type TemplateName = "analysis" | "question";

export interface PromptOptions {
  /** Maximum characters of bill text interpolated into the prompt */
  charLimit?: number;
  /** Template text overriding the bundled asset */
  template?: string;
}

export interface BuiltPrompt {
  prompt: string;
  truncated: boolean;
}

// ── Templates ─────────────────────────────────────────────────────────────────

const templateCache = new Map<TemplateName, string>();

/** Reads `prompts/<name>.txt` from the project root. */
export function loadPromptTemplate(name: TemplateName): string {
  const cached = templateCache.get(name);
  if (cached !== undefined) return cached;

  const template = readFileSync(
    new URL(`../../prompts/${name}.txt`, import.meta.url),
    "utf8"
  );
  templateCache.set(name, template);
  return template;
}

/**
 * Replaces `{{name}}` placeholders in a single pass, so values containing
 * braces are never re-expanded.
 *
 * @throws Error when the template uses a placeholder with no value
 */
export function renderTemplate(
  template: string,
  values: Readonly<Record<string, string>>
): string {
  return template.replace(/\{\{\s*([a-zA-Z][\w]*)\s*\}\}/g, (_, name: string) => {
    const value = values[name];
    if (value === undefined) {
      throw new Error(`No value for template placeholder "{{${name}}}"`);
    }
    return value;
  });
}

export function truncateForPrompt(
  text: string,
  limit: number
): { text: string; truncated: boolean; originalLength: number } {
  return {
    text: text.length > limit ? text.slice(0, limit) : text,
    truncated: text.length > limit,
    originalLength: text.length,
  };
}

// ── Prompts ───────────────────────────────────────────────────────────────────

/**
 * Renders the section list from the same schemas the extractor uses, so the
 * headers in the prompt match the parser character for character.
 */
export function renderSectionInstructions(): string {
  return BILL_SECTIONS.order
    .map((key) => {
      const block = renderBlock(BILL_SECTIONS, key);
      return key === "impactAnalysis"
        ? [block, ...IMPACT_GROUPS.order.map((g) => renderBlock(IMPACT_GROUPS, g))].join("\n\n")
        : block;
    })
    .join("\n\n");
}

export function buildAnalysisPrompt(
  doc: BillDocument,
  options: PromptOptions = {}
): BuiltPrompt {
  const bounded = truncateForPrompt(doc.text, options.charLimit ?? DEFAULT_PROMPT_CHAR_LIMIT);
  const prompt = renderTemplate(options.template ?? loadPromptTemplate("analysis"), {
    audience: AUDIENCE,
    sections: renderSectionInstructions(),
    rules: FORMAT_RULES.map((r) => `- ${r}`).join("\n"),
    document: bounded.text,
  });
  return { prompt, truncated: bounded.truncated };
}

/** Follow-up questions are answered from the bill's own text, not the analysis. */
export function buildQuestionPrompt(
  doc: BillDocument,
  question: string,
  options: PromptOptions = {}
): BuiltPrompt {
  const bounded = truncateForPrompt(doc.text, options.charLimit ?? DEFAULT_PROMPT_CHAR_LIMIT);
  const prompt = renderTemplate(options.template ?? loadPromptTemplate("question"), {
    audience: AUDIENCE,
    notFound: ANSWER_NOT_FOUND,
    document: bounded.text,
    question: question.trim(),
  });
  return { prompt, truncated: bounded.truncated };
}

function renderBlock<K extends string>(schema: SectionSchema<K>, key: K): string {
  const def = schema.definitions[key];
  return [def.header, ...def.instructions].join("\n");
}
