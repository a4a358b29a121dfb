import { describe, expect, it } from "vitest";
import { parseDocument } from "../../src/pipeline/documentParser.js";
import {
  ANSWER_NOT_FOUND,
  AUDIENCE,
  buildAnalysisPrompt,
  buildQuestionPrompt,
  renderSectionInstructions,
  renderTemplate,
  truncateForPrompt,
} from "../../src/pipeline/promptBuilder.js";
import { BILL_SECTIONS, IMPACT_GROUPS } from "../../src/pipeline/sectionExtractor.js";
import { BILL_TEXT } from "../support/fixtures.js";

const doc = parseDocument([BILL_TEXT], { id: "bill-prompt", filename: "shipping.pdf" });

describe("L4 · promptBuilder", () => {
  describe("renderTemplate", () => {
    it("substitutes placeholders, tolerating inner whitespace", () => {
      expect(renderTemplate("Hello {{name}} and {{ other }}", { name: "A", other: "B" })).toBe(
        "Hello A and B"
      );
    });

    it("does not re-expand placeholders inside values", () => {
      expect(renderTemplate("{{a}}", { a: "{{b}}", b: "nope" })).toBe("{{b}}");
    });

    it("throws when a placeholder has no value", () => {
      expect(() => renderTemplate("{{missing}}", {})).toThrow(
        'No value for template placeholder "{{missing}}"'
      );
    });
  });

  it("truncateForPrompt keeps text under the limit untouched", () => {
    expect(truncateForPrompt("abc", 10)).toEqual({ text: "abc", truncated: false, originalLength: 3 });
    expect(truncateForPrompt("abcdef", 4)).toEqual({ text: "abcd", truncated: true, originalLength: 6 });
  });

  it("lists impact groups between IMPACT ANALYSIS and BENEFICIARIES", () => {
    const instructions = renderSectionInstructions();
    const impactAt = instructions.indexOf("IMPACT ANALYSIS:");
    const beneficiariesAt = instructions.indexOf("BENEFICIARIES:");

    for (const header of IMPACT_GROUPS.headers) {
      const at = instructions.indexOf(header);
      expect(at).toBeGreaterThan(impactAt);
      expect(at).toBeLessThan(beneficiariesAt);
    }
  });

  describe("buildAnalysisPrompt", () => {
    it("names every section header in extraction order", () => {
      const { prompt } = buildAnalysisPrompt(doc);
      const positions = BILL_SECTIONS.headers.map((h) => prompt.indexOf(h));

      expect(positions.every((p) => p >= 0)).toBe(true);
      expect([...positions].sort((a, b) => a - b)).toEqual(positions);
    });

    it("fills the bundled template with audience, rules and bill text", () => {
      const { prompt, truncated } = buildAnalysisPrompt(doc);

      expect(prompt.startsWith("You are a Public Policy Analyst.")).toBe(true);
      expect(prompt).toContain(AUDIENCE);
      expect(prompt).toContain("- Use only the bill text");
      expect(prompt).toContain(`BILL TEXT:\n${doc.text}`);
      expect(prompt).not.toMatch(/\{\{\s*\w+\s*\}\}/);
      expect(truncated).toBe(false);
    });

    it("truncates the bill text to the character limit", () => {
      const { prompt, truncated } = buildAnalysisPrompt(doc, {
        template: "DOC={{document}}",
        charLimit: 5,
      });
      expect(prompt).toBe("DOC=THE C");
      expect(truncated).toBe(true);
    });
  });

  describe("buildQuestionPrompt", () => {
    it("embeds the trimmed question and the not-found reply", () => {
      const { prompt } = buildQuestionPrompt(doc, "  Who needs a licence?  ");

      expect(prompt).toContain("QUESTION:\nWho needs a licence?");
      expect(prompt).toContain(`"${ANSWER_NOT_FOUND}"`);
      expect(prompt).toContain(doc.text);
    });

    it("bounds the bill text like the analysis prompt", () => {
      const { prompt, truncated } = buildQuestionPrompt(doc, "Why?", {
        template: "{{document}}|{{question}}",
        charLimit: 3,
      });
      expect(prompt).toBe("THE|Why?");
      expect(truncated).toBe(true);
    });
  });
});
