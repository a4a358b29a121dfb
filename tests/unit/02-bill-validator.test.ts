import { describe, expect, it } from "vitest";
import { validateBill } from "../../src/pipeline/billValidator.js";
import { BILL_TEXT } from "../support/fixtures.js";

const FILLER = "Bicycle parking rules help everyone find a space near their home. ".repeat(3);

const LIKELY_BILL =
  "A Bill to regulate bicycle parking in cities. The Parliament will debate it " +
  "and the Minister will respond. " +
  FILLER;

const NO_INSTITUTION =
  "A Bill to amend the Motor Vehicles Act. Be it enacted as follows. " +
  "This Act may be called the Motor Vehicles (Amendment) Act. Short title and commencement. " +
  "The Minister may notify a schedule in the Gazette. " +
  "Road safety matters to every family that travels on public roads. ".repeat(2);

describe("L2 · billValidator", () => {
  it("accepts a bill with strong indicators and keywords", () => {
    const result = validateBill(BILL_TEXT);

    expect(result.accepted).toBe(true);
    expect(result.classification).toBe("accepted");
    expect(result.strongIndicatorCount).toBe(8);
    expect(result.keywordCount).toBe(9);
    expect(result.reason).toBe("Valid parliamentary bill (8 strong indicators, 9 keywords).");
    expect(result.matchedIndicators).toContain("be it enacted");
    expect(result.matchedKeywords).toContain("lok sabha");
  });

  it("rejects short text before looking for indicators", () => {
    const result = validateBill("Invoice #4521, due April 2024");

    expect(result.accepted).toBe(false);
    expect(result.classification).toBe("too_short");
    expect(result.reason).toBe(
      "Document too short: 29 characters found, at least 200 are needed to detect legislative indicators."
    );
    expect(result.strongIndicatorCount).toBe(0);
    expect(result.keywordCount).toBe(0);
  });

  it("rejects empty text as too short", () => {
    const result = validateBill("   ");
    expect(result.classification).toBe("too_short");
    expect(result.reason).toContain("0 characters found");
  });

  it("rejects long text with no legislative indicators", () => {
    const text = "The quarterly sales report shows steady growth across all regions. ".repeat(5);
    const result = validateBill(text);

    expect(result.accepted).toBe(false);
    expect(result.classification).toBe("invalid");
    expect(result.reason).toBe(
      "Document doesn't appear to be a parliamentary bill: insufficient legislative " +
        "indicators (0 strong indicators, 0 keywords)."
    );
  });

  it("rejects question/answer style instructional text", () => {
    const text = `Question: What does a bill do? Answer: It proposes a new law. ${BILL_TEXT}`;
    const result = validateBill(text);

    expect(result.accepted).toBe(false);
    expect(result.classification).toBe("example");
    expect(result.reason).toBe(
      "Document appears to be example/instructional text (question/answer block), not an official bill."
    );
  });

  it("rejects a sample bill even when it carries bill phrasing", () => {
    const result = validateBill(`This is a Sample Bill for class use.\n${BILL_TEXT}`);
    expect(result.classification).toBe("example");
    expect(result.reason).toContain("(sample bill)");
  });

  it("accepts a likely bill with one strong indicator and three keywords", () => {
    const result = validateBill(LIKELY_BILL);

    expect(result.accepted).toBe(true);
    expect(result.classification).toBe("likely");
    expect(result.reason).toBe(
      "Possible bill (1 strong indicators, 3 keywords); proceeding with analysis."
    );
  });

  it("never downgrades when more indicators are added", () => {
    const before = validateBill(LIKELY_BILL);
    const after = validateBill(
      `${LIKELY_BILL} BE IT ENACTED in the Lok Sabha. Short title and commencement.`
    );

    expect(before.classification).toBe("likely");
    expect(after.classification).toBe("accepted");
    expect(after.strongIndicatorCount).toBeGreaterThanOrEqual(before.strongIndicatorCount);
    expect(after.keywordCount).toBeGreaterThanOrEqual(before.keywordCount);
  });

  it("ignores indicators beyond the preview window", () => {
    const text = "Lorem ipsum dolor sit amet. ".repeat(11) + BILL_TEXT;
    const result = validateBill(text, { previewChars: 300 });

    expect(result.classification).toBe("invalid");
    expect(result.strongIndicatorCount).toBe(0);
  });

  it("honours a custom minimum length", () => {
    expect(validateBill("Short text", { minChars: 5 }).classification).toBe("invalid");
    expect(validateBill(BILL_TEXT, { minChars: 10_000 }).classification).toBe("too_short");
  });

  describe("strict mode", () => {
    it("accepts a bill that has identity, institution and action", () => {
      const result = validateBill(BILL_TEXT, { mode: "strict" });
      expect(result.accepted).toBe(true);
      expect(result.missingCategories).toEqual([]);
    });

    it("rejects when the institutional context is missing", () => {
      const standard = validateBill(NO_INSTITUTION);
      const strict = validateBill(NO_INSTITUTION, { mode: "strict" });

      expect(standard.accepted).toBe(true);
      expect(strict.accepted).toBe(false);
      expect(strict.classification).toBe("invalid");
      expect(strict.missingCategories).toEqual(["institution"]);
      expect(strict.reason).toBe(
        "Document doesn't appear to be a parliamentary bill: missing institutional " +
          "context (e.g. Lok Sabha, Rajya Sabha, Parliament)."
      );
    });
  });
});
