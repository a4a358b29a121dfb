import { vi } from "vitest";
import type { LanguageModelClient } from "../../src/llm/client.js";

/** Bill text with every strong indicator used by the validator tests. */
export const BILL_TEXT = `
THE COASTAL SHIPPING BILL, 2024
A
BILL
to consolidate and amend the law relating to the regulation of coastal shipping.
Bill No. 42 of 2024
AS INTRODUCED IN LOK SABHA
ARRANGEMENT OF CLAUSES
BE IT ENACTED by Parliament in the Seventy-fifth Year of the Republic of India as follows:
1. (1) This Act may be called the Coastal Shipping Act, 2024.
(2) It shall come into force on such date as the Central Government may, by notification in the Official Gazette, appoint.
This is a Bill to provide for the regulation of coastal trade, and the Minister may make rules under this clause.
STATEMENT OF OBJECTS AND REASONS
The legislative intent is to promote coastal shipping.
FINANCIAL MEMORANDUM
The Bill does not involve any recurring expenditure.
`.trim();

/** Model reply in the requested format. */
export const WELL_FORMED_RESPONSE = `SECTOR:
Shipping

OBJECTIVE:
To regulate coastal trade by Indian ships.

DETAILED SUMMARY:
- Creates a licence for coastal trade
- Sets up a national coastal shipping plan

IMPACT ANALYSIS:
Citizens:
- Cheaper goods moved by sea

Businesses:
- Ship owners need a licence

Government:
- Prepares a strategic plan

Industries / Markets:
- Ports see more cargo

NGOs / Civil Society:
- Little direct effect

BENEFICIARIES:
- Indian ship owners

AFFECTED GROUPS:
- Foreign vessels

POSITIVES:
- More jobs at ports

NEGATIVES / RISKS:
- Higher compliance costs`;

/** In-process stand-in for the hosted model. */
export function fakeModel(reply: string | ((prompt: string) => string), model = "fake-model") {
  const invoke = vi.fn(async (prompt: string) =>
    typeof reply === "function" ? reply(prompt) : reply
  );
  const client: LanguageModelClient = { model, invoke };
  return { client, invoke };
}

export function failingModel(message = "upstream timeout") {
  const invoke = vi.fn(async (_prompt: string): Promise<string> => {
    throw new Error(message);
  });
  const client: LanguageModelClient = { model: "fake-model", invoke };
  return { client, invoke };
}
