import { describe, expect, it, vi } from "vitest";
import { ExtractionFailedError } from "../src/errors.js";
import { detectDocumentKind, extractDocumentText } from "../src/extraction/document-text.js";
import { createOpenAIFactExtractor } from "../src/extraction/fact-extractor.js";
import type { JsonCompletion } from "../src/openai-client.js";
import { silentLogger } from "./helpers.js";

const SCHEDULE = Buffer.from(
  "Schedule D. Creditor: Acme Bank. Debtor: Jane Doe. Amount of claim: $12,500.00. Lien recorded March 15, 2023."
);

function extractorReturning(content: string) {
  const complete = vi.fn<JsonCompletion>(async () => content);
  const extractor = createOpenAIFactExtractor({ complete, model: "gpt-test", logger: silentLogger() });
  return { extractor, complete };
}

describe("document text", () => {
  it("detects kinds by extension, then by mime type", () => {
    expect(detectDocumentKind("Petition.PDF")).toBe("pdf");
    expect(detectDocumentKind("schedules.docx")).toBe("docx");
    expect(detectDocumentKind("upload", "text/plain")).toBe("txt");
    expect(detectDocumentKind("photo.png", "image/png")).toBeUndefined();
  });

  it("reads plain text and rejects empty files", async () => {
    expect(await extractDocumentText(Buffer.from("hello"), "txt")).toBe("hello");
    await expect(extractDocumentText(Buffer.alloc(0), "txt")).rejects.toThrow("The uploaded file is empty");
  });
});

describe("createOpenAIFactExtractor", () => {
  it("keeps schema fields and normalizes their values", async () => {
    const { extractor, complete } = extractorReturning(
      JSON.stringify({
        facts: {
          debtor_name: "Jane Doe",
          creditor_name: "Acme Bank",
          claim_value: "$12,500.00",
          lien_date: "March 15, 2023",
          judgment_amount: "$1,000",
        },
      })
    );

    const facts = await extractor.extract(SCHEDULE, "txt", "value_claim", { filename: "schedule-d.txt", chapter: "13" });

    expect(facts).toEqual([
      { name: "debtor_name", value: "Jane Doe" },
      { name: "creditor_name", value: "Acme Bank" },
      { name: "claim_value", value: 12500 },
      { name: "lien_date", value: "2023-03-15" },
    ]);
    const request = complete.mock.calls[0][0];
    expect(request.model).toBe("gpt-test");
    expect(request.temperature).toBe(0);
    expect(request.user).toContain("- Chapter: 13");
    expect(request.user).toContain("DOCUMENT (schedule-d.txt):");
  });

  it("drops null and unreadable values", async () => {
    const { extractor } = extractorReturning(
      "```json\n" + JSON.stringify({ facts: { debtor_name: null, claim_value: "unknown", lien_date: "2023-03-15" } }) + "\n```"
    );

    const facts = await extractor.extract(SCHEDULE, "txt", "value_claim");
    expect(facts).toEqual([{ name: "lien_date", value: "2023-03-15" }]);
  });

  it("fails on malformed responses", async () => {
    const { extractor } = extractorReturning('{"facts": "none"}');
    await expect(extractor.extract(SCHEDULE, "txt", "value_claim")).rejects.toThrow(ExtractionFailedError);
  });

  it("fails when the service fails", async () => {
    const complete = vi.fn<JsonCompletion>(async () => Promise.reject(new Error("rate limited")));
    const extractor = createOpenAIFactExtractor({ complete, model: "gpt-test", logger: silentLogger() });

    await expect(extractor.extract(SCHEDULE, "txt", "value_claim")).rejects.toThrow(
      "Extraction service failed: rate limited"
    );
  });

  it("fails when the document has no text", async () => {
    const { extractor, complete } = extractorReturning("{}");
    await expect(extractor.extract(Buffer.from("   \n"), "txt", "value_claim", { filename: "blank.txt" })).rejects.toThrow(
      "No readable text found in blank.txt"
    );
    expect(complete).not.toHaveBeenCalled();
  });
});
