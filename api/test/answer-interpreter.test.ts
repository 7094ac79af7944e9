import { describe, expect, it } from "vitest";
import { cleanSegment, interpretAnswer } from "../src/drafting/answer-interpreter.js";
import { getMotionSchema, type VariableSpec } from "../src/motions/motion-types.js";

const valueClaim = getMotionSchema("value_claim");
const avoidLien = getMotionSchema("avoid_lien");
const labelledOnly = { requested: [] };

describe("cleanSegment", () => {
  it("drops trailing separators and conjunctions", () => {
    expect(cleanSegment("Jane Doe and the ")).toBe("Jane Doe");
    expect(cleanSegment("Acme Bank, ")).toBe("Acme Bank");
    expect(cleanSegment("Smith.")).toBe("Smith");
  });

  it("keeps abbreviations that end in a period", () => {
    expect(cleanSegment("Acme Bank, N.A.")).toBe("Acme Bank, N.A.");
  });
});

describe("interpretAnswer", () => {
  it("reads labelled values in a sentence", () => {
    const result = interpretAnswer(
      "The claim value is $12,500 and the lien date was 03/15/2023",
      valueClaim,
      { requested: ["claim_value", "lien_date"] }
    );

    expect(result).toEqual({
      values: [
        { name: "claim_value", value: 12500 },
        { name: "lien_date", value: "2023-03-15" },
      ],
      ambiguous: [],
      unattributed: false,
    });
  });

  it("reads one value per line", () => {
    const result = interpretAnswer("Debtor name: Jane Doe\nCreditor name: Acme Bank", valueClaim, labelledOnly);

    expect(result.values).toEqual([
      { name: "debtor_name", value: "Jane Doe" },
      { name: "creditor_name", value: "Acme Bank" },
    ]);
  });

  it("prefers the longest label when labels overlap", () => {
    const result = interpretAnswer("Exemption statute: Fla. Const. Art. X, § 4", avoidLien, labelledOnly);

    expect(result.values).toEqual([{ name: "exemption_statute", value: "Fla. Const. Art. X, § 4" }]);
  });

  it("attributes a lone amount and a lone date by kind", () => {
    const result = interpretAnswer("$12,500 and 03/15/2023", valueClaim, {
      requested: ["claim_value", "lien_date"],
    });

    expect(result.values).toEqual([
      { name: "claim_value", value: 12500 },
      { name: "lien_date", value: "2023-03-15" },
    ]);
    expect(result.ambiguous).toEqual([]);
  });

  it("keeps an unlabelled date that follows a labelled amount", () => {
    const result = interpretAnswer(
      "Claim value: $12,500.00, lien date 03/15/2023",
      valueClaim,
      { requested: ["claim_value", "lien_date"] }
    );

    expect(result.values).toEqual([
      { name: "claim_value", value: 12500 },
      { name: "lien_date", value: "2023-03-15" },
    ]);
  });

  it("does not guess between two requested amounts", () => {
    const result = interpretAnswer("$5,000", avoidLien, {
      requested: ["judgment_amount", "exemption_value"],
    });

    expect(result).toEqual({
      values: [],
      ambiguous: ["judgment_amount", "exemption_value"],
      unattributed: false,
    });
  });

  it("answers a single requested variable with the whole reply", () => {
    const result = interpretAnswer("Acme Bank, N.A.", valueClaim, { requested: ["creditor_name"] });
    expect(result.values).toEqual([{ name: "creditor_name", value: "Acme Bank, N.A." }]);
  });

  it("flags a single requested value that does not parse", () => {
    const result = interpretAnswer("sometime last spring", valueClaim, { requested: ["lien_date"] });
    expect(result).toEqual({ values: [], ambiguous: ["lien_date"], unattributed: false });
  });

  it("flags a labelled value that does not parse", () => {
    const result = interpretAnswer("lien date: sometime last spring", valueClaim, labelledOnly);
    expect(result.ambiguous).toEqual(["lien_date"]);
    expect(result.values).toEqual([]);
  });

  it("ignores unlabelled values unless allowed", () => {
    const result = interpretAnswer("$12,500", valueClaim, labelledOnly);
    expect(result).toEqual({ values: [], ambiguous: [], unattributed: true });
  });

  it("treats one label shared by two variables as ambiguous", () => {
    const specs: VariableSpec[] = [
      { name: "first_amount", label: "First amount", aliases: ["amount"], kind: "money", description: "" },
      { name: "second_amount", label: "Second amount", aliases: ["amount"], kind: "money", description: "" },
    ];

    const result = interpretAnswer("amount: $100", specs, labelledOnly);
    expect(result).toEqual({ values: [], ambiguous: ["first_amount", "second_amount"], unattributed: false });
  });

  it("treats a variable labelled twice as ambiguous", () => {
    const result = interpretAnswer("claim value: $100, claim amount: $200", valueClaim, labelledOnly);
    expect(result.ambiguous).toEqual(["claim_value"]);
    expect(result.values).toEqual([]);
  });

  it("returns nothing for an empty reply", () => {
    expect(interpretAnswer("   ", valueClaim, { requested: ["debtor_name"] })).toEqual({
      values: [],
      ambiguous: [],
      unattributed: false,
    });
  });

  it("reads a label for a variable that was not asked for", () => {
    const result = interpretAnswer("Debtor name: John Smith", valueClaim, { requested: ["creditor_name"] });
    expect(result).toEqual({
      values: [{ name: "debtor_name", value: "John Smith" }],
      ambiguous: [],
      unattributed: false,
    });
  });

  it("does not take hedging prose as the answer to a single question", () => {
    const result = interpretAnswer("I'm not sure, I will check with the client", valueClaim, {
      requested: ["creditor_name"],
    });
    expect(result).toEqual({ values: [], ambiguous: [], unattributed: true });
  });

  it("does not take a sentence as the answer to a single question", () => {
    const result = interpretAnswer("The bank is still deciding", valueClaim, { requested: ["creditor_name"] });
    expect(result).toEqual({ values: [], ambiguous: [], unattributed: true });
  });

  it("still finds a lone date in a sentence for the one requested date", () => {
    const result = interpretAnswer("It was recorded on 03/15/2023", valueClaim, { requested: ["lien_date"] });
    expect(result.values).toEqual([{ name: "lien_date", value: "2023-03-15" }]);
  });

  it("ignores a label mentioned in the middle of a sentence", () => {
    const result = interpretAnswer("The lien against the debtor was recorded on 03/15/2023", valueClaim, {
      requested: ["debtor_name", "creditor_name", "claim_value", "lien_date"],
    });
    expect(result).toEqual({
      values: [{ name: "lien_date", value: "2023-03-15" }],
      ambiguous: [],
      unattributed: false,
    });
  });

  it("reads a label that starts a clause after a comma or \"and\"", () => {
    const result = interpretAnswer("Hi, the creditor is Acme Bank and my debtor is Jane Doe", valueClaim, labelledOnly);
    expect(result.values).toEqual([
      { name: "creditor_name", value: "Acme Bank" },
      { name: "debtor_name", value: "Jane Doe" },
    ]);
  });
});
