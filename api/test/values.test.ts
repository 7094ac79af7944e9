import { describe, expect, it } from "vitest";
import { findVariableSpec } from "../src/motions/motion-types.js";
import {
  findDates,
  findMoneyAmounts,
  formatIsoDate,
  formatMoney,
  formatValue,
  normalizeValue,
} from "../src/motions/values.js";

describe("normalizeValue", () => {
  it("reads money from dollar strings and numbers", () => {
    expect(normalizeValue("money", "$12,500.00")).toBe(12500);
    expect(normalizeValue("money", "12500")).toBe(12500);
    expect(normalizeValue("money", 12500.456)).toBe(12500.46);
  });

  it("rejects money it cannot read as one amount", () => {
    expect(normalizeValue("money", "$1,000 and $2,000")).toBeUndefined();
    expect(normalizeValue("money", "about twelve thousand")).toBeUndefined();
    expect(normalizeValue("money", -5)).toBeUndefined();
    expect(normalizeValue("money", null)).toBeUndefined();
  });

  it("converts the accepted date formats to ISO", () => {
    expect(normalizeValue("date", "2023-03-15")).toBe("2023-03-15");
    expect(normalizeValue("date", "03/15/2023")).toBe("2023-03-15");
    expect(normalizeValue("date", "March 15, 2023")).toBe("2023-03-15");
    expect(normalizeValue("date", "Sept 5 2023")).toBe("2023-09-05");
  });

  it("rejects impossible dates", () => {
    expect(normalizeValue("date", "02/30/2023")).toBeUndefined();
    expect(normalizeValue("date", "2023-02-29")).toBeUndefined();
    expect(normalizeValue("date", "2024-02-29")).toBe("2024-02-29");
  });

  it("collapses whitespace in text and rejects empty text", () => {
    expect(normalizeValue("text", "  Jane   Doe ")).toBe("Jane Doe");
    expect(normalizeValue("text", "   ")).toBeUndefined();
  });
});

describe("value scanning", () => {
  it("finds dollar amounts and comma-grouped numbers only", () => {
    const found = findMoneyAmounts("Claim of $12,500.00 on a 2019 car, balance 3,200");
    expect(found.map((f) => f.value)).toEqual([12500, 3200]);
  });

  it("returns dates in text order", () => {
    const found = findDates("Judgment on March 1, 2022, recorded 2022-04-10 and 05/02/2022");
    expect(found.map((f) => f.value)).toEqual(["2022-03-01", "2022-04-10", "2022-05-02"]);
  });
});

describe("formatting", () => {
  it("formats money and dates for documents", () => {
    expect(formatMoney(12500)).toBe("$12,500.00");
    expect(formatIsoDate("2023-03-15")).toBe("March 15, 2023");
  });

  it("formats by variable kind", () => {
    const claim = findVariableSpec("value_claim", "claim_value");
    const debtor = findVariableSpec("value_claim", "debtor_name");
    expect(claim && formatValue(claim, 1234.5)).toBe("$1,234.50");
    expect(debtor && formatValue(debtor, "Jane Doe")).toBe("Jane Doe");
  });
});
