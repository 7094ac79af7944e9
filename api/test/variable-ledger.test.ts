import { describe, expect, it } from "vitest";
import { UnknownVariableError } from "../src/errors.js";
import { VariableLedger } from "../src/ledger/variable-ledger.js";

describe("VariableLedger", () => {
  it("starts with exactly the motion's variables, all unset", () => {
    const ledger = new VariableLedger("value_claim");
    expect(ledger.keys()).toEqual(["debtor_name", "creditor_name", "claim_value", "lien_date"]);
    expect(ledger.entries().every((e) => e.provenance === "unset")).toBe(true);
    expect(ledger.isComplete()).toBe(false);
  });

  it("treats merging nothing as a no-op", () => {
    const ledger = new VariableLedger("value_claim");
    expect(ledger.merge([])).toEqual([]);
    expect(ledger.missing()).toEqual(["debtor_name", "creditor_name", "claim_value", "lien_date"]);
  });

  it("records extracted facts and ignores names outside the schema", () => {
    const ledger = new VariableLedger("value_claim");
    const changed = ledger.merge([
      { name: "creditor_name", value: "Acme Bank" },
      { name: "judgment_amount", value: 5000 },
    ]);

    expect(changed).toEqual(["creditor_name"]);
    expect(ledger.get("creditor_name")).toEqual({ name: "creditor_name", value: "Acme Bank", provenance: "extracted" });
    expect(ledger.keys()).not.toContain("judgment_amount");
  });

  it("refreshes an extracted value from a newer extraction", () => {
    const ledger = new VariableLedger("value_claim");
    ledger.merge([{ name: "claim_value", value: 12000 }]);

    expect(ledger.merge([{ name: "claim_value", value: 12000 }])).toEqual([]);
    expect(ledger.merge([{ name: "claim_value", value: 12500 }])).toEqual(["claim_value"]);
    expect(ledger.get("claim_value")?.value).toBe(12500);
  });

  it("never lets extraction replace a user-provided value", () => {
    const ledger = new VariableLedger("value_claim");
    ledger.setUserValue("claim_value", 15000);

    expect(ledger.merge([{ name: "claim_value", value: 99999 }])).toEqual([]);
    expect(ledger.get("claim_value")).toEqual({ name: "claim_value", value: 15000, provenance: "user_provided" });
  });

  it("reports whether a user value changed anything", () => {
    const ledger = new VariableLedger("value_claim");
    expect(ledger.setUserValue("debtor_name", "Jane Doe")).toBe(true);
    expect(ledger.setUserValue("debtor_name", "Jane Doe")).toBe(false);
    expect(ledger.setUserValue("debtor_name", "Jane Q. Doe")).toBe(true);
  });

  it("takes over an extracted value with the same content as user-provided", () => {
    const ledger = new VariableLedger("value_claim");
    ledger.merge([{ name: "debtor_name", value: "Jane Doe" }]);
    expect(ledger.setUserValue("debtor_name", "Jane Doe")).toBe(false);
    expect(ledger.get("debtor_name")?.provenance).toBe("user_provided");
  });

  it("rejects unknown variable names", () => {
    const ledger = new VariableLedger("avoid_lien");
    expect(() => ledger.setUserValue("claim_value", 1)).toThrow(UnknownVariableError);
  });

  it("lists missing variables in schema order", () => {
    const ledger = new VariableLedger("avoid_lien");
    ledger.setUserValue("exemption_value", 25000);
    ledger.merge([{ name: "debtor_name", value: "Jane Doe" }]);

    expect(ledger.missing()).toEqual([
      "creditor_name",
      "judgment_amount",
      "judgment_date",
      "property_description",
      "exemption_statute",
    ]);
  });

  it("exposes resolved facts and a snapshot", () => {
    const ledger = new VariableLedger("value_claim");
    ledger.merge([{ name: "debtor_name", value: "Jane Doe" }]);
    ledger.setUserValue("lien_date", "2023-03-15");

    expect(ledger.facts()).toEqual({ debtor_name: "Jane Doe", lien_date: "2023-03-15" });
    const snapshot = ledger.snapshot();
    expect(snapshot.complete).toBe(false);
    expect(snapshot.missing).toEqual(["creditor_name", "claim_value"]);
    expect(snapshot.variables[0]).toEqual({
      name: "debtor_name",
      value: "Jane Doe",
      provenance: "extracted",
      label: "Debtor name",
    });
  });
});
