import { UnknownVariableError } from "../errors.js";
import { getMotionSchema, type MotionType, type VariableSpec } from "../motions/motion-types.js";
import type { CaseValue } from "../motions/values.js";

export type Provenance = "user_provided" | "extracted" | "unset";

export type CaseVariable = {
  name: string;
  value?: CaseValue;
  provenance: Provenance;
};

export type ExtractedFact = { name: string; value: CaseValue };

export type LedgerEntry = CaseVariable & { label: string };

export type LedgerSnapshot = {
  motionType: MotionType;
  complete: boolean;
  missing: string[];
  variables: LedgerEntry[];
};

/**
 * Per-session record of the case facts a motion needs.
 * Keys are fixed to the motion's schema when the ledger is created.
 */
export class VariableLedger {
  private readonly schema: readonly VariableSpec[];
  private readonly variables = new Map<string, CaseVariable>();

  constructor(readonly motionType: MotionType) {
    this.schema = getMotionSchema(motionType);
    for (const spec of this.schema) {
      this.variables.set(spec.name, { name: spec.name, provenance: "unset" });
    }
  }

  /**
   * Merges extractor output. A user-provided value is never replaced; an
   * earlier extraction is refreshed by a newer one. Returns changed names.
   */
  merge(facts: readonly ExtractedFact[]): string[] {
    const changed: string[] = [];
    for (const fact of facts) {
      const current = this.variables.get(fact.name);
      if (!current) continue;
      if (current.provenance === "user_provided") continue;
      if (current.provenance === "extracted" && current.value === fact.value) continue;

      this.variables.set(fact.name, { name: fact.name, value: fact.value, provenance: "extracted" });
      if (!changed.includes(fact.name)) changed.push(fact.name);
    }
    return changed;
  }

  /** Always overwrites. Returns true when the stored value changed. */
  setUserValue(name: string, value: CaseValue): boolean {
    const current = this.variables.get(name);
    if (!current) throw new UnknownVariableError(name);
    const changed = current.provenance === "unset" || current.value !== value;
    this.variables.set(name, { name, value, provenance: "user_provided" });
    return changed;
  }

  get(name: string): CaseVariable | undefined {
    const variable = this.variables.get(name);
    return variable ? { ...variable } : undefined;
  }

  isResolved(name: string): boolean {
    const variable = this.variables.get(name);
    return variable !== undefined && variable.provenance !== "unset";
  }

  isComplete(): boolean {
    return this.schema.every((spec) => this.isResolved(spec.name));
  }

  /** Unset variable names in schema order. */
  missing(): string[] {
    return this.schema.filter((spec) => !this.isResolved(spec.name)).map((spec) => spec.name);
  }

  keys(): string[] {
    return [...this.variables.keys()];
  }

  specs(): readonly VariableSpec[] {
    return this.schema;
  }

  entries(): LedgerEntry[] {
    return this.schema.map((spec) => {
      const variable = this.variables.get(spec.name) ?? { name: spec.name, provenance: "unset" as const };
      return { ...variable, label: spec.label };
    });
  }

  /** Resolved values only, keyed by variable name. */
  facts(): Record<string, CaseValue> {
    const out: Record<string, CaseValue> = {};
    for (const variable of this.variables.values()) {
      if (variable.provenance !== "unset" && variable.value !== undefined) {
        out[variable.name] = variable.value;
      }
    }
    return out;
  }

  snapshot(): LedgerSnapshot {
    return {
      motionType: this.motionType,
      complete: this.isComplete(),
      missing: this.missing(),
      variables: this.entries(),
    };
  }
}
