export type MotionType = "value_claim" | "avoid_lien";

export const MOTION_TYPES: readonly MotionType[] = ["value_claim", "avoid_lien"];

export const MOTION_LABELS: Record<MotionType, string> = {
  value_claim: "Motion to Value Secured Claim",
  avoid_lien: "Motion to Avoid Judicial Lien",
};

export type VariableKind = "text" | "money" | "date";

export type VariableSpec = {
  name: string;             // stable key, e.g. "claim_value"
  label: string;            // how the user sees it
  aliases: string[];        // other labels accepted in free-text answers
  kind: VariableKind;
  description: string;      // guidance for the extractor
};

const DEBTOR_NAME: VariableSpec = {
  name: "debtor_name",
  label: "Debtor name",
  aliases: ["debtor", "debtors", "debtor's name", "debtor names"],
  kind: "text",
  description: "Full name(s) of the debtor(s) as listed on the petition.",
};

const CREDITOR_NAME: VariableSpec = {
  name: "creditor_name",
  label: "Creditor name",
  aliases: ["creditor", "creditor's name", "lienholder"],
  kind: "text",
  description: "Full name of the creditor holding the claim or lien.",
};

const MOTION_SCHEMAS: Record<MotionType, readonly VariableSpec[]> = {
  value_claim: [
    DEBTOR_NAME,
    CREDITOR_NAME,
    {
      name: "claim_value",
      label: "Claim value",
      aliases: ["claim amount", "amount of claim", "amount of the claim", "value of claim"],
      kind: "money",
      description: "Total amount of the secured creditor's claim in dollars (Schedule D).",
    },
    {
      name: "lien_date",
      label: "Lien date",
      aliases: ["date of lien", "date of the lien", "lien recorded", "lien recording date"],
      kind: "date",
      description: "Date the lien was created or recorded.",
    },
  ],
  avoid_lien: [
    DEBTOR_NAME,
    CREDITOR_NAME,
    {
      name: "judgment_amount",
      label: "Judgment amount",
      aliases: ["amount of judgment", "amount of the judgment", "judgment value"],
      kind: "money",
      description: "Amount of the judgment that gave rise to the judicial lien, in dollars.",
    },
    {
      name: "judgment_date",
      label: "Judgment date",
      aliases: ["date of judgment", "date of the judgment", "judgment recorded"],
      kind: "date",
      description: "Date the judgment was entered or recorded.",
    },
    {
      name: "property_description",
      label: "Property description",
      aliases: ["property", "property address", "collateral"],
      kind: "text",
      description: "Street address or description of the property the lien attaches to (Schedule A/B).",
    },
    {
      name: "exemption_statute",
      label: "Exemption statute",
      aliases: ["exemption law", "statute", "exemption claimed"],
      kind: "text",
      description: "Statute cited for the exemption on Schedule C, e.g. Fla. Const. Art. X, § 4.",
    },
    {
      name: "exemption_value",
      label: "Exemption value",
      aliases: ["value of exemption", "exemption amount", "amount of exemption"],
      kind: "money",
      description: "Value of the claimed exemption in dollars (Schedule C).",
    },
  ],
};

export function getMotionSchema(motionType: MotionType): readonly VariableSpec[] {
  return MOTION_SCHEMAS[motionType];
}

export function findVariableSpec(motionType: MotionType, name: string): VariableSpec | undefined {
  return MOTION_SCHEMAS[motionType].find((spec) => spec.name === name);
}
