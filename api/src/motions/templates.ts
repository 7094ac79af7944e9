import { getMotionSchema, type MotionType } from "./motion-types.js";
import { formatValue, type CaseValue } from "./values.js";

type MotionTemplates = {
  motion: string;
  order: string;
  defaultArgument: string;
};

const CAPTION = `# {{court}}

In re: {{debtor_name}}, Debtor.
Chapter {{chapter}}
`;

export const TPL: Record<MotionType, MotionTemplates> = {
  value_claim: {
    motion: `${CAPTION}
## MOTION TO VALUE SECURED CLAIM OF {{creditor_name}}

The Debtor, {{debtor_name}}, moves under 11 U.S.C. § 506(a) and Fed. R. Bankr. P. 3012 for entry of an order determining the value of the secured claim held by {{creditor_name}}, and states:

1. {{creditor_name}} holds a claim in the amount of {{claim_value}}, secured by a lien dated {{lien_date}}.
2. {{argument}}

## SUPPORTING AUTHORITY

{{authorities}}

WHEREFORE, the Debtor requests that the Court determine the value of the secured claim of {{creditor_name}} and grant such further relief as is just.
`,
    order: `${CAPTION}
## ORDER GRANTING MOTION TO VALUE SECURED CLAIM OF {{creditor_name}}

THIS MATTER came before the Court on the Debtor's Motion to Value Secured Claim of {{creditor_name}}. Having reviewed the motion and the record, it is ORDERED:

1. The motion is GRANTED.
2. The claim of {{creditor_name}} in the amount of {{claim_value}}, secured by the lien dated {{lien_date}}, is valued as set forth in the motion.
3. Any portion of the claim exceeding the secured value shall be treated as a general unsecured claim.

______________________________
United States Bankruptcy Judge
`,
    defaultArgument:
      "Under 11 U.S.C. § 506(a), an allowed claim secured by a lien on property of the estate is a secured claim only to the extent of the value of the creditor's interest in that property.",
  },
  avoid_lien: {
    motion: `${CAPTION}
## MOTION TO AVOID JUDICIAL LIEN OF {{creditor_name}}

The Debtor, {{debtor_name}}, moves under 11 U.S.C. § 522(f)(1)(A) to avoid the judicial lien held by {{creditor_name}}, and states:

1. On {{judgment_date}}, {{creditor_name}} obtained a judgment against the Debtor in the amount of {{judgment_amount}}.
2. The judgment constitutes a judicial lien on the following property: {{property_description}}.
3. The Debtor claimed the property exempt under {{exemption_statute}} in the amount of {{exemption_value}}.
4. {{argument}}

## SUPPORTING AUTHORITY

{{authorities}}

WHEREFORE, the Debtor requests that the Court avoid the judicial lien of {{creditor_name}} and grant such further relief as is just.
`,
    order: `${CAPTION}
## ORDER GRANTING MOTION TO AVOID JUDICIAL LIEN OF {{creditor_name}}

THIS MATTER came before the Court on the Debtor's Motion to Avoid Judicial Lien of {{creditor_name}}. Having reviewed the motion and the record, it is ORDERED:

1. The motion is GRANTED.
2. The judicial lien of {{creditor_name}} arising from the judgment entered on {{judgment_date}} in the amount of {{judgment_amount}} is avoided as to the property described as {{property_description}}.

______________________________
United States Bankruptcy Judge
`,
    defaultArgument:
      "Under 11 U.S.C. § 522(f)(1)(A), the Debtor may avoid the fixing of a judicial lien on an interest of the Debtor in property to the extent the lien impairs an exemption to which the Debtor would have been entitled.",
  },
};

export const CITATION_GAP_NOTICE =
  "[NO AUTHORITY RETRIEVED] The knowledge store could not be reached for this draft. Add supporting citations before filing.";

export type RenderInput = {
  motionType: MotionType;
  facts: Record<string, CaseValue>;
  citations: Array<{ snippet: string; citation: string }>;
  citationsUnavailable: boolean;
  jurisdiction?: string;
  chapter?: string;
  argument?: string;
};

function fill(template: string, values: Record<string, string>): string {
  let md = template;
  Object.entries(values).forEach(([k, v]) => {
    md = md.replaceAll(`{{${k}}}`, v);
  });
  return md;
}

export function renderAuthorities(
  citations: RenderInput["citations"],
  citationsUnavailable: boolean
): string {
  if (citationsUnavailable) return CITATION_GAP_NOTICE;
  if (citations.length === 0) return "No supporting authority was found in the knowledge store.";
  return citations.map((c) => `- ${c.citation}: "${c.snippet}"`).join("\n");
}

export function renderDraft(input: RenderInput): { motionText: string; proposedOrderText: string } {
  const tpl = TPL[input.motionType];
  const values: Record<string, string> = {
    court: input.jurisdiction
      ? `UNITED STATES BANKRUPTCY COURT, ${input.jurisdiction.toUpperCase()}`
      : "UNITED STATES BANKRUPTCY COURT",
    chapter: input.chapter || "____",
    argument: input.argument?.trim() || tpl.defaultArgument,
    authorities: renderAuthorities(input.citations, input.citationsUnavailable),
  };

  for (const spec of getMotionSchema(input.motionType)) {
    const value = input.facts[spec.name];
    values[spec.name] = value === undefined ? `[${spec.label.toUpperCase()}]` : formatValue(spec, value);
  }

  return {
    motionText: fill(tpl.motion, values),
    proposedOrderText: fill(tpl.order, values),
  };
}
