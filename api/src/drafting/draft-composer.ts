import { z } from "zod";
import { describeError } from "../errors.js";
import type { KnowledgeResult } from "../knowledge/knowledge-router.js";
import { consoleLogger, type Logger } from "../logger.js";
import { MOTION_LABELS, getMotionSchema, type MotionType } from "../motions/motion-types.js";
import { renderDraft } from "../motions/templates.js";
import { formatValue, type CaseValue } from "../motions/values.js";
import { parseJsonContent, type JsonCompletion } from "../openai-client.js";

export type DraftInput = {
  motionType: MotionType;
  facts: Record<string, CaseValue>;
  citations: KnowledgeResult[];
  citationsUnavailable: boolean;
  jurisdiction?: string;
  chapter?: string;
  draftingAgentId: string;
};

export type ComposedDraft = {
  motionText: string;
  proposedOrderText: string;
};

export interface DraftComposer {
  compose(input: DraftInput, signal?: AbortSignal): Promise<ComposedDraft>;
}

/** Fills the motion templates with ledger facts and citations only. */
export class TemplateDraftComposer implements DraftComposer {
  async compose(input: DraftInput): Promise<ComposedDraft> {
    return renderDraft(input);
  }
}

const ArgumentSchema = z.object({ argument: z.string().min(1) });

/**
 * Asks the drafting agent for the argument paragraph; the rest of the document
 * comes from the template. Falls back to the template's default argument.
 */
export class AgentDraftComposer implements DraftComposer {
  constructor(
    private readonly complete: JsonCompletion,
    private readonly logger: Logger = consoleLogger
  ) {}

  async compose(input: DraftInput, signal?: AbortSignal): Promise<ComposedDraft> {
    let argument: string | undefined;
    try {
      const content = await this.complete({
        model: input.draftingAgentId,
        system: `You are a bankruptcy attorney drafting a ${MOTION_LABELS[input.motionType]}.
Use ONLY the facts and authorities provided. Do not invent case law or citations.
Return JSON: { "argument": "<one paragraph applying the authorities to the facts>" }`,
        user: buildArgumentPrompt(input),
        temperature: 0.2,
        signal,
      });
      argument = ArgumentSchema.parse(parseJsonContent(content)).argument;
    } catch (error) {
      this.logger.warn(
        { motionType: input.motionType, err: describeError(error) },
        "[DRAFTER] Drafting agent failed, using template argument"
      );
    }

    return renderDraft({ ...input, argument });
  }
}

function buildArgumentPrompt(input: DraftInput): string {
  const facts = getMotionSchema(input.motionType)
    .filter((spec) => input.facts[spec.name] !== undefined)
    .map((spec) => `- ${spec.label}: ${formatValue(spec, input.facts[spec.name])}`)
    .join("\n");

  const authorities = input.citations.length
    ? input.citations.map((c) => `- ${c.citation}\n  ${c.snippet}`).join("\n")
    : "(none retrieved)";

  return `JURISDICTION: ${input.jurisdiction || "(unspecified)"}
CHAPTER: ${input.chapter || "(unspecified)"}

FACTS:
${facts}

AUTHORITIES:
${authorities}`;
}
