import { z } from "zod";
import { ExtractionFailedError, describeError } from "../errors.js";
import type { ExtractedFact } from "../ledger/variable-ledger.js";
import { consoleLogger, type Logger } from "../logger.js";
import { MOTION_LABELS, getMotionSchema, type MotionType } from "../motions/motion-types.js";
import { normalizeValue } from "../motions/values.js";
import { parseJsonContent, type JsonCompletion } from "../openai-client.js";
import { extractDocumentText, type DocumentKind } from "./document-text.js";

export type ExtractionContext = {
  filename?: string;
  jurisdiction?: string;
  chapter?: string;
};

export interface FactExtractor {
  /**
   * Reads case facts for the motion's schema out of a document.
   * Throws ExtractionFailedError when the document or the service fails.
   */
  extract(
    document: Buffer,
    kind: DocumentKind,
    motionType: MotionType,
    context?: ExtractionContext,
    signal?: AbortSignal
  ): Promise<ExtractedFact[]>;
}

const ExtractionResponseSchema = z.object({
  facts: z.record(z.union([z.string(), z.number(), z.null()])),
});

const MAX_DOCUMENT_CHARS = 12000;

function buildPrompt(motionType: MotionType, context: ExtractionContext): string {
  const fields = getMotionSchema(motionType)
    .map((spec) => `- ${spec.name} (${spec.kind}): ${spec.description}`)
    .join("\n");

  return `You extract factual data from bankruptcy petitions, schedules and related case documents.
The facts will be used to prepare a ${MOTION_LABELS[motionType]}.

Extract ONLY facts that are explicitly present in the document. Do not infer or invent values.
Do not draft any motion text.

FIELDS:
${fields}

CASE CONTEXT:
- Jurisdiction: ${context.jurisdiction || "(unspecified)"}
- Chapter: ${context.chapter || "(unspecified)"}

Return JSON:
{
  "facts": { "<field name>": "<value as written in the document>" | null }
}
Use null for every field the document does not state. Money values in dollars, dates as written.`;
}

export type OpenAIFactExtractorOptions = {
  complete: JsonCompletion;
  model: string;
  readText?: (document: Buffer, kind: DocumentKind) => Promise<string>;
  logger?: Logger;
};

export function createOpenAIFactExtractor(options: OpenAIFactExtractorOptions): FactExtractor {
  const readText = options.readText ?? extractDocumentText;
  const logger = options.logger ?? consoleLogger;

  return {
    async extract(document, kind, motionType, context = {}, signal) {
      const text = (await readText(document, kind)).trim();
      if (!text) {
        throw new ExtractionFailedError(`No readable text found in ${context.filename ?? "the document"}`);
      }

      const startTime = Date.now();
      let parsed: z.infer<typeof ExtractionResponseSchema>;
      try {
        const content = await options.complete({
          model: options.model,
          system: "You are a bankruptcy paralegal assistant. Return ONLY valid JSON, no additional text.",
          user: `${buildPrompt(motionType, context)}\n\nDOCUMENT (${context.filename ?? kind}):\n${text.substring(0, MAX_DOCUMENT_CHARS)}`,
          temperature: 0,
          signal,
        });
        parsed = ExtractionResponseSchema.parse(parseJsonContent(content));
      } catch (error) {
        throw new ExtractionFailedError(`Extraction service failed: ${describeError(error)}`, { cause: error });
      }

      const facts: ExtractedFact[] = [];
      for (const spec of getMotionSchema(motionType)) {
        const value = normalizeValue(spec.kind, parsed.facts[spec.name]);
        if (value !== undefined) {
          facts.push({ name: spec.name, value });
        }
      }

      const duration = ((Date.now() - startTime) / 1000).toFixed(1);
      logger.info(
        { motionType, filename: context.filename, found: facts.map((f) => f.name) },
        `[EXTRACTOR] Completed in ${duration}s`
      );
      return facts;
    },
  };
}
