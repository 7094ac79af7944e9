import {
  DraftingError,
  InvalidValueError,
  NotConfiguredError,
  UnknownVariableError,
  describeError,
} from "../errors.js";
import type { FactExtractor } from "../extraction/fact-extractor.js";
import type { KnowledgeResult, KnowledgeRouter } from "../knowledge/knowledge-router.js";
import { consoleLogger, type Logger } from "../logger.js";
import { MOTION_LABELS, findVariableSpec, type VariableSpec } from "../motions/motion-types.js";
import { renderDraft } from "../motions/templates.js";
import { formatValue, normalizeValue } from "../motions/values.js";
import { withTimeout } from "../timeout.js";
import { resolveConfiguration, type WorkspaceConfigStore } from "../workspace/workspace-config.js";
import { interpretAnswer, type AnswerInterpretation } from "./answer-interpreter.js";
import type { ComposedDraft, DraftComposer } from "./draft-composer.js";
import type {
  Attachment,
  DraftState,
  DraftingSession,
  DraftingStateName,
  StatusNote,
  TurnResult,
} from "./session.js";

export type OrchestratorTimeouts = {
  extractionMs: number;
  lookupMs: number;
  draftingMs: number;
};

export const DEFAULT_TIMEOUTS: OrchestratorTimeouts = {
  extractionMs: 60_000,
  lookupMs: 15_000,
  draftingMs: 60_000,
};

export type OrchestratorDeps = {
  extractor: FactExtractor;
  router: KnowledgeRouter;
  composer: DraftComposer;
  config: WorkspaceConfigStore;
  logger?: Logger;
  timeouts?: Partial<OrchestratorTimeouts>;
};

export type TurnInput = {
  message?: string;
  attachments?: Attachment[];
};

/** Bookkeeping for one turn: states entered and notes raised. */
class TurnContext {
  readonly transitions: DraftingStateName[] = [];
  readonly notes: StatusNote[] = [];
  readonly lines: string[] = [];

  constructor(
    readonly session: DraftingSession,
    private readonly logger: Logger
  ) {}

  enter(state: DraftingStateName) {
    this.logger.info(
      { sessionId: this.session.id, from: this.session.state, to: state },
      "[ORCHESTRATOR] State transition"
    );
    this.session.state = state;
    this.transitions.push(state);
  }

  note(note: StatusNote) {
    this.notes.push(note);
  }

  say(line: string) {
    this.lines.push(line);
  }

  result(): TurnResult {
    const reply = this.lines.join("\n\n");
    this.session.addTurn("system", reply);
    return {
      state: this.session.state,
      transitions: this.transitions,
      reply,
      requested: [...this.session.requested],
      notes: this.notes,
      draft: this.session.draft,
    };
  }
}

function labelsOf(specs: readonly VariableSpec[]): string {
  return specs.map((spec) => spec.label).join(", ");
}

/**
 * Drafting workflow state machine. Decides on every turn whether to ask for
 * missing facts, look up authority or (re)draft. Callers serialize turns per
 * session; the orchestrator itself keeps no per-session state.
 */
export class DraftingOrchestrator {
  private readonly logger: Logger;
  private readonly timeouts: OrchestratorTimeouts;

  constructor(private readonly deps: OrchestratorDeps) {
    this.logger = deps.logger ?? consoleLogger;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...deps.timeouts };
  }

  async handleTurn(session: DraftingSession, input: TurnInput): Promise<TurnResult> {
    const message = input.message?.trim() ?? "";
    const attachments = input.attachments ?? [];
    session.addTurn(
      "user",
      message,
      attachments.map((a) => a.filename)
    );
    const turn = new TurnContext(session, this.logger);

    if (session.state === "idle") {
      const ready = await this.leaveIdle(turn);
      if (!ready) return turn.result();
    }

    const startedIn = session.state;
    const changed = new Set<string>(await this.extractAll(turn, attachments));

    const interpretation = this.interpret(session, message, startedIn);
    for (const { name, value } of interpretation.values) {
      if (session.ledger.setUserValue(name, value)) changed.add(name);
    }
    this.reportAmbiguity(turn, interpretation, startedIn);

    await this.evaluate(turn, [...changed]);
    return turn.result();
  }

  /** Sets a variable as user-provided; a changed value on a draft triggers a revision. */
  async correct(session: DraftingSession, name: string, raw: unknown): Promise<TurnResult> {
    const spec = findVariableSpec(session.motionType, name);
    if (!spec) throw new UnknownVariableError(name);
    const value = normalizeValue(spec.kind, raw);
    if (value === undefined) throw new InvalidValueError(name, raw);

    session.addTurn("user", `${spec.label}: ${formatValue(spec, value)}`);
    const turn = new TurnContext(session, this.logger);
    const changed = session.ledger.setUserValue(name, value);

    if (session.state === "idle") {
      turn.say(`Recorded ${spec.label}. Send a message to start drafting.`);
      return turn.result();
    }

    await this.evaluate(turn, changed ? [name] : []);
    return turn.result();
  }

  private async leaveIdle(turn: TurnContext): Promise<boolean> {
    const { session } = turn;
    try {
      const config = await this.deps.config.load();
      session.configuration = resolveConfiguration(config, session.motionType);
    } catch (error) {
      const code = error instanceof DraftingError ? error.code : "NOT_CONFIGURED";
      this.logger.warn({ sessionId: session.id, err: describeError(error) }, "[ORCHESTRATOR] Workspace not configured");
      turn.note({ code, message: describeError(error) });
      turn.say(
        `${describeError(error)}. Set up the knowledge store and drafting agent in the workspace settings, then send your message again.`
      );
      return false;
    }
    turn.enter("collecting_facts");
    return true;
  }

  private async extractAll(turn: TurnContext, attachments: Attachment[]): Promise<string[]> {
    const { session } = turn;
    const changed: string[] = [];

    for (const attachment of attachments) {
      try {
        const facts = await withTimeout("Extraction", this.timeouts.extractionMs, (signal) =>
          this.deps.extractor.extract(
            attachment.bytes,
            attachment.kind,
            session.motionType,
            { filename: attachment.filename, jurisdiction: session.jurisdiction, chapter: session.chapter },
            signal
          )
        );
        const merged = session.ledger.merge(facts);
        changed.push(...merged.filter((name) => !changed.includes(name)));

        const specs = merged.flatMap((name) => findVariableSpec(session.motionType, name) ?? []);
        turn.say(
          specs.length
            ? `From ${attachment.filename} I found: ${labelsOf(specs)}.`
            : `No new facts were found in ${attachment.filename}.`
        );
      } catch (error) {
        this.logger.warn(
          { sessionId: session.id, filename: attachment.filename, err: describeError(error) },
          "[ORCHESTRATOR] Extraction failed"
        );
        turn.note({
          code: "EXTRACTION_FAILED",
          message: `Could not extract facts from ${attachment.filename}: ${describeError(error)}`,
        });
      }
    }
    return changed;
  }

  /**
   * Labels are read against the whole schema, so a reply may correct a
   * resolved variable while answering another. Unlabelled answers count only
   * for what was asked and is still open.
   */
  private interpret(session: DraftingSession, message: string, state: DraftingStateName): AnswerInterpretation {
    const { ledger } = session;
    const requested =
      state === "awaiting_clarification" ? session.requested.filter((name) => !ledger.isResolved(name)) : [];
    return interpretAnswer(message, ledger.specs(), { requested });
  }

  private reportAmbiguity(turn: TurnContext, interpretation: AnswerInterpretation, state: DraftingStateName) {
    const { session } = turn;
    if (interpretation.ambiguous.length > 0) {
      const specs = interpretation.ambiguous.flatMap((name) => findVariableSpec(session.motionType, name) ?? []);
      turn.note({
        code: "AMBIGUOUS_ANSWER",
        message: `Could not tell which value belongs to: ${labelsOf(specs)}. Please answer as "label: value".`,
      });
      return;
    }
    if (state === "awaiting_clarification" && interpretation.unattributed) {
      turn.note({
        code: "AMBIGUOUS_ANSWER",
        message: `Your reply did not match any requested item. Please answer as "label: value".`,
      });
    }
  }

  private async evaluate(turn: TurnContext, changed: string[]) {
    const { session } = turn;

    if (session.state === "drafted") {
      if (changed.length === 0) {
        turn.say(
          `The draft (revision ${session.draft?.revision ?? 1}) is current. To change a fact, reply with "label: value".`
        );
        return;
      }
      turn.enter("revising");
      await this.draft(turn);
      turn.enter("drafted");
      return;
    }

    if (session.state === "awaiting_clarification") {
      turn.enter("collecting_facts");
    }

    if (!session.ledger.isComplete()) {
      const missing = session.ledger.missing();
      session.requested = missing;
      turn.enter("awaiting_clarification");
      const specs = missing.flatMap((name) => findVariableSpec(session.motionType, name) ?? []);
      turn.say(
        `To prepare the ${MOTION_LABELS[session.motionType]}, please provide:\n${specs
          .map((spec) => `- ${spec.label}`)
          .join("\n")}`
      );
      return;
    }

    session.requested = [];
    await this.draft(turn);
    turn.enter("drafted");
  }

  private async draft(turn: TurnContext) {
    const { session } = turn;
    const startTime = Date.now();

    let citations: KnowledgeResult[] = [];
    let citationsUnavailable = false;
    try {
      citations = await withTimeout("Knowledge lookup", this.timeouts.lookupMs, (signal) =>
        this.deps.router.lookup(
          { query: buildLookupQuery(session), motionType: session.motionType, jurisdiction: session.jurisdiction },
          signal
        )
      );
    } catch (error) {
      citationsUnavailable = true;
      this.logger.warn({ sessionId: session.id, err: describeError(error) }, "[ORCHESTRATOR] Knowledge lookup failed");
      turn.note({
        code: "LOOKUP_UNAVAILABLE",
        message: `Supporting authority could not be retrieved: ${describeError(error)}`,
      });
    }

    const facts = session.ledger.facts();
    const input = {
      motionType: session.motionType,
      facts,
      citations,
      citationsUnavailable,
      jurisdiction: session.jurisdiction,
      chapter: session.chapter,
    };

    let composed: ComposedDraft;
    const draftingAgentId = session.configuration?.draftingAgentId;
    try {
      if (!draftingAgentId) throw new NotConfiguredError("No drafting agent recorded for this session");
      composed = await withTimeout("Drafting", this.timeouts.draftingMs, (signal) =>
        this.deps.composer.compose({ ...input, draftingAgentId }, signal)
      );
    } catch (error) {
      this.logger.warn({ sessionId: session.id, err: describeError(error) }, "[ORCHESTRATOR] Composer failed, using template");
      composed = renderDraft(input);
    }

    const revision = (session.draft?.revision ?? 0) + 1;
    const draft: DraftState = {
      ...composed,
      citations,
      citationsUnavailable,
      revision,
      generatedAt: new Date().toISOString(),
      facts,
    };
    session.draft = draft;

    const duration = ((Date.now() - startTime) / 1000).toFixed(2);
    this.logger.info(
      { sessionId: session.id, revision, citations: citations.length, citationsUnavailable },
      `[ORCHESTRATOR] Draft composed in ${duration}s`
    );

    const authority = citationsUnavailable
      ? "Supporting authority could not be retrieved; the draft marks where citations are needed."
      : `${citations.length} supporting ${citations.length === 1 ? "authority" : "authorities"} cited.`;
    turn.say(
      revision === 1
        ? `The draft ${MOTION_LABELS[session.motionType]} and proposed order are ready. ${authority}`
        : `Revised the draft (revision ${revision}). ${authority}`
    );
  }
}

export function buildLookupQuery(session: Pick<DraftingSession, "motionType" | "jurisdiction" | "chapter">): string {
  const parts = [`${MOTION_LABELS[session.motionType]}: governing statutes, rules and case law`];
  if (session.chapter) parts.push(`Chapter ${session.chapter} case`);
  return parts.join(". ");
}
