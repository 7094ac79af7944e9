import type { DraftingErrorCode } from "../errors.js";
import type { DocumentKind } from "../extraction/document-text.js";
import type { KnowledgeResult } from "../knowledge/knowledge-router.js";
import { VariableLedger, type LedgerSnapshot } from "../ledger/variable-ledger.js";
import type { MotionType } from "../motions/motion-types.js";
import type { CaseValue } from "../motions/values.js";
import type { ResolvedConfiguration } from "../workspace/workspace-config.js";

export type DraftingStateName = "idle" | "collecting_facts" | "awaiting_clarification" | "drafted" | "revising";

export type Attachment = {
  filename: string;
  kind: DocumentKind;
  bytes: Buffer;
};

export type ConversationTurn = {
  speaker: "user" | "system";
  content: string;
  attachments: string[];
  at: string;
};

export type StatusNote = {
  code: DraftingErrorCode;
  message: string;
};

export type DraftState = {
  motionText: string;
  proposedOrderText: string;
  citations: KnowledgeResult[];
  citationsUnavailable: boolean;
  revision: number;
  generatedAt: string;
  facts: Record<string, CaseValue>;
};

export type TurnResult = {
  state: DraftingStateName;
  transitions: DraftingStateName[];
  reply: string;
  requested: string[];
  notes: StatusNote[];
  draft?: DraftState;
};

export type SessionOptions = {
  id: string;
  motionType: MotionType;
  jurisdiction?: string;
  chapter?: string;
};

export type SessionView = {
  id: string;
  motionType: MotionType;
  jurisdiction?: string;
  chapter?: string;
  state: DraftingStateName;
  requested: string[];
  ledger: LedgerSnapshot;
  turns: ConversationTurn[];
  draft?: DraftState;
};

/** One drafting conversation. Only the orchestrator mutates it. */
export class DraftingSession {
  readonly id: string;
  readonly motionType: MotionType;
  readonly jurisdiction?: string;
  readonly chapter?: string;

  state: DraftingStateName = "idle";
  ledger: VariableLedger;
  turns: ConversationTurn[] = [];
  draft?: DraftState;
  /** Variables named in the last clarification prompt. */
  requested: string[] = [];
  /** Read from the workspace config when the session leaves idle. */
  configuration?: ResolvedConfiguration;

  constructor(options: SessionOptions) {
    this.id = options.id;
    this.motionType = options.motionType;
    this.jurisdiction = options.jurisdiction;
    this.chapter = options.chapter;
    this.ledger = new VariableLedger(options.motionType);
  }

  addTurn(speaker: ConversationTurn["speaker"], content: string, attachments: string[] = []) {
    this.turns.push({ speaker, content, attachments, at: new Date().toISOString() });
  }

  /** Drops turns, draft and facts; motion type, jurisdiction and chapter stay. */
  clear() {
    this.state = "idle";
    this.ledger = new VariableLedger(this.motionType);
    this.turns = [];
    this.draft = undefined;
    this.requested = [];
    this.configuration = undefined;
  }

  view(): SessionView {
    return {
      id: this.id,
      motionType: this.motionType,
      jurisdiction: this.jurisdiction,
      chapter: this.chapter,
      state: this.state,
      requested: [...this.requested],
      ledger: this.ledger.snapshot(),
      turns: this.turns.map((t) => ({ ...t, attachments: [...t.attachments] })),
      draft: this.draft,
    };
  }
}
