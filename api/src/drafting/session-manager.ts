import { randomUUID } from "crypto";
import { SessionNotFoundError } from "../errors.js";
import { consoleLogger, type Logger } from "../logger.js";
import type { WorkspaceConfigStore } from "../workspace/workspace-config.js";
import type { DraftingOrchestrator, TurnInput } from "./orchestrator.js";
import { SessionLane } from "./session-lane.js";
import { DraftingSession, type SessionOptions, type SessionView, type TurnResult } from "./session.js";

type SessionEntry = {
  session: DraftingSession;
  lane: SessionLane;
};

export type SessionManagerDeps = {
  orchestrator: DraftingOrchestrator;
  config: WorkspaceConfigStore;
  logger?: Logger;
  newId?: () => string;
};

/**
 * In-memory session registry. Every operation on a session runs in that
 * session's lane, so turns of one session never interleave.
 */
export class SessionManager {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly logger: Logger;
  private readonly newId: () => string;

  constructor(private readonly deps: SessionManagerDeps) {
    this.logger = deps.logger ?? consoleLogger;
    this.newId = deps.newId ?? randomUUID;
  }

  create(options: Omit<SessionOptions, "id">): SessionView {
    const session = new DraftingSession({ ...options, id: this.newId() });
    this.sessions.set(session.id, { session, lane: new SessionLane(1) });
    this.logger.info({ sessionId: session.id, motionType: session.motionType }, "[SESSIONS] Session created");
    return session.view();
  }

  get(sessionId: string): SessionView {
    return this.entry(sessionId).session.view();
  }

  async submitTurn(sessionId: string, input: TurnInput): Promise<TurnResult> {
    const { session, lane } = this.entry(sessionId);
    return lane.run(() => this.deps.orchestrator.handleTurn(session, input));
  }

  async correct(sessionId: string, name: string, value: unknown): Promise<TurnResult> {
    const { session, lane } = this.entry(sessionId);
    return lane.run(() => this.deps.orchestrator.correct(session, name, value));
  }

  async clear(sessionId: string): Promise<SessionView> {
    const { session, lane } = this.entry(sessionId);
    return lane.run(async () => {
      session.clear();
      this.logger.info({ sessionId }, "[SESSIONS] Chat cleared");
      return session.view();
    });
  }

  /** Drops every session and the persisted workspace configuration. */
  async resetWorkspace(): Promise<void> {
    const entries = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(entries.map(({ session, lane }) => lane.run(async () => session.clear())));
    await this.deps.config.reset();
    this.logger.info({ sessions: entries.length }, "[SESSIONS] Workspace reset");
  }

  private entry(sessionId: string): SessionEntry {
    const entry = this.sessions.get(sessionId);
    if (!entry) throw new SessionNotFoundError(sessionId);
    return entry;
  }
}
