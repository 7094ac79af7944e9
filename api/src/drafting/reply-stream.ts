import type { TurnResult } from "./session.js";

/** Word-sized pieces of the reply; joined they give the reply back. */
export function* replyChunks(reply: string): Generator<string> {
  for (const match of reply.matchAll(/\S+\s*/g)) {
    yield match[0];
  }
}

function sseEvent(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

/**
 * Server-sent events for a finished turn: the reply as `delta` events, then
 * the whole turn result as `done`. The turn is resolved before streaming, so
 * nothing streamed is ever partial state.
 */
export function* turnEvents(result: TurnResult): Generator<string> {
  for (const text of replyChunks(result.reply)) {
    yield sseEvent("delta", { text });
  }
  yield sseEvent("done", result);
}
