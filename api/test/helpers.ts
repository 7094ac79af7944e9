import { vi } from "vitest";
import type { FactExtractor } from "../src/extraction/fact-extractor.js";
import type { KnowledgeResult, KnowledgeRouter } from "../src/knowledge/knowledge-router.js";
import type { ExtractedFact } from "../src/ledger/variable-ledger.js";
import type { Logger } from "../src/logger.js";
import { MemoryWorkspaceConfigStore } from "../src/workspace/workspace-config.js";

export function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function configuredStore(): MemoryWorkspaceConfigStore {
  return new MemoryWorkspaceConfigStore({
    knowledgeStores: { value_claim: "value_claim_store", avoid_lien: "avoid_lien_store" },
    draftingAgentId: "gpt-test",
  });
}

export const CITATIONS: KnowledgeResult[] = [
  {
    citation: "11 U.S.C. § 506(a)",
    snippet: "An allowed claim of a creditor secured by a lien on property is a secured claim to the extent of the value of such creditor's interest.",
  },
];

export function fakeExtractor(facts: ExtractedFact[] = []) {
  const extract = vi.fn<FactExtractor["extract"]>(async () => facts);
  const extractor: FactExtractor = { extract };
  return { extractor, extract };
}

export function fakeRouter(results: KnowledgeResult[] = CITATIONS) {
  const lookup = vi.fn<KnowledgeRouter["lookup"]>(async () => results);
  const router: KnowledgeRouter = { lookup };
  return { router, lookup };
}

/** A lookup that only ends when its signal aborts. */
export function hangingRouter() {
  const lookup = vi.fn<KnowledgeRouter["lookup"]>(
    (_query, signal) =>
      new Promise<KnowledgeResult[]>((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(new Error("aborted")));
      })
  );
  const router: KnowledgeRouter = { lookup };
  return { router, lookup };
}

/** An extraction that only ends when its signal aborts. */
export function hangingExtractor() {
  const extract = vi.fn<FactExtractor["extract"]>(
    (_document, _kind, _motionType, _context, signal) =>
      new Promise<ExtractedFact[]>((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(new Error("aborted")));
      })
  );
  const extractor: FactExtractor = { extract };
  return { extractor, extract };
}
