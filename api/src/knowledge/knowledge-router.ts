import { LookupUnavailableError, describeError } from "../errors.js";
import { consoleLogger, type Logger } from "../logger.js";
import { MOTION_LABELS, type MotionType } from "../motions/motion-types.js";
import type { WorkspaceConfigStore } from "../workspace/workspace-config.js";

export type KnowledgeQuery = {
  query: string;
  motionType: MotionType;
  jurisdiction?: string;
};

export type KnowledgeResult = {
  snippet: string;
  citation: string;
};

export interface KnowledgeRouter {
  /** Ranked supporting authority, or LookupUnavailableError. */
  lookup(query: KnowledgeQuery, signal?: AbortSignal): Promise<KnowledgeResult[]>;
}

export type ChunkMetadata = {
  knowledgeBase?: string;
  jurisdiction?: string;
  title?: string;
  citation?: string;
  source?: string;
  url?: string;
};

export type RetrievedChunk = {
  text: string;
  score?: number;
  metadata: ChunkMetadata;
};

/** Similarity search over every indexed chunk, best match first. */
export type ChunkRetriever = (query: string, topK: number, signal?: AbortSignal) => Promise<RetrievedChunk[]>;

const MAX_SNIPPET_CHARS = 800;

function sameJurisdiction(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function toCitation(metadata: ChunkMetadata): string {
  const label = metadata.citation || metadata.title || "Unlabeled source";
  return metadata.url ? `${label} (${metadata.url})` : label;
}

export type KnowledgeRouterOptions = {
  config: WorkspaceConfigStore;
  retrieve: ChunkRetriever;
  topK?: number;
  logger?: Logger;
};

/**
 * Each motion type owns one knowledge store. The retriever searches the shared
 * chunk index; results are narrowed to the motion's store afterwards, and the
 * jurisdiction only filters out chunks tagged with a different one.
 */
export function createKnowledgeRouter(options: KnowledgeRouterOptions): KnowledgeRouter {
  const topK = options.topK ?? 6;
  const logger = options.logger ?? consoleLogger;

  return {
    async lookup({ query, motionType, jurisdiction }, signal) {
      const config = await options.config.load();
      const storeId = config.knowledgeStores[motionType];
      if (!storeId) {
        throw new LookupUnavailableError(`No knowledge store configured for ${MOTION_LABELS[motionType]}`);
      }

      const fullQuery = jurisdiction ? `${query}\nJurisdiction: ${jurisdiction}` : query;

      let chunks: RetrievedChunk[];
      try {
        chunks = await options.retrieve(fullQuery, topK * 2, signal);
      } catch (error) {
        throw new LookupUnavailableError(`Knowledge store ${storeId} unavailable: ${describeError(error)}`, {
          cause: error,
        });
      }

      const results = chunks
        .filter((chunk) => chunk.metadata.knowledgeBase === storeId)
        .filter((chunk) => {
          const tagged = chunk.metadata.jurisdiction;
          return !jurisdiction || !tagged || sameJurisdiction(tagged, jurisdiction);
        })
        .slice(0, topK)
        .map((chunk) => ({
          snippet: chunk.text.trim().substring(0, MAX_SNIPPET_CHARS),
          citation: toCitation(chunk.metadata),
        }));

      logger.info({ storeId, motionType, jurisdiction, results: results.length }, "[KNOWLEDGE] Lookup completed");
      return results;
    },
  };
}
