import { PGVectorStore } from "@llamaindex/postgres";
import { Document, MetadataMode, VectorStoreIndex } from "llamaindex";
import type { MotionType } from "../motions/motion-types.js";
import type { ChunkMetadata, ChunkRetriever } from "./knowledge-router.js";

// All stores share the "chunks" table; metadata.knowledgeBase tells them apart.
function createStore(dbUrl: string) {
  return new PGVectorStore({
    clientConfig: { connectionString: dbUrl },
    schemaName: "public",
    tableName: "chunks",
  });
}

function readString(metadata: Record<string, unknown>, key: string): string | undefined {
  const value = metadata[key];
  return typeof value === "string" && value.trim() ? value : undefined;
}

export function toChunkMetadata(metadata: Record<string, unknown>): ChunkMetadata {
  return {
    knowledgeBase: readString(metadata, "knowledgeBase"),
    jurisdiction: readString(metadata, "jurisdiction"),
    title: readString(metadata, "title"),
    citation: readString(metadata, "citation"),
    source: readString(metadata, "source"),
    url: readString(metadata, "url"),
  };
}

export function createPgVectorRetriever(dbUrl: string): ChunkRetriever {
  let indexPromise: Promise<VectorStoreIndex> | undefined;

  const getIndex = () => {
    indexPromise ??= VectorStoreIndex.fromVectorStore(createStore(dbUrl)).catch((error: unknown) => {
      indexPromise = undefined;
      throw error;
    });
    return indexPromise;
  };

  return async (query, topK, signal) => {
    signal?.throwIfAborted();
    const index = await getIndex();
    const retriever = index.asRetriever({ similarityTopK: topK });
    const results = await retriever.retrieve(query);

    return results.map((r) => ({
      text: r.node.getContent(MetadataMode.NONE),
      score: r.score,
      metadata: toChunkMetadata(r.node.metadata),
    }));
  };
}

export type KnowledgeDocument = {
  text: string;
  title: string;
  jurisdiction?: string;
  citation?: string;
  url?: string;
};

export type KnowledgeIngestor = (
  storeId: string,
  motionType: MotionType,
  documents: KnowledgeDocument[]
) => Promise<void>;

export function createPgVectorIngestor(dbUrl: string): KnowledgeIngestor {
  return async (storeId, motionType, documents) => {
    const docs = documents.map(
      (d) =>
        new Document({
          text: d.text,
          metadata: {
            knowledgeBase: storeId,
            motionType,
            source: "upload",
            title: d.title,
            jurisdiction: d.jurisdiction,
            citation: d.citation,
            url: d.url,
          },
        })
    );

    // @ts-ignore - LlamaIndex types are inconsistent
    await VectorStoreIndex.fromDocuments(docs, { vectorStore: createStore(dbUrl) });
  };
}
