import "dotenv/config";
import OpenAI from "openai";
import { AgentDraftComposer } from "./drafting/draft-composer.js";
import { DraftingOrchestrator } from "./drafting/orchestrator.js";
import { SessionManager } from "./drafting/session-manager.js";
import { loadEnv, parseOrigins } from "./env.js";
import { createOpenAIFactExtractor } from "./extraction/fact-extractor.js";
import { createKnowledgeRouter } from "./knowledge/knowledge-router.js";
import { PgKnowledgeStoreCatalog } from "./knowledge/knowledge-stores.js";
import { createPgVectorIngestor, createPgVectorRetriever } from "./knowledge/vector-index.js";
import { createOpenAIJsonCompletion } from "./openai-client.js";
import { buildServer } from "./server.js";
import { FileWorkspaceConfigStore } from "./workspace/workspace-config.js";

async function start() {
  const env = loadEnv();
  const complete = createOpenAIJsonCompletion(new OpenAI({ apiKey: env.OPENAI_API_KEY }));
  const config = new FileWorkspaceConfigStore(env.WORKSPACE_CONFIG_PATH);

  const app = await buildServer({ corsOrigins: parseOrigins(env.CORS_ORIGINS) }, (log) => {
    const orchestrator = new DraftingOrchestrator({
      extractor: createOpenAIFactExtractor({ complete, model: env.EXTRACTION_MODEL, logger: log }),
      router: createKnowledgeRouter({
        config,
        retrieve: createPgVectorRetriever(env.DATABASE_URL),
        topK: env.KNOWLEDGE_TOP_K,
        logger: log,
      }),
      composer: new AgentDraftComposer(complete, log),
      config,
      logger: log,
      timeouts: {
        extractionMs: env.EXTRACTION_TIMEOUT_MS,
        lookupMs: env.LOOKUP_TIMEOUT_MS,
        draftingMs: env.DRAFTING_TIMEOUT_MS,
      },
    });

    return {
      sessions: new SessionManager({ orchestrator, config, logger: log }),
      config,
      catalog: new PgKnowledgeStoreCatalog(env.DATABASE_URL),
      ingest: createPgVectorIngestor(env.DATABASE_URL),
    };
  });

  await app.listen({ host: "0.0.0.0", port: env.PORT });
  app.log.info(`Server listening on port ${env.PORT}`);
}

start().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
