import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { Readable } from "stream";
import { z, ZodError } from "zod";
import { assembleDraftDocument } from "./assembler/convert-to-word.js";
import type { SessionManager } from "./drafting/session-manager.js";
import { turnEvents } from "./drafting/reply-stream.js";
import type { Attachment } from "./drafting/session.js";
import type { TurnInput } from "./drafting/orchestrator.js";
import { DraftingError, NotConfiguredError, type DraftingErrorCode } from "./errors.js";
import { detectDocumentKind, extractDocumentText } from "./extraction/document-text.js";
import type { KnowledgeStoreCatalog, KnowledgeStoreRecord } from "./knowledge/knowledge-stores.js";
import type { KnowledgeDocument, KnowledgeIngestor } from "./knowledge/vector-index.js";
import type { Logger } from "./logger.js";
import { MOTION_LABELS, MOTION_TYPES } from "./motions/motion-types.js";
import {
  setDraftingAgent,
  setKnowledgeStore,
  type WorkspaceConfigStore,
} from "./workspace/workspace-config.js";

export type ServerDeps = {
  sessions: SessionManager;
  config: WorkspaceConfigStore;
  catalog: KnowledgeStoreCatalog;
  ingest: KnowledgeIngestor;
};

export type ServerOptions = {
  logger?: boolean;
  corsOrigins?: string[];
};

const STATUS_BY_CODE: Record<DraftingErrorCode, number> = {
  NOT_CONFIGURED: 409,
  EXTRACTION_FAILED: 422,
  LOOKUP_UNAVAILABLE: 503,
  AMBIGUOUS_ANSWER: 422,
  UNKNOWN_VARIABLE: 404,
  INVALID_VALUE: 400,
  SESSION_NOT_FOUND: 404,
  TIMEOUT: 504,
};

const MotionTypeSchema = z.enum(["value_claim", "avoid_lien"]);

const CreateSessionSchema = z.object({
  motionType: MotionTypeSchema,
  jurisdiction: z.string().optional(),
  chapter: z.string().optional(),
});

const SessionParams = z.object({ id: z.string().min(1) });
const VariableParams = SessionParams.extend({ name: z.string().min(1) });
const DraftParams = SessionParams.extend({ document: z.enum(["motion", "order"]) });
const TurnBody = z.object({ message: z.string().default("") });
const VariableBody = z.object({ value: z.union([z.string(), z.number()]) });
const AgentBody = z.object({ agentId: z.string().trim().min(1) });
const CreateStoresBody = z
  .object({ motionTypes: z.array(MotionTypeSchema).min(1).optional() })
  .default({});
const StoreParams = z.object({ motionType: MotionTypeSchema });

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

type UploadedFile = { filename: string; mimetype: string; bytes: Buffer };

async function readMultipart(req: FastifyRequest): Promise<{ fields: Record<string, string>; files: UploadedFile[] }> {
  const fields: Record<string, string> = {};
  const files: UploadedFile[] = [];
  for await (const part of req.parts()) {
    if (part.type === "file") {
      files.push({ filename: part.filename, mimetype: part.mimetype, bytes: await part.toBuffer() });
    } else {
      fields[part.fieldname] = typeof part.value === "string" ? part.value : String(part.value);
    }
  }
  return { fields, files };
}

function unsupportedFile(rep: FastifyReply, filename: string) {
  return rep.status(415).send({ error: `Unsupported file type: ${filename}. Upload PDF, DOCX or TXT files.` });
}

/**
 * Builds the HTTP API. Dependencies come from the caller so tests can run the
 * whole surface with in-process fakes through `app.inject`.
 */
export async function buildServer(
  options: ServerOptions,
  createDeps: (log: Logger) => ServerDeps
): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? true });
  const deps = createDeps(app.log);
  const { sessions, config, catalog, ingest } = deps;

  const allowedOrigins = options.corsOrigins ?? [];
  const isAllowedOrigin = (origin: string) => {
    if (origin.startsWith("http://localhost:") || origin.startsWith("http://127.0.0.1:")) return true;
    return allowedOrigins.includes(origin);
  };

  await app.register(cors, {
    hook: "onRequest",
    origin: (origin, cb) => {
      // Requests without an origin (curl, server-to-server) are allowed.
      if (!origin || isAllowedOrigin(origin)) {
        return cb(null, true);
      }
      app.log.warn(`CORS: origin denied: ${origin}`);
      return cb(new Error("Not allowed by CORS"), false);
    },
    methods: ["GET", "POST", "PUT", "OPTIONS"],
    credentials: true,
    allowedHeaders: ["Content-Type", "Authorization", "Accept"],
    exposedHeaders: ["Content-Disposition"],
    maxAge: 86400,
    optionsSuccessStatus: 204,
  });

  await app.register(multipart, {
    limits: {
      fileSize: 10 * 1024 * 1024, // 10MB
    },
  });

  app.setErrorHandler((error, req, rep) => {
    if (error instanceof ZodError) {
      return rep.status(400).send({ error: "Invalid request", issues: error.issues });
    }
    if (error instanceof DraftingError) {
      const status = STATUS_BY_CODE[error.code];
      if (status >= 500) req.log.error(error, `[API] ${error.code}`);
      return rep.status(status).send({ error: error.message, code: error.code });
    }
    if (error.statusCode && error.statusCode < 500) {
      return rep.status(error.statusCode).send({ error: error.message });
    }
    req.log.error(error, "[API] Unhandled error");
    return rep.status(500).send({ error: "Internal server error", message: error.message });
  });

  /** JSON `{ message }` or multipart with a `message` field and case documents. */
  async function readTurnInput(req: FastifyRequest): Promise<TurnInput | { unsupported: string }> {
    if (!req.isMultipart()) {
      return TurnBody.parse(req.body ?? {});
    }

    const { fields, files } = await readMultipart(req);
    const attachments: Attachment[] = [];
    for (const file of files) {
      const kind = detectDocumentKind(file.filename, file.mimetype);
      if (!kind) return { unsupported: file.filename };
      attachments.push({ filename: file.filename, kind, bytes: file.bytes });
    }
    return { message: fields.message ?? "", attachments };
  }

  app.get("/health", async () => ({ ok: true }));

  // --- Sessions ---

  app.post("/api/sessions", async (req, rep) => {
    const body = CreateSessionSchema.parse(req.body);
    return rep.status(201).send(sessions.create(body));
  });

  app.get("/api/sessions/:id", async (req) => {
    const { id } = SessionParams.parse(req.params);
    return sessions.get(id);
  });

  app.post("/api/sessions/:id/turns", async (req, rep) => {
    const { id } = SessionParams.parse(req.params);
    sessions.get(id);
    const input = await readTurnInput(req);
    if ("unsupported" in input) return unsupportedFile(rep, input.unsupported);
    return sessions.submitTurn(id, input);
  });

  app.post("/api/sessions/:id/turns/stream", async (req, rep) => {
    const { id } = SessionParams.parse(req.params);
    sessions.get(id);
    const input = await readTurnInput(req);
    if ("unsupported" in input) return unsupportedFile(rep, input.unsupported);
    const result = await sessions.submitTurn(id, input);

    rep.header("Content-Type", "text/event-stream; charset=utf-8");
    rep.header("Cache-Control", "no-cache");
    return rep.send(Readable.from(turnEvents(result)));
  });

  app.put("/api/sessions/:id/variables/:name", async (req) => {
    const { id, name } = VariableParams.parse(req.params);
    const { value } = VariableBody.parse(req.body);
    return sessions.correct(id, name, value);
  });

  app.post("/api/sessions/:id/clear", async (req) => {
    const { id } = SessionParams.parse(req.params);
    return sessions.clear(id);
  });

  app.get("/api/sessions/:id/draft/:document", async (req, rep) => {
    const { id, document } = DraftParams.parse(req.params);
    const view = sessions.get(id);
    if (!view.draft) {
      return rep.status(404).send({ error: "No draft has been generated for this session yet" });
    }

    const { filename, buffer } = await assembleDraftDocument(view.draft, view.motionType, document);
    rep.header("Content-Type", DOCX_MIME);
    rep.header("Content-Disposition", `attachment; filename="${filename}"; filename*=UTF-8''${encodeURIComponent(filename)}`);
    return rep.send(buffer);
  });

  // --- Workspace administration ---

  app.get("/api/admin/config", async () => config.load());

  app.put("/api/admin/drafting-agent", async (req) => {
    const { agentId } = AgentBody.parse(req.body);
    const next = await setDraftingAgent(config, agentId);
    app.log.info({ agentId }, "[ADMIN] Drafting agent configured");
    return next;
  });

  app.post("/api/admin/knowledge-stores", async (req, rep) => {
    const { motionTypes = MOTION_TYPES } = CreateStoresBody.parse(req.body ?? {});
    const stores: KnowledgeStoreRecord[] = [];
    for (const motionType of motionTypes) {
      const record = await catalog.ensureStore(motionType);
      await setKnowledgeStore(config, motionType, record.id);
      stores.push(record);
    }
    app.log.info({ stores: stores.map((s) => s.id) }, "[ADMIN] Knowledge stores registered");
    return rep.status(201).send({ stores, config: await config.load() });
  });

  app.get("/api/admin/knowledge-stores", async () => {
    const current = await config.load();
    const stores = [];
    for (const motionType of MOTION_TYPES) {
      const storeId = current.knowledgeStores[motionType];
      if (!storeId) {
        stores.push({ motionType, label: MOTION_LABELS[motionType], storeId: null, totalChunks: 0, documents: [] });
        continue;
      }
      const stats = await catalog.getStats(storeId);
      stores.push({ motionType, label: MOTION_LABELS[motionType], storeId, ...stats });
    }
    return { stores };
  });

  app.post("/api/admin/knowledge-stores/:motionType/documents", async (req, rep) => {
    const { motionType } = StoreParams.parse(req.params);
    if (!req.isMultipart()) {
      return rep.status(400).send({ error: "multipart/form-data is required" });
    }

    const { fields, files } = await readMultipart(req);
    if (files.length === 0) {
      return rep.status(400).send({ error: "No files were uploaded" });
    }

    const storeId = (await config.load()).knowledgeStores[motionType];
    if (!storeId) {
      throw new NotConfiguredError(`No knowledge store is configured for "${MOTION_LABELS[motionType]}"`);
    }

    const documents: KnowledgeDocument[] = [];
    for (const file of files) {
      const kind = detectDocumentKind(file.filename, file.mimetype);
      if (!kind) return unsupportedFile(rep, file.filename);
      const text = await extractDocumentText(file.bytes, kind);
      documents.push({
        text,
        title: file.filename.replace(/\.[^.]+$/, ""),
        jurisdiction: fields.jurisdiction || undefined,
        citation: fields.citation || undefined,
        url: fields.url || undefined,
      });
    }

    await ingest(storeId, motionType, documents);
    app.log.info({ storeId, documents: documents.length }, "[ADMIN] Documents ingested");
    return rep.status(201).send({ storeId, ingested: documents.map((d) => d.title) });
  });

  app.post("/api/admin/reset-workspace", async () => {
    await sessions.resetWorkspace();
    return { ok: true };
  });

  return app;
}
