import pg from "pg";
import { MOTION_LABELS, type MotionType } from "../motions/motion-types.js";
const { Client } = pg;

/**
 * Catalog of motion knowledge stores (one row per motion type)
 * plus statistics over the chunks indexed into each store.
 */

export interface KnowledgeStoreRecord {
  id: string;
  name: string;
  motionType: MotionType;
  createdAt?: Date;
  updatedAt?: Date;
}

export interface IndexedDocument {
  title: string;
  jurisdiction: string;
  chunks: number;
}

export interface KnowledgeStoreStats {
  totalChunks: number;
  documents: IndexedDocument[];
}

export interface KnowledgeStoreCatalog {
  ensureStore(motionType: MotionType): Promise<KnowledgeStoreRecord>;
  getStats(storeId: string): Promise<KnowledgeStoreStats>;
}

type KnowledgeBaseRow = {
  id: string;
  name: string;
  metadata: { motionType?: string } | null;
  created_at: Date;
  updated_at: Date;
};

type CountRow = { count: string };
type DocumentRow = { title: string | null; jurisdiction: string | null; count: string };

export function storeIdFor(motionType: MotionType): string {
  return `${motionType}_store`;
}

function isMissingTable(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = "code" in error ? error.code : undefined;
  return code === "42P01" || error.message.includes("does not exist");
}

export class PgKnowledgeStoreCatalog implements KnowledgeStoreCatalog {
  constructor(private readonly dbUrl: string) {}

  private async withClient<T>(run: (client: pg.Client) => Promise<T>): Promise<T> {
    const client = new Client({ connectionString: this.dbUrl });
    await client.connect();
    try {
      return await run(client);
    } finally {
      await client.end();
    }
  }

  async ensureSchema(): Promise<void> {
    await this.withClient(async (client) => {
      await client.query(`
        CREATE TABLE IF NOT EXISTS knowledge_bases (
          id          text PRIMARY KEY,
          name        text NOT NULL,
          description text,
          source_type text NOT NULL,
          enabled     boolean DEFAULT true,
          metadata    jsonb DEFAULT '{}'::jsonb,
          created_at  timestamptz DEFAULT now(),
          updated_at  timestamptz DEFAULT now()
        )
      `);
    });
  }

  async ensureStore(motionType: MotionType): Promise<KnowledgeStoreRecord> {
    await this.ensureSchema();
    const id = storeIdFor(motionType);
    const name = `${MOTION_LABELS[motionType]} knowledge`;

    return this.withClient(async (client) => {
      const result = await client.query<KnowledgeBaseRow>(
        `INSERT INTO knowledge_bases (id, name, description, source_type, enabled, metadata, updated_at)
         VALUES ($1, $2, $3, 'motion', true, $4, now())
         ON CONFLICT (id)
         DO UPDATE SET
           name = EXCLUDED.name,
           metadata = EXCLUDED.metadata,
           updated_at = now()
         RETURNING id, name, metadata, created_at, updated_at`,
        [id, name, `Statutes, case law and templates for the ${MOTION_LABELS[motionType]}`, JSON.stringify({ motionType })]
      );

      const row = result.rows[0];
      return {
        id: row.id,
        name: row.name,
        motionType,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
      };
    });
  }

  /** Empty stats while nothing has been indexed yet (no chunks table). */
  async getStats(storeId: string): Promise<KnowledgeStoreStats> {
    return this.withClient(async (client) => {
      try {
        const totalResult = await client.query<CountRow>(
          `SELECT COUNT(*) AS count FROM chunks WHERE metadata->>'knowledgeBase' = $1`,
          [storeId]
        );
        const documentResult = await client.query<DocumentRow>(
          `SELECT metadata->>'title' AS title, metadata->>'jurisdiction' AS jurisdiction, COUNT(*) AS count
           FROM chunks
           WHERE metadata->>'knowledgeBase' = $1
           GROUP BY metadata->>'title', metadata->>'jurisdiction'
           ORDER BY title`,
          [storeId]
        );

        return {
          totalChunks: parseInt(totalResult.rows[0]?.count ?? "0", 10),
          documents: documentResult.rows.map((row) => ({
            title: row.title || "(unknown)",
            jurisdiction: row.jurisdiction || "N/A",
            chunks: parseInt(row.count, 10),
          })),
        };
      } catch (error) {
        if (isMissingTable(error)) {
          console.warn("[KNOWLEDGE] chunks table does not exist yet, returning empty stats");
          return { totalChunks: 0, documents: [] };
        }
        throw error;
      }
    });
  }
}
