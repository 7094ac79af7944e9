import { existsSync } from "fs";
import { mkdir, readFile, unlink, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import { NotConfiguredError } from "../errors.js";
import { MOTION_LABELS, type MotionType } from "../motions/motion-types.js";

const WorkspaceConfigSchema = z.object({
  knowledgeStores: z
    .object({
      value_claim: z.string().min(1).optional(),
      avoid_lien: z.string().min(1).optional(),
    })
    .default({}),
  draftingAgentId: z.string().min(1).optional(),
});

export type WorkspaceConfig = z.infer<typeof WorkspaceConfigSchema>;

export type ResolvedConfiguration = {
  knowledgeStoreId: string;
  draftingAgentId: string;
};

export function emptyWorkspaceConfig(): WorkspaceConfig {
  return { knowledgeStores: {} };
}

/**
 * Store id for the motion plus the drafting agent id, or NotConfigured.
 */
export function resolveConfiguration(config: WorkspaceConfig, motionType: MotionType): ResolvedConfiguration {
  const knowledgeStoreId = config.knowledgeStores[motionType];
  const draftingAgentId = config.draftingAgentId;
  const missing: string[] = [];
  if (!knowledgeStoreId) missing.push(`knowledge store for "${MOTION_LABELS[motionType]}"`);
  if (!draftingAgentId) missing.push("drafting agent");

  if (!knowledgeStoreId || !draftingAgentId) {
    throw new NotConfiguredError(`Workspace is not configured: missing ${missing.join(" and ")}`, {
      details: { motionType, missing },
    });
  }
  return { knowledgeStoreId, draftingAgentId };
}

export interface WorkspaceConfigStore {
  load(): Promise<WorkspaceConfig>;
  save(config: WorkspaceConfig): Promise<void>;
  reset(): Promise<void>;
}

/**
 * Workspace configuration persisted as a JSON file.
 * A missing file reads as an empty configuration.
 */
export class FileWorkspaceConfigStore implements WorkspaceConfigStore {
  constructor(private readonly path: string) {}

  async load(): Promise<WorkspaceConfig> {
    if (!existsSync(this.path)) {
      return emptyWorkspaceConfig();
    }
    const raw = await readFile(this.path, "utf-8");
    return WorkspaceConfigSchema.parse(JSON.parse(raw));
  }

  async save(config: WorkspaceConfig): Promise<void> {
    const parsed = WorkspaceConfigSchema.parse(config);
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(parsed, null, 2), "utf-8");
  }

  async reset(): Promise<void> {
    if (existsSync(this.path)) {
      await unlink(this.path);
    }
  }
}

/** Keeps the configuration in memory. */
export class MemoryWorkspaceConfigStore implements WorkspaceConfigStore {
  private config: WorkspaceConfig;

  constructor(initial: WorkspaceConfig = emptyWorkspaceConfig()) {
    this.config = WorkspaceConfigSchema.parse(initial);
  }

  async load(): Promise<WorkspaceConfig> {
    return structuredClone(this.config);
  }

  async save(config: WorkspaceConfig): Promise<void> {
    this.config = WorkspaceConfigSchema.parse(config);
  }

  async reset(): Promise<void> {
    this.config = emptyWorkspaceConfig();
  }
}

export async function setKnowledgeStore(
  store: WorkspaceConfigStore,
  motionType: MotionType,
  storeId: string
): Promise<WorkspaceConfig> {
  const config = await store.load();
  const next: WorkspaceConfig = {
    ...config,
    knowledgeStores: { ...config.knowledgeStores, [motionType]: storeId },
  };
  await store.save(next);
  return next;
}

export async function setDraftingAgent(store: WorkspaceConfigStore, agentId: string): Promise<WorkspaceConfig> {
  const config = await store.load();
  const next: WorkspaceConfig = { ...config, draftingAgentId: agentId };
  await store.save(next);
  return next;
}
