import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
  WORKSPACE_CONFIG_PATH: z.string().min(1).default("./workspace-config.json"),
  EXTRACTION_MODEL: z.string().min(1).default("gpt-4o-mini"),
  EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  DRAFTING_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  KNOWLEDGE_TOP_K: z.coerce.number().int().positive().default(6),
  CORS_ORIGINS: z.string().default(""),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(source);
}

export function parseOrigins(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}
