import { z } from "zod";
import { ValidationError } from "@/shared/lib/errors";

export type RepositoryKind = "memory" | "file" | "supabase";

// 0.4 is the usual Euclidean tolerance for 128-d face embeddings
export const DEFAULT_SYSTEM_CONFIG = {
  TOLERANCE: 0.4, // Euclidean distance, lower = stricter
  EMBEDDING_DIMENSION: 128,
  MAX_EMBEDDINGS_PER_IDENTITY: 15,
  TOP_N: 10,
  HISTORY_DAYS: 30,
  DATA_DIR: "data",
};

export const systemConfigSchema = z
  .object({
    tolerance: z.number().finite().min(0).default(DEFAULT_SYSTEM_CONFIG.TOLERANCE),
    embeddingDimension: z.number().int().positive().default(DEFAULT_SYSTEM_CONFIG.EMBEDDING_DIMENSION),
    maxEmbeddingsPerIdentity: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_SYSTEM_CONFIG.MAX_EMBEDDINGS_PER_IDENTITY),
    topN: z.number().int().positive().default(DEFAULT_SYSTEM_CONFIG.TOP_N),
    historyDays: z.number().int().nonnegative().default(DEFAULT_SYSTEM_CONFIG.HISTORY_DAYS),
    repository: z.enum(["memory", "file", "supabase"]).default("memory"),
    dataDir: z.string().min(1).default(DEFAULT_SYSTEM_CONFIG.DATA_DIR),
    supabaseUrl: z.string().url().optional(),
    supabaseKey: z.string().min(1).optional(),
  })
  .strict();

export type SystemConfig = z.infer<typeof systemConfigSchema>;
export type SystemConfigInput = z.input<typeof systemConfigSchema>;

export const parseSystemConfig = (input: SystemConfigInput = {}): SystemConfig => {
  const result = systemConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
    throw new ValidationError("Invalid system configuration", issues);
  }
  return result.data;
};

const numberFromEnv = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
};

const repositoryFromEnv = (value: string | undefined): RepositoryKind | undefined => {
  if (value === "memory" || value === "file" || value === "supabase") return value;
  if (value !== undefined && value !== "") {
    console.warn(`[config] Unknown ATTENDANCE_REPOSITORY "${value}", using memory`);
  }
  return undefined;
};

/**
 * Build the configuration from environment variables. Values that are not
 * set fall back to the defaults; malformed numbers fail validation.
 */
export const loadSystemConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): SystemConfig =>
  parseSystemConfig({
    tolerance: numberFromEnv(env.FACE_MATCH_TOLERANCE),
    embeddingDimension: numberFromEnv(env.FACE_EMBEDDING_DIMENSION),
    maxEmbeddingsPerIdentity: numberFromEnv(env.FACE_MAX_EMBEDDINGS_PER_IDENTITY),
    topN: numberFromEnv(env.ATTENDANCE_TOP_N),
    historyDays: numberFromEnv(env.ATTENDANCE_HISTORY_DAYS),
    repository: repositoryFromEnv(env.ATTENDANCE_REPOSITORY),
    dataDir: env.ATTENDANCE_DATA_DIR || undefined,
    supabaseUrl: env.SUPABASE_URL || undefined,
    supabaseKey: env.SUPABASE_ANON_KEY || undefined,
  });

export const hasSupabaseConfig = (
  config: SystemConfig,
): config is SystemConfig & { supabaseUrl: string; supabaseKey: string } =>
  Boolean(config.supabaseUrl && config.supabaseKey);
