import { z } from 'zod';

export const APP_CONFIG = Symbol('APP_CONFIG');

const flag = z
  .string()
  .optional()
  .transform((v) => String(v ?? 'false').toLowerCase() === 'true');

const int = (def: number, min = 0) => z.coerce.number().int().min(min).default(def);

const EnvSchema = z
  .object({
    PORT: int(3000, 1),
    STORAGE_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
    DATABASE_URL: z.string().optional(),

    AWS_REGION: z.string().optional(),
    AWS_DEFAULT_REGION: z.string().optional(),
    BEDROCK_EMBED_MODEL: z.string().default('amazon.titan-embed-text-v2:0'),
    BEDROCK_LLM_MODEL: z.string().default('amazon.nova-lite-v1:0'),

    EMBEDDING_DIMENSION: int(512, 1),
    EMBEDDING_MAX_CHARS: int(8000, 1),
    EMBEDDING_BATCH_SIZE: int(16, 1),
    EMBEDDING_CONCURRENCY: int(4, 1),

    CHUNK_MAX_CHARS: int(1000, 20),
    CHUNK_OVERLAP_CHARS: int(100),

    RETRIEVAL_TOP_K: int(5, 1),
    RETRIEVAL_MIN_VECTOR_SCORE: z.coerce.number().min(-1).max(1).default(0.2),
    PROMPT_MAX_CONTEXT_CHARS: int(6000, 1),

    CONVERSATION_TTL_MINUTES: int(30, 1),
    CONVERSATION_HISTORY_TURNS: int(3),

    BACKEND_TIMEOUT_MS: int(15000, 1),
    RETRY_MAX_ATTEMPTS: int(3, 1),
    RETRY_BASE_DELAY_MS: int(200),
    RETRY_MAX_DELAY_MS: int(2000),

    DEV_MODE: flag,
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when STORAGE_DRIVER=postgres',
      });
    }
    if (env.CHUNK_OVERLAP_CHARS >= env.CHUNK_MAX_CHARS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHUNK_OVERLAP_CHARS'],
        message: 'CHUNK_OVERLAP_CHARS must be smaller than CHUNK_MAX_CHARS',
      });
    }
  });

export type RetryConfig = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type AppConfig = {
  port: number;
  devMode: boolean;
  storage: { driver: 'memory' | 'postgres'; databaseUrl?: string };
  bedrock: { region: string; embedModel: string; llmModel: string };
  embedding: {
    dimension: number;
    maxChars: number;
    batchSize: number;
    concurrency: number;
  };
  chunking: { maxChunkChars: number; overlapChars: number };
  retrieval: { topK: number; minVectorScore: number };
  synthesis: { maxContextChars: number; historyTurns: number };
  conversation: { ttlMs: number };
  backend: { timeoutMs: number; retry: RetryConfig };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    devMode: e.DEV_MODE,
    storage: { driver: e.STORAGE_DRIVER, databaseUrl: e.DATABASE_URL },
    bedrock: {
      region: e.AWS_REGION || e.AWS_DEFAULT_REGION || 'ap-south-1',
      embedModel: e.BEDROCK_EMBED_MODEL,
      llmModel: e.BEDROCK_LLM_MODEL,
    },
    embedding: {
      dimension: e.EMBEDDING_DIMENSION,
      maxChars: e.EMBEDDING_MAX_CHARS,
      batchSize: e.EMBEDDING_BATCH_SIZE,
      concurrency: e.EMBEDDING_CONCURRENCY,
    },
    chunking: {
      maxChunkChars: e.CHUNK_MAX_CHARS,
      overlapChars: e.CHUNK_OVERLAP_CHARS,
    },
    retrieval: {
      topK: e.RETRIEVAL_TOP_K,
      minVectorScore: e.RETRIEVAL_MIN_VECTOR_SCORE,
    },
    synthesis: {
      maxContextChars: e.PROMPT_MAX_CONTEXT_CHARS,
      historyTurns: e.CONVERSATION_HISTORY_TURNS,
    },
    conversation: { ttlMs: e.CONVERSATION_TTL_MINUTES * 60_000 },
    backend: {
      timeoutMs: e.BACKEND_TIMEOUT_MS,
      retry: {
        maxAttempts: e.RETRY_MAX_ATTEMPTS,
        baseDelayMs: e.RETRY_BASE_DELAY_MS,
        maxDelayMs: e.RETRY_MAX_DELAY_MS,
      },
    },
  };
}
