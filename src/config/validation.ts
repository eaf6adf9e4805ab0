import { z } from 'zod';

export const distanceMetricSchema = z.enum(['l2', 'cosine', 'dot']);
export const textUnitSchema = z.enum(['characters', 'tokens']);

export const configSchema = z.object({
  server: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    port: z.number().int().positive().default(3000),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  embedding: z.object({
    provider: z.enum(['openai', 'azure']).default('openai'),
    apiKey: z.string().min(1).optional(),
    model: z.string().min(1).default('text-embedding-3-small'),
    endpoint: z.string().url().optional(),
    apiVersion: z.string().min(1).optional(),
    deployment: z.string().min(1).optional(),
    maxRetries: z.number().int().min(0).default(3),
    timeoutMs: z.number().int().positive().default(30_000),
  }),
  llm: z.object({
    provider: z.enum(['openai', 'anthropic', 'openrouter']).default('openai'),
    apiKey: z.string().min(1).optional(),
    model: z.string().min(1).default('gpt-4o-mini'),
    maxTokens: z.number().int().positive().default(1024),
  }),
  chunking: z
    .object({
      size: z.number().int().positive().default(1000),
      overlap: z.number().int().min(0).default(100),
      unit: textUnitSchema.default('characters'),
    })
    .refine(c => c.overlap < c.size, {
      message: 'chunk overlap must be smaller than chunk size',
      path: ['overlap'],
    }),
  ingestion: z.object({
    batchSize: z.number().int().positive().default(64),
    concurrency: z.number().int().positive().default(1),
  }),
  index: z.object({
    metric: distanceMetricSchema.default('cosine'),
  }),
  retrieval: z.object({
    k: z.number().int().positive().default(4),
    maxContextLength: z.number().int().positive().default(6000),
  }),
  storage: z.object({
    maxUploadSizeMB: z.number().positive().default(50),
  }),
});

export type Config = z.infer<typeof configSchema>;
export type EmbeddingConfig = Config['embedding'];
export type LLMConfig = Config['llm'];
