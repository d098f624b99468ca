import { z } from 'zod';

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
  }),
  storage: z.object({
    supabaseUrl: z.string().url(),
    serviceRoleKey: z.string().min(1),
    bucket: z.string().min(1),
    blobMode: z.enum(['supabase', 'fs']),
    blobRootDir: z.string().min(1),
    requestTimeoutMs: z.number().int().positive(),
  }),
  search: z.object({
    apiKey: z.string().optional(),
    endpoint: z.string().url(),
    maxResults: z.number().int().positive().max(10),
    queryChars: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
  }),
  fetcher: z.object({
    timeoutMs: z.number().int().positive(),
    maxChars: z.number().int().positive(),
    minContentChars: z.number().int().nonnegative(),
    userAgent: z.string().min(1),
  }),
  similarity: z.object({
    apiToken: z.string().min(1),
    model: z.string().min(1),
    endpoint: z.string().url(),
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().nonnegative(),
    backoffMs: z.number().int().nonnegative(),
    maxInputChars: z.number().int().positive(),
  }),
  pipeline: z.object({
    chunkWords: z.number().int().positive(),
    relevanceThreshold: z.number().min(0).max(100),
    matchingTextChars: z.number().int().positive(),
    maxConcurrentRuns: z.number().int().positive(),
  }),
  report: z.object({
    topSources: z.number().int().positive(),
    wordsPerLine: z.number().int().positive(),
    flagEveryWords: z.number().int().positive(),
    flagThreshold: z.number().min(0).max(100),
    lowTierBelow: z.number().min(0).max(100),
    highTierAbove: z.number().min(0).max(100),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  search: {
    maxResults: number;
    queryChars: number;
  };
  pipeline: {
    chunkWords: number;
    relevanceThreshold: number;
    maxConcurrentRuns: number;
  };
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  search: {
    maxResults: config.search.maxResults,
    queryChars: config.search.queryChars,
  },
  pipeline: {
    chunkWords: config.pipeline.chunkWords,
    relevanceThreshold: config.pipeline.relevanceThreshold,
    maxConcurrentRuns: config.pipeline.maxConcurrentRuns,
  },
});
