import path from 'node:path';
import { ConfigSchema, type AppConfig, type PublicConfig, getPublicConfig as getPublicConfigShared } from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const stringFromEnv = (value: string | undefined, fallback: string): string => value?.trim() || fallback;

export type { AppConfig, PublicConfig };

export const DEFAULT_SIMILARITY_MODEL = 'sentence-transformers/all-MiniLM-L6-v2';

const similarityEndpointFor = (model: string) =>
  `https://router.huggingface.co/hf-inference/models/${model}/pipeline/sentence-similarity`;

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const model = stringFromEnv(env.SIMILARITY_MODEL, DEFAULT_SIMILARITY_MODEL);

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 8000),
    },
    storage: {
      supabaseUrl: env.SUPABASE_URL?.trim() || '',
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY?.trim() || '',
      bucket: stringFromEnv(env.SUPABASE_BUCKET, 'documents'),
      blobMode: env.BLOB_STORE?.trim().toLowerCase() === 'fs' ? 'fs' : 'supabase',
      blobRootDir: path.resolve(stringFromEnv(env.BLOB_ROOT, path.join(process.cwd(), 'blob_data'))),
      requestTimeoutMs: numberFromEnv(env.STORE_TIMEOUT_MS, 60_000),
    },
    search: {
      apiKey: env.SERPER_API_KEY?.trim() || undefined,
      endpoint: stringFromEnv(env.SERPER_ENDPOINT, 'https://google.serper.dev/search'),
      maxResults: numberFromEnv(env.SEARCH_MAX_RESULTS, 3),
      queryChars: numberFromEnv(env.SEARCH_QUERY_CHARS, 300),
      timeoutMs: numberFromEnv(env.SEARCH_TIMEOUT_MS, 10_000),
    },
    fetcher: {
      timeoutMs: numberFromEnv(env.FETCH_TIMEOUT_MS, 8_000),
      maxChars: numberFromEnv(env.FETCH_MAX_CHARS, 2_000),
      minContentChars: numberFromEnv(env.FETCH_MIN_CONTENT_CHARS, 100),
      userAgent: stringFromEnv(
        env.FETCH_USER_AGENT,
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36',
      ),
    },
    similarity: {
      apiToken: env.HF_API_TOKEN?.trim() || '',
      model,
      endpoint: stringFromEnv(env.SIMILARITY_ENDPOINT, similarityEndpointFor(model)),
      timeoutMs: numberFromEnv(env.SIMILARITY_TIMEOUT_MS, 30_000),
      maxRetries: numberFromEnv(env.SIMILARITY_RETRIES, 2),
      backoffMs: numberFromEnv(env.SIMILARITY_BACKOFF_MS, 5_000),
      maxInputChars: numberFromEnv(env.SIMILARITY_MAX_INPUT_CHARS, 1_000),
    },
    pipeline: {
      chunkWords: numberFromEnv(env.CHUNK_WORDS, 500),
      relevanceThreshold: numberFromEnv(env.RELEVANCE_THRESHOLD, 15),
      matchingTextChars: numberFromEnv(env.MATCHING_TEXT_CHARS, 500),
      maxConcurrentRuns: numberFromEnv(env.MAX_CONCURRENT_RUNS, 4),
    },
    report: {
      topSources: 10,
      wordsPerLine: 20,
      flagEveryWords: 60,
      flagThreshold: 20,
      lowTierBelow: 15,
      highTierAbove: 30,
    },
    observability: {
      logLevel: (env.LOG_LEVEL || 'info').toLowerCase(),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);

export const refreshConfig = (): AppConfig => {
  cachedConfig = null;
  return loadConfig();
};
