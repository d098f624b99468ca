import { describe, expect, it } from 'vitest';
import { buildConfig, DEFAULT_SIMILARITY_MODEL } from '../../server/config/config';
import { getPublicConfig } from '../config';

const requiredEnv: NodeJS.ProcessEnv = {
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
  HF_API_TOKEN: 'test-token',
};

describe('buildConfig', () => {
  it('fills defaults for everything optional', () => {
    const config = buildConfig(requiredEnv);

    expect(config.environment).toBe('development');
    expect(config.server.port).toBe(8000);
    expect(config.storage).toMatchObject({ bucket: 'documents', blobMode: 'supabase', requestTimeoutMs: 60_000 });
    expect(config.search).toMatchObject({ apiKey: undefined, maxResults: 3, queryChars: 300, timeoutMs: 10_000 });
    expect(config.fetcher).toMatchObject({ timeoutMs: 8_000, maxChars: 2_000, minContentChars: 100 });
    expect(config.similarity).toMatchObject({
      model: DEFAULT_SIMILARITY_MODEL,
      endpoint: `https://router.huggingface.co/hf-inference/models/${DEFAULT_SIMILARITY_MODEL}/pipeline/sentence-similarity`,
      maxRetries: 2,
      backoffMs: 5_000,
      maxInputChars: 1_000,
    });
    expect(config.pipeline).toEqual({
      chunkWords: 500,
      relevanceThreshold: 15,
      matchingTextChars: 500,
      maxConcurrentRuns: 4,
    });
    expect(config.observability.logLevel).toBe('info');
  });

  it('applies overrides and ignores unparsable numbers', () => {
    const config = buildConfig({
      ...requiredEnv,
      NODE_ENV: 'Production',
      PORT: '9001',
      BLOB_STORE: 'FS',
      SIMILARITY_MODEL: 'org/custom-model',
      CHUNK_WORDS: 'lots',
      RELEVANCE_THRESHOLD: '20',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.environment).toBe('production');
    expect(config.server.port).toBe(9001);
    expect(config.storage.blobMode).toBe('fs');
    expect(config.similarity.endpoint).toBe(
      'https://router.huggingface.co/hf-inference/models/org/custom-model/pipeline/sentence-similarity',
    );
    expect(config.pipeline.chunkWords).toBe(500);
    expect(config.pipeline.relevanceThreshold).toBe(20);
    expect(config.observability.logLevel).toBe('debug');
  });

  it('requires the similarity token', () => {
    expect(() => buildConfig({ ...requiredEnv, HF_API_TOKEN: '  ' })).toThrow();
  });

  it('caps search results at ten', () => {
    expect(() => buildConfig({ ...requiredEnv, SEARCH_MAX_RESULTS: '25' })).toThrow();
  });
});

describe('getPublicConfig', () => {
  it('exposes only search and pipeline tuning', () => {
    const publicConfig = getPublicConfig(buildConfig({ ...requiredEnv, SERPER_API_KEY: 'test-key' }));

    expect(publicConfig).toEqual({
      search: { maxResults: 3, queryChars: 300 },
      pipeline: { chunkWords: 500, relevanceThreshold: 15, maxConcurrentRuns: 4 },
    });
  });
});
