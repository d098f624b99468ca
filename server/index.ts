import 'dotenv/config';
import { loadConfig } from './config/config';
import { createApp } from './app';
import { createLogger } from './obs/logger';
import { createFsBlobStore } from './persistence/fsStore';
import { createSupabaseBlobStore, createSupabaseClient, createSupabaseRecordStore } from './persistence/supabaseStore';
import { createPipelineContext } from './pipeline/context';
import { createAnalysisRunner } from './pipeline/runner';

const config = loadConfig();
const logger = createLogger(config, { bindings: { service: 'plagiarism-pipeline', env: config.environment } });
logger.info('Config loaded', {
  environment: config.environment,
  blobStore: config.storage.blobMode,
  bucket: config.storage.bucket,
  search: { hasApiKey: Boolean(config.search.apiKey), maxResults: config.search.maxResults },
  similarity: { model: config.similarity.model, retries: config.similarity.maxRetries },
  chunkWords: config.pipeline.chunkWords,
});

const supabase = createSupabaseClient(config);
const records = createSupabaseRecordStore(supabase);
const blobs =
  config.storage.blobMode === 'fs' ? createFsBlobStore(config) : createSupabaseBlobStore(supabase, config.storage.bucket);

const context = createPipelineContext({ config, logger, records, blobs });
const runner = createAnalysisRunner(context);
const app = createApp({ config, logger, records, runner });

const port = config.server.port;

app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});
