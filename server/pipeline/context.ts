import type { AppConfig } from '../../shared/config';
import type { BlobStore, RecordStore } from '../../shared/stores';
import { createPdfTextExtractor, type TextExtractor } from '../extraction/pdfText';
import type { Logger } from '../obs/logger';
import { createReportGenerator, type ReportGenerator } from '../report/generateReport';
import { createContentFetcher, type ContentFetcher } from '../retrieval/contentFetcher';
import { createSerperFinder, type SourceFinder } from '../retrieval/serper';
import { createSimilarityScorer, type SimilarityScorer } from '../services/similarity';

/**
 * Everything a run needs, built once at startup and passed explicitly.
 */
export interface PipelineContext {
  config: AppConfig;
  logger: Logger;
  records: RecordStore;
  blobs: BlobStore;
  extractText: TextExtractor;
  findSources: SourceFinder;
  fetchContent: ContentFetcher;
  scorer: SimilarityScorer;
  reports: ReportGenerator;
}

export interface PipelineContextInit {
  config: AppConfig;
  logger: Logger;
  records: RecordStore;
  blobs: BlobStore;
}

export const createPipelineContext = ({ config, logger, records, blobs }: PipelineContextInit): PipelineContext => ({
  config,
  logger,
  records,
  blobs,
  extractText: createPdfTextExtractor(logger),
  findSources: createSerperFinder(config, logger),
  fetchContent: createContentFetcher(config, logger),
  scorer: createSimilarityScorer(config, logger),
  reports: createReportGenerator({ config, blobs, logger }),
});
