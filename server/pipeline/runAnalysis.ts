import path from 'node:path';
import type { Analysis, RunOutcome, SourceCandidate } from '../../shared/types';
import { describeError } from '../obs/logger';
import { createSourceCollector, type SourceCollector } from '../retrieval/dedup';
import { aggregateScore, isRelevant, toPercent } from './aggregate';
import { chunkWords } from './chunker';
import type { PipelineContext } from './context';
import { makeProgressTracker, PHASE_PROGRESS, searchProgress } from './progress';

export interface AnalysisJob {
  analysisId: string;
  filePath: string;
}

const documentNameOf = (analysis: Analysis, filePath: string): string =>
  analysis.fileName?.trim() || path.posix.basename(filePath) || filePath;

const notify = async (
  ctx: PipelineContext,
  analysisId: string,
  userId: string | null | undefined,
  title: string,
  message: string,
) => {
  if (!userId) {
    ctx.logger.debug('Notification skipped: analysis has no owner', { analysisId, title });
    return;
  }
  try {
    await ctx.records.insertNotification({ userId, title, message });
  } catch (error) {
    ctx.logger.warn('Notification failed', { analysisId, title, error: describeError(error) });
  }
};

const scoreCandidate = async (
  ctx: PipelineContext,
  job: AnalysisJob,
  chunk: string,
  chunkIndex: number,
  candidate: SourceCandidate,
  collector: SourceCollector,
): Promise<number | null> => {
  const { fetcher, pipeline } = ctx.config;
  const content = await ctx.fetchContent(candidate.url);
  if (content.trim().length < fetcher.minContentChars) {
    ctx.logger.debug('Candidate skipped: not enough text', { analysisId: job.analysisId, url: candidate.url });
    return null;
  }

  const score = toPercent(await ctx.scorer.score(chunk, content));
  if (isRelevant(score, pipeline.relevanceThreshold)) {
    await ctx.records.insertMatch({
      analysisId: job.analysisId,
      url: candidate.url,
      title: candidate.title,
      similarityScore: score,
      matchingText: content.slice(0, pipeline.matchingTextChars),
      chunkIndex,
    });
    collector.add(candidate, score);
  }
  return score;
};

/** Best score among the chunk's candidates, 0 when none could be scored. */
const analyzeChunk = async (
  ctx: PipelineContext,
  job: AnalysisJob,
  chunk: string,
  chunkIndex: number,
  collector: SourceCollector,
): Promise<number> => {
  const query = chunk.slice(0, ctx.config.search.queryChars);
  const candidates = await ctx.findSources(query, ctx.config.search.maxResults);
  let best = 0;
  for (const candidate of candidates) {
    try {
      const score = await scoreCandidate(ctx, job, chunk, chunkIndex, candidate, collector);
      if (score != null && score > best) {
        best = score;
      }
    } catch (error) {
      ctx.logger.warn('Candidate processing failed', {
        analysisId: job.analysisId,
        chunkIndex,
        url: candidate.url,
        error: describeError(error),
      });
    }
  }
  return best;
};

/**
 * Runs one analysis end to end. Never rejects: failures end in the `error`
 * state and are reported through the returned outcome.
 */
export const runAnalysis = async (ctx: PipelineContext, job: AnalysisJob): Promise<RunOutcome> => {
  const { analysisId } = job;
  const { logger, records } = ctx;
  const progress = makeProgressTracker(analysisId, records);
  let analysis: Analysis | null = null;
  let chunkCount = 0;

  try {
    analysis = await records.getAnalysis(analysisId);
    if (!analysis) {
      throw new Error(`Analysis ${analysisId} not found`);
    }
    const documentName = documentNameOf(analysis, job.filePath);

    await progress.advance('reading', PHASE_PROGRESS.reading);
    const content = await ctx.blobs.download(job.filePath);
    const text = await ctx.extractText(content);

    if (!text.trim()) {
      logger.info('No extractable text; finishing with score 0', { analysisId });
      await progress.complete({ score: 0, reportPath: null });
      await notify(ctx, analysisId, analysis.userId, 'Analysis complete', `"${documentName}" contains no readable text; score 0%.`);
      return { analysisId, status: 'done', score: 0, chunks: 0, reportPath: null };
    }

    const chunks = chunkWords(text, ctx.config.pipeline.chunkWords);
    chunkCount = chunks.length;
    await progress.advance('searching', PHASE_PROGRESS.searching);
    logger.info('Analysis started', { analysisId, chunks: chunks.length });

    const collector = createSourceCollector();
    const chunkMaxima: number[] = [];
    for (const [index, chunk] of chunks.entries()) {
      chunkMaxima.push(await analyzeChunk(ctx, job, chunk, index, collector));
      await progress.advance('searching', searchProgress(index + 1, chunks.length));
    }

    const score = aggregateScore(chunkMaxima);

    await progress.advance('reporting', PHASE_PROGRESS.reporting);
    const reportPath = await ctx.reports.generate({
      analysisId,
      documentName,
      score,
      sources: collector.ranked(ctx.config.report.topSources),
      text,
    });

    await progress.complete({ score, reportPath });
    logger.info('Analysis finished', { analysisId, score, sources: collector.size(), reportPath });
    await notify(ctx, analysisId, analysis.userId, 'Analysis complete', `"${documentName}" scored ${score.toFixed(2)}% similarity.`);
    return { analysisId, status: 'done', score, chunks: chunkCount, reportPath };
  } catch (error) {
    const message = describeError(error);
    logger.error('Analysis failed', { analysisId, stage: progress.current().status, error: message });
    try {
      await progress.fail();
    } catch (updateError) {
      logger.error('Could not mark analysis as failed', { analysisId, error: describeError(updateError) });
    }
    await notify(ctx, analysisId, analysis?.userId, 'Analysis failed', 'Your document could not be analyzed. Please try again.');
    return { analysisId, status: 'error', score: 0, chunks: chunkCount, reportPath: null, error: message };
  }
};
