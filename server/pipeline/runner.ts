import type { RunOutcome } from '../../shared/types';
import { describeError } from '../obs/logger';
import { Semaphore } from '../utils/concurrency';
import type { PipelineContext } from './context';
import { runAnalysis, type AnalysisJob } from './runAnalysis';

export interface AnalysisRunner {
  /** Schedules a run. Returns false when the analysis is already queued or running. */
  dispatch: (job: AnalysisJob) => boolean;
  isActive: (analysisId: string) => boolean;
  /** Resolves once every dispatched run has settled. */
  idle: () => Promise<void>;
}

export type RunFn = (ctx: PipelineContext, job: AnalysisJob) => Promise<RunOutcome>;

export const createAnalysisRunner = (ctx: PipelineContext, run: RunFn = runAnalysis): AnalysisRunner => {
  const slots = new Semaphore(ctx.config.pipeline.maxConcurrentRuns);
  const active = new Map<string, Promise<void>>();

  const execute = async (job: AnalysisJob) => {
    const release = await slots.acquire();
    try {
      const outcome = await run(ctx, job);
      ctx.logger.info('Analysis run settled', {
        analysisId: outcome.analysisId,
        status: outcome.status,
        score: outcome.score,
      });
    } finally {
      release();
    }
  };

  const dispatch = (job: AnalysisJob): boolean => {
    if (active.has(job.analysisId)) {
      return false;
    }
    const task = execute(job)
      .catch((error: unknown) => {
        ctx.logger.error('Analysis run crashed', { analysisId: job.analysisId, error: describeError(error) });
      })
      .finally(() => {
        active.delete(job.analysisId);
      });
    active.set(job.analysisId, task);
    ctx.logger.debug('Analysis dispatched', { analysisId: job.analysisId, queued: slots.waiting });
    return true;
  };

  return {
    dispatch,
    isActive: (analysisId) => active.has(analysisId),
    idle: async () => {
      while (active.size > 0) {
        await Promise.all(Array.from(active.values()));
      }
    },
  };
};
