import type { RecordStore } from '../../shared/stores';
import type { AnalysisStatus } from '../../shared/types';

export const PHASE_PROGRESS = {
  reading: 10,
  searching: 10,
  searchingEnd: 80,
  reporting: 90,
  done: 100,
} as const;

/** Progress after `processed` of `total` chunks: 10 + floor(processed/total * 70). */
export const searchProgress = (processed: number, total: number): number => {
  if (total <= 0) {
    return PHASE_PROGRESS.searchingEnd;
  }
  const ratio = Math.min(1, Math.max(0, processed / total));
  const span = PHASE_PROGRESS.searchingEnd - PHASE_PROGRESS.searching;
  return PHASE_PROGRESS.searching + Math.floor(ratio * span);
};

type ActiveStatus = Extract<AnalysisStatus, 'reading' | 'searching' | 'reporting'>;

export interface ProgressTracker {
  current: () => { status: AnalysisStatus; progress: number };
  advance: (status: ActiveStatus, progress: number) => Promise<void>;
  complete: (result: { score: number; reportPath: string | null }) => Promise<void>;
  fail: () => Promise<void>;
}

/**
 * Writes the analysis state machine to the record store. Progress written
 * through `advance` never goes backwards; `complete` pins it to 100 and `fail`
 * resets it to 0 together with the score.
 */
export const makeProgressTracker = (analysisId: string, records: RecordStore): ProgressTracker => {
  let status: AnalysisStatus = 'pending';
  let progress = 0;

  return {
    current: () => ({ status, progress }),

    advance: async (nextStatus, nextProgress) => {
      const clamped = Math.min(PHASE_PROGRESS.done - 1, Math.max(progress, Math.floor(nextProgress)));
      await records.updateAnalysis(analysisId, { status: nextStatus, progress: clamped });
      status = nextStatus;
      progress = clamped;
    },

    complete: async ({ score, reportPath }) => {
      await records.updateAnalysis(analysisId, {
        status: 'done',
        progress: PHASE_PROGRESS.done,
        plagiarismScore: score,
        reportPath,
      });
      status = 'done';
      progress = PHASE_PROGRESS.done;
    },

    fail: async () => {
      status = 'error';
      progress = 0;
      await records.updateAnalysis(analysisId, { status: 'error', progress: 0, plagiarismScore: 0 });
    },
  };
};
