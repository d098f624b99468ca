export type AnalysisStatus = 'pending' | 'reading' | 'searching' | 'reporting' | 'done' | 'error';

export type TerminalStatus = Extract<AnalysisStatus, 'done' | 'error'>;

export interface Analysis {
  id: string;
  userId: string | null;
  filePath: string | null;
  fileName: string | null;
  status: AnalysisStatus;
  progress: number;
  plagiarismScore: number | null;
  reportPath: string | null;
}

export type AnalysisPatch = Partial<Pick<Analysis, 'status' | 'progress' | 'plagiarismScore' | 'reportPath'>>;

export interface SourceCandidate {
  url: string;
  title: string;
}

export interface CandidateSource extends SourceCandidate {
  /** Similarity on a 0–100 scale, two decimals. */
  score: number;
  /** First-seen order within the run. */
  order: number;
}

export interface MatchRecord {
  analysisId: string;
  url: string;
  title: string;
  similarityScore: number;
  matchingText: string;
  chunkIndex: number;
}

export interface NotificationDraft {
  userId: string;
  title: string;
  message: string;
}

export interface RunOutcome {
  analysisId: string;
  status: TerminalStatus;
  score: number;
  chunks: number;
  reportPath: string | null;
  error?: string;
}
