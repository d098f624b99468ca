import type { Analysis, AnalysisPatch, MatchRecord, NotificationDraft } from './types';

export interface RecordStore {
  getAnalysis: (analysisId: string) => Promise<Analysis | null>;
  updateAnalysis: (analysisId: string, patch: AnalysisPatch) => Promise<void>;
  insertMatch: (match: MatchRecord) => Promise<void>;
  insertNotification: (notification: NotificationDraft) => Promise<void>;
}

export interface BlobStore {
  download: (objectPath: string) => Promise<Uint8Array>;
  upload: (objectPath: string, content: Uint8Array, contentType: string) => Promise<void>;
}

export const reportObjectPath = (analysisId: string): string => `reports/${analysisId}.pdf`;
