import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { AppConfig } from '../../shared/config';
import type { BlobStore, RecordStore } from '../../shared/stores';
import type { Analysis, AnalysisPatch } from '../../shared/types';

const AnalysisRowSchema = z.object({
  id: z.string(),
  user_id: z.string().nullable().optional(),
  file_path: z.string().nullable().optional(),
  file_name: z.string().nullable().optional(),
  status: z.enum(['pending', 'reading', 'searching', 'reporting', 'done', 'error']).catch('pending'),
  progress: z.number().nullable().optional(),
  plagiarism_score: z.number().nullable().optional(),
  report_path: z.string().nullable().optional(),
});

const ANALYSIS_COLUMNS = 'id, user_id, file_path, file_name, status, progress, plagiarism_score, report_path';

const toAnalysis = (row: z.infer<typeof AnalysisRowSchema>): Analysis => ({
  id: row.id,
  userId: row.user_id ?? null,
  filePath: row.file_path ?? null,
  fileName: row.file_name ?? null,
  status: row.status,
  progress: row.progress ?? 0,
  plagiarismScore: row.plagiarism_score ?? null,
  reportPath: row.report_path ?? null,
});

const toAnalysisRow = (patch: AnalysisPatch): Record<string, unknown> => {
  const row: Record<string, unknown> = {};
  if (patch.status !== undefined) row.status = patch.status;
  if (patch.progress !== undefined) row.progress = patch.progress;
  if (patch.plagiarismScore !== undefined) row.plagiarism_score = patch.plagiarismScore;
  if (patch.reportPath !== undefined) row.report_path = patch.reportPath;
  return row;
};

/**
 * Server-side client with the service role key. Sessions are not persisted and
 * every request is bounded by `storage.requestTimeoutMs`.
 */
export const createSupabaseClient = (config: Pick<AppConfig, 'storage'>): SupabaseClient => {
  const timeoutMs = config.storage.requestTimeoutMs;
  const fetchWithTimeout: typeof fetch = (input, init) =>
    fetch(input, { ...init, signal: init?.signal ?? AbortSignal.timeout(timeoutMs) });

  return createClient(config.storage.supabaseUrl, config.storage.serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
    global: {
      fetch: fetchWithTimeout,
    },
  });
};

export const createSupabaseRecordStore = (client: SupabaseClient): RecordStore => ({
  getAnalysis: async (analysisId) => {
    const { data, error } = await client.from('analyses').select(ANALYSIS_COLUMNS).eq('id', analysisId).maybeSingle();
    if (error) {
      throw new Error(`Failed to load analysis ${analysisId}: ${error.message}`);
    }
    if (!data) {
      return null;
    }
    return toAnalysis(AnalysisRowSchema.parse(data));
  },

  updateAnalysis: async (analysisId, patch) => {
    const { error } = await client.from('analyses').update(toAnalysisRow(patch)).eq('id', analysisId);
    if (error) {
      throw new Error(`Failed to update analysis ${analysisId}: ${error.message}`);
    }
  },

  insertMatch: async (match) => {
    const { error } = await client.from('analysis_results').insert({
      analysis_id: match.analysisId,
      url: match.url,
      title: match.title,
      similarity_score: match.similarityScore,
      matching_text: match.matchingText,
      chunk_index: match.chunkIndex,
    });
    if (error) {
      throw new Error(`Failed to insert match for analysis ${match.analysisId}: ${error.message}`);
    }
  },

  insertNotification: async (notification) => {
    const { error } = await client.from('notifications').insert({
      user_id: notification.userId,
      title: notification.title,
      message: notification.message,
      is_read: false,
    });
    if (error) {
      throw new Error(`Failed to insert notification for user ${notification.userId}: ${error.message}`);
    }
  },
});

export const createSupabaseBlobStore = (client: SupabaseClient, bucket: string): BlobStore => ({
  download: async (objectPath) => {
    const { data, error } = await client.storage.from(bucket).download(objectPath);
    if (error || !data) {
      throw new Error(`Failed to download ${bucket}/${objectPath}: ${error?.message ?? 'empty body'}`);
    }
    return new Uint8Array(await data.arrayBuffer());
  },

  upload: async (objectPath, content, contentType) => {
    const { error } = await client.storage.from(bucket).upload(objectPath, content, { contentType, upsert: true });
    if (error) {
      throw new Error(`Failed to upload ${bucket}/${objectPath}: ${error.message}`);
    }
  },
});
