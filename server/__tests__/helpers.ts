import http from 'node:http';
import { vi } from 'vitest';
import type { AppConfig } from '../../shared/config';
import type { BlobStore, RecordStore } from '../../shared/stores';
import type { Analysis, AnalysisPatch, MatchRecord, NotificationDraft } from '../../shared/types';
import { buildConfig } from '../config/config';
import type { Logger } from '../obs/logger';

const baseEnv: NodeJS.ProcessEnv = {
  NODE_ENV: 'test',
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
  HF_API_TOKEN: 'test-token',
  SERPER_API_KEY: 'test-key',
  SIMILARITY_BACKOFF_MS: '0',
  LOG_LEVEL: 'error',
};

export const makeTestConfig = (env: NodeJS.ProcessEnv = {}): AppConfig => buildConfig({ ...baseEnv, ...env });

export const silentLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

export const makeAnalysis = (overrides: Partial<Analysis> = {}): Analysis => ({
  id: 'analysis-1',
  userId: 'user-1',
  filePath: 'uploads/thesis.pdf',
  fileName: 'thesis.pdf',
  status: 'pending',
  progress: 0,
  plagiarismScore: null,
  reportPath: null,
  ...overrides,
});

export class MemoryRecordStore implements RecordStore {
  readonly analyses = new Map<string, Analysis>();
  readonly updates: Array<{ analysisId: string; patch: AnalysisPatch }> = [];
  readonly matches: MatchRecord[] = [];
  readonly notifications: NotificationDraft[] = [];
  failNotifications = false;
  failUpdatesWith: ((patch: AnalysisPatch) => Error | null) | null = null;

  constructor(analyses: Analysis[] = []) {
    for (const analysis of analyses) {
      this.analyses.set(analysis.id, { ...analysis });
    }
  }

  async getAnalysis(analysisId: string) {
    const found = this.analyses.get(analysisId);
    return found ? { ...found } : null;
  }

  async updateAnalysis(analysisId: string, patch: AnalysisPatch) {
    const failure = this.failUpdatesWith?.(patch);
    if (failure) {
      throw failure;
    }
    this.updates.push({ analysisId, patch });
    const existing = this.analyses.get(analysisId);
    if (existing) {
      this.analyses.set(analysisId, { ...existing, ...patch });
    }
  }

  async insertMatch(match: MatchRecord) {
    this.matches.push(match);
  }

  async insertNotification(notification: NotificationDraft) {
    if (this.failNotifications) {
      throw new Error('notifications table unavailable');
    }
    this.notifications.push(notification);
  }
}

export const createMemoryBlobStore = (objects: Record<string, Uint8Array> = {}) => {
  const stored = new Map<string, { content: Uint8Array; contentType: string }>();
  const store: BlobStore = {
    download: async (objectPath) => {
      const content = objects[objectPath];
      if (!content) {
        throw new Error(`Blob not found: ${objectPath}`);
      }
      return content;
    },
    upload: async (objectPath, content, contentType) => {
      stored.set(objectPath, { content, contentType });
    },
  };
  return { store, stored };
};

export interface TestHttpServer {
  url: string;
  close: () => Promise<void>;
}

/** Loopback server on an ephemeral port; `close` drops open sockets first. */
export const startHttpServer = async (handler: http.RequestListener): Promise<TestHttpServer> => {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return {
    url: `http://127.0.0.1:${address.port}`,
    close: async () => {
      server.closeAllConnections();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    },
  };
};

/** Handler that sends headers and a first fragment, then never ends the body. */
export const stallAfterHeaders =
  (contentType: string, fragment: string): http.RequestListener =>
  (_req, res) => {
    res.writeHead(200, { 'content-type': contentType });
    res.write(fragment);
  };
