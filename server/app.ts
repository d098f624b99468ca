import cors from 'cors';
import express from 'express';
import type { Express, Request, Response } from 'express';
import type { AppConfig } from '../shared/config';
import { getPublicConfig } from '../shared/config';
import type { RecordStore } from '../shared/stores';
import type { Logger } from './obs/logger';
import { describeError } from './obs/logger';
import type { AnalysisRunner } from './pipeline/runner';

export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  records: RecordStore;
  runner: AnalysisRunner;
}

export const createApp = ({ config, logger, records, runner }: AppDeps): Express => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.post('/start-analysis/:analysisId', async (req: Request, res: Response) => {
    const analysisId = String(req.params.analysisId || '').trim();
    if (!analysisId) {
      res.status(400).json({ error: 'Missing analysis id' });
      return;
    }

    try {
      const analysis = await records.getAnalysis(analysisId);
      const filePath = analysis?.filePath?.trim();
      if (!analysis || !filePath) {
        res.status(404).json({ error: 'Analysis not found' });
        return;
      }

      if (!runner.dispatch({ analysisId, filePath })) {
        res.status(409).json({ error: 'Analysis already running' });
        return;
      }

      logger.info('Analysis accepted', { analysisId, filePath });
      res.status(202).json({ message: 'Analysis started', analysisId });
    } catch (error) {
      const message = describeError(error);
      logger.error('Failed to start analysis', { analysisId, error: message });
      res.status(500).json({ error: message });
    }
  });

  return app;
};
