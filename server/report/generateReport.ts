import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import type { BlobStore } from '../../shared/stores';
import { reportObjectPath } from '../../shared/stores';
import type { Logger } from '../obs/logger';
import { buildReportModel, type ReportInput, type ReportModel } from './layout';
import { renderReportPdf } from './renderPdf';

export interface ReportGenerator {
  /** Renders, uploads and returns the report's object path. */
  generate: (input: ReportInput) => Promise<string>;
}

export interface ReportGeneratorDeps {
  config: Pick<AppConfig, 'report'>;
  blobs: BlobStore;
  logger: Logger;
  render?: (model: ReportModel) => Uint8Array;
  tmpDir?: string;
  now?: () => Date;
}

export const REPORT_CONTENT_TYPE = 'application/pdf';

const sanitizeSegment = (value: string): string => value.replace(/[^a-z0-9_-]/gi, '_').slice(0, 80) || 'report';

export const createReportGenerator = ({
  config,
  blobs,
  logger,
  render = renderReportPdf,
  tmpDir = os.tmpdir(),
  now = () => new Date(),
}: ReportGeneratorDeps): ReportGenerator => ({
  generate: async (input) => {
    const model = buildReportModel(input, config.report, now());
    const objectPath = reportObjectPath(input.analysisId);
    const localPath = path.join(tmpDir, `report_${sanitizeSegment(input.analysisId)}_${randomUUID()}.pdf`);

    try {
      await fs.writeFile(localPath, render(model));
      const content = new Uint8Array(await fs.readFile(localPath));
      await blobs.upload(objectPath, content, REPORT_CONTENT_TYPE);
      logger.info('Report uploaded', {
        analysisId: input.analysisId,
        objectPath,
        bytes: content.byteLength,
        sources: model.sources.length,
      });
      return objectPath;
    } finally {
      await fs.rm(localPath, { force: true });
    }
  },
});
