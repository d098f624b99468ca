import { z } from 'zod';
import type { AppConfig } from '../../shared/config';
import type { SourceCandidate } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { describeError } from '../obs/logger';
import { fetchWithTimeout, readJson } from '../utils/http';

export type SourceFinder = (query: string, maxResults?: number) => Promise<SourceCandidate[]>;

const SerperResponseSchema = z.object({
  organic: z
    .array(
      z.object({
        link: z.string().optional(),
        title: z.string().optional(),
      }),
    )
    .optional(),
});

/**
 * Web search through Serper's Google endpoint. Results keep the provider's
 * ranking. Any failure resolves to an empty list.
 */
export const createSerperFinder = (config: Pick<AppConfig, 'search'>, logger: Logger): SourceFinder => {
  const { apiKey, endpoint, timeoutMs } = config.search;

  return async (query, maxResults = config.search.maxResults) => {
    const q = query.trim();
    if (!q) {
      return [];
    }
    if (!apiKey) {
      logger.warn('Search skipped: SERPER_API_KEY missing');
      return [];
    }

    try {
      const response = await fetchWithTimeout(
        endpoint,
        {
          method: 'POST',
          timeoutMs,
          headers: {
            'X-API-KEY': apiKey,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({ q, num: maxResults }),
        },
        readJson,
      );

      if (!response.ok) {
        logger.warn('Search request failed', { status: response.status });
        return [];
      }

      const parsed = SerperResponseSchema.safeParse(response.body);
      if (!parsed.success) {
        logger.warn('Search response malformed', { issues: parsed.error.issues.length });
        return [];
      }

      const results: SourceCandidate[] = [];
      for (const item of parsed.data.organic ?? []) {
        const url = item.link?.trim();
        if (!url) continue;
        results.push({ url, title: item.title?.trim() || url });
        if (results.length >= maxResults) break;
      }
      return results;
    } catch (error) {
      logger.warn('Search request errored', { error: describeError(error) });
      return [];
    }
  };
};
