import { z } from 'zod';
import type { AppConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';
import { describeError } from '../obs/logger';
import { sleep as defaultSleep } from '../utils/async';
import { fetchWithTimeout, readText, type ReadResponse } from '../utils/http';

export interface SimilarityScorer {
  /** Similarity in [0,1]; 0 when the backend cannot produce one. */
  score: (source: string, candidate: string, retries?: number) => Promise<number>;
}

export interface SimilarityScorerDeps {
  sleep?: (ms: number) => Promise<void>;
}

const SimilarityResponseSchema = z.array(z.number()).min(1);

const clampUnit = (value: number): number => Math.min(1, Math.max(0, value));

/**
 * Sentence-similarity scoring against the Hugging Face inference API.
 *
 * The request asks the backend to wait for a cold model instead of failing.
 * Timeouts (including a body that stalls past `timeoutMs`) and connection
 * failures are retried after `backoffMs`, at most `retries` times; an HTTP
 * error response is final.
 */
export const createSimilarityScorer = (
  config: Pick<AppConfig, 'similarity'>,
  logger: Logger,
  deps: SimilarityScorerDeps = {},
): SimilarityScorer => {
  const { apiToken, endpoint, timeoutMs, backoffMs, maxInputChars, maxRetries } = config.similarity;
  const sleep = deps.sleep ?? defaultSleep;

  const score = async (source: string, candidate: string, retries = maxRetries): Promise<number> => {
    const body = JSON.stringify({
      inputs: {
        source_sentence: source.slice(0, maxInputChars),
        sentences: [candidate.slice(0, maxInputChars)],
      },
      options: { wait_for_model: true },
    });

    let retriesLeft = Math.max(0, Math.floor(retries));
    for (;;) {
      let response: ReadResponse<string>;
      try {
        response = await fetchWithTimeout(
          endpoint,
          {
            method: 'POST',
            timeoutMs,
            headers: {
              Authorization: `Bearer ${apiToken}`,
              'Content-Type': 'application/json',
              'X-Wait-For-Model': 'true',
            },
            body,
          },
          readText,
        );
      } catch (error) {
        if (retriesLeft <= 0) {
          logger.warn('Similarity backend unreachable; giving up', { error: describeError(error) });
          return 0;
        }
        retriesLeft -= 1;
        logger.info('Similarity backend unreachable; retrying', {
          error: describeError(error),
          backoffMs,
          retriesLeft,
        });
        await sleep(backoffMs);
        continue;
      }

      if (!response.ok || response.body == null) {
        logger.warn('Similarity request failed', { status: response.status });
        return 0;
      }

      let payload: unknown;
      try {
        payload = JSON.parse(response.body);
      } catch (error) {
        logger.warn('Similarity response unreadable', { error: describeError(error) });
        return 0;
      }
      const parsed = SimilarityResponseSchema.safeParse(payload);
      if (!parsed.success) {
        logger.warn('Similarity response malformed');
        return 0;
      }
      return clampUnit(parsed.data[0] ?? 0);
    }
  };

  return { score };
};
