import type { AppConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';
import { describeError } from '../obs/logger';
import { fetchWithTimeout, isFetchableUrl, type ResponseReader } from '../utils/http';
import { extractParagraphs } from '../utils/text';

export type ContentFetcher = (url: string) => Promise<string>;

const HTML_TYPES = ['text/html', 'application/xhtml+xml'];

const isHtml = (contentType: string | null): boolean => {
  // a missing header is treated as html
  if (!contentType) return true;
  const mediaType = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  return HTML_TYPES.includes(mediaType);
};

type PageRead =
  | { html: string }
  | { skipped: 'status' | 'content-type'; status: number; contentType: string | null };

const readPage: ResponseReader<PageRead> = async (response) => {
  const contentType = response.headers.get('content-type');
  const skipped = !response.ok ? 'status' : !isHtml(contentType) ? 'content-type' : null;
  if (skipped) {
    await response.body?.cancel();
    return { skipped, status: response.status, contentType };
  }
  return { html: await response.text() };
};

/**
 * Fetches a page and reduces it to its paragraph text, capped at
 * `fetcher.maxChars`. Resolves to '' on any failure.
 */
export const createContentFetcher = (config: Pick<AppConfig, 'fetcher'>, logger: Logger): ContentFetcher => {
  const { timeoutMs, userAgent, maxChars } = config.fetcher;

  return async (url) => {
    if (!isFetchableUrl(url)) {
      logger.debug('Skipping unsupported url', { url });
      return '';
    }
    try {
      const page = await fetchWithTimeout(
        url,
        {
          method: 'GET',
          timeoutMs,
          headers: {
            'User-Agent': userAgent,
            Accept: 'text/html,application/xhtml+xml',
            'Accept-Language': 'en-US,en;q=0.9',
          },
          redirect: 'follow',
        },
        readPage,
      );
      if ('skipped' in page) {
        logger.debug('Page skipped', {
          url,
          reason: page.skipped,
          status: page.status,
          contentType: page.contentType,
        });
        return '';
      }
      return extractParagraphs(page.html).join(' ').slice(0, maxChars);
    } catch (error) {
      logger.debug('Page fetch failed', { url, error: describeError(error) });
      return '';
    }
  };
};
