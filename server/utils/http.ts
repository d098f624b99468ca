export interface FetchWithTimeoutOptions extends Omit<RequestInit, 'signal'> {
  timeoutMs: number;
  signal?: AbortSignal;
}

export type ResponseReader<T> = (response: Response) => Promise<T>;

/**
 * Fetches `url` and hands the response to `read`. The deadline covers the
 * body as well as the headers, so `read` must consume everything it needs.
 */
export const fetchWithTimeout = async <T>(
  url: string,
  options: FetchWithTimeoutOptions,
  read: ResponseReader<T>,
): Promise<T> => {
  const { timeoutMs, signal, ...init } = options;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  let abortListener: (() => void) | null = null;

  if (signal) {
    if (signal.aborted) {
      clearTimeout(timer);
      throw new Error('Aborted');
    }
    abortListener = () => controller.abort();
    signal.addEventListener('abort', abortListener, { once: true });
  }

  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    return await read(response);
  } finally {
    clearTimeout(timer);
    if (abortListener && signal) {
      signal.removeEventListener('abort', abortListener);
    }
  }
};

export interface ReadResponse<T> {
  ok: boolean;
  status: number;
  /** Null for non-2xx responses, whose body is discarded. */
  body: T | null;
}

const discardBody = async (response: Response) => {
  await response.body?.cancel();
};

export const readText: ResponseReader<ReadResponse<string>> = async (response) => {
  if (!response.ok) {
    await discardBody(response);
    return { ok: false, status: response.status, body: null };
  }
  return { ok: true, status: response.status, body: await response.text() };
};

export const readJson: ResponseReader<ReadResponse<unknown>> = async (response) => {
  if (!response.ok) {
    await discardBody(response);
    return { ok: false, status: response.status, body: null };
  }
  const body: unknown = await response.json();
  return { ok: true, status: response.status, body };
};

const TRUSTED_PROTOCOLS = new Set(['http:', 'https:']);

export const isFetchableUrl = (rawUrl: string): boolean => {
  try {
    return TRUSTED_PROTOCOLS.has(new URL(rawUrl).protocol);
  } catch {
    return false;
  }
};
