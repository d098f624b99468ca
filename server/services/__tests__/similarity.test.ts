import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  makeTestConfig,
  silentLogger,
  startHttpServer,
  stallAfterHeaders,
  type TestHttpServer,
} from '../../__tests__/helpers';
import { createSimilarityScorer } from '../similarity';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

const timeoutError = () => new DOMException('This operation was aborted', 'AbortError');

describe('createSimilarityScorer', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('asks the backend to wait for the model and returns the first score', async () => {
    const fetchMock = vi.fn(async (_input: string, _init?: RequestInit) => jsonResponse([0.42]));
    vi.stubGlobal('fetch', fetchMock);

    const config = makeTestConfig({ SIMILARITY_MAX_INPUT_CHARS: '5' });
    const scorer = createSimilarityScorer(config, silentLogger(), { sleep: vi.fn(async () => {}) });
    const score = await scorer.score('abcdefgh', 'ijklmnop');

    expect(score).toBe(0.42);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(config.similarity.endpoint);
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-token', 'X-Wait-For-Model': 'true' });
    expect(JSON.parse(String(init?.body))).toEqual({
      inputs: { source_sentence: 'abcde', sentences: ['ijklm'] },
      options: { wait_for_model: true },
    });
  });

  it('retries timeouts with a fixed backoff until a valid response', async () => {
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(timeoutError())
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(jsonResponse([0.87]));
    vi.stubGlobal('fetch', fetchMock);
    const sleep = vi.fn(async (_ms: number) => {});

    const scorer = createSimilarityScorer(makeTestConfig({ SIMILARITY_BACKOFF_MS: '5000' }), silentLogger(), { sleep });
    const score = await scorer.score('a', 'b', 2);

    expect(score).toBe(0.87);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[5000], [5000]]);
  });

  it('returns 0 once the retry budget is exhausted', async () => {
    const fetchMock = vi.fn(async () => Promise.reject(timeoutError()));
    vi.stubGlobal('fetch', fetchMock);
    const sleep = vi.fn(async (_ms: number) => {});

    const scorer = createSimilarityScorer(makeTestConfig(), silentLogger(), { sleep });

    await expect(scorer.score('a', 'b', 2)).resolves.toBe(0);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('does not retry a well-formed error response', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ error: 'Model is overloaded' }, 503));
    vi.stubGlobal('fetch', fetchMock);
    const sleep = vi.fn(async (_ms: number) => {});

    const scorer = createSimilarityScorer(makeTestConfig(), silentLogger(), { sleep });

    await expect(scorer.score('a', 'b')).resolves.toBe(0);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('returns 0 for a malformed payload', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ scores: [0.5] })));
    const scorer = createSimilarityScorer(makeTestConfig(), silentLogger());
    await expect(scorer.score('a', 'b')).resolves.toBe(0);
  });

  it('clamps out-of-range similarities', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValueOnce(jsonResponse([1.0000002])).mockResolvedValueOnce(jsonResponse([-0.2])));
    const scorer = createSimilarityScorer(makeTestConfig(), silentLogger());
    await expect(scorer.score('a', 'b')).resolves.toBe(1);
    await expect(scorer.score('a', 'b')).resolves.toBe(0);
  });

  it('uses the configured budget by default', async () => {
    const fetchMock = vi.fn(async () => Promise.reject(new TypeError('fetch failed')));
    vi.stubGlobal('fetch', fetchMock);
    const sleep = vi.fn(async (_ms: number) => {});

    const scorer = createSimilarityScorer(makeTestConfig({ SIMILARITY_RETRIES: '1' }), silentLogger(), { sleep });

    await expect(scorer.score('a', 'b')).resolves.toBe(0);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });
});

describe('createSimilarityScorer against a stalled backend', () => {
  let server: TestHttpServer | null = null;

  afterEach(async () => {
    await server?.close();
    server = null;
  });

  const stalledConfig = (url: string, retries: string) =>
    makeTestConfig({ SIMILARITY_ENDPOINT: url, SIMILARITY_TIMEOUT_MS: '300', SIMILARITY_RETRIES: retries });

  it('treats a stalled body as a timeout and returns 0 without retries', async () => {
    const stalled = await startHttpServer(stallAfterHeaders('application/json', '['));
    server = stalled;
    const sleep = vi.fn(async (_ms: number) => {});

    const scorer = createSimilarityScorer(stalledConfig(`${stalled.url}/score`, '0'), silentLogger(), { sleep });

    const startedAt = Date.now();
    await expect(scorer.score('a', 'b', 0)).resolves.toBe(0);
    expect(Date.now() - startedAt).toBeLessThan(3_000);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries after a stalled body and uses the next response', async () => {
    let requests = 0;
    const stall = stallAfterHeaders('application/json', '[');
    const backend = await startHttpServer((req, res) => {
      requests += 1;
      if (requests === 1) {
        stall(req, res);
        return;
      }
      res.writeHead(200, { 'content-type': 'application/json' });
      res.end('[0.66]');
    });
    server = backend;
    const sleep = vi.fn(async (_ms: number) => {});

    const scorer = createSimilarityScorer(stalledConfig(`${backend.url}/score`, '2'), silentLogger(), { sleep });

    await expect(scorer.score('a', 'b')).resolves.toBe(0.66);
    expect(requests).toBe(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });
});
