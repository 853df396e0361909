import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PresidioRecognizer } from '../src/recognizer.js';
import { UpstreamError } from '../src/errors.js';

/**
 * Unit tests for the Presidio HTTP client
 * Architecture: global fetch replaced with vi.fn(), no network access
 */

const fetchMock = vi.fn();

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: { 'Content-Type': 'application/json' } });
}

function namedError(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe('PresidioRecognizer', () => {
  const recognizer = new PresidioRecognizer({ baseUrl: 'http://presidio.test:5002/', timeoutMs: 1000 });

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('detect', () => {
    it('posts the analyze payload and converts results into spans', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse([{ entity_type: 'PERSON', start: 5, end: 8, score: 0.85, analysis_explanation: null }])
      );

      const spans = await recognizer.detect({
        text: 'Call Ana now',
        entityTypes: ['PERSON'],
        language: 'en',
        scoreThreshold: 0.5
      });

      expect(spans).toEqual([{ entity_type: 'PERSON', start: 5, end: 8, score: 0.85, source_text: 'Ana' }]);

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('http://presidio.test:5002/analyze');
      expect(init.method).toBe('POST');
      expect(JSON.parse(init.body)).toEqual({
        text: 'Call Ana now',
        language: 'en',
        entities: ['PERSON'],
        score_threshold: 0.5
      });
      expect(init.signal).toBeInstanceOf(AbortSignal);
    });

    it('rounds scores to three decimals', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse([
          { entity_type: 'PERSON', start: 0, end: 3, score: 0.8567 },
          { entity_type: 'LOCATION', start: 7, end: 12, score: 0.49951 }
        ])
      );

      const spans = await recognizer.detect({ text: 'Ana in Paris', entityTypes: [], language: 'en', scoreThreshold: 0 });

      expect(spans.map((span) => span.score)).toEqual([0.857, 0.5]);
    });

    it('skips results that are not span-shaped', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse([
          { entity_type: 'PERSON', start: 0, end: 3, score: 0.9 },
          { entity_type: 'PERSON', start: '0', end: 3, score: 0.9 },
          'garbage'
        ])
      );

      const spans = await recognizer.detect({ text: 'Ana', entityTypes: [], language: 'en', scoreThreshold: 0 });

      expect(spans).toHaveLength(1);
      expect(console.warn).toHaveBeenCalledWith('[Presidio] Ignored 2 malformed analyzer result(s)');
    });

    it('reports an HTTP error status', async () => {
      fetchMock.mockResolvedValue(new Response('boom', { status: 500 }));

      const request = recognizer.detect({ text: 'x', entityTypes: [], language: 'en', scoreThreshold: 0 });

      await expect(request).rejects.toBeInstanceOf(UpstreamError);
      await expect(request).rejects.toMatchObject({
        errorType: 'HTTP',
        httpStatus: 500,
        message: 'Presidio request failed: HTTP 500 - boom'
      });
    });

    it('reports a timeout', async () => {
      fetchMock.mockRejectedValue(namedError('TimeoutError', 'The operation was aborted due to timeout'));

      await expect(
        recognizer.detect({ text: 'x', entityTypes: [], language: 'en', scoreThreshold: 0 })
      ).rejects.toMatchObject({ errorType: 'TIMEOUT', message: 'Presidio request timed out after 1000ms' });
    });

    it('reports a network failure', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      await expect(
        recognizer.detect({ text: 'x', entityTypes: [], language: 'en', scoreThreshold: 0 })
      ).rejects.toMatchObject({
        errorType: 'NETWORK',
        message: 'Cannot reach Presidio at http://presidio.test:5002: fetch failed'
      });
    });

    it('rejects a response that is not an array', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ error: 'unexpected' }));

      await expect(
        recognizer.detect({ text: 'x', entityTypes: [], language: 'en', scoreThreshold: 0 })
      ).rejects.toMatchObject({ errorType: 'INVALID_RESPONSE' });
    });
  });

  describe('supportedEntityTypes', () => {
    it('returns the supported set for a language', async () => {
      fetchMock.mockResolvedValue(jsonResponse(['PERSON', 'EMAIL_ADDRESS']));

      const supported = await recognizer.supportedEntityTypes('en');

      expect([...supported]).toEqual(['PERSON', 'EMAIL_ADDRESS']);
      expect(fetchMock.mock.calls[0][0]).toBe('http://presidio.test:5002/supportedentities?language=en');
    });

    it('rejects a payload that is not a string list', async () => {
      fetchMock.mockResolvedValue(jsonResponse([1, 2]));

      await expect(recognizer.supportedEntityTypes('en')).rejects.toMatchObject({ errorType: 'INVALID_RESPONSE' });
    });
  });
});
