import { describe, expect, it, vi } from 'vitest';
import { type FetchLike, HttpDatasetFetcher } from '../src/session/fetcher.js';

function jsonResponse(body: unknown, status = 200, statusText = 'OK') {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    json: async () => body,
  };
}

describe('HttpDatasetFetcher', () => {
  it('GETs the URL and parses JSON', async () => {
    const fetch = vi.fn<FetchLike>(async () => jsonResponse({ x: [0, 1], y: [0, 1] }));
    const fetcher = new HttpDatasetFetcher({ fetch });
    const signal = new AbortController().signal;

    await expect(fetcher.fetchCurve('http://curves.test/a.json', { signal })).resolves.toEqual({
      x: [0, 1],
      y: [0, 1],
    });
    expect(fetch).toHaveBeenCalledWith('http://curves.test/a.json', {
      method: 'GET',
      headers: { accept: 'application/json' },
      signal,
    });
  });

  it('rejects non-2xx responses', async () => {
    const fetcher = new HttpDatasetFetcher({
      fetch: async () => jsonResponse(null, 404, 'Not Found'),
    });
    await expect(
      fetcher.fetchCurve('http://curves.test/missing.json', {
        signal: new AbortController().signal,
      }),
    ).rejects.toThrow('HTTP 404 Not Found');
  });

  it('propagates JSON parse errors', async () => {
    const fetcher = new HttpDatasetFetcher({
      fetch: async () => ({
        ok: true,
        status: 200,
        statusText: 'OK',
        json: async () => {
          throw new SyntaxError('Unexpected token < in JSON');
        },
      }),
    });
    await expect(
      fetcher.fetchCurve('http://curves.test/page.html', { signal: new AbortController().signal }),
    ).rejects.toThrow(SyntaxError);
  });

  it('uses the global fetch by default', async () => {
    const globalFetch = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response(JSON.stringify({ x: [0], y: [0] }), { status: 200 }));
    try {
      const fetcher = new HttpDatasetFetcher();
      await expect(
        fetcher.fetchCurve('http://curves.test/b.json', { signal: new AbortController().signal }),
      ).resolves.toEqual({ x: [0], y: [0] });
      expect(globalFetch).toHaveBeenCalledTimes(1);
    } finally {
      globalFetch.mockRestore();
    }
  });
});
