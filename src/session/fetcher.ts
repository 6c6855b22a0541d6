/**
 * DatasetFetcher: the capability a session needs to load external curves.
 *
 * A session built without one has the external-dataset feature switched off.
 */

export interface DatasetFetcher {
  /** Fetch the raw document at `url`. Validation is the session's job. */
  fetchCurve(url: string, opts: { signal: AbortSignal }): Promise<unknown>;
}

/** The part of the global `fetch` that HttpDatasetFetcher relies on. */
export type FetchLike = (
  url: string,
  init: { method: 'GET'; headers: Record<string, string>; signal: AbortSignal },
) => Promise<{ ok: boolean; status: number; statusText: string; json(): Promise<unknown> }>;

/**
 * Fetches curves over HTTP with a GET request and parses the body as JSON.
 */
export class HttpDatasetFetcher implements DatasetFetcher {
  private readonly fetchImpl: FetchLike;

  constructor(opts?: { fetch?: FetchLike }) {
    this.fetchImpl = opts?.fetch ?? ((url, init) => globalThis.fetch(url, init));
  }

  async fetchCurve(url: string, opts: { signal: AbortSignal }): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      method: 'GET',
      headers: { accept: 'application/json' },
      signal: opts.signal,
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
    }
    return response.json();
  }
}
