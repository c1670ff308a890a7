import { PermanentProviderError, TransientProviderError, errorMessage } from '../core/errors';

export const isTransientStatus = (status: number): boolean => status === 408 || status === 429 || status >= 500;

export interface JsonRequest {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
}

/**
 * fetch + JSON decode with the provider error taxonomy: network failures, 408/429 and 5xx
 * are transient; other non-2xx answers and undecodable bodies are permanent.
 */
export const fetchJson = async (url: string, label: string, req: JsonRequest = {}): Promise<unknown> => {
  let resp: Response;
  try {
    resp = await fetch(url, {
      method: req.method ?? 'GET',
      headers: {
        Accept: 'application/json',
        ...(req.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        ...req.headers
      },
      body: req.body !== undefined ? JSON.stringify(req.body) : undefined,
      signal: req.signal
    });
  } catch (err) {
    throw new TransientProviderError(`${label} request failed: ${errorMessage(err)}`);
  }
  if (!resp.ok) {
    const text = await resp.text();
    const message = `${label} failed ${resp.status}: ${text.slice(0, 200)}`;
    if (isTransientStatus(resp.status)) {
      throw new TransientProviderError(message, { status: resp.status });
    }
    throw new PermanentProviderError(message, { status: resp.status });
  }
  try {
    return await resp.json();
  } catch (err) {
    throw new PermanentProviderError(`${label} returned invalid JSON: ${errorMessage(err)}`);
  }
};
