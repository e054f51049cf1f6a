import { fetch as undiciFetch } from 'undici';
import type { Logger } from './logging.js';

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export interface HttpRequestInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

export const defaultFetch: FetchLike = (url, init) => undiciFetch(url, init);

export class ExternalFetchError extends Error {
  constructor(
    public readonly kind: 'timeout' | 'network',
    message: string,
  ) {
    super(message);
    this.name = 'ExternalFetchError';
  }
}

/** A response arrived, but with a non-2xx status. */
export class BackendHttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`HTTP_${status}`);
    this.name = 'BackendHttpError';
  }
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof ExternalFetchError) return true;
  if (error instanceof BackendHttpError) return error.status === 429 || error.status >= 500;
  return false;
}

function isAbort(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Sends one JSON request. No retries here: callers decide whether an operation
 * may be repeated.
 */
export async function requestJSON(
  url: string,
  opts: {
    method?: 'GET' | 'POST';
    body?: unknown;
    headers?: Record<string, string>;
    signal?: AbortSignal;
    fetchImpl?: FetchLike;
    target?: string;
    log?: Logger;
  } = {},
): Promise<unknown> {
  const fetchImpl = opts.fetchImpl ?? defaultFetch;
  const target = opts.target ?? 'unknown';
  const method = opts.method ?? 'GET';
  const start = Date.now();

  let res: HttpResponseLike;
  try {
    res = await fetchImpl(url, {
      method,
      headers: {
        Accept: 'application/json',
        ...(opts.body !== undefined && { 'Content-Type': 'application/json' }),
        ...opts.headers,
      },
      ...(opts.body !== undefined && { body: JSON.stringify(opts.body) }),
      ...(opts.signal && { signal: opts.signal }),
    });
  } catch (err: unknown) {
    if (isAbort(err)) {
      opts.log?.debug({ target, ms: Date.now() - start }, 'request aborted');
      throw new ExternalFetchError('timeout', 'timeout');
    }
    opts.log?.debug({ target, error: err instanceof Error ? err.message : String(err) }, 'network error');
    throw new ExternalFetchError('network', 'network_error');
  }

  let text: string;
  try {
    text = await res.text();
  } catch (err: unknown) {
    throw new ExternalFetchError(isAbort(err) ? 'timeout' : 'network', 'response_read_error');
  }
  opts.log?.debug({ target, status: res.status, ms: Date.now() - start }, 'response received');

  if (!res.ok) {
    throw new BackendHttpError(res.status, text.slice(0, 500));
  }
  if (!text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch {
    throw new ExternalFetchError('network', 'json_parse_error');
  }
}
