/**
 * HTTP helpers for upstream calls
 *
 * Thin wrapper over fetch that applies a timeout and maps failures onto the
 * gateway's error taxonomy. No retries happen here: callers decide.
 */

import {
  AuthExpiredError,
  UpstreamRequestError,
  UpstreamUnavailableError,
} from './errors.js';

export type FetchFn = typeof fetch;

export interface RequestOptions {
  method?: 'GET' | 'POST' | 'DELETE';
  headers?: Record<string, string>;
  /** JSON-serialized when present */
  body?: unknown;
  /** Service name used in error messages */
  service?: string;
  /** Timeout in milliseconds (default 10s) */
  timeout?: number;
  fetch?: FetchFn;
}

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Headers every Jellyfin request sends besides X-Emby-Authorization
 */
export function jellyfinHeaders(): Record<string, string> {
  return {
    Accept: 'application/json',
  };
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Perform a request and return the response if it is 2xx.
 *
 * @throws AuthExpiredError on 401
 * @throws UpstreamUnavailableError on 5xx, 408, 429, network failure or timeout
 * @throws UpstreamRequestError on any other non-2xx status
 */
export async function request(url: string, options: RequestOptions = {}): Promise<Response> {
  const service = options.service ?? 'upstream';
  const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
  const doFetch = options.fetch ?? fetch;

  const headers: Record<string, string> = { ...options.headers };
  let body: string | undefined;
  if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(options.body);
  }

  let response: Response;
  try {
    response = await doFetch(url, {
      method: options.method ?? 'GET',
      headers,
      body,
      signal: AbortSignal.timeout(timeout),
    });
  } catch (error) {
    if (isTimeout(error)) {
      throw new UpstreamUnavailableError(`${service} request timed out after ${timeout}ms`, undefined, {
        cause: error,
      });
    }
    throw new UpstreamUnavailableError(`${service} is unreachable`, undefined, { cause: error });
  }

  if (response.ok) return response;

  const path = new URL(url).pathname;
  if (response.status === 401) {
    throw new AuthExpiredError(`${service} rejected credentials for ${path}`);
  }
  if (response.status >= 500 || response.status === 408 || response.status === 429) {
    throw new UpstreamUnavailableError(
      `${service} returned ${response.status} for ${path}`,
      response.status
    );
  }
  throw new UpstreamRequestError(`${service} returned ${response.status} for ${path}`, response.status);
}

/**
 * Perform a request and parse the JSON body. The result is untyped on purpose:
 * callers run it through a parser.
 */
export async function fetchJson(url: string, options: RequestOptions = {}): Promise<unknown> {
  const response = await request(url, options);
  const text = await response.text();
  if (text.length === 0) return null;
  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch (error) {
    throw new UpstreamUnavailableError(
      `${options.service ?? 'upstream'} returned malformed JSON`,
      response.status,
      { cause: error }
    );
  }
}
