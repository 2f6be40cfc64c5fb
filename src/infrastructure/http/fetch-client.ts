import { ResultAsync, errAsync, okAsync } from 'neverthrow';

/** The subset of global `fetch` the back ends use; tests pass a spy. */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpCallError =
  | { readonly code: 'HTTP_NETWORK_ERROR'; readonly url: string; readonly message: string }
  | { readonly code: 'HTTP_TIMEOUT'; readonly url: string; readonly message: string }
  | { readonly code: 'HTTP_STATUS'; readonly url: string; readonly status: number; readonly message: string };

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

export interface HttpCallOptions {
  readonly timeoutMs?: number;
}

/**
 * Performs one request with an abort timeout. Non-2xx responses become
 * `HTTP_STATUS` errors.
 */
export function fetchChecked(
  fetchFn: FetchLike,
  url: string,
  init: RequestInit,
  options: HttpCallOptions = {}
): ResultAsync<Response, HttpCallError> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  return ResultAsync.fromPromise(
    fetchFn(url, { ...init, signal: controller.signal }).finally(() => clearTimeout(timeoutId)),
    (e): HttpCallError =>
      controller.signal.aborted
        ? { code: 'HTTP_TIMEOUT', url, message: `Request to ${url} timed out after ${timeoutMs}ms` }
        : { code: 'HTTP_NETWORK_ERROR', url, message: e instanceof Error ? e.message : String(e) }
  ).andThen((response) =>
    response.ok
      ? okAsync(response)
      : errAsync<Response, HttpCallError>({
          code: 'HTTP_STATUS',
          url,
          status: response.status,
          message: `${url} returned ${response.status} ${response.statusText}`.trim(),
        })
  );
}
