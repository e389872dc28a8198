import { VersionCheckError, isVersionCheckError, toError } from '../utils/errors';

export const STORE_REQUEST_TIMEOUT_MS = 10_000;

export interface TransportRequest {
  method: 'GET';
  signal: AbortSignal;
}

export interface TransportResponse {
  status: number;
  text(): Promise<string>;
}

/**
 * Issues one HTTP request. The global `fetch` satisfies this signature.
 */
export type HttpTransport = (url: string, request: TransportRequest) => Promise<TransportResponse>;

export type FetchFailureReason = 'status' | 'timeout' | 'network';

export interface FetchError {
  reason: FetchFailureReason;
  message: string;
  status?: number;
}

export type FetchResult = { ok: true; body: string } | { ok: false; error: FetchError };

const defaultTransport: HttpTransport = (url, request) => fetch(url, request);

function toFetchError(error: unknown, uri: URL): FetchError {
  if (isVersionCheckError(error) && error.code === 'TIMEOUT') {
    return { reason: 'timeout', message: error.message };
  }
  return { reason: 'network', message: `${toError(error).message}, uri: ${uri.toString()}` };
}

/**
 * Performs a single GET against a store endpoint.
 *
 * The request and the body read share one timer; when it fires the request
 * signal is aborted. Only status 200 counts as success. Failures are returned,
 * never thrown.
 */
export async function fetchStoreResponse(
  uri: URL,
  transport: HttpTransport = defaultTransport,
  timeoutMs: number = STORE_REQUEST_TIMEOUT_MS
): Promise<FetchResult> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new VersionCheckError('TIMEOUT', `Request timed out after ${timeoutMs}ms: ${uri.toString()}`));
    }, timeoutMs);
  });

  try {
    const response = await Promise.race([
      transport(uri.toString(), { method: 'GET', signal: controller.signal }),
      timeout,
    ]);

    if (response.status !== 200) {
      controller.abort();
      return {
        ok: false,
        error: {
          reason: 'status',
          status: response.status,
          message: `Request failed: ${uri.toString()} Status code: ${response.status}`,
        },
      };
    }

    const body = await Promise.race([response.text(), timeout]);
    return { ok: true, body };
  } catch (error) {
    return { ok: false, error: toFetchError(error, uri) };
  } finally {
    clearTimeout(timer);
  }
}
