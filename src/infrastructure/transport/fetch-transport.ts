import type { Transport, TransportRequest, TransportResponse } from '../../application/ports.js';
import { TransportError } from '../../application/ports.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface FetchTransportOptions {
  readonly baseUrl: string;
  readonly timeoutMs?: number;
  /** Injected for tests; defaults to the global `fetch`. */
  readonly fetchFn?: typeof fetch;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

/**
 * Transport over the global `fetch`.
 *
 * Network failures and timeouts surface as transient `TransportError`s; a
 * request that cannot even be built (bad URL) is permanent. Any HTTP
 * response, whatever its status, is returned as is.
 */
export class FetchTransport implements Transport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: FetchTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    let url: URL;
    try {
      url = new URL(`${this.baseUrl}${request.path}`);
    } catch (err: unknown) {
      throw new TransportError('permanent', `Invalid request URL: ${this.baseUrl}${request.path}`, { cause: err });
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err: unknown) {
      const timedOut = isTimeout(err);
      const message = timedOut ? `Request timed out after ${this.timeoutMs} ms` : 'Network request failed';
      throw new TransportError('transient', message, { cause: err, timedOut });
    }

    let body: Uint8Array;
    try {
      body = new Uint8Array(await response.arrayBuffer());
    } catch (err: unknown) {
      throw new TransportError('transient', 'Failed to read response body', { cause: err, timedOut: isTimeout(err) });
    }
    return { status: response.status, body };
  }
}
