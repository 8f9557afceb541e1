/** Broad family an error belongs to; decides how callers react to it. */
export type ErrorCategory = 'configuration' | 'consent' | 'network' | 'storage' | 'data' | 'event';

export type AnalyticsErrorCode =
  | 'not_initialized'
  | 'invalid_configuration'
  | 'consent_required'
  | 'network_unavailable'
  | 'timeout'
  | 'server_error'
  | 'invalid_request'
  | 'unauthorized'
  | 'invalid_response'
  | 'storage_error'
  | 'encryption_error'
  | 'data_corrupted'
  | 'data_expired'
  | 'invalid_event_name'
  | 'invalid_event_data'
  | 'unknown';

const CATEGORY: Record<AnalyticsErrorCode, ErrorCategory> = {
  not_initialized: 'configuration',
  invalid_configuration: 'configuration',
  consent_required: 'consent',
  network_unavailable: 'network',
  timeout: 'network',
  server_error: 'network',
  invalid_request: 'network',
  unauthorized: 'network',
  invalid_response: 'network',
  storage_error: 'storage',
  encryption_error: 'data',
  data_corrupted: 'data',
  data_expired: 'data',
  invalid_event_name: 'event',
  invalid_event_data: 'event',
  unknown: 'network',
};

/** Codes a delivery may retry with backoff. */
const RETRYABLE: ReadonlySet<AnalyticsErrorCode> = new Set<AnalyticsErrorCode>([
  'network_unavailable',
  'timeout',
  'server_error',
]);

/**
 * The single error type used across the SDK core.
 *
 * Never thrown to host code: public entry points convert it into a
 * discriminated result or a log line.
 */
export class AnalyticsError extends Error {
  readonly code: AnalyticsErrorCode;
  readonly category: ErrorCategory;
  readonly retryable: boolean;
  readonly status: number | undefined;

  constructor(code: AnalyticsErrorCode, message: string, options: { cause?: unknown; status?: number } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AnalyticsError';
    this.code = code;
    this.category = CATEGORY[code];
    this.retryable = RETRYABLE.has(code);
    this.status = options.status;
  }
}

/**
 * Maps a non-2xx HTTP status to an error.
 *
 * 401/403 → unauthorized, other 4xx → invalid_request, 5xx → server_error.
 */
export function errorForStatus(status: number): AnalyticsError {
  if (status === 401 || status === 403) {
    return new AnalyticsError('unauthorized', `Collector rejected credentials (HTTP ${status})`, { status });
  }
  if (status >= 400 && status <= 499) {
    return new AnalyticsError('invalid_request', `Collector rejected request (HTTP ${status})`, { status });
  }
  if (status >= 500 && status <= 599) {
    return new AnalyticsError('server_error', `Collector error (HTTP ${status})`, { status });
  }
  return new AnalyticsError('unknown', `Unexpected HTTP status ${status}`, { status });
}
