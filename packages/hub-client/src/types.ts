/**
 * @closeout/hub-client — Client types.
 *
 * Domain types are imported from @closeout/types; these describe the
 * transport.
 */

// =============================================================================
// Client Configuration
// =============================================================================

export interface HttpClientConfig {
  /** Base URL, e.g. "http://central-settlement:3007/v2" */
  readonly baseUrl: string;
  /** Request timeout in milliseconds (default: 5000) */
  readonly timeout?: number | undefined;
  /** Extra attempts for failed GET requests (default: 0) */
  readonly retries?: number | undefined;
  /** Delay before the first retry, doubled per attempt (default: 250) */
  readonly retryDelayMs?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

export interface HttpResponse {
  readonly status: number;
  readonly body: unknown;
}

// =============================================================================
// Error Types
// =============================================================================

export type HubErrorCode =
  | "NOT_FOUND"
  | "CLIENT_ERROR"
  | "SERVER_ERROR"
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "INVALID_RESPONSE";

/**
 * Failure talking to the hub or the central ledger.
 */
export class HubError extends Error {
  readonly code: HubErrorCode;
  /** HTTP status code, 0 when no response arrived */
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(code: HubErrorCode, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "HubError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
