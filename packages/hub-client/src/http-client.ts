/**
 * @closeout/hub-client — HTTP Client.
 *
 * Wraps native fetch() with:
 * - Request ID generation
 * - Timeout handling
 * - Retries for GET on network errors and 5xx
 * - Error normalization into HubError
 *
 * Bodies come back as `unknown`; callers parse them with their own schema.
 */

import { randomUUID } from "node:crypto";
import { withRetry } from "./retry.js";
import type { HttpClientConfig, HttpResponse } from "./types.js";
import { HubError } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

/**
 * Parse a response body as JSON, handling empty responses.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

function describeFailure(body: unknown, fallback: string): string {
  if (typeof body === "object" && body !== null && "errorInformation" in body) {
    const info = body.errorInformation;
    if (typeof info === "object" && info !== null && "errorDescription" in info) {
      return String(info.errorDescription);
    }
  }
  return fallback;
}

function isRetriable(error: unknown): boolean {
  if (!(error instanceof HubError)) {
    return false;
  }
  return error.code === "NETWORK_ERROR" || error.code === "TIMEOUT" || error.code === "SERVER_ERROR";
}

// =============================================================================
// HTTP Client
// =============================================================================

export class HttpClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: HttpClientConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeout = config.timeout ?? 5000;
    this.retries = config.retries ?? 0;
    this.retryDelayMs = config.retryDelayMs ?? 250;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  /**
   * GET, retried on transient failures.
   *
   * @throws HubError NOT_FOUND on 404
   */
  async get(path: string): Promise<HttpResponse> {
    return withRetry(
      () => this.request("GET", path),
      { maxAttempts: this.retries + 1, baseDelayMs: this.retryDelayMs, maxDelayMs: 10000 },
      isRetriable,
    );
  }

  /**
   * PUT with a JSON body. Never retried.
   */
  async put(path: string, body: unknown): Promise<HttpResponse> {
    return this.request("PUT", path, body);
  }

  private async request(method: string, path: string, body?: unknown): Promise<HttpResponse> {
    const url = `${this.baseUrl}${path}`;

    const headers: Record<string, string> = {
      "Accept": "application/json",
      "X-Request-Id": randomUUID(),
    };
    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(body);
    }

    let response: Response;
    try {
      response = await this.fetchWithTimeout(url, init);
    } catch (error: unknown) {
      if (error instanceof HubError) {
        throw error;
      }
      throw new HubError(
        "NETWORK_ERROR",
        `${method} ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        0,
      );
    }

    const responseBody = await parseResponseBody(response);
    if (response.ok) {
      return { status: response.status, body: responseBody };
    }

    if (response.status === 404) {
      throw new HubError("NOT_FOUND", `${method} ${url} returned 404`, 404, responseBody);
    }
    const code = response.status >= 500 ? "SERVER_ERROR" : "CLIENT_ERROR";
    throw new HubError(
      code,
      describeFailure(responseBody, `${method} ${url} returned ${String(response.status)}`),
      response.status,
      responseBody,
    );
  }

  /**
   * Fetch with a timeout using AbortController.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchFn(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new HubError("TIMEOUT", `Request timed out after ${String(this.timeout)}ms`, 0);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
