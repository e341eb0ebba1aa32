/**
 * Shared HTTP plumbing for connectors: pacing, logging, error mapping
 */

import { UnknownError, errorFromResponse, normalizeError } from "../errors.js";
import { connectorLogger } from "../logger.js";
import { sleep } from "../utils/retry.js";

import type { ServiceKind } from "../types/index.js";

export type FetchFn = typeof fetch;

const REQUEST_TIMEOUT_MS = 30_000;

/**
 * Enforces a minimum interval between requests of one connector instance
 */
export class RateLimiter {
  private lastRequestTime = 0;

  constructor(
    private intervalMs: number,
    private wait: (ms: number) => Promise<void> = sleep
  ) {}

  async acquire(): Promise<void> {
    const elapsed = Date.now() - this.lastRequestTime;

    if (this.lastRequestTime > 0 && elapsed < this.intervalMs) {
      const waitTime = this.intervalMs - elapsed;
      connectorLogger.debug({ waitTime }, "Rate limiting: waiting before request");
      await this.wait(waitTime);
    }

    this.lastRequestTime = Date.now();
  }
}

export interface JsonRequest {
  service: ServiceKind;
  url: string;
  method?: "GET" | "POST" | "PUT" | "DELETE";
  headers: Record<string, string>;
  body?: unknown;
}

/**
 * Perform one paced request and return the parsed JSON body
 * (undefined for an empty body). Non-2xx statuses and network failures
 * reject with the matching ConnectorError.
 */
export async function requestJson(
  fetchFn: FetchFn,
  limiter: RateLimiter,
  request: JsonRequest
): Promise<unknown> {
  const method = request.method ?? "GET";
  const { service, url } = request;

  await limiter.acquire();
  connectorLogger.debug({ service, method, url }, "Sending request");

  const startTime = performance.now();
  let response: Response;
  try {
    response = await fetchFn(url, {
      method,
      headers: {
        "Content-Type": "application/json",
        ...request.headers,
      },
      body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  } catch (error) {
    const normalized = normalizeError(error);
    connectorLogger.warn(
      { service, method, url, error: normalized.message },
      "Request failed before a response arrived"
    );
    throw normalized;
  }
  const duration = Math.round(performance.now() - startTime);

  connectorLogger.debug(
    {
      service,
      method,
      url,
      status: response.status,
      duration: `${String(duration)}ms`,
    },
    "Received response"
  );

  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    throw normalizeError(error);
  }

  if (!response.ok) {
    throw errorFromResponse(response.status, text, response.headers);
  }

  if (text.trim() === "") {
    return undefined;
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new UnknownError(
      `Invalid JSON response from ${service}: ${text.slice(0, 100)}`,
      response.status
    );
  }
}
