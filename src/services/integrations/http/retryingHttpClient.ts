import type { HttpClientConfig, RetryPolicyConfig } from "../../../config/configManager.js";
import { createLogger, describeError, type Logger } from "../../../telemetry/logger.js";

export type RequestMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface RequestOptions extends Omit<RequestInit, "method" | "signal"> {
  readonly method?: RequestMethod;
  readonly timeoutMs?: number;
  readonly searchParams?: Record<string, string | number | boolean | undefined>;
  readonly expectedStatuses?: number[];
  /** `false` sends the request once; used for calls that must not be repeated, such as placing an order. */
  readonly retry?: boolean;
}

const DEFAULT_EXPECTED_STATUSES = [200];

interface InternalRequestOptions extends RequestOptions {
  readonly method: RequestMethod;
}

export class HttpRequestError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestError";
  }
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

function buildUrl(baseUrl: string, path: string, params?: RequestOptions["searchParams"]): string {
  const url = new URL(path, baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`);
  if (params) {
    Object.entries(params).forEach(([key, value]) => {
      if (value === undefined) {
        return;
      }
      url.searchParams.set(key, String(value));
    });
  }
  return url.toString();
}

function shouldRetry(status: number, expectedStatuses: number[]): boolean {
  if (expectedStatuses.includes(status)) {
    return false;
  }
  if (status === 429) {
    return true;
  }
  if (status >= 500) {
    return true;
  }
  return false;
}

function computeDelay(attempt: number, retry: RetryPolicyConfig): number {
  const exponentialDelay = retry.initialDelayMs * Math.pow(retry.backoffMultiplier, attempt - 1);
  const boundedDelay = Math.min(exponentialDelay, retry.maxDelayMs);
  const jitter = boundedDelay * 0.2 * Math.random();
  return Math.round(boundedDelay + jitter);
}

/**
 * Pulls a readable reason out of an error body. MetaApi answers with
 * `{ error, message }`, Telegram with `{ ok: false, description }`.
 */
export function extractErrorDetail(body: string): string | undefined {
  if (!body) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === "object" && parsed !== null) {
      for (const key of ["message", "description", "error"]) {
        const value: unknown = Reflect.get(parsed, key);
        if (typeof value === "string" && value.trim()) {
          return value.trim();
        }
      }
    }
  } catch {
    // plain-text body
  }
  const trimmed = body.trim();
  return trimmed ? trimmed.slice(0, 200) : undefined;
}

function buildStatusError(status: number, body: string, prefix: string): HttpRequestError {
  const detail = extractErrorDetail(body);
  const message = detail ? `${prefix} ${status}: ${detail}` : `${prefix} ${status}`;
  return new HttpRequestError(status, body, message);
}

function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error instanceof HttpRequestError) {
    return false;
  }
  return error.name === "AbortError" || error.name === "TimeoutError" || error instanceof TypeError;
}

export interface RetryingHttpClientOptions {
  readonly http: HttpClientConfig;
  /** Label used in log lines, e.g. "metaapi" or "telegram". */
  readonly service: string;
  readonly logger?: Logger;
}

export class RetryingHttpClient {
  private readonly logger: Logger;
  private readonly service: string;
  private readonly expectedStatuses: number[];
  private readonly minIntervalMs: number;
  private readonly retry: RetryPolicyConfig;
  private rateLimiter = Promise.resolve();
  private nextAvailableTimestamp = 0;

  constructor(private readonly options: RetryingHttpClientOptions) {
    this.service = options.service;
    this.logger = options.logger ?? createLogger(options.service);
    this.expectedStatuses = DEFAULT_EXPECTED_STATUSES;
    this.retry = options.http.retry;
    this.minIntervalMs = options.http.rateLimitPerSecond > 0
      ? Math.floor(1000 / options.http.rateLimitPerSecond)
      : 0;
  }

  get baseUrl(): string {
    return this.options.http.baseUrl;
  }

  async get<T>(path: string, options: RequestOptions = {}): Promise<T> {
    return this.request<T>(path, { ...options, method: "GET" });
  }

  async post<T>(path: string, options: RequestOptions = {}): Promise<T> {
    return this.request<T>(path, { ...options, method: "POST" });
  }

  async request<T>(path: string, options: InternalRequestOptions): Promise<T> {
    const response = await this.execute(path, options);
    return (await response.json()) as T;
  }

  /** Same retry semantics as `request`, for endpoints that answer without a body (e.g. 204). */
  async send(path: string, options: InternalRequestOptions): Promise<void> {
    const response = await this.execute(path, options);
    await response.text();
  }

  private async execute(path: string, options: InternalRequestOptions): Promise<Response> {
    const { timeoutMs: timeoutOverride, searchParams, expectedStatuses: statusOverride, retry, ...init } = options;
    const requestUrl = buildUrl(this.options.http.baseUrl, path, searchParams);
    const expectedStatuses = statusOverride ?? this.expectedStatuses;
    const maxAttempts = retry === false ? 1 : this.retry.maxAttempts;

    await this.applyRateLimit();

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const controller = new AbortController();
      const timeoutMs = timeoutOverride ?? this.options.http.timeoutMs;
      const timeout = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const response = await fetch(requestUrl, {
          ...init,
          method: options.method,
          signal: controller.signal,
        });
        clearTimeout(timeout);

        if (expectedStatuses.includes(response.status)) {
          return response;
        }

        const retryable = shouldRetry(response.status, expectedStatuses);
        const body = await response.text();
        const metadata = { path, attempt, status: response.status, body };
        if (!retryable) {
          this.logger.error(`${this.service} request failed`, metadata);
          throw buildStatusError(response.status, body, "Unexpected status");
        }
        if (attempt >= maxAttempts) {
          this.logger.error(`${this.service} request exhausted retries`, metadata);
          throw buildStatusError(response.status, body, `Failed after ${attempt} attempts with status`);
        }
        this.logger.warn(`${this.service} request retry`, metadata);
        await sleep(computeDelay(attempt, this.retry));
      } catch (error) {
        clearTimeout(timeout);
        if (!isRetryableError(error)) {
          throw error;
        }
        const metadata = { path, attempt, error: describeError(error) };
        if (attempt >= maxAttempts) {
          this.logger.error(`${this.service} request failed without response`, metadata);
          throw error;
        }
        this.logger.warn(`${this.service} request error`, metadata);
        await sleep(computeDelay(attempt, this.retry));
      }
    }

    throw new Error("Retry loop exited unexpectedly");
  }

  private applyRateLimit(): Promise<void> {
    if (this.minIntervalMs <= 0) {
      return Promise.resolve();
    }
    const limiter = this.rateLimiter.then(async () => {
      const now = Date.now();
      const waitTime = Math.max(0, this.nextAvailableTimestamp - now);
      if (waitTime > 0) {
        await sleep(waitTime);
      }
      this.nextAvailableTimestamp = Date.now() + this.minIntervalMs;
    });
    this.rateLimiter = limiter.catch((error: unknown) => {
      this.logger.error("Rate limiter failure", { error: describeError(error) });
    });
    return limiter;
  }
}
