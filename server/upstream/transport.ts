import { setTimeout as delay } from "node:timers/promises";
import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import pLimit from "p-limit";

import { UpstreamTimeoutError, RequestCancelledError } from "../errors";
import type { Logger } from "../log";
import type {
  ClassifyContext,
  FailureClassifier,
  UpstreamExchange,
  UpstreamOutcome,
} from "./classifier";
import { BROWSER_HEADERS } from "./requests";

export interface UpstreamRequest {
  method: "GET" | "POST";
  path: string;
  /** Sent form-encoded. */
  form?: Record<string, string>;
  /** Short description for log lines. */
  label: string;
  context?: ClassifyContext;
}

export interface RetryPolicy {
  /** Attempts after the first one. */
  maxRetries: number;
  /** Per-attempt timeout. */
  timeoutMs: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Budget for all attempts and backoff sleeps of one call. */
  deadlineMs: number;
}

export function createRetryPolicy(options: {
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
}): RetryPolicy {
  return {
    maxRetries: options.maxRetries,
    timeoutMs: options.timeoutMs,
    baseDelayMs: options.baseDelayMs,
    maxDelayMs: Math.max(options.baseDelayMs, 8_000),
    deadlineMs: options.timeoutMs * (options.maxRetries + 1),
  };
}

/** Delay before retry number `attempt` (1-based). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

type Limit = ReturnType<typeof pLimit>;

export interface UpstreamTransportOptions {
  baseUrl: string;
  policy: RetryPolicy;
  classifier: FailureClassifier;
  logger: Logger;
  concurrency: number;
  /** Replaces the network layer; tests pass an in-process adapter. */
  adapter?: AxiosAdapter;
  now?: () => number;
}

export class UpstreamTransport {
  private readonly http: AxiosInstance;
  /** Caps how many upstream calls are in flight; extra attempts queue in order. */
  private readonly limit: Limit;
  private readonly now: () => number;

  constructor(private readonly options: UpstreamTransportOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      headers: { ...BROWSER_HEADERS },
      responseType: "text",
      // Keep the raw body: the classifier must see captcha pages before any parsing.
      transformResponse: (data: unknown) => data,
      validateStatus: () => true,
      maxRedirects: 5,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
    this.limit = pLimit(Math.max(1, Math.floor(options.concurrency)));
    this.now = options.now ?? Date.now;
  }

  /**
   * Performs the request with the retry policy applied. Never throws for
   * upstream failures; the outcome carries the classified error instead.
   */
  async send(request: UpstreamRequest, signal?: AbortSignal): Promise<UpstreamOutcome> {
    const { policy, classifier, logger } = this.options;
    const deadline = this.now() + policy.deadlineMs;

    for (let attempt = 1; ; attempt += 1) {
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        logger.error(`${request.label}: deadline of ${policy.deadlineMs}ms exhausted`);
        return {
          ok: false,
          error: new UpstreamTimeoutError(`${request.label} exceeded its ${policy.deadlineMs}ms deadline`),
        };
      }

      const exchange = await this.limit(() =>
        this.exchange(request, Math.min(policy.timeoutMs, remaining), signal),
      );
      const outcome = classifier.classify(exchange, request.context);
      if (outcome.ok) {
        logger.debug(`${request.label}: HTTP ${outcome.status} on attempt ${attempt}`);
        return outcome;
      }

      const { error } = outcome;
      if (error.kind === "captcha_required") {
        logger.warn(`${request.label}: captcha challenge returned; not retrying`);
        return outcome;
      }
      if (!error.retryable || attempt > policy.maxRetries) {
        if (error.retryable) {
          logger.error(`${request.label}: giving up after ${attempt} attempts (${error.message})`);
        }
        return outcome;
      }

      const wait = backoffDelay(policy, attempt);
      if (this.now() + wait >= deadline) {
        logger.error(`${request.label}: no time left for retry ${attempt} (${error.message})`);
        return {
          ok: false,
          error: new UpstreamTimeoutError(
            `${request.label} exceeded its ${policy.deadlineMs}ms deadline after: ${error.message}`,
          ),
        };
      }
      logger.warn(`${request.label}: ${error.message}; retry ${attempt}/${policy.maxRetries} in ${wait}ms`);

      try {
        await delay(wait, undefined, { signal });
      } catch (sleepError) {
        if (signal?.aborted) return { ok: false, error: new RequestCancelledError() };
        throw sleepError;
      }
    }
  }

  /** One attempt, reduced to an exchange value. */
  private async exchange(
    request: UpstreamRequest,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<UpstreamExchange> {
    if (signal?.aborted) return { kind: "cancelled" };

    const started = this.now();
    try {
      const response = await this.http.request<unknown>({
        method: request.method,
        url: request.path,
        data: request.form ? new URLSearchParams(request.form).toString() : undefined,
        headers: request.form ? { "Content-Type": "application/x-www-form-urlencoded" } : undefined,
        timeout: timeoutMs,
        signal,
      });

      const rawType = response.headers["content-type"];
      return {
        kind: "response",
        status: response.status,
        contentType: typeof rawType === "string" ? rawType.toLowerCase() : "",
        body: typeof response.data === "string" ? response.data : JSON.stringify(response.data ?? ""),
      };
    } catch (error) {
      if (axios.isCancel(error) || signal?.aborted) {
        return { kind: "cancelled" };
      }
      if (axios.isAxiosError(error)) {
        if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
          return { kind: "timeout", elapsedMs: this.now() - started };
        }
        return { kind: "network", detail: error.code ?? error.message };
      }
      throw error;
    }
  }
}
