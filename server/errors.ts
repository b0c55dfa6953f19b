import type { CaptchaErrorBody, ErrorBody } from "@shared/schema";

export type ErrorKind =
  | "validation"
  | "not_found"
  | "captcha_required"
  | "upstream_timeout"
  | "upstream_error"
  | "cancelled";

export type NotFoundEntity = "state" | "commission" | "states" | "commissions";

export const CAPTCHA_MESSAGE =
  "The upstream portal returned a captcha; the request cannot be completed automatically.";

/**
 * Base class of every failure the adapter surfaces. Messages of subclasses
 * that wrap upstream failures are for logs only; `toResponseBody` is what
 * callers see.
 */
export abstract class CaseSearchError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /** Whether the transport may repeat the call that produced this failure. */
  get retryable(): boolean {
    return false;
  }

  toResponseBody(): ErrorBody | CaptchaErrorBody {
    return { detail: this.message };
  }
}

export class ValidationError extends CaseSearchError {
  readonly kind = "validation";
  readonly status = 400;

  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(message);
  }

  toResponseBody(): ErrorBody {
    return this.field ? { detail: this.message, field: this.field } : { detail: this.message };
  }
}

export class NotFoundError extends CaseSearchError {
  readonly kind = "not_found";
  readonly status = 404;

  constructor(
    readonly entity: NotFoundEntity,
    message: string,
    readonly suggestions: string[] = [],
  ) {
    super(message);
  }

  toResponseBody(): ErrorBody {
    return this.suggestions.length > 0
      ? { detail: this.message, suggestions: this.suggestions }
      : { detail: this.message };
  }
}

export class CaptchaRequiredError extends CaseSearchError {
  readonly kind = "captcha_required";
  readonly status = 503;

  constructor() {
    super(CAPTCHA_MESSAGE);
  }

  toResponseBody(): CaptchaErrorBody {
    return { detail: "captcha_required", captcha: true, message: CAPTCHA_MESSAGE };
  }
}

export class UpstreamTimeoutError extends CaseSearchError {
  readonly kind = "upstream_timeout";
  readonly status = 504;

  get retryable(): boolean {
    return true;
  }

  toResponseBody(): ErrorBody {
    return { detail: "Request to the upstream portal timed out. Please try again later." };
  }
}

export class UpstreamError extends CaseSearchError {
  readonly kind = "upstream_error";
  readonly status = 502;

  /** `upstreamStatus` is null when no HTTP response was received. */
  constructor(
    readonly upstreamStatus: number | null,
    detail: string,
  ) {
    super(upstreamStatus === null ? detail : `HTTP ${upstreamStatus}: ${detail}`);
  }

  get retryable(): boolean {
    return this.upstreamStatus === null || this.upstreamStatus >= 500;
  }

  toResponseBody(): ErrorBody {
    return { detail: "Error communicating with the upstream portal. Please try again later." };
  }
}

export class RequestCancelledError extends CaseSearchError {
  readonly kind = "cancelled";
  readonly status = 499;

  constructor() {
    super("The caller disconnected before the upstream call completed");
  }
}
