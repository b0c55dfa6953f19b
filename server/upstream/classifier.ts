import {
  CaptchaRequiredError,
  NotFoundError,
  RequestCancelledError,
  UpstreamError,
  UpstreamTimeoutError,
  ValidationError,
  type CaseSearchError,
  type NotFoundEntity,
} from "../errors";

/** What one attempt against the upstream portal produced, before any judgement. */
export type UpstreamExchange =
  | { kind: "response"; status: number; contentType: string; body: string }
  | { kind: "timeout"; elapsedMs: number }
  | { kind: "network"; detail: string }
  | { kind: "cancelled" };

export type UpstreamPayload =
  | { format: "json"; data: unknown }
  | { format: "html"; html: string };

export type UpstreamOutcome =
  | { ok: true; status: number; payload: UpstreamPayload }
  | { ok: false; error: CaseSearchError };

export interface ClassifyContext {
  /** Set for reference-data lookups; a 404 or empty body then means NotFound. */
  entity?: NotFoundEntity;
  /** Free-form label used in NotFound messages, e.g. "state ID: 29". */
  subject?: string;
}

const MARKUP = /^\s*<(?:!doctype|[a-z])/i;
const JSON_START = /^\s*[[{]/;

export class FailureClassifier {
  /** Single-token markers such as `g-recaptcha`; matched in any body. */
  private readonly tokens: readonly string[];
  /** Multi-word markers; matched in markup only, since result data may contain the same words. */
  private readonly phrases: readonly string[];

  constructor(captchaMarkers: readonly string[]) {
    const markers = captchaMarkers.map((marker) => marker.trim().toLowerCase()).filter(Boolean);
    this.tokens = markers.filter((marker) => !/\s/.test(marker));
    this.phrases = markers.filter((marker) => /\s/.test(marker));
  }

  isCaptcha(body: string, markup = true): boolean {
    const haystack = body.toLowerCase();
    if (this.tokens.some((marker) => haystack.includes(marker))) return true;
    return markup && this.phrases.some((marker) => haystack.includes(marker));
  }

  classify(exchange: UpstreamExchange, context: ClassifyContext = {}): UpstreamOutcome {
    switch (exchange.kind) {
      case "cancelled":
        return { ok: false, error: new RequestCancelledError() };
      case "timeout":
        return {
          ok: false,
          error: new UpstreamTimeoutError(`Upstream call timed out after ${exchange.elapsedMs}ms`),
        };
      case "network":
        return { ok: false, error: new UpstreamError(null, `Network failure: ${exchange.detail}`) };
      case "response":
        return this.classifyResponse(exchange, context);
    }
  }

  private classifyResponse(
    response: Extract<UpstreamExchange, { kind: "response" }>,
    context: ClassifyContext,
  ): UpstreamOutcome {
    const { status, body, contentType } = response;
    const looksJson = contentType.includes("json") || JSON_START.test(body);

    // A challenge page is neither a result nor an error page, whatever the status says.
    if (this.isCaptcha(body, !looksJson)) {
      return { ok: false, error: new CaptchaRequiredError() };
    }

    if (status === 404 && context.entity) {
      return { ok: false, error: this.notFound(context) };
    }
    if (status >= 400 && status < 500) {
      return {
        ok: false,
        error: new ValidationError(`The upstream portal rejected the request (HTTP ${status})`),
      };
    }
    if (status < 200 || status >= 300) {
      return { ok: false, error: new UpstreamError(status, "unexpected status") };
    }

    if (body.trim().length === 0) {
      return context.entity
        ? { ok: false, error: this.notFound(context) }
        : { ok: false, error: new UpstreamError(status, "empty response body") };
    }

    if (looksJson) {
      try {
        return { ok: true, status, payload: { format: "json", data: JSON.parse(body) } };
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return { ok: false, error: new UpstreamError(status, `malformed JSON body (${reason})`) };
      }
    }

    if (MARKUP.test(body)) {
      return { ok: true, status, payload: { format: "html", html: body } };
    }

    return { ok: false, error: new UpstreamError(status, "body is neither JSON nor HTML") };
  }

  private notFound(context: ClassifyContext): NotFoundError {
    const entity = context.entity ?? "states";
    const subject = context.subject ? ` for ${context.subject}` : "";
    return new NotFoundError(entity, `No ${entity} found${subject}`);
  }
}
