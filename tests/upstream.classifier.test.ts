import { describe, it } from "mocha";
import { expect } from "chai";

import { DEFAULT_CAPTCHA_MARKERS } from "../server/config";
import {
  CaptchaRequiredError,
  NotFoundError,
  RequestCancelledError,
  UpstreamError,
  UpstreamTimeoutError,
  ValidationError,
} from "../server/errors";
import { FailureClassifier, type UpstreamExchange } from "../server/upstream/classifier";

function response(status: number, body: string, contentType = "text/html"): UpstreamExchange {
  return { kind: "response", status, contentType, body };
}

describe("upstream/FailureClassifier", () => {
  const classifier = new FailureClassifier(DEFAULT_CAPTCHA_MARKERS);

  it("flags a captcha page even when the status is 200", () => {
    const outcome = classifier.classify(response(200, '<html><div class="g-recaptcha"></div></html>'));

    expect(outcome.ok).to.equal(false);
    if (outcome.ok) return;
    expect(outcome.error).to.be.instanceOf(CaptchaRequiredError);
    expect(outcome.error.status).to.equal(503);
    expect(outcome.error.toResponseBody()).to.deep.equal({
      detail: "captcha_required",
      captcha: true,
      message: "The upstream portal returned a captcha; the request cannot be completed automatically.",
    });
  });

  it("checks captcha markers before the status code", () => {
    const outcome = classifier.classify(response(500, "<p>Please VERIFY YOU ARE HUMAN</p>"));

    expect(outcome.ok).to.equal(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).to.equal("captcha_required");
  });

  it("uses the configured marker set", () => {
    const custom = new FailureClassifier(["Robot Check"]);

    expect(custom.isCaptcha("<h1>robot check</h1>")).to.equal(true);
    expect(custom.isCaptcha('<div class="g-recaptcha"></div>')).to.equal(false);
  });

  it("matches phrase markers in markup but not in JSON result data", () => {
    const custom = new FailureClassifier(["Security Check", "g-recaptcha"]);
    const row = '{"cases":[{"respondent":"Airport Security Check Services Pvt Ltd"}]}';

    expect(custom.classify(response(200, row, "application/json"))).to.deep.equal({
      ok: true,
      status: 200,
      payload: { format: "json", data: { cases: [{ respondent: "Airport Security Check Services Pvt Ltd" }] } },
    });
    expect(custom.isCaptcha("<h1>Security check</h1>")).to.equal(true);
    expect(custom.isCaptcha('{"widget":"g-recaptcha"}', false)).to.equal(true);
  });

  it("leaves generic wording out of the default markers", () => {
    expect(DEFAULT_CAPTCHA_MARKERS).to.not.include("security check");
    expect(classifier.isCaptcha("<p>Airport Security Check Services Pvt Ltd</p>")).to.equal(false);
  });

  it("parses JSON bodies by content type or leading bracket", () => {
    const byType = classifier.classify(response(200, '{"cases":[]}', "application/json; charset=utf-8"));
    const bySniff = classifier.classify(response(200, "  [1, 2]", "text/plain"));

    expect(byType).to.deep.equal({ ok: true, status: 200, payload: { format: "json", data: { cases: [] } } });
    expect(bySniff).to.deep.equal({ ok: true, status: 200, payload: { format: "json", data: [1, 2] } });
  });

  it("returns markup as an html payload", () => {
    const outcome = classifier.classify(response(200, "<!DOCTYPE html><table></table>"));

    expect(outcome).to.deep.equal({
      ok: true,
      status: 200,
      payload: { format: "html", html: "<!DOCTYPE html><table></table>" },
    });
  });

  it("treats malformed JSON and plain text as upstream errors", () => {
    const malformed = classifier.classify(response(200, '{"cases": [', "application/json"));
    const text = classifier.classify(response(200, "service unavailable", "text/plain"));

    expect(malformed.ok).to.equal(false);
    expect(text.ok).to.equal(false);
    if (malformed.ok || text.ok) return;
    expect(malformed.error).to.be.instanceOf(UpstreamError);
    expect(text.error).to.be.instanceOf(UpstreamError);
    expect(text.error.message).to.equal("HTTP 200: body is neither JSON nor HTML");
  });

  it("maps a 404 on a reference lookup to NotFound", () => {
    const outcome = classifier.classify(response(404, ""), { entity: "commissions", subject: "state ID: 99" });

    expect(outcome.ok).to.equal(false);
    if (outcome.ok) return;
    expect(outcome.error).to.be.instanceOf(NotFoundError);
    expect(outcome.error.message).to.equal("No commissions found for state ID: 99");
  });

  it("maps an empty 2xx body on a reference lookup to NotFound and on a search to an upstream error", () => {
    const lookup = classifier.classify(response(200, "   "), { entity: "states" });
    const search = classifier.classify(response(200, ""));

    expect(lookup.ok).to.equal(false);
    expect(search.ok).to.equal(false);
    if (lookup.ok || search.ok) return;
    expect(lookup.error.kind).to.equal("not_found");
    expect(search.error.kind).to.equal("upstream_error");
  });

  it("maps other 4xx to a validation error that is not retried", () => {
    const outcome = classifier.classify(response(422, "<p>bad form</p>"));

    expect(outcome.ok).to.equal(false);
    if (outcome.ok) return;
    expect(outcome.error).to.be.instanceOf(ValidationError);
    expect(outcome.error.message).to.equal("The upstream portal rejected the request (HTTP 422)");
    expect(outcome.error.retryable).to.equal(false);
  });

  it("marks 5xx, timeouts and network failures retryable", () => {
    const server = classifier.classify(response(503, "<p>down</p>"));
    const timeout = classifier.classify({ kind: "timeout", elapsedMs: 30_000 });
    const network = classifier.classify({ kind: "network", detail: "ECONNRESET" });

    expect(server.ok || timeout.ok || network.ok).to.equal(false);
    if (server.ok || timeout.ok || network.ok) return;
    expect(server.error).to.be.instanceOf(UpstreamError);
    expect(server.error.message).to.equal("HTTP 503: unexpected status");
    expect(timeout.error).to.be.instanceOf(UpstreamTimeoutError);
    expect(network.error.message).to.equal("Network failure: ECONNRESET");
    expect([server.error.retryable, timeout.error.retryable, network.error.retryable]).to.deep.equal([
      true,
      true,
      true,
    ]);
  });

  it("reports a cancelled exchange as a cancellation", () => {
    const outcome = classifier.classify({ kind: "cancelled" });

    expect(outcome.ok).to.equal(false);
    if (outcome.ok) return;
    expect(outcome.error).to.be.instanceOf(RequestCancelledError);
  });

  it("keeps upstream details out of the sanitized response bodies", () => {
    expect(new UpstreamError(500, "stack trace from portal").toResponseBody()).to.deep.equal({
      detail: "Error communicating with the upstream portal. Please try again later.",
    });
    expect(new UpstreamTimeoutError("slow").toResponseBody()).to.deep.equal({
      detail: "Request to the upstream portal timed out. Please try again later.",
    });
  });
});
