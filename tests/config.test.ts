import { describe, it } from "mocha";
import { expect } from "chai";

import { DEFAULT_CAPTCHA_MARKERS, loadConfig } from "../server/config";

describe("config/loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadConfig({})).to.deep.equal({
      appName: "Consumer Case Search API",
      version: "1.0.0",
      upstreamBaseUrl: "https://e-jagriti.gov.in",
      upstreamTimeoutMs: 30_000,
      upstreamMaxRetries: 3,
      upstreamBackoffMs: 500,
      upstreamConcurrency: 5,
      statesTtlSeconds: 86_400,
      commissionsTtlSeconds: 86_400,
      defaultPageSize: 20,
      maxPageSize: 100,
      captchaMarkers: DEFAULT_CAPTCHA_MARKERS,
      logLevel: "info",
      host: "0.0.0.0",
      port: 8000,
    });
  });

  it("reads and coerces environment values", () => {
    const config = loadConfig({
      UPSTREAM_BASE_URL: "https://portal.test/api//",
      UPSTREAM_TIMEOUT_SECONDS: "5",
      UPSTREAM_MAX_RETRIES: "0",
      CACHE_TTL_COMMISSIONS: "600",
      CAPTCHA_MARKERS: " Robot Check, ,cf-challenge ",
      LOG_LEVEL: "DEBUG",
      PORT: "9000",
    });

    expect(config.upstreamBaseUrl).to.equal("https://portal.test/api");
    expect(config.upstreamTimeoutMs).to.equal(5_000);
    expect(config.upstreamMaxRetries).to.equal(0);
    expect(config.commissionsTtlSeconds).to.equal(600);
    expect(config.statesTtlSeconds).to.equal(86_400);
    expect(config.captchaMarkers).to.deep.equal(["robot check", "cf-challenge"]);
    expect(config.logLevel).to.equal("debug");
    expect(config.port).to.equal(9000);
  });

  it("treats blank variables as unset", () => {
    expect(loadConfig({ PORT: "  ", LOG_LEVEL: "" }).port).to.equal(8000);
  });

  it("names the offending variable", () => {
    expect(() => loadConfig({ UPSTREAM_TIMEOUT_SECONDS: "-1" })).to.throw(
      "Invalid configuration: UPSTREAM_TIMEOUT_SECONDS Number must be greater than 0",
    );
    expect(() => loadConfig({ DEFAULT_PAGE_SIZE: "50", MAX_PAGE_SIZE: "10" })).to.throw(
      "Invalid configuration: DEFAULT_PAGE_SIZE DEFAULT_PAGE_SIZE cannot exceed MAX_PAGE_SIZE",
    );
  });
});
