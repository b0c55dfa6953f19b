import express, { type Express, type Request, type Response, type NextFunction } from "express";
import type { AxiosAdapter } from "axios";

import type { AppConfig } from "./config";
import type { Logger } from "./log";
import { ReferenceDataCache } from "./reference/reference-cache";
import { UpstreamReferenceSource } from "./reference/reference-source";
import { SearchOrchestrator } from "./search/orchestrator";
import { FailureClassifier } from "./upstream/classifier";
import { UpstreamTransport, createRetryPolicy } from "./upstream/transport";

export interface Services {
  config: AppConfig;
  logger: Logger;
  cache: ReferenceDataCache;
  orchestrator: SearchOrchestrator;
}

export interface ServiceOverrides {
  /** In-process network layer, used by tests. */
  adapter?: AxiosAdapter;
  now?: () => number;
}

export function createServices(config: AppConfig, logger: Logger, overrides: ServiceOverrides = {}): Services {
  const transport = new UpstreamTransport({
    baseUrl: config.upstreamBaseUrl,
    policy: createRetryPolicy({
      timeoutMs: config.upstreamTimeoutMs,
      maxRetries: config.upstreamMaxRetries,
      baseDelayMs: config.upstreamBackoffMs,
    }),
    classifier: new FailureClassifier(config.captchaMarkers),
    logger: logger.child("upstream"),
    concurrency: config.upstreamConcurrency,
    adapter: overrides.adapter,
    now: overrides.now,
  });

  const cache = new ReferenceDataCache(new UpstreamReferenceSource(transport), {
    statesTtlSeconds: config.statesTtlSeconds,
    commissionsTtlSeconds: config.commissionsTtlSeconds,
    logger: logger.child("cache"),
    now: overrides.now,
  });

  const orchestrator = new SearchOrchestrator({
    cache,
    transport,
    maxPageSize: config.maxPageSize,
    documentBaseUrl: config.upstreamBaseUrl,
    logger: logger.child("search"),
  });

  return { config, logger, cache, orchestrator };
}

export function createApp(logger: Logger): Express {
  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      const duration = Date.now() - start;
      logger.info(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    });

    next();
  });

  return app;
}
