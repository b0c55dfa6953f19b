import { type Express, type Request, type Response, type NextFunction } from "express";
import { createServer, type Server } from "http";
import {
  SEARCH_KINDS,
  searchRequestSchema,
  type CommissionListResponse,
  type SearchCriteria,
  type SearchKind,
  type StateListResponse,
} from "@shared/schema";

import type { Services } from "./app";
import { CaseSearchError, RequestCancelledError, ValidationError } from "./errors";

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error middleware on its own.
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function searchPath(kind: SearchKind): string {
  return `/cases/by-${kind.replace(/_/g, "-")}`;
}

function parseCriteria(kind: SearchKind, source: unknown, defaultPageSize: number): SearchCriteria {
  const parsed = searchRequestSchema.safeParse(source ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join(".");
    throw field ? new ValidationError(`${field} ${issue.message}`, field) : new ValidationError(issue.message);
  }

  const values = parsed.data;
  return {
    search_kind: kind,
    state: values.state,
    commission: values.commission,
    search_value: values.search_value,
    date_from: values.date_from ?? null,
    date_to: values.date_to ?? null,
    page: values.page,
    per_page: values.per_page ?? defaultPageSize,
  };
}

function isMalformedBody(error: unknown): boolean {
  return typeof error === "object" && error !== null && "type" in error && error.type === "entity.parse.failed";
}

export async function registerRoutes(app: Express, services: Services): Promise<Server> {
  const { config, cache, orchestrator } = services;
  const logger = services.logger.child("express");

  // Middleware to handle CORS
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.header("Access-Control-Expose-Headers", "X-Total-Count-Exact");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.get("/", (_req, res) => {
    const caseSearch = Object.fromEntries(SEARCH_KINDS.map((kind) => [`by_${kind}`, searchPath(kind)]));
    res.json({
      message: `Welcome to ${config.appName}`,
      version: config.version,
      health_url: "/health",
      endpoints: {
        states: "/states",
        commissions: "/commissions/{state_id}",
        case_search: caseSearch,
      },
    });
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      version: config.version,
      service: config.appName,
      cache: cache.stats(),
    });
  });

  app.get(
    "/states",
    asyncRoute(async (_req, res) => {
      const body: StateListResponse = { states: await orchestrator.listStates() };
      res.json(body);
    }),
  );

  app.get(
    "/commissions/:stateId",
    asyncRoute(async (req, res) => {
      const stateId = req.params.stateId.trim();
      const body: CommissionListResponse = {
        commissions: await orchestrator.listCommissions(stateId),
        state_id: stateId,
      };
      res.json(body);
    }),
  );

  for (const kind of SEARCH_KINDS) {
    const handler = asyncRoute(async (req, res) => {
      const source: unknown = req.method === "GET" ? req.query : req.body;
      const criteria = parseCriteria(kind, source, config.defaultPageSize);

      // The upstream call is abandoned once the client hangs up.
      const controller = new AbortController();
      const onClose = () => {
        if (!res.writableFinished) controller.abort();
      };
      res.on("close", onClose);

      try {
        const page = await orchestrator.search(criteria, controller.signal);
        if (!page.totalIsExact) {
          res.setHeader("X-Total-Count-Exact", "false");
        }
        res.json(page.result);
      } finally {
        res.off("close", onClose);
      }
    });

    app.get(searchPath(kind), handler);
    app.post(searchPath(kind), handler);
  }

  app.use((req, res) => {
    res.status(404).json({ detail: "Not Found", path: req.path });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof RequestCancelledError) {
      logger.info(`${req.method} ${req.path}: client disconnected, upstream call abandoned`);
      return;
    }
    if (res.headersSent) {
      logger.error(`${req.method} ${req.path}: failed after the response started: ${String(error)}`);
      res.end();
      return;
    }

    if (error instanceof CaseSearchError) {
      if (error.status >= 500) {
        logger.error(`${req.method} ${req.path}: ${error.kind}: ${error.message}`);
      }
      res.status(error.status).json(error.toResponseBody());
      return;
    }
    if (isMalformedBody(error)) {
      res.status(400).json({ detail: "Request body is not valid JSON" });
      return;
    }

    logger.error(`${req.method} ${req.path}: unexpected error: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`);
    res.status(500).json({ detail: "Internal server error" });
  });

  const httpServer = createServer(app);
  return httpServer;
}
