import compression from "compression";
import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import rateLimit from "express-rate-limit";
import helmet from "helmet";
import pinoHttp from "pino-http";

import type { MetricsEngine } from "./analytics/metricsEngine";
import { MetricsController } from "./controllers/metrics.controller";
import { createMetricsRouter } from "./routes/metrics.route";
import { logger, requestLogProps } from "./utils/logger";

export class HttpError extends Error {
  public readonly status: number;
  public readonly details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.status = status;
    this.details = details;
  }
}

export interface AppOptions {
  engine: MetricsEngine;
  /** Allowed browser origins; every origin is allowed when unset. */
  corsOrigins?: string[];
}

export const createApp = ({ engine, corsOrigins }: AppOptions) => {
  const app = express();

  app.disable("x-powered-by");

  app.use(
    pinoHttp({
      logger,
      customProps: requestLogProps,
      autoLogging: {
        ignore: (req) => req.url === "/health"
      }
    })
  );

  app.use(helmet());

  app.use(
    cors({
      origin: (origin, cb) => {
        if (!corsOrigins || corsOrigins.length === 0) return cb(null, true);
        if (!origin) return cb(null, true);
        return cb(null, corsOrigins.includes(origin));
      },
      credentials: true
    })
  );

  app.use(compression());
  app.use(express.json({ limit: "100kb" }));

  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: 60,
      standardHeaders: true,
      legacyHeaders: false
    })
  );

  app.get("/health", (_req, res) => res.status(200).json({ ok: true, cachedEntries: engine.cachedEntries }));

  app.use("/api/metrics", createMetricsRouter(new MetricsController(engine)));

  app.use((_req, _res, next) => {
    next(new HttpError(404, "Not found"));
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = req.id ?? req.header("x-request-id") ?? undefined;

    if (err instanceof HttpError) {
      req.log.warn({ err, requestId }, "request_error");

      return res.status(err.status).json({
        ok: false,
        error: {
          message: err.message,
          status: err.status,
          details: err.details,
          request_id: requestId
        }
      });
    }

    req.log.error({ err, requestId }, "unhandled_error");

    return res.status(500).json({
      ok: false,
      error: {
        message: "Internal server error",
        status: 500,
        request_id: requestId
      }
    });
  });

  return app;
};
