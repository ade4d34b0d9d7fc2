import { Router } from "express";

import type { MetricsController } from "../controllers/metrics.controller";

export const createMetricsRouter = (controller: MetricsController): Router => {
  const metricsRouter = Router();

  metricsRouter.get("/", (req, res, next) => {
    controller.listMetrics(req, res).catch(next);
  });

  metricsRouter.post("/cache/invalidate", (req, res, next) => {
    controller.invalidateCache(req, res).catch(next);
  });

  metricsRouter.get("/:metricId", (req, res, next) => {
    controller.getMetric(req, res).catch(next);
  });

  return metricsRouter;
};
