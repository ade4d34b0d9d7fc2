import type { Request, Response } from "express";
import { z } from "zod";

import { HttpError } from "../app";
import type { MetricErrorKind } from "../analytics/errors";
import type { MetricsEngine } from "../analytics/metricsEngine";
import { ROLES, type CallerIdentity } from "../analytics/types";

const callerSchema = z.object({
  id: z.string().trim().min(1).max(128),
  role: z.preprocess((v) => (typeof v === "string" ? v.toLowerCase().trim() : v), z.enum(ROLES))
});

const metricIdParamSchema = z.object({
  metricId: z.string().min(1).max(128)
});

const invalidateBodySchema = z
  .object({
    metricId: z.string().min(1).max(128).optional()
  })
  .strict();

const STATUS_BY_KIND: Record<MetricErrorKind, number> = {
  validation: 400,
  authorization: 403,
  data_unavailable: 503,
  internal: 500
};

/** Identity and role are set by the gateway in front of this service. */
const getCaller = (req: Request): CallerIdentity => {
  const parsed = callerSchema.safeParse({ id: req.header("x-caller-id"), role: req.header("x-role") });
  if (!parsed.success) {
    throw new HttpError(401, "Missing or invalid caller identity");
  }
  return parsed.data;
};

export class MetricsController {
  constructor(private readonly engine: MetricsEngine) {}

  async listMetrics(req: Request, res: Response): Promise<void> {
    const caller = getCaller(req);
    res.status(200).json({ ok: true, data: this.engine.listMetrics(caller) });
  }

  async getMetric(req: Request, res: Response): Promise<void> {
    const caller = getCaller(req);

    const parsedParams = metricIdParamSchema.safeParse(req.params);
    if (!parsedParams.success) {
      throw new HttpError(400, "Invalid metric id", parsedParams.error.flatten());
    }

    const response = await this.engine.getMetric({ metricId: parsedParams.data.metricId, params: { ...req.query } }, caller);

    if (response.ok) {
      res.status(200).json(response);
      return;
    }

    const { retryAfterMs } = response.error;
    if (retryAfterMs !== undefined) {
      res.setHeader("Retry-After", String(Math.max(1, Math.ceil(retryAfterMs / 1000))));
    }
    res.status(STATUS_BY_KIND[response.error.kind]).json(response);
  }

  async invalidateCache(req: Request, res: Response): Promise<void> {
    const caller = getCaller(req);
    if (caller.role !== "admin") {
      throw new HttpError(403, "Forbidden");
    }

    const parsedBody = invalidateBodySchema.safeParse(req.body ?? {});
    if (!parsedBody.success) {
      throw new HttpError(400, "Invalid invalidation request", parsedBody.error.flatten());
    }

    const { metricId } = parsedBody.data;
    if (metricId !== undefined && !this.engine.hasMetric(metricId)) {
      throw new HttpError(404, `Unknown metric: ${metricId}`);
    }

    const invalidated = this.engine.invalidate(metricId);
    res.status(200).json({ ok: true, data: { metricId: metricId ?? null, invalidated } });
  }
}
