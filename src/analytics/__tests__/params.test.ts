import { describe, expect, it } from "vitest";

import { normalizeParams, parseParams, type TunableParam, type TunableValues } from "../catalog/params";
import { ValidationError } from "../errors";

const globals: TunableValues = {
  threshold: 70,
  granularity: "day",
  limit: 10,
  windowSize: 7,
  percentile: 0.5,
  slaMs: 1000,
  caseStudyId: undefined,
  service: undefined,
  route: undefined
};

const accepts = (tunables: readonly TunableParam[], defaults: Partial<TunableValues> = {}) => ({
  defaultWindow: "30d" as const,
  tunables,
  scope: true,
  defaults
});

const validationDetails = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (e) {
    if (e instanceof ValidationError) return e.details;
    throw e;
  }
  throw new Error("expected a ValidationError");
};

describe("parseParams", () => {
  it("coerces query-string numbers", () => {
    expect(parseParams({ limit: "5", threshold: "65.5" })).toEqual({ limit: 5, threshold: 65.5 });
  });

  it("rejects unknown keys and out-of-range values", () => {
    expect(() => parseParams({ colour: "red" })).toThrow(ValidationError);
    expect(() => parseParams({ threshold: "101" })).toThrow(ValidationError);
    expect(() => parseParams({ limit: "0" })).toThrow(ValidationError);
    expect(() => parseParams({ percentile: "1.2" })).toThrow(ValidationError);
  });

  it("restricts identifiers to a safe character set", () => {
    expect(() => parseParams({ route: "/api/grades" })).not.toThrow();
    expect(() => parseParams({ caseStudyId: "x'; drop table" })).toThrow(ValidationError);
  });

  it("requires from and to exactly with a custom window", () => {
    expect(() => parseParams({ window: "custom", from: "2024-06-01T00:00:00Z" })).toThrow(ValidationError);
    expect(() => parseParams({ window: "7d", from: "2024-06-01T00:00:00Z" })).toThrow(ValidationError);
    expect(() => parseParams({ window: "custom", from: "2024-06-02T00:00:00Z", to: "2024-06-01T00:00:00Z" })).toThrow(ValidationError);
  });
});

describe("normalizeParams", () => {
  it("fills defaults from the definition before the global ones", () => {
    const normalized = normalizeParams(parseParams({ limit: "5" }), accepts(["limit", "threshold"], { threshold: 60 }), globals);
    expect(normalized).toEqual({ window: { window: "30d" }, tunables: { limit: 5, threshold: 60 } });
  });

  it("collapses equivalent requests", () => {
    const explicit = normalizeParams(parseParams({ window: "30d", limit: "10" }), accepts(["limit"]), globals);
    const implicit = normalizeParams(parseParams({}), accepts(["limit"]), globals);
    expect(explicit).toEqual(implicit);
  });

  it("canonicalizes custom bounds to UTC", () => {
    const normalized = normalizeParams(
      parseParams({ window: "custom", from: "2024-01-01T00:00:00+02:00", to: "2024-01-31T00:00:00Z" }),
      accepts([]),
      globals
    );
    expect(normalized.window).toEqual({ window: "custom", from: "2023-12-31T22:00:00.000Z", to: "2024-01-31T00:00:00.000Z" });
  });

  it("rejects parameters the metric does not accept", () => {
    expect(validationDetails(() => normalizeParams(parseParams({ granularity: "week" }), accepts([]), globals))).toEqual({
      unsupported: ["granularity"]
    });
    expect(
      validationDetails(() => normalizeParams(parseParams({ studentId: "s1" }), { ...accepts([]), scope: false }, globals))
    ).toEqual({ unsupported: ["studentId"] });
  });
});
