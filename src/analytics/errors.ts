export type MetricErrorKind = "validation" | "authorization" | "data_unavailable" | "internal";

export interface MetricErrorBody {
  kind: MetricErrorKind;
  message: string;
  details?: unknown;
  retryAfterMs?: number;
}

export class MetricError extends Error {
  public readonly kind: MetricErrorKind;
  public readonly details?: unknown;

  constructor(kind: MetricErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.details = details;
  }

  toBody(): MetricErrorBody {
    return this.details === undefined
      ? { kind: this.kind, message: this.message }
      : { kind: this.kind, message: this.message, details: this.details };
  }
}

export class ValidationError extends MetricError {
  constructor(message: string, details?: unknown) {
    super("validation", message, details);
  }
}

export type AuthorizationReason = "ownership" | "scope_violation" | "role_not_permitted";

export class AuthorizationError extends MetricError {
  public readonly reason: AuthorizationReason;

  constructor(reason: AuthorizationReason, message: string) {
    super("authorization", message, { reason });
    this.reason = reason;
  }
}

export class DataUnavailableError extends MetricError {
  public readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number, cause?: unknown) {
    super("data_unavailable", message);
    this.retryAfterMs = retryAfterMs;
    if (cause !== undefined) this.cause = cause;
  }

  override toBody(): MetricErrorBody {
    return { kind: this.kind, message: this.message, retryAfterMs: this.retryAfterMs };
  }
}

export const toMetricError = (e: unknown): MetricError => {
  if (e instanceof MetricError) return e;
  return new MetricError("internal", "Metric computation failed");
};
