import { AuthorizationError, ValidationError } from "./errors";
import type { MetricCatalog, MetricDefinition } from "./catalog";
import { readsOnly } from "./catalog/builder";
import type { CallerIdentity, EffectiveScope } from "./types";

export interface MetricRequest {
  metricId: string;
  params: Record<string, unknown>;
}

export interface ScopedRequest {
  definition: MetricDefinition;
  scope: EffectiveScope;
}

const optionalString = (value: unknown): string | undefined => (typeof value === "string" && value.trim() !== "" ? value.trim() : undefined);

/** True when the value names nobody or the caller. A value of any other type names someone else. */
const isOwnId = (value: unknown, callerId: string): boolean =>
  value === undefined || value === null || (typeof value === "string" && (value.trim() === "" || value.trim() === callerId));

/**
 * The single checkpoint between a caller and the catalog: every request is
 * turned into an effective scope here, or rejected.
 */
export class RoleScopingLayer {
  constructor(private readonly catalog: MetricCatalog) {}

  scope(request: MetricRequest, caller: CallerIdentity): ScopedRequest {
    const studentId = optionalString(request.params.studentId);
    const department = optionalString(request.params.department);
    const cohort = optionalString(request.params.cohort);

    // Ownership comes first, before the metric id is even looked up.
    if (caller.role === "student" && !isOwnId(request.params.studentId, caller.id)) {
      throw new AuthorizationError("ownership", "Students may only request their own metrics");
    }

    const definition = this.catalog.get(request.metricId);
    if (!definition) {
      throw new ValidationError(`Unknown metric: ${request.metricId}`);
    }

    switch (caller.role) {
      case "student": {
        if (department !== undefined || cohort !== undefined) {
          throw new AuthorizationError("scope_violation", "Students cannot filter by department or cohort");
        }
        this.assertVisible(definition, caller);
        return { definition, scope: { role: caller.role, callerId: caller.id, ownerId: caller.id } };
      }

      case "developer": {
        if (!readsOnly(definition, "telemetry")) {
          throw new AuthorizationError("scope_violation", `Developers may only request telemetry metrics, not ${definition.id}`);
        }
        this.assertVisible(definition, caller);
        return { definition, scope: { role: caller.role, callerId: caller.id } };
      }

      case "faculty":
      case "admin": {
        this.assertVisible(definition, caller);
        if (definition.subject === "student" && studentId === undefined) {
          throw new ValidationError(`Metric ${definition.id} requires a studentId`);
        }
        return {
          definition,
          scope: { role: caller.role, callerId: caller.id, ownerId: studentId, department, cohort }
        };
      }
    }
  }

  private assertVisible(definition: MetricDefinition, caller: CallerIdentity): void {
    if (!definition.roles.includes(caller.role)) {
      throw new AuthorizationError("role_not_permitted", `Role ${caller.role} may not request ${definition.id}`);
    }
  }
}
