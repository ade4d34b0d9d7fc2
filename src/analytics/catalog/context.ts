import { ValidationError } from "../errors";
import { withTimeout, type RecordFilters, type RecordStore } from "../recordStore";
import { windowToRange } from "../timeWindow";
import type {
  Account,
  CanonicalWindow,
  CaseStudy,
  EffectiveScope,
  GradeRecord,
  RecordType,
  RecordTypeMap,
  Role,
  TelemetryEvent,
  TimeRange
} from "../types";
import type { CatalogSettings, MetricContext, MetricDefinition } from "./builder";
import type { TunableValues } from "./params";

export class RecordContext implements MetricContext {
  readonly range: TimeRange | undefined;

  constructor(
    private readonly definition: MetricDefinition,
    private readonly store: RecordStore,
    readonly settings: CatalogSettings,
    readonly window: CanonicalWindow,
    readonly params: TunableValues,
    readonly scope: EffectiveScope,
    readonly now: Date
  ) {
    this.range = windowToRange(window, now);
  }

  async accounts(opts?: { windowed?: boolean; role?: Role }): Promise<Account[]> {
    this.assertDeclared("account");
    return this.pull("account", opts?.windowed ? this.range : undefined, {
      ownerIds: this.scope.ownerId === undefined ? undefined : [this.scope.ownerId],
      role: opts?.role,
      department: this.scope.department,
      cohort: this.scope.cohort
    });
  }

  async grades(opts?: { windowed?: boolean }): Promise<GradeRecord[]> {
    this.assertDeclared("grade");
    const ownerIds = await this.ownerIds();
    return this.pull("grade", opts?.windowed === false ? undefined : this.range, {
      ownerIds,
      caseStudyId: this.params.caseStudyId
    });
  }

  async telemetry(): Promise<TelemetryEvent[]> {
    this.assertDeclared("telemetry");
    return this.pull("telemetry", this.range, { service: this.params.service, route: this.params.route });
  }

  async caseStudies(): Promise<CaseStudy[]> {
    this.assertDeclared("caseStudy");
    return this.pull("caseStudy", undefined, {});
  }

  subjectId(): string {
    if (this.scope.ownerId === undefined) {
      throw new ValidationError(`Metric ${this.definition.id} needs a studentId`);
    }
    return this.scope.ownerId;
  }

  /** Owner restriction for grade pulls: the scoped owner, or the students of a department/cohort. */
  private async ownerIds(): Promise<string[] | undefined> {
    if (this.scope.ownerId !== undefined) return [this.scope.ownerId];
    if (this.scope.department === undefined && this.scope.cohort === undefined) return undefined;

    const members = await this.pull("account", undefined, {
      role: "student",
      department: this.scope.department,
      cohort: this.scope.cohort
    });
    return members.map((a) => a.id);
  }

  private pull<K extends RecordType>(type: K, range: TimeRange | undefined, filters: RecordFilters): Promise<RecordTypeMap[K][]> {
    const work = Promise.resolve().then(() => this.store.fetch(type, range, filters));
    return withTimeout(work, this.settings.recordFetchTimeoutMs, `${type} records`);
  }

  private assertDeclared(type: RecordType): void {
    if (!this.definition.records.includes(type)) {
      throw new Error(`Metric ${this.definition.id} does not declare ${type} records`);
    }
  }
}
