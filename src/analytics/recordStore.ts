import { DataUnavailableError } from "./errors";
import { isWithin } from "./timeWindow";
import type { Account, CaseStudy, GradeRecord, RecordType, RecordTypeMap, Role, TelemetryEvent, TimeRange } from "./types";

export interface RecordFilters {
  ownerIds?: readonly string[];
  role?: Role;
  department?: string;
  cohort?: string;
  caseStudyId?: string;
  service?: string;
  route?: string;
}

/**
 * Read-only access to the operational records. The engine never writes
 * through this interface.
 */
export interface RecordStore {
  fetch<K extends RecordType>(type: K, range: TimeRange | undefined, filters?: RecordFilters): Promise<RecordTypeMap[K][]>;
}

export type RecordCollections = { [K in RecordType]: RecordTypeMap[K][] };

type RecordMatchers = {
  [K in RecordType]: (record: RecordTypeMap[K], range: TimeRange | undefined, filters: RecordFilters) => boolean;
};

const matchesOwner = (id: string, filters: RecordFilters): boolean => !filters.ownerIds || filters.ownerIds.includes(id);

const matchers: RecordMatchers = {
  account: (a: Account, range, f) =>
    isWithin(a.registeredAt, range) &&
    matchesOwner(a.id, f) &&
    (f.role === undefined || a.role === f.role) &&
    (f.department === undefined || a.department === f.department) &&
    (f.cohort === undefined || a.cohort === f.cohort),
  grade: (g: GradeRecord, range, f) =>
    isWithin(g.submittedAt, range) &&
    matchesOwner(g.accountId, f) &&
    (f.caseStudyId === undefined || g.caseStudyId === f.caseStudyId),
  telemetry: (t: TelemetryEvent, range, f) =>
    isWithin(t.timestamp, range) &&
    (f.service === undefined || t.service === f.service) &&
    (f.route === undefined || t.route === f.route),
  caseStudy: (c: CaseStudy, _range, f) => f.caseStudyId === undefined || c.id === f.caseStudyId
};

export const emptyCollections = (): RecordCollections => ({ account: [], grade: [], telemetry: [], caseStudy: [] });

export class InMemoryRecordStore implements RecordStore {
  protected collections: RecordCollections;

  constructor(seed?: Partial<RecordCollections>) {
    this.collections = { ...emptyCollections(), ...seed };
  }

  async fetch<K extends RecordType>(type: K, range: TimeRange | undefined, filters: RecordFilters = {}): Promise<RecordTypeMap[K][]> {
    const match = matchers[type];
    return this.collections[type].filter((record) => match(record, range, filters));
  }
}

/**
 * Races a record pull against a deadline. Both a timeout and a store failure
 * become DataUnavailable; nothing partial is returned.
 */
export const withTimeout = async <T>(work: Promise<T>, timeoutMs: number, what: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new DataUnavailableError(`Timed out fetching ${what} after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, deadline]);
  } catch (e) {
    if (e instanceof DataUnavailableError) throw e;
    throw new DataUnavailableError(`Record store unavailable while fetching ${what}`, timeoutMs, e);
  } finally {
    clearTimeout(timer);
  }
};
