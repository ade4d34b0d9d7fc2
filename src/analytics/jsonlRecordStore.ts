import fs from "fs/promises";
import path from "path";
import { z } from "zod";

import { logger } from "../utils/logger";
import { InMemoryRecordStore, type RecordCollections, type RecordFilters } from "./recordStore";
import { ROLES, type RecordType, type RecordTypeMap, type TimeRange } from "./types";

const timestamp = z.string().refine((s) => !Number.isNaN(new Date(s).getTime()), "invalid timestamp");

const accountSchema = z.object({
  id: z.string().min(1),
  role: z.enum(ROLES),
  name: z.string(),
  department: z.string().nullable(),
  cohort: z.string().nullable(),
  registeredAt: timestamp
});

const gradeSchema = z.object({
  id: z.string().min(1),
  accountId: z.string().min(1),
  caseStudyId: z.string().min(1),
  finalScore: z.number().min(0).max(100).nullable(),
  submittedAt: timestamp,
  summary: z.string().nullable().default(null),
  feedback: z.string().nullable().default(null)
});

const telemetrySchema = z.object({
  id: z.string().min(1),
  timestamp,
  service: z.string(),
  route: z.string(),
  statusCode: z.number().int(),
  latencyMs: z.number().nonnegative().nullable(),
  isError: z.boolean(),
  aiModel: z.string().nullable().default(null),
  aiTokens: z.number().int().nonnegative().nullable().default(null)
});

const caseStudySchema = z.object({
  id: z.string().min(1),
  title: z.string()
});

type RecordSchemas = { [K in RecordType]: z.ZodType<RecordTypeMap[K], z.ZodTypeDef, unknown> };

const schemas: RecordSchemas = {
  account: accountSchema,
  grade: gradeSchema,
  telemetry: telemetrySchema,
  caseStudy: caseStudySchema
};

const FILES: Record<RecordType, string> = {
  account: "accounts.jsonl",
  grade: "grades.jsonl",
  telemetry: "telemetry.jsonl",
  caseStudy: "case_studies.jsonl"
};

/**
 * Record store backed by one JSON-lines file per record type, loaded into
 * memory on first use. Lines that fail validation are skipped with a warning.
 * A missing file is an empty collection.
 */
export class JsonlRecordStore extends InMemoryRecordStore {
  private readonly dataDir: string;
  private loaded: Promise<void> | null = null;

  constructor(opts: { dataDir: string }) {
    super();
    this.dataDir = opts.dataDir;
  }

  override async fetch<K extends RecordType>(
    type: K,
    range: TimeRange | undefined,
    filters?: RecordFilters
  ): Promise<RecordTypeMap[K][]> {
    await this.ensureLoaded();
    return super.fetch(type, range, filters);
  }

  /** Re-reads every file; callers should invalidate cached metrics afterwards. */
  async reload(): Promise<void> {
    this.loaded = null;
    await this.ensureLoaded();
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loaded) {
      this.loaded = this.load().catch((err: unknown) => {
        this.loaded = null;
        throw err;
      });
    }
    return this.loaded;
  }

  private async load(): Promise<void> {
    const next: RecordCollections = {
      account: await this.loadFile("account"),
      grade: await this.loadFile("grade"),
      telemetry: await this.loadFile("telemetry"),
      caseStudy: await this.loadFile("caseStudy")
    };
    this.collections = next;
  }

  private async loadFile<K extends RecordType>(type: K): Promise<RecordTypeMap[K][]> {
    const file = path.join(this.dataDir, FILES[type]);

    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (err: unknown) {
      const code = err instanceof Error && "code" in err ? err.code : undefined;
      if (code === "ENOENT") {
        logger.debug({ file }, "record_file_missing");
        return [];
      }
      throw err;
    }

    const schema = schemas[type];
    const rows: RecordTypeMap[K][] = [];
    const lines = raw.split("\n");

    lines.forEach((line, index) => {
      if (!line.trim()) return;

      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        logger.warn({ file, line: index + 1 }, "record_line_skipped");
        return;
      }

      const parsed = schema.safeParse(json);
      if (!parsed.success) {
        logger.warn({ file, line: index + 1, issues: parsed.error.issues.length }, "record_line_skipped");
        return;
      }
      rows.push(parsed.data);
    });

    logger.info({ type, count: rows.length }, "records_loaded");
    return rows;
  }
}
