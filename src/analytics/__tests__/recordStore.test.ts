import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DataUnavailableError } from "../errors";
import { JsonlRecordStore } from "../jsonlRecordStore";
import { InMemoryRecordStore, withTimeout } from "../recordStore";
import { seedRecords } from "./fixtures";

describe("InMemoryRecordStore", () => {
  const store = new InMemoryRecordStore(seedRecords());

  it("filters by time range and owner", async () => {
    const range = { from: new Date("2024-06-10T10:30:00Z"), to: new Date("2024-06-12T23:59:59Z") };
    const grades = await store.fetch("grade", range, { ownerIds: ["s2"] });
    expect(grades.map((g) => g.id)).toEqual(["g3", "g4"]);
  });

  it("filters accounts by role and department", async () => {
    const accounts = await store.fetch("account", undefined, { role: "student", department: "cs" });
    expect(accounts.map((a) => a.id)).toEqual(["s1", "s3"]);
  });

  it("filters telemetry by service and route", async () => {
    const events = await store.fetch("telemetry", undefined, { service: "api", route: "/api/grades" });
    expect(events.map((e) => e.id)).toEqual(["t3", "t5"]);
  });
});

describe("withTimeout", () => {
  it("fails a slow pull with DataUnavailable", async () => {
    const never = new Promise<number>(() => undefined);
    const failure = withTimeout(never, 10, "grade records").catch((e: unknown) => e);

    const e = await failure;
    expect(e).toBeInstanceOf(DataUnavailableError);
    expect(e instanceof DataUnavailableError && e.toBody()).toEqual({
      kind: "data_unavailable",
      message: "Timed out fetching grade records after 10ms",
      retryAfterMs: 10
    });
  });

  it("maps a store failure to DataUnavailable", async () => {
    await expect(withTimeout(Promise.reject(new Error("disk gone")), 50, "account records")).rejects.toThrow(
      "Record store unavailable while fetching account records"
    );
  });

  it("passes the value through", async () => {
    expect(await withTimeout(Promise.resolve(3), 50, "x")).toBe(3);
  });
});

describe("JsonlRecordStore", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "analytics-records-"));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("loads valid lines, skips malformed ones and treats missing files as empty", async () => {
    const lines = [
      JSON.stringify({ id: "g1", accountId: "s1", caseStudyId: "cs-1", finalScore: 88, submittedAt: "2024-06-01T00:00:00Z" }),
      "{not json",
      JSON.stringify({ id: "g2", accountId: "s1", caseStudyId: "cs-1", finalScore: 140, submittedAt: "2024-06-01T00:00:00Z" }),
      "",
      JSON.stringify({ id: "g3", accountId: "s2", caseStudyId: "cs-2", finalScore: null, submittedAt: "2024-06-02T00:00:00Z", feedback: "ok" })
    ];
    await fs.writeFile(path.join(dataDir, "grades.jsonl"), lines.join("\n"), "utf8");

    const store = new JsonlRecordStore({ dataDir });
    const grades = await store.fetch("grade", undefined);

    expect(grades).toEqual([
      { id: "g1", accountId: "s1", caseStudyId: "cs-1", finalScore: 88, submittedAt: "2024-06-01T00:00:00Z", summary: null, feedback: null },
      { id: "g3", accountId: "s2", caseStudyId: "cs-2", finalScore: null, submittedAt: "2024-06-02T00:00:00Z", summary: null, feedback: "ok" }
    ]);
    expect(await store.fetch("account", undefined)).toEqual([]);
  });

  it("picks up new records on reload", async () => {
    const file = path.join(dataDir, "case_studies.jsonl");
    await fs.writeFile(file, `${JSON.stringify({ id: "cs-1", title: "Pricing" })}\n`, "utf8");

    const store = new JsonlRecordStore({ dataDir });
    expect(await store.fetch("caseStudy", undefined)).toHaveLength(1);

    await fs.appendFile(file, `${JSON.stringify({ id: "cs-2", title: "Logistics" })}\n`, "utf8");
    expect(await store.fetch("caseStudy", undefined)).toHaveLength(1);

    await store.reload();
    expect((await store.fetch("caseStudy", undefined)).map((c) => c.id)).toEqual(["cs-1", "cs-2"]);
  });
});
