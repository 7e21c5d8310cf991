import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openDatabase, type Db } from "../db/connection.js";
import { loadMigrations, runMigrations } from "../db/migrate.js";
import type { ImportSummary } from "../types/domain.js";
import {
  clearImportLogs,
  deleteImportLog,
  getImportLog,
  listImportLogRows,
  listImportLogs,
  saveImportLog,
} from "./importLogService.js";

const summary: ImportSummary = {
  suiteId: null,
  created: 1,
  updated: 0,
  failed: 1,
  outcomes: [
    { status: "created", firstRow: 2, lastRow: 3, caseId: 1000, title: "Checkout happy path" },
    {
      status: "failed",
      firstRow: 4,
      lastRow: 4,
      caseId: null,
      title: "Refund",
      errorKind: "SectionNotFoundError",
      error: "Section not found: Refunds in path Checkout/Refunds",
    },
  ],
};

describe("import history", () => {
  let db: Db;

  beforeEach(() => {
    db = openDatabase(":memory:");
    runMigrations(db);
  });

  afterEach(() => {
    db.close();
  });

  it("applies each migration once", () => {
    expect(runMigrations(db)).toEqual([]);
    expect(loadMigrations().map((migration) => migration.name)).toEqual(["001_import_logs.sql"]);
  });

  it("applies only the migrations not yet recorded", () => {
    const extra = { name: "002_notes.sql", sql: "CREATE TABLE notes (id INTEGER PRIMARY KEY);" };

    expect(runMigrations(db, undefined, [...loadMigrations(), extra])).toEqual(["002_notes.sql"]);
    expect(db.prepare<[], { name: string }>("SELECT name FROM schema_migrations ORDER BY name").all()).toEqual([
      { name: "001_import_logs.sql" },
      { name: "002_notes.sql" },
    ]);
  });

  it("stores a run with one row per group", () => {
    const logId = saveImportLog(db, { fileName: "cases.csv", projectId: 3, suiteId: 9, summary });

    expect(getImportLog(db, logId)).toMatchObject({
      id: logId,
      fileName: "cases.csv",
      projectId: 3,
      suiteId: 9,
      totalGroups: 2,
      createdCount: 1,
      updatedCount: 0,
      failedCount: 1,
    });
    expect(listImportLogRows(db, logId)).toEqual([
      {
        id: expect.any(Number),
        firstRow: 2,
        lastRow: 3,
        status: "created",
        caseId: 1000,
        title: "Checkout happy path",
        errorKind: null,
        errorMessage: null,
      },
      {
        id: expect.any(Number),
        firstRow: 4,
        lastRow: 4,
        status: "failed",
        caseId: null,
        title: "Refund",
        errorKind: "SectionNotFoundError",
        errorMessage: "Section not found: Refunds in path Checkout/Refunds",
      },
    ]);
  });

  it("lists newest first and deletes rows with their log", () => {
    const first = saveImportLog(db, { fileName: "a.csv", projectId: 1, summary });
    const second = saveImportLog(db, { fileName: "b.csv", projectId: 1, summary });

    expect(listImportLogs(db).map((log) => log.fileName)).toEqual(["b.csv", "a.csv"]);

    expect(deleteImportLog(db, first)).toBe(true);
    expect(deleteImportLog(db, first)).toBe(false);
    expect(listImportLogRows(db, first)).toEqual([]);
    expect(getImportLog(db, second)?.suiteId).toBeNull();
  });

  it("clears every log", () => {
    saveImportLog(db, { fileName: "a.csv", projectId: 1, summary });
    saveImportLog(db, { fileName: "b.csv", projectId: 1, summary });

    expect(clearImportLogs(db)).toBe(2);
    expect(listImportLogs(db)).toEqual([]);
  });
});
