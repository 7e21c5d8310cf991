import type { Db } from "../db/connection.js";
import type { GroupOutcomeStatus, ImportSummary } from "../types/domain.js";
import { nowIso } from "../utils/time.js";

export type ImportLog = {
  id: number;
  fileName: string;
  projectId: number;
  suiteId: number | null;
  totalGroups: number;
  createdCount: number;
  updatedCount: number;
  failedCount: number;
  createdAt: string;
};

export type ImportLogRow = {
  id: number;
  firstRow: number;
  lastRow: number;
  status: GroupOutcomeStatus;
  caseId: number | null;
  title: string;
  errorKind: string | null;
  errorMessage: string | null;
};

type ImportLogDbRow = {
  id: number;
  file_name: string;
  project_id: number;
  suite_id: number | null;
  total_groups: number;
  created_count: number;
  updated_count: number;
  failed_count: number;
  created_at: string;
};

type ImportLogRowDbRow = {
  id: number;
  first_row: number;
  last_row: number;
  status: GroupOutcomeStatus;
  case_id: number | null;
  title: string;
  error_kind: string | null;
  error_message: string | null;
};

function toImportLog(row: ImportLogDbRow): ImportLog {
  return {
    id: row.id,
    fileName: row.file_name,
    projectId: row.project_id,
    suiteId: row.suite_id,
    totalGroups: row.total_groups,
    createdCount: row.created_count,
    updatedCount: row.updated_count,
    failedCount: row.failed_count,
    createdAt: row.created_at,
  };
}

/** Stores one import run with a row per case group; returns the log id. */
export function saveImportLog(
  db: Db,
  params: { fileName: string; projectId: number; suiteId?: number | null; summary: ImportSummary },
): number {
  const { summary } = params;

  const tx = db.transaction((): number => {
    const importLog = db
      .prepare(
        `INSERT INTO import_logs(file_name, project_id, suite_id, total_groups, created_count, updated_count, failed_count, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        params.fileName || "import.csv",
        params.projectId,
        params.suiteId ?? null,
        summary.outcomes.length,
        summary.created,
        summary.updated,
        summary.failed,
        nowIso(),
      );
    const importLogId = Number(importLog.lastInsertRowid);

    const logRowStmt = db.prepare(
      `INSERT INTO import_log_rows(import_log_id, first_row, last_row, status, case_id, title, error_kind, error_message)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    for (const outcome of summary.outcomes) {
      logRowStmt.run(
        importLogId,
        outcome.firstRow,
        outcome.lastRow,
        outcome.status,
        outcome.caseId,
        outcome.title,
        outcome.errorKind ?? null,
        outcome.error ?? null,
      );
    }
    return importLogId;
  });

  return tx();
}

export function listImportLogs(db: Db): ImportLog[] {
  const rows = db
    .prepare<[], ImportLogDbRow>(
      `SELECT id, file_name, project_id, suite_id, total_groups, created_count, updated_count, failed_count, created_at
       FROM import_logs
       ORDER BY id DESC`,
    )
    .all();

  return rows.map(toImportLog);
}

export function getImportLog(db: Db, importLogId: number): ImportLog | null {
  const row = db
    .prepare<[number], ImportLogDbRow>(
      `SELECT id, file_name, project_id, suite_id, total_groups, created_count, updated_count, failed_count, created_at
       FROM import_logs
       WHERE id = ?`,
    )
    .get(importLogId);
  return row ? toImportLog(row) : null;
}

export function listImportLogRows(db: Db, importLogId: number): ImportLogRow[] {
  const rows = db
    .prepare<[number], ImportLogRowDbRow>(
      `SELECT id, first_row, last_row, status, case_id, title, error_kind, error_message
       FROM import_log_rows
       WHERE import_log_id = ?
       ORDER BY first_row ASC`,
    )
    .all(importLogId);

  return rows.map((row) => ({
    id: row.id,
    firstRow: row.first_row,
    lastRow: row.last_row,
    status: row.status,
    caseId: row.case_id,
    title: row.title,
    errorKind: row.error_kind,
    errorMessage: row.error_message,
  }));
}

/** Returns false when no log has that id. */
export function deleteImportLog(db: Db, importLogId: number): boolean {
  return db.prepare(`DELETE FROM import_logs WHERE id = ?`).run(importLogId).changes > 0;
}

export function clearImportLogs(db: Db): number {
  return db.prepare(`DELETE FROM import_logs`).run().changes;
}
