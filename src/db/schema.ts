import type Database from "better-sqlite3";
import type { AuditLog } from "../types/index.ts";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS audit_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT NOT NULL DEFAULT (datetime('now')),
  action TEXT NOT NULL,
  resource TEXT NOT NULL,
  resource_id TEXT,
  details TEXT,
  ip_address TEXT NOT NULL DEFAULT '',
  success INTEGER NOT NULL DEFAULT 1
);

-- Indexes
CREATE INDEX IF NOT EXISTS idx_audit_log_timestamp ON audit_log(timestamp);
CREATE INDEX IF NOT EXISTS idx_audit_log_action ON audit_log(action);
`;

export function initSchema(db: Database.Database): void {
  db.pragma("journal_mode = WAL");
  db.exec(SCHEMA_SQL);
}

export type AuditEntry = Omit<AuditLog, "id" | "timestamp">;

export function insertAuditLog(db: Database.Database, entry: AuditEntry): void {
  db.prepare(
    `INSERT INTO audit_log (action, resource, resource_id, details, ip_address, success)
     VALUES (@action, @resource, @resource_id, @details, @ip_address, @success)`,
  ).run(entry);
}

export function recentAuditLogs(db: Database.Database, limit: number): AuditLog[] {
  return db
    .prepare<[number], AuditLog>("SELECT * FROM audit_log ORDER BY id DESC LIMIT ?")
    .all(limit);
}
