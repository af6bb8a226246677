import Database from "better-sqlite3";
import { initSchema } from "./schema.ts";

let db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDb() first.");
  }
  return db;
}

export function initDb(dbPath: string): Database.Database {
  db = new Database(dbPath);
  initSchema(db);
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/** For testing: inject a pre-configured Database instance */
export function setDb(instance: Database.Database): void {
  db = instance;
}
