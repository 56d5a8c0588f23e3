import type Database from "better-sqlite3";
import { type IdentityDatabase, openIdentityDatabase } from "../db/index.js";

/** Fresh in-memory identity database with the schema applied. */
export function createTestDb(): IdentityDatabase {
  return openIdentityDatabase(":memory:");
}

export function truncateAllTables(sqlite: Database.Database): void {
  sqlite.exec("DELETE FROM lifecycle_transitions; DELETE FROM instance_lifecycles;");
}
