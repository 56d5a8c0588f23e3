import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import { applyIdentityPragmas } from "./pragmas.js";
import * as schema from "./schema/index.js";

/** The schema type shared across all db instances. */
export type Schema = typeof schema;

/** Drizzle handle over better-sqlite3. Repositories accept this type. */
export type DrizzleDb = BetterSQLite3Database<Schema>;

/** Create a Drizzle database instance wrapping the given SQLite handle. */
export function createDb(sqlite: Database.Database): DrizzleDb {
  return drizzle(sqlite, { schema });
}

/** Create the identity tables if they do not exist yet. */
export function initIdentitySchema(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS instance_lifecycles (
      instance_pubkey TEXT PRIMARY KEY,
      state TEXT NOT NULL CHECK (state IN (
        'unregistered', 'operator_registered', 'owner_registered', 'workload_configured', 'workload_exposed'
      )),
      version INTEGER NOT NULL,
      operator_pubkey TEXT,
      operator_instance_signature TEXT,
      operator_identity_signature TEXT,
      operator_registered_at INTEGER,
      owner_token_hash TEXT,
      owner_token_consumed INTEGER NOT NULL DEFAULT 0,
      owner_token_consumed_at INTEGER,
      owner_pubkey TEXT,
      owner_instance_signature TEXT,
      owner_identity_signature TEXT,
      owner_registered_at INTEGER,
      workload_image TEXT,
      workload_persist_dirs TEXT,
      workload_port INTEGER CHECK (workload_port IS NULL OR workload_port BETWEEN 1 AND 65535),
      workload_exposed INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_instance_lifecycles_state ON instance_lifecycles (state);

    CREATE TABLE IF NOT EXISTS lifecycle_transitions (
      id TEXT PRIMARY KEY,
      instance_pubkey TEXT NOT NULL,
      from_state TEXT NOT NULL,
      to_state TEXT NOT NULL,
      operation TEXT NOT NULL,
      version INTEGER NOT NULL,
      created_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_lifecycle_transitions_instance ON lifecycle_transitions (instance_pubkey);
    CREATE INDEX IF NOT EXISTS idx_lifecycle_transitions_created ON lifecycle_transitions (created_at);
  `);
}

export interface IdentityDatabase {
  sqlite: Database.Database;
  db: DrizzleDb;
}

/**
 * Open (or create) the identity database at `databasePath`, apply pragmas and
 * ensure the schema exists. ":memory:" is accepted for tests.
 */
export function openIdentityDatabase(databasePath: string): IdentityDatabase {
  if (databasePath !== ":memory:") {
    mkdirSync(path.dirname(databasePath), { recursive: true });
  }
  const sqlite = new Database(databasePath);
  applyIdentityPragmas(sqlite);
  initIdentitySchema(sqlite);
  return { sqlite, db: createDb(sqlite) };
}

export { schema };
export { applyIdentityPragmas } from "./pragmas.js";
