// biome-ignore lint/style/useImportType: Database namespace needed for Database.Database type reference
import Database from "better-sqlite3";

/**
 * Apply the identity store pragmas to a SQLite database handle.
 *
 * - journal_mode = WAL: concurrent readers with a single writer
 * - synchronous = FULL: a committed transaction is fsynced before the call
 *   returns, so no acknowledged transition can be lost on power failure
 * - busy_timeout = 5000: wait up to 5 seconds for write locks instead of
 *   failing immediately with SQLITE_BUSY
 */
export function applyIdentityPragmas(sqlite: Database.Database): void {
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("synchronous = FULL");
  sqlite.pragma("busy_timeout = 5000");
}
