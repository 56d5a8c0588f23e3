/**
 * Operator tool: wipe lifecycle state so an instance can be registered again.
 *
 * Usage:
 *   DATABASE_PATH=/data/identity/identity.db npx tsx scripts/reset-state.ts [--instance <hex pubkey>]
 *
 * Without --instance every lifecycle record and transition is removed. The
 * instance key file is left alone, so the instance keeps its identity.
 * Stop the service first; a running service keeps serving what it has committed.
 */

import { parseArgs } from "node:util";
import { loadConfig } from "../src/config/index.js";
import { type DrizzleDb, openIdentityDatabase } from "../src/db/index.js";
import { DrizzleLifecycleRepository } from "../src/identity/drizzle-lifecycle-repository.js";
import { decodeHex, encodeHex, PUBLIC_KEY_LENGTH } from "../src/identity/signature.js";

export interface ResetOptions {
  /** Lower-case hex instance key; undefined resets every instance. */
  instancePubkey?: string;
}

export function parseResetArgs(argv: string[]): ResetOptions {
  const { values } = parseArgs({
    args: argv,
    options: { instance: { type: "string" } },
    strict: true,
  });
  if (values.instance === undefined) return {};
  const bytes = decodeHex(values.instance, PUBLIC_KEY_LENGTH);
  if (!bytes) {
    throw new Error(`--instance must be a ${PUBLIC_KEY_LENGTH}-byte hex public key`);
  }
  return { instancePubkey: encodeHex(bytes) };
}

/** Delete lifecycle state. Returns the number of lifecycle records removed. */
export function resetState(db: DrizzleDb, options: ResetOptions): number {
  return new DrizzleLifecycleRepository(db).reset(options.instancePubkey);
}

function main(): void {
  const options = parseResetArgs(process.argv.slice(2));
  const { databasePath } = loadConfig();

  console.log("Reset lifecycle state");
  console.log(`  DB:       ${databasePath}`);
  console.log(`  Instance: ${options.instancePubkey ?? "all"}`);

  const { sqlite, db } = openIdentityDatabase(databasePath);
  try {
    const removed = resetState(db, options);
    console.log(`Done: ${removed} lifecycle record(s) removed`);
  } finally {
    sqlite.close();
  }
}

// Run main() only when executed directly via `npx tsx`
const isDirectRun = process.argv[1]?.endsWith("reset-state.ts");
if (isDirectRun) {
  try {
    main();
  } catch (err) {
    console.error("Reset failed:", err);
    process.exit(1);
  }
}
