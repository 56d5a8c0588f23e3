import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openIdentityDatabase } from "./index.js";

describe("openIdentityDatabase", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "identity-db-test-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("creates missing parent directories and both tables", () => {
    const { sqlite } = openIdentityDatabase(join(tmpDir, "nested", "dir", "identity.db"));
    const tables = sqlite.prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name").pluck().all();
    sqlite.close();
    expect(tables).toEqual(["instance_lifecycles", "lifecycle_transitions"]);
  });

  it("is idempotent across reopen", () => {
    const dbPath = join(tmpDir, "identity.db");
    openIdentityDatabase(dbPath).sqlite.close();
    const { sqlite } = openIdentityDatabase(dbPath);
    const count = sqlite.prepare("SELECT COUNT(*) FROM instance_lifecycles").pluck().get();
    sqlite.close();
    expect(count).toBe(0);
  });

  it("rejects an unknown state at the storage layer", () => {
    const { sqlite } = openIdentityDatabase(":memory:");
    expect(() =>
      sqlite
        .prepare(
          "INSERT INTO instance_lifecycles (instance_pubkey, state, version, created_at, updated_at) VALUES (?, ?, 1, 0, 0)",
        )
        .run("aa", "finalized"),
    ).toThrow(/CHECK constraint failed/);
    sqlite.close();
  });
});
