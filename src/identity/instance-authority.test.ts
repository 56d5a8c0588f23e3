import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import type Database from "better-sqlite3";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../observability/sentry.js", () => ({
  captureError: vi.fn(),
}));

import { type DrizzleDb, openIdentityDatabase } from "../db/index.js";
import { captureError } from "../observability/sentry.js";
import { createTestDb, truncateAllTables } from "../test/db.js";
import { signPayload, signRegistration, type TestKeypair, testKeypair } from "../test/identity-fixtures.js";
import { DrizzleLifecycleRepository } from "./drizzle-lifecycle-repository.js";
import { ConflictError, StorageError, UnauthorizedError, ValidationError } from "./errors.js";
import { InstanceAuthority } from "./instance-authority.js";
import { InstanceKey } from "./instance-key.js";
import { KeyedSerializer } from "./keyed-serializer.js";
import type { ILifecycleRepository } from "./lifecycle-repository.js";
import { decodeHex, encodeHex, verifySignature } from "./signature.js";
import type { LifecycleRecord, LifecycleTransition, TransitionIntent, WorkloadConfig } from "./types.js";
import { RecordingWorkloadRuntime, type WorkloadRuntime } from "./workload-runtime.js";

const instanceKey = new InstanceKey(new Uint8Array(32).fill(1));
const operatorKey = testKeypair(2);
const ownerKey = testKeypair(3);
const strangerKey = testKeypair(4);
const NOW = 1_750_000_000;

function configBody(overrides: Record<string, unknown> = {}) {
  return {
    instance_pubkey: instanceKey.publicKeyHex,
    image: "nginx:1.27",
    persist_dirs: ["/etc/nginx/conf.d", "/var/www"],
    port: 8080,
    ...overrides,
  };
}

function exposeBody(overrides: Record<string, unknown> = {}) {
  return { instance_pubkey: instanceKey.publicKeyHex, image: "nginx:1.27", ...overrides };
}

function registration(signer: TestKeypair) {
  return { pubkey: signer.hex, signature: signRegistration(signer, instanceKey.publicKey) };
}

/** Delegates to a real repository; lets a test act between read and swap. */
class InterceptingRepository implements ILifecycleRepository {
  swapCalls = 0;
  beforeSwap: ((call: number) => boolean | undefined) | null = null;

  constructor(private readonly inner: ILifecycleRepository) {}

  get(instancePubkey: string): LifecycleRecord {
    return this.inner.get(instancePubkey);
  }

  compareAndSwap(instancePubkey: string, expected: number, next: LifecycleRecord, intent: TransitionIntent): boolean {
    this.swapCalls++;
    const override = this.beforeSwap?.(this.swapCalls);
    if (override !== undefined) return override;
    return this.inner.compareAndSwap(instancePubkey, expected, next, intent);
  }

  listTransitions(instancePubkey: string, limit?: number): LifecycleTransition[] {
    return this.inner.listTransitions(instancePubkey, limit);
  }

  reset(instancePubkey?: string): number {
    return this.inner.reset(instancePubkey);
  }
}

describe("InstanceAuthority", () => {
  let sqlite: Database.Database;
  let db: DrizzleDb;
  let repository: InterceptingRepository;
  let runtime: RecordingWorkloadRuntime;
  let authority: InstanceAuthority;

  function buildAuthority(overrides: { runtime?: WorkloadRuntime; storageRetryAttempts?: number } = {}) {
    return new InstanceAuthority({
      instance: instanceKey,
      repository,
      serializer: new KeyedSerializer(),
      runtime: overrides.runtime ?? runtime,
      allowedRoot: "/",
      storageRetryAttempts: overrides.storageRetryAttempts ?? 3,
      now: () => NOW,
    });
  }

  async function registerBoth(): Promise<void> {
    const { ownerToken } = await authority.registerOperator(registration(operatorKey));
    await authority.registerOwner({ ...registration(ownerKey), token: ownerToken });
  }

  async function configure(body = configBody()): Promise<WorkloadConfig> {
    return authority.configureWorkload({ body, signature: signPayload(ownerKey, body) });
  }

  beforeAll(() => {
    ({ sqlite, db } = createTestDb());
  });

  afterAll(() => {
    sqlite.close();
  });

  beforeEach(() => {
    vi.clearAllMocks();
    truncateAllTables(sqlite);
    repository = new InterceptingRepository(new DrizzleLifecycleRepository(db));
    runtime = new RecordingWorkloadRuntime({ hostRoot: "/data/persist", publishedPort: 8080 });
    authority = buildAuthority();
  });

  it("starts unregistered under the instance key", () => {
    expect(authority.instancePubkey).toBe(instanceKey.publicKeyHex);
    expect(authority.getRecord()).toMatchObject({ state: "unregistered", version: 0 });
  });

  describe("registerOperator", () => {
    it("binds the operator and returns a 64-char hex owner token", async () => {
      const { ownerToken } = await authority.registerOperator(registration(operatorKey));

      expect(ownerToken).toMatch(/^[0-9a-f]{64}$/);
      const record = authority.getRecord();
      if (record.state !== "operator_registered") throw new Error(`unexpected state ${record.state}`);
      expect(record.operator.pubkey).toBe(operatorKey.hex);
      expect(record.operator.registeredAt).toBe(NOW);
      expect(record.ownerToken.consumed).toBe(false);
      expect(record.ownerToken.hash).not.toBe(ownerToken);
    });

    it("countersigns the operator key with the instance key", async () => {
      await authority.registerOperator(registration(operatorKey));
      const record = authority.getRecord();
      if (record.state !== "operator_registered") throw new Error(`unexpected state ${record.state}`);

      const countersignature = decodeHex(record.operator.identitySignature, 64);
      expect(countersignature).not.toBeNull();
      if (!countersignature) return;
      expect(verifySignature(instanceKey.publicKey, operatorKey.publicKey, countersignature)).toBe(true);
    });

    it("stores the key lowercase when the request used upper-case hex", async () => {
      await authority.registerOperator({
        pubkey: operatorKey.hex.toUpperCase(),
        signature: signRegistration(operatorKey, instanceKey.publicKey).toUpperCase(),
      });
      const record = authority.getRecord();
      expect(record.state === "operator_registered" && record.operator.pubkey).toBe(operatorKey.hex);
    });

    it("rejects a signature made by another key", async () => {
      const forged = { pubkey: operatorKey.hex, signature: signRegistration(strangerKey, instanceKey.publicKey) };
      await expect(authority.registerOperator(forged)).rejects.toThrow(
        new UnauthorizedError("Invalid operator signature"),
      );
      expect(authority.getRecord().state).toBe("unregistered");
    });

    it("rejects a signature over the wrong message", async () => {
      const wrong = { pubkey: operatorKey.hex, signature: signRegistration(operatorKey, strangerKey.publicKey) };
      await expect(authority.registerOperator(wrong)).rejects.toBeInstanceOf(UnauthorizedError);
    });

    it.each([
      ["short key", { pubkey: "ab", signature: "cd".repeat(64) }],
      ["non-hex signature", { pubkey: operatorKey.hex, signature: "zz".repeat(64) }],
      ["missing fields", { pubkey: undefined, signature: undefined }],
    ])("treats a malformed request (%s) as an invalid signature", async (_label, request) => {
      await expect(authority.registerOperator(request)).rejects.toThrow("Invalid operator signature");
    });

    it("refuses a second operator with a conflict", async () => {
      await authority.registerOperator(registration(operatorKey));
      await expect(authority.registerOperator(registration(strangerKey))).rejects.toThrow(
        new ConflictError("Operator already registered"),
      );
    });

    it("lets exactly one of several concurrent registrations win", async () => {
      const signers = [2, 4, 5, 6, 7].map(testKeypair);
      const results = await Promise.allSettled(signers.map((s) => authority.registerOperator(registration(s))));

      const fulfilled = results.filter((r) => r.status === "fulfilled");
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(4);
      for (const r of rejected) {
        expect(r.reason).toBeInstanceOf(ConflictError);
      }
      expect(authority.listTransitions()).toHaveLength(1);
    });
  });

  describe("registerOwner", () => {
    let ownerToken: string;

    beforeEach(async () => {
      ({ ownerToken } = await authority.registerOperator(registration(operatorKey)));
    });

    it("binds the owner and consumes the token", async () => {
      await authority.registerOwner({ ...registration(ownerKey), token: ownerToken });

      const record = authority.getRecord();
      if (record.state !== "owner_registered") throw new Error(`unexpected state ${record.state}`);
      expect(record.owner.pubkey).toBe(ownerKey.hex);
      expect(record.ownerToken).toMatchObject({ consumed: true, consumedAt: NOW });
      const countersignature = decodeHex(record.owner.identitySignature, 64);
      expect(countersignature && verifySignature(instanceKey.publicKey, ownerKey.publicKey, countersignature)).toBe(
        true,
      );
    });

    it("requires an operator first", async () => {
      truncateAllTables(sqlite);
      await expect(authority.registerOwner({ ...registration(ownerKey), token: ownerToken })).rejects.toThrow(
        new UnauthorizedError("Operator not registered"),
      );
    });

    it("rejects a missing token", async () => {
      await expect(authority.registerOwner({ ...registration(ownerKey), token: undefined })).rejects.toThrow(
        new UnauthorizedError("Missing token header"),
      );
    });

    it("rejects a wrong token", async () => {
      await expect(authority.registerOwner({ ...registration(ownerKey), token: "00".repeat(32) })).rejects.toThrow(
        new UnauthorizedError("Invalid owner token"),
      );
      expect(authority.getRecord().state).toBe("operator_registered");
    });

    it("rejects reuse of a consumed token", async () => {
      await authority.registerOwner({ ...registration(ownerKey), token: ownerToken });
      await expect(authority.registerOwner({ ...registration(strangerKey), token: ownerToken })).rejects.toThrow(
        new UnauthorizedError("Owner token already consumed"),
      );
      const record = authority.getRecord();
      expect(record.state === "owner_registered" && record.owner.pubkey).toBe(ownerKey.hex);
    });

    it("rejects an invalid owner signature without spending the token", async () => {
      const forged = { pubkey: ownerKey.hex, signature: signRegistration(strangerKey, instanceKey.publicKey) };
      await expect(authority.registerOwner({ ...forged, token: ownerToken })).rejects.toThrow(
        new UnauthorizedError("Invalid owner signature"),
      );
      await authority.registerOwner({ ...registration(ownerKey), token: ownerToken });
      expect(authority.getRecord().state).toBe("owner_registered");
    });

    it("lets exactly one concurrent owner registration with the same token win", async () => {
      const results = await Promise.allSettled(
        [3, 4, 5].map((seed) => authority.registerOwner({ ...registration(testKeypair(seed)), token: ownerToken })),
      );
      expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
      const reasons = results.flatMap((r) => (r.status === "rejected" ? [r.reason] : []));
      expect(reasons).toEqual([
        new UnauthorizedError("Owner token already consumed"),
        new UnauthorizedError("Owner token already consumed"),
      ]);
    });
  });

  describe("configureWorkload", () => {
    it("requires a registered owner", async () => {
      await authority.registerOperator(registration(operatorKey));
      await expect(configure()).rejects.toThrow(new UnauthorizedError("Owner not registered"));
    });

    it("stores the validated workload and hands it to the runtime", async () => {
      await registerBoth();
      const workload = await configure();
      await authority.whenRuntimeIdle();

      expect(workload).toEqual({
        instancePubkey: instanceKey.publicKeyHex,
        image: "nginx:1.27",
        persistDirs: ["/etc/nginx/conf.d", "/var/www"],
        port: 8080,
      });
      const record = authority.getRecord();
      expect(record.state).toBe("workload_configured");
      expect(runtime.desired).toMatchObject({ image: "nginx:1.27", publishedPort: null });
    });

    it("rejects a missing signature", async () => {
      await registerBoth();
      await expect(authority.configureWorkload({ body: configBody(), signature: undefined })).rejects.toThrow(
        new UnauthorizedError("Missing signature header"),
      );
    });

    it("rejects a malformed signature", async () => {
      await registerBoth();
      await expect(authority.configureWorkload({ body: configBody(), signature: "not-hex" })).rejects.toThrow(
        new UnauthorizedError("Invalid signature format"),
      );
    });

    it("rejects a signature by anyone but the owner", async () => {
      await registerBoth();
      const body = configBody();
      await expect(authority.configureWorkload({ body, signature: signPayload(operatorKey, body) })).rejects.toThrow(
        new UnauthorizedError("Invalid signature"),
      );
    });

    it("rejects a body altered after signing", async () => {
      await registerBoth();
      const signature = signPayload(ownerKey, configBody());
      await expect(authority.configureWorkload({ body: configBody({ port: 9090 }), signature })).rejects.toThrow(
        "Invalid signature",
      );
    });

    it("accepts the same payload regardless of member order", async () => {
      await registerBoth();
      const body = configBody();
      const reordered = { port: body.port, persist_dirs: body.persist_dirs, image: body.image, instance_pubkey: body.instance_pubkey };
      await expect(authority.configureWorkload({ body: reordered, signature: signPayload(ownerKey, body) })).resolves.toMatchObject({
        port: 8080,
      });
    });

    it.each([
      [{ port: -1 }, "port must be an integer between 1 and 65535"],
      [{ port: 70000 }, "port must be an integer between 1 and 65535"],
      [{ port: undefined }, "port is required"],
      [{ persist_dirs: ["/etc/nginx/conf.d/../../../etc/shadow"] }, "Invalid directory path"],
      [{ persist_dirs: ["relative/dir"] }, "Invalid directory path"],
      [{ persist_dirs: [""] }, "Invalid directory path"],
      [{ instance_pubkey: "cd".repeat(32) }, "instance_pubkey does not match this instance"],
    ])("rejects invalid content %j", async (overrides, message) => {
      await registerBoth();
      const error = await configure(configBody(overrides)).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty("message", message);
      expect(authority.getRecord().state).toBe("owner_registered");
    });

    it("allows reconfiguring before exposure", async () => {
      await registerBoth();
      await configure();
      await configure(configBody({ image: "nginx:1.28", port: 9090 }));

      const record = authority.getRecord();
      expect(record.state === "workload_configured" && record.workload).toMatchObject({ image: "nginx:1.28", port: 9090 });
      expect(authority.listTransitions().map((t) => t.toState)).toEqual([
        "workload_configured",
        "workload_configured",
        "owner_registered",
        "operator_registered",
      ]);
    });

    it("rejects reconfiguration once exposed", async () => {
      await registerBoth();
      await configure();
      const body = exposeBody();
      await authority.exposeWorkload({ body, signature: signPayload(ownerKey, body) });

      await expect(configure(configBody({ image: "nginx:1.28" }))).rejects.toThrow(
        new ConflictError("Workload already exposed"),
      );
    });

    it("keeps the committed workload when the runtime fails", async () => {
      const failing: WorkloadRuntime = { apply: vi.fn().mockRejectedValue(new Error("engine down")) };
      authority = buildAuthority({ runtime: failing });
      await registerBoth();

      await configure();
      await authority.whenRuntimeIdle();

      expect(authority.getRecord().state).toBe("workload_configured");
      expect(captureError).toHaveBeenCalledWith(expect.any(Error), {
        instancePubkey: instanceKey.publicKeyHex,
        extra: { exposed: false },
      });
    });
  });

  describe("exposeWorkload", () => {
    async function expose(body: Record<string, unknown> = exposeBody()) {
      return authority.exposeWorkload({ body, signature: signPayload(ownerKey, body) });
    }

    it("answers not configured before any registration", async () => {
      await expect(expose()).rejects.toThrow(new ValidationError("Workload not configured"));
    });

    it("answers not configured when only an operator is registered", async () => {
      await authority.registerOperator(registration(operatorKey));
      await expect(expose()).rejects.toThrow(new ValidationError("Workload not configured"));
      expect(authority.getRecord().state).toBe("operator_registered");
    });

    it("requires a configured workload", async () => {
      await registerBoth();
      await expect(expose()).rejects.toThrow(new ValidationError("Workload not configured"));
    });

    it("rejects an invalid signature", async () => {
      await registerBoth();
      await configure();
      const body = exposeBody();
      await expect(authority.exposeWorkload({ body, signature: signPayload(strangerKey, body) })).rejects.toThrow(
        new UnauthorizedError("Invalid signature"),
      );
    });

    it("publishes the configured workload", async () => {
      await registerBoth();
      await configure();
      await expose();
      await authority.whenRuntimeIdle();

      expect(authority.getRecord().state).toBe("workload_exposed");
      expect(runtime.desired?.publishedPort).toBe(8080);
    });

    it("rejects an image other than the configured one", async () => {
      await registerBoth();
      await configure();
      await expect(expose(exposeBody({ image: "nginx:latest" }))).rejects.toThrow(
        "image does not match the configured workload",
      );
    });

    it("is idempotent once exposed", async () => {
      await registerBoth();
      await configure();
      await expose();
      const version = authority.getRecord().version;

      await expect(expose()).resolves.toMatchObject({ image: "nginx:1.27" });
      expect(authority.getRecord().version).toBe(version);
    });
  });

  describe("compare-and-swap retries", () => {
    it("re-reads after a lost swap and reports the winner's state", async () => {
      repository.beforeSwap = (call) => {
        if (call !== 1) return undefined;
        // Another writer commits between our read and our swap.
        repository.beforeSwap = null;
        new DrizzleLifecycleRepository(db).compareAndSwap(
          instanceKey.publicKeyHex,
          0,
          {
            instancePubkey: instanceKey.publicKeyHex,
            state: "operator_registered",
            version: 0,
            createdAt: null,
            updatedAt: null,
            operator: {
              pubkey: strangerKey.hex,
              instanceSignature: signRegistration(strangerKey, instanceKey.publicKey),
              identitySignature: encodeHex(instanceKey.sign(strangerKey.publicKey)),
              registeredAt: NOW,
            },
            ownerToken: { hash: "ab".repeat(32), consumed: false, consumedAt: null },
          },
          { fromState: "unregistered", operation: "register_operator" },
        );
        return undefined;
      };

      await expect(authority.registerOperator(registration(operatorKey))).rejects.toThrow(
        new ConflictError("Operator already registered"),
      );
      const record = authority.getRecord();
      expect(record.state === "operator_registered" && record.operator.pubkey).toBe(strangerKey.hex);
    });

    it("retries a lost swap and then succeeds", async () => {
      repository.beforeSwap = (call) => (call === 1 ? false : undefined);
      await authority.registerOperator(registration(operatorKey));
      expect(repository.swapCalls).toBe(2);
      expect(authority.getRecord().state).toBe("operator_registered");
    });

    it("retries a transient storage error", async () => {
      repository.beforeSwap = (call) => {
        if (call === 1) throw new StorageError("database is locked");
        return undefined;
      };
      await authority.registerOperator(registration(operatorKey));
      expect(authority.getRecord().state).toBe("operator_registered");
    });

    it("gives up with Storage unavailable after the configured attempts", async () => {
      authority = buildAuthority({ storageRetryAttempts: 2 });
      repository.beforeSwap = () => {
        throw new StorageError("disk I/O error");
      };

      const error = await authority.registerOperator(registration(operatorKey)).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(StorageError);
      expect(error).toHaveProperty("message", "Storage unavailable");
      expect(repository.swapCalls).toBe(2);
    });
  });

  describe("reconcile", () => {
    it("does nothing before a workload is configured", async () => {
      await authority.reconcile();
      expect(runtime.desired).toBeNull();
    });

    it("replays the stored workload", async () => {
      await registerBoth();
      await configure();
      const fresh = new RecordingWorkloadRuntime({ hostRoot: "/data/persist", publishedPort: 8080 });

      await buildAuthority({ runtime: fresh }).reconcile();

      expect(fresh.desired).toMatchObject({ image: "nginx:1.27", containerPort: 8080, publishedPort: null });
    });
  });
});

describe("InstanceAuthority across restarts", () => {
  it("reproduces bindings and workload after reopening the database", async () => {
    const dir = mkdtempSync(path.join(tmpdir(), "authority-restart-"));
    const file = path.join(dir, "identity.db");
    const runtime = new RecordingWorkloadRuntime({ hostRoot: "/data/persist", publishedPort: 8080 });
    const open = () => {
      const handle = openIdentityDatabase(file);
      const authority = new InstanceAuthority({
        instance: instanceKey,
        repository: new DrizzleLifecycleRepository(handle.db),
        serializer: new KeyedSerializer(),
        runtime,
        allowedRoot: "/",
        storageRetryAttempts: 3,
      });
      return { handle, authority };
    };

    try {
      const first = open();
      const { ownerToken } = await first.authority.registerOperator(registration(operatorKey));
      await first.authority.registerOwner({ ...registration(ownerKey), token: ownerToken });
      const body = configBody();
      await first.authority.configureWorkload({ body, signature: signPayload(ownerKey, body) });
      const expose = exposeBody();
      await first.authority.exposeWorkload({ body: expose, signature: signPayload(ownerKey, expose) });
      await first.authority.whenRuntimeIdle();
      const before = first.authority.getRecord();
      first.handle.sqlite.close();

      const second = open();
      const after = second.authority.getRecord();
      await expect(
        second.authority.registerOwner({ ...registration(strangerKey), token: ownerToken }),
      ).rejects.toThrow("Owner token already consumed");
      second.handle.sqlite.close();

      expect(after).toEqual(before);
      expect(after.state).toBe("workload_exposed");
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
