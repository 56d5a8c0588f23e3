import { randomUUID } from "node:crypto";
import { and, desc, eq } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { instanceLifecycles } from "../db/schema/instance-lifecycles.js";
import { lifecycleTransitions } from "../db/schema/lifecycle-transitions.js";
import { StorageError } from "./errors.js";
import type { ILifecycleRepository } from "./lifecycle-repository.js";
import { isLifecycleOperation, isLifecycleState } from "./lifecycle-state-machine.js";
import type { OwnerTokenCapability } from "./owner-token.js";
import {
  emptyRecord,
  type IdentityBinding,
  isConfigured,
  isOwned,
  type LifecycleRecord,
  type LifecycleTransition,
  type TransitionIntent,
  type WorkloadConfig,
} from "./types.js";

type LifecycleRow = typeof instanceLifecycles.$inferSelect;
type LifecycleInsert = typeof instanceLifecycles.$inferInsert;
type TransitionRow = typeof lifecycleTransitions.$inferSelect;

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function corrupt(row: { instancePubkey: string }, detail: string): StorageError {
  return new StorageError(`Corrupt lifecycle record for instance ${row.instancePubkey}: ${detail}`);
}

function toBinding(
  pubkey: string | null,
  instanceSignature: string | null,
  identitySignature: string | null,
  registeredAt: number | null,
): IdentityBinding | null {
  if (pubkey === null || instanceSignature === null || identitySignature === null || registeredAt === null) {
    return null;
  }
  return { pubkey, instanceSignature, identitySignature, registeredAt };
}

function toOwnerToken(row: LifecycleRow): OwnerTokenCapability | null {
  if (row.ownerTokenHash === null) return null;
  return { hash: row.ownerTokenHash, consumed: row.ownerTokenConsumed, consumedAt: row.ownerTokenConsumedAt };
}

function toWorkload(row: LifecycleRow): WorkloadConfig | null {
  const dirs: unknown = row.workloadPersistDirs;
  if (row.workloadImage === null || row.workloadPort === null || !Array.isArray(dirs)) return null;
  const persistDirs = dirs.filter((d): d is string => typeof d === "string");
  if (persistDirs.length !== dirs.length) return null;
  return { instancePubkey: row.instancePubkey, image: row.workloadImage, persistDirs, port: row.workloadPort };
}

/**
 * Rebuild the typed record from a row, enforcing the per-state invariants:
 * operator iff state ≥ operator_registered, owner iff ≥ owner_registered
 * (with the token consumed), workload iff ≥ workload_configured, exposed
 * flag iff workload_exposed.
 */
export function toRecord(row: LifecycleRow): LifecycleRecord {
  const base = {
    instancePubkey: row.instancePubkey,
    version: row.version,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
  const state = row.state;
  if (!isLifecycleState(state)) throw corrupt(row, `unknown state "${state}"`);

  const operator = toBinding(
    row.operatorPubkey,
    row.operatorInstanceSignature,
    row.operatorIdentitySignature,
    row.operatorRegisteredAt,
  );
  const ownerToken = toOwnerToken(row);
  const owner = toBinding(row.ownerPubkey, row.ownerInstanceSignature, row.ownerIdentitySignature, row.ownerRegisteredAt);
  const workload = toWorkload(row);

  if (state === "unregistered") {
    if (operator || ownerToken || owner || workload) throw corrupt(row, "unregistered record carries bindings");
    return { ...base, state };
  }
  if (!operator || !ownerToken) throw corrupt(row, `${state} record without operator or owner token`);

  if (state === "operator_registered") {
    if (owner || workload || ownerToken.consumed) throw corrupt(row, "operator_registered record carries owner data");
    return { ...base, state, operator, ownerToken };
  }
  if (!owner || !ownerToken.consumed) throw corrupt(row, `${state} record without owner or with unconsumed token`);

  if (state === "owner_registered") {
    if (workload || row.workloadExposed) throw corrupt(row, "owner_registered record carries a workload");
    return { ...base, state, operator, ownerToken, owner };
  }
  if (!workload) throw corrupt(row, `${state} record without a valid workload`);
  if (row.workloadExposed !== (state === "workload_exposed")) throw corrupt(row, "exposed flag disagrees with state");

  return state === "workload_configured"
    ? { ...base, state, operator, ownerToken, owner, workload }
    : { ...base, state, operator, ownerToken, owner, workload };
}

function toRow(record: LifecycleRecord, version: number, createdAt: number, updatedAt: number): LifecycleInsert {
  const row: LifecycleInsert = {
    instancePubkey: record.instancePubkey,
    state: record.state,
    version,
    operatorPubkey: null,
    operatorInstanceSignature: null,
    operatorIdentitySignature: null,
    operatorRegisteredAt: null,
    ownerTokenHash: null,
    ownerTokenConsumed: false,
    ownerTokenConsumedAt: null,
    ownerPubkey: null,
    ownerInstanceSignature: null,
    ownerIdentitySignature: null,
    ownerRegisteredAt: null,
    workloadImage: null,
    workloadPersistDirs: null,
    workloadPort: null,
    workloadExposed: false,
    createdAt,
    updatedAt,
  };
  if (record.state !== "unregistered") {
    row.operatorPubkey = record.operator.pubkey;
    row.operatorInstanceSignature = record.operator.instanceSignature;
    row.operatorIdentitySignature = record.operator.identitySignature;
    row.operatorRegisteredAt = record.operator.registeredAt;
    row.ownerTokenHash = record.ownerToken.hash;
    row.ownerTokenConsumed = record.ownerToken.consumed;
    row.ownerTokenConsumedAt = record.ownerToken.consumedAt;
  }
  if (isOwned(record)) {
    row.ownerPubkey = record.owner.pubkey;
    row.ownerInstanceSignature = record.owner.instanceSignature;
    row.ownerIdentitySignature = record.owner.identitySignature;
    row.ownerRegisteredAt = record.owner.registeredAt;
  }
  if (isConfigured(record)) {
    row.workloadImage = record.workload.image;
    row.workloadPersistDirs = record.workload.persistDirs;
    row.workloadPort = record.workload.port;
    row.workloadExposed = record.state === "workload_exposed";
  }
  return row;
}

function toTransition(row: TransitionRow): LifecycleTransition {
  const { fromState, toState, operation } = row;
  if (!isLifecycleState(fromState) || !isLifecycleState(toState) || !isLifecycleOperation(operation)) {
    throw corrupt(row, `unreadable transition ${row.id}`);
  }
  return { ...row, fromState, toState, operation };
}

export class DrizzleLifecycleRepository implements ILifecycleRepository {
  constructor(private readonly db: DrizzleDb) {}

  get(instancePubkey: string): LifecycleRecord {
    let row: LifecycleRow | undefined;
    try {
      row = this.db.select().from(instanceLifecycles).where(eq(instanceLifecycles.instancePubkey, instancePubkey)).get();
    } catch (err) {
      throw new StorageError(`Failed to read lifecycle record for instance ${instancePubkey}`, { cause: err });
    }
    return row ? toRecord(row) : emptyRecord(instancePubkey);
  }

  compareAndSwap(
    instancePubkey: string,
    expectedVersion: number,
    next: LifecycleRecord,
    intent: TransitionIntent,
  ): boolean {
    const now = nowSeconds();
    const version = expectedVersion + 1;
    const values = toRow({ ...next, instancePubkey }, version, next.createdAt ?? now, now);

    try {
      return this.db.transaction((tx) => {
        let changes: number;
        if (expectedVersion === 0) {
          changes = tx.insert(instanceLifecycles).values(values).onConflictDoNothing().run().changes;
        } else {
          const { instancePubkey: _key, createdAt: _createdAt, ...updates } = values;
          changes = tx
            .update(instanceLifecycles)
            .set(updates)
            .where(
              and(eq(instanceLifecycles.instancePubkey, instancePubkey), eq(instanceLifecycles.version, expectedVersion)),
            )
            .run().changes;
        }

        if (changes === 0) return false;

        tx.insert(lifecycleTransitions)
          .values({
            id: randomUUID(),
            instancePubkey,
            fromState: intent.fromState,
            toState: next.state,
            operation: intent.operation,
            version,
            createdAt: now,
          })
          .run();
        return true;
      });
    } catch (err) {
      throw new StorageError(`Failed to commit ${intent.operation} for instance ${instancePubkey}`, { cause: err });
    }
  }

  listTransitions(instancePubkey: string, limit = 50): LifecycleTransition[] {
    let rows: TransitionRow[];
    try {
      rows = this.db
        .select()
        .from(lifecycleTransitions)
        .where(eq(lifecycleTransitions.instancePubkey, instancePubkey))
        .orderBy(desc(lifecycleTransitions.version))
        .limit(limit)
        .all();
    } catch (err) {
      throw new StorageError(`Failed to read transitions for instance ${instancePubkey}`, { cause: err });
    }
    return rows.map(toTransition);
  }

  reset(instancePubkey?: string): number {
    return this.db.transaction((tx) => {
      if (instancePubkey === undefined) {
        tx.delete(lifecycleTransitions).run();
        return tx.delete(instanceLifecycles).run().changes;
      }
      tx.delete(lifecycleTransitions).where(eq(lifecycleTransitions.instancePubkey, instancePubkey)).run();
      return tx.delete(instanceLifecycles).where(eq(instanceLifecycles.instancePubkey, instancePubkey)).run().changes;
    });
  }
}
