import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * One lifecycle record per instance, keyed by the hex instance public key.
 *
 * Columns are nullable because the record grows as the instance moves
 * through its states; `toRecord()` in the drizzle repository enforces which
 * columns must be present for each state. `version` is the compare-and-swap
 * counter: every committed transition increments it by exactly one.
 */
export const instanceLifecycles = sqliteTable(
  "instance_lifecycles",
  {
    /** Hex-encoded 32-byte Ed25519 instance public key */
    instancePubkey: text("instance_pubkey").primaryKey(),
    /** unregistered | operator_registered | owner_registered | workload_configured | workload_exposed */
    state: text("state").notNull(),
    /** CAS counter, starts at 1 on first insert */
    version: integer("version").notNull(),

    operatorPubkey: text("operator_pubkey"),
    /** Operator's signature over the raw instance public key */
    operatorInstanceSignature: text("operator_instance_signature"),
    /** Instance's countersignature over the operator public key */
    operatorIdentitySignature: text("operator_identity_signature"),
    operatorRegisteredAt: integer("operator_registered_at"),

    /** SHA-256 of the owner token; the plaintext is only ever returned to the operator */
    ownerTokenHash: text("owner_token_hash"),
    ownerTokenConsumed: integer("owner_token_consumed", { mode: "boolean" }).notNull().default(false),
    ownerTokenConsumedAt: integer("owner_token_consumed_at"),

    ownerPubkey: text("owner_pubkey"),
    ownerInstanceSignature: text("owner_instance_signature"),
    ownerIdentitySignature: text("owner_identity_signature"),
    ownerRegisteredAt: integer("owner_registered_at"),

    workloadImage: text("workload_image"),
    /** JSON array of validated absolute container paths, order preserved */
    workloadPersistDirs: text("workload_persist_dirs", { mode: "json" }).$type<string[]>(),
    workloadPort: integer("workload_port"),
    workloadExposed: integer("workload_exposed", { mode: "boolean" }).notNull().default(false),

    /** Unix epoch seconds */
    createdAt: integer("created_at").notNull(),
    /** Unix epoch seconds */
    updatedAt: integer("updated_at").notNull(),
  },
  (table) => [index("idx_instance_lifecycles_state").on(table.state)],
);
