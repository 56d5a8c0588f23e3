import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * Append-only history of lifecycle transitions.
 * Written in the same SQLite transaction as the record update it describes.
 */
export const lifecycleTransitions = sqliteTable(
  "lifecycle_transitions",
  {
    /** UUID */
    id: text("id").primaryKey(),
    /** References instance_lifecycles.instance_pubkey */
    instancePubkey: text("instance_pubkey").notNull(),
    fromState: text("from_state").notNull(),
    toState: text("to_state").notNull(),
    /** register_operator | register_owner | configure_workload | expose_workload */
    operation: text("operation").notNull(),
    /** Record version after the transition */
    version: integer("version").notNull(),
    /** Unix epoch seconds */
    createdAt: integer("created_at").notNull(),
  },
  (t) => [
    index("idx_lifecycle_transitions_instance").on(t.instancePubkey),
    index("idx_lifecycle_transitions_created").on(t.createdAt),
  ],
);
