import type { LifecycleRecord, LifecycleTransition, TransitionIntent } from "./types.js";

/**
 * Durable store of lifecycle records.
 *
 * compareAndSwap() is the only write path for normal operation. It commits the
 * new record and its history row atomically and durably, or not at all.
 */
export interface ILifecycleRepository {
  /** Current record; an unregistered record with version 0 when none is stored. */
  get(instancePubkey: string): LifecycleRecord;
  /**
   * Replace the record whose version is `expectedVersion` with `next`
   * (stored as version `expectedVersion + 1`). Returns false when another
   * writer committed first. Throws StorageError when SQLite fails.
   */
  compareAndSwap(instancePubkey: string, expectedVersion: number, next: LifecycleRecord, intent: TransitionIntent): boolean;
  /** Newest first. */
  listTransitions(instancePubkey: string, limit?: number): LifecycleTransition[];
  /** Administrative wipe of one instance, or of every instance when omitted. Returns records removed. */
  reset(instancePubkey?: string): number;
}
