import type { LifecycleOperation, LifecycleState } from "./lifecycle-state-machine.js";
import type { OwnerTokenCapability } from "./owner-token.js";

/** A principal bound to an instance. All byte fields are lowercase hex. */
export interface IdentityBinding {
  pubkey: string;
  /** Principal's signature over the raw instance public key */
  instanceSignature: string;
  /** Instance's countersignature over the principal's public key */
  identitySignature: string;
  /** Unix epoch seconds */
  registeredAt: number;
}

/** Validated workload configuration as persisted. */
export interface WorkloadConfig {
  instancePubkey: string;
  image: string;
  /** Normalized absolute container paths, order preserved */
  persistDirs: string[];
  port: number;
}

interface RecordBase {
  instancePubkey: string;
  /** CAS counter; 0 means the record has never been persisted */
  version: number;
  /** Unix epoch seconds; null until first persisted */
  createdAt: number | null;
  updatedAt: number | null;
}

export interface UnregisteredRecord extends RecordBase {
  state: "unregistered";
}

export interface OperatorRegisteredRecord extends RecordBase {
  state: "operator_registered";
  operator: IdentityBinding;
  ownerToken: OwnerTokenCapability;
}

export interface OwnerRegisteredRecord extends RecordBase {
  state: "owner_registered";
  operator: IdentityBinding;
  ownerToken: OwnerTokenCapability;
  owner: IdentityBinding;
}

export interface WorkloadConfiguredRecord extends RecordBase {
  state: "workload_configured";
  operator: IdentityBinding;
  ownerToken: OwnerTokenCapability;
  owner: IdentityBinding;
  workload: WorkloadConfig;
}

export interface WorkloadExposedRecord extends RecordBase {
  state: "workload_exposed";
  operator: IdentityBinding;
  ownerToken: OwnerTokenCapability;
  owner: IdentityBinding;
  workload: WorkloadConfig;
}

/**
 * Aggregate root, one per instance. Each state carries exactly the fields
 * that exist once it is reached, so combinations such as an owner without an
 * operator are unrepresentable.
 */
export type LifecycleRecord =
  | UnregisteredRecord
  | OperatorRegisteredRecord
  | OwnerRegisteredRecord
  | WorkloadConfiguredRecord
  | WorkloadExposedRecord;

/** Records that have an owner bound. */
export type OwnedRecord = OwnerRegisteredRecord | WorkloadConfiguredRecord | WorkloadExposedRecord;

/** Records with a stored workload. */
export type ConfiguredRecord = WorkloadConfiguredRecord | WorkloadExposedRecord;

export interface LifecycleTransition {
  id: string;
  instancePubkey: string;
  fromState: LifecycleState;
  toState: LifecycleState;
  operation: LifecycleOperation;
  version: number;
  createdAt: number;
}

/** What a compare-and-swap records alongside the new record. */
export interface TransitionIntent {
  fromState: LifecycleState;
  operation: LifecycleOperation;
}

export function emptyRecord(instancePubkey: string): UnregisteredRecord {
  return { instancePubkey, state: "unregistered", version: 0, createdAt: null, updatedAt: null };
}

export function isOwned(record: LifecycleRecord): record is OwnedRecord {
  return (
    record.state === "owner_registered" ||
    record.state === "workload_configured" ||
    record.state === "workload_exposed"
  );
}

export function isConfigured(record: LifecycleRecord): record is ConfiguredRecord {
  return record.state === "workload_configured" || record.state === "workload_exposed";
}
