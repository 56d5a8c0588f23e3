import { logger } from "../config/logger.js";
import { captureError } from "../observability/sentry.js";
import { CanonicalizationError, canonicalPayload } from "./canonical-payload.js";
import { ConflictError, StorageError, UnauthorizedError, ValidationError } from "./errors.js";
import type { InstanceSigner } from "./instance-key.js";
import type { KeyedSerializer } from "./keyed-serializer.js";
import type { ILifecycleRepository } from "./lifecycle-repository.js";
import { assertTransition, type LifecycleOperation } from "./lifecycle-state-machine.js";
import { checkOwnerToken, consumeOwnerToken, mintOwnerToken } from "./owner-token.js";
import {
  decodeHex,
  encodeHex,
  PUBLIC_KEY_LENGTH,
  SIGNATURE_LENGTH,
  verifySignature,
} from "./signature.js";
import {
  type IdentityBinding,
  isConfigured,
  isOwned,
  type LifecycleRecord,
  type LifecycleTransition,
  type OperatorRegisteredRecord,
  type OwnerRegisteredRecord,
  type WorkloadConfig,
  type WorkloadConfiguredRecord,
  type WorkloadExposedRecord,
} from "./types.js";
import { assertMatchesWorkload, parseConfigureWorkload, parseExposeWorkload, toWorkloadConfig } from "./workload-config.js";
import type { WorkloadRuntime } from "./workload-runtime.js";

export interface InstanceAuthorityOptions {
  instance: InstanceSigner;
  repository: ILifecycleRepository;
  /** Shared across authorities; keyed by instance public key. */
  serializer: KeyedSerializer;
  runtime: WorkloadRuntime;
  /** Every persist dir must normalize to this root or below it. */
  allowedRoot: string;
  storageRetryAttempts: number;
  /** Unix epoch seconds */
  now?: () => number;
}

/** Hex-encoded public key and signature as received; validated here. */
export interface RegistrationRequest {
  pubkey: unknown;
  signature: unknown;
}

export interface OwnerRegistrationRequest extends RegistrationRequest {
  /** Plaintext owner token from the x-token header */
  token: string | undefined;
}

export interface SignedPayloadRequest {
  /** Parsed JSON body; the signature covers its canonical form */
  body: unknown;
  /** Hex signature from the x-signature header */
  signature: string | undefined;
}

interface Decision<T> {
  /** null when the request is satisfied without a write */
  next: LifecycleRecord | null;
  result: T;
}

const unixNow = () => Math.floor(Date.now() / 1000);

/**
 * Authorization state machine for one instance.
 *
 * Every mutating operation runs under the instance's serializer slot as a
 * read, decide, compare-and-swap cycle. A lost swap or a storage error
 * re-reads the record and decides again, so a caller that raced a winner
 * sees the domain error of the new state.
 */
export class InstanceAuthority {
  readonly instancePubkey: string;
  private readonly now: () => number;
  private runtimeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly options: InstanceAuthorityOptions) {
    this.instancePubkey = options.instance.publicKeyHex;
    this.now = options.now ?? unixNow;
  }

  getRecord(): LifecycleRecord {
    return this.options.repository.get(this.instancePubkey);
  }

  listTransitions(limit?: number): LifecycleTransition[] {
    return this.options.repository.listTransitions(this.instancePubkey, limit);
  }

  /** Bind the operator and mint the owner token. The plaintext token is returned exactly once. */
  registerOperator(request: RegistrationRequest): Promise<{ ownerToken: string }> {
    return this.commit("register_operator", (current) => {
      if (current.state !== "unregistered") {
        throw new ConflictError("Operator already registered");
      }
      const operator = this.bind(request, "Invalid operator signature");
      const { token, capability } = mintOwnerToken();
      const next: OperatorRegisteredRecord = {
        ...current,
        state: "operator_registered",
        operator,
        ownerToken: capability,
      };
      return { next, result: { ownerToken: token } };
    });
  }

  /** Bind the owner, spending the owner token. */
  registerOwner(request: OwnerRegistrationRequest): Promise<void> {
    return this.commit("register_owner", (current) => {
      if (current.state === "unregistered") {
        throw new UnauthorizedError("Operator not registered");
      }
      switch (checkOwnerToken(current.ownerToken, request.token)) {
        case "missing":
          throw new UnauthorizedError("Missing token header");
        case "mismatch":
          throw new UnauthorizedError("Invalid owner token");
        case "consumed":
          throw new UnauthorizedError("Owner token already consumed");
        case "valid":
          break;
      }
      // A valid token is unconsumed, so no owner can be bound yet.
      if (current.state !== "operator_registered") {
        throw new UnauthorizedError("Owner token already consumed");
      }
      const owner = this.bind(request, "Invalid owner signature");
      const next: OwnerRegisteredRecord = {
        ...current,
        state: "owner_registered",
        ownerToken: consumeOwnerToken(current.ownerToken, owner.registeredAt),
        owner,
      };
      return { next, result: undefined };
    });
  }

  /** Store (or replace) the workload. Rejected once the workload is exposed. */
  async configureWorkload(request: SignedPayloadRequest): Promise<WorkloadConfig> {
    const message = toSignedBytes(request.body);
    const workload = await this.commit("configure_workload", (current) => {
      if (!isOwned(current)) {
        throw new UnauthorizedError("Owner not registered");
      }
      this.verifyOwnerSignature(current.owner, message, request.signature);
      if (current.state === "workload_exposed") {
        throw new ConflictError("Workload already exposed");
      }
      const config = toWorkloadConfig(
        parseConfigureWorkload(request.body),
        this.instancePubkey,
        this.options.allowedRoot,
      );
      const next: WorkloadConfiguredRecord = { ...current, state: "workload_configured", workload: config };
      return { next, result: config };
    });
    this.scheduleRuntime(workload, false);
    return workload;
  }

  /** Publish the configured workload. Repeating the request once exposed changes nothing. */
  async exposeWorkload(request: SignedPayloadRequest): Promise<WorkloadConfig> {
    const message = toSignedBytes(request.body);
    const { workload, changed } = await this.commit("expose_workload", (current) => {
      // Without a workload there is nothing to expose, whoever signed.
      if (!isConfigured(current)) {
        throw new ValidationError("Workload not configured");
      }
      this.verifyOwnerSignature(current.owner, message, request.signature);
      assertMatchesWorkload(parseExposeWorkload(request.body), current.workload);
      if (current.state === "workload_exposed") {
        return { next: null, result: { workload: current.workload, changed: false } };
      }
      const next: WorkloadExposedRecord = { ...current, state: "workload_exposed" };
      return { next, result: { workload: current.workload, changed: true } };
    });
    if (changed) this.scheduleRuntime(workload, true);
    return workload;
  }

  /** Replay the persisted workload to the runtime, e.g. after a restart. */
  async reconcile(): Promise<void> {
    const record = this.getRecord();
    if (!isConfigured(record)) {
      logger.info("No workload to reconcile", { instancePubkey: this.instancePubkey, state: record.state });
      return;
    }
    await this.applyRuntime(record.workload, record.state === "workload_exposed");
  }

  /** Resolves once every scheduled runtime application has finished. */
  whenRuntimeIdle(): Promise<void> {
    return this.runtimeQueue;
  }

  private commit<T>(operation: LifecycleOperation, decide: (current: LifecycleRecord) => Decision<T>): Promise<T> {
    const { repository, serializer, storageRetryAttempts } = this.options;
    const instancePubkey = this.instancePubkey;

    return serializer.run(instancePubkey, () => {
      let lastFailure: unknown;
      for (let attempt = 1; attempt <= storageRetryAttempts; attempt++) {
        try {
          const current = repository.get(instancePubkey);
          const { next, result } = decide(current);
          if (next === null) return result;

          assertTransition(current.state, next.state);
          if (repository.compareAndSwap(instancePubkey, current.version, next, { fromState: current.state, operation })) {
            logger.info("Lifecycle transition committed", {
              instancePubkey,
              operation,
              from: current.state,
              to: next.state,
              version: current.version + 1,
            });
            return result;
          }
          lastFailure = undefined;
          logger.warn("Lost compare-and-swap, re-reading record", { instancePubkey, operation, attempt });
        } catch (err) {
          if (!(err instanceof StorageError)) throw err;
          lastFailure = err;
          logger.warn("Storage error during transition", { instancePubkey, operation, attempt, error: err.message });
        }
      }
      logger.error("Transition abandoned after retries", { instancePubkey, operation, attempts: storageRetryAttempts });
      throw new StorageError("Storage unavailable", { cause: lastFailure });
    });
  }

  /** Verify a registration signature over the instance key and countersign the principal's key. */
  private bind(request: RegistrationRequest, failure: string): IdentityBinding {
    const pubkey = decodeHex(request.pubkey, PUBLIC_KEY_LENGTH);
    const signature = decodeHex(request.signature, SIGNATURE_LENGTH);
    if (!pubkey || !signature || !verifySignature(pubkey, this.options.instance.publicKey, signature)) {
      throw new UnauthorizedError(failure);
    }
    return {
      pubkey: encodeHex(pubkey),
      instanceSignature: encodeHex(signature),
      identitySignature: encodeHex(this.options.instance.sign(pubkey)),
      registeredAt: this.now(),
    };
  }

  private verifyOwnerSignature(owner: IdentityBinding, message: Uint8Array, signatureHex: string | undefined): void {
    if (!signatureHex) {
      throw new UnauthorizedError("Missing signature header");
    }
    const signature = decodeHex(signatureHex, SIGNATURE_LENGTH);
    if (!signature) {
      throw new UnauthorizedError("Invalid signature format");
    }
    const ownerKey = decodeHex(owner.pubkey, PUBLIC_KEY_LENGTH);
    if (!ownerKey || !verifySignature(ownerKey, message, signature)) {
      throw new UnauthorizedError("Invalid signature");
    }
  }

  private scheduleRuntime(workload: WorkloadConfig, exposed: boolean): void {
    this.runtimeQueue = this.options.serializer.run(`${this.instancePubkey}:runtime`, () =>
      this.applyRuntime(workload, exposed),
    );
  }

  private async applyRuntime(workload: WorkloadConfig, exposed: boolean): Promise<void> {
    try {
      await this.options.runtime.apply(workload, exposed);
    } catch (err) {
      logger.error("Workload runtime failed to apply committed state", {
        instancePubkey: this.instancePubkey,
        exposed,
        error: err instanceof Error ? err.message : String(err),
      });
      captureError(err, { instancePubkey: this.instancePubkey, extra: { exposed } });
    }
  }
}

function toSignedBytes(body: unknown): Uint8Array {
  try {
    return canonicalPayload(body);
  } catch (err) {
    if (err instanceof CanonicalizationError) throw new ValidationError("Invalid payload");
    throw err;
  }
}
