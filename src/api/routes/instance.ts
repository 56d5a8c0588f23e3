import { Hono } from "hono";
import { z } from "zod";
import { ValidationError } from "../../identity/errors.js";
import type { InstanceAuthority } from "../../identity/instance-authority.js";
import { decodeHex, encodeHex, PUBLIC_KEY_LENGTH } from "../../identity/signature.js";
import {
  type IdentityBinding,
  isConfigured,
  isOwned,
  type LifecycleRecord,
  type LifecycleTransition,
} from "../../identity/types.js";

function bindingView(binding: IdentityBinding) {
  return {
    pubkey: binding.pubkey,
    instance_signature: binding.instanceSignature,
    identity_signature: binding.identitySignature,
    registered_at: binding.registeredAt,
  };
}

/** Public read model. The owner token, even hashed, never leaves the service. */
export function toReadModel(record: LifecycleRecord) {
  return {
    instance_pubkey: record.instancePubkey,
    state: record.state,
    operator: record.state === "unregistered" ? null : bindingView(record.operator),
    owner: isOwned(record) ? bindingView(record.owner) : null,
    workload: isConfigured(record)
      ? {
          image: record.workload.image,
          persist_dirs: record.workload.persistDirs,
          port: record.workload.port,
          exposed: record.state === "workload_exposed",
        }
      : null,
  };
}

function transitionView(transition: LifecycleTransition) {
  return {
    from_state: transition.fromState,
    to_state: transition.toState,
    operation: transition.operation,
    version: transition.version,
    created_at: transition.createdAt,
  };
}

const transitionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export function createInstanceRoutes(authority: InstanceAuthority): Hono {
  const routes = new Hono();

  /** Resolve the :pubkey parameter; only this instance is served. */
  function requireThisInstance(param: string): boolean {
    const bytes = decodeHex(param, PUBLIC_KEY_LENGTH);
    if (!bytes) {
      throw new ValidationError("Invalid instance public key", "pubkey");
    }
    return encodeHex(bytes) === authority.instancePubkey;
  }

  // Registered before /:pubkey so the literal path wins.
  routes.get("/pubkey", (c) => c.json({ pubkey: authority.instancePubkey }));

  routes.get("/:pubkey", (c) => {
    if (!requireThisInstance(c.req.param("pubkey"))) {
      return c.json({ error: "Instance not found" }, 404);
    }
    return c.json(toReadModel(authority.getRecord()));
  });

  routes.get("/:pubkey/transitions", (c) => {
    if (!requireThisInstance(c.req.param("pubkey"))) {
      return c.json({ error: "Instance not found" }, 404);
    }
    const query = transitionsQuerySchema.safeParse({ limit: c.req.query("limit") });
    if (!query.success) {
      throw new ValidationError("limit must be an integer between 1 and 200", "limit");
    }
    return c.json({ transitions: authority.listTransitions(query.data.limit).map(transitionView) });
  });

  return routes;
}
