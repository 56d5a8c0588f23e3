import { createHash, randomBytes, timingSafeEqual } from "node:crypto";

/**
 * Single-use delegation capability bridging operator registration to owner
 * registration. Only the SHA-256 hash is stored; `consumed` flips exactly once.
 */
export interface OwnerTokenCapability {
  hash: string;
  consumed: boolean;
  /** Unix epoch seconds; null while unconsumed */
  consumedAt: number | null;
}

export type OwnerTokenCheck = "valid" | "missing" | "mismatch" | "consumed";

const TOKEN_BYTES = 32;

function hashToken(token: string): string {
  return createHash("sha256").update(token).digest("hex");
}

/** Mint a fresh token. The plaintext goes to the operator once and is never persisted. */
export function mintOwnerToken(): { token: string; capability: OwnerTokenCapability } {
  const token = randomBytes(TOKEN_BYTES).toString("hex");
  return { token, capability: { hash: hashToken(token), consumed: false, consumedAt: null } };
}

/** Compare a presented token against the capability in constant time. */
export function checkOwnerToken(capability: OwnerTokenCapability, presented: string | undefined): OwnerTokenCheck {
  if (!presented) return "missing";
  const expected = Buffer.from(capability.hash, "hex");
  const actual = Buffer.from(hashToken(presented), "hex");
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) return "mismatch";
  if (capability.consumed) return "consumed";
  return "valid";
}

/** Mark the capability spent. Consuming twice is a programming error. */
export function consumeOwnerToken(capability: OwnerTokenCapability, now: number): OwnerTokenCapability {
  if (capability.consumed) {
    throw new Error("Owner token already consumed");
  }
  return { ...capability, consumed: true, consumedAt: now };
}
