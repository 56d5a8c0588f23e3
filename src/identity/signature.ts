import * as ed from "@noble/ed25519";
import { sha512 } from "@noble/hashes/sha2.js";

// Enables the synchronous sign/verify/getPublicKey API.
ed.hashes.sha512 = sha512;

export const PUBLIC_KEY_LENGTH = 32;
export const SECRET_KEY_LENGTH = 32;
export const SIGNATURE_LENGTH = 64;

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * Decode a hex string into exactly `length` bytes.
 * Returns null for non-strings, odd-length or non-hex input and wrong lengths.
 */
export function decodeHex(value: unknown, length: number): Uint8Array | null {
  if (typeof value !== "string" || value.length !== length * 2 || !HEX_PATTERN.test(value)) {
    return null;
  }
  return new Uint8Array(Buffer.from(value, "hex"));
}

/** Lowercase hex encoding. */
export function encodeHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}

/**
 * Verify a detached Ed25519 signature.
 *
 * Strict RFC 8032 verification (ZIP-215 leniency off): non-canonical point
 * encodings and small-order keys are rejected. Wrong-length inputs and
 * malformed encodings return false instead of throwing.
 */
export function verifySignature(publicKey: Uint8Array, message: Uint8Array, signature: Uint8Array): boolean {
  if (publicKey.length !== PUBLIC_KEY_LENGTH || signature.length !== SIGNATURE_LENGTH) {
    return false;
  }
  try {
    return ed.verify(signature, message, publicKey, { zip215: false });
  } catch {
    // Point decoding failures surface as exceptions; they are invalid signatures.
    return false;
  }
}

/** Sign `message` with a 32-byte Ed25519 secret key. */
export function signMessage(secretKey: Uint8Array, message: Uint8Array): Uint8Array {
  return ed.sign(message, secretKey);
}

export function derivePublicKey(secretKey: Uint8Array): Uint8Array {
  return ed.getPublicKey(secretKey);
}

export function generateSecretKey(): Uint8Array {
  return ed.utils.randomSecretKey();
}
