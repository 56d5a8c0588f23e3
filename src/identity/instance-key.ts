import { chmod, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { logger } from "../config/logger.js";
import { derivePublicKey, encodeHex, generateSecretKey, SECRET_KEY_LENGTH, signMessage } from "./signature.js";

/** The instance's own identity: its public key and the ability to countersign. */
export interface InstanceSigner {
  readonly publicKey: Uint8Array;
  readonly publicKeyHex: string;
  sign(message: Uint8Array): Uint8Array;
}

export class InstanceKey implements InstanceSigner {
  readonly publicKey: Uint8Array;
  readonly publicKeyHex: string;

  constructor(private readonly secretKey: Uint8Array) {
    if (secretKey.length !== SECRET_KEY_LENGTH) {
      throw new Error(`Instance secret key must be ${SECRET_KEY_LENGTH} bytes, got ${secretKey.length}`);
    }
    this.publicKey = derivePublicKey(secretKey);
    this.publicKeyHex = encodeHex(this.publicKey);
  }

  static generate(): InstanceKey {
    return new InstanceKey(generateSecretKey());
  }

  sign(message: Uint8Array): Uint8Array {
    return signMessage(this.secretKey, message);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Load the instance key from `keyPath` (32 raw secret-key bytes), creating it
 * on first boot. The key is never rotated: once written, every later boot
 * must find the same file.
 */
export async function loadOrCreateInstanceKey(keyPath: string): Promise<InstanceKey> {
  let raw: Buffer;
  try {
    raw = await readFile(keyPath);
  } catch (err) {
    if (!isNotFound(err)) throw err;
    const secretKey = generateSecretKey();
    await saveSecretKey(keyPath, secretKey);
    const key = new InstanceKey(secretKey);
    logger.info("Generated new instance key", { keyPath, instancePubkey: key.publicKeyHex });
    return key;
  }

  if (raw.length !== SECRET_KEY_LENGTH) {
    throw new Error(`Instance key at ${keyPath} must be ${SECRET_KEY_LENGTH} raw bytes, found ${raw.length}`);
  }
  const key = new InstanceKey(new Uint8Array(raw));
  logger.info("Loaded instance key", { keyPath, instancePubkey: key.publicKeyHex });
  return key;
}

// Write-then-rename so a crash never leaves a truncated key behind.
async function saveSecretKey(keyPath: string, secretKey: Uint8Array): Promise<void> {
  await mkdir(dirname(keyPath), { recursive: true });
  const tempPath = `${keyPath}.${process.pid}.${Date.now()}.tmp`;
  await writeFile(tempPath, secretKey, { mode: 0o600, flag: "wx" });
  await rename(tempPath, keyPath);
  await chmod(keyPath, 0o600);
}
