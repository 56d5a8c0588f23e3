import { z } from "zod";
import { ValidationError } from "./errors.js";
import { INVALID_DIRECTORY_PATH, validatePersistDirs } from "./path-safety.js";
import type { WorkloadConfig } from "./types.js";

const PORT_MESSAGE = "port must be an integer between 1 and 65535";

function requiredString(field: string) {
  return z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .min(1, `${field} must not be empty`);
}

/** Body of POST /workload/configure. Unknown members are ignored but still covered by the signature. */
export const configureWorkloadSchema = z.object({
  instance_pubkey: requiredString("instance_pubkey"),
  image: requiredString("image"),
  persist_dirs: z.array(z.string({ invalid_type_error: "persist_dirs entries must be strings" }), {
    required_error: "persist_dirs is required",
    invalid_type_error: "persist_dirs must be an array of strings",
  }),
  port: z
    .number({ required_error: "port is required", invalid_type_error: PORT_MESSAGE })
    .int(PORT_MESSAGE)
    .min(1, PORT_MESSAGE)
    .max(65535, PORT_MESSAGE),
});

export type ConfigureWorkloadRequest = z.infer<typeof configureWorkloadSchema>;

/** Body of POST /workload/expose. */
export const exposeWorkloadSchema = z.object({
  instance_pubkey: requiredString("instance_pubkey"),
  image: requiredString("image"),
});

export type ExposeWorkloadRequest = z.infer<typeof exposeWorkloadSchema>;

function toValidationError(error: z.ZodError): ValidationError {
  const issue = error.issues[0];
  if (!issue || issue.path.length === 0) return new ValidationError("Invalid payload");
  const field = issue.path.find((segment): segment is string => typeof segment === "string");
  return new ValidationError(issue.message, field);
}

function parseWith<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) throw toValidationError(parsed.error);
  return parsed.data;
}

export function parseConfigureWorkload(body: unknown): ConfigureWorkloadRequest {
  return parseWith(configureWorkloadSchema, body);
}

export function parseExposeWorkload(body: unknown): ExposeWorkloadRequest {
  return parseWith(exposeWorkloadSchema, body);
}

function assertSameInstance(claimed: string, instancePubkey: string): void {
  if (claimed.toLowerCase() !== instancePubkey) {
    throw new ValidationError("instance_pubkey does not match this instance", "instance_pubkey");
  }
}

/**
 * Check a parsed configure request against this instance and the persistence
 * root, returning the workload exactly as it will be stored.
 */
export function toWorkloadConfig(
  request: ConfigureWorkloadRequest,
  instancePubkey: string,
  allowedRoot: string,
): WorkloadConfig {
  assertSameInstance(request.instance_pubkey, instancePubkey);
  const dirs = validatePersistDirs(request.persist_dirs, allowedRoot);
  if (!dirs.ok) {
    throw new ValidationError(INVALID_DIRECTORY_PATH, "persist_dirs");
  }
  return { instancePubkey, image: request.image, persistDirs: dirs.paths, port: request.port };
}

/** An expose request must name the instance and the image that were configured. */
export function assertMatchesWorkload(request: ExposeWorkloadRequest, workload: WorkloadConfig): void {
  assertSameInstance(request.instance_pubkey, workload.instancePubkey);
  if (request.image !== workload.image) {
    throw new ValidationError("image does not match the configured workload", "image");
  }
}
