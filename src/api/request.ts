import type { Context } from "hono";
import { z } from "zod";
import { CANONICAL_PAYLOAD_VERSION, PAYLOAD_VERSION_HEADER } from "../identity/canonical-payload.js";
import { ValidationError } from "../identity/errors.js";

/** Header carrying the owner token on POST /owner/register. */
export const TOKEN_HEADER = "x-token";

/** Header carrying the owner's hex signature on workload requests. */
export const SIGNATURE_HEADER = "x-signature";

/** Parse the request body as JSON; anything unparseable is a bad request. */
export async function readJsonBody(c: Context): Promise<unknown> {
  const text = await c.req.text();
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new ValidationError("Invalid payload");
  }
}

/** Reject requests signed over a canonical form this service does not produce. */
export function assertPayloadVersion(c: Context): void {
  const version = c.req.header(PAYLOAD_VERSION_HEADER);
  if (version !== undefined && version !== CANONICAL_PAYLOAD_VERSION) {
    throw new ValidationError("Unsupported payload version");
  }
}

const registrationSchema = z.object({
  pubkey: z.string(),
  signature: z.string(),
});

export type RegistrationBody = z.infer<typeof registrationSchema>;

/** `{ pubkey, signature }` as hex strings; the hex itself is checked during verification. */
export async function readRegistrationBody(c: Context): Promise<RegistrationBody> {
  const parsed = registrationSchema.safeParse(await readJsonBody(c));
  if (!parsed.success) {
    throw new ValidationError("Invalid payload");
  }
  return parsed.data;
}
