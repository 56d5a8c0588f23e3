/**
 * Canonical payload encoding, version 1.
 *
 * The bytes an owner signs for a workload request are the UTF-8 encoding of:
 *   - objects: members sorted by key (UTF-16 code unit order), `undefined`
 *     members dropped, written as `{"k":v,...}`;
 *   - arrays: elements in their original order, written as `[a,b,...]`;
 *   - strings, finite numbers, booleans and null: as `JSON.stringify` writes them;
 *   - no whitespace anywhere.
 *
 * Clients and the service must produce identical bytes for equal payloads, so
 * any change to these rules requires a new version number.
 */

export const CANONICAL_PAYLOAD_VERSION = "1";

/** Header a client may send to pin the canonical form it signed. */
export const PAYLOAD_VERSION_HEADER = "x-payload-version";

export class CanonicalizationError extends Error {
  readonly name = "CanonicalizationError" as const;
}

export function canonicalJson(value: unknown): string {
  if (value === null) return "null";

  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "boolean":
      return value ? "true" : "false";
    case "number":
      if (!Number.isFinite(value)) throw new CanonicalizationError("Cannot canonicalize non-finite number");
      return JSON.stringify(value);
    case "object": {
      if (Array.isArray(value)) {
        return `[${value.map((entry) => canonicalJson(entry)).join(",")}]`;
      }
      const entries = Object.entries(value)
        .filter(([, member]) => member !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      return `{${entries.map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`).join(",")}}`;
    }
    default:
      throw new CanonicalizationError(`Unsupported value type for canonicalization: ${typeof value}`);
  }
}

/** The exact bytes signed for a workload request body. */
export function canonicalPayload(value: unknown): Uint8Array {
  return new TextEncoder().encode(canonicalJson(value));
}
