import path from "node:path";

export const INVALID_DIRECTORY_PATH = "Invalid directory path";

export type PathValidation = { ok: true; path: string } | { ok: false; reason: string };

/**
 * Lexically normalize an absolute POSIX path: collapse repeated slashes and
 * drop `.` segments. Never touches the filesystem, since the directories may
 * not exist yet. Returns null when the path is not absolute or contains a
 * `..` segment: a parent reference is treated as an escape attempt even when
 * it would resolve inside the root.
 */
export function normalizeAbsolutePath(candidate: string): string | null {
  if (!candidate.startsWith("/")) return null;
  const segments: string[] = [];
  for (const segment of candidate.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") return null;
    segments.push(segment);
  }
  return `/${segments.join("/")}`;
}

function isWithin(normalized: string, root: string): boolean {
  if (root === "/") return true;
  return normalized === root || normalized.startsWith(`${root}/`);
}

/**
 * Validate one container persist directory against the configured root.
 * Operates on the literal string only.
 */
export function validatePersistDir(candidate: string, allowedRoot: string): PathValidation {
  if (candidate.length === 0 || candidate.includes("\0")) {
    return { ok: false, reason: INVALID_DIRECTORY_PATH };
  }
  const normalized = normalizeAbsolutePath(candidate);
  const root = normalizeAbsolutePath(allowedRoot);
  if (normalized === null || root === null || !isWithin(normalized, root)) {
    return { ok: false, reason: INVALID_DIRECTORY_PATH };
  }
  return { ok: true, path: normalized };
}

export type PathListValidation = { ok: true; paths: string[] } | { ok: false; reason: string; index: number };

/**
 * Validate every entry independently; any failure rejects the whole list.
 * Returns the normalized paths in their original order.
 */
export function validatePersistDirs(candidates: readonly string[], allowedRoot: string): PathListValidation {
  const paths: string[] = [];
  for (const [index, candidate] of candidates.entries()) {
    const result = validatePersistDir(candidate, allowedRoot);
    if (!result.ok) return { ok: false, reason: result.reason, index };
    paths.push(result.path);
  }
  return { ok: true, paths };
}

/**
 * Bind-mount source on the host for a validated container directory:
 * `/etc/nginx/conf.d` under host root `/data/persist` maps to
 * `/data/persist/etc/nginx/conf.d`.
 */
export function hostPathFor(containerDir: string, hostRoot: string): string {
  const normalized = normalizeAbsolutePath(containerDir);
  if (normalized === null) {
    throw new Error(`${INVALID_DIRECTORY_PATH}: ${containerDir}`);
  }
  return path.join(hostRoot, normalized.slice(1));
}
