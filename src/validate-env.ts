/**
 * Startup environment variable validation.
 *
 * Throws on settings that would break the trust guarantees. Warns on missing
 * recommended vars. Skipped in test environment.
 */
export function validateRequiredEnvVars(): void {
  if (process.env.NODE_ENV === "test") return;

  const errors: string[] = [];
  const warnings: string[] = [];

  // --- Critical (state would not be durable or paths not confined) ---

  const databasePath = process.env.DATABASE_PATH;
  if (databasePath === ":memory:") {
    errors.push("DATABASE_PATH must point at a file; an in-memory database loses registrations on restart");
  }

  const allowedRoot = process.env.PERSIST_ALLOWED_ROOT;
  if (allowedRoot !== undefined && !allowedRoot.startsWith("/")) {
    errors.push("PERSIST_ALLOWED_ROOT must be an absolute path");
  }

  // --- Recommended ---

  if (!process.env.INSTANCE_KEY_PATH) {
    warnings.push("INSTANCE_KEY_PATH not set; using ./data/instance.key relative to the working directory");
  }

  if (process.env.NODE_ENV === "production" && !process.env.SENTRY_DSN) {
    warnings.push("SENTRY_DSN not set; errors will only be logged");
  }

  // --- Emit ---

  if (warnings.length > 0) {
    for (const w of warnings) {
      console.warn(`[env] WARNING: ${w}`);
    }
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }
}
