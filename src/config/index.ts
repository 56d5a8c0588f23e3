import { z } from "zod";

const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3001),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** SQLite file holding lifecycle records and transition history. */
  databasePath: z.string().min(1).default("./data/identity.db"),

  /** Raw 32-byte Ed25519 secret key of this instance. Created on first boot. */
  instanceKeyPath: z.string().min(1).default("./data/instance.key"),

  /** Workload persistence rules. */
  persist: z
    .object({
      /** Every persist_dirs entry must normalize to this directory or below it. */
      allowedRoot: z.string().min(1).default("/"),
      /** Host directory that container persist dirs are bind-mounted from. */
      hostRoot: z.string().min(1).default("./data/persist"),
    })
    .default({
      allowedRoot: "/",
      hostRoot: "./data/persist",
    }),

  /** Where committed workload state is applied. "none" only records it. */
  runtime: z
    .object({
      kind: z.enum(["none", "docker"]).default("none"),
      /** Docker-compatible engine socket (a podman API socket works too). */
      socketPath: z.string().min(1).default("/var/run/docker.sock"),
      /** Host port the workload port is published on once exposed. */
      publishedPort: z.coerce.number().int().min(1).max(65535).default(8080),
    })
    .default({
      kind: "none",
      socketPath: "/var/run/docker.sock",
      publishedPort: 8080,
    }),

  /** Compare-and-swap attempts per transition before reporting a storage failure. */
  storageRetryAttempts: z.coerce.number().int().min(1).max(10).default(3),

  sentryDsn: z.string().optional(),
});

export type Config = z.infer<typeof configSchema>;

/** Parse configuration from an environment map (process.env by default). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    databasePath: env.DATABASE_PATH,
    instanceKeyPath: env.INSTANCE_KEY_PATH,
    persist: {
      allowedRoot: env.PERSIST_ALLOWED_ROOT,
      hostRoot: env.WORKLOAD_HOST_ROOT,
    },
    runtime: {
      kind: env.WORKLOAD_RUNTIME,
      socketPath: env.CONTAINER_SOCKET_PATH,
      publishedPort: env.WORKLOAD_PUBLISHED_PORT,
    },
    storageRetryAttempts: env.STORAGE_RETRY_ATTEMPTS,
    sentryDsn: env.SENTRY_DSN || undefined,
  });
}
