import { serve } from "@hono/node-server";
import Docker from "dockerode";
import { createApp } from "./api/app.js";
import { type Config, loadConfig } from "./config/index.js";
import { logger } from "./config/logger.js";
import { openIdentityDatabase } from "./db/index.js";
import { DrizzleLifecycleRepository } from "./identity/drizzle-lifecycle-repository.js";
import { InstanceAuthority } from "./identity/instance-authority.js";
import { loadOrCreateInstanceKey } from "./identity/instance-key.js";
import { KeyedSerializer } from "./identity/keyed-serializer.js";
import { DockerWorkloadRuntime, RecordingWorkloadRuntime, type WorkloadRuntime } from "./identity/workload-runtime.js";
import { captureError, initSentry } from "./observability/sentry.js";
import { validateRequiredEnvVars } from "./validate-env.js";

export const unhandledRejectionHandler = (reason: unknown) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
  captureError(reason, { extra: { source: "unhandledRejection" } });
};

export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", { error: err.message, stack: err.stack, origin });
  captureError(err, { extra: { source: "uncaughtException", origin } });
  // Winston's Console transport is synchronous, so the entry is written.
  process.exit(1);
};

export function createWorkloadRuntime(config: Config): WorkloadRuntime {
  const planOptions = { hostRoot: config.persist.hostRoot, publishedPort: config.runtime.publishedPort };
  if (config.runtime.kind === "docker") {
    return new DockerWorkloadRuntime(new Docker({ socketPath: config.runtime.socketPath }), planOptions);
  }
  return new RecordingWorkloadRuntime(planOptions);
}

async function main(): Promise<void> {
  process.on("unhandledRejection", unhandledRejectionHandler);
  process.on("uncaughtException", uncaughtExceptionHandler);

  validateRequiredEnvVars();
  const config = loadConfig();
  initSentry(config.sentryDsn, config.nodeEnv);

  const { sqlite, db } = openIdentityDatabase(config.databasePath);
  const instance = await loadOrCreateInstanceKey(config.instanceKeyPath);
  const authority = new InstanceAuthority({
    instance,
    repository: new DrizzleLifecycleRepository(db),
    serializer: new KeyedSerializer(),
    runtime: createWorkloadRuntime(config),
    allowedRoot: config.persist.allowedRoot,
    storageRetryAttempts: config.storageRetryAttempts,
  });

  // Bring the container back in line with what was committed before the restart.
  await authority.reconcile();

  const app = createApp({ authority });
  const server = serve({ fetch: app.fetch, port: config.port }, () => {
    logger.info(`instance-identity listening on http://0.0.0.0:${config.port}`, {
      instancePubkey: authority.instancePubkey,
      runtime: config.runtime.kind,
    });
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    server.close(() => {
      authority
        .whenRuntimeIdle()
        .catch((err: unknown) => logger.error("Runtime did not settle before shutdown", { err }))
        .finally(() => {
          sqlite.close();
          process.exit(0);
        });
    });
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
}

if (process.env.NODE_ENV !== "test") {
  main().catch((err: unknown) => {
    logger.error("Startup failed", { err });
    process.exit(1);
  });
}
