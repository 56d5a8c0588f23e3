import type { ErrorHandler } from "hono";
import { Hono } from "hono";
import { secureHeaders } from "hono/secure-headers";
import { logger } from "../config/logger.js";
import { isIdentityError } from "../identity/errors.js";
import type { InstanceAuthority } from "../identity/instance-authority.js";
import { captureError } from "../observability/sentry.js";
import { createHealthRoutes } from "./routes/health.js";
import { createInstanceRoutes } from "./routes/instance.js";
import { createRegistrationRoutes } from "./routes/registration.js";
import { createWorkloadRoutes } from "./routes/workload.js";

export interface AppDeps {
  authority: InstanceAuthority;
}

/**
 * Maps identity failures to their status with `{ error }` bodies. Storage
 * failures and anything unexpected are logged, reported and answered with a
 * fixed message.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  const route = c.req.path;

  if (isIdentityError(err)) {
    if (err.kind === "storage") {
      logger.error("Storage failure while handling request", { error: err.message, path: route, method: c.req.method });
      captureError(err, { route });
      return c.json({ error: "Storage unavailable" }, 500);
    }
    logger.warn("Request rejected", { kind: err.kind, error: err.message, path: route, method: c.req.method });
    return c.json({ error: err.message }, err.status);
  }

  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: route,
    method: c.req.method,
  });
  captureError(err, { route });
  return c.json({ error: "Internal server error" }, 500);
};

/** Build the HTTP gateway for one instance. */
export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  app.use("/*", secureHeaders());

  app.route("/health", createHealthRoutes(deps.authority));
  app.route("/instance", createInstanceRoutes(deps.authority));
  app.route("/", createRegistrationRoutes(deps.authority));
  app.route("/workload", createWorkloadRoutes(deps.authority));

  app.notFound((c) => c.json({ error: "Not found" }, 404));
  app.onError(errorHandler);

  return app;
}
