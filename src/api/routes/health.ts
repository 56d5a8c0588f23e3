import { Hono } from "hono";
import { logger } from "../../config/logger.js";
import { StorageError } from "../../identity/errors.js";
import type { InstanceAuthority } from "../../identity/instance-authority.js";
import type { LifecycleState } from "../../identity/lifecycle-state-machine.js";

// Public, unauthenticated; used by the supervisor and monitoring.
export function createHealthRoutes(authority: InstanceAuthority): Hono {
  const routes = new Hono();

  routes.get("/", (c) => {
    const health: { status: "ok" | "degraded"; service: string; state: LifecycleState | null } = {
      status: "ok",
      service: "instance-identity",
      state: null,
    };

    try {
      health.state = authority.getRecord().state;
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      logger.warn("Health check could not read lifecycle record", { error: err.message });
      health.status = "degraded";
    }

    return c.json(health);
  });

  return routes;
}
