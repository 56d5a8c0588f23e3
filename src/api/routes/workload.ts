import { Hono } from "hono";
import type { InstanceAuthority } from "../../identity/instance-authority.js";
import { assertPayloadVersion, readJsonBody, SIGNATURE_HEADER } from "../request.js";

// Owner-signed: x-signature carries a hex signature over the canonical body.
export function createWorkloadRoutes(authority: InstanceAuthority): Hono {
  const routes = new Hono();

  routes.post("/configure", async (c) => {
    assertPayloadVersion(c);
    const body = await readJsonBody(c);
    await authority.configureWorkload({ body, signature: c.req.header(SIGNATURE_HEADER) });
    return c.json({ status: "success" });
  });

  routes.post("/expose", async (c) => {
    assertPayloadVersion(c);
    const body = await readJsonBody(c);
    await authority.exposeWorkload({ body, signature: c.req.header(SIGNATURE_HEADER) });
    return c.json({ status: "success" });
  });

  return routes;
}
