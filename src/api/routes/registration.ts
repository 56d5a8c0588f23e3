import { Hono } from "hono";
import type { InstanceAuthority } from "../../identity/instance-authority.js";
import { readRegistrationBody, TOKEN_HEADER } from "../request.js";

/**
 * Principal registration. Both bodies are `{ pubkey, signature }`: a hex
 * Ed25519 key and its signature over the raw instance public key.
 */
export function createRegistrationRoutes(authority: InstanceAuthority): Hono {
  const routes = new Hono();

  routes.post("/operator/register", async (c) => {
    const body = await readRegistrationBody(c);
    const { ownerToken } = await authority.registerOperator(body);
    return c.json({ status: "success", owner_token: ownerToken });
  });

  routes.post("/owner/register", async (c) => {
    const body = await readRegistrationBody(c);
    await authority.registerOwner({ ...body, token: c.req.header(TOKEN_HEADER) });
    return c.json({ status: "success" });
  });

  return routes;
}
