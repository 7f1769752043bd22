/**
 * Health check route.
 *
 * GET /health  Liveness check, with the module's current nonce
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { MultisigService } from "../services/multisig-service.js";

export function createHealthRoutes(service: MultisigService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      nonce: service.state().nonce,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
