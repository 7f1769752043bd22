/**
 * Multisig routes.
 *
 * GET  /api/v1/multisig                     Domain, nonce and quorum
 * GET  /api/v1/multisig/signers/:address    Trust status of one address
 * POST /api/v1/multisig/digest              Signing request for an action at the current nonce
 * POST /api/v1/multisig/execute             Submit an external call
 * POST /api/v1/multisig/quorum              Submit a quorum change
 * POST /api/v1/multisig/signers             Submit a trust change
 * GET  /api/v1/multisig/events              Recorded events (cursor pagination)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ActionSchema,
  ExecuteSchema,
  ListEventsQuerySchema,
  SetQuorumSchema,
  SetSignerSchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { paginate } from "../types/pagination.js";

export function createMultisigRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").state() });
  });

  routes.get("/signers/:address", (c) => {
    const service = c.get("service");
    return c.json({ data: service.signer(c.req.param("address")) });
  });

  routes.post("/digest", validateBody(ActionSchema), (c) => {
    const service = c.get("service");
    return c.json({ data: service.signingRequest(c.req.valid("json")) });
  });

  routes.post("/execute", validateBody(ExecuteSchema), async (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");

    const recorded = await service.execute(body.target, body.value, body.payload, body.signatures);
    return c.json({ data: recorded });
  });

  routes.post("/quorum", validateBody(SetQuorumSchema), async (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");

    const recorded = await service.setQuorum(body.quorum, body.signatures);
    return c.json({ data: recorded });
  });

  routes.post("/signers", validateBody(SetSignerSchema), async (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");

    const recorded = await service.setSigner(body.signer, body.trusted, body.signatures);
    return c.json({ data: recorded });
  });

  routes.get("/events", validateQuery(ListEventsQuerySchema), (c) => {
    const service = c.get("service");
    const query = c.req.valid("query");

    const events = service
      .events()
      .filter((e) => query.type === undefined || e.event.type === query.type);

    return c.json(
      paginate(
        events,
        { cursor: query.cursor, limit: query.limit },
        (e) => e.sequence,
        "sequence",
      ),
    );
  });

  return routes;
}
