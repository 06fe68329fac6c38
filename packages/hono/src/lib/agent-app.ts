import { OpenAPIHono } from "@hono/zod-openapi";
import { HTTPException } from "hono/http-exception";
import { RpcMethodError } from "@relaydesk/core";
import type { AgentRequestHandler } from "@relaydesk/core";
import { createHealthRoutes } from "../routes/health/health.route.js";
import { createAgentRpcRoutes } from "../routes/rpc/rpc.routes.js";

/** `{ error }` bodies for thrown errors and unknown routes. */
export function applyErrorHandlers(app: OpenAPIHono) {
  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status);
    }
    if (err instanceof RpcMethodError) {
      return c.json({ error: err.message }, err.status);
    }

    console.error(err);
    return c.json({ error: "Internal Server Error" }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: "Not Found" }, 404);
  });
}

/** Hono app serving one JSON-RPC agent: health, agent card and `/rpc`. */
export function createAgentApp(handler: AgentRequestHandler): OpenAPIHono {
  const app = new OpenAPIHono();
  applyErrorHandlers(app);
  app.route("/health", createHealthRoutes(handler.card));
  app.route("/", createAgentRpcRoutes(handler));
  return app;
}
