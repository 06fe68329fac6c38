import { createRoute, z } from "@hono/zod-openapi";
import { OpenAPIHono } from "@hono/zod-openapi";
import { createRouterHandlers, routerRequestSchema, routerResponseSchema } from "@relaydesk/core";
import type { OrchestratorContext } from "@relaydesk/core";
import { toAgentRequest } from "../../adapters/request-adapter.js";

export function createOrchestrateRoutes(ctx: OrchestratorContext) {
  const router = new OpenAPIHono();
  const { handle } = createRouterHandlers(ctx);

  router.openAPIRegistry.registerPath(
    createRoute({
      method: "post",
      path: "/",
      tags: ["Router"],
      summary: "Answer a customer request",
      description: "Plans, calls the specialists and composes one answer. Use ?format=sse or Accept: text/event-stream to stream progress.",
      request: {
        query: z.object({ format: z.enum(["json", "sse"]).optional() }),
        body: { content: { "application/json": { schema: routerRequestSchema } } },
      },
      responses: {
        200: { description: "Composed answer", content: { "application/json": { schema: routerResponseSchema } } },
        400: { description: "Invalid body", content: { "application/json": { schema: z.object({ error: z.string() }) } } },
      },
    }),
  );

  router.post("/", (c) => handle(toAgentRequest(c)));

  return router;
}
