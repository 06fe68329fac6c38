import { createRoute, z } from "@hono/zod-openapi";
import { OpenAPIHono } from "@hono/zod-openapi";
import type { AgentCard } from "@relaydesk/core";

export function createHealthRoutes(card: AgentCard) {
  const router = new OpenAPIHono();

  router.openapi(
    createRoute({
      method: "get",
      path: "/",
      tags: ["Health"],
      summary: "Health check",
      responses: {
        200: {
          description: "Server is healthy",
          content: {
            "application/json": {
              schema: z.object({
                status: z.string(),
                timestamp: z.string(),
                agent: z.string(),
                skills: z.number(),
              }),
            },
          },
        },
      },
    }),
    (c) => {
      return c.json({
        status: "ok",
        timestamp: new Date().toISOString(),
        agent: card.name,
        skills: card.skills.length,
      }, 200);
    },
  );

  return router;
}
