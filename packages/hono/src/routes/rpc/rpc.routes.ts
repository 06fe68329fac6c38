import { createRoute, z } from "@hono/zod-openapi";
import { OpenAPIHono } from "@hono/zod-openapi";
import { stream } from "hono/streaming";
import { agentCardSchema, dispatchRpc, rpcRequestSchema } from "@relaydesk/core";
import type { AgentRequestHandler, Task, TaskStatusUpdateEvent } from "@relaydesk/core";

const errorSchema = z.object({ error: z.string() });

function rpcResult(id: string | number | null | undefined, result: Task | TaskStatusUpdateEvent) {
  return { jsonrpc: "2.0" as const, id: id ?? null, result };
}

/**
 * Agent card discovery plus the JSON-RPC endpoint. Unknown methods and
 * missing tasks surface as `RpcMethodError` and are mapped by the app's
 * error handler.
 */
export function createAgentRpcRoutes(handler: AgentRequestHandler) {
  const router = new OpenAPIHono();

  // GET /.well-known/agent-card.json
  router.openapi(
    createRoute({
      method: "get",
      path: "/.well-known/agent-card.json",
      tags: ["Agent"],
      summary: "Agent card",
      description: "Describes the agent, its skills and its JSON-RPC endpoint",
      responses: {
        200: {
          description: "Agent card",
          content: { "application/json": { schema: agentCardSchema } },
        },
      },
    }),
    (c) => c.json(handler.card, 200),
  );

  // POST /rpc: documented here, served by the plain handler below (it may stream)
  router.openAPIRegistry.registerPath(
    createRoute({
      method: "post",
      path: "/rpc",
      tags: ["Agent"],
      summary: "JSON-RPC endpoint",
      description: "message/send, message/send_stream (NDJSON), tasks/get, tasks/cancel",
      request: { body: { content: { "application/json": { schema: rpcRequestSchema } } } },
      responses: {
        200: { description: "JSON-RPC response, or NDJSON status events for message/send_stream" },
        400: { description: "Malformed request or params", content: { "application/json": { schema: errorSchema } } },
        404: { description: "Unknown method or task", content: { "application/json": { schema: errorSchema } } },
      },
    }),
  );

  router.post("/rpc", async (c) => {
    const body = await c.req.json<unknown>().catch(() => undefined);
    const parsed = rpcRequestSchema.safeParse(body);
    if (!parsed.success) return c.json({ error: "Invalid JSON-RPC request" }, 400);
    const request = parsed.data;

    if (request.method !== "message/send_stream") {
      const result = await dispatchRpc(handler, request);
      return c.json(rpcResult(request.id, result));
    }

    const events = handler.onMessageSendStream(request.params);
    // Pull the first event before streaming so bad params still get a 400
    const first = await events.next();
    c.header("Content-Type", "application/x-ndjson");
    return stream(
      c,
      async (out) => {
        if (!first.done) await out.write(`${JSON.stringify(rpcResult(request.id, first.value))}\n`);
        for await (const event of events) {
          await out.write(`${JSON.stringify(rpcResult(request.id, event))}\n`);
        }
      },
      async (err) => {
        console.error("[rpc] stream failed:", err.message);
      },
    );
  });

  return router;
}
