import type { Context } from "hono";
import type { AgentRequest } from "@relaydesk/core";

/**
 * Builds the router's view of a Hono request. Streaming is chosen with
 * `?format=sse` or an `Accept: text/event-stream` header.
 */
export function toAgentRequest(c: Context): AgentRequest {
  const accept = c.req.header("Accept") ?? "";
  return {
    json: () => c.req.json<unknown>(),
    wantsEventStream: c.req.query("format") === "sse" || accept.includes("text/event-stream"),
    signal: c.req.raw.signal,
  };
}
