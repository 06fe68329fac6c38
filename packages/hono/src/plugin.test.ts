import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { z } from "zod";
import { buildTextMessage, CAPABILITIES, type Capability } from "@relaydesk/core";
import { createSpecialists } from "@relaydesk/specialists";
import { createAgentApp } from "./lib/agent-app.js";
import { createRouterPlugin } from "./plugin.js";

const URLS: Record<Capability, string> = {
  data: "http://data.test/rpc",
  support: "http://support.test/rpc",
  billing: "http://billing.test/rpc",
};

const EXPECTED_REPLY = [
  "Hi there, I took a look at the recent notes on your account.",
  "Account Eli Novak is currently active. Latest ticket #6 (open): Charged twice for March subscription.",
  "Here's what I'd suggest for \"Get customer information for ID 5\":",
  "- Let me know any specifics you want us to double-check.",
  "- We can schedule a quick follow-up if you'd like more help.",
  "- If you need urgent assistance, reply here and we'll prioritize your request.",
  "We're here to help. Reply to this message if you'd like me to take action now.",
].join("\n");

/** Routes capability calls to specialist apps running in this process. */
function inProcessFetch(): typeof fetch {
  const specialists = createSpecialists({ urls: URLS });
  const apps = {
    data: createAgentApp(specialists.data),
    support: createAgentApp(specialists.support),
    billing: createAgentApp(specialists.billing),
  };
  return async (input, init) => {
    const request = new Request(input, init);
    const name = CAPABILITIES.find((c) => URLS[c] === request.url);
    if (!name) throw new TypeError("fetch failed");
    return apps[name].fetch(request);
  };
}

function createRouter() {
  return createRouterPlugin({ capabilities: URLS, fetch: inProcessFetch(), publicUrl: "http://router.test" }).app;
}

function post(app: ReturnType<typeof createRouter>, path: string, body: unknown) {
  return app.request(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("createRouterPlugin", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("answers through the fallback plan with real specialists", async () => {
    const res = await post(createRouter(), "/orchestrate", { message: "Get customer information for ID 5" });

    expect(res.status).toBe(200);
    const body = z
      .object({ response: z.string(), planSource: z.string(), log: z.array(z.string()), hints: z.unknown() })
      .parse(await res.json());
    expect(body.response).toBe(EXPECTED_REPLY);
    expect(body.planSource).toBe("fallback");
    expect(body.hints).toEqual({ customerId: 5, email: null });
    expect(body.log.slice(1)).toEqual([
      "Router -> data: dispatched",
      "data -> Router: completed",
      "Router -> support: dispatched",
      "support -> Router: completed",
    ]);
  });

  it("streams progress as server-sent events", async () => {
    const res = await post(createRouter(), "/orchestrate?format=sse", { message: "Get customer information for ID 5" });

    expect(res.headers.get("Content-Type")).toBe("text/event-stream");
    const text = await res.text();
    expect(text.startsWith("id: 0\nevent: session:start\n")).toBe(true);
    expect(text).toContain("event: router:plan\n");
    expect(text).toContain(`event: text-delta\ndata: ${JSON.stringify({ text: EXPECTED_REPLY })}\n\n`);
    expect(text).toContain("event: done\n");
  });

  it("streams when the client accepts an event stream", async () => {
    const res = await createRouter().request("/orchestrate", {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "text/event-stream" },
      body: JSON.stringify({ message: "Get customer information for ID 5", runId: "run_accept" }),
    });

    expect(res.headers.get("Content-Type")).toBe("text/event-stream");
    expect(await res.text()).toContain(`event: session:start\ndata: ${JSON.stringify({ runId: "run_accept" })}\n\n`);
  });

  it("rejects requests without a message", async () => {
    const res = await post(createRouter(), "/orchestrate", {});
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Request body must be JSON with a non-empty "message"' });
  });

  it("serves the router over JSON-RPC", async () => {
    const res = await post(createRouter(), "/rpc", {
      jsonrpc: "2.0",
      id: "r1",
      method: "message/send",
      params: { message: buildTextMessage("Get customer information for ID 5", "user") },
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      id: "r1",
      result: { status: { state: "completed", message: { parts: [{ text: EXPECTED_REPLY }] } } },
    });
  });

  it("advertises its card and OpenAPI document", async () => {
    const app = createRouter();

    const card = await app.request("/.well-known/agent-card.json");
    expect(await card.json()).toMatchObject({ name: "Customer Service Router", url: "http://router.test/rpc" });

    const doc = z
      .object({ openapi: z.string(), servers: z.unknown(), paths: z.record(z.unknown()) })
      .parse(await (await app.request("/doc")).json());
    expect(doc.openapi).toBe("3.1.0");
    expect(doc.servers).toEqual([{ url: "http://router.test", description: "Router" }]);
    expect(Object.keys(doc.paths)).toEqual(expect.arrayContaining(["/rpc", "/.well-known/agent-card.json"]));
  });
});
