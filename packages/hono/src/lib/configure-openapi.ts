import { apiReference } from "@scalar/hono-api-reference";
import type { OpenAPIHono } from "@hono/zod-openapi";

export interface OpenAPIConfig {
  title?: string;
  version?: string;
  description?: string;
  /** Advertised as the single server entry */
  serverUrl?: string;
}

const TAGS = [
  { name: "Router", description: "Plan, run and answer customer requests" },
  { name: "Agent", description: "Agent card and JSON-RPC endpoint" },
  { name: "Health", description: "Liveness" },
];

/** Serves the OpenAPI document at `/doc` and the Scalar reference UI at `/reference`. */
export function configureOpenAPI(app: OpenAPIHono, config: OpenAPIConfig = {}) {
  const {
    title = "Relaydesk Router API",
    version = "0.1.0",
    description = "Plans and runs customer-support requests across specialist agents",
    serverUrl,
  } = config;

  app.doc("/doc", {
    openapi: "3.1.0",
    info: { title, version, description },
    tags: TAGS,
    ...(serverUrl ? { servers: [{ url: serverUrl, description: "Router" }] } : {}),
  });

  app.get(
    "/reference",
    apiReference({
      url: "/doc",
      theme: "kepler",
      pageTitle: `${title} - API Reference`,
    })
  );
}
