import type { OpenAPIHono } from "@hono/zod-openapi";
import type { AgentCard, AgentRequestHandler, CoreConfig, OrchestratorContext } from "@relaydesk/core";
import type { OpenAPIConfig } from "./lib/configure-openapi.js";

export interface RouterPluginConfig extends CoreConfig {
  /** Public base URL advertised in the router's agent card */
  publicUrl?: string;
  /** Replaces the default router agent card */
  card?: AgentCard;
  openapi?: OpenAPIConfig;
}

export interface RouterPluginInstance {
  app: OpenAPIHono;
  ctx: OrchestratorContext;
  /** JSON-RPC handler behind `/rpc` */
  handler: AgentRequestHandler;
}
