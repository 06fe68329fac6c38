import {
  createAgentRequestHandler,
  createOrchestratorContext,
  routerSkill,
} from "@relaydesk/core";
import type { RouterPluginConfig, RouterPluginInstance } from "./types.js";
import { configureOpenAPI } from "./lib/configure-openapi.js";
import { createAgentApp } from "./lib/agent-app.js";
import { buildRouterCard } from "./lib/router-card.js";
import { createOrchestrateRoutes } from "./routes/orchestrate/orchestrate.routes.js";

export function createRouterPlugin(config: RouterPluginConfig): RouterPluginInstance {
  const ctx = createOrchestratorContext(config);
  const publicUrl = config.publicUrl ?? "http://localhost:8010";

  const handler = createAgentRequestHandler({
    card: config.card ?? buildRouterCard(`${publicUrl}/rpc`),
    skill: routerSkill(ctx),
    tasks: ctx.tasks,
  });

  // Health, agent card and JSON-RPC
  const app = createAgentApp(handler);

  app.route("/orchestrate", createOrchestrateRoutes(ctx));

  configureOpenAPI(app, { serverUrl: config.publicUrl, ...config.openapi });

  console.log(
    `[relaydesk] Router ready: ${ctx.capabilities.list().length} capabilities, planner ${ctx.planOracle ? "enabled" : "disabled (fallback plan only)"}`,
  );

  return { app, ctx, handler };
}
