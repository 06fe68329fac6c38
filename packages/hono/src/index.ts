// Re-export everything from core so apps need a single import
export * from "@relaydesk/core";

// Hono-specific exports
export { createRouterPlugin } from "./plugin.js";
export type { RouterPluginConfig, RouterPluginInstance } from "./types.js";
export { createAgentApp, applyErrorHandlers } from "./lib/agent-app.js";
export { buildRouterCard } from "./lib/router-card.js";
export { configureOpenAPI } from "./lib/configure-openapi.js";
export type { OpenAPIConfig } from "./lib/configure-openapi.js";
export { createAgentRpcRoutes } from "./routes/rpc/rpc.routes.js";
export { createOrchestrateRoutes } from "./routes/orchestrate/orchestrate.routes.js";
export { createHealthRoutes } from "./routes/health/health.route.js";
export { loadServerConfig } from "./config.js";
export type { ServerConfig } from "./config.js";
export { toAgentRequest } from "./adapters/request-adapter.js";
