import { serve } from "@hono/node-server";
import { createOpenAI } from "@ai-sdk/openai";
import { CAPABILITIES } from "@relaydesk/core";
import { createSpecialists } from "@relaydesk/specialists";
import { loadServerConfig } from "./config.js";
import { createAgentApp } from "./lib/agent-app.js";
import { createRouterPlugin } from "./plugin.js";

const config = loadServerConfig();

const specialists = createSpecialists({ urls: config.capabilities });
CAPABILITIES.forEach((name, i) => {
  const port = config.specialistBasePort + i;
  serve({ fetch: createAgentApp(specialists[name]).fetch, port, hostname: config.host });
  console.log(`[relaydesk] ${name} agent listening on http://${config.host}:${port}`);
});

const openai = config.openaiApiKey ? createOpenAI({ apiKey: config.openaiApiKey }) : undefined;
if (!openai) console.log("[relaydesk] OPENAI_API_KEY not set; every request uses the fallback plan");

const publicUrl = `http://${config.host}:${config.port}`;
const router = createRouterPlugin({
  capabilities: config.capabilities,
  model: openai ? (id) => openai(id ?? config.modelId) : undefined,
  modelId: config.modelId,
  policy: config.policy,
  debugTrace: config.debugTrace,
  publicUrl,
});

serve({ fetch: router.app.fetch, port: config.port, hostname: config.host });
console.log(`[relaydesk] Router listening on ${publicUrl} (docs at ${publicUrl}/reference)`);
