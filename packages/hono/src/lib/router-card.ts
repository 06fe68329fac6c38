import type { AgentCard } from "@relaydesk/core";

export function buildRouterCard(url: string): AgentCard {
  return {
    name: "Customer Service Router",
    description: "Plans each customer request, calls the data, support and billing agents and composes one answer",
    url,
    version: "0.1.0",
    skills: [
      {
        id: "route-customer-request",
        name: "Route customer request",
        description: "Answers account, support and billing questions by coordinating specialist agents",
        tags: ["router", "customer-service"],
        inputModes: ["text/plain"],
        outputModes: ["text/plain"],
        examples: ["Get customer information for ID 5", "I was charged twice, please refund me"],
      },
    ],
    defaultInputModes: ["text/plain"],
    defaultOutputModes: ["text/plain"],
    capabilities: { streaming: true },
    provider: { organization: "Relaydesk", url },
    preferredTransport: "JSONRPC",
  };
}
