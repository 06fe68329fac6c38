import type { AgentCard, AgentSkill, Capability } from "@relaydesk/core";

function specialistCard(url: string, card: { name: string; description: string; skill: AgentSkill }): AgentCard {
  return {
    name: card.name,
    description: card.description,
    url,
    version: "0.1.0",
    skills: [card.skill],
    defaultInputModes: ["application/json"],
    defaultOutputModes: ["application/json"],
    capabilities: { streaming: true },
    provider: { organization: "Relaydesk", url },
    preferredTransport: "JSONRPC",
  };
}

export const SPECIALIST_CARDS: Record<Capability, (url: string) => AgentCard> = {
  data: (url) => specialistCard(url, {
    name: "Customer Data Agent",
    description: "Reads and updates customer records and support tickets",
    skill: {
      id: "customer-data",
      name: "Customer records",
      description: "Fetches customers and their ticket history, updates emails, opens tickets",
      tags: ["data", "customers", "tickets"],
      inputModes: ["application/json"],
      outputModes: ["application/json"],
      examples: ['{"request":"Get customer information for ID 5","customer_id":5}'],
    },
  }),
  support: (url) => specialistCard(url, {
    name: "Support Agent",
    description: "Writes customer-facing replies for non-billing support cases",
    skill: {
      id: "support-general",
      name: "General support",
      description: "Answers product and troubleshooting questions with practical next steps",
      tags: ["support", "triage"],
      inputModes: ["application/json"],
      outputModes: ["application/json"],
      examples: ['{"request":"I cannot log in","data_context":{}}'],
    },
  }),
  billing: (url) => specialistCard(url, {
    name: "Billing Agent",
    description: "Handles billing disputes and refund requests",
    skill: {
      id: "billing",
      name: "Billing",
      description: "Acknowledges charges, refunds and invoice questions",
      tags: ["billing", "payments"],
      inputModes: ["application/json"],
      outputModes: ["application/json"],
      examples: ['{"request":"I was charged twice","billing_issue":"duplicate charge"}'],
    },
  }),
};
