import {
  CAPABILITIES,
  createAgentRequestHandler,
  createInMemoryTaskStore,
  type AgentRequestHandler,
  type AgentSkillHandler,
  type Capability,
} from "@relaydesk/core";
import { CustomerStore } from "./customer-store.js";
import { createDataSkill } from "./data-agent.js";
import { createSupportSkill } from "./support-agent.js";
import { createBillingSkill } from "./billing-agent.js";
import { SPECIALIST_CARDS } from "./cards.js";

export interface SpecialistsConfig {
  /** Public JSON-RPC URL of each specialist, advertised in its agent card */
  urls: Record<Capability, string>;
  /** Backing store for the data agent (default: seeded from data/customers.json) */
  store?: CustomerStore;
}

/** One JSON-RPC handler per specialist, each with its own task store. */
export function createSpecialists({ urls, store = new CustomerStore() }: SpecialistsConfig): Record<Capability, AgentRequestHandler> {
  const skills: Record<Capability, AgentSkillHandler> = {
    data: createDataSkill(store),
    support: createSupportSkill(),
    billing: createBillingSkill(),
  };
  const handler = (name: Capability) =>
    createAgentRequestHandler({ card: SPECIALIST_CARDS[name](urls[name]), skill: skills[name], tasks: createInMemoryTaskStore() });

  console.log(`[specialists] Ready: ${CAPABILITIES.join(", ")}`);
  return { data: handler("data"), support: handler("support"), billing: handler("billing") };
}

export { CustomerStore, loadCustomerSeed, customerSeedSchema } from "./customer-store.js";
export type { Customer, Ticket, TicketPriority, CustomerSeed, CustomerUpdate, CustomerStoreOptions } from "./customer-store.js";
export { createDataSkill, INVALID_REQUEST_REASON } from "./data-agent.js";
export type { DataTool, ToolCallRecord } from "./data-agent.js";
export { createSupportSkill, buildSuggestions, summarizeContext } from "./support-agent.js";
export { createBillingSkill, buildBillingReply } from "./billing-agent.js";
export { SPECIALIST_CARDS } from "./cards.js";
