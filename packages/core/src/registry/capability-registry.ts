import { CAPABILITIES, type Capability } from "../plan/types.js";

export interface CapabilityRegistration {
  name: Capability;
  /** JSON-RPC endpoint, e.g. http://127.0.0.1:8011/rpc */
  endpoint: string;
  description: string;
}

export const DEFAULT_DESCRIPTIONS: Record<Capability, string> = {
  data: "fetches customer records, history and tickets; expects request, customer_id, email",
  support: "writes customer-facing replies; expects request, customer_id, email, data_context",
  billing: "answers billing and refund questions; expects request, data_context, billing_issue",
};

export function describeCapabilities(entries: Array<{ name: string; description: string }>): string {
  return entries.map((c) => `- ${c.name}: ${c.description}`).join("\n");
}

export class CapabilityRegistry {
  private capabilities = new Map<Capability, CapabilityRegistration>();

  constructor(endpoints?: Record<Capability, string>) {
    if (!endpoints) return;
    for (const name of CAPABILITIES) {
      this.register({ name, endpoint: endpoints[name], description: DEFAULT_DESCRIPTIONS[name] });
    }
  }

  register(registration: CapabilityRegistration) {
    this.capabilities.set(registration.name, registration);
  }

  get(name: Capability): CapabilityRegistration | undefined {
    return this.capabilities.get(name);
  }

  list(): CapabilityRegistration[] {
    return [...this.capabilities.values()];
  }

  /** One line per capability, for the planner instruction */
  describe(): string {
    return describeCapabilities(this.list());
  }
}
