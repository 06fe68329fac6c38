import { readFileSync } from "node:fs";
import { z } from "zod";

export const customerSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  email: z.string().nullable(),
  phone: z.string().nullable(),
  status: z.enum(["active", "disabled"]),
});

export const ticketSchema = z.object({
  id: z.number().int().positive(),
  customer_id: z.number().int().positive(),
  issue: z.string(),
  status: z.enum(["open", "in_progress", "resolved"]),
  priority: z.enum(["low", "medium", "high"]),
  created_at: z.string(),
});

export const customerSeedSchema = z.object({
  customers: z.array(customerSchema),
  tickets: z.array(ticketSchema),
});

export type Customer = z.infer<typeof customerSchema>;
export type Ticket = z.infer<typeof ticketSchema>;
export type TicketPriority = Ticket["priority"];
export type CustomerSeed = z.infer<typeof customerSeedSchema>;
export type CustomerUpdate = Partial<Pick<Customer, "name" | "email" | "phone" | "status">>;

const SEED_FILE = new URL("../data/customers.json", import.meta.url);

export function loadCustomerSeed(file: URL = SEED_FILE): CustomerSeed {
  return customerSeedSchema.parse(JSON.parse(readFileSync(file, "utf-8")));
}

export interface CustomerStoreOptions {
  /** Clock used for `created_at` on new tickets */
  now?: () => Date;
}

/**
 * Customers and their tickets, held in memory. Every read returns copies so
 * callers cannot mutate the store.
 */
export class CustomerStore {
  private customers = new Map<number, Customer>();
  private tickets = new Map<number, Ticket>();
  private readonly now: () => Date;

  constructor(seed: CustomerSeed = loadCustomerSeed(), options: CustomerStoreOptions = {}) {
    for (const c of seed.customers) this.customers.set(c.id, { ...c });
    for (const t of seed.tickets) this.tickets.set(t.id, { ...t });
    this.now = options.now ?? (() => new Date());
  }

  getCustomer(id: number): Customer | undefined {
    const customer = this.customers.get(id);
    return customer && { ...customer };
  }

  /** Ordered by id. */
  listCustomers({ status, limit = 20 }: { status?: Customer["status"]; limit?: number } = {}): Customer[] {
    return [...this.customers.values()]
      .filter((c) => !status || c.status === status)
      .sort((a, b) => a.id - b.id)
      .slice(0, limit)
      .map((c) => ({ ...c }));
  }

  /** Applies the given fields; returns `undefined` when the customer does not exist. */
  updateCustomer(id: number, update: CustomerUpdate): Customer | undefined {
    const current = this.customers.get(id);
    if (!current) return undefined;
    const fields = Object.fromEntries(Object.entries(update).filter(([, v]) => v !== undefined));
    const next = customerSchema.parse({ ...current, ...fields });
    this.customers.set(id, next);
    return { ...next };
  }

  /** Returns `undefined` when the customer does not exist. */
  createTicket(customerId: number, issue: string, priority: TicketPriority = "medium"): Ticket | undefined {
    if (!this.customers.has(customerId)) return undefined;
    const id = Math.max(0, ...this.tickets.keys()) + 1;
    const ticket: Ticket = {
      id,
      customer_id: customerId,
      issue,
      status: "open",
      priority,
      created_at: this.now().toISOString(),
    };
    this.tickets.set(id, ticket);
    return { ...ticket };
  }

  /** Tickets for one customer, newest first. */
  getCustomerHistory(customerId: number): Ticket[] {
    return [...this.tickets.values()]
      .filter((t) => t.customer_id === customerId)
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .map((t) => ({ ...t }));
  }
}
