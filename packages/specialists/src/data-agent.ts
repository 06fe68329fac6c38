import { jsonSkill, type AgentSkillHandler } from "@relaydesk/core";
import type { Customer, CustomerStore, Ticket, TicketPriority } from "./customer-store.js";

export type DataTool = "get_customer" | "list_customers" | "update_customer" | "create_ticket" | "get_customer_history";

export interface ToolCallRecord {
  tool: DataTool;
  args: Record<string, unknown>;
  result: unknown;
}

export const INVALID_REQUEST_REASON = "Invalid structured request: expected JSON with request, customer_id, and email.";

const OPEN_STATES = new Set<Ticket["status"]>(["open", "in_progress"]);
const ACTIVE_REPORT_LIMIT = 50;

function toCustomerId(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value) && value > 0) return value;
  if (typeof value === "string" && /^\d+$/.test(value.trim())) return Number(value.trim());
  return null;
}

function toIdFilter(value: unknown): Set<number> | null {
  if (!Array.isArray(value)) return null;
  const ids = value.map(toCustomerId).filter((id): id is number => id !== null);
  return ids.length > 0 ? new Set(ids) : null;
}

function ticketRequest(request: string): { issue: string; priority: TicketPriority } | null {
  if (!/\b(open|create|file|raise)\b[\s\S]*\bticket\b/i.test(request)) return null;
  return { issue: request, priority: /\b(urgent|asap|immediately)\b/i.test(request) ? "high" : "medium" };
}

/**
 * Looks up and updates customer records. With an id and an email the email
 * is updated; with only an id the record and history are fetched; without an
 * id it reports active customers that have open tickets.
 */
export function createDataSkill(store: CustomerStore): AgentSkillHandler {
  return jsonSkill((input) => {
    if (!input) return { handled: false, reason: INVALID_REQUEST_REASON };

    const request = typeof input.request === "string" ? input.request : "";
    const customerId = toCustomerId(input.customer_id);
    const email = typeof input.email === "string" && input.email.trim() ? input.email.trim() : null;

    const calls: ToolCallRecord[] = [];
    const record = <T>(tool: DataTool, args: Record<string, unknown>, result: T): T => {
      calls.push({ tool, args, result });
      return result;
    };

    const summaries: string[] = [];
    let dataContext: Record<string, unknown>;

    if (customerId !== null && email) {
      const updated = record(
        "update_customer",
        { customer_id: customerId, data: { email } },
        store.updateCustomer(customerId, { email }) ?? null,
      );
      const history = record("get_customer_history", { customer_id: customerId }, store.getCustomerHistory(customerId));
      dataContext = { customer_id: customerId, email, updated, history };
      summaries.push(updated
        ? `Updated email and retrieved history for customer ${customerId}`
        : `No customer found with id ${customerId}`);
    } else if (customerId !== null) {
      const customer = record("get_customer", { customer_id: customerId }, store.getCustomer(customerId) ?? null);
      const history = record("get_customer_history", { customer_id: customerId }, store.getCustomerHistory(customerId));
      dataContext = { customer, history };
      summaries.push(customer
        ? `Fetched customer record and history for ${customerId}`
        : `No customer found with id ${customerId}`);

      const ticket = customer ? ticketRequest(request) : null;
      if (ticket) {
        const created = record(
          "create_ticket",
          { customer_id: customerId, issue: ticket.issue, priority: ticket.priority },
          store.createTicket(customerId, ticket.issue, ticket.priority) ?? null,
        );
        dataContext = { ...dataContext, created_ticket: created };
        if (created) summaries.push(`Opened ticket #${created.id}`);
      }
    } else {
      const only = toIdFilter(input.customer_ids);
      const active = record(
        "list_customers",
        { status: "active", limit: ACTIVE_REPORT_LIMIT },
        store.listCustomers({ status: "active", limit: ACTIVE_REPORT_LIMIT }),
      ).filter((c) => !only || only.has(c.id));

      const report: Array<{ customer: Customer; open_tickets: Ticket[] }> = [];
      for (const customer of active) {
        const history = record("get_customer_history", { customer_id: customer.id }, store.getCustomerHistory(customer.id));
        const open = history.filter((t) => OPEN_STATES.has(t.status));
        if (open.length > 0) report.push({ customer, open_tickets: open });
      }
      dataContext = { active_customers_with_open_tickets: report };
      summaries.push(`Compiled report for ${report.length} active customers with open tickets`);
    }

    return {
      handled: true,
      summary: summaries.join("; "),
      data_context: dataContext,
      tool_calls_executed: calls,
      request,
      customer_id: customerId,
      email,
    };
  });
}
