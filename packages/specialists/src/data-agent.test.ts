import { describe, it, expect } from "vitest";
import { buildTextMessage, messageText } from "@relaydesk/core";
import { CustomerStore, loadCustomerSeed } from "./customer-store.js";
import { createDataSkill, INVALID_REQUEST_REASON } from "./data-agent.js";

function setup() {
  const store = new CustomerStore(loadCustomerSeed(), { now: () => new Date("2026-04-01T00:00:00.000Z") });
  const skill = createDataSkill(store);
  const ask = async (input: unknown): Promise<unknown> => {
    const text = typeof input === "string" ? input : JSON.stringify(input);
    return JSON.parse(messageText(await skill(buildTextMessage(text, "user"))));
  };
  return { store, ask };
}

describe("createDataSkill", () => {
  it("fetches the record and history for a customer id", async () => {
    const { ask } = setup();
    const reply = await ask({ request: "Get customer information for ID 5", customer_id: 5, email: null });

    expect(reply).toMatchObject({
      handled: true,
      summary: "Fetched customer record and history for 5",
      data_context: { customer: { id: 5, name: "Eli Novak" }, history: [{ id: 6 }, { id: 7 }] },
      tool_calls_executed: [{ tool: "get_customer" }, { tool: "get_customer_history" }],
      customer_id: 5,
      email: null,
    });
  });

  it("reports unknown customers", async () => {
    const { ask } = setup();
    expect(await ask({ request: "Who is 99?", customer_id: 99 })).toMatchObject({
      summary: "No customer found with id 99",
      data_context: { customer: null, history: [] },
    });
  });

  it("updates the email when one is given", async () => {
    const { store, ask } = setup();
    const reply = await ask({ request: "Update my email", customer_id: "2", email: " new@example.com " });

    expect(reply).toMatchObject({
      summary: "Updated email and retrieved history for customer 2",
      customer_id: 2,
      email: "new@example.com",
      tool_calls_executed: [{ tool: "update_customer", args: { customer_id: 2, data: { email: "new@example.com" } } }, { tool: "get_customer_history" }],
    });
    expect(store.getCustomer(2)?.email).toBe("new@example.com");
  });

  it("opens a ticket when asked to", async () => {
    const { store, ask } = setup();
    const reply = await ask({ request: "Please open an urgent ticket about refunds", customer_id: 5 });

    expect(reply).toMatchObject({
      summary: "Fetched customer record and history for 5; Opened ticket #11",
      data_context: { created_ticket: { id: 11, priority: "high", status: "open" } },
    });
    expect(store.getCustomerHistory(5)[0].id).toBe(11);
  });

  it("reports active customers with open tickets when no id is given", async () => {
    const { ask } = setup();
    const reply = await ask({ request: "Which active customers have open tickets?" });

    expect(reply).toMatchObject({
      summary: "Compiled report for 4 active customers with open tickets",
      customer_id: null,
    });
    expect(reply).toHaveProperty("data_context.active_customers_with_open_tickets.length", 4);
  });

  it("restricts the report to the listed ids", async () => {
    const { ask } = setup();
    const reply = await ask({ request: "Report on these customers", customer_ids: [8, "4", 3] });

    expect(reply).toMatchObject({
      summary: "Compiled report for 1 active customers with open tickets",
      data_context: { active_customers_with_open_tickets: [{ customer: { id: 8 }, open_tickets: [{ id: 9 }, { id: 10 }] }] },
    });
  });

  it("rejects input that is not a JSON object", async () => {
    const { ask } = setup();
    expect(await ask("hello")).toEqual({ handled: false, reason: INVALID_REQUEST_REASON });
    expect(await ask("[1,2]")).toEqual({ handled: false, reason: INVALID_REQUEST_REASON });
  });
});
