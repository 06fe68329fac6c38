import { describe, it, expect } from "vitest";
import { CustomerStore, loadCustomerSeed } from "./customer-store.js";

const fixedNow = () => new Date("2026-04-01T00:00:00.000Z");

describe("CustomerStore", () => {
  it("looks customers up by id", () => {
    const store = new CustomerStore();
    expect(store.getCustomer(5)?.name).toBe("Eli Novak");
    expect(store.getCustomer(99)).toBeUndefined();
  });

  it("lists customers in id order with status and limit filters", () => {
    const store = new CustomerStore();
    expect(store.listCustomers().map((c) => c.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(store.listCustomers({ status: "active" }).map((c) => c.id)).toEqual([1, 2, 4, 5, 6, 8]);
    expect(store.listCustomers({ status: "disabled", limit: 1 }).map((c) => c.id)).toEqual([3]);
  });

  it("updates existing customers only", () => {
    const store = new CustomerStore();
    expect(store.updateCustomer(5, { email: "new@example.com" })?.email).toBe("new@example.com");
    expect(store.getCustomer(5)?.email).toBe("new@example.com");
    expect(store.getCustomer(5)?.name).toBe("Eli Novak");
    expect(store.updateCustomer(99, { email: "x@example.com" })).toBeUndefined();
  });

  it("hands out copies", () => {
    const store = new CustomerStore();
    const customer = store.getCustomer(1);
    if (customer) customer.name = "Changed";
    store.getCustomerHistory(1)[0].issue = "Changed";
    expect(store.getCustomer(1)?.name).toBe("Ada Park");
    expect(store.getCustomerHistory(1)[0].issue).toBe("Invoice shows wrong billing address");
  });

  it("opens tickets with the next id", () => {
    const store = new CustomerStore(loadCustomerSeed(), { now: fixedNow });
    expect(store.createTicket(2, "Cannot export")).toEqual({
      id: 11,
      customer_id: 2,
      issue: "Cannot export",
      status: "open",
      priority: "medium",
      created_at: "2026-04-01T00:00:00.000Z",
    });
    expect(store.createTicket(99, "Nobody")).toBeUndefined();
    expect(store.getCustomerHistory(2).map((t) => t.id)).toEqual([11, 3]);
  });

  it("returns history newest first", () => {
    const store = new CustomerStore();
    expect(store.getCustomerHistory(5).map((t) => t.id)).toEqual([6, 7]);
    expect(store.getCustomerHistory(8).map((t) => t.id)).toEqual([9, 10]);
    expect(store.getCustomerHistory(99)).toEqual([]);
  });
});
