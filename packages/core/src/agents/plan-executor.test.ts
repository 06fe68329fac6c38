import { describe, it, expect } from "vitest";
import {
  advance,
  createExecutionState,
  executePlan,
  finish,
  prepareCallPayload,
  startExecution,
} from "./plan-executor.js";
import { CapabilityClient } from "../capabilities/capability-client.js";
import { CapabilityRegistry } from "../registry/capability-registry.js";
import { validatePlan } from "../plan/validate-plan.js";
import type { Plan } from "../plan/types.js";
import { TEST_ENDPOINTS, createFakeFetch, hang, type FakeAgent } from "../testing/fake-agents.js";

const noHints = { customerId: null, email: null };

function planOf(candidate: unknown): Plan {
  const plan = validatePlan(candidate);
  if (!plan) throw new Error("test plan did not validate");
  return plan;
}

function setup(agents: Partial<Record<"data" | "support" | "billing", FakeAgent>>) {
  const fake = createFakeFetch(agents);
  const client = new CapabilityClient(new CapabilityRegistry(TEST_ENDPOINTS), { timeoutMs: 60, connectTimeoutMs: 20 }, fake.fetch);
  return { client, calls: fake.calls };
}

describe("executor state machine", () => {
  it("walks planning, running, finalizing and done", () => {
    const state = createExecutionState("hi", noHints);
    expect(state.phase).toBe("planning");

    startExecution(state, planOf({ steps: [{ agent: "data" }, { agent: "support" }] }));
    expect(state).toMatchObject({ phase: "running", stepIndex: 0 });

    advance(state);
    expect(state).toMatchObject({ phase: "running", stepIndex: 1 });

    advance(state);
    expect(state).toMatchObject({ phase: "finalizing", stepIndex: 2 });

    finish(state);
    expect(state.phase).toBe("done");
  });

  it("rejects out-of-order transitions", () => {
    const state = createExecutionState("hi", noHints);
    expect(() => advance(state)).toThrow('Invalid executor transition: expected phase "running", was "planning"');
  });
});

describe("prepareCallPayload", () => {
  const support = { type: "call" as const, capability: "support" as const, payload: {} };

  it("defaults the request and injects the data result", () => {
    expect(prepareCallPayload(support, { data: { summary: "x" } }, "original text")).toEqual({
      request: "original text",
      data_context: { summary: "x" },
    });
  });

  it("keeps a request and a non-empty context supplied by the plan", () => {
    const call = { ...support, payload: { request: "custom", data_context: { note: "given" } } };
    expect(prepareCallPayload(call, { data: { summary: "x" } }, "original text")).toEqual({
      request: "custom",
      data_context: { note: "given" },
    });
  });

  it("does not inject context into data calls", () => {
    const call = { type: "call" as const, capability: "data" as const, payload: {} };
    expect(prepareCallPayload(call, { data: { summary: "x" } }, "t")).toEqual({ request: "t" });
  });
});

describe("executePlan", () => {
  it("threads the data result into the support call", async () => {
    const { client, calls } = setup({
      data: () => ({ summary: "Customer 5 found" }),
      support: (payload) => ({ reply: `ctx:${JSON.stringify(payload.data_context)}` }),
    });
    const state = createExecutionState("Get customer information for ID 5", { customerId: 5, email: null });
    startExecution(state, planOf({ steps: [{ agent: "data", payload: { customer_id: 5 } }, { agent: "support", payload: {} }] }));

    await executePlan(state, client);

    expect(state).toMatchObject({ phase: "finalizing", stepIndex: 2 });
    expect(calls[0].payload).toEqual({ customer_id: 5, request: "Get customer information for ID 5" });
    expect(state.accumulated.support).toEqual({ reply: 'ctx:{"summary":"Customer 5 found"}' });
  });

  it("batches group results in declaration order and continues past a timeout", async () => {
    const { client, calls } = setup({
      data: (payload, signal) => (payload.n === 2 ? hang(signal) : { summary: `n${String(payload.n)}` }),
      support: () => ({ reply: "done" }),
    });
    const state = createExecutionState("report", noHints);
    startExecution(state, planOf({
      steps: [
        { parallel: [1, 2, 3].map((n) => ({ agent: "data", payload: { n } })) },
        { agent: "support" },
      ],
    }));

    await executePlan(state, client);

    const batch = {
      batch: [
        { summary: "n1" },
        { failed: true, kind: "timeout", detail: "connect timed out after 20ms" },
        { summary: "n3" },
      ],
    };
    expect(state.accumulated.data).toEqual(batch);
    expect(calls.at(-1)).toEqual({ capability: "support", payload: { request: "report", data_context: batch } });
    expect(state.log).toHaveLength(8);
    expect(state.log.at(-1)).toBe("support -> Router: completed");
  });

  it("gives every group child the context from before the group", async () => {
    const { client, calls } = setup({
      data: () => ({ summary: "fresh" }),
      support: () => ({ reply: "ok" }),
    });
    const state = createExecutionState("both", noHints);
    startExecution(state, planOf({ steps: [{ parallel: [{ agent: "data" }, { agent: "support" }] }] }));

    await executePlan(state, client);

    const supportCall = calls.find((c) => c.capability === "support");
    expect(supportCall?.payload).toEqual({ request: "both", data_context: {} });
    expect(state.accumulated).toEqual({ data: { summary: "fresh" }, support: { reply: "ok" } });
  });
});
