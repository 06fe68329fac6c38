import { describe, it, expect, vi, beforeEach } from "vitest";
import { generateText } from "ai";
import { createModelComposeOracle, createModelPlanOracle } from "./model-oracles.js";
import { buildFallbackPlan } from "../plan/fallback-plan.js";

vi.mock("ai", () => ({
  generateText: vi.fn(async ({ system }: { system?: string }) => ({ text: `reply to ${system?.slice(0, 12) ?? ""}` })),
}));

const generateTextMock = vi.mocked(generateText);

describe("model oracles", () => {
  beforeEach(() => {
    generateTextMock.mockClear();
  });

  it("sends the planner instruction as the system prompt", async () => {
    const oracle = createModelPlanOracle("test-model");

    const text = await oracle("Plan carefully please", "Refund me", { customerId: 5, email: null });

    expect(text).toBe("reply to Plan careful");
    const [options] = generateTextMock.mock.calls[0];
    expect(options.system).toBe("Plan carefully please");
    expect(options.prompt).toBe('{"request":"Refund me","parsed":{"customer_id":5,"email":null}}');
  });

  it("hands the wire plan and observations to the composer", async () => {
    const oracle = createModelComposeOracle("test-model");
    const plan = buildFallbackPlan("hello", { customerId: null, email: null });

    await oracle("hello", plan, ["billing: ok"]);

    const [options] = generateTextMock.mock.calls[0];
    expect(options.prompt).toBe(
      JSON.stringify({
        user_request: "hello",
        plan: {
          steps: [
            { agent: "data", payload: { request: "hello", customer_id: null, email: null } },
            { agent: "support", payload: { request: "hello", customer_id: null, email: null, data_context: {} } },
          ],
          final_answer_strategy: "last_step_text",
        },
        observations: ["billing: ok"],
      }),
    );
  });
});
