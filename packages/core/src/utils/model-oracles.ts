import { generateText, type LanguageModel } from "ai";
import type { ComposeOracle, PlanOracle, RetryPolicy } from "../types.js";
import { toWirePlan } from "../plan/validate-plan.js";
import { withResilience } from "./resilience.js";
import { getAbortSignal } from "./run-context.js";

const COMPOSER_SYSTEM =
  "You are a customer support orchestrator. Given the outputs collected from specialist agents, " +
  "write a concise, empathetic final reply to the customer. Never mention agents, routing or raw JSON.";

/** Plan oracle backed by an AI SDK language model. */
export function createModelPlanOracle(model: LanguageModel, retry?: RetryPolicy): PlanOracle {
  return async (instruction, requestText, hints) => {
    const result = await withResilience({
      fn: () => generateText({
        model,
        system: instruction,
        prompt: JSON.stringify({ request: requestText, parsed: { customer_id: hints.customerId, email: hints.email } }),
        temperature: 0.2,
        maxOutputTokens: 400,
        abortSignal: getAbortSignal(),
      }),
      policy: retry,
      label: "planner",
      abortSignal: getAbortSignal(),
    });
    return result.text;
  };
}

/** Composition oracle backed by an AI SDK language model. */
export function createModelComposeOracle(model: LanguageModel, retry?: RetryPolicy): ComposeOracle {
  return async (requestText, plan, observations) => {
    const result = await withResilience({
      fn: () => generateText({
        model,
        system: COMPOSER_SYSTEM,
        prompt: JSON.stringify({ user_request: requestText, plan: toWirePlan(plan), observations }),
        temperature: 0.3,
        maxOutputTokens: 300,
        abortSignal: getAbortSignal(),
      }),
      policy: retry,
      label: "composer",
      abortSignal: getAbortSignal(),
    });
    return result.text;
  };
}
