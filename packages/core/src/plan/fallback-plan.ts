import { deepFreeze } from "../utils/json.js";
import type { Plan, PlanPayload, RequestHints } from "./types.js";

/**
 * Deterministic plan used when the oracle is unavailable or its output is rejected:
 * look the customer up, then let support answer with that context.
 */
export function buildFallbackPlan(requestText: string, hints: RequestHints): Plan {
  const base: PlanPayload = {
    request: requestText,
    customer_id: hints.customerId,
    email: hints.email,
  };
  return deepFreeze<Plan>({
    steps: [
      { type: "call", capability: "data", payload: base },
      { type: "call", capability: "support", payload: { ...base, data_context: {} } },
    ],
    finalAnswerStrategy: "last_step_text",
  });
}
