import type { PlanOracle } from "../types.js";
import { stripCodeFences, tryParseJson } from "../utils/json.js";
import { CAPABILITIES, PLAN_LIMITS, type PlanLimits, type RequestHints } from "./types.js";
import { DEFAULT_DESCRIPTIONS, describeCapabilities } from "../registry/capability-registry.js";

const DEFAULT_CAPABILITY_LIST = describeCapabilities(
  CAPABILITIES.map((name) => ({ name, description: DEFAULT_DESCRIPTIONS[name] })),
);

export function buildPlannerInstruction(capabilityList: string = DEFAULT_CAPABILITY_LIST, limits: PlanLimits = PLAN_LIMITS): string {
  return [
    "You plan which customer-support specialists to call for one customer message.",
    `Specialists:\n${capabilityList}`,
    "Reply with JSON only, no markdown, in this shape:",
    '{"steps":[{"agent":"data|support|billing","payload":{}} or {"parallel":[{"agent":"...","payload":{}}]}],"final_answer_strategy":"last_step_text|compose"}',
    "Leave out specialists that are not needed. For account-specific requests call data first, then support.",
    "Use a parallel group when several independent lookups are needed.",
    `At most ${limits.maxPlanSteps} steps, ${limits.maxToolCalls} calls in total and ${limits.maxCustomers} customers.`,
    "Copy the customer's message verbatim into payload.request.",
    "When the message asks for several actions, give each action its own step.",
  ].join("\n");
}

/**
 * Asks the oracle for a candidate plan. Transport errors, empty output and
 * output that is not JSON all come back as null; the candidate is untrusted
 * until it has been through `validatePlan`.
 */
export async function proposePlan(
  oracle: PlanOracle | undefined,
  requestText: string,
  hints: RequestHints,
  instruction: string = buildPlannerInstruction(),
): Promise<unknown | null> {
  if (!oracle) return null;
  let raw: string;
  try {
    raw = await oracle(instruction, requestText, hints);
  } catch (err: unknown) {
    console.error("[planner] plan oracle failed:", err instanceof Error ? err.message : String(err));
    return null;
  }
  if (!raw || !raw.trim()) return null;
  const parsed = tryParseJson(stripCodeFences(raw));
  return parsed === undefined ? null : parsed;
}
