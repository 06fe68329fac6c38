import { z } from "zod";
import { deepFreeze, isRecord } from "../utils/json.js";
import {
  ID_COLLECTION_FIELDS,
  PLAN_LIMITS,
  isCapability,
  type FinalAnswerStrategy,
  type JsonValue,
  type Plan,
  type PlanLimits,
  type PlanPayload,
  type PlanStep,
  type SingleCall,
  type WirePlan,
} from "./types.js";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

const payloadSchema = z.record(jsonValueSchema);

function capIdCollections(payload: PlanPayload, maxCustomers: number): PlanPayload {
  const capped: PlanPayload = { ...payload };
  for (const field of ID_COLLECTION_FIELDS) {
    const value = capped[field];
    if (Array.isArray(value)) capped[field] = value.slice(0, maxCustomers);
  }
  return capped;
}

/**
 * Accepts `{agent, payload}` from the oracle or `{type: "call", capability, payload}`
 * from an already validated plan. A missing payload becomes `{}`; a payload that is
 * present but not a JSON object drops the call.
 */
function parseCall(raw: unknown, limits: PlanLimits): SingleCall | null {
  if (!isRecord(raw)) return null;
  const capability = raw.capability ?? raw.agent;
  if (!isCapability(capability)) return null;
  if (raw.payload === undefined) return { type: "call", capability, payload: {} };
  const parsed = payloadSchema.safeParse(raw.payload);
  if (!parsed.success) return null;
  return { type: "call", capability, payload: capIdCollections(parsed.data, limits.maxCustomers) };
}

function groupChildren(raw: Record<string, unknown>): unknown[] | null {
  if (raw.type === "parallel" && Array.isArray(raw.children)) return raw.children;
  if (Array.isArray(raw.parallel)) return raw.parallel;
  return null;
}

function normalizeStrategy(raw: Record<string, unknown>): FinalAnswerStrategy {
  const strategy = raw.final_answer_strategy ?? raw.finalAnswerStrategy;
  return strategy === "compose" ? "compose" : "last_step_text";
}

/**
 * Turns an untrusted candidate into a plan that fits the call, fan-out and step
 * budgets, or returns null when nothing usable is left. Unknown capabilities are
 * dropped one by one; the plan is only rejected when no step survives.
 */
export function validatePlan(candidate: unknown, limits: PlanLimits = PLAN_LIMITS): Plan | null {
  if (!isRecord(candidate)) return null;
  const rawSteps = candidate.steps;
  if (!Array.isArray(rawSteps) || rawSteps.length === 0) return null;

  const steps: PlanStep[] = [];
  let usedCalls = 0;

  for (const rawStep of rawSteps) {
    if (usedCalls >= limits.maxToolCalls || steps.length >= limits.maxPlanSteps) break;
    if (!isRecord(rawStep)) continue;

    const rawChildren = groupChildren(rawStep);
    if (rawChildren) {
      const children: SingleCall[] = [];
      for (const rawChild of rawChildren) {
        if (usedCalls >= limits.maxToolCalls || children.length >= limits.maxParallelFanout) break;
        const child = parseCall(rawChild, limits);
        if (!child) continue;
        children.push(child);
        usedCalls++;
      }
      if (children.length > 0) steps.push({ type: "parallel", children });
      continue;
    }

    const call = parseCall(rawStep, limits);
    if (!call) continue;
    steps.push(call);
    usedCalls++;
  }

  if (steps.length === 0) return null;
  return deepFreeze<Plan>({ steps, finalAnswerStrategy: normalizeStrategy(candidate) });
}

/** Number of SingleCall leaves, group children included. */
export function countPlanCalls(plan: Plan): number {
  return plan.steps.reduce((total, step) => total + (step.type === "parallel" ? step.children.length : 1), 0);
}

/** The snake-case shape the plan oracle speaks, used for traces and the compose oracle. */
export function toWirePlan(plan: Plan): WirePlan {
  return {
    steps: plan.steps.map((step) => {
      switch (step.type) {
        case "call":
          return { agent: step.capability, payload: step.payload };
        case "parallel":
          return { parallel: step.children.map((child) => ({ agent: child.capability, payload: child.payload })) };
      }
    }),
    final_answer_strategy: plan.finalAnswerStrategy,
  };
}
