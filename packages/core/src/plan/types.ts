export const CAPABILITIES = ["data", "support", "billing"] as const;

/** A named remote specialist the router can dispatch to. */
export type Capability = (typeof CAPABILITIES)[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type PlanPayload = Record<string, JsonValue>;

/** Best-effort values pulled out of the request text. */
export interface RequestHints {
  customerId: number | null;
  email: string | null;
}

export interface SingleCall {
  type: "call";
  capability: Capability;
  payload: PlanPayload;
}

/** Children run concurrently. Groups never nest. */
export interface ParallelGroup {
  type: "parallel";
  children: SingleCall[];
}

export type PlanStep = SingleCall | ParallelGroup;

export const FINAL_ANSWER_STRATEGIES = ["last_step_text", "compose"] as const;

export type FinalAnswerStrategy = (typeof FINAL_ANSWER_STRATEGIES)[number];

export interface Plan {
  readonly steps: readonly PlanStep[];
  readonly finalAnswerStrategy: FinalAnswerStrategy;
}

export interface PlanLimits {
  /** SingleCall leaves across the whole plan, group children included */
  maxToolCalls: number;
  /** Children kept in any one parallel group */
  maxParallelFanout: number;
  /** Top-level steps */
  maxPlanSteps: number;
  /** Elements kept in id-collection payload fields */
  maxCustomers: number;
}

export const PLAN_LIMITS: PlanLimits = {
  maxToolCalls: 8,
  maxParallelFanout: 12,
  maxPlanSteps: 5,
  maxCustomers: 12,
};

/** Payload fields treated as id collections and capped at `maxCustomers`. */
export const ID_COLLECTION_FIELDS = ["customer_ids", "customers", "accounts"] as const;

/** Shape the plan oracle is instructed to produce. */
export interface WirePlanCall {
  agent: Capability;
  payload: PlanPayload;
}

export interface WirePlan {
  steps: Array<WirePlanCall | { parallel: WirePlanCall[] }>;
  final_answer_strategy: FinalAnswerStrategy;
}

export function isCapability(value: unknown): value is Capability {
  return typeof value === "string" && CAPABILITIES.some((c) => c === value);
}
