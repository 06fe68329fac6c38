/** SSE event names sent to clients over Server-Sent Events */
export const SSE_EVENTS = {
  SESSION_START: "session:start",
  TEXT_DELTA: "text-delta",
  PLAN: "router:plan",
  STEP_START: "step:start",
  STEP_END: "step:end",
  CAPABILITY_CALL: "capability-call",
  CAPABILITY_RESULT: "capability-result",
  STATUS: "status",
  DONE: "done",
  ERROR: "error",
} as const;

export type SseEventName = (typeof SSE_EVENTS)[keyof typeof SSE_EVENTS];

/** Internal bus event names emitted during one orchestration run */
export const BUS_EVENTS = {
  PLAN: "plan",
  STEP_START: "step:start",
  STEP_END: "step:end",
  CAPABILITY_CALL: "capability:call",
  CAPABILITY_RESULT: "capability:result",
  STATUS: "status",
} as const;

export type BusEventName = (typeof BUS_EVENTS)[keyof typeof BUS_EVENTS];

/** Maps internal bus event names to their corresponding SSE event names */
export const BUS_TO_SSE_MAP: Record<string, string> = {
  [BUS_EVENTS.PLAN]: SSE_EVENTS.PLAN,
  [BUS_EVENTS.STEP_START]: SSE_EVENTS.STEP_START,
  [BUS_EVENTS.STEP_END]: SSE_EVENTS.STEP_END,
  [BUS_EVENTS.CAPABILITY_CALL]: SSE_EVENTS.CAPABILITY_CALL,
  [BUS_EVENTS.CAPABILITY_RESULT]: SSE_EVENTS.CAPABILITY_RESULT,
  [BUS_EVENTS.STATUS]: SSE_EVENTS.STATUS,
};

/** Set of bus event names that are forwarded to SSE clients */
export const FORWARDED_BUS_EVENTS = new Set(Object.keys(BUS_TO_SSE_MAP));

/** Typed status codes for the `status` event */
export const STATUS_CODES = {
  PLANNING: "planning",
  FALLBACK_PLAN: "fallback-plan",
  EXECUTING_STEP: "executing-step",
  COMPOSING: "composing",
  RETRYING: "retrying",
} as const;

export type StatusCode = (typeof STATUS_CODES)[keyof typeof STATUS_CODES];
