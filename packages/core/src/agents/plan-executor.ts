import type { CapabilityClient, CapabilityReply } from "../capabilities/capability-client.js";
import type { Capability, Plan, PlanStep, RequestHints, SingleCall } from "../plan/types.js";
import { BUS_EVENTS, STATUS_CODES } from "../events/events.js";
import { emitStatus, getEventBus } from "../utils/run-context.js";
import { DEFAULTS } from "../utils/constants.js";
import { isEmptyValue, isRecord } from "../utils/json.js";

export type ExecutorPhase = "planning" | "running" | "advancing" | "finalizing" | "done";

/** Latest output recorded for a capability: reply data, a failure marker or a batch. */
export type CapabilityResult = Record<string, unknown>;

export type FailureMarker = { failed: true; kind: string; detail: string };

export type BatchResult = { batch: CapabilityResult[] };

export interface ExecutionState {
  readonly requestText: string;
  readonly hints: RequestHints;
  plan: Plan | null;
  phase: ExecutorPhase;
  /** Index of the top-level step being run; only ever grows */
  stepIndex: number;
  accumulated: Partial<Record<Capability, CapabilityResult>>;
  /** Append-only trace of the run */
  readonly log: string[];
}

export interface StepOutcome {
  capability: Capability;
  ok: boolean;
}

/** Where `support` and `billing` find the output of earlier steps. */
const PRIOR_CONTEXT_SOURCES: Partial<Record<Capability, Capability>> = {
  support: "data",
  billing: "data",
};

export function isFailureMarker(result: unknown): result is FailureMarker {
  return isRecord(result) && result.failed === true;
}

export function isBatchResult(result: unknown): result is BatchResult {
  return isRecord(result) && Array.isArray(result.batch);
}

export function createExecutionState(requestText: string, hints: RequestHints): ExecutionState {
  return { requestText, hints, plan: null, phase: "planning", stepIndex: 0, accumulated: {}, log: [] };
}

function assertPhase(state: ExecutionState, expected: ExecutorPhase) {
  if (state.phase !== expected) {
    throw new Error(`Invalid executor transition: expected phase "${expected}", was "${state.phase}"`);
  }
}

/** Planning → Running(0). Validated plans always have at least one step. */
export function startExecution(state: ExecutionState, plan: Plan): void {
  assertPhase(state, "planning");
  state.plan = plan;
  state.stepIndex = 0;
  state.phase = plan.steps.length > 0 ? "running" : "finalizing";
}

/** Running(i) → Advancing(i + 1) → Running(i + 1) or Finalizing. */
export function advance(state: ExecutionState): void {
  assertPhase(state, "running");
  state.phase = "advancing";
  state.stepIndex += 1;
  const total = state.plan?.steps.length ?? 0;
  state.phase = state.stepIndex < total ? "running" : "finalizing";
}

export function finish(state: ExecutionState): void {
  assertPhase(state, "finalizing");
  state.phase = "done";
}

/**
 * Outbound payload for one call: `request` defaults to the original text, and
 * capabilities that consume prior context get the latest data result injected
 * when their own `data_context` is missing or empty.
 */
export function prepareCallPayload(
  call: SingleCall,
  accumulated: Partial<Record<Capability, CapabilityResult>>,
  requestText: string,
): Record<string, unknown> {
  const payload: Record<string, unknown> = { ...call.payload };
  if (typeof payload.request !== "string" || payload.request === "") payload.request = requestText;

  const source = PRIOR_CONTEXT_SOURCES[call.capability];
  if (source && isEmptyValue(payload[DEFAULTS.PRIOR_CONTEXT_FIELD])) {
    payload[DEFAULTS.PRIOR_CONTEXT_FIELD] = accumulated[source] ?? {};
  }
  return payload;
}

function toResult(reply: CapabilityReply): CapabilityResult {
  if (reply.ok) return reply.data;
  const marker: FailureMarker = { failed: true, kind: reply.error.kind, detail: reply.error.detail };
  return marker;
}

async function runGroup(children: readonly SingleCall[], state: ExecutionState, client: CapabilityClient): Promise<StepOutcome[]> {
  // Every child sees the context as it was before the group started.
  const snapshot = { ...state.accumulated };
  const settled = await Promise.allSettled(
    children.map((child) => client.call(child.capability, prepareCallPayload(child, snapshot, state.requestText), state.log)),
  );

  const results = new Map<Capability, CapabilityResult[]>();
  const outcomes: StepOutcome[] = [];
  settled.forEach((s, i) => {
    const capability = children[i].capability;
    const result: CapabilityResult = s.status === "fulfilled"
      ? toResult(s.value)
      : { failed: true, kind: "transport", detail: s.reason instanceof Error ? s.reason.message : String(s.reason) };
    const list = results.get(capability) ?? [];
    list.push(result);
    results.set(capability, list);
    outcomes.push({ capability, ok: !isFailureMarker(result) });
  });

  for (const [capability, list] of results) {
    state.accumulated[capability] = list.length > 1 ? { batch: list } : list[0];
  }
  return outcomes;
}

/** Runs one top-level step and records its results into `state.accumulated`. */
export async function runStep(step: PlanStep, state: ExecutionState, client: CapabilityClient): Promise<StepOutcome[]> {
  switch (step.type) {
    case "call": {
      const reply = await client.call(step.capability, prepareCallPayload(step, state.accumulated, state.requestText), state.log);
      state.accumulated[step.capability] = toResult(reply);
      return [{ capability: step.capability, ok: reply.ok }];
    }
    case "parallel":
      return runGroup(step.children, state, client);
  }
}

/**
 * Walks the plan from Running(0) to Finalizing. A failed call never stops the
 * plan: its failure marker is recorded and the next step runs.
 */
export async function executePlan(state: ExecutionState, client: CapabilityClient): Promise<void> {
  const bus = getEventBus();
  while (state.phase === "running" && state.plan) {
    const index = state.stepIndex;
    const step = state.plan.steps[index];
    const capabilities = step.type === "call" ? [step.capability] : step.children.map((c) => c.capability);

    emitStatus({
      code: STATUS_CODES.EXECUTING_STEP,
      message: `Running step ${index + 1} of ${state.plan.steps.length}`,
      metadata: { index, parallel: step.type === "parallel" },
    });
    bus?.emit(BUS_EVENTS.STEP_START, { index, type: step.type, capabilities });

    const outcomes = await runStep(step, state, client);

    bus?.emit(BUS_EVENTS.STEP_END, { index, outcomes });
    advance(state);
  }
}
