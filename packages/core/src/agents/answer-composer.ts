import type { ComposeOracle } from "../types.js";
import type { Capability, PlanStep } from "../plan/types.js";
import { STATUS_CODES } from "../events/events.js";
import { emitStatus } from "../utils/run-context.js";
import { DEFAULTS, SUMMARY_EXCLUDED_KEYS } from "../utils/constants.js";
import { isBatchResult, isFailureMarker, type CapabilityResult, type ExecutionState } from "./plan-executor.js";

function itemsOf(result: CapabilityResult | undefined): CapabilityResult[] {
  if (!result) return [];
  return isBatchResult(result) ? result.batch : [result];
}

/** `reply` text of a support/billing result; batch replies are joined by a blank line. */
export function replyText(result: CapabilityResult | undefined): string {
  return itemsOf(result)
    .filter((item) => !isFailureMarker(item))
    .map((item) => (typeof item.reply === "string" ? item.reply.trim() : ""))
    .filter(Boolean)
    .join("\n\n");
}

function summarizeItem(item: CapabilityResult): string {
  if (isFailureMarker(item)) return "";
  if (typeof item.summary === "string" && item.summary.trim()) return item.summary.trim();
  const rest = Object.fromEntries(Object.entries(item).filter(([key]) => !SUMMARY_EXCLUDED_KEYS.has(key)));
  return Object.keys(rest).length > 0 ? JSON.stringify(rest) : "";
}

/** Human-readable summary of a data result. Failures contribute nothing. */
export function summarizeData(result: CapabilityResult | undefined): string {
  return itemsOf(result).map(summarizeItem).filter(Boolean).join("; ");
}

function textFor(capability: Capability, result: CapabilityResult | undefined): string {
  return capability === "data" ? summarizeData(result) : replyText(result);
}

/** Capability answered by a step: a group only counts when all its children share one. */
function stepCapability(step: PlanStep | undefined): Capability | null {
  if (!step) return null;
  if (step.type === "call") return step.capability;
  const [first, ...rest] = step.children;
  return first && rest.every((c) => c.capability === first.capability) ? first.capability : null;
}

function failureNote(capability: Capability, result: CapabilityResult | undefined): string | null {
  const failures = itemsOf(result).filter(isFailureMarker);
  if (failures.length === 0) return null;
  const reasons = failures.map((f) => `${f.kind}: ${f.detail}`).join(", ");
  return `${capability}: the ${capability} service could not complete the request (${reasons})`;
}

/** Observation lines handed to the composition oracle. */
export function buildObservations(state: ExecutionState): string[] {
  const { data, support, billing } = state.accumulated;
  const lines: string[] = [];

  const dataSummary = summarizeData(data);
  if (dataSummary) lines.push(`data_context: ${dataSummary}`);
  const supportItems = itemsOf(support).filter((item) => !isFailureMarker(item));
  if (supportItems.length > 0) lines.push(`support: ${JSON.stringify(supportItems.length > 1 ? supportItems : supportItems[0])}`);
  const billingReply = replyText(billing);
  if (billingReply) lines.push(`billing: ${billingReply}`);

  for (const capability of ["data", "support", "billing"] as const) {
    const note = failureNote(capability, state.accumulated[capability]);
    if (note) lines.push(note);
  }
  return lines;
}

/** support reply, then billing reply, then data summary, then the fixed apology. */
export function terminalFallback(state: ExecutionState): string {
  const { data, support, billing } = state.accumulated;
  return replyText(support) || replyText(billing) || summarizeData(data) || DEFAULTS.APOLOGY;
}

/**
 * Final text for the run. The requested strategy is tried first; whatever it
 * cannot produce falls through to the fixed priority list, so the result is
 * never empty and this never throws.
 */
export async function composeAnswer(state: ExecutionState, composeOracle?: ComposeOracle): Promise<string> {
  const plan = state.plan;
  if (!plan) return terminalFallback(state);

  if (plan.finalAnswerStrategy === "last_step_text") {
    const capability = stepCapability(plan.steps[plan.steps.length - 1]);
    const text = capability ? textFor(capability, state.accumulated[capability]) : "";
    if (text) return text;
  } else if (composeOracle) {
    emitStatus({ code: STATUS_CODES.COMPOSING, message: "Composing final answer" });
    try {
      const composed = (await composeOracle(state.requestText, plan, buildObservations(state))).trim();
      if (composed) return composed;
    } catch (err: unknown) {
      console.error("[composer] composition oracle failed:", err instanceof Error ? err.message : String(err));
    }
  }

  return terminalFallback(state);
}
