import { AsyncLocalStorage } from "node:async_hooks";
import type { AgentEventBus } from "../events/agent-events.js";
import { BUS_EVENTS, type StatusCode } from "../events/events.js";

export interface RunContext {
  /** Identifies one orchestration run in logs and SSE sessions */
  runId: string;
  /** Event bus for everything the run emits */
  events?: AgentEventBus;
  /** Signal to abort outbound calls made by this run */
  abortSignal?: AbortSignal;
}

export interface StatusPayload {
  code: StatusCode;
  message: string;
  capability?: string;
  metadata?: Record<string, unknown>;
}

/** AsyncLocalStorage instance that propagates the run context through async boundaries */
export const runStore = new AsyncLocalStorage<RunContext>();

/** Returns the event bus from the current run context, if any */
export function getEventBus(): AgentEventBus | undefined {
  return runStore.getStore()?.events;
}

/** Returns the abort signal from the current run context, if any */
export function getAbortSignal(): AbortSignal | undefined {
  return runStore.getStore()?.abortSignal;
}

/** Publishes a status event on the current run's bus; a no-op outside a run. */
export function emitStatus(payload: StatusPayload): void {
  getEventBus()?.emit(BUS_EVENTS.STATUS, { ...payload });
}

export function generateRunId(existing?: string) {
  return existing ?? `run_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}
