import type { BusEventName } from "./events.js";

export interface AgentEvent {
  type: BusEventName;
  /** Run that emitted the event */
  runId?: string;
  data: Record<string, unknown>;
  timestamp: number;
}

type EventHandler = (event: AgentEvent) => void;

/**
 * Per-run fan-out of plan, step, capability and status events. Subscribers
 * (the SSE bridge, tests) see events in emission order; a throwing handler is
 * logged and does not stop the others.
 */
export class AgentEventBus {
  private handlers = new Set<EventHandler>();

  constructor(readonly runId?: string) {}

  subscribe(handler: EventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  emit(type: BusEventName, data: Record<string, unknown> = {}): void {
    const event: AgentEvent = { type, runId: this.runId, data, timestamp: Date.now() };
    for (const handler of [...this.handlers]) {
      try {
        handler(event);
      } catch (err) {
        console.error(`[agent-events:${this.runId ?? "-"}] ${type} handler failed:`, err);
      }
    }
  }
}
