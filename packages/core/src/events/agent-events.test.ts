import { describe, it, expect, vi, afterEach } from "vitest";
import { AgentEventBus, type AgentEvent } from "./agent-events.js";

describe("AgentEventBus", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("delivers events in order, tagged with the run id", () => {
    const bus = new AgentEventBus("run_1");
    const seen: AgentEvent[] = [];
    bus.subscribe((event) => seen.push(event));

    bus.emit("plan", { source: "fallback" });
    bus.emit("step:start");

    expect(seen.map((e) => [e.type, e.runId, e.data])).toEqual([
      ["plan", "run_1", { source: "fallback" }],
      ["step:start", "run_1", {}],
    ]);
  });

  it("stops delivering after unsubscribe", () => {
    const bus = new AgentEventBus();
    const handler = vi.fn();
    const unsubscribe = bus.subscribe(handler);

    bus.emit("status");
    unsubscribe();
    bus.emit("status");

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("keeps going when a handler throws", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const bus = new AgentEventBus("run_2");
    const after = vi.fn();
    bus.subscribe(() => {
      throw new Error("boom");
    });
    bus.subscribe(after);

    bus.emit("plan");

    expect(after).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith("[agent-events:run_2] plan handler failed:", expect.any(Error));
  });
});
