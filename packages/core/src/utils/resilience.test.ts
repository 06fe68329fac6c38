import { describe, it, expect, vi } from "vitest";
import { isRetryableError, withResilience } from "./resilience.js";
import { runStore } from "./run-context.js";
import { AgentEventBus, type AgentEvent } from "../events/agent-events.js";

const instant = { baseDelayMs: 0, maxDelayMs: 0 };

function failingThen<T>(failures: Error[], value: T) {
  let calls = 0;
  const fn = vi.fn(async (): Promise<T> => {
    const failure = failures[calls++];
    if (failure) throw failure;
    return value;
  });
  return fn;
}

describe("isRetryableError", () => {
  it("classifies by status, name and message", () => {
    expect(isRetryableError(Object.assign(new Error("upstream"), { status: 503 }))).toBe(true);
    expect(isRetryableError(Object.assign(new Error("denied"), { status: 401 }))).toBe(false);
    expect(isRetryableError(new Error("fetch failed"))).toBe(true);
    expect(isRetryableError(new Error("Rate limit exceeded"))).toBe(true);
    expect(isRetryableError(Object.assign(new Error("stop"), { name: "AbortError" }))).toBe(false);
    expect(isRetryableError(new Error("bad input"))).toBe(false);
    expect(isRetryableError("fetch failed")).toBe(false);
  });
});

describe("withResilience", () => {
  it("retries retryable errors until the call succeeds", async () => {
    const fn = failingThen([new Error("fetch failed"), new Error("socket hang up")], "ok");
    await expect(withResilience({ fn, policy: { maxRetries: 2, ...instant } })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("gives up after maxRetries", async () => {
    const fn = failingThen([new Error("fetch failed"), new Error("fetch failed again")], "ok");
    await expect(withResilience({ fn, policy: { maxRetries: 1, ...instant } })).rejects.toThrow("fetch failed again");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry by default", async () => {
    const fn = failingThen([new Error("fetch failed")], "ok");
    await expect(withResilience({ fn })).rejects.toThrow("fetch failed");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("uses the caller's classifier when given", async () => {
    const fn = failingThen([new Error("custom transient")], "ok");
    const retryable = (err: Error) => err.message === "custom transient";
    await expect(withResilience({ fn, policy: { maxRetries: 1, ...instant }, retryable })).resolves.toBe("ok");
  });

  it("stops once the run is aborted", async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      controller.abort();
      throw new Error("fetch failed");
    });
    await expect(withResilience({ fn, policy: { maxRetries: 3, ...instant }, abortSignal: controller.signal })).rejects.toThrow("fetch failed");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("releases the abort listener after each backoff", async () => {
    const controller = new AbortController();
    const added = vi.spyOn(controller.signal, "addEventListener");
    const removed = vi.spyOn(controller.signal, "removeEventListener");
    const fn = failingThen([new Error("fetch failed"), new Error("fetch failed")], "ok");

    await expect(withResilience({ fn, policy: { maxRetries: 2, ...instant }, abortSignal: controller.signal })).resolves.toBe("ok");

    expect(added).toHaveBeenCalledTimes(2);
    expect(removed.mock.calls.map((call) => call[1])).toEqual(added.mock.calls.map((call) => call[1]));
  });

  it("reports each retry as a status event", async () => {
    const bus = new AgentEventBus("run_retry");
    const events: AgentEvent[] = [];
    bus.subscribe((event) => events.push(event));
    const fn = failingThen([new Error("fetch failed")], "ok");

    await runStore.run({ runId: "run_retry", events: bus }, () =>
      withResilience({ fn, policy: { maxRetries: 1, ...instant }, label: "billing" }),
    );

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: "status",
      runId: "run_retry",
      data: { code: "retrying", message: "Retrying (attempt 1/1)", capability: "billing" },
    });
  });
});
