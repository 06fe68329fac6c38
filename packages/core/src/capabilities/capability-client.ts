import { Agent, errors, fetch as poolFetch } from "undici";
import type { CapabilityPolicy } from "../types.js";
import type { CapabilityRegistry } from "../registry/capability-registry.js";
import type { Capability } from "../plan/types.js";
import { rpcResponseSchema, taskSchema } from "../schemas/rpc.schemas.js";
import { buildMessageSendRequest, finalMessageText } from "./envelope.js";
import { isRetryableError, withResilience } from "../utils/resilience.js";
import { getAbortSignal, getEventBus } from "../utils/run-context.js";
import { BUS_EVENTS } from "../events/events.js";
import { DEFAULTS } from "../utils/constants.js";
import { isRecord, tryParseJson } from "../utils/json.js";

export type CapabilityFailureKind = "timeout" | "transport" | "remote";

export interface CapabilityFailure {
  kind: CapabilityFailureKind;
  detail: string;
}

export type CapabilityReply =
  | { ok: true; capability: Capability; data: Record<string, unknown> }
  | { ok: false; capability: Capability; error: CapabilityFailure };

export class CapabilityError extends Error {
  constructor(
    readonly kind: CapabilityFailureKind,
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "CapabilityError";
  }

  /** Timeouts and transport failures may succeed on retry; remote errors only when the status says so. */
  get retryable(): boolean {
    if (this.kind !== "remote") return true;
    return this.status === 429 || (this.status !== undefined && this.status >= 500);
  }
}

type HttpResponse = Pick<Response, "ok" | "status" | "text">;

interface HttpRequest {
  method: "POST";
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}

type Transport = (url: string, init: HttpRequest) => Promise<HttpResponse>;

function toCapabilityError(err: unknown, signal: AbortSignal, connectTimeoutMs: number): CapabilityError {
  if (signal.aborted && signal.reason instanceof CapabilityError) return signal.reason;
  if (err instanceof CapabilityError) return err;
  if (signal.aborted) return new CapabilityError("timeout", "request aborted");
  if (err instanceof Error && err.cause instanceof errors.ConnectTimeoutError) {
    return new CapabilityError("timeout", `connect timed out after ${connectTimeoutMs}ms`);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new CapabilityError("transport", message);
}

/** Text that parses to a JSON object is structured; anything else is a raw reply. */
export function parseReplyText(text: string): Record<string, unknown> {
  const parsed = tryParseJson(text);
  return isRecord(parsed) ? parsed : { reply: text };
}

/**
 * Sends payloads to named specialists over JSON-RPC `message/send`.
 *
 * `call` never throws: timeouts, network failures and error responses come back
 * as typed failures. Each call appends two lines to the caller's trace log.
 *
 * Without an injected `fetch`, calls go through a keep-alive pool whose TCP
 * connect is bounded by `connectTimeoutMs`. The overall timer covers the rest.
 */
export class CapabilityClient {
  private readonly timeoutMs: number;
  private readonly connectTimeoutMs: number;
  private readonly pool?: Agent;
  private readonly transport: Transport;

  constructor(
    private readonly registry: CapabilityRegistry,
    private readonly policy: CapabilityPolicy = {},
    fetchImpl?: typeof fetch,
  ) {
    this.timeoutMs = policy.timeoutMs ?? DEFAULTS.CAPABILITY_TIMEOUT_MS;
    this.connectTimeoutMs = Math.min(policy.connectTimeoutMs ?? DEFAULTS.CAPABILITY_CONNECT_TIMEOUT_MS, this.timeoutMs);
    if (fetchImpl) {
      this.transport = (url, init) => fetchImpl(url, init);
    } else {
      const pool = new Agent({ connect: { timeout: this.connectTimeoutMs } });
      this.pool = pool;
      this.transport = (url, init) => poolFetch(url, { ...init, dispatcher: pool });
    }
  }

  /** Closes pooled connections. Injected transports are left alone. */
  async close(): Promise<void> {
    await this.pool?.close();
  }

  async call(capability: Capability, payload: Record<string, unknown>, log: string[]): Promise<CapabilityReply> {
    const bus = getEventBus();
    log.push(`Router -> ${capability}: dispatched`);
    bus?.emit(BUS_EVENTS.CAPABILITY_CALL, { capability, payload });

    let reply: CapabilityReply;
    try {
      const data = await withResilience({
        fn: () => this.send(capability, payload),
        policy: this.policy,
        label: capability,
        abortSignal: getAbortSignal(),
        retryable: (err) => (err instanceof CapabilityError ? err.retryable : isRetryableError(err)),
      });
      reply = { ok: true, capability, data };
    } catch (err: unknown) {
      const error = err instanceof CapabilityError ? err : new CapabilityError("transport", String(err));
      reply = { ok: false, capability, error: { kind: error.kind, detail: error.message } };
    }

    if (reply.ok) {
      log.push(`${capability} -> Router: completed`);
      bus?.emit(BUS_EVENTS.CAPABILITY_RESULT, { capability, ok: true });
    } else {
      log.push(`${capability} -> Router: failed (${reply.error.kind}: ${reply.error.detail})`);
      bus?.emit(BUS_EVENTS.CAPABILITY_RESULT, { capability, ok: false, error: reply.error });
    }
    return reply;
  }

  private async send(capability: Capability, payload: Record<string, unknown>): Promise<Record<string, unknown>> {
    const endpoint = this.registry.get(capability)?.endpoint;
    if (!endpoint) throw new CapabilityError("transport", `no endpoint registered for ${capability}`);

    const parentSignal = getAbortSignal();
    if (parentSignal?.aborted) throw new CapabilityError("timeout", "request aborted");

    const controller = new AbortController();
    const overall = setTimeout(
      () => controller.abort(new CapabilityError("timeout", `timed out after ${this.timeoutMs}ms`)),
      this.timeoutMs,
    );
    const onParentAbort = () => controller.abort(parentSignal?.reason);
    parentSignal?.addEventListener("abort", onParentAbort, { once: true });

    try {
      let response: HttpResponse;
      try {
        response = await this.transport(endpoint, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(buildMessageSendRequest(JSON.stringify(payload))),
          signal: controller.signal,
        });
      } catch (err: unknown) {
        throw toCapabilityError(err, controller.signal, this.connectTimeoutMs);
      }

      if (!response.ok) throw new CapabilityError("remote", `HTTP ${response.status}`, response.status);

      let body: string;
      try {
        body = await response.text();
      } catch (err: unknown) {
        throw toCapabilityError(err, controller.signal, this.connectTimeoutMs);
      }

      const envelope = rpcResponseSchema.safeParse(tryParseJson(body));
      if (!envelope.success) throw new CapabilityError("transport", "invalid JSON-RPC response");
      if (envelope.data.error) throw new CapabilityError("remote", envelope.data.error.message);
      if (envelope.data.result === undefined || envelope.data.result === null) return parseReplyText("");

      const task = taskSchema.safeParse(envelope.data.result);
      if (!task.success) throw new CapabilityError("transport", "unexpected JSON-RPC result");
      return parseReplyText(finalMessageText(task.data));
    } finally {
      clearTimeout(overall);
      parentSignal?.removeEventListener("abort", onParentAbort);
    }
  }
}
