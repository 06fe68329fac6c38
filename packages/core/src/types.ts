import type { LanguageModel } from "ai";
import type { CapabilityRegistry } from "./registry/capability-registry.js";
export type { CapabilityRegistry };
import type { CapabilityClient } from "./capabilities/capability-client.js";
import type { Capability, Plan, PlanLimits, RequestHints } from "./plan/types.js";
import type { TaskStore } from "./storage/interfaces.js";

/**
 * What the router handlers need from an inbound HTTP request. Adapters
 * (Hono, Express, etc.) build it from their native request objects.
 */
export interface AgentRequest {
  /** Parsed JSON body; rejects when the body is not JSON */
  json(): Promise<unknown>;
  /** True when the client asked for server-sent events instead of one JSON reply */
  wantsEventStream: boolean;
  /** Aborts when the client disconnects */
  signal: AbortSignal;
}

export interface RetryPolicy {
  /** Max retry attempts after the first try */
  maxRetries?: number;
  /** Base delay in ms for exponential backoff (default: 250) */
  baseDelayMs?: number;
  /** Max delay cap in ms (default: 5000) */
  maxDelayMs?: number;
  /** Jitter factor 0-1 to randomize delay (default: 0.2) */
  jitterFactor?: number;
}

/** Timeout and retry discipline shared by every outbound capability call. */
export interface CapabilityPolicy extends RetryPolicy {
  /** Overall budget for one call, response body included (default: 10000) */
  timeoutMs?: number;
  /** Budget for the TCP connect of the pooled transport; kept below `timeoutMs` (default: 3000) */
  connectTimeoutMs?: number;
}

/** Asks an external planner for a plan. Returns raw text expected to be plan JSON. */
export type PlanOracle = (instruction: string, requestText: string, hints: RequestHints) => Promise<string>;

/** Asks an external writer for the final answer given everything the run observed. */
export type ComposeOracle = (requestText: string, plan: Plan, observations: string[]) => Promise<string>;

/** Engine configuration, independent of the HTTP framework. */
export interface CoreConfig {
  /** JSON-RPC endpoint of each specialist */
  capabilities: Record<Capability, string>;
  /** Returns a LanguageModel for the given model ID (or default). Omit to run without oracles. */
  model?: (model?: string) => LanguageModel;
  /** Model ID passed to `model` for planning and composition */
  modelId?: string;
  /** Overrides the model-backed plan oracle */
  planOracle?: PlanOracle;
  /** Overrides the model-backed composition oracle */
  composeOracle?: ComposeOracle;
  /** Timeouts and retries for capability calls */
  policy?: CapabilityPolicy;
  /** Retries for oracle calls (default: one retry) */
  oracleRetry?: RetryPolicy;
  /** Plan budgets; unspecified fields keep the defaults */
  limits?: Partial<PlanLimits>;
  /** Append the trace log to router replies */
  debugTrace?: boolean;
  /** Transport used for capability calls; it owns its connection settings (default: undici pool) */
  fetch?: typeof fetch;
  /** Storage for JSON-RPC tasks (default: in-memory) */
  tasks?: TaskStore;
}

/** Internal context passed to all core handlers and factories. */
export interface OrchestratorContext {
  capabilities: CapabilityRegistry;
  client: CapabilityClient;
  planOracle?: PlanOracle;
  composeOracle?: ComposeOracle;
  limits: PlanLimits;
  tasks: TaskStore;
  config: CoreConfig;
}
