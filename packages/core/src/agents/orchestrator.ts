import type { AgentRequest, CoreConfig, OrchestratorContext } from "../types.js";
import type { Message } from "../schemas/rpc.schemas.js";
import { routerRequestSchema, type RouterResponse } from "../schemas/router.schemas.js";
import { CapabilityRegistry } from "../registry/capability-registry.js";
import { CapabilityClient } from "../capabilities/capability-client.js";
import { buildTextMessage, messageText } from "../capabilities/envelope.js";
import { createInMemoryTaskStore } from "../storage/in-memory/task-store.js";
import { createSSEStream, type SSEWriter } from "../streaming/sse-writer.js";
import { AgentEventBus } from "../events/agent-events.js";
import { BUS_EVENTS, BUS_TO_SSE_MAP, FORWARDED_BUS_EVENTS, SSE_EVENTS, STATUS_CODES } from "../events/events.js";
import { extractHints } from "../plan/hints.js";
import { buildPlannerInstruction, proposePlan } from "../plan/plan-oracle.js";
import { toWirePlan, validatePlan } from "../plan/validate-plan.js";
import { buildFallbackPlan } from "../plan/fallback-plan.js";
import { PLAN_LIMITS, type Plan, type RequestHints, type WirePlan } from "../plan/types.js";
import { createModelComposeOracle, createModelPlanOracle } from "../utils/model-oracles.js";
import { emitStatus, generateRunId, getEventBus, runStore } from "../utils/run-context.js";
import { DEFAULTS } from "../utils/constants.js";
import { composeAnswer } from "./answer-composer.js";
import {
  createExecutionState,
  executePlan,
  finish,
  startExecution,
  type CapabilityResult,
  type ExecutionState,
} from "./plan-executor.js";

export type PlanSource = "oracle" | "fallback";

export interface OrchestrationResult {
  runId: string;
  answer: string;
  plan: WirePlan;
  planSource: PlanSource;
  hints: RequestHints;
  accumulated: Partial<Record<string, CapabilityResult>>;
  log: string[];
  durationMs: number;
}

export interface OrchestrationOptions {
  runId?: string;
  /** Bus that receives plan, step, capability and status events */
  events?: AgentEventBus;
  abortSignal?: AbortSignal;
}

/**
 * Wires the registry, capability client, oracles and task store for one
 * process. Oracles are only created when a model (or an explicit oracle) is
 * configured; without them every request runs the fallback plan.
 */
export function createOrchestratorContext(config: CoreConfig): OrchestratorContext {
  const capabilities = new CapabilityRegistry(config.capabilities);
  const client = new CapabilityClient(capabilities, config.policy, config.fetch);
  const model = config.model?.(config.modelId);
  const oracleRetry = config.oracleRetry ?? { maxRetries: DEFAULTS.ORACLE_MAX_RETRIES };

  return {
    capabilities,
    client,
    planOracle: config.planOracle ?? (model ? createModelPlanOracle(model, oracleRetry) : undefined),
    composeOracle: config.composeOracle ?? (model ? createModelComposeOracle(model, oracleRetry) : undefined),
    limits: { ...PLAN_LIMITS, ...config.limits },
    tasks: config.tasks ?? createInMemoryTaskStore(),
    config,
  };
}

async function acquirePlan(ctx: OrchestratorContext, state: ExecutionState): Promise<{ plan: Plan; source: PlanSource }> {
  emitStatus({ code: STATUS_CODES.PLANNING, message: "Building execution plan" });
  const instruction = buildPlannerInstruction(ctx.capabilities.describe(), ctx.limits);
  const candidate = await proposePlan(ctx.planOracle, state.requestText, state.hints, instruction);
  const validated = validatePlan(candidate, ctx.limits);

  let result: { plan: Plan; source: PlanSource };
  if (validated) {
    result = { plan: validated, source: "oracle" };
  } else {
    emitStatus({ code: STATUS_CODES.FALLBACK_PLAN, message: "Using fallback plan" });
    result = { plan: buildFallbackPlan(state.requestText, state.hints), source: "fallback" };
  }

  const wire = toWirePlan(result.plan);
  state.log.push(`Planner -> Router: ${JSON.stringify(wire)}`);
  getEventBus()?.emit(BUS_EVENTS.PLAN, { plan: wire, source: result.source });
  return result;
}

/**
 * One request, start to finish: hints, plan (oracle or fallback), execution,
 * composition. Capability failures are folded into the answer, not thrown.
 */
export async function runOrchestration(
  ctx: OrchestratorContext,
  requestText: string,
  options: OrchestrationOptions = {},
): Promise<OrchestrationResult> {
  const runId = generateRunId(options.runId);
  const events = options.events ?? new AgentEventBus(runId);

  return runStore.run({ runId, events, abortSignal: options.abortSignal }, async () => {
    const start = performance.now();
    const state = createExecutionState(requestText, extractHints(requestText));

    const { plan, source } = await acquirePlan(ctx, state);
    startExecution(state, plan);
    await executePlan(state, ctx.client);
    const answer = await composeAnswer(state, ctx.composeOracle);
    finish(state);

    return {
      runId,
      answer,
      plan: toWirePlan(plan),
      planSource: source,
      hints: state.hints,
      accumulated: state.accumulated,
      log: state.log,
      durationMs: Math.round(performance.now() - start),
    };
  });
}

function toRouterResponse(result: OrchestrationResult): RouterResponse {
  return {
    response: result.answer,
    runId: result.runId,
    plan: result.plan,
    planSource: result.planSource,
    hints: result.hints,
    log: result.log,
    durationMs: result.durationMs,
  };
}

// ── Serialized stream writer
interface StreamWriter {
  write(event: string, data: Record<string, unknown>): Promise<void>;
  flush(): Promise<void>;
}

function createStreamWriter(stream: SSEWriter): StreamWriter {
  let id = 0;
  let chain = Promise.resolve();
  return {
    write(event: string, data: Record<string, unknown>) {
      chain = chain
        .then(() => stream.writeSSE({ id: String(id++), event, data: JSON.stringify(data) }))
        .catch((err: unknown) => console.error("[orchestrator] SSE write failed:", err));
      return chain;
    },
    flush() { return chain; },
  };
}

function bridgeBusToStream(bus: AgentEventBus, writer: StreamWriter): () => void {
  return bus.subscribe((event) => {
    if (!FORWARDED_BUS_EVENTS.has(event.type)) return;
    const sseEvent = BUS_TO_SSE_MAP[event.type] ?? event.type;
    void writer.write(sseEvent, event.data);
  });
}

async function readRouterRequest(req: AgentRequest) {
  const body = await req.json().catch(() => undefined);
  return routerRequestSchema.safeParse(body);
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

// ── JSON handler
function buildJsonHandler(ctx: OrchestratorContext) {
  return async (req: AgentRequest): Promise<Response> => {
    const parsed = await readRouterRequest(req);
    if (!parsed.success) return jsonResponse({ error: "Request body must be JSON with a non-empty \"message\"" }, 400);

    const result = await runOrchestration(ctx, parsed.data.message, {
      runId: parsed.data.runId,
      abortSignal: req.signal,
    });
    return jsonResponse(toRouterResponse(result));
  };
}

// ── SSE Handler ──────────────────────────────────────
function buildSseHandler(ctx: OrchestratorContext) {
  return async (req: AgentRequest): Promise<Response> => {
    const parsed = await readRouterRequest(req);
    if (!parsed.success) return jsonResponse({ error: "Request body must be JSON with a non-empty \"message\"" }, 400);

    const { message } = parsed.data;
    const runId = generateRunId(parsed.data.runId);
    const abortSignal = req.signal;

    return createSSEStream(async (writer) => {
      const swriter = createStreamWriter(writer);
      const bus = new AgentEventBus(runId);
      const unsub = bridgeBusToStream(bus, swriter);
      await swriter.write(SSE_EVENTS.SESSION_START, { runId });
      try {
        await swriter.write(SSE_EVENTS.STATUS, { code: STATUS_CODES.PLANNING, message: "Request received" });
        const result = await runOrchestration(ctx, message, { runId, events: bus, abortSignal });
        await swriter.flush();
        await swriter.write(SSE_EVENTS.TEXT_DELTA, { text: result.answer });
        await swriter.write(SSE_EVENTS.DONE, toRouterResponse(result));
      } catch (err: unknown) {
        const errorMessage = err instanceof Error ? err.message : String(err);
        console.error(`[orchestrator:${runId}] SSE error:`, errorMessage);
        await swriter.write(SSE_EVENTS.ERROR, { runId, error: errorMessage });
      } finally {
        unsub();
      }
    }, abortSignal);
  };
}

export function createRouterHandlers(ctx: OrchestratorContext) {
  const jsonHandler = buildJsonHandler(ctx);
  const sseHandler = buildSseHandler(ctx);
  return {
    jsonHandler,
    sseHandler,
    /** Picks the SSE or JSON handler by what the client asked for */
    handle: (req: AgentRequest) => (req.wantsEventStream ? sseHandler(req) : jsonHandler(req)),
  };
}

/** Adapts orchestration to a JSON-RPC agent skill: request text in, answer text out. */
export function routerSkill(ctx: OrchestratorContext) {
  return async (message: Message): Promise<Message> => {
    const result = await runOrchestration(ctx, messageText(message));
    const answer = ctx.config.debugTrace
      ? `${result.answer}\n\nA2A log:\n- ${result.log.join("\n- ")}`
      : result.answer;
    return buildTextMessage(answer);
  };
}
