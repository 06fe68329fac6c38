// ── Core types ──
export type {
  AgentRequest,
  CoreConfig,
  OrchestratorContext,
  RetryPolicy,
  CapabilityPolicy,
  PlanOracle,
  ComposeOracle,
} from "./types.js";

// ── Plan ──
export {
  CAPABILITIES,
  FINAL_ANSWER_STRATEGIES,
  PLAN_LIMITS,
  ID_COLLECTION_FIELDS,
  isCapability,
} from "./plan/types.js";
export type {
  Capability,
  JsonValue,
  PlanPayload,
  RequestHints,
  SingleCall,
  ParallelGroup,
  PlanStep,
  FinalAnswerStrategy,
  Plan,
  PlanLimits,
  WirePlan,
  WirePlanCall,
} from "./plan/types.js";
export { extractHints } from "./plan/hints.js";
export { validatePlan, countPlanCalls, toWirePlan } from "./plan/validate-plan.js";
export { buildFallbackPlan } from "./plan/fallback-plan.js";
export { buildPlannerInstruction, proposePlan } from "./plan/plan-oracle.js";

// ── Registry ──
export { CapabilityRegistry, DEFAULT_DESCRIPTIONS, describeCapabilities } from "./registry/capability-registry.js";
export type { CapabilityRegistration } from "./registry/capability-registry.js";

// ── Capabilities ──
export { CapabilityClient, CapabilityError, parseReplyText } from "./capabilities/capability-client.js";
export type { CapabilityFailure, CapabilityFailureKind, CapabilityReply } from "./capabilities/capability-client.js";
export { buildTextMessage, buildMessageSendRequest, messageText, finalMessageText } from "./capabilities/envelope.js";

// ── Agents ──
export {
  createOrchestratorContext,
  runOrchestration,
  createRouterHandlers,
  routerSkill,
} from "./agents/orchestrator.js";
export type { OrchestrationResult, OrchestrationOptions, PlanSource } from "./agents/orchestrator.js";
export {
  createExecutionState,
  startExecution,
  advance,
  finish,
  executePlan,
  runStep,
  prepareCallPayload,
  isFailureMarker,
  isBatchResult,
} from "./agents/plan-executor.js";
export type { ExecutionState, ExecutorPhase, CapabilityResult, FailureMarker, BatchResult, StepOutcome } from "./agents/plan-executor.js";
export { composeAnswer, buildObservations, terminalFallback, replyText, summarizeData } from "./agents/answer-composer.js";

// ── JSON-RPC agents ──
export { createAgentRequestHandler, dispatchRpc, jsonSkill, RpcMethodError } from "./rpc/agent-request-handler.js";
export type { AgentRequestHandler, AgentRequestHandlerOptions, AgentSkillHandler } from "./rpc/agent-request-handler.js";

// ── Schemas ──
export {
  messageSchema,
  taskSchema,
  taskStatusUpdateEventSchema,
  rpcRequestSchema,
  rpcResponseSchema,
  agentCardSchema,
} from "./schemas/rpc.schemas.js";
export type { Message, Task, TaskState, TaskStatus, TaskStatusUpdateEvent, RpcRequest, AgentCard, AgentSkill } from "./schemas/rpc.schemas.js";
export { routerRequestSchema, routerResponseSchema, wirePlanSchema } from "./schemas/router.schemas.js";
export type { RouterRequest, RouterResponse } from "./schemas/router.schemas.js";

// ── Events ──
export { AgentEventBus } from "./events/agent-events.js";
export type { AgentEvent } from "./events/agent-events.js";
export { SSE_EVENTS, BUS_EVENTS, BUS_TO_SSE_MAP, FORWARDED_BUS_EVENTS, STATUS_CODES } from "./events/events.js";
export type { SseEventName, BusEventName, StatusCode } from "./events/events.js";

// ── Constants ──
export { DEFAULTS } from "./utils/constants.js";

// ── JSON helpers ──
export { isRecord, tryParseJson, stripCodeFences } from "./utils/json.js";

// ── Run context ──
export { runStore, getEventBus, getAbortSignal, generateRunId, emitStatus } from "./utils/run-context.js";
export type { RunContext, StatusPayload } from "./utils/run-context.js";

// ── Oracles ──
export { createModelPlanOracle, createModelComposeOracle } from "./utils/model-oracles.js";
export { withResilience, isRetryableError } from "./utils/resilience.js";

// ── Streaming ──
export { createSSEStream } from "./streaming/sse-writer.js";
export type { SSEWriter, SSEMessage } from "./streaming/sse-writer.js";

// ── Storage ──
export type { TaskStore } from "./storage/interfaces.js";
export { createInMemoryTaskStore } from "./storage/in-memory/task-store.js";
