import { randomUUID } from "node:crypto";
import type { ZodType } from "zod";
import type { TaskStore } from "../storage/interfaces.js";
import {
  messageSendParamsSchema,
  taskIdParamsSchema,
  type AgentCard,
  type Message,
  type RpcRequest,
  type Task,
  type TaskStatusUpdateEvent,
} from "../schemas/rpc.schemas.js";
import { buildTextMessage, messageText } from "../capabilities/envelope.js";
import { isRecord, tryParseJson } from "../utils/json.js";

/** Turns one inbound message into the agent's reply. */
export type AgentSkillHandler = (message: Message) => Promise<Message>;

/** Raised for requests the agent cannot answer; `status` is the HTTP status to send. */
export class RpcMethodError extends Error {
  constructor(
    readonly status: 400 | 404,
    message: string,
  ) {
    super(message);
    this.name = "RpcMethodError";
  }
}

export interface AgentRequestHandler {
  readonly card: AgentCard;
  onMessageSend(params: unknown): Promise<Task>;
  onMessageSendStream(params: unknown): AsyncGenerator<TaskStatusUpdateEvent>;
  onGetTask(params: unknown): Promise<Task>;
  onCancelTask(params: unknown): Promise<Task>;
}

export interface AgentRequestHandlerOptions {
  card: AgentCard;
  skill: AgentSkillHandler;
  tasks: TaskStore;
}

function parseParams<T>(schema: ZodType<T>, params: unknown): T {
  const parsed = schema.safeParse(params);
  if (!parsed.success) throw new RpcMethodError(400, "Invalid params");
  return parsed.data;
}

/**
 * Wraps a skill that works on JSON objects. Text that does not parse to an
 * object reaches the skill as `undefined`; whatever it returns is sent back
 * JSON-stringified as a single text part.
 */
export function jsonSkill(
  fn: (input: Record<string, unknown> | undefined, text: string) => Record<string, unknown> | Promise<Record<string, unknown>>,
): AgentSkillHandler {
  return async (message) => {
    const text = messageText(message);
    const parsed = tryParseJson(text);
    const reply = await fn(isRecord(parsed) ? parsed : undefined, text);
    return buildTextMessage(JSON.stringify(reply));
  };
}

/**
 * JSON-RPC agent behaviour independent of the HTTP framework: runs the skill,
 * records each exchange as a task with history `[inbound, reply]`.
 */
export function createAgentRequestHandler({ card, skill, tasks }: AgentRequestHandlerOptions): AgentRequestHandler {
  async function answer(message: Message): Promise<Task> {
    const taskId = message.taskId ?? randomUUID();
    const contextId = message.contextId ?? randomUUID();
    const inbound: Message = { ...message, taskId, contextId };
    const reply = await skill(inbound);
    const outbound: Message = { ...reply, taskId, contextId };
    return tasks.save({
      id: taskId,
      contextId,
      history: [inbound, outbound],
      status: { state: "completed", message: outbound },
    });
  }

  function requireTask(found: Task | undefined): Task {
    if (!found) throw new RpcMethodError(404, "Task not found");
    return found;
  }

  return {
    card,

    async onMessageSend(params) {
      const { message } = parseParams(messageSendParamsSchema, params);
      return answer(message);
    },

    async *onMessageSendStream(params) {
      const { message } = parseParams(messageSendParamsSchema, params);
      const taskId = message.taskId ?? randomUUID();
      const contextId = message.contextId ?? randomUUID();
      yield { taskId, contextId, status: { state: "running" }, final: false };
      const task = await answer({ ...message, taskId, contextId });
      yield { taskId, contextId, status: task.status, final: true };
    },

    async onGetTask(params) {
      const { id } = parseParams(taskIdParamsSchema, params);
      return requireTask(await tasks.get(id));
    },

    async onCancelTask(params) {
      const { id } = parseParams(taskIdParamsSchema, params);
      return requireTask(await tasks.cancel(id));
    },
  };
}

/** Unary dispatch for everything except `message/send_stream`. */
export async function dispatchRpc(handler: AgentRequestHandler, request: RpcRequest): Promise<Task> {
  switch (request.method) {
    case "message/send":
      return handler.onMessageSend(request.params);
    case "tasks/get":
      return handler.onGetTask(request.params);
    case "tasks/cancel":
      return handler.onCancelTask(request.params);
    default:
      throw new RpcMethodError(404, "Unknown method");
  }
}
