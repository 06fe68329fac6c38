import { z } from "zod";

export const textPartSchema = z.object({ text: z.string() });

export const messageSchema = z.object({
  messageId: z.string(),
  role: z.enum(["user", "agent"]),
  parts: z.array(textPartSchema),
  taskId: z.string().nullish(),
  contextId: z.string().nullish(),
});

export const taskStateSchema = z.enum(["running", "completed", "canceled"]);

export const taskStatusSchema = z.object({
  state: taskStateSchema,
  message: messageSchema.nullish(),
});

export const taskSchema = z.object({
  id: z.string(),
  contextId: z.string(),
  history: z.array(messageSchema),
  status: taskStatusSchema,
});

export const taskStatusUpdateEventSchema = z.object({
  taskId: z.string(),
  contextId: z.string(),
  status: taskStatusSchema,
  final: z.boolean(),
});

export const messageSendParamsSchema = z.object({ message: messageSchema });

export const taskIdParamsSchema = z.object({ id: z.string().min(1) });

export const rpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0").default("2.0"),
  method: z.string().min(1),
  params: z.record(z.unknown()).nullish(),
  id: z.union([z.string(), z.number()]).nullish(),
});

export const rpcResponseSchema = z.object({
  jsonrpc: z.literal("2.0").optional(),
  id: z.union([z.string(), z.number()]).nullish(),
  result: z.unknown().optional(),
  error: z.object({ code: z.number().optional(), message: z.string() }).optional(),
});

export const agentSkillSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  tags: z.array(z.string()),
  inputModes: z.array(z.string()),
  outputModes: z.array(z.string()),
  examples: z.array(z.string()),
});

export const agentCardSchema = z.object({
  name: z.string(),
  description: z.string(),
  url: z.string(),
  version: z.string(),
  skills: z.array(agentSkillSchema),
  defaultInputModes: z.array(z.string()),
  defaultOutputModes: z.array(z.string()),
  capabilities: z.object({ streaming: z.boolean() }),
  provider: z.object({ organization: z.string(), url: z.string() }),
  documentationUrl: z.string().optional(),
  preferredTransport: z.string().optional(),
});

export type TextPart = z.infer<typeof textPartSchema>;
export type Message = z.infer<typeof messageSchema>;
export type TaskState = z.infer<typeof taskStateSchema>;
export type TaskStatus = z.infer<typeof taskStatusSchema>;
export type Task = z.infer<typeof taskSchema>;
export type TaskStatusUpdateEvent = z.infer<typeof taskStatusUpdateEventSchema>;
export type RpcRequest = z.infer<typeof rpcRequestSchema>;
export type AgentSkill = z.infer<typeof agentSkillSchema>;
export type AgentCard = z.infer<typeof agentCardSchema>;
