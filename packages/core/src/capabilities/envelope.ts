import { randomUUID } from "node:crypto";
import type { Message, Task } from "../schemas/rpc.schemas.js";

export function buildTextMessage(
  text: string,
  role: Message["role"] = "agent",
  ids: { taskId?: string; contextId?: string } = {},
): Message {
  return {
    messageId: randomUUID(),
    role,
    parts: [{ text }],
    ...(ids.taskId && { taskId: ids.taskId }),
    ...(ids.contextId && { contextId: ids.contextId }),
  };
}

/** JSON-RPC 2.0 `message/send` request carrying `text` as a single user text part. */
export function buildMessageSendRequest(text: string) {
  return {
    jsonrpc: "2.0" as const,
    id: randomUUID(),
    method: "message/send",
    params: { message: buildTextMessage(text, "user") },
  };
}

export function messageText(message: Message | null | undefined): string {
  return message?.parts.map((p) => p.text).join("") ?? "";
}

/** Text of the agent's reply: the last history entry after the inbound message, else the status message. */
export function finalMessageText(task: Task): string {
  if (task.history.length > 1) return messageText(task.history[task.history.length - 1]);
  return messageText(task.status.message);
}
