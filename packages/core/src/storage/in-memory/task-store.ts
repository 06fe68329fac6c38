import type { Task } from "../../schemas/rpc.schemas.js";
import type { TaskStore } from "../interfaces.js";

/** Ephemeral task store; contents are lost on restart. */
export function createInMemoryTaskStore(): TaskStore {
  const store = new Map<string, Task>();

  return {
    async save(task) {
      store.set(task.id, task);
      return task;
    },

    async get(id) {
      return store.get(id);
    },

    async cancel(id) {
      const task = store.get(id);
      if (!task) return undefined;
      const canceled: Task = { ...task, status: { ...task.status, state: "canceled" } };
      store.set(id, canceled);
      return canceled;
    },

    async list() {
      return [...store.values()];
    },
  };
}
