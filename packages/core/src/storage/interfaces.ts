import type { Task } from "../schemas/rpc.schemas.js";

/**
 * Keeps the JSON-RPC tasks an agent has answered so they can be fetched
 * or canceled later.
 *
 * @example
 * ```ts
 * const plugin = createRouterPlugin({ capabilities, tasks: new RedisTaskStore(client) });
 * ```
 */
export interface TaskStore {
  /** Insert or replace a task by id. */
  save(task: Task): Promise<Task>;
  get(id: string): Promise<Task | undefined>;
  /** Mark a task canceled. Returns `undefined` if it does not exist. */
  cancel(id: string): Promise<Task | undefined>;
  list(): Promise<Task[]>;
}
