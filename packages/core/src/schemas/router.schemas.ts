import { z } from "zod";

export const routerRequestSchema = z.object({
  message: z.string().min(1),
  runId: z.string().optional(),
});

const wirePlanCallSchema = z.object({
  agent: z.enum(["data", "support", "billing"]),
  payload: z.record(z.unknown()),
});

export const wirePlanSchema = z.object({
  steps: z.array(z.union([wirePlanCallSchema, z.object({ parallel: z.array(wirePlanCallSchema) })])),
  final_answer_strategy: z.enum(["last_step_text", "compose"]),
});

export const routerResponseSchema = z.object({
  response: z.string(),
  runId: z.string(),
  plan: wirePlanSchema,
  planSource: z.enum(["oracle", "fallback"]),
  hints: z.object({ customerId: z.number().nullable(), email: z.string().nullable() }),
  log: z.array(z.string()),
  durationMs: z.number(),
});

export type RouterRequest = z.infer<typeof routerRequestSchema>;
export type RouterResponse = z.infer<typeof routerResponseSchema>;
