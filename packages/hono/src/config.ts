import { z } from "zod";
import { CAPABILITIES, type Capability, type CapabilityPolicy } from "@relaydesk/core";

const optionalString = z.preprocess((v) => (v === "" ? undefined : v), z.string().optional());
const optionalUrl = z.preprocess((v) => (v === "" ? undefined : v), z.string().url().optional());

const envSchema = z.object({
  HOST: z.string().default("127.0.0.1"),
  PORT: z.coerce.number().int().positive().default(8010),
  SPECIALIST_PORTS: z.coerce.number().int().positive().default(8011),
  DATA_AGENT_RPC: optionalUrl,
  SUPPORT_AGENT_RPC: optionalUrl,
  BILLING_AGENT_RPC: optionalUrl,
  ROUTER_LLM_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_API_KEY: optionalString,
  CAPABILITY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  CAPABILITY_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(3_000),
  CAPABILITY_MAX_RETRIES: z.coerce.number().int().min(0).default(0),
  DEBUG_A2A_LOGS: optionalString,
});

export interface ServerConfig {
  host: string;
  port: number;
  /** First specialist port; data, support and billing take consecutive ports */
  specialistBasePort: number;
  capabilities: Record<Capability, string>;
  modelId: string;
  openaiApiKey?: string;
  policy: CapabilityPolicy;
  debugTrace: boolean;
}

const ENDPOINT_VARS = {
  data: "DATA_AGENT_RPC",
  support: "SUPPORT_AGENT_RPC",
  billing: "BILLING_AGENT_RPC",
} as const satisfies Record<Capability, keyof z.infer<typeof envSchema>>;

export function loadServerConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;

  const endpoint = (name: Capability) =>
    e[ENDPOINT_VARS[name]] ?? `http://${e.HOST}:${e.SPECIALIST_PORTS + CAPABILITIES.indexOf(name)}/rpc`;

  return {
    host: e.HOST,
    port: e.PORT,
    specialistBasePort: e.SPECIALIST_PORTS,
    capabilities: { data: endpoint("data"), support: endpoint("support"), billing: endpoint("billing") },
    modelId: e.ROUTER_LLM_MODEL,
    openaiApiKey: e.OPENAI_API_KEY,
    policy: {
      timeoutMs: e.CAPABILITY_TIMEOUT_MS,
      connectTimeoutMs: e.CAPABILITY_CONNECT_TIMEOUT_MS,
      maxRetries: e.CAPABILITY_MAX_RETRIES,
    },
    debugTrace: e.DEBUG_A2A_LOGS === "1",
  };
}
