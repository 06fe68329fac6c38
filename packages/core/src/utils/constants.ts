/** Default configuration values */
export const DEFAULTS = {
  CAPABILITY_TIMEOUT_MS: 10_000,
  CAPABILITY_CONNECT_TIMEOUT_MS: 3_000,
  ORACLE_MAX_RETRIES: 1,
  APOLOGY: "I'm sorry, I was unable to produce a response.",
  /** Payload field that carries the data capability's result into later steps */
  PRIOR_CONTEXT_FIELD: "data_context",
  SUMMARY_LENGTH_LIMIT: 200,
} as const;

/** Keys left out when a data result is summarized as JSON */
export const SUMMARY_EXCLUDED_KEYS = new Set(["tool_calls", "tool_calls_executed", "logs"]);
