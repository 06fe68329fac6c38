import { isRecord, jsonSkill, type AgentSkillHandler } from "@relaydesk/core";

const SUGGESTIONS: Array<{ pattern: RegExp; lines: string[] }> = [
  {
    pattern: /login|log in|password|sign in/,
    lines: [
      "Try resetting your password and confirm you can sign in from a trusted browser.",
      "If the issue persists, send us the exact error message so we can investigate quickly.",
    ],
  },
  {
    pattern: /ticket|issue/,
    lines: [
      "We'll open a support ticket and keep you updated via email.",
      "Feel free to reply with any screenshots or timestamps to speed things up.",
    ],
  },
  {
    pattern: /history|follow/,
    lines: [
      "We reviewed your recent activity and will keep monitoring for any new updates.",
      "If anything changes, let us know and we can adjust the plan together.",
    ],
  },
];

const DEFAULT_SUGGESTIONS = [
  "Let me know any specifics you want us to double-check.",
  "We can schedule a quick follow-up if you'd like more help.",
];

const URGENT_SUGGESTION = "If you need urgent assistance, reply here and we'll prioritize your request.";

export function buildSuggestions(request: string): string[] {
  const lower = request.toLowerCase();
  const match = SUGGESTIONS.find((s) => s.pattern.test(lower));
  return [...(match?.lines ?? DEFAULT_SUGGESTIONS), URGENT_SUGGESTION];
}

function hasContext(context: unknown): boolean {
  if (typeof context === "string") return context.trim() !== "";
  return isRecord(context) && Object.keys(context).length > 0;
}

/** One or two sentences about the account, from whatever the data agent returned. */
export function summarizeContext(context: unknown): string {
  if (typeof context === "string") return context.trim().slice(0, 200);
  if (!isRecord(context)) return "";
  const inner = isRecord(context.data_context) ? context.data_context : context;

  const sentences: string[] = [];
  const customer = inner.customer;
  if (isRecord(customer) && typeof customer.name === "string") {
    sentences.push(`Account ${customer.name} is currently ${typeof customer.status === "string" ? customer.status : "noted"}.`);
  }
  const history = inner.history;
  if (Array.isArray(history) && isRecord(history[0])) {
    const latest = history[0];
    const issue = typeof latest.issue === "string" ? latest.issue : "recent activity";
    sentences.push(`Latest ticket #${String(latest.id)} (${String(latest.status)}): ${issue}.`);
  }
  if (sentences.length > 0) return sentences.join(" ");
  if (typeof context.summary === "string" && context.summary.trim()) return `${context.summary.trim()}.`;
  return JSON.stringify(context).slice(0, 200);
}

/** Templated customer-facing reply. Returns `{ reply }`. */
export function createSupportSkill(): AgentSkillHandler {
  return jsonSkill((input, text) => {
    const request = (input ? (typeof input.request === "string" ? input.request : "") : text).trim();
    const context = input?.data_context;
    const lower = request.toLowerCase();

    const intro = hasContext(context)
      ? "Hi there, I took a look at the recent notes on your account."
      : "Hi there, thanks for reaching out.";

    let contextLine = "";
    if (/login|log in|sign in/.test(lower)) contextLine = "It looks like you're having trouble signing in.";
    else if (/ticket|issue/.test(lower)) contextLine = "I see you're dealing with an issue you'd like us to track.";
    else if (hasContext(context)) contextLine = summarizeContext(context);

    const lines = [
      intro,
      contextLine,
      request ? `Here's what I'd suggest for "${request}":` : "Here's what I'd suggest:",
      ...buildSuggestions(request).slice(0, 3).map((s) => `- ${s}`),
      "We're here to help. Reply to this message if you'd like me to take action now.",
    ];
    return { reply: lines.filter(Boolean).join("\n") };
  });
}
