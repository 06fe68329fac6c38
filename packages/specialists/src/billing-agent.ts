import { isRecord, jsonSkill, type AgentSkillHandler } from "@relaydesk/core";

function findCustomer(context: Record<string, unknown>): Record<string, unknown> | null {
  if (isRecord(context.customer)) return context.customer;
  if (isRecord(context.data_context) && isRecord(context.data_context.customer)) return context.data_context.customer;
  return null;
}

export function buildBillingReply(request: string, context: Record<string, unknown>, billingIssue: string): string {
  const lines = ["Billing support on it."];
  const customer = findCustomer(context);
  if (customer) {
    const email = typeof customer.email === "string" ? customer.email : "no email on file";
    lines.push(`Account ${String(customer.id)} (${email}) noted.`);
  }
  if (billingIssue) lines.push(`Issue details: ${billingIssue}`);
  lines.push(`Request: ${request}`);
  lines.push("Next steps: we'll verify the transactions and confirm once any refund has been applied.");
  return lines.join(" ");
}

/** Acknowledges billing requests. Returns `{ reply, handled }`; non-JSON input is answered with `handled: false`. */
export function createBillingSkill(): AgentSkillHandler {
  return jsonSkill((input, text) => {
    if (!input) {
      return {
        reply: buildBillingReply(text.trim() || "Billing question", {}, ""),
        handled: false,
        error: "Invalid structured request: expected JSON",
      };
    }
    const request = typeof input.request === "string" && input.request.trim() ? input.request.trim() : "Billing question";
    const context = isRecord(input.data_context) ? input.data_context : {};
    const billingIssue = typeof input.billing_issue === "string" ? input.billing_issue.trim() : "";
    return { reply: buildBillingReply(request, context, billingIssue), handled: true };
  });
}
