import { describe, it, expect } from "vitest";
import { buildTextMessage, messageText } from "@relaydesk/core";
import { buildSuggestions, createSupportSkill, summarizeContext } from "./support-agent.js";

async function reply(input: unknown): Promise<unknown> {
  const text = typeof input === "string" ? input : JSON.stringify(input);
  return JSON.parse(messageText(await createSupportSkill()(buildTextMessage(text, "user"))));
}

describe("createSupportSkill", () => {
  it("summarizes the account when data context is present", async () => {
    const dataReply = {
      handled: true,
      summary: "Fetched customer record and history for 5",
      data_context: {
        customer: { id: 5, name: "Eli Novak", status: "active" },
        history: [{ id: 6, status: "open", issue: "Charged twice for March subscription" }],
      },
    };

    expect(await reply({ request: "Get customer information for ID 5", data_context: dataReply })).toEqual({
      reply: [
        "Hi there, I took a look at the recent notes on your account.",
        "Account Eli Novak is currently active. Latest ticket #6 (open): Charged twice for March subscription.",
        "Here's what I'd suggest for \"Get customer information for ID 5\":",
        "- Let me know any specifics you want us to double-check.",
        "- We can schedule a quick follow-up if you'd like more help.",
        "- If you need urgent assistance, reply here and we'll prioritize your request.",
        "We're here to help. Reply to this message if you'd like me to take action now.",
      ].join("\n"),
    });
  });

  it("answers sign-in trouble without context", async () => {
    expect(await reply({ request: "I can't log in", data_context: {} })).toEqual({
      reply: [
        "Hi there, thanks for reaching out.",
        "It looks like you're having trouble signing in.",
        "Here's what I'd suggest for \"I can't log in\":",
        "- Try resetting your password and confirm you can sign in from a trusted browser.",
        "- If the issue persists, send us the exact error message so we can investigate quickly.",
        "- If you need urgent assistance, reply here and we'll prioritize your request.",
        "We're here to help. Reply to this message if you'd like me to take action now.",
      ].join("\n"),
    });
  });

  it("treats plain text as the request", async () => {
    expect(await reply("Just saying hello")).toEqual({
      reply: [
        "Hi there, thanks for reaching out.",
        "Here's what I'd suggest for \"Just saying hello\":",
        "- Let me know any specifics you want us to double-check.",
        "- We can schedule a quick follow-up if you'd like more help.",
        "- If you need urgent assistance, reply here and we'll prioritize your request.",
        "We're here to help. Reply to this message if you'd like me to take action now.",
      ].join("\n"),
    });
  });
});

describe("buildSuggestions", () => {
  it("uses the first matching topic", () => {
    expect(buildSuggestions("Ticket history please")).toEqual([
      "We'll open a support ticket and keep you updated via email.",
      "Feel free to reply with any screenshots or timestamps to speed things up.",
      "If you need urgent assistance, reply here and we'll prioritize your request.",
    ]);
  });
});

describe("summarizeContext", () => {
  it("handles strings, summaries and unknown shapes", () => {
    expect(summarizeContext("  account note ")).toBe("account note");
    expect(summarizeContext({ summary: "Compiled report" })).toBe("Compiled report.");
    expect(summarizeContext({ plan: "pro" })).toBe('{"plan":"pro"}');
    expect(summarizeContext(42)).toBe("");
  });
});
