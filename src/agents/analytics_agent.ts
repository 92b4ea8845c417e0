import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { DomainChatAgent } from "./domain_agent.js";

export function createAnalyticsAgent(llm: BaseChatModel) {
  return DomainChatAgent.init({
    llm,
    options: {
      agent: "analytics",
      name: "Business Analytics Calculator",
      styleGuide:
        "Work through payroll, budget and business-metric calculations step by step. Show the formula and intermediate values in a Markdown table, round currency to two decimals, and state every assumption as a user notice."
    }
  });
}
