import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { DomainChatAgent } from "./domain_agent.js";

export function createGeneralAgent(llm: BaseChatModel) {
  return DomainChatAgent.init({
    llm,
    options: {
      agent: "general",
      name: "Workplace Assistant",
      styleGuide:
        "Handle greetings and general questions briefly and professionally. When a request belongs to people lookup, business calculations or company documents, suggest a follow-up question phrased so that a specialist can pick it up."
    }
  });
}
