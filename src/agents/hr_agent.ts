import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { DomainChatAgent } from "./domain_agent.js";

export function createHrAgent(llm: BaseChatModel) {
  return DomainChatAgent.init({
    llm,
    options: {
      agent: "hr",
      name: "People Directory Specialist",
      styleGuide:
        "Answer questions about employees, teams, reporting lines, skills and roles. Name people and their titles precisely, list who to contact next, and never guess at personal data that is not in the context."
    }
  });
}
