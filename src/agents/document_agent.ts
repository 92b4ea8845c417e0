import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { RetrieverLike } from "./domain_agent.js";
import { DomainChatAgent } from "./domain_agent.js";

export function createDocumentAgent(llm: BaseChatModel, retriever?: RetrieverLike) {
  return DomainChatAgent.init({
    llm,
    retriever,
    options: {
      agent: "documents",
      name: "Company Knowledge Assistant",
      styleGuide:
        "Answer only from the internal documents in the context. Structure policy answers as summary, key rules or steps, and who to contact. Cite every document you used in sources, and if the answer is not in the context say that the information is not available in the current documents."
    }
  });
}
