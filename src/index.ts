export * from "./agents/types.js";
export { AgentRouter, type AgentRouterOptions } from "./agents/agent_router.js";
export { loadVocabulary, compileVocabulary, parseVocabulary, tokenize } from "./agents/vocabulary.js";
export type { CompiledVocabulary, VocabularyEntry, VocabularyTable } from "./agents/vocabulary.js";
export {
  Orchestrator,
  invocationFailureAnswer,
  INVOCATION_FAILURE_TAG,
  type OrchestratorOptions,
  type TurnOutcome
} from "./agents/orchestrator.js";
export { DomainAgentInvoker } from "./agents/agent_invoker.js";
export { DomainChatAgent, answerCardSchema, type RetrieverLike } from "./agents/domain_agent.js";
export { sanitize } from "./recovery/sanitizer.js";
export { extractCandidate, locateCandidate, type Extraction, type ExtractionMethod } from "./recovery/extractor.js";
export { normalize, normalizeSources, type NormalizationMode } from "./recovery/normalizer.js";
export { recoverStructuredAnswer, parseCandidate, type ParseResult, type RecoveryReport } from "./recovery/pipeline.js";
export { ConversationContext } from "./session/conversation_context.js";
export { SessionStore } from "./session/session_store.js";
export { renderAnswerCard, type AnswerCardOptions } from "./answer_card.js";
export { loadConfig, type AppConfig } from "./config.js";
export { createAnswerDesk, type AnswerDesk } from "./multi_agent_system.js";
