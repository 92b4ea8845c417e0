/**
 * ## 1. Setup & Imports
 */
import "dotenv/config";
import { fileURLToPath } from "node:url";
import { ChatOpenAI, OpenAIEmbeddings } from "@langchain/openai";
import type { RunnableConfig } from "@langchain/core/runnables";
import { CallbackHandler as LangfuseCallbackHandler } from "@langfuse/langchain";
import { Pinecone } from "@pinecone-database/pinecone";
import { PineconeStore } from "@langchain/pinecone";
import { loadConfig, type AppConfig } from "./config.js";
import { logger } from "./logger.js";
import { AgentRouter } from "./agents/agent_router.js";
import { DomainAgentInvoker } from "./agents/agent_invoker.js";
import type { DomainChatAgent, RetrieverLike } from "./agents/domain_agent.js";
import { createHrAgent } from "./agents/hr_agent.js";
import { createAnalyticsAgent } from "./agents/analytics_agent.js";
import { createDocumentAgent } from "./agents/document_agent.js";
import { createGeneralAgent } from "./agents/general_agent.js";
import { Orchestrator } from "./agents/orchestrator.js";
import type { AgentId } from "./agents/types.js";
import { SessionStore } from "./session/session_store.js";
import { renderAnswerCard } from "./answer_card.js";

/**
 * ## 2. Document Retrieval
 *
 * The documents agent reads from an already-populated Pinecone namespace.
 * Without Pinecone settings it answers from the prompt alone.
 */
async function resolveDocumentRetriever(config: AppConfig): Promise<RetrieverLike | undefined> {
  if (!config.pinecone) {
    logger.warn("Pinecone configuration missing. Document agent runs without retrieval.");
    return undefined;
  }
  const pinecone = new Pinecone({ apiKey: config.pinecone.apiKey });
  const embeddings = new OpenAIEmbeddings({
    apiKey: config.openRouter.apiKey,
    model: config.openRouter.embeddingModel,
    dimensions: config.openRouter.embeddingDim,
    configuration: {
      baseURL: config.openRouter.baseUrl
    }
  });
  const store = await PineconeStore.fromExistingIndex(embeddings, {
    pineconeIndex: pinecone.index(config.pinecone.index),
    namespace: config.pinecone.namespace
  });
  const retriever: RetrieverLike = store.asRetriever({ k: 5 });
  return retriever;
}

/**
 * ## 3. Agent Definitions
 */
function buildAgents(llm: ChatOpenAI, retriever: RetrieverLike | undefined) {
  return {
    hr: createHrAgent(llm),
    analytics: createAnalyticsAgent(llm),
    documents: createDocumentAgent(llm, retriever),
    general: createGeneralAgent(llm)
  } satisfies Record<AgentId, DomainChatAgent>;
}

/**
 * ## 4. Tracing
 */
function configureLangfuse(config: AppConfig): LangfuseCallbackHandler | undefined {
  if (!config.tracingEnabled) {
    logger.warn("Langfuse keys missing. Tracing disabled.");
    return undefined;
  }
  return new LangfuseCallbackHandler({
    tags: ["answer-desk"],
    traceMetadata: {
      service: "answer-desk-router",
      environment: process.env.NODE_ENV ?? "local"
    }
  });
}

export interface AnswerDesk {
  orchestrator: Orchestrator;
  sessions: SessionStore;
}

export async function createAnswerDesk(config: AppConfig = loadConfig()): Promise<AnswerDesk> {
  for (const warning of config.warnings) {
    logger.warn(warning);
  }

  const llm = new ChatOpenAI({
    temperature: 0,
    model: config.openRouter.model,
    apiKey: config.openRouter.apiKey,
    maxRetries: config.agentMaxRetries,
    configuration: {
      baseURL: config.openRouter.baseUrl
    }
  });

  const langfuseHandler = configureLangfuse(config);
  const runConfig: RunnableConfig = langfuseHandler ? { callbacks: [langfuseHandler] } : {};
  const agents = buildAgents(llm, await resolveDocumentRetriever(config));
  const router = new AgentRouter({
    confidenceThreshold: config.router.confidenceThreshold,
    continuityBonus: config.router.continuityBonus
  });
  const orchestrator = new Orchestrator(router, new DomainAgentInvoker(agents, runConfig), {
    timeoutMs: config.agentTimeoutMs
  });

  return { orchestrator, sessions: new SessionStore(config.contextMaxTurns) };
}

/**
 * ## 5. Examples
 */
async function runExamples({ orchestrator, sessions }: AnswerDesk) {
  const sampleQueries = [
    "Who reports to the platform team lead?",
    "Calculate net pay for a $3,000 monthly salary with 20% tax.",
    "What does the employee handbook say about remote work?",
    "And the security rules for it?",
    "Hello there!"
  ];

  const context = sessions.create();
  for (const text of sampleQueries) {
    const outcome = await orchestrator.runTurn({ text, turnIndex: context.nextTurnIndex }, context);
    console.log("\n---");
    console.log("Query:", text);
    console.log(
      `Routed to: ${outcome.decision.agent} (confidence ${outcome.decision.confidence.toFixed(2)}${
        outcome.decision.usedFallback ? ", fallback" : ""
      })`
    );
    console.log(renderAnswerCard(outcome.answer));
  }
}

async function bootstrap() {
  const desk = await createAnswerDesk();
  await runExamples(desk);
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error: unknown) => {
    logger.error({ err: error }, "Failed to bootstrap answer desk");
    process.exitCode = 1;
  });
}
