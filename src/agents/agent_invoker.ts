import type { RunnableConfig } from "@langchain/core/runnables";
import type { DomainChatAgent } from "./domain_agent.js";
import type {
  AgentId,
  AgentInvocation,
  AgentInvoker,
  ConversationView,
  InvokeOptions,
  Message
} from "./types.js";

/**
 * Dispatches a routed turn to the matching chat agent. Retries belong to the
 * chat model (its `maxRetries` setting), not to this class.
 */
export class DomainAgentInvoker implements AgentInvoker {
  constructor(
    private readonly agents: Record<AgentId, DomainChatAgent>,
    private readonly runConfig: RunnableConfig = {}
  ) {}

  async invoke(
    agent: AgentId,
    message: Message,
    context: ConversationView,
    options: InvokeOptions = {}
  ): Promise<AgentInvocation> {
    const target = this.agents[agent];
    return target.invoke(message, context, {
      ...this.runConfig,
      ...(options.signal ? { signal: options.signal } : {}),
      runName: target.name,
      metadata: {
        ...this.runConfig.metadata,
        agent,
        turn_index: message.turnIndex
      }
    });
  }
}
