import { logger as defaultLogger, type Logger } from "../logger.js";
import { recoverStructuredAnswer, type RecoveryReport } from "../recovery/pipeline.js";
import type { ConversationContext } from "../session/conversation_context.js";
import type { AgentRouter } from "./agent_router.js";
import {
  AgentInvocationError,
  type AgentId,
  type AgentInvocation,
  type AgentInvoker,
  type InvocationFailureReason,
  type Message,
  type RoutingDecision,
  type StructuredAnswer
} from "./types.js";

export const DEFAULT_AGENT_TIMEOUT_MS = 30_000;
export const INVOCATION_FAILURE_TAG = "agent_invocation_failed";

const AGENT_LABELS: Record<AgentId, string> = {
  hr: "people directory agent",
  analytics: "analytics agent",
  documents: "document agent",
  general: "assistant"
};

export interface OrchestratorOptions {
  timeoutMs?: number;
  logger?: Logger;
}

export interface TurnOutcome {
  answer: StructuredAnswer;
  decision: RoutingDecision;
  recovery?: RecoveryReport;
  failure?: {
    reason: InvocationFailureReason;
    message: string;
  };
}

export async function invokeWithTimeout<T>(
  agent: AgentId,
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new AgentInvocationError(agent, "timeout");
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } catch (error) {
    if (error instanceof AgentInvocationError) {
      throw error;
    }
    throw new AgentInvocationError(agent, "error", { cause: error });
  } finally {
    clearTimeout(timer);
  }
}

export function invocationFailureAnswer(agent: AgentId, reason: InvocationFailureReason): StructuredAnswer {
  const detail =
    reason === "timeout"
      ? "It did not respond in time."
      : "The request could not be completed.";
  return {
    answerMarkdown: `**The ${AGENT_LABELS[agent]} is unavailable right now.** ${detail} Please try again in a moment.`,
    sources: [],
    followUpQuestions: [],
    userNotices: [`${INVOCATION_FAILURE_TAG}:${reason}`],
    relatedTopics: []
  };
}

export class Orchestrator {
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(
    private readonly router: AgentRouter,
    private readonly invoker: AgentInvoker,
    options: OrchestratorOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_AGENT_TIMEOUT_MS;
    this.log = options.logger ?? defaultLogger;
  }

  async handleTurn(message: Message, context: ConversationContext): Promise<StructuredAnswer> {
    const outcome = await this.runTurn(message, context);
    return outcome.answer;
  }

  runTurn(message: Message, context: ConversationContext): Promise<TurnOutcome> {
    return context.runExclusive(() => this.executeTurn(message, context));
  }

  private async executeTurn(message: Message, context: ConversationContext): Promise<TurnOutcome> {
    const decision = this.router.route(message, context);
    const turnLog = this.log.child({ sessionId: context.sessionId, turnIndex: message.turnIndex });
    turnLog.info(
      {
        agent: decision.agent,
        confidence: Number(decision.confidence.toFixed(3)),
        usedFallback: decision.usedFallback,
        issue: decision.usedFallback ? "ROUTING_AMBIGUOUS" : undefined
      },
      decision.reasoning
    );

    let invocation: AgentInvocation;
    try {
      invocation = await invokeWithTimeout(
        decision.agent,
        (signal) => this.invoker.invoke(decision.agent, message, context, { signal }),
        this.timeoutMs
      );
    } catch (error) {
      const failure =
        error instanceof AgentInvocationError
          ? error
          : new AgentInvocationError(decision.agent, "error", { cause: error });
      turnLog.warn(
        { agent: decision.agent, reason: failure.reason, err: failure.cause ?? failure, issue: "AGENT_INVOCATION_FAILED" },
        failure.message
      );
      return {
        answer: invocationFailureAnswer(decision.agent, failure.reason),
        decision,
        failure: { reason: failure.reason, message: failure.message }
      };
    }

    const recovery = recoverStructuredAnswer(invocation.output, invocation.envelope ?? {});
    if (recovery.issues.length) {
      turnLog.debug(
        { issues: recovery.issues, extraction: recovery.extraction, normalization: recovery.normalization },
        "agent reply recovered with fallbacks"
      );
    }

    context.append(message, decision.agent);
    return { answer: recovery.answer, decision, recovery };
  }
}
