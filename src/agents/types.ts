export type AgentId = "hr" | "analytics" | "documents" | "general";

export type SpecialistAgentId = Exclude<AgentId, "general">;

// Also the tie-break order when two specialists score the same.
export const SPECIALIST_AGENTS = ["hr", "analytics", "documents"] as const satisfies readonly SpecialistAgentId[];

export const AGENT_IDS = [...SPECIALIST_AGENTS, "general"] as const satisfies readonly AgentId[];

export interface Message {
  readonly text: string;
  readonly turnIndex: number;
}

export interface ConversationTurn {
  readonly message: Message;
  readonly agent: AgentId;
}

/** Read-only view of a session's history, enough for routing and prompting. */
export interface ConversationView {
  readonly turns: readonly ConversationTurn[];
}

export interface RoutingDecision {
  agent: AgentId;
  confidence: number;
  scores: Record<AgentId, number>;
  usedFallback: boolean;
  reasoning: string;
  /** Other specialists with a non-zero score, best first. */
  alternatives: SpecialistAgentId[];
}

export type RawAgentOutput = string | object;

export interface EnvelopeHints {
  sources?: readonly unknown[];
}

export interface AgentInvocation {
  output: RawAgentOutput;
  envelope?: EnvelopeHints;
}

export interface InvokeOptions {
  signal?: AbortSignal;
}

export interface AgentInvoker {
  invoke(
    agent: AgentId,
    message: Message,
    context: ConversationView,
    options?: InvokeOptions
  ): Promise<AgentInvocation>;
}

export interface Source {
  title: string;
  documentRef: string;
  url: string;
  breadcrumb: string;
}

export interface StructuredAnswer {
  answerMarkdown: string;
  shortAnswer?: string;
  sources: Source[];
  followUpQuestions: string[];
  userNotices: string[];
  relatedTopics: string[];
}

export type PipelineIssue =
  | "ROUTING_AMBIGUOUS"
  | "EXTRACTION_FAILED"
  | "PARSE_FAILED"
  | "AGENT_INVOCATION_FAILED";

export type InvocationFailureReason = "timeout" | "error";

export class AgentInvocationError extends Error {
  constructor(
    readonly agent: AgentId,
    readonly reason: InvocationFailureReason,
    options?: { cause?: unknown }
  ) {
    super(
      reason === "timeout"
        ? `Agent ${agent} timed out`
        : `Agent ${agent} invocation failed`,
      options
    );
    this.name = "AgentInvocationError";
  }
}
