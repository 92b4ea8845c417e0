import type { AgentId, ConversationTurn, ConversationView, Message } from "../agents/types.js";

export const DEFAULT_MAX_TURNS = 20;

/**
 * Bounded, append-only history of one session. Turns that touch the history
 * must go through {@link ConversationContext.runExclusive}; tasks queued on
 * the same context run one after another.
 */
export class ConversationContext implements ConversationView {
  private readonly history: ConversationTurn[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly sessionId: string,
    private readonly maxTurns = DEFAULT_MAX_TURNS
  ) {
    if (!Number.isInteger(maxTurns) || maxTurns < 1) {
      throw new Error("maxTurns must be a positive integer.");
    }
  }

  get turns(): readonly ConversationTurn[] {
    return this.history;
  }

  get lastAgent(): AgentId | undefined {
    return this.history.at(-1)?.agent;
  }

  /** Next turn index for a message produced in this session. */
  get nextTurnIndex(): number {
    const last = this.history.at(-1);
    return last ? last.message.turnIndex + 1 : 0;
  }

  append(message: Message, agent: AgentId): void {
    this.history.push({ message, agent });
    if (this.history.length > this.maxTurns) {
      this.history.splice(0, this.history.length - this.maxTurns);
    }
  }

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
