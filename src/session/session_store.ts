import { randomUUID } from "node:crypto";
import { ConversationContext, DEFAULT_MAX_TURNS } from "./conversation_context.js";

export class SessionStore {
  private readonly sessions = new Map<string, ConversationContext>();

  constructor(private readonly maxTurns = DEFAULT_MAX_TURNS) {}

  create(sessionId: string = randomUUID()): ConversationContext {
    const context = new ConversationContext(sessionId, this.maxTurns);
    this.sessions.set(sessionId, context);
    return context;
  }

  get(sessionId: string): ConversationContext | undefined {
    return this.sessions.get(sessionId);
  }

  getOrCreate(sessionId?: string): ConversationContext {
    if (sessionId) {
      const existing = this.sessions.get(sessionId);
      if (existing) {
        return existing;
      }
    }
    return this.create(sessionId || undefined);
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
