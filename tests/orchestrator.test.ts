import { describe, expect, it } from "vitest";
import { AgentRouter } from "../src/agents/agent_router.js";
import { Orchestrator, invocationFailureAnswer } from "../src/agents/orchestrator.js";
import type { AgentId, AgentInvocation, AgentInvoker, ConversationView, InvokeOptions, Message } from "../src/agents/types.js";
import { createLogger } from "../src/logger.js";
import { ConversationContext } from "../src/session/conversation_context.js";

type Responder = (call: { agent: AgentId; message: Message; signal?: AbortSignal }, index: number) => Promise<AgentInvocation>;

class FakeInvoker implements AgentInvoker {
  readonly calls: Array<{ agent: AgentId; text: string }> = [];

  constructor(private readonly respond: Responder) {}

  invoke(agent: AgentId, message: Message, _context: ConversationView, options: InvokeOptions = {}) {
    const index = this.calls.length;
    this.calls.push({ agent, text: message.text });
    return this.respond({ agent, message, signal: options.signal }, index);
  }
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const silent = createLogger({ level: "silent", pretty: false });

function orchestratorWith(invoker: AgentInvoker, timeoutMs = 1_000) {
  return new Orchestrator(new AgentRouter(), invoker, { timeoutMs, logger: silent });
}

describe("Orchestrator", () => {
  it("routes, recovers the reply and records the turn", async () => {
    const invoker = new FakeInvoker(async () => ({
      output: 'Here you go:\n```json\n{"answer_markdown": "Hi", "sources": ["policy.pdf"]}\n```'
    }));
    const context = new ConversationContext("s1");
    const outcome = await orchestratorWith(invoker).runTurn({ text: "What is our leave policy?", turnIndex: 0 }, context);

    expect(invoker.calls).toEqual([{ agent: "documents", text: "What is our leave policy?" }]);
    expect(outcome.decision.agent).toBe("documents");
    expect(outcome.answer.answerMarkdown).toBe("Hi");
    expect(outcome.answer.sources.map((source) => source.documentRef)).toEqual(["policy.pdf"]);
    expect(outcome.recovery?.extraction).toBe("fenced");
    expect(context.turns).toEqual([
      { message: { text: "What is our leave policy?", turnIndex: 0 }, agent: "documents" }
    ]);
  });

  it("uses envelope sources when the payload names none", async () => {
    const invoker = new FakeInvoker(async () => ({
      output: '{"answer_markdown": "See the handbook."}',
      envelope: { sources: ["handbook.md"] }
    }));
    const answer = await orchestratorWith(invoker).handleTurn(
      { text: "Where is the employee handbook?", turnIndex: 0 },
      new ConversationContext("s1")
    );
    expect(answer.sources).toEqual([{ title: "handbook.md", documentRef: "handbook.md", url: "#", breadcrumb: "" }]);
  });

  it("routes unmatched messages to the general agent", async () => {
    const invoker = new FakeInvoker(async () => ({ output: "Hello! How can I help?" }));
    const outcome = await orchestratorWith(invoker).runTurn(
      { text: "Hello there", turnIndex: 0 },
      new ConversationContext("s1")
    );
    expect(invoker.calls[0]?.agent).toBe("general");
    expect(outcome.decision.usedFallback).toBe(true);
    expect(outcome.answer.answerMarkdown).toBe("Hello! How can I help?");
  });

  it("returns an answer for a native reply that cannot be serialized", async () => {
    const invoker = new FakeInvoker(async () => ({ output: { total: 10n } }));
    const context = new ConversationContext("s1");
    const answer = await orchestratorWith(invoker).handleTurn(
      { text: "Calculate the total budget", turnIndex: 0 },
      context
    );

    expect(answer.answerMarkdown).toBe("");
    expect(answer.userNotices).toEqual([]);
    expect(context.turns.map((turn) => turn.agent)).toEqual(["analytics"]);
  });

  it("turns an invocation error into a failure answer without recording the turn", async () => {
    const invoker = new FakeInvoker(async () => {
      throw new Error("upstream 500");
    });
    const context = new ConversationContext("s1");
    const outcome = await orchestratorWith(invoker).runTurn(
      { text: "Where is the employee handbook?", turnIndex: 0 },
      context
    );

    expect(outcome.answer).toEqual({
      answerMarkdown:
        "**The document agent is unavailable right now.** The request could not be completed. Please try again in a moment.",
      sources: [],
      followUpQuestions: [],
      userNotices: ["agent_invocation_failed:error"],
      relatedTopics: []
    });
    expect(outcome.failure).toEqual({ reason: "error", message: "Agent documents invocation failed" });
    expect(context.turns).toEqual([]);
  });

  it("times out a slow agent and aborts its call", async () => {
    let aborted = false;
    const invoker = new FakeInvoker(
      ({ signal }) =>
        new Promise<AgentInvocation>(() => {
          signal?.addEventListener("abort", () => {
            aborted = true;
          });
        })
    );
    const context = new ConversationContext("s1");
    const outcome = await orchestratorWith(invoker, 20).runTurn(
      { text: "Who is on the org chart?", turnIndex: 0 },
      context
    );

    expect(aborted).toBe(true);
    expect(outcome.failure?.reason).toBe("timeout");
    expect(outcome.answer).toEqual(invocationFailureAnswer("hr", "timeout"));
    expect(outcome.answer.userNotices).toEqual(["agent_invocation_failed:timeout"]);
    expect(context.turns).toEqual([]);
  });

  it("ignores a reply that arrives after the timeout", async () => {
    const invoker = new FakeInvoker(async () => {
      await sleep(40);
      return { output: '{"answer_markdown": "too late"}' };
    });
    const context = new ConversationContext("s1");
    const outcome = await orchestratorWith(invoker, 10).runTurn(
      { text: "Who is on the org chart?", turnIndex: 0 },
      context
    );
    await sleep(60);

    expect(outcome.failure?.reason).toBe("timeout");
    expect(context.turns).toEqual([]);
  });

  it("serializes turns on the same session", async () => {
    const gate = deferred<AgentInvocation>();
    const invoker = new FakeInvoker(async (_call, index) =>
      index === 0 ? gate.promise : { output: '{"answer_markdown": "second"}' }
    );
    const orchestrator = orchestratorWith(invoker);
    const context = new ConversationContext("s1");

    const first = orchestrator.runTurn({ text: "Where is the employee handbook?", turnIndex: 0 }, context);
    const second = orchestrator.runTurn({ text: "Can you check this?", turnIndex: 1 }, context);
    await sleep(5);
    expect(invoker.calls).toHaveLength(1);

    gate.resolve({ output: '{"answer_markdown": "first"}' });
    const [firstOutcome, secondOutcome] = await Promise.all([first, second]);

    expect(firstOutcome.answer.answerMarkdown).toBe("first");
    // Routed with the first turn already in the history.
    expect(secondOutcome.decision.agent).toBe("documents");
    expect(secondOutcome.answer.answerMarkdown).toBe("second");
    expect(context.turns.map((turn) => turn.message.turnIndex)).toEqual([0, 1]);
  });

  it("runs different sessions concurrently", async () => {
    const gate = deferred<AgentInvocation>();
    const invoker = new FakeInvoker(() => gate.promise);
    const orchestrator = orchestratorWith(invoker);

    const first = orchestrator.runTurn({ text: "Who is on the org chart?", turnIndex: 0 }, new ConversationContext("a"));
    const second = orchestrator.runTurn({ text: "Who is on the org chart?", turnIndex: 0 }, new ConversationContext("b"));
    await sleep(5);
    expect(invoker.calls).toHaveLength(2);

    gate.resolve({ output: "done" });
    const outcomes = await Promise.all([first, second]);
    expect(outcomes.map((outcome) => outcome.answer.answerMarkdown)).toEqual(["done", "done"]);
  });
});
