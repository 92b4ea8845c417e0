import { describe, expect, it } from "vitest";
import { ConversationContext } from "../src/session/conversation_context.js";
import { SessionStore } from "../src/session/session_store.js";

describe("ConversationContext", () => {
  it("starts empty", () => {
    const context = new ConversationContext("s1");
    expect(context.turns).toEqual([]);
    expect(context.lastAgent).toBeUndefined();
    expect(context.nextTurnIndex).toBe(0);
  });

  it("keeps only the most recent turns", () => {
    const context = new ConversationContext("s1", 2);
    context.append({ text: "a", turnIndex: 0 }, "hr");
    context.append({ text: "b", turnIndex: 1 }, "analytics");
    context.append({ text: "c", turnIndex: 2 }, "documents");

    expect(context.turns.map((turn) => turn.message.text)).toEqual(["b", "c"]);
    expect(context.lastAgent).toBe("documents");
    expect(context.nextTurnIndex).toBe(3);
  });

  it("rejects a non-positive window", () => {
    expect(() => new ConversationContext("s1", 0)).toThrow("maxTurns must be a positive integer.");
  });

  it("runs exclusive tasks in order and keeps going after a failure", async () => {
    const context = new ConversationContext("s1");
    const order: string[] = [];

    const first = context.runExclusive(async () => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push("first");
      throw new Error("first failed");
    });
    const second = context.runExclusive(async () => {
      order.push("second");
      return 2;
    });

    await expect(first).rejects.toThrow("first failed");
    await expect(second).resolves.toBe(2);
    expect(order).toEqual(["first", "second"]);
  });
});

describe("SessionStore", () => {
  it("creates, finds and deletes sessions", () => {
    const store = new SessionStore(5);
    const context = store.create("abc");

    expect(store.get("abc")).toBe(context);
    expect(store.getOrCreate("abc")).toBe(context);
    expect(store.size).toBe(1);
    expect(store.delete("abc")).toBe(true);
    expect(store.get("abc")).toBeUndefined();
  });

  it("generates an id when none is given", () => {
    const store = new SessionStore();
    const context = store.getOrCreate();
    const blank = store.getOrCreate("");

    expect(context.sessionId).not.toBe("");
    expect(blank.sessionId).not.toBe("");
    expect(blank.sessionId).not.toBe(context.sessionId);
    expect(store.size).toBe(2);
  });
});
