import { describe, expect, it } from "vitest";
import { ConversationLog } from "./ConversationLog.js";
import { ConversationStore, contextKeyFor } from "./ConversationStore.js";

const system = { role: "system", content: "You are Abstruse." } as const;

describe("ConversationLog", () => {
  it("starts with the system prompt and hands out copies", () => {
    const log = new ConversationLog("You are Abstruse.", { maxMessages: 50, maxTokens: 0 });
    log.append({ role: "user", content: "hi" });

    const snapshot = log.messages();
    snapshot[1].content = "changed";
    snapshot.push({ role: "assistant", content: "extra" });

    expect(log.messages()).toEqual([system, { role: "user", content: "hi" }]);
  });

  it("drops the oldest turns beyond the message limit", () => {
    const log = new ConversationLog("You are Abstruse.", { maxMessages: 3, maxTokens: 0 });
    log.append({ role: "user", content: "one" });
    log.append({ role: "assistant", content: "two" });
    log.append({ role: "user", content: "three" });
    log.append({ role: "assistant", content: "four" });
    log.trim();

    expect(log.messages()).toEqual([
      system,
      { role: "user", content: "three" },
      { role: "assistant", content: "four" },
    ]);
  });

  it("keeps the system prompt and newest exchange under a tight token budget", () => {
    const log = new ConversationLog("You are Abstruse.", { maxMessages: 50, maxTokens: 1 });
    log.append({ role: "user", content: "a fairly long question about something" });
    log.append({ role: "assistant", content: "an equally long answer about that thing" });
    log.append({ role: "user", content: "and a follow-up" });
    log.append({ role: "assistant", content: "with its answer" });
    log.trim();

    expect(log.messages()).toEqual([
      system,
      { role: "user", content: "and a follow-up" },
      { role: "assistant", content: "with its answer" },
    ]);
  });

  it("never leaves an assistant turn without its user message", () => {
    const log = new ConversationLog("You are Abstruse.", { maxMessages: 50, maxTokens: 1 });
    log.append({ role: "user", content: "a fairly long question about something" });
    log.append({ role: "assistant", content: "an equally long answer about that thing" });
    log.trim();

    expect(log.messages()).toEqual([
      system,
      { role: "user", content: "a fairly long question about something" },
      { role: "assistant", content: "an equally long answer about that thing" },
    ]);
  });

  it("drops a whole exchange when the message limit splits it", () => {
    const log = new ConversationLog("You are Abstruse.", { maxMessages: 4, maxTokens: 0 });
    log.append({ role: "user", content: "one" });
    log.append({ role: "assistant", content: "two" });
    log.append({ role: "user", content: "three" });
    log.append({ role: "assistant", content: "four" });
    log.trim();

    expect(log.messages()).toEqual([
      system,
      { role: "user", content: "three" },
      { role: "assistant", content: "four" },
    ]);
  });

  it("leaves the log alone when it fits the token budget", () => {
    const log = new ConversationLog("You are Abstruse.", { maxMessages: 50, maxTokens: 100_000 });
    log.append({ role: "user", content: "hi" });
    log.append({ role: "assistant", content: "hello" });
    log.trim();

    expect(log.length).toBe(3);
  });

  it("resets to the current or a new system prompt", () => {
    const log = new ConversationLog("You are Abstruse.", { maxMessages: 50, maxTokens: 0 });
    log.append({ role: "user", content: "hi" });
    log.reset();
    expect(log.messages()).toEqual([system]);

    log.reset("You are Rex.");
    expect(log.messages()).toEqual([{ role: "system", content: "You are Rex." }]);
  });

  it("counts resets in its generation", () => {
    const log = new ConversationLog("You are Abstruse.", { maxMessages: 50, maxTokens: 0 });
    expect(log.generation).toBe(0);

    log.append({ role: "user", content: "hi" });
    log.trim();
    expect(log.generation).toBe(0);

    log.reset();
    log.reset("You are Rex.");
    expect(log.generation).toBe(2);
  });
});

describe("ConversationStore", () => {
  const limits = { maxMessages: 50, maxTokens: 0 };

  it("creates one log per key on first use", () => {
    const store = new ConversationStore("You are Abstruse.", limits);
    expect(store.has("channel:c1")).toBe(false);

    const log = store.get("channel:c1");
    expect(store.get("channel:c1")).toBe(log);
    expect(store.get("channel:c2")).not.toBe(log);
    expect(store.size).toBe(2);
  });

  it("resets only the given key", () => {
    const store = new ConversationStore("You are Abstruse.", limits);
    store.get("channel:c1").append({ role: "user", content: "hi" });
    store.get("channel:c2").append({ role: "user", content: "hey" });

    store.reset("channel:c1");
    store.reset("channel:unknown");

    expect(store.get("channel:c1").length).toBe(1);
    expect(store.get("channel:c2").length).toBe(2);
    expect(store.has("channel:unknown")).toBe(false);
    expect(store.size).toBe(2);
  });

  it("restarts every log when the system prompt changes", () => {
    const store = new ConversationStore("You are Assistant.", limits);
    store.get("channel:c1").append({ role: "user", content: "hi" });

    store.setSystemPrompt("You are Abstruse.");

    expect(store.get("channel:c1").messages()).toEqual([system]);
    expect(store.get("channel:c2").messages()).toEqual([system]);
    expect(store.getSystemPrompt()).toBe("You are Abstruse.");
  });
});

describe("contextKeyFor", () => {
  const inGuild = { guildId: "g1", channelId: "c1" };
  const inDm = { guildId: null, channelId: "dm1" };

  it("keys by scope", () => {
    expect(contextKeyFor("global", inGuild)).toBe("global");
    expect(contextKeyFor("guild", inGuild)).toBe("guild:g1");
    expect(contextKeyFor("channel", inGuild)).toBe("channel:c1");
  });

  it("falls back to the channel for direct messages", () => {
    expect(contextKeyFor("guild", inDm)).toBe("channel:dm1");
    expect(contextKeyFor("global", inDm)).toBe("global");
  });
});
