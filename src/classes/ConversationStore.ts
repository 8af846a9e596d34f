import type { ContextLocation, ContextScope } from "../models.js";
import { type ConversationLimits, ConversationLog } from "./ConversationLog.js";

export function contextKeyFor(scope: ContextScope, location: ContextLocation): string {
  if (scope === "global") return "global";
  // DMs have no guild, so they get a log per channel
  if (scope === "guild" && location.guildId) return `guild:${location.guildId}`;
  return `channel:${location.channelId}`;
}

/**
 * Conversation logs keyed by context key, created on first use.
 * Lives in memory only; a restart starts every conversation over.
 */
export class ConversationStore {
  // Never evicted: one small log per channel or guild the bot has been mentioned in,
  // each capped by its limits. Reset clears a log but keeps its entry.
  private logs = new Map<string, ConversationLog>();
  private systemPrompt: string;
  private limits: ConversationLimits;

  constructor(systemPrompt: string, limits: ConversationLimits) {
    this.systemPrompt = systemPrompt;
    this.limits = limits;
  }

  get size(): number {
    return this.logs.size;
  }

  get(key: string): ConversationLog {
    let log = this.logs.get(key);
    if (!log) {
      log = new ConversationLog(this.systemPrompt, this.limits);
      this.logs.set(key, log);
    }
    return log;
  }

  has(key: string): boolean {
    return this.logs.has(key);
  }

  reset(key: string) {
    this.logs.get(key)?.reset(this.systemPrompt);
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }

  /** New prompt for every log. Existing logs start over with it. */
  setSystemPrompt(systemPrompt: string) {
    this.systemPrompt = systemPrompt;
    for (const log of this.logs.values()) log.reset(systemPrompt);
  }
}
