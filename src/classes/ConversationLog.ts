import type { ChatMessage } from "../models.js";
import { countMessageTokens } from "../utils/tokenCounter.js";

export interface ConversationLimits {
  /** Upper bound on messages kept, system prompt included. */
  maxMessages: number;
  /** Token budget for the whole log; 0 disables the check. */
  maxTokens: number;
}

/**
 * One conversation with the model. Index 0 always holds the system prompt.
 */
export class ConversationLog {
  private log: ChatMessage[];
  private limits: ConversationLimits;
  private resets = 0;

  constructor(systemPrompt: string, limits: ConversationLimits) {
    this.limits = limits;
    this.log = [{ role: "system", content: systemPrompt }];
  }

  get length(): number {
    return this.log.length;
  }

  get systemPrompt(): string {
    return this.log[0].content;
  }

  /** Bumped by every reset, so a caller can tell the log started over while it waited. */
  get generation(): number {
    return this.resets;
  }

  messages(): ChatMessage[] {
    return this.log.map((msg) => ({ ...msg }));
  }

  append(message: ChatMessage) {
    this.log.push({ ...message });
  }

  /**
   * Drops the oldest turns until the log fits its limits.
   * A user message and the assistant replies after it go together.
   */
  trim() {
    while (this.log.length > this.limits.maxMessages) this.dropOldestTurn();

    if (this.limits.maxTokens <= 0) return;
    // Keep at least the system prompt and the newest turn
    while (this.latestTurnStart() > 1 && countMessageTokens(this.log) > this.limits.maxTokens) {
      this.dropOldestTurn();
    }
  }

  reset(systemPrompt: string = this.systemPrompt) {
    this.log = [{ role: "system", content: systemPrompt }];
    this.resets++;
  }

  private dropOldestTurn() {
    this.log.splice(1, 1);
    while (this.log.length > 1 && this.log[1].role === "assistant") this.log.splice(1, 1);
  }

  private latestTurnStart(): number {
    for (let i = this.log.length - 1; i > 0; i--) {
      if (this.log[i].role === "user") return i;
    }
    return 1;
  }
}
