/**
 * Shared type definitions for the Discord bot
 */

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** How conversation logs are keyed: one for the whole bot, one per guild, or one per channel. */
export type ContextScope = "global" | "guild" | "channel";

export interface ContextLocation {
  guildId: string | null;
  channelId: string;
}

/**
 * What slash commands are allowed to change on the running bot.
 */
export interface BotControls {
  resetContext(location: ContextLocation): void;
  isChatEnabled(): boolean;
  setChatEnabled(enabled: boolean): void;
}
