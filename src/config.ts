import type { ContextScope } from "./models.js";
import type { LogLevel } from "./utils/logger.js";

export interface OllamaConfig {
  host: string;
  model: string;
  temperature: number;
  timeoutSeconds: number;
}

export interface DiscordConfig {
  botToken: string;
  allowedUserIds: string[];
  commandPrefix: string;
  chatEnabled: boolean;
  contextScope: ContextScope;
  maxConversationLogSize: number;
  maxContextTokens: number;
  maxTextAttachmentSize: number;
  maxFileSize: number;
  systemPrompt: string;
  logLevel: LogLevel;
  ollama: OllamaConfig;
}

export const DEFAULT_SYSTEM_PROMPT =
  "You are {{bot_name}}, a helpful but slightly offhand assistant residing in Discord. " +
  "Answer the user's questions directly. You may be playful or roast lightly, " +
  "but do not be abusive or discriminatory.";

const CONTEXT_SCOPES: readonly ContextScope[] = ["global", "guild", "channel"];
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function readNumber(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (Number.isNaN(value) || value < min || value > max) {
    throw new Error(`${name} must be a number between ${min} and ${max} (got "${raw}")`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === "true" || raw === "1" || raw === "yes") return true;
  if (raw === "false" || raw === "0" || raw === "no") return false;
  throw new Error(`${name} must be true or false (got "${raw}")`);
}

function readChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  const match = choices.find((choice) => choice === raw);
  if (!match) throw new Error(`${name} must be one of ${choices.join(", ")} (got "${raw}")`);
  return match;
}

/**
 * Builds the bot configuration from environment variables.
 * Throws on a missing token or a malformed value.
 */
export function loadConfig(env: Env = process.env): DiscordConfig {
  const botToken = env.DISCORD_BOT_TOKEN?.trim() || "";
  if (!botToken) throw new Error("DISCORD_BOT_TOKEN is not configured in .env file");

  return {
    botToken,
    allowedUserIds: (env.DISCORD_ALLOWED_USERS || "")
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    commandPrefix: env.COMMAND_PREFIX ?? "!",
    chatEnabled: readBoolean(env, "CHAT_ENABLED", true),
    contextScope: readChoice(env, "CONTEXT_SCOPE", CONTEXT_SCOPES, "channel"),
    maxConversationLogSize: readInteger(env, "MAX_CONVERSATION_LOG_SIZE", 50, 3),
    maxContextTokens: readInteger(env, "MAX_CONTEXT_TOKENS", 0, 0),
    maxTextAttachmentSize: readInteger(env, "MAX_TEXT_ATTACHMENT_SIZE", 20_000, 0),
    maxFileSize: readInteger(env, "MAX_FILE_SIZE", 2 * 1024 * 1024, 0),
    systemPrompt: env.SYSTEM_PROMPT?.trim() || DEFAULT_SYSTEM_PROMPT,
    logLevel: readChoice(env, "LOG_LEVEL", LOG_LEVELS, "info"),
    ollama: {
      host: (env.OLLAMA_HOST?.trim() || "http://localhost:11434").replace(/\/+$/, ""),
      model: env.OLLAMA_MODEL?.trim() || "llama3",
      temperature: readNumber(env, "OLLAMA_TEMPERATURE", 0.7, 0, 2),
      timeoutSeconds: readNumber(env, "OLLAMA_TIMEOUT_SECONDS", 120, 1, 3600),
    },
  };
}
