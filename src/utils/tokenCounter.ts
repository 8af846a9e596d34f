import { encode } from "gpt-tokenizer";
import type { ChatMessage } from "../models.js";
import { logger } from "./logger.js";

/**
 * Count tokens in a string using gpt-tokenizer.
 * Ollama models use their own tokenizers, so this is an estimate.
 */
export function countTokens(text: string): number {
  try {
    return encode(text).length;
  } catch (error) {
    logger.warn("Error counting tokens:", error);
    return Math.ceil(text.length / 4);
  }
}

/**
 * Count tokens in an array of messages
 */
export function countMessageTokens(messages: ChatMessage[]): number {
  return messages.reduce((total, msg) => total + countTokens(msg.role) + countTokens(msg.content) + 4, 0);
}
