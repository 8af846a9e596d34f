import type { Message as DiscordMessage } from "discord.js";

/** Name used in the system prompt until the client is logged in. */
export const PLACEHOLDER_BOT_NAME = "Assistant";

/**
 * Replace placeholders in a template string
 */
export function replacePlaceholders(template: string, replacements: Record<string, string>): string {
  let result = template;

  for (const [key, value] of Object.entries(replacements)) {
    // Case-insensitive replacement for all variations
    const regex = new RegExp(`{{\\s*${key}\\s*}}`, "gi");
    // function form so "$&" and friends in the value are taken literally
    result = result.replace(regex, () => value);
  }

  return result;
}

export function renderSystemPrompt(template: string, botName: string): string {
  return replacePlaceholders(template, { bot_name: botName });
}

/**
 * Replace Discord mentions (<@userid> or <@!userid>) with display names.
 * Ids missing from `names` are left as-is.
 */
export function replaceMentionsWithNames(content: string, names: ReadonlyMap<string, string>): string {
  return content.replace(/<@!?(\d+)>/g, (mentionText: string, userId: string) => {
    const displayName = names.get(userId);
    return displayName ? `@${displayName}` : mentionText;
  });
}

/**
 * Display names of everyone mentioned in a message, keyed by user id
 */
export function mentionedNames(message: DiscordMessage): Map<string, string> {
  const names = new Map<string, string>();
  for (const [id, user] of message.mentions.users) {
    const member = message.mentions.members?.get(id);
    names.set(id, member?.displayName || user.displayName || user.username);
  }
  return names;
}

/**
 * The content of the user turn sent to the model: the message text with
 * mentions spelled out, followed by any attachment text.
 */
export function buildUserContent(message: DiscordMessage, attachmentText: string): string {
  return replaceMentionsWithNames(message.content, mentionedNames(message)) + attachmentText;
}
