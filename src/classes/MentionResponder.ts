import { type Message, userMention } from "discord.js";
import { type ChatModel, describeFailure } from "../api/ollama.js";
import type { DiscordConfig } from "../config.js";
import type { ChatMessage } from "../models.js";
import { buildUserContent } from "../tools/prompt.js";
import { type AttachmentDownloader, downloadAttachment, readTextAttachments } from "../utils/attachments.js";
import { KeyedQueue } from "../utils/KeyedQueue.js";
import { logger } from "../utils/logger.js";
import { splitMessage } from "../utils/splitMessage.js";
import { type ConversationStore, contextKeyFor } from "./ConversationStore.js";

const TYPING_REFRESH_MS = 8000;

export interface MentionResponderOptions {
  config: DiscordConfig;
  store: ConversationStore;
  model: ChatModel;
  isChatEnabled: () => boolean;
  download?: AttachmentDownloader;
}

/**
 * Answers messages that @-mention the bot, keeping one conversation log per context key.
 */
export class MentionResponder {
  private config: DiscordConfig;
  private store: ConversationStore;
  private model: ChatModel;
  private isChatEnabled: () => boolean;
  private download: AttachmentDownloader;
  private queue = new KeyedQueue();

  constructor(options: MentionResponderOptions) {
    this.config = options.config;
    this.store = options.store;
    this.model = options.model;
    this.isChatEnabled = options.isChatEnabled;
    this.download = options.download || downloadAttachment;
  }

  shouldRespond(message: Message, botUserId: string): boolean {
    // Don't respond to bots, including ourselves
    if (message.author.bot) return false;
    if (!this.isChatEnabled()) return false;
    if (this.config.commandPrefix && message.content.startsWith(this.config.commandPrefix)) return false;

    return message.mentions.has(botUserId, { ignoreEveryone: true, ignoreRoles: true });
  }

  async handle(message: Message, botUserId: string): Promise<void> {
    if (!this.shouldRespond(message, botUserId)) return;

    const key = contextKeyFor(this.config.contextScope, { guildId: message.guildId, channelId: message.channelId });
    await this.queue.run(key, () => this.respond(message, key));
  }

  private async respond(message: Message, key: string) {
    const attachments = await readTextAttachments(
      message.attachments.values(),
      { maxFileSize: this.config.maxFileSize, maxTextLength: this.config.maxTextAttachmentSize },
      this.download
    );
    if (!attachments.ok) {
      await this.sendToChannel(message, attachments.error);
      return;
    }

    const log = this.store.get(key);
    const generation = log.generation;
    const userMessage: ChatMessage = { role: "user", content: buildUserContent(message, attachments.text) };

    const stopTyping = this.startTyping(message);
    let reply: string;
    try {
      reply = await this.model.chat([...log.messages(), userMessage]);
      // Only completed exchanges enter the log, and not after a reset during the request
      if (log.generation === generation) {
        log.append(userMessage);
        log.append({ role: "assistant", content: reply });
        log.trim();
        logger.debug(`Context ${key} now holds ${log.length} messages`);
      } else {
        logger.debug(`Context ${key} was reset during the request; reply not logged`);
      }
    } catch (error) {
      logger.error(`Chat request for ${key} failed:`, error);
      reply = describeFailure(error);
    } finally {
      stopTyping();
    }

    await this.sendReply(message, `${userMention(message.author.id)} ${reply}`);
  }

  private startTyping(message: Message): () => void {
    const channel = message.channel;
    if (!("sendTyping" in channel)) return () => {};

    const typing = () =>
      channel.sendTyping().catch((error: unknown) => {
        logger.debug("Typing indicator failed:", error);
      });
    void typing();
    const typingInterval = setInterval(typing, TYPING_REFRESH_MS);
    return () => clearInterval(typingInterval);
  }

  /**
   * Split long messages (Discord has a 2000 character limit).
   * The first chunk replies to the trigger, the rest follow in the channel.
   */
  private async sendReply(message: Message, text: string) {
    const [first, ...rest] = splitMessage(text);
    if (first === undefined) return;

    try {
      await message.reply(first);
      for (const chunk of rest) await this.sendToChannel(message, chunk);
    } catch (error) {
      logger.error(`Failed to send reply in channel ${message.channelId}:`, error);
    }
  }

  private async sendToChannel(message: Message, text: string) {
    if (!("send" in message.channel)) {
      logger.warn(`Channel ${message.channelId} does not accept messages`);
      return;
    }
    await message.channel.send(text);
  }
}
