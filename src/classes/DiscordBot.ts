import { Client, Events, GatewayIntentBits, type Interaction, type Message, Partials } from "discord.js";
import { OllamaClient } from "../api/ollama.js";
import CommandHandler from "../commands/CommandHandler.js";
import CommandManager from "../commands/CommandManager.js";
import type { DiscordConfig } from "../config.js";
import type { BotControls, ContextLocation } from "../models.js";
import { PLACEHOLDER_BOT_NAME, renderSystemPrompt } from "../tools/prompt.js";
import { logger } from "../utils/logger.js";
import { ConversationStore, contextKeyFor } from "./ConversationStore.js";
import { MentionResponder } from "./MentionResponder.js";

export interface DiscordBotOptions {
  discordConfig: DiscordConfig;
  client?: Client;
  ollama?: OllamaClient;
  commandManager?: CommandManager;
}

export class DiscordBot implements BotControls {
  private client: Client;
  private discordConfig: DiscordConfig;
  private ollama: OllamaClient;
  private store: ConversationStore;
  private responder: MentionResponder;
  private commandHandler: CommandHandler;

  // Runtime state
  private chatEnabled: boolean;

  constructor(options: DiscordBotOptions) {
    this.discordConfig = options.discordConfig;
    this.chatEnabled = this.discordConfig.chatEnabled;
    this.ollama = options.ollama || new OllamaClient(this.discordConfig.ollama);

    this.store = new ConversationStore(renderSystemPrompt(this.discordConfig.systemPrompt, PLACEHOLDER_BOT_NAME), {
      maxMessages: this.discordConfig.maxConversationLogSize,
      maxTokens: this.discordConfig.maxContextTokens,
    });

    this.responder = new MentionResponder({
      config: this.discordConfig,
      store: this.store,
      model: this.ollama,
      isChatEnabled: () => this.chatEnabled,
    });

    // Create Discord client
    this.client =
      options.client ||
      new Client({
        intents: [
          GatewayIntentBits.Guilds,
          GatewayIntentBits.GuildMessages,
          GatewayIntentBits.MessageContent,
          GatewayIntentBits.DirectMessages,
        ],
        partials: [Partials.Channel],
      });

    this.commandHandler = new CommandHandler(
      this,
      options.commandManager || new CommandManager(this.discordConfig.botToken),
      this.discordConfig.allowedUserIds
    );

    this.setupEventHandlers();
  }

  private setupEventHandlers() {
    this.client.on(Events.ClientReady, async (readyClient) => {
      try {
        await this.onReady(readyClient.user.id, readyClient.user.username, readyClient.user.tag);
      } catch (error) {
        logger.error("Error during ready setup:", error);
      }
    });

    this.client.on(Events.MessageCreate, async (message: Message) => {
      await this.handleMessage(message);
    });

    this.client.on(Events.InteractionCreate, async (interaction: Interaction) => {
      try {
        await this.commandHandler.handleInteraction(interaction);
      } catch (error) {
        logger.error("Error handling interaction:", error);
      }
    });

    this.client.on(Events.Error, (error) => {
      logger.error("Discord client error:", error);
    });
  }

  /**
   * Runs on every ready event; a reconnect refreshes the prompt but does not
   * register the commands again.
   */
  async onReady(botUserId: string, botName: string, botTag: string) {
    this.store.setSystemPrompt(renderSystemPrompt(this.discordConfig.systemPrompt, botName));
    logger.info(`Assistant system prompt set to include bot name: ${botName}`);

    await this.commandHandler.registerCommands(botUserId);

    logger.info(`Bot ready as ${botTag} (id: ${botUserId})`);
    logger.info(`Using Ollama model ${this.ollama.model} at ${this.discordConfig.ollama.host}`);
    logger.info(`Conversation context is kept per ${this.discordConfig.contextScope}`);

    const health = await this.ollama.healthCheck();
    if (health.error) logger.warn(health.error);
  }

  async handleMessage(message: Message) {
    const botUserId = this.client.user?.id;
    if (!botUserId) return;

    try {
      await this.responder.handle(message, botUserId);
    } catch (error) {
      logger.error("Error handling message:", error);
    }
  }

  // BotControls, used by the command handler
  public resetContext(location: ContextLocation) {
    this.store.reset(contextKeyFor(this.discordConfig.contextScope, location));
  }

  public isChatEnabled(): boolean {
    return this.chatEnabled;
  }

  public setChatEnabled(enabled: boolean) {
    this.chatEnabled = enabled;
  }

  public getStore(): ConversationStore {
    return this.store;
  }

  public async start() {
    await this.client.login(this.discordConfig.botToken);
  }

  public async stop() {
    await this.client.destroy();
  }
}
