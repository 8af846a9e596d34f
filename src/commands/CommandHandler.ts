import type { ChatInputCommandInteraction, Interaction } from "discord.js";
import type { BotControls } from "../models.js";
import { logger } from "../utils/logger.js";
import type CommandManager from "./CommandManager.js";

export default class CommandHandler {
  private bot: BotControls;
  private commandManager: CommandManager;
  private allowedUserIds: string[];

  constructor(bot: BotControls, commandManager: CommandManager, allowedUserIds: string[] = []) {
    this.bot = bot;
    this.commandManager = commandManager;
    this.allowedUserIds = allowedUserIds;
  }

  async registerCommands(applicationId: string) {
    await this.commandManager.registerCommands(applicationId);
  }

  async handleInteraction(interaction: Interaction) {
    if (!interaction.isChatInputCommand()) return;

    const cmd = interaction;

    // An empty allow-list lets everyone use the commands
    if (this.allowedUserIds.length > 0 && !this.allowedUserIds.includes(cmd.user.id)) {
      await cmd.reply({ content: "You don't have permission to use this command.", ephemeral: true });
      return;
    }

    try {
      switch (cmd.commandName) {
        case "reset":
          await this.handleResetCommand(cmd);
          return;
        case "toggle":
          await this.handleToggleCommand(cmd);
          return;
        default:
          logger.warn(`Unknown command /${cmd.commandName}`);
      }
    } catch (err) {
      logger.error(`Command /${cmd.commandName} failed:`, err);
      try {
        if (!cmd.replied && !cmd.deferred) await cmd.reply({ content: "Command failed.", ephemeral: true });
      } catch (replyErr) {
        logger.warn("Could not report command failure:", replyErr);
      }
    }
  }

  private async handleResetCommand(cmd: ChatInputCommandInteraction) {
    this.bot.resetContext({ guildId: cmd.guildId, channelId: cmd.channelId });
    logger.info(`Context reset by ${cmd.user.tag} in channel ${cmd.channelId}`);
    await cmd.reply({ content: "AI context reset.", ephemeral: false });
  }

  private async handleToggleCommand(cmd: ChatInputCommandInteraction) {
    const enable = cmd.options.getBoolean("enable");
    const enabled = enable ?? !this.bot.isChatEnabled();
    this.bot.setChatEnabled(enabled);
    logger.info(`Chatbot ${enabled ? "enabled" : "disabled"} by ${cmd.user.tag}`);
    await cmd.reply({ content: `Chatbot ${enabled ? "enabled" : "disabled"}.`, ephemeral: false });
  }
}
