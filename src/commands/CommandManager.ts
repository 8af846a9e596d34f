import { REST, Routes, SlashCommandBuilder } from "discord.js";
import { logger } from "../utils/logger.js";

export const commandDefinitions = [
  new SlashCommandBuilder().setName("reset").setDescription("Reset the AI conversation context for this bot."),
  new SlashCommandBuilder()
    .setName("toggle")
    .setDescription("Enable, disable, or toggle the chatbot replies.")
    .addBooleanOption((o) =>
      o.setName("enable").setDescription("true to enable, false to disable; omit to flip").setRequired(false)
    ),
];

/** Minimal REST surface used for registration, so tests can stand in for Discord. */
export interface CommandRegistrar {
  put(route: `/${string}`, options: { body: unknown }): Promise<unknown>;
}

export class CommandManager {
  private rest: CommandRegistrar;
  private registered = false;

  constructor(botToken: string, rest?: CommandRegistrar) {
    this.rest = rest || new REST({ version: "10" }).setToken(botToken);
  }

  get isRegistered(): boolean {
    return this.registered;
  }

  /**
   * Registers the slash commands globally. Global commands can take up to an
   * hour to show up in every guild. Only the first successful call per process
   * talks to Discord.
   */
  async registerCommands(applicationId: string): Promise<boolean> {
    if (this.registered) return true;

    const body = commandDefinitions.map((c) => c.toJSON());
    try {
      await this.rest.put(Routes.applicationCommands(applicationId), { body });
      this.registered = true;
      logger.info(`Globally registered ${body.length} slash commands`);
    } catch (err) {
      logger.error("Failed to register commands:", err);
    }
    return this.registered;
  }
}

export default CommandManager;
