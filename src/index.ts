import "dotenv/config";
import { loadConfig } from "./config.js";
import { DiscordBot } from "./classes/DiscordBot.js";
import { logger, setLogLevel } from "./utils/logger.js";

async function main() {
  const discordConfig = loadConfig();
  setLogLevel(discordConfig.logLevel);

  const bot = new DiscordBot({ discordConfig });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    bot
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Error during shutdown:", error);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await bot.start();
}

main().catch((error) => {
  logger.error("Failed to start bot:", error);
  process.exit(1);
});
