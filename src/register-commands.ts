import { REST, Routes } from "discord.js";
import { commands } from "./commands";
import { ENV, required } from "./env";
import { describeError, logger } from "./logger";

async function main() {
  const token = required(ENV, "DISCORD_TOKEN");
  const clientId = required(ENV, "DISCORD_CLIENT_ID");
  const rest = new REST({ version: "10" }).setToken(token);
  const body = commands.map((c) => c.toJSON());

  if (ENV.DISCORD_GUILD_ID) {
    await rest.put(Routes.applicationGuildCommands(clientId, ENV.DISCORD_GUILD_ID), { body });
    logger.info(`Registered guild commands in ${ENV.DISCORD_GUILD_ID}`);
  } else {
    await rest.put(Routes.applicationCommands(clientId), { body });
    logger.info("Registered global commands (may take time to propagate)");
  }
}

main().catch((e) => {
  logger.error("command registration failed", { error: describeError(e) });
  process.exit(1);
});
