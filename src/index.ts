import path from "path";
import { Client, Events, GatewayIntentBits, Interaction } from "discord.js";
import { Pool } from "pg";
import { handleCommand, hintFromDiscordError, logUnhandled, replyEphemeral } from "./bot";
import { initSchema } from "./db";
import { ENV, draftSettings, required } from "./env";
import { describeError, logger } from "./logger";
import { TeamCatalog } from "./draft/catalog";
import { PgLedger } from "./draft/db";
import { Ledger } from "./draft/ledger";
import { MemoryLedger } from "./draft/memory";
import { DraftEngine } from "./draft/orchestrator";
import { DraftQueries } from "./draft/queries";

async function openLedger(): Promise<Ledger> {
  if (!ENV.DATABASE_URL) {
    logger.warn("DATABASE_URL not set: using the in-memory ledger, drafts are lost on restart");
    return new MemoryLedger();
  }
  const pool = new Pool({ connectionString: ENV.DATABASE_URL });
  await initSchema(pool);
  return new PgLedger(pool);
}

async function main(): Promise<void> {
  const token = required(ENV, "DISCORD_TOKEN");
  const catalog = TeamCatalog.load(path.resolve(ENV.TEAMS_FILE));
  const settings = draftSettings(ENV);
  const ledger = await openLedger();
  const engine = new DraftEngine(ledger, catalog, settings);
  const queries = new DraftQueries(ledger, catalog, engine.settings);
  const deps = {
    engine,
    queries,
    adminUserId: ENV.ADMIN_USER_ID,
    defaultPicksAllowed: ENV.DEFAULT_PICKS_ALLOWED,
  };

  logger.info("team catalog loaded", {
    conferences: catalog.conferences().length,
    teams: catalog.allTeams().length,
    ...settings,
  });

  const client = new Client({
    intents: [GatewayIntentBits.Guilds],
  });

  client.once(Events.ClientReady, (c) => {
    logger.info(`Logged in as ${c.user.tag}`);
  });

  client.on(Events.InteractionCreate, async (interaction: Interaction) => {
    if (!interaction.isChatInputCommand()) return;
    try {
      await handleCommand(interaction, deps);
    } catch (e) {
      logUnhandled(interaction.commandName, e);
      const content = hintFromDiscordError(e) ?? "Something went wrong.";
      try {
        await replyEphemeral(interaction, content);
      } catch (replyError) {
        logger.warn("could not report failure to user", { error: String(replyError) });
      }
    }
  });

  await client.login(token);
}

main().catch((e) => {
  logger.error("startup failed", { error: describeError(e) });
  process.exit(1);
});
