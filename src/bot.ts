import {
  AttachmentBuilder,
  ChatInputCommandInteraction,
  PermissionFlagsBits,
} from "discord.js";
import { CommandName } from "./commands";
import { DraftErrors, isDraftError } from "./errors";
import { describeError, logger } from "./logger";
import { DraftEngine } from "./draft/orchestrator";
import { DraftQueries } from "./draft/queries";
import {
  MAX_INLINE_REPLY,
  renderActionResult,
  renderAvailable,
  renderCancelled,
  renderConferenceRosters,
  renderConferenceSlots,
  renderConferenceView,
  renderCreated,
  renderStatusEmbed,
} from "./draft/render";
import { DraftRow } from "./draft/types";

export type BotDeps = {
  engine: DraftEngine;
  queries: DraftQueries;
  adminUserId?: string;
  defaultPicksAllowed: number | null;
};

type Handler = (i: ChatInputCommandInteraction, deps: BotDeps) => Promise<void>;

const handlers: Record<CommandName, Handler> = {
  start_draft: handleStartDraft,
  choose_conference: async (i, deps) => {
    const draft = await requireOpenDraft(i, deps);
    const res = await deps.engine.chooseConference(
      draft.id,
      i.user.id,
      i.options.getString("conference", true)
    );
    await i.reply({ content: renderActionResult(res) });
  },
  claim: async (i, deps) => {
    const draft = await requireOpenDraft(i, deps);
    const res = await deps.engine.claimTeam(draft.id, i.user.id, i.options.getString("team_name", true));
    await i.reply({ content: renderActionResult(res) });
  },
  pick: async (i, deps) => {
    const draft = await requireOpenDraft(i, deps);
    const res = await deps.engine.makePick(draft.id, i.user.id, i.options.getString("team_name", true));
    await i.reply({ content: renderActionResult(res) });
  },
  list_available: async (i, deps) => {
    const draft = await requireOpenDraft(i, deps);
    const teams = await deps.queries.availableTeams(draft.id, i.user.id);
    await replyLong(i, renderAvailable(teams), "available_teams.txt", true);
  },
  status: async (i, deps) => {
    const draft = await requireOpenDraft(i, deps);
    await deps.engine.settleTurn(draft.id);
    const view = await deps.queries.status(draft.id);
    if (!view) throw DraftErrors.notFound(draft.id);
    await i.reply({ embeds: [renderStatusEmbed(view)] });
  },
  conference_rosters: async (i, deps) => {
    const draft = await requireAnyDraft(i, deps);
    const mapping = await deps.queries.conferenceRosters(draft.id);
    await replyLong(
      i,
      renderConferenceRosters(draft.id, mapping),
      `conference_rosters_draft_${draft.id}.txt`
    );
  },
  conference_view: async (i, deps) => {
    const draft = await requireAnyDraft(i, deps);
    const conference = i.options.getString("conference", true);
    const mapping = await deps.queries.conferenceRosters(draft.id);
    const out = renderConferenceView(draft.id, mapping, conference);
    if (!out) {
      await i.reply({
        content: `No entries found for conference '${conference}' in draft #${draft.id}.`,
        ephemeral: true,
      });
      return;
    }
    await replyLong(i, out, `conference_draft_${draft.id}.txt`);
  },
  list_conferences: async (i, deps) => {
    const draft = await requireAnyDraft(i, deps);
    const slots = await deps.queries.conferenceSlots(draft.id);
    await replyLong(
      i,
      renderConferenceSlots(draft.id, slots, deps.engine.settings.maxPerConference),
      `conferences_draft_${draft.id}.txt`
    );
  },
  end_draft: async (i, deps) => {
    if (!isAdmin(i, deps.adminUserId)) {
      await i.reply({ content: "You don't have permission to end a draft.", ephemeral: true });
      return;
    }
    const draft = await requireOpenDraft(i, deps);
    const res = await deps.engine.cancelDraft(draft.id);
    await i.reply({ content: renderCancelled(res) });
  },
};

function isCommandName(name: string): name is CommandName {
  return Object.prototype.hasOwnProperty.call(handlers, name);
}

export async function handleCommand(
  interaction: ChatInputCommandInteraction,
  deps: BotDeps
): Promise<void> {
  if (!interaction.inGuild()) {
    await interaction.reply({ content: "Use this command in a server.", ephemeral: true });
    return;
  }
  if (!isCommandName(interaction.commandName)) return;

  try {
    await handlers[interaction.commandName](interaction, deps);
  } catch (e) {
    if (!isDraftError(e)) throw e;
    await replyEphemeral(interaction, e.message);
  }
}

async function handleStartDraft(i: ChatInputCommandInteraction, deps: BotDeps): Promise<void> {
  if (!isAdmin(i, deps.adminUserId)) {
    await i.reply({ content: "You don't have permission to start a draft.", ephemeral: true });
    return;
  }
  const guildId = i.guildId;
  if (!guildId) return;

  const userIds = parseUserIds(i.options.getString("participants", true));
  const picks = i.options.getInteger("picks");
  const created = await deps.engine.createDraft({
    guildId,
    channelId: i.channelId,
    userIds,
    picksAllowed: picks ?? deps.defaultPicksAllowed,
  });
  await i.reply({ content: renderCreated(created, deps.engine.settings.maxPerConference) });
}

async function requireOpenDraft(i: ChatInputCommandInteraction, deps: BotDeps): Promise<DraftRow> {
  const draft = i.guildId ? await deps.engine.findOpenDraft(i.guildId) : null;
  if (!draft) throw DraftErrors.notFound();
  return draft;
}

async function requireAnyDraft(i: ChatInputCommandInteraction, deps: BotDeps): Promise<DraftRow> {
  if (!i.guildId) throw DraftErrors.notFound();
  const draft =
    (await deps.engine.findOpenDraft(i.guildId)) ?? (await deps.engine.findLatestDraft(i.guildId));
  if (!draft) throw DraftErrors.notFound();
  return draft;
}

function isAdmin(i: ChatInputCommandInteraction, adminUserId: string | undefined): boolean {
  if (adminUserId && i.user.id === adminUserId) return true;
  return i.memberPermissions?.has(PermissionFlagsBits.Administrator) ?? false;
}

/** Pulls user ids out of `<@123>`, `<@!123>` mentions and bare numeric ids, keeping order. */
export function parseUserIds(text: string): string[] {
  const ids: string[] = [];
  for (const token of text.split(/\s+/)) {
    const m = /^<@!?(\d+)>$/.exec(token) ?? /^(\d+)$/.exec(token);
    if (m?.[1]) ids.push(m[1]);
  }
  return ids;
}

async function replyLong(
  i: ChatInputCommandInteraction,
  content: string,
  filename: string,
  ephemeral = false
): Promise<void> {
  if (content.length <= MAX_INLINE_REPLY) {
    await i.reply({ content, ephemeral });
    return;
  }
  const file = new AttachmentBuilder(Buffer.from(content, "utf-8"), { name: filename });
  await i.reply({ content: "Output is long, attached as a file:", files: [file], ephemeral });
}

export async function replyEphemeral(
  i: ChatInputCommandInteraction,
  content: string
): Promise<void> {
  if (i.deferred || i.replied) {
    await i.followUp({ content, ephemeral: true });
  } else {
    await i.reply({ content, ephemeral: true });
  }
}

export function hintFromDiscordError(e: unknown): string | null {
  const code = discordErrorCode(e);
  if (code === 50001) {
    return (
      "Missing Access (50001). The bot cannot see this channel or thread. " +
      "Check channel permissions: View Channel, Send Messages, Embed Links, Attach Files."
    );
  }
  if (code === 50013) {
    return (
      "Missing Permissions (50013). Check channel permissions: " +
      "View Channel, Send Messages, Embed Links, Attach Files."
    );
  }
  return null;
}

function discordErrorCode(e: unknown): number | null {
  if (typeof e !== "object" || e === null) return null;
  if ("code" in e && typeof e.code === "number") return e.code;
  if ("rawError" in e && typeof e.rawError === "object" && e.rawError !== null) {
    const raw = e.rawError;
    if ("code" in raw && typeof raw.code === "number") return raw.code;
  }
  return null;
}

export function logUnhandled(commandName: string, e: unknown): void {
  logger.error("interaction failed", { command: commandName, error: describeError(e) });
}
