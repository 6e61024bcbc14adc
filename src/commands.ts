import { SlashCommandBuilder } from "discord.js";

export const commands = [
  new SlashCommandBuilder()
    .setName("start_draft")
    .setDescription("Create and start a new draft with participants in pick order.")
    .addStringOption((opt) =>
      opt
        .setName("participants")
        .setDescription("Mentions or user ids in pick order, space separated. Example: @User1 @User2")
        .setRequired(true)
    )
    .addIntegerOption((opt) =>
      opt
        .setName("picks")
        .setDescription("Team picks allowed per participant (claims do not count)")
        .setMinValue(1)
        .setRequired(false)
    ),
  new SlashCommandBuilder()
    .setName("choose_conference")
    .setDescription("Choose your conference during the conference round.")
    .addStringOption((opt) =>
      opt.setName("conference").setDescription("Conference name").setRequired(true)
    ),
  new SlashCommandBuilder()
    .setName("claim")
    .setDescription("Claim a team from your conference before picks start.")
    .addStringOption((opt) =>
      opt
        .setName("team_name")
        .setDescription("Team name (case-insensitive). Use /list_available to see options.")
        .setRequired(true)
    ),
  new SlashCommandBuilder()
    .setName("pick")
    .setDescription("Pick a team when it is your turn.")
    .addStringOption((opt) =>
      opt
        .setName("team_name")
        .setDescription("Team name (case-insensitive). Use /list_available to see options.")
        .setRequired(true)
    ),
  new SlashCommandBuilder()
    .setName("list_available")
    .setDescription("List teams nobody holds yet."),
  new SlashCommandBuilder()
    .setName("status")
    .setDescription("Show draft status and recent picks (up to 50)."),
  new SlashCommandBuilder()
    .setName("conference_rosters")
    .setDescription("Show teams per conference for the active or most recent draft."),
  new SlashCommandBuilder()
    .setName("conference_view")
    .setDescription("Show teams in one conference for the active or most recent draft.")
    .addStringOption((opt) =>
      opt.setName("conference").setDescription("Conference name").setRequired(true)
    ),
  new SlashCommandBuilder()
    .setName("list_conferences")
    .setDescription("Show conferences and slot usage for the active or most recent draft."),
  new SlashCommandBuilder()
    .setName("end_draft")
    .setDescription("End (cancel) the current draft."),
];

export type CommandName =
  | "start_draft"
  | "choose_conference"
  | "claim"
  | "pick"
  | "list_available"
  | "status"
  | "conference_rosters"
  | "conference_view"
  | "list_conferences"
  | "end_draft";
