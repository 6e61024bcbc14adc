import { EmbedBuilder } from "discord.js";
import { CancelResult } from "./orchestrator";
import { ConferenceRosters, ConferenceSlots, DraftStatusView, UNASSIGNED } from "./queries";
import { ActionResult, CreatedDraft, DraftStage } from "./types";

/** Replies longer than this go out as a text attachment. */
export const MAX_INLINE_REPLY = 1900;

const STAGE_LABEL: Record<DraftStage, string> = {
  conference: "conference selection",
  claim: "team claims",
  drafting: "team picks",
  done: "done",
};

export function mention(userId: string): string {
  return `<@${userId}>`;
}

export function renderCreated(created: CreatedDraft, maxPerConference: number): string {
  const order = created.participants.map((p) => mention(p.user_id)).join(", ");
  return (
    `Draft #${created.draft.id} started. Pick order: ${order}.\n` +
    `Stage: ${STAGE_LABEL[created.draft.stage]}. Everyone uses /choose_conference <conference> ` +
    `(max ${maxPerConference} users per conference), then /claim <team_name> to claim a team ` +
    `from their conference. Team picks start once everyone has claimed.`
  );
}

export function renderActionResult(result: ActionResult): string {
  const lines: string[] = [];
  const o = result.outcome;
  switch (o.type) {
    case "conferenceChosen":
      lines.push(`${mention(o.userId)} chose conference '${o.conference}'.`);
      break;
    case "teamClaimed":
      lines.push(`${mention(o.userId)} claimed '${o.teamName}' (${o.conference}).`);
      break;
    case "pickMade":
      lines.push(
        `${mention(o.pick.user_id)} picked ${o.pick.team_name} (global pick #${o.pick.pick_number}).`
      );
      break;
  }

  if (result.transition?.to === "claim") {
    lines.push("All conferences chosen. Use /claim <team_name> to claim a team from your conference.");
  } else if (result.transition?.to === "drafting") {
    lines.push("All teams claimed. Moving to team picks.");
  } else if (result.transition?.to === "done") {
    lines.push(`Draft #${result.draft.id} is complete. Use /conference_rosters to see the results.`);
  }

  if (result.currentTurn) {
    lines.push(`Next: ${mention(result.currentTurn)}'s turn. Use /pick <team_name>.`);
  }
  return lines.join("\n");
}

export function renderCancelled(res: CancelResult): string {
  const released =
    res.released > 0 ? ` ${res.released} team${res.released === 1 ? "" : "s"} released.` : "";
  return `Draft #${res.draft.id} ended.${released}`;
}

export function renderAvailable(teams: string[]): string {
  if (teams.length === 0) return "No teams left.";
  return `Available teams (${teams.length}):\n${teams.join("\n")}`;
}

export function renderStatusEmbed(view: DraftStatusView): EmbedBuilder {
  const { draft } = view;
  const embed = new EmbedBuilder()
    .setTitle(`Draft #${draft.id}`)
    .setDescription(
      `Status: ${draft.status} • Stage: ${STAGE_LABEL[draft.stage]} • ` +
        `pick index ${draft.current_pick_index}`
    )
    .setColor(draft.status === "active" ? 0x2ecc71 : draft.status === "pending" ? 0x3498db : 0x95a5a6);

  const participants = view.participants.map((p) => {
    const cap = p.picksAllowed == null ? "∞" : `${p.picksAllowed}`;
    const turn = p.user_id === view.currentTurn ? " ⏳" : "";
    return (
      `${mention(p.user_id)}${turn} — conference: ${p.conference ?? "(not chosen)"}; ` +
      `claimed: ${p.claimed_team ?? "(none)"}; picks ${p.picksMade}/${cap}`
    );
  });
  const picks = view.picks.map(
    (k) => `#${k.pick_number} ${mention(k.user_id)} — ${k.team_name}`
  );

  embed.addFields([
    { name: `Participants (${view.participants.length})`, value: truncateLines(participants.join("\n"), 1024) },
    { name: "Picks", value: picks.length ? truncateLines(picks.join("\n"), 1024) : "No team picks yet." },
  ]);
  return embed;
}

export function renderConferenceRosters(draftId: number, mapping: ConferenceRosters): string {
  const lines: string[] = [`Conference rosters for draft #${draftId}:`];
  const conferences = [...mapping.keys()].sort(byConference);
  for (const conf of conferences) {
    lines.push(...renderConferenceBlock(conf, mapping.get(conf) ?? new Map()), "");
  }
  return lines.join("\n").trimEnd();
}

export function renderConferenceView(
  draftId: number,
  mapping: ConferenceRosters,
  conference: string
): string | null {
  const key = [...mapping.keys()].find((k) => k.toLowerCase() === conference.trim().toLowerCase());
  if (!key) return null;
  const users = mapping.get(key) ?? new Map<string, string[]>();
  return [`Conference '${key}' for draft #${draftId}:`, ...renderConferenceBlock(key, users)].join(
    "\n"
  );
}

export function renderConferenceSlots(
  draftId: number,
  slots: ConferenceSlots,
  maxPerConference: number
): string {
  const lines = [
    `Conferences (draft #${draftId}): each conference has max ${maxPerConference} slots.`,
  ];
  for (const s of slots) {
    if (s.conference === UNASSIGNED) {
      lines.push(`- ${UNASSIGNED}: ${s.userIds.length}`);
    } else {
      lines.push(`- ${s.conference}: ${s.userIds.length}/${maxPerConference} slots used`);
    }
    if (s.userIds.length > 0) lines.push(`  ${s.userIds.map(mention).join(", ")}`);
  }
  return lines.join("\n");
}

function renderConferenceBlock(conf: string, users: Map<string, string[]>): string[] {
  const lines = [`=== ${conf} ===`];
  if (users.size === 0) {
    lines.push("  (no users)");
    return lines;
  }
  for (const [userId, teams] of users) {
    lines.push(`- ${mention(userId)}: ${teams.length ? teams.join(", ") : "(no teams)"}`);
  }
  return lines;
}

// "(unassigned)" sorts last, the rest alphabetically
function byConference(a: string, b: string): number {
  if (a === UNASSIGNED) return b === UNASSIGNED ? 0 : 1;
  if (b === UNASSIGNED) return -1;
  return a.toLowerCase().localeCompare(b.toLowerCase());
}

function truncateLines(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return `${s.slice(0, maxLen - 10)}\n…`;
}
