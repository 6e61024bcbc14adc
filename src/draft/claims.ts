import { DraftErrors } from "../errors";
import { TeamCatalog } from "./catalog";
import { LedgerTx } from "./ledger";
import { findHolder } from "./pool";
import { ActionOutcome, DraftRow, ParticipantRow } from "./types";

async function requireParticipant(
  tx: LedgerTx,
  draftId: number,
  userId: string
): Promise<{ me: ParticipantRow; all: ParticipantRow[] }> {
  const all = await tx.listParticipants(draftId);
  const me = all.find((p) => p.user_id === userId);
  if (!me) throw DraftErrors.notAParticipant();
  return { me, all };
}

export async function chooseConference(
  tx: LedgerTx,
  catalog: TeamCatalog,
  maxPerConference: number,
  draft: DraftRow,
  userId: string,
  conferenceName: string
): Promise<ActionOutcome> {
  const { me, all } = await requireParticipant(tx, draft.id, userId);
  if (me.conference_chosen && me.conference != null) {
    throw DraftErrors.conferenceAlreadyChosen(me.conference);
  }

  const conference = catalog.resolveConference(conferenceName);
  if (!conference) throw DraftErrors.unknownConference(conferenceName.trim());

  const used = all.filter((p) => p.conference === conference).length;
  if (used >= maxPerConference) throw DraftErrors.conferenceFull(conference, maxPerConference);

  // every member of a conference still has to claim one of its unheld teams
  const taken = new Set((await tx.listAssignedTeams()).map((a) => a.team_name));
  const free = catalog.teamsIn(conference).filter((t) => !taken.has(t)).length;
  const waiting = all.filter((p) => p.conference === conference && !p.claimed).length;
  if (free <= waiting) throw DraftErrors.conferenceOutOfTeams(conference);

  await tx.setConference(draft.id, userId, conference);
  return { type: "conferenceChosen", userId, conference };
}

export async function claimTeam(
  tx: LedgerTx,
  catalog: TeamCatalog,
  draft: DraftRow,
  userId: string,
  teamName: string
): Promise<ActionOutcome> {
  const { me } = await requireParticipant(tx, draft.id, userId);
  if (me.claimed && me.claimed_team != null) throw DraftErrors.teamAlreadyChosen(me.claimed_team);

  const team = catalog.resolveTeam(teamName);
  if (!team) throw DraftErrors.unknownTeam(teamName.trim());
  if (me.conference == null || team.conference !== me.conference) {
    throw DraftErrors.teamOutsideConference(team.name, me.conference ?? "none");
  }

  // No availability pre-check: the insert either wins the team or reports
  // the conflict, and the participant row is written only after it wins.
  const won = await tx.insertAssignedTeam({
    team_name: team.name,
    draft_id: draft.id,
    user_id: userId,
    source: "claim",
  });
  if (!won) {
    throw DraftErrors.teamAlreadyClaimed(team.name, await findHolder(tx, team.name));
  }

  await tx.setClaimedTeam(draft.id, userId, team.name);
  return { type: "teamClaimed", userId, teamName: team.name, conference: team.conference };
}
