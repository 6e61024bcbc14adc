import { DraftErrors, InvariantViolation } from "../errors";
import { TeamCatalog } from "./catalog";
import { LedgerTx } from "./ledger";
import {
  exhaustion,
  findHolder,
  limitReached,
  loadPickContext,
  picksAllowed,
  picksMade,
} from "./pool";
import { advance, participantAt } from "./turns";
import { ActionOutcome, DraftRow, DraftSettings, PickRow } from "./types";

export type PickResult = {
  outcome: Extract<ActionOutcome, { type: "pickMade" }>;
  /** false when nobody can pick any more. */
  draftContinues: boolean;
};

/**
 * Validates a pick against turn order, the user's cap and the team pool,
 * then writes the assignment, the pick log entry and the new cursor. The
 * caller's transaction makes the three writes one unit.
 */
export async function makePick(
  tx: LedgerTx,
  catalog: TeamCatalog,
  settings: DraftSettings,
  draft: DraftRow,
  userId: string,
  teamName: string,
  now: Date
): Promise<PickResult> {
  const ctx = await loadPickContext(tx, draft.id);
  const me = ctx.participants.find((p) => p.user_id === userId);
  if (!me) throw DraftErrors.notAParticipant();

  const onClock = participantAt(draft, ctx.participants, settings.pickOrder);
  if (onClock.user_id !== userId) throw DraftErrors.notYourTurn(onClock.user_id);

  if (limitReached(ctx, userId)) {
    throw DraftErrors.limitReached(picksMade(ctx, userId), picksAllowed(ctx, userId) ?? 0);
  }

  const team = catalog.resolveTeam(teamName);
  if (!team) throw DraftErrors.unknownTeam(teamName.trim());
  if (settings.pickScope === "conference" && team.conference !== me.conference) {
    throw DraftErrors.teamOutsideConference(team.name, me.conference ?? "none");
  }
  if (ctx.taken.has(team.name)) {
    const holder = await findHolder(tx, team.name);
    if (holder) throw DraftErrors.teamTaken(team.name, holder);
  }

  const won = await tx.insertAssignedTeam({
    team_name: team.name,
    draft_id: draft.id,
    user_id: userId,
    source: "pick",
  });
  if (!won) {
    throw DraftErrors.teamAlreadyClaimed(team.name, await findHolder(tx, team.name));
  }

  const pick: PickRow = {
    draft_id: draft.id,
    pick_number: (await tx.maxPickNumber(draft.id)) + 1,
    user_id: userId,
    team_name: team.name,
    picked_at: now,
  };
  if (!(await tx.insertPick(pick))) {
    throw new InvariantViolation(`draft ${draft.id}: pick number ${pick.pick_number} already used`);
  }

  ctx.taken.add(team.name);
  ctx.pickCounts.set(userId, picksMade(ctx, userId) + 1);

  const next = await advance(
    tx,
    draft,
    ctx.participants,
    settings.pickOrder,
    exhaustion(ctx, catalog, settings.pickScope)
  );

  return {
    outcome: { type: "pickMade", pick, nextUserId: next?.user_id ?? null },
    draftContinues: next != null,
  };
}
