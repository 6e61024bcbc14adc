import { TeamCatalog } from "./catalog";
import { LedgerTx } from "./ledger";
import { ParticipantRow, PickScope, TeamHolder } from "./types";

export type PickContext = {
  participants: ParticipantRow[];
  limits: Map<string, number | null>;
  pickCounts: Map<string, number>;
  /** Team names assigned anywhere, in any draft. */
  taken: Set<string>;
};

export async function loadPickContext(tx: LedgerTx, draftId: number): Promise<PickContext> {
  const participants = await tx.listParticipants(draftId);
  const limitRows = await tx.listLimits(draftId);
  const picks = await tx.listPicks(draftId);
  const assigned = await tx.listAssignedTeams();

  const limits = new Map<string, number | null>();
  for (const l of limitRows) limits.set(l.user_id, l.picks_allowed);

  const pickCounts = new Map<string, number>();
  for (const p of picks) pickCounts.set(p.user_id, (pickCounts.get(p.user_id) ?? 0) + 1);

  return {
    participants,
    limits,
    pickCounts,
    taken: new Set(assigned.map((a) => a.team_name)),
  };
}

export function picksMade(ctx: PickContext, userId: string): number {
  return ctx.pickCounts.get(userId) ?? 0;
}

/** null = no cap. */
export function picksAllowed(ctx: PickContext, userId: string): number | null {
  return ctx.limits.get(userId) ?? null;
}

export function limitReached(ctx: PickContext, userId: string): boolean {
  const allowed = picksAllowed(ctx, userId);
  return allowed != null && picksMade(ctx, userId) >= allowed;
}

/** Teams the participant could still pick, in catalog order. */
export function eligibleTeams(
  catalog: TeamCatalog,
  scope: PickScope,
  participant: ParticipantRow,
  taken: Set<string>
): string[] {
  const pool =
    scope === "conference"
      ? participant.conference
        ? catalog.teamsIn(participant.conference)
        : []
      : catalog.allTeams().map((t) => t.name);
  return pool.filter((t) => !taken.has(t));
}

export function exhaustion(
  ctx: PickContext,
  catalog: TeamCatalog,
  scope: PickScope
): (p: ParticipantRow) => boolean {
  return (p) =>
    limitReached(ctx, p.user_id) || eligibleTeams(catalog, scope, p, ctx.taken).length === 0;
}

export async function findHolder(tx: LedgerTx, teamName: string): Promise<TeamHolder | null> {
  const row = await tx.getAssignedTeam(teamName);
  if (!row) return null;
  let pickNumber: number | null = null;
  if (row.source === "pick") {
    const picks = await tx.listPicks(row.draft_id);
    pickNumber = picks.find((p) => p.team_name === teamName)?.pick_number ?? null;
  }
  return { userId: row.user_id, draftId: row.draft_id, pickNumber };
}
