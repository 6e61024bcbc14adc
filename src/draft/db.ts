import { Pool, PoolClient } from "pg";
import { withTx } from "../db";
import { Ledger, LedgerTx } from "./ledger";
import {
  AssignedTeamRow,
  DraftRow,
  DraftStage,
  DraftStatus,
  LimitRow,
  ParticipantRow,
  PickRow,
} from "./types";

const DRAFT_COLUMNS = `id, guild_id, channel_id, status, stage, created_at, current_pick_index`;

export async function lockDraft(c: PoolClient, draftId: number): Promise<DraftRow | null> {
  const res = await c.query<DraftRow>(
    `SELECT ${DRAFT_COLUMNS}
     FROM drafts
     WHERE id = $1
     FOR UPDATE`,
    [draftId]
  );
  return res.rows[0] ?? null;
}

export async function getDraft(c: PoolClient, draftId: number): Promise<DraftRow | null> {
  const res = await c.query<DraftRow>(`SELECT ${DRAFT_COLUMNS} FROM drafts WHERE id = $1`, [
    draftId,
  ]);
  return res.rows[0] ?? null;
}

export async function findOpenDraft(c: PoolClient, guildId: string): Promise<DraftRow | null> {
  const res = await c.query<DraftRow>(
    `SELECT ${DRAFT_COLUMNS}
     FROM drafts
     WHERE guild_id = $1 AND status IN ('pending', 'active')
     ORDER BY id DESC
     LIMIT 1`,
    [guildId]
  );
  return res.rows[0] ?? null;
}

export async function findLatestDraft(c: PoolClient, guildId: string): Promise<DraftRow | null> {
  const res = await c.query<DraftRow>(
    `SELECT ${DRAFT_COLUMNS}
     FROM drafts
     WHERE guild_id = $1
     ORDER BY id DESC
     LIMIT 1`,
    [guildId]
  );
  return res.rows[0] ?? null;
}

export async function insertDraft(
  c: PoolClient,
  args: { guildId: string; channelId: string | null; createdAt: Date }
): Promise<DraftRow | null> {
  // drafts_open_guild_idx rejects a second open draft for the guild
  const res = await c.query<DraftRow>(
    `INSERT INTO drafts(guild_id, channel_id, status, stage, created_at, current_pick_index)
     VALUES($1, $2, 'pending', 'conference', $3, 0)
     ON CONFLICT DO NOTHING
     RETURNING ${DRAFT_COLUMNS}`,
    [args.guildId, args.channelId, args.createdAt]
  );
  return res.rows[0] ?? null;
}

export async function setStage(c: PoolClient, draftId: number, stage: DraftStage): Promise<void> {
  await c.query(`UPDATE drafts SET stage = $2 WHERE id = $1`, [draftId, stage]);
}

export async function setStatus(c: PoolClient, draftId: number, status: DraftStatus): Promise<void> {
  await c.query(`UPDATE drafts SET status = $2 WHERE id = $1`, [draftId, status]);
}

export async function setCurrentPickIndex(
  c: PoolClient,
  draftId: number,
  index: number
): Promise<void> {
  await c.query(`UPDATE drafts SET current_pick_index = $2 WHERE id = $1`, [draftId, index]);
}

export async function insertParticipant(
  c: PoolClient,
  draftId: number,
  userId: string,
  pickOrder: number
): Promise<void> {
  await c.query(`INSERT INTO participants(draft_id, user_id, pick_order) VALUES($1, $2, $3)`, [
    draftId,
    userId,
    pickOrder,
  ]);
}

export async function listParticipants(c: PoolClient, draftId: number): Promise<ParticipantRow[]> {
  const res = await c.query<ParticipantRow>(
    `SELECT draft_id, user_id, pick_order, conference, conference_chosen, claimed_team, claimed
     FROM participants
     WHERE draft_id = $1
     ORDER BY pick_order ASC`,
    [draftId]
  );
  return res.rows;
}

export async function setConference(
  c: PoolClient,
  draftId: number,
  userId: string,
  conference: string
): Promise<void> {
  await c.query(
    `UPDATE participants
     SET conference = $3, conference_chosen = TRUE
     WHERE draft_id = $1 AND user_id = $2`,
    [draftId, userId, conference]
  );
}

export async function setClaimedTeam(
  c: PoolClient,
  draftId: number,
  userId: string,
  teamName: string
): Promise<void> {
  await c.query(
    `UPDATE participants
     SET claimed_team = $3, claimed = TRUE
     WHERE draft_id = $1 AND user_id = $2`,
    [draftId, userId, teamName]
  );
}

export async function setPicksAllowed(
  c: PoolClient,
  draftId: number,
  userId: string,
  picksAllowed: number | null
): Promise<void> {
  await c.query(
    `INSERT INTO participant_limits(draft_id, user_id, picks_allowed)
     VALUES($1, $2, $3)
     ON CONFLICT (draft_id, user_id) DO UPDATE SET picks_allowed = EXCLUDED.picks_allowed`,
    [draftId, userId, picksAllowed]
  );
}

export async function listLimits(c: PoolClient, draftId: number): Promise<LimitRow[]> {
  const res = await c.query<LimitRow>(
    `SELECT draft_id, user_id, picks_allowed FROM participant_limits WHERE draft_id = $1`,
    [draftId]
  );
  return res.rows;
}

export async function listPicks(c: PoolClient, draftId: number): Promise<PickRow[]> {
  const res = await c.query<PickRow>(
    `SELECT draft_id, pick_number, user_id, team_name, picked_at
     FROM picks
     WHERE draft_id = $1
     ORDER BY pick_number ASC`,
    [draftId]
  );
  return res.rows;
}

export async function maxPickNumber(c: PoolClient, draftId: number): Promise<number> {
  const res = await c.query<{ n: number }>(
    `SELECT COALESCE(MAX(pick_number), 0)::int as n FROM picks WHERE draft_id = $1`,
    [draftId]
  );
  return res.rows[0]?.n ?? 0;
}

export async function insertPick(c: PoolClient, pick: PickRow): Promise<boolean> {
  const res = await c.query(
    `INSERT INTO picks(draft_id, pick_number, user_id, team_name, picked_at)
     VALUES($1, $2, $3, $4, $5)
     ON CONFLICT (draft_id, pick_number) DO NOTHING`,
    [pick.draft_id, pick.pick_number, pick.user_id, pick.team_name, pick.picked_at]
  );
  return (res.rowCount ?? 0) > 0;
}

export async function getAssignedTeam(
  c: PoolClient,
  teamName: string
): Promise<AssignedTeamRow | null> {
  const res = await c.query<AssignedTeamRow>(
    `SELECT team_name, draft_id, user_id, source FROM assigned_teams WHERE team_name = $1`,
    [teamName]
  );
  return res.rows[0] ?? null;
}

export async function listAssignedTeams(c: PoolClient): Promise<AssignedTeamRow[]> {
  const res = await c.query<AssignedTeamRow>(
    `SELECT team_name, draft_id, user_id, source FROM assigned_teams`
  );
  return res.rows;
}

export async function insertAssignedTeam(c: PoolClient, row: AssignedTeamRow): Promise<boolean> {
  // The primary key on team_name is the serialization point for claims.
  const res = await c.query(
    `INSERT INTO assigned_teams(team_name, draft_id, user_id, source)
     VALUES($1, $2, $3, $4)
     ON CONFLICT (team_name) DO NOTHING`,
    [row.team_name, row.draft_id, row.user_id, row.source]
  );
  return (res.rowCount ?? 0) > 0;
}

export async function releaseAssignedTeams(c: PoolClient, draftId: number): Promise<number> {
  const res = await c.query(`DELETE FROM assigned_teams WHERE draft_id = $1`, [draftId]);
  return res.rowCount ?? 0;
}

class PgLedgerTx implements LedgerTx {
  constructor(private readonly c: PoolClient) {}

  lockDraft(draftId: number) {
    return lockDraft(this.c, draftId);
  }
  getDraft(draftId: number) {
    return getDraft(this.c, draftId);
  }
  findOpenDraft(guildId: string) {
    return findOpenDraft(this.c, guildId);
  }
  findLatestDraft(guildId: string) {
    return findLatestDraft(this.c, guildId);
  }
  insertDraft(args: { guildId: string; channelId: string | null; createdAt: Date }) {
    return insertDraft(this.c, args);
  }
  setStage(draftId: number, stage: DraftStage) {
    return setStage(this.c, draftId, stage);
  }
  setStatus(draftId: number, status: DraftStatus) {
    return setStatus(this.c, draftId, status);
  }
  setCurrentPickIndex(draftId: number, index: number) {
    return setCurrentPickIndex(this.c, draftId, index);
  }
  insertParticipant(draftId: number, userId: string, pickOrder: number) {
    return insertParticipant(this.c, draftId, userId, pickOrder);
  }
  listParticipants(draftId: number) {
    return listParticipants(this.c, draftId);
  }
  setConference(draftId: number, userId: string, conference: string) {
    return setConference(this.c, draftId, userId, conference);
  }
  setClaimedTeam(draftId: number, userId: string, teamName: string) {
    return setClaimedTeam(this.c, draftId, userId, teamName);
  }
  setPicksAllowed(draftId: number, userId: string, picksAllowed: number | null) {
    return setPicksAllowed(this.c, draftId, userId, picksAllowed);
  }
  listLimits(draftId: number) {
    return listLimits(this.c, draftId);
  }
  listPicks(draftId: number) {
    return listPicks(this.c, draftId);
  }
  maxPickNumber(draftId: number) {
    return maxPickNumber(this.c, draftId);
  }
  insertPick(pick: PickRow) {
    return insertPick(this.c, pick);
  }
  getAssignedTeam(teamName: string) {
    return getAssignedTeam(this.c, teamName);
  }
  listAssignedTeams() {
    return listAssignedTeams(this.c);
  }
  insertAssignedTeam(row: AssignedTeamRow) {
    return insertAssignedTeam(this.c, row);
  }
  releaseAssignedTeams(draftId: number) {
    return releaseAssignedTeams(this.c, draftId);
  }
}

export class PgLedger implements Ledger {
  constructor(private readonly pool: Pool) {}

  withTx<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    return withTx(this.pool, (c) => fn(new PgLedgerTx(c)));
  }
}
