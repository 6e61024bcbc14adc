import { Pool, PoolClient } from "pg";
import { logger } from "./logger";

export async function withTx<T>(pool: Pool, fn: (c: PoolClient) => Promise<T>): Promise<T> {
  const c = await pool.connect();
  try {
    await c.query("BEGIN");
    const res = await fn(c);
    await c.query("COMMIT");
    return res;
  } catch (e) {
    try {
      await c.query("ROLLBACK");
    } catch (rollbackError) {
      logger.warn("ROLLBACK failed", { error: String(rollbackError) });
    }
    throw e;
  } finally {
    c.release();
  }
}

export async function initSchema(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS drafts (
      id SERIAL PRIMARY KEY,
      guild_id TEXT NOT NULL,
      channel_id TEXT,
      status TEXT NOT NULL, -- pending | active | completed | cancelled
      stage TEXT NOT NULL DEFAULT 'conference', -- conference | claim | drafting | done
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      current_pick_index INTEGER NOT NULL DEFAULT 0
    );

    -- one open draft per guild
    CREATE UNIQUE INDEX IF NOT EXISTS drafts_open_guild_idx
      ON drafts(guild_id) WHERE status IN ('pending', 'active');

    CREATE TABLE IF NOT EXISTS participants (
      id SERIAL PRIMARY KEY,
      draft_id INTEGER NOT NULL REFERENCES drafts(id) ON DELETE CASCADE,
      user_id TEXT NOT NULL,
      pick_order INTEGER NOT NULL,
      claimed_team TEXT DEFAULT NULL,
      conference TEXT DEFAULT NULL,
      claimed BOOLEAN NOT NULL DEFAULT FALSE,
      conference_chosen BOOLEAN NOT NULL DEFAULT FALSE,
      UNIQUE (draft_id, user_id),
      UNIQUE (draft_id, pick_order),
      CHECK (claimed = (claimed_team IS NOT NULL)),
      CHECK (conference_chosen = (conference IS NOT NULL))
    );

    CREATE TABLE IF NOT EXISTS participant_limits (
      draft_id INTEGER NOT NULL REFERENCES drafts(id) ON DELETE CASCADE,
      user_id TEXT NOT NULL,
      picks_allowed INTEGER, -- NULL = unlimited
      PRIMARY KEY (draft_id, user_id)
    );

    CREATE TABLE IF NOT EXISTS picks (
      id SERIAL PRIMARY KEY,
      draft_id INTEGER NOT NULL REFERENCES drafts(id) ON DELETE CASCADE,
      pick_number INTEGER NOT NULL,
      user_id TEXT NOT NULL,
      team_name TEXT NOT NULL,
      picked_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      UNIQUE (draft_id, pick_number)
    );

    CREATE TABLE IF NOT EXISTS assigned_teams (
      team_name TEXT PRIMARY KEY,
      draft_id INTEGER NOT NULL,
      user_id TEXT NOT NULL
    );
  `);

  // Schema migrations for existing installations
  await pool.query(
    `ALTER TABLE assigned_teams ADD COLUMN IF NOT EXISTS source TEXT NOT NULL DEFAULT 'pick';`
  );
}
