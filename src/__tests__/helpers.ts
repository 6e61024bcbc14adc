import { TeamCatalog } from "../draft/catalog";
import { Ledger } from "../draft/ledger";
import { MemoryLedger } from "../draft/memory";
import { DraftEngine } from "../draft/orchestrator";
import { DraftQueries } from "../draft/queries";
import { DraftSettings } from "../draft/types";

export const catalogFixture = {
  North: ["Alpha Owls", "Bravo Bears", "Cedar Cats"],
  South: ["Delta Dogs", "Echo Eagles", "Foxtrot Foxes"],
  West: ["Golf Geese", "Hotel Hawks"],
};

export function setup(settings: Partial<DraftSettings> = {}) {
  const ledger = new MemoryLedger();
  const catalog = new TeamCatalog(catalogFixture);
  let tick = 0;
  const now = () => new Date(Date.UTC(2024, 0, 1, 12, 0, tick++));
  const engine = new DraftEngine(ledger, catalog, settings, now);
  const queries = new DraftQueries(ledger, catalog, engine.settings);
  return { ledger, catalog, engine, queries };
}

/**
 * Creates a three-user draft and walks it to the picking stage:
 * u0 North / Alpha Owls, u1 South / Delta Dogs, u2 West / Golf Geese.
 */
export async function toDrafting(engine: DraftEngine, picksAllowed: number | null) {
  const { draft } = await engine.createDraft({
    guildId: "g1",
    channelId: "c1",
    userIds: ["u0", "u1", "u2"],
    picksAllowed,
  });
  await engine.chooseConference(draft.id, "u0", "North");
  await engine.chooseConference(draft.id, "u1", "South");
  await engine.chooseConference(draft.id, "u2", "West");
  await engine.claimTeam(draft.id, "u0", "Alpha Owls");
  await engine.claimTeam(draft.id, "u1", "Delta Dogs");
  const last = await engine.claimTeam(draft.id, "u2", "Golf Geese");
  return { draftId: draft.id, last };
}

/** Checks the ledger-wide invariants that must hold after every commit. */
export async function expectInvariants(ledger: Ledger, draftId: number): Promise<void> {
  const { participants, picks, assigned } = await ledger.withTx(async (tx) => ({
    participants: await tx.listParticipants(draftId),
    picks: await tx.listPicks(draftId),
    assigned: await tx.listAssignedTeams(),
  }));

  const names = assigned.map((a) => a.team_name);
  expect(new Set(names).size).toBe(names.length);

  expect(picks.map((p) => p.pick_number)).toEqual(picks.map((_, i) => i + 1));

  for (const p of participants) {
    expect(p.claimed).toBe(p.claimed_team !== null);
    expect(p.conference_chosen).toBe(p.conference !== null);
  }
  const orders = participants.map((p) => p.pick_order);
  expect(new Set(orders).size).toBe(orders.length);
}
