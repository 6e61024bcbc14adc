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

type MemoryState = {
  nextDraftId: number;
  drafts: DraftRow[];
  participants: ParticipantRow[];
  limits: LimitRow[];
  picks: PickRow[];
  assigned: AssignedTeamRow[];
};

function emptyState(): MemoryState {
  return { nextDraftId: 1, drafts: [], participants: [], limits: [], picks: [], assigned: [] };
}

const isOpen = (d: DraftRow) => d.status === "pending" || d.status === "active";

class MemoryLedgerTx implements LedgerTx {
  constructor(private readonly s: MemoryState) {}

  private draft(draftId: number): DraftRow | undefined {
    return this.s.drafts.find((d) => d.id === draftId);
  }

  private participant(draftId: number, userId: string): ParticipantRow | undefined {
    return this.s.participants.find((p) => p.draft_id === draftId && p.user_id === userId);
  }

  async lockDraft(draftId: number) {
    // Transactions already run one at a time.
    return this.getDraft(draftId);
  }

  async getDraft(draftId: number) {
    const d = this.draft(draftId);
    return d ? { ...d } : null;
  }

  async findOpenDraft(guildId: string) {
    const open = this.s.drafts.filter((d) => d.guild_id === guildId && isOpen(d));
    const d = open[open.length - 1];
    return d ? { ...d } : null;
  }

  async findLatestDraft(guildId: string) {
    const all = this.s.drafts.filter((d) => d.guild_id === guildId);
    const d = all[all.length - 1];
    return d ? { ...d } : null;
  }

  async insertDraft(args: { guildId: string; channelId: string | null; createdAt: Date }) {
    if (this.s.drafts.some((d) => d.guild_id === args.guildId && isOpen(d))) return null;
    const row: DraftRow = {
      id: this.s.nextDraftId++,
      guild_id: args.guildId,
      channel_id: args.channelId,
      status: "pending",
      stage: "conference",
      created_at: args.createdAt,
      current_pick_index: 0,
    };
    this.s.drafts.push(row);
    return { ...row };
  }

  async setStage(draftId: number, stage: DraftStage) {
    const d = this.draft(draftId);
    if (d) d.stage = stage;
  }

  async setStatus(draftId: number, status: DraftStatus) {
    const d = this.draft(draftId);
    if (d) d.status = status;
  }

  async setCurrentPickIndex(draftId: number, index: number) {
    const d = this.draft(draftId);
    if (d) d.current_pick_index = index;
  }

  async insertParticipant(draftId: number, userId: string, pickOrder: number) {
    const dup = this.s.participants.some(
      (p) => p.draft_id === draftId && (p.user_id === userId || p.pick_order === pickOrder)
    );
    if (dup) throw new Error(`duplicate participant ${userId} in draft ${draftId}`);
    this.s.participants.push({
      draft_id: draftId,
      user_id: userId,
      pick_order: pickOrder,
      conference: null,
      conference_chosen: false,
      claimed_team: null,
      claimed: false,
    });
  }

  async listParticipants(draftId: number) {
    return this.s.participants
      .filter((p) => p.draft_id === draftId)
      .sort((a, b) => a.pick_order - b.pick_order)
      .map((p) => ({ ...p }));
  }

  async setConference(draftId: number, userId: string, conference: string) {
    const p = this.participant(draftId, userId);
    if (!p) return;
    p.conference = conference;
    p.conference_chosen = true;
  }

  async setClaimedTeam(draftId: number, userId: string, teamName: string) {
    const p = this.participant(draftId, userId);
    if (!p) return;
    p.claimed_team = teamName;
    p.claimed = true;
  }

  async setPicksAllowed(draftId: number, userId: string, picksAllowed: number | null) {
    const existing = this.s.limits.find((l) => l.draft_id === draftId && l.user_id === userId);
    if (existing) existing.picks_allowed = picksAllowed;
    else this.s.limits.push({ draft_id: draftId, user_id: userId, picks_allowed: picksAllowed });
  }

  async listLimits(draftId: number) {
    return this.s.limits.filter((l) => l.draft_id === draftId).map((l) => ({ ...l }));
  }

  async listPicks(draftId: number) {
    return this.s.picks
      .filter((p) => p.draft_id === draftId)
      .sort((a, b) => a.pick_number - b.pick_number)
      .map((p) => ({ ...p }));
  }

  async maxPickNumber(draftId: number) {
    return this.s.picks
      .filter((p) => p.draft_id === draftId)
      .reduce((max, p) => Math.max(max, p.pick_number), 0);
  }

  async insertPick(pick: PickRow) {
    const taken = this.s.picks.some(
      (p) => p.draft_id === pick.draft_id && p.pick_number === pick.pick_number
    );
    if (taken) return false;
    this.s.picks.push({ ...pick });
    return true;
  }

  async getAssignedTeam(teamName: string) {
    const row = this.s.assigned.find((a) => a.team_name === teamName);
    return row ? { ...row } : null;
  }

  async listAssignedTeams() {
    return this.s.assigned.map((a) => ({ ...a }));
  }

  async insertAssignedTeam(row: AssignedTeamRow) {
    if (this.s.assigned.some((a) => a.team_name === row.team_name)) return false;
    this.s.assigned.push({ ...row });
    return true;
  }

  async releaseAssignedTeams(draftId: number) {
    const before = this.s.assigned.length;
    this.s.assigned = this.s.assigned.filter((a) => a.draft_id !== draftId);
    return before - this.s.assigned.length;
  }
}

/**
 * In-process ledger. Transactions run one at a time against a copy of the
 * state; the copy replaces the live state only when the callback resolves.
 * Nothing survives a restart.
 */
export class MemoryLedger implements Ledger {
  private state: MemoryState = emptyState();
  private tail: Promise<void> = Promise.resolve();

  withTx<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const working = structuredClone(this.state);
      const res = await fn(new MemoryLedgerTx(working));
      this.state = working;
      return res;
    };
    const next = this.tail.then(run);
    // Keep the queue moving whether or not this transaction commits;
    // the caller still receives the rejection through `next`.
    this.tail = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }
}
