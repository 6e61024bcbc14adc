import {
  AssignedTeamRow,
  DraftRow,
  DraftStage,
  DraftStatus,
  LimitRow,
  ParticipantRow,
  PickRow,
} from "./types";

/**
 * Operations available inside one ledger transaction. Everything written
 * through a `LedgerTx` commits together or not at all.
 */
export interface LedgerTx {
  /** Reads the draft and holds it against concurrent writers until commit. */
  lockDraft(draftId: number): Promise<DraftRow | null>;
  getDraft(draftId: number): Promise<DraftRow | null>;
  findOpenDraft(guildId: string): Promise<DraftRow | null>;
  findLatestDraft(guildId: string): Promise<DraftRow | null>;
  /** Returns null when the guild already has an open draft. */
  insertDraft(args: {
    guildId: string;
    channelId: string | null;
    createdAt: Date;
  }): Promise<DraftRow | null>;
  setStage(draftId: number, stage: DraftStage): Promise<void>;
  setStatus(draftId: number, status: DraftStatus): Promise<void>;
  setCurrentPickIndex(draftId: number, index: number): Promise<void>;

  insertParticipant(draftId: number, userId: string, pickOrder: number): Promise<void>;
  /** Ordered by pick_order. */
  listParticipants(draftId: number): Promise<ParticipantRow[]>;
  setConference(draftId: number, userId: string, conference: string): Promise<void>;
  setClaimedTeam(draftId: number, userId: string, teamName: string): Promise<void>;

  setPicksAllowed(draftId: number, userId: string, picksAllowed: number | null): Promise<void>;
  listLimits(draftId: number): Promise<LimitRow[]>;

  /** Ordered by pick_number. */
  listPicks(draftId: number): Promise<PickRow[]>;
  maxPickNumber(draftId: number): Promise<number>;
  /** Returns false when the pick number is already used in this draft. */
  insertPick(pick: PickRow): Promise<boolean>;

  getAssignedTeam(teamName: string): Promise<AssignedTeamRow | null>;
  listAssignedTeams(): Promise<AssignedTeamRow[]>;
  /** Returns false when the team is already assigned; nothing is written then. */
  insertAssignedTeam(row: AssignedTeamRow): Promise<boolean>;
  releaseAssignedTeams(draftId: number): Promise<number>;
}

export interface Ledger {
  withTx<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T>;
}
