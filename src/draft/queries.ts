import { Ledger } from "./ledger";
import { TeamCatalog } from "./catalog";
import { participantAt } from "./turns";
import { DraftRow, DraftSettings, ParticipantRow, PickRow } from "./types";

export const UNASSIGNED = "(unassigned)";

export type StatusParticipant = ParticipantRow & {
  picksAllowed: number | null;
  picksMade: number;
};

export type DraftStatusView = {
  draft: DraftRow;
  participants: StatusParticipant[];
  picks: PickRow[];
  currentTurn: string | null;
};

/** conference -> user -> teams (claimed team first, then picks in order) */
export type ConferenceRosters = Map<string, Map<string, string[]>>;

export type ConferenceSlots = { conference: string; userIds: string[] }[];

const STATUS_PICK_LIMIT = 50;

export class DraftQueries {
  constructor(
    private readonly ledger: Ledger,
    private readonly catalog: TeamCatalog,
    private readonly settings: DraftSettings
  ) {}

  /**
   * Catalog teams nobody holds, in catalog order. Under conference scope a
   * participant who has chosen a conference sees only its teams.
   */
  availableTeams(draftId: number, userId: string): Promise<string[]> {
    return this.ledger.withTx(async (tx) => {
      const taken = new Set((await tx.listAssignedTeams()).map((a) => a.team_name));
      let teams = this.catalog.allTeams();
      if (this.settings.pickScope === "conference") {
        const me = (await tx.listParticipants(draftId)).find((p) => p.user_id === userId);
        if (me?.conference) teams = teams.filter((t) => t.conference === me.conference);
      }
      return teams.map((t) => t.name).filter((t) => !taken.has(t));
    });
  }

  status(draftId: number): Promise<DraftStatusView | null> {
    return this.ledger.withTx(async (tx) => {
      const draft = await tx.getDraft(draftId);
      if (!draft) return null;
      const participants = await tx.listParticipants(draftId);
      const limits = await tx.listLimits(draftId);
      const picks = await tx.listPicks(draftId);

      const rows = participants.map((p) => ({
        ...p,
        picksAllowed: limits.find((l) => l.user_id === p.user_id)?.picks_allowed ?? null,
        picksMade: picks.filter((k) => k.user_id === p.user_id).length,
      }));
      const currentTurn =
        draft.status === "active" && participants.length > 0
          ? participantAt(draft, participants, this.settings.pickOrder).user_id
          : null;
      return { draft, participants: rows, picks: picks.slice(0, STATUS_PICK_LIMIT), currentTurn };
    });
  }

  conferenceRosters(draftId: number): Promise<ConferenceRosters> {
    return this.ledger.withTx(async (tx) => {
      const participants = await tx.listParticipants(draftId);
      const picks = await tx.listPicks(draftId);
      const mapping: ConferenceRosters = new Map();
      const confOf = new Map<string, string>();

      const slot = (conf: string, userId: string): string[] => {
        let users = mapping.get(conf);
        if (!users) {
          users = new Map();
          mapping.set(conf, users);
        }
        let teams = users.get(userId);
        if (!teams) {
          teams = [];
          users.set(userId, teams);
        }
        return teams;
      };

      for (const p of participants) {
        const conf = p.conference ?? UNASSIGNED;
        confOf.set(p.user_id, conf);
        const teams = slot(conf, p.user_id);
        if (p.claimed_team) teams.push(p.claimed_team);
      }
      for (const k of picks) {
        slot(confOf.get(k.user_id) ?? UNASSIGNED, k.user_id).push(k.team_name);
      }
      return mapping;
    });
  }

  /** Catalog conferences with their participants, then anyone still undecided. */
  conferenceSlots(draftId: number): Promise<ConferenceSlots> {
    return this.ledger.withTx(async (tx) => {
      const participants = await tx.listParticipants(draftId);
      const slots: ConferenceSlots = this.catalog.conferences().map((conference) => ({
        conference,
        userIds: participants.filter((p) => p.conference === conference).map((p) => p.user_id),
      }));
      const undecided = participants.filter((p) => p.conference == null).map((p) => p.user_id);
      if (undecided.length > 0) slots.push({ conference: UNASSIGNED, userIds: undecided });
      return slots;
    });
  }
}
