export type DraftStatus = "pending" | "active" | "completed" | "cancelled";
export type DraftStage = "conference" | "claim" | "drafting" | "done";

export type PickOrderPolicy = "round_robin" | "snake";
export type PickScope = "open" | "conference";

export type DraftRow = {
  id: number;
  guild_id: string;
  channel_id: string | null;
  status: DraftStatus;
  stage: DraftStage;
  created_at: Date;
  current_pick_index: number;
};

export type ParticipantRow = {
  draft_id: number;
  user_id: string; // discord user id
  pick_order: number;
  conference: string | null;
  conference_chosen: boolean;
  claimed_team: string | null;
  claimed: boolean;
};

export type LimitRow = {
  draft_id: number;
  user_id: string;
  picks_allowed: number | null; // null = unlimited
};

export type PickRow = {
  draft_id: number;
  pick_number: number;
  user_id: string;
  team_name: string;
  picked_at: Date;
};

export type AssignmentSource = "claim" | "pick";

export type AssignedTeamRow = {
  team_name: string;
  draft_id: number;
  user_id: string;
  source: AssignmentSource;
};

/** Who holds a team and, when it was taken by a pick, which pick. */
export type TeamHolder = { userId: string; draftId: number; pickNumber: number | null };

export type DraftSettings = {
  pickOrder: PickOrderPolicy;
  pickScope: PickScope;
  maxPerConference: number;
  releaseTeamsOnCancel: boolean;
};

export const DEFAULT_SETTINGS: DraftSettings = {
  pickOrder: "round_robin",
  pickScope: "open",
  maxPerConference: 2,
  releaseTeamsOnCancel: true,
};

/**
 * Inbound user action. Each variant is accepted in exactly one stage, see
 * {@link stageForAction}.
 */
export type DraftAction =
  | { type: "chooseConference"; conference: string }
  | { type: "claimTeam"; teamName: string }
  | { type: "makePick"; teamName: string };

export function stageForAction(action: DraftAction): DraftStage {
  switch (action.type) {
    case "chooseConference":
      return "conference";
    case "claimTeam":
      return "claim";
    case "makePick":
      return "drafting";
  }
}

export type ActionOutcome =
  | { type: "conferenceChosen"; userId: string; conference: string }
  | { type: "teamClaimed"; userId: string; teamName: string; conference: string }
  | { type: "pickMade"; pick: PickRow; nextUserId: string | null };

export type StageTransition = { from: DraftStage; to: DraftStage };

export type ActionResult = {
  draft: DraftRow; // state after commit
  outcome: ActionOutcome;
  transition: StageTransition | null;
  /** Whose turn it is after the action, once drafting has started. */
  currentTurn: string | null;
};

export type CreateDraftInput = {
  guildId: string;
  channelId?: string | null;
  userIds: string[]; // in pick order
  picksAllowed?: number | null;
};

export type CreatedDraft = {
  draft: DraftRow;
  participants: ParticipantRow[];
};
