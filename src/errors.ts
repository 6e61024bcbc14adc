import { TeamHolder } from "./draft/types";

/**
 * Kinds of expected draft failures. These are reported back to the user;
 * only `TeamAlreadyClaimed` is worth retrying.
 */
export const DraftErrorKind = {
  DRAFT_NOT_FOUND: "DraftNotFound",
  NOT_A_PARTICIPANT: "NotAParticipant",
  INVALID_STAGE: "InvalidStage",
  ALREADY_CHOSEN: "AlreadyChosen",
  UNKNOWN_CONFERENCE: "UnknownConference",
  CONFERENCE_FULL: "ConferenceFull",
  TEAM_ALREADY_CLAIMED: "TeamAlreadyClaimed",
  TEAM_UNAVAILABLE: "TeamUnavailable",
  NOT_YOUR_TURN: "NotYourTurn",
  LIMIT_REACHED: "LimitReached",
  DRAFT_CANCELLED: "DraftCancelled",
  DRAFT_COMPLETED: "DraftCompleted",
  INVALID_SETUP: "InvalidSetup",
  DRAFT_IN_PROGRESS: "DraftInProgress",
} as const;

export type DraftErrorKindType = (typeof DraftErrorKind)[keyof typeof DraftErrorKind];

/**
 * Base class for expected draft failures.
 */
export class DraftError extends Error {
  constructor(
    public readonly kind: DraftErrorKindType,
    message: string,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when persisted state breaks one of the draft invariants. Aborts the
 * transaction; never shown to users verbatim.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export function isDraftError(e: unknown): e is DraftError {
  return e instanceof DraftError;
}

function describeHolder(h: TeamHolder): string {
  if (h.pickNumber != null) {
    return `picked by <@${h.userId}> (global pick #${h.pickNumber}) in draft #${h.draftId}`;
  }
  return `claimed by <@${h.userId}> (initial claim) in draft #${h.draftId}`;
}

export const DraftErrors = {
  notFound: (draftId?: number) =>
    new DraftError(
      DraftErrorKind.DRAFT_NOT_FOUND,
      draftId == null ? "No active draft." : `Draft #${draftId} not found.`
    ),
  notAParticipant: () =>
    new DraftError(DraftErrorKind.NOT_A_PARTICIPANT, "You are not a participant in this draft."),
  invalidStage: (expected: string, actual: string) =>
    new DraftError(
      DraftErrorKind.INVALID_STAGE,
      `That action belongs to the ${expected} stage; the draft is in the ${actual} stage.`
    ),
  conferenceAlreadyChosen: (conference: string) =>
    new DraftError(
      DraftErrorKind.ALREADY_CHOSEN,
      `You already chose the conference '${conference}'.`
    ),
  teamAlreadyChosen: (team: string) =>
    new DraftError(DraftErrorKind.ALREADY_CHOSEN, `You already claimed '${team}'.`),
  unknownConference: (name: string) =>
    new DraftError(
      DraftErrorKind.UNKNOWN_CONFERENCE,
      `Unknown conference '${name}'. Use /list_conferences to see the options.`
    ),
  conferenceFull: (conference: string, max: number) =>
    new DraftError(
      DraftErrorKind.CONFERENCE_FULL,
      `The conference '${conference}' already has ${max} users. Pick a different conference.`
    ),
  conferenceOutOfTeams: (conference: string) =>
    new DraftError(
      DraftErrorKind.CONFERENCE_FULL,
      `The conference '${conference}' has no teams left to claim. Pick a different conference.`
    ),
  teamAlreadyClaimed: (team: string, holder: TeamHolder | null) =>
    new DraftError(
      DraftErrorKind.TEAM_ALREADY_CLAIMED,
      holder
        ? `'${team}' was just ${describeHolder(holder)}. Pick another team.`
        : `'${team}' was just taken. Pick another team.`,
      true
    ),
  unknownTeam: (name: string) =>
    new DraftError(
      DraftErrorKind.TEAM_UNAVAILABLE,
      `Unknown team '${name}'. Use /list_available to see valid team names.`
    ),
  teamOutsideConference: (team: string, conference: string) =>
    new DraftError(
      DraftErrorKind.TEAM_UNAVAILABLE,
      `'${team}' is not in your conference (${conference}).`
    ),
  teamTaken: (team: string, holder: TeamHolder) =>
    new DraftError(DraftErrorKind.TEAM_UNAVAILABLE, `'${team}' was already ${describeHolder(holder)}.`),
  notYourTurn: (expectedUserId: string) =>
    new DraftError(
      DraftErrorKind.NOT_YOUR_TURN,
      `It is not your turn. It is <@${expectedUserId}>'s turn.`
    ),
  limitReached: (made: number, allowed: number) =>
    new DraftError(
      DraftErrorKind.LIMIT_REACHED,
      `You have already made ${made} team picks and reached your limit (${allowed}).`
    ),
  cancelled: (draftId: number) =>
    new DraftError(DraftErrorKind.DRAFT_CANCELLED, `Draft #${draftId} was cancelled.`),
  completed: (draftId: number) =>
    new DraftError(DraftErrorKind.DRAFT_COMPLETED, `Draft #${draftId} is already complete.`),
  invalidSetup: (message: string) => new DraftError(DraftErrorKind.INVALID_SETUP, message),
  inProgress: (draftId: number) =>
    new DraftError(
      DraftErrorKind.DRAFT_IN_PROGRESS,
      `Draft #${draftId} is still running in this server. End it with /end_draft first.`
    ),
};
