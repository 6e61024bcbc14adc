import { DraftErrors, InvariantViolation, isDraftError } from "../errors";
import { describeError, logger } from "../logger";
import { TeamCatalog } from "./catalog";
import { chooseConference, claimTeam } from "./claims";
import { Ledger, LedgerTx } from "./ledger";
import { makePick } from "./picks";
import { exhaustion, loadPickContext } from "./pool";
import { nextOpenIndex, participantAt, whoseTurn } from "./turns";
import {
  ActionOutcome,
  ActionResult,
  CreateDraftInput,
  CreatedDraft,
  DEFAULT_SETTINGS,
  DraftAction,
  DraftRow,
  DraftSettings,
  StageTransition,
  stageForAction,
} from "./types";

export type CancelResult = { draft: DraftRow; released: number };

/**
 * Top-level draft state machine. Every method runs as one ledger
 * transaction: the action's writes and any stage change commit together.
 */
export class DraftEngine {
  readonly settings: DraftSettings;

  constructor(
    private readonly ledger: Ledger,
    readonly catalog: TeamCatalog,
    settings: Partial<DraftSettings> = {},
    private readonly now: () => Date = () => new Date()
  ) {
    this.settings = { ...DEFAULT_SETTINGS, ...settings };
  }

  async createDraft(input: CreateDraftInput): Promise<CreatedDraft> {
    const userIds = input.userIds;
    if (userIds.length < 2) throw DraftErrors.invalidSetup("Provide at least two participants.");
    if (new Set(userIds).size !== userIds.length) {
      throw DraftErrors.invalidSetup("Each participant can only be listed once.");
    }
    const picksAllowed = input.picksAllowed ?? null;
    if (picksAllowed != null && (!Number.isInteger(picksAllowed) || picksAllowed < 1)) {
      throw DraftErrors.invalidSetup("The pick limit must be a positive whole number.");
    }

    const created = await this.ledger.withTx(async (tx) => {
      const draft = await tx.insertDraft({
        guildId: input.guildId,
        channelId: input.channelId ?? null,
        createdAt: this.now(),
      });
      if (!draft) {
        const open = await tx.findOpenDraft(input.guildId);
        throw DraftErrors.inProgress(open?.id ?? 0);
      }
      for (const [order, userId] of userIds.entries()) {
        await tx.insertParticipant(draft.id, userId, order);
        await tx.setPicksAllowed(draft.id, userId, picksAllowed);
      }
      return { draft, participants: await tx.listParticipants(draft.id) };
    });

    logger.info("draft created", {
      draftId: created.draft.id,
      guildId: input.guildId,
      participants: userIds.length,
      picksAllowed,
    });
    return created;
  }

  async submitAction(draftId: number, userId: string, action: DraftAction): Promise<ActionResult> {
    if (action.type === "makePick") await this.settleTurn(draftId);
    try {
      const result = await this.ledger.withTx(async (tx) => {
        const draft = await tx.lockDraft(draftId);
        if (!draft) throw DraftErrors.notFound(draftId);
        assertAccepting(draft);

        const expected = stageForAction(action);
        if (draft.stage !== expected) throw DraftErrors.invalidStage(expected, draft.stage);

        let outcome: ActionOutcome;
        let transition: StageTransition | null;
        switch (action.type) {
          case "chooseConference":
            outcome = await chooseConference(
              tx,
              this.catalog,
              this.settings.maxPerConference,
              draft,
              userId,
              action.conference
            );
            transition = await this.afterConference(tx, draft);
            break;
          case "claimTeam":
            outcome = await claimTeam(tx, this.catalog, draft, userId, action.teamName);
            transition = await this.afterClaim(tx, draft);
            break;
          case "makePick": {
            const res = await makePick(
              tx,
              this.catalog,
              this.settings,
              draft,
              userId,
              action.teamName,
              this.now()
            );
            outcome = res.outcome;
            transition = res.draftContinues ? null : await this.complete(tx, draft);
            break;
          }
        }

        const after = await tx.getDraft(draftId);
        if (!after) throw new InvariantViolation(`draft ${draftId} vanished mid-transaction`);
        const currentTurn =
          after.status === "active" ? await whoseTurn(tx, after, this.settings.pickOrder) : null;
        return { draft: after, outcome, transition, currentTurn };
      });

      logger.info("draft action applied", {
        draftId,
        userId,
        action: action.type,
        stage: result.draft.stage,
      });
      if (result.transition) {
        logger.info("draft stage advanced", { draftId, ...result.transition });
      }
      return result;
    } catch (e) {
      if (isDraftError(e)) {
        logger.info("draft action rejected", { draftId, userId, action: action.type, kind: e.kind });
      } else {
        logger.error("draft action failed", {
          draftId,
          userId,
          action: action.type,
          error: describeError(e),
        });
      }
      throw e;
    }
  }

  chooseConference(draftId: number, userId: string, conference: string): Promise<ActionResult> {
    return this.submitAction(draftId, userId, { type: "chooseConference", conference });
  }

  claimTeam(draftId: number, userId: string, teamName: string): Promise<ActionResult> {
    return this.submitAction(draftId, userId, { type: "claimTeam", teamName });
  }

  makePick(draftId: number, userId: string, teamName: string): Promise<ActionResult> {
    return this.submitAction(draftId, userId, { type: "makePick", teamName });
  }

  /**
   * Cancels the draft at any stage. Cancelling twice is a no-op; a completed
   * draft cannot be cancelled.
   */
  async cancelDraft(draftId: number): Promise<CancelResult> {
    const res = await this.ledger.withTx(async (tx) => {
      const draft = await tx.lockDraft(draftId);
      if (!draft) throw DraftErrors.notFound(draftId);
      if (draft.status === "cancelled") return { draft, released: 0 };
      if (draft.status === "completed") throw DraftErrors.completed(draftId);

      await tx.setStatus(draftId, "cancelled");
      const released = this.settings.releaseTeamsOnCancel
        ? await tx.releaseAssignedTeams(draftId)
        : 0;
      return { draft: { ...draft, status: "cancelled" as const }, released };
    });
    logger.info("draft cancelled", { draftId, released: res.released });
    return res;
  }

  /**
   * Teams are shared by every draft, so the participant on the clock can run
   * out of eligible teams while waiting. Moves the cursor past anyone who can
   * no longer pick, and completes the draft when nobody can. Commits on its
   * own, ahead of the action that triggered it.
   */
  async settleTurn(draftId: number): Promise<void> {
    const settled = await this.ledger.withTx(async (tx) => {
      const draft = await tx.lockDraft(draftId);
      if (!draft || draft.status !== "active" || draft.stage !== "drafting") return null;

      const ctx = await loadPickContext(tx, draftId);
      const isExhausted = exhaustion(ctx, this.catalog, this.settings.pickScope);
      const onClock = participantAt(draft, ctx.participants, this.settings.pickOrder);
      if (!isExhausted(onClock)) return null;

      const idx = nextOpenIndex(
        draft.current_pick_index,
        ctx.participants,
        this.settings.pickOrder,
        isExhausted
      );
      if (idx == null) {
        await this.complete(tx, draft);
        return { skipped: onClock.user_id, completed: true };
      }
      await tx.setCurrentPickIndex(draftId, idx);
      return { skipped: onClock.user_id, completed: false };
    });
    if (settled) logger.info("turn skipped, no eligible team left", { draftId, ...settled });
  }

  findOpenDraft(guildId: string): Promise<DraftRow | null> {
    return this.ledger.withTx((tx) => tx.findOpenDraft(guildId));
  }

  findLatestDraft(guildId: string): Promise<DraftRow | null> {
    return this.ledger.withTx((tx) => tx.findLatestDraft(guildId));
  }

  private async afterConference(tx: LedgerTx, draft: DraftRow): Promise<StageTransition | null> {
    const participants = await tx.listParticipants(draft.id);
    if (!participants.every((p) => p.conference_chosen)) return null;
    await tx.setStage(draft.id, "claim");
    return { from: "conference", to: "claim" };
  }

  private async afterClaim(tx: LedgerTx, draft: DraftRow): Promise<StageTransition | null> {
    const participants = await tx.listParticipants(draft.id);
    if (!participants.every((p) => p.claimed)) return null;

    const ctx = await loadPickContext(tx, draft.id);
    const first = nextOpenIndex(
      0,
      ctx.participants,
      this.settings.pickOrder,
      exhaustion(ctx, this.catalog, this.settings.pickScope)
    );
    if (first == null) return await this.complete(tx, draft);

    await tx.setStage(draft.id, "drafting");
    await tx.setStatus(draft.id, "active");
    await tx.setCurrentPickIndex(draft.id, first);
    return { from: "claim", to: "drafting" };
  }

  private async complete(tx: LedgerTx, draft: DraftRow): Promise<StageTransition> {
    await tx.setStage(draft.id, "done");
    await tx.setStatus(draft.id, "completed");
    return { from: draft.stage, to: "done" };
  }
}

function assertAccepting(draft: DraftRow): void {
  if (draft.status === "cancelled") throw DraftErrors.cancelled(draft.id);
  if (draft.status === "completed") throw DraftErrors.completed(draft.id);
}
