import { InvariantViolation } from "../errors";
import { LedgerTx } from "./ledger";
import { DraftRow, ParticipantRow, PickOrderPolicy } from "./types";

/**
 * Seat (0-based position in pick_order) that owns the turn at `index`.
 * Snake order runs backwards on every odd round.
 */
export function seatFor(index: number, count: number, policy: PickOrderPolicy): number {
  if (!Number.isInteger(count) || count <= 0) {
    throw new Error("count must be a positive integer");
  }
  if (!Number.isInteger(index) || index < 0) {
    throw new Error("index must be a non-negative integer");
  }
  const round = Math.floor(index / count);
  const pos = index % count;
  if (policy === "snake" && round % 2 === 1) return count - 1 - pos;
  return pos;
}

/**
 * Finds the first turn index at or after `from` whose participant can still
 * pick. The scan covers every seat at least once (two rounds for snake) and
 * returns null when nobody can.
 */
export function nextOpenIndex(
  from: number,
  participants: ParticipantRow[],
  policy: PickOrderPolicy,
  isExhausted: (p: ParticipantRow) => boolean
): number | null {
  const n = participants.length;
  if (n === 0) return null;
  const bound = policy === "snake" ? 2 * n : n;
  for (let step = 0; step < bound; step++) {
    const idx = from + step;
    const p = participants[seatFor(idx, n, policy)];
    if (p && !isExhausted(p)) return idx;
  }
  return null;
}

export function participantAt(
  draft: DraftRow,
  participants: ParticipantRow[],
  policy: PickOrderPolicy
): ParticipantRow {
  if (participants.length === 0) {
    throw new InvariantViolation(`draft ${draft.id} has no participants`);
  }
  const p = participants[seatFor(draft.current_pick_index, participants.length, policy)];
  if (!p) {
    throw new InvariantViolation(
      `draft ${draft.id}: pick index ${draft.current_pick_index} points at no participant`
    );
  }
  return p;
}

export async function whoseTurn(
  tx: LedgerTx,
  draft: DraftRow,
  policy: PickOrderPolicy
): Promise<string> {
  const participants = await tx.listParticipants(draft.id);
  return participantAt(draft, participants, policy).user_id;
}

/**
 * Moves the cursor past the current turn, skipping exhausted participants.
 * Returns the participant now on the clock, or null when every participant
 * is exhausted (the cursor still moves one step).
 */
export async function advance(
  tx: LedgerTx,
  draft: DraftRow,
  participants: ParticipantRow[],
  policy: PickOrderPolicy,
  isExhausted: (p: ParticipantRow) => boolean
): Promise<ParticipantRow | null> {
  const from = draft.current_pick_index + 1;
  const idx = nextOpenIndex(from, participants, policy, isExhausted);
  await tx.setCurrentPickIndex(draft.id, idx ?? from);
  if (idx == null) return null;
  return participantAt({ ...draft, current_pick_index: idx }, participants, policy);
}
