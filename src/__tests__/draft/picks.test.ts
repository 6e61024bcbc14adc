import { expectInvariants, setup, toDrafting } from "../helpers";

describe("make_pick", () => {
  test("three users with one pick each pick in order, then the draft completes", async () => {
    const { engine, ledger } = setup();
    const { draftId, last } = await toDrafting(engine, 1);
    expect(last.currentTurn).toBe("u0");

    const p1 = await engine.makePick(draftId, "u0", "Bravo Bears");
    expect(p1.outcome).toMatchObject({
      type: "pickMade",
      pick: { pick_number: 1, user_id: "u0", team_name: "Bravo Bears" },
      nextUserId: "u1",
    });
    expect(p1.currentTurn).toBe("u1");

    const p2 = await engine.makePick(draftId, "u1", "Echo Eagles");
    expect(p2.currentTurn).toBe("u2");

    const p3 = await engine.makePick(draftId, "u2", "Hotel Hawks");
    expect(p3.outcome).toMatchObject({ pick: { pick_number: 3 }, nextUserId: null });
    expect(p3.transition).toEqual({ from: "drafting", to: "done" });
    expect(p3.draft).toMatchObject({ stage: "done", status: "completed" });
    expect(p3.currentTurn).toBeNull();

    for (const user of ["u0", "u1", "u2"]) {
      await expect(engine.makePick(draftId, user, "Cedar Cats")).rejects.toMatchObject({
        kind: "DraftCompleted",
      });
    }
    await expectInvariants(ledger, draftId);
  });

  test("rejects picks out of turn", async () => {
    const { engine } = setup();
    const { draftId } = await toDrafting(engine, 2);

    await expect(engine.makePick(draftId, "u1", "Bravo Bears")).rejects.toMatchObject({
      kind: "NotYourTurn",
      message: "It is not your turn. It is <@u0>'s turn.",
    });
    await expect(engine.makePick(draftId, "stranger", "Bravo Bears")).rejects.toMatchObject({
      kind: "NotAParticipant",
    });
  });

  test("rejects teams already held, naming the holder", async () => {
    const { engine } = setup();
    const { draftId } = await toDrafting(engine, 2);

    await expect(engine.makePick(draftId, "u0", "delta dogs")).rejects.toMatchObject({
      kind: "TeamUnavailable",
      message: "'Delta Dogs' was already claimed by <@u1> (initial claim) in draft #1.",
    });

    await engine.makePick(draftId, "u0", "Bravo Bears");
    await expect(engine.makePick(draftId, "u1", "Bravo Bears")).rejects.toMatchObject({
      kind: "TeamUnavailable",
      message: "'Bravo Bears' was already picked by <@u0> (global pick #1) in draft #1.",
    });
    await expect(engine.makePick(draftId, "u1", "Made Up Team")).rejects.toMatchObject({
      kind: "TeamUnavailable",
    });
  });

  test("a failed pick leaves no partial writes", async () => {
    const { engine, ledger } = setup();
    const { draftId } = await toDrafting(engine, 2);
    const read = () =>
      ledger.withTx(async (tx) => ({
        draft: await tx.getDraft(draftId),
        picks: await tx.listPicks(draftId),
        assigned: await tx.listAssignedTeams(),
      }));
    const before = await read();

    await expect(engine.makePick(draftId, "u0", "Golf Geese")).rejects.toMatchObject({
      kind: "TeamUnavailable",
    });
    expect(await read()).toEqual(before);
  });

  test("round robin keeps going until the pool runs dry", async () => {
    const { engine, ledger } = setup();
    const { draftId } = await toDrafting(engine, 2);

    await engine.makePick(draftId, "u0", "Bravo Bears");
    await engine.makePick(draftId, "u1", "Echo Eagles");
    const third = await engine.makePick(draftId, "u2", "Hotel Hawks");
    expect(third.currentTurn).toBe("u0");
    await engine.makePick(draftId, "u0", "Cedar Cats");
    const last = await engine.makePick(draftId, "u1", "Foxtrot Foxes");

    expect(last.transition).toEqual({ from: "drafting", to: "done" });
    expect(last.draft.status).toBe("completed");
    expect(await engine.findOpenDraft("g1")).toBeNull();
    await expectInvariants(ledger, draftId);
  });

  test("snake order reverses direction every round", async () => {
    const { engine } = setup({ pickOrder: "snake" });
    const { draftId } = await toDrafting(engine, 2);

    await engine.makePick(draftId, "u0", "Bravo Bears");
    await engine.makePick(draftId, "u1", "Echo Eagles");
    const third = await engine.makePick(draftId, "u2", "Hotel Hawks");
    expect(third.currentTurn).toBe("u2");

    await expect(engine.makePick(draftId, "u0", "Cedar Cats")).rejects.toMatchObject({
      kind: "NotYourTurn",
    });
    const fourth = await engine.makePick(draftId, "u2", "Cedar Cats");
    expect(fourth.currentTurn).toBe("u1");
    expect(fourth.draft.current_pick_index).toBe(4);
  });

  test("participants at their cap are skipped", async () => {
    const { engine, ledger } = setup();
    const { draftId } = await toDrafting(engine, 2);
    await ledger.withTx((tx) => tx.setPicksAllowed(draftId, "u1", 1));

    await engine.makePick(draftId, "u0", "Bravo Bears");
    await engine.makePick(draftId, "u1", "Echo Eagles");
    await engine.makePick(draftId, "u2", "Hotel Hawks");
    const fourth = await engine.makePick(draftId, "u0", "Cedar Cats");

    expect(fourth.currentTurn).toBe("u2");
    expect(fourth.draft.current_pick_index).toBe(5);

    const last = await engine.makePick(draftId, "u2", "Foxtrot Foxes");
    expect(last.draft.status).toBe("completed");
    await expectInvariants(ledger, draftId);
  });

  test("a participant whose cap drops to zero while on the clock is skipped", async () => {
    const { engine, ledger } = setup();
    const { draftId } = await toDrafting(engine, 2);
    await ledger.withTx((tx) => tx.setPicksAllowed(draftId, "u0", 0));

    await expect(engine.makePick(draftId, "u0", "Bravo Bears")).rejects.toMatchObject({
      kind: "NotYourTurn",
      message: "It is not your turn. It is <@u1>'s turn.",
    });
    const res = await engine.makePick(draftId, "u1", "Bravo Bears");
    expect(res.outcome).toMatchObject({ pick: { pick_number: 1 }, nextUserId: "u2" });
  });

  test("conference scope limits picks to the participant's conference", async () => {
    const { engine, ledger } = setup({ pickScope: "conference" });
    const { draft } = await engine.createDraft({
      guildId: "g1",
      userIds: ["u0", "u1"],
      picksAllowed: null,
    });
    await engine.chooseConference(draft.id, "u0", "North");
    await engine.chooseConference(draft.id, "u1", "South");
    await engine.claimTeam(draft.id, "u0", "Alpha Owls");
    await engine.claimTeam(draft.id, "u1", "Delta Dogs");

    await expect(engine.makePick(draft.id, "u0", "Echo Eagles")).rejects.toMatchObject({
      kind: "TeamUnavailable",
      message: "'Echo Eagles' is not in your conference (North).",
    });

    await engine.makePick(draft.id, "u0", "Bravo Bears");
    await engine.makePick(draft.id, "u1", "Echo Eagles");
    const third = await engine.makePick(draft.id, "u0", "Cedar Cats");
    expect(third.currentTurn).toBe("u1");
    const fourth = await engine.makePick(draft.id, "u1", "Foxtrot Foxes");

    expect(fourth.outcome).toMatchObject({ pick: { pick_number: 4 }, nextUserId: null });
    expect(fourth.draft.status).toBe("completed");
    await expectInvariants(ledger, draft.id);
  });

  describe("teams taken by another guild's draft", () => {
    async function claimInOtherGuild(
      engine: ReturnType<typeof setup>["engine"],
      claims: [string, string][]
    ) {
      const { draft } = await engine.createDraft({
        guildId: "g2",
        userIds: claims.map((_, i) => `v${i}`),
        picksAllowed: null,
      });
      for (const [i, [conference]] of claims.entries()) {
        await engine.chooseConference(draft.id, `v${i}`, conference);
      }
      for (const [i, [, team]] of claims.entries()) {
        await engine.claimTeam(draft.id, `v${i}`, team);
      }
    }

    test("the participant on the clock is skipped once nothing is left for them", async () => {
      const { engine, ledger } = setup({ pickScope: "conference" });
      const { draft } = await engine.createDraft({ guildId: "g1", userIds: ["u0", "u1"], picksAllowed: null });
      await engine.chooseConference(draft.id, "u0", "North");
      await engine.chooseConference(draft.id, "u1", "South");
      await engine.claimTeam(draft.id, "u0", "Alpha Owls");
      const started = await engine.claimTeam(draft.id, "u1", "Delta Dogs");
      expect(started.currentTurn).toBe("u0");

      await claimInOtherGuild(engine, [
        ["North", "Bravo Bears"],
        ["North", "Cedar Cats"],
      ]);

      await expect(engine.makePick(draft.id, "u0", "Echo Eagles")).rejects.toMatchObject({
        kind: "NotYourTurn",
        message: "It is not your turn. It is <@u1>'s turn.",
      });
      const first = await engine.makePick(draft.id, "u1", "Echo Eagles");
      expect(first.outcome).toMatchObject({ pick: { pick_number: 1 }, nextUserId: "u1" });
      expect(first.draft.current_pick_index).toBe(3);

      const last = await engine.makePick(draft.id, "u1", "Foxtrot Foxes");
      expect(last.draft).toMatchObject({ stage: "done", status: "completed" });
      await expectInvariants(ledger, draft.id);
    });

    test("the draft completes when nobody has an eligible team left", async () => {
      const { engine } = setup({ pickScope: "conference" });
      const { draft } = await engine.createDraft({ guildId: "g1", userIds: ["u0", "u1"], picksAllowed: null });
      await engine.chooseConference(draft.id, "u0", "North");
      await engine.chooseConference(draft.id, "u1", "North");
      await engine.claimTeam(draft.id, "u0", "Alpha Owls");
      await engine.claimTeam(draft.id, "u1", "Bravo Bears");

      await claimInOtherGuild(engine, [
        ["North", "Cedar Cats"],
        ["South", "Delta Dogs"],
      ]);

      await expect(engine.makePick(draft.id, "u0", "Cedar Cats")).rejects.toMatchObject({
        kind: "DraftCompleted",
      });
      expect(await engine.findOpenDraft("g1")).toBeNull();
      expect(await engine.findLatestDraft("g1")).toMatchObject({
        id: draft.id,
        stage: "done",
        status: "completed",
      });
    });
  });
});
