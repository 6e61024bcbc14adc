import { MemoryLedger } from "../../draft/memory";

const createdAt = new Date(Date.UTC(2024, 0, 1));

describe("MemoryLedger", () => {
  test("discards every write of a failed transaction", async () => {
    const ledger = new MemoryLedger();

    await expect(
      ledger.withTx(async (tx) => {
        const d = await tx.insertDraft({ guildId: "g1", channelId: null, createdAt });
        if (d) await tx.insertParticipant(d.id, "u0", 0);
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    const draft = await ledger.withTx(async (tx) => {
      expect(await tx.findOpenDraft("g1")).toBeNull();
      return tx.insertDraft({ guildId: "g1", channelId: null, createdAt });
    });
    expect(draft?.id).toBe(1);
    expect(await ledger.withTx((tx) => tx.listParticipants(1))).toEqual([]);
  });

  test("runs transactions one at a time in submission order", async () => {
    const ledger = new MemoryLedger();
    const log: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = ledger.withTx(async () => {
      log.push("first:start");
      await gate;
      log.push("first:end");
    });
    const second = ledger.withTx(async () => {
      log.push("second:start");
    });

    await Promise.resolve();
    release();
    await Promise.all([first, second]);
    expect(log).toEqual(["first:start", "first:end", "second:start"]);
  });

  test("keeps going after a failed transaction", async () => {
    const ledger = new MemoryLedger();
    const failed = ledger.withTx(async () => {
      throw new Error("nope");
    });
    const next = ledger.withTx(async () => "ok");

    await expect(failed).rejects.toThrow("nope");
    await expect(next).resolves.toBe("ok");
  });

  test("hands out copies, not live rows", async () => {
    const ledger = new MemoryLedger();
    await ledger.withTx(async (tx) => {
      await tx.insertDraft({ guildId: "g1", channelId: "c1", createdAt });
      await tx.insertParticipant(1, "u0", 0);
    });

    const [p] = await ledger.withTx((tx) => tx.listParticipants(1));
    if (p) p.conference = "North";
    const [again] = await ledger.withTx((tx) => tx.listParticipants(1));
    expect(again?.conference).toBeNull();
  });

  test("enforces the uniqueness rules of the schema", async () => {
    const ledger = new MemoryLedger();
    await ledger.withTx(async (tx) => {
      const d = await tx.insertDraft({ guildId: "g1", channelId: null, createdAt });
      expect(d?.id).toBe(1);
      expect(await tx.insertDraft({ guildId: "g1", channelId: null, createdAt })).toBeNull();

      await tx.insertParticipant(1, "u0", 0);
      await expect(tx.insertParticipant(1, "u0", 1)).rejects.toThrow();
      await expect(tx.insertParticipant(1, "u1", 0)).rejects.toThrow();

      const row = { team_name: "Alpha Owls", draft_id: 1, user_id: "u0", source: "claim" as const };
      expect(await tx.insertAssignedTeam(row)).toBe(true);
      expect(await tx.insertAssignedTeam({ ...row, user_id: "u1" })).toBe(false);

      const pick = { draft_id: 1, pick_number: 1, user_id: "u0", team_name: "Bravo Bears", picked_at: createdAt };
      expect(await tx.insertPick(pick)).toBe(true);
      expect(await tx.insertPick({ ...pick, team_name: "Cedar Cats" })).toBe(false);
      expect(await tx.maxPickNumber(1)).toBe(1);
    });
  });
});
