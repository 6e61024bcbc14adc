import { ConferenceRosters, UNASSIGNED } from "../../draft/queries";
import {
  renderActionResult,
  renderAvailable,
  renderCancelled,
  renderConferenceRosters,
  renderConferenceSlots,
  renderConferenceView,
  renderStatusEmbed,
} from "../../draft/render";
import { setup, toDrafting } from "../helpers";

const noTeams: string[] = [];
const rosters: ConferenceRosters = new Map([
  [UNASSIGNED, new Map([["u3", noTeams]])],
  ["South", new Map([["u1", ["Delta Dogs"]]])],
  ["North", new Map([["u0", ["Alpha Owls", "Bravo Bears"]]])],
]);

describe("renderActionResult", () => {
  test("announces the pick and the next turn", async () => {
    const { engine } = setup();
    const { draftId } = await toDrafting(engine, 2);
    const res = await engine.makePick(draftId, "u0", "Bravo Bears");

    expect(renderActionResult(res)).toBe(
      "<@u0> picked Bravo Bears (global pick #1).\nNext: <@u1>'s turn. Use /pick <team_name>."
    );
  });

  test("announces stage changes", async () => {
    const { engine } = setup();
    const { draft } = await engine.createDraft({ guildId: "g1", userIds: ["u0", "u1"], picksAllowed: 1 });
    await engine.chooseConference(draft.id, "u0", "North");
    const res = await engine.chooseConference(draft.id, "u1", "South");

    expect(renderActionResult(res)).toBe(
      "<@u1> chose conference 'South'.\n" +
        "All conferences chosen. Use /claim <team_name> to claim a team from your conference."
    );
  });

  test("announces the end of the draft", async () => {
    const { engine } = setup();
    const { draftId } = await toDrafting(engine, 1);
    await engine.makePick(draftId, "u0", "Bravo Bears");
    await engine.makePick(draftId, "u1", "Echo Eagles");
    const res = await engine.makePick(draftId, "u2", "Hotel Hawks");

    expect(renderActionResult(res)).toBe(
      "<@u2> picked Hotel Hawks (global pick #3).\n" +
        "Draft #1 is complete. Use /conference_rosters to see the results."
    );
  });
});

describe("text views", () => {
  test("renderCancelled counts released teams", async () => {
    const { engine } = setup();
    const { draftId } = await toDrafting(engine, 2);
    const res = await engine.cancelDraft(draftId);

    expect(renderCancelled(res)).toBe("Draft #1 ended. 3 teams released.");
    expect(renderCancelled({ ...res, released: 1 })).toBe("Draft #1 ended. 1 team released.");
    expect(renderCancelled({ ...res, released: 0 })).toBe("Draft #1 ended.");
  });

  test("renderAvailable", () => {
    expect(renderAvailable([])).toBe("No teams left.");
    expect(renderAvailable(["Cedar Cats", "Hotel Hawks"])).toBe(
      "Available teams (2):\nCedar Cats\nHotel Hawks"
    );
  });

  test("renderConferenceRosters sorts conferences and puts unassigned last", () => {
    expect(renderConferenceRosters(1, rosters)).toBe(
      [
        "Conference rosters for draft #1:",
        "=== North ===",
        "- <@u0>: Alpha Owls, Bravo Bears",
        "",
        "=== South ===",
        "- <@u1>: Delta Dogs",
        "",
        "=== (unassigned) ===",
        "- <@u3>: (no teams)",
      ].join("\n")
    );
  });

  test("renderConferenceView matches the conference name case-insensitively", () => {
    expect(renderConferenceView(1, rosters, " north ")).toBe(
      "Conference 'North' for draft #1:\n=== North ===\n- <@u0>: Alpha Owls, Bravo Bears"
    );
    expect(renderConferenceView(1, rosters, "East")).toBeNull();
  });

  test("renderConferenceSlots", () => {
    const out = renderConferenceSlots(
      3,
      [
        { conference: "North", userIds: ["u0", "u1"] },
        { conference: "South", userIds: [] },
        { conference: UNASSIGNED, userIds: ["u2"] },
      ],
      2
    );
    expect(out).toBe(
      [
        "Conferences (draft #3): each conference has max 2 slots.",
        "- North: 2/2 slots used",
        "  <@u0>, <@u1>",
        "- South: 0/2 slots used",
        "- (unassigned): 1",
        "  <@u2>",
      ].join("\n")
    );
  });

  test("renderStatusEmbed lists participants and picks", async () => {
    const { engine, queries } = setup();
    const { draftId } = await toDrafting(engine, 2);
    await engine.makePick(draftId, "u0", "Bravo Bears");
    const view = await queries.status(draftId);
    if (!view) throw new Error("missing status");

    const embed = renderStatusEmbed(view).toJSON();
    expect(embed.title).toBe("Draft #1");
    expect(embed.fields?.[0]?.name).toBe("Participants (3)");
    expect(embed.fields?.[1]).toEqual({ name: "Picks", value: "#1 <@u0> — Bravo Bears" });
  });
});
