import path from "path";
import { TeamCatalog, normalizeName } from "../../draft/catalog";
import { catalogFixture } from "../helpers";

describe("TeamCatalog", () => {
  const catalog = new TeamCatalog(catalogFixture);

  test("normalizes names for lookup", () => {
    expect(normalizeName("  Alpha \t  OWLS ")).toBe("alpha owls");
  });

  test("resolves conferences and teams to their canonical names", () => {
    expect(catalog.resolveConference("south")).toBe("South");
    expect(catalog.resolveConference("East")).toBeNull();
    expect(catalog.resolveTeam("hotel   hawks")).toEqual({ name: "Hotel Hawks", conference: "West" });
    expect(catalog.resolveTeam("Hotel")).toBeNull();
  });

  test("lists conferences and teams in file order", () => {
    expect(catalog.conferences()).toEqual(["North", "South", "West"]);
    expect(catalog.teamsIn("West")).toEqual(["Golf Geese", "Hotel Hawks"]);
    expect(catalog.teamsIn("Nowhere")).toEqual([]);
    expect(catalog.allTeams()).toHaveLength(8);
    expect(catalog.allTeams()[3]).toEqual({ name: "Delta Dogs", conference: "South" });
  });

  test("rejects a team listed in two conferences", () => {
    expect(() => new TeamCatalog({ A: ["Same Team"], B: ["same team"] })).toThrow(
      "Team catalog: 'same team' listed in both 'A' and 'B'"
    );
  });

  test("rejects conferences that differ only in case", () => {
    expect(() => new TeamCatalog({ North: ["X"], NORTH: ["Y"] })).toThrow(
      "Team catalog: duplicate conference 'NORTH'"
    );
  });

  test("validates the json shape", () => {
    expect(() => TeamCatalog.fromJson({ North: [] })).toThrow(
      "Team catalog must map conference names to non-empty arrays of team names."
    );
    expect(() => TeamCatalog.fromJson(["North"])).toThrow();
    expect(TeamCatalog.fromJson({ North: ["X"] }).conferences()).toEqual(["North"]);
  });

  test("loads the bundled team file", () => {
    const bundled = TeamCatalog.load(path.resolve(__dirname, "../../../data/teams.json"));
    expect(bundled.conferences().length).toBeGreaterThan(0);
    for (const conf of bundled.conferences()) {
      expect(bundled.teamsIn(conf).length).toBeGreaterThan(0);
    }
  });
});
