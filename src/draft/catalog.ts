import { readFileSync } from "fs";
import { z } from "zod";

export type CatalogTeam = { name: string; conference: string };

const catalogSchema = z.record(z.string().min(1), z.array(z.string().min(1)).min(1));

export function normalizeName(n: string): string {
  return n.trim().split(/\s+/).join(" ").toLowerCase();
}

/**
 * Fixed set of conferences and the team pool partitioned between them.
 * Lookups ignore case and repeated whitespace and return canonical names.
 */
export class TeamCatalog {
  private readonly byConference = new Map<string, string[]>();
  private readonly conferenceKeys = new Map<string, string>();
  private readonly teamKeys = new Map<string, CatalogTeam>();

  constructor(raw: Record<string, string[]>) {
    for (const [conference, teams] of Object.entries(raw)) {
      const confKey = normalizeName(conference);
      if (!confKey) throw new Error("Team catalog: empty conference name");
      if (this.conferenceKeys.has(confKey)) {
        throw new Error(`Team catalog: duplicate conference '${conference}'`);
      }
      this.conferenceKeys.set(confKey, conference);
      this.byConference.set(conference, [...teams]);

      for (const name of teams) {
        const key = normalizeName(name);
        const prev = this.teamKeys.get(key);
        if (prev) {
          throw new Error(
            `Team catalog: '${name}' listed in both '${prev.conference}' and '${conference}'`
          );
        }
        this.teamKeys.set(key, { name, conference });
      }
    }
  }

  static fromJson(json: unknown): TeamCatalog {
    const res = catalogSchema.safeParse(json);
    if (!res.success) {
      throw new Error(
        "Team catalog must map conference names to non-empty arrays of team names."
      );
    }
    return new TeamCatalog(res.data);
  }

  static load(file: string): TeamCatalog {
    const text = readFileSync(file, "utf-8");
    return TeamCatalog.fromJson(JSON.parse(text));
  }

  conferences(): string[] {
    return [...this.byConference.keys()];
  }

  resolveConference(name: string): string | null {
    return this.conferenceKeys.get(normalizeName(name)) ?? null;
  }

  resolveTeam(name: string): CatalogTeam | null {
    return this.teamKeys.get(normalizeName(name)) ?? null;
  }

  teamsIn(conference: string): string[] {
    return [...(this.byConference.get(conference) ?? [])];
  }

  allTeams(): CatalogTeam[] {
    return [...this.teamKeys.values()];
  }
}
