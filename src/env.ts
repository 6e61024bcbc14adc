import * as dotenv from "dotenv";
import { z } from "zod";
import { DraftSettings } from "./draft/types";

dotenv.config();

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false"])
    .optional()
    .transform((v) => (v == null ? fallback : v === "true"));

const positiveInt = z
  .string()
  .regex(/^[1-9]\d*$/, "must be a positive integer")
  .transform((v) => parseInt(v, 10));

// empty values in .env count as unset
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z.object({
  DISCORD_TOKEN: optionalString,
  DISCORD_CLIENT_ID: optionalString,
  DISCORD_GUILD_ID: optionalString,
  ADMIN_USER_ID: optionalString,
  DATABASE_URL: optionalString,

  TEAMS_FILE: z.string().min(1).default("data/teams.json"),
  PICK_ORDER: z.enum(["round_robin", "snake"]).default("round_robin"),
  PICK_SCOPE: z.enum(["open", "conference"]).default("open"),
  // "unlimited" leaves the cap unset
  DEFAULT_PICKS_ALLOWED: z
    .union([z.literal("unlimited"), positiveInt])
    .default("7")
    .transform((v) => (v === "unlimited" ? null : v)),
  MAX_PER_CONFERENCE: positiveInt.default("2"),
  RELEASE_TEAMS_ON_CANCEL: flag(true),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const res = envSchema.safeParse(source);
  if (!res.success) {
    const lines = res.error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid environment configuration:\n${lines.join("\n")}`);
  }
  return res.data;
}

export function draftSettings(env: Env): DraftSettings {
  return {
    pickOrder: env.PICK_ORDER,
    pickScope: env.PICK_SCOPE,
    maxPerConference: env.MAX_PER_CONFERENCE,
    releaseTeamsOnCancel: env.RELEASE_TEAMS_ON_CANCEL,
  };
}

export function required<K extends keyof Env>(env: Env, name: K): NonNullable<Env[K]> {
  const v = env[name];
  if (v == null) throw new Error(`Missing env var: ${name}`);
  return v;
}

export const ENV = parseEnv(process.env);
