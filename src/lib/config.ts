import { z } from "zod";

const blankAsUnset = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const optionalInt = (min: number, max: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().min(min).max(max).optional());

const intOr = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().min(min).max(max).default(fallback));

const text = (fallback: string) =>
  z
    .string()
    .trim()
    .transform((value) => value || fallback)
    .default(fallback);

const optionalText = z.preprocess(blankAsUnset, z.string().trim().optional());

const idList = z
  .string()
  .default("")
  .transform((value) => [...new Set(value.split(/[\s,]+/).filter(Boolean))]);

const envSchema = z
  .object({
    ALERT_WINDOW_HOURS: intOr(24, 0),
    CURRENT_WEEK: optionalInt(1, 22),
    SEASON_WEEKS: intOr(18, 1, 22),
    CHECK_INTERVAL_MINUTES: intOr(30, 1),
    INJURY_DATA_DIR: text("data"),
    RETURN_MODEL_PATH: text("models/return-model.json"),
    NEWS_NOTES_PATH: text("data/manual/news.yaml"),
    REPORT_DIR: text("public/data"),
    SLEEPER_BASE: z
      .string()
      .trim()
      .url()
      .transform((value) => value.replace(/\/+$/, ""))
      .default("https://api.sleeper.app"),
    FEED_CACHE_TTL_MINUTES: intOr(20, 0),
    ROSTER_PLAYER_IDS: idList,
    SLEEPER_LEAGUE_ID: optionalText,
    SLEEPER_USER_ID: optionalText,
  })
  .superRefine((values, ctx) => {
    if (values.SLEEPER_USER_ID && !values.SLEEPER_LEAGUE_ID) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SLEEPER_USER_ID"],
        message: "requires SLEEPER_LEAGUE_ID",
      });
    }
  });

export interface MonitorConfig {
  alertWindowHours: number;
  /** Unset means "derive from the calendar". */
  currentWeek?: number;
  seasonWeeks: number;
  checkIntervalMinutes: number;
  dataDir: string;
  returnModelPath: string;
  newsNotesPath: string;
  reportDir: string;
  sleeperBase: string;
  feedCacheTtlMs: number;
  /** Explicit roster; wins over the league roster of `leagueUserId`. */
  rosterPlayerIds: string[];
  leagueId?: string;
  leagueUserId?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  const values = parsed.data;
  return {
    alertWindowHours: values.ALERT_WINDOW_HOURS,
    currentWeek: values.CURRENT_WEEK,
    seasonWeeks: values.SEASON_WEEKS,
    checkIntervalMinutes: values.CHECK_INTERVAL_MINUTES,
    dataDir: values.INJURY_DATA_DIR,
    returnModelPath: values.RETURN_MODEL_PATH,
    newsNotesPath: values.NEWS_NOTES_PATH,
    reportDir: values.REPORT_DIR,
    sleeperBase: values.SLEEPER_BASE,
    feedCacheTtlMs: values.FEED_CACHE_TTL_MINUTES * 60 * 1000,
    rosterPlayerIds: values.ROSTER_PLAYER_IDS,
    leagueId: values.SLEEPER_LEAGUE_ID,
    leagueUserId: values.SLEEPER_USER_ID,
  };
}
