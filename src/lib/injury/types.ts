import { z } from "zod";

export const INJURY_STATUSES = ["Questionable", "Doubtful", "Out", "IR", "PUP", "Suspended"] as const;

export type InjuryStatus = (typeof INJURY_STATUSES)[number];

const STATUS_LOOKUP = new Map<string, InjuryStatus>(
  INJURY_STATUSES.map((status) => [status.toLowerCase(), status]),
);

export function parseInjuryStatus(value: unknown): InjuryStatus | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  return STATUS_LOOKUP.get(value.trim().toLowerCase());
}

export const injuryStatusSchema = z.string().transform((value, ctx) => {
  const status = parseInjuryStatus(value);
  if (!status) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown injury status "${value}"` });
    return z.NEVER;
  }
  return status;
});

const requiredText = z.string().trim().min(1);

const isoTimestamp = z.string().refine((value) => Number.isFinite(Date.parse(value)), {
  message: "Expected an ISO timestamp",
});

/** One currently-injured player as delivered by the injury feed. */
export const feedRecordSchema = z
  .object({
    player_id: z.union([requiredText, z.number().int().nonnegative()]).transform(String),
    name: requiredText,
    position: requiredText.transform((value) => value.toUpperCase()),
    team: z.string().trim().nullable().optional(),
    status: injuryStatusSchema,
    body_part: requiredText,
    notes: z.string().trim().nullable().optional(),
  })
  .strip();

export type FeedRecord = z.infer<typeof feedRecordSchema>;

export const injuryEventSchema = z
  .object({
    playerId: requiredText,
    name: requiredText,
    team: z.string().nullable(),
    position: requiredText,
    bodyPart: requiredText,
    status: injuryStatusSchema,
    firstSeen: isoTimestamp,
    lastUpdated: isoTimestamp,
    recoveredAt: isoTimestamp.nullable(),
    daysOut: z.number().int().nonnegative().nullable(),
    notes: z.string().optional(),
  })
  .strip();

export type InjuryEvent = z.infer<typeof injuryEventSchema>;

/** Last-known event per player id. */
export type InjurySnapshot = Record<string, InjuryEvent>;

export const injurySnapshotSchema = z.record(z.string(), injuryEventSchema);

export interface BodyPartCount {
  label: string;
  count: number;
}

export interface PlayerInjuryProfile {
  totalInjuryCount: number;
  /** Keyed by normalized body part; counts closed events only. */
  recurrenceByBodyPart: Record<string, BodyPartCount>;
  recentInjuryCount6mo: number;
  longRecoveryCount: number;
  avgRecoveryDaysByStatus: Partial<Record<InjuryStatus, number>>;
  lastInjuryAt: string | null;
}

export const RISK_LEVELS = ["Minimal", "Low", "Moderate", "High", "Critical"] as const;

export type RiskLevel = (typeof RISK_LEVELS)[number];

export interface RiskBreakdown {
  frequency: number;
  recurrence: number;
  severity: number;
  recency: number;
  recovery: number;
}

export interface RiskAssessment {
  score: number;
  level: RiskLevel;
  reasons: string[];
  chronicBodyParts: string[];
  breakdown: RiskBreakdown;
}

export type EstimateSource = "model" | "news_override" | "status_floor";

export interface ReturnWindow {
  predictedDays: number;
  confidenceLow: number;
  confidenceHigh: number;
  weeksOut: number;
  targetWeek: number;
}

export interface ReturnEstimate extends ReturnWindow {
  source: EstimateSource;
  overrideReason?: string;
  /** Estimate before the news override replaced it. */
  modelEstimate?: ReturnWindow;
  signalDays?: number;
  reasons: string[];
}

/** Free-text timeline hint for one player (news blurb, feed note). */
export interface TextSignal {
  text: string;
  source?: string;
  impliedDays?: number;
}

export type AlertKind = "NEW" | "WORSENED" | "IMPROVED" | "UNCHANGED";

export interface AlertClassification {
  kind: AlertKind;
  previous: InjuryEvent | null;
  current: InjuryEvent;
  hoursSinceFirstSeen: number;
  withinAlertWindow: boolean;
  alertable: boolean;
}

export function normalizeBodyPart(value: string): string {
  return value.trim().replace(/\s+/g, " ").toLowerCase();
}
