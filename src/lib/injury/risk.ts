import { priorCountForBodyPart } from "../history/profile.js";
import {
  normalizeBodyPart,
  type InjuryEvent,
  type InjuryStatus,
  type PlayerInjuryProfile,
  type RiskAssessment,
  type RiskBreakdown,
  type RiskLevel,
} from "./types.js";

/** Integer weights (percent) so the weighted sum stays exact at band edges. */
export const RISK_WEIGHTS: Record<keyof RiskBreakdown, number> = {
  frequency: 30,
  recurrence: 25,
  severity: 20,
  recency: 15,
  recovery: 10,
};

export const STATUS_SEVERITY_SCORE: Record<InjuryStatus, number> = {
  Questionable: 20,
  Doubtful: 40,
  Out: 60,
  PUP: 90,
  IR: 100,
  Suspended: 0,
};

const LEVEL_FLOORS: ReadonlyArray<[number, RiskLevel]> = [
  [75, "Critical"],
  [60, "High"],
  [40, "Moderate"],
  [20, "Low"],
];

const RECENCY_SATURATION = 3;
const RECURRENCE_MATCH_BONUS = 20;

export function riskLevelFor(score: number): RiskLevel {
  for (const [floor, level] of LEVEL_FLOORS) {
    if (score >= floor) {
      return level;
    }
  }
  return "Minimal";
}

function clamp(value: number, min = 0, max = 100): number {
  return Math.min(max, Math.max(min, value));
}

export function frequencyComponent(injuryCount: number): number {
  if (injuryCount <= 0) return 0;
  if (injuryCount === 1) return 15;
  if (injuryCount === 2) return 35;
  if (injuryCount === 3) return 60;
  return clamp(85 + 5 * (injuryCount - 4));
}

export function recurrenceBase(sameBodyPartCount: number): number {
  if (sameBodyPartCount <= 1) return 0;
  if (sameBodyPartCount === 2) return 30;
  if (sameBodyPartCount === 3) return 60;
  return 90;
}

function worstBodyPart(profile: PlayerInjuryProfile): { label: string; count: number } | null {
  let worst: { label: string; count: number } | null = null;
  for (const entry of Object.values(profile.recurrenceByBodyPart)) {
    if (!worst || entry.count > worst.count) {
      worst = entry;
    }
  }
  return worst;
}

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

/** Body parts hurt at least twice, counting the current injury. */
export function chronicBodyParts(current: InjuryEvent, profile: PlayerInjuryProfile): string[] {
  const currentKey = normalizeBodyPart(current.bodyPart);
  const labels = new Set<string>();
  for (const [key, entry] of Object.entries(profile.recurrenceByBodyPart)) {
    const count = entry.count + (key === currentKey ? 1 : 0);
    if (count >= 2) {
      labels.add(entry.label);
    }
  }
  return [...labels].sort((a, b) => a.localeCompare(b));
}

export function scoreInjuryRisk(current: InjuryEvent, profile: PlayerInjuryProfile): RiskAssessment {
  const reasons: string[] = [];
  const priorInjuries = profile.totalInjuryCount;

  const frequency = frequencyComponent(priorInjuries);
  if (frequency > 0) {
    reasons.push(plural(priorInjuries, "prior injury", "prior injuries"));
  }

  const worst = worstBodyPart(profile);
  const sameBodyPart = priorCountForBodyPart(profile, current.bodyPart);
  const recurrence = clamp(
    recurrenceBase(worst?.count ?? 0) + (sameBodyPart > 0 ? RECURRENCE_MATCH_BONUS : 0),
  );
  if (recurrence > 0) {
    if (sameBodyPart > 0) {
      reasons.push(`Recurring ${current.bodyPart.trim()} injury (${sameBodyPart + 1}x)`);
    } else if (worst) {
      reasons.push(`Chronic ${worst.label} history (${worst.count}x)`);
    }
  }

  const severity = STATUS_SEVERITY_SCORE[current.status];
  if (severity > 0) {
    reasons.push(`Current status ${current.status} (severity ${severity})`);
  }

  const recentCount = profile.recentInjuryCount6mo;
  const recency = (Math.min(recentCount, RECENCY_SATURATION) / RECENCY_SATURATION) * 100;
  if (recency > 0) {
    reasons.push(`${plural(recentCount, "injury", "injuries")} in last 6 months`);
  }

  const recovery = priorInjuries > 0 ? (profile.longRecoveryCount / priorInjuries) * 100 : 0;
  if (recovery > 0) {
    reasons.push(
      `${profile.longRecoveryCount} of ${priorInjuries} past injuries took more than 21 days to heal`,
    );
  }

  const breakdown: RiskBreakdown = { frequency, recurrence, severity, recency, recovery };
  const weighted =
    (frequency * RISK_WEIGHTS.frequency +
      recurrence * RISK_WEIGHTS.recurrence +
      severity * RISK_WEIGHTS.severity +
      recency * RISK_WEIGHTS.recency +
      recovery * RISK_WEIGHTS.recovery) /
    100;
  const score = clamp(weighted);

  return {
    score,
    level: riskLevelFor(score),
    reasons,
    chronicBodyParts: chronicBodyParts(current, profile),
    breakdown,
  };
}
