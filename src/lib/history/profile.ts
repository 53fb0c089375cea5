import {
  normalizeBodyPart,
  type InjuryEvent,
  type InjuryStatus,
  type PlayerInjuryProfile,
} from "../injury/types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export const RECENT_WINDOW_DAYS = 180;
export const LONG_RECOVERY_DAYS = 21;

export function emptyInjuryProfile(): PlayerInjuryProfile {
  return {
    totalInjuryCount: 0,
    recurrenceByBodyPart: {},
    recentInjuryCount6mo: 0,
    longRecoveryCount: 0,
    avgRecoveryDaysByStatus: {},
    lastInjuryAt: null,
  };
}

export function isClosed(event: InjuryEvent): boolean {
  return event.recoveredAt !== null;
}

/**
 * Aggregates a player's closed injury events. The open event, if any, is
 * ignored: it is the injury being scored, not part of the history.
 */
export function buildInjuryProfile(events: readonly InjuryEvent[], now: Date): PlayerInjuryProfile {
  const profile = emptyInjuryProfile();
  const recentCutoff = now.getTime() - RECENT_WINDOW_DAYS * DAY_MS;
  const recoveryTotals = new Map<InjuryStatus, { sum: number; count: number }>();
  let lastInjuryMs = Number.NEGATIVE_INFINITY;

  const closed = events
    .filter(isClosed)
    .sort((a, b) => Date.parse(a.firstSeen) - Date.parse(b.firstSeen));

  for (const event of closed) {
    profile.totalInjuryCount += 1;

    const key = normalizeBodyPart(event.bodyPart);
    const entry = profile.recurrenceByBodyPart[key];
    if (entry) {
      entry.count += 1;
    } else {
      profile.recurrenceByBodyPart[key] = { label: event.bodyPart.trim(), count: 1 };
    }

    const startedMs = Date.parse(event.firstSeen);
    if (startedMs >= recentCutoff && startedMs <= now.getTime()) {
      profile.recentInjuryCount6mo += 1;
    }
    if (startedMs > lastInjuryMs) {
      lastInjuryMs = startedMs;
      profile.lastInjuryAt = event.firstSeen;
    }

    if (event.daysOut !== null) {
      if (event.daysOut > LONG_RECOVERY_DAYS) {
        profile.longRecoveryCount += 1;
      }
      const totals = recoveryTotals.get(event.status) ?? { sum: 0, count: 0 };
      totals.sum += event.daysOut;
      totals.count += 1;
      recoveryTotals.set(event.status, totals);
    }
  }

  for (const [status, totals] of recoveryTotals) {
    profile.avgRecoveryDaysByStatus[status] = totals.sum / totals.count;
  }

  return profile;
}

/** Closed count for a body part, or 0 when the player never hurt it before. */
export function priorCountForBodyPart(profile: PlayerInjuryProfile, bodyPart: string): number {
  return profile.recurrenceByBodyPart[normalizeBodyPart(bodyPart)]?.count ?? 0;
}
