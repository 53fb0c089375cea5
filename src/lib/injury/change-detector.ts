import { compareSeverity } from "./severity.js";
import {
  feedRecordSchema,
  type AlertClassification,
  type AlertKind,
  type FeedRecord,
  type InjuryEvent,
  type InjurySnapshot,
} from "./types.js";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export const DEFAULT_ALERT_WINDOW_HOURS = 24;

export interface DetectOptions {
  now: Date;
  alertWindowHours?: number;
  warn?: (message: string) => void;
}

export interface DetectionResult {
  classifications: AlertClassification[];
  /** Previously injured players missing from the fresh feed, closed at `now`. */
  recovered: InjuryEvent[];
  skipped: number;
  snapshot: InjurySnapshot;
}

function rawField(raw: unknown, key: "name" | "player_id"): string | undefined {
  if (!raw || typeof raw !== "object" || !(key in raw)) {
    return undefined;
  }
  const value: unknown = Reflect.get(raw, key);
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function describeRecord(raw: unknown, index: number): string {
  const name = rawField(raw, "name");
  if (name) return `"${name}"`;
  const playerId = rawField(raw, "player_id");
  if (playerId) return `player ${playerId}`;
  return `record #${index}`;
}

export function daysBetween(fromIso: string, toIso: string): number {
  const elapsed = Date.parse(toIso) - Date.parse(fromIso);
  return Math.max(0, Math.floor(elapsed / DAY_MS));
}

export function closeInjuryEvent(event: InjuryEvent, recoveredAt: string): InjuryEvent {
  return {
    ...event,
    recoveredAt,
    daysOut: daysBetween(event.firstSeen, recoveredAt),
  };
}

function eventFromRecord(record: FeedRecord, firstSeen: string, observedAt: string): InjuryEvent {
  const event: InjuryEvent = {
    playerId: record.player_id,
    name: record.name,
    team: record.team || null,
    position: record.position,
    bodyPart: record.body_part,
    status: record.status,
    firstSeen,
    lastUpdated: observedAt,
    recoveredAt: null,
    daysOut: null,
  };
  if (record.notes) {
    event.notes = record.notes;
  }
  return event;
}

function classifyTransition(previous: InjuryEvent, current: InjuryEvent): AlertKind {
  const direction = compareSeverity(current.status, previous.status);
  if (direction > 0) return "WORSENED";
  if (direction < 0) return "IMPROVED";
  return "UNCHANGED";
}

function isAlertable(kind: AlertKind, withinAlertWindow: boolean): boolean {
  switch (kind) {
    case "NEW":
    case "WORSENED":
      return true;
    case "IMPROVED":
      return false;
    case "UNCHANGED":
      return withinAlertWindow;
  }
}

/**
 * Classifies every valid record of a fresh feed against the previous snapshot.
 * Invalid or duplicate records are skipped one by one; the batch never fails.
 */
export function detectChanges(
  previous: InjurySnapshot,
  records: readonly unknown[],
  options: DetectOptions,
): DetectionResult {
  const warn = options.warn ?? console.warn;
  const windowHours = options.alertWindowHours ?? DEFAULT_ALERT_WINDOW_HOURS;
  if (!Number.isFinite(windowHours) || windowHours < 0) {
    throw new Error(`Alert window must be a non-negative number of hours, got ${windowHours}`);
  }

  const nowMs = options.now.getTime();
  const nowIso = options.now.toISOString();
  const classifications: AlertClassification[] = [];
  const snapshot: InjurySnapshot = {};
  const classified = new Set<string>();
  let skipped = 0;

  records.forEach((raw, index) => {
    const parsed = feedRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "record").join(", ");
      warn(`Skipping malformed injury record ${describeRecord(raw, index)}: invalid ${fields}`);
      skipped += 1;
      // A known player with a bad record this cycle is not treated as recovered.
      const playerId = rawField(raw, "player_id");
      if (playerId && Object.hasOwn(previous, playerId) && !snapshot[playerId]) {
        snapshot[playerId] = previous[playerId];
      }
      return;
    }

    const record = parsed.data;
    if (classified.has(record.player_id)) {
      warn(`Skipping duplicate injury record for player ${record.player_id} (${record.name})`);
      skipped += 1;
      return;
    }

    const prior = Object.hasOwn(previous, record.player_id) ? previous[record.player_id] : undefined;
    const current = eventFromRecord(record, prior?.firstSeen ?? nowIso, nowIso);
    const kind: AlertKind = prior ? classifyTransition(prior, current) : "NEW";
    const hoursSinceFirstSeen = Math.max(0, (nowMs - Date.parse(current.firstSeen)) / HOUR_MS);
    const withinAlertWindow = hoursSinceFirstSeen <= windowHours;

    classified.add(record.player_id);
    snapshot[record.player_id] = current;
    classifications.push({
      kind,
      previous: prior ?? null,
      current,
      hoursSinceFirstSeen,
      withinAlertWindow,
      alertable: isAlertable(kind, withinAlertWindow),
    });
  });

  const recovered = Object.entries(previous)
    .filter(([playerId]) => !snapshot[playerId])
    .map(([, event]) => closeInjuryEvent(event, nowIso));

  return { classifications, recovered, skipped, snapshot };
}
