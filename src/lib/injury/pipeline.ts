import type { HistoryStore, TransactionalHistoryStore } from "../history/store.js";
import { DEFAULT_ALERT_WINDOW_HOURS, detectChanges } from "./change-detector.js";
import { suggestBackup, type BackupSuggestion, type DepthChart } from "./depth-chart.js";
import { estimateReturn } from "./estimator.js";
import { DEFAULT_SEASON_WEEKS, type ReturnPredictor } from "./model.js";
import { scoreInjuryRisk } from "./risk.js";
import type {
  AlertClassification,
  InjuryEvent,
  InjurySnapshot,
  PlayerInjuryProfile,
  ReturnEstimate,
  RiskAssessment,
  TextSignal,
} from "./types.js";

export interface MonitorCycleInput {
  previous: InjurySnapshot;
  records: readonly unknown[];
  now: Date;
  currentWeek: number;
  store: TransactionalHistoryStore;
  alertWindowHours?: number;
  seasonWeeks?: number;
  predictor?: ReturnPredictor | null;
  /** Explicit timeline signals by player id; they win over feed notes. */
  signals?: ReadonlyMap<string, TextSignal>;
  depthChart?: DepthChart;
  /** Rostered player id to owner label, for backup availability. */
  ownership?: ReadonlyMap<string, string>;
  /** When set, only these players are reported; history still covers everyone. */
  roster?: ReadonlySet<string>;
  warn?: (message: string) => void;
}

export interface PlayerReport {
  classification: AlertClassification;
  profile: PlayerInjuryProfile;
  risk: RiskAssessment;
  estimate: ReturnEstimate;
  backup: BackupSuggestion | null;
}

export interface MonitorCycleResult {
  generatedAt: string;
  currentWeek: number;
  alertWindowHours: number;
  players: PlayerReport[];
  alerts: PlayerReport[];
  recovered: InjuryEvent[];
  skipped: number;
  /** Size of the roster the report is limited to, or null for the whole league. */
  rosterSize: number | null;
  snapshot: InjurySnapshot;
}

function signalFor(event: InjuryEvent, signals: ReadonlyMap<string, TextSignal> | undefined): TextSignal | null {
  const explicit = signals?.get(event.playerId);
  if (explicit) {
    return explicit;
  }
  return event.notes ? { text: event.notes, source: "feed" } : null;
}

/**
 * Adds the open history event of every player the snapshot has lost, so an
 * injury that is still running keeps its first sighting.
 */
async function withOpenHistory(previous: InjurySnapshot, store: HistoryStore): Promise<InjurySnapshot> {
  const merged: InjurySnapshot = { ...previous };
  for (const playerId of await store.listPlayers()) {
    if (Object.hasOwn(merged, playerId)) {
      continue;
    }
    const open = (await store.listEvents(playerId)).find((event) => event.recoveredAt === null);
    if (open) {
      merged[playerId] = open;
    }
  }
  return merged;
}

function comparePlayers(a: PlayerReport, b: PlayerReport): number {
  if (a.classification.alertable !== b.classification.alertable) {
    return a.classification.alertable ? -1 : 1;
  }
  if (a.risk.score !== b.risk.score) {
    return b.risk.score - a.risk.score;
  }
  return a.classification.current.name.localeCompare(b.classification.current.name);
}

/**
 * One monitoring cycle: diff the feed, write history in a single transaction,
 * then score and estimate every currently injured player on the roster (every
 * injured player when no roster is given).
 */
export async function runMonitorCycle(input: MonitorCycleInput): Promise<MonitorCycleResult> {
  const alertWindowHours = input.alertWindowHours ?? DEFAULT_ALERT_WINDOW_HOURS;
  const seasonWeeks = input.seasonWeeks ?? DEFAULT_SEASON_WEEKS;
  const warn = input.warn ?? console.warn;

  const previous = await withOpenHistory(input.previous, input.store);
  const detection = detectChanges(previous, input.records, {
    now: input.now,
    alertWindowHours,
    warn,
  });

  await input.store.transaction(async (store) => {
    for (const { current } of detection.classifications) {
      await store.recordObservation(current.playerId, current);
    }
    for (const event of detection.recovered) {
      await store.closeEvent(event.playerId, input.now.toISOString());
    }
  });

  const { roster, depthChart } = input;
  const reported = (playerId: string) => !roster || roster.has(playerId);

  const players: PlayerReport[] = [];
  for (const classification of detection.classifications) {
    const { current } = classification;
    if (!reported(current.playerId)) {
      continue;
    }
    const profile = await input.store.getProfile(current.playerId, input.now);
    players.push({
      classification,
      profile,
      risk: scoreInjuryRisk(current, profile),
      estimate: estimateReturn(current, profile, signalFor(current, input.signals), input.currentWeek, {
        predictor: input.predictor ?? null,
        seasonWeeks,
        warn,
      }),
      backup: depthChart
        ? suggestBackup(depthChart, current, { injured: detection.snapshot, ownership: input.ownership })
        : null,
    });
  }
  players.sort(comparePlayers);

  return {
    generatedAt: input.now.toISOString(),
    currentWeek: input.currentWeek,
    alertWindowHours,
    players,
    alerts: players.filter((player) => player.classification.alertable),
    recovered: detection.recovered.filter((event) => reported(event.playerId)),
    skipped: detection.skipped,
    rosterSize: roster ? roster.size : null,
    snapshot: detection.snapshot,
  };
}
