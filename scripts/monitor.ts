import fs from "node:fs/promises";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { pathToFileURL } from "node:url";

import { renderInjuryReport } from "../content/templates/injuryReport.md.js";
import { loadConfig, type MonitorConfig } from "../src/lib/config.js";
import { JsonFileHistoryStore } from "../src/lib/history/json-store.js";
import { HistoryStoreUnavailableError } from "../src/lib/history/store.js";
import { DepthChart } from "../src/lib/injury/depth-chart.js";
import { loadReturnModel } from "../src/lib/injury/model.js";
import { runMonitorCycle, type MonitorCycleResult } from "../src/lib/injury/pipeline.js";
import { injurySnapshotSchema, type InjurySnapshot } from "../src/lib/injury/types.js";
import { fetchSleeperFeed } from "./fetch/sleeper_injuries.js";
import { buildOwnership, fetchLeagueRosters, rosterForUser } from "./fetch/sleeper_league.js";
import { readJsonFile, writeJsonFile, writeTextFile } from "./lib/files.js";
import { loadNewsNotes } from "./lib/news_notes.js";
import { nflWeekFor } from "./lib/season.js";

export interface MonitorPaths {
  snapshotFile: string;
  historyFile: string;
  cacheDir: string;
  reportJson: string;
  reportMarkdown: string;
  failureFile: string;
}

export function resolveMonitorPaths(config: MonitorConfig): MonitorPaths {
  return {
    snapshotFile: path.join(config.dataDir, "injury_snapshot.json"),
    historyFile: path.join(config.dataDir, "history.json"),
    cacheDir: path.join(config.dataDir, "cache", "sleeper"),
    reportJson: path.join(config.reportDir, "injury_report.json"),
    reportMarkdown: path.join(config.reportDir, "injury_report.md"),
    failureFile: path.join(config.reportDir, "injury_report.failed.json"),
  };
}

export async function loadSnapshot(filePath: string): Promise<InjurySnapshot> {
  const raw = await readJsonFile(filePath, {});
  const parsed = injurySnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid injury snapshot ${filePath}: ${issue?.path.join(".")} ${issue?.message}`);
  }
  return parsed.data;
}

export interface LeagueScope {
  /** Players the report is limited to; unset reports every injured player. */
  roster?: Set<string>;
  ownership?: Map<string, string>;
}

export async function resolveLeagueScope(config: MonitorConfig, cacheDir: string): Promise<LeagueScope> {
  const explicit = config.rosterPlayerIds.length > 0 ? new Set(config.rosterPlayerIds) : undefined;
  if (!config.leagueId) {
    return { roster: explicit };
  }
  const rosters = await fetchLeagueRosters({
    leagueId: config.leagueId,
    baseUrl: config.sleeperBase,
    cacheDir,
    ttlMs: config.feedCacheTtlMs,
  });
  return {
    roster: explicit ?? (config.leagueUserId ? rosterForUser(rosters, config.leagueUserId) : undefined),
    ownership: buildOwnership(rosters),
  };
}

export async function runOnce(config: MonitorConfig, now = new Date()): Promise<MonitorCycleResult> {
  const paths = resolveMonitorPaths(config);
  try {
    const currentWeek = config.currentWeek ?? nflWeekFor(now, config.seasonWeeks);
    const [previous, store, predictor, signals] = await Promise.all([
      loadSnapshot(paths.snapshotFile),
      JsonFileHistoryStore.open(paths.historyFile),
      loadReturnModel(config.returnModelPath),
      loadNewsNotes(config.newsNotesPath, now),
    ]);
    const [feed, scope] = await Promise.all([
      fetchSleeperFeed({
        baseUrl: config.sleeperBase,
        cacheDir: paths.cacheDir,
        ttlMs: config.feedCacheTtlMs,
      }),
      resolveLeagueScope(config, paths.cacheDir),
    ]);

    const result = await runMonitorCycle({
      previous,
      records: feed.records,
      now,
      currentWeek,
      store,
      alertWindowHours: config.alertWindowHours,
      seasonWeeks: config.seasonWeeks,
      predictor,
      signals,
      depthChart: new DepthChart(feed.depthChart),
      ownership: scope.ownership,
      roster: scope.roster,
    });

    await writeJsonFile(paths.snapshotFile, result.snapshot);
    await writeJsonFile(paths.reportJson, result);
    await writeTextFile(paths.reportMarkdown, renderInjuryReport(result));
    await fs.rm(paths.failureFile, { force: true });
    console.log(
      `Week ${currentWeek}: ${result.players.length} injured, ${result.alerts.length} alerts, ` +
        `${result.recovered.length} recovered, ${result.skipped} skipped. Wrote ${paths.reportMarkdown}.`,
    );
    return result;
  } catch (error) {
    await writeJsonFile(paths.failureFile, {
      error: error instanceof Error ? error.message : String(error),
      at: new Date().toISOString(),
    });
    throw error;
  }
}

/** Cycles run back to back; a slow cycle delays the next one instead of overlapping it. */
export async function watch(config: MonitorConfig, signal: AbortSignal): Promise<void> {
  const intervalMs = config.checkIntervalMinutes * 60 * 1000;
  while (!signal.aborted) {
    try {
      await runOnce(config);
    } catch (error) {
      if (error instanceof HistoryStoreUnavailableError) {
        throw error;
      }
      console.error("Injury monitor cycle failed:", error);
    }
    try {
      await sleep(intervalMs, undefined, { signal });
    } catch (error) {
      if (signal.aborted) {
        break;
      }
      throw error;
    }
  }
}

async function main() {
  const config = loadConfig();
  if (!process.argv.includes("--watch")) {
    await runOnce(config);
    return;
  }
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  process.once("SIGTERM", () => controller.abort());
  console.log(`Watching injuries every ${config.checkIntervalMinutes} minutes (Ctrl+C to stop).`);
  await watch(config, controller.signal);
}

const isMain = process.argv[1] && pathToFileURL(process.argv[1]).href === import.meta.url;

if (isMain) {
  main().catch((error) => {
    console.error("Failed to run injury monitor:", error);
    process.exitCode = 1;
  });
}
