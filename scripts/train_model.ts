import path from "node:path";
import { pathToFileURL } from "node:url";

import { loadConfig } from "../src/lib/config.js";
import { JsonFileHistoryStore } from "../src/lib/history/json-store.js";
import type { HistoryStore } from "../src/lib/history/store.js";
import { buildTrainingSamples, trainReturnModel, type LinearReturnModel } from "../src/lib/injury/model.js";
import type { InjuryEvent } from "../src/lib/injury/types.js";
import { writeJsonFile } from "./lib/files.js";
import { nflWeekFor } from "./lib/season.js";

function parseLambda(argv: readonly string[]): number | undefined {
  const flag = argv.find((arg) => arg.startsWith("--lambda="));
  if (!flag) {
    return undefined;
  }
  const value = Number.parseFloat(flag.slice("--lambda=".length));
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid --lambda value: ${flag}`);
  }
  return value;
}

export async function trainFromHistory(
  store: HistoryStore,
  options: { seasonWeeks: number; lambda?: number; now?: Date },
): Promise<LinearReturnModel> {
  const eventsByPlayer: InjuryEvent[][] = [];
  for (const playerId of await store.listPlayers()) {
    eventsByPlayer.push(await store.listEvents(playerId));
  }
  const samples = buildTrainingSamples(
    eventsByPlayer,
    (iso) => nflWeekFor(new Date(iso), options.seasonWeeks),
    options.seasonWeeks,
  );
  return trainReturnModel(samples, { lambda: options.lambda, now: options.now });
}

async function main() {
  const config = loadConfig();
  const store = await JsonFileHistoryStore.open(path.join(config.dataDir, "history.json"));
  const model = await trainFromHistory(store, {
    seasonWeeks: config.seasonWeeks,
    lambda: parseLambda(process.argv.slice(2)),
  });
  await writeJsonFile(config.returnModelPath, model.toJSON());
  console.log(
    `Trained return model on ${model.sampleCount} injuries (MAE ${model.mae.toFixed(1)} days). Wrote ${config.returnModelPath}.`,
  );
}

const isMain = process.argv[1] && pathToFileURL(process.argv[1]).href === import.meta.url;

if (isMain) {
  main().catch((error) => {
    console.error("Failed to train return model:", error);
    process.exitCode = 1;
  });
}
