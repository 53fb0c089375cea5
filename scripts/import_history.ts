import path from "node:path";
import { pathToFileURL } from "node:url";

import { loadConfig } from "../src/lib/config.js";
import { JsonFileHistoryStore } from "../src/lib/history/json-store.js";
import { importHistoryRecords } from "../src/lib/history/store.js";
import { readJsonFile } from "./lib/files.js";

/** Accepts a bare array of rows or `{ "injuries": [...] }`. */
export function extractHistoryRows(payload: unknown): unknown[] {
  if (Array.isArray(payload)) {
    return payload;
  }
  if (payload && typeof payload === "object" && "injuries" in payload && Array.isArray(payload.injuries)) {
    return payload.injuries;
  }
  throw new Error("Expected an array of injuries or an object with an `injuries` array");
}

async function main() {
  const source = process.argv[2];
  if (!source) {
    throw new Error("Usage: npm run import:history -- <injuries.json>");
  }
  const config = loadConfig();
  const payload = await readJsonFile(source);
  if (payload === null) {
    throw new Error(`History file not found: ${source}`);
  }
  const store = await JsonFileHistoryStore.open(path.join(config.dataDir, "history.json"));
  const summary = await importHistoryRecords(store, extractHistoryRows(payload));
  console.log(`Imported ${summary.imported} injuries from ${source} (${summary.skipped} skipped) into ${store.filePath}.`);
}

const isMain = process.argv[1] && pathToFileURL(process.argv[1]).href === import.meta.url;

if (isMain) {
  main().catch((error) => {
    console.error("Failed to import injury history:", error);
    process.exitCode = 1;
  });
}
