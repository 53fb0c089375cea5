import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { injuryEventSchema } from "../injury/types.js";
import { HistoryStoreUnavailableError, MemoryHistoryStore, type HistoryLog } from "./store.js";

const historyFileSchema = z.object({
  version: z.literal(1),
  updatedAt: z.string(),
  players: z.record(z.string(), z.array(injuryEventSchema)),
});

export type HistoryFile = z.infer<typeof historyFileSchema>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readHistoryFile(filePath: string): Promise<HistoryLog> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return {};
    }
    throw new HistoryStoreUnavailableError(filePath, error);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new HistoryStoreUnavailableError(filePath, error);
  }

  const parsed = historyFileSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new HistoryStoreUnavailableError(filePath, new Error(issues.slice(0, 5).join("; ")));
  }
  return parsed.data.players;
}

async function writeHistoryFile(filePath: string, log: HistoryLog): Promise<void> {
  const payload: HistoryFile = { version: 1, updatedAt: new Date().toISOString(), players: log };
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new HistoryStoreUnavailableError(filePath, error);
  }
}

/** History log kept in one JSON file; every committed transaction rewrites it. */
export class JsonFileHistoryStore extends MemoryHistoryStore {
  readonly filePath: string;

  private constructor(filePath: string, initial: HistoryLog) {
    super({ initial, persist: (log) => writeHistoryFile(filePath, log) });
    this.filePath = filePath;
  }

  static async open(filePath: string): Promise<JsonFileHistoryStore> {
    return new JsonFileHistoryStore(filePath, await readHistoryFile(filePath));
  }
}
