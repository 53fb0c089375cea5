import { z } from "zod";

import { closeInjuryEvent } from "../injury/change-detector.js";
import { injuryStatusSchema, type InjuryEvent, type PlayerInjuryProfile } from "../injury/types.js";
import { buildInjuryProfile } from "./profile.js";

export interface HistoryStore {
  getProfile(playerId: string, now: Date): Promise<PlayerInjuryProfile>;
  listEvents(playerId: string): Promise<InjuryEvent[]>;
  listPlayers(): Promise<string[]>;
  recordObservation(playerId: string, event: InjuryEvent): Promise<void>;
  closeEvent(playerId: string, recoveredAt: string): Promise<void>;
}

export interface TransactionalHistoryStore extends HistoryStore {
  /** Runs `work` against a staged copy; nothing is published unless it resolves and persists. */
  transaction<T>(work: (store: HistoryStore) => Promise<T>): Promise<T>;
}

export class HistoryStoreUnavailableError extends Error {
  readonly location: string;

  constructor(location: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Injury history unavailable at ${location}: ${detail}`, { cause });
    this.name = "HistoryStoreUnavailableError";
    this.location = location;
  }
}

export type HistoryLog = Record<string, InjuryEvent[]>;

function cloneLog(log: HistoryLog): HistoryLog {
  const copy: HistoryLog = {};
  for (const [playerId, events] of Object.entries(log)) {
    copy[playerId] = events.map((event) => ({ ...event }));
  }
  return copy;
}

function findOpenIndex(events: readonly InjuryEvent[]): number {
  for (let index = events.length - 1; index >= 0; index -= 1) {
    if (events[index].recoveredAt === null) {
      return index;
    }
  }
  return -1;
}

/** Mutations on a plain log object; shared by the live store and transaction stages. */
class LogWriter implements HistoryStore {
  constructor(private readonly log: HistoryLog) {}

  async getProfile(playerId: string, now: Date): Promise<PlayerInjuryProfile> {
    return buildInjuryProfile(await this.listEvents(playerId), now);
  }

  async listEvents(playerId: string): Promise<InjuryEvent[]> {
    return (this.log[playerId] ?? []).map((event) => ({ ...event }));
  }

  async listPlayers(): Promise<string[]> {
    return Object.keys(this.log).sort();
  }

  async recordObservation(playerId: string, event: InjuryEvent): Promise<void> {
    const events = this.log[playerId] ?? [];
    this.log[playerId] = events;
    const openIndex = findOpenIndex(events);

    if (openIndex >= 0) {
      const open = events[openIndex];
      if (open.firstSeen === event.firstSeen) {
        events[openIndex] = {
          ...open,
          name: event.name,
          team: event.team,
          position: event.position,
          bodyPart: event.bodyPart,
          status: event.status,
          lastUpdated: event.lastUpdated,
          notes: event.notes,
        };
        return;
      }
      // A different firstSeen means the player recovered unseen; close at the last sighting.
      events[openIndex] = closeInjuryEvent(open, open.lastUpdated);
    }

    events.push({ ...event, playerId, recoveredAt: null, daysOut: null });
  }

  async closeEvent(playerId: string, recoveredAt: string): Promise<void> {
    const events = this.log[playerId];
    if (!events) {
      return;
    }
    const openIndex = findOpenIndex(events);
    if (openIndex >= 0) {
      events[openIndex] = closeInjuryEvent(events[openIndex], recoveredAt);
    }
  }
}

export interface MemoryHistoryStoreOptions {
  initial?: HistoryLog;
  /** Called with the staged log before a transaction is published. */
  persist?: (log: HistoryLog) => Promise<void>;
}

export class MemoryHistoryStore implements TransactionalHistoryStore {
  private log: HistoryLog;
  private readonly persist?: (log: HistoryLog) => Promise<void>;

  constructor(options: MemoryHistoryStoreOptions = {}) {
    this.log = cloneLog(options.initial ?? {});
    this.persist = options.persist;
  }

  getProfile(playerId: string, now: Date): Promise<PlayerInjuryProfile> {
    return new LogWriter(this.log).getProfile(playerId, now);
  }

  listEvents(playerId: string): Promise<InjuryEvent[]> {
    return new LogWriter(this.log).listEvents(playerId);
  }

  listPlayers(): Promise<string[]> {
    return new LogWriter(this.log).listPlayers();
  }

  recordObservation(playerId: string, event: InjuryEvent): Promise<void> {
    return this.transaction((store) => store.recordObservation(playerId, event));
  }

  closeEvent(playerId: string, recoveredAt: string): Promise<void> {
    return this.transaction((store) => store.closeEvent(playerId, recoveredAt));
  }

  async transaction<T>(work: (store: HistoryStore) => Promise<T>): Promise<T> {
    const staged = cloneLog(this.log);
    const result = await work(new LogWriter(staged));
    if (this.persist) {
      await this.persist(staged);
    }
    this.log = staged;
    return result;
  }

  snapshot(): HistoryLog {
    return cloneLog(this.log);
  }
}

const dateLike = z
  .string()
  .trim()
  .refine((value) => Number.isFinite(Date.parse(value)), { message: "Expected a date" });

export const historyRecordSchema = z.object({
  player_id: z.union([z.string().trim().min(1), z.number().int().nonnegative()]).transform(String),
  name: z.string().trim().min(1),
  position: z
    .string()
    .trim()
    .min(1)
    .transform((value) => value.toUpperCase()),
  team: z.string().trim().nullable().optional(),
  status: injuryStatusSchema,
  body_part: z.string().trim().min(1),
  start_date: dateLike,
  end_date: dateLike.nullable().optional(),
});

export type HistoryRecord = z.infer<typeof historyRecordSchema>;

export interface ImportSummary {
  imported: number;
  skipped: number;
}

/**
 * Loads past injuries into the store in one transaction. Rows without an end
 * date are imported as open events.
 */
export async function importHistoryRecords(
  store: TransactionalHistoryStore,
  records: readonly unknown[],
  warn: (message: string) => void = console.warn,
): Promise<ImportSummary> {
  const rows: HistoryRecord[] = [];
  let skipped = 0;

  records.forEach((raw, index) => {
    const parsed = historyRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "record").join(", ");
      warn(`Skipping history row #${index}: invalid ${fields}`);
      skipped += 1;
      return;
    }
    const row = parsed.data;
    if (row.end_date && Date.parse(row.end_date) < Date.parse(row.start_date)) {
      warn(`Skipping history row #${index} for ${row.name}: end_date is before start_date`);
      skipped += 1;
      return;
    }
    rows.push(row);
  });

  rows.sort((a, b) => Date.parse(a.start_date) - Date.parse(b.start_date));

  await store.transaction(async (staged) => {
    for (const row of rows) {
      const firstSeen = new Date(Date.parse(row.start_date)).toISOString();
      const event: InjuryEvent = {
        playerId: row.player_id,
        name: row.name,
        team: row.team || null,
        position: row.position,
        bodyPart: row.body_part,
        status: row.status,
        firstSeen,
        lastUpdated: firstSeen,
        recoveredAt: null,
        daysOut: null,
      };
      await staged.recordObservation(row.player_id, event);
      if (row.end_date) {
        const recoveredAt = new Date(Date.parse(row.end_date)).toISOString();
        await staged.closeEvent(row.player_id, recoveredAt);
      }
    }
  });

  return { imported: rows.length, skipped };
}

