import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { JsonFileHistoryStore } from "../../src/lib/history/json-store.js";
import { emptyInjuryProfile } from "../../src/lib/history/profile.js";
import {
  HistoryStoreUnavailableError,
  importHistoryRecords,
  MemoryHistoryStore,
} from "../../src/lib/history/store.js";
import { makeEvent } from "../helpers/events.js";

const NOW = new Date("2026-10-18T12:00:00.000Z");

describe("MemoryHistoryStore", () => {
  it("updates the open event in place while firstSeen stays fixed", async () => {
    const store = new MemoryHistoryStore();
    await store.recordObservation("p1", makeEvent({ status: "Questionable" }));
    await store.recordObservation(
      "p1",
      makeEvent({ status: "Out", bodyPart: "Calf", lastUpdated: "2026-10-05T12:00:00.000Z", notes: "Left practice" }),
    );

    const events = await store.listEvents("p1");

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      status: "Out",
      bodyPart: "Calf",
      firstSeen: "2026-10-01T12:00:00.000Z",
      lastUpdated: "2026-10-05T12:00:00.000Z",
      notes: "Left practice",
      recoveredAt: null,
    });
  });

  it("closes the open event with its days out", async () => {
    const store = new MemoryHistoryStore();
    await store.recordObservation("p1", makeEvent());
    await store.closeEvent("p1", "2026-10-11T18:00:00.000Z");

    const [event] = await store.listEvents("p1");

    expect(event.recoveredAt).toBe("2026-10-11T18:00:00.000Z");
    expect(event.daysOut).toBe(10);
  });

  it("ignores closing a player with no open event", async () => {
    const store = new MemoryHistoryStore();

    await store.closeEvent("nobody", "2026-10-11T18:00:00.000Z");

    expect(await store.listEvents("nobody")).toEqual([]);
    expect(await store.listPlayers()).toEqual([]);
  });

  it("closes a stale open event at its last sighting before opening a new one", async () => {
    const store = new MemoryHistoryStore();
    await store.recordObservation("p1", makeEvent({ lastUpdated: "2026-10-04T12:00:00.000Z" }));
    await store.recordObservation(
      "p1",
      makeEvent({ firstSeen: "2026-10-15T12:00:00.000Z", lastUpdated: "2026-10-15T12:00:00.000Z" }),
    );

    const events = await store.listEvents("p1");

    expect(events.map((event) => [event.firstSeen, event.recoveredAt, event.daysOut])).toEqual([
      ["2026-10-01T12:00:00.000Z", "2026-10-04T12:00:00.000Z", 3],
      ["2026-10-15T12:00:00.000Z", null, null],
    ]);
  });

  it("returns the zero profile for an unknown player", async () => {
    const store = new MemoryHistoryStore();

    expect(await store.getProfile("ghost", NOW)).toEqual(emptyInjuryProfile());
  });

  it("publishes nothing when the transaction work fails", async () => {
    const store = new MemoryHistoryStore();
    await store.recordObservation("p1", makeEvent());

    await expect(
      store.transaction(async (staged) => {
        await staged.closeEvent("p1", "2026-10-10T12:00:00.000Z");
        await staged.recordObservation("p2", makeEvent({ playerId: "p2" }));
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(await store.listPlayers()).toEqual(["p1"]);
    expect((await store.listEvents("p1"))[0].recoveredAt).toBeNull();
  });

  it("publishes nothing when persistence fails", async () => {
    const persist = vi.fn().mockRejectedValueOnce(new Error("disk full"));
    const store = new MemoryHistoryStore({ persist });

    await expect(store.recordObservation("p1", makeEvent())).rejects.toThrow("disk full");
    expect(await store.listPlayers()).toEqual([]);

    await store.recordObservation("p1", makeEvent());
    expect(persist).toHaveBeenCalledTimes(2);
    expect(await store.listPlayers()).toEqual(["p1"]);
  });

  it("hands out copies of its events", async () => {
    const store = new MemoryHistoryStore();
    await store.recordObservation("p1", makeEvent());

    const [event] = await store.listEvents("p1");
    event.status = "IR";

    expect((await store.listEvents("p1"))[0].status).toBe("Questionable");
  });
});

describe("JsonFileHistoryStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "injury-history-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("treats a missing file as an empty history", async () => {
    const store = await JsonFileHistoryStore.open(path.join(dir, "history.json"));

    expect(await store.listPlayers()).toEqual([]);
  });

  it("persists committed transactions and reloads them", async () => {
    const filePath = path.join(dir, "nested", "history.json");
    const store = await JsonFileHistoryStore.open(filePath);
    await store.recordObservation("p1", makeEvent());
    await store.closeEvent("p1", "2026-10-08T12:00:00.000Z");

    const raw: unknown = JSON.parse(await fs.readFile(filePath, "utf8"));
    const reopened = await JsonFileHistoryStore.open(filePath);

    expect(raw).toMatchObject({ version: 1, players: { p1: [{ daysOut: 7 }] } });
    expect(await reopened.listEvents("p1")).toEqual(await store.listEvents("p1"));
    expect(await fs.readdir(path.dirname(filePath))).toEqual(["history.json"]);
  });

  it("raises HistoryStoreUnavailableError for a corrupt file", async () => {
    const filePath = path.join(dir, "history.json");
    await fs.writeFile(filePath, "{ not json", "utf8");

    const opening = JsonFileHistoryStore.open(filePath);

    await expect(opening).rejects.toBeInstanceOf(HistoryStoreUnavailableError);
    await expect(opening).rejects.toThrow(`Injury history unavailable at ${filePath}`);
  });

  it("raises HistoryStoreUnavailableError for an unknown version", async () => {
    const filePath = path.join(dir, "history.json");
    await fs.writeFile(filePath, JSON.stringify({ version: 2, updatedAt: "x", players: {} }), "utf8");

    await expect(JsonFileHistoryStore.open(filePath)).rejects.toBeInstanceOf(HistoryStoreUnavailableError);
  });
});

describe("importHistoryRecords", () => {
  it("imports closed and open rows and skips invalid ones", async () => {
    const warn = vi.fn();
    const store = new MemoryHistoryStore();

    const summary = await importHistoryRecords(
      store,
      [
        {
          player_id: 7,
          name: "Test Runner",
          position: "rb",
          status: "Out",
          body_part: "Knee",
          start_date: "2025-10-01",
          end_date: "2025-10-29",
        },
        {
          player_id: "7",
          name: "Test Runner",
          position: "RB",
          status: "questionable",
          body_part: "Ankle",
          start_date: "2026-09-20",
        },
        { player_id: "8", name: "No Status", position: "WR", body_part: "Hip", start_date: "2026-01-01" },
        {
          player_id: "9",
          name: "Backwards",
          position: "TE",
          status: "IR",
          body_part: "Foot",
          start_date: "2026-02-01",
          end_date: "2026-01-01",
        },
      ],
      warn,
    );

    expect(summary).toEqual({ imported: 2, skipped: 2 });
    expect(warn).toHaveBeenNthCalledWith(1, "Skipping history row #2: invalid status");
    expect(warn).toHaveBeenNthCalledWith(2, "Skipping history row #3 for Backwards: end_date is before start_date");

    const events = await store.listEvents("7");
    expect(events.map((event) => [event.bodyPart, event.status, event.daysOut])).toEqual([
      ["Knee", "Out", 28],
      ["Ankle", "Questionable", null],
    ]);
    expect(events[0].position).toBe("RB");
  });
});
