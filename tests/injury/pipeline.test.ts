import { describe, expect, it, vi } from "vitest";

import { HistoryStoreUnavailableError, MemoryHistoryStore } from "../../src/lib/history/store.js";
import { DepthChart } from "../../src/lib/injury/depth-chart.js";
import { runMonitorCycle } from "../../src/lib/injury/pipeline.js";
import { closedEvent, makeEvent } from "../helpers/events.js";

const NOW = new Date("2026-10-18T12:00:00.000Z");

function seededStore(): MemoryHistoryStore {
  const lingering = makeEvent({
    playerId: "p2",
    name: "Slot Receiver",
    position: "WR",
    bodyPart: "Groin",
    status: "Out",
    firstSeen: "2026-10-10T12:00:00.000Z",
    lastUpdated: "2026-10-17T12:00:00.000Z",
  });
  return new MemoryHistoryStore({
    initial: {
      p1: [
        closedEvent("2026-05-01T12:00:00.000Z", 10),
        closedEvent("2026-07-01T12:00:00.000Z", 30),
        closedEvent("2026-09-01T12:00:00.000Z", 8),
      ],
      p2: [lingering],
      p3: [makeEvent({ playerId: "p3", name: "Back Healthy", firstSeen: "2026-10-10T12:00:00.000Z" })],
    },
  });
}

const previous = {
  p2: makeEvent({
    playerId: "p2",
    name: "Slot Receiver",
    position: "WR",
    bodyPart: "Groin",
    status: "Out",
    firstSeen: "2026-10-10T12:00:00.000Z",
  }),
  p3: makeEvent({ playerId: "p3", name: "Back Healthy", firstSeen: "2026-10-10T12:00:00.000Z" }),
};

const records = [
  { player_id: "p2", name: "Slot Receiver", position: "WR", status: "Out", body_part: "Groin" },
  { player_id: "p9", name: "Broken Row", position: "QB", status: "Unknown", body_part: "Hand" },
  { player_id: "p1", name: "Test Runner", position: "RB", team: "AAA", status: "IR", body_part: "Hamstring" },
];

describe("runMonitorCycle", () => {
  it("scores and estimates every injured player and writes the history", async () => {
    const store = seededStore();
    const warn = vi.fn();

    const result = await runMonitorCycle({
      previous,
      records,
      now: NOW,
      currentWeek: 7,
      store,
      signals: new Map([["p2", { text: "Expected to miss 2-3 weeks" }]]),
      warn,
    });

    expect(result.generatedAt).toBe("2026-10-18T12:00:00.000Z");
    expect(result.alertWindowHours).toBe(24);
    expect(result.rosterSize).toBeNull();
    expect(result.skipped).toBe(1);
    expect(result.players.map((player) => player.classification.current.playerId)).toEqual(["p1", "p2"]);
    expect(result.alerts.map((player) => player.classification.current.playerId)).toEqual(["p1"]);

    const [runner, receiver] = result.players;
    expect(runner.backup).toBeNull();
    expect(runner.classification.kind).toBe("NEW");
    expect(runner.risk.score).toBeCloseTo(76.333, 3);
    expect(runner.risk.level).toBe("Critical");
    expect(runner.estimate).toMatchObject({ predictedDays: 28, targetWeek: 11, source: "status_floor" });

    expect(receiver.classification.kind).toBe("UNCHANGED");
    expect(receiver.classification.alertable).toBe(false);
    expect(receiver.estimate).toMatchObject({
      predictedDays: 18,
      confidenceLow: 14,
      confidenceHigh: 21,
      targetWeek: 10,
      source: "news_override",
      overrideReason: 'News: "miss 2-3 weeks"',
    });

    expect(result.recovered.map((event) => [event.playerId, event.daysOut])).toEqual([["p3", 8]]);
    expect((await store.listEvents("p3"))[0]).toMatchObject({
      recoveredAt: "2026-10-18T12:00:00.000Z",
      daysOut: 8,
    });
    expect(await store.listEvents("p1")).toHaveLength(4);
    expect((await store.listEvents("p2"))[0].lastUpdated).toBe("2026-10-18T12:00:00.000Z");
    expect(Object.keys(result.snapshot).sort()).toEqual(["p1", "p2"]);
  });

  it("uses the feed note when no explicit signal is given", async () => {
    const result = await runMonitorCycle({
      previous: {},
      records: [
        {
          player_id: "p5",
          name: "Edge Rusher",
          position: "lb",
          status: "Out",
          body_part: "Knee",
          notes: "Underwent surgery on Tuesday",
        },
      ],
      now: NOW,
      currentWeek: 7,
      store: new MemoryHistoryStore(),
    });

    expect(result.players[0].estimate).toMatchObject({
      predictedDays: 42,
      source: "news_override",
      overrideReason: 'News: "underwent surgery"',
    });
  });

  it("orders by alertability, then risk, then name", async () => {
    const result = await runMonitorCycle({
      previous: {},
      records: [
        { player_id: "a", name: "Zed", position: "RB", status: "Questionable", body_part: "Toe" },
        { player_id: "b", name: "Amos", position: "RB", status: "Questionable", body_part: "Toe" },
        { player_id: "c", name: "Mid", position: "RB", status: "IR", body_part: "Toe" },
      ],
      now: NOW,
      currentWeek: 7,
      store: new MemoryHistoryStore(),
    });

    expect(result.players.map((player) => player.classification.current.name)).toEqual(["Mid", "Amos", "Zed"]);
  });

  it("keeps firstSeen from the history when the snapshot was lost", async () => {
    const ongoing = makeEvent({
      status: "Out",
      firstSeen: "2026-10-01T12:00:00.000Z",
      lastUpdated: "2026-10-17T12:00:00.000Z",
    });
    const quiet = makeEvent({ playerId: "p4", name: "Gone Quiet", firstSeen: "2026-10-11T12:00:00.000Z" });
    const store = new MemoryHistoryStore({ initial: { p1: [ongoing], p4: [quiet] } });

    const result = await runMonitorCycle({
      previous: {},
      records: [{ player_id: "p1", name: "Test Runner", position: "RB", team: "AAA", status: "Out", body_part: "Hamstring" }],
      now: NOW,
      currentWeek: 7,
      store,
    });

    const [runner] = result.players;
    expect(runner.classification.kind).toBe("UNCHANGED");
    expect(runner.classification.alertable).toBe(false);
    expect(runner.classification.current.firstSeen).toBe("2026-10-01T12:00:00.000Z");
    expect(runner.risk.breakdown.frequency).toBe(0);
    expect(await store.listEvents("p1")).toEqual([{ ...ongoing, lastUpdated: "2026-10-18T12:00:00.000Z" }]);
    expect(result.recovered.map((event) => [event.playerId, event.daysOut])).toEqual([["p4", 7]]);
    expect(result.snapshot.p1.firstSeen).toBe("2026-10-01T12:00:00.000Z");
  });

  it("opens a fresh event when a recovered player is hurt again", async () => {
    const store = new MemoryHistoryStore();
    const feed = (status: string) => [
      { player_id: "p1", name: "Test Runner", position: "RB", team: "AAA", status, body_part: "Hamstring" },
    ];

    const first = await runMonitorCycle({
      previous: {},
      records: feed("Questionable"),
      now: new Date("2026-10-01T12:00:00.000Z"),
      currentWeek: 4,
      store,
    });
    const healthy = await runMonitorCycle({
      previous: first.snapshot,
      records: [],
      now: new Date("2026-10-08T12:00:00.000Z"),
      currentWeek: 5,
      store,
    });
    const again = await runMonitorCycle({
      previous: healthy.snapshot,
      records: feed("Out"),
      now: NOW,
      currentWeek: 7,
      store,
    });

    expect(healthy.recovered.map((event) => event.playerId)).toEqual(["p1"]);
    const [runner] = again.players;
    expect(runner.classification.kind).toBe("NEW");
    expect(runner.classification.current.firstSeen).toBe("2026-10-18T12:00:00.000Z");
    expect(runner.risk.breakdown.frequency).toBe(15);
    const events = await store.listEvents("p1");
    expect(events.map((event) => [event.firstSeen, event.recoveredAt, event.daysOut])).toEqual([
      ["2026-10-01T12:00:00.000Z", "2026-10-08T12:00:00.000Z", 7],
      ["2026-10-18T12:00:00.000Z", null, null],
    ]);
  });

  it("limits the report to the roster but records every injury", async () => {
    const store = seededStore();
    const depthChart = new DepthChart([
      { playerId: "p1", name: "Test Runner", team: "AAA", position: "RB", slot: "RB", order: 1 },
      { playerId: "p7", name: "Second Back", team: "AAA", position: "RB", slot: "RB", order: 2 },
    ]);

    const result = await runMonitorCycle({
      previous,
      records,
      now: NOW,
      currentWeek: 7,
      store,
      depthChart,
      ownership: new Map([["p7", "Rival Team"]]),
      roster: new Set(["p1", "p3"]),
      warn: vi.fn(),
    });

    expect(result.rosterSize).toBe(2);
    expect(result.players.map((player) => player.classification.current.playerId)).toEqual(["p1"]);
    expect(result.recovered.map((event) => event.playerId)).toEqual(["p3"]);
    expect(result.players[0].backup).toMatchObject({ playerId: "p7", depth: 2, available: false, ownedBy: "Rival Team" });
    expect(Object.keys(result.snapshot).sort()).toEqual(["p1", "p2"]);
    expect((await store.listEvents("p2"))[0].lastUpdated).toBe("2026-10-18T12:00:00.000Z");
  });

  it("propagates history store failures", async () => {
    const store = new MemoryHistoryStore({
      persist: () => Promise.reject(new HistoryStoreUnavailableError("data/history.json", new Error("EACCES"))),
    });

    await expect(
      runMonitorCycle({ previous: {}, records: records.slice(2), now: NOW, currentWeek: 7, store }),
    ).rejects.toBeInstanceOf(HistoryStoreUnavailableError);
  });
});
