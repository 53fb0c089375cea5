import { describe, expect, it } from "vitest";

import { renderInjuryReport } from "../../content/templates/injuryReport.md.js";
import { MemoryHistoryStore } from "../../src/lib/history/store.js";
import { DepthChart } from "../../src/lib/injury/depth-chart.js";
import { runMonitorCycle } from "../../src/lib/injury/pipeline.js";
import { makeEvent } from "../helpers/events.js";

const NOW = new Date("2026-10-18T12:00:00.000Z");

describe("renderInjuryReport", () => {
  it("renders alerts, player details and recoveries", async () => {
    const recovering = makeEvent({ playerId: "p3", name: "Back Healthy", firstSeen: "2026-10-10T12:00:00.000Z" });
    const result = await runMonitorCycle({
      previous: { p3: recovering },
      records: [
        { player_id: "p1", name: "Test Runner", position: "RB", team: "AAA", status: "Questionable", body_part: "Hamstring" },
      ],
      now: NOW,
      currentWeek: 7,
      store: new MemoryHistoryStore({ initial: { p3: [recovering] } }),
    });

    expect(renderInjuryReport(result).split("\n")).toEqual([
      "# Injury report: week 7",
      "",
      "1 injured player, 1 alert, and 1 recovered. Generated 2026-10-18T12:00:00.000Z.",
      "",
      "## Alerts",
      "",
      "| Change | Player | Status | Injury | Risk | Return |",
      "| --- | --- | --- | --- | --- | --- |",
      "| NEW | Test Runner (RB, AAA) | Questionable | Hamstring | 4.0 Minimal | 0 days (0-0), week 7 |",
      "",
      "## Players",
      "",
      "### Test Runner (RB, AAA)",
      "",
      "- Status: Questionable (Hamstring), first seen 2026-10-18T12:00:00.000Z",
      "- Risk: 4.0 (Minimal)",
      "  - Current status Questionable (severity 20)",
      "- Return: 0 days (0-0), week 7 via status floor",
      "",
      "## Recovered",
      "",
      "- Back Healthy (RB, AAA): Hamstring, back after 8 days",
      "",
    ]);
  });

  it("shows the override and the estimate it replaced", async () => {
    const previous = { p1: makeEvent({ status: "Out" }) };
    const result = await runMonitorCycle({
      previous,
      records: [
        {
          player_id: "p1",
          name: "Test Runner",
          position: "RB",
          team: "AAA",
          status: "IR",
          body_part: "Hamstring",
          notes: "Out for the season",
        },
      ],
      now: NOW,
      currentWeek: 7,
      store: new MemoryHistoryStore(),
    });

    const lines = renderInjuryReport(result).split("\n");

    expect(lines).toContain("- Status: Out -> IR (Hamstring), first seen 2026-10-01T12:00:00.000Z");
    expect(lines).toContain("- Return: 77 days (77-365), week 18 via news");
    expect(lines).toContain('  - News: "out for the season"');
    expect(lines).toContain("  - Before override: 28 days (28-42), week 11");
  });

  it("scopes the summary to the roster and names the backup", async () => {
    const result = await runMonitorCycle({
      previous: {},
      records: [
        { player_id: "p1", name: "Test Runner", position: "RB", team: "AAA", status: "Questionable", body_part: "Hamstring" },
        { player_id: "p7", name: "Second Back", position: "RB", team: "AAA", status: "Out", body_part: "Ankle" },
      ],
      now: NOW,
      currentWeek: 7,
      store: new MemoryHistoryStore(),
      depthChart: new DepthChart([
        { playerId: "p1", name: "Test Runner", team: "AAA", position: "RB", slot: "RB", order: 1 },
        { playerId: "p7", name: "Second Back", team: "AAA", position: "RB", slot: "RB", order: 2 },
      ]),
      ownership: new Map<string, string>(),
      roster: new Set(["p1"]),
    });

    const lines = renderInjuryReport(result).split("\n");

    expect(lines[2]).toBe("1 injured player on the roster, 1 alert, and 0 recovered. Generated 2026-10-18T12:00:00.000Z.");
    expect(lines).toContain("- Backup: Second Back (AAA RB #2), also Out (Ankle), available");
  });

  it("says so when nothing needs attention", async () => {
    const result = await runMonitorCycle({
      previous: {},
      records: [],
      now: NOW,
      currentWeek: 3,
      store: new MemoryHistoryStore(),
    });

    expect(renderInjuryReport(result)).toBe(
      [
        "# Injury report: week 3",
        "",
        "0 injured players, 0 alerts, and 0 recovered. Generated 2026-10-18T12:00:00.000Z.",
        "",
        "## Alerts",
        "",
        "_No new or worsening injuries._",
        "",
      ].join("\n"),
    );
  });
});
