import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parse as parseYaml } from "yaml";

import { loadNewsNotes, parseNewsNotes } from "../lib/news_notes.js";

const NOW = new Date("2026-10-18T12:00:00.000Z");

describe("parseNewsNotes", () => {
  it("reads plain and detailed notes keyed by player id", () => {
    const raw = parseYaml(
      [
        "notes:",
        '  "1001": Out 4-6 weeks after the sprain',
        '  "1002":',
        "    text: Limited in practice",
        "    source: beat writer",
        "    expected_return: 2026-11-01",
      ].join("\n"),
    );

    const signals = parseNewsNotes(raw, NOW);

    expect(signals.get("1001")).toEqual({ text: "Out 4-6 weeks after the sprain", source: "manual" });
    expect(signals.get("1002")).toEqual({ text: "Limited in practice", source: "beat writer", impliedDays: 14 });
  });

  it("accepts a bare map and warns about unusable entries", () => {
    const warn = vi.fn();

    const signals = parseNewsNotes({ "7": "Day-to-day", "8": { source: "no text" } }, NOW, warn);

    expect([...signals.keys()]).toEqual(["7"]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^Ignoring news note for player 8: /);
  });

  it("never implies negative days for a past return date", () => {
    const signals = parseNewsNotes({ "7": { text: "Back soon", expected_return: "2026-10-01" } }, NOW);

    expect(signals.get("7")?.impliedDays).toBe(0);
  });
});

describe("loadNewsNotes", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "news-notes-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("returns no signals when the file is absent", async () => {
    const signals = await loadNewsNotes(path.join(dir, "news.yaml"), NOW);

    expect(signals.size).toBe(0);
  });

  it("loads notes from disk", async () => {
    const filePath = path.join(dir, "news.yaml");
    await fs.writeFile(filePath, 'notes:\n  "1001": Season-ending knee injury\n', "utf8");

    const signals = await loadNewsNotes(filePath, NOW);

    expect(signals.get("1001")?.text).toBe("Season-ending knee injury");
  });
});
