import fs from "node:fs/promises";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import type { TextSignal } from "../../src/lib/injury/types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

const noteSchema = z.union([
  z.string().trim().min(1).transform((text) => ({ text })),
  z.object({
    text: z.string().trim().min(1),
    source: z.string().trim().optional(),
    expected_return: z.union([z.string(), z.date()]).optional(),
  }),
]);

type NoteEntry = z.infer<typeof noteSchema>;

function impliedDaysUntil(value: string | Date, now: Date): number | undefined {
  const target = value instanceof Date ? value.getTime() : Date.parse(value);
  if (!Number.isFinite(target)) {
    return undefined;
  }
  return Math.max(0, Math.ceil((target - now.getTime()) / DAY_MS));
}

function toSignal(entry: NoteEntry, now: Date): TextSignal {
  const signal: TextSignal = { text: entry.text, source: "source" in entry && entry.source ? entry.source : "manual" };
  if ("expected_return" in entry && entry.expected_return !== undefined) {
    const days = impliedDaysUntil(entry.expected_return, now);
    if (days !== undefined) {
      signal.impliedDays = days;
    }
  }
  return signal;
}

/**
 * Accepts either a top-level `notes:` map or a bare map of player id to a
 * note string or `{ text, source?, expected_return? }`.
 */
export function parseNewsNotes(
  raw: unknown,
  now: Date,
  warn: (message: string) => void = console.warn,
): Map<string, TextSignal> {
  const signals = new Map<string, TextSignal>();
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    return signals;
  }
  const inner: unknown = "notes" in raw ? raw.notes : raw;
  if (!inner || typeof inner !== "object" || Array.isArray(inner)) {
    return signals;
  }

  for (const [playerId, value] of Object.entries(inner)) {
    const parsed = noteSchema.safeParse(value);
    if (!parsed.success) {
      warn(`Ignoring news note for player ${playerId}: ${parsed.error.issues[0]?.message ?? "invalid entry"}`);
      continue;
    }
    signals.set(playerId.trim(), toSignal(parsed.data, now));
  }
  return signals;
}

export async function loadNewsNotes(
  filePath: string,
  now: Date,
  warn: (message: string) => void = console.warn,
): Promise<Map<string, TextSignal>> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return new Map();
    }
    throw error;
  }
  return parseNewsNotes(parseYaml(text), now, warn);
}
