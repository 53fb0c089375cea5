import { z } from "zod";

import { isFantasyPosition, type DepthChartEntry } from "../../src/lib/injury/depth-chart.js";
import { parseInjuryStatus, type InjuryStatus } from "../../src/lib/injury/types.js";
import { withCache } from "./cache.js";
import { buildUrl, requestJson } from "./http.js";

const sleeperPlayerSchema = z
  .object({
    player_id: z.union([z.string(), z.number()]).nullable().optional(),
    full_name: z.string().nullable().optional(),
    first_name: z.string().nullable().optional(),
    last_name: z.string().nullable().optional(),
    position: z.string().nullable().optional(),
    team: z.string().nullable().optional(),
    injury_status: z.string().nullable().optional(),
    injury_body_part: z.string().nullable().optional(),
    injury_notes: z.string().nullable().optional(),
    depth_chart_position: z.string().nullable().optional(),
    depth_chart_order: z.number().nullable().optional(),
  })
  .passthrough();

export type SleeperPlayer = z.infer<typeof sleeperPlayerSchema>;

const playersPayloadSchema = z.record(z.string(), z.unknown());

/** Sleeper abbreviations that are not spelled out in full. */
const STATUS_ALIASES: Record<string, InjuryStatus> = {
  sus: "Suspended",
  susp: "Suspended",
  q: "Questionable",
  d: "Doubtful",
  o: "Out",
};

export function mapSleeperStatus(raw: string | null | undefined): InjuryStatus | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return undefined;
  }
  return parseInjuryStatus(trimmed) ?? STATUS_ALIASES[trimmed.toLowerCase()];
}

function playerName(player: SleeperPlayer): string | undefined {
  const full = player.full_name?.trim();
  if (full) {
    return full;
  }
  const joined = `${player.first_name?.trim() ?? ""} ${player.last_name?.trim() ?? ""}`.trim();
  return joined || undefined;
}

/**
 * Maps one Sleeper player to the feed record shape. Players without a tracked
 * injury status yield null; incomplete ones are passed on as-is so the change
 * detector can reject and report them.
 */
export function toFeedRecord(key: string, raw: unknown): Record<string, unknown> | null {
  const parsed = sleeperPlayerSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  const player = parsed.data;
  const status = mapSleeperStatus(player.injury_status);
  if (!status) {
    return null;
  }
  return {
    player_id: player.player_id ?? key,
    name: playerName(player),
    position: player.position ?? undefined,
    team: player.team ?? null,
    status,
    body_part: player.injury_body_part ?? undefined,
    notes: player.injury_notes ?? null,
  };
}

export function extractInjuryRecords(payload: unknown): Record<string, unknown>[] {
  const parsed = playersPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error("Unexpected Sleeper players payload: expected an object keyed by player id");
  }
  const records: Record<string, unknown>[] = [];
  for (const [key, raw] of Object.entries(parsed.data)) {
    const record = toFeedRecord(key, raw);
    if (record) {
      records.push(record);
    }
  }
  return records;
}

/** Depth chart slots of every QB, RB, WR and TE Sleeper lists with a team and an order. */
export function extractDepthChart(payload: unknown): DepthChartEntry[] {
  const parsed = playersPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error("Unexpected Sleeper players payload: expected an object keyed by player id");
  }
  const entries: DepthChartEntry[] = [];
  for (const [key, raw] of Object.entries(parsed.data)) {
    const player = sleeperPlayerSchema.safeParse(raw);
    if (!player.success) {
      continue;
    }
    const { team, depth_chart_position: slot, depth_chart_order: order } = player.data;
    const position = player.data.position?.trim().toUpperCase() ?? "";
    const name = playerName(player.data);
    if (!team || !slot || order === null || order === undefined || !name || !isFantasyPosition(position)) {
      continue;
    }
    entries.push({
      playerId: String(player.data.player_id ?? key),
      name,
      team,
      position,
      slot,
      order,
    });
  }
  return entries;
}

export interface SleeperFeed {
  records: Record<string, unknown>[];
  depthChart: DepthChartEntry[];
}

export interface FetchInjuryOptions {
  baseUrl?: string;
  cacheDir: string;
  ttlMs?: number;
}

export async function fetchSleeperFeed(options: FetchInjuryOptions): Promise<SleeperFeed> {
  const payload = await withCache("sleeper-players-nfl", { cacheDir: options.cacheDir, ttlMs: options.ttlMs }, () =>
    requestJson(buildUrl("/v1/players/nfl", options.baseUrl)),
  );
  return { records: extractInjuryRecords(payload), depthChart: extractDepthChart(payload) };
}
