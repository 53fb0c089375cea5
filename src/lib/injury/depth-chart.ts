import type { InjuryEvent, InjurySnapshot, InjuryStatus } from "./types.js";

export const FANTASY_POSITIONS = ["QB", "RB", "WR", "TE"] as const;

export type FantasyPosition = (typeof FANTASY_POSITIONS)[number];

export interface DepthChartEntry {
  playerId: string;
  name: string;
  team: string;
  position: FantasyPosition;
  /** Depth chart slot, e.g. "QB", "LWR", "SWR". */
  slot: string;
  order: number;
}

export interface BackupSuggestion {
  playerId: string;
  name: string;
  team: string;
  position: FantasyPosition;
  slot: string;
  /** 1 is the starter. */
  depth: number;
  injuryStatus: InjuryStatus | null;
  bodyPart: string | null;
  /** Null when no league rosters are known. */
  available: boolean | null;
  ownedBy: string | null;
}

export interface BackupContext {
  /** Every player injured this cycle, by player id. */
  injured: InjurySnapshot;
  /** Rostered player id to owner label. */
  ownership?: ReadonlyMap<string, string>;
}

export function isFantasyPosition(position: string): position is FantasyPosition {
  return FANTASY_POSITIONS.some((candidate) => candidate === position);
}

function slotKey(team: string, slot: string): string {
  return `${team.toUpperCase()}|${slot.toUpperCase()}`;
}

export class DepthChart {
  private readonly slots = new Map<string, DepthChartEntry[]>();
  private readonly players = new Map<string, DepthChartEntry>();

  constructor(entries: Iterable<DepthChartEntry>) {
    for (const entry of entries) {
      if (this.players.has(entry.playerId)) {
        continue;
      }
      this.players.set(entry.playerId, entry);
      const key = slotKey(entry.team, entry.slot);
      const slot = this.slots.get(key) ?? [];
      slot.push(entry);
      this.slots.set(key, slot);
    }
    for (const slot of this.slots.values()) {
      slot.sort((a, b) => a.order - b.order || a.name.localeCompare(b.name));
    }
  }

  get size(): number {
    return this.players.size;
  }

  /** The player listed right behind `playerId` in the same team slot, with their 1-based depth. */
  nextInLine(playerId: string): { entry: DepthChartEntry; depth: number } | null {
    const listed = this.players.get(playerId);
    if (!listed) {
      return null;
    }
    const slot = this.slots.get(slotKey(listed.team, listed.slot)) ?? [];
    const index = slot.findIndex((entry) => entry.playerId === playerId);
    if (index < 0 || index + 1 >= slot.length) {
      return null;
    }
    return { entry: slot[index + 1], depth: index + 2 };
  }
}

/**
 * Suggests the next man up for an injured QB, RB, WR or TE. Returns null for
 * other positions and for players the depth chart does not list.
 */
export function suggestBackup(
  chart: DepthChart,
  player: InjuryEvent,
  context: BackupContext,
): BackupSuggestion | null {
  if (!isFantasyPosition(player.position)) {
    return null;
  }
  const next = chart.nextInLine(player.playerId);
  if (!next) {
    return null;
  }
  const { entry, depth } = next;
  const injury = Object.hasOwn(context.injured, entry.playerId) ? context.injured[entry.playerId] : undefined;
  const owner = context.ownership?.get(entry.playerId) ?? null;
  return {
    playerId: entry.playerId,
    name: entry.name,
    team: entry.team,
    position: entry.position,
    slot: entry.slot,
    depth,
    injuryStatus: injury?.status ?? null,
    bodyPart: injury?.bodyPart ?? null,
    available: context.ownership ? owner === null : null,
    ownedBy: owner,
  };
}
