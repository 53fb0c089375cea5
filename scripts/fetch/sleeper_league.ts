import { z } from "zod";

import { withCache } from "./cache.js";
import { buildUrl, requestJson } from "./http.js";

const rosterSchema = z
  .object({
    roster_id: z.number(),
    owner_id: z.string().nullable().optional(),
    players: z.array(z.string()).nullable().optional(),
  })
  .passthrough();

const userSchema = z
  .object({
    user_id: z.string(),
    display_name: z.string().nullable().optional(),
    metadata: z
      .object({ team_name: z.string().nullable().optional() })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

export interface LeagueRoster {
  rosterId: number;
  ownerId: string | null;
  ownerName: string;
  playerIds: string[];
}

export interface FetchLeagueOptions {
  leagueId: string;
  baseUrl?: string;
  cacheDir: string;
  ttlMs?: number;
}

function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, what: string): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Unexpected Sleeper ${what} payload: ${issue?.path.join(".")} ${issue?.message}`);
  }
  return parsed.data;
}

export async function fetchLeagueRosters(options: FetchLeagueOptions): Promise<LeagueRoster[]> {
  const league = encodeURIComponent(options.leagueId);
  const cache = { cacheDir: options.cacheDir, ttlMs: options.ttlMs };
  const [rostersPayload, usersPayload] = await Promise.all([
    withCache(`sleeper-league-${options.leagueId}-rosters`, cache, () =>
      requestJson(buildUrl(`/v1/league/${league}/rosters`, options.baseUrl)),
    ),
    withCache(`sleeper-league-${options.leagueId}-users`, cache, () =>
      requestJson(buildUrl(`/v1/league/${league}/users`, options.baseUrl)),
    ),
  ]);
  const rosters = parsePayload(z.array(rosterSchema), rostersPayload, "rosters");
  const users = parsePayload(z.array(userSchema), usersPayload, "users");

  const names = new Map<string, string>();
  for (const user of users) {
    names.set(user.user_id, user.metadata?.team_name?.trim() || user.display_name?.trim() || user.user_id);
  }
  return rosters.map((roster) => ({
    rosterId: roster.roster_id,
    ownerId: roster.owner_id ?? null,
    ownerName: (roster.owner_id && names.get(roster.owner_id)) || `Roster ${roster.roster_id}`,
    playerIds: roster.players ?? [],
  }));
}

/** Rostered player id to the name of the team that holds them. */
export function buildOwnership(rosters: readonly LeagueRoster[]): Map<string, string> {
  const ownership = new Map<string, string>();
  for (const roster of rosters) {
    for (const playerId of roster.playerIds) {
      ownership.set(playerId, roster.ownerName);
    }
  }
  return ownership;
}

export function rosterForUser(rosters: readonly LeagueRoster[], userId: string): Set<string> {
  const roster = rosters.find((candidate) => candidate.ownerId === userId);
  if (!roster) {
    throw new Error(`No roster in the league is owned by Sleeper user ${userId}`);
  }
  return new Set(roster.playerIds);
}
