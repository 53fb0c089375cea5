import type { InjuryStatus } from "./types.js";

export const SEVERITY_RANK: Record<InjuryStatus, number> = {
  Questionable: 2,
  Doubtful: 3,
  Out: 4,
  PUP: 4,
  Suspended: 4,
  IR: 5,
};

export function severityRank(status: InjuryStatus): number {
  return SEVERITY_RANK[status];
}

/** Negative when `a` is less severe than `b`, zero when tied. */
export function compareSeverity(a: InjuryStatus, b: InjuryStatus): number {
  return Math.sign(SEVERITY_RANK[a] - SEVERITY_RANK[b]);
}
