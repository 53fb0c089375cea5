import type { InjuryEvent } from "../../src/lib/injury/types.js";

export function makeEvent(overrides: Partial<InjuryEvent> = {}): InjuryEvent {
  return {
    playerId: "p1",
    name: "Test Runner",
    team: "AAA",
    position: "RB",
    bodyPart: "Hamstring",
    status: "Questionable",
    firstSeen: "2026-10-01T12:00:00.000Z",
    lastUpdated: "2026-10-01T12:00:00.000Z",
    recoveredAt: null,
    daysOut: null,
    ...overrides,
  };
}

/** Closed event starting `start` and lasting `daysOut` whole days. */
export function closedEvent(start: string, daysOut: number, overrides: Partial<InjuryEvent> = {}): InjuryEvent {
  const startMs = Date.parse(start);
  const recoveredAt = new Date(startMs + daysOut * 24 * 60 * 60 * 1000).toISOString();
  return makeEvent({
    firstSeen: new Date(startMs).toISOString(),
    lastUpdated: recoveredAt,
    recoveredAt,
    daysOut,
    ...overrides,
  });
}
