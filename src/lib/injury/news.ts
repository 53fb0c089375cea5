export type RangeUnit = "days" | "weeks" | "games";

export type TimelineSignal =
  | { kind: "season-ending"; phrase: string }
  | { kind: "explicit-range"; low: number; high: number; unit: RangeUnit; phrase: string }
  | { kind: "activated"; phrase: string }
  | { kind: "known-injury"; days: number; phrase: string }
  | { kind: "surgery"; days: number; phrase: string }
  | { kind: "vague"; window: "day-to-day" | "week-to-week"; phrase: string };

export interface TimelineRule {
  name: TimelineSignal["kind"];
  match(text: string): TimelineSignal | null;
}

export interface SignalWindow {
  predictedDays: number;
  confidenceLow: number;
  confidenceHigh: number;
}

export interface SignalContext {
  currentWeek: number;
  seasonWeeks: number;
}

const SEASON_ENDING_PHRASES = [
  "season-ending",
  "season ending",
  "out for the season",
  "out for season",
  "done for the year",
  "done for the season",
  "rest of the season",
  "remainder of the season",
  "will not return this season",
  "season is over",
  "shut down for the season",
];

const ACTIVATED_PHRASES = [
  "activated from",
  "activated off",
  "designated to return",
  "designated for return",
  "removed from ir",
  "returned to practice",
  "return to practice",
  "cleared to play",
  "cleared to return",
  "practicing fully",
  "full participant",
  "expected to play",
];

const NEGATION_PATTERN = /\b(?:not|no|never|won't|isn't|wasn't|hasn't|didn't|unlikely|ruled out)\b/;

/** Words before an activation phrase that are searched for a negation. */
const NEGATION_WINDOW_WORDS = 3;

const KNOWN_INJURY_DAYS: ReadonlyArray<[string, number]> = [
  ["torn acl", 270],
  ["acl tear", 270],
  ["ruptured achilles", 270],
  ["torn achilles", 270],
  ["achilles tear", 270],
  ["torn ligament", 180],
  ["pcl tear", 90],
  ["mcl tear", 42],
  ["fractured", 42],
  ["broken", 42],
];

const SURGERY_PHRASES = [
  "underwent surgery",
  "will undergo surgery",
  "surgery scheduled",
  "requires surgery",
  "surgical procedure",
];

const WEEK_TO_WEEK_PHRASES = ["week-to-week", "week to week", "evaluated weekly", "no timetable", "indefinitely"];

const DAY_TO_DAY_PHRASES = ["day-to-day", "day to day", "game-time decision", "gametime decision"];

const RANGE_PATTERNS: RegExp[] = [
  /\b(?:out|miss|sidelined)\s+(?:for\s+)?(?:about\s+|roughly\s+|an estimated\s+)?(\d{1,3})\s*(?:-|to)\s*(\d{1,3})\s+(days?|weeks?|games?)\b/,
  /\b(\d{1,3})\s*(?:-|to)\s*(\d{1,3})[\s-]+(days?|weeks?|games?)\b/,
];

const SINGLE_PATTERNS: RegExp[] = [
  /\b(?:out|miss|sidelined)\s+(?:for\s+)?(?:about\s+|roughly\s+|at least\s+|an estimated\s+)?(\d{1,3})\s+(days?|weeks?|games?)\b/,
  /\b(\d{1,3})\s+(weeks?|games?)\s+out\b/,
];

const UNIT_DAYS: Record<RangeUnit, number> = { days: 1, weeks: 7, games: 7 };

function toUnit(raw: string): RangeUnit {
  if (raw.startsWith("day")) return "days";
  if (raw.startsWith("game")) return "games";
  return "weeks";
}

function findPhrase(text: string, phrases: readonly string[]): string | undefined {
  return phrases.find((phrase) => text.includes(phrase));
}

function isNegatedAt(text: string, index: number): boolean {
  const before = text.slice(0, index).trim().split(" ").slice(-NEGATION_WINDOW_WORDS).join(" ");
  return NEGATION_PATTERN.test(before);
}

/** Like `findPhrase`, but an occurrence right after "not", "no" and the like does not count. */
function findAffirmedPhrase(text: string, phrases: readonly string[]): string | undefined {
  for (const phrase of phrases) {
    let index = text.indexOf(phrase);
    while (index >= 0) {
      if (!isNegatedAt(text, index)) {
        return phrase;
      }
      index = text.indexOf(phrase, index + phrase.length);
    }
  }
  return undefined;
}

export function normalizeSignalText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[\u2010-\u2015\u2212]/g, "-")
    .replace(/[\u2018\u2019]/g, "'")
    .replace(/\s+/g, " ")
    .trim();
}

function matchExplicitRange(text: string): TimelineSignal | null {
  for (const pattern of RANGE_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      const a = Number.parseInt(match[1], 10);
      const b = Number.parseInt(match[2], 10);
      return {
        kind: "explicit-range",
        low: Math.min(a, b),
        high: Math.max(a, b),
        unit: toUnit(match[3]),
        phrase: match[0],
      };
    }
  }
  for (const pattern of SINGLE_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      const value = Number.parseInt(match[1], 10);
      return { kind: "explicit-range", low: value, high: value, unit: toUnit(match[2]), phrase: match[0] };
    }
  }
  return null;
}

/** Evaluated in order; the first rule that matches wins. */
export const TIMELINE_RULES: readonly TimelineRule[] = [
  {
    name: "season-ending",
    match(text) {
      const phrase = findPhrase(text, SEASON_ENDING_PHRASES);
      return phrase ? { kind: "season-ending", phrase } : null;
    },
  },
  {
    name: "explicit-range",
    match: matchExplicitRange,
  },
  {
    name: "activated",
    match(text) {
      const phrase = findAffirmedPhrase(text, ACTIVATED_PHRASES);
      return phrase ? { kind: "activated", phrase } : null;
    },
  },
  {
    name: "known-injury",
    match(text) {
      const hit = KNOWN_INJURY_DAYS.find(([phrase]) => text.includes(phrase));
      return hit ? { kind: "known-injury", days: hit[1], phrase: hit[0] } : null;
    },
  },
  {
    name: "surgery",
    match(text) {
      const phrase = findPhrase(text, SURGERY_PHRASES);
      if (!phrase) return null;
      const minor = text.includes("minor") || text.includes("arthroscopic");
      return { kind: "surgery", days: minor ? 21 : 42, phrase };
    },
  },
  {
    name: "vague",
    match(text) {
      const weekly = findPhrase(text, WEEK_TO_WEEK_PHRASES);
      if (weekly) return { kind: "vague", window: "week-to-week", phrase: weekly };
      const daily = findPhrase(text, DAY_TO_DAY_PHRASES);
      return daily ? { kind: "vague", window: "day-to-day", phrase: daily } : null;
    },
  },
];

export function matchTimelineSignal(
  text: string,
  rules: readonly TimelineRule[] = TIMELINE_RULES,
): TimelineSignal | null {
  const normalized = normalizeSignalText(text);
  if (!normalized) {
    return null;
  }
  for (const rule of rules) {
    const signal = rule.match(normalized);
    if (signal) {
      return signal;
    }
  }
  return null;
}

export function resolveSignalWindow(signal: TimelineSignal, context: SignalContext): SignalWindow {
  switch (signal.kind) {
    case "season-ending": {
      const weeksRemaining = Math.max(1, context.seasonWeeks - context.currentWeek);
      const days = weeksRemaining * 7;
      return { predictedDays: days, confidenceLow: days, confidenceHigh: 365 };
    }
    case "explicit-range": {
      const perUnit = UNIT_DAYS[signal.unit];
      const lowDays = signal.low * perUnit;
      const highDays = signal.high * perUnit;
      const predictedDays = Math.round((lowDays + highDays) / 2);
      if (signal.low !== signal.high) {
        return { predictedDays, confidenceLow: lowDays, confidenceHigh: highDays };
      }
      const slack = signal.unit === "days" ? 2 : 7;
      return {
        predictedDays,
        confidenceLow: Math.max(1, predictedDays - slack),
        confidenceHigh: predictedDays + slack,
      };
    }
    case "activated":
      return { predictedDays: 3, confidenceLow: 0, confidenceHigh: 7 };
    case "known-injury":
      return {
        predictedDays: signal.days,
        confidenceLow: signal.days - 14,
        confidenceHigh: signal.days + 30,
      };
    case "surgery":
      return { predictedDays: signal.days, confidenceLow: signal.days, confidenceHigh: signal.days + 28 };
    case "vague":
      return signal.window === "week-to-week"
        ? { predictedDays: 14, confidenceLow: 7, confidenceHigh: 21 }
        : { predictedDays: 3, confidenceLow: 1, confidenceHigh: 7 };
  }
}
