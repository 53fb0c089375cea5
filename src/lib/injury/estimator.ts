import { buildReturnFeatures, DEFAULT_SEASON_WEEKS, type ReturnPredictor } from "./model.js";
import { matchTimelineSignal, resolveSignalWindow, type TimelineRule, TIMELINE_RULES } from "./news.js";
import type {
  EstimateSource,
  InjuryEvent,
  InjuryStatus,
  PlayerInjuryProfile,
  ReturnEstimate,
  ReturnWindow,
  TextSignal,
} from "./types.js";

export interface EstimateOptions {
  predictor?: ReturnPredictor | null;
  seasonWeeks?: number;
  rules?: readonly TimelineRule[];
  warn?: (message: string) => void;
}

interface DayWindow {
  predictedDays: number;
  confidenceLow: number;
  confidenceHigh: number;
}

const LONG_TERM_FLOOR_DAYS = 28;
const LONG_TERM_SPREAD_DAYS = 14;
const OUT_FLOOR_DAYS = 7;
const OUT_LOW_FLOOR_DAYS = 3;
const DISAGREEMENT_RATIO = 2;

export function weeksUntilReturn(predictedDays: number): number {
  return Math.ceil(predictedDays / 7);
}

export function targetWeekFor(currentWeek: number, predictedDays: number): number {
  return currentWeek + weeksUntilReturn(predictedDays);
}

function toWholeDays(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.round(value)) : 0;
}

function normalizeWindow(days: number, low: number, high: number): DayWindow {
  const predictedDays = toWholeDays(days);
  return {
    predictedDays,
    confidenceLow: Math.min(toWholeDays(low), predictedDays),
    confidenceHigh: Math.max(toWholeDays(high), predictedDays),
  };
}

function toReturnWindow(window: DayWindow, currentWeek: number): ReturnWindow {
  return {
    ...window,
    weeksOut: weeksUntilReturn(window.predictedDays),
    targetWeek: targetWeekFor(currentWeek, window.predictedDays),
  };
}

/** Minimums implied by roster rules: IR/PUP sit at least four weeks, Out at least one. */
export function applyStatusFloor(status: InjuryStatus, window: DayWindow): DayWindow & { raised: boolean } {
  switch (status) {
    case "IR":
    case "PUP": {
      const predictedDays = Math.max(window.predictedDays, LONG_TERM_FLOOR_DAYS);
      return {
        predictedDays,
        confidenceLow: Math.max(window.confidenceLow, LONG_TERM_FLOOR_DAYS),
        confidenceHigh: Math.max(window.confidenceHigh, predictedDays + LONG_TERM_SPREAD_DAYS),
        raised: predictedDays > window.predictedDays,
      };
    }
    case "Out": {
      const predictedDays = Math.max(window.predictedDays, OUT_FLOOR_DAYS);
      return {
        predictedDays,
        confidenceLow: Math.max(window.confidenceLow, OUT_LOW_FLOOR_DAYS),
        confidenceHigh: Math.max(window.confidenceHigh, predictedDays),
        raised: predictedDays > window.predictedDays,
      };
    }
    default:
      return { ...window, raised: false };
  }
}

function baseEstimate(
  current: InjuryEvent,
  profile: PlayerInjuryProfile,
  currentWeek: number,
  seasonWeeks: number,
  predictor: ReturnPredictor | null,
  warn: (message: string) => void,
): { window: DayWindow; source: EstimateSource } {
  if (predictor) {
    try {
      const prediction = predictor.predict(buildReturnFeatures(current, profile, currentWeek, seasonWeeks));
      return {
        window: normalizeWindow(prediction.days, prediction.low, prediction.high),
        source: "model",
      };
    } catch (error) {
      warn(
        `Return model failed for ${current.name} (${current.playerId}): ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }
  const prior = profile.avgRecoveryDaysByStatus[current.status] ?? 0;
  return { window: normalizeWindow(prior, prior, prior), source: "status_floor" };
}

function disagrees(a: number, b: number): boolean {
  const low = Math.max(1, Math.min(a, b));
  const high = Math.max(1, Math.max(a, b));
  return high / low > DISAGREEMENT_RATIO;
}

/**
 * Base estimate (model or historical prior), then status floors, then an
 * optional text override that takes precedence over both.
 */
export function estimateReturn(
  current: InjuryEvent,
  profile: PlayerInjuryProfile,
  signal: TextSignal | null,
  currentWeek: number,
  options: EstimateOptions = {},
): ReturnEstimate {
  if (!Number.isInteger(currentWeek) || currentWeek < 0) {
    throw new Error(`Current week must be a non-negative integer, got ${currentWeek}`);
  }
  const seasonWeeks = options.seasonWeeks ?? DEFAULT_SEASON_WEEKS;
  const warn = options.warn ?? console.warn;

  const base = baseEstimate(current, profile, currentWeek, seasonWeeks, options.predictor ?? null, warn);
  const floored = applyStatusFloor(current.status, base.window);
  const { raised, ...floorWindow } = floored;
  const estimate: ReturnEstimate = {
    ...toReturnWindow(floorWindow, currentWeek),
    source: raised ? "status_floor" : base.source,
    reasons: [],
  };

  if (!signal || !signal.text.trim()) {
    return estimate;
  }

  const matched = matchTimelineSignal(signal.text, options.rules ?? TIMELINE_RULES);
  if (matched) {
    const window = resolveSignalWindow(matched, { currentWeek, seasonWeeks });
    return {
      ...toReturnWindow(normalizeWindow(window.predictedDays, window.confidenceLow, window.confidenceHigh), currentWeek),
      source: "news_override",
      overrideReason: `News: "${matched.phrase}"`,
      modelEstimate: {
        predictedDays: estimate.predictedDays,
        confidenceLow: estimate.confidenceLow,
        confidenceHigh: estimate.confidenceHigh,
        weeksOut: estimate.weeksOut,
        targetWeek: estimate.targetWeek,
      },
      reasons: estimate.reasons,
    };
  }

  if (signal.impliedDays !== undefined && Number.isFinite(signal.impliedDays)) {
    const signalDays = toWholeDays(signal.impliedDays);
    if (disagrees(signalDays, estimate.predictedDays)) {
      estimate.signalDays = signalDays;
      estimate.reasons.push(
        `News timeline (${signalDays} days) disagrees with model estimate (${estimate.predictedDays} days)`,
      );
    }
  }

  return estimate;
}
