import { readFile } from "node:fs/promises";

import { mean, quantile } from "d3-array";
import { z } from "zod";

import { buildInjuryProfile, priorCountForBodyPart } from "../history/profile.js";
import { severityRank } from "./severity.js";
import { normalizeBodyPart, type InjuryEvent, type PlayerInjuryProfile } from "./types.js";

export const DEFAULT_SEASON_WEEKS = 18;
export const MIN_TRAINING_SAMPLES = 10;

export interface ReturnFeatures {
  bodyPart: string;
  position: string;
  severityRank: number;
  totalInjuryCount: number;
  /** Times this body part has been hurt, the current injury included. */
  recurrenceCount: number;
  seasonProgress: number;
}

export interface ReturnPrediction {
  days: number;
  low: number;
  high: number;
}

export interface ReturnPredictor {
  predict(features: ReturnFeatures): ReturnPrediction;
}

export interface TrainingSample {
  features: ReturnFeatures;
  daysOut: number;
}

export interface TrainOptions {
  /** Ridge penalty on every coefficient except the intercept. */
  lambda?: number;
  now?: Date;
}

export function buildReturnFeatures(
  current: InjuryEvent,
  profile: PlayerInjuryProfile,
  currentWeek: number,
  seasonWeeks = DEFAULT_SEASON_WEEKS,
): ReturnFeatures {
  return {
    bodyPart: current.bodyPart,
    position: current.position,
    severityRank: severityRank(current.status),
    totalInjuryCount: profile.totalInjuryCount,
    recurrenceCount: priorCountForBodyPart(profile, current.bodyPart) + 1,
    seasonProgress: currentWeek / seasonWeeks,
  };
}

/**
 * One sample per closed event with a known recovery, using the features the
 * player had when that injury started.
 */
export function buildTrainingSamples(
  eventsByPlayer: Iterable<readonly InjuryEvent[]>,
  weekOf: (iso: string) => number,
  seasonWeeks = DEFAULT_SEASON_WEEKS,
): TrainingSample[] {
  const samples: TrainingSample[] = [];
  for (const events of eventsByPlayer) {
    const closed = events
      .filter((event) => event.recoveredAt !== null)
      .sort((a, b) => Date.parse(a.firstSeen) - Date.parse(b.firstSeen));

    closed.forEach((event, index) => {
      if (event.daysOut === null) {
        return;
      }
      const profile = buildInjuryProfile(closed.slice(0, index), new Date(event.firstSeen));
      samples.push({
        features: buildReturnFeatures(event, profile, weekOf(event.firstSeen), seasonWeeks),
        daysOut: event.daysOut,
      });
    });
  }
  return samples;
}

const modelFileSchema = z.object({
  version: z.literal(1),
  trainedAt: z.string(),
  sampleCount: z.number().int().nonnegative(),
  bodyParts: z.array(z.string()),
  positions: z.array(z.string()),
  intercept: z.number(),
  weights: z.array(z.number()),
  residualLow: z.number(),
  residualHigh: z.number(),
  mae: z.number().nonnegative(),
});

export type ReturnModelFile = z.infer<typeof modelFileSchema>;

const NUMERIC_FEATURES = 4;

function normalizePosition(value: string): string {
  return value.trim().toUpperCase();
}

/** Ridge regression over one-hot body part and position plus the numeric features. */
export class LinearReturnModel implements ReturnPredictor {
  readonly #file: ReturnModelFile;
  readonly #bodyPartIndex: Map<string, number>;
  readonly #positionIndex: Map<string, number>;

  constructor(file: ReturnModelFile) {
    const expected = file.bodyParts.length + file.positions.length + NUMERIC_FEATURES;
    if (file.weights.length !== expected) {
      throw new Error(`Return model has ${file.weights.length} weights, expected ${expected}`);
    }
    this.#file = file;
    this.#bodyPartIndex = new Map(file.bodyParts.map((part, index) => [part, index]));
    this.#positionIndex = new Map(file.positions.map((position, index) => [position, index]));
  }

  static fromJSON(payload: unknown): LinearReturnModel {
    return new LinearReturnModel(modelFileSchema.parse(payload));
  }

  get mae(): number {
    return this.#file.mae;
  }

  get sampleCount(): number {
    return this.#file.sampleCount;
  }

  encode(features: ReturnFeatures): number[] {
    return encodeFeatures(features, this.#bodyPartIndex, this.#positionIndex);
  }

  predict(features: ReturnFeatures): ReturnPrediction {
    const row = this.encode(features);
    let days = this.#file.intercept;
    row.forEach((value, index) => {
      days += value * this.#file.weights[index];
    });
    return {
      days,
      low: days + this.#file.residualLow,
      high: days + this.#file.residualHigh,
    };
  }

  toJSON(): ReturnModelFile {
    return { ...this.#file, weights: [...this.#file.weights] };
  }
}

function encodeFeatures(
  features: ReturnFeatures,
  bodyParts: Map<string, number>,
  positions: Map<string, number>,
): number[] {
  const row = new Array<number>(bodyParts.size + positions.size + NUMERIC_FEATURES).fill(0);
  const partIndex = bodyParts.get(normalizeBodyPart(features.bodyPart));
  if (partIndex !== undefined) {
    row[partIndex] = 1;
  }
  const positionIndex = positions.get(normalizePosition(features.position));
  if (positionIndex !== undefined) {
    row[bodyParts.size + positionIndex] = 1;
  }
  const offset = bodyParts.size + positions.size;
  row[offset] = features.severityRank;
  row[offset + 1] = features.totalInjuryCount;
  row[offset + 2] = features.recurrenceCount;
  row[offset + 3] = features.seasonProgress;
  return row;
}

/** Gaussian elimination with partial pivoting. */
export function solveLinearSystem(matrix: number[][], rhs: number[]): number[] {
  const n = rhs.length;
  const a = matrix.map((row, i) => [...row, rhs[i]]);

  for (let col = 0; col < n; col += 1) {
    let pivot = col;
    for (let row = col + 1; row < n; row += 1) {
      if (Math.abs(a[row][col]) > Math.abs(a[pivot][col])) {
        pivot = row;
      }
    }
    if (Math.abs(a[pivot][col]) < 1e-12) {
      throw new Error(`Singular system at column ${col}; add regularization or more samples`);
    }
    [a[col], a[pivot]] = [a[pivot], a[col]];

    for (let row = col + 1; row < n; row += 1) {
      const factor = a[row][col] / a[col][col];
      if (factor === 0) continue;
      for (let k = col; k <= n; k += 1) {
        a[row][k] -= factor * a[col][k];
      }
    }
  }

  const solution = new Array<number>(n).fill(0);
  for (let row = n - 1; row >= 0; row -= 1) {
    let sum = a[row][n];
    for (let k = row + 1; k < n; k += 1) {
      sum -= a[row][k] * solution[k];
    }
    solution[row] = sum / a[row][row];
  }
  return solution;
}

export function trainReturnModel(samples: readonly TrainingSample[], options: TrainOptions = {}): LinearReturnModel {
  if (samples.length < MIN_TRAINING_SAMPLES) {
    throw new Error(
      `Need at least ${MIN_TRAINING_SAMPLES} closed injuries with known recovery to train, got ${samples.length}`,
    );
  }
  const lambda = options.lambda ?? 1;

  const bodyParts = [...new Set(samples.map((s) => normalizeBodyPart(s.features.bodyPart)))].sort();
  const positions = [...new Set(samples.map((s) => normalizePosition(s.features.position)))].sort();
  const bodyPartIndex = new Map(bodyParts.map((part, index) => [part, index]));
  const positionIndex = new Map(positions.map((position, index) => [position, index]));

  // Column 0 is the intercept.
  const rows = samples.map((sample) => [1, ...encodeFeatures(sample.features, bodyPartIndex, positionIndex)]);
  const targets = samples.map((sample) => sample.daysOut);
  const width = rows[0].length;

  const gram = Array.from({ length: width }, () => new Array<number>(width).fill(0));
  const moment = new Array<number>(width).fill(0);
  rows.forEach((row, r) => {
    for (let i = 0; i < width; i += 1) {
      moment[i] += row[i] * targets[r];
      for (let j = 0; j < width; j += 1) {
        gram[i][j] += row[i] * row[j];
      }
    }
  });
  for (let i = 1; i < width; i += 1) {
    gram[i][i] += lambda;
  }

  const [intercept, ...weights] = solveLinearSystem(gram, moment);

  const residuals = rows.map((row, r) => {
    let fitted = intercept;
    for (let i = 1; i < width; i += 1) {
      fitted += row[i] * weights[i - 1];
    }
    return targets[r] - fitted;
  });

  return new LinearReturnModel({
    version: 1,
    trainedAt: (options.now ?? new Date()).toISOString(),
    sampleCount: samples.length,
    bodyParts,
    positions,
    intercept,
    weights,
    residualLow: quantile(residuals, 0.1) ?? 0,
    residualHigh: quantile(residuals, 0.9) ?? 0,
    mae: mean(residuals, (value) => Math.abs(value)) ?? 0,
  });
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Returns null (after a warning) when no usable model file exists. */
export async function loadReturnModel(
  filePath: string,
  warn: (message: string) => void = console.warn,
): Promise<LinearReturnModel | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    warn(`Return model unavailable at ${filePath} (${describeError(error)}); using status floors only`);
    return null;
  }
  try {
    return LinearReturnModel.fromJSON(JSON.parse(raw));
  } catch (error) {
    warn(`Return model at ${filePath} is invalid (${describeError(error)}); using status floors only`);
    return null;
  }
}
