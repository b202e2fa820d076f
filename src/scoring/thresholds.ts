import { SuggestionLevel } from "../shared/types/evaluation.types";
import { ReadinessTier } from "../shared/types/insights.types";

/** Lower-bound breakpoint: matches any input `>= min`. */
export interface Threshold<T> {
  readonly min: number;
  readonly value: T;
}

/** Upper-bound breakpoint: matches any input `<= max`. */
export interface Ceiling<T> {
  readonly max: number;
  readonly value: T;
}

export type ThresholdTable<T> = ReadonlyArray<Threshold<T>>;
export type CeilingTable<T> = ReadonlyArray<Ceiling<T>>;

/**
 * Walks a table ordered by descending `min` and returns the first entry the
 * input reaches, or the fallback when it reaches none.
 */
export function pickThreshold<T>(table: ThresholdTable<T>, input: number, fallback: T): T {
  for (const entry of table) {
    if (input >= entry.min) {
      return entry.value;
    }
  }
  return fallback;
}

/** Same walk for tables ordered by ascending `max`. */
export function pickCeiling<T>(table: CeilingTable<T>, input: number, fallback: T): T {
  for (const entry of table) {
    if (input <= entry.max) {
      return entry.value;
    }
  }
  return fallback;
}

export const ACCURACY_BASELINE: ThresholdTable<number> = [
  { min: 0.5, value: 9 },
  { min: 0.35, value: 7.5 },
  { min: 0.25, value: 6 },
  { min: 0.15, value: 4.5 },
  { min: 0.05, value: 3 },
];
export const ACCURACY_BASELINE_FLOOR = 1.5;
export const ACCURACY_KEYWORD_BONUS_MIN = 6;

export const CLARITY_SENTENCE_BONUS: ThresholdTable<number> = [
  { min: 3, value: 2 },
  { min: 2, value: 1 },
];
export const CLARITY_IDEAL_WORDS = { min: 30, max: 200, bonus: 2 } as const;
export const CLARITY_WORD_BONUS: ThresholdTable<number> = [{ min: 15, value: 1 }];
export const CLARITY_SHORT_PENALTY = -2;
export const CLARITY_REPETITION_RATIO = 0.4;

export const COMPLETENESS_WORD_BONUS: ThresholdTable<number> = [
  { min: 80, value: 3 },
  { min: 50, value: 2.5 },
  { min: 30, value: 1.5 },
  { min: 15, value: 0.5 },
];
export const COMPLETENESS_SHORT_PENALTY = -1;
export const COMPLETENESS_SENTENCE_BONUS: ThresholdTable<number> = [
  { min: 5, value: 2.5 },
  { min: 3, value: 1.5 },
  { min: 2, value: 0.5 },
];

export const CONFIDENCE_WORD_BONUS: ThresholdTable<number> = [
  { min: 40, value: 2 },
  { min: 20, value: 1.5 },
  { min: 10, value: 0.5 },
];
export const CONFIDENCE_SHORT_PENALTY = -2;
export const CONFIDENCE_FILLER_STEP = 0.8;
export const CONFIDENCE_FILLER_CAP = 4;
export const CONFIDENCE_ASSERTIVE_STEP = 0.5;
export const CONFIDENCE_ASSERTIVE_CAP = 2;
export const CONFIDENCE_REAL_WORD_RATIO = 0.8;

export type NarrativeBand = "strong" | "adequate" | "weak";

export const NARRATIVE_BANDS: ThresholdTable<NarrativeBand> = [
  { min: 7, value: "strong" },
  { min: 4, value: "adequate" },
];

export const SUGGESTION_LEVELS: CeilingTable<SuggestionLevel> = [
  { max: 3, value: "low" },
  { max: 6, value: "medium" },
];

export const READINESS_TIERS: ThresholdTable<ReadinessTier> = [
  { min: 7.5, value: "strong_candidate" },
  { min: 5, value: "interview_ready" },
];

export const STRENGTH_MIN_AVERAGE = 5;
export const STRENGTH_STRONG_AVERAGE = 7;
export const IMPROVEMENT_MAX_AVERAGE = 8;
export const IMPROVEMENT_WEAK_AVERAGE = 4;
export const SHORT_ANSWER_AVG_WORDS = 40;
