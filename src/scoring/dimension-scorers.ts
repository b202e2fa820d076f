import { SCORE_MAX, SCORE_MIN } from "../shared/constants";
import { DimensionScores, Signals } from "../shared/types/evaluation.types";
import { clampToRange, round1 } from "../shared/utils/math";
import {
  ACCURACY_BASELINE,
  ACCURACY_BASELINE_FLOOR,
  ACCURACY_KEYWORD_BONUS_MIN,
  CLARITY_IDEAL_WORDS,
  CLARITY_REPETITION_RATIO,
  CLARITY_SENTENCE_BONUS,
  CLARITY_SHORT_PENALTY,
  CLARITY_WORD_BONUS,
  COMPLETENESS_SENTENCE_BONUS,
  COMPLETENESS_SHORT_PENALTY,
  COMPLETENESS_WORD_BONUS,
  CONFIDENCE_ASSERTIVE_CAP,
  CONFIDENCE_ASSERTIVE_STEP,
  CONFIDENCE_FILLER_CAP,
  CONFIDENCE_FILLER_STEP,
  CONFIDENCE_REAL_WORD_RATIO,
  CONFIDENCE_SHORT_PENALTY,
  CONFIDENCE_WORD_BONUS,
  pickThreshold,
} from "./thresholds";

const CLARITY_BASELINE = 5;
const COMPLETENESS_BASELINE = 3;
const CONFIDENCE_BASELINE = 5;

/** Sentence structure, answer length and vocabulary variety. */
export function scoreClarity(signals: Signals): number {
  if (signals.isGibberish) {
    return round1(Math.min(1, signals.realWordRatio * 2));
  }

  let score = CLARITY_BASELINE;
  score += pickThreshold(CLARITY_SENTENCE_BONUS, signals.sentenceCount, 0);

  const wordCount = signals.wordCount;
  if (wordCount >= CLARITY_IDEAL_WORDS.min && wordCount <= CLARITY_IDEAL_WORDS.max) {
    score += CLARITY_IDEAL_WORDS.bonus;
  } else {
    score += pickThreshold(CLARITY_WORD_BONUS, wordCount, CLARITY_SHORT_PENALTY);
  }

  if (signals.startsWithCapital) {
    score += 0.5;
  }
  if (signals.uniqueRatio < CLARITY_REPETITION_RATIO) {
    score -= 2;
  }

  return finalizeScore(score);
}

/** Coverage of the question's expected concepts. */
export function scoreAccuracy(signals: Signals): number {
  if (signals.isGibberish) {
    return 0;
  }

  let score = pickThreshold(ACCURACY_BASELINE, signals.keywordMatchRatio, ACCURACY_BASELINE_FLOOR);
  if (signals.matchedKeywords.length >= ACCURACY_KEYWORD_BONUS_MIN) {
    score = Math.min(SCORE_MAX, score + 1);
  }

  return finalizeScore(score);
}

/** Depth and breadth: length, sentence variety, concrete examples. */
export function scoreCompleteness(signals: Signals): number {
  if (signals.isGibberish) {
    return 0;
  }

  let score = COMPLETENESS_BASELINE;
  score += pickThreshold(COMPLETENESS_WORD_BONUS, signals.wordCount, COMPLETENESS_SHORT_PENALTY);
  score += pickThreshold(COMPLETENESS_SENTENCE_BONUS, signals.sentenceCount, 0);
  if (signals.hasExamples) {
    score += 0.5;
  }

  return finalizeScore(score);
}

/** Assertiveness against hedging. */
export function scoreConfidence(signals: Signals): number {
  if (signals.isGibberish) {
    return 0;
  }

  let score = CONFIDENCE_BASELINE;
  score += pickThreshold(CONFIDENCE_WORD_BONUS, signals.wordCount, CONFIDENCE_SHORT_PENALTY);
  score -= Math.min(signals.fillerCount * CONFIDENCE_FILLER_STEP, CONFIDENCE_FILLER_CAP);
  score += Math.min(
    signals.assertiveFound.length * CONFIDENCE_ASSERTIVE_STEP,
    CONFIDENCE_ASSERTIVE_CAP,
  );
  if (signals.realWordRatio >= CONFIDENCE_REAL_WORD_RATIO) {
    score += 0.5;
  }

  return finalizeScore(score);
}

export function computeScores(signals: Signals): DimensionScores {
  return Object.freeze({
    clarity: scoreClarity(signals),
    accuracy: scoreAccuracy(signals),
    completeness: scoreCompleteness(signals),
    confidence: scoreConfidence(signals),
  });
}

function finalizeScore(score: number): number {
  return round1(clampToRange(score, SCORE_MIN, SCORE_MAX));
}
