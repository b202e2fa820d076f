import { DIMENSIONS, DIMENSION_LABELS } from "../shared/constants";
import { EmptyInputError } from "../shared/errors";
import { AnswerResult, DimensionKey } from "../shared/types/evaluation.types";
import {
  DimensionAverages,
  DimensionInsight,
  InterviewInsights,
  ReadinessIndicator,
  ReadinessTier,
  RunningAverages,
} from "../shared/types/insights.types";
import { mean, round1, roundTo } from "../shared/utils/math";
import {
  IMPROVEMENT_MAX_AVERAGE,
  IMPROVEMENT_WEAK_AVERAGE,
  READINESS_TIERS,
  SHORT_ANSWER_AVG_WORDS,
  STRENGTH_MIN_AVERAGE,
  STRENGTH_STRONG_AVERAGE,
  pickThreshold,
} from "../scoring/thresholds";

const READINESS: Readonly<Record<ReadinessTier, ReadinessIndicator>> = {
  strong_candidate: {
    tier: "strong_candidate",
    label: "Strong Candidate",
    level: "high",
    description: "Demonstrates excellent interview skills across all dimensions.",
    className: "readiness-high",
  },
  interview_ready: {
    tier: "interview_ready",
    label: "Interview Ready",
    level: "medium",
    description: "Solid performance with room for targeted improvement.",
    className: "readiness-medium",
  },
  needs_preparation: {
    tier: "needs_preparation",
    label: "Needs Preparation",
    level: "low",
    description: "Additional practice recommended before proceeding to interviews.",
    className: "readiness-low",
  },
};

const STRENGTH_NOTES: Readonly<Record<DimensionKey, { strong: string; solid: string }>> = {
  clarity: {
    strong: "Responses are well-structured and easy to follow.",
    solid: "Answers show reasonable clarity in communication.",
  },
  accuracy: {
    strong: "Demonstrates strong domain knowledge with relevant terminology.",
    solid: "Shows adequate understanding of technical concepts.",
  },
  completeness: {
    strong: "Provides thorough, multi-faceted responses with supporting detail.",
    solid: "Covers the essential points in each answer.",
  },
  confidence: {
    strong: "Communicates with conviction and assertive, professional language.",
    solid: "Maintains a generally confident tone throughout.",
  },
};

const IMPROVEMENT_NOTES: Readonly<Record<DimensionKey, { weak: string; moderate: string }>> = {
  clarity: {
    weak: "Needs significantly more structure. Practice organizing thoughts before responding.",
    moderate: "Could benefit from more polished sentence transitions and flow.",
  },
  accuracy: {
    weak: "Technical vocabulary is lacking. Review core concepts for the target role.",
    moderate: "Incorporating more specific terms and concepts would strengthen responses.",
  },
  completeness: {
    weak: "Answers are too brief. Practice expanding with examples and multiple perspectives.",
    moderate: "Adding concrete examples and covering more angles would improve depth.",
  },
  confidence: {
    weak: "Excessive use of hedging language. Practice direct, assertive phrasing.",
    moderate: "Minor hesitation phrases can be eliminated for a more polished delivery.",
  },
};

const REMEDIATION_STEPS: Readonly<Record<DimensionKey, string>> = {
  clarity:
    "Practice the STAR method (Situation, Task, Action, Result) to structure answers more clearly.",
  accuracy:
    "Review key technical concepts for your target role and practice using specific terminology.",
  completeness:
    "Before answering, mentally outline 2–3 points to cover, then expand each with detail.",
  confidence:
    "Record yourself answering practice questions and identify filler words to eliminate.",
};

const REINFORCEMENT_STEPS: Readonly<Record<DimensionKey, string>> = {
  clarity: "Your communication clarity is a strength. Leverage it in presentations and demos.",
  accuracy: "Your technical knowledge is solid. Consider deepening into specialized areas.",
  completeness: "Your thoroughness stands out. Channel this skill into technical documentation.",
  confidence: "Your confident delivery is impressive. Consider mentoring peers on interview prep.",
};

export interface RankedDimension {
  dimension: DimensionKey;
  score: number;
}

export function computeDimensionAverages(results: ReadonlyArray<AnswerResult>): DimensionAverages {
  assertNotEmpty(results);
  return {
    clarity: round1(mean(results.map((result) => result.scores.clarity))),
    accuracy: round1(mean(results.map((result) => result.scores.accuracy))),
    completeness: round1(mean(results.map((result) => result.scores.completeness))),
    confidence: round1(mean(results.map((result) => result.scores.confidence))),
  };
}

export function computeRunningAverages(results: ReadonlyArray<AnswerResult>): RunningAverages {
  const averages = computeDimensionAverages(results);
  return { ...averages, overall: overallOf(averages) };
}

export function resolveReadiness(overall: number): ReadinessIndicator {
  const tier = pickThreshold(READINESS_TIERS, overall, "needs_preparation");
  return { ...READINESS[tier] };
}

/**
 * Orders dimensions by average, highest first. Equal averages keep the fixed
 * priority order (clarity, accuracy, completeness, confidence).
 */
export function rankDimensions(averages: DimensionAverages): RankedDimension[] {
  return DIMENSIONS.map((dimension, index) => ({ dimension, score: averages[dimension], index }))
    .sort((left, right) => right.score - left.score || left.index - right.index)
    .map(({ dimension, score }) => ({ dimension, score }));
}

export function computeInterviewInsights(results: ReadonlyArray<AnswerResult>): InterviewInsights {
  const averages = computeDimensionAverages(results);
  const overall = overallOf(averages);
  const ranked = rankDimensions(averages);

  const strengths = ranked
    .slice(0, 2)
    .filter((entry) => entry.score >= STRENGTH_MIN_AVERAGE)
    .map((entry) => toInsight(entry, strengthNote(entry)));
  const improvements = ranked
    .slice(-2)
    .filter((entry) => entry.score < IMPROVEMENT_MAX_AVERAGE)
    .map((entry) => toInsight(entry, improvementNote(entry)));

  return {
    overall,
    averages,
    readiness: resolveReadiness(overall),
    strengths,
    improvements,
    nextSteps: buildNextSteps(ranked, results),
  };
}

function buildNextSteps(
  ranked: ReadonlyArray<RankedDimension>,
  results: ReadonlyArray<AnswerResult>,
): string[] {
  const strongest = ranked[0];
  const lowest = ranked[ranked.length - 1];
  // Among tied lowest averages the highest-priority dimension is remediated.
  const weakest = lowest && ranked.find((entry) => entry.score === lowest.score);
  if (!strongest || !weakest) {
    throw new EmptyInputError("No dimensions to rank");
  }

  const avgWords = roundTo(mean(results.map((result) => result.signals.wordCount)), 0);
  const anyExamples = results.some((result) => result.signals.hasExamples);

  let coverageStep: string;
  if (avgWords < SHORT_ANSWER_AVG_WORDS) {
    coverageStep = `Your average response length is ${avgWords} words. Aim for 50–100 words per answer for more thorough coverage.`;
  } else if (!anyExamples) {
    coverageStep =
      "None of your answers included specific examples. Practice incorporating real experiences to make responses more compelling.";
  } else {
    coverageStep =
      "Continue preparing with mock interviews to build consistency across all dimensions.";
  }

  return [
    REMEDIATION_STEPS[weakest.dimension],
    coverageStep,
    REINFORCEMENT_STEPS[strongest.dimension],
  ];
}

function strengthNote(entry: RankedDimension): string {
  const notes = STRENGTH_NOTES[entry.dimension];
  return entry.score >= STRENGTH_STRONG_AVERAGE ? notes.strong : notes.solid;
}

function improvementNote(entry: RankedDimension): string {
  const notes = IMPROVEMENT_NOTES[entry.dimension];
  return entry.score < IMPROVEMENT_WEAK_AVERAGE ? notes.weak : notes.moderate;
}

function toInsight(entry: RankedDimension, note: string): DimensionInsight {
  return {
    dimension: entry.dimension,
    name: DIMENSION_LABELS[entry.dimension],
    score: entry.score,
    note,
  };
}

function overallOf(averages: DimensionAverages): number {
  return round1(mean(DIMENSIONS.map((dimension) => averages[dimension])));
}

function assertNotEmpty(results: ReadonlyArray<AnswerResult>): void {
  if (results.length === 0) {
    throw new EmptyInputError();
  }
}
