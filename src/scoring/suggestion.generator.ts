import { DIMENSION_LABELS } from "../shared/constants";
import {
  DimensionKey,
  Signals,
  Suggestion,
  SuggestionIcon,
  SuggestionLevel,
} from "../shared/types/evaluation.types";
import { SUGGESTION_LEVELS, pickCeiling } from "./thresholds";

const BRIEF_ANSWER_WORDS = 15;
const REPETITIVE_VOCABULARY_RATIO = 0.4;
const HEAVY_FILLER_COUNT = 3;
const QUOTED_FILLER_LIMIT = 3;
const DEVELOPED_SENTENCE_COUNT = 3;

const LEVEL_ICONS: Readonly<Record<SuggestionLevel, SuggestionIcon>> = {
  low: "warning",
  medium: "tip",
  high: "check",
};

type AdviceBuilder = (signals: Signals) => string;

const LOW_ADVICE: Readonly<Record<DimensionKey, AdviceBuilder>> = {
  clarity: (signals) => {
    if (signals.wordCount < BRIEF_ANSWER_WORDS) {
      return "Your response is very brief. Aim for at least 3–4 complete sentences with a clear beginning, middle, and conclusion.";
    }
    if (signals.uniqueRatio < REPETITIVE_VOCABULARY_RATIO) {
      return "There is noticeable word repetition. Vary your vocabulary and structure thoughts into distinct sentences.";
    }
    return "Improve clarity by organizing your answer into clear sentences. Start with your main point, support with details, then summarize.";
  },
  accuracy: (signals) => {
    if (signals.matchedKeywords.length === 0) {
      return "Your answer did not include key technical terms. Review the topic and incorporate specific terminology and concepts.";
    }
    return `Only ${signals.matchedKeywords.length} relevant term(s) detected. Use more domain-specific vocabulary and reference concrete concepts.`;
  },
  completeness: (signals) => {
    if (signals.wordCount < BRIEF_ANSWER_WORDS) {
      return "Your response is too brief. Expand with at least 3–5 sentences covering different aspects of the question.";
    }
    return "Your answer covers limited ground. Address multiple facets and include specific examples to demonstrate depth.";
  },
  confidence: (signals) => {
    if (signals.fillerCount > HEAVY_FILLER_COUNT) {
      const quoted = signals.fillerWordsFound.slice(0, QUOTED_FILLER_LIMIT).join("', '");
      return `Multiple hesitation phrases detected ('${quoted}'). Practice delivering answers with direct, assertive language.`;
    }
    return "The response conveys uncertainty. Use definitive statements like 'I achieved...' or 'I built...' to project confidence.";
  },
};

const MEDIUM_ADVICE: Readonly<Record<DimensionKey, AdviceBuilder>> = {
  clarity: (signals) => {
    if (signals.sentenceCount < DEVELOPED_SENTENCE_COUNT) {
      return "Your answer is reasonably clear but could benefit from additional sentences to fully develop your point.";
    }
    return "Good clarity foundation. Ensure each sentence transitions smoothly to the next for a cohesive narrative.";
  },
  accuracy: (signals) =>
    `You referenced ${signals.matchedKeywords.length} of ${signals.totalKeywords} expected concepts. Mentioning more domain-specific terms would elevate accuracy.`,
  completeness: (signals) => {
    if (!signals.hasExamples) {
      return "Solid answer overall. Adding a concrete example or use case would make it more complete and convincing.";
    }
    return "Good detail level. Consider expanding on additional angles or trade-offs to demonstrate comprehensive understanding.";
  },
  confidence: (signals) => {
    const firstFiller = signals.fillerWordsFound[0];
    if (signals.fillerCount > 0 && firstFiller !== undefined) {
      return `Your answer is confident overall, but reducing hesitation phrases like '${firstFiller}' would strengthen delivery.`;
    }
    return "Confident tone detected. Adding a personal achievement statement would further reinforce self-assurance.";
  },
};

const HIGH_ADVICE: Readonly<Record<DimensionKey, AdviceBuilder>> = {
  clarity: () =>
    "Excellent clarity! Well-structured and easy to follow. To reach the next level, consider using transition phrases between ideas.",
  accuracy: (signals) =>
    `Strong technical accuracy with ${signals.matchedKeywords.length} relevant concepts. For even greater impact, relate concepts to real-world applications.`,
  completeness: (signals) => {
    if (signals.hasExamples) {
      return "Very thorough response with examples included. Maintain this standard of completeness across all answers.";
    }
    return "Comprehensive answer. Adding a brief example would make it truly outstanding.";
  },
  confidence: (signals) => {
    if (signals.assertiveFound.length > 0) {
      return "Highly confident delivery with assertive language. This projects professionalism, so keep this approach.";
    }
    return "Strong confident tone. Consider adding quantified achievements to amplify impact.";
  },
};

const ADVICE_BY_LEVEL: Readonly<Record<SuggestionLevel, Readonly<Record<DimensionKey, AdviceBuilder>>>> = {
  low: LOW_ADVICE,
  medium: MEDIUM_ADVICE,
  high: HIGH_ADVICE,
};

export function resolveSuggestionLevel(score: number): SuggestionLevel {
  return pickCeiling(SUGGESTION_LEVELS, score, "high");
}

export function generateSuggestion(
  score: number,
  dimension: DimensionKey,
  signals: Signals,
): Suggestion {
  const level = resolveSuggestionLevel(score);
  return Object.freeze({
    dimension,
    label: DIMENSION_LABELS[dimension],
    score,
    level,
    icon: LEVEL_ICONS[level],
    text: ADVICE_BY_LEVEL[level][dimension](signals),
  });
}
