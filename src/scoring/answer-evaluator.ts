import { DIMENSIONS } from "../shared/constants";
import { AnswerResult, DimensionKey, Suggestion } from "../shared/types/evaluation.types";
import { PhraseLists, QuestionSpec } from "../shared/types/rubric.types";
import { computeScores } from "./dimension-scorers";
import { generateExplanation } from "./explanation.generator";
import { extractSignals } from "./signal-extractor";
import { generateSuggestion } from "./suggestion.generator";

export function evaluateAnswer(
  answer: string,
  question: QuestionSpec,
  phrases: PhraseLists,
): AnswerResult {
  const signals = extractSignals(answer, question, phrases);
  const scores = computeScores(signals);

  const explanations = DIMENSIONS.map((dimension) =>
    generateExplanation(dimension, scores[dimension], signals),
  );
  const suggestions: Record<DimensionKey, Suggestion> = {
    clarity: generateSuggestion(scores.clarity, "clarity", signals),
    accuracy: generateSuggestion(scores.accuracy, "accuracy", signals),
    completeness: generateSuggestion(scores.completeness, "completeness", signals),
    confidence: generateSuggestion(scores.confidence, "confidence", signals),
  };

  return Object.freeze({
    questionId: question.id,
    answer,
    signals,
    scores,
    explanations: Object.freeze(explanations),
    suggestions: Object.freeze(suggestions),
  });
}
