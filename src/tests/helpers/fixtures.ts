import { Logger } from "../../config/logger";
import { QuestionBank } from "../../rubric/question-bank";
import { loadRubric } from "../../rubric/rubric.loader";
import { generateSuggestion } from "../../scoring/suggestion.generator";
import { AnswerResult, DimensionScores, Signals } from "../../shared/types/evaluation.types";

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export interface RecordedLog {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  meta?: Record<string, unknown>;
}

export function createRecordingLogger(): { logger: Logger; entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];
  return {
    entries,
    logger: {
      debug(message, meta) {
        entries.push({ level: "debug", message, meta });
      },
      info(message, meta) {
        entries.push({ level: "info", message, meta });
      },
      warn(message, meta) {
        entries.push({ level: "warn", message, meta });
      },
      error(message, meta) {
        entries.push({ level: "error", message, meta });
      },
    },
  };
}

export function loadQuestionBank(): QuestionBank {
  return new QuestionBank(loadRubric());
}

// Question 4 (teamwork): 95 words, 5 sentences, 16 of 17 keywords.
export const STRONG_TEAMWORK_ANSWER =
  "On my last project our team worked in an agile scrum process with a shared sprint board. " +
  "I believe clear communication matters most, so I set up a daily meeting and asked for honest feedback after every code review. " +
  "For example, when two engineers had a conflict about the database design, I helped them reach a resolution by pairing together on a prototype. " +
  "We agreed on the design before the deadline and everyone took responsibility for the result. " +
  "I know that strong support inside a team makes delivery faster and keeps morale high for everyone.";

// Question 2 (problem solving): 23 words, 3 sentences.
export const SHORT_BUGFIX_ANSWER =
  "I fixed a slow query by adding an index. The problem was a full table scan. After the fix the page loaded quickly.";

export const HEDGING_ANSWER = "I think maybe I kind of built something, I guess.";

export const NONSENSE_ANSWER = "xkcd qwrt zxcv";

export function makeSignals(overrides: Partial<Signals> = {}): Signals {
  return {
    wordCount: 20,
    sentenceCount: 2,
    uniqueRatio: 0.8,
    matchedKeywords: [],
    totalKeywords: 10,
    keywordMatchRatio: 0,
    fillerWordsFound: [],
    fillerCount: 0,
    assertiveFound: [],
    hasExamples: false,
    startsWithCapital: true,
    avgSentenceLen: 10,
    realWordRatio: 0.9,
    isGibberish: false,
    ...overrides,
  };
}

export function makeResult(
  scores: DimensionScores,
  options: { questionId?: number; wordCount?: number; hasExamples?: boolean } = {},
): AnswerResult {
  const signals = makeSignals({
    wordCount: options.wordCount ?? 60,
    hasExamples: options.hasExamples ?? false,
  });
  return {
    questionId: options.questionId ?? 1,
    answer: "placeholder answer",
    signals,
    scores,
    explanations: [],
    suggestions: {
      clarity: generateSuggestion(scores.clarity, "clarity", signals),
      accuracy: generateSuggestion(scores.accuracy, "accuracy", signals),
      completeness: generateSuggestion(scores.completeness, "completeness", signals),
      confidence: generateSuggestion(scores.confidence, "confidence", signals),
    },
  };
}
