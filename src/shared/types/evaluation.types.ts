export type DimensionKey = "clarity" | "accuracy" | "completeness" | "confidence";

export interface Signals {
  readonly wordCount: number;
  readonly sentenceCount: number;
  readonly uniqueRatio: number;
  readonly matchedKeywords: ReadonlyArray<string>;
  readonly totalKeywords: number;
  readonly keywordMatchRatio: number;
  readonly fillerWordsFound: ReadonlyArray<string>;
  readonly fillerCount: number;
  readonly assertiveFound: ReadonlyArray<string>;
  readonly hasExamples: boolean;
  readonly startsWithCapital: boolean;
  readonly avgSentenceLen: number;
  readonly realWordRatio: number;
  readonly isGibberish: boolean;
}

export type DimensionScores = Readonly<Record<DimensionKey, number>>;

export interface Explanation {
  readonly dimension: DimensionKey;
  readonly label: string;
  readonly score: number;
  readonly text: string;
  readonly signalsDetected: ReadonlyArray<string>;
}

export type SuggestionLevel = "low" | "medium" | "high";

export type SuggestionIcon = "warning" | "tip" | "check";

export interface Suggestion {
  readonly dimension: DimensionKey;
  readonly label: string;
  readonly score: number;
  readonly level: SuggestionLevel;
  readonly icon: SuggestionIcon;
  readonly text: string;
}

export interface AnswerResult {
  readonly questionId: number;
  readonly answer: string;
  readonly signals: Signals;
  readonly scores: DimensionScores;
  readonly explanations: ReadonlyArray<Explanation>;
  readonly suggestions: Readonly<Record<DimensionKey, Suggestion>>;
}
