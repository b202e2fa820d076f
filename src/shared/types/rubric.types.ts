export interface QuestionSpec {
  readonly id: number;
  readonly text: string;
  readonly category: string;
  readonly keywords: ReadonlyArray<string>;
}

export interface QuestionSummary {
  id: number;
  text: string;
  category: string;
}

export interface PhraseLists {
  readonly fillers: ReadonlyArray<string>;
  readonly assertive: ReadonlyArray<string>;
  readonly examples: ReadonlyArray<string>;
}

export interface Rubric {
  readonly questions: ReadonlyArray<QuestionSpec>;
  readonly phrases: PhraseLists;
}
