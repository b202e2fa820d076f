import { DimensionKey } from "./types/evaluation.types";

export const APP_NAME = "Interview Scorecard";
export const APP_TAGLINE = "Explainable scoring for interview practice.";

export const DEFAULT_SESSION_ID = "default";

// Priority order; also breaks ties when ranking dimensions.
export const DIMENSIONS: ReadonlyArray<DimensionKey> = [
  "clarity",
  "accuracy",
  "completeness",
  "confidence",
];

export const DIMENSION_LABELS: Readonly<Record<DimensionKey, string>> = {
  clarity: "Clarity",
  accuracy: "Technical Accuracy",
  completeness: "Completeness",
  confidence: "Confidence",
};

export const SCORE_MIN = 0;
export const SCORE_MAX = 10;
