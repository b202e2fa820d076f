import { DimensionKey, DimensionScores, Explanation, Suggestion } from "./evaluation.types";

export type DimensionAverages = DimensionScores;

export interface RunningAverages extends DimensionAverages {
  readonly overall: number;
}

export type ReadinessTier = "strong_candidate" | "interview_ready" | "needs_preparation";

export interface ReadinessIndicator {
  tier: ReadinessTier;
  label: string;
  level: "high" | "medium" | "low";
  description: string;
  className: string;
}

export interface DimensionInsight {
  dimension: DimensionKey;
  name: string;
  score: number;
  note: string;
}

export interface InterviewInsights {
  overall: number;
  averages: DimensionAverages;
  readiness: ReadinessIndicator;
  strengths: DimensionInsight[];
  improvements: DimensionInsight[];
  nextSteps: string[];
}

export interface InterviewerInfo {
  name?: string;
  email?: string;
}

export interface ReportResponseEntry {
  questionId: number;
  category: string;
  question: string;
  answer: string;
  scores: DimensionScores;
  explanations: ReadonlyArray<Explanation>;
  suggestions: Readonly<Record<DimensionKey, Suggestion>>;
}

export interface FinalReport {
  appName: string;
  tagline: string;
  generatedAt: string;
  interviewer: InterviewerInfo;
  overallScore: number;
  dimensionAverages: DimensionAverages;
  readinessIndicator: ReadinessIndicator;
  interviewInsights: {
    strengths: DimensionInsight[];
    improvementAreas: DimensionInsight[];
    actionableNextSteps: string[];
  };
  responses: ReportResponseEntry[];
}
