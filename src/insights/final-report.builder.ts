import { APP_NAME, APP_TAGLINE } from "../shared/constants";
import { AnswerResult } from "../shared/types/evaluation.types";
import { FinalReport, InterviewerInfo, ReportResponseEntry } from "../shared/types/insights.types";
import { QuestionSpec } from "../shared/types/rubric.types";
import { computeInterviewInsights } from "./aggregation.engine";

export interface BuildFinalReportInput {
  results: ReadonlyArray<AnswerResult>;
  interviewer: InterviewerInfo;
  resolveQuestion: (questionId: number) => QuestionSpec;
  generatedAt: Date;
}

export function buildFinalReport(input: BuildFinalReportInput): FinalReport {
  const insights = computeInterviewInsights(input.results);

  const responses: ReportResponseEntry[] = input.results.map((result) => {
    const question = input.resolveQuestion(result.questionId);
    return {
      questionId: result.questionId,
      category: question.category,
      question: question.text,
      answer: result.answer,
      scores: result.scores,
      explanations: result.explanations,
      suggestions: result.suggestions,
    };
  });

  return {
    appName: APP_NAME,
    tagline: APP_TAGLINE,
    generatedAt: input.generatedAt.toISOString(),
    interviewer: input.interviewer,
    overallScore: insights.overall,
    dimensionAverages: insights.averages,
    readinessIndicator: insights.readiness,
    interviewInsights: {
      strengths: insights.strengths,
      improvementAreas: insights.improvements,
      actionableNextSteps: insights.nextSteps,
    },
    responses,
  };
}
