import { Logger } from "../config/logger";
import { buildFinalReport } from "../insights/final-report.builder";
import {
  computeInterviewInsights,
  computeRunningAverages,
  resolveReadiness,
} from "../insights/aggregation.engine";
import { QuestionBank } from "../rubric/question-bank";
import { evaluateAnswer } from "../scoring/answer-evaluator";
import { EmptyAnswerError, EmptyInputError, QuestionNotFoundError } from "../shared/errors";
import { AnswerResult } from "../shared/types/evaluation.types";
import {
  FinalReport,
  InterviewInsights,
  InterviewerInfo,
  ReadinessIndicator,
  RunningAverages,
} from "../shared/types/insights.types";
import { QuestionSummary } from "../shared/types/rubric.types";
import { SessionStore } from "../storage/session.store";

export interface SubmitAnswerInput {
  sessionId: string;
  questionId: unknown;
  answer: string;
}

export interface SubmitAnswerOutcome {
  result: AnswerResult;
  runningAverages: RunningAverages;
  readiness: ReadinessIndicator;
}

export class InterviewSessionService {
  constructor(
    private readonly questionBank: QuestionBank,
    private readonly store: SessionStore,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  listQuestions(): QuestionSummary[] {
    return this.questionBank.listSummaries();
  }

  submitAnswer(input: SubmitAnswerInput): SubmitAnswerOutcome {
    const answer = input.answer.trim();
    if (!answer) {
      throw new EmptyAnswerError();
    }

    const questionId = toQuestionId(input.questionId);
    if (questionId === null) {
      throw new QuestionNotFoundError(input.questionId);
    }
    const question = this.questionBank.getById(questionId);

    const result = evaluateAnswer(answer, question, this.questionBank.phrases);
    this.store.append(input.sessionId, result);

    const runningAverages = computeRunningAverages(this.store.get(input.sessionId));
    this.logger.info("answer.evaluated", {
      sessionId: input.sessionId,
      questionId,
      wordCount: result.signals.wordCount,
      isGibberish: result.signals.isGibberish,
      scores: result.scores,
      runningOverall: runningAverages.overall,
    });

    return {
      result,
      runningAverages,
      readiness: resolveReadiness(runningAverages.overall),
    };
  }

  getInsights(sessionId: string): InterviewInsights {
    return computeInterviewInsights(this.requireAnswers(sessionId));
  }

  buildFinalReport(sessionId: string, interviewer: InterviewerInfo): FinalReport {
    const results = this.requireAnswers(sessionId);
    const report = buildFinalReport({
      results,
      interviewer,
      resolveQuestion: (questionId) => this.questionBank.getById(questionId),
      generatedAt: this.now(),
    });
    this.logger.info("report.generated", {
      sessionId,
      answers: results.length,
      overallScore: report.overallScore,
      readiness: report.readinessIndicator.tier,
    });
    return report;
  }

  reset(sessionId: string): void {
    this.store.reset(sessionId);
    this.logger.info("session.reset", { sessionId });
  }

  private requireAnswers(sessionId: string): ReadonlyArray<AnswerResult> {
    const results = this.store.get(sessionId);
    if (results.length === 0) {
      throw new EmptyInputError("No interview data found for this session");
    }
    return results;
  }
}

function toQuestionId(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return null;
}
