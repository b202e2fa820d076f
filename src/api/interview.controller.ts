import { Request, Response, Router } from "express";
import { Logger, logContext } from "../config/logger";
import { InterviewSessionService } from "../interviews/interview-session.service";
import { DEFAULT_SESSION_ID } from "../shared/constants";
import { EvaluationErrorCode, isEvaluationError } from "../shared/errors";
import { InterviewerInfo } from "../shared/types/insights.types";

interface InterviewControllerDeps {
  interviewService: InterviewSessionService;
  logger: Logger;
}

const ERROR_STATUS: Record<EvaluationErrorCode, number> = {
  empty_answer: 400,
  question_not_found: 404,
  empty_input: 404,
};

export function buildInterviewController(deps: InterviewControllerDeps): Router {
  const router = Router();

  router.get("/questions", (_request: Request, response: Response) => {
    const questions = deps.interviewService.listQuestions();
    response.status(200).json({ questions, total: questions.length });
  });

  router.post("/evaluate", (request: Request, response: Response) => {
    const body = readBody(request);
    if (!body) {
      response.status(400).json({ ok: false, error: "No JSON body provided", code: "invalid_body" });
      return;
    }

    const sessionId = readSessionId(body.sessionId);
    handle(deps, request, response, { session_id: sessionId }, () => {
      const answer = typeof body.answer === "string" ? body.answer : "";
      const outcome = deps.interviewService.submitAnswer({
        sessionId,
        questionId: body.questionId,
        answer,
      });
      const { result } = outcome;
      return {
        questionId: result.questionId,
        scores: result.scores,
        explanations: result.explanations,
        suggestions: result.suggestions,
        signals: {
          wordCount: result.signals.wordCount,
          sentenceCount: result.signals.sentenceCount,
          matchedKeywords: result.signals.matchedKeywords,
          fillerWordsFound: result.signals.fillerWordsFound,
          hasExamples: result.signals.hasExamples,
          isGibberish: result.signals.isGibberish,
          realWordRatio: result.signals.realWordRatio,
        },
        runningAverages: outcome.runningAverages,
        readiness: outcome.readiness,
      };
    });
  });

  router.get("/insights", (request: Request, response: Response) => {
    const sessionId = readSessionId(request.query.sessionId);
    handle(deps, request, response, { session_id: sessionId }, () =>
      deps.interviewService.getInsights(sessionId),
    );
  });

  router.post("/final-report", (request: Request, response: Response) => {
    const body = readBody(request) ?? {};
    const sessionId = readSessionId(body.sessionId);
    handle(deps, request, response, { session_id: sessionId }, () =>
      deps.interviewService.buildFinalReport(sessionId, readInterviewer(body.interviewer)),
    );
  });

  router.post("/reset", (request: Request, response: Response) => {
    const body = readBody(request) ?? {};
    const sessionId = readSessionId(body.sessionId);
    handle(deps, request, response, { session_id: sessionId }, () => {
      deps.interviewService.reset(sessionId);
      return { ok: true, message: "Session reset successfully" };
    });
  });

  return router;
}

function handle(
  deps: InterviewControllerDeps,
  request: Request,
  response: Response,
  context: { session_id: string },
  action: () => unknown,
): void {
  const startedAt = Date.now();
  try {
    const payload = action();
    response.status(200).json(payload);
    logContext(deps.logger, "debug", "http.request", {
      ...context,
      method: request.method,
      route: request.path,
      status_code: 200,
      latency_ms: Date.now() - startedAt,
      ok: true,
    });
  } catch (error) {
    if (isEvaluationError(error)) {
      const status = ERROR_STATUS[error.code];
      logContext(deps.logger, "info", "http.request.rejected", {
        ...context,
        method: request.method,
        route: request.path,
        status_code: status,
        ok: false,
        error_code: error.code,
      });
      response.status(status).json({ ok: false, error: error.message, code: error.code });
      return;
    }

    logContext(
      deps.logger,
      "error",
      "http.request.failed",
      {
        ...context,
        method: request.method,
        route: request.path,
        status_code: 500,
        ok: false,
      },
      { error: error instanceof Error ? error.message : "Unknown error" },
    );
    response.status(500).json({ ok: false, error: "Internal server error", code: "internal_error" });
  }
}

function readBody(request: Request): Record<string, unknown> | null {
  const body: unknown = request.body;
  return isRecord(body) ? body : null;
}

function readSessionId(value: unknown): string {
  if (typeof value === "string" && value.trim()) {
    return value.trim();
  }
  return DEFAULT_SESSION_ID;
}

function readInterviewer(value: unknown): InterviewerInfo {
  if (!isRecord(value)) {
    return {};
  }
  const interviewer: InterviewerInfo = {};
  const { name, email } = value;
  if (typeof name === "string" && name.trim()) {
    interviewer.name = name.trim();
  }
  if (typeof email === "string" && email.trim()) {
    interviewer.email = email.trim();
  }
  return interviewer;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
