import express, { Express, NextFunction, Request, Response } from "express";
import { buildInterviewController } from "./api/interview.controller";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { InterviewSessionService } from "./interviews/interview-session.service";
import { QuestionBank } from "./rubric/question-bank";
import { loadRubric } from "./rubric/rubric.loader";
import { Rubric } from "./shared/types/rubric.types";
import { InMemorySessionStore, SessionStore } from "./storage/session.store";
import { renderPracticePage } from "./web/practice.page";

export interface AppContext {
  app: Express;
  logger: Logger;
}

export interface CreateAppOverrides {
  logger?: Logger;
  rubric?: Rubric;
  sessionStore?: SessionStore;
  now?: () => Date;
}

export function createApp(env: EnvConfig, overrides: CreateAppOverrides = {}): AppContext {
  const logger =
    overrides.logger ??
    createLogger({
      minLevel: env.logLevel,
      webhook: {
        enabled: env.logWebhookEnabled,
        url: env.logWebhookUrl,
        minLevel: env.logWebhookLevel,
        ratePerMinute: env.logWebhookRatePerMin,
        batchMs: env.logWebhookBatchMs,
      },
    });

  const rubric = overrides.rubric ?? loadRubric(env.rubricPath);
  const questionBank = new QuestionBank(rubric);
  const sessionStore = overrides.sessionStore ?? new InMemorySessionStore();
  const interviewService = new InterviewSessionService(
    questionBank,
    sessionStore,
    logger,
    overrides.now,
  );
  logger.info("Rubric loaded", {
    questions: rubric.questions.length,
    fillers: rubric.phrases.fillers.length,
    assertive: rubric.phrases.assertive.length,
    examples: rubric.phrases.examples.length,
  });

  const app = express();
  app.use(express.json({ limit: env.jsonBodyLimit }));

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  app.get("/", (_request: Request, response: Response) => {
    response.status(200).type("html").send(renderPracticePage());
  });

  app.use("/api", buildInterviewController({ interviewService, logger }));

  app.use((_request: Request, response: Response) => {
    response.status(404).json({ ok: false, error: "Not found", code: "not_found" });
  });

  app.use((error: unknown, request: Request, response: Response, _next: NextFunction) => {
    if (isBodyParseError(error)) {
      logger.debug("Rejected request body", { route: request.path, type: error.type });
      response.status(error.status).json({ ok: false, error: "Invalid JSON body", code: "invalid_body" });
      return;
    }
    logger.error("Unhandled request error", {
      route: request.path,
      error: error instanceof Error ? error.message : "Unknown error",
    });
    response.status(500).json({ ok: false, error: "Internal server error", code: "internal_error" });
  });

  return { app, logger };
}

function isBodyParseError(error: unknown): error is { type: string; status: number } {
  if (typeof error !== "object" || error === null) {
    return false;
  }
  const type: unknown = Reflect.get(error, "type");
  const status: unknown = Reflect.get(error, "status");
  return (
    typeof type === "string" &&
    type.startsWith("entity.") &&
    typeof status === "number" &&
    status >= 400 &&
    status < 500
  );
}
