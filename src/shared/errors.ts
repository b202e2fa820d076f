export type EvaluationErrorCode = "empty_answer" | "question_not_found" | "empty_input";

export class EvaluationError extends Error {
  constructor(
    readonly code: EvaluationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyAnswerError extends EvaluationError {
  constructor() {
    super("empty_answer", "Answer cannot be empty");
  }
}

export class QuestionNotFoundError extends EvaluationError {
  constructor(readonly questionId: unknown) {
    super("question_not_found", `Question ${String(questionId)} not found`);
  }
}

export class EmptyInputError extends EvaluationError {
  constructor(message = "No answers to aggregate") {
    super("empty_input", message);
  }
}

export function isEvaluationError(error: unknown): error is EvaluationError {
  return error instanceof EvaluationError;
}
