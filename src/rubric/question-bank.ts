import { QuestionNotFoundError } from "../shared/errors";
import { PhraseLists, QuestionSpec, QuestionSummary, Rubric } from "../shared/types/rubric.types";

export class QuestionBank {
  private readonly byId: ReadonlyMap<number, QuestionSpec>;

  constructor(private readonly rubric: Rubric) {
    this.byId = new Map(rubric.questions.map((question) => [question.id, question]));
  }

  get phrases(): PhraseLists {
    return this.rubric.phrases;
  }

  list(): ReadonlyArray<QuestionSpec> {
    return this.rubric.questions;
  }

  listSummaries(): QuestionSummary[] {
    return this.rubric.questions.map((question) => ({
      id: question.id,
      text: question.text,
      category: question.category,
    }));
  }

  getById(questionId: number): QuestionSpec {
    const question = this.byId.get(questionId);
    if (!question) {
      throw new QuestionNotFoundError(questionId);
    }
    return question;
  }
}
