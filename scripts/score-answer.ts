import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";
import { QuestionBank } from "../src/rubric/question-bank";
import { loadRubric } from "../src/rubric/rubric.loader";
import { evaluateAnswer } from "../src/scoring/answer-evaluator";

// Usage: npm run score -- <questionId> "<answer text>"
function run(): void {
  const [questionIdRaw, ...answerParts] = process.argv.slice(2);
  const answer = answerParts.join(" ").trim();
  const questionId = Number(questionIdRaw);
  if (!Number.isInteger(questionId) || !answer) {
    throw new Error('Usage: score-answer <questionId> "<answer text>"');
  }

  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel });
  const questionBank = new QuestionBank(loadRubric(env.rubricPath));
  const question = questionBank.getById(questionId);
  const result = evaluateAnswer(answer, question, questionBank.phrases);

  logger.info("Scored answer", { questionId, category: question.category, scores: result.scores });
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
}

try {
  run();
} catch (error) {
  process.stderr.write(`${error instanceof Error ? error.message : "Unknown error"}\n`);
  process.exitCode = 1;
}
