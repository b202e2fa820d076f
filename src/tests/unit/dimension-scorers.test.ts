import assert from "node:assert/strict";
import { test } from "node:test";
import {
  computeScores,
  scoreAccuracy,
  scoreClarity,
  scoreCompleteness,
  scoreConfidence,
} from "../../scoring/dimension-scorers";
import { extractSignals } from "../../scoring/signal-extractor";
import {
  HEDGING_ANSWER,
  NONSENSE_ANSWER,
  SHORT_BUGFIX_ANSWER,
  STRONG_TEAMWORK_ANSWER,
  loadQuestionBank,
  makeSignals,
} from "../helpers/fixtures";

const bank = loadQuestionBank();

function scoresFor(answer: string, questionId: number) {
  return computeScores(extractSignals(answer, bank.getById(questionId), bank.phrases));
}

test("scores a developed, example-backed answer", () => {
  assert.deepEqual(scoresFor(STRONG_TEAMWORK_ANSWER, 4), {
    clarity: 9.5,
    accuracy: 10,
    completeness: 9,
    confidence: 8,
  });
});

test("scores a short answer with few keywords", () => {
  assert.deepEqual(scoresFor(SHORT_BUGFIX_ANSWER, 2), {
    clarity: 8.5,
    accuracy: 3,
    completeness: 5,
    confidence: 6.5,
  });
});

test("hedging lowers confidence", () => {
  assert.deepEqual(scoresFor(HEDGING_ANSWER, 4), {
    clarity: 3.5,
    accuracy: 1.5,
    completeness: 2,
    confidence: 2.3,
  });
});

test("gibberish scores zero except a small clarity floor", () => {
  assert.deepEqual(scoresFor(NONSENSE_ANSWER, 4), {
    clarity: 0,
    accuracy: 0,
    completeness: 0,
    confidence: 0,
  });
  assert.deepEqual(scoresFor("blah blah hmm ok", 4), {
    clarity: 1,
    accuracy: 0,
    completeness: 0,
    confidence: 0,
  });
});

test("clarity rewards structure and penalizes repetition", () => {
  assert.equal(
    scoreClarity(makeSignals({ wordCount: 40, sentenceCount: 3, uniqueRatio: 0.3, startsWithCapital: false })),
    7,
  );
  assert.equal(scoreClarity(makeSignals({ wordCount: 250, sentenceCount: 10 })), 8.5);
  assert.equal(scoreClarity(makeSignals({ wordCount: 5, sentenceCount: 1 })), 3.5);
});

test("accuracy adds the keyword bonus up to the maximum", () => {
  const sixKeywords = ["a", "b", "c", "d", "e", "f"];
  assert.equal(scoreAccuracy(makeSignals({ keywordMatchRatio: 0.6, matchedKeywords: sixKeywords })), 10);
  assert.equal(scoreAccuracy(makeSignals({ keywordMatchRatio: 0.3, matchedKeywords: sixKeywords })), 7);
  assert.equal(scoreAccuracy(makeSignals({ keywordMatchRatio: 0.06, matchedKeywords: ["a"] })), 3);
});

test("completeness combines length, sentences and examples", () => {
  assert.equal(
    scoreCompleteness(makeSignals({ wordCount: 120, sentenceCount: 6, hasExamples: true })),
    9,
  );
  assert.equal(scoreCompleteness(makeSignals({ wordCount: 8, sentenceCount: 1 })), 2);
});

test("confidence is clamped at zero", () => {
  assert.equal(
    scoreConfidence(makeSignals({ wordCount: 5, fillerCount: 10, realWordRatio: 0.5 })),
    0,
  );
  assert.equal(
    scoreConfidence(
      makeSignals({
        wordCount: 60,
        assertiveFound: ["i know", "i can", "i will", "i have", "clearly"],
      }),
    ),
    9.5,
  );
});

test("computeScores returns a frozen record", () => {
  assert.equal(Object.isFrozen(computeScores(makeSignals())), true);
});

test("every score stays within 0..10 at one decimal", () => {
  for (const wordCount of [0, 5, 14, 15, 29, 30, 80, 200, 201, 400]) {
    for (const sentenceCount of [0, 1, 2, 3, 5, 12]) {
      for (const fillerCount of [0, 2, 9]) {
        const scores = computeScores(
          makeSignals({
            wordCount,
            sentenceCount,
            fillerCount,
            uniqueRatio: fillerCount > 5 ? 0.3 : 0.9,
            keywordMatchRatio: wordCount / 400,
            assertiveFound: fillerCount === 0 ? ["i know", "i can", "i will", "clearly", "certainly"] : [],
            hasExamples: sentenceCount > 2,
          }),
        );
        for (const score of Object.values(scores)) {
          assert.ok(score >= 0 && score <= 10, `score ${score} out of range`);
          assert.equal(Math.round(score * 10) / 10, score);
        }
      }
    }
  }
});

test("accuracy never drops as more keywords are matched", () => {
  const question = bank.getById(4);
  let previousRatio = -1;
  let previousScore = -1;
  for (let count = 0; count <= question.keywords.length; count += 1) {
    const answer = `We worked well as a group on the project. ${question.keywords.slice(0, count).join(" ")}`;
    const signals = extractSignals(answer, question, bank.phrases);
    const accuracy = scoreAccuracy(signals);
    assert.ok(signals.keywordMatchRatio >= previousRatio);
    assert.ok(accuracy >= previousScore);
    previousRatio = signals.keywordMatchRatio;
    previousScore = accuracy;
  }
});
