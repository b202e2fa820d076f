import assert from "node:assert/strict";
import { test } from "node:test";
import { scoreClarity } from "../../scoring/dimension-scorers";
import { generateExplanation } from "../../scoring/explanation.generator";
import { extractSignals } from "../../scoring/signal-extractor";
import { HEDGING_ANSWER, NONSENSE_ANSWER, STRONG_TEAMWORK_ANSWER, loadQuestionBank, makeSignals } from "../helpers/fixtures";

const bank = loadQuestionBank();
const teamwork = bank.getById(4);

test("explains a strong answer with previewed keywords", () => {
  const signals = extractSignals(STRONG_TEAMWORK_ANSWER, teamwork, bank.phrases);

  assert.deepEqual(generateExplanation("accuracy", 10, signals), {
    dimension: "accuracy",
    label: "Technical Accuracy",
    score: 10,
    text: "Strong keyword presence indicates solid understanding of the topic.",
    signalsDetected: ["16 of 17 keywords matched", "Found: team, communication, agile, scrum, feedback..."],
  });
  assert.deepEqual(generateExplanation("clarity", 9.5, signals).signalsDetected, [
    "5 sentence(s) detected",
    "95 words total",
    "proper capitalization",
    "diverse vocabulary",
  ]);
  assert.deepEqual(generateExplanation("confidence", 8, signals).signalsDetected, [
    "no filler/hesitation words",
    "assertive phrases: i believe, i know",
  ]);
  assert.deepEqual(generateExplanation("completeness", 9, signals).signalsDetected, [
    "95 words total",
    "5 sentence(s)",
    "includes concrete examples",
  ]);
});

test("explains a hedging answer", () => {
  const signals = extractSignals(HEDGING_ANSWER, teamwork, bank.phrases);
  const explanation = generateExplanation("confidence", 2.3, signals);

  assert.equal(explanation.text, "Response suggests significant uncertainty or excessive hedging.");
  assert.deepEqual(explanation.signalsDetected, [
    "4 filler word(s): maybe, i think, i guess, kind of",
    "no assertive phrases detected",
  ]);
  assert.deepEqual(generateExplanation("accuracy", 1.5, signals).signalsDetected, [
    "0 of 17 keywords matched",
  ]);
});

test("gibberish overrides every narrative", () => {
  const signals = extractSignals(NONSENSE_ANSWER, teamwork, bank.phrases);
  const explanation = generateExplanation("completeness", 0, signals);

  assert.equal(
    explanation.text,
    "Response appears to be nonsensical or gibberish. Please provide a meaningful answer.",
  );
  assert.deepEqual(explanation.signalsDetected, [
    "non-meaningful content detected",
    "only 0% recognizable words",
  ]);
});

test("gibberish evidence rounds the recognizable share to a whole percent", () => {
  const signals = extractSignals("xq zz hello pp kk qq rr tt", teamwork, bank.phrases);
  assert.equal(scoreClarity(signals), 0.2);
  assert.deepEqual(generateExplanation("clarity", 0.2, signals).signalsDetected, [
    "non-meaningful content detected",
    "only 12% recognizable words",
  ]);

  const tied = makeSignals({ isGibberish: true, realWordRatio: 0.125 });
  assert.equal(generateExplanation("accuracy", 0, tied).signalsDetected[1], "only 12% recognizable words");
});

test("narrative bands switch at 7 and 4", () => {
  const signals = makeSignals();
  assert.equal(
    generateExplanation("clarity", 7, signals).text,
    "Well-structured response with clear sentence organization.",
  );
  assert.equal(
    generateExplanation("clarity", 6.9, signals).text,
    "Adequate structure. Additional sentences would improve readability.",
  );
  assert.equal(
    generateExplanation("completeness", 4, signals).text,
    "Covers the basics but could explore the topic further.",
  );
  assert.equal(
    generateExplanation("completeness", 3.9, signals).text,
    "Response is too brief or narrow to be considered complete.",
  );
});

test("evidence notes repetition and truncates filler previews", () => {
  const repetitive = generateExplanation(
    "clarity",
    5,
    makeSignals({ uniqueRatio: 0.3, startsWithCapital: false }),
  );
  assert.deepEqual(repetitive.signalsDetected, [
    "2 sentence(s) detected",
    "20 words total",
    "high word repetition detected",
  ]);

  const hedged = generateExplanation(
    "confidence",
    1,
    makeSignals({
      fillerWordsFound: ["maybe", "perhaps", "i think", "i guess", "um"],
      fillerCount: 6,
    }),
  );
  assert.equal(hedged.signalsDetected[0], "6 filler word(s): maybe, perhaps, i think, i guess");
});
