import { Signals } from "../shared/types/evaluation.types";
import { PhraseLists, QuestionSpec } from "../shared/types/rubric.types";
import { ratio, roundTo } from "../shared/utils/math";

const GIBBERISH_RATIO = 0.4;
const SHORT_ANSWER_REAL_RATIO = 0.6;
const SHORT_ANSWER_WORDS = 15;
const REAL_WORD_MIN_LENGTH = 3;
const VOWEL_PATTERN = /[aeiou]/i;
// Word characters in any script, so "umé" is not read as "um".
const WORD_CHAR = "[\\p{L}\\p{N}_]";

/**
 * Measures an answer against one question. Every score, explanation and
 * suggestion downstream is a function of the returned signals only.
 *
 * Callers reject blank answers before getting here; blank input still yields
 * a zero-word, gibberish result rather than an error.
 */
export function extractSignals(
  answer: string,
  question: QuestionSpec,
  phrases: PhraseLists,
): Signals {
  const lowerAnswer = answer.toLowerCase();
  const words = tokenizeWords(answer);
  const wordCount = words.length;
  const sentenceCount = splitSentences(answer).length;

  const uniqueWords = new Set(words.map((word) => word.toLowerCase()));
  const uniqueRatio = ratio(uniqueWords.size, wordCount);

  const matchedKeywords = question.keywords.filter((keyword) =>
    lowerAnswer.includes(keyword.toLowerCase()),
  );
  const keywordMatchRatio = ratio(matchedKeywords.length, question.keywords.length);

  const fillers = detectFillers(lowerAnswer, phrases.fillers);
  const assertiveFound = phrases.assertive.filter((phrase) =>
    lowerAnswer.includes(phrase.toLowerCase()),
  );
  const hasExamples = phrases.examples.some((phrase) =>
    lowerAnswer.includes(phrase.toLowerCase()),
  );

  const trimmed = answer.trim();
  const firstChar = trimmed.charAt(0);
  const startsWithCapital = firstChar.length > 0 && firstChar === firstChar.toUpperCase();

  const avgSentenceLen = sentenceCount > 0 ? roundTo(wordCount / sentenceCount, 0) : wordCount;

  const realWords = words.filter(isRealWord);
  const realWordRatio = ratio(realWords.length, wordCount);
  const isGibberish =
    realWordRatio < GIBBERISH_RATIO ||
    (wordCount > 0 &&
      keywordMatchRatio === 0 &&
      realWordRatio < SHORT_ANSWER_REAL_RATIO &&
      wordCount < SHORT_ANSWER_WORDS);

  return Object.freeze({
    wordCount,
    sentenceCount,
    uniqueRatio,
    matchedKeywords: Object.freeze(matchedKeywords),
    totalKeywords: question.keywords.length,
    keywordMatchRatio,
    fillerWordsFound: Object.freeze(fillers.found),
    fillerCount: fillers.count,
    assertiveFound: Object.freeze(assertiveFound),
    hasExamples,
    startsWithCapital,
    avgSentenceLen,
    realWordRatio,
    isGibberish,
  });
}

export function tokenizeWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

export function splitSentences(text: string): string[] {
  return text
    .split(/[.!?]+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export function isRealWord(word: string): boolean {
  return [...word].length >= REAL_WORD_MIN_LENGTH && VOWEL_PATTERN.test(word);
}

function detectFillers(
  lowerAnswer: string,
  fillers: ReadonlyArray<string>,
): { found: string[]; count: number } {
  const found: string[] = [];
  let count = 0;
  for (const filler of fillers) {
    const pattern = new RegExp(
      `(?<!${WORD_CHAR})${escapeRegExp(filler)}(?!${WORD_CHAR})`,
      "giu",
    );
    const matches = lowerAnswer.match(pattern);
    if (matches) {
      count += matches.length;
      found.push(filler);
    }
  }
  return { found, count };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
