import { DIMENSION_LABELS } from "../shared/constants";
import { DimensionKey, Explanation, Signals } from "../shared/types/evaluation.types";
import { roundTo } from "../shared/utils/math";
import { NARRATIVE_BANDS, NarrativeBand, pickThreshold } from "./thresholds";

const KEYWORD_PREVIEW_LIMIT = 5;
const FILLER_PREVIEW_LIMIT = 4;
const ASSERTIVE_PREVIEW_LIMIT = 3;
const DIVERSE_VOCABULARY_RATIO = 0.7;
const REPETITIVE_VOCABULARY_RATIO = 0.4;

const GIBBERISH_TEXT =
  "Response appears to be nonsensical or gibberish. Please provide a meaningful answer.";

const NARRATIVES: Readonly<Record<DimensionKey, Readonly<Record<NarrativeBand, string>>>> = {
  clarity: {
    strong: "Well-structured response with clear sentence organization.",
    adequate: "Adequate structure. Additional sentences would improve readability.",
    weak: "Response lacks sentence structure or is too brief for clear communication.",
  },
  accuracy: {
    strong: "Strong keyword presence indicates solid understanding of the topic.",
    adequate: "Some relevant concepts present but key terms are missing.",
    weak: "Very few domain-relevant terms detected in the response.",
  },
  completeness: {
    strong: "Thorough response covering multiple facets of the question.",
    adequate: "Covers the basics but could explore the topic further.",
    weak: "Response is too brief or narrow to be considered complete.",
  },
  confidence: {
    strong: "Confident, assertive tone with minimal hesitation.",
    adequate: "Moderate confidence. Some uncertainty phrases dilute the message.",
    weak: "Response suggests significant uncertainty or excessive hedging.",
  },
};

type EvidenceBuilder = (signals: Signals) => string[];

const EVIDENCE: Readonly<Record<DimensionKey, EvidenceBuilder>> = {
  clarity: (signals) => {
    const detected = [
      `${signals.sentenceCount} sentence(s) detected`,
      `${signals.wordCount} words total`,
    ];
    if (signals.startsWithCapital) {
      detected.push("proper capitalization");
    }
    if (signals.uniqueRatio < REPETITIVE_VOCABULARY_RATIO) {
      detected.push("high word repetition detected");
    } else if (signals.uniqueRatio > DIVERSE_VOCABULARY_RATIO) {
      detected.push("diverse vocabulary");
    }
    return detected;
  },
  accuracy: (signals) => {
    const matched = signals.matchedKeywords;
    const detected = [`${matched.length} of ${signals.totalKeywords} keywords matched`];
    if (matched.length > 0) {
      detected.push(`Found: ${previewList(matched, KEYWORD_PREVIEW_LIMIT, "...")}`);
    }
    return detected;
  },
  completeness: (signals) => [
    `${signals.wordCount} words total`,
    `${signals.sentenceCount} sentence(s)`,
    signals.hasExamples ? "includes concrete examples" : "no specific examples detected",
  ],
  confidence: (signals) => {
    const detected: string[] = [];
    if (signals.fillerCount === 0) {
      detected.push("no filler/hesitation words");
    } else {
      detected.push(
        `${signals.fillerCount} filler word(s): ${previewList(signals.fillerWordsFound, FILLER_PREVIEW_LIMIT)}`,
      );
    }
    if (signals.assertiveFound.length > 0) {
      detected.push(
        `assertive phrases: ${previewList(signals.assertiveFound, ASSERTIVE_PREVIEW_LIMIT)}`,
      );
    } else {
      detected.push("no assertive phrases detected");
    }
    return detected;
  },
};

export function generateExplanation(
  dimension: DimensionKey,
  score: number,
  signals: Signals,
): Explanation {
  const label = DIMENSION_LABELS[dimension];

  if (signals.isGibberish) {
    return Object.freeze({
      dimension,
      label,
      score,
      text: GIBBERISH_TEXT,
      signalsDetected: Object.freeze([
        "non-meaningful content detected",
        `only ${roundTo(signals.realWordRatio * 100, 0)}% recognizable words`,
      ]),
    });
  }

  const band = pickThreshold(NARRATIVE_BANDS, score, "weak");
  return Object.freeze({
    dimension,
    label,
    score,
    text: NARRATIVES[dimension][band],
    signalsDetected: Object.freeze(EVIDENCE[dimension](signals)),
  });
}

function previewList(items: ReadonlyArray<string>, limit: number, overflowMarker = ""): string {
  const preview = items.slice(0, limit).join(", ");
  return items.length > limit ? `${preview}${overflowMarker}` : preview;
}
