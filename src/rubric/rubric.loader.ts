import { readFileSync } from "node:fs";
import path from "node:path";
import { PhraseLists, QuestionSpec, Rubric } from "../shared/types/rubric.types";

export const DEFAULT_RUBRIC_PATH = path.resolve(process.cwd(), "data", "rubric.json");

export function loadRubric(filePath: string = DEFAULT_RUBRIC_PATH): Rubric {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new Error(
      `Failed to read rubric file ${filePath}: ${error instanceof Error ? error.message : "Unknown error"}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `Rubric file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : "Unknown error"}`,
    );
  }

  return parseRubric(parsed);
}

export function parseRubric(value: unknown): Rubric {
  if (!isRecord(value)) {
    throw new Error("Invalid rubric: expected an object");
  }
  if (!Array.isArray(value.questions) || value.questions.length === 0) {
    throw new Error("Invalid rubric: questions must be a non-empty array");
  }

  const questions = value.questions.map((item, index) => parseQuestion(item, index));
  const seen = new Set<number>();
  for (const question of questions) {
    if (seen.has(question.id)) {
      throw new Error(`Invalid rubric: duplicate question id ${question.id}`);
    }
    seen.add(question.id);
  }

  return Object.freeze({
    questions: Object.freeze(questions),
    phrases: parsePhrases(value.phrases),
  });
}

function parseQuestion(value: unknown, index: number): QuestionSpec {
  if (!isRecord(value)) {
    throw new Error(`Invalid rubric: questions[${index}] must be an object`);
  }
  const { id, text, category } = value;
  if (typeof id !== "number" || !Number.isInteger(id)) {
    throw new Error(`Invalid rubric: questions[${index}].id must be an integer`);
  }
  if (typeof text !== "string" || !text.trim()) {
    throw new Error(`Invalid rubric: questions[${index}].text must be a non-empty string`);
  }
  if (typeof category !== "string" || !category.trim()) {
    throw new Error(`Invalid rubric: questions[${index}].category must be a non-empty string`);
  }
  return Object.freeze({
    id,
    text: text.trim(),
    category: category.trim(),
    keywords: Object.freeze(
      toPhraseList(value.keywords, `questions[${index}].keywords`, { lowercase: false }),
    ),
  });
}

function parsePhrases(value: unknown): PhraseLists {
  if (!isRecord(value)) {
    throw new Error("Invalid rubric: phrases must be an object");
  }
  return Object.freeze({
    fillers: Object.freeze(toPhraseList(value.fillers, "phrases.fillers")),
    assertive: Object.freeze(toPhraseList(value.assertive, "phrases.assertive")),
    examples: Object.freeze(toPhraseList(value.examples, "phrases.examples")),
  });
}

function toPhraseList(
  value: unknown,
  field: string,
  options: { lowercase: boolean } = { lowercase: true },
): string[] {
  if (!Array.isArray(value)) {
    throw new Error(`Invalid rubric: ${field} must be an array of strings`);
  }
  const phrases = new Map<string, string>();
  for (const item of value) {
    if (typeof item !== "string" || !item.trim()) {
      throw new Error(`Invalid rubric: ${field} must contain only non-empty strings`);
    }
    const trimmed = item.trim();
    const key = trimmed.toLowerCase();
    if (!phrases.has(key)) {
      phrases.set(key, options.lowercase ? key : trimmed);
    }
  }
  return Array.from(phrases.values());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
