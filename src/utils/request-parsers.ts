import { ClientInputError } from "./http-errors";
import {
  DEFAULT_YEAR_END_DIFFICULTY,
  isYearEndSubject,
  P3_YEAR_END_TOPICS,
  QUESTION_PAPER_DEFAULT_COUNT,
  QUESTION_PAPER_MAX_COUNT,
  YEAR_END_CLASS_LEVEL,
  YEAR_END_DIFFICULTY_MAP,
  YEAR_END_SUBJECTS,
} from "./homework-constants";
import type {
  EvaluationRequest,
  HintRequest,
  QuestionItem,
  QuestionPaperRequest,
  QuizRequest,
  YearEndDifficulty,
  YearEndRequest,
} from "../types/homework";

type JsonBody = Record<string, unknown>;

function isRecord(value: unknown): value is JsonBody {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asBody(body: unknown): JsonBody {
  if (!isRecord(body)) {
    throw new ClientInputError("Request body must be JSON.");
  }
  return body;
}

/** Trimmed string, or "" for anything that is not a non-blank string */
function readString(body: JsonBody, key: string): string {
  const value = body[key];
  return typeof value === "string" ? value.trim() : "";
}

/** previousQuestions, falling back to the older snake_case key */
function readPreviousQuestions(body: JsonBody): string[] {
  const raw = body.previousQuestions ?? body.previous_questions;
  if (!Array.isArray(raw)) return [];
  return raw
    .filter((q): q is string => typeof q === "string")
    .map((q) => q.trim())
    .filter(Boolean);
}

export function parseQuizRequest(input: unknown): QuizRequest {
  const body = asBody(input);
  const requiredFields = ["classLevel", "subject", "topic", "difficulty"];

  const missingFields = requiredFields.filter((field) => !readString(body, field));
  if (missingFields.length > 0) {
    throw new ClientInputError(
      `Missing or empty required fields: ${missingFields.join(", ")}`,
    );
  }

  const request: QuizRequest = {
    classLevel: readString(body, "classLevel"),
    subject: readString(body, "subject"),
    topic: readString(body, "topic"),
    difficulty: readString(body, "difficulty"),
    previousQuestions: readPreviousQuestions(body),
  };

  const template = readString(body, "template");
  if (template) request.template = template;

  return request;
}

/**
 * Accepts integers, integral numeric strings and truncates finite numbers.
 * Absent (undefined/null) means "use the default".
 */
export function parseQuestionCount(value: unknown): number {
  if (value === undefined || value === null) return QUESTION_PAPER_DEFAULT_COUNT;

  let count: number;
  if (typeof value === "number" && Number.isFinite(value)) {
    count = Math.trunc(value);
  } else if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    count = parseInt(value, 10);
  } else {
    throw new ClientInputError("'questionCount' must be a number.");
  }

  if (count < 1) {
    throw new ClientInputError("'questionCount' must be at least 1.");
  }

  return Math.min(count, QUESTION_PAPER_MAX_COUNT);
}

export function parseQuestionPaperRequest(input: unknown): QuestionPaperRequest {
  const body: JsonBody = isRecord(input) ? input : {};
  const classLevel = readString(body, "classLevel");
  const subject = readString(body, "subject");

  if (!classLevel || !subject) {
    throw new ClientInputError("Missing 'classLevel' or 'subject'.");
  }

  return {
    classLevel,
    subject,
    questionCount: parseQuestionCount(body.questionCount),
    previousQuestions: readPreviousQuestions(body),
  };
}

/** "Med-Hard Mix!" -> "medhardmix" -> lookup; unknown -> medium-hard */
export function normalizeYearEndDifficulty(value: unknown): YearEndDifficulty {
  const text = typeof value === "string" ? value : "";
  const key = text.toLowerCase().replace(/[^a-z0-9]/g, "");
  return YEAR_END_DIFFICULTY_MAP.get(key) ?? DEFAULT_YEAR_END_DIFFICULTY;
}

/**
 * Keep only allow-listed topics; subjects left empty are dropped, then every
 * reference subject that is still missing gets its full default list.
 */
export function resolveYearEndSubjects(value: unknown): Record<string, string[]> {
  const subjects: Record<string, string[]> = {};

  if (isRecord(value)) {
    for (const [subject, topics] of Object.entries(value)) {
      if (!Array.isArray(topics) || !isYearEndSubject(subject)) continue;
      const allowed = P3_YEAR_END_TOPICS[subject];
      const filtered = topics.filter(
        (topic): topic is string =>
          typeof topic === "string" && allowed.includes(topic),
      );
      if (filtered.length > 0) subjects[subject] = filtered;
    }
  }

  for (const subject of YEAR_END_SUBJECTS) {
    if (!subjects[subject]) subjects[subject] = [...P3_YEAR_END_TOPICS[subject]];
  }

  return subjects;
}

export function parseYearEndRequest(input: unknown): YearEndRequest {
  const body: JsonBody = isRecord(input) ? input : {};
  const classLevel = readString(body, "classLevel");

  if (!classLevel) {
    throw new ClientInputError("Missing 'classLevel' in request.");
  }
  // exact match: " P3 " is not P3
  if (body.classLevel !== YEAR_END_CLASS_LEVEL) {
    throw new ClientInputError(
      "Year-end paper generation is currently supported for Primary 3 only.",
    );
  }

  return {
    classLevel: YEAR_END_CLASS_LEVEL,
    difficulty: normalizeYearEndDifficulty(body.difficulty),
    subjects: resolveYearEndSubjects(body.subjects),
  };
}

function parseQuestionItem(value: unknown, index: number): QuestionItem {
  if (
    !isRecord(value) ||
    typeof value.type !== "string" ||
    typeof value.question !== "string"
  ) {
    throw new ClientInputError(
      `Question ${index + 1} must have a 'type' and a 'question'.`,
    );
  }

  const item: QuestionItem = { type: value.type, question: value.question };
  if (Array.isArray(value.options)) {
    item.options = value.options.map((option) => String(option));
  }
  return item;
}

export function parseEvaluationRequest(input: unknown): EvaluationRequest {
  if (!isRecord(input) || !("questions" in input) || !("answers" in input)) {
    throw new ClientInputError("Missing 'questions' or 'answers' in request.");
  }

  const { questions, answers } = input;
  if (!Array.isArray(questions) || !Array.isArray(answers)) {
    throw new ClientInputError("'questions' and 'answers' must be arrays.");
  }
  if (questions.length === 0) {
    throw new ClientInputError(
      "At least one question is required for evaluation.",
    );
  }
  // answers are read by position; a missing one is a client error
  if (answers.length < questions.length) {
    throw new ClientInputError(
      `Missing answer for question ${answers.length + 1}.`,
    );
  }

  return {
    questions: questions.map(parseQuestionItem),
    answers: answers.slice(0, questions.length),
  };
}

export function parseHintRequest(input: unknown): HintRequest {
  const question = isRecord(input) ? readString(input, "question") : "";
  if (!question) {
    throw new ClientInputError("Missing 'question' in request.");
  }
  return { question };
}
