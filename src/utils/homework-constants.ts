import p3YearEndTopics from "../data/p3-year-end-topics.json";
import type { YearEndDifficulty } from "../types/homework";

/** Subjects of the year-end paper, in section order */
export const YEAR_END_SUBJECTS = ["English", "Maths", "Science"] as const;
export type YearEndSubject = (typeof YEAR_END_SUBJECTS)[number];

/** The only class level the year-end paper is written for */
export const YEAR_END_CLASS_LEVEL = "P3";

function freezeTopicTable(
  table: Record<YearEndSubject, string[]>,
): Readonly<Record<YearEndSubject, readonly string[]>> {
  return Object.freeze({
    English: Object.freeze([...table.English]),
    Maths: Object.freeze([...table.Maths]),
    Science: Object.freeze([...table.Science]),
  });
}

/** Syllabus-aligned P3 topic allow-list, per subject */
export const P3_YEAR_END_TOPICS = freezeTopicTable(p3YearEndTopics);

const SUBJECT_NAMES: readonly string[] = YEAR_END_SUBJECTS;

export function isYearEndSubject(subject: string): subject is YearEndSubject {
  return SUBJECT_NAMES.includes(subject);
}

/** Keys are lower-cased, alphanumeric-only difficulty strings */
export const YEAR_END_DIFFICULTY_MAP: ReadonlyMap<string, YearEndDifficulty> =
  new Map<string, YearEndDifficulty>([
    ["medium", "medium"],
    ["med", "medium"],
    ["mediumhard", "medium-hard"],
    ["mediumhardmix", "medium-hard"],
    ["mediumtohardmix", "medium-hard"],
    ["medhard", "medium-hard"],
    ["medhardmix", "medium-hard"],
    ["hard", "hard"],
  ]);

export const DEFAULT_YEAR_END_DIFFICULTY: YearEndDifficulty = "medium-hard";

/** English topics that get an all-MCQ quiz */
export const ENGLISH_MCQ_TOPICS: ReadonlySet<string> = new Set([
  "Vocab MCQ",
  "Grammar MCQ",
  "Grammar Cloze",
  "Comprehension Cloze",
]);

/** English topics whose quiz questions share one passage/image */
export const ENGLISH_COMPREHENSION_TOPICS: ReadonlySet<string> = new Set([
  "Comprehension (Open-Ended)",
]);

export const QUESTION_PAPER_DEFAULT_COUNT = 10;
export const QUESTION_PAPER_MAX_COUNT = 15;

export const QUIZ_QUESTION_COUNT = 5;
