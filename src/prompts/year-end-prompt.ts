import type {
  CompiledPrompt,
  YearEndDifficulty,
  YearEndRequest,
} from "../types/homework";
import { P3_YEAR_END_TOPICS, YEAR_END_SUBJECTS } from "../utils/homework-constants";
import { YEAR_END_GENERATION_CONFIG } from "./response-schemas";

const DIFFICULTY_SENTENCES: Record<YearEndDifficulty, string> = {
  medium:
    "Ensure every question reflects medium difficulty suitable for confident Primary 3 pupils preparing for the year-end assessment.",
  "medium-hard":
    "Ensure the questions span medium to hard difficulty, mirroring the rigour of Primary 3 year-end examinations.",
  hard: "Ensure every question is hard difficulty, stretching capable Primary 3 pupils while staying within MOE expectations.",
};

/** One "Subject: topic, topic" line per subject, in section order */
export function buildTopicLines(subjects: Record<string, string[]>): string {
  const lines: string[] = [];
  for (const subject of YEAR_END_SUBJECTS) {
    const topics = subjects[subject] ?? P3_YEAR_END_TOPICS[subject];
    if (topics.length > 0) lines.push(`${subject}: ${topics.join(", ")}`);
  }
  return lines.join("\n");
}

export function buildYearEndPrompt(request: YearEndRequest): CompiledPrompt {
  const prompt = [
    "Act as an experienced Primary 3 teacher in Singapore preparing a year-end practice examination that follows the latest Singapore MOE syllabus. " +
      "Create a complete Primary 3 practice paper with separate sections for English, Mathematics, and Science. " +
      "Follow these requirements:",
    "1. Present the paper in three sections (English, Mathematics, Science) in that order with clear section titles.",
    "2. Use only these Primary 3 topics and tag every question with a 'topic' field that matches one of them exactly:",
    buildTopicLines(request.subjects),
    `3. ${DIFFICULTY_SENTENCES[request.difficulty]}`,
    "4. Provide an overall paper title and recommended total duration in minutes.",
    "5. English section (align with Paper 2 Language Use & Comprehension):",
    "   • Include section instructions suitable for Primary 3 students.",
    "   • Add 3 Vocabulary MCQ questions and 3 Grammar MCQ questions.",
    "   • Add 2 Grammar Cloze questions. Each Grammar Cloze question should contain a short passage with three blanks, each blank offering four MCQ options.",
    "   • Add 1 Comprehension Cloze passage with five blanks (treated as five questions) and four MCQ options for each blank.",
    "   • Add 2 Sentence Combining questions that are open-ended.",
    "   • Add 2 Comprehension open-ended questions tied to one short passage.",
    "6. Mathematics section:",
    "   • Provide section instructions, suggested time, and total marks.",
    "   • Include 10 questions: 4 MCQ, 4 short-answer, and 2 structured word problems that expect working steps.",
    "7. Science section:",
    "   • Provide section instructions, suggested time, and total marks.",
    "   • Include 8 questions: 4 MCQ and 4 open-ended questions focusing on explanation or application of concepts.",
    "8. For every question, include an answer and, where helpful, a short explanation aligned with MOE marking expectations.",
    "9. Number questions within each section starting from Q1.",
    "10. Return the paper strictly as JSON that follows the provided schema.",
  ].join("\n");

  return { prompt, generationConfig: YEAR_END_GENERATION_CONFIG };
}
