import type { CompiledPrompt, QuestionPaperRequest } from "../types/homework";
import { QUESTION_PAPER_GENERATION_CONFIG } from "./response-schemas";
import { buildAvoidRepeatsBlock, TEACHER_PERSONA } from "./shared";

export function buildQuestionPaperPrompt(
  request: QuestionPaperRequest,
): CompiledPrompt {
  let prompt =
    TEACHER_PERSONA +
    `Create a question paper with exactly ${request.questionCount} questions for a ${request.classLevel} student. ` +
    `The subject is ${request.subject}. ` +
    "Provide a healthy mix of question types that reflects the MOE syllabus: include several 'single-choice' multiple-choice questions, at least one 'multi-select' question, and at least two 'free-text' questions. " +
    "For all multiple-choice or multi-select questions, include four options with clear wording. " +
    "Do not include answer keys, hints, or explanations in the question paper itself. ";

  prompt += buildAvoidRepeatsBlock(
    request.previousQuestions,
    "Avoid reusing any of the following questions that the student has already seen for this subject:",
    "Create fresh variations with different numbers, scenarios, or phrasing wherever possible.",
  );

  prompt +=
    "\nReturn a single JSON object with a key 'questions', which is an array of question objects. " +
    "Each question object must contain: 'type' (one of 'single-choice', 'multi-select', or 'free-text'), " +
    "a 'question' field containing the question text, and an 'options' array of four strings for choice-based questions.";

  return { prompt, generationConfig: QUESTION_PAPER_GENERATION_CONFIG };
}
