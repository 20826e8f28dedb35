import type { CompiledPrompt, QuizRequest } from "../types/homework";
import {
  ENGLISH_COMPREHENSION_TOPICS,
  ENGLISH_MCQ_TOPICS,
  QUIZ_QUESTION_COUNT,
} from "../utils/homework-constants";
import { QUIZ_GENERATION_CONFIG } from "./response-schemas";
import {
  buildAvoidRepeatsBlock,
  SYLLABUS_ALIGNMENT,
  TEACHER_PERSONA,
} from "./shared";

export function isEnglishMcqQuiz(request: QuizRequest): boolean {
  return request.subject === "English" && ENGLISH_MCQ_TOPICS.has(request.topic);
}

function describeRequest(request: QuizRequest): string {
  return (
    `The subject is ${request.subject} and the specific topic is ${request.topic}. ` +
    `The difficulty level should be ${request.difficulty}. `
  );
}

/**
 * Build the quiz prompt.
 * English MCQ topics get five single-choice questions; everything else gets
 * the fixed 2 single-choice / 1 multi-select / 2 free-text structure.
 */
export function buildQuizPrompt(request: QuizRequest): CompiledPrompt {
  const isEnglish = request.subject === "English";
  let prompt = TEACHER_PERSONA;

  if (isEnglishMcqQuiz(request)) {
    prompt += `Generate a quiz with exactly ${QUIZ_QUESTION_COUNT} 'single-choice' multiple-choice questions for a ${request.classLevel} student. `;
    prompt += describeRequest(request);
    prompt += "Each question must have four options with exactly one correct answer. ";
  } else {
    prompt += `Generate a quiz with exactly ${QUIZ_QUESTION_COUNT} questions for a ${request.classLevel} student. `;
    prompt += describeRequest(request);
    prompt += "The quiz must have this structure: ";
    prompt += "1. Two 'single-choice' questions (select one correct answer from 4 options). ";
    prompt += "2. One 'multi-select' question (select one or more correct answers from 4 options). ";
    prompt += "3. Two 'free-text' questions (open-ended questions requiring a written answer). ";
  }
  prompt += SYLLABUS_ALIGNMENT;

  if (isEnglish && request.template) {
    prompt += `\nUse the following question template for formatting:\n${request.template}`;
  }

  if (isEnglish && ENGLISH_COMPREHENSION_TOPICS.has(request.topic)) {
    prompt +=
      "\nAll five questions must be based on the same image. Include an 'image' field with the same URL for each question.";
  }

  prompt += buildAvoidRepeatsBlock(
    request.previousQuestions,
    "IMPORTANT: To ensure variety, do not generate any of the following questions that the student has already answered for this topic:",
    "Also, try to create questions with different patterns and structures than the ones listed above.",
  );

  prompt +=
    `\nReturn a single JSON object with a key 'questions', which is an array of ${QUIZ_QUESTION_COUNT} question objects. ` +
    "Each question object must have: a 'type' (string: 'single-choice', 'multi-select', or 'free-text'), " +
    "a 'question' (string), and for choice questions, an 'options' array of exactly 4 strings.";

  return { prompt, generationConfig: QUIZ_GENERATION_CONFIG };
}
