import type { CompiledPrompt, EvaluationRequest } from "../types/homework";
import { EVALUATION_GENERATION_CONFIG } from "./response-schemas";
import { TEACHER_PERSONA } from "./shared";

export function stringifyAnswer(answer: unknown): string {
  if (typeof answer === "string") return answer;
  if (answer === null || answer === undefined) return "(no answer)";
  return JSON.stringify(answer);
}

export function buildEvaluationPrompt(request: EvaluationRequest): CompiledPrompt {
  const questionCount = request.questions.length;

  const blocks = request.questions.map((q, i) => {
    const options = q.options ? JSON.stringify(q.options) : "N/A";
    return (
      `Question ${i + 1} (type: ${q.type}): ${q.question}\n` +
      `Options: ${options}\n` +
      `Student's Answer: ${stringifyAnswer(request.answers[i])}\n\n`
    );
  });

  const prompt =
    TEACHER_PERSONA +
    "Evaluate the following questions and student answers. For each one, provide whether it is correct, the correct answer (be concise), and a simple, encouraging one-sentence explanation. " +
    `Here are the questions and answers:\n${blocks.join("")}` +
    `Return the response as a single JSON object with a key 'evaluation', which is an array of exactly ${questionCount} objects, one per question in the same order. ` +
    "Each object must have three keys: 'is_correct' (boolean), 'correct_answer' (string), and 'explanation' (string).";

  return { prompt, generationConfig: EVALUATION_GENERATION_CONFIG };
}
