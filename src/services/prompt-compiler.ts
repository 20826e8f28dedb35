import type { CompiledPrompt, TaskId, TaskRequest } from "../types/homework";
import { TASK_IDS } from "../types/homework";
import { buildQuizPrompt } from "../prompts/quiz-prompt";
import { buildQuestionPaperPrompt } from "../prompts/question-paper-prompt";
import { buildYearEndPrompt } from "../prompts/year-end-prompt";
import { buildEvaluationPrompt } from "../prompts/evaluation-prompt";
import { buildHintPrompt } from "../prompts/hint-prompt";
import {
  parseEvaluationRequest,
  parseHintRequest,
  parseQuestionPaperRequest,
  parseQuizRequest,
  parseYearEndRequest,
} from "../utils/request-parsers";

/** Older route names still sent by deployed clients */
const TASK_ALIASES: ReadonlyMap<string, TaskId> = new Map<string, TaskId>([
  ["generate", "generate-quiz"],
  ["question-paper", "generate-question-paper"],
  ["generate-year-end", "generate-year-end-paper"],
]);

const KNOWN_TASK_IDS: readonly string[] = TASK_IDS;

function isTaskId(value: string): value is TaskId {
  return KNOWN_TASK_IDS.includes(value);
}

/** Strips surrounding slashes; returns null when nothing matches */
export function resolveTaskId(raw: string): TaskId | null {
  const name = raw.trim().replace(/^\/+|\/+$/g, "");
  if (isTaskId(name)) return name;
  return TASK_ALIASES.get(name) ?? null;
}

/** Validate an untyped body into the request variant for `task` */
export function parseTaskRequest(task: TaskId, body: unknown): TaskRequest {
  switch (task) {
    case "generate-quiz":
      return { task, request: parseQuizRequest(body) };
    case "generate-question-paper":
      return { task, request: parseQuestionPaperRequest(body) };
    case "generate-year-end-paper":
      return { task, request: parseYearEndRequest(body) };
    case "evaluate":
      return { task, request: parseEvaluationRequest(body) };
    case "get-hint":
      return { task, request: parseHintRequest(body) };
  }
}

/** Pure: same request in, same prompt and schema out */
export function compilePrompt(task: TaskRequest): CompiledPrompt {
  switch (task.task) {
    case "generate-quiz":
      return buildQuizPrompt(task.request);
    case "generate-question-paper":
      return buildQuestionPaperPrompt(task.request);
    case "generate-year-end-paper":
      return buildYearEndPrompt(task.request);
    case "evaluate":
      return buildEvaluationPrompt(task.request);
    case "get-hint":
      return buildHintPrompt(task.request);
  }
}
