import type { Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import type { TaskId } from "../types/homework";
import {
  compilePrompt,
  parseTaskRequest,
  resolveTaskId,
} from "../services/prompt-compiler";
import { generateFromPrompt } from "../services/gemini-client";
import { getConfiguredApiKey } from "../config/gemini-config";
import {
  NotFoundError,
  sendError,
  ServiceNotConfiguredError,
} from "../utils/http-errors";

/**
 * Key check → validate → compile → call Gemini → normalize. Every branch
 * writes exactly one response; nothing reaches Gemini on a 4xx.
 */
async function runTask(task: TaskId, body: unknown, res: Response) {
  const requestId = uuidv4();
  const logTag = `[homework-ai] [${requestId}]`;

  try {
    if (!getConfiguredApiKey()) throw new ServiceNotConfiguredError();
    const compiled = compilePrompt(parseTaskRequest(task, body));
    const result = await generateFromPrompt(compiled, logTag);
    return res.json(result);
  } catch (error) {
    return sendError(res, error, requestId);
  }
}

/** Express handler for one path-addressed task */
export function handleTask(task: TaskId) {
  return (req: Request, res: Response) => runTask(task, req.body, res);
}

/**
 * @route  POST /generate
 * @input  Body: { classLevel, subject, topic, difficulty, template?, previousQuestions? }
 * @returns 200 { questions: [...] }
 * @errors 400 missing/empty fields, 500 not configured / bad upstream output
 */
export const generateQuiz = handleTask("generate-quiz");

/**
 * @route  POST /question-paper
 * @input  Body: { classLevel, subject, questionCount? (1-15, default 10), previousQuestions? }
 * @returns 200 { questions: [...] }
 */
export const generateQuestionPaper = handleTask("generate-question-paper");

/**
 * @route  POST /generate-year-end
 * @input  Body: { classLevel: "P3", difficulty?, subjects?: { [subject]: topic[] } }
 * @returns 200 { paper_title, duration_minutes, sections: [...] }
 */
export const generateYearEndPaper = handleTask("generate-year-end-paper");

/**
 * @route  POST /evaluate
 * @input  Body: { questions: { type, question, options? }[], answers: any[] }
 * @returns 200 { evaluation: { is_correct, correct_answer, explanation }[] }
 */
export const evaluateAnswers = handleTask("evaluate");

/**
 * @route  POST /get-hint
 * @input  Body: { question }
 * @returns 200 { text }
 */
export const getHint = handleTask("get-hint");

/**
 * @route  POST /dispatch?path=<task>
 * @notes  Task comes from the `path` query parameter, else from body `__route`.
 *         Accepts canonical task ids and the older route names.
 */
export async function dispatchTask(req: Request, res: Response) {
  const fromQuery = typeof req.query.path === "string" ? req.query.path : "";
  const body: unknown = req.body;

  let target = fromQuery.trim().replace(/^\/+|\/+$/g, "");
  if (!target && typeof body === "object" && body !== null && "__route" in body) {
    const route = body.__route;
    target = typeof route === "string" ? route : "";
  }

  const task = target ? resolveTaskId(target) : null;
  if (!task) {
    return sendError(res, new NotFoundError());
  }

  return runTask(task, body, res);
}

/** Any method other than POST on a task path */
export function methodNotAllowed(req: Request, res: Response) {
  return res.status(405).json({ error: "Method not allowed." });
}
