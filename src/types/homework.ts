/** ---------- Inbound task requests (validated) ---------- */

export interface QuizRequest {
  classLevel: string;
  subject: string;
  topic: string;
  difficulty: string;
  template?: string;
  previousQuestions: string[];
}

export interface QuestionPaperRequest {
  classLevel: string;
  subject: string;
  questionCount: number; // clamped to 1..15
  previousQuestions: string[];
}

export type YearEndDifficulty = "medium" | "medium-hard" | "hard";

export interface YearEndRequest {
  classLevel: string;
  difficulty: YearEndDifficulty;
  subjects: Record<string, string[]>; // resolved against the P3 allow-list
}

export interface QuestionItem {
  type: string;
  question: string;
  options?: string[];
}

export interface EvaluationRequest {
  questions: QuestionItem[];
  answers: unknown[];
}

export interface HintRequest {
  question: string;
}

/** ---------- Task dispatch ---------- */

export const TASK_IDS = [
  "generate-quiz",
  "generate-question-paper",
  "generate-year-end-paper",
  "evaluate",
  "get-hint",
] as const;
export type TaskId = (typeof TASK_IDS)[number];

export type TaskRequest =
  | { task: "generate-quiz"; request: QuizRequest }
  | { task: "generate-question-paper"; request: QuestionPaperRequest }
  | { task: "generate-year-end-paper"; request: YearEndRequest }
  | { task: "evaluate"; request: EvaluationRequest }
  | { task: "get-hint"; request: HintRequest };

/** ---------- Upstream generation config (Gemini REST shape) ---------- */

export type SchemaType =
  | "OBJECT"
  | "ARRAY"
  | "STRING"
  | "INTEGER"
  | "NUMBER"
  | "BOOLEAN";

export interface ResponseSchema {
  type: SchemaType;
  properties?: Record<string, ResponseSchema>;
  items?: ResponseSchema;
  required?: string[];
}

export interface GenerationConfig {
  responseMimeType: "application/json";
  responseSchema: ResponseSchema;
}

export interface CompiledPrompt {
  prompt: string;
  generationConfig?: GenerationConfig;
}

/** ---------- Outputs returned to the client ---------- */

type GeneratedQuestionType = "single-choice" | "multi-select" | "free-text";

interface GeneratedQuestion {
  type: GeneratedQuestionType;
  question: string;
  options?: string[];
  image?: string;
}

export interface GeneratedQuiz {
  questions: GeneratedQuestion[];
}

interface EvaluationVerdict {
  is_correct: boolean;
  correct_answer: string;
  explanation: string;
}

export interface EvaluationResult {
  evaluation: EvaluationVerdict[];
}

export interface HintResult {
  text: string;
}
