import type { GenerationConfig, ResponseSchema } from "../types/homework";

const STRING: ResponseSchema = { type: "STRING" };
const INTEGER: ResponseSchema = { type: "INTEGER" };
const STRING_ARRAY: ResponseSchema = { type: "ARRAY", items: STRING };

function jsonOutput(responseSchema: ResponseSchema): GenerationConfig {
  return { responseMimeType: "application/json", responseSchema };
}

export const QUIZ_GENERATION_CONFIG: GenerationConfig = jsonOutput({
  type: "OBJECT",
  properties: {
    questions: {
      type: "ARRAY",
      items: {
        type: "OBJECT",
        properties: {
          type: STRING,
          question: STRING,
          options: STRING_ARRAY,
          image: STRING,
        },
        required: ["type", "question"],
      },
    },
  },
});

export const QUESTION_PAPER_GENERATION_CONFIG: GenerationConfig = jsonOutput({
  type: "OBJECT",
  properties: {
    questions: {
      type: "ARRAY",
      items: {
        type: "OBJECT",
        properties: {
          type: STRING,
          question: STRING,
          options: STRING_ARRAY,
        },
        required: ["type", "question"],
      },
    },
  },
});

export const YEAR_END_GENERATION_CONFIG: GenerationConfig = jsonOutput({
  type: "OBJECT",
  properties: {
    paper_title: STRING,
    duration_minutes: INTEGER,
    sections: {
      type: "ARRAY",
      items: {
        type: "OBJECT",
        properties: {
          subject: STRING,
          section_title: STRING,
          instructions: STRING,
          time_allocated_minutes: INTEGER,
          total_marks: INTEGER,
          questions: {
            type: "ARRAY",
            items: {
              type: "OBJECT",
              properties: {
                number: STRING,
                type: STRING,
                prompt: STRING,
                options: STRING_ARRAY,
                topic: STRING,
                marks: INTEGER,
                answer: STRING,
                answer_explanation: STRING,
              },
              required: ["number", "type", "prompt", "answer", "topic"],
            },
          },
        },
        required: ["subject", "section_title", "instructions", "questions"],
      },
    },
  },
  required: ["paper_title", "sections"],
});

export const EVALUATION_GENERATION_CONFIG: GenerationConfig = jsonOutput({
  type: "OBJECT",
  properties: {
    evaluation: {
      type: "ARRAY",
      items: {
        type: "OBJECT",
        properties: {
          is_correct: { type: "BOOLEAN" },
          correct_answer: STRING,
          explanation: STRING,
        },
        required: ["is_correct", "correct_answer", "explanation"],
      },
    },
  },
});
