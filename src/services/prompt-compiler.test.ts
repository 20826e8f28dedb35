import { compilePrompt, parseTaskRequest, resolveTaskId } from "./prompt-compiler";
import { buildTopicLines } from "../prompts/year-end-prompt";
import { stringifyAnswer } from "../prompts/evaluation-prompt";
import {
  EVALUATION_GENERATION_CONFIG,
  QUESTION_PAPER_GENERATION_CONFIG,
  QUIZ_GENERATION_CONFIG,
  YEAR_END_GENERATION_CONFIG,
} from "../prompts/response-schemas";
import type { QuizRequest } from "../types/homework";

function quiz(overrides: Partial<QuizRequest> = {}) {
  return compilePrompt({
    task: "generate-quiz",
    request: {
      classLevel: "P3",
      subject: "Maths",
      topic: "Fractions",
      difficulty: "Medium",
      previousQuestions: [],
      ...overrides,
    },
  });
}

describe("resolveTaskId", () => {
  it("accepts canonical ids and older route names", () => {
    expect(resolveTaskId("evaluate")).toBe("evaluate");
    expect(resolveTaskId("/generate/")).toBe("generate-quiz");
    expect(resolveTaskId("question-paper")).toBe("generate-question-paper");
    expect(resolveTaskId("generate-year-end")).toBe("generate-year-end-paper");
    expect(resolveTaskId("generate-year-end-paper")).toBe("generate-year-end-paper");
  });

  it("returns null for unknown ids", () => {
    expect(resolveTaskId("")).toBeNull();
    expect(resolveTaskId("grade")).toBeNull();
    expect(resolveTaskId("constructor")).toBeNull();
  });
});

describe("parseTaskRequest", () => {
  it("tags the parsed request with its task", () => {
    expect(parseTaskRequest("get-hint", { question: "2 + 2?" })).toEqual({
      task: "get-hint",
      request: { question: "2 + 2?" },
    });
  });
});

describe("compilePrompt: generate-quiz", () => {
  it("asks for five single-choice MCQs for English MCQ topics", () => {
    const { prompt, generationConfig } = quiz({
      subject: "English",
      topic: "Vocab MCQ",
    });

    expect(prompt).toContain(
      "Generate a quiz with exactly 5 'single-choice' multiple-choice questions for a P3 student. ",
    );
    expect(prompt).toContain(
      "Each question must have four options with exactly one correct answer. ",
    );
    expect(prompt).not.toContain("One 'multi-select' question");
    expect(prompt).not.toContain("Two 'free-text' questions");
    expect(generationConfig).toBe(QUIZ_GENERATION_CONFIG);
  });

  it("asks for 2 single-choice, 1 multi-select, 2 free-text in that order", () => {
    const { prompt } = quiz();

    const single = prompt.indexOf("1. Two 'single-choice' questions");
    const multi = prompt.indexOf("2. One 'multi-select' question");
    const free = prompt.indexOf("3. Two 'free-text' questions");
    expect(single).toBeGreaterThan(-1);
    expect(multi).toBeGreaterThan(single);
    expect(free).toBeGreaterThan(multi);
    expect(prompt).toContain(
      "The subject is Maths and the specific topic is Fractions. The difficulty level should be Medium. ",
    );
  });

  it("uses the mixed structure for English topics outside the MCQ set", () => {
    const { prompt } = quiz({ subject: "English", topic: "Sentence Combining" });
    expect(prompt).toContain("2. One 'multi-select' question");
  });

  it("appends the template only for English", () => {
    const english = quiz({
      subject: "English",
      topic: "Grammar MCQ",
      template: "Fill in: ___",
    });
    const maths = quiz({ template: "Fill in: ___" });

    expect(english.prompt).toContain(
      "\nUse the following question template for formatting:\nFill in: ___",
    );
    expect(maths.prompt).not.toContain("question template");
  });

  it("asks comprehension questions to share one image", () => {
    const { prompt } = quiz({
      subject: "English",
      topic: "Comprehension (Open-Ended)",
    });
    expect(prompt).toContain(
      "\nAll five questions must be based on the same image. Include an 'image' field with the same URL for each question.",
    );
  });

  it("lists previous questions to avoid", () => {
    const { prompt } = quiz({
      previousQuestions: ["What is 1/2 of 8?", "Shade 3/4 of the shape."],
    });
    expect(prompt).toContain(
      "answered for this topic:\n- What is 1/2 of 8?\n- Shade 3/4 of the shape.\nAlso, try to create questions",
    );
  });

  it("skips the history block when there is none", () => {
    expect(quiz().prompt).not.toContain("IMPORTANT: To ensure variety");
  });

  it("ends with the output-shape instruction", () => {
    expect(quiz().prompt).toMatch(
      /an 'options' array of exactly 4 strings\.$/,
    );
  });
});

describe("compilePrompt: generate-question-paper", () => {
  it("embeds the clamped count and the schema", () => {
    const request = parseTaskRequest("generate-question-paper", {
      classLevel: "P5",
      subject: "Science",
      questionCount: 20,
    });
    const { prompt, generationConfig } = compilePrompt(request);

    expect(prompt).toContain(
      "Create a question paper with exactly 15 questions for a P5 student. ",
    );
    expect(prompt).toContain("at least one 'multi-select' question");
    expect(prompt).toContain(
      "Do not include answer keys, hints, or explanations in the question paper itself.",
    );
    expect(generationConfig).toBe(QUESTION_PAPER_GENERATION_CONFIG);
  });

  it("adds the history block", () => {
    const { prompt } = compilePrompt({
      task: "generate-question-paper",
      request: {
        classLevel: "P5",
        subject: "Science",
        questionCount: 10,
        previousQuestions: ["Name a magnetic material."],
      },
    });
    expect(prompt).toContain(
      "already seen for this subject:\n- Name a magnetic material.\nCreate fresh variations",
    );
  });
});

describe("compilePrompt: generate-year-end-paper", () => {
  it("renders the resolved topics in section order", () => {
    const request = parseTaskRequest("generate-year-end-paper", {
      classLevel: "P3",
      difficulty: "hard",
      subjects: { Maths: ["Money", "Time"] },
    });
    const { prompt, generationConfig } = compilePrompt(request);

    expect(prompt).toContain("\nMaths: Money, Time\n");
    expect(prompt.indexOf("English: Vocab MCQ")).toBeLessThan(
      prompt.indexOf("Maths: Money"),
    );
    expect(prompt).toContain(
      "3. Ensure every question is hard difficulty, stretching capable Primary 3 pupils while staying within MOE expectations.",
    );
    expect(prompt).toContain(
      "Include 10 questions: 4 MCQ, 4 short-answer, and 2 structured word problems",
    );
    expect(prompt).toContain("Include 8 questions: 4 MCQ and 4 open-ended questions");
    expect(generationConfig).toBe(YEAR_END_GENERATION_CONFIG);
  });

  it("describes medium-hard when difficulty is unrecognised", () => {
    const { prompt } = compilePrompt(
      parseTaskRequest("generate-year-end-paper", { classLevel: "P3", difficulty: "??" }),
    );
    expect(prompt).toContain(
      "3. Ensure the questions span medium to hard difficulty",
    );
  });

  it("declares the nested paper schema", () => {
    const schema = YEAR_END_GENERATION_CONFIG.responseSchema;
    expect(schema.required).toEqual(["paper_title", "sections"]);
    expect(
      schema.properties?.sections?.items?.properties?.questions?.items?.required,
    ).toEqual(["number", "type", "prompt", "answer", "topic"]);
  });

  it("builds topic lines", () => {
    expect(
      buildTopicLines({
        Science: ["Properties of Magnets"],
        English: ["Grammar MCQ"],
        Maths: ["Angles"],
      }),
    ).toBe("English: Grammar MCQ\nMaths: Angles\nScience: Properties of Magnets");
  });
});

describe("compilePrompt: evaluate", () => {
  it("renders one block per question and fixes the output length", () => {
    const { prompt, generationConfig } = compilePrompt({
      task: "evaluate",
      request: {
        questions: [
          { type: "single-choice", question: "2 + 2?", options: ["3", "4", "5", "6"] },
          { type: "free-text", question: "Capital of France?" },
        ],
        answers: ["4", null],
      },
    });

    expect(prompt).toContain(
      'Question 1 (type: single-choice): 2 + 2?\nOptions: ["3","4","5","6"]\nStudent\'s Answer: 4\n\n',
    );
    expect(prompt).toContain(
      "Question 2 (type: free-text): Capital of France?\nOptions: N/A\nStudent's Answer: (no answer)\n\n",
    );
    expect(prompt).toContain("which is an array of exactly 2 objects");
    expect(generationConfig).toBe(EVALUATION_GENERATION_CONFIG);
  });

  it("stringifies non-string answers", () => {
    expect(stringifyAnswer(["a", "b"])).toBe('["a","b"]');
    expect(stringifyAnswer(3)).toBe("3");
    expect(stringifyAnswer(true)).toBe("true");
    expect(stringifyAnswer(undefined)).toBe("(no answer)");
  });
});

describe("compilePrompt: get-hint", () => {
  it("asks for a hint without the answer and requests plain text", () => {
    const compiled = compilePrompt({
      task: "get-hint",
      request: { question: "What is 6 x 7?" },
    });

    expect(compiled.prompt).toBe(
      'Provide a simple one-sentence hint for a Primary 3 student for the following question, but do not give away the answer: "What is 6 x 7?"',
    );
    expect(compiled.generationConfig).toBeUndefined();
  });
});
