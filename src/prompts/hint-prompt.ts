import type { CompiledPrompt, HintRequest } from "../types/homework";

/** Plain-text task: no generationConfig, the model answers in prose */
export function buildHintPrompt(request: HintRequest): CompiledPrompt {
  return {
    prompt:
      "Provide a simple one-sentence hint for a Primary 3 student for the following question, " +
      `but do not give away the answer: "${request.question}"`,
  };
}
