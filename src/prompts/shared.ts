export const TEACHER_PERSONA = "Act as a Primary School teacher in Singapore. ";

export const SYLLABUS_ALIGNMENT =
  "Ensure the questions are aligned with the Singapore MOE syllabus. ";

export function bulletList(lines: readonly string[]): string {
  return lines.map((line) => `- ${line}`).join("\n");
}

/**
 * Appended when the client sends questions the student has already seen.
 * `lead` frames the list, `closing` asks for structurally different questions.
 */
export function buildAvoidRepeatsBlock(
  previousQuestions: readonly string[],
  lead: string,
  closing: string,
): string {
  if (previousQuestions.length === 0) return "";
  return `\n${lead}\n${bulletList(previousQuestions)}\n${closing}`;
}
