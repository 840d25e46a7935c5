export const NOT_FOUND_ANSWER = "No answer found in provided documents.";

export function buildAnswerPrompt(question: string, context: string): string {
  return [
    `Answer the question using ONLY the information in the documents below. If they do not contain the answer, respond with "${NOT_FOUND_ANSWER}"`,
    "",
    "Format your response as:",
    "Answer: [your answer]",
    "Citation: [document name(s) from the Source lines]",
    "",
    "Documents:",
    context,
    "",
    `Question: ${question.trim()}`,
    "",
    "Answer:",
  ].join("\n");
}

const ECHO_PREFIXES = ["Question:", "Context:", "Documents:", "Citation:"];

/**
 * Drops echoed prompt lines and the citation line from model output and
 * strips the `Answer:` label; citations are taken from the context instead.
 */
export function cleanGeneratedText(text: string): string {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line && !ECHO_PREFIXES.some((p) => line.startsWith(p)))
    .map((line) => line.replace(/^Answer:\s*/, ""))
    .filter((line) => line.length > 0)
    .join("\n")
    .trim();
}
