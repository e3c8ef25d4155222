// Prompts for the generative collaborators

export function buildRewordingPrompt(question: string, count: number): string {
  return `Write ${count} different ways of asking the question below.
Each version must ask for exactly the same information as the original.
Vary the sentence structure and vocabulary instead of swapping single words.
Put each version on its own line, with no numbering, bullets or commentary.

Example:
Question: How tall is Mount Everest?
Rewritten:
What is the height of Mount Everest?
How high does Mount Everest rise?
Can you tell me the elevation of Mount Everest?

Question: ${question}
Rewritten:`;
}

export const QA_PAIRS_SYSTEM_PROMPT = `You turn source text into question-answer pairs for a knowledge base.
Write two or more questions that the text answers, mixing factual, analytical,
cause-and-effect and comparison questions.
Only use information that is stated in the text; do not speculate.
Reply with a JSON object of the form {"pairs": [{"q": "<question>", "a": "<answer>"}]}.`;

export function buildQAPairsUserPrompt(text: string): string {
  return `[INPUT TEXT]\n${text}\n\n[JSON OUTPUT]\n`;
}
