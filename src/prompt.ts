import type { RetrievalResult } from "./types.js";

export const CONTEXT_HEADER = "### Context";
export const QUESTION_HEADER = "### Question";
export const ANSWER_HEADER = "### Answer";

const INSTRUCTIONS = `
Answer the question using only the context below.
If the context does not contain the answer, say that you do not know.
Answer in one or two sentences and do not repeat the context or the question.
`.trim();

export interface PromptOptions {
  maxContextChars: number;
}

export interface BuiltPrompt {
  /** Full prompt text for generators that take a single string. */
  text: string;
  question: string;
  /** The context block body, for backends that take documents separately. */
  context: string;
  passages: RetrievalResult[];
  dropped: number;
}

function formatPassage(position: number, result: RetrievalResult): string {
  const { passage } = result;
  return [`[${position}] (source: ${passage.sourceDocument}, offset ${passage.offset})`, passage.text].join("\n");
}

/**
 * Admits passages in descending score order while they fit the context
 * budget. When not even the best passage fits, its text is cut to the budget.
 */
export function selectPassages(results: RetrievalResult[], maxContextChars: number): RetrievalResult[] {
  const ranked = [...results].sort((a, b) => b.score - a.score || a.passage.id - b.passage.id);
  const selected: RetrievalResult[] = [];
  let used = 0;

  for (const result of ranked) {
    const cost = result.passage.text.length + (selected.length > 0 ? 2 : 0);
    if (used + cost > maxContextChars) {
      break;
    }
    selected.push(result);
    used += cost;
  }

  const best = ranked[0];
  if (selected.length === 0 && best && maxContextChars > 0) {
    selected.push({
      score: best.score,
      passage: { ...best.passage, text: best.passage.text.slice(0, maxContextChars) }
    });
  }

  return selected;
}

export function buildPrompt(question: string, results: RetrievalResult[], options: PromptOptions): BuiltPrompt {
  const trimmedQuestion = question.trim();
  const passages = selectPassages(results, options.maxContextChars);
  const context = passages.map((result, index) => formatPassage(index + 1, result)).join("\n\n");

  const text = [
    INSTRUCTIONS,
    "",
    CONTEXT_HEADER,
    context || "(no context)",
    "",
    QUESTION_HEADER,
    trimmedQuestion,
    "",
    ANSWER_HEADER
  ].join("\n");

  return {
    text,
    question: trimmedQuestion,
    context,
    passages,
    dropped: results.length - passages.length
  };
}
