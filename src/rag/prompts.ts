import { ChunkRef, ConversationTurn } from '../types.js';
import { formatLabelledChunks } from './context-assembler.js';

/** Returned verbatim when retrieval finds nothing relevant; the model is not consulted */
export const NOT_IN_DOCUMENT_ANSWER =
  'The document does not contain information about this. Try rephrasing the question or asking about another topic it covers.';

/** Sentence the model is told to use when the excerpts do not answer the question */
export const INSUFFICIENT_CONTEXT_ANSWER = 'The information is not available in the provided document context.';

export function buildSummaryPrompt(content: string, maxWords: number, sampled: boolean): { system: string; prompt: string } {
  const scope = sampled
    ? 'The text below is a sample of excerpts taken from across a longer document.'
    : 'The text below is the full document.';
  return {
    system: `You summarize documents. Use only the supplied text and do not invent facts. Respond with at most ${maxWords} words.`,
    prompt: `${scope}\nSummarize it concisely in less than ${maxWords} words. Focus on the main points and overall topic.\n\nDocument:\n${content}`,
  };
}

function formatHistory(history: readonly ConversationTurn[]): string {
  return history.map((turn) => `User: ${turn.question}\nAssistant: ${turn.answer}`).join('\n\n');
}

export function buildAnswerPrompt(
  question: string,
  context: readonly ChunkRef[],
  history: readonly ConversationTurn[]
): { system: string; prompt: string } {
  const sections = [];
  if (history.length > 0) {
    sections.push(`Previous conversation (use it only to resolve follow-up references):\n${formatHistory(history)}`);
  }
  sections.push(`Context from the document:\n${formatLabelledChunks(context)}`);
  sections.push(`Question: ${question}`);

  return {
    system: [
      'You are a helpful assistant that answers questions about a single document.',
      'Answer ONLY from the provided context. Do not make up any information.',
      `If the answer cannot be found in the context, reply exactly: "${INSUFFICIENT_CONTEXT_ANSWER}"`,
    ].join('\n'),
    prompt: `${sections.join('\n\n')}\n\nYour answer:`,
  };
}

export function buildChallengePrompt(sample: readonly ChunkRef[], count: number): { system: string; prompt: string } {
  return {
    system: [
      'You write quiz questions that test understanding of a document.',
      'Questions must require reasoning or comprehension beyond simple fact lookup, and must be answerable from the excerpts.',
      'Respond with a JSON object of the form {"questions": [{"question": string, "chunks": number[]}]}',
      'where "chunks" lists the numbers of the excerpts that support the answer.',
    ].join('\n'),
    prompt: `Write ${count} unique logic-based or comprehension-focused questions.\n\nDocument excerpts:\n${formatLabelledChunks(sample)}`,
  };
}

export function buildEvaluationPrompt(
  question: string,
  answer: string,
  context: readonly ChunkRef[]
): { system: string; prompt: string } {
  return {
    system: [
      "You evaluate a user's answer to a question about a document, using ONLY the provided excerpts.",
      'State whether the answer is Correct, Partially Correct, or Incorrect, then justify the judgement by citing the excerpts.',
      'Use this format:',
      'Evaluation: Correct | Partially Correct | Incorrect',
      'Justification: <explanation based on the excerpts>',
    ].join('\n'),
    prompt: `Question: ${question}\nUser's answer: ${answer}\n\nDocument excerpts:\n${formatLabelledChunks(context)}`,
  };
}
