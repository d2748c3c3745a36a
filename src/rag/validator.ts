import { INSUFFICIENT_CONTEXT_ANSWER } from './prompts.js';
import { compactWhitespace } from './context-assembler.js';
import { logger } from '../util/logger.js';

export interface ReferenceValidation {
  /** Distinct indices that exist in the allowed set, in first-seen order */
  valid: number[];
  dropped: unknown[];
}

/**
 * Keep only chunk references the model was actually shown.
 * Anything that is not an allowed integer index is dropped.
 */
export function validateReferences(candidates: readonly unknown[], allowed: ReadonlySet<number>): ReferenceValidation {
  const valid: number[] = [];
  const dropped: unknown[] = [];
  for (const candidate of candidates) {
    if (typeof candidate === 'number' && allowed.has(candidate)) {
      if (!valid.includes(candidate)) valid.push(candidate);
    } else {
      dropped.push(candidate);
    }
  }
  if (dropped.length > 0) {
    logger.debug(`[ReferenceValidator] Dropped unknown chunk references: ${JSON.stringify(dropped)}`);
  }
  return { valid, dropped };
}

/**
 * Detect the model declining to answer with the sentence it was told to use
 */
export function isInsufficientContextAnswer(answer: string): boolean {
  const normalized = compactWhitespace(answer).toLowerCase().replace(/^["']+/, '');
  const expected = INSUFFICIENT_CONTEXT_ANSWER.toLowerCase().replace(/\.$/, '');
  return normalized.startsWith(expected);
}
