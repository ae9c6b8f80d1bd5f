import type { InputSource } from '@pipeask/types';
import { UsageError } from '../errors.js';

/**
 * Merge piped text and argument text into a single prompt.
 * Empty strings count as absent; with neither source present a
 * {@link UsageError} is thrown.
 */
export function assemblePrompt({ argText, stdinText }: InputSource): string {
  const question = argText ?? '';
  const context = stdinText ?? '';
  if (question && context) return `Question: ${question}\n\nContext:\n${context}`;
  if (context) return context;
  if (question) return question;
  throw new UsageError('no input provided');
}
