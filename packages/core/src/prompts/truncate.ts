/** Rough average characters per model token. */
export const CHARS_PER_TOKEN = 4;

/** Default approximate token budget for the outgoing prompt. */
export const DEFAULT_INPUT_TOKEN_BUDGET = 8000;

export const TRUNCATION_MARKER = '\n...(input truncated due to length)';

/**
 * Cut `prompt` to roughly `maxTokens` tokens, counting code points rather
 * than UTF-16 units so a surrogate pair is never split.
 */
export function truncatePrompt(prompt: string, maxTokens: number): string {
  const maxChars = maxTokens * CHARS_PER_TOKEN;
  const codePoints = Array.from(prompt);
  if (codePoints.length <= maxChars) return prompt;
  return codePoints.slice(0, maxChars).join('') + TRUNCATION_MARKER;
}
