import { type OutputFormat, defaultFormatHints } from '@pipeask/hints';
import { UsageError } from '../errors.js';

/** Structured output requested from the model, if any. */
export type OutputHint = OutputFormat | 'none';

/** Resolve the format flags into a single hint, rejecting json together with yaml. */
export function resolveOutputHint({ json, yaml }: { json?: boolean; yaml?: boolean }): OutputHint {
  if (json && yaml) throw new UsageError('You can only specify json or yaml output');
  if (json) return 'json';
  if (yaml) return 'yaml';
  return 'none';
}

/** Append the structured-output instruction for `hint` after a blank line. */
export function appendHint(prompt: string, hint: OutputHint): string {
  if (hint === 'none') return prompt;
  return `${prompt}\n\n${defaultFormatHints[hint]}`;
}
