import type { OutputHint } from '../prompts/formatHint.js';

/** Events that the orchestrator emits while running a request. */
export type OrchestratorEvent =
  | { type: 'configLoaded'; path: string; model: string }
  | { type: 'promptAssembled'; chars: number; hint: OutputHint; truncated: boolean }
  | { type: 'requestSent'; model: string }
  | { type: 'completed'; chars: number };
