import type {
  CompletionProvider,
  CompletionRequest,
  Configuration,
  InputSource,
} from '@pipeask/types';
import { loadConfig } from '../config/ConfigLoader.js';
import { assemblePrompt } from '../context/InputAssembler.js';
import { describeError } from '../errors.js';
import { OpenAIProvider } from '../llm/OpenAIProvider.js';
import { appendHint, resolveOutputHint } from '../prompts/formatHint.js';
import { DEFAULT_INPUT_TOKEN_BUDGET, truncatePrompt } from '../prompts/truncate.js';
import { Transcript } from '../telemetry/Transcript.js';
import type { OrchestratorEvent } from './Events.js';

/** Options that configure a single run. */
export type OrchestratorOptions = {
  /** Path to the YAML config file */
  configPath: string;
  /** Approximate token budget for the outgoing prompt (default 8000) */
  inputTokenBudget?: number;
  /** Requested structured output formats */
  outputFormats?: { json?: boolean; yaml?: boolean };
  /** Build the request but do not send it */
  dryRun?: boolean;
  /** Optional directory to write a JSONL transcript to */
  logDir?: string;
  /** Provider factory (default: HTTP OpenAI provider) */
  createProvider?: (config: Configuration) => CompletionProvider;
  /** Receives pipeline progress events */
  onEvent?: (event: OrchestratorEvent) => void;
};

/** Outcome of a run. */
export type RunResult =
  | { kind: 'answer'; text: string }
  | { kind: 'dryRun'; request: CompletionRequest };

function defaultProvider(config: Configuration): CompletionProvider {
  return new OpenAIProvider({ apiKey: config.apiKey });
}

/** Build the chat-completion request for a prompt. */
export function buildCompletionRequest(config: Configuration, prompt: string): CompletionRequest {
  return {
    model: config.model,
    messages: [{ role: 'user', content: prompt }],
    max_tokens: config.maxTokens,
  };
}

/**
 * Runs the ask pipeline: validate flags, load config, assemble and trim the
 * prompt, then make at most one provider call.
 */
export class Orchestrator {
  private readonly options: OrchestratorOptions;

  public constructor(options: OrchestratorOptions) {
    this.options = options;
  }

  public async run(source: InputSource): Promise<RunResult> {
    const hint = resolveOutputHint(this.options.outputFormats ?? {});

    const config = await loadConfig(this.options.configPath);
    this.emit({ type: 'configLoaded', path: this.options.configPath, model: config.model });

    // Hint goes on before truncation, so a long prompt can lose it.
    const hinted = appendHint(assemblePrompt(source), hint);
    const prompt = truncatePrompt(
      hinted,
      this.options.inputTokenBudget ?? DEFAULT_INPUT_TOKEN_BUDGET
    );
    this.emit({
      type: 'promptAssembled',
      chars: Array.from(prompt).length,
      hint,
      truncated: prompt !== hinted,
    });

    const request = buildCompletionRequest(config, prompt);
    if (this.options.dryRun) {
      return { kind: 'dryRun', request };
    }

    // An unusable log directory fails the run before anything is sent.
    const transcript = this.options.logDir
      ? await Transcript.open({ logDir: this.options.logDir })
      : undefined;
    const provider = (this.options.createProvider ?? defaultProvider)(config);
    transcript?.write({ ts: Date.now(), type: 'request', model: config.model, prompt });
    this.emit({ type: 'requestSent', model: config.model });

    try {
      const text = await provider.complete(request);
      transcript?.write({ ts: Date.now(), type: 'response', text });
      this.emit({ type: 'completed', chars: Array.from(text).length });
      return { kind: 'answer', text };
    } catch (err) {
      transcript?.write({ ts: Date.now(), type: 'error', error: describeError(err) });
      throw err;
    } finally {
      await transcript?.close();
    }
  }

  private emit(event: OrchestratorEvent): void {
    this.options.onEvent?.(event);
  }
}
