import {
  ConfigError,
  DEFAULT_INPUT_TOKEN_BUDGET,
  OpenAIProvider,
  Orchestrator,
  type OrchestratorEvent,
  UsageError,
  defaultConfigPath,
  describeError,
  readStdin,
} from '@pipeask/core';
import { type OutputFormat, isOutputFormat } from '@pipeask/hints';
import { Command, InvalidArgumentError } from 'commander';

export const VERSION = '0.1.0';

export const USAGE = [
  'Usage: pipeask [--config <filepath>] [-ojson|-oyaml] [--max-tokens <number>] <input>',
  '   or: <command> | pipeask [-ojson|-oyaml] [--max-tokens <number>] <question>',
].join('\n');

/** Anything text can be written to. */
export type TextSink = { write(chunk: string): unknown };

/** Process surface the CLI runs against. */
export type CliIO = {
  stdin: AsyncIterable<Buffer | string>;
  /** Whether stdin is attached to a terminal (nothing piped) */
  stdinIsTTY: boolean;
  stdout: TextSink;
  stderr: TextSink;
  env: NodeJS.ProcessEnv;
  homeDir: string;
  exit: (code: number) => void;
  /** Fetch implementation for the completion request (default: global fetch) */
  fetch?: typeof fetch;
};

type CliOptions = {
  config: string;
  maxTokens: number;
  output: OutputFormat[];
  dryRun?: boolean;
  printConfig?: boolean;
  log?: string;
  verbose?: boolean;
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function collectFormat(value: string, previous: OutputFormat[]): OutputFormat[] {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError('Expected json or yaml.');
  }
  return [...previous, value];
}

function describeEvent(event: OrchestratorEvent): string {
  switch (event.type) {
    case 'configLoaded':
      return `config loaded from ${event.path} (model ${event.model})`;
    case 'promptAssembled':
      return `prompt: ${event.chars} chars, hint ${event.hint}${event.truncated ? ', truncated' : ''}`;
    case 'requestSent':
      return `request sent to ${event.model}`;
    case 'completed':
      return `answer: ${event.chars} chars`;
  }
}

/** Print a failure the way the CLI reports it and return the exit code. */
function reportError(err: unknown, io: CliIO): number {
  if (err instanceof UsageError) {
    io.stderr.write(`[pipeask] ${err.message}\n`);
    io.stdout.write(`${USAGE}\n`);
  } else if (err instanceof ConfigError) {
    io.stderr.write(`Error loading config: ${err.message}\n`);
  } else {
    io.stderr.write(`Error generating response: ${describeError(err)}\n`);
  }
  return 1;
}

async function runAsk(question: string[], opts: CliOptions, io: CliIO): Promise<number> {
  const effective = {
    configPath: opts.config,
    inputTokenBudget: opts.maxTokens,
    output: opts.output,
    dryRun: Boolean(opts.dryRun),
    logDir: opts.log,
  } as const;

  if (opts.printConfig) {
    io.stderr.write(`[pipeask] Effective config: ${JSON.stringify(effective)}\n`);
  }

  const orchestrator = new Orchestrator({
    configPath: effective.configPath,
    inputTokenBudget: effective.inputTokenBudget,
    outputFormats: {
      json: effective.output.includes('json'),
      yaml: effective.output.includes('yaml'),
    },
    dryRun: effective.dryRun,
    logDir: effective.logDir,
    createProvider: (config) => new OpenAIProvider({ apiKey: config.apiKey, fetch: io.fetch }),
    onEvent: opts.verbose
      ? (event) => io.stderr.write(`[pipeask] ${describeEvent(event)}\n`)
      : undefined,
  });

  try {
    const stdinText = io.stdinIsTTY ? undefined : await readStdin(io.stdin);
    const result = await orchestrator.run({ stdinText, argText: question.join(' ') });
    if (result.kind === 'dryRun') {
      io.stdout.write(`${JSON.stringify(result.request, null, 2)}\n`);
    } else {
      io.stdout.write(result.text);
    }
    return 0;
  } catch (err) {
    return reportError(err, io);
  }
}

function envTokenBudget(env: NodeJS.ProcessEnv): number {
  const parsed = Number(env.PIPEASK_MAX_TOKENS);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_INPUT_TOKEN_BUDGET;
}

/** Build the pipeask command bound to the given process surface. */
export function createProgram(io: CliIO): Command {
  const program = new Command();
  program
    .name('pipeask')
    .description('Ask a chat-completion model a question, with optional piped context')
    .version(VERSION)
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    })
    // Everything from the first question word on is question text, dashes included.
    .passThroughOptions()
    .argument('[question...]', 'Question to ask')
    .option('--config <path>', 'Path to config file', io.env.PIPEASK_CONFIG ?? defaultConfigPath(io.homeDir))
    .option(
      '--max-tokens <num>',
      'Approximate token budget for the input',
      parsePositiveInt,
      envTokenBudget(io.env)
    )
    .option('-o, --output <format>', 'Request json or yaml structured output', collectFormat, [])
    .option('--dry-run', 'Print the request instead of sending it', false)
    .option('--print-config', 'Print effective options before run', false)
    .option('--log <dir>', 'Directory to append a JSONL transcript to', io.env.PIPEASK_LOG_DIR)
    .option('--verbose', 'Print pipeline events to stderr', false)
    .action(async (question: string[], opts: CliOptions) => {
      io.exit(await runAsk(question, opts, io));
    });
  return program;
}
